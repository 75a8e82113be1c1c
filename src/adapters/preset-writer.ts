// src/adapters/preset-writer.ts
// ColorPreset -> color-rule document. Rules, colors and selectors are always rebuilt
// from scratch; `floats` and every unrelated field come from the original as-is.

import {
    type Document,
    type DocumentObject,
    cloneDocument,
    isDocumentObject,
} from "../core/document";
import type { ColorPreset, Rgba } from "../core/ir";
import { describeShape } from "../core/normalize";
import { isRgba } from "../core/color";
import { StructureError } from "../core/errors";
import { validateDocument } from "../core/validate";
import {
    COLOR_PROPERTY_NAME,
    SELECTOR_PART_CLASS,
    SELECTOR_SPECIFICITY,
    VALUE_TYPE_COLOR,
} from "../core/constants";

// Line numbers are placeholders; the game only needs them to be distinct.
function ruleFor(i: number): DocumentObject {
    return {
        m_Properties: [
            {
                m_Name: COLOR_PROPERTY_NAME,
                m_Line: 3 + 4 * i,
                m_Values: [{ m_ValueType: VALUE_TYPE_COLOR, valueIndex: i }],
            },
        ],
        line: 2 + 4 * i,
    };
}

function selectorFor(label: string, i: number): DocumentObject {
    return {
        m_Specificity: SELECTOR_SPECIFICITY,
        m_Selectors: [
            {
                m_Parts: [{ m_Value: label, m_Type: SELECTOR_PART_CLASS }],
                m_PreviousRelationship: 0,
            },
        ],
        ruleIndex: i,
    };
}

function colorEntry(c: Rgba): DocumentObject {
    return { r: c.r, g: c.g, b: c.b, a: c.a };
}

export function encodeColorPreset(
    preset: ColorPreset,
    originalDoc: Document
): DocumentObject {
    const { colors, labels } = preset;
    if (colors.length !== labels.length)
        throw new StructureError("preset.labels", `${colors.length} labels`, `${labels.length}`);

    colors.forEach((c, i) => {
        if (!isRgba(c))
            throw new StructureError(`preset.colors[${i}]`, "RGBA channels in 0..1", JSON.stringify(c));
    });

    validateDocument(originalDoc);
    if (!isDocumentObject(originalDoc))
        throw new StructureError("root", "an object", describeShape(originalDoc));

    const out: DocumentObject = {};
    for (const key of Object.keys(originalDoc)) {
        out[key] = cloneDocument(originalDoc[key]);
    }
    out["m_Rules"] = colors.map((_, i) => ruleFor(i));
    out["colors"] = colors.map(colorEntry);
    out["m_ComplexSelectors"] = labels.map(selectorFor);
    validateDocument(out);
    return out;
}
