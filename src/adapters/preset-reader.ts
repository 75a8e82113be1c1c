// src/adapters/preset-reader.ts
// Read a color-rule preset into positional colors and labels.
// - Each rule's `color` property points either into `colors` or, in older
//   presets, at four consecutive entries of `floats`
// - Labels come from the complex selectors, bound to rules by `ruleIndex`

import { type Document, getField, isDocumentObject } from "../core/document";
import type { ColorPreset, Rgba } from "../core/ir";
import { describeShape, fieldOf, readList } from "../core/normalize";
import { StructureError } from "../core/errors";
import { WHITE } from "../core/color";
import { logWarn } from "../core/log";
import {
    COLOR_PROPERTY_NAME,
    VALUE_TYPE_COLOR,
    VALUE_TYPE_FLOAT,
} from "../core/constants";

function channel(obj: Document, key: string): number {
    const v = fieldOf(obj, key);
    if (typeof v !== "number" || !Number.isFinite(v)) return 1;
    return v < 0 ? 0 : v > 1 ? 1 : v;
}

/** `{ r, g, b, a }` object -> Rgba; absent channels read as 1.0. */
function colorFromObject(obj: Document): Rgba | null {
    if (!isDocumentObject(obj)) return null;
    return {
        r: channel(obj, "r"),
        g: channel(obj, "g"),
        b: channel(obj, "b"),
        a: channel(obj, "a"),
    };
}

function unit(v: Document | undefined): number | null {
    if (typeof v !== "number" || !Number.isFinite(v)) return null;
    return v < 0 ? 0 : v > 1 ? 1 : v;
}

function colorFromFloats(floats: Document[], start: number): Rgba | null {
    const r = unit(floats[start]);
    const g = unit(floats[start + 1]);
    const b = unit(floats[start + 2]);
    if (r === null || g === null || b === null) return null;
    return { r, g, b, a: unit(floats[start + 3]) ?? 1 };
}

function resolveRuleColor(
    rule: Document,
    colors: Document[],
    floats: Document[]
): Rgba | null {
    const props = readList(fieldOf(rule, "m_Properties")) ?? [];
    const prop = props.find((p) => fieldOf(p, "m_Name") === COLOR_PROPERTY_NAME);
    const desc = (readList(fieldOf(prop, "m_Values")) ?? [])[0];

    const index = fieldOf(desc, "valueIndex");
    if (typeof index !== "number" || !Number.isInteger(index) || index < 0) return null;

    switch (fieldOf(desc, "m_ValueType")) {
        case VALUE_TYPE_COLOR:
            return index < colors.length ? colorFromObject(colors[index]) : null;
        case VALUE_TYPE_FLOAT:
            return colorFromFloats(floats, index);
        default:
            return null;
    }
}

/** First class-name part of each selector, placed at its rule's position. */
function readLabels(doc: Document, ruleCount: number): string[] {
    const labels: string[] = new Array<string>(ruleCount).fill("");
    const selectors = readList(fieldOf(doc, "m_ComplexSelectors")) ?? [];
    for (const sel of selectors) {
        const ruleIndex = fieldOf(sel, "ruleIndex");
        if (typeof ruleIndex !== "number" || ruleIndex < 0 || ruleIndex >= ruleCount) continue;
        if (labels[ruleIndex] !== "") continue;
        const first = (readList(fieldOf(sel, "m_Selectors")) ?? [])[0];
        const part = (readList(fieldOf(first, "m_Parts")) ?? [])[0];
        const value = fieldOf(part, "m_Value");
        if (typeof value === "string") labels[ruleIndex] = value;
    }
    return labels;
}

export function decodeColorPreset(doc: Document): ColorPreset {
    if (!isDocumentObject(doc))
        throw new StructureError("root", "an object", describeShape(doc));

    const rawRules = getField(doc, "m_Rules");
    const rules = readList(rawRules);
    if (!rules)
        throw new StructureError("root.m_Rules", "a list", describeShape(rawRules));

    const colorList = readList(getField(doc, "colors")) ?? [];
    const floats = readList(getField(doc, "floats")) ?? [];

    const resolved = rules.map((rule) => resolveRuleColor(rule, colorList, floats));
    let colors: Rgba[];
    const complete: Rgba[] = [];
    for (const c of resolved) if (c) complete.push(c);

    if (complete.length === rules.length) {
        colors = complete;
    } else if (colorList.length === rules.length) {
        colors = colorList.map((c) => colorFromObject(c) ?? { ...WHITE });
    } else {
        logWarn(
            `Could not resolve ${rules.length - complete.length} of ${rules.length} rule colors; using white`
        );
        colors = rules.map(() => ({ ...WHITE }));
    }

    return { colors, labels: readLabels(doc, rules.length) };
}
