// src/adapters/highlight-collection.ts
// Row-number highlight on/off, stored as the label rows of a small collection.
// Disabled is three copies of the variant's base label; anything else reads as enabled.

import type { Document, DocumentObject } from "../core/document";
import type { HighlightToggle, HighlightVariant } from "../core/ir";
import { formatPath } from "../core/normalize";
import { StructureError } from "../core/errors";
import { validateDocument } from "../core/validate";
import { HIGHLIGHT_LABELS } from "../core/constants";
import { resolveColumn, replaceRows } from "./side-tables";

export function highlightRows(variant: HighlightVariant, enabled: boolean): string[] {
    const labels = HIGHLIGHT_LABELS[variant];
    return enabled ? [...labels] : [labels[0], labels[0], labels[0]];
}

export function decodeHighlightToggle(
    doc: Document,
    variant: HighlightVariant = "standard"
): HighlightToggle {
    const table = resolveColumn(doc, "string");
    const rows = table.rows.map((v, i) => {
        if (typeof v !== "string")
            throw new StructureError(formatPath([...table.rowsPath, i]), "a string", JSON.stringify(v));
        return v;
    });
    const base = HIGHLIGHT_LABELS[variant][0];
    const disabled = rows.length === 3 && rows.every((r) => r === base);
    return { rows, enabled: !disabled };
}

export function encodeHighlightToggle(
    enabled: boolean,
    originalDoc: Document,
    variant: HighlightVariant = "standard"
): DocumentObject {
    validateDocument(originalDoc);
    const table = resolveColumn(originalDoc, "string");
    const out = replaceRows(originalDoc, [
        { table, rows: highlightRows(variant, enabled), shape: "bare" },
    ]);
    validateDocument(out);
    return out;
}
