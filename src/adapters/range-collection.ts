// src/adapters/range-collection.ts
// Rating collection <-> RangeCollection.
// - Boundaries live in the integer column, style-class labels in the string column
// - Encoding swaps only those two row lists and the top-level row count

import type { Document, DocumentObject } from "../core/document";
import type { RangeCollection } from "../core/ir";
import { formatPath } from "../core/normalize";
import { StructureError } from "../core/errors";
import { validateDocument } from "../core/validate";
import { resolveColumn, replaceRows } from "./side-tables";

export function decodeRangeCollection(doc: Document): RangeCollection {
    const ints = resolveColumn(doc, "int");
    const strings = resolveColumn(doc, "string");

    const boundaries = ints.rows.map((v, i) => {
        if (typeof v !== "number" || !Number.isInteger(v))
            throw new StructureError(formatPath([...ints.rowsPath, i]), "an integer", JSON.stringify(v));
        return v;
    });
    const labels = strings.rows.map((v, i) => {
        if (typeof v !== "string")
            throw new StructureError(formatPath([...strings.rowsPath, i]), "a string", JSON.stringify(v));
        return v;
    });

    if (labels.length !== boundaries.length)
        throw new StructureError(
            formatPath(strings.rowsPath),
            `${boundaries.length} rows`,
            `${labels.length}`
        );

    return { boundaries, labels };
}

/** Rebuild the collection rows; the original document is left untouched. */
export function encodeRangeCollection(
    collection: RangeCollection,
    originalDoc: Document
): DocumentObject {
    const { boundaries, labels } = collection;
    if (boundaries.length !== labels.length)
        throw new StructureError("collection.labels", `${boundaries.length} labels`, `${labels.length}`);

    boundaries.forEach((b, i) => {
        if (!Number.isInteger(b))
            throw new StructureError(`collection.boundaries[${i}]`, "an integer", JSON.stringify(b));
    });

    validateDocument(originalDoc);
    const ints = resolveColumn(originalDoc, "int");
    const strings = resolveColumn(originalDoc, "string");

    const out = replaceRows(originalDoc, [
        { table: ints, rows: boundaries.slice(), shape: ints.shape },
        { table: strings, rows: labels.slice(), shape: strings.shape },
    ]);
    out["m_rows"] = boundaries.length;
    validateDocument(out);
    return out;
}
