// src/adapters/side-tables.ts
// Locate the integer and string columns of a data collection.
// - `m_columns[0]` names the integer column, `m_columns[1]` the string column
// - Each column is a `{ rid }` pointing into `references.RefIds`

import {
    type Document,
    type DocumentObject,
    cloneDocument,
    getField,
    isDocumentObject,
} from "../core/document";
import {
    type ListShape,
    type PathSegment,
    describeShape,
    fieldOf,
    formatPath,
    listPath,
    listShape,
    readList,
    withListShape,
} from "../core/normalize";
import { StructureError } from "../core/errors";
import { INT_DATASET_CLASS, STRING_DATASET_CLASS } from "../core/constants";

export type ColumnKind = "int" | "string";

const COLUMN_CLASS: Record<ColumnKind, string> = {
    int: INT_DATASET_CLASS,
    string: STRING_DATASET_CLASS,
};
const COLUMN_POSITION: Record<ColumnKind, number> = { int: 0, string: 1 };

export interface SideTable {
    /** Position of the backing entry inside `references.RefIds`. */
    refIndex: number;
    rows: Document[];
    /** Shape the row list arrived in. */
    shape: ListShape;
    /** Path segments of the row list, for row-level diagnostics. */
    rowsPath: PathSegment[];
}

function rootObject(doc: Document): DocumentObject {
    if (!isDocumentObject(doc))
        throw new StructureError("root", "an object", describeShape(doc));
    return doc;
}

function refIdsOf(root: DocumentObject): Document[] {
    const raw = fieldOf(getField(root, "references"), "RefIds");
    const refs = readList(raw);
    if (!refs)
        throw new StructureError("root.references.RefIds", "a list", describeShape(raw));
    return refs;
}

/** Resolve one column of a data collection to its row list. */
export function resolveColumn(doc: Document, kind: ColumnKind): SideTable {
    const root = rootObject(doc);

    const rawColumns = getField(root, "m_columns");
    const columns = readList(rawColumns);
    if (!columns)
        throw new StructureError("root.m_columns", "a list", describeShape(rawColumns));

    const position = COLUMN_POSITION[kind];
    const columnPath = [...listPath(["root", "m_columns"], rawColumns), position];
    const column = columns[position];
    if (!isDocumentObject(column))
        throw new StructureError(formatPath(columnPath), "a column reference", describeShape(column));

    const rid = getField(column, "rid");
    if (typeof rid !== "number" && typeof rid !== "string")
        throw new StructureError(formatPath([...columnPath, "rid"]), "a reference id", describeShape(rid));

    const rawRefs = fieldOf(getField(root, "references"), "RefIds");
    const refs = refIdsOf(root);
    const cls = COLUMN_CLASS[kind];
    const refIndex = refs.findIndex(
        (ref) =>
            fieldOf(ref, "rid") === rid &&
            fieldOf(fieldOf(ref, "type"), "class") === cls
    );
    if (refIndex < 0)
        throw new StructureError(
            formatPath([...columnPath, "rid"]),
            `a ${cls} reference with rid ${rid}`,
            "none"
        );

    const data = fieldOf(refs[refIndex], "data");
    const rawRows = fieldOf(data, "m_rows");
    const refPath = [...listPath(["root", "references", "RefIds"], rawRefs), refIndex, "data", "m_rows"];
    const rows = readList(rawRows);
    const shape = listShape(rawRows);
    if (!rows || !shape)
        throw new StructureError(formatPath(refPath), "a list", describeShape(rawRows));

    return { refIndex, rows, shape, rowsPath: listPath(refPath, rawRows) };
}

export interface RowPatch {
    table: SideTable;
    rows: Document[];
    shape: ListShape;
}

/**
 * Fresh copy of `doc` with the given side-table row lists replaced.
 * Every other reference and field is carried over unchanged.
 */
export function replaceRows(doc: Document, patches: readonly RowPatch[]): DocumentObject {
    const out = cloneDocument(rootObject(doc));
    const refs = refIdsOf(out);
    for (const patch of patches) {
        const ref = refs[patch.table.refIndex];
        const data = fieldOf(ref, "data");
        if (!isDocumentObject(data))
            throw new StructureError(
                formatPath(["root", "references", "RefIds", patch.table.refIndex, "data"]),
                "an object",
                describeShape(data)
            );
        data["m_rows"] = withListShape(patch.rows, patch.shape);
    }
    return out;
}
