// src/core/normalize.ts
// Shared helpers for the two legal list shapes and for diagnostic paths.
// - Every read accepts a bare list or an object wrapping it under "Array"
// - Untouched lists can be re-emitted in whatever shape they arrived in

import {
    type Document,
    type DocumentObject,
    getField,
    isDocumentList,
    isDocumentObject,
} from "./document";

export const ARRAY_KEY = "Array";

export type ListShape = "bare" | "wrapped";

/* =========================
   Dual-shape list access
   ========================= */

/** Return the list behind either shape, or null when the value holds no list. */
export function readList(v: Document | undefined): Document[] | null {
    if (isDocumentList(v)) return v;
    if (isDocumentObject(v)) {
        const inner = getField(v, ARRAY_KEY);
        if (isDocumentList(inner)) return inner;
    }
    return null;
}

export function listShape(v: Document | undefined): ListShape | null {
    if (isDocumentList(v)) return "bare";
    if (isDocumentObject(v) && isDocumentList(getField(v, ARRAY_KEY)))
        return "wrapped";
    return null;
}

/** Emit `items` in the given shape; codec-rebuilt fields always pass "bare". */
export function withListShape(
    items: Document[],
    shape: ListShape | null
): Document {
    if (shape === "wrapped") {
        const wrapped: DocumentObject = {};
        wrapped[ARRAY_KEY] = items;
        return wrapped;
    }
    return items;
}

/** Object field read; returns undefined for non-objects. */
export function fieldOf(
    v: Document | undefined,
    key: string
): Document | undefined {
    return isDocumentObject(v) ? getField(v, key) : undefined;
}

/* =========================
   Paths
   ========================= */

export type PathSegment = string | number;

/** Render `["root", "m_Rules", 3]` as `root.m_Rules[3]`. */
export function formatPath(path: readonly PathSegment[]): string {
    let s = "";
    for (let i = 0; i < path.length; i++) {
        const seg = path[i];
        if (typeof seg === "number") s += "[" + seg + "]";
        else s += i === 0 ? seg : "." + seg;
    }
    return s;
}

/** Path segments leading into the list held by `v` (adds "Array" for the wrapped shape). */
export function listPath(
    base: readonly PathSegment[],
    v: Document | undefined
): PathSegment[] {
    return listShape(v) === "wrapped" ? [...base, ARRAY_KEY] : [...base];
}

/** Short description of a value's shape for error messages. */
export function describeShape(v: Document | undefined): string {
    if (v === undefined) return "missing";
    if (v === null) return "null";
    if (Array.isArray(v)) return "list";
    if (typeof v === "object") return "object";
    return typeof v;
}
