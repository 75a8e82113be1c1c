// src/core/document.ts
// The weakly-typed tree that the asset container hands us for each named object.

export type Document =
    | null
    | boolean
    | number
    | string
    | DocumentObject
    | Document[];

/** String-keyed node; key order follows insertion, matching the serialized field order. */
export interface DocumentObject {
    [key: string]: Document;
}

export function isDocumentObject(v: Document | undefined): v is DocumentObject {
    return !!v && typeof v === "object" && !Array.isArray(v);
}

export function isDocumentList(v: Document | undefined): v is Document[] {
    return Array.isArray(v);
}

/** Own-key lookup that never walks the prototype chain. */
export function getField(
    obj: DocumentObject,
    key: string
): Document | undefined {
    return Object.prototype.hasOwnProperty.call(obj, key)
        ? obj[key]
        : undefined;
}

export function cloneDocument<T extends Document>(v: T): T;
export function cloneDocument(v: Document): Document {
    if (Array.isArray(v)) return v.map((item) => cloneDocument(item));
    if (isDocumentObject(v)) {
        const out: DocumentObject = {};
        for (const k of Object.keys(v)) out[k] = cloneDocument(v[k]);
        return out;
    }
    return v;
}
