// src/core/validate.ts
// One recursive pass over the codec-owned parts of a Document.
// The first violation is thrown as a StructureError carrying its exact path.

import {
    type Document,
    type DocumentObject,
    getField,
    isDocumentObject,
} from "./document";
import {
    type PathSegment,
    describeShape,
    formatPath,
    listPath,
    readList,
} from "./normalize";
import { StructureError } from "./errors";

/** Fields whose string values are names, not data. */
const NAME_KEYS = new Set(["m_Name", "m_Value", "class", "ns", "asm"]);
/** Row lists of string side-tables. */
const ROW_LIST_KEYS = new Set(["m_rows", "strings"]);
const CHANNEL_KEYS = ["r", "g", "b", "a"];

function fail(path: readonly PathSegment[], expected: string, v: Document | undefined): never {
    throw new StructureError(formatPath(path), expected, describeShape(v));
}

/**
 * Optional list field: absent is fine, anything else must be a list in either shape.
 * Returns the items together with the path prefix their indices hang off.
 */
function listField(
    owner: DocumentObject,
    key: string,
    base: readonly PathSegment[]
): { items: Document[]; path: PathSegment[] } | null {
    const raw = getField(owner, key);
    if (raw === undefined) return null;
    const items = readList(raw);
    const path = [...base, key];
    if (!items) fail(path, "a list", raw);
    return { items, path: listPath(path, raw) };
}

function checkStrings(v: Document, path: PathSegment[], allowed: boolean): void {
    if (typeof v === "string") {
        if (!allowed) throw new StructureError(formatPath(path), "a non-string value", JSON.stringify(v));
        return;
    }
    if (Array.isArray(v)) {
        v.forEach((item, i) => checkStrings(item, [...path, i], allowed));
        return;
    }
    if (isDocumentObject(v)) {
        for (const key of Object.keys(v)) {
            const inner = allowed || NAME_KEYS.has(key) || ROW_LIST_KEYS.has(key);
            checkStrings(v[key], [...path, key], inner);
        }
    }
}

function checkRule(rule: Document, path: PathSegment[]): void {
    if (!isDocumentObject(rule)) fail(path, "an object", rule);

    const props = getField(rule, "m_Properties");
    const propList = readList(props);
    if (!propList) fail([...path, "m_Properties"], "a list", props);
    const propsPath = listPath([...path, "m_Properties"], props);

    propList.forEach((prop, p) => {
        const at = [...propsPath, p];
        if (!isDocumentObject(prop)) fail(at, "an object", prop);
        const values = getField(prop, "m_Values");
        const valueList = readList(values);
        if (!valueList) fail([...at, "m_Values"], "a list", values);
        const valuesPath = listPath([...at, "m_Values"], values);
        valueList.forEach((desc, d) => {
            const vat = [...valuesPath, d];
            if (!isDocumentObject(desc)) fail(vat, "an object", desc);
            const tag = getField(desc, "m_ValueType");
            if (typeof tag !== "number") fail([...vat, "m_ValueType"], "a number", tag);
        });
    });

    checkStrings(rule, path, false);
}

/** Throw a StructureError for the first malformed codec-owned structure in `doc`. */
export function validateDocument(doc: Document): void {
    const root: PathSegment[] = ["root"];
    if (!isDocumentObject(doc)) fail(root, "an object", doc);

    const rules = listField(doc, "m_Rules", root);
    if (rules) rules.items.forEach((rule, i) => checkRule(rule, [...rules.path, i]));

    const selectors = listField(doc, "m_ComplexSelectors", root);
    if (selectors) {
        selectors.items.forEach((sel, i) => {
            const at = [...selectors.path, i];
            if (!isDocumentObject(sel)) fail(at, "an object", sel);
            checkStrings(sel, at, false);
        });
    }

    const colors = listField(doc, "colors", root);
    if (colors) {
        colors.items.forEach((c, i) => {
            const at = [...colors.path, i];
            if (!isDocumentObject(c)) fail(at, "an object", c);
            for (const ch of CHANNEL_KEYS) {
                const v = getField(c, ch);
                if (v !== undefined && (typeof v !== "number" || !Number.isFinite(v)))
                    throw new StructureError(formatPath([...at, ch]), "a finite number", JSON.stringify(v));
            }
            checkStrings(c, at, false);
        });
    }

    const floats = listField(doc, "floats", root);
    if (floats) {
        floats.items.forEach((f, i) => {
            if (typeof f !== "number") fail([...floats.path, i], "a number", f);
            if (!Number.isFinite(f))
                throw new StructureError(formatPath([...floats.path, i]), "a finite number", String(f));
        });
    }

    const references = getField(doc, "references");
    if (isDocumentObject(references)) {
        const refIds = listField(references, "RefIds", [...root, "references"]);
        if (refIds) {
            refIds.items.forEach((ref, i) => {
                const at = [...refIds.path, i];
                if (!isDocumentObject(ref)) fail(at, "an object", ref);
                checkStrings(ref, at, false);
            });
        }
    } else if (references !== undefined) {
        fail([...root, "references"], "an object", references);
    }
}
