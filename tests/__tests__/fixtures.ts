import {
    type Document,
    type DocumentObject,
    cloneDocument,
    isDocumentObject,
} from "../../src/core/document";
import type { Rgba } from "../../src/core/ir";
import type { AssetContainer } from "../../src/core/pipeline";

export const INT_RID = 1001;
export const STRING_RID = 1002;

const TYPE_NS = { ns: "Game.UI", asm: "Game.UI" };

function rowList(items: Document[], wrapped: boolean): Document {
    return wrapped ? { Array: items } : items;
}

/** Two-column data collection plus one unrelated reference. */
export function collectionDoc(
    ints: Document[],
    strings: Document[],
    wrapped = false
): DocumentObject {
    return {
        m_Name: "TestCollection",
        m_rows: ints.length,
        m_columns: [{ rid: INT_RID }, { rid: STRING_RID }],
        references: {
            version: 2,
            RefIds: [
                {
                    rid: INT_RID,
                    type: { class: "IntDataSet", ...TYPE_NS },
                    data: { m_rows: rowList(ints, wrapped) },
                },
                {
                    rid: STRING_RID,
                    type: { class: "StringDataSet", ...TYPE_NS },
                    data: { m_rows: rowList(strings, wrapped) },
                },
                {
                    rid: 1003,
                    type: { class: "IntDataSet", ...TYPE_NS },
                    data: { m_rows: [7, 8] },
                },
            ],
        },
    };
}

export function colorRule(valueType: number, valueIndex: number): DocumentObject {
    return {
        m_Properties: [
            {
                m_Name: "color",
                m_Line: 3,
                m_Values: [{ m_ValueType: valueType, valueIndex }],
            },
        ],
        line: 2,
    };
}

export function selector(label: string, ruleIndex: number): DocumentObject {
    return {
        m_Specificity: 11,
        m_Selectors: [
            { m_Parts: [{ m_Value: label, m_Type: 3 }], m_PreviousRelationship: 0 },
        ],
        ruleIndex,
    };
}

/** Preset whose i-th rule points at the i-th entry of `colors`. */
export function presetDoc(colors: Rgba[], labels: string[]): DocumentObject {
    return {
        m_Name: "TestPreset",
        m_ImportedWithWarnings: false,
        m_Rules: colors.map((_, i) => colorRule(4, i)),
        colors: colors.map((c) => ({ r: c.r, g: c.g, b: c.b, a: c.a })),
        floats: [0.25],
        m_ComplexSelectors: labels.map((l, i) => selector(l, i)),
    };
}

export function rgba(r: number, g: number, b: number, a = 1): Rgba {
    return { r, g, b, a };
}

/** Walk object keys and list indices; undefined as soon as a step is missing. */
export function dig(
    v: Document | undefined,
    ...path: Array<string | number>
): Document | undefined {
    let cur = v;
    for (const seg of path) {
        if (typeof seg === "number") {
            cur = Array.isArray(cur) ? cur[seg] : undefined;
        } else {
            cur = isDocumentObject(cur) ? cur[seg] : undefined;
        }
    }
    return cur;
}

/** Deterministic sequence for property-style checks. */
export function lcg(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
        return state / 4294967296;
    };
}

export class MemoryContainer implements AssetContainer {
    readonly objects = new Map<string, Document>();
    readonly writes: Array<Record<string, Document>> = [];

    constructor(initial: Record<string, Document> = {}) {
        for (const name of Object.keys(initial)) this.objects.set(name, initial[name]);
    }

    async readObject(name: string): Promise<Document | null> {
        const v = this.objects.get(name);
        return v === undefined ? null : cloneDocument(v);
    }

    async writeObjects(objects: Record<string, Document>): Promise<void> {
        this.writes.push(objects);
        for (const name of Object.keys(objects)) this.objects.set(name, objects[name]);
    }
}
