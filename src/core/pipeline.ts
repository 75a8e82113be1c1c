// src/core/pipeline.ts
// Pipeline glue between the asset containers and the editor model.
// - loadSession: container objects -> decoded collections -> RangeTable
// - buildSaveBatch / saveSession: RangeTable -> encoded objects -> containers

import type { Document, DocumentObject } from "./document";
import type { HighlightVariant, RangeEntry, Rgba } from "./ir";
import { RangeTable, type RangeLimits } from "./ranges";
import { NotFoundError } from "./errors";
import { WHITE } from "./color";
import { logInfo, logWarn } from "./log";
import {
    DEFAULT_PRESET_NAME,
    GAME_CUSTOM_LABEL_PREFIX,
    HIGHLIGHT_COLLECTION_NAMES,
    RATING_COLLECTION_NAME,
    RESERVED_COUNT,
} from "./constants";
import {
    decodeRangeCollection,
    encodeRangeCollection,
} from "../adapters/range-collection";
import {
    decodeHighlightToggle,
    encodeHighlightToggle,
} from "../adapters/highlight-collection";
import { decodeColorPreset } from "../adapters/preset-reader";
import { encodeColorPreset } from "../adapters/preset-writer";

/** A bundle (or anything bundle-like) holding named serialized objects. */
export interface AssetContainer {
    /** Resolves to null when no object carries that name. */
    readObject(name: string): Promise<Document | null>;
    writeObjects(objects: Record<string, Document>): Promise<void>;
}

export interface AssetSource {
    /** Holds the rating and highlight collections. */
    data: AssetContainer;
    /** Holds the color-rule presets. */
    styles: AssetContainer;
}

export interface SessionOptions extends Partial<RangeLimits> {
    collectionName?: string;
    highlightNames?: Partial<Record<HighlightVariant, string>>;
    /** Preset the colors are read from. */
    presetName?: string;
    /** Presets rewritten on save; defaults to the preset colors are read from. */
    writePresets?: string[];
    reservedCount?: number;
    labelPrefix?: string;
}

export interface SessionOriginals {
    collection: Document;
    presets: Record<string, Document>;
    highlights: Partial<Record<HighlightVariant, Document>>;
}

export interface Session {
    table: RangeTable;
    /** Row-number highlight; applied to every highlight collection present. */
    highlight: boolean;
    originals: SessionOriginals;
}

export interface SaveBatch {
    data: Record<string, DocumentObject>;
    styles: Record<string, DocumentObject>;
}

const VARIANTS: HighlightVariant[] = ["standard", "noBorder"];

function collectionNameOf(opts: SessionOptions): string {
    return opts.collectionName ?? RATING_COLLECTION_NAME;
}

function highlightNameOf(opts: SessionOptions, variant: HighlightVariant): string {
    return opts.highlightNames?.[variant] ?? HIGHLIGHT_COLLECTION_NAMES[variant];
}

function presetNameOf(opts: SessionOptions): string {
    return opts.presetName ?? DEFAULT_PRESET_NAME;
}

export async function loadSession(
    source: AssetSource,
    opts: SessionOptions = {}
): Promise<Session> {
    const collectionName = collectionNameOf(opts);
    const collectionDoc = await source.data.readObject(collectionName);
    if (collectionDoc === null) throw new NotFoundError(collectionName, "data container");
    const collection = decodeRangeCollection(collectionDoc);
    logInfo(`Loaded ${collectionName}: ${collection.boundaries.length} rows`);

    const presetName = presetNameOf(opts);
    const presets: Record<string, Document> = {};
    let colors: Rgba[] = [];
    const presetDoc = await source.styles.readObject(presetName);
    if (presetDoc === null) {
        logWarn(`${presetName} not found; every range starts white`);
    } else {
        presets[presetName] = presetDoc;
        colors = decodeColorPreset(presetDoc).colors;
        logInfo(`Loaded ${presetName}: ${colors.length} colors`);
    }

    for (const name of opts.writePresets ?? []) {
        if (name in presets) continue;
        const doc = await source.styles.readObject(name);
        if (doc === null) {
            logWarn(`${name} not found; it will not be rewritten`);
            continue;
        }
        presets[name] = doc;
    }

    const entries: RangeEntry[] = collection.boundaries.map((boundary, i) => ({
        boundary,
        label: collection.labels[i],
        color: colors[i] ?? { ...WHITE },
    }));
    const table = RangeTable.create(entries, {
        minEditable: opts.minEditable,
        maxEditable: opts.maxEditable,
        maxBoundary: opts.maxBoundary,
        maxInsertHint: opts.maxInsertHint,
        reservedCount: opts.reservedCount ?? RESERVED_COUNT,
        labelPrefix: opts.labelPrefix ?? GAME_CUSTOM_LABEL_PREFIX,
    });

    const highlights: Partial<Record<HighlightVariant, Document>> = {};
    let highlight = true;
    for (const variant of VARIANTS) {
        const name = highlightNameOf(opts, variant);
        const doc = await source.data.readObject(name);
        if (doc === null) {
            logInfo(`${name} not present; skipping`);
            continue;
        }
        highlights[variant] = doc;
        const toggle = decodeHighlightToggle(doc, variant);
        if (variant === "standard") highlight = toggle.enabled;
    }

    return { table, highlight, originals: { collection: collectionDoc, presets, highlights } };
}

/** Encode every object the session owns. Each encoder validates; nothing is written. */
export function buildSaveBatch(
    session: Session,
    opts: SessionOptions = {}
): SaveBatch {
    const { table, originals } = session;
    const data: Record<string, DocumentObject> = {};
    const styles: Record<string, DocumentObject> = {};

    data[collectionNameOf(opts)] = encodeRangeCollection(
        { boundaries: table.allBoundaries(), labels: table.allLabels() },
        originals.collection
    );

    for (const variant of VARIANTS) {
        const doc = originals.highlights[variant];
        if (doc === undefined) continue;
        data[highlightNameOf(opts, variant)] = encodeHighlightToggle(session.highlight, doc, variant);
    }

    const preset = { colors: table.allColors(), labels: table.allLabels() };
    for (const name of Object.keys(originals.presets)) {
        styles[name] = encodeColorPreset(preset, originals.presets[name]);
    }

    return { data, styles };
}

/** Encode everything first so a validation failure leaves both containers untouched. */
export async function saveSession(
    session: Session,
    source: AssetSource,
    opts: SessionOptions = {}
): Promise<SaveBatch> {
    const batch = buildSaveBatch(session, opts);

    await source.data.writeObjects(batch.data);
    logInfo(`Wrote ${Object.keys(batch.data).length} objects to the data container`);

    const styleNames = Object.keys(batch.styles);
    if (styleNames.length > 0) {
        await source.styles.writeObjects(batch.styles);
        logInfo(`Wrote ${styleNames.join(", ")} to the styles container`);
    }
    return batch;
}
