// src/core/constants.ts
// Names and limits observed in the shipped asset objects. Callers override any of
// these per call through the options objects; nothing is read from the environment.

import type { HighlightVariant } from "./ir";

/* ---------- object names ---------- */

export const RATING_COLLECTION_NAME = "AttributeDataCollection";
export const HIGHLIGHT_COLLECTION_NAMES: Record<HighlightVariant, string> = {
    standard: "AttributeHighlightTypeDataCollection",
    noBorder: "AttributeHighlightTypeNoBorderDataCollection",
};

export const DEFAULT_PRESET_NAME = "AttributeColoursDefault";

/* ---------- range table limits ---------- */

/** Leading "Unset"/"Low" bands carried verbatim and never shown for editing. */
export const RESERVED_COUNT = 2;
export const MIN_EDITABLE = 4;
export const MAX_EDITABLE = 18;
export const MIN_BOUNDARY = 1;
export const MAX_BOUNDARY = 20;
/** Largest boundary a freshly inserted range may request. */
export const MAX_INSERT_HINT = MAX_BOUNDARY - 1;

/* ---------- labels ---------- */

export const CUSTOM_LABEL_PREFIX = "custom-";
export const GAME_CUSTOM_LABEL_PREFIX = "attribute-colour-custom-";

export const HIGHLIGHT_LABELS: Record<
    HighlightVariant,
    readonly [string, string, string]
> = {
    standard: [
        "attributes-row-number",
        "attributes-row-number-preference",
        "attributes-row-number-key",
    ],
    noBorder: [
        "attributes-row-number-no-border",
        "attributes-row-number-preference-no-border",
        "attributes-row-number-key-no-border",
    ],
};

/* ---------- serialized tags ---------- */

export const INT_DATASET_CLASS = "IntDataSet";
export const STRING_DATASET_CLASS = "StringDataSet";

/** `m_ValueType` of a value descriptor pointing into the `colors` list. */
export const VALUE_TYPE_COLOR = 4;
/** `m_ValueType` of the legacy descriptor pointing at four entries of `floats`. */
export const VALUE_TYPE_FLOAT = 2;
/** `m_Type` of a class-name selector part. */
export const SELECTOR_PART_CLASS = 3;
export const SELECTOR_SPECIFICITY = 11;
export const COLOR_PROPERTY_NAME = "color";
