// src/index.ts
// Public surface: the range model, the codecs and the session pipeline.

export type { Document, DocumentObject } from "./core/document";
export { cloneDocument, isDocumentList, isDocumentObject } from "./core/document";
export type {
  ColorPreset,
  HighlightToggle,
  HighlightVariant,
  RangeCollection,
  RangeEntry,
  RangeSpan,
  Rgba,
} from "./core/ir";
export type { ListShape } from "./core/normalize";
export { readList, listShape } from "./core/normalize";

export {
  BoundaryError,
  CapacityError,
  EditorError,
  NotFoundError,
  StructureError,
} from "./core/errors";
export { logInfo, logWarn, setLogSink } from "./core/log";
export type { LogLevel, LogSink } from "./core/log";
export * from "./core/constants";

export { colorToHex, hexToRgba, isRgba, rgbaToHex, WHITE } from "./core/color";
export { allocateLabel } from "./core/labels";
export { RangeTable, checkBoundaries } from "./core/ranges";
export type {
  BoundaryCheck,
  RangeLimits,
  RangeTableEvent,
  RangeTableListener,
  RangeTableOptions,
} from "./core/ranges";
export { validateDocument } from "./core/validate";

export { decodeRangeCollection, encodeRangeCollection } from "./adapters/range-collection";
export { decodeHighlightToggle, encodeHighlightToggle } from "./adapters/highlight-collection";
export { decodeColorPreset } from "./adapters/preset-reader";
export { encodeColorPreset } from "./adapters/preset-writer";

export { buildSaveBatch, loadSession, saveSession } from "./core/pipeline";
export type {
  AssetContainer,
  AssetSource,
  SaveBatch,
  Session,
  SessionOptions,
} from "./core/pipeline";
