// src/core/ir.ts
// Domain types shared between the range model, the codec and the session pipeline.
// - Mirrors only what the editor owns; everything else rides along in the original Document
// - Keeps colors as plain 0..1 floats so the codec can emit them verbatim

/** Straight-alpha color with every channel in 0..1. */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** One rating band: inclusive upper bound, style-class label and display color. */
export interface RangeEntry {
  boundary: number;
  label: string;
  color: Rgba;
}

/** Side-table rows of the rating collection, reserved rows included. */
export interface RangeCollection {
  boundaries: number[];
  labels: string[];
}

/** Colors of one preset, positionally bound to the labels its selectors name. */
export interface ColorPreset {
  colors: Rgba[];
  labels: string[];
}

/** The two highlight collections carry different canonical style classes. */
export type HighlightVariant = 'standard' | 'noBorder';

export interface HighlightToggle {
  rows: string[];
  enabled: boolean;
}

/** Closed [min, max] rating interval, as shown next to each range. */
export type RangeSpan = [number, number];
