// src/core/ranges.ts
// Ordered rating bands with the boundary cascade the editor relies on.
// - Boundaries strictly increase and the last one is pinned to the scale maximum
// - Moving, inserting or removing one range adjusts its neighbours

import type { RangeEntry, RangeSpan, Rgba } from './ir';
import { BoundaryError, CapacityError, StructureError } from './errors';
import { hexToRgba, isRgba } from './color';
import { allocateLabel } from './labels';
import {
  CUSTOM_LABEL_PREFIX,
  MAX_BOUNDARY,
  MAX_EDITABLE,
  MAX_INSERT_HINT,
  MIN_BOUNDARY,
  MIN_EDITABLE,
  RESERVED_COUNT,
} from './constants';

export interface RangeLimits {
  minEditable: number;
  maxEditable: number;
  maxBoundary: number;
  /** Upper bound applied to the boundary hint of an inserted range. */
  maxInsertHint: number;
}

export interface RangeTableOptions extends Partial<RangeLimits> {
  /** Leading entries kept verbatim and excluded from editing. */
  reservedCount?: number;
  /** Prefix for labels generated by `appendRange`. */
  labelPrefix?: string;
}

export type RangeTableEvent =
  | { type: 'thresholds'; boundaries: number[] }
  | { type: 'colors'; colors: Rgba[] }
  | { type: 'rows'; count: number };

export type RangeTableListener = (event: RangeTableEvent) => void;

export type BoundaryCheck =
  | { ok: true }
  | { ok: false; index: number; reason: string };

/** Verify ordering, range and the pinned last boundary of an editable boundary list. */
export function checkBoundaries(boundaries: readonly number[], maxBoundary = MAX_BOUNDARY): BoundaryCheck {
  for (let i = 0; i < boundaries.length; i++) {
    const b = boundaries[i];
    if (!Number.isInteger(b) || b < MIN_BOUNDARY || b > maxBoundary) {
      return { ok: false, index: i, reason: `boundary ${b} outside ${MIN_BOUNDARY}..${maxBoundary}` };
    }
    if (i > 0 && b <= boundaries[i - 1]) {
      return { ok: false, index: i, reason: `boundary ${b} is not above ${boundaries[i - 1]}` };
    }
  }
  const last = boundaries.length - 1;
  if (last >= 0 && boundaries[last] !== maxBoundary) {
    return { ok: false, index: last, reason: `last boundary must be ${maxBoundary}` };
  }
  return { ok: true };
}

function copyEntry(e: RangeEntry): RangeEntry {
  return { boundary: e.boundary, label: e.label, color: { r: e.color.r, g: e.color.g, b: e.color.b, a: e.color.a } };
}

function clamp(n: number, lo: number, hi: number): number {
  return n < lo ? lo : n > hi ? hi : n;
}

export class RangeTable {
  readonly limits: Readonly<RangeLimits>;
  private readonly labelPrefix: string;
  private readonly reserved: RangeEntry[];
  private readonly rows: RangeEntry[];
  private readonly listeners = new Set<RangeTableListener>();

  private constructor(reserved: RangeEntry[], rows: RangeEntry[], limits: Readonly<RangeLimits>, labelPrefix: string) {
    this.reserved = reserved;
    this.rows = rows;
    this.limits = limits;
    this.labelPrefix = labelPrefix;
  }

  /**
   * Build a table from the full entry list, reserved entries first.
   * The last editable boundary is pinned to the scale maximum; anything else that
   * breaks the table invariants is rejected rather than repaired.
   */
  static create(entries: readonly RangeEntry[], options: RangeTableOptions = {}): RangeTable {
    const limits: Readonly<RangeLimits> = Object.freeze({
      minEditable: options.minEditable ?? MIN_EDITABLE,
      maxEditable: options.maxEditable ?? MAX_EDITABLE,
      maxBoundary: options.maxBoundary ?? MAX_BOUNDARY,
      maxInsertHint: options.maxInsertHint ?? MAX_INSERT_HINT,
    });
    const reservedCount = options.reservedCount ?? RESERVED_COUNT;

    if (!Number.isInteger(limits.minEditable) || limits.minEditable < 1) {
      throw new CapacityError(limits.minEditable, 1, 'At least one editable range is required');
    }

    if (entries.length < reservedCount) {
      throw new CapacityError(entries.length, reservedCount, 'Not enough entries for the reserved ranges');
    }
    const reserved = entries.slice(0, reservedCount).map(copyEntry);
    const rows = entries.slice(reservedCount).map(copyEntry);

    if (rows.length < limits.minEditable) {
      throw new CapacityError(rows.length, limits.minEditable, 'Too few editable ranges');
    }
    if (rows.length > limits.maxEditable) {
      throw new CapacityError(rows.length, limits.maxEditable, 'Too many editable ranges');
    }

    rows[rows.length - 1].boundary = limits.maxBoundary;
    const check = checkBoundaries(rows.map(r => r.boundary), limits.maxBoundary);
    if (!check.ok) throw new BoundaryError(check.index, check.reason);

    for (let i = 0; i < rows.length; i++) {
      const at = `entries[${reservedCount + i}]`;
      if (rows[i].label.length === 0) throw new StructureError(at + '.label', 'a non-empty label', 'an empty string');
      if (!isRgba(rows[i].color)) throw new StructureError(at + '.color', 'RGBA channels in 0..1', JSON.stringify(rows[i].color));
    }

    return new RangeTable(reserved, rows, limits, options.labelPrefix ?? CUSTOM_LABEL_PREFIX);
  }

  /* ---------- accessors ---------- */

  get editableCount(): number {
    return this.rows.length;
  }

  boundaries(): number[] {
    return this.rows.map(r => r.boundary);
  }

  labels(): string[] {
    return this.rows.map(r => r.label);
  }

  colors(): Rgba[] {
    return this.rows.map(r => copyEntry(r).color);
  }

  entries(): RangeEntry[] {
    return this.rows.map(copyEntry);
  }

  reservedEntries(): RangeEntry[] {
    return this.reserved.map(copyEntry);
  }

  /** Reserved + editable, the order the serialized collection stores them in. */
  allBoundaries(): number[] {
    return this.reserved.map(r => r.boundary).concat(this.boundaries());
  }

  allLabels(): string[] {
    return this.reserved.map(r => r.label).concat(this.labels());
  }

  allColors(): Rgba[] {
    return this.reservedEntries().map(r => r.color).concat(this.colors());
  }

  /** Derived lower bound of a range; never stored. */
  impliedMinimum(index: number): number {
    this.checkIndex(index);
    return index === 0 ? MIN_BOUNDARY : this.rows[index - 1].boundary + 1;
  }

  /** [min, max] of every editable range, as displayed next to its color. */
  ranges(): RangeSpan[] {
    return this.rows.map((r, i): RangeSpan => [i === 0 ? MIN_BOUNDARY : this.rows[i - 1].boundary + 1, r.boundary]);
  }

  subscribe(listener: RangeTableListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /* ---------- mutations ---------- */

  /**
   * Move one boundary. The last boundary ignores the request (it stays pinned) but
   * still notifies. Other requests are clamped to the range's legal window, then
   * neighbours cascade until the ordering holds again.
   */
  setBoundary(index: number, value: number): void {
    this.checkIndex(index);
    if (!Number.isInteger(value)) throw new BoundaryError(index, `boundary must be an integer, got ${value}`);

    const last = this.rows.length - 1;
    if (index === last) {
      this.rows[last].boundary = this.limits.maxBoundary;
      this.emitThresholds();
      return;
    }

    const target = clamp(value, this.impliedMinimum(index), this.maxFor(index, this.rows.length));
    const current = this.rows[index].boundary;
    this.rows[index].boundary = target;

    if (target < current) {
      this.lowerPredecessors(index);
      this.raiseSuccessors(index);
    } else {
      this.pushCollapsed(index);
    }
    this.settle(index);
    this.emitThresholds();
  }

  /**
   * Insert a range at `index`; the fixed last range moves right. The boundary hint
   * is capped at `maxInsertHint` and raised to one past the previous boundary, so a
   * hint below the next range's boundary leaves every other range untouched.
   * Neighbours cascade only when that gap is empty.
   */
  insertAt(index: number, boundaryHint: number, label: string, color: Rgba): void {
    const count = this.rows.length;
    if (count >= this.limits.maxEditable) {
      throw new CapacityError(count, this.limits.maxEditable, 'Cannot add another range');
    }
    if (!Number.isInteger(index) || index < 0 || index > count - 1) {
      throw new BoundaryError(index, index === count ? 'cannot insert after the fixed last range' : `index outside 0..${count - 1}`);
    }
    if (!Number.isInteger(boundaryHint)) throw new BoundaryError(index, `boundary must be an integer, got ${boundaryHint}`);
    if (label.length === 0) throw new StructureError(`ranges[${index}].label`, 'a non-empty label', 'an empty string');
    if (!isRgba(color)) throw new StructureError(`ranges[${index}].color`, 'RGBA channels in 0..1', JSON.stringify(color));

    const hint = Math.min(boundaryHint, this.limits.maxInsertHint);
    const upper = this.maxFor(index, count + 1);
    const floor = Math.min(this.impliedMinimum(index), upper);
    const value = clamp(hint, floor, upper);
    this.rows.splice(index, 0, { boundary: value, label, color: { r: color.r, g: color.g, b: color.b, a: color.a } });
    this.pinLast();
    this.settle(index);

    this.emitThresholds();
    this.emitColors();
    this.emit({ type: 'rows', count: this.rows.length });
  }

  /** Add a range where the editor's "Add Range" button puts it; returns its index. */
  appendRange(color?: Rgba): number {
    const index = Math.min(3, this.rows.length - 1);
    const source = this.rows[index > 0 ? index - 1 : index];
    const label = allocateLabel(this.allLabels(), this.labelPrefix);
    this.insertAt(index, this.limits.maxInsertHint, label, color ?? source.color);
    return index;
  }

  removeAt(index: number): void {
    const count = this.rows.length;
    if (count <= this.limits.minEditable) {
      throw new CapacityError(count, this.limits.minEditable, 'Cannot remove another range');
    }
    this.checkIndex(index);
    if (index === count - 1) throw new BoundaryError(index, 'the last range cannot be removed');

    this.rows.splice(index, 1);
    this.emitThresholds();
    this.emitColors();
    this.emit({ type: 'rows', count: this.rows.length });
  }

  setColor(index: number, color: Rgba): void {
    this.checkIndex(index);
    if (!isRgba(color)) throw new StructureError(`ranges[${index}].color`, 'RGBA channels in 0..1', JSON.stringify(color));
    this.rows[index].color = { r: color.r, g: color.g, b: color.b, a: color.a };
    this.emitColors();
  }

  setColorHex(index: number, hex: string): void {
    this.setColor(index, hexToRgba(hex));
  }

  /* ---------- cascade ---------- */

  /** Highest boundary `index` may take while leaving one value for every later range. */
  private maxFor(index: number, count: number): number {
    return this.limits.maxBoundary - (count - 1 - index);
  }

  private pinLast(): void {
    this.rows[this.rows.length - 1].boundary = this.limits.maxBoundary;
  }

  /** Walk backward from `index - 1`, pulling each predecessor below its successor. */
  private lowerPredecessors(index: number): boolean {
    let changed = false;
    for (let i = index - 1; i >= 0; i--) {
      const cap = this.rows[i + 1].boundary - 1;
      if (this.rows[i].boundary > cap) {
        this.rows[i].boundary = cap;
        changed = true;
      }
    }
    return changed;
  }

  /** Walk forward from `index + 1`, raising each successor to its implied minimum. */
  private raiseSuccessors(index: number): boolean {
    let changed = false;
    for (let i = index + 1; i < this.rows.length; i++) {
      const min = this.rows[i - 1].boundary + 1;
      if (this.rows[i].boundary < min) {
        this.rows[i].boundary = min;
        changed = true;
      }
    }
    return changed;
  }

  /**
   * Growth cascade: push the next range up to one past its predecessor, and keep
   * going only while each pushed range collapses onto its implied minimum.
   */
  private pushCollapsed(index: number): void {
    for (let i = index + 1; i < this.rows.length; i++) {
      const min = this.rows[i - 1].boundary + 1;
      if (this.rows[i].boundary >= min) {
        if (this.rows[i].boundary > min) return;
        continue;
      }
      this.rows[i].boundary = min;
    }
  }

  /** Repeat both walks until neither moves anything. */
  private settle(anchor: number): void {
    for (let pass = 0; pass <= this.rows.length; pass++) {
      const raised = this.raiseSuccessors(anchor);
      const lowered = this.lowerPredecessors(anchor);
      this.pinLast();
      if (!raised && !lowered) break;
    }
    const check = checkBoundaries(this.boundaries(), this.limits.maxBoundary);
    if (!check.ok) throw new BoundaryError(check.index, check.reason);
  }

  /* ---------- plumbing ---------- */

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.rows.length) {
      throw new BoundaryError(index, `index outside 0..${this.rows.length - 1}`);
    }
  }

  private emitThresholds(): void {
    this.emit({ type: 'thresholds', boundaries: this.boundaries() });
  }

  private emitColors(): void {
    this.emit({ type: 'colors', colors: this.colors() });
  }

  private emit(event: RangeTableEvent): void {
    for (const listener of Array.from(this.listeners)) listener(event);
  }
}
