// src/core/color.ts
// RGBA float <-> hex conversion for range colors.
// - Emits "#RRGGBBAA" so alpha always survives a round trip through the editor
// - Accepts 6 or 8 hex digits on the way back in, with or without '#'

import type { Rgba } from "./ir";

export const WHITE: Rgba = { r: 1, g: 1, b: 1, a: 1 };

function clamp01(x: number): number {
    if (!Number.isFinite(x)) return 0;
    if (x < 0) return 0;
    if (x > 1) return 1;
    return x;
}

function to2(n: number): string {
    const s = n.toString(16).toUpperCase();
    return s.length === 1 ? "0" + s : s;
}

function toByte(x: number): number {
    return Math.round(clamp01(x) * 255);
}

/** RGBA floats -> "#RRGGBBAA". */
export function rgbaToHex(r: number, g: number, b: number, a = 1): string {
    return "#" + to2(toByte(r)) + to2(toByte(g)) + to2(toByte(b)) + to2(toByte(a));
}

export function colorToHex(color: Rgba): string {
    return rgbaToHex(color.r, color.g, color.b, color.a);
}

function isHexCharCode(code: number): boolean {
    if (code >= 48 && code <= 57) return true;
    if (code >= 65 && code <= 70) return true;
    if (code >= 97 && code <= 102) return true;
    return false;
}
function hexPairToByte(h1: number, h2: number): number {
    function val(c: number): number {
        if (c >= 48 && c <= 57) return c - 48;
        if (c >= 65 && c <= 70) return c - 55;
        if (c >= 97 && c <= 102) return c - 87;
        return 0;
    }
    return (val(h1) << 4) | val(h2);
}

/** "#RRGGBB" (alpha 1.0) or "#RRGGBBAA" -> RGBA floats. */
export function hexToRgba(hex: string): Rgba {
    let s = hex.trim();
    if (s.length > 0 && s.charAt(0) === "#") s = s.substring(1);

    if (s.length !== 6 && s.length !== 8) {
        throw new Error("Invalid hex color: " + hex);
    }
    for (let i = 0; i < s.length; i++) {
        if (!isHexCharCode(s.charCodeAt(i)))
            throw new Error("Invalid hex color: " + hex);
    }

    const r = hexPairToByte(s.charCodeAt(0), s.charCodeAt(1));
    const g = hexPairToByte(s.charCodeAt(2), s.charCodeAt(3));
    const b = hexPairToByte(s.charCodeAt(4), s.charCodeAt(5));
    const a = s.length === 8 ? hexPairToByte(s.charCodeAt(6), s.charCodeAt(7)) : 255;

    return { r: r / 255, g: g / 255, b: b / 255, a: a / 255 };
}

/** Structural check: four finite channels, each within 0..1. */
export function isRgba(v: unknown): v is Rgba {
    if (!v || typeof v !== "object") return false;
    if (!("r" in v) || !("g" in v) || !("b" in v) || !("a" in v)) return false;
    return isUnit(v.r) && isUnit(v.g) && isUnit(v.b) && isUnit(v.a);
}

function isUnit(n: unknown): boolean {
    return typeof n === "number" && Number.isFinite(n) && n >= 0 && n <= 1;
}
