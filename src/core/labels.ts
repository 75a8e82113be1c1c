// src/core/labels.ts
// Style-class names for ranges the user adds.

import { CUSTOM_LABEL_PREFIX } from "./constants";

function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Numeric suffix of `label` when it reads `<prefix><integer>`, else 0. */
export function customSuffix(label: string, prefix = CUSTOM_LABEL_PREFIX): number {
    const m = new RegExp("^" + escapeRegExp(prefix) + "(\\d+)$").exec(label);
    if (!m) return 0;
    const n = parseInt(m[1], 10);
    return Number.isSafeInteger(n) ? n : 0;
}

/**
 * Next free custom label: `<prefix>(N + 1)` where N is the largest numeric suffix
 * among `existing`. Never returns a label already in `existing`.
 */
export function allocateLabel(
    existing: readonly string[],
    prefix = CUSTOM_LABEL_PREFIX
): string {
    let max = 0;
    for (const label of existing) {
        const n = customSuffix(label, prefix);
        if (n > max) max = n;
    }
    const taken = new Set(existing);
    let next = max + 1;
    while (taken.has(prefix + next)) next++;
    return prefix + next;
}
