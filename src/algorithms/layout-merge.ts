import { type LayoutConfig, type LayoutValue } from '../types/figure.js';

/**
 * Type guard for nested layout sections (plain objects, not arrays or null).
 */
export function isLayoutConfig(value: LayoutValue | undefined): value is LayoutConfig {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-copies a layout value so merged sections never alias their source.
 */
export function cloneLayoutValue(value: LayoutValue): LayoutValue {
    if (Array.isArray(value)) {
        return value.map(cloneLayoutValue);
    }
    if (isLayoutConfig(value)) {
        const copy: LayoutConfig = {};
        for (const [key, inner] of Object.entries(value)) {
            if (inner !== undefined) {
                copy[key] = cloneLayoutValue(inner);
            }
        }
        return copy;
    }
    return value;
}

/**
 * Merges `source` into `target` in place and returns `target`.
 *
 * Sections present on both sides are merged key by key; any other source
 * value replaces the target's. `undefined` source values are skipped, while
 * `null` replaces (it is how a setting is cleared).
 */
export function mergeLayout(target: LayoutConfig, source: LayoutConfig): LayoutConfig {
    for (const [key, value] of Object.entries(source)) {
        if (value === undefined) continue;
        const existing = target[key];
        if (isLayoutConfig(existing) && isLayoutConfig(value)) {
            mergeLayout(existing, value);
        } else {
            target[key] = cloneLayoutValue(value);
        }
    }
    return target;
}

/**
 * Returns the nested section stored at `key`, creating an empty one
 * (or replacing a non-section value) when needed.
 */
export function section(layout: LayoutConfig, key: string): LayoutConfig {
    const existing = layout[key];
    if (isLayoutConfig(existing)) {
        return existing;
    }
    const created: LayoutConfig = {};
    layout[key] = created;
    return created;
}

/**
 * Reads a numeric `[start, end]` pair stored at `key`, falling back when absent or malformed.
 */
export function numberPair(layout: LayoutConfig, key: string, fallback: [number, number]): [number, number] {
    const value = layout[key];
    if (Array.isArray(value) && value.length === 2) {
        const [a, b] = value;
        if (typeof a === 'number' && typeof b === 'number') {
            return [a, b];
        }
    }
    return [fallback[0], fallback[1]];
}
