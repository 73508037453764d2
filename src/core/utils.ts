/**
 * Numeric helpers shared by the channel store and the engine.
 * @module core/utils
 */

/** Clamp an integer into `[lo, hi]`. Non-finite input maps to `lo`. */
export const clampInt = (value: number, lo: number, hi: number): number => {
    if (!Number.isFinite(value)) return lo;
    const v = Math.trunc(value);
    if (v < lo) return lo;
    if (v > hi) return hi;
    return v;
};

/** Clamp a float into `[lo, hi]`. */
export const clampFloat = (value: number, lo: number, hi: number): number => {
    if (value < lo) return lo;
    if (value > hi) return hi;
    return value;
};

/**
 * Map a channel value onto 0-100 using an asset range.
 * A degenerate range (`max <= min`) is treated as `min..min + 1`.
 */
export const percentOf = (value: number, min: number, max: number): number => {
    const hi = max > min ? max : min + 1;
    if (!Number.isFinite(value)) return 0;
    const ratio = clampFloat((value - min) / (hi - min), 0, 1);
    return clampInt(Math.round(ratio * 100), 0, 100);
};

/** Convert an opacity percentage to an 8-bit alpha. */
export const percentToAlpha = (pct: number): number => Math.floor((clampInt(pct, 0, 100) * 255) / 100);

/** Truncate a string to at most `max` code points. */
export const truncateText = (text: string, max: number): string => {
    if (text.length <= max) return text;
    return Array.from(text).slice(0, max).join('');
};
