/**
 * RGB color utilities: random shades, bounded variation and theme blending
 */

import type { RandomSource } from "../rng.js";

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

function clampChannel(value: number): number {
    return Math.max(0, Math.min(255, Math.round(value)));
}

/**
 * Converts RGB to hex string
 */
export function rgbToHex(rgb: RGB): string {
    return `#${[rgb.r, rgb.g, rgb.b]
        .map((val) => clampChannel(val).toString(16).padStart(2, "0"))
        .join("")
        .toUpperCase()}`;
}

/**
 * Converts hex string to RGB
 * @param hex - Hex color string (with or without #)
 * @returns RGB object or null if invalid
 */
export function hexToRgb(hex: string): RGB | null {
    const cleaned = hex.replace(/^#/, "");
    if (!/^[0-9a-fA-F]{6}$/.test(cleaned)) {
        return null;
    }
    return {
        r: parseInt(cleaned.substring(0, 2), 16),
        g: parseInt(cleaned.substring(2, 4), 16),
        b: parseInt(cleaned.substring(4, 6), 16),
    };
}

/**
 * CSS functional notation, as written into SVG attributes
 */
export function toCss(rgb: RGB): string {
    return `rgb(${rgb.r},${rgb.g},${rgb.b})`;
}

export function randomColor(rng: RandomSource): RGB {
    return {
        r: rng.randomInt(0, 256),
        g: rng.randomInt(0, 256),
        b: rng.randomInt(0, 256),
    };
}

/**
 * Shifts every channel independently by an integer in [-amount, amount],
 * clamped to the valid range. Amount 0 returns the color unchanged.
 */
export function variate(rgb: RGB, rng: RandomSource, amount: number): RGB {
    if (amount <= 0) {
        return { ...rgb };
    }
    const shift = (v: number) => clampChannel(v + rng.randomInt(-amount, amount + 1));
    return {
        r: shift(rgb.r),
        g: shift(rgb.g),
        b: shift(rgb.b),
    };
}

/**
 * Weighted mean of `rgb` (weight 100) and `theme` (weight `weight`).
 * Weight 0 leaves the color as is; large weights converge on the theme.
 */
export function meanpoint(rgb: RGB, theme: RGB, weight: number): RGB {
    const w = Math.max(0, weight);
    const mix = (a: number, b: number) => clampChannel((a * 100 + b * w) / (100 + w));
    return {
        r: mix(rgb.r, theme.r),
        g: mix(rgb.g, theme.g),
        b: mix(rgb.b, theme.b),
    };
}
