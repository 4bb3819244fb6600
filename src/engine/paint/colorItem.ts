import { meanpoint, variate, type RGB } from "../../lib/color/color.js";
import type { RandomSource } from "../../lib/rng.js";

/**
 * Source of colors for one region: a base shade perturbed by up to
 * `deviation` per channel, then pulled toward `theme` by `weight`
 */
export interface ColorItem {
    shade: RGB;
    deviation: number;
    theme: RGB;
    weight: number;
}

/**
 * Draws a new color; every call may give a different result
 */
export function sampleColor(item: ColorItem, rng: RandomSource): RGB {
    return meanpoint(variate(item.shade, rng, item.deviation), item.theme, item.weight);
}
