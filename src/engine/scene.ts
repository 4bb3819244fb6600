/**
 * Scene: ordered paint regions over a background
 */

import type { RGB } from "../lib/color/color.js";
import type { Pos } from "../lib/geometry/pos.js";
import type { RandomSource } from "../lib/rng.js";
import { sampleColor, type ColorItem } from "./paint/colorItem.js";
import { contains, type Region } from "./paint/regions.js";

export class Scene {
    constructor(
        readonly background: ColorItem,
        readonly items: readonly Region[]
    ) {}

    /**
     * Color of the first region containing `p`, or a background sample.
     * Earlier regions hide later ones.
     */
    color(p: Pos, rng: RandomSource): RGB {
        for (const item of this.items) {
            const c = contains(item, p, rng);
            if (c !== undefined) {
                return c;
            }
        }
        return sampleColor(this.background, rng);
    }
}
