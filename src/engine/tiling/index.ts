/**
 * Tiling selection
 */

import type { Frame } from "../../lib/geometry/frame.js";
import type { Tile } from "../../lib/geometry/movable.js";
import type { RandomSource } from "../../lib/rng.js";
import { randomDelaunay } from "./delaunay.js";
import {
    tileHexagons,
    tileHybridHexagonsTriangles,
    tileHybridSquaresTriangles,
    tilePentagons,
    tileRhombus,
    tileTriangles,
} from "./recipes.js";

export const TILINGS = [
    "hexagons",
    "triangles",
    "hexagons-and-triangles",
    "squares-and-triangles",
    "rhombus",
    "pentagons",
    "delaunay",
] as const;

export type Tiling = (typeof TILINGS)[number];

export interface TilingParams {
    tiling: Tiling;
    /** Cell size of the periodic tilings */
    size: number;
    /** Point count of the Delaunay tiling */
    nbDelaunay: number;
}

/**
 * Builds the tiles for one image. The rotation is drawn once and shared by
 * every site.
 */
export function makeTiling(frame: Frame, params: TilingParams, rng: RandomSource): Tile[] {
    const { size } = params;
    switch (params.tiling) {
        case "hexagons":
            return tileHexagons(frame, size, rng.randomInt(0, 360));
        case "triangles":
            return tileTriangles(frame, size, rng.randomInt(0, 360));
        case "hexagons-and-triangles":
            return tileHybridHexagonsTriangles(frame, size, rng.randomInt(0, 360));
        case "squares-and-triangles":
            return tileHybridSquaresTriangles(frame, size, rng.randomInt(0, 360));
        case "rhombus":
            return tileRhombus(frame, size, size * Math.tan(Math.PI / 6), rng.randomInt(0, 360));
        case "pentagons":
            return tilePentagons(frame, size, rng.randomInt(0, 360));
        case "delaunay":
            return randomDelaunay(frame, rng, params.nbDelaunay);
    }
}
