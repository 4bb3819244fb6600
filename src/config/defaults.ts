/**
 * Built-in values used whenever the configuration leaves a field out
 */

import { existsSync, readFileSync } from "fs";
import { fileURLToPath } from "url";
import type { RGB } from "../lib/color/color.js";

export const DEFAULT_GLOBAL = {
    deviation: 20,
    weight: 40,
    size: 15,
    width: 1000,
    height: 600,
};

export const DEFAULT_LINE: { width: number; color: RGB } = {
    width: 1,
    color: { r: 0, g: 0, b: 0 },
};

export const DEFAULT_PATTERN_DATA = {
    nbFreeCircles: 10,
    nbFreeTriangles: 15,
    nbFreeStripes: 6,
    nbFreeSpirals: 3,
    nbConcentricCircles: 5,
    nbParallelStripes: 6,
    nbCrossedStripes: 4,
    nbParallelWaves: 5,
    varParallelStripes: 15,
    varCrossedStripes: 10,
    sizeFreeCircles: 0.15,
    sizeFreeTriangles: 0.3,
    widthStripe: 0.1,
    widthSpiral: 0.3,
};

export const DEFAULT_TILING_DATA = {
    sizeHexagons: 15,
    sizeTriangles: 20,
    sizeHexagonsAndTriangles: 10,
    sizeSquaresAndTriangles: 10,
    sizeRhombus: 15,
    sizePentagons: 25,
    nbDelaunay: 1000,
};

/**
 * Location of the sample configuration shipped with the package
 */
export function sampleConfigPath(): string {
    return fileURLToPath(new URL("../data/default-config.json", import.meta.url));
}

/**
 * Text of the sample configuration
 */
export function readSampleConfig(): string {
    const path = sampleConfigPath();
    if (!existsSync(path)) {
        throw new Error(`Sample configuration missing at ${path}`);
    }
    return readFileSync(path, "utf-8");
}
