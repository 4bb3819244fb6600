/**
 * Region layouts: how many regions a pattern creates and how their
 * parameters relate to each other
 */

import type { Frame } from "../../lib/geometry/frame.js";
import { Pos } from "../../lib/geometry/pos.js";
import type { RandomSource } from "../../lib/rng.js";
import type { ColorItem } from "./colorItem.js";
import {
    randomDisc,
    randomHalfPlane,
    randomSpiral,
    randomStripe,
    randomTriangle,
    type Disc,
    type HalfPlane,
    type Region,
} from "./regions.js";

export const PATTERNS = [
    "free-circles",
    "free-triangles",
    "free-stripes",
    "free-spirals",
    "concentric-circles",
    "parallel-stripes",
    "crossed-stripes",
    "parallel-waves",
] as const;

export type Pattern = (typeof PATTERNS)[number];

export interface PatternParams {
    pattern: Pattern;
    /** Number of regions (rows for waves, stripes per family for crossed stripes) */
    count: number;
    /**
     * Fraction of the frame's shorter side: size hint for circles and
     * triangles, band width for stripes and spirals
     */
    width: number;
    /** Angular jitter in degrees for stripe families */
    variation: number;
}

/**
 * Creates a fresh color item for one region
 */
export type ColorFactory = (rng: RandomSource) => ColorItem;

/**
 * Builds the ordered region list; earlier regions take priority
 */
export function createRegions(
    params: PatternParams,
    frame: Frame,
    makeColor: ColorFactory,
    rng: RandomSource
): Region[] {
    const n = Math.max(0, Math.floor(params.count));
    switch (params.pattern) {
        case "free-circles":
            return createFreeCircles(n, params.width, frame, makeColor, rng);
        case "free-triangles":
            return repeat(n, () => randomTriangle(rng, randomDisc(rng, frame, makeColor(rng), params.width)));
        case "free-stripes":
            return repeat(n, () => randomStripe(rng, frame, makeColor(rng), params.width * frame.minSide()));
        case "free-spirals":
            return repeat(n, () => randomSpiral(rng, frame, makeColor(rng), params.width * frame.minSide()));
        case "concentric-circles":
            return createConcentricCircles(n, frame, makeColor, rng);
        case "parallel-stripes":
            return createParallelStripes(n, rng.randomInt(0, 360), params.variation, frame, makeColor, rng);
        case "crossed-stripes":
            return createCrossedStripes(n, params.variation, frame, makeColor, rng);
        case "parallel-waves":
            return createWaves(n, frame, makeColor, rng);
    }
}

function repeat<T>(n: number, build: () => T): T[] {
    const out: T[] = [];
    for (let i = 0; i < n; i++) out.push(build());
    return out;
}

/** Half the frame diagonal: any line through the center crosses the frame within this distance */
function halfDiagonal(frame: Frame): number {
    return Math.sqrt(frame.w * frame.w + frame.h * frame.h) / 2;
}

function createFreeCircles(
    n: number,
    sizeHint: number,
    frame: Frame,
    makeColor: ColorFactory,
    rng: RandomSource
): Disc[] {
    const discs = repeat(n, () => randomDisc(rng, frame, makeColor(rng), sizeHint));
    // Smallest first, otherwise large discs would hide them
    return discs.sort((a, b) => a.radius - b.radius);
}

function createConcentricCircles(n: number, frame: Frame, makeColor: ColorFactory, rng: RandomSource): Disc[] {
    const center = Pos.random(frame, rng);
    const corners = [new Pos(0, 0), new Pos(frame.w, 0), new Pos(0, frame.h), new Pos(frame.w, frame.h)];
    const reach = Math.max(...corners.map((c) => Math.sqrt(c.sub(center).dotSelf())));
    const step = reach / Math.max(1, n);
    return repeat(n, () => makeColor(rng)).map((color, i): Disc => ({
        kind: "disc",
        center,
        radius: step * (i + 1),
        color,
    }));
}

/**
 * Half-planes whose limits advance across the frame along `angle`
 */
function createParallelStripes(
    n: number,
    angle: number,
    variation: number,
    frame: Frame,
    makeColor: ColorFactory,
    rng: RandomSource
): HalfPlane[] {
    const reach = halfDiagonal(frame);
    const dir = Pos.polar(angle, 1);
    const start = frame.center().sub(dir.scale(reach));
    const step = (2 * reach) / (n + 1);
    return repeat(n, () => makeColor(rng)).map((color, i) =>
        randomHalfPlane(rng, start.add(dir.scale(step * (i + 1))), angle, variation, color)
    );
}

function createCrossedStripes(
    n: number,
    variation: number,
    frame: Frame,
    makeColor: ColorFactory,
    rng: RandomSource
): HalfPlane[] {
    const angle = rng.randomInt(0, 360);
    const first = createParallelStripes(n, angle, variation, frame, makeColor, rng);
    const second = createParallelStripes(n, angle + 90, variation, frame, makeColor, rng);
    const out: HalfPlane[] = [];
    for (let i = 0; i < n; i++) {
        out.push(first[i], second[i]);
    }
    return out;
}

/**
 * Rows of overlapping equal discs along parallel lines; the uncovered
 * scallops between rows read as waves
 */
function createWaves(n: number, frame: Frame, makeColor: ColorFactory, rng: RandomSource): Disc[] {
    const angle = rng.randomInt(0, 360);
    const reach = halfDiagonal(frame);
    const across = Pos.polar(angle, 1);
    const along = Pos.polar(angle + 90, 1);
    const spacing = (2 * reach) / (n + 1);
    const radius = spacing;
    const gap = radius * 1.5;
    const perRow = Math.ceil((2 * reach) / gap) + 2;
    const start = frame.center().sub(across.scale(reach));

    const discs: Disc[] = [];
    for (let row = 0; row < n; row++) {
        const color = makeColor(rng);
        const phase = rng.random() * gap;
        const base = start.add(across.scale(spacing * (row + 1))).sub(along.scale(reach + gap - phase));
        for (let k = 0; k < perRow; k++) {
            discs.push({ kind: "disc", center: base.add(along.scale(gap * k)), radius, color });
        }
    }
    return discs;
}
