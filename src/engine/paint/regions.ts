/**
 * Paint regions: shapes that claim points and color them
 */

import type { RGB } from "../../lib/color/color.js";
import type { Frame } from "../../lib/geometry/frame.js";
import { Pos, orientation } from "../../lib/geometry/pos.js";
import type { RandomSource } from "../../lib/rng.js";
import { sampleColor, type ColorItem } from "./colorItem.js";

export interface Disc {
    kind: "disc";
    center: Pos;
    radius: number;
    color: ColorItem;
}

/**
 * Points on the far side of `limit` as seen from `reference`
 */
export interface HalfPlane {
    kind: "half-plane";
    limit: Pos;
    reference: Pos;
    color: ColorItem;
}

export interface Triangle {
    kind: "triangle";
    a: Pos;
    b: Pos;
    c: Pos;
    color: ColorItem;
}

/**
 * Archimedean spiral arms of constant width around `center`
 */
export interface Spiral {
    kind: "spiral";
    center: Pos;
    width: number;
    color: ColorItem;
}

/**
 * Band between the lines through `limit` and `reference`, both
 * perpendicular to the segment joining them
 */
export interface Stripe {
    kind: "stripe";
    limit: Pos;
    reference: Pos;
    color: ColorItem;
}

export type Region = Disc | HalfPlane | Triangle | Spiral | Stripe;

/**
 * Pure membership test
 */
export function isInside(region: Region, p: Pos): boolean {
    switch (region.kind) {
        case "disc":
            return region.center.sub(p).dotSelf() < region.radius * region.radius;
        case "half-plane":
            return p.sub(region.limit).dot(region.reference.sub(region.limit)) < 0;
        case "triangle": {
            // Boundary points count as inside
            const d1 = orientation(p, region.a, region.b);
            const d2 = orientation(p, region.b, region.c);
            const d3 = orientation(p, region.c, region.a);
            const hasNeg = d1 < 0 || d2 < 0 || d3 < 0;
            const hasPos = d1 > 0 || d2 > 0 || d3 > 0;
            return !(hasNeg && hasPos);
        }
        case "spiral": {
            const d = region.center.sub(p);
            const theta = Math.atan2(d.x, d.y);
            const radius = Math.sqrt(d.dotSelf()) + (theta / Math.PI) * region.width;
            return Math.floor(radius / region.width) % 2 === 0;
        }
        case "stripe": {
            const along = region.reference.sub(region.limit);
            return p.sub(region.limit).dot(along) > 0 && p.sub(region.reference).dot(along.neg()) > 0;
        }
    }
}

/**
 * Samples the region's color when it contains `p`
 */
export function contains(region: Region, p: Pos, rng: RandomSource): RGB | undefined {
    return isInside(region, p) ? sampleColor(region.color, rng) : undefined;
}

/**
 * Disc at a random center with radius (u·sizeHint + 0.1)·min(w, h)
 */
export function randomDisc(rng: RandomSource, frame: Frame, color: ColorItem, sizeHint: number): Disc {
    const center = Pos.random(frame, rng);
    const radius = (rng.random() * sizeHint + 0.1) * frame.minSide();
    return { kind: "disc", center, radius, color };
}

/**
 * Half-plane bounded at `limit`, facing `indicator` ± `variation` degrees
 */
export function randomHalfPlane(
    rng: RandomSource,
    limit: Pos,
    indicator: number,
    variation: number,
    color: ColorItem
): HalfPlane {
    const angle = rng.randomInt(indicator - variation, indicator + variation + 1);
    return { kind: "half-plane", limit, reference: limit.add(Pos.polar(angle, 100)), color };
}

/**
 * Triangle inscribed in `circle`, consecutive vertices 80° to 150° apart
 */
export function randomTriangle(rng: RandomSource, circle: Disc): Triangle {
    const theta0 = rng.randomInt(0, 360);
    const theta1 = rng.randomInt(80, 150);
    const theta2 = rng.randomInt(80, 150);
    const at = (deg: number) => circle.center.add(Pos.polar(deg, circle.radius));
    return {
        kind: "triangle",
        a: at(theta0),
        b: at(theta0 + theta1),
        c: at(theta0 + theta1 + theta2),
        color: circle.color,
    };
}

export function randomSpiral(rng: RandomSource, frame: Frame, color: ColorItem, width: number): Spiral {
    return { kind: "spiral", center: Pos.random(frame, rng), width, color };
}

export function randomStripe(rng: RandomSource, frame: Frame, color: ColorItem, width: number): Stripe {
    const limit = Pos.random(frame, rng);
    const reference = limit.add(Pos.polar(rng.randomInt(0, 360), width));
    return { kind: "stripe", limit, reference, color };
}
