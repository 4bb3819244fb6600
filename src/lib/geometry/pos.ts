/**
 * 2D positions and vectors
 */

import type { RandomSource } from "../rng.js";
import type { Frame } from "./frame.js";

/**
 * Converts degrees to radians
 */
export function radians(degrees: number): number {
    return (degrees * Math.PI) / 180;
}

/**
 * Immutable 2D point, also used as a displacement vector
 */
export class Pos {
    constructor(
        readonly x: number,
        readonly y: number
    ) {}

    static zero(): Pos {
        return new Pos(0, 0);
    }

    /**
     * Builds a vector from an angle in degrees and a length
     */
    static polar(degrees: number, radius: number): Pos {
        const a = radians(degrees);
        return new Pos(radius * Math.cos(a), radius * Math.sin(a));
    }

    /**
     * Uniform point inside the frame
     */
    static random(frame: Frame, rng: RandomSource): Pos {
        return new Pos(rng.random() * frame.w, rng.random() * frame.h);
    }

    /**
     * Intersection of two rays, each given by an origin and a direction in degrees.
     * Returns undefined when the rays are parallel.
     */
    static intersect(
        [p, alpha]: readonly [Pos, number],
        [q, beta]: readonly [Pos, number]
    ): Pos | undefined {
        const u = Pos.polar(alpha, 1);
        const v = Pos.polar(beta, 1);
        const denom = u.cross(v);
        if (Math.abs(denom) < 1e-12) return undefined;
        const t = q.sub(p).cross(v) / denom;
        return p.add(u.scale(t));
    }

    add(other: Pos): Pos {
        return new Pos(this.x + other.x, this.y + other.y);
    }

    sub(other: Pos): Pos {
        return new Pos(this.x - other.x, this.y - other.y);
    }

    /**
     * Scaling by a real or signed integer factor
     */
    scale(k: number): Pos {
        return new Pos(this.x * k, this.y * k);
    }

    neg(): Pos {
        return new Pos(-this.x, -this.y);
    }

    dot(other: Pos): number {
        return this.x * other.x + this.y * other.y;
    }

    /** Squared length */
    dotSelf(): number {
        return this.dot(this);
    }

    /** z component of the 3D cross product */
    cross(other: Pos): number {
        return this.x * other.y - this.y * other.x;
    }

    /**
     * Rotation around the origin by an angle in degrees
     */
    rotate(degrees: number): Pos {
        const a = radians(degrees);
        const c = Math.cos(a);
        const s = Math.sin(a);
        return new Pos(this.x * c - this.y * s, this.x * s + this.y * c);
    }

    /**
     * Unweighted average of a non-empty list of points
     */
    static mean(points: readonly Pos[]): Pos {
        let sum = Pos.zero();
        for (const p of points) sum = sum.add(p);
        return sum.scale(1 / points.length);
    }
}

/**
 * Signed orientation of the triangle (p, a, b): positive on one side of the
 * line through a and b, negative on the other, zero on it.
 */
export function orientation(p: Pos, a: Pos, b: Pos): number {
    return (p.x - b.x) * (a.y - b.y) - (a.x - b.x) * (p.y - b.y);
}
