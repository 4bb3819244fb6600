/**
 * Shape templates that can be stamped at any position
 */

import { Pos } from "./pos.js";

/**
 * Closed polygon given by its vertices in tracing order
 */
export type Path = readonly Pos[];

/**
 * A tile ready for coloring: the point the scene is queried with and the outline to fill
 */
export interface Tile {
    position: Pos;
    path: Path;
}

/**
 * Polygon template stored as offsets from its own center.
 * Rotation is baked into the offsets when the template is built.
 */
export class Movable {
    private constructor(private readonly offsets: readonly Pos[]) {}

    static from(offsets: readonly Pos[]): Movable {
        return new Movable([...offsets]);
    }

    /**
     * Regular polygon with `sides` vertices on a circle of `radius`,
     * the first vertex pointing at `rot` degrees
     */
    static regular(sides: number, radius: number, rot: number): Movable {
        const offsets: Pos[] = [];
        for (let i = 0; i < sides; i++) {
            offsets.push(Pos.polar(rot + (360 / sides) * i, radius));
        }
        return new Movable(offsets);
    }

    /** Hexagon of circumradius (= side) `size` with a vertex pointing at `rot` */
    static hexagon(size: number, rot: number): Movable {
        return Movable.regular(6, size, rot);
    }

    /** Equilateral triangle of circumradius `size` with a vertex pointing at `rot` */
    static triangle(size: number, rot: number): Movable {
        return Movable.regular(3, size, rot);
    }

    /** Square of side `side` with one side facing `rot` */
    static square(side: number, rot: number): Movable {
        return Movable.regular(4, side / Math.SQRT2, rot + 45);
    }

    /**
     * Rhombus with half-diagonals `ldiag` along `rot` and `sdiag` across it
     */
    static rhombus(ldiag: number, sdiag: number, rot: number): Movable {
        return new Movable([
            Pos.polar(rot, ldiag),
            Pos.polar(rot + 90, sdiag),
            Pos.polar(rot + 180, ldiag),
            Pos.polar(rot + 270, sdiag),
        ]);
    }

    /** Offsets negated: the template turned half a revolution */
    flipped(): Movable {
        return new Movable(this.offsets.map((o) => o.neg()));
    }

    vertices(): readonly Pos[] {
        return this.offsets;
    }

    /**
     * Places the template at `position`, keeping vertex order
     */
    render(position: Pos): Tile {
        return {
            position,
            path: this.offsets.map((o) => position.add(o)),
        };
    }
}
