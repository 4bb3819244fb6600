/**
 * Periodic tilings, each a choice of lattice basis and shapes per site
 * `size` is the edge length of the tiles unless noted otherwise; `rot` is in degrees.
 */

import type { Frame } from "../../lib/geometry/frame.js";
import { Movable, type Tile } from "../../lib/geometry/movable.js";
import { Pos, radians } from "../../lib/geometry/pos.js";
import { ErrorCode, codedError } from "../../lib/errors.js";
import { periodicGridTiling, type PeriodicTilingOptions } from "./periodic.js";

const COS30 = Math.cos(radians(30));
const TAN30 = Math.tan(radians(30));

/**
 * Regular hexagons
 */
export function tileHexagons(frame: Frame, size: number, rot: number, options?: PeriodicTilingOptions): Tile[] {
    const idir = Pos.polar(rot - 30, size * 2 * COS30);
    const jdir = Pos.polar(rot + 30, size * 2 * COS30);
    const m = Movable.hexagon(size, rot);
    return periodicGridTiling(frame, (p) => [m.render(p)], idir, jdir, options);
}

/**
 * Equilateral triangles, alternating orientation; `size` is the circumradius
 */
export function tileTriangles(frame: Frame, size: number, rot: number, options?: PeriodicTilingOptions): Tile[] {
    const idir = Pos.polar(rot - 30, size * 2 * COS30);
    const jdir = Pos.polar(rot + 30, size * 2 * COS30);
    const adjust = Pos.polar(rot + 60, size / 2).add(idir.scale(0.5));
    const m1 = Movable.triangle(size, rot + 60);
    const m2 = Movable.triangle(size, rot);
    return periodicGridTiling(frame, (p) => [m1.render(p), m2.render(p.add(adjust))], idir, jdir, options);
}

/**
 * Trihexagonal tiling: each hexagon touches six others by a vertex,
 * two triangles fill the gaps per site
 */
export function tileHybridHexagonsTriangles(
    frame: Frame,
    size: number,
    rot: number,
    options?: PeriodicTilingOptions
): Tile[] {
    const idir = Pos.polar(rot, size * 2);
    const jdir = Pos.polar(rot + 60, size * 2);
    const adjust = Pos.polar(rot + 30, size / COS30);
    const hex = Movable.hexagon(size, rot);
    const up = Movable.triangle(size * TAN30, rot + 30);
    const down = Movable.triangle(size * TAN30, rot + 90);
    return periodicGridTiling(
        frame,
        (p) => [hex.render(p), up.render(p.add(adjust)), down.render(p.sub(adjust))],
        idir,
        jdir,
        options
    );
}

/**
 * Rhombitrihexagonal tiling with every hexagon split into six triangles:
 * per site, six inner triangles, three squares on alternate hexagon edges
 * and two triangles at hexagon vertices
 */
export function tileHybridSquaresTriangles(
    frame: Frame,
    size: number,
    rot: number,
    options?: PeriodicTilingOptions
): Tile[] {
    // Neighboring hexagon centers are one apothem, one square side and
    // another apothem apart
    const t = size;
    const c = t * TAN30;
    const apothem = t * COS30;
    const step = 2 * apothem + t;
    const idir = Pos.polar(rot + 30, step);
    const jdir = Pos.polar(rot + 90, step);

    const inner: [Movable, Pos][] = [];
    for (let i = 0; i < 6; i++) {
        const phi = rot + 30 + 60 * i;
        inner.push([Movable.triangle(c, phi + 180), Pos.polar(phi, c)]);
    }
    const squares: [Movable, Pos][] = [30, 90, 150].map((a) => [
        Movable.square(t, rot + a),
        Pos.polar(rot + a, apothem + t / 2),
    ]);
    const outer: [Movable, Pos][] = [0, 60].map((a) => [
        Movable.triangle(c, rot + a + 180),
        Pos.polar(rot + a, t + c),
    ]);
    const placements = [...inner, ...squares, ...outer];

    return periodicGridTiling(
        frame,
        (p) => placements.map(([m, offset]) => m.render(p.add(offset))),
        idir,
        jdir,
        options
    );
}

/**
 * Rhombi; `ldiag` and `sdiag` are half-diagonals
 */
export function tileRhombus(
    frame: Frame,
    ldiag: number,
    sdiag: number,
    rot: number,
    options?: PeriodicTilingOptions
): Tile[] {
    const idir = Pos.polar(rot, ldiag).add(Pos.polar(rot + 90, sdiag));
    const jdir = Pos.polar(rot, -ldiag).add(Pos.polar(rot + 90, sdiag));
    const m = Movable.rhombus(ldiag, sdiag, rot);
    return periodicGridTiling(frame, (p) => [m.render(p)], idir, jdir, options);
}

/**
 * Type 1 pentagon: a `width` x `height` rectangle capped by a roof whose apex
 * is where the two roof edges, rising at `roof` degrees, meet.
 * Vertices are returned in the unrotated local frame, bottom-left first.
 */
export function pentagonVertices(width: number, height: number, roof: number): Pos[] {
    const a = Pos.zero();
    const b = a.add(Pos.polar(0, width));
    const c = b.add(Pos.polar(90, height));
    const e = a.add(Pos.polar(90, height));
    const d = Pos.intersect([e, roof], [c, 180 - roof]);
    if (d === undefined) {
        throw codedError(ErrorCode.DegenerateGeometry, `Pentagon roof angle ${roof} leaves no apex`);
    }
    return [a, b, c, d, e];
}

/**
 * Upright pentagons in rows, each valley between two roofs filled by the
 * apex of an inverted copy
 */
export function tilePentagons(frame: Frame, size: number, rot: number, options?: PeriodicTilingOptions): Tile[] {
    const width = size;
    const height = size / 2;
    const vertices = pentagonVertices(width, height, 30);
    const mid = Pos.mean(vertices);
    const rise = vertices[3].y - height;

    const upright = Movable.from(vertices.map((v) => v.sub(mid).rotate(rot)));
    const inverted = upright.flipped();
    // Half-turn center mapping the upright cell onto the inverted one
    const pivot = new Pos((3 * width) / 4, (2 * height + rise) / 2);
    const invertedOffset = pivot.sub(mid).scale(2).rotate(rot);

    const idir = Pos.polar(rot, width);
    const jdir = Pos.polar(rot + 90, 2 * height + rise);
    return periodicGridTiling(
        frame,
        (p) => [upright.render(p), inverted.render(p.add(invertedOffset))],
        idir,
        jdir,
        options
    );
}
