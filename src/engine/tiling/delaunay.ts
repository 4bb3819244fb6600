/**
 * Aperiodic tiling from a Delaunay triangulation of random points
 */

import { Delaunay } from "d3-delaunay";
import { ErrorCode, codedError } from "../../lib/errors.js";
import type { Frame } from "../../lib/geometry/frame.js";
import type { Tile } from "../../lib/geometry/movable.js";
import { Pos } from "../../lib/geometry/pos.js";
import type { RandomSource } from "../../lib/rng.js";

/**
 * Triangulation service: returns a flat index list, three indices per triangle
 */
export interface Triangulator {
    triangulate(points: readonly Pos[]): ArrayLike<number>;
}

/**
 * True when every point lies on one line (or all coincide)
 */
export function allCollinear(points: readonly Pos[]): boolean {
    const origin = points[0];
    if (origin === undefined) return true;
    const other = points.find((p) => p.sub(origin).dotSelf() > 1e-18);
    if (other === undefined) return true;
    const dir = other.sub(origin);
    const len = Math.sqrt(dir.dotSelf());
    return points.every((p) => {
        const d = p.sub(origin);
        return Math.abs(dir.cross(d)) <= 1e-9 * len * Math.max(len, Math.sqrt(d.dotSelf()));
    });
}

/**
 * Triangulator backed by d3-delaunay. Collinear input is rejected up front:
 * d3-delaunay would jitter it into sliver triangles.
 */
export const d3Triangulator: Triangulator = {
    triangulate(points) {
        if (points.length < 3) {
            throw codedError(
                ErrorCode.DegenerateTriangulation,
                `Triangulation needs at least 3 points (got ${points.length})`
            );
        }
        if (allCollinear(points)) {
            throw codedError(ErrorCode.DegenerateTriangulation, "All points are collinear");
        }
        const delaunay = Delaunay.from(
            points,
            (p) => p.x,
            (p) => p.y
        );
        if (delaunay.triangles.length === 0) {
            throw codedError(ErrorCode.DegenerateTriangulation, "Triangulation produced no triangles");
        }
        return delaunay.triangles;
    },
};

/**
 * Exact centroid of a triangle
 */
export function triangleCentroid(a: Pos, b: Pos, c: Pos): Pos {
    return new Pos((a.x + b.x + c.x) / 3, (a.y + b.y + c.y) / 3);
}

/**
 * Maps a triangle index list back to tiles
 */
export function trianglesToTiles(points: readonly Pos[], indices: ArrayLike<number>): Tile[] {
    const tiles: Tile[] = [];
    for (let i = 0; i + 2 < indices.length; i += 3) {
        const a = points[indices[i]];
        const b = points[indices[i + 1]];
        const c = points[indices[i + 2]];
        tiles.push({ position: triangleCentroid(a, b, c), path: [a, b, c] });
    }
    return tiles;
}

/**
 * Scatters `n` uniform points in the frame and emits one tile per triangle.
 * The frame corners join the scattered points so that the triangulated
 * hull is the whole frame.
 */
export function randomDelaunay(
    frame: Frame,
    rng: RandomSource,
    n: number,
    triangulator: Triangulator = d3Triangulator
): Tile[] {
    const points: Pos[] = frame.corners();
    for (let i = 0; i < n; i++) {
        points.push(Pos.random(frame, rng));
    }
    return trianglesToTiles(points, triangulator.triangulate(points));
}
