import { describe, it, expect } from 'vitest';
import { Frame } from '../../../lib/geometry/frame.js';
import { Pos } from '../../../lib/geometry/pos.js';
import { SeededRNG } from '../../../lib/rng.js';
import {
    allCollinear,
    d3Triangulator,
    randomDelaunay,
    triangleCentroid,
    trianglesToTiles,
    type Triangulator,
} from '../delaunay.js';

describe('triangleCentroid', () => {
    it('averages the three vertices', () => {
        expect(triangleCentroid(new Pos(0, 0), new Pos(6, 0), new Pos(0, 6))).toEqual(new Pos(2, 2));
    });
});

describe('trianglesToTiles', () => {
    it('builds one tile per index triple', () => {
        const points = [new Pos(0, 0), new Pos(3, 0), new Pos(3, 3), new Pos(0, 3)];
        const tiles = trianglesToTiles(points, [0, 1, 2, 0, 2, 3]);
        expect(tiles).toHaveLength(2);
        expect(tiles[0].path).toEqual([points[0], points[1], points[2]]);
        expect(tiles[0].position).toEqual(new Pos(2, 1));
        expect(tiles[1].path).toEqual([points[0], points[2], points[3]]);
        expect(tiles[1].position).toEqual(new Pos(1, 2));
    });
});

describe('allCollinear', () => {
    it('detects points on one line', () => {
        expect(allCollinear([new Pos(0, 0), new Pos(1, 1), new Pos(2, 2), new Pos(5, 5)])).toBe(true);
        expect(allCollinear([new Pos(1, 1), new Pos(1, 1), new Pos(1, 1)])).toBe(true);
        expect(allCollinear([new Pos(0, 0), new Pos(1, 0), new Pos(0, 1)])).toBe(false);
    });
});

describe('d3Triangulator', () => {
    it('rejects fewer than three points', () => {
        expect(() => d3Triangulator.triangulate([new Pos(0, 0), new Pos(1, 1)])).toThrow(
            'ERROR-WW-03: Triangulation needs at least 3 points (got 2)'
        );
    });

    it('rejects collinear points', () => {
        const points = [new Pos(0, 0), new Pos(1, 1), new Pos(2, 2), new Pos(3, 3)];
        expect(() => d3Triangulator.triangulate(points)).toThrow('ERROR-WW-03: All points are collinear');
    });

    it('splits a square into two triangles', () => {
        const points = [new Pos(0, 0), new Pos(4, 0), new Pos(4, 4), new Pos(0, 4)];
        const indices = d3Triangulator.triangulate(points);
        expect(indices.length).toBe(6);
        const total = trianglesToTiles(points, indices).reduce((sum, t) => {
            const [a, b, c] = t.path;
            return sum + Math.abs(b.sub(a).cross(c.sub(a))) / 2;
        }, 0);
        expect(total).toBeCloseTo(16, 9);
    });
});

describe('randomDelaunay', () => {
    it('hands the scattered points to the triangulator', () => {
        let seen: readonly Pos[] = [];
        const stub: Triangulator = {
            triangulate(points) {
                seen = points;
                return [0, 1, 2];
            },
        };
        const tiles = randomDelaunay(new Frame(100, 50), new SeededRNG(8), 5, stub);
        // Four corners, then the scattered points
        expect(seen).toHaveLength(9);
        expect(seen.slice(0, 4)).toEqual(new Frame(100, 50).corners());
        expect(tiles).toHaveLength(1);
        expect(tiles[0].path).toEqual([seen[0], seen[1], seen[2]]);
    });

    it('keeps every triangle inside the frame', () => {
        const frame = new Frame(100, 50);
        const tiles = randomDelaunay(frame, new SeededRNG(8), 60);
        expect(tiles.length).toBeGreaterThan(0);
        for (const t of tiles) {
            expect(t.path).toHaveLength(3);
            expect(t.path.every((p) => frame.isInside(p))).toBe(true);
            expect(frame.isInside(t.position)).toBe(true);
        }
    });

    it('covers the whole frame', () => {
        const frame = new Frame(100, 50);
        const tiles = randomDelaunay(frame, new SeededRNG(8), 60);
        const total = tiles.reduce((sum, t) => {
            const [a, b, c] = t.path;
            return sum + Math.abs(b.sub(a).cross(c.sub(a))) / 2;
        }, 0);
        expect(total).toBeCloseTo(frame.w * frame.h, 6);
    });

    it('triangulates the bare frame when no points are scattered', () => {
        const tiles = randomDelaunay(new Frame(10, 10), new SeededRNG(1), 0);
        expect(tiles).toHaveLength(2);
    });

    it('propagates triangulator failures', () => {
        const failing: Triangulator = {
            triangulate() {
                return d3Triangulator.triangulate([]);
            },
        };
        expect(() => randomDelaunay(new Frame(10, 10), new SeededRNG(1), 3, failing)).toThrow(
            'ERROR-WW-03: Triangulation needs at least 3 points (got 0)'
        );
    });
});
