import { describe, it, expect } from 'vitest';
import { Frame } from '../../../lib/geometry/frame.js';
import type { Path, Tile } from '../../../lib/geometry/movable.js';
import { Pos } from '../../../lib/geometry/pos.js';
import { SeededRNG } from '../../../lib/rng.js';
import { latticeKey, type PeriodicTilingOptions } from '../periodic.js';
import {
    pentagonVertices,
    tileHexagons,
    tileHybridHexagonsTriangles,
    tileHybridSquaresTriangles,
    tilePentagons,
    tileRhombus,
    tileTriangles,
} from '../recipes.js';

const SQRT3 = Math.sqrt(3);
const TAN30 = Math.tan(Math.PI / 6);

function area(path: Path): number {
    let sum = 0;
    for (let i = 0; i < path.length; i++) {
        const a = path[i];
        const b = path[(i + 1) % path.length];
        sum += a.cross(b);
    }
    return Math.abs(sum) / 2;
}

/** Strictly inside a convex polygon, either winding */
function strictlyInside(path: Path, p: Pos): boolean {
    let sign = 0;
    for (let i = 0; i < path.length; i++) {
        const a = path[i];
        const b = path[(i + 1) % path.length];
        const s = Math.sign(b.sub(a).cross(p.sub(a)));
        if (s === 0) return false;
        if (sign === 0) sign = s;
        else if (s !== sign) return false;
    }
    return true;
}

type Recipe = (frame: Frame, rot: number, options?: PeriodicTilingOptions) => Tile[];

const SIZE = 10;

// Per-site tile count and total area of one lattice cell
const recipes: [string, Recipe, number, number][] = [
    ['hexagons', (f, r, o) => tileHexagons(f, SIZE, r, o), 1, (3 * SQRT3 / 2) * SIZE * SIZE],
    ['triangles', (f, r, o) => tileTriangles(f, SIZE, r, o), 2, (3 * SQRT3 / 2) * SIZE * SIZE],
    [
        'hexagons-and-triangles',
        (f, r, o) => tileHybridHexagonsTriangles(f, SIZE, r, o),
        3,
        2 * SQRT3 * SIZE * SIZE,
    ],
    [
        'squares-and-triangles',
        (f, r, o) => tileHybridSquaresTriangles(f, SIZE, r, o),
        11,
        (2 * SQRT3 + 3) * SIZE * SIZE,
    ],
    ['rhombus', (f, r, o) => tileRhombus(f, SIZE, SIZE * TAN30, r, o), 1, 2 * SIZE * SIZE * TAN30],
    [
        'pentagons',
        (f, r, o) => tilePentagons(f, SIZE, r, o),
        2,
        2 * SIZE * (SIZE / 2) + SIZE * (SIZE / 2) * TAN30,
    ],
];

describe('pentagonVertices', () => {
    it('puts the apex where the roof edges meet', () => {
        const [a, b, c, d, e] = pentagonVertices(10, 5, 30);
        expect(a).toEqual(new Pos(0, 0));
        expect(b.x).toBeCloseTo(10, 9);
        expect(c.y).toBeCloseTo(5, 9);
        expect(e.x).toBeCloseTo(0, 9);
        expect(d.x).toBeCloseTo(5, 9);
        expect(d.y).toBeCloseTo(5 + 5 * TAN30, 9);
    });

    it('rejects a roof whose edges never meet', () => {
        expect(() => pentagonVertices(10, 5, 90)).toThrow(/^ERROR-WW-01/);
    });
});

describe.each(recipes)('%s tiling', (_name, recipe, perSite, cellArea) => {
    it('covers exactly one lattice cell per site', () => {
        // Without a margin the center is the only site of a 1x1 frame
        const tiles = recipe(new Frame(1, 1), 17, { margin: 0 });
        expect(tiles).toHaveLength(perSite);
        const total = tiles.reduce((sum, t) => sum + area(t.path), 0);
        expect(total).toBeCloseTo(cellArea, 6);
    });

    it('places every tile once', () => {
        const tiles = recipe(new Frame(200, 150), 17);
        const keys = new Set(tiles.map((t) => latticeKey(t.position)));
        expect(keys.size).toBe(tiles.length);
    });

    it('keeps tile positions within a few cells of the frame', () => {
        const frame = new Frame(200, 150);
        const margin = 12 * SIZE;
        for (const t of recipe(frame, 17)) {
            expect(t.position.x).toBeGreaterThanOrEqual(-margin);
            expect(t.position.x).toBeLessThanOrEqual(frame.w + margin);
            expect(t.position.y).toBeGreaterThanOrEqual(-margin);
            expect(t.position.y).toBeLessThanOrEqual(frame.h + margin);
        }
    });

    it('covers the interior without gaps or overlaps', () => {
        const tiles = recipe(new Frame(240, 240), 17);
        const rng = new SeededRNG(2024);
        for (let i = 0; i < 300; i++) {
            const p = new Pos(80 + rng.random() * 80, 80 + rng.random() * 80);
            const covering = tiles.filter((t) => strictlyInside(t.path, p)).length;
            expect(covering).toBe(1);
        }
    });

    it.each([17, 45])('covers the frame up to its edges at %i degrees', (rot) => {
        const frame = new Frame(300, 200);
        const tiles = recipe(frame, rot);
        const edge: Pos[] = [];
        for (let x = 0.3; x < frame.w; x += 6.1) {
            edge.push(new Pos(x, 0.5), new Pos(x, frame.h - 0.5));
        }
        for (let y = 0.3; y < frame.h; y += 6.1) {
            edge.push(new Pos(0.5, y), new Pos(frame.w - 0.5, y));
        }
        for (const p of edge) {
            const covering = tiles.filter((t) => strictlyInside(t.path, p)).length;
            expect(covering).toBe(1);
        }
    });
});
