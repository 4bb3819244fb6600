/**
 * Flood-fill tiling over a 2D lattice
 * Covers every tiling that maps onto a grid, i.e. all of them except Delaunay.
 */

import { ErrorCode, codedError } from "../../lib/errors.js";
import type { Frame } from "../../lib/geometry/frame.js";
import type { Tile } from "../../lib/geometry/movable.js";
import type { Pos } from "../../lib/geometry/pos.js";

/**
 * Emits the tiles belonging to one lattice site (zero or more)
 */
export type SiteGenerator = (site: Pos) => Tile[];

export interface PeriodicTilingOptions {
    /** Upper bound on visited sites before the fill is abandoned */
    maxSites?: number;
    /**
     * Distance beyond the frame within which sites still emit tiles.
     * Defaults to the reach of the center site's tiles plus one step
     * along each basis vector: every tile overlapping the frame then has
     * its site within the margin, joined to the center by a chain of
     * sites that are all within it too.
     */
    margin?: number;
}

const DEFAULT_MAX_SITES = 2_000_000;

const NEIGHBOR_STEPS: readonly (readonly [number, number])[] = [
    [0, 1],
    [0, -1],
    [1, 0],
    [-1, 0],
];

/**
 * Identity of a lattice site: coordinates rounded to two decimals, so that
 * positions reached through different step sequences collapse to one key.
 * Only meant for deduplicating sites.
 */
export function latticeKey(p: Pos): string {
    return `${Math.round(p.x * 100)},${Math.round(p.y * 100)}`;
}

/**
 * Farthest tile vertex from the site that generated the tiles
 */
export function tileReach(site: Pos, tiles: readonly Tile[]): number {
    let reach = 0;
    for (const tile of tiles) {
        for (const v of tile.path) {
            reach = Math.max(reach, Math.sqrt(v.sub(site).dotSelf()));
        }
    }
    return reach;
}

/**
 * Rejects zero-length or (nearly) parallel basis vectors
 */
export function assertIndependentBasis(idir: Pos, jdir: Pos): void {
    const li = Math.sqrt(idir.dotSelf());
    const lj = Math.sqrt(jdir.dotSelf());
    if (!(li > 1e-9) || !(lj > 1e-9)) {
        throw codedError(ErrorCode.DegenerateGeometry, "Lattice basis vector has zero length");
    }
    if (Math.abs(idir.cross(jdir)) < 1e-6 * li * lj) {
        throw codedError(ErrorCode.DegenerateGeometry, "Lattice basis vectors are parallel");
    }
}

/**
 * Visits every lattice site {center + i·idir + j·jdir} reachable from the
 * frame center through sites within `margin` of the frame, and collects the
 * generator output of each of them. Sites beyond the margin are dropped
 * without expanding their neighbors; neighbors are marked visited when enqueued.
 */
export function periodicGridTiling(
    frame: Frame,
    generate: SiteGenerator,
    idir: Pos,
    jdir: Pos,
    options: PeriodicTilingOptions = {}
): Tile[] {
    assertIndependentBasis(idir, jdir);
    const maxSites = options.maxSites ?? DEFAULT_MAX_SITES;

    const center = frame.center();
    const items: Tile[] = [...generate(center)];
    const margin =
        options.margin ?? tileReach(center, items) + Math.sqrt(idir.dotSelf()) + Math.sqrt(jdir.dotSelf());
    const visited = new Set<string>([latticeKey(center)]);
    const stack: Pos[] = [];

    const expand = (site: Pos): void => {
        for (const [i, j] of NEIGHBOR_STEPS) {
            const next = site.add(idir.scale(i)).add(jdir.scale(j));
            const key = latticeKey(next);
            if (!visited.has(key)) {
                if (visited.size >= maxSites) {
                    throw codedError(ErrorCode.SiteLimit, `Lattice flood fill exceeded ${maxSites} sites`);
                }
                visited.add(key);
                stack.push(next);
            }
        }
    };

    expand(center);
    let site = stack.pop();
    while (site !== undefined) {
        if (frame.isInside(site, margin)) {
            items.push(...generate(site));
            expand(site);
        }
        site = stack.pop();
    }
    return items;
}
