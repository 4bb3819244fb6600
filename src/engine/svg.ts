/**
 * SVG document assembly
 */

import { toCss, type RGB } from "../lib/color/color.js";
import type { Frame } from "../lib/geometry/frame.js";
import type { Path, Tile } from "../lib/geometry/movable.js";
import type { RandomSource } from "../lib/rng.js";
import type { Scene } from "./scene.js";

export interface LineStyle {
    color: RGB;
    /** Below 0.0001 the stroke takes the fill color */
    width: number;
}

/**
 * A filled outline ready for output
 */
export interface PaintedTile {
    path: Path;
    fill: RGB;
    stroke: RGB;
    strokeWidth: number;
}

/**
 * Path data for a closed polygon
 */
export function pathData(path: Path): string {
    return (
        path.map((p, idx) => `${idx === 0 ? "M" : "L"}${p.x.toFixed(2)},${p.y.toFixed(2)}`).join(" ") + " Z"
    );
}

/**
 * Queries the scene with each tile's position and applies the line style
 */
export function paintTiles(tiles: readonly Tile[], scene: Scene, line: LineStyle, rng: RandomSource): PaintedTile[] {
    const strokeLikeFill = line.width < 0.0001;
    const strokeWidth = Math.max(line.width, 0.1);
    return tiles.map((tile) => {
        const fill = scene.color(tile.position, rng);
        return {
            path: tile.path,
            fill,
            stroke: strokeLikeFill ? fill : line.color,
            strokeWidth,
        };
    });
}

export function renderSvg(frame: Frame, painted: readonly PaintedTile[]): string {
    const body = painted
        .map(
            (t) =>
                `  <path d="${pathData(t.path)}" fill="${toCss(t.fill)}" stroke="${toCss(t.stroke)}" stroke-width="${t.strokeWidth}" />\n`
        )
        .join("");
    return `<svg viewBox="0 0 ${frame.w} ${frame.h}" width="${frame.w}" height="${frame.h}" xmlns="http://www.w3.org/2000/svg">\n${body}</svg>\n`;
}
