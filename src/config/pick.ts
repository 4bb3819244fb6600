/**
 * Turns a configuration into the concrete choices of one run
 */

import { existsSync, readFileSync } from "fs";
import { hexToRgb, randomColor, type RGB } from "../lib/color/color.js";
import { Frame } from "../lib/geometry/frame.js";
import { Logger } from "../lib/log.js";
import type { RandomSource } from "../lib/rng.js";
import type { ColorItem } from "../engine/paint/colorItem.js";
import { createRegions, PATTERNS, type Pattern, type PatternParams } from "../engine/paint/patterns.js";
import { Scene } from "../engine/scene.js";
import type { LineStyle } from "../engine/svg.js";
import { TILINGS, type Tiling, type TilingParams } from "../engine/tiling/index.js";
import { Chooser } from "./chooser.js";
import {
    DEFAULT_GLOBAL,
    DEFAULT_LINE,
    DEFAULT_PATTERN_DATA,
    DEFAULT_TILING_DATA,
} from "./defaults.js";
import { metaConfigSchema, type Entry, type MetaConfig, type WeightedRef } from "./schema.js";

/**
 * Everything one generation pass needs
 */
export interface SceneConfig {
    theme: Chooser<RGB>;
    deviation: number;
    weight: number;
    frame: Frame;
    pattern: PatternParams;
    tiling: TilingParams;
    line: LineStyle;
}

/**
 * Parses configuration text. Problems are logged and the affected
 * configuration is replaced by an empty one, which means all defaults.
 */
export function parseMetaConfig(text: string, log: Logger = new Logger()): MetaConfig {
    if (text.trim() === "") {
        return {};
    }
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        log.warn(`Configuration is not valid JSON (${error instanceof Error ? error.message : "Unknown error"}); switching to default settings`);
        return {};
    }
    const parsed = metaConfigSchema.safeParse(raw);
    if (!parsed.success) {
        for (const issue of parsed.error.issues) {
            log.warn(`Configuration ${issue.path.join(".") || "root"}: ${issue.message}`);
        }
        log.warn("Switching to default settings");
        return {};
    }
    return parsed.data;
}

/**
 * Reads a configuration file; a missing or unreadable file yields defaults
 */
export function loadMetaConfig(path: string | undefined, log: Logger = new Logger()): MetaConfig {
    if (!path) {
        log.info("No configuration file given; using default settings");
        return {};
    }
    if (!existsSync(path)) {
        log.warn(`Settings file not found: ${path}`);
        return {};
    }
    try {
        return parseMetaConfig(readFileSync(path, "utf-8"), log);
    } catch (error) {
        log.warn(`${error instanceof Error ? error.message : "Unknown error"}; switching to default settings`);
        return {};
    }
}

/**
 * Parses "HHMM-HHMM" into numeric bounds
 */
export function parseSpan(span: string): [number, number] {
    const [start, end] = span.split("-").map((s) => parseInt(s, 10));
    return [start, end];
}

/**
 * Whether `time` (HHMM) falls in [start, end), wrapping past midnight when start > end
 */
export function isActive(entry: Pick<Entry, "span">, time: number): boolean {
    const [start, end] = parseSpan(entry.span);
    if (start <= end) {
        return start <= time && time < end;
    }
    return time >= start || time < end;
}

function refName(ref: WeightedRef): string {
    return typeof ref === "string" ? ref : ref.name;
}

function refWeight(ref: WeightedRef): number {
    return typeof ref === "string" ? 1 : ref.weight;
}

/**
 * Resolves a color name from the palette, or a literal hex value
 */
export function resolveColor(name: string, meta: MetaConfig): RGB | undefined {
    const named = meta.colors?.[name];
    return hexToRgb(named ?? name) ?? undefined;
}

function pickName(
    refs: readonly WeightedRef[],
    available: readonly string[],
    what: string,
    rng: RandomSource,
    log: Logger
): string | undefined {
    const chooser = new Chooser<string>();
    for (const ref of refs) {
        const name = refName(ref);
        if (available.includes(name)) {
            chooser.push(name, refWeight(ref));
        } else {
            log.warn(`Unknown ${what} '${name}'`);
        }
    }
    if (chooser.isEmpty()) {
        return rng.choose(available);
    }
    return chooser.choose(rng);
}

function weightedKinds<K extends string>(
    weights: Record<string, number> | undefined,
    kinds: readonly K[],
    what: string,
    log: Logger
): Chooser<K> {
    const chooser = new Chooser<K>();
    for (const [name, weight] of Object.entries(weights ?? {})) {
        const kind = kinds.find((k) => k === name);
        if (kind === undefined) {
            log.warn(`Unknown ${what} '${name}'`);
        } else {
            chooser.push(kind, weight);
        }
    }
    if (chooser.isEmpty()) {
        for (const kind of kinds) chooser.push(kind, 1);
    }
    return chooser;
}

function themeChooser(name: string | undefined, meta: MetaConfig, rng: RandomSource, log: Logger): Chooser<RGB> {
    const chooser = new Chooser<RGB>();
    const refs = name === undefined ? [] : meta.themes?.[name] ?? [];
    for (const ref of refs) {
        const color = resolveColor(refName(ref), meta);
        if (color === undefined) {
            log.warn(`Unknown color '${refName(ref)}' in theme '${name}'`);
        } else {
            chooser.push(color, refWeight(ref));
        }
    }
    if (chooser.isEmpty()) {
        log.details("No usable theme; drawing a random theme color");
        chooser.push(randomColor(rng), 1);
    }
    return chooser;
}

export function patternParams(pattern: Pattern, meta: MetaConfig): PatternParams {
    const data = { ...DEFAULT_PATTERN_DATA, ...meta.data?.patterns };
    switch (pattern) {
        case "free-circles":
            return { pattern, count: data.nbFreeCircles, width: data.sizeFreeCircles, variation: 0 };
        case "free-triangles":
            return { pattern, count: data.nbFreeTriangles, width: data.sizeFreeTriangles, variation: 0 };
        case "free-stripes":
            return { pattern, count: data.nbFreeStripes, width: data.widthStripe, variation: 0 };
        case "free-spirals":
            return { pattern, count: data.nbFreeSpirals, width: data.widthSpiral, variation: 0 };
        case "concentric-circles":
            return { pattern, count: data.nbConcentricCircles, width: 0, variation: 0 };
        case "parallel-stripes":
            return { pattern, count: data.nbParallelStripes, width: 0, variation: data.varParallelStripes };
        case "crossed-stripes":
            return { pattern, count: data.nbCrossedStripes, width: 0, variation: data.varCrossedStripes };
        case "parallel-waves":
            return { pattern, count: data.nbParallelWaves, width: 0, variation: 0 };
    }
}

type SizeKey = Exclude<keyof typeof DEFAULT_TILING_DATA, "nbDelaunay">;

const SIZE_KEYS: Record<Exclude<Tiling, "delaunay">, SizeKey> = {
    hexagons: "sizeHexagons",
    triangles: "sizeTriangles",
    "hexagons-and-triangles": "sizeHexagonsAndTriangles",
    "squares-and-triangles": "sizeSquaresAndTriangles",
    rhombus: "sizeRhombus",
    pentagons: "sizePentagons",
};

/**
 * Cell size: the tiling's own setting, else `global.size`, else the built-in size
 */
export function tilingParams(tiling: Tiling, meta: MetaConfig): TilingParams {
    const nbDelaunay = meta.data?.tilings?.nbDelaunay ?? DEFAULT_TILING_DATA.nbDelaunay;
    if (tiling === "delaunay") {
        return { tiling, size: meta.global?.size ?? DEFAULT_GLOBAL.size, nbDelaunay };
    }
    const key = SIZE_KEYS[tiling];
    const size = meta.data?.tilings?.[key] ?? meta.global?.size ?? DEFAULT_TILING_DATA[key];
    return { tiling, size, nbDelaunay };
}

export interface PickOverrides {
    pattern?: Pattern;
    tiling?: Tiling;
    width?: number;
    height?: number;
}

/**
 * Chooses entry, theme, shape set, pattern and tiling for the time of day `time` (HHMM)
 */
export function pickConfig(
    meta: MetaConfig,
    rng: RandomSource,
    time: number,
    overrides: PickOverrides = {},
    log: Logger = new Logger()
): SceneConfig {
    const entries = meta.entry ?? [];
    const active = entries.filter((e) => isActive(e, time));
    if (entries.length > 0 && active.length === 0) {
        log.warn(`No entry covers time ${String(time).padStart(4, "0")}; choosing among all entries`);
    }
    const entry = new Chooser((active.length > 0 ? active : entries).map((e) => [e, e.weight] as const)).choose(rng);
    log.details(`Entry: ${entry?.span ?? "none"}`);

    const themeName = pickName(entry?.themes ?? [], Object.keys(meta.themes ?? {}), "theme", rng, log);
    const theme = themeChooser(themeName, meta, rng, log);
    log.details(`Theme: ${themeName ?? "random"}`);

    const shapeName = pickName(entry?.shapes ?? [], Object.keys(meta.shapes ?? {}), "shape set", rng, log);
    const shape = shapeName === undefined ? undefined : meta.shapes?.[shapeName];

    const pattern =
        overrides.pattern ?? weightedKinds(shape?.patterns, PATTERNS, "pattern", log).choose(rng) ?? "free-circles";
    const tiling = overrides.tiling ?? weightedKinds(shape?.tilings, TILINGS, "tiling", log).choose(rng) ?? "hexagons";
    log.info(`Pattern: ${pattern}, tiling: ${tiling}`);

    const lineColorName = entry?.line_color ?? meta.lines?.color;
    let lineColor = DEFAULT_LINE.color;
    if (lineColorName !== undefined) {
        const resolved = resolveColor(lineColorName, meta);
        if (resolved === undefined) {
            log.warn(`Unknown line color '${lineColorName}'`);
        } else {
            lineColor = resolved;
        }
    }

    return {
        theme,
        deviation: meta.global?.deviation ?? DEFAULT_GLOBAL.deviation,
        weight: meta.global?.weight ?? DEFAULT_GLOBAL.weight,
        frame: new Frame(
            overrides.width ?? meta.global?.width ?? DEFAULT_GLOBAL.width,
            overrides.height ?? meta.global?.height ?? DEFAULT_GLOBAL.height
        ),
        pattern: patternParams(pattern, meta),
        tiling: tilingParams(tiling, meta),
        line: {
            color: lineColor,
            width: entry?.line_width ?? meta.lines?.width ?? DEFAULT_LINE.width,
        },
    };
}

/**
 * Random shade, configured deviation and weight, theme color drawn from the theme
 */
export function chooseColorItem(cfg: SceneConfig, rng: RandomSource): ColorItem {
    return {
        shade: randomColor(rng),
        deviation: cfg.deviation,
        weight: cfg.weight,
        theme: cfg.theme.choose(rng) ?? { r: 0, g: 0, b: 0 },
    };
}

export function buildScene(cfg: SceneConfig, rng: RandomSource): Scene {
    const background = chooseColorItem(cfg, rng);
    const items = createRegions(cfg.pattern, cfg.frame, (r) => chooseColorItem(cfg, r), rng);
    return new Scene(background, items);
}
