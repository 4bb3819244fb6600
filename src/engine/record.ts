/**
 * Scene records: JSON form of a generated scene, so the same color layout
 * can be replayed over another tiling
 */

import { readFile, rename, rm, writeFile } from "fs/promises";
import { z } from "zod";
import { hexToRgb, rgbToHex, type RGB } from "../lib/color/color.js";
import { ErrorCode, codedError } from "../lib/errors.js";
import { Frame } from "../lib/geometry/frame.js";
import { Pos } from "../lib/geometry/pos.js";
import type { ColorItem } from "./paint/colorItem.js";
import type { Region } from "./paint/regions.js";
import { Scene } from "./scene.js";

const hexSchema = z.string().regex(/^#?[0-9a-fA-F]{6}$/, "Expected a #RRGGBB color");
const pointSchema = z.tuple([z.number(), z.number()]);

const colorItemSchema = z.object({
    shade: hexSchema,
    deviation: z.number().int().min(0),
    theme: hexSchema,
    weight: z.number().int().min(0),
});

const regionSchema = z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("disc"), center: pointSchema, radius: z.number().positive(), color: colorItemSchema }),
    z.object({ kind: z.literal("half-plane"), limit: pointSchema, reference: pointSchema, color: colorItemSchema }),
    z.object({
        kind: z.literal("triangle"),
        a: pointSchema,
        b: pointSchema,
        c: pointSchema,
        color: colorItemSchema,
    }),
    z.object({ kind: z.literal("spiral"), center: pointSchema, width: z.number().positive(), color: colorItemSchema }),
    z.object({ kind: z.literal("stripe"), limit: pointSchema, reference: pointSchema, color: colorItemSchema }),
]);

export const sceneRecordSchema = z.object({
    frame: z.object({ w: z.number().positive(), h: z.number().positive() }),
    background: colorItemSchema,
    items: z.array(regionSchema),
});

export type SceneRecord = z.infer<typeof sceneRecordSchema>;
type ColorItemRecord = z.infer<typeof colorItemSchema>;
type RegionRecord = z.infer<typeof regionSchema>;
type PointRecord = z.infer<typeof pointSchema>;

function toPoint(p: Pos): PointRecord {
    return [p.x, p.y];
}

function fromPoint([x, y]: PointRecord): Pos {
    return new Pos(x, y);
}

function fromHex(hex: string): RGB {
    const rgb = hexToRgb(hex);
    // The schema regex already guarantees a parsable value
    if (!rgb) {
        throw codedError(ErrorCode.SceneRecord, `Invalid color ${hex}`);
    }
    return rgb;
}

function colorItemToRecord(item: ColorItem): ColorItemRecord {
    return {
        shade: rgbToHex(item.shade),
        deviation: item.deviation,
        theme: rgbToHex(item.theme),
        weight: item.weight,
    };
}

function colorItemFromRecord(record: ColorItemRecord): ColorItem {
    return {
        shade: fromHex(record.shade),
        deviation: record.deviation,
        theme: fromHex(record.theme),
        weight: record.weight,
    };
}

function regionToRecord(region: Region): RegionRecord {
    const color = colorItemToRecord(region.color);
    switch (region.kind) {
        case "disc":
            return { kind: "disc", center: toPoint(region.center), radius: region.radius, color };
        case "half-plane":
            return { kind: "half-plane", limit: toPoint(region.limit), reference: toPoint(region.reference), color };
        case "triangle":
            return { kind: "triangle", a: toPoint(region.a), b: toPoint(region.b), c: toPoint(region.c), color };
        case "spiral":
            return { kind: "spiral", center: toPoint(region.center), width: region.width, color };
        case "stripe":
            return { kind: "stripe", limit: toPoint(region.limit), reference: toPoint(region.reference), color };
    }
}

function regionFromRecord(record: RegionRecord): Region {
    const color = colorItemFromRecord(record.color);
    switch (record.kind) {
        case "disc":
            return { kind: "disc", center: fromPoint(record.center), radius: record.radius, color };
        case "half-plane":
            return {
                kind: "half-plane",
                limit: fromPoint(record.limit),
                reference: fromPoint(record.reference),
                color,
            };
        case "triangle":
            return {
                kind: "triangle",
                a: fromPoint(record.a),
                b: fromPoint(record.b),
                c: fromPoint(record.c),
                color,
            };
        case "spiral":
            return { kind: "spiral", center: fromPoint(record.center), width: record.width, color };
        case "stripe":
            return { kind: "stripe", limit: fromPoint(record.limit), reference: fromPoint(record.reference), color };
    }
}

export function sceneToRecord(scene: Scene, frame: Frame): SceneRecord {
    return {
        frame: { w: frame.w, h: frame.h },
        background: colorItemToRecord(scene.background),
        items: scene.items.map(regionToRecord),
    };
}

/**
 * Validates an untyped value and rebuilds the scene and its frame
 */
export function sceneFromRecord(value: unknown): { scene: Scene; frame: Frame } {
    const parsed = sceneRecordSchema.safeParse(value);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
        throw codedError(ErrorCode.SceneRecord, `Invalid scene record${where}: ${issue?.message ?? "unknown issue"}`);
    }
    const record = parsed.data;
    return {
        scene: new Scene(colorItemFromRecord(record.background), record.items.map(regionFromRecord)),
        frame: new Frame(record.frame.w, record.frame.h),
    };
}

/**
 * Writes the record next to `path` first, then renames it into place
 */
export async function saveScene(path: string, scene: Scene, frame: Frame): Promise<void> {
    const tmp = `${path}.tmp`;
    try {
        await writeFile(tmp, JSON.stringify(sceneToRecord(scene, frame), null, 2), "utf-8");
        await rename(tmp, path);
    } catch (error) {
        await rm(tmp, { force: true });
        throw codedError(
            ErrorCode.Output,
            `Could not save scene to ${path}: ${error instanceof Error ? error.message : "Unknown error"}`
        );
    }
}

export async function loadScene(path: string): Promise<{ scene: Scene; frame: Frame }> {
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch (error) {
        throw codedError(
            ErrorCode.SceneRecord,
            `Could not read scene from ${path}: ${error instanceof Error ? error.message : "Unknown error"}`
        );
    }
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch {
        throw codedError(ErrorCode.SceneRecord, `Scene file ${path} is not valid JSON`);
    }
    return sceneFromRecord(value);
}
