/**
 * Configuration file format
 * Every section is optional; missing values fall back to built-in defaults.
 */

import { z } from "zod";

const count = z.number().int().min(0);
const fraction = z.number().positive();
const cellSize = z.number().positive();

/**
 * A name (color, theme or shape set) with weight 1, or a name with an explicit weight
 */
export const weightedRefSchema = z.union([
    z.string(),
    z.object({
        name: z.string(),
        weight: count,
    }),
]);

export const patternDataSchema = z
    .object({
        nbFreeCircles: count,
        nbFreeTriangles: count,
        nbFreeStripes: count,
        nbFreeSpirals: count,
        nbConcentricCircles: count,
        nbParallelStripes: count,
        nbCrossedStripes: count,
        nbParallelWaves: count,
        varParallelStripes: count,
        varCrossedStripes: count,
        sizeFreeCircles: fraction,
        sizeFreeTriangles: fraction,
        widthStripe: fraction,
        widthSpiral: fraction,
    })
    .partial();

export const tilingDataSchema = z
    .object({
        sizeHexagons: cellSize,
        sizeTriangles: cellSize,
        sizeHexagonsAndTriangles: cellSize,
        sizeSquaresAndTriangles: cellSize,
        sizeRhombus: cellSize,
        sizePentagons: cellSize,
        nbDelaunay: z.number().int().min(3),
    })
    .partial();

export const entrySchema = z.object({
    span: z.string().regex(/^\d{4}-\d{4}$/, "Expected a span like 0700-1830"),
    weight: count.default(1),
    themes: z.array(weightedRefSchema).default([]),
    shapes: z.array(weightedRefSchema).default([]),
    line_color: z.string().optional(),
    line_width: z.number().min(0).optional(),
});

export const metaConfigSchema = z.object({
    global: z
        .object({
            deviation: count,
            weight: count,
            size: cellSize,
            width: z.number().int().positive(),
            height: z.number().int().positive(),
        })
        .partial()
        .optional(),
    lines: z
        .object({
            width: z.number().min(0),
            color: z.string(),
        })
        .partial()
        .optional(),
    colors: z.record(z.string(), z.string().regex(/^#?[0-9a-fA-F]{6}$/, "Expected a #RRGGBB color")).optional(),
    themes: z.record(z.string(), z.array(weightedRefSchema)).optional(),
    shapes: z
        .record(
            z.string(),
            z.object({
                tilings: z.record(z.string(), count).optional(),
                patterns: z.record(z.string(), count).optional(),
            })
        )
        .optional(),
    data: z
        .object({
            patterns: patternDataSchema.optional(),
            tilings: tilingDataSchema.optional(),
        })
        .optional(),
    entry: z.array(entrySchema).optional(),
});

export type WeightedRef = z.infer<typeof weightedRefSchema>;
export type PatternData = z.infer<typeof patternDataSchema>;
export type TilingData = z.infer<typeof tilingDataSchema>;
export type Entry = z.infer<typeof entrySchema>;
export type MetaConfig = z.infer<typeof metaConfigSchema>;
