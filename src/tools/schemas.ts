import { z } from 'zod';
import { type LayoutValue } from '../types/figure.js';

/**
 * Shared zod schemas for figure tool inputs.
 */

export const layoutValueSchema: z.ZodType<LayoutValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(layoutValueSchema),
        z.record(z.string(), layoutValueSchema),
    ]),
);

export const layoutSchema = z.record(z.string(), layoutValueSchema);

export const spanSchema = z.tuple([z.number(), z.number()]);

export const axisRangeSchema = z.tuple([z.number(), z.number()]);

const coordListSchema = z.array(z.number().nullable());

export const traceSchema = z.object({
    type: z.literal('scatter').optional(),
    x: coordListSchema.optional(),
    y: coordListSchema.optional(),
    mode: z.enum(['lines', 'markers', 'lines+markers']).optional(),
    fill: z.enum(['toself', 'none']).optional(),
    fillcolor: z.string().nullable().optional(),
    line: z.object({ color: z.string().nullable().optional() }).optional(),
    marker: z
        .object({
            size: z.number().optional(),
            symbol: z.string().optional(),
            color: z.string().nullable().optional(),
        })
        .optional(),
    text: z.string().nullable().optional(),
    name: z.string().nullable().optional(),
    legendgroup: z.string().nullable().optional(),
    showlegend: z.boolean().optional(),
    hoverinfo: z.string().optional(),
    xaxis: z.string().optional(),
    yaxis: z.string().optional(),
});
