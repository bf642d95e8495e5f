import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { makeShape } from '../classes/make-shape.js';
import { type LayoutConfig, type Trace } from '../types/figure.js';
import { type Span } from '../types/shape.js';
import { mergeLayout } from '../algorithms/layout-merge.js';
import { layoutSchema, spanSchema, traceSchema } from './schemas.js';
import { jsonResult } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `figure` tool.
 *
 * Actions: create, add_feature, add_trace, remove_traces, set_layout, set_size, get, delete
 */
const figureInputSchema = {
    action: z
        .enum(['create', 'add_feature', 'add_trace', 'remove_traces', 'set_layout', 'set_size', 'get', 'delete'])
        .describe('Action to perform on a figure'),
    name: z.string().min(1).describe('Workspace name of the figure'),
    title: z.string().optional().describe('Figure title (create)'),
    xtitle: z.string().optional().describe('X axis title (create)'),
    ytitle: z.string().optional().describe('Y axis title (create)'),
    width: z.number().positive().optional().describe('Figure width in pixels (create, set_size)'),
    height: z.number().positive().optional().describe('Figure height in pixels (create, set_size)'),
    showlegend: z.boolean().optional().describe('Show the legend (create, add_feature)'),
    visible_axes: z.boolean().optional().describe('Show the axes (create)'),
    layout: layoutSchema.optional().describe('Layout settings merged into the figure (create, set_layout)'),
    feature_type: z.string().optional().describe('Feature type, e.g. gene, exon, snp, variation (add_feature)'),
    feature_name: z.string().optional().describe('Feature label shown on hover (add_feature)'),
    coords: z.array(spanSchema).optional().describe('Feature spans as [start, end] pairs, in strand order (add_feature)'),
    y: z.number().optional().describe('Track row the feature is drawn on (add_feature)'),
    feature_height: z.number().positive().optional().describe('Feature height in track units (add_feature)'),
    arrow_head_width: z.number().positive().optional().describe('Arrow head size as a fraction of the body (add_feature)'),
    shift_x: z.number().optional().describe('Offset added to x coordinates (add_feature)'),
    shift_y: z.number().optional().describe('Offset added to y coordinates (add_feature)'),
    transpose: z.boolean().optional().describe('Draw the feature vertically, for left tracks (add_feature)'),
    trace: traceSchema.optional().describe('A complete scatter trace (add_trace)'),
    trace_names: z.array(z.string()).optional().describe('Names of traces to remove (remove_traces)'),
};

/**
 * Registers the `figure` tool on the MCP server.
 */
export function registerFigureTool(server: McpServer): void {
    server.registerTool(
        'figure',
        {
            title: 'Figure',
            description:
                'Create figures and draw sequence features (genes, exons, variants) on them as shape traces. Returns figure specifications in the plotly.js schema.',
            inputSchema: figureInputSchema,
        },
        (args) => {
            const workspace = getWorkspace();

            switch (args.action) {
                case 'create':
                    return handleCreate(workspace, args);
                case 'add_feature':
                    return handleAddFeature(workspace, args);
                case 'add_trace':
                    return handleAddTrace(workspace, args.name, args.trace);
                case 'remove_traces':
                    return handleRemoveTraces(workspace, args.name, args.trace_names);
                case 'set_layout':
                    return handleSetLayout(workspace, args.name, args.layout);
                case 'set_size':
                    return handleSetSize(workspace, args.name, args.width, args.height);
                case 'get':
                    return handleGet(workspace, args.name);
                case 'delete':
                    return handleDelete(workspace, args.name);
                default:
                    return errors.invalidArgument(`Unknown figure action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;

interface CreateArgs {
    name: string;
    title?: string;
    xtitle?: string;
    ytitle?: string;
    width?: number;
    height?: number;
    showlegend?: boolean;
    visible_axes?: boolean;
    layout?: LayoutConfig;
}

interface FeatureArgs {
    name: string;
    feature_type?: string;
    feature_name?: string;
    coords?: Span[];
    y?: number;
    feature_height?: number;
    arrow_head_width?: number;
    shift_x?: number;
    shift_y?: number;
    transpose?: boolean;
    showlegend?: boolean;
}

function handleCreate(workspace: Workspace, args: CreateArgs) {
    try {
        workspace.createFigure(args.name, {
            title: args.title,
            xtitle: args.xtitle,
            ytitle: args.ytitle,
            width: args.width,
            height: args.height,
            showlegend: args.showlegend,
            visibleAxes: args.visible_axes,
            layout: args.layout,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
    return jsonResult({ message: `Figure '${args.name}' created.` });
}

function handleAddFeature(workspace: Workspace, args: FeatureArgs) {
    if (!args.feature_type) {
        return errors.invalidArgument('figure add_feature requires "feature_type".');
    }
    if (!args.coords || args.coords.length === 0) {
        return errors.noCoordinates();
    }

    try {
        const figure = workspace.getFigure(args.name);
        const shape = makeShape(
            { type: args.feature_type, name: args.feature_name ?? null, coords: args.coords },
            {
                y: args.y,
                height: args.feature_height,
                arrowHeadWidth: args.arrow_head_width,
                showlegend: args.showlegend,
            },
        );
        if (shape === null) {
            return errors.noCoordinates();
        }
        shape.shift(args.shift_x ?? 0, args.shift_y ?? 0);
        if (args.transpose) {
            shape.transpose();
        }
        figure.addTrace(shape.asTrace());
        return jsonResult({
            message: `Feature '${args.feature_name ?? args.feature_type}' added to '${args.name}'.`,
            traceCount: figure.traceCount,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleAddTrace(workspace: Workspace, name: string, trace: Trace | undefined) {
    if (!trace) {
        return errors.invalidArgument('figure add_trace requires "trace".');
    }
    try {
        const figure = workspace.getFigure(name);
        figure.addTrace(trace);
        return jsonResult({ message: `Trace added to '${name}'.`, traceCount: figure.traceCount });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleRemoveTraces(workspace: Workspace, name: string, traceNames: string[] | undefined) {
    if (!traceNames || traceNames.length === 0) {
        return errors.invalidArgument('figure remove_traces requires "trace_names".');
    }
    try {
        const figure = workspace.getFigure(name);
        const removed = figure.removeTraces(traceNames);
        return jsonResult({
            message: `Removed ${String(removed)} trace(s) from '${name}'.`,
            traceCount: figure.traceCount,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleSetLayout(workspace: Workspace, name: string, layout: LayoutConfig | undefined) {
    if (!layout) {
        return errors.invalidArgument('figure set_layout requires "layout".');
    }
    try {
        const figure = workspace.getFigure(name);
        mergeLayout(figure.layout, layout);
        return jsonResult({ message: `Layout of '${name}' updated.` });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleSetSize(workspace: Workspace, name: string, width: number | undefined, height: number | undefined) {
    if (width === undefined && height === undefined) {
        return errors.invalidArgument('figure set_size requires "width" or "height".');
    }
    try {
        const figure = workspace.getFigure(name);
        if (width !== undefined) figure.figWidth = width;
        if (height !== undefined) figure.figHeight = height;
        return jsonResult({
            message: `Size of '${name}' updated.`,
            width: figure.figWidth,
            height: figure.figHeight,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleGet(workspace: Workspace, name: string) {
    try {
        return jsonResult(workspace.getFigure(name).toJSON());
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleDelete(workspace: Workspace, name: string) {
    try {
        workspace.deleteFigure(name);
        return jsonResult({ message: `Figure '${name}' deleted.` });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}
