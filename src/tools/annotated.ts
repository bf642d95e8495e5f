import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { type LayoutConfig } from '../types/figure.js';
import { type AxisRange } from '../classes/annotated-drawable.js';
import { axisRangeSchema, layoutSchema } from './schemas.js';
import { jsonResult } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `annotated` tool.
 *
 * Actions: create, remove_track, get
 */
const annotatedInputSchema = {
    action: z.enum(['create', 'remove_track', 'get']).describe('Action to perform on an annotated figure'),
    name: z.string().min(1).describe('Workspace name of the annotated figure'),
    core: z.string().optional().describe('Workspace name of the main figure (create)'),
    left_track: z.string().optional().describe('Workspace name of the figure drawn as the left track (create)'),
    bottom_track: z.string().optional().describe('Workspace name of the figure drawn as the bottom track (create)'),
    title: z.string().optional().describe('Title, applied to the main figure (create)'),
    xtitle: z.string().optional().describe('X axis title (create)'),
    ytitle: z.string().optional().describe('Y axis title (create)'),
    xrange: axisRangeSchema.optional().describe('X axis range of the main plot (create)'),
    yrange: axisRangeSchema.optional().describe('Y axis range of the main plot (create)'),
    width: z.number().positive().optional().describe('Figure width in pixels, default 500 (create)'),
    height: z.number().positive().optional().describe('Figure height in pixels, default 500 (create)'),
    layout: layoutSchema.optional().describe('Layout settings for the composed figure (create)'),
    remove_left: z.boolean().optional().describe('Remove the left track (remove_track)'),
    remove_bottom: z.boolean().optional().describe('Remove the bottom track (remove_track)'),
};

/**
 * Registers the `annotated` tool on the MCP server.
 */
export function registerAnnotatedTool(server: McpServer): void {
    server.registerTool(
        'annotated',
        {
            title: 'Annotated Figure',
            description:
                'Compose a main figure with left and/or bottom annotation tracks into one multi-panel figure. Track panels are sized by how many feature rows they hold.',
            inputSchema: annotatedInputSchema,
        },
        (args) => {
            const workspace = getWorkspace();

            switch (args.action) {
                case 'create':
                    return handleCreate(workspace, args);
                case 'remove_track':
                    return handleRemoveTrack(workspace, args.name, args.remove_left, args.remove_bottom);
                case 'get':
                    return handleGet(workspace, args.name);
                default:
                    return errors.invalidArgument(`Unknown annotated action: ${String(args.action)}`);
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
    core?: string;
    left_track?: string;
    bottom_track?: string;
    title?: string;
    xtitle?: string;
    ytitle?: string;
    xrange?: AxisRange;
    yrange?: AxisRange;
    width?: number;
    height?: number;
    layout?: LayoutConfig;
}

function handleCreate(workspace: Workspace, args: CreateArgs) {
    if (!args.core) {
        return errors.invalidArgument('annotated create requires "core".');
    }

    try {
        const annotated = workspace.composeAnnotated(args.name, args.core, {
            leftTrack: args.left_track,
            bottomTrack: args.bottom_track,
            title: args.title,
            xtitle: args.xtitle,
            ytitle: args.ytitle,
            xrange: args.xrange,
            yrange: args.yrange,
            width: args.width,
            height: args.height,
            layout: args.layout,
        });
        return jsonResult({
            message: `Annotated figure '${args.name}' created.`,
            leftTrack: annotated.leftTrack !== null,
            bottomTrack: annotated.bottomTrack !== null,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleRemoveTrack(
    workspace: Workspace,
    name: string,
    removeLeft: boolean | undefined,
    removeBottom: boolean | undefined,
) {
    if (!removeLeft && !removeBottom) {
        return errors.invalidArgument('annotated remove_track requires "remove_left" or "remove_bottom".');
    }
    try {
        const annotated = workspace.getAnnotated(name);
        annotated.removeTrack({ left: removeLeft, bottom: removeBottom });
        return jsonResult({
            message: `Tracks of '${name}' updated.`,
            leftTrack: annotated.leftTrack !== null,
            bottomTrack: annotated.bottomTrack !== null,
        });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

function handleGet(workspace: Workspace, name: string) {
    try {
        return jsonResult(workspace.getAnnotated(name).toJSON());
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}
