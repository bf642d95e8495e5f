import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getDomain } from '../algorithms/domain.js';
import { GRID_SPACING } from '../config/defaults.js';
import { jsonResult } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `grid` tool.
 *
 * Actions: domain
 */
const gridInputSchema = {
    action: z.enum(['domain']).describe('Action to perform'),
    total: z.number().int().min(1).describe('Number of panels along the axis'),
    element: z.number().int().min(0).describe('Zero-based panel index'),
    is_y: z.boolean().optional().describe('Count rows from the top (y axis domains)'),
    space: z.number().min(0).optional().describe(`Gap between panels, default ${String(GRID_SPACING)}`),
};

/**
 * Registers the `grid` tool on the MCP server.
 */
export function registerGridTool(server: McpServer): void {
    server.registerTool(
        'grid',
        {
            title: 'Grid',
            description: 'Compute the normalised [start, end] axis domain of one panel in an evenly spaced grid of subplots.',
            inputSchema: gridInputSchema,
        },
        (args) => {
            switch (args.action) {
                case 'domain':
                    try {
                        const domain = getDomain(args.total, args.element, args.is_y ?? false, args.space ?? GRID_SPACING);
                        return jsonResult({ domain });
                    } catch (e: unknown) {
                        return errors.fromException(e);
                    }
                default:
                    return errors.invalidArgument(`Unknown grid action: ${String(args.action)}`);
            }
        },
    );
}
