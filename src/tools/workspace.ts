import { z } from 'zod';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getWorkspace } from '../classes/workspace.js';
import { jsonResult } from './result.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `workspace` tool.
 *
 * Actions: info, save, load
 */
const workspaceInputSchema = {
    action: z.enum(['info', 'save', 'load']).describe('Action to perform on the workspace session'),
    name: z.string().optional().describe('Workspace name of the figure (required for save, load)'),
    path: z.string().optional().describe('Figure JSON file path (required for save, load)'),
};

/**
 * Registers the `workspace` tool on the MCP server.
 */
export function registerWorkspaceTool(server: McpServer): void {
    server.registerTool(
        'workspace',
        {
            title: 'Workspace',
            description:
                'In-memory figure session management. List figures, save a figure specification as JSON, or load one back.',
            inputSchema: workspaceInputSchema,
        },
        async (args) => {
            const workspace = getWorkspace();

            switch (args.action) {
                case 'info':
                    return handleInfo(workspace);
                case 'save':
                    return handleSave(workspace, args.name, args.path);
                case 'load':
                    return handleLoad(workspace, args.name, args.path);
                default:
                    return errors.invalidArgument(`Unknown workspace action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Workspace = ReturnType<typeof getWorkspace>;

function handleInfo(workspace: Workspace) {
    return jsonResult(workspace.info());
}

async function handleSave(workspace: Workspace, name: string | undefined, path: string | undefined) {
    if (!name || !path) {
        return errors.invalidArgument('workspace save requires "name" and "path".');
    }

    try {
        const result = await workspace.save(name, path);
        return jsonResult({ message: `Figure '${name}' saved.`, path: result.path });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}

async function handleLoad(workspace: Workspace, name: string | undefined, path: string | undefined) {
    if (!name || !path) {
        return errors.invalidArgument('workspace load requires "name" and "path".');
    }

    try {
        const figure = await workspace.load(name, path);
        return jsonResult({ message: `Figure '${name}' loaded.`, traceCount: figure.traceCount });
    } catch (e: unknown) {
        return errors.fromException(e);
    }
}
