import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerFigureTool } from './tools/figure.js';
import { registerAnnotatedTool } from './tools/annotated.js';
import { registerWorkspaceTool } from './tools/workspace.js';
import { registerGridTool } from './tools/grid.js';

export const SERVER_NAME = 'seqdraw';
export const SERVER_VERSION = '1.0.0';

/**
 * Builds the server with every tool registered. Transport wiring is left to the caller.
 */
export function createServer(): McpServer {
    const server = new McpServer({
        name: SERVER_NAME,
        version: SERVER_VERSION,
    });

    registerFigureTool(server);
    registerAnnotatedTool(server);
    registerWorkspaceTool(server);
    registerGridTool(server);

    return server;
}
