/**
 * Shared helpers for tool handler tests.
 */

export type ToolCallback = (args: Record<string, unknown>) => unknown;

/**
 * Registers a tool against a stub server and returns the handler it installed.
 */
export function captureToolCallback(registerFn: (server: any) => void): ToolCallback {
    let cb: ToolCallback | null = null;
    const mockServer = {
        registerTool(_name: string, _config: unknown, callback: ToolCallback) {
            cb = callback;
        },
    };
    registerFn(mockServer);
    if (!cb) throw new Error('registerTool callback not captured');
    return cb;
}

export interface ToolResult {
    isError?: boolean;
    content: Array<{ type: string; text: string }>;
}

function isToolResult(value: unknown): value is ToolResult {
    return typeof value === 'object' && value !== null && 'content' in value && Array.isArray(value.content);
}

/**
 * Invokes a handler and checks the result has the tool response shape.
 */
export async function call(handler: ToolCallback, args: Record<string, unknown>): Promise<ToolResult> {
    const result = await handler(args);
    if (!isToolResult(result)) throw new Error('handler did not return a tool result');
    return result;
}

/**
 * Parses the JSON payload of a successful result.
 */
export function payload(result: ToolResult): any {
    return JSON.parse(result.content[0].text);
}
