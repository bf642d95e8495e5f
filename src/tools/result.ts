/**
 * Wraps a JSON-serializable payload as a successful tool result.
 */
export function jsonResult(payload: unknown) {
    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify(payload),
            },
        ],
    };
}
