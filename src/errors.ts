/**
 * Shared Error Factory for seqdraw domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.figureNotLoaded(name);
 *
 * Classes and algorithms throw `new Error(errors.x(...).content[0].text)` so the
 * message a caller sees is the same one a tool returns.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The LLM reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// workspace
// ----------------------------------------------------------------------------

export function figureNotLoaded(name: string): DomainErrorResponse {
    return domainError(`Figure '${name}' is not loaded in the workspace.`);
}

export function figureAlreadyExists(name: string): DomainErrorResponse {
    return domainError(`Figure '${name}' already exists in the workspace.`);
}

export function notAnnotatedFigure(name: string): DomainErrorResponse {
    return domainError(`Figure '${name}' is not an annotated figure.`);
}

export function figureFileNotFound(path: string): DomainErrorResponse {
    return domainError(`Figure file not found: ${path}`);
}

export function invalidFigureFile(path: string): DomainErrorResponse {
    return domainError(`File ${path} does not contain a figure with "data" and "layout".`);
}

// ----------------------------------------------------------------------------
// layout & geometry
// ----------------------------------------------------------------------------

export function domainIndexTooBig(element: number, total: number): DomainErrorResponse {
    return domainError(`${String(element)} index too big for ${String(total)}`);
}

export function invalidGridSize(total: number): DomainErrorResponse {
    return domainError(`Grid must have at least one element per axis, got ${String(total)}.`);
}

export function noCoordinates(): DomainErrorResponse {
    return domainError('No coordinates defined');
}

export function noNumericCoordinates(axis: 'x' | 'y'): DomainErrorResponse {
    return domainError(`Shape has no numeric ${axis} coordinates.`);
}

// ----------------------------------------------------------------------------
// handler helpers
// ----------------------------------------------------------------------------

/**
 * Converts an exception thrown by a class or algorithm into an error response.
 * Class-level errors already carry the factory message, so it is passed through.
 */
export function fromException(e: unknown): DomainErrorResponse {
    return domainError(e instanceof Error ? e.message : String(e));
}
