import * as fs from 'fs/promises';
import * as path from 'node:path';
import { type FigureSpec } from '../types/figure.js';
import * as errors from '../errors.js';

/**
 * Validates that an object is structurally a figure: a `data` array of trace
 * objects and a `layout` object.
 */
function validateFigureStructure(data: unknown): data is FigureSpec {
    if (!data || typeof data !== 'object') return false;
    if (!('data' in data) || !('layout' in data)) return false;

    const { data: traces, layout } = data;
    if (!Array.isArray(traces)) return false;
    if (!traces.every((t) => t !== null && typeof t === 'object' && !Array.isArray(t))) return false;
    if (!layout || typeof layout !== 'object' || Array.isArray(layout)) return false;

    return true;
}

/**
 * Loads a figure specification from a JSON file.
 *
 * @param filePath - Path to the figure JSON file
 * @returns The parsed figure
 */
export async function loadFigureFile(filePath: string): Promise<FigureSpec> {
    let fileContent: string;
    try {
        fileContent = await fs.readFile(filePath, 'utf8');
    } catch (error: unknown) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            throw new Error(errors.figureFileNotFound(filePath).content[0].text);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(fileContent);
    } catch (e: unknown) {
        const detail = e instanceof Error ? e.message : String(e);
        throw new Error(`Invalid JSON in figure file: ${filePath}. ${detail}`);
    }

    if (!validateFigureStructure(parsed)) {
        throw new Error(errors.invalidFigureFile(filePath).content[0].text);
    }
    return parsed;
}

/**
 * Saves a figure specification to a JSON file, creating parent directories as needed.
 *
 * @param filePath - Destination path
 * @param figure - The figure to write
 */
export async function saveFigureFile(filePath: string, figure: FigureSpec): Promise<void> {
    const dir = path.dirname(filePath);
    if (dir) {
        await fs.mkdir(dir, { recursive: true });
    }
    await fs.writeFile(filePath, JSON.stringify(figure, null, 2), 'utf8');
}
