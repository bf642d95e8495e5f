import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadFigureFile, saveFigureFile } from './figure-io.js';
import { type FigureSpec } from '../types/figure.js';

describe('figure-io', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'seqdraw-figure-io-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    function makeTestFigure(): FigureSpec {
        return {
            data: [
                { type: 'scatter', name: 'gene', x: [0, 0, 10, 10, 0, null, 10, 20, null], y: [0, 1, 1, 0, 0, null, 0.5, 0.5, null] },
            ],
            layout: { width: 500, xaxis: { domain: [0.109, 1], title: { text: 'Position' } }, template: null },
        };
    }

    it('roundtrips a figure', async () => {
        const filePath = path.join(tempDir, 'figure.json');
        const original = makeTestFigure();

        await saveFigureFile(filePath, original);
        const loaded = await loadFigureFile(filePath);

        expect(loaded).toEqual(original);
    });

    it('creates missing parent directories', async () => {
        const filePath = path.join(tempDir, 'nested', 'deeper', 'figure.json');
        await saveFigureFile(filePath, makeTestFigure());
        const stat = await fs.stat(filePath);
        expect(stat.isFile()).toBe(true);
    });

    it('writes indented JSON', async () => {
        const filePath = path.join(tempDir, 'figure.json');
        await saveFigureFile(filePath, { data: [], layout: {} });
        expect(await fs.readFile(filePath, 'utf8')).toBe('{\n  "data": [],\n  "layout": {}\n}');
    });

    it('reports a missing file', async () => {
        const filePath = path.join(tempDir, 'missing.json');
        await expect(loadFigureFile(filePath)).rejects.toThrow(`Figure file not found: ${filePath}`);
    });

    it('reports invalid JSON', async () => {
        const filePath = path.join(tempDir, 'broken.json');
        await fs.writeFile(filePath, '{ "data": [', 'utf8');
        await expect(loadFigureFile(filePath)).rejects.toThrow('Invalid JSON in figure file');
    });

    it('rejects files that are not figures', async () => {
        const filePath = path.join(tempDir, 'other.json');
        for (const content of ['{"data": {}, "layout": {}}', '{"data": [1], "layout": {}}', '{"data": []}', '[]']) {
            await fs.writeFile(filePath, content, 'utf8');
            await expect(loadFigureFile(filePath)).rejects.toThrow('does not contain a figure');
        }
    });
});
