import { describe, it, expect, beforeEach } from 'vitest';
import { registerAnnotatedTool } from './annotated.js';
import { registerFigureTool } from './figure.js';
import { WorkspaceClass } from '../classes/workspace.js';
import { call, captureToolCallback, payload, type ToolCallback } from './test-helpers.js';

describe('annotated tool', () => {
    let handler: ToolCallback;
    let figure: ToolCallback;

    beforeEach(async () => {
        WorkspaceClass.reset();
        handler = captureToolCallback(registerAnnotatedTool);
        figure = captureToolCallback(registerFigureTool);

        await call(figure, { action: 'create', name: 'dots' });
        await call(figure, { action: 'add_trace', name: 'dots', trace: { name: 'hits', x: [1, 2], y: [1, 2] } });
        await call(figure, { action: 'create', name: 'genes' });
        await call(figure, { action: 'add_feature', name: 'genes', feature_type: 'gene', feature_name: 'g1', coords: [[0, 10]] });
    });

    it('create composes a core with a bottom track', async () => {
        const result = await call(handler, {
            action: 'create',
            name: 'combined',
            core: 'dots',
            bottom_track: 'genes',
            xtitle: 'Seq 1',
        });
        expect(payload(result)).toEqual({
            message: "Annotated figure 'combined' created.",
            leftTrack: false,
            bottomTrack: true,
        });

        const fig = payload(await call(handler, { action: 'get', name: 'combined' }));
        expect(fig.data.map((t: { name: string; yaxis: string }) => [t.name, t.yaxis])).toEqual([
            ['hits', 'y'],
            ['gene', 'y2'],
        ]);
        expect(fig.layout.yaxis2.range).toEqual([0, 1]);
        expect(fig.layout.xaxis.title).toEqual({ text: 'Seq 1' });
        expect(fig.layout.width).toBe(500);
    });

    it('create without core returns an error', async () => {
        const result = await call(handler, { action: 'create', name: 'combined' });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toContain('"core"');
    });

    it('create with an unknown track returns figureNotLoaded', async () => {
        const result = await call(handler, { action: 'create', name: 'combined', core: 'dots', left_track: 'ghost' });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Figure 'ghost' is not loaded in the workspace.");
    });

    it('remove_track drops a track', async () => {
        await call(handler, { action: 'create', name: 'combined', core: 'dots', bottom_track: 'genes' });
        const result = await call(handler, { action: 'remove_track', name: 'combined', remove_bottom: true });
        expect(payload(result)).toEqual({
            message: "Tracks of 'combined' updated.",
            leftTrack: false,
            bottomTrack: false,
        });

        const fig = payload(await call(handler, { action: 'get', name: 'combined' }));
        expect(fig.data).toHaveLength(1);
    });

    it('remove_track without a selection returns an error', async () => {
        await call(handler, { action: 'create', name: 'combined', core: 'dots', bottom_track: 'genes' });
        const result = await call(handler, { action: 'remove_track', name: 'combined' });
        expect(result.isError).toBe(true);
    });

    it('get on a plain figure returns notAnnotatedFigure', async () => {
        const result = await call(handler, { action: 'get', name: 'dots' });
        expect(result.isError).toBe(true);
        expect(result.content[0].text).toBe("Figure 'dots' is not an annotated figure.");
    });
});
