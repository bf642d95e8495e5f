import { describe, it, expect } from 'vitest';
import { DrawableClass } from './drawable.js';
import { type Trace } from '../types/figure.js';

describe('DrawableClass layout', () => {
    it('starts from the default layout', () => {
        expect(new DrawableClass().layout).toEqual({
            font: { family: 'Balto', size: 14 },
            autosize: false,
            hovermode: 'closest',
            template: null,
            plot_bgcolor: null,
            margin: { l: 50, r: 50, t: 50, b: 50, pad: 4 },
            xaxis: { visible: true },
            yaxis: { visible: true },
            title: null,
            width: null,
            height: null,
            showlegend: true,
        });
    });

    it('stores the title as a title section', () => {
        const d = new DrawableClass({ title: 'Coverage' });
        expect(d.layout.title).toEqual({ text: 'Coverage' });
        expect(d.title).toBe('Coverage');

        d.title = 'Depth';
        expect(d.layout.title).toEqual({ text: 'Depth' });
    });

    it('merges a supplied layout over the defaults', () => {
        const d = new DrawableClass({ layout: { width: 300, margin: { l: 10 }, showlegend: false } });
        expect(d.layout.width).toBe(300);
        expect(d.layout.margin).toEqual({ l: 10, r: 50, t: 50, b: 50, pad: 4 });
        expect(d.layout.showlegend).toBe(false);
    });

    it('lets explicit constructor values win over the supplied layout', () => {
        const d = new DrawableClass({ width: 400, visibleAxes: false, layout: { width: 300, xaxis: { visible: true } } });
        expect(d.layout.width).toBe(400);
        expect(d.layout.xaxis).toEqual({ visible: false });
        expect(d.layout.yaxis).toEqual({ visible: false });
    });

    it('exposes width and height accessors', () => {
        const d = new DrawableClass({ width: 600 });
        expect(d.figWidth).toBe(600);
        expect(d.figHeight).toBeNull();
        d.figHeight = 250;
        expect(d.layout.height).toBe(250);
    });
});

describe('DrawableClass traces', () => {
    function makeDrawable(): DrawableClass {
        const d = new DrawableClass();
        d.addTrace({ name: 'a', x: [1] });
        d.addTrace({ name: 'b', x: [2] });
        d.addTrace({ name: 'a', x: [3] });
        return d;
    }

    it('keeps traces in insertion order', () => {
        expect(makeDrawable().getTraceTitles()).toEqual(['a', 'b', 'a']);
    });

    it('pops the first trace with a matching name', () => {
        const d = makeDrawable();
        const popped = d.popTrace('a');
        expect(popped).toEqual({ name: 'a', x: [1] });
        expect(d.getTraceTitles()).toEqual(['b', 'a']);
    });

    it('returns undefined when popping an unknown name', () => {
        const d = makeDrawable();
        expect(d.popTrace('zzz')).toBeUndefined();
        expect(d.traces).toHaveLength(3);
    });

    it('removes traces by one name or several', () => {
        const d = makeDrawable();
        d.removeTraces('b');
        expect(d.getTraceTitles()).toEqual(['a', 'a']);
        d.removeTraces(['a', 'a', 'missing']);
        expect(d.traces).toEqual([]);
    });
});

describe('DrawableClass figure', () => {
    it('substitutes an empty trace when there are none', () => {
        const fig = new DrawableClass().figure;
        expect(fig.data).toEqual([{}]);
        expect(fig.layout.xaxis).toEqual({ visible: true, title: null });
    });

    it('returns its own layout with axis titles resolved', () => {
        const d = new DrawableClass({ xtitle: 'Position', traces: [{ name: 't' }] });
        const fig = d.figure;
        expect(fig.layout).toBe(d.layout);
        expect(fig.layout.xaxis).toEqual({ visible: true, title: 'Position' });
        expect(fig.data).toEqual([{ name: 't' }]);
    });

    it('keeps an axis title supplied through the layout', () => {
        const d = new DrawableClass({ layout: { yaxis: { title: 'Depth' } } });
        expect(d.figure.layout.yaxis).toEqual({ visible: true, title: 'Depth' });
    });

    it('builds traces lazily in subclasses', () => {
        class Generated extends DrawableClass {
            builds = 0;
            protected buildFig(): void {
                this.builds++;
                this.addTrace({ name: 'generated' });
            }
        }
        const d = new Generated();
        expect(d.figure.data).toEqual([{ name: 'generated' }]);
        d.figure;
        expect(d.builds).toBe(1);

        const e = new Generated();
        e.removeTraces('generated');
        expect(e.builds).toBe(1);
        expect(e.traces).toEqual([]);
    });

    it('serialises to a detached copy', () => {
        const trace: Trace = { name: 't', x: [1, null, 2] };
        const d = new DrawableClass({ traces: [trace] });
        const json = d.toJSON();
        expect(json.data).toEqual([{ name: 't', x: [1, null, 2] }]);
        json.layout.width = 999;
        expect(d.layout.width).toBeNull();
    });
});
