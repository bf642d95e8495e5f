import { type FigureSpec, type LayoutConfig, type Trace } from '../types/figure.js';
import { DrawableClass } from './drawable.js';
import { isLayoutConfig, mergeLayout, numberPair, section } from '../algorithms/layout-merge.js';
import { coordExtent } from '../algorithms/shape-geometry.js';
import {
    ANNOTATED_HEIGHT,
    ANNOTATED_WIDTH,
    TRACK_SPACING,
    ticksOff,
    ticksOn,
} from '../config/defaults.js';

export type AxisRange = [number, number];

/**
 * Constructor options for AnnotatedDrawableClass.
 */
export interface AnnotatedDrawableOptions {
    /** Features drawn vertically, to the left of the core plot */
    leftTrack?: DrawableClass | null;
    /** Features drawn horizontally, beneath the core plot */
    bottomTrack?: DrawableClass | null;
    xtitle?: string | null;
    ytitle?: string | null;
    /** Applied to the core drawable */
    title?: string | null;
    xrange?: AxisRange | null;
    yrange?: AxisRange | null;
    width?: number;
    height?: number;
    layout?: LayoutConfig;
}

/**
 * The traces of one track, already assigned to their axes, and the axis range they need.
 */
interface CollectedTrack {
    traces: Trace[];
    range: AxisRange;
}

/**
 * A core drawable plus optional left and bottom annotation tracks, laid out
 * as one figure with shared axes.
 *
 * Axis naming follows the renderer's grid: in the 2×2 layout the left track
 * is `x`/`y`, the core is `x2`/`y2` and the bottom track is `x3`/`y3`.
 * Track panels are sized in proportion to how many feature rows they hold.
 */
export class AnnotatedDrawableClass extends DrawableClass {
    public readonly core: DrawableClass;
    public leftTrack: DrawableClass | null;
    public bottomTrack: DrawableClass | null;
    public xrange: AxisRange | null;
    public yrange: AxisRange | null;

    /** Set when the user layout declares an overlaying second y axis. */
    private _overlaying = false;

    /** The y axis each core trace carried before this drawable first assigned one. */
    private readonly _coreYaxis = new WeakMap<Trace, string | null>();

    constructor(core: DrawableClass, options: AnnotatedDrawableOptions = {}) {
        super({
            visibleAxes: true,
            showlegend: true,
            width: options.width ?? ANNOTATED_WIDTH,
            height: options.height ?? ANNOTATED_HEIGHT,
            layout: options.layout,
        });

        this.xtitle = options.xtitle ?? null;
        this.ytitle = options.ytitle ?? null;
        this.xrange = options.xrange ?? null;
        this.yrange = options.yrange ?? null;

        if (options.title) {
            core.title = options.title;
        }
        this.core = core;
        this.leftTrack = options.leftTrack ?? null;
        this.bottomTrack = options.bottomTrack ?? null;
    }

    get overlaying(): boolean {
        return this._overlaying;
    }

    /**
     * Number of traces in the composed figure: the core traces (as built, or
     * the core's own before the first build) plus those of each track.
     */
    get traceCount(): number {
        const core = this._traces.length > 0 ? this._traces.length : this.core.traceCount;
        return core + (this.leftTrack?.traceCount ?? 0) + (this.bottomTrack?.traceCount ?? 0);
    }

    protected buildFig(): void {
        this.buildCore();
    }

    /**
     * Pulls the core figure, merges its layout into ours and assigns its traces to the given axes.
     * Returns the core figure with tick labels switched on.
     */
    private buildCore(xaxis: string = 'x', yaxis: string = 'y'): FigureSpec {
        const f = this.core.figure;

        const yaxis2 = this.layout.yaxis2;
        if (isLayoutConfig(yaxis2) && yaxis2.overlaying !== undefined && yaxis2.overlaying !== 'free') {
            this._overlaying = true;
        }

        // figure size belongs to the composed figure, not the core panel
        const coreLayout: LayoutConfig = { ...f.layout };
        delete coreLayout.width;
        delete coreLayout.height;
        mergeLayout(this.layout, coreLayout);
        for (const trace of f.data) {
            if (!this._coreYaxis.has(trace)) {
                this._coreYaxis.set(trace, trace.yaxis ?? null);
            }
            // traces on a secondary axis follow the overlaid axis
            const secondary = this._coreYaxis.get(trace) !== null;
            trace.xaxis = xaxis;
            trace.yaxis = this._overlaying && secondary ? 'y3' : yaxis;
        }
        this._traces = [...f.data];

        const coreX = section(f.layout, 'xaxis');
        const coreY = section(f.layout, 'yaxis');
        coreX.title = this.xtitle;
        coreY.title = this.ytitle;
        mergeLayout(coreX, ticksOn);
        mergeLayout(coreY, ticksOn);
        return f;
    }

    /**
     * Gathers a track's traces, assigns their axes and hides legend entries for
     * feature types already seen in this figure.
     *
     * @param axis The coordinate the track extends along (x for left, y for bottom).
     */
    private collectTrack(
        track: DrawableClass,
        axis: 'x' | 'y',
        seen: Set<string | null>,
        axes: { xaxis: string; yaxis: string },
    ): CollectedTrack {
        let max = 0;
        const traces: Trace[] = [];
        for (const trace of track.traces) {
            trace.xaxis = axes.xaxis;
            trace.yaxis = axes.yaxis;
            traces.push(trace);

            const extent = coordExtent(trace[axis] ?? []);
            if (extent !== null && extent.max > max) {
                max = extent.max;
            }

            const group = trace.legendgroup ?? null;
            if (seen.has(group)) {
                trace.showlegend = false;
            }
            seen.add(group);
        }
        return { traces, range: [0, Math.floor(max) + 1] };
    }

    private build2x2Fig(left: DrawableClass, bottom: DrawableClass): FigureSpec {
        if (this._traces.length === 0) {
            this.buildCore('x2', 'y2');
        }

        const layout = mergeLayout(
            {
                xaxis: { anchor: 'y', domain: [0.0, 0.099] },
                xaxis2: { anchor: 'y2', domain: [0.109, 1.0] },
                xaxis3: { anchor: 'y3', domain: [0.109, 1.0] },
                yaxis: { anchor: 'x', domain: [0.109, 1.0] },
                yaxis2: { anchor: 'x2', domain: [0.109, 1.0] },
                yaxis3: { anchor: 'x3', domain: [0.0, 0.099] },
            },
            this.layout,
        );
        const data: Trace[] = [...this._traces];

        mergeLayout(section(layout, 'xaxis2'), { range: this.xrange, ...ticksOff });
        mergeLayout(section(layout, 'yaxis2'), { range: this.yrange, ...ticksOff });

        const seen = new Set<string | null>();
        const leftTrack = this.collectTrack(left, 'x', seen, { xaxis: 'x', yaxis: 'y' });
        const bottomTrack = this.collectTrack(bottom, 'y', seen, { xaxis: 'x3', yaxis: 'y3' });
        data.push(...leftTrack.traces, ...bottomTrack.traces);

        mergeLayout(section(layout, 'yaxis'), { title: { text: this.ytitle }, range: this.yrange, ...ticksOn });
        mergeLayout(section(layout, 'xaxis3'), { title: { text: this.xtitle }, range: this.xrange, ...ticksOn });

        // track panels scale with their number of feature rows
        const minRange = Math.min(leftTrack.range[1], bottomTrack.range[1]);

        const xaxis = section(layout, 'xaxis');
        const xDomain = numberPair(xaxis, 'domain', [0.0, 0.099]);
        xDomain[1] = (leftTrack.range[1] / minRange) * xDomain[1];
        mergeLayout(xaxis, { range: leftTrack.range, domain: xDomain, ...ticksOff });
        xaxis.title = {};
        section(layout, 'xaxis2').domain = [xDomain[1] + TRACK_SPACING, 1.0];
        section(layout, 'xaxis3').domain = [xDomain[1] + TRACK_SPACING, 1.0];

        const yaxis3 = section(layout, 'yaxis3');
        const yDomain = numberPair(yaxis3, 'domain', [0.0, 0.099]);
        yDomain[1] = (bottomTrack.range[1] / minRange) * yDomain[1];
        mergeLayout(yaxis3, { range: bottomTrack.range, domain: yDomain, ...ticksOff });
        yaxis3.title = {};
        section(layout, 'yaxis').domain = [yDomain[1] + TRACK_SPACING, 1.0];
        section(layout, 'yaxis2').domain = [yDomain[1] + TRACK_SPACING, 1.0];

        return { data, layout };
    }

    private build2x1Fig(bottom: DrawableClass): FigureSpec {
        if (this._traces.length === 0) {
            this.buildCore();
        }

        if (this._overlaying && !isLayoutConfig(this.layout.yaxis3)) {
            // the overlaid axis moves out of the way of the bottom track
            this.layout.yaxis3 = this.layout.yaxis2;
            this.layout.yaxis2 = {};
            section(this.layout, 'legend').x = 1.3;
        }

        const layout = mergeLayout(
            {
                xaxis: { anchor: 'y2', domain: [0.0, 1.0] },
                yaxis: { anchor: 'free', domain: [0.1135, 1.0], position: 0.0 },
                yaxis2: { anchor: 'x', domain: [0.0, 0.0985] },
            },
            this.layout,
        );
        const data: Trace[] = [...this._traces];

        mergeLayout(section(layout, 'xaxis'), { title: { text: this.xtitle }, range: this.xrange, ...ticksOn });
        mergeLayout(section(layout, 'yaxis'), { title: { text: this.ytitle }, range: this.yrange, ...ticksOn });

        const bottomTrack = this.collectTrack(bottom, 'y', new Set(), { xaxis: 'x', yaxis: 'y2' });
        data.push(...bottomTrack.traces);

        const yaxis2 = section(layout, 'yaxis2');
        mergeLayout(yaxis2, { range: bottomTrack.range, ...ticksOff });
        yaxis2.title = {};

        return { data, layout };
    }

    private build1x2Fig(left: DrawableClass): FigureSpec {
        if (this._traces.length === 0) {
            this.buildCore('x2');
        }

        const layout = mergeLayout(
            {
                xaxis: { anchor: 'y', domain: [0.0, 0.099] },
                xaxis2: { anchor: 'free', domain: [0.109, 1.0], position: 0.0 },
                yaxis: { anchor: 'x', domain: [0.0, 1.0] },
            },
            this.layout,
        );
        const data: Trace[] = [...this._traces];

        mergeLayout(section(layout, 'xaxis2'), { title: { text: this.xtitle }, range: this.xrange, ...ticksOn });
        mergeLayout(section(layout, 'yaxis'), { title: { text: this.ytitle }, range: this.yrange, ...ticksOn });

        const leftTrack = this.collectTrack(left, 'x', new Set(), { xaxis: 'x', yaxis: 'y' });
        data.push(...leftTrack.traces);

        const xaxis = section(layout, 'xaxis');
        mergeLayout(xaxis, { range: leftTrack.range, ...ticksOff });
        xaxis.title = null;

        return { data, layout };
    }

    /**
     * Returns the composed figure. The panel arrangement follows which tracks are present.
     */
    get figure(): FigureSpec {
        if (this.leftTrack && this.bottomTrack) {
            return this.build2x2Fig(this.leftTrack, this.bottomTrack);
        }
        if (this.bottomTrack) {
            return this.build2x1Fig(this.bottomTrack);
        }
        if (this.leftTrack) {
            return this.build1x2Fig(this.leftTrack);
        }
        return this.buildCore();
    }

    /**
     * Drops the selected tracks. The core traces are re-assigned to their axes on the next build.
     */
    removeTrack(which: { left?: boolean; bottom?: boolean }): void {
        if (which.left) {
            this.leftTrack = null;
        }
        if (which.bottom) {
            this.bottomTrack = null;
        }
        if (which.left || which.bottom) {
            this._traces = [];
        }
    }
}
