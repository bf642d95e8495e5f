import { type FigureSpec, type LayoutConfig, type LayoutValue, type Trace } from '../types/figure.js';
import { isLayoutConfig, mergeLayout, section } from '../algorithms/layout-merge.js';
import { defaultLayout } from '../config/defaults.js';

/**
 * Constructor options for DrawableClass.
 */
export interface DrawableOptions {
    title?: string | null;
    traces?: Trace[];
    width?: number | null;
    height?: number | null;
    showlegend?: boolean;
    visibleAxes?: boolean;
    /** Layout merged over the defaults */
    layout?: LayoutConfig;
    xtitle?: string | null;
    ytitle?: string | null;
}

function titleValue(title: string | null | undefined): LayoutConfig | null | undefined {
    if (title === undefined) return undefined;
    return title === null ? null : { text: title };
}

function titleText(title: LayoutValue | undefined): string | null {
    if (typeof title === 'string') return title;
    if (isLayoutConfig(title) && typeof title.text === 'string') return title.text;
    return null;
}

/**
 * Mutable figure container: an ordered list of traces plus a layout.
 *
 * Subclasses that generate their traces lazily override `buildFig()`, which
 * is called whenever the figure is requested while the trace list is empty.
 */
export class DrawableClass {
    protected _traces: Trace[];

    /** The layout handed to the renderer. Mutate freely. */
    public layout: LayoutConfig;

    /** X axis title. Takes precedence over `layout.xaxis.title` when set. */
    public xtitle: string | null;

    /** Y axis title. Takes precedence over `layout.yaxis.title` when set. */
    public ytitle: string | null;

    constructor(options: DrawableOptions = {}) {
        const visibleAxes = options.visibleAxes ?? true;
        this._traces = options.traces ?? [];

        this.layout = mergeLayout(
            {
                ...mergeLayout({}, defaultLayout),
                xaxis: { visible: visibleAxes },
                yaxis: { visible: visibleAxes },
                title: titleValue(options.title) ?? null,
                width: options.width ?? null,
                height: options.height ?? null,
                showlegend: options.showlegend ?? true,
            },
            options.layout ?? {},
        );

        // explicit constructor values win over the supplied layout
        mergeLayout(this.layout, {
            title: titleValue(options.title),
            width: options.width,
            height: options.height,
            showlegend: options.showlegend,
            xaxis: { visible: options.visibleAxes },
            yaxis: { visible: options.visibleAxes },
        });

        this.xtitle = options.xtitle ?? null;
        this.ytitle = options.ytitle ?? null;
    }

    // ------------------------------------------------------------------------
    // Traces
    // ------------------------------------------------------------------------

    get traces(): Trace[] {
        return this._traces;
    }

    /** Number of traces the figure holds. */
    get traceCount(): number {
        return this._traces.length;
    }

    addTrace(trace: Trace): void {
        this._traces.push(trace);
    }

    getTraceTitles(): Array<string | null | undefined> {
        return this._traces.map((tr) => tr.name);
    }

    /**
     * Removes the first trace whose name matches `title`.
     * @returns The removed trace, or undefined when no trace has that name.
     */
    popTrace(title: string): Trace | undefined {
        const index = this.getTraceTitles().indexOf(title);
        if (index === -1) {
            return undefined;
        }
        return this._traces.splice(index, 1)[0];
    }

    /**
     * Removes traces by name. Names with no matching trace are ignored.
     * @returns The number of traces removed.
     */
    removeTraces(names: string | readonly string[]): number {
        if (this._traces.length === 0) {
            this.buildFig();
        }
        const list = typeof names === 'string' ? [names] : names;
        let removed = 0;
        for (const name of list) {
            if (this.popTrace(name) !== undefined) {
                removed++;
            }
        }
        return removed;
    }

    /**
     * Populates the trace list. The base class holds only explicitly added traces.
     */
    protected buildFig(): void {
        // nothing to generate
    }

    // ------------------------------------------------------------------------
    // Layout accessors
    // ------------------------------------------------------------------------

    get title(): string | null {
        return titleText(this.layout.title);
    }

    set title(title: string | null) {
        this.layout.title = titleValue(title) ?? null;
    }

    /** Figure width, also settable via `layout.width`. */
    get figWidth(): number | null {
        return typeof this.layout.width === 'number' ? this.layout.width : null;
    }

    set figWidth(width: number | null) {
        this.layout.width = width;
    }

    /** Figure height, also settable via `layout.height`. */
    get figHeight(): number | null {
        return typeof this.layout.height === 'number' ? this.layout.height : null;
    }

    set figHeight(height: number | null) {
        this.layout.height = height;
    }

    // ------------------------------------------------------------------------
    // Output
    // ------------------------------------------------------------------------

    /**
     * Returns the figure for the renderer.
     *
     * The returned layout is this drawable's own layout object, with the axis
     * titles resolved into it; the trace objects are shared with the drawable.
     * A figure with no traces carries a single empty trace.
     */
    get figure(): FigureSpec {
        if (this._traces.length === 0) {
            this.buildFig();
        }

        const data: Trace[] = this._traces.length > 0 ? [...this._traces] : [{}];
        const xaxis = section(this.layout, 'xaxis');
        const yaxis = section(this.layout, 'yaxis');
        xaxis.title = this.xtitle ?? xaxis.title ?? null;
        yaxis.title = this.ytitle ?? yaxis.title ?? null;

        return { data, layout: this.layout };
    }

    /**
     * Returns a JSON-safe deep copy of the figure.
     */
    toJSON(): FigureSpec {
        return JSON.parse(JSON.stringify(this.figure)) as FigureSpec;
    }
}
