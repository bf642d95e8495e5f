import { type Coord, type PointSymbol, type Span } from '../types/shape.js';
import { type Trace } from '../types/figure.js';
import {
    arrowCoords,
    coordExtent,
    diamondCoords,
    pointCoords,
    rectangleCoords,
} from '../algorithms/shape-geometry.js';
import * as errors from '../errors.js';
import { ARROW_HEAD_WIDTH, FEATURE_HEIGHT, POINT_SIZE } from '../config/defaults.js';

/**
 * Styling shared by every shape.
 */
export interface ShapeStyle {
    /** Trace name shown in the legend */
    name?: string | null;
    /** Hover text */
    text?: string | null;
    /** Fill the outline (true) or draw it as a line only */
    filled?: boolean;
    fillcolor?: string | null;
    legendgroup?: string | null;
    showlegend?: boolean;
}

/**
 * Geometry options for span-based shapes.
 */
export interface SpanShapeOptions extends ShapeStyle {
    /** Baseline of the shape on the track axis */
    y?: number;
    height?: number;
}

export interface ArrowShapeOptions extends SpanShapeOptions {
    /** Head size as a fraction of the body */
    arrowHeadWidth?: number;
    reverse?: boolean;
}

export interface PointShapeOptions extends ShapeStyle {
    size?: number;
    symbol?: PointSymbol;
}

/**
 * Base class for feature shapes. Holds parallel vertex lists plus legend styling,
 * and converts itself into a scatter trace.
 */
export abstract class ShapeClass {
    public x: Coord[] = [];
    public y: Coord[] = [];

    public name: string | null;
    public text: string | null;
    public filled: boolean;
    public fillcolor: string | null;
    public legendgroup: string | null;
    public showlegend: boolean;

    protected readonly mode: 'lines' | 'markers' = 'lines';

    protected constructor(style: ShapeStyle = {}) {
        this.name = style.name ?? null;
        this.text = style.text ?? null;
        this.filled = style.filled ?? true;
        this.fillcolor = style.fillcolor ?? null;
        this.legendgroup = style.legendgroup ?? null;
        this.showlegend = style.showlegend ?? true;
    }

    // ------------------------------------------------------------------------
    // Geometry
    // ------------------------------------------------------------------------

    /**
     * Translates every vertex. Path breaks are left as they are.
     */
    shift(dx: number = 0, dy: number = 0): this {
        this.x = this.x.map((v) => (v === null ? null : v + dx));
        this.y = this.y.map((v) => (v === null ? null : v + dy));
        return this;
    }

    /**
     * Swaps the axes, turning a horizontal track shape into a vertical one.
     */
    transpose(): this {
        const x = this.x;
        this.x = this.y;
        this.y = x;
        return this;
    }

    get top(): number {
        return this.yExtent().max;
    }

    get bottom(): number {
        return this.yExtent().min;
    }

    get height(): number {
        return this.top - this.bottom;
    }

    get middle(): number {
        return this.height / 2 + this.bottom;
    }

    private yExtent(): { min: number; max: number } {
        const extent = coordExtent(this.y);
        if (extent === null) {
            throw new Error(errors.noNumericCoordinates('y').content[0].text);
        }
        return extent;
    }

    // ------------------------------------------------------------------------
    // Rendering
    // ------------------------------------------------------------------------

    /**
     * Returns the shape as a scatter trace. Vertex lists are copied.
     * @param name Overrides the shape's legend name.
     */
    asTrace(name?: string): Trace {
        return {
            type: 'scatter',
            x: [...this.x],
            y: [...this.y],
            mode: this.mode,
            fill: this.filled ? 'toself' : 'none',
            fillcolor: this.fillcolor,
            line: { color: this.fillcolor },
            text: this.text,
            name: name ?? this.name,
            legendgroup: this.legendgroup,
            showlegend: this.showlegend,
            hoverinfo: 'text',
        };
    }
}

/**
 * Non-directional feature: one rectangle per span.
 */
export class RectangleShape extends ShapeClass {
    constructor(spans: readonly Span[], options: SpanShapeOptions = {}) {
        super(options);
        const coords = rectangleCoords(spans, options.y ?? 0, options.height ?? FEATURE_HEIGHT);
        this.x = coords.x;
        this.y = coords.y;
    }
}

/**
 * Variation feature: one diamond per span.
 */
export class DiamondShape extends ShapeClass {
    constructor(spans: readonly Span[], options: SpanShapeOptions = {}) {
        super(options);
        const coords = diamondCoords(spans, options.y ?? 0, options.height ?? FEATURE_HEIGHT);
        this.x = coords.x;
        this.y = coords.y;
    }
}

/**
 * Directional feature: rectangles with an arrow head on the last span.
 */
export class ArrowShape extends ShapeClass {
    public readonly reverse: boolean;

    constructor(spans: readonly Span[], options: ArrowShapeOptions = {}) {
        super(options);
        this.reverse = options.reverse ?? false;
        const coords = arrowCoords(
            spans,
            options.y ?? 0,
            options.height ?? FEATURE_HEIGHT,
            options.arrowHeadWidth ?? ARROW_HEAD_WIDTH,
            this.reverse,
        );
        this.x = coords.x;
        this.y = coords.y;
    }
}

/**
 * Single-position feature drawn as a marker.
 */
export class PointShape extends ShapeClass {
    protected readonly mode = 'markers' as const;

    public readonly size: number;
    public readonly symbol: PointSymbol;

    constructor(x: number, y: number, options: PointShapeOptions = {}) {
        super(options);
        const coords = pointCoords(x, y);
        this.x = coords.x;
        this.y = coords.y;
        this.size = options.size ?? POINT_SIZE;
        this.symbol = options.symbol ?? 'square';
    }

    asTrace(name?: string): Trace {
        return {
            ...super.asTrace(name),
            marker: { size: this.size, symbol: this.symbol, color: this.fillcolor },
        };
    }
}
