import { type Coord, type ShapeCoords, type Span } from '../types/shape.js';
import * as errors from '../errors.js';
import { ARROW_HEAD_WIDTH, FEATURE_HEIGHT } from '../config/defaults.js';

/**
 * Returns the left edge and width of a span, whichever order its ends are in.
 */
function extent(span: Span): { start: number; width: number } {
    return {
        start: Math.min(span[0], span[1]),
        width: Math.abs(span[0] - span[1]),
    };
}

function requireSpans(spans: readonly Span[]): void {
    if (spans.length === 0) {
        throw new Error(errors.noCoordinates().content[0].text);
    }
}

/**
 * Appends a path break, a line from the end of `prev` to the start of `next`, and another break.
 */
function pushConnector(out: ShapeCoords, prev: Span, next: Span, y: number): void {
    out.x.push(null, prev[1], next[0], null);
    out.y.push(null, y, y, null);
}

function pushRectangle(out: ShapeCoords, span: Span, y: number, height: number): void {
    const { start, width } = extent(span);
    out.x.push(start, start, start + width, start + width, start);
    out.y.push(y, y + height, y + height, y, y);
}

/**
 * Builds rectangle outlines for each span, joined by a line through their vertical middle.
 *
 * @param spans Feature spans, in order.
 * @param y Bottom edge of the rectangles.
 * @param height Rectangle height.
 */
export function rectangleCoords(spans: readonly Span[], y: number = 0, height: number = FEATURE_HEIGHT): ShapeCoords {
    requireSpans(spans);
    const out: ShapeCoords = { x: [], y: [] };
    pushRectangle(out, spans[0], y, height);
    for (let i = 1; i < spans.length; i++) {
        pushConnector(out, spans[i - 1], spans[i], y + height / 2);
        pushRectangle(out, spans[i], y, height);
    }
    return out;
}

/**
 * Builds diamond outlines for each span, centred on `y`, joined by a line along `y`.
 *
 * @param spans Feature spans, in order.
 * @param y Vertical centre of the diamonds.
 * @param height Full diamond height.
 */
export function diamondCoords(spans: readonly Span[], y: number = 0, height: number = FEATURE_HEIGHT): ShapeCoords {
    requireSpans(spans);
    const out: ShapeCoords = { x: [], y: [] };
    const hh = height / 2;

    const pushDiamond = (span: Span) => {
        const { start, width } = extent(span);
        out.x.push(start, start + width / 2, start + width, start + width / 2, start);
        out.y.push(y, y + hh, y, y - hh, y);
    };

    pushDiamond(spans[0]);
    for (let i = 1; i < spans.length; i++) {
        pushConnector(out, spans[i - 1], spans[i], y);
        pushDiamond(spans[i]);
    }
    return out;
}

/**
 * Builds a directional feature: a rectangle per span with an arrow head on the last span.
 *
 * The head overhangs the body by `height * arrowHeadWidth * 2` on each side
 * and takes `width * arrowHeadWidth * 2` of the last span's length. When
 * `reverse` is set the last span is mirrored within its own extent so the
 * head points towards lower coordinates; the other spans are unchanged.
 *
 * @param spans Feature spans, in order.
 * @param y Bottom edge of the body.
 * @param height Body height.
 * @param arrowHeadWidth Head size as a fraction of the body.
 * @param reverse Point the head towards the start of the sequence.
 */
export function arrowCoords(
    spans: readonly Span[],
    y: number = 0,
    height: number = FEATURE_HEIGHT,
    arrowHeadWidth: number = ARROW_HEAD_WIDTH,
    reverse: boolean = false,
): ShapeCoords {
    requireSpans(spans);
    const out: ShapeCoords = { x: [], y: [] };

    for (let i = 0; i < spans.length - 1; i++) {
        pushRectangle(out, spans[i], y, height);
        pushConnector(out, spans[i], spans[i + 1], y + height / 2);
    }

    const { start, width } = extent(spans[spans.length - 1]);
    const hh = height * arrowHeadWidth * 2;
    const hw = width * arrowHeadWidth * 2;
    const end = start + width;

    const headX = [start, end - hw, end - hw, end, end - hw, end - hw, start, start];
    const headY = [y, y, y - hh, y + height / 2, y + height + hh, y + height, y + height, y];

    if (!reverse) {
        out.x.push(...headX);
        out.y.push(...headY);
        return out;
    }

    const maxX = Math.max(...headX);
    const minX = Math.min(...headX);
    out.x.push(...headX.map((v) => maxX - v + minX).reverse());
    out.y.push(...[...headY].reverse());
    return out;
}

/**
 * Builds a single-vertex shape.
 */
export function pointCoords(x: number, y: number): ShapeCoords {
    return { x: [x], y: [y] };
}

/**
 * Returns the smallest and largest numeric values of a coordinate list,
 * skipping path breaks, or null when it holds none.
 */
export function coordExtent(values: readonly Coord[]): { min: number; max: number } | null {
    let min = Infinity;
    let max = -Infinity;
    for (const v of values) {
        if (v === null) continue;
        if (v < min) min = v;
        if (v > max) max = v;
    }
    return min <= max ? { min, max } : null;
}
