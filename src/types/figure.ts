/**
 * Core types for figure specifications.
 *
 * The shapes here mirror the subset of the plotly.js figure schema this
 * package produces. They are not a complete description of that schema:
 * layouts are open-ended nested objects that are merged, not interpreted.
 */

import { type Coord } from './shape.js';

/**
 * A value that may appear anywhere in a layout tree.
 */
export type LayoutValue = string | number | boolean | null | LayoutValue[] | LayoutConfig;

/**
 * A nested layout configuration (the plotly `layout` object or any section of it).
 */
export interface LayoutConfig {
  [key: string]: LayoutValue | undefined;
}

/**
 * Marker styling for point traces.
 */
export interface TraceMarker {
  size?: number;
  symbol?: string;
  color?: string | null;
}

/**
 * One renderable data series. Trace list order is display order.
 */
export interface Trace {
  type?: 'scatter';
  x?: Coord[];
  y?: Coord[];
  mode?: 'lines' | 'markers' | 'lines+markers';
  fill?: 'toself' | 'none';
  fillcolor?: string | null;
  line?: { color?: string | null };
  marker?: TraceMarker;
  text?: string | null;
  name?: string | null;
  legendgroup?: string | null;
  showlegend?: boolean;
  hoverinfo?: string;
  /** Axis the trace is drawn against (e.g., "x", "x2") */
  xaxis?: string;
  /** Axis the trace is drawn against (e.g., "y", "y3") */
  yaxis?: string;
}

/**
 * The structure handed to the renderer.
 */
export interface FigureSpec {
  data: Trace[];
  layout: LayoutConfig;
}
