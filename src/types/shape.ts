/**
 * Core types for feature shape geometry.
 *
 * Coordinates are in sequence space along x and track space along y.
 * A `null` coordinate breaks the path so the renderer does not join
 * the vertices on either side of it.
 */

/**
 * A single vertex coordinate, or a path break.
 */
export type Coord = number | null;

/**
 * A feature span as `[start, end]`. The two values may be given in either
 * order; geometry only uses the span's extent.
 */
export type Span = [number, number];

/**
 * Parallel vertex lists for one shape.
 */
export interface ShapeCoords {
  x: Coord[];
  y: Coord[];
}

/**
 * Marker symbols accepted for point features.
 */
export type PointSymbol = 'square' | 'circle' | 'diamond' | 'triangle-up' | 'triangle-down' | 'cross' | 'x';

/**
 * A feature annotation on a sequence, already resolved to sequence coordinates.
 */
export interface FeatureAnnotation {
  /** Feature type (e.g., "gene", "exon", "snp") */
  type: string;
  /** Feature label (e.g., "BRCA2") */
  name: string;
  /** Spans covered by the feature, in the order they occur on the strand */
  spans: Span[];
  /** True when the feature lies on the reverse strand */
  reverse: boolean;
  /** False when the annotation maps to nothing in the current sequence */
  useful?: boolean;
}
