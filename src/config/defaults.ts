import { type LayoutConfig } from '../types/figure.js';

/**
 * Shape kinds a feature type can be drawn as.
 */
export type ShapeKind = 'arrow' | 'rectangle' | 'diamond' | 'point';

/**
 * Layout defaults shared by every drawable. Per-figure values (title, size,
 * legend, axis visibility) are filled in by the Drawable constructor.
 */
export const defaultLayout: LayoutConfig = {
  font: { family: 'Balto', size: 14 },
  autosize: false,
  hovermode: 'closest',
  template: null,
  plot_bgcolor: null,
  margin: { l: 50, r: 50, t: 50, b: 50, pad: 4 },
};

/** Axis styling for panels that hide tick labels (annotation tracks, inner panels). */
export const ticksOff: LayoutConfig = {
  showticklabels: false,
  mirror: true,
  showgrid: false,
  showline: true,
  ticks: '',
};

/** Axis styling for panels that carry the figure's tick labels. */
export const ticksOn: LayoutConfig = {
  showticklabels: true,
  mirror: true,
  showgrid: false,
  showline: true,
};

/** Gap between a track panel and the panel it annotates, in domain units. */
export const TRACK_SPACING = 0.01;

/** Default gap between grid cells passed to getDomain. */
export const GRID_SPACING = 0.01;

/** Default size for annotated figures, in pixels. */
export const ANNOTATED_WIDTH = 500;
export const ANNOTATED_HEIGHT = 500;

/** Default shape geometry for feature tracks. */
export const FEATURE_HEIGHT = 0.25;
export const ARROW_HEAD_WIDTH = 0.1;
export const POINT_SIZE = 14;

/**
 * Fill colours keyed by lower-cased feature type. Types without an entry get no fill colour.
 */
export const featureColors: Readonly<Record<string, string>> = {
  cds: 'rgba(0,0,150,0.5)',
  exon: 'rgba(0,0,100,0.5)',
  gene: 'rgba(0,0,150,0.5)',
  transcript: 'rgba(0,0,200,0.5)',
  snp: 'rgba(200,0,0,0.5)',
  snv: 'rgba(200,0,0,0.5)',
};

/**
 * Shape kinds keyed by lower-cased feature type. Types without an entry are drawn as rectangles.
 */
export const featureShapes: Readonly<Record<string, ShapeKind>> = {
  cds: 'arrow',
  exon: 'arrow',
  transcript: 'arrow',
  gene: 'arrow',
  repeat: 'rectangle',
  snp: 'point',
  snv: 'point',
  variation: 'diamond',
};
