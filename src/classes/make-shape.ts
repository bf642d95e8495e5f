import { type FeatureAnnotation, type Span } from '../types/shape.js';
import { ArrowShape, DiamondShape, PointShape, RectangleShape, type ShapeClass } from './shape.js';
import { POINT_SIZE, featureColors, featureShapes, type ShapeKind } from '../config/defaults.js';
import * as errors from '../errors.js';

/**
 * A feature given directly by type, label and spans.
 */
export interface RawFeature {
    type: string;
    name?: string | null;
    coords?: Span[];
}

/**
 * Geometry and styling forwarded to the shape constructor.
 */
export interface MakeShapeOptions {
    y?: number;
    height?: number;
    arrowHeadWidth?: number;
    showlegend?: boolean;
    filled?: boolean;
}

function isAnnotation(feature: RawFeature | FeatureAnnotation): feature is FeatureAnnotation {
    return 'spans' in feature;
}

/**
 * Looks up the shape kind for a feature type. Unknown types are rectangles.
 */
export function shapeKindFor(type: string): ShapeKind {
    return featureShapes[type.toLowerCase()] ?? 'rectangle';
}

/**
 * Looks up the fill colour for a feature type, or null when it has none.
 */
export function colorFor(type: string): string | null {
    return featureColors[type.toLowerCase()] ?? null;
}

/**
 * Builds the annotation shape for a feature.
 *
 * Feature types choose the shape (genes and their parts are arrows, SNPs are
 * points, variations are diamonds, everything else is a rectangle) and the
 * fill colour. The shape is named and grouped by feature type so features of
 * one type share a legend entry; the feature label becomes the hover text.
 *
 * For raw features the strand is inferred: the feature is reversed when its
 * first span starts after its last span ends.
 *
 * @returns The shape, or null for an annotation that maps to nothing.
 */
export function makeShape(feature: RawFeature | FeatureAnnotation, options: MakeShapeOptions = {}): ShapeClass | null {
    let spans: Span[];
    let reverse: boolean;
    let label: string | null;

    if (isAnnotation(feature)) {
        if (feature.useful === false) {
            return null;
        }
        spans = feature.spans;
        reverse = feature.reverse;
        label = feature.name;
    } else {
        spans = feature.coords ?? [];
        label = feature.name ?? null;
        reverse = spans.length > 0 && spans[0][0] > spans[spans.length - 1][1];
    }

    if (spans.length === 0) {
        throw new Error(errors.noCoordinates().content[0].text);
    }

    const type = feature.type;
    const style = {
        name: type,
        text: label,
        legendgroup: type,
        fillcolor: colorFor(type),
        showlegend: options.showlegend,
        filled: options.filled,
    };

    switch (shapeKindFor(type)) {
        case 'arrow':
            return new ArrowShape(spans, {
                ...style,
                y: options.y,
                height: options.height,
                arrowHeadWidth: options.arrowHeadWidth,
                reverse,
            });
        case 'diamond':
            return new DiamondShape(spans, { ...style, y: options.y, height: options.height });
        case 'point':
            return new PointShape(Math.min(spans[0][0], spans[spans.length - 1][1]), 1, {
                ...style,
                size: POINT_SIZE,
                symbol: 'square',
            });
        case 'rectangle':
            return new RectangleShape(spans, { ...style, y: options.y, height: options.height });
    }
}
