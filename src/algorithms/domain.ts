import * as errors from '../errors.js';
import { GRID_SPACING } from '../config/defaults.js';

/**
 * Returns the evenly spaced domain for one element of a grid plot.
 *
 * The unit interval is split into `total` equal cells and each cell is
 * shrunk by a gap on both sides. The gap is half of `space`, capped at a
 * tenth of the cell so dense grids keep most of their width.
 *
 * @param total The number of elements along the axis.
 * @param element Zero-based index of the element.
 * @param isY When true the index counts from the top, so element 0 is the
 *   highest row (cartesian, not array, order).
 * @param space The separation between neighbouring elements.
 * @returns The `[start, end]` domain in figure-normalised coordinates.
 */
export function getDomain(total: number, element: number, isY: boolean, space: number = GRID_SPACING): [number, number] {
    if (!Number.isInteger(total) || total < 1) {
        throw new Error(errors.invalidGridSize(total).content[0].text);
    }
    if (total === 1) {
        return [0, 1];
    }
    if (!Number.isInteger(element) || element < 0) {
        throw new Error(errors.invalidArgument(`element must be a non-negative integer, got ${String(element)}.`).content[0].text);
    }
    if (element > total - 1) {
        throw new Error(errors.domainIndexTooBig(element, total).content[0].text);
    }

    const perElement = 1 / total;
    const gap = Math.min(space / 2, perElement / 10);
    const index = isY ? total - element - 1 : element;

    return [perElement * index + gap, perElement * (index + 1) - gap];
}
