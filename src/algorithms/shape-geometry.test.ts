import { describe, it, expect } from 'vitest';
import { arrowCoords, coordExtent, diamondCoords, pointCoords, rectangleCoords } from './shape-geometry.js';
import { type Coord } from '../types/shape.js';

function expectCoordsClose(actual: Coord[], expected: Coord[]) {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((value, i) => {
    const want = expected[i];
    if (want === null) {
      expect(value, `index ${String(i)}`).toBeNull();
    } else {
      expect(value, `index ${String(i)}`).toBeCloseTo(want, 10);
    }
  });
}

describe('rectangleCoords', () => {
  it('builds a closed rectangle for one span', () => {
    expect(rectangleCoords([[10, 20]])).toEqual({
      x: [10, 10, 20, 20, 10],
      y: [0, 0.25, 0.25, 0, 0],
    });
  });

  it('ignores span orientation', () => {
    expect(rectangleCoords([[20, 10]])).toEqual(rectangleCoords([[10, 20]]));
  });

  it('joins spans with a connector through the middle', () => {
    expect(rectangleCoords([[0, 10], [20, 30]])).toEqual({
      x: [0, 0, 10, 10, 0, null, 10, 20, null, 20, 20, 30, 30, 20],
      y: [0, 0.25, 0.25, 0, 0, null, 0.125, 0.125, null, 0, 0.25, 0.25, 0, 0],
    });
  });

  it('honours baseline and height', () => {
    expect(rectangleCoords([[0, 2]], 3, 1).y).toEqual([3, 4, 4, 3, 3]);
  });

  it('rejects an empty span list', () => {
    expect(() => rectangleCoords([])).toThrow('No coordinates defined');
  });
});

describe('diamondCoords', () => {
  it('centres the diamond on y', () => {
    expect(diamondCoords([[0, 10]], 1, 0.5)).toEqual({
      x: [0, 5, 10, 5, 0],
      y: [1, 1.25, 1, 0.75, 1],
    });
  });

  it('joins spans along y', () => {
    const coords = diamondCoords([[0, 4], [8, 12]], 1, 0.5);
    expect(coords.x).toEqual([0, 2, 4, 2, 0, null, 4, 8, null, 8, 10, 12, 10, 8]);
    expect(coords.y).toEqual([1, 1.25, 1, 0.75, 1, null, 1, 1, null, 1, 1.25, 1, 0.75, 1]);
  });

  it('rejects an empty span list', () => {
    expect(() => diamondCoords([])).toThrow('No coordinates defined');
  });
});

describe('arrowCoords', () => {
  it('builds an arrow head with default proportions', () => {
    const coords = arrowCoords([[0, 10]]);
    expectCoordsClose(coords.x, [0, 8, 8, 10, 8, 8, 0, 0]);
    expectCoordsClose(coords.y, [0, 0, -0.05, 0.125, 0.3, 0.25, 0.25, 0]);
  });

  it('scales the head with arrowHeadWidth', () => {
    expect(arrowCoords([[0, 8]], 0, 1, 0.25)).toEqual({
      x: [0, 4, 4, 8, 4, 4, 0, 0],
      y: [0, 0, -0.5, 0.5, 1.5, 1, 1, 0],
    });
  });

  it('mirrors the head when reversed', () => {
    expect(arrowCoords([[0, 8]], 0, 1, 0.25, true)).toEqual({
      x: [8, 8, 4, 4, 0, 4, 4, 8],
      y: [0, 1, 1, 1.5, 0.5, -0.5, 0, 0],
    });
  });

  it('mirrors within the span, not around the origin', () => {
    expect(arrowCoords([[10, 18]], 0, 1, 0.25, true).x).toEqual([18, 18, 14, 14, 10, 14, 14, 18]);
  });

  it('draws leading spans as rectangles and puts the head on the last span', () => {
    expect(arrowCoords([[0, 4], [6, 14]], 0, 1, 0.25)).toEqual({
      x: [0, 0, 4, 4, 0, null, 4, 6, null, 6, 10, 10, 14, 10, 10, 6, 6],
      y: [0, 1, 1, 0, 0, null, 0.5, 0.5, null, 0, 0, -0.5, 0.5, 1.5, 1, 1, 0],
    });
  });

  it('rejects an empty span list', () => {
    expect(() => arrowCoords([])).toThrow('No coordinates defined');
  });
});

describe('pointCoords / coordExtent', () => {
  it('builds a single vertex', () => {
    expect(pointCoords(5, 1)).toEqual({ x: [5], y: [1] });
  });

  it('skips path breaks', () => {
    expect(coordExtent([3, null, -2, 7, null])).toEqual({ min: -2, max: 7 });
  });

  it('returns null without numeric values', () => {
    expect(coordExtent([])).toBeNull();
    expect(coordExtent([null, null])).toBeNull();
  });

  it('handles very long coordinate lists', () => {
    const values = Array.from({ length: 300_000 }, (_, i) => (i % 1000 === 0 ? null : i / 1000));
    expect(coordExtent(values)).toEqual({ min: 0.001, max: 299.999 });
  });
});
