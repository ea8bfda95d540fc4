import { describe, it, expect } from 'vitest';
import { generateGrid, gridSpacing } from '../src/strategy/grid-planner.js';

describe('generateGrid', () => {
  it('produces count ascending levels from lower to upper', () => {
    const levels = generateGrid(1, 2, 5);
    expect(levels.map((l) => l.index)).toEqual([0, 1, 2, 3, 4]);
    expect(levels.map((l) => l.price)).toEqual([1, 1.25, 1.5, 1.75, 2]);
  });

  it('pins the first level to lower and the last to upper', () => {
    const levels = generateGrid(0.00061, 0.003, 7);
    expect(levels[0]?.price).toBe(0.00061);
    expect(levels[levels.length - 1]?.price).toBe(0.003);
    for (let i = 1; i < levels.length; i++) {
      expect(levels[i]!.price).toBeGreaterThan(levels[i - 1]!.price);
    }
  });

  it('spaces three levels evenly between the bounds', () => {
    const levels = generateGrid(0.00061, 0.003, 3);
    expect(levels).toHaveLength(3);
    expect(levels[0]?.price).toBe(0.00061);
    expect(levels[1]?.price).toBeCloseTo(0.001805, 12);
    expect(levels[2]?.price).toBe(0.003);
  });

  it('returns [] for count below 2', () => {
    expect(generateGrid(1, 2, 1)).toEqual([]);
    expect(generateGrid(1, 2, 0)).toEqual([]);
    expect(generateGrid(1, 2, -3)).toEqual([]);
  });

  it('returns [] for inverted, equal or non-positive bounds', () => {
    expect(generateGrid(2, 1, 3)).toEqual([]);
    expect(generateGrid(1, 1, 3)).toEqual([]);
    expect(generateGrid(0, 1, 3)).toEqual([]);
    expect(generateGrid(-1, 1, 3)).toEqual([]);
  });

  it('returns [] for non-finite input or a fractional count', () => {
    expect(generateGrid(Number.NaN, 1, 3)).toEqual([]);
    expect(generateGrid(1, Number.POSITIVE_INFINITY, 3)).toEqual([]);
    expect(generateGrid(1, 2, 2.5)).toEqual([]);
  });
});

describe('gridSpacing', () => {
  it('divides the range by count', () => {
    expect(gridSpacing(1, 2, 4)).toBe(0.25);
    expect(gridSpacing(0.001, 0.003, 10)).toBeCloseTo(0.0002, 15);
  });

  it('is 0 for an unusable range', () => {
    expect(gridSpacing(2, 1, 4)).toBe(0);
    expect(gridSpacing(1, 2, 0)).toBe(0);
  });
});
