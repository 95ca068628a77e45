import { describe, it, expect } from 'vitest';
import { linspace, polyfit } from '../polyfit.js';

describe('polyfit', () => {
  it('recovers a straight line', () => {
    const fit = polyfit([1, 2, 3, 4], [3, 5, 7, 9], 1);

    expect(fit).toBeDefined();
    expect(fit?.evaluate(10)).toBeCloseTo(21, 9);
  });

  it('recovers a parabola', () => {
    const fit = polyfit([0, 1, 2, 3, 4], [0, 1, 4, 9, 16], 2);

    expect(fit?.degree).toBe(2);
    expect(fit?.evaluate(5)).toBeCloseTo(25, 9);
  });

  it('stays accurate on GHz-range abscissae', () => {
    const outputs = [2.05e9, 2.03e9, 2.01e9, 1.99e9];
    const lengths = outputs.map((f) => 100 + (2.05e9 - f) / 2e6);
    const fit = polyfit(outputs, lengths, 1);

    expect(fit?.evaluate(2.0e9)).toBeCloseTo(125, 6);
  });

  it('returns undefined when every abscissa is the same', () => {
    expect(polyfit([3, 3, 3, 3], [1, 2, 3, 4], 1)).toBeUndefined();
  });

  it('returns undefined with no more points than the degree', () => {
    expect(polyfit([1], [1], 1)).toBeUndefined();
    expect(polyfit([1, 2], [1, 2], 2)).toBeUndefined();
  });

  it('throws on inputs of different lengths', () => {
    expect(() => polyfit([1, 2], [1], 1)).toThrow(
      'polyfit needs equal length inputs, got 2 and 1'
    );
  });
});

describe('linspace', () => {
  it('includes both ends', () => {
    expect(linspace(0, 1, 5)).toEqual([0, 0.25, 0.5, 0.75, 1]);
  });

  it('returns the start for a single sample', () => {
    expect(linspace(3, 9, 1)).toEqual([3]);
  });
});
