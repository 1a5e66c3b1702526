import { describe, it, expect } from 'vitest';
import { computeDataRanges } from '../dataRanges';
import { validatePlotUniforms } from '../../core/uniformLayout';

describe('computeDataRanges', () => {
  it('defaults to the unit square without points', () => {
    expect(computeDataRanges([])).toEqual({ xRange: [0, 1], yRange: [0, 1] });
    expect(computeDataRanges([[], []])).toEqual({ xRange: [0, 1], yRange: [0, 1] });
  });

  it('folds min and max across every series', () => {
    expect(
      computeDataRanges([
        [
          [0, 1],
          [2, 3],
        ],
        [[-1, 5]],
      ])
    ).toEqual({ xRange: [-1, 2], yRange: [1, 5] });
  });

  it('widens a constant axis by half a unit each way', () => {
    expect(
      computeDataRanges([
        [
          [0, 3],
          [1, 3],
        ],
      ])
    ).toEqual({ xRange: [0, 1], yRange: [2.5, 3.5] });
  });

  it('widens both axes around a single point', () => {
    expect(computeDataRanges([[[2, 3]]])).toEqual({ xRange: [1.5, 2.5], yRange: [2.5, 3.5] });
  });

  it('widens a constant axis at large magnitude until f32 separates the bounds', () => {
    const { xRange } = computeDataRanges([
      [
        [1e8, 0],
        [1e8, 1],
      ],
    ]);
    const half = 1e8 * 2 ** -23;
    expect(xRange).toEqual([1e8 - half, 1e8 + half]);
    expect(Math.fround(xRange[1])).toBeGreaterThan(Math.fround(xRange[0]));
  });

  it('widens distinct values that round to a single f32', () => {
    const { xRange } = computeDataRanges([
      [
        [1e8, 0],
        [1e8 + 1, 1],
      ],
    ]);
    expect(Math.fround(xRange[1])).toBeGreaterThan(Math.fround(xRange[0]));
    expect(
      validatePlotUniforms({
        viewportSize: [400, 300],
        xRange,
        yRange: [0, 1],
        padding: [0, 0],
        markerRadius: 4,
        lineWidth: 2,
      })
    ).toEqual([]);
  });

  it('ignores points with a non-finite coordinate', () => {
    expect(
      computeDataRanges([
        [
          [Number.NaN, 100],
          [0, 0],
          [1, Number.POSITIVE_INFINITY],
          [1, 1],
        ],
      ])
    ).toEqual({ xRange: [0, 1], yRange: [0, 1] });
  });
});
