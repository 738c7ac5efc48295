import { describe, expect, it } from 'vitest';
import { MotionExtractor } from '../src/detection/motionExtractor.js';
import type { ForegroundMask } from '../src/types.js';

function maskFrom(rows: string[]): ForegroundMask {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const data = new Uint8Array(width * height);
  rows.forEach((row, y) => {
    for (let x = 0; x < width; x += 1) {
      data[y * width + x] = row[x] === '#' ? 1 : 0;
    }
  });
  return { width, height, data };
}

describe('MotionExtractor', () => {
  const extractor = new MotionExtractor();

  it('MotionExtractorConnectivity joins diagonal neighbours', () => {
    const mask = maskFrom(['....', '.#..', '..#.', '....']);

    expect(extractor.extract(mask, 1)).toEqual([{ x: 1, y: 1, width: 2, height: 2, area: 2 }]);
  });

  it('MotionExtractorMinArea drops regions below the minimum', () => {
    const mask = maskFrom([
      '###.....',
      '###.....',
      '###.....',
      '........',
      '........',
      '........',
      '......##',
      '......##'
    ]);

    expect(extractor.extract(mask, 5)).toEqual([{ x: 0, y: 0, width: 3, height: 3, area: 9 }]);
    expect(extractor.extract(mask, 1)).toEqual([
      { x: 0, y: 0, width: 3, height: 3, area: 9 },
      { x: 6, y: 6, width: 2, height: 2, area: 4 }
    ]);
  });

  it('MotionExtractorMinArea keeps a region at exactly the minimum', () => {
    const mask = maskFrom(['##', '##']);

    expect(extractor.extract(mask, 4)).toHaveLength(1);
    expect(extractor.extract(mask, 5)).toHaveLength(0);
  });

  it('MotionExtractorBounds cover irregular shapes', () => {
    const mask = maskFrom(['#....', '#....', '#....', '####.']);

    expect(extractor.extract(mask, 1)).toEqual([{ x: 0, y: 0, width: 4, height: 4, area: 7 }]);
  });

  it('MotionExtractor returns nothing for an empty mask', () => {
    expect(extractor.extract(maskFrom(['....', '....']), 1)).toEqual([]);
  });

  it('MotionExtractorTotals sum region areas', () => {
    const regions = extractor.extract(maskFrom(['#.#', '...', '#..']), 1);

    expect(regions).toHaveLength(3);
    expect(extractor.totalMotionArea(regions)).toBe(3);
  });
});
