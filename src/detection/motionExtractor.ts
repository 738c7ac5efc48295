import type { ForegroundMask, Region } from '../types.js';

const NEIGHBOURS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [0, -1],
  [1, -1],
  [-1, 0],
  [1, 0],
  [-1, 1],
  [0, 1],
  [1, 1]
];

/**
 * Groups foreground pixels into 8-connected regions. Regions smaller than
 * `minArea` are dropped; the rest come back in scan order of their first pixel.
 */
export class MotionExtractor {
  extract(mask: ForegroundMask, minArea: number): Region[] {
    const { width, height, data } = mask;
    const visited = new Uint8Array(width * height);
    const regions: Region[] = [];
    const stack: number[] = [];

    for (let start = 0; start < data.length; start += 1) {
      if (data[start] === 0 || visited[start] === 1) {
        continue;
      }

      visited[start] = 1;
      stack.push(start);
      let minX = width;
      let minY = height;
      let maxX = -1;
      let maxY = -1;
      let area = 0;

      while (stack.length > 0) {
        const index = stack.pop();
        if (index === undefined) {
          break;
        }
        const x = index % width;
        const y = (index - x) / width;
        area += 1;
        if (x < minX) minX = x;
        if (x > maxX) maxX = x;
        if (y < minY) minY = y;
        if (y > maxY) maxY = y;

        for (const [dx, dy] of NEIGHBOURS) {
          const nx = x + dx;
          const ny = y + dy;
          if (nx < 0 || ny < 0 || nx >= width || ny >= height) {
            continue;
          }
          const neighbour = ny * width + nx;
          if (data[neighbour] === 1 && visited[neighbour] === 0) {
            visited[neighbour] = 1;
            stack.push(neighbour);
          }
        }
      }

      if (area >= minArea) {
        regions.push({
          x: minX,
          y: minY,
          width: maxX - minX + 1,
          height: maxY - minY + 1,
          area
        });
      }
    }

    return regions;
  }

  totalMotionArea(regions: readonly Region[]): number {
    let total = 0;
    for (const region of regions) {
      total += region.area;
    }
    return total;
  }
}
