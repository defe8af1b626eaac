import type { Point } from '@drawboard/shared';

export interface Raster {
  width: number;
  height: number;
  /** Row-major occupancy, one cell per pixel, values in [0, 1]. */
  cells: Float32Array;
}

/** Cells above this value count as ink. */
export const ACTIVE_THRESHOLD = 0.1;

export function createRaster(width: number, height: number): Raster {
  return { width, height, cells: new Float32Array(width * height) };
}

export function isActive(raster: Raster, x: number, y: number): boolean {
  return raster.cells[y * raster.width + x] > ACTIVE_THRESHOLD;
}

// 3x3 block centred on (cx, cy); anything off the canvas is dropped.
function stamp(raster: Raster, cx: number, cy: number): void {
  const { width, height, cells } = raster;
  for (let dy = -1; dy <= 1; dy++) {
    const y = cy + dy;
    if (y < 0 || y >= height) continue;
    for (let dx = -1; dx <= 1; dx++) {
      const x = cx + dx;
      if (x < 0 || x >= width) continue;
      cells[y * width + x] = 1;
    }
  }
}

/**
 * Draws strokes onto a fresh raster. Every point is stamped, then each
 * segment is walked in steps no longer than one pixel so fast pointer
 * movement still produces a connected line.
 */
export function rasterize(strokes: ReadonlyArray<{ points: ReadonlyArray<Point> }>, width: number, height: number): Raster {
  const raster = createRaster(width, height);

  for (const { points } of strokes) {
    for (const p of points) {
      stamp(raster, Math.round(p.x), Math.round(p.y));
    }

    for (let i = 0; i < points.length - 1; i++) {
      const from = points[i];
      const to = points[i + 1];
      const dx = to.x - from.x;
      const dy = to.y - from.y;
      const steps = Math.floor(Math.hypot(dx, dy)) + 1;
      for (let j = 0; j <= steps; j++) {
        const t = j / steps;
        stamp(raster, Math.round(from.x + t * dx), Math.round(from.y + t * dy));
      }
    }
  }

  return raster;
}
