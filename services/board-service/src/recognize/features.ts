import { isActive, type Raster } from './raster';

export type FeatureName =
  | 'density'
  | 'aspect_ratio'
  | 'center_offset_x'
  | 'center_offset_y'
  | 'horizontal_lines'
  | 'vertical_lines'
  | 'diagonal_lines'
  | 'has_cross'
  | 'has_three_horizontal'
  | 'has_two_horizontal'
  | 'has_single_horizontal'
  | 'has_single_vertical';

export type FeatureSet = Record<FeatureName, number>;

type Axis = 'row' | 'column';

/** Longest run of active cells in each row (or column). */
function longestRuns(raster: Raster, axis: Axis): number[] {
  const lanes = axis === 'row' ? raster.height : raster.width;
  const span = axis === 'row' ? raster.width : raster.height;
  const longest = new Array<number>(lanes).fill(0);

  for (let lane = 0; lane < lanes; lane++) {
    let run = 0;
    let best = 0;
    for (let i = 0; i < span; i++) {
      const active = axis === 'row' ? isActive(raster, i, lane) : isActive(raster, lane, i);
      if (active) {
        run++;
        if (run > best) best = run;
      } else {
        run = 0;
      }
    }
    longest[lane] = best;
  }
  return longest;
}

/** Counts bands of adjacent lanes whose longest run reaches `minLength`. */
function countLineBands(runs: number[], minLength: number): number {
  let bands = 0;
  let inBand = false;
  for (const run of runs) {
    const qualifies = run >= minLength;
    if (qualifies && !inBand) bands++;
    inBand = qualifies;
  }
  return bands;
}

export function countHorizontalLines(raster: Raster): number {
  return countLineBands(longestRuns(raster, 'row'), Math.floor(raster.width / 10));
}

export function countVerticalLines(raster: Raster): number {
  return countLineBands(longestRuns(raster, 'column'), Math.floor(raster.height / 10));
}

/**
 * Tallies diagonal runs the way a ray cast from every cell in each of the
 * four diagonal directions would see them: a run of length L starting at
 * offset a on a diagonal of length n is seen whole from the a + 1 starts at
 * or before it and from the far end's n - b starts, and seen truncated but
 * still long enough from L - min starts inside it in each direction. The
 * same visual line is therefore counted many times; the number is only a
 * rough signal of diagonal ink.
 */
export function countDiagonalRuns(raster: Raster): number {
  const { width, height } = raster;
  const minLength = Math.max(1, Math.floor(Math.floor(Math.hypot(width, height)) / 8));
  let total = 0;

  const scanLine = (x0: number, y0: number, stepY: 1 | -1, length: number) => {
    let runStart = -1;
    for (let i = 0; i <= length; i++) {
      const active = i < length && isActive(raster, x0 + i, y0 + stepY * i);
      if (active && runStart < 0) {
        runStart = i;
      } else if (!active && runStart >= 0) {
        const runLength = i - runStart;
        const runEnd = i - 1;
        if (runLength >= minLength) {
          total += runStart + 1 + (length - runEnd);
        }
        total += 2 * Math.max(0, runLength - minLength);
        runStart = -1;
      }
    }
  };

  // x - y constant: walked with (1, 1), reversed by (-1, -1)
  for (let k = -(height - 1); k < width; k++) {
    const x0 = Math.max(k, 0);
    const y0 = x0 - k;
    scanLine(x0, y0, 1, Math.min(width - x0, height - y0));
  }
  // x + y constant: walked with (1, -1), reversed by (-1, 1)
  for (let s = 0; s <= width + height - 2; s++) {
    const x0 = Math.max(0, s - (height - 1));
    const y0 = s - x0;
    scanLine(x0, y0, -1, Math.min(width - x0, y0 + 1));
  }

  return total;
}

/** True when the longest row run exceeds a third of the width and the longest column run a third of the height. */
export function hasCross(raster: Raster): boolean {
  const longestRow = longestRuns(raster, 'row').reduce((a, b) => Math.max(a, b), 0);
  const longestColumn = longestRuns(raster, 'column').reduce((a, b) => Math.max(a, b), 0);
  return longestRow > Math.floor(raster.width / 3) && longestColumn > Math.floor(raster.height / 3);
}

const flag = (value: boolean): number => (value ? 1 : 0);

export function extractFeatures(raster: Raster): FeatureSet {
  const { width, height } = raster;
  let active = 0;
  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (!isActive(raster, x, y)) continue;
      active++;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  const centerX = width / 2;
  const centerY = height / 2;
  const empty = active === 0;

  const horizontal = countHorizontalLines(raster);
  const vertical = countVerticalLines(raster);

  return {
    density: active / (width * height),
    aspect_ratio: empty ? 0 : (maxX - minX + 1) / (maxY - minY + 1),
    center_offset_x: empty ? 0 : Math.abs((minX + maxX) / 2 - centerX) / centerX,
    center_offset_y: empty ? 0 : Math.abs((minY + maxY) / 2 - centerY) / centerY,
    horizontal_lines: horizontal,
    vertical_lines: vertical,
    diagonal_lines: countDiagonalRuns(raster),
    has_cross: flag(hasCross(raster)),
    has_three_horizontal: flag(horizontal >= 3),
    has_two_horizontal: flag(horizontal >= 2),
    has_single_horizontal: flag(horizontal >= 1 && vertical === 0),
    has_single_vertical: flag(vertical >= 1 && horizontal === 0),
  };
}
