import type { Candidate, Point } from '@drawboard/shared';
import { classifyFeatures } from './classifier';
import { extractFeatures, type FeatureSet } from './features';
import { rasterize } from './raster';
import { classifyByDirection } from './simple';

export { DEFAULT_TOP_N } from './classifier';
export type { FeatureSet } from './features';

export interface Recognition {
  candidates: Candidate[];
  features: FeatureSet | null;
}

function assertDimension(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/** Rasterizes the strokes and ranks candidates; also returns the features for diagnostics. */
export function recognize(
  strokes: ReadonlyArray<{ points: ReadonlyArray<Point> }>,
  width: number,
  height: number,
  topN: number,
): Recognition {
  assertDimension('width', width);
  assertDimension('height', height);
  if (strokes.length === 0) {
    return { candidates: [], features: null };
  }
  const features = extractFeatures(rasterize(strokes, width, height));
  return { candidates: classifyFeatures(features, strokes.length, topN), features };
}

export function classify(
  strokes: ReadonlyArray<{ points: ReadonlyArray<Point> }>,
  width: number,
  height: number,
  topN: number,
): Candidate[] {
  return recognize(strokes, width, height, topN).candidates;
}

export type RecognizerKind = 'raster' | 'simple';

/** A ranking strategy the HTTP layer can be configured with. */
export interface Recognizer {
  readonly kind: RecognizerKind;
  recognize(
    strokes: ReadonlyArray<{ points: ReadonlyArray<Point> }>,
    width: number,
    height: number,
    topN: number,
  ): Candidate[];
}

export const rasterRecognizer: Recognizer = {
  kind: 'raster',
  recognize: classify,
};

export const simpleRecognizer: Recognizer = {
  kind: 'simple',
  recognize(strokes, width, height, topN) {
    assertDimension('width', width);
    assertDimension('height', height);
    return classifyByDirection(strokes, topN);
  },
};

export function createRecognizer(kind: RecognizerKind): Recognizer {
  return kind === 'simple' ? simpleRecognizer : rasterRecognizer;
}
