import type { Candidate, Point } from '@drawboard/shared';
import { DEFAULT_TOP_N } from './classifier';

export type Direction = 'dot' | 'horizontal' | 'vertical';
export type Shape = 'straight' | 'slightly_curved' | 'curved';

/** Start-to-end displacement below this on both axes reads as a dot. */
const DOT_EXTENT = 5;
const STRAIGHT_DEVIATION = 5;
const CURVED_DEVIATION = 15;
/** Drawings with more points than this also suggest dense characters. */
const DENSE_POINTS = 20;

/** Primary direction from the first point to the last one. */
export function strokeDirection(points: ReadonlyArray<Point>): Direction {
  if (points.length < 2) return 'dot';
  const start = points[0];
  const end = points[points.length - 1];
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  if (Math.abs(dx) < DOT_EXTENT && Math.abs(dy) < DOT_EXTENT) return 'dot';

  let angle = (Math.atan2(dy, dx) * 180) / Math.PI;
  if (angle < 0) angle += 360;
  const horizontal = angle >= 315 || angle < 45 || (angle >= 135 && angle < 225);
  return horizontal ? 'horizontal' : 'vertical';
}

/**
 * Average distance of the interior points from the start-end chord. A stroke
 * that returns to its start has no chord and reads as curved.
 */
export function strokeShape(points: ReadonlyArray<Point>): Shape {
  if (points.length < 3) return 'straight';
  const start = points[0];
  const end = points[points.length - 1];
  const chord = Math.hypot(end.x - start.x, end.y - start.y);

  let total = 0;
  for (let i = 1; i < points.length - 1; i++) {
    const p = points[i];
    total +=
      Math.abs((end.y - start.y) * p.x - (end.x - start.x) * p.y + end.x * start.y - end.y * start.x) / chord;
  }
  const average = total / (points.length - 2);

  if (average < STRAIGHT_DEVIATION) return 'straight';
  if (average < CURVED_DEVIATION) return 'slightly_curved';
  return 'curved';
}

type Analysed = { direction: Direction; shape: Shape };

type Pattern = {
  strokes: number;
  when: (s: Analysed[]) => boolean;
  candidates: Candidate[];
};

const allHorizontal = (s: Analysed[]) => s.every((a) => a.direction === 'horizontal');

// At most one pattern per stroke count applies: the first that matches.
const PATTERNS: Pattern[] = [
  {
    strokes: 1,
    when: ([a]) => a.direction === 'horizontal' && a.shape === 'straight',
    candidates: [{ text: '一', score: 0.9 }, { text: 'ー', score: 0.7 }],
  },
  {
    strokes: 1,
    when: ([a]) => a.direction === 'vertical' && a.shape === 'straight',
    candidates: [{ text: '丨', score: 0.9 }, { text: '｜', score: 0.7 }],
  },
  {
    strokes: 1,
    when: ([a]) => a.direction === 'dot',
    candidates: [{ text: '丶', score: 0.8 }, { text: '。', score: 0.6 }],
  },
  {
    strokes: 1,
    when: ([a]) => a.shape === 'curved',
    candidates: [{ text: 'し', score: 0.7 }, { text: 'く', score: 0.5 }],
  },
  {
    strokes: 2,
    when: allHorizontal,
    candidates: [{ text: '二', score: 0.8 }, { text: 'ニ', score: 0.6 }],
  },
  {
    strokes: 2,
    when: ([a, b]) =>
      (a.direction === 'horizontal' && b.direction === 'vertical') ||
      (a.direction === 'vertical' && b.direction === 'horizontal'),
    candidates: [{ text: '十', score: 0.8 }, { text: '＋', score: 0.6 }],
  },
  {
    strokes: 3,
    when: allHorizontal,
    candidates: [{ text: '三', score: 0.8 }, { text: 'ミ', score: 0.6 }],
  },
];

function complexCandidates(analysed: Analysed[]): Candidate[] {
  const horizontal = analysed.filter((a) => a.direction === 'horizontal').length;
  const vertical = analysed.filter((a) => a.direction === 'vertical').length;
  const grid: Candidate[] =
    horizontal >= 2 && vertical >= 2 ? [{ text: '中', score: 0.6 }, { text: '田', score: 0.5 }] : [];
  return [...grid, { text: '国', score: 0.5 }, { text: '学', score: 0.4 }, { text: '生', score: 0.3 }];
}

function genericByStrokeCount(strokeCount: number): Candidate {
  switch (strokeCount) {
    case 1:
      return { text: '一', score: 0.5 };
    case 2:
      return { text: '二', score: 0.5 };
    case 3:
      return { text: '三', score: 0.5 };
    default:
      return { text: '中', score: 0.4 };
  }
}

/**
 * Ranks candidates from stroke count, stroke directions and straightness
 * alone. The raster size plays no part.
 */
export function classifyByDirection(
  strokes: ReadonlyArray<{ points: ReadonlyArray<Point> }>,
  topN: number,
): Candidate[] {
  if (strokes.length === 0) return [];
  const limit = topN > 0 ? topN : DEFAULT_TOP_N;

  const analysed = strokes.map((s) => ({ direction: strokeDirection(s.points), shape: strokeShape(s.points) }));
  const totalPoints = strokes.reduce((sum, s) => sum + s.points.length, 0);

  const candidates: Candidate[] = [];
  if (strokes.length >= 4) {
    candidates.push(...complexCandidates(analysed));
  } else {
    const match = PATTERNS.find((p) => p.strokes === strokes.length && p.when(analysed));
    if (match) candidates.push(...match.candidates);
  }
  if (totalPoints > DENSE_POINTS) {
    candidates.push({ text: '書', score: 0.3 }, { text: '字', score: 0.2 });
  }
  if (candidates.length === 0) {
    candidates.push(genericByStrokeCount(strokes.length));
  }

  return candidates.slice(0, limit).map((c) => ({ ...c }));
}
