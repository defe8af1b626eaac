import type { Candidate } from '@drawboard/shared';
import type { FeatureSet } from './features';

export const DEFAULT_TOP_N = 10;

type Rule = {
  strokes: number;
  when: (f: FeatureSet) => boolean;
  candidates: Candidate[];
};

// Order matters: earlier rows rank first when several match.
const PRIORITY_RULES: Rule[] = [
  {
    strokes: 2,
    when: (f) => f.has_cross > 0.5,
    candidates: [{ text: '十', score: 0.95 }, { text: '＋', score: 0.8 }],
  },
  {
    strokes: 3,
    when: (f) => f.has_three_horizontal > 0.5,
    candidates: [{ text: '三', score: 0.95 }, { text: 'ミ', score: 0.7 }],
  },
  {
    strokes: 2,
    when: (f) => f.has_two_horizontal > 0.5,
    candidates: [{ text: '二', score: 0.9 }, { text: 'ニ', score: 0.7 }],
  },
  {
    strokes: 1,
    when: (f) => f.has_single_horizontal > 0.5,
    candidates: [{ text: '一', score: 0.9 }, { text: 'ー', score: 0.7 }],
  },
  {
    strokes: 1,
    when: (f) => f.has_single_vertical > 0.5,
    candidates: [{ text: '丨', score: 0.9 }, { text: '｜', score: 0.7 }],
  },
];

function fallbackByLineCounts(f: FeatureSet, strokeCount: number): Candidate[] {
  const horizontal = f.horizontal_lines;
  const vertical = f.vertical_lines;

  switch (strokeCount) {
    case 1:
      if (horizontal >= 1) return [{ text: '一', score: 0.7 }, { text: 'ー', score: 0.5 }];
      if (vertical >= 1) return [{ text: '丨', score: 0.7 }, { text: '｜', score: 0.5 }];
      if (f.density < 0.01) return [{ text: '丶', score: 0.8 }, { text: '。', score: 0.6 }];
      return [{ text: 'し', score: 0.6 }, { text: 'く', score: 0.4 }];
    case 2:
      if (horizontal >= 2) return [{ text: '二', score: 0.7 }, { text: 'ニ', score: 0.5 }];
      if (horizontal >= 1 && vertical >= 1) return [{ text: '十', score: 0.7 }, { text: '＋', score: 0.5 }];
      return [{ text: '人', score: 0.6 }, { text: '入', score: 0.4 }];
    case 3:
      if (horizontal >= 3) return [{ text: '三', score: 0.7 }, { text: 'ミ', score: 0.5 }];
      if (horizontal >= 1 && vertical >= 1) return [{ text: '大', score: 0.6 }, { text: '太', score: 0.4 }];
      return [{ text: '小', score: 0.5 }, { text: '川', score: 0.3 }];
    default: {
      const candidates: Candidate[] = [];
      if (horizontal >= 2 && vertical >= 2) {
        candidates.push({ text: '中', score: 0.6 }, { text: '田', score: 0.5 });
      }
      candidates.push({ text: '国', score: 0.5 }, { text: '学', score: 0.4 }, { text: '生', score: 0.3 });
      return candidates;
    }
  }
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
 * Ranks character candidates for a drawing from its features and stroke
 * count. Candidates keep generation order; `topN <= 0` means 10.
 */
export function classifyFeatures(features: FeatureSet, strokeCount: number, topN: number): Candidate[] {
  if (strokeCount <= 0) return [];
  const limit = topN > 0 ? topN : DEFAULT_TOP_N;

  const candidates: Candidate[] = [];
  for (const rule of PRIORITY_RULES) {
    if (rule.strokes === strokeCount && rule.when(features)) {
      candidates.push(...rule.candidates);
    }
  }

  if (candidates.length === 0) {
    candidates.push(...fallbackByLineCounts(features, strokeCount));
  }

  if (features.density > 0.1) {
    candidates.push({ text: '書', score: 0.3 }, { text: '字', score: 0.2 });
  }

  if (candidates.length === 0) {
    candidates.push(genericByStrokeCount(strokeCount));
  }

  return candidates.slice(0, limit).map((c) => ({ ...c }));
}
