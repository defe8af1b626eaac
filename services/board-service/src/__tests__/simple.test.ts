import type { Point } from '@drawboard/shared';
import { createRecognizer, rasterRecognizer, simpleRecognizer } from '../recognize';
import { classifyByDirection, strokeDirection, strokeShape } from '../recognize/simple';

const stroke = (...coords: Array<[number, number]>): { points: Point[] } => ({
  points: coords.map(([x, y]) => ({ x, y })),
});

describe('strokeDirection', () => {
  it.each([
    ['a rightward segment', [[10, 10], [20, 10]], 'horizontal'],
    ['a leftward segment', [[20, 10], [10, 12]], 'horizontal'],
    ['a downward segment', [[10, 10], [11, 40]], 'vertical'],
    ['a steep diagonal', [[0, 0], [50, 100]], 'vertical'],
    ['a shallow diagonal', [[100, 0], [0, 80]], 'horizontal'],
    ['a tiny movement', [[10, 10], [14, 13]], 'dot'],
    ['a single point', [[10, 10]], 'dot'],
  ])('reads %s', (_label, coords, expected) => {
    expect(strokeDirection(stroke(...coords.map(([x, y]): [number, number] => [x, y])).points)).toBe(expected);
  });
});

describe('strokeShape', () => {
  it('treats two-point strokes as straight', () => {
    expect(strokeShape(stroke([0, 0], [100, 40]).points)).toBe('straight');
  });

  it('grades the average distance from the chord', () => {
    expect(strokeShape(stroke([0, 0], [50, 4], [100, 0]).points)).toBe('straight');
    expect(strokeShape(stroke([0, 0], [50, 10], [100, 0]).points)).toBe('slightly_curved');
    expect(strokeShape(stroke([0, 0], [50, 60], [100, 0]).points)).toBe('curved');
  });

  it('reads a stroke that ends where it began as curved', () => {
    expect(strokeShape(stroke([0, 0], [30, 30], [0, 0]).points)).toBe('curved');
  });
});

describe('classifyByDirection', () => {
  it('reads a short horizontal dash as 一', () => {
    expect(classifyByDirection([stroke([10, 10], [20, 10])], 10)).toEqual([
      { text: '一', score: 0.9 },
      { text: 'ー', score: 0.7 },
    ]);
  });

  it('reads a straight vertical stroke as 丨', () => {
    expect(classifyByDirection([stroke([150, 50], [150, 250])], 10)).toEqual([
      { text: '丨', score: 0.9 },
      { text: '｜', score: 0.7 },
    ]);
  });

  it('reads a tap as 丶', () => {
    expect(classifyByDirection([stroke([10, 10], [12, 11])], 10)).toEqual([
      { text: '丶', score: 0.8 },
      { text: '。', score: 0.6 },
    ]);
  });

  it('reads a bowed stroke as し', () => {
    expect(classifyByDirection([stroke([0, 0], [50, 60], [100, 0])], 10)).toEqual([
      { text: 'し', score: 0.7 },
      { text: 'く', score: 0.5 },
    ]);
  });

  it('reads two and three horizontal strokes as 二 and 三', () => {
    expect(classifyByDirection([stroke([0, 10], [100, 10]), stroke([0, 50], [100, 50])], 10)).toEqual([
      { text: '二', score: 0.8 },
      { text: 'ニ', score: 0.6 },
    ]);
    expect(
      classifyByDirection([stroke([0, 10], [100, 10]), stroke([0, 50], [100, 50]), stroke([0, 90], [100, 90])], 10),
    ).toEqual([
      { text: '三', score: 0.8 },
      { text: 'ミ', score: 0.6 },
    ]);
  });

  it('reads a vertical then horizontal stroke as 十', () => {
    expect(classifyByDirection([stroke([50, 0], [50, 100]), stroke([0, 50], [100, 50])], 10)).toEqual([
      { text: '十', score: 0.8 },
      { text: '＋', score: 0.6 },
    ]);
  });

  it('offers grid characters for four strokes with two of each direction', () => {
    const strokes = [
      stroke([0, 10], [100, 10]),
      stroke([0, 90], [100, 90]),
      stroke([10, 0], [10, 100]),
      stroke([90, 0], [90, 100]),
    ];
    expect(classifyByDirection(strokes, 10)).toEqual([
      { text: '中', score: 0.6 },
      { text: '田', score: 0.5 },
      { text: '国', score: 0.5 },
      { text: '学', score: 0.4 },
      { text: '生', score: 0.3 },
    ]);
  });

  it('adds dense characters past twenty points and honours topN', () => {
    const dense = stroke(...Array.from({ length: 21 }, (_, i): [number, number] => [i * 10, 10]));
    expect(classifyByDirection([dense], 10)).toEqual([
      { text: '一', score: 0.9 },
      { text: 'ー', score: 0.7 },
      { text: '書', score: 0.3 },
      { text: '字', score: 0.2 },
    ]);
    expect(classifyByDirection([dense], 3).map((c) => c.text)).toEqual(['一', 'ー', '書']);
  });

  it('falls back to the stroke count when nothing matches', () => {
    expect(classifyByDirection([stroke([0, 0], [50, 10], [100, 0])], 10)).toEqual([{ text: '一', score: 0.5 }]);
    expect(classifyByDirection([stroke([0, 0], [1, 1]), stroke([5, 5], [6, 6])], 10)).toEqual([
      { text: '二', score: 0.5 },
    ]);
  });

  it('returns nothing for an empty drawing', () => {
    expect(classifyByDirection([], 10)).toEqual([]);
  });
});

describe('createRecognizer', () => {
  it('picks the recognizer by kind', () => {
    expect(createRecognizer('simple')).toBe(simpleRecognizer);
    expect(createRecognizer('raster')).toBe(rasterRecognizer);
  });

  it('ranks the short dash differently per recognizer', () => {
    const dash = [stroke([10, 10], [20, 10])];
    expect(simpleRecognizer.recognize(dash, 300, 300, 10)[0]).toEqual({ text: '一', score: 0.9 });
    expect(rasterRecognizer.recognize(dash, 300, 300, 10)[0]).toEqual({ text: '丶', score: 0.8 });
  });

  it('rejects a non-positive raster in both recognizers', () => {
    expect(() => simpleRecognizer.recognize([stroke([1, 1], [2, 2])], 0, 300, 10)).toThrow(RangeError);
    expect(() => rasterRecognizer.recognize([stroke([1, 1], [2, 2])], 300, 0, 10)).toThrow(RangeError);
  });
});
