import { describe, it, expect } from 'vitest';
import {
  assertIntervals,
  consolidateIntervals,
  mergeIntervals,
  splitGroup,
} from '../src/pipeline/consolidate';
import { ChunkingError } from '../src/pipeline/errors';
import type { Chunk, SpeechInterval } from '../src/pipeline/types';

const SR = 16000;
const sec = (s: number) => Math.round(s * SR);

function expectAscendingDisjoint(chunks: Chunk[]) {
  for (let i = 0; i < chunks.length; i++) {
    expect(chunks[i].end).toBeGreaterThan(chunks[i].start);
    if (i > 0) expect(chunks[i].start).toBeGreaterThanOrEqual(chunks[i - 1].end);
  }
}

describe('consolidateIntervals', () => {
  const opts = { mergeGap: 10, maxChunk: 300, splitGap: 0.5 };

  it('should return no chunks for no intervals', () => {
    expect(consolidateIntervals([], SR, opts)).toEqual([]);
  });

  it('should keep a single long interval whole', () => {
    const chunks = consolidateIntervals([{ start: 0, end: sec(400) }], SR, opts);
    expect(chunks).toEqual([{ start: 0, end: 6_400_000 }]);
  });

  it('should merge closely spaced short intervals into one chunk', () => {
    const intervals: SpeechInterval[] = Array.from({ length: 12 }, (_, i) => ({
      start: sec(i * 0.25),
      end: sec(i * 0.25 + 0.2),
    }));
    expect(consolidateIntervals(intervals, SR, opts)).toEqual([{ start: 0, end: 47_200 }]);
  });

  it('should merge intervals spread over three minutes when no gap reaches mergeGap', () => {
    const intervals: SpeechInterval[] = Array.from({ length: 19 }, (_, i) => ({
      start: sec(i * 10),
      end: sec(i * 10 + 0.2),
    }));
    expect(consolidateIntervals(intervals, SR, opts)).toEqual([{ start: 0, end: 2_883_200 }]);
  });

  it('should not merge across a gap exactly equal to mergeGap', () => {
    const chunks = consolidateIntervals(
      [
        { start: 0, end: SR },
        { start: 2 * SR, end: 3 * SR },
      ],
      SR,
      { mergeGap: 1, maxChunk: 300, splitGap: 0.5 }
    );
    expect(chunks).toEqual([
      { start: 0, end: SR },
      { start: 2 * SR, end: 3 * SR },
    ]);
  });

  it('should split an oversized chunk at a long enough pause', () => {
    // sample rate 1: samples are seconds
    const intervals = [
      { start: 0, end: 100 },
      { start: 101, end: 200 },
      { start: 203, end: 300 },
      { start: 301, end: 400 },
    ];
    const chunks = consolidateIntervals(intervals, 1, { mergeGap: 10, maxChunk: 250, splitGap: 2 });
    expect(chunks).toEqual([
      { start: 0, end: 200 },
      { start: 203, end: 400 },
    ]);
    expectAscendingDisjoint(chunks);
  });

  it('should never split at a pause shorter than splitGap', () => {
    const intervals = [
      { start: 0, end: 100 },
      { start: 101, end: 200 },
      { start: 203, end: 300 },
      { start: 301, end: 400 },
    ];
    const chunks = consolidateIntervals(intervals, 1, { mergeGap: 10, maxChunk: 250, splitGap: 5 });
    expect(chunks).toEqual([{ start: 0, end: 400 }]);
  });

  it('should split repeatedly while the running length exceeds maxChunk', () => {
    const intervals = [
      { start: 0, end: 100 },
      { start: 102, end: 200 },
      { start: 202, end: 300 },
      { start: 302, end: 400 },
    ];
    const chunks = consolidateIntervals(intervals, 1, { mergeGap: 10, maxChunk: 150, splitGap: 2 });
    expect(chunks).toEqual(intervals);
  });

  it('should reject intervals that are out of order', () => {
    expect(() =>
      consolidateIntervals(
        [
          { start: 50, end: 60 },
          { start: 10, end: 20 },
        ],
        SR,
        opts
      )
    ).toThrow(ChunkingError);
  });
});

describe('mergeIntervals', () => {
  const intervals = [
    { start: 0, end: 5 },
    { start: 7, end: 10 },
    { start: 30, end: 35 },
    { start: 36, end: 40 },
    { start: 60, end: 61 },
  ];

  it('should group intervals separated by less than mergeGap', () => {
    const groups = mergeIntervals(intervals, 1, 5);
    expect(groups.map((g) => ({ start: g.start, end: g.end }))).toEqual([
      { start: 0, end: 10 },
      { start: 30, end: 40 },
      { start: 60, end: 61 },
    ]);
    expect(groups[0].members).toEqual([intervals[0], intervals[1]]);
  });

  it('should be idempotent on its own output', () => {
    const once = mergeIntervals(intervals, 1, 5).map((g) => ({ start: g.start, end: g.end }));
    const twice = mergeIntervals(once, 1, 5).map((g) => ({ start: g.start, end: g.end }));
    expect(twice).toEqual(once);
  });
});

describe('splitGroup', () => {
  it('should leave a group within maxChunk untouched', () => {
    const group = {
      start: 0,
      end: 100,
      members: [
        { start: 0, end: 40 },
        { start: 60, end: 100 },
      ],
    };
    expect(splitGroup(group, 1, 100, 1)).toEqual([{ start: 0, end: 100 }]);
  });
});

describe('assertIntervals', () => {
  it('should reject an empty interval', () => {
    expect(() => assertIntervals([{ start: 10, end: 10 }])).toThrow(ChunkingError);
  });

  it('should reject fractional sample positions', () => {
    expect(() => assertIntervals([{ start: 0.5, end: 10 }])).toThrow(ChunkingError);
  });

  it('should accept touching intervals', () => {
    expect(() =>
      assertIntervals([
        { start: 0, end: 10 },
        { start: 10, end: 20 },
      ])
    ).not.toThrow();
  });
});
