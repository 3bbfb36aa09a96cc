import type { Segment, SegmentOptions, SegmentWord, WordToken } from './types';

// Leading whitespace or the SentencePiece word marker
const WORD_START = /^[\s▁]/;
const WORD_MARKERS = /▁/g;

/** True when the token opens a new orthographic word rather than continuing one. */
export function startsNewWord(token: WordToken): boolean {
    return WORD_START.test(token.text);
}

function cleanText(text: string): string {
    return text.replace(WORD_MARKERS, ' ').trim();
}

export function finalizeSegment(words: readonly WordToken[], join: SegmentOptions['join']): Segment {
    const kept: SegmentWord[] = [];
    for (const w of words) {
        const word = cleanText(w.text);
        if (!word) continue;
        kept.push({ word, start: w.start, end: w.end, score: w.confidence });
    }
    const text =
        join === 'concat'
            ? cleanText(words.map((w) => w.text).join('')).replace(/\s+/g, ' ')
            : kept.map((w) => w.word).join(' ');
    return {
        start: words[0].start,
        end: words[words.length - 1].end,
        text,
        words: kept,
    };
}

/**
 * Regroups a chronological word stream into segments. A break goes before a
 * word when the pause since the previous word exceeds `gapThreshold`, or the
 * open segment already runs longer than `maxDuration`. Under the
 * `word-boundary` policy the word must also start a new orthographic word.
 */
export function buildSegments(words: readonly WordToken[], opts: SegmentOptions): Segment[] {
    if (!words.length) return [];

    const segments: Segment[] = [];
    let current: WordToken[] = [words[0]];
    let segmentStart = words[0].start;

    for (let i = 1; i < words.length; i++) {
        const prev = words[i - 1];
        const curr = words[i];
        const gap = curr.start - prev.end;
        const running = prev.end - segmentStart;

        const timingBreak = gap > opts.gapThreshold || running > opts.maxDuration;
        const shouldBreak =
            timingBreak && (opts.breakPolicy === 'timing' || startsNewWord(curr));

        if (shouldBreak) {
            segments.push(finalizeSegment(current, opts.join));
            current = [curr];
            segmentStart = curr.start;
        } else {
            current.push(curr);
        }
    }
    segments.push(finalizeSegment(current, opts.join));
    return segments;
}
