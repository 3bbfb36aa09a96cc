import type { Chunk, SpeechInterval } from './types';
import { ChunkingError } from './errors';

export interface ConsolidateOptions {
    /** Gaps strictly shorter than this (seconds) are absorbed into one chunk. */
    mergeGap: number;
    /** Soft upper bound on chunk duration (seconds). */
    maxChunk: number;
    /** Minimum pause (seconds) at which an oversized chunk may be re-split. */
    splitGap: number;
}

/** A merged chunk together with the speech intervals it was built from. */
export interface IntervalGroup {
    start: number;
    end: number;
    members: SpeechInterval[];
}

export function assertIntervals(intervals: readonly SpeechInterval[]): void {
    let prevEnd = 0;
    intervals.forEach((iv, idx) => {
        if (!Number.isInteger(iv.start) || !Number.isInteger(iv.end)) {
            throw new ChunkingError(`Speech interval ${idx} is not a whole sample range`, {
                idx,
                start: iv.start,
                end: iv.end,
            });
        }
        if (iv.start < 0 || iv.end <= iv.start) {
            throw new ChunkingError(`Speech interval ${idx} is empty or negative`, {
                idx,
                start: iv.start,
                end: iv.end,
            });
        }
        if (iv.start < prevEnd) {
            throw new ChunkingError(`Speech interval ${idx} overlaps or precedes its predecessor`, {
                idx,
                start: iv.start,
                prevEnd,
            });
        }
        prevEnd = iv.end;
    });
}

/**
 * Greedy merge: walks intervals in order and absorbs the next one whenever the
 * pause before it is shorter than `mergeGap` seconds.
 */
export function mergeIntervals(
    intervals: readonly SpeechInterval[],
    sampleRate: number,
    mergeGap: number
): IntervalGroup[] {
    const groups: IntervalGroup[] = [];
    let current: IntervalGroup | null = null;
    for (const iv of intervals) {
        if (current && (iv.start - current.end) / sampleRate < mergeGap) {
            current.end = iv.end;
            current.members.push(iv);
            continue;
        }
        current = { start: iv.start, end: iv.end, members: [iv] };
        groups.push(current);
    }
    return groups;
}

/**
 * Re-splits a group longer than `maxChunk` at pauses of at least `splitGap`
 * between its original intervals. A group with no such pause stays whole.
 */
export function splitGroup(
    group: IntervalGroup,
    sampleRate: number,
    maxChunk: number,
    splitGap: number
): Chunk[] {
    const { members } = group;
    if ((group.end - group.start) / sampleRate <= maxChunk || members.length < 2) {
        return [{ start: group.start, end: group.end }];
    }
    const out: Chunk[] = [];
    let start = members[0].start;
    let end = members[0].end;
    for (let i = 1; i < members.length; i++) {
        const next = members[i];
        const gap = (next.start - end) / sampleRate;
        const extended = (next.end - start) / sampleRate;
        if (extended > maxChunk && gap >= splitGap) {
            out.push({ start, end });
            start = next.start;
        }
        end = next.end;
    }
    out.push({ start, end });
    return out;
}

export function consolidateIntervals(
    intervals: readonly SpeechInterval[],
    sampleRate: number,
    opts: ConsolidateOptions
): Chunk[] {
    assertIntervals(intervals);
    return mergeIntervals(intervals, sampleRate, opts.mergeGap).flatMap((g) =>
        splitGroup(g, sampleRate, opts.maxChunk, opts.splitGap)
    );
}
