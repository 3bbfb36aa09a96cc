export type ChunkMode = 'vad' | 'window';
export type BreakPolicy = 'timing' | 'word-boundary';
export type TextJoin = 'space' | 'concat';
export type ChunkErrorPolicy = 'fail' | 'skip';

/** Sample range flagged as speech by voice-activity detection. */
export interface SpeechInterval {
    start: number;
    end: number;
}

/** Sample range handed to the transcription engine as one unit. */
export interface Chunk {
    start: number;
    end: number;
}

export interface PcmAudio {
    samples: Float32Array;
    sampleRate: number;
}

/** Word as returned by the engine, in chunk-local seconds. */
export interface RawWordToken {
    text: string;
    start: number;
    end: number;
    confidence?: number;
}

/** Word on the global timeline, rounded once at aggregation. */
export interface WordToken {
    text: string;
    start: number;
    end: number;
    confidence: number;
}

export interface SegmentWord {
    word: string;
    start: number;
    end: number;
    score: number;
}

export interface Segment {
    start: number;
    end: number;
    text: string;
    words: SegmentWord[];
}

export interface TranscriptResult {
    segments: Segment[];
    language: string;
}

export interface VadOptions {
    minSpeechMs: number;
    minSilenceMs: number;
    mergeGap: number;
    maxChunk: number;
    splitGap: number;
}

export interface WindowOptions {
    chunkDuration: number;
    overlap: number;
}

export interface SegmentOptions {
    gapThreshold: number;
    maxDuration: number;
    breakPolicy: BreakPolicy;
    join: TextJoin;
}

/** Engine command for a profile, e.g. a GPU build with device flags. */
export interface EngineOptions {
    bin: string;
    args: string[];
}

export interface PipelineConfig {
    mode: ChunkMode;
    sampleRate: number;
    vad: VadOptions;
    window: WindowOptions;
    segments: SegmentOptions;
    model: string;
    language: string;
    onChunkError: ChunkErrorPolicy;
    chunkTimeoutSec: number;
    engine: EngineOptions;
}

export interface ChunkProgress {
    chunkIndex: number;
    total: number;
    startSec: number;
    endSec: number;
    words: number;
    failed: boolean;
}

export interface RunSummary {
    chunks: number;
    words: number;
    segments: number;
    failedChunks: number[];
}
