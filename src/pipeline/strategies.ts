import { consolidateIntervals } from './consolidate';
import { info } from './log';
import type { Chunk, ChunkMode, PcmAudio, PipelineConfig, VadOptions, WindowOptions } from './types';
import type { VoiceActivityDetector } from './vad';
import { windowChunks } from './window';

/** Produces the ordered chunk boundaries for one decoded file. */
export interface ChunkingStrategy {
    readonly mode: ChunkMode;
    plan(audio: PcmAudio): Promise<Chunk[]>;
}

export class VadChunkingStrategy implements ChunkingStrategy {
    readonly mode = 'vad';

    constructor(
        private readonly vad: VoiceActivityDetector,
        private readonly opts: VadOptions
    ) {}

    async plan(audio: PcmAudio): Promise<Chunk[]> {
        const intervals = await this.vad.detect(audio, {
            minSpeechMs: this.opts.minSpeechMs,
            minSilenceMs: this.opts.minSilenceMs,
        });
        const chunks = consolidateIntervals(intervals, audio.sampleRate, this.opts);
        info('chunk.vad', { intervals: intervals.length, chunks: chunks.length });
        return chunks;
    }
}

export class WindowChunkingStrategy implements ChunkingStrategy {
    readonly mode = 'window';

    constructor(private readonly opts: WindowOptions) {}

    async plan(audio: PcmAudio): Promise<Chunk[]> {
        const chunks = windowChunks(audio.samples.length, audio.sampleRate, this.opts);
        info('chunk.window', {
            durationSec: audio.samples.length / audio.sampleRate,
            chunkDuration: this.opts.chunkDuration,
            overlap: this.opts.overlap,
            chunks: chunks.length,
        });
        return chunks;
    }
}

export function createChunkingStrategy(
    config: PipelineConfig,
    vad: VoiceActivityDetector
): ChunkingStrategy {
    return config.mode === 'vad'
        ? new VadChunkingStrategy(vad, config.vad)
        : new WindowChunkingStrategy(config.window);
}
