import { sliceSamples } from './audio';
import { validatePipelineConfig } from './config';
import type { TranscriptionEngine } from './engine';
import { InputError, PipelineError, TranscriptionError, errorMessage } from './errors';
import { debug, info, startStep, warn } from './log';
import { buildSegments } from './segments';
import { type AudioStager, withStagedAudio } from './staging';
import type { ChunkingStrategy } from './strategies';
import type {
    Chunk,
    ChunkProgress,
    PcmAudio,
    PipelineConfig,
    RawWordToken,
    RunSummary,
    TranscriptResult,
    WordToken,
} from './types';

export interface PipelineDeps {
    strategy: ChunkingStrategy;
    engine: TranscriptionEngine;
    stager: AudioStager;
    onProgress?: (p: ChunkProgress) => void;
}

export interface PipelineOutput {
    result: TranscriptResult;
    summary: RunSummary;
    chunks: Chunk[];
}

export function roundTo(value: number, digits: number): number {
    const f = 10 ** digits;
    return Math.round(value * f) / f;
}

/** Shifts a chunk-local word onto the global timeline; the only rounding step. */
export function toGlobalWord(w: RawWordToken, offsetSec: number): WordToken {
    return {
        text: w.text,
        start: roundTo(w.start + offsetSec, 3),
        end: roundTo(w.end + offsetSec, 3),
        confidence: roundTo(w.confidence ?? 1.0, 4),
    };
}

export function chunkLabel(idx: number): string {
    return `chunk_${String(idx).padStart(4, '0')}`;
}

/**
 * Chunks one decoded file, transcribes the chunks strictly one after another
 * and regroups the words into segments. A chunk's staged audio and the
 * engine's device memory are released before the next chunk starts.
 */
export class TranscriptionPipeline {
    constructor(
        private readonly config: PipelineConfig,
        private readonly deps: PipelineDeps
    ) {
        validatePipelineConfig(config);
    }

    async run(audio: PcmAudio): Promise<PipelineOutput> {
        if (audio.sampleRate !== this.config.sampleRate) {
            throw new InputError('Decoded audio does not match the configured sample rate', {
                expected: this.config.sampleRate,
                actual: audio.sampleRate,
            });
        }
        const chunks = await this.deps.strategy.plan(audio);
        info('transcribe.plan', { mode: this.deps.strategy.mode, chunks: chunks.length });

        const words: WordToken[] = [];
        const failedChunks: number[] = [];
        const timer = startStep('transcribe.chunks', { total: chunks.length });
        for (const [idx, chunk] of chunks.entries()) {
            const chunkWords = await this.transcribeChunk(audio, chunk, idx);
            if (chunkWords === null) {
                failedChunks.push(idx);
            } else {
                words.push(...chunkWords);
            }
            const progress: ChunkProgress = {
                chunkIndex: idx,
                total: chunks.length,
                startSec: roundTo(chunk.start / audio.sampleRate, 3),
                endSec: roundTo(chunk.end / audio.sampleRate, 3),
                words: chunkWords?.length ?? 0,
                failed: chunkWords === null,
            };
            info('transcribe.chunk.done', { ...progress });
            this.deps.onProgress?.(progress);
            timer.eta(idx + 1, chunks.length);
        }
        timer.end({ words: words.length, failed: failedChunks.length });

        if (!chunks.length) {
            info('transcribe.nospeech', {});
        }
        const segments = buildSegments(words, this.config.segments);
        info('transcribe.segments', { words: words.length, segments: segments.length });

        return {
            result: { segments, language: this.config.language },
            summary: {
                chunks: chunks.length,
                words: words.length,
                segments: segments.length,
                failedChunks,
            },
            chunks,
        };
    }

    /** Returns null when the chunk failed and the skip policy is in effect. */
    private async transcribeChunk(audio: PcmAudio, chunk: Chunk, idx: number): Promise<WordToken[] | null> {
        const offsetSec = chunk.start / audio.sampleRate;
        debug('transcribe.chunk.start', { idx, start: chunk.start, end: chunk.end });
        try {
            return await withStagedAudio(
                this.deps.stager,
                sliceSamples(audio, chunk),
                audio.sampleRate,
                chunkLabel(idx),
                async (staged) => {
                    try {
                        const raw = await this.deps.engine.transcribe(staged.path, {
                            chunkIndex: idx,
                            model: this.config.model,
                            language: this.config.language,
                        });
                        return raw.map((w) => toGlobalWord(w, offsetSec));
                    } finally {
                        await this.releaseEngineMemory(idx);
                    }
                }
            );
        } catch (e) {
            const err =
                e instanceof PipelineError
                    ? e
                    : new TranscriptionError(`Chunk ${idx} failed: ${errorMessage(e)}`, idx, {}, { cause: e });
            if (this.config.onChunkError === 'skip') {
                warn('transcribe.chunk.skip', { idx, error: err.message });
                return null;
            }
            throw err;
        }
    }

    private async releaseEngineMemory(idx: number): Promise<void> {
        try {
            await this.deps.engine.releaseMemory();
        } catch (e) {
            debug('transcribe.release.fail', { idx, error: errorMessage(e) });
        }
    }
}
