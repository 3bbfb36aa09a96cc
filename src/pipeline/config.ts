import { ENV, splitArgs } from './env';
import { ConfigurationError } from './errors';
import { assertWindowOptions } from './window';
import type {
    BreakPolicy,
    ChunkErrorPolicy,
    ChunkMode,
    EngineOptions,
    PipelineConfig,
    SegmentOptions,
    TextJoin,
    VadOptions,
    WindowOptions,
} from './types';

export type ConfigOverrides = Partial<Omit<PipelineConfig, 'vad' | 'window' | 'segments' | 'engine'>> & {
    vad?: Partial<VadOptions>;
    window?: Partial<WindowOptions>;
    segments?: Partial<SegmentOptions>;
    engine?: Partial<EngineOptions>;
};

const MODES: readonly ChunkMode[] = ['vad', 'window'];
const BREAK_POLICIES: readonly BreakPolicy[] = ['timing', 'word-boundary'];
const JOINS: readonly TextJoin[] = ['space', 'concat'];
const CHUNK_ERROR_POLICIES: readonly ChunkErrorPolicy[] = ['fail', 'skip'];

function oneOf<T extends string>(allowed: readonly T[], name: string, value: string): T {
    const hit = allowed.find((a) => a === value);
    if (hit === undefined) {
        throw new ConfigurationError(`${name} must be one of ${allowed.join(', ')}`, { [name]: value });
    }
    return hit;
}

export const parseMode = (v: string) => oneOf(MODES, 'mode', v);
export const parseBreakPolicy = (v: string) => oneOf(BREAK_POLICIES, 'breakPolicy', v);
export const parseTextJoin = (v: string) => oneOf(JOINS, 'join', v);
export const parseChunkErrorPolicy = (v: string) => oneOf(CHUNK_ERROR_POLICIES, 'onChunkError', v);

export function defaultPipelineConfig(): PipelineConfig {
    return {
        mode: parseMode(ENV.mode),
        sampleRate: ENV.sampleRate,
        vad: {
            minSpeechMs: ENV.vadMinSpeechMs,
            minSilenceMs: ENV.vadMinSilenceMs,
            mergeGap: ENV.vadMergeGap,
            maxChunk: ENV.vadMaxChunk,
            splitGap: ENV.vadSplitGap,
        },
        window: {
            chunkDuration: ENV.chunkDuration,
            overlap: ENV.overlap,
        },
        segments: {
            gapThreshold: ENV.gapThreshold,
            maxDuration: ENV.maxSegmentDuration,
            breakPolicy: parseBreakPolicy(ENV.breakPolicy),
            join: parseTextJoin(ENV.textJoin),
        },
        model: ENV.model,
        language: ENV.language,
        onChunkError: parseChunkErrorPolicy(ENV.onChunkError),
        chunkTimeoutSec: ENV.chunkTimeoutSec,
        engine: {
            bin: ENV.engineBin,
            args: splitArgs(ENV.engineArgs),
        },
    };
}

function applyOverrides(base: PipelineConfig, o: ConfigOverrides): PipelineConfig {
    return {
        mode: o.mode ?? base.mode,
        sampleRate: o.sampleRate ?? base.sampleRate,
        vad: {
            minSpeechMs: o.vad?.minSpeechMs ?? base.vad.minSpeechMs,
            minSilenceMs: o.vad?.minSilenceMs ?? base.vad.minSilenceMs,
            mergeGap: o.vad?.mergeGap ?? base.vad.mergeGap,
            maxChunk: o.vad?.maxChunk ?? base.vad.maxChunk,
            splitGap: o.vad?.splitGap ?? base.vad.splitGap,
        },
        window: {
            chunkDuration: o.window?.chunkDuration ?? base.window.chunkDuration,
            overlap: o.window?.overlap ?? base.window.overlap,
        },
        segments: {
            gapThreshold: o.segments?.gapThreshold ?? base.segments.gapThreshold,
            maxDuration: o.segments?.maxDuration ?? base.segments.maxDuration,
            breakPolicy: o.segments?.breakPolicy ?? base.segments.breakPolicy,
            join: o.segments?.join ?? base.segments.join,
        },
        model: o.model ?? base.model,
        language: o.language ?? base.language,
        onChunkError: o.onChunkError ?? base.onChunkError,
        chunkTimeoutSec: o.chunkTimeoutSec ?? base.chunkTimeoutSec,
        engine: {
            bin: o.engine?.bin ?? base.engine.bin,
            args: o.engine?.args ?? base.engine.args,
        },
    };
}

function requirePositive(name: string, value: number) {
    if (!(value > 0)) {
        throw new ConfigurationError(`${name} must be greater than zero`, { [name]: value });
    }
}

function requireNonNegative(name: string, value: number) {
    if (!(value >= 0)) {
        throw new ConfigurationError(`${name} must not be negative`, { [name]: value });
    }
}

/** Rejects invalid option combinations before any audio is touched. */
export function validatePipelineConfig(config: PipelineConfig): PipelineConfig {
    parseMode(config.mode);
    parseBreakPolicy(config.segments.breakPolicy);
    parseTextJoin(config.segments.join);
    parseChunkErrorPolicy(config.onChunkError);
    if (!Number.isInteger(config.sampleRate) || config.sampleRate <= 0) {
        throw new ConfigurationError('sampleRate must be a positive whole number', {
            sampleRate: config.sampleRate,
        });
    }
    requireNonNegative('minSpeechMs', config.vad.minSpeechMs);
    requireNonNegative('minSilenceMs', config.vad.minSilenceMs);
    requireNonNegative('mergeGap', config.vad.mergeGap);
    requirePositive('maxChunk', config.vad.maxChunk);
    requireNonNegative('splitGap', config.vad.splitGap);
    assertWindowOptions(config.window);
    requireNonNegative('gapThreshold', config.segments.gapThreshold);
    requirePositive('maxDuration', config.segments.maxDuration);
    requireNonNegative('chunkTimeoutSec', config.chunkTimeoutSec);
    if (!config.model.trim()) {
        throw new ConfigurationError('model must not be empty');
    }
    if (!config.language.trim()) {
        throw new ConfigurationError('language must not be empty');
    }
    if (!config.engine.bin.trim()) {
        throw new ConfigurationError('engine.bin must not be empty');
    }
    return config;
}

/** Defaults from the environment, then each layer in order; later layers win. */
export function resolvePipelineConfig(...layers: Array<ConfigOverrides | undefined>): PipelineConfig {
    const merged = layers.reduce<PipelineConfig>(
        (acc, layer) => (layer ? applyOverrides(acc, layer) : acc),
        defaultPipelineConfig()
    );
    return validatePipelineConfig(merged);
}
