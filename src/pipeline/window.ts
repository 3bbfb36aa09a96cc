import type { Chunk, WindowOptions } from './types';
import { ConfigurationError } from './errors';

export function assertWindowOptions(opts: WindowOptions): void {
    if (!(opts.chunkDuration > 0) || !Number.isFinite(opts.chunkDuration)) {
        throw new ConfigurationError('chunkDuration must be a positive number of seconds', {
            chunkDuration: opts.chunkDuration,
        });
    }
    if (!(opts.overlap >= 0) || !Number.isFinite(opts.overlap)) {
        throw new ConfigurationError('overlap must be zero or a positive number of seconds', {
            overlap: opts.overlap,
        });
    }
    if (opts.overlap >= opts.chunkDuration) {
        throw new ConfigurationError('overlap must be shorter than chunkDuration', {
            chunkDuration: opts.chunkDuration,
            overlap: opts.overlap,
        });
    }
}

/**
 * Fixed-size windows over the whole timeline, `chunkDuration - overlap`
 * seconds apart. The last window is cut at the end of the audio. Words in the
 * overlapped region are transcribed twice and are not deduplicated.
 */
export function windowChunks(totalSamples: number, sampleRate: number, opts: WindowOptions): Chunk[] {
    assertWindowOptions(opts);
    const size = Math.round(opts.chunkDuration * sampleRate);
    const stride = Math.round((opts.chunkDuration - opts.overlap) * sampleRate);
    if (size < 1 || stride < 1) {
        throw new ConfigurationError('Window is shorter than one sample at this sample rate', {
            sampleRate,
            chunkDuration: opts.chunkDuration,
            overlap: opts.overlap,
        });
    }
    const chunks: Chunk[] = [];
    let start = 0;
    while (start < totalSamples) {
        const end = Math.min(totalSamples, start + size);
        chunks.push({ start, end });
        if (end >= totalSamples) break;
        start += stride;
    }
    return chunks;
}
