import { execa } from 'execa';
import { ENV, splitArgs } from './env';
import { TranscriptionError, errorMessage } from './errors';
import { debug, warn } from './log';
import type { RawWordToken } from './types';

export interface EngineRequest {
    chunkIndex: number;
    model: string;
    language: string;
}

/**
 * Word-level transcription engine. One chunk in flight at a time; the
 * pipeline calls `releaseMemory` after every chunk, whatever the outcome.
 */
export interface TranscriptionEngine {
    transcribe(audioPath: string, req: EngineRequest): Promise<RawWordToken[]>;
    releaseMemory(): Promise<void>;
}

function wordText(item: object): string | undefined {
    if ('word' in item && typeof item.word === 'string') return item.word;
    if ('text' in item && typeof item.text === 'string') return item.text;
    return undefined;
}

/** Accepts `{words: [...]}` or a bare list; each entry carries `word` or `text`. */
export function parseWordTokens(raw: unknown, chunkIndex?: number): RawWordToken[] {
    const list = typeof raw === 'object' && raw !== null && 'words' in raw ? raw.words : raw;
    if (!Array.isArray(list)) {
        throw new TranscriptionError('Engine output must contain a list of words', chunkIndex);
    }
    return list.map((item: unknown, idx) => {
        if (typeof item !== 'object' || item === null) {
            throw new TranscriptionError(`Engine word ${idx} is not an object`, chunkIndex, { idx });
        }
        const text = wordText(item);
        const start = 'start' in item ? item.start : undefined;
        const end = 'end' in item ? item.end : undefined;
        const confidence = 'confidence' in item ? item.confidence : undefined;
        if (
            text === undefined ||
            typeof start !== 'number' ||
            typeof end !== 'number' ||
            !Number.isFinite(start) ||
            !Number.isFinite(end)
        ) {
            throw new TranscriptionError(`Engine word ${idx} is malformed`, chunkIndex, { idx });
        }
        const token: RawWordToken = { text, start, end };
        if (typeof confidence === 'number' && Number.isFinite(confidence)) {
            token.confidence = Math.min(1, Math.max(0, confidence));
        }
        return token;
    });
}

export interface CommandEngineOptions {
    bin?: string;
    extraArgs?: string[];
    // Watchdog timeout (seconds) for one chunk. 0 disables.
    timeoutSec?: number;
}

/**
 * Runs the engine command once per chunk:
 *   <bin> [extraArgs] --model <model> --language <lang> <chunk.wav>
 * and reads JSON words from stdout. Stderr lines are forwarded at debug.
 */
export class CommandTranscriptionEngine implements TranscriptionEngine {
    private readonly bin: string;
    private readonly extraArgs: string[];
    private readonly timeoutSec: number;

    constructor(opts: CommandEngineOptions = {}) {
        this.bin = opts.bin ?? ENV.engineBin;
        this.extraArgs = opts.extraArgs ?? splitArgs(ENV.engineArgs);
        this.timeoutSec = opts.timeoutSec ?? ENV.chunkTimeoutSec;
    }

    async transcribe(audioPath: string, req: EngineRequest): Promise<RawWordToken[]> {
        const args = [...this.extraArgs, '--model', req.model, '--language', req.language, audioPath];
        const proc = execa(this.bin, args);
        let timedOut = false;
        let timeoutHandle: NodeJS.Timeout | null = null;
        if (this.timeoutSec > 0) {
            timeoutHandle = setTimeout(() => {
                if (!proc.killed) {
                    timedOut = true;
                    proc.kill('SIGKILL');
                    warn('engine.timeout', { idx: req.chunkIndex, timeoutSec: this.timeoutSec });
                }
            }, this.timeoutSec * 1000);
        }
        proc.stderr?.on('data', (d: Buffer) => {
            const line = d.toString().trim();
            if (!line) return;
            debug('engine.log', { idx: req.chunkIndex, line });
        });

        let stdout: string;
        try {
            ({ stdout } = await proc);
        } catch (e) {
            const message = timedOut
                ? `Engine timed out after ${this.timeoutSec}s on chunk ${req.chunkIndex}`
                : `Engine failed on chunk ${req.chunkIndex}: ${errorMessage(e)}`;
            throw new TranscriptionError(message, req.chunkIndex, { bin: this.bin }, { cause: e });
        } finally {
            if (timeoutHandle) clearTimeout(timeoutHandle);
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(stdout);
        } catch (e) {
            throw new TranscriptionError(
                'Engine output is not valid JSON',
                req.chunkIndex,
                { stdoutSnippet: stdout.slice(0, 200) },
                { cause: e }
            );
        }
        return parseWordTokens(parsed, req.chunkIndex);
    }

    // Each chunk runs in its own process, so device memory is returned when it exits.
    async releaseMemory(): Promise<void> {
        debug('engine.release', { bin: this.bin });
    }
}
