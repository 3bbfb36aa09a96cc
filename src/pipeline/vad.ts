import { execa } from 'execa';
import { ENV, splitArgs } from './env';
import { ChunkingError, errorMessage } from './errors';
import { startStep } from './log';
import { type AudioStager, withStagedAudio } from './staging';
import type { PcmAudio, SpeechInterval } from './types';

export interface VadDetectOptions {
    minSpeechMs: number;
    minSilenceMs: number;
}

/** Pure function from audio to ascending speech intervals (sample ranges). */
export interface VoiceActivityDetector {
    detect(audio: PcmAudio, opts: VadDetectOptions): Promise<SpeechInterval[]>;
}

export function parseIntervals(raw: unknown): SpeechInterval[] {
    const list =
        typeof raw === 'object' && raw !== null && 'intervals' in raw ? raw.intervals : raw;
    if (!Array.isArray(list)) {
        throw new ChunkingError('Voice-activity output must be an array of {start, end}');
    }
    return list.map((item: unknown, idx) => {
        if (
            typeof item !== 'object' ||
            item === null ||
            !('start' in item) ||
            !('end' in item) ||
            typeof item.start !== 'number' ||
            typeof item.end !== 'number'
        ) {
            throw new ChunkingError(`Voice-activity interval ${idx} is malformed`, { idx });
        }
        return { start: item.start, end: item.end };
    });
}

/**
 * Runs an external detector over the staged audio. The command receives the
 * WAV path and thresholds after any extra args and prints a JSON list of
 * sample ranges.
 */
export class CommandVoiceActivityDetector implements VoiceActivityDetector {
    constructor(
        private readonly stager: AudioStager,
        private readonly bin: string = ENV.vadBin,
        private readonly extraArgs: string[] = splitArgs(ENV.vadArgs)
    ) {}

    async detect(audio: PcmAudio, opts: VadDetectOptions): Promise<SpeechInterval[]> {
        return withStagedAudio(this.stager, audio.samples, audio.sampleRate, 'vad_input', async (staged) => {
            const timer = startStep('vad.detect', { bin: this.bin });
            let stdout: string;
            try {
                ({ stdout } = await execa(this.bin, [
                    ...this.extraArgs,
                    staged.path,
                    '--sample-rate',
                    String(audio.sampleRate),
                    '--min-speech-ms',
                    String(opts.minSpeechMs),
                    '--min-silence-ms',
                    String(opts.minSilenceMs),
                ]));
            } catch (e) {
                throw new ChunkingError(
                    `Voice-activity detection failed: ${errorMessage(e)}`,
                    { bin: this.bin },
                    { cause: e }
                );
            }
            let parsed: unknown;
            try {
                parsed = JSON.parse(stdout);
            } catch (e) {
                throw new ChunkingError(
                    'Voice-activity output is not valid JSON',
                    { bin: this.bin, stdoutSnippet: stdout.slice(0, 200) },
                    { cause: e }
                );
            }
            const intervals = parseIntervals(parsed);
            timer.end({ intervals: intervals.length });
            return intervals;
        });
    }
}
