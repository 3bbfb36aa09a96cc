import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { InputError, errorMessage } from './errors';
import { info } from './log';
import type { Chunk, PcmAudio } from './types';

const WAV_HEADER_BYTES = 44;
const BITS_PER_SAMPLE = 16;

export async function assertReadableAudio(audioPath: string): Promise<void> {
    if (!(await fs.pathExists(audioPath))) {
        throw new InputError(`Input audio not found: ${audioPath}`, { audioPath });
    }
    const stat = await fs.stat(audioPath);
    if (!stat.isFile()) {
        throw new InputError(`Input audio is not a file: ${audioPath}`, { audioPath });
    }
    if (stat.size === 0) {
        throw new InputError(`Input audio is empty (0 bytes): ${audioPath}`, { audioPath });
    }
}

export function decodeFloat32LE(buf: Buffer): Float32Array {
    const count = Math.floor(buf.length / 4);
    const samples = new Float32Array(count);
    for (let i = 0; i < count; i++) {
        samples[i] = buf.readFloatLE(i * 4);
    }
    return samples;
}

/**
 * Decodes any ffmpeg-readable input to mono float PCM at `sampleRate`.
 * The raw stream goes through a scratch file in `workDir`.
 */
export async function loadAudio(
    audioPath: string,
    sampleRate: number,
    workDir: string,
    ffmpegBin = ENV.ffmpegBin
): Promise<PcmAudio> {
    await assertReadableAudio(audioPath);
    await fs.ensureDir(workDir);
    const rawPath = path.join(workDir, 'decoded.f32');
    try {
        await execa(ffmpegBin, [
            '-y',
            '-loglevel',
            'error',
            '-hide_banner',
            '-nostdin',
            '-i',
            audioPath,
            '-vn',
            '-sn',
            '-ac',
            '1',
            '-ar',
            String(sampleRate),
            '-acodec',
            'pcm_f32le',
            '-f',
            'f32le',
            rawPath,
        ]);
    } catch (e) {
        throw new InputError(
            `ffmpeg failed to decode ${audioPath}. Check that it is a valid audio file. Underlying error: ${errorMessage(e)}`,
            { audioPath },
            { cause: e }
        );
    }
    try {
        const samples = decodeFloat32LE(await fs.readFile(rawPath));
        info('audio.load', { audioPath, sampleRate, durationSec: samples.length / sampleRate });
        return { samples, sampleRate };
    } finally {
        await fs.remove(rawPath);
    }
}

export function sliceSamples(audio: PcmAudio, chunk: Chunk): Float32Array {
    return audio.samples.subarray(chunk.start, chunk.end);
}

/** 16-bit PCM mono WAV: 44-byte header followed by little-endian samples. */
export function encodeWav(samples: Float32Array, sampleRate: number): Buffer {
    const bytesPerSample = BITS_PER_SAMPLE / 8;
    const dataSize = samples.length * bytesPerSample;
    const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataSize);
    let offset = 0;

    // RIFF header
    buffer.write('RIFF', offset);
    offset += 4;
    buffer.writeUInt32LE(buffer.length - 8, offset);
    offset += 4;
    buffer.write('WAVE', offset);
    offset += 4;

    // fmt subchunk
    buffer.write('fmt ', offset);
    offset += 4;
    buffer.writeUInt32LE(16, offset);
    offset += 4; // Subchunk1Size (16 for PCM)
    buffer.writeUInt16LE(1, offset);
    offset += 2; // AudioFormat (1 = PCM)
    buffer.writeUInt16LE(1, offset);
    offset += 2; // NumChannels
    buffer.writeUInt32LE(sampleRate, offset);
    offset += 4;
    buffer.writeUInt32LE(sampleRate * bytesPerSample, offset);
    offset += 4; // ByteRate
    buffer.writeUInt16LE(bytesPerSample, offset);
    offset += 2; // BlockAlign
    buffer.writeUInt16LE(BITS_PER_SAMPLE, offset);
    offset += 2;

    // data subchunk
    buffer.write('data', offset);
    offset += 4;
    buffer.writeUInt32LE(dataSize, offset);
    offset += 4;

    for (const s of samples) {
        const clamped = Math.max(-1, Math.min(1, s));
        const v = clamped < 0 ? clamped * 0x8000 : clamped * 0x7fff;
        buffer.writeInt16LE(Math.round(v), offset);
        offset += bytesPerSample;
    }
    return buffer;
}
