import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { encodeWav } from './audio';
import { ENV } from './env';
import { errorMessage } from './errors';
import { debug } from './log';

export interface StagedAudio {
    path: string;
    release: () => Promise<void>;
}

/** Writes audio where an external collaborator can read it. */
export interface AudioStager {
    readonly workDir: string;
    stage(samples: Float32Array, sampleRate: number, label: string): Promise<StagedAudio>;
    dispose(): Promise<void>;
}

/** Cleanup never fails the run; a file that is already gone is fine. */
export async function removeQuietly(target: string): Promise<void> {
    try {
        await fs.remove(target);
    } catch (e) {
        debug('staging.cleanup.fail', { path: target, error: errorMessage(e) });
    }
}

export class WavFileStager implements AudioStager {
    private constructor(readonly workDir: string) {}

    static async create(root: string = ENV.tempDir || os.tmpdir()): Promise<WavFileStager> {
        await fs.ensureDir(root);
        const workDir = await fs.mkdtemp(path.join(root, 'chunkscribe-'));
        debug('staging.create', { workDir });
        return new WavFileStager(workDir);
    }

    async stage(samples: Float32Array, sampleRate: number, label: string): Promise<StagedAudio> {
        const filePath = path.join(this.workDir, `${label}.wav`);
        await fs.writeFile(filePath, encodeWav(samples, sampleRate));
        return { path: filePath, release: () => removeQuietly(filePath) };
    }

    async dispose(): Promise<void> {
        await removeQuietly(this.workDir);
    }
}

/** Scoped staging: the file is released on every exit path of `fn`. */
export async function withStagedAudio<T>(
    stager: AudioStager,
    samples: Float32Array,
    sampleRate: number,
    label: string,
    fn: (staged: StagedAudio) => Promise<T>
): Promise<T> {
    const staged = await stager.stage(samples, sampleRate, label);
    try {
        return await fn(staged);
    } finally {
        await staged.release();
    }
}
