import * as dotenv from 'dotenv';
dotenv.config();

export const ENV = {
    // Optional: run ledger. Empty disables it.
    databaseUrl: process.env.DATABASE_URL || '',
    outputDir: process.env.OUTPUT_DIR || 'transcripts',
    // Staging area for per-chunk WAV files; defaults to the OS temp dir
    tempDir: process.env.TEMP_DIR || '',
    profilesFile: process.env.PROFILES_FILE || 'config/profiles.json',
    mode: process.env.CHUNK_MODE || 'vad',
    sampleRate: Number(process.env.SAMPLE_RATE || 16000),
    vadMinSpeechMs: Number(process.env.VAD_MIN_SPEECH_MS || 250),
    vadMinSilenceMs: Number(process.env.VAD_MIN_SILENCE_MS || 100),
    vadMergeGap: Number(process.env.VAD_MERGE_GAP || 10),
    vadMaxChunk: Number(process.env.VAD_MAX_CHUNK || 300),
    vadSplitGap: Number(process.env.VAD_SPLIT_GAP || 0.5),
    chunkDuration: Number(process.env.WINDOW_CHUNK_DURATION || 300),
    overlap: Number(process.env.WINDOW_OVERLAP || 5),
    gapThreshold: Number(process.env.GAP_THRESHOLD || 0.4),
    maxSegmentDuration: Number(process.env.MAX_SEGMENT_DURATION || 10),
    breakPolicy: process.env.BREAK_POLICY || 'timing',
    textJoin: process.env.TEXT_JOIN || 'space',
    model: process.env.ENGINE_MODEL || 'nvidia/parakeet-tdt-0.6b-v3',
    language: process.env.TRANSCRIPT_LANGUAGE || 'en',
    onChunkError: process.env.ON_CHUNK_ERROR || 'fail',
    // Watchdog timeout (seconds) for a single chunk transcription. 0 disables.
    chunkTimeoutSec: Number(process.env.CHUNK_TIMEOUT_SEC || 0),
    // External collaborators: word-level engine and voice-activity detector
    engineBin: process.env.ENGINE_BIN || 'transcribe-words',
    // Extra engine args (space-separated), e.g. "--device cuda --compute-type float16"
    engineArgs: process.env.ENGINE_ARGS || '',
    vadBin: process.env.VAD_BIN || 'detect-speech',
    vadArgs: process.env.VAD_ARGS || '',
    ffmpegBin: process.env.FFMPEG_BIN || 'ffmpeg',
};

export function splitArgs(raw: string): string[] {
    return raw
        .split(' ')
        .map((s) => s.trim())
        .filter(Boolean);
}
