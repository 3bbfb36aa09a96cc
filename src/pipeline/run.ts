import path from "path";
import { ENV } from "./env";
import { assertReadableAudio, loadAudio } from "./audio";
import { type ConfigOverrides, resolvePipelineConfig } from "./config";
import { CommandTranscriptionEngine, type TranscriptionEngine } from "./engine";
import { errorMessage } from "./errors";
import { writeTranscript } from "./export";
import { closeLogFile, error, info, setLogFile } from "./log";
import { loadProfiles, selectProfile } from "./profiles";
import { type RunLedger, createRunLedger } from "./run_db";
import { WavFileStager } from "./staging";
import { createChunkingStrategy } from "./strategies";
import { TranscriptionPipeline } from "./transcribe";
import type { Chunk, ChunkProgress, PcmAudio, PipelineConfig, RunSummary, TranscriptResult } from "./types";
import { CommandVoiceActivityDetector, type VoiceActivityDetector } from "./vad";

export type AudioDecoder = (audioPath: string, sampleRate: number, workDir: string) => Promise<PcmAudio>;

/** Replaceable collaborators; the command-line adapters are used otherwise. */
export interface RunCollaborators {
  engine?: TranscriptionEngine;
  vad?: VoiceActivityDetector;
  decode?: AudioDecoder;
}

export interface RunOptions {
  outDir?: string;
  profile?: string;
  profilesFile?: string;
  overrides?: ConfigOverrides;
  logFile?: string;
  tempDir?: string;
  ledger?: RunLedger;
  collaborators?: RunCollaborators;
  onProgress?: (p: ChunkProgress) => void;
}

export interface RunResult {
  outputPath: string;
  result: TranscriptResult;
  summary: RunSummary;
}

export interface ChunkPlanEntry {
  index: number;
  start: number;
  end: number;
  startSec: number;
  endSec: number;
}

export async function resolveRunConfig(opts: RunOptions = {}): Promise<PipelineConfig> {
  const profiles = await loadProfiles(opts.profilesFile ?? ENV.profilesFile);
  return resolvePipelineConfig(selectProfile(profiles, opts.profile), opts.overrides);
}

/**
 * Full batch run for one file: validate options, decode, chunk, transcribe,
 * segment, write `<stem>.json`. Nothing is written when any stage fails.
 */
export async function runTranscriptionForFile(
  inputPath: string,
  opts: RunOptions = {}
): Promise<RunResult> {
  const config = await resolveRunConfig(opts);
  await assertReadableAudio(inputPath);

  if (opts.logFile) setLogFile(opts.logFile);
  const ledger = opts.ledger ?? createRunLedger();
  const runId = await ledger.start({
    inputPath: path.resolve(inputPath),
    mode: config.mode,
    model: config.model,
    language: config.language,
  });
  info("run.start", { inputPath, runId, mode: config.mode, model: config.model });
  const startTs = Date.now();

  let stager: WavFileStager | undefined;
  try {
    stager = await WavFileStager.create(opts.tempDir || undefined);
    const decode = opts.collaborators?.decode ?? loadAudio;
    const audio = await decode(inputPath, config.sampleRate, stager.workDir);
    const pipeline = new TranscriptionPipeline(config, {
      strategy: createChunkingStrategy(
        config,
        opts.collaborators?.vad ?? new CommandVoiceActivityDetector(stager)
      ),
      engine:
        opts.collaborators?.engine ??
        new CommandTranscriptionEngine({
          bin: config.engine.bin,
          extraArgs: config.engine.args,
          timeoutSec: config.chunkTimeoutSec,
        }),
      stager,
      onProgress: opts.onProgress,
    });
    const { result, summary } = await pipeline.run(audio);
    const outputPath = await writeTranscript(result, inputPath, opts.outDir ?? ENV.outputDir);
    await ledger.complete(runId, summary, outputPath);
    info("run.complete", { inputPath, runId, outputPath, durationMs: Date.now() - startTs, ...summary });
    return { outputPath, result, summary };
  } catch (e) {
    error("run.fail", { inputPath, runId, error: errorMessage(e) });
    await ledger.fail(runId, errorMessage(e));
    throw e;
  } finally {
    if (stager) await stager.dispose();
    if (opts.logFile) closeLogFile();
  }
}

/** Chunk boundaries the run would use, without calling the engine. */
export async function planChunksForFile(
  inputPath: string,
  opts: RunOptions = {}
): Promise<ChunkPlanEntry[]> {
  const config = await resolveRunConfig(opts);
  await assertReadableAudio(inputPath);
  const stager = await WavFileStager.create(opts.tempDir || undefined);
  try {
    const decode = opts.collaborators?.decode ?? loadAudio;
    const audio = await decode(inputPath, config.sampleRate, stager.workDir);
    const strategy = createChunkingStrategy(
      config,
      opts.collaborators?.vad ?? new CommandVoiceActivityDetector(stager)
    );
    const chunks = await strategy.plan(audio);
    return chunks.map((c: Chunk, index) => ({
      index,
      start: c.start,
      end: c.end,
      startSec: c.start / audio.sampleRate,
      endSec: c.end / audio.sampleRate,
    }));
  } finally {
    await stager.dispose();
  }
}
