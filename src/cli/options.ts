import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import {
  type ConfigOverrides,
  parseBreakPolicy,
  parseChunkErrorPolicy,
  parseMode,
  parseTextJoin,
} from "../pipeline/config";
import { isLogLevel, setLogFormat, setLogLevel } from "../pipeline/log";

/** Options shared by every command that chunks audio. */
export function baseCli(argv: string[] = hideBin(process.argv)) {
  return yargs(argv)
    .option("input", { type: "string", demandOption: true, describe: "Audio file to process" })
    .option("profile", { type: "string", describe: "Named profile from the profiles file" })
    .option("profiles-file", { type: "string", describe: "Path to profiles JSON" })
    .option("mode", { type: "string", choices: ["vad", "window"], describe: "Chunking mode" })
    .option("merge-gap", { type: "number", describe: "VAD: merge pauses shorter than this (s)" })
    .option("max-chunk", { type: "number", describe: "VAD: soft maximum chunk length (s)" })
    .option("split-gap", { type: "number", describe: "VAD: minimum pause to split an oversized chunk (s)" })
    .option("min-speech-ms", { type: "number" })
    .option("min-silence-ms", { type: "number" })
    .option("chunk-duration", { type: "number", describe: "Window: chunk length (s)" })
    .option("overlap", { type: "number", describe: "Window: overlap between chunks (s)" })
    .option("log-level", { type: "string", choices: ["debug", "info", "warn", "error"] })
    .option("log-format", { type: "string", choices: ["json", "pretty"] })
    .strict()
    .help();
}

export interface OverrideArgs {
  mode?: string;
  "merge-gap"?: number;
  "max-chunk"?: number;
  "split-gap"?: number;
  "min-speech-ms"?: number;
  "min-silence-ms"?: number;
  "chunk-duration"?: number;
  overlap?: number;
  "gap-threshold"?: number;
  "max-duration"?: number;
  "break-policy"?: string;
  join?: string;
  model?: string;
  language?: string;
  "on-chunk-error"?: string;
  "chunk-timeout"?: number;
}

export function overridesFromArgs(argv: OverrideArgs): ConfigOverrides {
  return {
    mode: argv.mode === undefined ? undefined : parseMode(argv.mode),
    model: argv.model,
    language: argv.language,
    onChunkError:
      argv["on-chunk-error"] === undefined ? undefined : parseChunkErrorPolicy(argv["on-chunk-error"]),
    chunkTimeoutSec: argv["chunk-timeout"],
    vad: {
      mergeGap: argv["merge-gap"],
      maxChunk: argv["max-chunk"],
      splitGap: argv["split-gap"],
      minSpeechMs: argv["min-speech-ms"],
      minSilenceMs: argv["min-silence-ms"],
    },
    window: {
      chunkDuration: argv["chunk-duration"],
      overlap: argv.overlap,
    },
    segments: {
      gapThreshold: argv["gap-threshold"],
      maxDuration: argv["max-duration"],
      breakPolicy: argv["break-policy"] === undefined ? undefined : parseBreakPolicy(argv["break-policy"]),
      join: argv.join === undefined ? undefined : parseTextJoin(argv.join),
    },
  };
}

export function applyLogArgs(argv: { "log-level"?: string; "log-format"?: string }) {
  const level = argv["log-level"];
  const format = argv["log-format"];
  if (isLogLevel(level)) setLogLevel(level);
  if (format === "pretty" || format === "json") setLogFormat(format);
}
