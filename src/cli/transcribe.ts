import path from "path";
import { ENV } from "../pipeline/env";
import { errorMessage } from "../pipeline/errors";
import { error } from "../pipeline/log";
import { runTranscriptionForFile } from "../pipeline/run";
import { applyLogArgs, baseCli, overridesFromArgs } from "./options";

async function main() {
  const argv = await baseCli()
    .option("out", { type: "string", default: ENV.outputDir, describe: "Output directory" })
    .option("gap-threshold", { type: "number", describe: "Pause that starts a new segment (s)" })
    .option("max-duration", { type: "number", describe: "Segment length that forces a break (s)" })
    .option("break-policy", { type: "string", choices: ["timing", "word-boundary"] })
    .option("join", { type: "string", choices: ["space", "concat"] })
    .option("model", { type: "string" })
    .option("language", { type: "string", describe: "Language code, passed through unchanged" })
    .option("on-chunk-error", { type: "string", choices: ["fail", "skip"] })
    .option("chunk-timeout", { type: "number", describe: "Per-chunk engine timeout (s), 0 disables" })
    .option("log-file", { type: "string", describe: "Also append JSON log lines to this file" })
    .parse();

  applyLogArgs(argv);
  const res = await runTranscriptionForFile(argv.input, {
    outDir: argv.out,
    profile: argv.profile,
    profilesFile: argv["profiles-file"],
    overrides: overridesFromArgs(argv),
    logFile: argv["log-file"],
  });
  console.log("Transcript:", path.resolve(res.outputPath));
  console.log(
    `Segments: ${res.summary.segments}  Words: ${res.summary.words}  Chunks: ${res.summary.chunks}` +
      (res.summary.failedChunks.length ? `  Skipped chunks: ${res.summary.failedChunks.join(", ")}` : "")
  );
}

main().catch((e) => {
  error("cli.fatal", { error: errorMessage(e) });
  console.error(String(e));
  process.exit(1);
});
