import fs from "fs-extra";
import path from "path";
import type { TranscriptResult } from "./types";

export function transcriptPathFor(inputPath: string, outDir: string): string {
  const stem = path.parse(inputPath).name;
  return path.join(outDir, `${stem}.json`);
}

/** Writes `{segments, language}` as `<outDir>/<input stem>.json`. */
export async function writeTranscript(
  result: TranscriptResult,
  inputPath: string,
  outDir: string
): Promise<string> {
  await fs.ensureDir(outDir);
  const outPath = transcriptPathFor(inputPath, outDir);
  await fs.writeJson(outPath, result, { spaces: 2 });
  return outPath;
}
