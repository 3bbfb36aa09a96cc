import pg from 'pg';
import type { Client } from 'pg';
import { ENV } from './env';
import { errorMessage } from './errors';
import { debug, warn } from './log';
import type { ChunkMode, RunSummary } from './types';

export interface NewRunRecord {
  inputPath: string;
  mode: ChunkMode;
  model: string;
  language: string;
}

/** Persistent record of pipeline runs; never affects the transcript itself. */
export interface RunLedger {
  start(rec: NewRunRecord): Promise<string | null>;
  complete(runId: string | null, summary: RunSummary, outputPath: string): Promise<void>;
  fail(runId: string | null, message: string): Promise<void>;
}

export async function withPg<T>(databaseUrl: string, fn: (c: Client) => Promise<T>): Promise<T> {
  const client = new pg.Client({ connectionString: databaseUrl });
  try {
    await client.connect();
  } catch (e) {
    warn('db.connect.fail', { url: redactUrl(databaseUrl), error: errorMessage(e) });
    throw e;
  }
  try {
    return await fn(client);
  } finally {
    try { await client.end(); } catch (e) { debug('db.end.fail', { error: errorMessage(e) }); }
  }
}

export function redactUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

export async function insertRun(client: Client, rec: NewRunRecord): Promise<string> {
  const res = await client.query<{ id: string }>(
    `INSERT INTO runs (input_path, mode, model, language, status)
     VALUES ($1,$2,$3,$4,'started') RETURNING id`,
    [rec.inputPath, rec.mode, rec.model, rec.language]
  );
  return res.rows[0].id;
}

export async function completeRun(
  client: Client,
  runId: string,
  summary: RunSummary,
  outputPath: string
) {
  await client.query(
    `UPDATE runs
        SET status='completed', chunk_count=$2, word_count=$3, segment_count=$4,
            failed_chunks=$5, output_path=$6, finished_at=now()
      WHERE id=$1`,
    [runId, summary.chunks, summary.words, summary.segments, summary.failedChunks, outputPath]
  );
}

export async function failRun(client: Client, runId: string, message: string) {
  await client.query(
    `UPDATE runs SET status='failed', error=$2, finished_at=now() WHERE id=$1`,
    [runId, message]
  );
}

/** Ledger failures are logged and otherwise ignored. */
export class PgRunLedger implements RunLedger {
  constructor(private readonly databaseUrl: string) {}

  async start(rec: NewRunRecord): Promise<string | null> {
    try {
      return await withPg(this.databaseUrl, (c) => insertRun(c, rec));
    } catch (e) {
      warn('run.db.start.fail', { error: errorMessage(e), dbUrl: redactUrl(this.databaseUrl) });
      return null;
    }
  }

  async complete(runId: string | null, summary: RunSummary, outputPath: string): Promise<void> {
    if (!runId) return;
    try {
      await withPg(this.databaseUrl, (c) => completeRun(c, runId, summary, outputPath));
    } catch (e) {
      warn('run.db.complete.fail', { runId, error: errorMessage(e) });
    }
  }

  async fail(runId: string | null, message: string): Promise<void> {
    if (!runId) return;
    try {
      await withPg(this.databaseUrl, (c) => failRun(c, runId, message));
    } catch (e) {
      warn('run.db.fail.fail', { runId, error: errorMessage(e) });
    }
  }
}

export const noopRunLedger: RunLedger = {
  start: async () => null,
  complete: async () => undefined,
  fail: async () => undefined,
};

export function createRunLedger(databaseUrl: string = ENV.databaseUrl): RunLedger {
  if (!databaseUrl) {
    debug('db.disabled', { reason: 'DATABASE_URL not set' });
    return noopRunLedger;
  }
  return new PgRunLedger(databaseUrl);
}
