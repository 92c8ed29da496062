/**
 * File-system artifact store.
 *
 * Layout under the base directory:
 *   .staging/<runId>/   in-flight run (trace.jsonl)
 *   runs/<runId>/       sealed run (trace.jsonl, artifacts.json, report.md)
 *
 * A run becomes visible only when seal() renames its staging directory into
 * runs/. Released-but-unsealed staging directories are discarded.
 */

import { appendFile, mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { join } from 'node:path';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { InvariantViolationError } from '../errors.js';
import { isSafeSlug } from '../request.js';
import { renderSummary } from './summary.js';
import type { ArtifactDocument, ArtifactRef, WorkerOutcome } from '../types.js';

const logger = createLogger('artifact-store');

export const ARTIFACT_FILE = 'artifacts.json';
export const SUMMARY_FILE = 'report.md';
export const TRACE_FILE = 'trace.jsonl';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RunHandle {
  readonly run_id: string;
  readonly staging_dir: string;
  readonly created_at: string;
}

interface OpenRun {
  handle: RunHandle;
  /** Serialises trace appends and the seal for one run. */
  queue: Promise<void>;
  sealing?: Promise<ArtifactRef>;
  sealed?: ArtifactRef;
}

const StoredArtifactSchema = z
  .object({
    run_id: z.string(),
    created_at: z.string(),
    sealed_at: z.string(),
    status: z.enum(['completed', 'degraded', 'failed', 'cancelled']),
    input: z.record(z.unknown()),
    worker_plan: z
      .object({
        sequence: z.array(z.string()),
        mode: z.string(),
        reason: z.string(),
      })
      .passthrough(),
    orchestration_trace: z.array(z.record(z.unknown())),
    input_translation: z.unknown(),
    result: z.record(z.unknown()),
  })
  .passthrough();

export type StoredArtifact = z.infer<typeof StoredArtifactSchema>;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * run-YYYYMMDD-HHMMSS-<6 hex>, in UTC.
 */
export function createRunId(date: Date = new Date()): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `run-${day}-${time}-${randomBytes(3).toString('hex')}`;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if (isMissing(err)) return false;
    throw err;
  }
}

// ─── Artifact Store ─────────────────────────────────────────────────────────

export class ArtifactStore {
  private active: Map<string, OpenRun> = new Map();
  private readonly runsDir: string;
  private readonly stagingDir: string;

  constructor(
    readonly baseDir: string,
    private now: () => number = Date.now,
  ) {
    this.runsDir = join(baseDir, 'runs');
    this.stagingDir = join(baseDir, '.staging');
  }

  /**
   * Reserve a run id and create its staging directory.
   */
  async open(runId: string = createRunId(new Date(this.now()))): Promise<RunHandle> {
    if (!isSafeSlug(runId)) {
      throw new InvariantViolationError(`Unsafe run id: ${runId}`);
    }
    if (this.active.has(runId)) {
      throw new InvariantViolationError(`Run ${runId} already exists`);
    }

    const handle: RunHandle = Object.freeze({
      run_id: runId,
      staging_dir: join(this.stagingDir, runId),
      created_at: new Date(this.now()).toISOString(),
    });
    // Claimed before the first await so a concurrent open of the same id fails.
    this.active.set(runId, { handle, queue: Promise.resolve() });

    try {
      if (await exists(join(this.runsDir, runId))) {
        throw new InvariantViolationError(`Run ${runId} already exists`);
      }
      await mkdir(handle.staging_dir, { recursive: true });
      await writeFile(join(handle.staging_dir, TRACE_FILE), '');
    } catch (err) {
      this.active.delete(runId);
      throw err;
    }

    logger.debug({ run: runId }, 'Run opened');
    return handle;
  }

  /**
   * Open a run, hand it to fn, and release it on every exit path.
   */
  async withRun<T>(runId: string | undefined, fn: (handle: RunHandle) => Promise<T>): Promise<T> {
    const handle = await this.open(runId);
    try {
      return await fn(handle);
    } finally {
      await this.release(handle);
    }
  }

  /**
   * Append one outcome as a JSON line. Rejected once the run is sealed.
   */
  async appendTrace(handle: RunHandle, outcome: WorkerOutcome): Promise<void> {
    const run = this.requireOpen(handle);
    if (run.sealing) {
      throw new InvariantViolationError(`Run ${handle.run_id} is sealed`);
    }
    const line = `${JSON.stringify(outcome)}\n`;
    const next = run.queue.then(() => appendFile(join(handle.staging_dir, TRACE_FILE), line));
    run.queue = next.catch(() => undefined);
    await next;
  }

  /**
   * Write artifacts.json and report.md, then publish the run atomically.
   * Sealing again returns the same reference and writes nothing.
   */
  async seal(handle: RunHandle, document: ArtifactDocument): Promise<ArtifactRef> {
    const open = this.active.get(handle.run_id);
    if (!open && (await exists(join(this.runsDir, handle.run_id, ARTIFACT_FILE)))) {
      return this.refFor(handle.run_id);
    }
    const run = this.requireOpen(handle);
    if (run.sealed) return run.sealed;
    if (run.sealing) return run.sealing;
    if (document.run_id !== handle.run_id) {
      throw new InvariantViolationError(`Document for ${document.run_id} sealed into run ${handle.run_id}`);
    }

    const sealing = this.publish(run, document);
    run.sealing = sealing;
    try {
      return await sealing;
    } catch (err) {
      run.sealing = undefined;
      throw err;
    }
  }

  /**
   * Forget an open run. Unsealed staging output is deleted.
   */
  async release(handle: RunHandle): Promise<void> {
    const run = this.active.get(handle.run_id);
    if (!run) return;
    this.active.delete(handle.run_id);
    await run.queue;
    if (run.sealing) {
      await run.sealing.catch((err: unknown) => {
        logger.error({ run: handle.run_id, err }, 'Seal failed before release');
      });
    }
    if (!run.sealed) {
      await rm(handle.staging_dir, { recursive: true, force: true });
      logger.warn({ run: handle.run_id }, 'Unsealed run discarded');
    }
  }

  /**
   * Load a sealed run's document, or undefined when no such run is visible.
   */
  async read(runId: string): Promise<StoredArtifact | undefined> {
    if (!isSafeSlug(runId)) return undefined;
    let raw: string;
    try {
      raw = await readFile(join(this.runsDir, runId, ARTIFACT_FILE), 'utf-8');
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    const parsed = StoredArtifactSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new InvariantViolationError(`Stored artifact for ${runId} is malformed`);
    }
    return parsed.data;
  }

  /**
   * Sealed run ids, oldest first.
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.runsDir, { withFileTypes: true });
      return entries
        .filter((e) => e.isDirectory() && isSafeSlug(e.name))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
  }

  get openRuns(): number {
    return this.active.size;
  }

  private async publish(run: OpenRun, document: ArtifactDocument): Promise<ArtifactRef> {
    const { handle } = run;
    await run.queue;

    const dir = join(this.runsDir, handle.run_id);
    await writeFile(join(handle.staging_dir, ARTIFACT_FILE), `${JSON.stringify(document, null, 2)}\n`);
    await writeFile(join(handle.staging_dir, SUMMARY_FILE), renderSummary(document));
    await mkdir(this.runsDir, { recursive: true });
    await rename(handle.staging_dir, dir);

    const ref = this.refFor(handle.run_id);
    run.sealed = ref;
    logger.info({ run: handle.run_id, status: document.status, dir }, 'Run sealed');
    return ref;
  }

  private refFor(runId: string): ArtifactRef {
    const dir = join(this.runsDir, runId);
    return {
      run_id: runId,
      dir,
      artifact_path: join(dir, ARTIFACT_FILE),
      summary_path: join(dir, SUMMARY_FILE),
    };
  }

  private requireOpen(handle: RunHandle): OpenRun {
    const run = this.active.get(handle.run_id);
    if (!run || run.handle !== handle) {
      throw new InvariantViolationError(`Run ${handle.run_id} is not open`);
    }
    return run;
  }
}
