/**
 * Small QA gate over the generate payload. Expects
 * `{ error?, output_path?, size_bytes? }` from the generator.
 */

import { stat } from 'node:fs/promises';
import { readNumber, readString } from './payload.js';
import type { QaVerdict, Worker, WorkerContext, WorkerResult } from '../types.js';

export const MIN_OUTPUT_BYTES = 20_000;

export interface QaCriticOptions {
  minOutputBytes?: number;
}

async function fileSize(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

export class QaCriticWorker implements Worker {
  readonly name = 'qa';
  private minOutputBytes: number;

  constructor(options: QaCriticOptions = {}) {
    this.minOutputBytes = options.minOutputBytes ?? MIN_OUTPUT_BYTES;
  }

  async run(context: WorkerContext): Promise<WorkerResult> {
    return { payload: await this.evaluate(context.outputs.generate) };
  }

  async evaluate(generated: unknown): Promise<QaVerdict> {
    const error = readString(generated, 'error');
    if (error) {
      return { passed: false, reason: 'generation_error', feedback: error };
    }

    const path = readString(generated, 'output_path');
    const size = readNumber(generated, 'size_bytes') ?? (path ? await fileSize(path) : undefined);
    if (size === undefined) {
      return { passed: false, reason: 'missing_output', feedback: 'No output found after generation.' };
    }

    if (size < this.minOutputBytes) {
      return {
        passed: false,
        reason: 'suspicious_small_output',
        feedback: `Generated output too small (${size} bytes).`,
      };
    }

    return { passed: true, reason: 'passed', feedback: `Output looks valid (${size} bytes).` };
  }
}
