/**
 * Worker implementations keyed by step name.
 */

import { createLogger } from '../logger.js';
import type { Worker, WorkerName } from '../types.js';

const logger = createLogger('worker-registry');

export class WorkerRegistry {
  private workers: Map<WorkerName, Worker> = new Map();

  constructor(workers: Worker[] = []) {
    for (const worker of workers) this.workers.set(worker.name, worker);
  }

  /**
   * Register a worker, replacing any previous one for the same step.
   */
  register(worker: Worker): void {
    const replaced = this.workers.has(worker.name);
    this.workers.set(worker.name, worker);
    logger.info({ step: worker.name, replaced }, 'Worker registered');
  }

  get(name: WorkerName): Worker | undefined {
    return this.workers.get(name);
  }

  has(name: WorkerName): boolean {
    return this.workers.has(name);
  }

  list(): WorkerName[] {
    return Array.from(this.workers.keys());
  }
}
