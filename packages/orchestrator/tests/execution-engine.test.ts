import { describe, it, expect, beforeEach } from 'vitest';
import { ExecutionEngine } from '../src/engine/engine.js';
import { OrchestrationTrace } from '../src/engine/trace.js';
import { QaRetryLoop } from '../src/engine/qa-loop.js';
import { buildPlan, deterministicPlan } from '../src/planning/resolver.js';
import { createContentRequest, type ContentRequestInput } from '../src/request.js';
import { FatalWorkerError, InvariantViolationError, TransientWorkerError } from '../src/errors.js';
import type { PlanSignals, Worker, WorkerContext, WorkerName, WorkerOutcome, WorkerResult } from '../src/types.js';

type Behaviour = (context: WorkerContext, call: number) => WorkerResult | Promise<WorkerResult>;

interface FakeWorker extends Worker {
  calls: WorkerContext[];
}

function fakeWorker(name: WorkerName, behaviour: Behaviour = () => ({ payload: `${name}-output` })): FakeWorker {
  const calls: WorkerContext[] = [];
  return {
    name,
    calls,
    async run(context) {
      calls.push(context);
      return behaviour(context, calls.length);
    },
  };
}

function request(overrides: Partial<ContentRequestInput> = {}) {
  return createContentRequest({ objective: 'Summer drop', brand_id: 'acme', build: true, ...overrides });
}

const NO_REFS: PlanSignals = {
  has_style_reference: false,
  has_local_brand_references: false,
  mentions_trends: false,
  wants_text: true,
};

function steps(outcomes: readonly WorkerOutcome[]): string[] {
  return outcomes.map((o) => `${o.step}:${o.status}:${o.attempt}`);
}

describe('ExecutionEngine', () => {
  let engine: ExecutionEngine;
  let workers: Map<WorkerName, FakeWorker>;

  beforeEach(() => {
    engine = new ExecutionEngine({ transient_retries: 2, retry_backoff_ms: 0, step_timeout_ms: 1000 });
    workers = new Map<WorkerName, FakeWorker>(
      (['research', 'copy', 'design', 'generate'] as const).map((name): [WorkerName, FakeWorker] => [name, fakeWorker(name)]),
    );
    workers.set('qa', fakeWorker('qa', () => ({ payload: { passed: true } })));
  });

  function use(worker: FakeWorker): FakeWorker {
    workers.set(worker.name, worker);
    return worker;
  }

  it('re-invokes generate once when QA rejects the first attempt', async () => {
    const req = request({ include_text: false, max_retries: 1 });
    const plan = deterministicPlan(req, { ...NO_REFS, has_style_reference: true });
    const generate = use(fakeWorker('generate', (_, call) => ({ payload: { image: `v${call}` } })));
    use(
      fakeWorker('qa', (_, call) => ({
        payload: call === 1 ? { passed: false, feedback: 'too dark' } : { passed: true, score: 0.9 },
      })),
    );

    const report = await engine.execute(plan, req, { runId: 'run-1', workers });

    expect(generate.calls).toHaveLength(2);
    expect(generate.calls[0].attempt).toBe(1);
    expect(generate.calls[0].feedback).toBeUndefined();
    expect(generate.calls[1].attempt).toBe(2);
    expect(generate.calls[1].feedback).toEqual({ passed: false, feedback: 'too dark' });
    expect(steps(report.trace.entries)).toEqual([
      'research:skipped:0',
      'copy:skipped:0',
      'design:succeeded:1',
      'generate:succeeded:1',
      'qa:succeeded:1',
      'generate:succeeded:2',
      'qa:succeeded:2',
    ]);
    expect(report.status).toBe('completed');
    expect(report.qa).toEqual({ resolution: 'accepted', attempts: 2 });
    expect(report.outputs.generate).toEqual({ image: 'v2' });
  });

  it('stops after max_retries + 1 attempts and degrades', async () => {
    const req = request({ max_retries: 2 });
    const generate = use(fakeWorker('generate'));
    use(fakeWorker('qa', () => ({ payload: { passed: false, feedback: 'off-brand' } })));

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-2', workers });

    expect(generate.calls).toHaveLength(3);
    expect(report.qa).toEqual({ resolution: 'exhausted', attempts: 3 });
    expect(report.status).toBe('degraded');
    expect(report.trace.status).toBe('degraded');
  });

  it('never invokes generate or qa when build=false', async () => {
    const req = request({ build: false });
    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-3', workers });

    expect(workers.get('generate')?.calls).toHaveLength(0);
    expect(workers.get('qa')?.calls).toHaveLength(0);
    expect(steps(report.trace.entries)).toEqual([
      'research:succeeded:1',
      'copy:succeeded:1',
      'design:skipped:0',
      'generate:skipped:0',
      'qa:skipped:0',
    ]);
    expect(report.qa).toEqual({ resolution: 'not_run', attempts: 0 });
    expect(report.status).toBe('completed');
  });

  it('runs generate once without QA when max_retries=0', async () => {
    const req = request({ max_retries: 0 });
    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-4', workers });

    expect(workers.get('generate')?.calls).toHaveLength(1);
    expect(workers.get('qa')?.calls).toHaveLength(0);
    expect(report.trace.entries[4]).toMatchObject({ step: 'qa', status: 'skipped', reason: 'max_retries=0' });
  });

  it('passes earlier outputs and collaborator config to later steps', async () => {
    const req = request({ max_retries: 0 });
    const design = use(fakeWorker('design'));

    await engine.execute(deterministicPlan(req, NO_REFS), req, {
      runId: 'run-5',
      workers,
      config: { products: ['sneaker'] },
    });

    expect(design.calls[0].outputs).toEqual({ research: 'research-output', copy: 'copy-output' });
    expect(design.calls[0].config).toEqual({ products: ['sneaker'] });
    expect(design.calls[0].run_id).toBe('run-5');
  });

  it('retries transient failures and records every try', async () => {
    const req = request({ build: false });
    use(
      fakeWorker('copy', (_, call) => {
        if (call < 3) throw new TransientWorkerError('rate limited');
        return { payload: 'copy-ok' };
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-6', workers });
    const copy = report.trace.entries.filter((o) => o.step === 'copy');

    expect(copy.map((o) => [o.status, o.retry, o.error_kind])).toEqual([
      ['failed', 0, 'transient'],
      ['failed', 1, 'transient'],
      ['succeeded', 2, undefined],
    ]);
    expect(report.status).toBe('completed');
  });

  it('records an exhausted transient step as failed and continues degraded', async () => {
    const req = request({ max_retries: 0 });
    const research = use(
      fakeWorker('research', () => {
        throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-7', workers });

    expect(research.calls).toHaveLength(3);
    expect(workers.get('design')?.calls).toHaveLength(1);
    expect(report.status).toBe('degraded');
    expect(report.trace.entries[2]).toMatchObject({
      step: 'research',
      status: 'failed',
      error_kind: 'transient',
      error_message: 'socket hang up',
      retry: 2,
    });
  });

  it('aborts the run on a fatal error', async () => {
    const req = request();
    use(
      fakeWorker('design', () => {
        throw new FatalWorkerError('bad brief');
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-8', workers });

    expect(report.status).toBe('failed');
    expect(report.error).toBe('design failed: bad brief');
    expect(workers.get('generate')?.calls).toHaveLength(0);
    expect(steps(report.trace.entries)).toEqual(['research:succeeded:1', 'copy:succeeded:1', 'design:failed:1']);
  });

  it('treats unrecognised errors as fatal', async () => {
    const req = request({ build: false });
    const research = use(
      fakeWorker('research', () => {
        throw new TypeError('undefined is not a function');
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-9', workers });

    expect(research.calls).toHaveLength(1);
    expect(report.status).toBe('failed');
    expect(report.trace.entries[0].error_kind).toBe('fatal');
  });

  it('fails the run when a planned step has no worker', async () => {
    const req = request({ max_retries: 0 });
    workers.delete('design');

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-10', workers });

    expect(report.status).toBe('failed');
    expect(report.error).toBe('No worker registered for step design');
  });

  it('rejects a malformed QA verdict as fatal', async () => {
    const req = request();
    use(fakeWorker('qa', () => ({ payload: { ok: true } })));

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-11', workers });

    expect(report.status).toBe('failed');
    expect(report.error).toMatch(/^qa failed: Malformed QA verdict/);
    expect(report.trace.entries.at(-1)).toMatchObject({ step: 'qa', status: 'failed', error_kind: 'fatal' });
  });

  it('counts a failed generate attempt against the QA budget', async () => {
    engine = new ExecutionEngine({ transient_retries: 0, retry_backoff_ms: 0, step_timeout_ms: 1000 });
    const req = request({ max_retries: 1 });
    use(
      fakeWorker('generate', (_, call) => {
        if (call === 1) throw new TransientWorkerError('upstream timeout');
        return { payload: 'image' };
      }),
    );
    const qa = use(fakeWorker('qa', () => ({ payload: { passed: true } })));

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-12', workers });

    expect(qa.calls).toHaveLength(1);
    expect(report.qa).toEqual({ resolution: 'accepted', attempts: 2 });
    expect(report.status).toBe('completed');
  });

  it('records a worker that misses its deadline as a transient failure', async () => {
    engine = new ExecutionEngine({ transient_retries: 0, retry_backoff_ms: 0, step_timeout_ms: 20 });
    const req = request({ build: false });
    use(fakeWorker('research', () => new Promise<WorkerResult>(() => undefined)));

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, { runId: 'run-13', workers });

    expect(report.trace.entries[0]).toMatchObject({
      step: 'research',
      status: 'failed',
      error_kind: 'transient',
      error_message: 'Worker exceeded its 20ms deadline',
    });
    expect(report.status).toBe('degraded');
  });

  it('seals cancelled when the signal aborts between steps', async () => {
    const req = request();
    const controller = new AbortController();
    use(
      fakeWorker('copy', () => {
        controller.abort();
        return { payload: 'copy' };
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, {
      runId: 'run-14',
      workers,
      signal: controller.signal,
    });

    expect(report.status).toBe('cancelled');
    expect(report.trace.status).toBe('cancelled');
    expect(report.trace.entries[0]).toMatchObject({ step: 'research', status: 'succeeded' });
    expect(workers.get('design')?.calls).toHaveLength(0);
  });

  it('lets an in-flight worker finish before sealing cancelled', async () => {
    const req = request();
    const controller = new AbortController();
    let workerSignal: AbortSignal | undefined;
    use(
      fakeWorker('research', async (context) => {
        workerSignal = context.signal;
        controller.abort();
        await new Promise((resolve) => setTimeout(resolve, 20));
        return { payload: 'late research' };
      }),
    );

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, {
      runId: 'run-14b',
      workers,
      signal: controller.signal,
    });

    expect(workerSignal?.aborted).toBe(true);
    expect(report.status).toBe('cancelled');
    expect(report.trace.entries.map((o) => [o.step, o.status])).toEqual([['research', 'succeeded']]);
    expect(report.outputs.research).toBe('late research');
    expect(workers.get('copy')?.calls).toHaveLength(0);
  });

  it('does nothing for an already-cancelled run', async () => {
    const req = request();
    const controller = new AbortController();
    controller.abort();

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, {
      runId: 'run-15',
      workers,
      signal: controller.signal,
    });

    expect(report.status).toBe('cancelled');
    expect(report.trace.entries).toEqual([]);
  });

  it('reports each outcome and sums cost', async () => {
    const req = request({ build: false });
    use(fakeWorker('research', () => ({ payload: 'r', cost_usd: 0.5 })));
    use(fakeWorker('copy', () => ({ payload: 'c', cost_usd: 0.25 })));
    const seen: string[] = [];

    const report = await engine.execute(deterministicPlan(req, NO_REFS), req, {
      runId: 'run-16',
      workers,
      onOutcome: (outcome) => {
        seen.push(outcome.step);
      },
    });

    expect(seen).toEqual(['research', 'copy', 'design', 'generate', 'qa']);
    expect(report.cost_usd).toBe(0.75);
    expect(Object.isFrozen(report.trace.entries)).toBe(true);
  });

  it('refuses a plan that runs qa without generate', async () => {
    const req = request();
    const plan = buildPlan(
      new Map<WorkerName, { run: boolean; reason: string }>([
        ['research', { run: false, reason: 'x' }],
        ['copy', { run: false, reason: 'x' }],
        ['design', { run: true, reason: 'x' }],
        ['generate', { run: false, reason: 'x' }],
        ['qa', { run: true, reason: 'x' }],
      ]),
      'llm',
      'hand-built',
    );

    await expect(engine.execute(plan, req, { runId: 'run-17', workers })).rejects.toThrow(InvariantViolationError);
  });
});

describe('QaRetryLoop', () => {
  it('walks generate, evaluate, retry and exhausted', () => {
    const loop = new QaRetryLoop(1);

    expect(loop.beginAttempt()).toBe(1);
    expect(loop.evaluate({ passed: false })).toBe('retry');
    loop.retry();
    expect(loop.beginAttempt()).toBe(2);
    expect(loop.evaluate({ passed: false })).toBe('exhausted');
    expect(loop.done).toBe(true);
    expect(loop.resolution()).toBe('exhausted');
  });

  it('accepts on a passing verdict', () => {
    const loop = new QaRetryLoop(3);
    loop.beginAttempt();
    expect(loop.evaluate({ passed: true })).toBe('accept');
    expect(loop.resolution()).toBe('accepted');
    expect(loop.attempts).toBe(1);
  });

  it('rejects out-of-order transitions', () => {
    const loop = new QaRetryLoop(1);
    expect(() => loop.evaluate({ passed: true })).toThrow(InvariantViolationError);
    expect(() => loop.retry()).toThrow(InvariantViolationError);
  });

  it('rejects a negative budget', () => {
    expect(() => new QaRetryLoop(-1)).toThrow(RangeError);
  });
});

describe('OrchestrationTrace', () => {
  it('refuses appends after sealing', () => {
    const trace = new OrchestrationTrace(() => 0);
    trace.append({
      step: 'research',
      success: true,
      status: 'skipped',
      attempt: 0,
      retry: 0,
      started_at: '1970-01-01T00:00:00.000Z',
      duration_ms: 0,
      cost_usd: 0,
    });

    const sealed = trace.seal('completed');

    expect(sealed).toMatchObject({ status: 'completed', sealed_at: '1970-01-01T00:00:00.000Z' });
    expect(sealed.entries).toHaveLength(1);
    expect(trace.seal('failed')).toBe(sealed);
    expect(() =>
      trace.append({
        step: 'copy',
        success: true,
        status: 'skipped',
        attempt: 0,
        retry: 0,
        started_at: '',
        duration_ms: 0,
        cost_usd: 0,
      }),
    ).toThrow(InvariantViolationError);
  });
});
