import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, existsSync, readdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ArtifactStore, createRunId } from '../src/artifacts/store.js';
import { renderSummary } from '../src/artifacts/summary.js';
import { deterministicPlan } from '../src/planning/resolver.js';
import { createContentRequest } from '../src/request.js';
import { InvariantViolationError } from '../src/errors.js';
import type { ArtifactDocument, WorkerOutcome } from '../src/types.js';

const RUN_ID = 'run-20261018-070509-a1b2c3';

const OUTCOME: WorkerOutcome = {
  step: 'research',
  success: true,
  status: 'succeeded',
  payload: { recommended_styles: ['bold_color'] },
  attempt: 1,
  retry: 0,
  started_at: '2026-10-18T07:05:09.000Z',
  duration_ms: 12,
  cost_usd: 0,
};

function makeDocument(runId: string, status: ArtifactDocument['status'] = 'completed'): ArtifactDocument {
  const input = createContentRequest({ objective: 'Autumn launch', brand_id: 'acme', build: true, max_retries: 0 });
  const plan = deterministicPlan(input, {
    has_style_reference: false,
    has_local_brand_references: false,
    mentions_trends: false,
    wants_text: false,
  });
  return {
    run_id: runId,
    created_at: '2026-10-18T07:05:09.000Z',
    sealed_at: '2026-10-18T07:05:10.000Z',
    status,
    input,
    worker_plan: { sequence: plan.sequence, mode: plan.mode, reason: plan.reason, workers: plan.steps },
    orchestration_trace: [OUTCOME],
    input_translation: null,
    result: {
      status,
      cost_usd: 0.125,
      duration_ms: 1000,
      qa: { resolution: 'not_run', attempts: 0 },
      outputs: { research: OUTCOME.payload },
    },
  };
}

describe('ArtifactStore', () => {
  let dir: string;
  let store: ArtifactStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'crew-artifacts-'));
    store = new ArtifactStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps a run invisible until it is sealed', async () => {
    const ref = await store.withRun(RUN_ID, async (handle) => {
      await store.appendTrace(handle, OUTCOME);

      expect(await store.list()).toEqual([]);
      expect(await store.read(RUN_ID)).toBeUndefined();
      expect(existsSync(join(dir, '.staging', RUN_ID, 'trace.jsonl'))).toBe(true);

      return store.seal(handle, makeDocument(RUN_ID));
    });

    expect(ref).toEqual({
      run_id: RUN_ID,
      dir: join(dir, 'runs', RUN_ID),
      artifact_path: join(dir, 'runs', RUN_ID, 'artifacts.json'),
      summary_path: join(dir, 'runs', RUN_ID, 'report.md'),
    });
    expect(await store.list()).toEqual([RUN_ID]);
    expect(readdirSync(join(dir, '.staging'))).toEqual([]);
    expect(readdirSync(ref.dir).sort()).toEqual(['artifacts.json', 'report.md', 'trace.jsonl']);
  });

  it('stores the document and one trace line per outcome', async () => {
    await store.withRun(RUN_ID, async (handle) => {
      await store.appendTrace(handle, OUTCOME);
      await store.appendTrace(handle, { ...OUTCOME, step: 'copy', payload: undefined });
      await store.seal(handle, makeDocument(RUN_ID));
    });

    const stored = await store.read(RUN_ID);
    expect(stored?.run_id).toBe(RUN_ID);
    expect(stored?.status).toBe('completed');
    expect(stored?.worker_plan.sequence).toEqual(['research', 'design', 'generate']);
    expect(stored?.input).toMatchObject({ brand_id: 'acme', days: 3, build: true });

    const lines = readFileSync(join(dir, 'runs', RUN_ID, 'trace.jsonl'), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ step: 'copy', status: 'succeeded' });
  });

  it('returns the same reference on a second seal and writes nothing', async () => {
    await store.withRun(RUN_ID, async (handle) => {
      const first = await store.seal(handle, makeDocument(RUN_ID, 'completed'));
      const second = await store.seal(handle, makeDocument(RUN_ID, 'failed'));

      expect(second).toBe(first);
      const stored = JSON.parse(readFileSync(first.artifact_path, 'utf-8'));
      expect(stored.status).toBe('completed');
    });
  });

  it('rejects trace appends after the seal', async () => {
    await store.withRun(RUN_ID, async (handle) => {
      await store.seal(handle, makeDocument(RUN_ID));
      await expect(store.appendTrace(handle, OUTCOME)).rejects.toThrow(InvariantViolationError);
    });
  });

  it('discards the staging directory when the run fails before sealing', async () => {
    await expect(
      store.withRun(RUN_ID, async (handle) => {
        await store.appendTrace(handle, OUTCOME);
        throw new Error('worker exploded');
      }),
    ).rejects.toThrow('worker exploded');

    expect(existsSync(join(dir, '.staging', RUN_ID))).toBe(false);
    expect(await store.list()).toEqual([]);
    expect(store.openRuns).toBe(0);
  });

  it('refuses duplicate and unsafe run ids', async () => {
    await store.withRun(RUN_ID, async (handle) => {
      await store.seal(handle, makeDocument(RUN_ID));
    });

    await expect(store.open(RUN_ID)).rejects.toThrow(InvariantViolationError);
    await expect(store.open('../escape')).rejects.toThrow(InvariantViolationError);
    expect(await store.read('../escape')).toBeUndefined();
  });

  it('lets only one of two concurrent opens claim a run id', async () => {
    const results = await Promise.allSettled([store.open(RUN_ID), store.open(RUN_ID)]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(store.openRuns).toBe(1);
    const [claimed] = results;
    if (claimed.status !== 'fulfilled') throw new Error('first open should win');
    await store.appendTrace(claimed.value, OUTCOME);
    await store.release(claimed.value);
    expect(store.openRuns).toBe(0);
  });

  it('resolves a re-seal through a released handle from disk', async () => {
    const { released, first } = await store.withRun(RUN_ID, async (handle) => ({
      released: handle,
      first: await store.seal(handle, makeDocument(RUN_ID, 'completed')),
    }));

    const again = await store.seal(released, makeDocument(RUN_ID, 'failed'));

    expect(again).toEqual(first);
    expect(store.openRuns).toBe(0);
    expect(JSON.parse(readFileSync(first.artifact_path, 'utf-8')).status).toBe('completed');
  });

  it('refuses a document that belongs to another run', async () => {
    await store.withRun(RUN_ID, async (handle) => {
      await expect(store.seal(handle, makeDocument('run-other'))).rejects.toThrow(InvariantViolationError);
    });
  });

  it('generates run ids from the UTC timestamp', () => {
    const id = createRunId(new Date(Date.UTC(2026, 9, 18, 7, 5, 9)));
    expect(id).toMatch(/^run-20261018-070509-[0-9a-f]{6}$/);
  });
});

describe('renderSummary', () => {
  it('renders the run header, plan table and trace', () => {
    const lines = renderSummary(makeDocument(RUN_ID)).split('\n');

    expect(lines.slice(0, 12)).toEqual([
      `# Campaign Run ${RUN_ID}`,
      '',
      '- Brand: acme',
      '- Objective: Autumn launch',
      '- Days: 3',
      '- Build executed: true',
      '- Status: completed',
      '- Plan mode: fallback (fallback_policy)',
      '- Cost (USD): 0.1250',
      '- Duration: 1000 ms',
      '- QA: not_run after 0 attempt(s)',
      '',
    ]);
    expect(lines).toContain('| copy | no | no-text phrasing in request |');
    expect(lines).toContain('| qa | no | max_retries=0 |');
    expect(lines).toContain('- research: succeeded (attempt 1, retry 0, 12 ms)');
  });
});
