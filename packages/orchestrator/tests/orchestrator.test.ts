import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Orchestrator, type RunEvent } from '../src/orchestrator.js';
import { FsBrandReferenceProbe, type BrandReferenceProbe } from '../src/brands/probe.js';
import { DEFAULT_CONFIG, DEFAULT_INTENT_KEYWORDS } from '../src/config/schema.js';
import { createContentRequest, type ContentRequestInput } from '../src/request.js';
import { InvariantViolationError } from '../src/errors.js';
import type { Worker } from '../src/types.js';
import { FakeAdapterManager } from './fakes.js';

const SETTINGS = { ...DEFAULT_CONFIG, engine: { ...DEFAULT_CONFIG.engine, retry_backoff_ms: 0 } };

class StaticProbe implements BrandReferenceProbe {
  constructor(private present: boolean) {}
  async hasReferences(): Promise<boolean> {
    return this.present;
  }
}

function generator(payload: unknown = { size_bytes: 25_000 }): Worker {
  return {
    name: 'generate',
    async run() {
      return { payload, cost_usd: 0.5 };
    },
  };
}

function request(overrides: Partial<ContentRequestInput> = {}) {
  return createContentRequest({ objective: 'Autumn launch', brand_id: 'acme', build: true, ...overrides });
}

describe('Orchestrator', () => {
  let basePath: string;
  let orchestrator: Orchestrator;
  let events: Array<[RunEvent, unknown]>;

  beforeEach(() => {
    basePath = mkdtempSync(join(tmpdir(), 'crew-orchestrator-'));
    orchestrator = new Orchestrator({ basePath, settings: SETTINGS, keywords: DEFAULT_INTENT_KEYWORDS });
    events = [];
    orchestrator.setEventHandler((event, data) => events.push([event, data]));
  });

  afterEach(() => {
    rmSync(basePath, { recursive: true, force: true });
  });

  it('plans, runs and seals a campaign', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker(generator());

    const result = await orchestrator.runCampaign(request(), { runId: 'run-autumn' });

    expect(result.status).toBe('completed');
    expect(result.plan.sequence).toEqual(['copy', 'design', 'generate', 'qa']);
    expect(result.plan.mode).toBe('fallback');
    expect(result.plan.reason).toBe('fallback_policy_no_delegate');
    expect(result.qa).toEqual({ resolution: 'accepted', attempts: 1 });
    expect(result.cost_usd).toBe(0.5);
    expect(result.trace.entries.map((e) => [e.step, e.status])).toEqual([
      ['research', 'skipped'],
      ['copy', 'succeeded'],
      ['design', 'succeeded'],
      ['generate', 'succeeded'],
      ['qa', 'succeeded'],
    ]);
    expect(result.artifact.dir).toBe(join(basePath, 'outputs', 'runs', 'run-autumn'));
    expect(existsSync(result.artifact.summary_path)).toBe(true);

    const stored = await orchestrator.getArtifactStore().read('run-autumn');
    expect(stored?.status).toBe('completed');
    expect(stored?.input_translation).toBeNull();
    expect(stored?.orchestration_trace).toHaveLength(5);

    expect(events.map(([event]) => event)).toEqual([
      'run:started',
      'run:outcome',
      'run:outcome',
      'run:outcome',
      'run:outcome',
      'run:outcome',
      'run:completed',
    ]);
    expect(events[6][1]).toEqual({
      run_id: 'run-autumn',
      status: 'completed',
      sequence: ['copy', 'design', 'generate', 'qa'],
      mode: 'fallback',
      cost_usd: 0.5,
      artifact_dir: result.artifact.dir,
    });
  });

  it('completes the run when the event handler throws', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker(generator());
    orchestrator.setEventHandler((event) => {
      if (event === 'run:outcome') throw new Error('listener broke');
    });

    const result = await orchestrator.runCampaign(request(), { runId: 'run-noisy' });

    expect(result.status).toBe('completed');
    expect(result.trace.entries).toHaveLength(5);
    expect((await orchestrator.getArtifactStore().read('run-noisy'))?.status).toBe('completed');
  });

  it('skips research when a style reference is attached', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(false));
    const plan = await orchestrator.previewPlan(request({ style_ref_present: true }));
    expect(plan.steps[0]).toEqual({ name: 'research', will_run: false, reason: 'style references present', order: 0 });
  });

  it('runs research when the brand has no references', async () => {
    const research: Worker = {
      name: 'research',
      async run() {
        return { payload: { recommended_styles: ['bold_color'] } };
      },
    };
    orchestrator.registerWorker(research);
    orchestrator.registerWorker(generator());

    const result = await orchestrator.runCampaign(request({ include_text: false }));

    expect(result.plan.sequence).toEqual(['research', 'design', 'generate', 'qa']);
    expect(result.outputs.design).toMatchObject({ selected_style: 'bold_color' });
    expect(result.run_id).toMatch(/^run-\d{8}-\d{6}-[0-9a-f]{6}$/);
  });

  it('reads brand references from the brands directory', async () => {
    mkdirSync(join(basePath, 'brands', 'acme', 'references'), { recursive: true });
    writeFileSync(join(basePath, 'brands', 'acme', 'references', 'logo.PNG'), 'png');

    const plan = await orchestrator.previewPlan(request());

    expect(plan.steps[0].will_run).toBe(false);
    expect(await new FsBrandReferenceProbe(join(basePath, 'brands')).hasReferences('other')).toBe(false);
  });

  it('seals failed runs with the error', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker({
      name: 'generate',
      async run() {
        throw new Error('renderer missing');
      },
    });

    const result = await orchestrator.runCampaign(request(), { runId: 'run-broken' });

    expect(result.status).toBe('failed');
    const stored = await orchestrator.getArtifactStore().read('run-broken');
    expect(stored?.status).toBe('failed');
    expect(stored?.result).toMatchObject({ error: 'generate failed: renderer missing' });
  });

  it('seals cancelled runs', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker(generator());
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.runCampaign(request(), { signal: controller.signal });

    expect(result.status).toBe('cancelled');
    expect(await orchestrator.getArtifactStore().list()).toEqual([result.run_id]);
  });

  it('rejects and reports a run id that is already taken', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker(generator());
    await orchestrator.runCampaign(request({ build: false }), { runId: 'run-once' });
    events = [];

    await expect(orchestrator.runCampaign(request({ build: false }), { runId: 'run-once' })).rejects.toThrow(
      InvariantViolationError,
    );
    expect(events.map(([event]) => event)).toEqual(['run:started', 'run:failed']);
  });

  it('translates chat input before running', async () => {
    orchestrator.setBrandReferenceProbe(new StaticProbe(true));
    orchestrator.registerWorker(generator());

    const result = await orchestrator.runFromUserInput('acme', 'Autumn drop for 2 days, no text');

    expect(result.input_translation).toMatchObject({ mode: 'fallback', days: 2, include_text: false });
    expect(result.request.days).toBe(2);
    expect(result.plan.steps[1]).toMatchObject({ name: 'copy', will_run: false, reason: 'include_text=false' });
    const stored = await orchestrator.getArtifactStore().read(result.run_id);
    expect(stored?.input_translation).toMatchObject({ reason: 'heuristic_translation' });
  });

  it('reports missing workers and wires the adapter manager', () => {
    expect(orchestrator.getHealth()).toEqual({
      status: 'degraded',
      workers: ['copy', 'design', 'qa'],
      missing_workers: ['research', 'generate'],
      planning: 'deterministic',
      adapters: [],
      open_runs: 0,
    });

    orchestrator.setAdapterManager(FakeAdapterManager.replying('{}'));
    orchestrator.registerWorker(generator());

    expect(orchestrator.getHealth()).toMatchObject({
      status: 'healthy',
      missing_workers: [],
      planning: 'delegate',
      adapters: ['fake'],
    });
  });
});
