/**
 * Campaign orchestrator — the facade that connects the pieces.
 *
 * Responsibilities:
 * - Load settings and intent keywords
 * - Probe brand references and read intent from the request text
 * - Resolve the worker plan (delegate or deterministic rules)
 * - Execute the plan and stream every outcome into the artifact store
 * - Seal the run and report it to event listeners
 */

import { join, resolve } from 'node:path';
import { ConfigLoader } from './config/index.js';
import type { CrewConfig, IntentKeywords } from './config/index.js';
import { PlanResolver, AdapterPlanProposer, RequestTranslator, detectIntent } from './planning/index.js';
import type { PlanProposer, TranslateOptions } from './planning/index.js';
import { ExecutionEngine } from './engine/index.js';
import type { ExecutionEngineOptions } from './engine/index.js';
import { ArtifactStore, createRunId } from './artifacts/index.js';
import { CopyWorker, DesignWorker, QaCriticWorker, AgentWorker, WorkerRegistry } from './workers/index.js';
import { FsBrandReferenceProbe, type BrandReferenceProbe } from './brands/index.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { WORKER_ORDER } from './types.js';
import type { AdapterManagerLike } from './adapters.js';
import type {
  ArtifactDocument,
  ContentRequest,
  InputTranslation,
  PlanSignals,
  RunResult,
  Worker,
  WorkerName,
  WorkerPlan,
} from './types.js';

const logger = createLogger('orchestrator');

const RESEARCH_SYSTEM_PROMPT =
  'You are a social media trend researcher. Summarise current visual and messaging trends for the brand in a few bullet points.';

// ─── Config ─────────────────────────────────────────────────────────────────

export type RunEvent = 'run:started' | 'run:outcome' | 'run:completed' | 'run:failed';

export type RunEventHandler = (event: RunEvent, data: unknown) => void;

export interface OrchestratorConfig {
  /** Root that relative paths in the settings resolve against. */
  basePath: string;
  /** Directory holding campaign-crew.yaml and intent-keywords.yaml. Defaults to `<basePath>/config`. */
  configDir?: string;
  artifactsDir?: string;
  brandsDir?: string;
  /** Pre-loaded settings; skips reading campaign-crew.yaml. */
  settings?: CrewConfig;
  keywords?: IntentKeywords;
  /** Engine overrides (clock, sleep) on top of the loaded settings. */
  engine?: ExecutionEngineOptions;
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
  runId?: string;
  inputTranslation?: InputTranslation;
  /** Brand / product / campaign context handed to workers as-is. */
  config?: Readonly<Record<string, unknown>>;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  workers: WorkerName[];
  missing_workers: WorkerName[];
  planning: 'delegate' | 'deterministic';
  adapters: string[];
  open_runs: number;
}

// ─── Orchestrator ───────────────────────────────────────────────────────────

export class Orchestrator {
  private configLoader: ConfigLoader;
  private settings: CrewConfig;
  private keywords: IntentKeywords;
  private resolver: PlanResolver;
  private translator: RequestTranslator;
  private engine: ExecutionEngine;
  private artifactStore: ArtifactStore;
  private workers: WorkerRegistry;
  private brandProbe: BrandReferenceProbe;
  private now: () => number;

  // Pluggable dependencies — set after construction
  private adapterManager?: AdapterManagerLike;
  private eventHandler?: RunEventHandler;

  constructor(config: OrchestratorConfig) {
    this.now = config.now ?? Date.now;
    this.configLoader = new ConfigLoader(config.configDir ?? join(config.basePath, 'config'));
    this.settings = config.settings ?? this.configLoader.loadConfig();
    this.keywords = config.keywords ?? this.configLoader.loadIntentKeywords();

    this.resolver = new PlanResolver({ delegateTimeoutMs: this.settings.planning.delegate_timeout_ms });
    this.translator = new RequestTranslator(this.keywords, {
      providerPriority: this.settings.planning.provider_priority,
      timeoutMs: this.settings.planning.delegate_timeout_ms,
    });
    this.engine = new ExecutionEngine({ ...this.settings.engine, now: this.now, ...config.engine });
    this.artifactStore = new ArtifactStore(
      resolve(config.basePath, config.artifactsDir ?? this.settings.paths.artifacts_dir),
      this.now,
    );
    this.brandProbe = new FsBrandReferenceProbe(resolve(config.basePath, config.brandsDir ?? this.settings.paths.brands_dir));
    this.workers = new WorkerRegistry([new CopyWorker(), new DesignWorker(), new QaCriticWorker()]);
  }

  /**
   * Wire the adapter manager (provider layer): enables the planning and
   * translation delegates, and a model-backed research worker when none is registered.
   */
  setAdapterManager(adapterManager: AdapterManagerLike): void {
    const providerPriority = this.settings.planning.provider_priority;
    this.adapterManager = adapterManager;
    this.resolver.setProposer(new AdapterPlanProposer({ adapterManager, providerPriority }));
    this.translator.setAdapterManager(adapterManager, providerPriority);
    if (!this.workers.has('research')) {
      this.workers.register(
        new AgentWorker('research', { adapterManager, providerPriority, systemPrompt: RESEARCH_SYSTEM_PROMPT }),
      );
    }
    logger.info({ adapters: adapterManager.listAdapters() }, 'Adapter manager wired');
  }

  /**
   * Register (or replace) the implementation of one worker.
   */
  registerWorker(worker: Worker): void {
    this.workers.register(worker);
  }

  /**
   * Replace the planning delegate; undefined falls back to the rules alone.
   */
  setPlanProposer(proposer: PlanProposer | undefined): void {
    this.resolver.setProposer(proposer);
  }

  setBrandReferenceProbe(probe: BrandReferenceProbe): void {
    this.brandProbe = probe;
  }

  /**
   * Set event handler for broadcasting run progress to listeners.
   */
  setEventHandler(handler: RunEventHandler | undefined): void {
    this.eventHandler = handler;
  }

  /**
   * Resolve the worker plan for a request without executing it.
   */
  async previewPlan(request: ContentRequest): Promise<WorkerPlan> {
    return this.resolver.resolve(request, await this.collectSignals(request));
  }

  /**
   * Plan, execute and seal one campaign run. Worker problems are reported in
   * the result; only invariant violations and storage failures reject.
   */
  async runCampaign(request: ContentRequest, options: RunOptions = {}): Promise<RunResult> {
    const runId = options.runId ?? createRunId(new Date(this.now()));
    const plan = await this.previewPlan(request);
    this.emit('run:started', { run_id: runId, brand: request.brand_id, sequence: plan.sequence, mode: plan.mode });

    try {
      return await this.artifactStore.withRun(runId, async (handle) => {
        const report = await this.engine.execute(plan, request, {
          runId: handle.run_id,
          workers: this.workers,
          config: options.config,
          signal: options.signal,
          onOutcome: async (outcome) => {
            await this.artifactStore.appendTrace(handle, outcome);
            this.emit('run:outcome', { run_id: handle.run_id, outcome });
          },
        });

        const inputTranslation = options.inputTranslation ?? null;
        const document: ArtifactDocument = {
          run_id: handle.run_id,
          created_at: handle.created_at,
          sealed_at: report.trace.sealed_at,
          status: report.status,
          input: request,
          worker_plan: { sequence: plan.sequence, mode: plan.mode, reason: plan.reason, workers: plan.steps },
          orchestration_trace: report.trace.entries,
          input_translation: inputTranslation,
          result: {
            status: report.status,
            cost_usd: report.cost_usd,
            duration_ms: report.duration_ms,
            qa: report.qa,
            outputs: report.outputs,
            ...(report.error !== undefined ? { error: report.error } : {}),
          },
        };
        const artifact = await this.artifactStore.seal(handle, document);

        const result: RunResult = {
          run_id: handle.run_id,
          request,
          plan,
          trace: report.trace,
          artifact,
          status: report.status,
          cost_usd: report.cost_usd,
          duration_ms: report.duration_ms,
          qa: report.qa,
          outputs: report.outputs,
          input_translation: inputTranslation,
        };
        this.emit('run:completed', {
          run_id: result.run_id,
          status: result.status,
          sequence: plan.sequence,
          mode: plan.mode,
          cost_usd: result.cost_usd,
          artifact_dir: artifact.dir,
        });
        return result;
      });
    } catch (err) {
      logger.error({ err, run: runId }, 'Run failed before sealing');
      this.emit('run:failed', { run_id: runId, error: errorMessage(err) });
      throw err;
    }
  }

  /**
   * Translate free chat text into a request, then run it.
   */
  async runFromUserInput(brandId: string, text: string, options: RunOptions & TranslateOptions = {}): Promise<RunResult> {
    const { request, translation } = await this.translator.translate(brandId, text, options);
    return this.runCampaign(request, { ...options, inputTranslation: translation });
  }

  /**
   * Get system health status.
   */
  getHealth(): HealthReport {
    const workers = this.workers.list();
    const missing = WORKER_ORDER.filter((name) => !this.workers.has(name));
    return {
      status: missing.length === 0 ? 'healthy' : 'degraded',
      workers,
      missing_workers: missing,
      planning: this.resolver.hasDelegate() ? 'delegate' : 'deterministic',
      adapters: this.adapterManager?.listAdapters() ?? [],
      open_runs: this.artifactStore.openRuns,
    };
  }

  /**
   * Get component references for advanced usage.
   */
  getArtifactStore(): ArtifactStore { return this.artifactStore; }
  getTranslator(): RequestTranslator { return this.translator; }
  getSettings(): CrewConfig { return this.settings; }
  getIntentKeywords(): IntentKeywords { return this.keywords; }

  // ─── Private ──────────────────────────────────────────────────────────

  private async collectSignals(request: ContentRequest): Promise<PlanSignals> {
    const intent = detectIntent(`${request.objective} ${request.constraints}`, this.keywords);
    return {
      has_style_reference: request.style_ref_present,
      has_local_brand_references: await this.brandProbe.hasReferences(request.brand_id),
      mentions_trends: intent.mentions_trends,
      wants_text: intent.wants_text,
    };
  }

  private emit(event: RunEvent, data: unknown): void {
    if (!this.eventHandler) return;
    try {
      this.eventHandler(event, data);
    } catch (err) {
      logger.error({ err, event }, 'Run event handler error');
    }
  }
}
