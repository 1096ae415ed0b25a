// Transaction insights pipeline
//
// TransactionStore → ProfileAggregator → FeatureEncoder → PeerClusterer   (once per period)
//   → PromptOrchestrator → ReportScreener/EthicalGate → ReportAssembler   (per user)
//
// The period snapshot (cohort, profiles, vectors, clusters) is built once and
// shared read-only by every per-user run. Per-user failures never abort the batch.

import type { TransactionStore } from '../store/transaction-store.js';
import type { MonthlyProfile, FeatureVector } from '../types/profile.js';
import type { ReportDocument, ReportGateResult, ReportSchema, UserOutcome } from '../types/report.js';
import type { TextClassifier, TextGenerator } from '../types/capabilities.js';
import type { EventBus, PipelineEvent, PipelineEventType } from '../types/events.js';
import { PIPELINE_EVENT_TYPES, SimpleEventBus, createEvent } from '../types/events.js';
import { CancelledError, InsightsError, errorMessage } from '../types/errors.js';
import type { InsightsConfig } from '../config/index.js';
import { ProfileAggregator } from '../profile/profile-aggregator.js';
import { CohortSelector, type CohortCriteria } from '../profile/cohort-selector.js';
import { FeatureEncoder } from '../features/feature-encoder.js';
import { PeerClusterer, type PeerClustering } from '../clustering/peer-clusterer.js';
import { PromptOrchestrator } from '../orchestrator/prompt-orchestrator.js';
import { buildReportSchema } from '../prompts/section-catalogue.js';
import { EthicalGate } from '../safety/ethical-gate.js';
import { ReportScreener } from '../safety/report-screener.js';
import { ReportAssembler, type ReportFileSystem } from '../report/report-assembler.js';
import { ConcurrencyLimiter, mapWithConcurrency } from '../utils/concurrency.js';
import { assertPeriod } from '../utils/calendar.js';
import { throwIfAborted } from '../utils/retry.js';
import type { RandomSource } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ReportPipeline');

// ── Pipeline types ──────────────────────────────────────────────────

export interface PipelineDeps {
  store: TransactionStore;
  generator: TextGenerator;
  classifier: TextClassifier;
  config: InsightsConfig;
  encoder?: FeatureEncoder;
  fileSystem?: ReportFileSystem;
  /** Jitter source for LLM and classifier backoff */
  random?: RandomSource;
  /** Timestamp written into generated reports */
  now?: () => Date;
  onEvent?: (event: PipelineEvent) => void;
}

export interface PeriodSnapshot {
  readonly year: number;
  readonly month: number;
  /** Active users, most active first */
  readonly cohort: readonly string[];
  readonly profiles: ReadonlyMap<string, MonthlyProfile>;
  readonly vectors: ReadonlyMap<string, FeatureVector>;
  /** null when the cohort is empty */
  readonly clustering: PeerClustering | null;
}

export type UserSelection =
  | { userIds: string[] }
  | { criteria?: Partial<CohortCriteria> };

export interface RunOptions {
  /** Max users processed at once (default: config.output.concurrency) */
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (progress: RunProgress) => void;
  /** Reuse a snapshot built earlier for the same period */
  snapshot?: PeriodSnapshot;
}

export interface RunProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'saved' | 'flagged' | 'failed';
  error?: string;
}

export interface GeneratedReport {
  path: string;
  document: ReportDocument;
  gate: ReportGateResult;
}

export interface RunResult {
  year: number;
  month: number;
  outcomes: UserOutcome[];
  saved: number;
  flagged: number;
  failed: number;
  totalDurationMs: number;
}

// ── Pipeline ────────────────────────────────────────────────────────

export class ReportPipeline {
  private readonly config: InsightsConfig;
  private readonly eventBus: EventBus;
  private readonly aggregator: ProfileAggregator;
  private readonly selector: CohortSelector;
  private readonly encoder: FeatureEncoder;
  private readonly clusterer = new PeerClusterer();
  private readonly orchestrator: PromptOrchestrator;
  private readonly screener: ReportScreener;
  private readonly assembler: ReportAssembler;
  private readonly schema: ReportSchema;
  private readonly now: () => Date;

  constructor(deps: PipelineDeps) {
    this.config = deps.config;
    this.eventBus = new SimpleEventBus();
    if (deps.onEvent) {
      for (const type of PIPELINE_EVENT_TYPES) this.eventBus.on(type, deps.onEvent);
    }

    this.aggregator = new ProfileAggregator(deps.store);
    this.selector = new CohortSelector(deps.store);
    this.encoder = deps.encoder ?? new FeatureEncoder();
    this.now = deps.now ?? (() => new Date());

    const { llm, generation, classifier } = deps.config;
    this.schema = buildReportSchema(generation.sections, generation.approach, generation.maxSectionLength);

    this.orchestrator = new PromptOrchestrator(deps.generator, llm, generation, {
      limiter: new ConcurrencyLimiter(llm.maxConcurrentCalls),
      events: this.eventBus,
      random: deps.random,
    });
    this.screener = new ReportScreener(deps.classifier, new EthicalGate(classifier.thresholds), classifier, {
      limiter: new ConcurrencyLimiter(classifier.concurrency),
      events: this.eventBus,
      random: deps.random,
      backoff: { baseDelayMs: llm.baseDelayMs, maxDelayMs: llm.maxDelayMs },
    });
    this.assembler = new ReportAssembler(deps.fileSystem);
  }

  get reportSchema(): ReportSchema {
    return this.schema;
  }

  /**
   * Aggregate, encode and cluster the period's cohort once. The result is
   * frozen and shared by every per-user run for the period.
   */
  async prepareSnapshot(year: number, month: number, criteria: Partial<CohortCriteria> = {}): Promise<PeriodSnapshot> {
    assertPeriod(year, month);
    const cohort = await this.selector.selectActive(year, month, { ...this.config.cohort, ...criteria });
    this.emit('CohortSelected', { year, month, users: cohort.length });

    const profiles = new Map<string, MonthlyProfile>();
    const vectors = new Map<string, FeatureVector>();
    for (const userId of cohort) {
      const profile = await this.aggregator.buildProfile(userId, year, month);
      profiles.set(userId, profile);
      vectors.set(userId, this.encoder.encode(profile));
    }

    let clustering: PeerClustering | null = null;
    if (vectors.size > 0) {
      const { policy, seed, minClusterSize } = this.config.clustering;
      clustering = this.clusterer.cluster(vectors, policy, { seed, minClusterSize });
      this.emit('ClustersBuilt', {
        year,
        month,
        clusters: clustering.clusters.length,
        sizes: clustering.clusters.map(c => c.memberIds.length),
        version: clustering.version,
      });
    } else {
      log.warn('empty cohort; reports will be generated without peer comparison', { year, month });
    }

    return Object.freeze({
      year,
      month,
      cohort: Object.freeze([...cohort]),
      profiles,
      vectors,
      clustering,
    });
  }

  /** Generate, screen and persist one user's report; throws on any failure. */
  async generateReport(userId: string, snapshot: PeriodSnapshot, signal?: AbortSignal): Promise<GeneratedReport> {
    const { year, month } = snapshot;
    throwIfAborted(signal);

    const profile = snapshot.profiles.get(userId)
      ?? await this.aggregator.buildProfile(userId, year, month, { requireActivity: true });
    const vector = snapshot.vectors.get(userId) ?? this.encoder.encode(profile);
    const peers = snapshot.clustering?.compare(vector);

    const generated = await this.orchestrator.generate(profile, peers, this.schema, { signal, vector });

    throwIfAborted(signal);
    const gate = await this.screener.screen(generated.texts, { signal, userId });

    throwIfAborted(signal);
    const document = this.assembler.assemble({
      userId,
      year,
      month,
      schema: this.schema,
      sections: generated.texts,
      attempts: generated.attempts,
      gate,
      generatedAt: this.now(),
      metadata: {
        encoderVersion: vector.version,
        clusterLabel: peers ? peers.cluster.label : null,
        clusterSize: peers ? peers.cluster.memberIds.length : 0,
        approach: this.schema.approach,
        model: this.orchestrator.model,
      },
    });
    const path = await this.assembler.save(document, this.config.output.root);
    this.emit('ReportSaved', { userId, year, month, path, flag: gate.flag });
    return { path, document, gate };
  }

  /** Like generateReport, but reports failure as an outcome instead of throwing. */
  async runUser(userId: string, snapshot: PeriodSnapshot, signal?: AbortSignal): Promise<UserOutcome> {
    const start = Date.now();
    try {
      const { path, gate } = await this.generateReport(userId, snapshot, signal);
      return {
        userId,
        status: gate.flag === 'Flagged' ? 'flagged' : 'saved',
        path,
        durationMs: Date.now() - start,
      };
    } catch (err) {
      const errorCode = err instanceof InsightsError ? err.code : 'UNEXPECTED';
      const error = errorMessage(err);
      if (err instanceof CancelledError) {
        log.warn('user run cancelled', { userId });
      } else {
        log.error('user run failed', { userId, errorCode, error });
      }
      this.emit('UserFailed', { userId, errorCode, error });
      return { userId, status: 'failed', errorCode, error, durationMs: Date.now() - start };
    }
  }

  /**
   * Run every selected user for the period through a bounded worker pool.
   * Outcomes keep selection order.
   */
  async run(year: number, month: number, selection: UserSelection = {}, options: RunOptions = {}): Promise<RunResult> {
    const totalStart = Date.now();
    const criteria = 'criteria' in selection ? selection.criteria : undefined;
    const snapshot = options.snapshot ?? await this.prepareSnapshot(year, month, criteria);
    const targets = 'userIds' in selection ? [...new Set(selection.userIds)] : [...snapshot.cohort];

    const concurrency = Math.max(1, Math.floor(options.concurrency ?? this.config.output.concurrency));
    let completed = 0;

    const outcomes = await mapWithConcurrency(targets, concurrency, async (userId) => {
      options.onProgress?.({ completed, total: targets.length, current: userId, status: 'running' });
      const outcome = await this.runUser(userId, snapshot, options.signal);
      completed++;
      options.onProgress?.({
        completed,
        total: targets.length,
        current: userId,
        status: outcome.status,
        error: outcome.error,
      });
      return outcome;
    });

    const count = (status: UserOutcome['status']): number => outcomes.filter(o => o.status === status).length;
    const result: RunResult = {
      year,
      month,
      outcomes,
      saved: count('saved'),
      flagged: count('flagged'),
      failed: count('failed'),
      totalDurationMs: Date.now() - totalStart,
    };
    log.info('run complete', { year, month, users: targets.length, saved: result.saved, flagged: result.flagged, failed: result.failed });
    return result;
  }

  private emit(type: PipelineEventType, payload: Record<string, unknown>): void {
    this.eventBus.emit(createEvent(type, payload));
  }
}
