import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ReportPipeline } from '../src/pipeline.js';
import { InMemoryTransactionStore } from '../store/transaction-store.js';
import { readReport } from '../report/report-reader.js';
import { loadConfig } from '../config/index.js';
import type { CallOptions } from '../types/capabilities.js';
import type { PipelineEventType } from '../types/events.js';
import type { Classification } from '../types/report.js';
import { EthicalBlock, GenerationError } from '../types/errors.js';
import { monthOf } from './helpers.js';

const GOOD = 'Your spending stayed within what you received this month.';
const makeComplete = () => vi.fn(async (_prompt: string, _options?: CallOptions): Promise<string> => GOOD);
const makeClassify = () => vi.fn(async (_text: string, _options?: CallOptions): Promise<Classification> =>
  ({ label: 'safe', confidence: 0.98 }));
const NOW = new Date('2025-05-01T08:00:00.000Z');

// Two well-separated groups: modest spenders u-01..u-05, heavy spenders u-06..u-10.
// u-11 is active in April but below the cohort threshold.
const RECORDS = [
  ...monthOf('u-01', 2025, 4, [400, 600], [1200]),
  ...monthOf('u-02', 2025, 4, [300, 500, 250], [1100]),
  ...monthOf('u-03', 2025, 4, [450, 350], [1000]),
  ...monthOf('u-04', 2025, 4, [200, 700, 100], [1300]),
  ...monthOf('u-05', 2025, 4, [500, 520], [1250]),
  ...['u-06', 'u-07', 'u-08', 'u-09', 'u-10'].flatMap((id, i) => {
    const scale = 1 + i * 0.05;
    return monthOf(id, 2025, 4, [20_000 * scale, 18_000 * scale, 22_000 * scale], [500]);
  }),
  ...monthOf('u-11', 2025, 4, [50], []),
];

describe('ReportPipeline', () => {
  let root: string;
  let complete: ReturnType<typeof makeComplete>;
  let classify: ReturnType<typeof makeClassify>;
  let events: PipelineEventType[];

  function build(env: Record<string, string> = {}): ReportPipeline {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-key',
      CLUSTER_K: '2',
      LLM_BASE_DELAY_MS: '0',
      LLM_MAX_DELAY_MS: '0',
      REPORTS_DIR: root,
      ...env,
    });
    return new ReportPipeline({
      store: new InMemoryTransactionStore(RECORDS),
      generator: { model: 'test-model', complete },
      classifier: { classify },
      config,
      now: () => NOW,
      onEvent: e => events.push(e.type),
    });
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'insights-pipeline-'));
    complete = makeComplete();
    classify = makeClassify();
    events = [];
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it('builds a clustered snapshot for the period', async () => {
    const snapshot = await build().prepareSnapshot(2025, 4);

    expect(snapshot.cohort).toEqual(['u-02', 'u-04', 'u-06', 'u-07', 'u-08', 'u-09', 'u-10', 'u-01', 'u-03', 'u-05']);
    expect(snapshot.profiles.get('u-01')?.totalSpend).toBe(1000);
    expect(snapshot.profiles.get('u-01')?.totalCashIn).toBe(1200);
    expect(snapshot.clustering?.clusters).toHaveLength(2);
    expect(snapshot.clustering?.clusterOf('u-01')?.memberIds).toEqual(['u-01', 'u-02', 'u-03', 'u-04', 'u-05']);
    expect(snapshot.clustering?.clusterOf('u-08')?.memberIds).toEqual(['u-06', 'u-07', 'u-08', 'u-09', 'u-10']);
  });

  it('generates, screens and saves a report', async () => {
    const pipeline = build();
    const snapshot = await pipeline.prepareSnapshot(2025, 4);

    const report = await pipeline.generateReport('u-01', snapshot);

    expect(report.path).toBe(join(root, '2025', 'April', 'u-01.json'));
    expect(report.gate.flag).toBe('Safe');
    expect(complete).toHaveBeenCalledTimes(3);
    expect(classify).toHaveBeenCalledTimes(3);
    expect(complete.mock.calls[0][0]).toContain('Peer group 1 of 2 with 5 members');

    const stored = await readReport(root, 'u-01', 2025, 4);
    expect(stored).toEqual(report.document);
    expect(stored?.sections).toEqual({
      executive_summary: GOOD,
      spending_patterns: GOOD,
      recommendations: GOOD,
    });
    expect(stored?.ethicalFlag).toBe('Safe');
    expect(stored?.confidence).toBe(0.98);
    expect(stored?.generatedAt).toBe('2025-05-01T08:00:00.000Z');
    expect(stored?.metadata).toEqual({
      encoderVersion: 'v1',
      clusterLabel: 0,
      clusterSize: 5,
      approach: 'chain_of_thought',
      model: 'test-model',
    });
    expect(events).toEqual([
      'CohortSelected', 'ClustersBuilt',
      'SectionDrafting', 'SectionValidating', 'SectionAccepted',
      'SectionDrafting', 'SectionValidating', 'SectionAccepted',
      'SectionDrafting', 'SectionValidating', 'SectionAccepted',
      'ReportScreened', 'ReportSaved',
    ]);
  });

  it('rewrites identical bytes on a re-run', async () => {
    const pipeline = build();
    const snapshot = await pipeline.prepareSnapshot(2025, 4);

    const { path } = await pipeline.generateReport('u-01', snapshot);
    const first = await fs.readFile(path, 'utf8');
    await pipeline.generateReport('u-01', snapshot);

    expect(await fs.readFile(path, 'utf8')).toBe(first);
  });

  it('fails the report when a section never validates', async () => {
    complete.mockResolvedValue('Dear {{customer}}, here is your summary.');
    const pipeline = build();
    const snapshot = await pipeline.prepareSnapshot(2025, 4);

    const err = await pipeline.generateReport('u-01', snapshot).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    if (!(err instanceof GenerationError)) return;
    expect(err.section).toBe('executive_summary');
    expect(err.attempts).toBe(3);
    expect(complete).toHaveBeenCalledTimes(3);
    expect(classify).not.toHaveBeenCalled();
    expect(await readReport(root, 'u-01', 2025, 4)).toBeNull();
  });

  it('blocks unsafe reports without writing them', async () => {
    classify.mockResolvedValue({ label: 'unsafe', confidence: 0.97 });
    const pipeline = build();
    const snapshot = await pipeline.prepareSnapshot(2025, 4);

    const err = await pipeline.generateReport('u-01', snapshot).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(EthicalBlock);
    if (!(err instanceof EthicalBlock)) return;
    expect(err.flag).toBe('Blocked');
    expect(err.section).toBe('executive_summary');
    expect(await readReport(root, 'u-01', 2025, 4)).toBeNull();
    expect(await fs.readdir(root)).toEqual([]);
  });

  it('keeps flagged reports and counts them', async () => {
    classify.mockResolvedValue({ label: 'unsafe', confidence: 0.5 });

    const result = await build().run(2025, 4, { userIds: ['u-01'] });

    expect(result.outcomes[0]).toMatchObject({ userId: 'u-01', status: 'flagged', path: join(root, '2025', 'April', 'u-01.json') });
    expect(result.flagged).toBe(1);
    expect((await readReport(root, 'u-01', 2025, 4))?.ethicalFlag).toBe('Flagged');
  });

  it('isolates per-user failures in a batch', async () => {
    complete.mockImplementation(async (prompt: string) => (prompt.includes('User u-03 ') ? 'TODO' : GOOD));
    const progress: string[] = [];

    const result = await build().run(2025, 4, {}, {
      concurrency: 3,
      onProgress: p => {
        if (p.status !== 'running') progress.push(`${p.current}:${p.status}`);
      },
    });

    expect(result.outcomes.map(o => o.userId)).toEqual(['u-02', 'u-04', 'u-06', 'u-07', 'u-08', 'u-09', 'u-10', 'u-01', 'u-03', 'u-05']);
    expect(result.saved).toBe(9);
    expect(result.flagged).toBe(0);
    expect(result.failed).toBe(1);
    expect(result.outcomes.find(o => o.userId === 'u-03')).toMatchObject({ status: 'failed', errorCode: 'GENERATION_ERROR' });
    expect(progress).toHaveLength(10);
    expect(progress).toContain('u-03:failed');
    expect(await readReport(root, 'u-03', 2025, 4)).toBeNull();
    expect(await readReport(root, 'u-05', 2025, 4)).not.toBeNull();
  });

  it('runs at most the requested number of users at once', async () => {
    complete.mockImplementation(async () => {
      await new Promise(resolve => setTimeout(resolve, 2));
      return GOOD;
    });
    let running = 0;
    let peak = 0;

    const result = await build().run(2025, 4, {}, {
      concurrency: 2,
      onProgress: p => {
        running += p.status === 'running' ? 1 : -1;
        peak = Math.max(peak, running);
      },
    });

    expect(result.saved).toBe(10);
    expect(peak).toBe(2);
    expect(running).toBe(0);
  });

  it('bounds in-flight LLM calls across users', async () => {
    let inFlight = 0;
    let peak = 0;
    complete.mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
      return GOOD;
    });

    const result = await build({ LLM_MAX_CONCURRENT: '2' }).run(2025, 4, {}, { concurrency: 5 });

    expect(result.saved).toBe(10);
    expect(peak).toBe(2);
  });

  it('matches an explicitly requested user outside the cohort to a peer group', async () => {
    const result = await build().run(2025, 4, { userIds: ['u-11', 'u-11'] });

    expect(result.outcomes).toHaveLength(1);
    expect(result.outcomes[0].status).toBe('saved');
    const prompt = complete.mock.calls[0][0];
    expect(prompt).toContain('User u-11 monthly transaction summary (April 2025)');
    expect(prompt).toContain('(matched by similarity; this user is not a member)');
    expect(typeof (await readReport(root, 'u-11', 2025, 4))?.metadata?.clusterLabel).toBe('number');
  });

  it('fails users whose period lies outside the data horizon', async () => {
    const pipeline = build();
    const snapshot = await pipeline.prepareSnapshot(2025, 3);
    expect(snapshot.cohort).toEqual([]);
    expect(snapshot.clustering).toBeNull();

    const result = await pipeline.run(2025, 3, { userIds: ['u-01'] }, { snapshot });

    expect(result.outcomes[0]).toMatchObject({ userId: 'u-01', status: 'failed', errorCode: 'DATA_ERROR' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('reports every user as cancelled once the run is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await build().run(2025, 4, { userIds: ['u-01', 'u-02'] }, { signal: controller.signal });

    expect(result.outcomes.map(o => o.errorCode)).toEqual(['CANCELLED', 'CANCELLED']);
    expect(complete).not.toHaveBeenCalled();
  });
});
