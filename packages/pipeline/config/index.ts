// Configuration — parsed once from the environment, then passed explicitly
// to every component. Nothing else in the package reads process.env for settings.

import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import { SECTION_NAMES, type PromptApproach, type SectionName } from '../types/report.js';
import type { ClusterPolicy } from '../types/clustering.js';

const APPROACHES = ['zero_shot', 'few_shot', 'chain_of_thought'] as const satisfies readonly PromptApproach[];

const commaList = (fallback: string) =>
  z.string().default(fallback).transform((s) => s.split(',').map(p => p.trim()).filter(Boolean));

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().default(''),
  INSIGHTS_MODEL: z.string().min(1).default('claude-3-5-haiku-latest'),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1024),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LLM_MAX_CONCURRENT: z.coerce.number().int().positive().default(4),
  LLM_MAX_ATTEMPTS: z.coerce.number().int().positive().default(4),
  LLM_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  LLM_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(8_000),

  CLASSIFIER_URL: z.string().url().optional(),
  CLASSIFIER_TOKEN: z.string().optional(),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  CLASSIFIER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  CLASSIFIER_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  GATE_FLAG_AT: z.coerce.number().min(0).max(1).default(0.3),
  GATE_BLOCK_AT: z.coerce.number().min(0).max(1).default(0.9),
  GATE_SAFE_LABELS: commaList('safe'),
  GATE_UNSAFE_LABELS: commaList('unsafe'),

  GENERATION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  GENERATION_MAX_SECTION_LENGTH: z.coerce.number().int().positive().default(2_000),
  GENERATION_NUMERIC_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  GENERATION_APPROACH: z.enum(APPROACHES).default('chain_of_thought'),
  REPORT_SECTIONS: commaList('executive_summary,spending_patterns,recommendations')
    .pipe(z.array(z.enum(SECTION_NAMES)).min(1)),

  CLUSTER_SEED: z.coerce.number().int().default(42),
  CLUSTER_K: z.union([z.literal('auto'), z.coerce.number().int().positive()]).default('auto'),
  CLUSTER_MAX_K: z.coerce.number().int().min(2).default(10),
  CLUSTER_MIN_SIZE: z.coerce.number().int().positive().default(3),

  COHORT_MIN_TRANSACTIONS: z.coerce.number().int().nonnegative().default(3),
  COHORT_MIN_SPEND: z.coerce.number().nonnegative().default(0),
  COHORT_MIN_CASH_IN: z.coerce.number().nonnegative().default(0),
  COHORT_MAX_USERS: z.coerce.number().int().nonnegative().default(1_000),

  REPORTS_DIR: z.string().min(1).default('reports'),
  REPORT_CONCURRENCY: z.coerce.number().int().positive().default(4),

  PG_HOST: z.string().default('localhost'),
  PG_PORT: z.coerce.number().int().positive().default(5432),
  PG_USER: z.string().default('insights'),
  PG_PASSWORD: z.string().default(''),
  PG_DATABASE: z.string().default('transactions'),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  PG_IDLE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  PG_CONNECTION_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5_000),
  PG_RETRY_MAX: z.coerce.number().int().nonnegative().default(2),
  PG_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
}).refine((env) => env.GATE_FLAG_AT <= env.GATE_BLOCK_AT, {
  message: 'GATE_FLAG_AT must not exceed GATE_BLOCK_AT',
  path: ['GATE_FLAG_AT'],
});

export interface LlmConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  maxConcurrentCalls: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface GateThresholds {
  /** risk at or above which a text is Flagged */
  flagAt: number;
  /** risk at or above which a text is Blocked */
  blockAt: number;
  safeLabels: string[];
  unsafeLabels: string[];
}

export interface ClassifierConfig {
  url?: string;
  token?: string;
  timeoutMs: number;
  concurrency: number;
  maxAttempts: number;
  thresholds: GateThresholds;
}

export interface GenerationConfig {
  maxValidationAttempts: number;
  maxSectionLength: number;
  numericTolerance: number;
  approach: PromptApproach;
  sections: SectionName[];
}

export interface ClusteringConfig {
  seed: number;
  policy: ClusterPolicy;
  minClusterSize: number;
}

export interface CohortConfig {
  minTransactions: number;
  minSpend: number;
  minCashIn: number;
  maxUsers: number;
}

export interface PgConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  poolMax: number;
  idleTimeoutMs: number;
  connectionTimeoutMs: number;
  retryMax: number;
  retryDelayMs: number;
}

export interface InsightsConfig {
  llm: LlmConfig;
  classifier: ClassifierConfig;
  generation: GenerationConfig;
  clustering: ClusteringConfig;
  cohort: CohortConfig;
  output: { root: string; concurrency: number };
  database: PgConfig;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): InsightsConfig {
  // Empty strings count as unset so `FOO=` in a .env file falls back to the default
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid configuration — ${issues.join('; ')}`, issues);
  }
  const e = parsed.data;

  return {
    llm: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.INSIGHTS_MODEL,
      maxTokens: e.LLM_MAX_TOKENS,
      temperature: e.LLM_TEMPERATURE,
      timeoutMs: e.LLM_TIMEOUT_MS,
      maxConcurrentCalls: e.LLM_MAX_CONCURRENT,
      maxAttempts: e.LLM_MAX_ATTEMPTS,
      baseDelayMs: e.LLM_BASE_DELAY_MS,
      maxDelayMs: e.LLM_MAX_DELAY_MS,
    },
    classifier: {
      url: e.CLASSIFIER_URL,
      token: e.CLASSIFIER_TOKEN,
      timeoutMs: e.CLASSIFIER_TIMEOUT_MS,
      concurrency: e.CLASSIFIER_CONCURRENCY,
      maxAttempts: e.CLASSIFIER_MAX_ATTEMPTS,
      thresholds: {
        flagAt: e.GATE_FLAG_AT,
        blockAt: e.GATE_BLOCK_AT,
        safeLabels: e.GATE_SAFE_LABELS.map(l => l.toLowerCase()),
        unsafeLabels: e.GATE_UNSAFE_LABELS.map(l => l.toLowerCase()),
      },
    },
    generation: {
      maxValidationAttempts: e.GENERATION_MAX_ATTEMPTS,
      maxSectionLength: e.GENERATION_MAX_SECTION_LENGTH,
      numericTolerance: e.GENERATION_NUMERIC_TOLERANCE,
      approach: e.GENERATION_APPROACH,
      sections: e.REPORT_SECTIONS,
    },
    clustering: {
      seed: e.CLUSTER_SEED,
      policy: e.CLUSTER_K === 'auto'
        ? { kind: 'auto', maxK: e.CLUSTER_MAX_K }
        : { kind: 'fixed', k: e.CLUSTER_K },
      minClusterSize: e.CLUSTER_MIN_SIZE,
    },
    cohort: {
      minTransactions: e.COHORT_MIN_TRANSACTIONS,
      minSpend: e.COHORT_MIN_SPEND,
      minCashIn: e.COHORT_MIN_CASH_IN,
      maxUsers: e.COHORT_MAX_USERS,
    },
    output: {
      root: e.REPORTS_DIR,
      concurrency: e.REPORT_CONCURRENCY,
    },
    database: {
      host: e.PG_HOST,
      port: e.PG_PORT,
      user: e.PG_USER,
      password: e.PG_PASSWORD,
      database: e.PG_DATABASE,
      poolMax: e.PG_POOL_MAX,
      idleTimeoutMs: e.PG_IDLE_TIMEOUT_MS,
      connectionTimeoutMs: e.PG_CONNECTION_TIMEOUT_MS,
      retryMax: e.PG_RETRY_MAX,
      retryDelayMs: e.PG_RETRY_DELAY_MS,
    },
  };
}
