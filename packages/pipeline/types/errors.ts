// Error taxonomy for the transaction-to-report pipeline
// Every failure a per-user run can end in is one of these classes; the batch
// runner reports them per user by `code` without aborting sibling runs.

import type { EthicalFlag } from './report.js';

export type ErrorCode =
  | 'DATA_ERROR'
  | 'CLUSTERING_ERROR'
  | 'LLM_ERROR'
  | 'CLASSIFIER_ERROR'
  | 'GENERATION_ERROR'
  | 'ETHICAL_BLOCK'
  | 'ASSEMBLY_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'CONFIG_ERROR'
  | 'CANCELLED';

export class InsightsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InsightsError';
  }
}

/** Missing or out-of-range input data (bad month, period outside the data horizon, invalid record). */
export class DataError extends InsightsError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DATA_ERROR', cause);
    this.name = 'DataError';
  }
}

/** Empty cohort, mixed encoder versions or a non-finite feature space. */
export class ClusteringError extends InsightsError {
  constructor(message: string) {
    super(message, 'CLUSTERING_ERROR');
    this.name = 'ClusteringError';
  }
}

export class LLMError extends InsightsError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LLMError';
  }
}

export class ClassifierError extends InsightsError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, 'CLASSIFIER_ERROR', cause);
    this.name = 'ClassifierError';
  }
}

export class GenerationError extends InsightsError {
  constructor(
    public readonly section: string,
    public readonly violations: string[],
    public readonly attempts: number,
  ) {
    super(
      `Section "${section}" failed validation after ${attempts} attempt(s): ${violations.join('; ')}`,
      'GENERATION_ERROR',
    );
    this.name = 'GenerationError';
  }
}

/** Terminal outcome: the gate blocked the report. Never retried automatically. */
export class EthicalBlock extends InsightsError {
  constructor(
    public readonly flag: EthicalFlag,
    public readonly confidence: number,
    public readonly section?: string,
  ) {
    super(
      `Report blocked by ethical gate${section ? ` (section "${section}")` : ''} with confidence ${confidence.toFixed(2)}`,
      'ETHICAL_BLOCK',
    );
    this.name = 'EthicalBlock';
  }
}

export class AssemblyError extends InsightsError {
  constructor(message: string) {
    super(message, 'ASSEMBLY_ERROR');
    this.name = 'AssemblyError';
  }
}

export class PersistenceError extends InsightsError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, 'PERSISTENCE_ERROR', cause);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends InsightsError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class CancelledError extends InsightsError {
  constructor(message = 'Run cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

/**
 * Failure of a single call to an external service, as classified by a bridge.
 * `transient` failures (timeouts, rate limits, 5xx) are retried with backoff;
 * permanent ones (bad auth, malformed request) surface immediately.
 */
export class ServiceCallError extends Error {
  constructor(
    message: string,
    public readonly service: 'llm' | 'classifier' | 'database',
    public readonly transient: boolean,
    public readonly status?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ServiceCallError';
  }
}

/** HTTP statuses worth retrying: request timeout, conflict, rate limit and server errors. */
export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 409 || status === 429 || status >= 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
