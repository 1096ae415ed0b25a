// ReportScreener — classifies every generated section through the bounded
// classifier gate and folds the per-section results into one report decision.
// The report takes its flag from its most severe section.

import type { TextClassifier } from '../types/capabilities.js';
import type { Classification, GateResult, ReportGateResult } from '../types/report.js';
import type { EventBus } from '../types/events.js';
import { createEvent } from '../types/events.js';
import { CancelledError, ClassifierError, ServiceCallError, errorMessage } from '../types/errors.js';
import type { ClassifierConfig, LlmConfig } from '../config/index.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { RetryExhaustedError, withRetry } from '../utils/retry.js';
import type { RandomSource } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';
import { EthicalGate, FLAG_SEVERITY } from './ethical-gate.js';

const log = createLogger('ReportScreener');

export interface ReportScreenerOptions {
  /** Shared across every screener using the same classifier capacity */
  limiter?: ConcurrencyLimiter;
  events?: EventBus;
  random?: RandomSource;
  /** Backoff between classifier retries */
  backoff?: Pick<LlmConfig, 'baseDelayMs' | 'maxDelayMs'>;
}

export interface ScreenOptions {
  signal?: AbortSignal;
  userId?: string;
}

/** Most severe flag wins; ties go to the higher risk, then to the earlier section. */
export function combineSectionResults(results: ReadonlyArray<[string, GateResult]>): ReportGateResult {
  const first = results[0];
  if (!first) throw new ClassifierError('No sections to screen', 0);

  let [section, decided] = first;
  for (const [name, result] of results.slice(1)) {
    const severity = FLAG_SEVERITY[result.flag] - FLAG_SEVERITY[decided.flag];
    if (severity > 0 || (severity === 0 && result.risk > decided.risk)) {
      section = name;
      decided = result;
    }
  }

  return Object.freeze({
    ...decided,
    section,
    sections: Object.freeze(Object.fromEntries(results)),
  });
}

export class ReportScreener {
  private readonly limiter: ConcurrencyLimiter;
  private readonly events?: EventBus;
  private readonly random?: RandomSource;
  private readonly backoff: Pick<LlmConfig, 'baseDelayMs' | 'maxDelayMs'>;

  constructor(
    private readonly classifier: TextClassifier,
    private readonly gate: EthicalGate,
    private readonly config: ClassifierConfig,
    options: ReportScreenerOptions = {},
  ) {
    this.limiter = options.limiter ?? new ConcurrencyLimiter(config.concurrency);
    this.events = options.events;
    this.random = options.random;
    this.backoff = options.backoff ?? { baseDelayMs: 250, maxDelayMs: 4_000 };
  }

  async screen(sections: Readonly<Record<string, string>>, options: ScreenOptions = {}): Promise<ReportGateResult> {
    const entries = Object.entries(sections);
    const results = await Promise.all(entries.map(async ([name, text]): Promise<[string, GateResult]> => {
      const classification = await this.classify(name, text, options);
      if (!this.gate.isKnownLabel(classification.label)) {
        log.warn('classifier returned an unconfigured label; screening as unsafe', {
          userId: options.userId,
          section: name,
          label: classification.label,
        });
      }
      return [name, this.gate.screen(classification)];
    }));

    const decision = combineSectionResults(results);
    this.events?.emit(createEvent('ReportScreened', {
      userId: options.userId,
      flag: decision.flag,
      confidence: decision.confidence,
      section: decision.section,
    }));
    if (decision.flag !== 'Safe') {
      log.warn(`report ${decision.flag.toLowerCase()} by ethical gate`, {
        userId: options.userId,
        section: decision.section,
        label: decision.label,
        confidence: decision.confidence,
      });
    }
    return decision;
  }

  private async classify(section: string, text: string, options: ScreenOptions): Promise<Classification> {
    let attempts = 0;
    try {
      return await this.limiter.run(() => withRetry(
        (signal, attempt) => {
          attempts = attempt;
          return this.classifier.classify(text, { signal });
        },
        {
          maxAttempts: this.config.maxAttempts,
          baseDelayMs: this.backoff.baseDelayMs,
          maxDelayMs: this.backoff.maxDelayMs,
          timeoutMs: this.config.timeoutMs,
          signal: options.signal,
          random: this.random,
          onRetry: ({ attempt, delayMs, error }) => {
            log.warn('classifier call failed, backing off', {
              userId: options.userId, section, attempt, delayMs, error: errorMessage(error),
            });
          },
        },
      ));
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (err instanceof RetryExhaustedError) {
        throw new ClassifierError(
          `Classifier call for section "${section}" failed after ${err.attempts} attempt(s): ${errorMessage(err.lastError)}`,
          err.attempts,
          err.lastError,
        );
      }
      const kind = err instanceof ServiceCallError ? 'permanent failure' : 'unexpected failure';
      throw new ClassifierError(
        `Classifier call for section "${section}" hit a ${kind}: ${errorMessage(err)}`,
        Math.max(1, attempts),
        err,
      );
    }
  }
}
