// PromptOrchestrator — drafts report sections one at a time through the
// TextGenerator, validating each before moving on.
//
// Per section: Drafting → Validating → Accepted | Retrying | Failed
// Validation retries re-prompt with the violations; LLM call failures are
// retried separately with jittered backoff under a shared in-flight limit.

import type { MonthlyProfile, FeatureVector } from '../types/profile.js';
import type { PeerSummary } from '../types/clustering.js';
import type { ReportSchema, SectionSpec } from '../types/report.js';
import type { TextGenerator } from '../types/capabilities.js';
import type { EventBus, PipelineEventType } from '../types/events.js';
import { createEvent } from '../types/events.js';
import { CancelledError, GenerationError, LLMError, ServiceCallError, errorMessage } from '../types/errors.js';
import type { GenerationConfig, LlmConfig } from '../config/index.js';
import { buildPromptContext, type PromptContext } from '../prompts/prompt-context.js';
import { buildRefinedPrompt, buildSectionPrompt } from '../prompts/section-prompts.js';
import { validateSection } from './section-validator.js';
import { ConcurrencyLimiter } from '../utils/concurrency.js';
import { RetryExhaustedError, throwIfAborted, withRetry } from '../utils/retry.js';
import type { RandomSource } from '../utils/random.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('PromptOrchestrator');

export interface PromptOrchestratorOptions {
  /** Shared across every orchestrator drawing on the same LLM quota */
  limiter?: ConcurrencyLimiter;
  events?: EventBus;
  /** Jitter source for backoff */
  random?: RandomSource;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  vector?: FeatureVector;
}

export interface GeneratedSections {
  /** section name → accepted text, in schema order */
  readonly texts: Readonly<Record<string, string>>;
  /** section name → generation attempts used */
  readonly attempts: Readonly<Record<string, number>>;
}

export class PromptOrchestrator {
  private readonly limiter: ConcurrencyLimiter;
  private readonly events?: EventBus;
  private readonly random?: RandomSource;

  constructor(
    private readonly generator: TextGenerator,
    private readonly llm: LlmConfig,
    private readonly generation: GenerationConfig,
    options: PromptOrchestratorOptions = {},
  ) {
    this.limiter = options.limiter ?? new ConcurrencyLimiter(llm.maxConcurrentCalls);
    this.events = options.events;
    this.random = options.random;
  }

  get model(): string {
    return this.generator.model;
  }

  async generate(
    profile: MonthlyProfile,
    peers: PeerSummary | undefined,
    schema: ReportSchema,
    options: GenerateOptions = {},
  ): Promise<GeneratedSections> {
    const context = buildPromptContext(profile, options.vector, peers);
    const texts: Record<string, string> = {};
    const attempts: Record<string, number> = {};

    for (const spec of schema.sections) {
      const result = await this.generateSection(spec, schema, context, options.signal);
      texts[spec.name] = result.text;
      attempts[spec.name] = result.attempts;
    }

    return Object.freeze({ texts: Object.freeze(texts), attempts: Object.freeze(attempts) });
  }

  private async generateSection(
    spec: SectionSpec,
    schema: ReportSchema,
    context: PromptContext,
    signal?: AbortSignal,
  ): Promise<{ text: string; attempts: number }> {
    const maxAttempts = Math.max(1, this.generation.maxValidationAttempts);
    const basePrompt = buildSectionPrompt(spec, schema.approach, context);
    const userId = context.userId;
    let prompt = basePrompt;

    for (let attempt = 1; ; attempt++) {
      throwIfAborted(signal);
      this.emit('SectionDrafting', { userId, section: spec.name, attempt });

      const text = (await this.complete(prompt, spec, userId, signal)).trim();

      this.emit('SectionValidating', { userId, section: spec.name, attempt });
      const violations = validateSection(text, spec, context.numbers, this.generation.numericTolerance);

      if (violations.length === 0) {
        this.emit('SectionAccepted', { userId, section: spec.name, attempt });
        return { text, attempts: attempt };
      }

      const messages = violations.map(v => v.message);
      if (attempt >= maxAttempts) {
        this.emit('SectionFailed', { userId, section: spec.name, attempt, violations: messages });
        log.error('section failed validation', { userId, section: spec.name, attempts: attempt, violations: messages });
        throw new GenerationError(spec.name, messages, attempt);
      }

      this.emit('SectionRetrying', { userId, section: spec.name, attempt, violations: messages });
      log.warn('section rejected, re-prompting', { userId, section: spec.name, attempt, rules: violations.map(v => v.rule) });
      prompt = buildRefinedPrompt(basePrompt, text, messages);
    }
  }

  private async complete(prompt: string, spec: SectionSpec, userId: string, signal?: AbortSignal): Promise<string> {
    let attempts = 0;
    try {
      return await this.limiter.run(() => withRetry(
        (callSignal, attempt) => {
          attempts = attempt;
          return this.generator.complete(prompt, { signal: callSignal });
        },
        {
          maxAttempts: this.llm.maxAttempts,
          baseDelayMs: this.llm.baseDelayMs,
          maxDelayMs: this.llm.maxDelayMs,
          timeoutMs: this.llm.timeoutMs,
          signal,
          random: this.random,
          onRetry: ({ attempt, delayMs, error }) => {
            this.emit('LlmCallRetried', { userId, section: spec.name, attempt, delayMs, error: errorMessage(error) });
            log.warn('LLM call failed, backing off', { userId, section: spec.name, attempt, delayMs, error: errorMessage(error) });
          },
        },
      ));
    } catch (err) {
      if (err instanceof CancelledError) throw err;
      if (err instanceof RetryExhaustedError) {
        throw new LLMError(
          `LLM call for section "${spec.name}" failed after ${err.attempts} attempt(s): ${errorMessage(err.lastError)}`,
          err.attempts,
          err.lastError,
        );
      }
      const kind = err instanceof ServiceCallError ? 'permanent failure' : 'unexpected failure';
      throw new LLMError(
        `LLM call for section "${spec.name}" hit a ${kind}: ${errorMessage(err)}`,
        Math.max(1, attempts),
        err,
      );
    }
  }

  private emit(type: PipelineEventType, payload: Record<string, unknown>): void {
    this.events?.emit(createEvent(type, payload));
  }
}
