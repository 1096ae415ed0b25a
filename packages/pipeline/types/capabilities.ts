// External capabilities the pipeline depends on. Bridges implement these
// against real services; tests substitute fakes.

import type { Classification } from './report.js';

export interface CallOptions {
  /** Aborted when the call times out or the run is cancelled */
  signal?: AbortSignal;
}

export interface TextGenerator {
  /** Model identifier recorded in report metadata */
  readonly model: string;
  /**
   * Complete a prompt. Failures are thrown as ServiceCallError with `transient`
   * set for timeouts, rate limits and 5xx responses.
   */
  complete(prompt: string, options?: CallOptions): Promise<string>;
}

export interface TextClassifier {
  classify(text: string, options?: CallOptions): Promise<Classification>;
}
