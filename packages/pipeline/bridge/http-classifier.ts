// HTTP classifier bridge — TextClassifier backed by a hosted text
// classification endpoint. Accepts the common response shapes
// `[[{label, score}]]`, `[{label, score}]` and `{label, score}`;
// the highest-scoring label wins.

import { z } from 'zod';
import type { CallOptions, TextClassifier } from '../types/capabilities.js';
import type { Classification } from '../types/report.js';
import { ConfigError, ServiceCallError, isTransientStatus } from '../types/errors.js';
import type { ClassifierConfig } from '../config/index.js';

const ScoreSchema = z.object({
  label: z.string().min(1),
  score: z.number().min(0).max(1),
});

const ResponseSchema = z.union([
  z.array(z.array(ScoreSchema).min(1)).min(1),
  z.array(ScoreSchema).min(1),
  ScoreSchema,
]);

type Score = z.infer<typeof ScoreSchema>;

function flatten(body: z.infer<typeof ResponseSchema>): Score[] {
  if (!Array.isArray(body)) return [body];
  return body.flatMap((entry): Score[] => (Array.isArray(entry) ? entry : [entry]));
}

export class HttpTextClassifier implements TextClassifier {
  private readonly url: string;

  constructor(private readonly config: ClassifierConfig) {
    if (!config.url) {
      throw new ConfigError('CLASSIFIER_URL is required for the HTTP classifier', ['CLASSIFIER_URL: Required']);
    }
    this.url = config.url;
  }

  async classify(text: string, options: CallOptions = {}): Promise<Classification> {
    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'Content-Type': 'application/json',
    };
    if (this.config.token) headers['Authorization'] = `Bearer ${this.config.token}`;

    let res: Response;
    try {
      res = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ inputs: text }),
        signal: options.signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new ServiceCallError(`Classifier request failed: ${message}`, 'classifier', true, undefined, err);
    }

    if (!res.ok) {
      const body = await res.text().catch(() => '');
      if (res.status === 401 || res.status === 403) {
        throw new ServiceCallError(`Classifier rejected credentials (HTTP ${res.status})`, 'classifier', false, res.status);
      }
      throw new ServiceCallError(
        `Classifier: HTTP ${res.status} ${body.slice(0, 200)}`.trim(),
        'classifier',
        isTransientStatus(res.status),
        res.status,
      );
    }

    let payload: unknown;
    try {
      payload = await res.json();
    } catch (err) {
      throw new ServiceCallError('Classifier returned invalid JSON', 'classifier', false, res.status, err);
    }

    const parsed = ResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceCallError(
        `Classifier returned an unexpected shape: ${parsed.error.issues.map(i => i.message).join('; ')}`,
        'classifier',
        false,
        res.status,
      );
    }

    const best = flatten(parsed.data).reduce((a, b) => (b.score > a.score ? b : a));
    return { label: best.label.toLowerCase(), confidence: best.score };
  }
}
