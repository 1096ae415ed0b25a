// Persisted report format — snake_case JSON, two-space indent, trailing newline.
// Key order is fixed so identical documents serialise to identical bytes.

import { join } from 'node:path';
import { z } from 'zod';
import type { ReportDocument, SectionEvaluation } from '../types/report.js';
import { monthName } from '../utils/calendar.js';

const FlagSchema = z.enum(['Safe', 'Flagged', 'Blocked']);

const StoredReportSchema = z.object({
  user_id: z.string().min(1),
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  month_name: z.string(),
  generated_at: z.string(),
  sections: z.record(z.string()),
  ethical_flag: z.enum(['Safe', 'Flagged']),
  confidence: z.number().min(0).max(1),
  evaluation: z.record(z.object({
    ethical_flag: FlagSchema,
    confidence: z.number(),
    attempts: z.number().int().nonnegative(),
  })),
  metadata: z.object({
    encoder_version: z.string(),
    cluster_label: z.number().int().nullable(),
    cluster_size: z.number().int().nonnegative(),
    approach: z.enum(['zero_shot', 'few_shot', 'chain_of_thought']),
    model: z.string(),
  }).optional(),
});

export type StoredReport = z.infer<typeof StoredReportSchema>;

/** Rejects ids that would escape or alias the month directory */
export function isSafeUserId(userId: string): boolean {
  return userId.length > 0
    && userId !== '.'
    && userId !== '..'
    && !/[/\\\0]/.test(userId);
}

export function reportPath(root: string, userId: string, year: number, month: number): string {
  return join(root, String(year), monthName(month), `${userId}.json`);
}

export function toStored(doc: ReportDocument): StoredReport {
  const evaluation: StoredReport['evaluation'] = {};
  for (const [name, e] of Object.entries(doc.evaluation)) {
    evaluation[name] = { ethical_flag: e.flag, confidence: e.confidence, attempts: e.attempts };
  }

  const stored: StoredReport = {
    user_id: doc.userId,
    year: doc.year,
    month: doc.month,
    month_name: doc.monthName,
    generated_at: doc.generatedAt,
    sections: { ...doc.sections },
    ethical_flag: doc.ethicalFlag,
    confidence: doc.confidence,
    evaluation,
  };
  if (doc.metadata) {
    stored.metadata = {
      encoder_version: doc.metadata.encoderVersion,
      cluster_label: doc.metadata.clusterLabel,
      cluster_size: doc.metadata.clusterSize,
      approach: doc.metadata.approach,
      model: doc.metadata.model,
    };
  }
  return stored;
}

export function serializeReport(doc: ReportDocument): string {
  return `${JSON.stringify(toStored(doc), null, 2)}\n`;
}

/** Parse a stored report; returns null when the content is not a valid report. */
export function parseReport(content: string): ReportDocument | null {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = StoredReportSchema.safeParse(json);
  if (!parsed.success) return null;
  const s = parsed.data;

  const evaluation: Record<string, SectionEvaluation> = {};
  for (const [name, e] of Object.entries(s.evaluation)) {
    evaluation[name] = { flag: e.ethical_flag, confidence: e.confidence, attempts: e.attempts };
  }

  return {
    userId: s.user_id,
    year: s.year,
    month: s.month,
    monthName: s.month_name,
    generatedAt: s.generated_at,
    sections: s.sections,
    ethicalFlag: s.ethical_flag,
    confidence: s.confidence,
    evaluation,
    ...(s.metadata ? {
      metadata: {
        encoderVersion: s.metadata.encoder_version,
        clusterLabel: s.metadata.cluster_label,
        clusterSize: s.metadata.cluster_size,
        approach: s.metadata.approach,
        model: s.metadata.model,
      },
    } : {}),
  };
}
