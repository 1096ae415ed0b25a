// Report schema, gate results and the persisted report document

export type EthicalFlag = 'Safe' | 'Flagged' | 'Blocked';

export type PromptApproach = 'zero_shot' | 'few_shot' | 'chain_of_thought';

export const SECTION_NAMES = [
  'executive_summary',
  'spending_patterns',
  'cash_flow',
  'savings_position',
  'recommendations',
] as const;

export type SectionName = typeof SECTION_NAMES[number];

export interface SectionSpec {
  readonly name: SectionName;
  readonly title: string;
  readonly maxLength: number;
  /** When true, numbers in the output must be backed by a supplied fact */
  readonly checkNumbers: boolean;
}

export interface ReportSchema {
  readonly sections: readonly SectionSpec[];
  readonly approach: PromptApproach;
}

export interface Classification {
  readonly label: string;
  readonly confidence: number;
}

export interface GateResult {
  readonly flag: EthicalFlag;
  /** Classifier confidence on its own label, in [0, 1] */
  readonly confidence: number;
  /** Policy risk the flag was decided on, in [0, 1] */
  readonly risk: number;
  readonly label: string;
}

export interface SectionEvaluation {
  readonly flag: EthicalFlag;
  readonly confidence: number;
  readonly attempts: number;
}

export interface ReportGateResult extends GateResult {
  /** Section that decided the report-level flag */
  readonly section: string;
  readonly sections: Readonly<Record<string, GateResult>>;
}

export interface ReportMetadata {
  readonly encoderVersion: string;
  /** null when the report was generated without a peer group */
  readonly clusterLabel: number | null;
  readonly clusterSize: number;
  readonly approach: PromptApproach;
  readonly model: string;
}

export interface ReportDocument {
  readonly userId: string;
  readonly year: number;
  readonly month: number;
  readonly monthName: string;
  readonly generatedAt: string;
  /** section name → text, in schema order */
  readonly sections: Readonly<Record<string, string>>;
  readonly ethicalFlag: Exclude<EthicalFlag, 'Blocked'>;
  readonly confidence: number;
  readonly evaluation: Readonly<Record<string, SectionEvaluation>>;
  readonly metadata?: ReportMetadata;
}

export type UserOutcomeStatus = 'saved' | 'flagged' | 'failed';

export interface UserOutcome {
  userId: string;
  status: UserOutcomeStatus;
  path?: string;
  errorCode?: string;
  error?: string;
  durationMs: number;
}
