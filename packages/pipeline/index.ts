// @transaction-insights/pipeline — monthly transaction profiles, peer
// clustering and screened narrative reports

// Types
export * from './types/index.js';

// Configuration
export { loadConfig } from './config/index.js';
export type {
  InsightsConfig, LlmConfig, ClassifierConfig, GateThresholds, GenerationConfig,
  ClusteringConfig, CohortConfig, PgConfig,
} from './config/index.js';

// Input store
export { InMemoryTransactionStore } from './store/transaction-store.js';
export type { TransactionStore, UserActivity, DataHorizon } from './store/transaction-store.js';
export { PgTransactionStore } from './store/pg-transaction-store.js';
export { PgClient, isRecoverablePgError } from './db/pg-client.js';

// Profiles, features and clustering
export { ProfileAggregator, aggregateProfile } from './profile/profile-aggregator.js';
export { CohortSelector, DEFAULT_COHORT_CRITERIA, type CohortCriteria } from './profile/cohort-selector.js';
export { describeProfile } from './profile/describe-profile.js';
export { FeatureEncoder, FEATURE_SCHEMA_V1, type FeatureDefinition } from './features/feature-encoder.js';
export { PeerClusterer, PeerClustering } from './clustering/peer-clusterer.js';

// Generation
export { PromptOrchestrator, type GeneratedSections } from './orchestrator/prompt-orchestrator.js';
export { validateSection, type SectionViolation } from './orchestrator/section-validator.js';
export { SECTION_CATALOGUE, buildReportSchema } from './prompts/section-catalogue.js';
export { buildPromptContext } from './prompts/prompt-context.js';

// Bridges
export { AnthropicTextGenerator } from './bridge/anthropic-generator.js';
export { HttpTextClassifier } from './bridge/http-classifier.js';

// Safety
export { EthicalGate, DEFAULT_THRESHOLDS } from './safety/ethical-gate.js';
export { ReportScreener } from './safety/report-screener.js';

// Reports
export { ReportAssembler, type ReportFileSystem } from './report/report-assembler.js';
export { readReport } from './report/report-reader.js';
export { serializeReport, reportPath } from './report/report-document.js';

// Pipeline
export { ReportPipeline } from './src/pipeline.js';
export type { PipelineDeps, PeriodSnapshot, UserSelection, RunOptions, RunProgress, RunResult } from './src/pipeline.js';
