/**
 * Barrel export for all shared types.
 */
export type { PaperRow, AuthorRow, AuthorshipRow, AuthorPosition } from './paper.js';
export { UNKNOWN_AUTHOR_NAME } from './paper.js';
export type {
    OpenAlexWork,
    OpenAlexAuthorship,
    OpenAlexTopic,
    OpenAlexListResponse,
    OpenAlexConcept,
} from './work.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    EtlConfig,
    EtlConfigInput,
    LogLevel,
    ApiConfig,
    DatabaseConfig,
    QualityThresholds,
    QualityConfig,
    ExecutionConfig,
} from './config.js';
export type {
    QualityCheck,
    CheckCategory,
    CheckResult,
    QualityReport,
    SampleRecord,
} from './quality.js';
export type {
    PipelineStage,
    PipelineOutcome,
    EntityKind,
    UpsertRowResult,
    UpsertResult,
    EntityCounts,
    ImportStats,
    StageError,
    PipelineResult,
} from './pipeline.js';
export type { WorkSource, WorkSourceOptions } from './source-adapter.js';
