/**
 * Library entry point. The CLI lives in `cli/index.ts`.
 */
export * from './types/index.js';
export { normalizeWork, toAuthorRow, toAuthorshipRow, type NormalizeResult, type NormalizedWork } from './etl/normalize.js';
export { dedupeAuthors, dedupeAuthorships } from './etl/dedupe.js';
export { RunContext } from './etl/run-context.js';
export { matchDomainVocabulary, scoreWorkRelevance, hasDomainFieldOrSubfield, assessFetchRelevance } from './etl/relevance.js';
export { ResearchDatabase, type StoredPaper, type StoredAuthor, type StoredAuthorship } from './storage/database.js';
export { PaperImporter, formatImportSummary } from './pipeline/importer.js';
export { Pipeline, formatPipelineSummary, type PipelineDependencies } from './pipeline/pipeline.js';
export { QualityValidator } from './quality/validator.js';
export { QUALITY_CHECKS } from './quality/checks.js';
export { formatQualityReport, writeQualityReport } from './quality/report.js';
export { JsonFileSource } from './sources/json-file.js';
export { OpenAlexSource, saveWorks } from './sources/openalex.js';
export { resolveConfig, mergeConfig, validateConfig, parseConfigInput } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './utils/errors.js';
