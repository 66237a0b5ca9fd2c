import type { QualityReport } from './quality.js';

/**
 * Pipeline states. `DONE`, `FAILED` and `FORCED` are terminal.
 */
export type PipelineStage =
    | 'FETCH'
    | 'SCHEMA_ENSURE'
    | 'LOAD'
    | 'VALIDATE'
    | 'DONE'
    | 'FAILED'
    | 'FORCED';

export type PipelineOutcome = Extract<PipelineStage, 'DONE' | 'FAILED' | 'FORCED'>;

export type EntityKind = 'authors' | 'papers' | 'paper_authors';

/**
 * Per-row classification returned by an upsert.
 */
export interface UpsertRowResult {
    id: string;
    action: 'inserted' | 'updated';
}

export interface UpsertResult {
    inserted: number;
    updated: number;
    rows: UpsertRowResult[];
}

export interface EntityCounts {
    inserted: number;
    updated: number;
    failed: number;
}

/**
 * Counters for one LOAD stage.
 */
export interface ImportStats {
    processed: number;
    /** Papers whose normalization or writes failed */
    failed: number;
    normalizationFailures: number;
    duplicateAuthorships: number;
    duplicateDoisDropped: number;
    papers: EntityCounts;
    authors: EntityCounts;
    paperAuthors: EntityCounts;
}

export interface StageError {
    stage: PipelineStage;
    message: string;
}

export interface PipelineResult {
    outcome: PipelineOutcome;
    /** Every stage entered, in order */
    stages: PipelineStage[];
    fetched: number;
    importStats: ImportStats | null;
    report: QualityReport | null;
    errors: StageError[];
    /** Milliseconds */
    duration: number;
}
