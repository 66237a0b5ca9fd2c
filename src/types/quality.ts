import type { QualityThresholds } from './config.js';

export type CheckCategory =
    | 'Data Completeness'
    | 'Data Validity'
    | 'Business Logic'
    | 'Data Quality'
    | 'Referential Integrity'
    | 'Timestamps & Metadata';

/**
 * A declarative data quality check.
 *
 * `countSql` returns a single `failure_count` column; `sampleSql` returns the
 * violating rows and must bind `@limit`. Both may bind the thresholds named
 * in `params` as `@<name>`.
 */
export interface QualityCheck {
    readonly id: string;
    readonly name: string;
    readonly category: CheckCategory;
    readonly description: string;
    readonly countSql: string;
    readonly sampleSql: string;
    readonly params: ReadonlyArray<keyof QualityThresholds>;
}

export type SampleRecord = Record<string, unknown>;

export interface CheckResult {
    id: string;
    name: string;
    category: CheckCategory;
    description: string;
    passed: boolean;
    failureCount: number;
    samples: SampleRecord[];
    /** Milliseconds */
    executionTime: number;
    /** Set when the check itself could not run */
    error?: string;
}

export interface QualityReport {
    startedAt: Date;
    /** Milliseconds */
    duration: number;
    results: CheckResult[];
    passed: boolean;
}
