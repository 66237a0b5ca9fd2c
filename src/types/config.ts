/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Live fetch from the OpenAlex API.
 */
export interface ApiConfig {
    /** Lookback window for publication dates */
    daysBack: number;
    /** Acceptance threshold for the fetch-time relevance score */
    minRelevanceScore: number;
    /** Concept searched to scope the fetch */
    concept: string;
    /** Contact email for the polite pool */
    email?: string;
    /** Where fetched works are saved as JSON (unset: not saved) */
    outputDir?: string;
}

export interface DatabaseConfig {
    /** SQLite file path (":memory:" for a throwaway store) */
    path: string;
    /** Run the schema migration during SCHEMA_ENSURE */
    deploySchema: boolean;
}

/**
 * Thresholds substituted into the quality checks.
 */
export interface QualityThresholds {
    suspiciousCitationThreshold: number;
    retractedUpdateWindowDays: number;
    minPublicationYear: number;
    maxPublicationYear: number;
}

export interface QualityConfig extends QualityThresholds {
    maxSampleRecords: number;
    /** Report file (unset: stdout only) */
    outputFile?: string;
}

export interface ExecutionConfig {
    skipQualityTests: boolean;
    /** Complete the run even when quality checks fail */
    forceStore: boolean;
    /** Normalize without writing anything */
    dryRun: boolean;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface EtlConfig {
    /** Read works from this JSON file instead of the API */
    input?: string;

    api: ApiConfig;
    database: DatabaseConfig;
    testing: { runTests: boolean };
    execution: ExecutionConfig;
    quality: QualityConfig;

    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial config as read from a file or assembled from CLI flags.
 */
export interface EtlConfigInput {
    input?: string;
    api?: Partial<ApiConfig>;
    database?: Partial<DatabaseConfig>;
    testing?: { runTests?: boolean };
    execution?: Partial<ExecutionConfig>;
    quality?: Partial<QualityConfig>;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: EtlConfig = {
    api: {
        daysBack: 3,
        minRelevanceScore: 0.7,
        concept: 'artificial intelligence',
    },
    database: {
        path: './biblio.db',
        deploySchema: true,
    },
    testing: {
        runTests: true,
    },
    execution: {
        skipQualityTests: false,
        forceStore: false,
        dryRun: false,
    },
    quality: {
        suspiciousCitationThreshold: 100000,
        retractedUpdateWindowDays: 30,
        minPublicationYear: 1900,
        maxPublicationYear: new Date().getFullYear() + 1,
        maxSampleRecords: 10,
    },
    logLevel: 'info',
    jsonLogs: false,
};
