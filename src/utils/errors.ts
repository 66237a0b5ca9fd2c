import type { EntityKind } from '../types/index.js';

/**
 * Base class for errors raised by the ETL core.
 */
export class EtlError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'EtlError';
    }
}

/**
 * A raw record without a usable identifier. The record is skipped.
 */
export class NormalizationError extends EtlError {
    constructor(
        message: string,
        public readonly title: string | null = null
    ) {
        super(message);
        this.name = 'NormalizationError';
    }
}

/**
 * A batch write that was rolled back.
 * `batchSize` rows are counted as failed for `entity`.
 */
export class WriteError extends EtlError {
    constructor(
        message: string,
        public readonly entity: EntityKind,
        public readonly batchSize: number,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'WriteError';
    }
}

/**
 * A row referencing a paper or author that has not been written.
 * Never retried: the same order would fail the same way.
 */
export class OrderingViolationError extends WriteError {
    constructor(message: string, entity: EntityKind, batchSize: number, options?: { cause?: unknown }) {
        super(message, entity, batchSize, options);
        this.name = 'OrderingViolationError';
    }
}

/**
 * Missing or malformed configuration. Fatal at startup.
 */
export class ConfigError extends EtlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ConfigError';
    }
}

/**
 * Works could not be obtained (file unreadable, API unreachable, bad payload).
 */
export class FetchError extends EtlError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FetchError';
    }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
