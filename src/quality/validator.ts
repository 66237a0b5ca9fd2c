import type Database from 'better-sqlite3';
import type {
    CheckResult,
    QualityCheck,
    QualityConfig,
    QualityReport,
    SampleRecord,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { QUALITY_CHECKS } from './checks.js';

/**
 * Runs the quality check table against the store.
 *
 * Checks never mutate data, and a failing or erroring check never stops
 * the others: errors are reported as a failed check.
 */
export class QualityValidator {
    constructor(
        private readonly db: Database.Database,
        private readonly config: QualityConfig,
        private readonly checks: readonly QualityCheck[] = QUALITY_CHECKS
    ) {}

    runAll(): QualityReport {
        const logger = getLogger();
        const startedAt = new Date();
        const start = performance.now();

        logger.info({ checks: this.checks.length }, 'Running quality checks');
        const results = this.checks.map((check) => this.runCheck(check));
        const passed = results.every((r) => r.passed);
        const duration = performance.now() - start;

        const failedIds = results.filter((r) => !r.passed).map((r) => r.id);
        logger.info(
            { passed: results.length - failedIds.length, failed: failedIds.length, failedIds, durationMs: Math.round(duration) },
            passed ? 'All quality checks passed' : 'Quality checks failed'
        );

        return { startedAt, duration, results, passed };
    }

    runCheck(check: QualityCheck): CheckResult {
        const start = performance.now();
        const base = {
            id: check.id,
            name: check.name,
            category: check.category,
            description: check.description,
        };

        try {
            const params = this.paramsFor(check);
            const count = this.db
                .prepare<unknown[], { failure_count: number }>(check.countSql)
                .get(...(Object.keys(params).length > 0 ? [params] : []));
            const failureCount = count?.failure_count ?? 0;

            let samples: SampleRecord[] = [];
            if (failureCount > 0 && this.config.maxSampleRecords > 0) {
                samples = this.db
                    .prepare<unknown[], SampleRecord>(check.sampleSql)
                    .all({ ...params, limit: this.config.maxSampleRecords });
            }

            getLogger().debug({ check: check.id, failureCount }, check.name);
            return {
                ...base,
                passed: failureCount === 0,
                failureCount,
                samples,
                executionTime: performance.now() - start,
            };
        } catch (error) {
            getLogger().error({ check: check.id, err: errorMessage(error) }, 'Quality check could not run');
            return {
                ...base,
                passed: false,
                failureCount: 0,
                samples: [],
                executionTime: performance.now() - start,
                error: errorMessage(error),
            };
        }
    }

    private paramsFor(check: QualityCheck): Record<string, number> {
        const params: Record<string, number> = {};
        for (const name of check.params) {
            params[name] = this.config[name];
        }
        return params;
    }
}
