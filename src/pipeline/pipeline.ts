import type {
    EtlConfig,
    ImportStats,
    PipelineOutcome,
    PipelineResult,
    PipelineStage,
    QualityReport,
    StageError,
    WorkSource,
} from '../types/index.js';
import { RunContext } from '../etl/run-context.js';
import { QualityValidator } from '../quality/validator.js';
import { writeQualityReport } from '../quality/report.js';
import { ResearchDatabase } from '../storage/database.js';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { PaperImporter, formatImportSummary } from './importer.js';

export interface PipelineDependencies {
    source: WorkSource;
    /** Defaults to opening the SQLite file at `database.path` */
    openDatabase?: (path: string) => ResearchDatabase;
    /** Report sink; defaults to stdout plus `quality.outputFile` */
    writeReport?: (report: QualityReport) => void;
}

/**
 * Thrown inside a stage to end the run as FAILED.
 */
class StageFailure extends Error {}

/**
 * FETCH → SCHEMA_ENSURE → LOAD → VALIDATE → DONE.
 *
 * Any stage but VALIDATE failing ends the run in FAILED. Failing quality
 * checks end it in FAILED, or in FORCED when `execution.forceStore` is set;
 * the loaded data is committed either way.
 *
 * A fetch that returns no works ends the run in DONE straight after FETCH:
 * the store is not opened, so SCHEMA_ENSURE and VALIDATE do not run.
 */
export class Pipeline {
    private readonly context = new RunContext();
    private readonly openDatabase: (path: string) => ResearchDatabase;
    private readonly writeReport: (report: QualityReport) => void;
    private stopRequested = false;

    private stages: PipelineStage[] = [];
    private errors: StageError[] = [];
    private fetched = 0;
    private importStats: ImportStats | null = null;
    private report: QualityReport | null = null;

    constructor(
        private readonly config: EtlConfig,
        private readonly deps: PipelineDependencies
    ) {
        this.openDatabase = deps.openDatabase ?? ((path) => new ResearchDatabase(path));
        this.writeReport = deps.writeReport ?? ((report) => {
            writeQualityReport(report, config.quality.outputFile);
        });
    }

    /**
     * Ask a running LOAD to stop before its next paper.
     */
    requestStop(): void {
        this.stopRequested = true;
    }

    async run(): Promise<PipelineResult> {
        const logger = getLogger();
        const start = performance.now();
        const { execution, database, testing } = this.config;
        this.reset();

        let db: ResearchDatabase | null = null;
        let outcome: PipelineOutcome;

        try {
            const works = await this.stage('FETCH', () => this.deps.source.fetchWorks());
            this.fetched = works.length;

            if (works.length === 0) {
                logger.info('No works fetched, nothing to load');
                outcome = this.finish('DONE');
            } else if (execution.dryRun) {
                logger.info({ works: works.length }, 'Dry run: normalizing without writing');
                await this.stage('LOAD', () => this.load(works, null));
                outcome = this.finish('DONE');
            } else {
                db = await this.stage('SCHEMA_ENSURE', () => this.ensureSchema(database.path, database.deploySchema));
                const store = db;
                await this.stage('LOAD', () => this.load(works, store));

                if (!testing.runTests || execution.skipQualityTests) {
                    logger.info('Quality checks skipped');
                    outcome = this.finish('DONE');
                } else {
                    const passed = await this.stage('VALIDATE', () => this.validate(store));
                    if (passed) {
                        outcome = this.finish('DONE');
                    } else if (execution.forceStore) {
                        logger.warn('Quality checks failed, continuing because forceStore is set');
                        outcome = this.finish('FORCED');
                    } else {
                        outcome = this.finish('FAILED');
                    }
                }
            }
        } catch (error) {
            if (!(error instanceof StageFailure)) throw error;
            outcome = this.finish('FAILED');
        } finally {
            db?.close();
        }

        const result: PipelineResult = {
            outcome,
            stages: [...this.stages],
            fetched: this.fetched,
            importStats: this.importStats,
            report: this.report,
            errors: [...this.errors],
            duration: performance.now() - start,
        };

        logger.info({ outcome, durationMs: Math.round(result.duration), errors: result.errors.length }, 'Pipeline finished');
        return result;
    }

    private reset(): void {
        this.stages = [];
        this.errors = [];
        this.fetched = 0;
        this.importStats = null;
        this.report = null;
        this.stopRequested = false;
    }

    /**
     * Enter `stage`, run `fn`, and turn any error into a recorded StageFailure.
     */
    private async stage<T>(stage: PipelineStage, fn: () => T | Promise<T>): Promise<T> {
        const logger = getLogger();
        this.stages.push(stage);
        logger.info({ stage }, 'Stage started');

        try {
            return await fn();
        } catch (error) {
            const message = errorMessage(error);
            this.errors.push({ stage, message });
            logger.error({ stage, err: message }, 'Stage failed');
            throw new StageFailure(message, { cause: error });
        }
    }

    private finish(outcome: PipelineOutcome): PipelineOutcome {
        this.stages.push(outcome);
        return outcome;
    }

    private ensureSchema(path: string, deploySchema: boolean): ResearchDatabase {
        const db = this.openDatabase(path);
        try {
            if (deploySchema) {
                db.ensureSchema();
            } else {
                getLogger().info('Schema deployment disabled');
            }
        } catch (error) {
            db.close();
            throw error;
        }
        return db;
    }

    private load(works: readonly unknown[], db: ResearchDatabase | null): void {
        const importer = new PaperImporter({ target: db ?? undefined, context: this.context });
        importer.reset();

        const { stats, stopped } = importer.importAll(works, () => this.stopRequested);
        this.importStats = stats;

        getLogger().info(
            {
                processed: stats.processed,
                failed: stats.failed,
                papers: stats.papers,
                authors: stats.authors,
                paperAuthors: stats.paperAuthors,
            },
            'Load finished'
        );
        if (stats.failed > 0) {
            getLogger().warn({ failed: stats.failed }, 'Some papers failed to import');
        }

        if (stopped) {
            throw new Error(`Stopped by request after ${stats.processed} of ${works.length} works`);
        }
    }

    private validate(db: ResearchDatabase): boolean {
        const validator = new QualityValidator(db.getRawDb(), this.config.quality);
        const report = validator.runAll();
        this.report = report;
        this.writeReport(report);

        const failed = report.results.filter((r) => !r.passed).length;
        if (failed > 0) {
            this.errors.push({ stage: 'VALIDATE', message: `${failed} quality check(s) failed` });
        }
        return report.passed;
    }
}

/**
 * Closing summary of a run: outcome, stages, counts and errors per stage.
 */
export function formatPipelineSummary(result: PipelineResult): string {
    const failedChecks = result.report?.results.filter((r) => !r.passed).length ?? 0;
    const passedChecks = (result.report?.results.length ?? 0) - failedChecks;

    const lines = [
        `Pipeline ${result.outcome} in ${(result.duration / 1000).toFixed(2)}s`,
        `  Stages:    ${result.stages.join(' → ')}`,
        `  Fetched:   ${result.fetched}`,
        `  Processed: ${result.importStats?.processed ?? 0}`,
        `  Checks:    ${passedChecks} passed, ${failedChecks} failed`,
        `  Errors:    ${result.errors.length}`,
        ...result.errors.map((e) => `    - [${e.stage}] ${e.message}`),
    ];

    if (result.importStats) {
        lines.push('', formatImportSummary(result.importStats));
    }

    return lines.join('\n');
}
