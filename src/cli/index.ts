#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { Pipeline, formatPipelineSummary } from '../pipeline/pipeline.js';
import { QualityValidator } from '../quality/validator.js';
import { writeQualityReport } from '../quality/report.js';
import { ResearchDatabase } from '../storage/database.js';
import { JsonFileSource } from '../sources/json-file.js';
import { OpenAlexSource, saveWorks } from '../sources/openalex.js';
import type { EtlConfig, EtlConfigInput, LogLevel, WorkSource } from '../types/index.js';

const VERSION = '1.0.0';

interface CommonOptions {
    config?: string;
    db?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface RunOptions extends CommonOptions {
    input?: string;
    daysBack?: number;
    minScore?: number;
    email?: string;
    outputDir?: string;
    deploySchema: boolean;
    skipTests?: boolean;
    force?: boolean;
    dryRun?: boolean;
    report?: string;
}

interface CheckOptions extends CommonOptions {
    report?: string;
}

interface FetchOptions extends CommonOptions {
    daysBack?: number;
    minScore?: number;
    email?: string;
    outputDir?: string;
}

interface InspectOptions extends CommonOptions {
    top: number;
}

const program = new Command();

program
    .name('biblio-etl')
    .description('Load OpenAlex works into a SQLite research store and check its data quality.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

withRunOptions(
    program
        .command('run')
        .description('Fetch works (API or --input file), load them, and run the quality checks')
        .option('-i, --input <file>', 'Read works from a JSON file instead of the API')
).action(async (opts: RunOptions) => {
    await runPipeline(opts);
});

// ─── IMPORT command ───────────────────────────────────────

withRunOptions(
    program
        .command('import')
        .description('Load works from a JSON file and run the quality checks')
        .argument('<file>', 'JSON array of OpenAlex works')
).action(async (file: string, opts: RunOptions) => {
    await runPipeline({ ...opts, input: file });
});

// ─── CHECK command ────────────────────────────────────────

withCommonOptions(
    program
        .command('check')
        .description('Run the quality checks against an existing database')
        .option('-r, --report <file>', 'Also write the report to this file')
).action(async (opts: CheckOptions) => {
    await guarded(async () => {
        const config = await configure(opts, { quality: { outputFile: opts.report } });
        const db = new ResearchDatabase(config.database.path);
        try {
            const report = new QualityValidator(db.getRawDb(), config.quality).runAll();
            writeQualityReport(report, config.quality.outputFile);
            process.exitCode = report.passed ? 0 : 1;
        } finally {
            db.close();
        }
    });
});

// ─── FETCH command ────────────────────────────────────────

withCommonOptions(
    program
        .command('fetch')
        .description('Fetch recent relevant works from OpenAlex and save them as JSON')
        .option('--days-back <n>', 'Publication-date lookback window in days', parseInteger)
        .option('--min-score <score>', 'Minimum fetch-time relevance score', parseScore)
        .option('--email <email>', 'Contact email for the OpenAlex polite pool')
        .option('-o, --output-dir <dir>', 'Directory for the saved JSON file', './data')
).action(async (opts: FetchOptions) => {
    await guarded(async () => {
        const config = await configure(opts, {
            api: { daysBack: opts.daysBack, minRelevanceScore: opts.minScore, email: opts.email, outputDir: opts.outputDir },
        });
        const source = new OpenAlexSource({ api: { ...config.api, outputDir: undefined }, email: config.api.email });
        const works = await source.fetchWorks();
        const path = await saveWorks(works, config.api.outputDir ?? './data');
        console.log(`Saved ${works.length} works to ${path}`);
    });
});

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program
        .command('inspect')
        .description('Show table counts and the most cited authors')
        .option('--top <n>', 'Number of authors to list', parseInteger, 10)
).action(async (opts: InspectOptions) => {
    await guarded(async () => {
        const config = await configure(opts, {});
        const db = new ResearchDatabase(config.database.path);
        try {
            if (!db.hasSchema()) {
                console.log(`No schema in ${config.database.path}; run an import first.`);
                return;
            }

            const stats = db.getStats();
            console.log('\nResearch Database Statistics\n');
            console.log(`  Papers:       ${stats.papers}`);
            console.log(`  Authors:      ${stats.authors}`);
            console.log(`  Authorships:  ${stats.paper_authors}`);

            const authors = db.getAuthorProductivity(opts.top);
            if (authors.length > 0) {
                console.log('\n  Top authors by citations:');
                for (const author of authors) {
                    console.log(`    ${author.display_name}: ${author.total_papers} papers, ${author.total_citations} citations`);
                }
            }
            console.log('');
        } finally {
            db.close();
        }
    });
});

await program.parseAsync();

// ─── Helpers ──────────────────────────────────────────────

function withCommonOptions(command: Command): Command {
    return command
        .option('-c, --config <path>', 'Config file (default: search for biblio-etl.config.{json,yaml,yml})')
        .option('--db <path>', 'SQLite database path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevel)
        .option('--json-logs', 'Output JSON logs');
}

function withRunOptions(command: Command): Command {
    return withCommonOptions(command)
        .option('--days-back <n>', 'Publication-date lookback window in days', parseInteger)
        .option('--min-score <score>', 'Minimum fetch-time relevance score', parseScore)
        .option('--email <email>', 'Contact email for the OpenAlex polite pool')
        .option('-o, --output-dir <dir>', 'Save fetched works as JSON in this directory')
        .option('--no-deploy-schema', 'Do not create or migrate the schema')
        .option('--skip-tests', 'Skip the quality checks')
        .option('--force', 'Finish the run even when quality checks fail')
        .option('--dry-run', 'Normalize works without writing anything')
        .option('-r, --report <file>', 'Also write the quality report to this file');
}

async function runPipeline(opts: RunOptions): Promise<void> {
    await guarded(async () => {
        const config = await configure(opts, {
            input: opts.input,
            api: { daysBack: opts.daysBack, minRelevanceScore: opts.minScore, email: opts.email, outputDir: opts.outputDir },
            // commander sets deploySchema to true unless --no-deploy-schema; only the flag should override
            database: { deploySchema: opts.deploySchema ? undefined : false },
            execution: { skipQualityTests: opts.skipTests, forceStore: opts.force, dryRun: opts.dryRun },
            quality: { outputFile: opts.report },
        });

        const pipeline = new Pipeline(config, { source: createSource(config) });
        const onSignal = (): void => {
            getLogger().warn('Interrupt received, stopping after the current paper');
            pipeline.requestStop();
        };
        process.once('SIGINT', onSignal);

        try {
            const result = await pipeline.run();
            console.log(`\n${formatPipelineSummary(result)}\n`);
            process.exitCode = result.outcome === 'FAILED' ? 1 : 0;
        } finally {
            process.off('SIGINT', onSignal);
        }
    });
}

function createSource(config: EtlConfig): WorkSource {
    if (config.input) {
        return new JsonFileSource(config.input);
    }
    return new OpenAlexSource({ api: config.api, email: config.api.email });
}

/**
 * Resolve config from file, env and flags, then start the logger.
 */
async function configure(opts: CommonOptions, flags: EtlConfigInput): Promise<EtlConfig> {
    const config = await resolveConfig(
        {
            ...flags,
            database: { ...flags.database, path: opts.db },
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
        },
        opts.config
    );
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

/**
 * Run a command body, mapping errors to exit code 1.
 */
async function guarded(fn: () => Promise<void>): Promise<void> {
    try {
        await fn();
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Configuration error: ${error.message}`);
        } else {
            getLogger().error({ err: errorMessage(error) }, 'Command failed');
        }
        process.exitCode = 1;
    }
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseScore(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function parseLevel(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected one of error, warn, info, debug, silent.');
    }
    return level;
}
