import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type EtlConfig, type EtlConfigInput } from '../types/index.js';
import { ConfigError, errorMessage } from './errors.js';
import { getLogger, parseLogLevel } from './logger.js';

const MODULE_NAME = 'biblio-etl';

/**
 * Load configuration using cosmiconfig.
 * With an explicit path the file must exist; otherwise the usual search places
 * are tried and a missing file is fine (defaults are used).
 * A file that exists but cannot be parsed is a ConfigError.
 */
async function loadConfigFile(configPath?: string): Promise<EtlConfigInput | null> {
    const explorer = cosmiconfig(MODULE_NAME, {
        searchPlaces: [
            `${MODULE_NAME}.config.json`,
            `${MODULE_NAME}.config.yaml`,
            `${MODULE_NAME}.config.yml`,
        ],
    });

    let result;
    try {
        result = configPath ? await explorer.load(configPath) : await explorer.search();
    } catch (error) {
        throw new ConfigError(`Failed to load config file: ${errorMessage(error)}`, { cause: error });
    }

    if (!result || result.isEmpty) {
        return null;
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseConfigInput(result.config, result.filepath);
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): EtlConfigInput {
    const env: EtlConfigInput = {};

    const dbPath = process.env['BIBLIO_ETL_DB_PATH'];
    if (dbPath) {
        env.database = { path: dbPath };
    }

    const email = process.env['OPENALEX_EMAIL'];
    if (email) {
        env.api = { email };
    }

    const logLevel = parseLogLevel(process.env['LOG_LEVEL']);
    if (logLevel) {
        env.logLevel = logLevel;
    }

    return env;
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(cliFlags: EtlConfigInput, configPath?: string): Promise<EtlConfig> {
    const fileConfig = await loadConfigFile(configPath);
    const envConfig = loadEnvVars();

    const merged = mergeConfig(DEFAULT_CONFIG, fileConfig ?? {}, envConfig, cliFlags);
    validateConfig(merged);
    return merged;
}

/**
 * Deep-merge partial configs over a base, later layers winning.
 * `undefined` values never override.
 */
export function mergeConfig(base: EtlConfig, ...layers: EtlConfigInput[]): EtlConfig {
    let merged: EtlConfig = base;

    for (const layer of layers) {
        merged = {
            input: layer.input ?? merged.input,
            api: overlay(merged.api, layer.api),
            database: overlay(merged.database, layer.database),
            testing: overlay(merged.testing, layer.testing),
            execution: overlay(merged.execution, layer.execution),
            quality: overlay(merged.quality, layer.quality),
            logLevel: layer.logLevel ?? merged.logLevel,
            jsonLogs: layer.jsonLogs ?? merged.jsonLogs,
        };
    }

    return merged;
}

function overlay<T extends object>(base: T, patch: Partial<T> | undefined): T {
    const out = { ...base };
    if (!patch) return out;
    for (const [key, value] of Object.entries(patch)) {
        if (value !== undefined) {
            Reflect.set(out, key, value);
        }
    }
    return out;
}

/**
 * Reject values no stage could run with.
 */
export function validateConfig(config: EtlConfig): void {
    const problems: string[] = [];

    if (!config.database.path.trim()) {
        problems.push('database.path is required');
    }
    if (!Number.isInteger(config.api.daysBack) || config.api.daysBack < 1) {
        problems.push('api.daysBack must be a positive integer');
    }
    if (config.api.minRelevanceScore < 0 || config.api.minRelevanceScore > 1) {
        problems.push('api.minRelevanceScore must be between 0 and 1');
    }
    if (config.quality.suspiciousCitationThreshold < 0) {
        problems.push('quality.suspiciousCitationThreshold must be non-negative');
    }
    if (!Number.isInteger(config.quality.retractedUpdateWindowDays) || config.quality.retractedUpdateWindowDays < 0) {
        problems.push('quality.retractedUpdateWindowDays must be a non-negative integer');
    }
    if (config.quality.minPublicationYear > config.quality.maxPublicationYear) {
        problems.push('quality.minPublicationYear must not exceed quality.maxPublicationYear');
    }
    if (!Number.isInteger(config.quality.maxSampleRecords) || config.quality.maxSampleRecords < 0) {
        problems.push('quality.maxSampleRecords must be a non-negative integer');
    }

    if (problems.length > 0) {
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
    }
}

// ─── File parsing ─────────────────────────────────────────

type Section = Record<string, unknown>;

/**
 * Check the shape of a parsed config file.
 * Unknown keys are ignored; known keys with the wrong type are errors.
 */
export function parseConfigInput(raw: unknown, source = 'config'): EtlConfigInput {
    if (!isSection(raw)) {
        throw new ConfigError(`${source}: expected an object at the top level`);
    }

    const reader = new SectionReader(source);
    const input: EtlConfigInput = {};

    input.input = reader.string(raw, 'input');
    const logLevel = reader.string(raw, 'logLevel');
    if (logLevel !== undefined) {
        input.logLevel = parseLogLevel(logLevel);
        if (!input.logLevel) {
            throw new ConfigError(`${source}: logLevel "${logLevel}" is not one of error, warn, info, debug, silent`);
        }
    }
    input.jsonLogs = reader.boolean(raw, 'jsonLogs');

    const api = reader.section(raw, 'api');
    if (api) {
        input.api = {
            daysBack: reader.number(api, 'daysBack', 'api'),
            minRelevanceScore: reader.number(api, 'minRelevanceScore', 'api'),
            concept: reader.string(api, 'concept', 'api'),
            email: reader.string(api, 'email', 'api'),
            outputDir: reader.string(api, 'outputDir', 'api'),
        };
    }

    const database = reader.section(raw, 'database');
    if (database) {
        input.database = {
            path: reader.string(database, 'path', 'database'),
            deploySchema: reader.boolean(database, 'deploySchema', 'database'),
        };
    }

    const testing = reader.section(raw, 'testing');
    if (testing) {
        input.testing = { runTests: reader.boolean(testing, 'runTests', 'testing') };
    }

    const execution = reader.section(raw, 'execution');
    if (execution) {
        input.execution = {
            skipQualityTests: reader.boolean(execution, 'skipQualityTests', 'execution'),
            forceStore: reader.boolean(execution, 'forceStore', 'execution'),
            dryRun: reader.boolean(execution, 'dryRun', 'execution'),
        };
    }

    const quality = reader.section(raw, 'quality');
    if (quality) {
        input.quality = {
            suspiciousCitationThreshold: reader.number(quality, 'suspiciousCitationThreshold', 'quality'),
            retractedUpdateWindowDays: reader.number(quality, 'retractedUpdateWindowDays', 'quality'),
            minPublicationYear: reader.number(quality, 'minPublicationYear', 'quality'),
            maxPublicationYear: reader.number(quality, 'maxPublicationYear', 'quality'),
            maxSampleRecords: reader.number(quality, 'maxSampleRecords', 'quality'),
            outputFile: reader.string(quality, 'outputFile', 'quality'),
        };
    }

    return input;
}

function isSection(value: unknown): value is Section {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SectionReader {
    constructor(private readonly source: string) {}

    section(obj: Section, key: string): Section | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (!isSection(value)) throw this.typeError(key, 'an object');
        return value;
    }

    string(obj: Section, key: string, prefix?: string): string | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'string') throw this.typeError(key, 'a string', prefix);
        return value;
    }

    number(obj: Section, key: string, prefix?: string): number | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'number' || !Number.isFinite(value)) throw this.typeError(key, 'a number', prefix);
        return value;
    }

    boolean(obj: Section, key: string, prefix?: string): boolean | undefined {
        const value = obj[key];
        if (value === undefined || value === null) return undefined;
        if (typeof value !== 'boolean') throw this.typeError(key, 'a boolean', prefix);
        return value;
    }

    private typeError(key: string, expected: string, prefix?: string): ConfigError {
        const path = prefix ? `${prefix}.${key}` : key;
        return new ConfigError(`${this.source}: ${path} must be ${expected}`);
    }
}
