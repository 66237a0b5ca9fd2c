import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { mergeConfig, parseConfigInput, resolveConfig, validateConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { removeDir, tempDir } from './helpers.js';

describe('mergeConfig', () => {
    it('should let later layers win', () => {
        const merged = mergeConfig(DEFAULT_CONFIG, { api: { daysBack: 5 } }, { api: { daysBack: 9 } });
        expect(merged.api.daysBack).toBe(9);
    });

    it('should not let undefined values override', () => {
        const merged = mergeConfig(
            DEFAULT_CONFIG,
            { api: { daysBack: 5 }, logLevel: 'debug' },
            { api: { daysBack: undefined, concept: 'robotics' }, logLevel: undefined }
        );

        expect(merged.api.daysBack).toBe(5);
        expect(merged.api.concept).toBe('robotics');
        expect(merged.api.minRelevanceScore).toBe(0.7);
        expect(merged.logLevel).toBe('debug');
    });

    it('should not modify the base', () => {
        mergeConfig(DEFAULT_CONFIG, { database: { path: 'other.db' } });
        expect(DEFAULT_CONFIG.database.path).toBe('./biblio.db');
    });
});

describe('validateConfig', () => {
    it('should accept the defaults', () => {
        expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
    });

    it('should list every problem', () => {
        const config = mergeConfig(DEFAULT_CONFIG, {
            api: { daysBack: 0, minRelevanceScore: 1.5 },
            quality: { minPublicationYear: 2030, maxPublicationYear: 2020 },
        });

        expect(() => validateConfig(config)).toThrow(
            new ConfigError(
                'Invalid configuration: api.daysBack must be a positive integer; ' +
                    'api.minRelevanceScore must be between 0 and 1; ' +
                    'quality.minPublicationYear must not exceed quality.maxPublicationYear'
            )
        );
    });

    it('should require a database path', () => {
        expect(() => validateConfig(mergeConfig(DEFAULT_CONFIG, { database: { path: '  ' } }))).toThrow(
            'database.path is required'
        );
    });
});

describe('parseConfigInput', () => {
    it('should read known sections', () => {
        const input = parseConfigInput({
            logLevel: 'debug',
            api: { daysBack: 7, concept: 'robotics' },
            execution: { forceStore: true },
            quality: { maxSampleRecords: 3 },
            unknown: { ignored: true },
        });

        expect(input.logLevel).toBe('debug');
        expect(input.api?.daysBack).toBe(7);
        expect(input.api?.concept).toBe('robotics');
        expect(input.execution?.forceStore).toBe(true);
        expect(input.quality?.maxSampleRecords).toBe(3);
        expect(input.database).toBeUndefined();
    });

    it('should reject a non-object document', () => {
        expect(() => parseConfigInput(['a'], 'biblio.yaml')).toThrow('biblio.yaml: expected an object at the top level');
    });

    it('should reject a mistyped value', () => {
        expect(() => parseConfigInput({ api: { daysBack: '3' } }, 'biblio.yaml')).toThrow(
            'biblio.yaml: api.daysBack must be a number'
        );
        expect(() => parseConfigInput({ database: 'x' })).toThrow('config: database must be an object');
    });

    it('should reject an unknown log level', () => {
        expect(() => parseConfigInput({ logLevel: 'loud' })).toThrow(ConfigError);
    });
});

describe('resolveConfig', () => {
    let dir: string;
    let configPath: string;

    beforeEach(() => {
        dir = tempDir();
        configPath = join(dir, 'biblio-etl.config.yaml');
        writeFileSync(
            configPath,
            ['api:', '  daysBack: 7', 'database:', '  path: ./from-file.db', 'quality:', '  maxSampleRecords: 3', ''].join('\n')
        );
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        removeDir(dir);
    });

    it('should layer the file over the defaults', async () => {
        const config = await resolveConfig({}, configPath);

        expect(config.api.daysBack).toBe(7);
        expect(config.database.path).toBe('./from-file.db');
        expect(config.quality.maxSampleRecords).toBe(3);
        expect(config.api.minRelevanceScore).toBe(0.7);
    });

    it('should let environment variables override the file', async () => {
        vi.stubEnv('BIBLIO_ETL_DB_PATH', 'env.db');
        vi.stubEnv('OPENALEX_EMAIL', 'test@example.org');

        const config = await resolveConfig({}, configPath);

        expect(config.database.path).toBe('env.db');
        expect(config.api.email).toBe('test@example.org');
    });

    it('should let CLI flags override everything', async () => {
        vi.stubEnv('BIBLIO_ETL_DB_PATH', 'env.db');

        const config = await resolveConfig({ database: { path: 'cli.db' }, logLevel: 'debug' }, configPath);

        expect(config.database.path).toBe('cli.db');
        expect(config.logLevel).toBe('debug');
    });

    it('should read the log level from the environment', async () => {
        const config = await resolveConfig({}, configPath);
        expect(config.logLevel).toBe('silent');
    });

    it('should fail on a missing explicit file', async () => {
        await expect(resolveConfig({}, join(dir, 'missing.yaml'))).rejects.toThrow(ConfigError);
    });

    it('should fail on an invalid merged result', async () => {
        await expect(resolveConfig({ api: { daysBack: -1 } }, configPath)).rejects.toThrow(
            'Invalid configuration: api.daysBack must be a positive integer'
        );
    });

    it('should fail on a mistyped file value', async () => {
        writeFileSync(configPath, 'testing:\n  runTests: "yes"\n');

        await expect(resolveConfig({}, configPath)).rejects.toThrow(`${configPath}: testing.runTests must be a boolean`);
    });
});
