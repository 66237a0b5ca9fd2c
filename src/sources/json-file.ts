import { readFile } from 'node:fs/promises';
import type { WorkSource } from '../types/index.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Reads works from a JSON file holding an array of raw OpenAlex works,
 * such as one written by `OpenAlexSource.saveWorks`.
 */
export class JsonFileSource implements WorkSource {
    readonly name = 'json-file';

    constructor(private readonly path: string) {}

    async fetchWorks(): Promise<unknown[]> {
        let text: string;
        try {
            text = await readFile(this.path, 'utf-8');
        } catch (error) {
            throw new FetchError(`Cannot read ${this.path}: ${errorMessage(error)}`, { cause: error });
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (error) {
            throw new FetchError(`Invalid JSON in ${this.path}: ${errorMessage(error)}`, { cause: error });
        }

        if (!Array.isArray(parsed)) {
            throw new FetchError(`${this.path} must contain a JSON array of works`);
        }

        getLogger().info({ path: this.path, works: parsed.length }, 'Loaded works from file');
        return parsed;
    }
}
