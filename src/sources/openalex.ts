import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ApiConfig, WorkSource, WorkSourceOptions } from '../types/index.js';
import { assessFetchRelevance } from '../etl/relevance.js';
import { HttpClient, type HttpResponse } from '../utils/http-client.js';
import { FetchError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { asArray, asNumber, asString, extractIdFromUrl, getPath, isRecord } from './utils.js';

const OPENALEX_BASE = 'https://api.openalex.org';
const PER_PAGE = 200;

export interface OpenAlexSourceOptions extends WorkSourceOptions {
    api: Pick<ApiConfig, 'concept' | 'daysBack' | 'minRelevanceScore' | 'outputDir'>;
    /** Fixed "today" for the publication-date window */
    now?: () => Date;
}

/**
 * Live OpenAlex fetch: resolve the domain concept, page through the recent
 * works tagged with it, and keep the ones the relevance scorer accepts.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexSource implements WorkSource {
    readonly name = 'OpenAlex';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly api: OpenAlexSourceOptions['api'];
    private readonly now: () => Date;

    constructor(options: OpenAlexSourceOptions) {
        this.apiKey = options.apiKey ?? process.env['OPENALEX_API_KEY'];
        this.email = options.email;
        this.api = options.api;
        this.now = options.now ?? (() => new Date());
        this.httpClient = new HttpClient({ email: this.email });
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async fetchWorks(): Promise<unknown[]> {
        const logger = getLogger();

        try {
            const conceptId = await this.findConcept();
            const works = await this.fetchRecentWorks(conceptId);
            const relevant = this.filterRelevant(works);

            logger.info(
                { fetched: works.length, kept: relevant.length, filteredOut: works.length - relevant.length },
                'Filtered works by relevance'
            );

            if (this.api.outputDir) {
                await saveWorks(relevant, this.api.outputDir, this.now());
            }

            return relevant;
        } catch (error) {
            if (error instanceof FetchError) throw error;
            throw new FetchError(`OpenAlex fetch failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Id of the most cited concept matching the configured concept name.
     */
    async findConcept(): Promise<string> {
        const params = new URLSearchParams({ search: this.api.concept });
        this.addAuthParams(params);

        const url = `${OPENALEX_BASE}/concepts?${params.toString()}`;
        getLogger().debug({ url }, 'OpenAlex concept search');

        const response = await this.httpClient.get<unknown>(url, { source: 'openalex' });
        const candidates = asArray(getPath(response.data, 'results'));

        let best: { id: string; citedBy: number; name: string | null } | null = null;
        for (const candidate of candidates) {
            const id = extractIdFromUrl(getPath(candidate, 'id'));
            if (!id) continue;
            const citedBy = asNumber(getPath(candidate, 'cited_by_count')) ?? 0;
            if (!best || citedBy > best.citedBy) {
                best = { id, citedBy, name: asString(getPath(candidate, 'display_name')) };
            }
        }

        if (!best) {
            throw new FetchError(`No OpenAlex concept found for "${this.api.concept}"`);
        }

        getLogger().info({ conceptId: best.id, name: best.name, citedBy: best.citedBy }, 'Resolved concept');
        return best.id;
    }

    /**
     * Every work tagged with `conceptId` published inside the `daysBack` window.
     */
    async fetchRecentWorks(conceptId: string): Promise<unknown[]> {
        const logger = getLogger();
        const end = this.now();
        const start = new Date(end.getTime() - this.api.daysBack * 24 * 60 * 60 * 1000);
        const filter = [
            `concepts.id:${conceptId}`,
            `from_publication_date:${isoDate(start)}`,
            `to_publication_date:${isoDate(end)}`,
        ].join(',');

        const works: unknown[] = [];
        let cursor: string | null = '*';
        let page = 0;

        while (cursor) {
            const params: URLSearchParams = new URLSearchParams({ filter, per_page: String(PER_PAGE), cursor });
            this.addAuthParams(params);

            const response: HttpResponse<unknown> = await this.httpClient.get<unknown>(`${OPENALEX_BASE}/works?${params.toString()}`, {
                source: 'openalex',
            });
            const results = asArray(getPath(response.data, 'results'));
            page++;
            works.push(...results);
            logger.debug({ page, results: results.length, total: works.length }, 'Fetched works page');

            cursor = results.length > 0 ? asString(getPath(response.data, 'meta', 'next_cursor')) : null;
        }

        logger.info({ works: works.length, pages: page, from: isoDate(start), to: isoDate(end) }, 'Fetched recent works');
        return works;
    }

    /**
     * Score, annotate and keep the relevant works, highest score first.
     */
    filterRelevant(works: readonly unknown[]): Record<string, unknown>[] {
        const kept: Array<Record<string, unknown> & { _relevance_score: number }> = [];

        for (const work of works) {
            if (!isRecord(work)) continue;
            const relevance = assessFetchRelevance(work, this.api.minRelevanceScore);
            if (!relevance.accepted) continue;
            kept.push({ ...work, _relevance_score: relevance.score, _has_domain_field: relevance.hasDomainField });
        }

        return kept.sort((a, b) => b._relevance_score - a._relevance_score);
    }

    private addAuthParams(params: URLSearchParams): void {
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
        if (this.email) {
            params.set('mailto', this.email);
        }
    }
}

/**
 * Write works to `<outputDir>/works_<timestamp>.json`. Returns the file path.
 */
export async function saveWorks(works: readonly unknown[], outputDir: string, at: Date = new Date()): Promise<string> {
    await mkdir(outputDir, { recursive: true });

    const stamp = at.toISOString().slice(0, 19).replace('T', '_').replace(/:/g, '-');
    const path = join(outputDir, `works_${stamp}.json`);
    await writeFile(path, JSON.stringify(works, null, 2), 'utf-8');

    getLogger().info({ path, works: works.length }, 'Saved works');
    return path;
}

function isoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}
