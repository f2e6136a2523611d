import type { OpenAlexWork, OpenAlexWorksPage } from '../types/index.js';
import { createHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { isWorkRecord } from '../parser/work-parser.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export const OPENALEX_BASE = 'https://api.openalex.org';

/** Cursor that starts a fresh cursor walk. */
export const INITIAL_CURSOR = '*';

/**
 * Institution and publication-year bounds for a works query.
 */
export interface WorksFilter {
    /** Bare ROR identifier, e.g. "03490as77" */
    ror: string;
    fromYear?: number;
    toYear?: number;
}

/**
 * One fetched page, reduced to what the harvester needs.
 */
export interface WorksPage {
    results: OpenAlexWork[];
    /** Cursor for the following page; null once the walk is over. */
    nextCursor: string | null;
    /** Total matching works reported by the API, when present */
    count: number | null;
}

/**
 * Build the `filter` parameter for an institution's works.
 *
 * The institution predicate is always present; year bounds are ANDed in
 * (comma) as a closed range or a one-sided strict comparison.
 */
export function buildWorksFilter({ ror, fromYear, toYear }: WorksFilter): string {
    const predicates = [`institutions.ror:${ror}`];

    if (fromYear !== undefined && toYear !== undefined) {
        predicates.push(`publication_year:${fromYear}-${toYear}`);
    } else if (fromYear !== undefined) {
        predicates.push(`publication_year:>${fromYear - 1}`);
    } else if (toYear !== undefined) {
        predicates.push(`publication_year:<${toYear + 1}`);
    }

    return predicates.join(',');
}

/**
 * Cursor-paginated client for the OpenAlex `/works` list endpoint.
 *
 * @see https://docs.openalex.org/how-to-use-the-api/get-lists-of-entities/paging
 */
export class OpenAlexWorksClient {
    private readonly httpClient: HttpClient;
    private readonly email?: string;

    constructor(options?: { email?: string; httpClient?: HttpClient }) {
        this.email = options?.email;
        this.httpClient = options?.httpClient ?? createHttpClient({ email: options?.email });
    }

    /**
     * Build the request URL for one page.
     */
    buildPageUrl(filter: string, cursor: string, perPage: number): string {
        const params = new URLSearchParams({
            filter,
            'per-page': String(perPage),
            cursor,
        });
        if (this.email) {
            params.set('mailto', this.email);
        }
        return `${OPENALEX_BASE}/works?${params.toString()}`;
    }

    /**
     * Fetch one page of works. Transport failures surface as `HttpError`.
     */
    async fetchPage(filter: string, cursor: string, perPage: number): Promise<WorksPage> {
        const url = this.buildPageUrl(filter, cursor, perPage);
        logger.debug({ url }, 'OpenAlex works page');

        const response = await this.httpClient.get<OpenAlexWorksPage>(url, { source: 'openalex' });
        return toWorksPage(response.data, response.status, url);
    }

    /**
     * HTTP attempts made against OpenAlex so far, retries included.
     */
    getRequestCount(): number {
        return this.httpClient.getRequestCount('openalex');
    }
}

/**
 * Reduce a `/works` body to a page. A body without a `results` array cannot
 * be told apart from a cut-short walk, so it fails the request; entries that
 * are not objects are dropped.
 */
function toWorksPage(data: OpenAlexWorksPage | string | null, status: number, url: string): WorksPage {
    if (typeof data !== 'object' || data === null || !Array.isArray(data.results)) {
        throw new HttpError(`Unexpected OpenAlex response (no results array): ${url}`, status, false, data);
    }

    const results = data.results.filter(isWorkRecord);
    if (results.length < data.results.length) {
        logger.warn({ url, dropped: data.results.length - results.length }, 'Skipping results that are not objects');
    }

    const nextCursor = data.meta?.next_cursor;
    const count = data.meta?.count;

    return {
        results,
        nextCursor: typeof nextCursor === 'string' && nextCursor.length > 0 ? nextCursor : null,
        count: typeof count === 'number' ? count : null,
    };
}
