import type { DatabaseHandler, OpenAlexRows, OpenAlexWork } from '../types/index.js';
import { MAX_PER_PAGE } from '../types/index.js';
import { buildWorksFilter, INITIAL_CURSOR, OpenAlexWorksClient } from '../sources/openalex.js';
import { normalizeId } from '../sources/identifiers.js';
import { getLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';
import { ingestWork, tallyInserted } from './ingest.js';
import { JsonlSink } from './jsonl-sink.js';

const logger = getLogger();

/**
 * idle → fetching → processing → fetching → … → done, or failed.
 */
export type HarvestState = 'idle' | 'fetching' | 'processing' | 'done' | 'failed';

/**
 * Reported after every persisted page; `nextCursor` is what a resumed run
 * would pass as `startCursor`.
 */
export interface PageProgress {
    page: number;
    cursor: string;
    nextCursor: string | null;
    records: number;
}

export interface HarvestOptions {
    /** Institution ROR, bare or as an https://ror.org/ URL */
    ror: string;
    fromYear?: number;
    toYear?: number;
    /** Page size, at most MAX_PER_PAGE (default) */
    perPage?: number;
    /** Contact address for the OpenAlex polite pool */
    mailto?: string;
    /** Stop after this many pages */
    maxPages?: number;
    /** JSONL sink; must not exist yet */
    jsonlPath?: string;
    /** A handler, or a function that opens one once the options are valid */
    database?: DatabaseHandler<OpenAlexRows> | (() => DatabaseHandler<OpenAlexRows>);
    startCursor?: string;
    onPage?: (progress: PageProgress) => void;
    client?: OpenAlexWorksClient;
    /** Clock used for the year-bound check */
    now?: () => Date;
}

export interface HarvestSummary {
    state: HarvestState;
    pages: number;
    records: number;
    /** HTTP attempts made by this run, retries included */
    requests: number;
    /** Cursor of the last page fetched */
    lastCursor: string | null;
    /** Cursor that was not followed because of `maxPages`, null after a full walk */
    resumeCursor: string | null;
    /** Rows inserted per table */
    inserted: Record<string, number>;
}

interface ResolvedHarvestOptions {
    ror: string;
    fromYear?: number;
    toYear?: number;
    perPage: number;
    maxPages?: number;
}

/**
 * Check harvest options before anything touches the network or the disk.
 * Returns the options with defaults applied and the ROR normalized.
 */
export function validateHarvestOptions(options: HarvestOptions, currentYear: number): ResolvedHarvestOptions {
    const { fromYear, toYear, maxPages, perPage = MAX_PER_PAGE } = options;

    if (!options.jsonlPath && !options.database) {
        throw new ConfigurationError('Provide a JSONL output path, a database, or both');
    }

    const ror = normalizeId(options.ror);
    if (!ror) {
        throw new ConfigurationError('An institution ROR is required');
    }

    if (!Number.isInteger(perPage) || perPage < 1 || perPage > MAX_PER_PAGE) {
        throw new ConfigurationError(`perPage must be an integer between 1 and ${MAX_PER_PAGE}, got ${perPage}`);
    }

    if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages < 1)) {
        throw new ConfigurationError(`maxPages must be a positive integer, got ${maxPages}`);
    }

    for (const [name, year] of [['fromYear', fromYear], ['toYear', toYear]] as const) {
        if (year === undefined) continue;
        if (!Number.isInteger(year)) {
            throw new ConfigurationError(`${name} must be an integer year, got ${year}`);
        }
        if (year > currentYear) {
            throw new ConfigurationError(`${name} ${year} cannot be after the current year ${currentYear}`);
        }
    }

    if (fromYear !== undefined && toYear !== undefined && fromYear > toYear) {
        throw new ConfigurationError(`fromYear ${fromYear} cannot be after toYear ${toYear}`);
    }

    return { ror, fromYear, toYear, perPage, maxPages };
}

/**
 * Walks the OpenAlex works of one institution with cursor paging.
 *
 * Strictly sequential: a page is fetched, written to the sink, parsed and
 * inserted (every table, parents first) before the next fetch. Transport
 * errors end the run in `failed`; whatever was persisted stays valid and a
 * rerun skips it.
 */
export class WorksHarvester {
    private state: HarvestState = 'idle';
    private readonly resolved: ResolvedHarvestOptions;
    private readonly sink: JsonlSink | null;
    private readonly client: OpenAlexWorksClient;
    private readonly database: DatabaseHandler<OpenAlexRows> | null;

    /**
     * Validates the options and claims the sink path. A database opener is
     * only called after both succeed.
     */
    constructor(private readonly options: HarvestOptions) {
        const now = options.now ?? (() => new Date());
        this.resolved = validateHarvestOptions(options, now().getFullYear());
        this.sink = options.jsonlPath ? new JsonlSink(options.jsonlPath) : null;
        this.client = options.client ?? new OpenAlexWorksClient({ email: options.mailto });

        const database = options.database;
        this.database = typeof database === 'function' ? database() : database ?? null;
    }

    getState(): HarvestState {
        return this.state;
    }

    /**
     * Run the cursor walk to completion (or to `maxPages`).
     * Rejects with the transport error after moving to `failed`.
     */
    async harvest(): Promise<HarvestSummary> {
        if (this.state !== 'idle') {
            throw new ConfigurationError(`Harvester already ran (state: ${this.state}); create a new instance`);
        }

        const { ror, fromYear, toYear, perPage, maxPages } = this.resolved;
        const filter = buildWorksFilter({ ror, fromYear, toYear });
        const summary: HarvestSummary = {
            state: this.state,
            pages: 0,
            records: 0,
            requests: 0,
            lastCursor: null,
            resumeCursor: null,
            inserted: {},
        };

        const requestsBefore = this.client.getRequestCount();
        let cursor: string | null = this.options.startCursor ?? INITIAL_CURSOR;
        logger.info({ filter, perPage, maxPages, cursor, sink: this.sink?.path }, 'Starting harvest');

        try {
            while (cursor !== null) {
                if (maxPages !== undefined && summary.pages >= maxPages) {
                    summary.resumeCursor = cursor;
                    logger.info({ maxPages, resumeCursor: cursor }, 'Page limit reached');
                    break;
                }

                this.setState('fetching');
                const page = await this.client.fetchPage(filter, cursor, perPage);

                this.setState('processing');
                this.persistPage(page.results, summary.inserted);

                summary.pages++;
                summary.records += page.results.length;
                summary.lastCursor = cursor;

                logger.info(
                    { page: summary.pages, results: page.results.length, total: page.count, nextCursor: page.nextCursor },
                    'Page stored'
                );
                this.options.onPage?.({
                    page: summary.pages,
                    cursor,
                    nextCursor: page.nextCursor,
                    records: page.results.length,
                });

                cursor = page.nextCursor;
            }
        } catch (error) {
            this.setState('failed');
            logger.error(
                { err: error, pages: summary.pages, cursor, requests: this.client.getRequestCount() - requestsBefore },
                'Harvest failed'
            );
            throw error;
        }

        this.setState('done');
        summary.state = this.state;
        summary.requests = this.client.getRequestCount() - requestsBefore;
        logger.info(
            { pages: summary.pages, records: summary.records, requests: summary.requests, inserted: summary.inserted },
            'Harvest complete'
        );
        return summary;
    }

    private persistPage(results: readonly OpenAlexWork[], inserted: Record<string, number>): void {
        this.sink?.appendPage(results);

        const database = this.database;
        if (!database) return;

        for (const work of results) {
            tallyInserted(inserted, ingestWork(database, work));
        }
    }

    private setState(next: HarvestState): void {
        logger.debug({ from: this.state, to: next }, 'Harvest state');
        this.state = next;
    }
}
