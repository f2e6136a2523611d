import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';
import { WorksHarvester, validateHarvestOptions, type PageProgress } from '../harvester/works-harvester.js';
import { ConfigurationError } from '../harvester/errors.js';
import { OpenAlexWorksClient } from '../sources/openalex.js';
import { openOpenAlexDatabase, type SqliteDatabaseHandler } from '../storage/database.js';
import { createHttpClient, HttpError } from '../utils/http-client.js';
import type { OpenAlexRows, OpenAlexWorksPage } from '../types/index.js';
import { jsonResponse, makePage, makeWork } from './fixtures.js';

const ROR = 'https://ror.org/00home0000';

function work(n: number) {
    return makeWork({ id: `https://openalex.org/W${n}`, title: `Work ${n}` });
}

describe('WorksHarvester', () => {
    let tmpDir: string;
    let db: SqliteDatabaseHandler<OpenAlexRows>;
    let fetchMock: ReturnType<typeof vi.fn>;

    /** Serve the given bodies in order, one per request. */
    function servePages(pages: OpenAlexWorksPage[]): void {
        for (const page of pages) {
            fetchMock.mockResolvedValueOnce(jsonResponse(page));
        }
    }

    function requestedCursors(): Array<string | null> {
        return fetchMock.mock.calls.map((call) => {
            const url: unknown = call[0];
            return typeof url === 'string' ? new URL(url).searchParams.get('cursor') : null;
        });
    }

    function newClient(): OpenAlexWorksClient {
        return new OpenAlexWorksClient({ httpClient: createHttpClient({ maxRetries: 0 }) });
    }

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'bibharvest-harvest-'));
        db = openOpenAlexDatabase(':memory:');
        fetchMock = vi.fn();
        vi.stubGlobal('fetch', fetchMock);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        db.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    describe('cursor walk', () => {
        it('should follow next_cursor until a page has none', async () => {
            servePages([
                makePage([work(1)], 'c1'),
                makePage([work(2)], 'c2'),
                makePage([work(3)], null),
            ]);
            const harvester = new WorksHarvester({ ror: ROR, database: db, client: newClient() });

            const summary = await harvester.harvest();

            expect(fetchMock).toHaveBeenCalledTimes(3);
            expect(requestedCursors()).toEqual(['*', 'c1', 'c2']);
            expect(summary).toEqual({
                state: 'done',
                pages: 3,
                records: 3,
                requests: 3,
                lastCursor: 'c2',
                resumeCursor: null,
                inserted: {
                    primary_source: 1,
                    authors: 2,
                    institutions: 2,
                    topics: 2,
                    works: 3,
                    authorships: 6,
                    cited_by_year: 9,
                    topics_by_work: 6,
                },
            });
            expect(harvester.getState()).toBe('done');
            expect(db.countRows('works')).toBe(3);
        });

        it('should request the institution filter and page size', async () => {
            servePages([makePage([], null)]);
            const harvester = new WorksHarvester({
                ror: ROR,
                fromYear: 2020,
                toYear: 2022,
                perPage: 25,
                database: db,
                client: newClient(),
                now: () => new Date('2024-06-01T00:00:00Z'),
            });

            await harvester.harvest();

            const url: unknown = fetchMock.mock.calls[0]?.[0];
            expect(typeof url).toBe('string');
            const params = new URL(String(url)).searchParams;
            expect(params.get('filter')).toBe('institutions.ror:00home0000,publication_year:2020-2022');
            expect(params.get('per-page')).toBe('25');
        });

        it('should start from the given cursor', async () => {
            servePages([makePage([work(1)], null)]);
            const harvester = new WorksHarvester({ ror: ROR, database: db, startCursor: 'resume-here', client: newClient() });

            await harvester.harvest();

            expect(requestedCursors()).toEqual(['resume-here']);
        });

        it('should stop at maxPages and report the cursor to resume from', async () => {
            servePages([makePage([work(1)], 'c1'), makePage([work(2)], null)]);
            const harvester = new WorksHarvester({ ror: ROR, database: db, maxPages: 1, client: newClient() });

            const summary = await harvester.harvest();

            expect(fetchMock).toHaveBeenCalledTimes(1);
            expect(summary.state).toBe('done');
            expect(summary.pages).toBe(1);
            expect(summary.resumeCursor).toBe('c1');
        });

        it('should report progress after every page', async () => {
            servePages([makePage([work(1), work(2)], 'c1'), makePage([work(3)], null)]);
            const progress: PageProgress[] = [];
            const harvester = new WorksHarvester({
                ror: ROR,
                database: db,
                client: newClient(),
                onPage: (p) => progress.push(p),
            });

            await harvester.harvest();

            expect(progress).toEqual([
                { page: 1, cursor: '*', nextCursor: 'c1', records: 2 },
                { page: 2, cursor: 'c1', nextCursor: null, records: 1 },
            ]);
        });

        it('should skip results that are not objects', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ meta: { count: 2, next_cursor: null }, results: [null, work(1)] }));
            const harvester = new WorksHarvester({ ror: ROR, database: db, client: newClient() });

            const summary = await harvester.harvest();

            expect(summary.state).toBe('done');
            expect(summary.records).toBe(1);
            expect(db.countRows('works')).toBe(1);
        });

        it('should refuse to run twice', async () => {
            servePages([makePage([], null)]);
            const harvester = new WorksHarvester({ ror: ROR, database: db, client: newClient() });

            await harvester.harvest();

            await expect(harvester.harvest()).rejects.toBeInstanceOf(ConfigurationError);
            expect(fetchMock).toHaveBeenCalledTimes(1);
        });
    });

    describe('failures', () => {
        it('should move to failed and rethrow on an HTTP error', async () => {
            servePages([makePage([work(1)], 'c1')]);
            fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'not found' }, 404));
            const harvester = new WorksHarvester({ ror: ROR, database: db, client: newClient() });

            await expect(harvester.harvest()).rejects.toBeInstanceOf(HttpError);

            expect(harvester.getState()).toBe('failed');
            expect(db.countRows('works')).toBe(1);
        });

        it('should fail instead of finishing when a page is not JSON', async () => {
            servePages([makePage([work(1)], 'c1')]);
            fetchMock.mockResolvedValueOnce(
                new Response('<html>maintenance</html>', { status: 200, headers: { 'content-type': 'text/html' } })
            );
            const harvester = new WorksHarvester({ ror: ROR, database: db, client: newClient() });

            await expect(harvester.harvest()).rejects.toBeInstanceOf(HttpError);

            expect(fetchMock).toHaveBeenCalledTimes(2);
            expect(harvester.getState()).toBe('failed');
            expect(db.countRows('works')).toBe(1);
        });
    });

    describe('database opener', () => {
        it('should open the database once and store into it', async () => {
            servePages([makePage([work(1)], null)]);
            const openDatabase = vi.fn(() => db);
            const harvester = new WorksHarvester({ ror: ROR, database: openDatabase, client: newClient() });

            const summary = await harvester.harvest();

            expect(openDatabase).toHaveBeenCalledTimes(1);
            expect(summary.inserted['works']).toBe(1);
            expect(db.countRows('works')).toBe(1);
        });

        it('should not open the database when the sink path already exists', () => {
            const jsonlPath = path.join(tmpDir, 'works.jsonl');
            fs.writeFileSync(jsonlPath, '');
            const openDatabase = vi.fn(() => db);

            expect(() => new WorksHarvester({ ror: ROR, jsonlPath, database: openDatabase, client: newClient() })).toThrow(
                ConfigurationError
            );
            expect(openDatabase).not.toHaveBeenCalled();
        });

        it('should not open the database when the options are invalid', () => {
            const openDatabase = vi.fn(() => db);

            expect(() => new WorksHarvester({ ror: ROR, database: openDatabase, perPage: 500, client: newClient() })).toThrow(
                ConfigurationError
            );
            expect(openDatabase).not.toHaveBeenCalled();
        });
    });

    describe('JSONL sink', () => {
        it('should write one line per record', async () => {
            servePages([makePage([work(1), work(2)], 'c1'), makePage([work(3)], null)]);
            const jsonlPath = path.join(tmpDir, 'nested', 'works.jsonl');
            const harvester = new WorksHarvester({ ror: ROR, jsonlPath, client: newClient() });

            const summary = await harvester.harvest();

            const lines = fs.readFileSync(jsonlPath, 'utf-8').trimEnd().split('\n');
            expect(lines).toHaveLength(3);
            expect(lines.map((line) => JSON.parse(line).id)).toEqual([
                'https://openalex.org/W1',
                'https://openalex.org/W2',
                'https://openalex.org/W3',
            ]);
            expect(summary.inserted).toEqual({});
        });

        it('should refuse an existing output file before any request', () => {
            const jsonlPath = path.join(tmpDir, 'works.jsonl');
            fs.writeFileSync(jsonlPath, '');

            expect(() => new WorksHarvester({ ror: ROR, jsonlPath, client: newClient() })).toThrow(ConfigurationError);
            expect(fetchMock).not.toHaveBeenCalled();
        });
    });

    describe('validation', () => {
        it('should reject a page size above 200 before any request', () => {
            expect(() => new WorksHarvester({ ror: ROR, database: db, perPage: 201, client: newClient() })).toThrow(
                'perPage must be an integer between 1 and 200, got 201'
            );
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should require a sink or a database', () => {
            expect(() => new WorksHarvester({ ror: ROR, client: newClient() })).toThrow(ConfigurationError);
        });
    });
});

describe('validateHarvestOptions', () => {
    const db = { insertOrder: [], ensureSchema: vi.fn(), insertIfAbsent: vi.fn(), query: vi.fn(), close: vi.fn() };

    it('should normalize the ROR and apply the default page size', () => {
        expect(validateHarvestOptions({ ror: ROR, database: db }, 2024)).toEqual({
            ror: '00home0000',
            fromYear: undefined,
            toYear: undefined,
            perPage: 200,
            maxPages: undefined,
        });
    });

    it('should reject an empty ROR', () => {
        expect(() => validateHarvestOptions({ ror: '  ', database: db }, 2024)).toThrow('An institution ROR is required');
    });

    it('should reject years after the current year', () => {
        expect(() => validateHarvestOptions({ ror: ROR, database: db, fromYear: 2025 }, 2024)).toThrow(
            'fromYear 2025 cannot be after the current year 2024'
        );
        expect(() => validateHarvestOptions({ ror: ROR, database: db, toYear: 2030 }, 2024)).toThrow(
            'toYear 2030 cannot be after the current year 2024'
        );
    });

    it('should reject an inverted year range', () => {
        expect(() => validateHarvestOptions({ ror: ROR, database: db, fromYear: 2022, toYear: 2020 }, 2024)).toThrow(
            'fromYear 2022 cannot be after toYear 2020'
        );
    });

    it('should accept the current year as a bound', () => {
        expect(validateHarvestOptions({ ror: ROR, database: db, fromYear: 2024, toYear: 2024 }, 2024).toYear).toBe(2024);
    });

    it('should reject a non-positive page limit', () => {
        expect(() => validateHarvestOptions({ ror: ROR, database: db, maxPages: 0 }, 2024)).toThrow(
            'maxPages must be a positive integer, got 0'
        );
    });

    it('should reject a page size of zero', () => {
        expect(() => validateHarvestOptions({ ror: ROR, database: db, perPage: 0 }, 2024)).toThrow(ConfigurationError);
    });
});
