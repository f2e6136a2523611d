import type { OpenAlexTopic, OpenAlexWork, OpenAlexWorksPage } from '../types/index.js';

/**
 * Build a topic with its subfield/field/domain hierarchy.
 */
export function makeTopic(
    id: string,
    score: number,
    hierarchy: { subfield: string; field: string; domain: string | null }
): OpenAlexTopic {
    return {
        id: `https://openalex.org/${id}`,
        display_name: `Topic ${id}`,
        score,
        subfield: { id: `https://openalex.org/subfields/${hierarchy.subfield}`, display_name: `Subfield ${hierarchy.subfield}` },
        field: { id: `https://openalex.org/fields/${hierarchy.field}`, display_name: `Field ${hierarchy.field}` },
        domain: hierarchy.domain === null
            ? null
            : { id: `https://openalex.org/domains/${hierarchy.domain}`, display_name: `Domain ${hierarchy.domain}` },
    };
}

/**
 * A complete work: one source, two authorships (two and zero institutions),
 * three yearly citation counts and two topics.
 */
export function makeWork(overrides: Partial<OpenAlexWork> = {}): OpenAlexWork {
    return {
        id: 'https://openalex.org/W1',
        doi: 'https://doi.org/10.1234/test.one',
        title: 'Test work one',
        display_name: 'Test work one',
        publication_year: 2021,
        publication_date: '2021-03-15',
        type: 'article',
        cited_by_count: 12,
        referenced_works_count: 30,
        indexed_in: ['crossref', 'pubmed'],
        open_access: { is_oa: true, oa_status: 'gold' },
        primary_location: {
            source: {
                id: 'https://openalex.org/S1',
                display_name: 'Journal of Tests',
                issn_l: '1234-5678',
                issn: ['1234-5678', '8765-4321'],
                is_oa: true,
                host_organization: 'https://openalex.org/P1',
                host_organization_name: 'Test Press',
                type: 'journal',
            },
        },
        authorships: [
            {
                author_position: 'first',
                is_corresponding: true,
                author: {
                    id: 'https://openalex.org/A1',
                    display_name: 'Author One',
                    orcid: 'https://orcid.org/0000-0000-0000-0001',
                },
                institutions: [
                    {
                        id: 'https://openalex.org/I1',
                        display_name: 'Home University',
                        ror: 'https://ror.org/00home0000',
                        type: 'education',
                        country_code: 'DE',
                    },
                    {
                        id: 'https://openalex.org/I2',
                        display_name: 'Partner Lab',
                        ror: 'https://ror.org/00part0000',
                        type: 'facility',
                        country_code: 'FR',
                    },
                ],
            },
            {
                author_position: 'last',
                is_corresponding: false,
                author: { id: 'https://openalex.org/A2', display_name: 'Author Two', orcid: null },
                institutions: [],
            },
        ],
        counts_by_year: [
            { year: 2023, cited_by_count: 5 },
            { year: 2022, cited_by_count: 4 },
            { year: 2021, cited_by_count: 3 },
        ],
        topics: [
            makeTopic('T1', 0.9, { subfield: '1', field: '1', domain: '1' }),
            makeTopic('T2', 0.5, { subfield: '2', field: '2', domain: '2' }),
        ],
        ...overrides,
    };
}

/**
 * A `/works` response body.
 */
export function makePage(results: OpenAlexWork[], nextCursor: string | null, count?: number): OpenAlexWorksPage {
    return {
        meta: { count: count ?? results.length, next_cursor: nextCursor },
        results,
    };
}

/**
 * A JSON fetch response as the OpenAlex API returns it.
 */
export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}
