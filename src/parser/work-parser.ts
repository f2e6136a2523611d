import type {
    OpenAlexWork,
    OpenAlexSource,
    OpenAlexAuthorship,
    OpenAlexTopic,
    ParsedWorkTables,
    SourceRow,
    AuthorRow,
    InstitutionRow,
    TopicRow,
    WorkRow,
    AuthorshipRow,
    CitedByYearRow,
    TopicByWorkRow,
} from '../types/index.js';
import { normalizeId, normalizeIds } from '../sources/identifiers.js';

/**
 * Whether a decoded JSON value can be read as a work record.
 */
export function isWorkRecord(value: unknown): value is OpenAlexWork {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split one raw OpenAlex work into flat rows for every destination table.
 *
 * Keys come back in insertion order (sources and dimension tables before
 * works and join tables). Rows sharing a key across authorships are kept;
 * the database insert is what de-duplicates them.
 */
export function parseWork(work: OpenAlexWork): ParsedWorkTables {
    const workId = normalizeId(work.id);
    const source = work.primary_location?.source ?? null;
    const authorships = work.authorships ?? [];
    const topics = work.topics ?? [];

    return {
        primary_source: source ? [toSourceRow(source)] : [],
        authors: authorships.map(toAuthorRow),
        institutions: authorships.flatMap(toInstitutionRows),
        topics: topics.map(toTopicRow),
        works: [toWorkRow(work, workId, source)],
        authorships: authorships.map((authorship) => toAuthorshipRow(authorship, workId)),
        cited_by_year: (work.counts_by_year ?? []).map((count): CitedByYearRow => ({
            work_id: workId,
            year: count.year ?? null,
            cited_count: count.cited_by_count ?? null,
        })),
        topics_by_work: topics.map((topic): TopicByWorkRow => ({
            work_id: workId,
            topic_id: normalizeId(topic.id),
            score: topic.score ?? null,
        })),
    };
}

// ─── Per-table extraction ─────────────────────────────────

function toWorkRow(work: OpenAlexWork, workId: string | null, source: OpenAlexSource | null): WorkRow {
    return {
        work_id: workId,
        doi: normalizeId(work.doi),
        work_title: work.title ?? work.display_name ?? null,
        publication_year: work.publication_year ?? null,
        publication_date: work.publication_date ?? null,
        work_type: work.type ?? null,
        cited_by_count: work.cited_by_count ?? null,
        primary_source_id: normalizeId(source?.id),
        is_oa: work.open_access?.is_oa ?? null,
        oa_status: work.open_access?.oa_status ?? null,
        referenced_works_count: work.referenced_works_count ?? null,
        indexed_in: (work.indexed_in ?? []).filter((name): name is string => typeof name === 'string'),
    };
}

function toSourceRow(source: OpenAlexSource): SourceRow {
    return {
        source_id: normalizeId(source.id),
        source_name: source.display_name ?? null,
        source_issn_l: source.issn_l ?? null,
        issn: (source.issn ?? []).filter((issn): issn is string => typeof issn === 'string'),
        is_oa: source.is_oa ?? null,
        host_organization_id: normalizeId(source.host_organization),
        host_organization_name: source.host_organization_name ?? null,
        type: source.type ?? null,
    };
}

function toAuthorRow(authorship: OpenAlexAuthorship): AuthorRow {
    const author = authorship.author;
    return {
        author_id: normalizeId(author?.id),
        author_name: author?.display_name ?? null,
        orcid: normalizeId(author?.orcid),
    };
}

function toAuthorshipRow(authorship: OpenAlexAuthorship, workId: string | null): AuthorshipRow {
    return {
        work_id: workId,
        author_id: normalizeId(authorship.author?.id),
        author_position: authorship.author_position ?? null,
        is_corresponding: authorship.is_corresponding ?? null,
        institution_id: normalizeIds((authorship.institutions ?? []).map((institution) => institution.id)),
    };
}

function toInstitutionRows(authorship: OpenAlexAuthorship): InstitutionRow[] {
    return (authorship.institutions ?? []).map((institution) => ({
        institution_id: normalizeId(institution.id),
        institution_name: institution.display_name ?? null,
        ror: normalizeId(institution.ror),
        type: institution.type ?? null,
        country_code: institution.country_code ?? null,
    }));
}

function toTopicRow(topic: OpenAlexTopic): TopicRow {
    return {
        topic_id: normalizeId(topic.id),
        topic_name: topic.display_name ?? null,
        subfield_id: normalizeId(topic.subfield?.id),
        subfield_name: topic.subfield?.display_name ?? null,
        field_id: normalizeId(topic.field?.id),
        field_name: topic.field?.display_name ?? null,
        domain_id: normalizeId(topic.domain?.id),
        domain_name: topic.domain?.display_name ?? null,
    };
}
