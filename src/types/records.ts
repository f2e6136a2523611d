/**
 * Flat per-table rows produced by the work parser.
 * Column names match the SQLite schema one to one.
 *
 * Declared as type aliases (not interfaces) so that each row type is
 * assignable to `Row` and can flow through the generic database handler.
 */

export type SourceRow = {
    source_id: string | null;
    source_name: string | null;
    source_issn_l: string | null;
    issn: string[];
    is_oa: boolean | null;
    host_organization_id: string | null;
    host_organization_name: string | null;
    type: string | null;
};

export type AuthorRow = {
    author_id: string | null;
    author_name: string | null;
    orcid: string | null;
};

export type InstitutionRow = {
    institution_id: string | null;
    institution_name: string | null;
    ror: string | null;
    type: string | null;
    country_code: string | null;
};

/** Topic with its subfield, field and domain denormalized onto it. */
export type TopicRow = {
    topic_id: string | null;
    topic_name: string | null;
    subfield_id: string | null;
    subfield_name: string | null;
    field_id: string | null;
    field_name: string | null;
    domain_id: string | null;
    domain_name: string | null;
};

export type WorkRow = {
    work_id: string | null;
    doi: string | null;
    work_title: string | null;
    publication_year: number | null;
    /** ISO date (YYYY-MM-DD) */
    publication_date: string | null;
    work_type: string | null;
    cited_by_count: number | null;
    primary_source_id: string | null;
    is_oa: boolean | null;
    oa_status: string | null;
    referenced_works_count: number | null;
    indexed_in: string[];
};

export type AuthorshipRow = {
    work_id: string | null;
    author_id: string | null;
    author_position: string | null;
    is_corresponding: boolean | null;
    /** One authorship can carry several affiliations. */
    institution_id: string[];
};

export type CitedByYearRow = {
    work_id: string | null;
    year: number | null;
    cited_count: number | null;
};

export type TopicByWorkRow = {
    work_id: string | null;
    topic_id: string | null;
    score: number | null;
};

/**
 * Table name → row type for the OpenAlex table set.
 * Key order is the insertion order.
 */
export type OpenAlexRows = {
    primary_source: SourceRow;
    authors: AuthorRow;
    institutions: InstitutionRow;
    topics: TopicRow;
    works: WorkRow;
    authorships: AuthorshipRow;
    cited_by_year: CitedByYearRow;
    topics_by_work: TopicByWorkRow;
};

export type OpenAlexTable = keyof OpenAlexRows;

/**
 * Parser output: one row list per destination table.
 */
export type ParsedWorkTables = { [K in OpenAlexTable]: OpenAlexRows[K][] };
