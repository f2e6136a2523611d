/**
 * OpenAlex works API payload types (subset of the fields the parser reads).
 *
 * Every nested object and list may be missing or explicitly null in real
 * payloads, so all of them are typed as optional and nullable.
 *
 * @see https://docs.openalex.org/api-entities/works/work-object
 */
export interface OpenAlexWork {
    id?: string | null;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_year?: number | null;
    publication_date?: string | null;
    type?: string | null;
    cited_by_count?: number | null;
    referenced_works_count?: number | null;
    indexed_in?: string[] | null;
    open_access?: {
        is_oa?: boolean | null;
        oa_status?: string | null;
    } | null;
    primary_location?: {
        source?: OpenAlexSource | null;
        landing_page_url?: string | null;
    } | null;
    authorships?: OpenAlexAuthorship[] | null;
    counts_by_year?: OpenAlexYearCount[] | null;
    topics?: OpenAlexTopic[] | null;
}

export interface OpenAlexSource {
    id?: string | null;
    display_name?: string | null;
    issn_l?: string | null;
    issn?: string[] | null;
    is_oa?: boolean | null;
    host_organization?: string | null;
    host_organization_name?: string | null;
    type?: string | null;
}

export interface OpenAlexAuthorship {
    author_position?: string | null;
    is_corresponding?: boolean | null;
    author?: {
        id?: string | null;
        display_name?: string | null;
        orcid?: string | null;
    } | null;
    institutions?: OpenAlexInstitution[] | null;
}

export interface OpenAlexInstitution {
    id?: string | null;
    display_name?: string | null;
    ror?: string | null;
    type?: string | null;
    country_code?: string | null;
}

export interface OpenAlexYearCount {
    year?: number | null;
    cited_by_count?: number | null;
}

/** A level of the topic hierarchy (subfield, field or domain). */
export interface OpenAlexTopicLevel {
    id?: string | null;
    display_name?: string | null;
}

export interface OpenAlexTopic {
    id?: string | null;
    display_name?: string | null;
    score?: number | null;
    subfield?: OpenAlexTopicLevel | null;
    field?: OpenAlexTopicLevel | null;
    domain?: OpenAlexTopicLevel | null;
}

/**
 * One page of the `/works` list endpoint.
 */
export interface OpenAlexWorksPage {
    meta?: {
        count?: number;
        per_page?: number;
        next_cursor?: string | null;
    } | null;
    results?: OpenAlexWork[] | null;
}
