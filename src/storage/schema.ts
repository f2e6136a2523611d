import type { OpenAlexRows, SchemaDefinition } from '../types/index.js';

/**
 * OpenAlex table set.
 *
 * `insertOrder` is load-bearing: sources and dimension tables come before
 * works, and works before the tables that reference them.
 */
export const OPENALEX_SCHEMA: SchemaDefinition<OpenAlexRows> = {
    name: 'openalex',
    version: 1,
    insertOrder: [
        'primary_source',
        'authors',
        'institutions',
        'topics',
        'works',
        'authorships',
        'cited_by_year',
        'topics_by_work',
    ],
    tables: {
        primary_source: {
            columns: {
                source_id: { type: 'text' },
                source_name: { type: 'text' },
                source_issn_l: { type: 'text' },
                issn: { type: 'text[]' },
                is_oa: { type: 'boolean' },
                host_organization_id: { type: 'text' },
                host_organization_name: { type: 'text' },
                type: { type: 'text' },
            },
            primaryKey: ['source_id'],
        },
        authors: {
            columns: {
                author_id: { type: 'text' },
                author_name: { type: 'text' },
                orcid: { type: 'text' },
            },
            primaryKey: ['author_id'],
        },
        institutions: {
            columns: {
                institution_id: { type: 'text' },
                institution_name: { type: 'text' },
                ror: { type: 'text' },
                type: { type: 'text' },
                country_code: { type: 'text' },
            },
            primaryKey: ['institution_id'],
        },
        topics: {
            columns: {
                topic_id: { type: 'text' },
                topic_name: { type: 'text' },
                subfield_id: { type: 'text' },
                subfield_name: { type: 'text' },
                field_id: { type: 'text' },
                field_name: { type: 'text' },
                domain_id: { type: 'text' },
                domain_name: { type: 'text' },
            },
            primaryKey: ['topic_id'],
        },
        works: {
            columns: {
                work_id: { type: 'text' },
                doi: { type: 'text' },
                work_title: { type: 'text' },
                publication_year: { type: 'integer' },
                publication_date: { type: 'date' },
                work_type: { type: 'text' },
                cited_by_count: { type: 'integer' },
                primary_source_id: { type: 'text', references: { table: 'primary_source', column: 'source_id' } },
                is_oa: { type: 'boolean' },
                oa_status: { type: 'text' },
                referenced_works_count: { type: 'integer' },
                indexed_in: { type: 'text[]' },
            },
            primaryKey: ['work_id'],
        },
        authorships: {
            columns: {
                work_id: { type: 'text', references: { table: 'works', column: 'work_id' } },
                author_id: { type: 'text', references: { table: 'authors', column: 'author_id' } },
                author_position: { type: 'text' },
                is_corresponding: { type: 'boolean' },
                institution_id: { type: 'text[]' },
            },
            primaryKey: ['work_id', 'author_id'],
        },
        cited_by_year: {
            columns: {
                work_id: { type: 'text', references: { table: 'works', column: 'work_id' } },
                year: { type: 'integer' },
                cited_count: { type: 'integer' },
            },
            primaryKey: ['work_id', 'year'],
        },
        topics_by_work: {
            columns: {
                work_id: { type: 'text', references: { table: 'works', column: 'work_id' } },
                topic_id: { type: 'text', references: { table: 'topics', column: 'topic_id' } },
                score: { type: 'real' },
            },
            primaryKey: ['work_id', 'topic_id'],
        },
    },
    indexes: [
        'CREATE INDEX IF NOT EXISTS idx_works_year ON works(publication_year)',
        'CREATE INDEX IF NOT EXISTS idx_works_source ON works(primary_source_id)',
        'CREATE INDEX IF NOT EXISTS idx_authorships_author ON authorships(author_id)',
        'CREATE INDEX IF NOT EXISTS idx_topics_by_work_topic ON topics_by_work(topic_id)',
    ],
};

