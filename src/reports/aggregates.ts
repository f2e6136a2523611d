import type { DatabaseHandler, OpenAlexRows } from '../types/index.js';
import { toRecords } from '../storage/database.js';
import { cumulativeBy, hIndex, readBoolean, readNumber, readString, roundedMean } from './metrics.js';

/**
 * Dashboard aggregates over the normalized OpenAlex tables.
 *
 * Every report is a function of the current database contents, computed
 * when called. A failed or empty query yields an empty report.
 */
export type ReportSource = Pick<DatabaseHandler<OpenAlexRows>, 'query'>;

export const UNKNOWN_DOMAIN = 'Unknown';

// ─── Publication overview ─────────────────────────────────

/**
 * Whether a work's corresponding authorship is affiliated with the institution.
 * `undefined` means no corresponding authorship with a known affiliation.
 */
export type CorrespondingStatus = 'institution' | 'external' | 'undefined';

export interface PublicationOverviewRow {
    work_id: string;
    publication_year: number | null;
    work_type: string | null;
    is_oa: boolean | null;
    oa_status: string | null;
    corresponding: CorrespondingStatus;
}

const OVERVIEW_SQL = `
SELECT
  w.work_id,
  w.publication_year,
  w.work_type,
  w.is_oa,
  w.oa_status,
  CASE
    WHEN NOT EXISTS (
      SELECT 1 FROM authorships a, json_each(a.institution_id) j
      WHERE a.work_id = w.work_id AND a.is_corresponding = 1
    ) THEN 'undefined'
    WHEN EXISTS (
      SELECT 1 FROM authorships a, json_each(a.institution_id) j
      WHERE a.work_id = w.work_id AND a.is_corresponding = 1 AND j.value = ?
    ) THEN 'institution'
    ELSE 'external'
  END AS corresponding
FROM works w
ORDER BY w.work_id
`;

/**
 * One row per work, classified by the affiliation of its corresponding author.
 */
export function publicationOverview(
    db: ReportSource,
    options: { institutionId: string }
): PublicationOverviewRow[] {
    return toRecords(db.query(OVERVIEW_SQL, [options.institutionId])).flatMap((record) => {
        const workId = readString(record['work_id']);
        if (!workId) return [];
        return [{
            work_id: workId,
            publication_year: readNumber(record['publication_year']),
            work_type: readString(record['work_type']),
            is_oa: readBoolean(record['is_oa']),
            oa_status: readString(record['oa_status']),
            corresponding: toCorrespondingStatus(record['corresponding']),
        }];
    });
}

function toCorrespondingStatus(value: unknown): CorrespondingStatus {
    return value === 'institution' || value === 'external' ? value : 'undefined';
}

export type OverviewGrouping = 'work_type' | 'is_oa' | 'oa_status' | 'corresponding';

export interface YearCount {
    publication_year: number;
    /** Value of the grouping column ("all" when ungrouped, "unknown" for nulls) */
    group: string;
    count: number;
}

/**
 * Histogram of overview rows per publication year, optionally split by one column.
 * Works without a publication year are left out.
 */
export function countPublicationsByYear(
    rows: readonly PublicationOverviewRow[],
    options: { fromYear?: number; toYear?: number; groupBy?: OverviewGrouping } = {}
): YearCount[] {
    const { fromYear, toYear, groupBy } = options;
    const counts = new Map<string, YearCount>();

    for (const row of rows) {
        const year = row.publication_year;
        if (year === null) continue;
        if (fromYear !== undefined && year < fromYear) continue;
        if (toYear !== undefined && year > toYear) continue;

        const raw = groupBy ? row[groupBy] : 'all';
        const group = raw === null ? 'unknown' : String(raw);
        const key = `${year}\u0000${group}`;

        const entry = counts.get(key);
        if (entry) {
            entry.count++;
        } else {
            counts.set(key, { publication_year: year, group, count: 1 });
        }
    }

    return [...counts.values()].sort(
        (a, b) => a.publication_year - b.publication_year || a.group.localeCompare(b.group)
    );
}

// ─── Collaborations ───────────────────────────────────────

export interface CountryCollaboration {
    country_code: string;
    n_works: number;
}

const COLLABORATIONS_SQL = `
SELECT i.country_code AS country_code, COUNT(DISTINCT a.work_id) AS n_works
FROM authorships a
JOIN json_each(a.institution_id) j
JOIN institutions i ON i.institution_id = j.value
WHERE i.institution_id <> ? AND i.country_code IS NOT NULL
GROUP BY i.country_code
ORDER BY n_works DESC, i.country_code ASC
`;

/**
 * Distinct works co-authored with partner institutions, per partner country.
 * The home institution itself is left out.
 */
export function collaborationsByCountry(
    db: ReportSource,
    options: { institutionId: string }
): CountryCollaboration[] {
    return toRecords(db.query(COLLABORATIONS_SQL, [options.institutionId])).flatMap((record) => {
        const countryCode = readString(record['country_code']);
        const nWorks = readNumber(record['n_works']);
        return countryCode && nWorks !== null ? [{ country_code: countryCode, n_works: nWorks }] : [];
    });
}

// ─── Topics ───────────────────────────────────────────────

export interface PrimaryTopicCount {
    topic_id: string;
    topic_name: string | null;
    subfield_name: string | null;
    field_name: string | null;
    domain_name: string | null;
    n_works: number;
}

// Primary topic = highest score per work; ties go to the lowest topic id.
const PRIMARY_TOPICS_SQL = `
WITH ranked AS (
  SELECT
    tw.work_id,
    tw.topic_id,
    ROW_NUMBER() OVER (PARTITION BY tw.work_id ORDER BY tw.score DESC, tw.topic_id ASC) AS topic_rank
  FROM topics_by_work tw
  JOIN topics t ON t.topic_id = tw.topic_id
  WHERE t.domain_name IS NOT NULL
)
SELECT t.topic_id, t.topic_name, t.subfield_name, t.field_name, t.domain_name, COUNT(*) AS n_works
FROM ranked r
JOIN topics t ON t.topic_id = r.topic_id
WHERE r.topic_rank = 1
GROUP BY t.topic_id
ORDER BY n_works DESC, t.topic_id ASC
`;

/**
 * Number of works whose primary topic is each topic.
 */
export function primaryTopicCounts(db: ReportSource): PrimaryTopicCount[] {
    return toRecords(db.query(PRIMARY_TOPICS_SQL)).flatMap((record) => {
        const topicId = readString(record['topic_id']);
        if (!topicId) return [];
        return [{
            topic_id: topicId,
            topic_name: readString(record['topic_name']),
            subfield_name: readString(record['subfield_name']),
            field_name: readString(record['field_name']),
            domain_name: readString(record['domain_name']),
            n_works: readNumber(record['n_works']) ?? 0,
        }];
    });
}

export type ClassificationLevel = 'topic_name' | 'subfield_name' | 'field_name' | 'domain_name';

export const CLASSIFICATION_LEVELS: readonly ClassificationLevel[] = [
    'topic_name',
    'subfield_name',
    'field_name',
    'domain_name',
];

export interface TopicImpact {
    /** Name at the requested classification level */
    name: string;
    domain_name: string | null;
    n_works: number;
    h_index: number;
    mean_referenced_works: number | null;
    mean_authors: number | null;
}

const TOPIC_WORKS_SQL = `
SELECT
  w.work_id,
  w.work_type,
  w.cited_by_count,
  w.referenced_works_count,
  t.topic_name,
  t.subfield_name,
  t.field_name,
  t.domain_name,
  (SELECT COUNT(*) FROM authorships a WHERE a.work_id = w.work_id) AS author_count
FROM works w
JOIN topics_by_work tw ON tw.work_id = w.work_id
JOIN topics t ON t.topic_id = tw.topic_id
WHERE t.domain_name IS NOT NULL
ORDER BY w.work_id, tw.score DESC
`;

/**
 * Output and impact per classification level: work count, h-index of the
 * works' citation counts, mean references and mean authors per work.
 * A work counts once per group even when several of its topics fall in it.
 */
export function topicImpact(
    db: ReportSource,
    options: { level: ClassificationLevel; workTypes?: readonly string[] }
): TopicImpact[] {
    const { level, workTypes = ['article', 'review'] } = options;
    const allowedTypes = new Set(workTypes);

    interface Group {
        domainName: string | null;
        citations: number[];
        references: number[];
        authors: number[];
    }
    const groups = new Map<string, Group>();
    const seen = new Set<string>();

    for (const record of toRecords(db.query(TOPIC_WORKS_SQL))) {
        const workId = readString(record['work_id']);
        const workType = readString(record['work_type']);
        const name = readString(record[level]);
        if (!workId || !name || workType === null || !allowedTypes.has(workType)) continue;

        const key = `${workId}\u0000${name}`;
        if (seen.has(key)) continue;
        seen.add(key);

        let group = groups.get(name);
        if (!group) {
            group = { domainName: readString(record['domain_name']), citations: [], references: [], authors: [] };
            groups.set(name, group);
        }

        group.citations.push(readNumber(record['cited_by_count']) ?? 0);
        const references = readNumber(record['referenced_works_count']);
        if (references !== null) group.references.push(references);
        const authors = readNumber(record['author_count']);
        if (authors !== null) group.authors.push(authors);
    }

    return [...groups.entries()]
        .map(([name, group]) => ({
            name,
            domain_name: group.domainName,
            n_works: group.citations.length,
            h_index: hIndex(group.citations),
            mean_referenced_works: roundedMean(group.references),
            mean_authors: roundedMean(group.authors),
        }))
        .sort((a, b) => (a.domain_name ?? '').localeCompare(b.domain_name ?? '') || a.name.localeCompare(b.name));
}

// ─── Domain time series ───────────────────────────────────

export interface DomainCitationYear {
    domain_name: string;
    year: number;
    cited_count: number;
    cumulative_cited_count: number;
}

// One row per (work, domain, year): a work with two topics in the same
// domain must not be counted twice.
const DOMAIN_CITATIONS_SQL = `
SELECT domain_name, year, SUM(cited_count) AS cited_count
FROM (
  SELECT DISTINCT w.work_id, COALESCE(t.domain_name, ?) AS domain_name, c.year, c.cited_count
  FROM works w
  LEFT JOIN topics_by_work tw ON tw.work_id = w.work_id
  LEFT JOIN topics t ON t.topic_id = tw.topic_id
  JOIN cited_by_year c ON c.work_id = w.work_id
)
GROUP BY domain_name, year
ORDER BY domain_name, year
`;

/**
 * Citations received per year by the works of each domain, with the running
 * total per domain. Works without topics fall under "Unknown".
 */
export function domainCitationsByYear(db: ReportSource): DomainCitationYear[] {
    const rows = toRecords(db.query(DOMAIN_CITATIONS_SQL, [UNKNOWN_DOMAIN])).flatMap((record) => {
        const domainName = readString(record['domain_name']);
        const year = readNumber(record['year']);
        if (domainName === null || year === null) return [];
        return [{ domain_name: domainName, year, cited_count: readNumber(record['cited_count']) ?? 0 }];
    });

    const cumulative = cumulativeBy(rows, (row) => row.domain_name, (row) => row.cited_count);
    return rows.map((row, index) => ({ ...row, cumulative_cited_count: cumulative[index] ?? row.cited_count }));
}

export interface DomainWorksYear {
    publication_year: number;
    domain_name: string;
    n_works: number;
    cumulative_n_works: number;
}

const DOMAIN_WORKS_SQL = `
SELECT DISTINCT w.work_id, w.publication_year, COALESCE(t.domain_name, ?) AS domain_name
FROM works w
LEFT JOIN topics_by_work tw ON tw.work_id = w.work_id
LEFT JOIN topics t ON t.topic_id = tw.topic_id
WHERE w.publication_year IS NOT NULL
`;

/**
 * Works published per year in each domain, over every (year, domain)
 * combination present in the data (missing ones count zero), with the
 * running total per domain.
 */
export function domainWorksByPublicationYear(db: ReportSource): DomainWorksYear[] {
    const counts = new Map<string, number>();
    const years = new Set<number>();
    const domains = new Set<string>();

    for (const record of toRecords(db.query(DOMAIN_WORKS_SQL, [UNKNOWN_DOMAIN]))) {
        const year = readNumber(record['publication_year']);
        const domainName = readString(record['domain_name']);
        if (year === null || domainName === null) continue;

        years.add(year);
        domains.add(domainName);
        const key = `${year}\u0000${domainName}`;
        counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    const sortedYears = [...years].sort((a, b) => a - b);
    const sortedDomains = [...domains].sort((a, b) => a.localeCompare(b));

    const grid = sortedYears.flatMap((year) =>
        sortedDomains.map((domainName) => ({
            publication_year: year,
            domain_name: domainName,
            n_works: counts.get(`${year}\u0000${domainName}`) ?? 0,
        }))
    );

    const cumulative = cumulativeBy(grid, (row) => row.domain_name, (row) => row.n_works);
    return grid.map((row, index) => ({ ...row, cumulative_n_works: cumulative[index] ?? row.n_works }));
}
