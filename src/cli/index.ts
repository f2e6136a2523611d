import { writeFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { openOpenAlexDatabase, type SqliteDatabaseHandler } from '../storage/database.js';
import { OpenAlexWorksClient } from '../sources/openalex.js';
import { normalizeId } from '../sources/identifiers.js';
import { WorksHarvester } from '../harvester/works-harvester.js';
import { importJsonl } from '../harvester/ingest.js';
import { ConfigurationError } from '../harvester/errors.js';
import {
    CLASSIFICATION_LEVELS,
    collaborationsByCountry,
    countPublicationsByYear,
    domainCitationsByYear,
    domainWorksByPublicationYear,
    primaryTopicCounts,
    publicationOverview,
    topicImpact,
    type ClassificationLevel,
    type OverviewGrouping,
    type ReportSource,
} from '../reports/aggregates.js';
import type { BibHarvestConfig, OpenAlexRows } from '../types/index.js';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('bibharvest')
    .description('Harvest the OpenAlex works of an institution into a normalized SQLite database and report on them.')
    .version(VERSION);

// ─── Option parsers ───────────────────────────────────────

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

function parseLevelOption(value: string): ConfigOverrides['logLevel'] {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected one of: error, warn, info, debug.');
    }
    return level;
}

function parseClassificationLevel(value: string): ClassificationLevel {
    const level = CLASSIFICATION_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new InvalidArgumentError(`Expected one of: ${CLASSIFICATION_LEVELS.join(', ')}.`);
    }
    return level;
}

const GROUPINGS: readonly OverviewGrouping[] = ['work_type', 'is_oa', 'oa_status', 'corresponding'];

function parseGrouping(value: string): OverviewGrouping {
    const grouping = GROUPINGS.find((candidate) => candidate === value);
    if (!grouping) {
        throw new InvalidArgumentError(`Expected one of: ${GROUPINGS.join(', ')}.`);
    }
    return grouping;
}

interface CommonCliOptions {
    db?: string;
    logLevel?: ConfigOverrides['logLevel'];
    jsonLogs?: boolean;
}

/**
 * Flags that were given on the command line; unset ones stay absent so
 * lower configuration layers still apply.
 */
function commonOverrides(opts: CommonCliOptions): ConfigOverrides {
    return {
        ...(opts.db !== undefined ? { database: opts.db } : {}),
        ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
        ...(opts.jsonLogs !== undefined ? { jsonLogs: opts.jsonLogs } : {}),
    };
}

async function setup(overrides: ConfigOverrides): Promise<BibHarvestConfig> {
    const config = await resolveConfig(overrides);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function requireDatabase(config: BibHarvestConfig): string {
    if (!config.database) {
        throw new ConfigurationError('No database given; pass --db or set BIBHARVEST_DB');
    }
    return config.database;
}

function fail(message: string, error: unknown): void {
    getLogger().error({ err: error }, message);
    process.exitCode = 1;
}

// ─── HARVEST command ──────────────────────────────────────

interface HarvestCliOptions extends CommonCliOptions {
    ror?: string;
    out?: string;
    fromYear?: number;
    toYear?: number;
    perPage?: number;
    maxPages?: number;
    mailto?: string;
    cursor?: string;
}

program
    .command('harvest')
    .description('Walk the works of one institution and store them')
    .option('-r, --ror <ror>', 'Institution ROR (bare or https://ror.org/ URL)')
    .option('-d, --db <path>', 'SQLite database path')
    .option('-o, --out <path>', 'JSONL output path (must not exist)')
    .option('--from-year <year>', 'First publication year', parseInteger)
    .option('--to-year <year>', 'Last publication year', parseInteger)
    .option('--per-page <n>', 'Page size, 1-200', parseInteger)
    .option('--max-pages <n>', 'Stop after this many pages', parseInteger)
    .option('--mailto <email>', 'Contact address for the OpenAlex polite pool')
    .option('--cursor <cursor>', 'Resume from a cursor logged by an earlier run')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLevelOption)
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: HarvestCliOptions) => {
        const config = await setup({
            ...commonOverrides(opts),
            ...(opts.ror !== undefined ? { ror: opts.ror } : {}),
            ...(opts.out !== undefined ? { jsonl: opts.out } : {}),
            ...(opts.fromYear !== undefined ? { fromYear: opts.fromYear } : {}),
            ...(opts.toYear !== undefined ? { toYear: opts.toYear } : {}),
            ...(opts.perPage !== undefined ? { perPage: opts.perPage } : {}),
            ...(opts.maxPages !== undefined ? { maxPages: opts.maxPages } : {}),
            ...(opts.mailto !== undefined ? { mailto: opts.mailto } : {}),
            ...(opts.cursor !== undefined ? { cursor: opts.cursor } : {}),
        });
        const logger = getLogger();

        const databasePath = config.database;
        const opened: SqliteDatabaseHandler<OpenAlexRows>[] = [];
        const openDatabase = (filePath: string): SqliteDatabaseHandler<OpenAlexRows> => {
            const handler = openOpenAlexDatabase(filePath);
            opened.push(handler);
            return handler;
        };

        try {
            const httpClient = createHttpClient({ ...config.http, version: VERSION, email: config.mailto });
            const harvester = new WorksHarvester({
                ror: config.ror ?? '',
                fromYear: config.fromYear,
                toYear: config.toYear,
                perPage: config.perPage,
                maxPages: config.maxPages,
                mailto: config.mailto,
                jsonlPath: config.jsonl,
                database: databasePath ? () => openDatabase(databasePath) : undefined,
                startCursor: config.cursor,
                client: new OpenAlexWorksClient({ email: config.mailto, httpClient }),
                onPage: (progress) => logger.debug({ nextCursor: progress.nextCursor }, 'Checkpoint'),
            });

            const summary = await harvester.harvest();
            process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
        } catch (error) {
            fail('Harvest failed', error);
        } finally {
            for (const handler of opened) handler.close();
        }
    });

// ─── IMPORT command ───────────────────────────────────────

program
    .command('import')
    .description('Load a JSONL dump written by harvest into a database')
    .argument('<file>', 'JSONL file')
    .option('-d, --db <path>', 'SQLite database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLevelOption)
    .option('--json-logs', 'Output JSON logs')
    .action(async (file: string, opts: CommonCliOptions) => {
        const config = await setup(commonOverrides(opts));

        try {
            const database = openOpenAlexDatabase(requireDatabase(config));
            try {
                const summary = await importJsonl(file, database);
                process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
            } finally {
                database.close();
            }
        } catch (error) {
            fail('Import failed', error);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show row counts per table')
    .option('-d, --db <path>', 'SQLite database path')
    .action(async (opts: CommonCliOptions) => {
        const config = await setup(commonOverrides(opts));

        try {
            const database = openOpenAlexDatabase(requireDatabase(config));
            const stats = database.getStats();
            database.close();

            console.log('\nDatabase statistics\n');
            for (const [table, count] of Object.entries(stats)) {
                console.log(`  ${table.padEnd(16)} ${count}`);
            }
            console.log('');
        } catch (error) {
            fail('Inspect failed', error);
        }
    });

// ─── REPORT command ───────────────────────────────────────

const REPORTS = [
    'overview',
    'by-year',
    'collaborations',
    'primary-topics',
    'topic-impact',
    'domain-citations',
    'domain-works',
] as const;

type ReportName = (typeof REPORTS)[number];

function parseReportName(value: string): ReportName {
    const name = REPORTS.find((candidate) => candidate === value);
    if (!name) {
        throw new InvalidArgumentError(`Expected one of: ${REPORTS.join(', ')}.`);
    }
    return name;
}

interface ReportCliOptions extends CommonCliOptions {
    institution?: string;
    level: ClassificationLevel;
    groupBy?: OverviewGrouping;
    fromYear?: number;
    toYear?: number;
    workTypes?: string[];
    out?: string;
}

function requireInstitution(config: BibHarvestConfig, report: ReportName): string {
    const institutionId = normalizeId(config.institutionId);
    if (!institutionId) {
        throw new ConfigurationError(`Report "${report}" needs an OpenAlex institution id; pass --institution`);
    }
    return institutionId;
}

function buildReport(db: ReportSource, name: ReportName, opts: ReportCliOptions, config: BibHarvestConfig): unknown {
    switch (name) {
        case 'overview':
            return publicationOverview(db, { institutionId: requireInstitution(config, name) });
        case 'by-year':
            return countPublicationsByYear(
                publicationOverview(db, { institutionId: requireInstitution(config, name) }),
                { fromYear: opts.fromYear, toYear: opts.toYear, groupBy: opts.groupBy }
            );
        case 'collaborations':
            return collaborationsByCountry(db, { institutionId: requireInstitution(config, name) });
        case 'primary-topics':
            return primaryTopicCounts(db);
        case 'topic-impact':
            return topicImpact(db, { level: opts.level, workTypes: opts.workTypes });
        case 'domain-citations':
            return domainCitationsByYear(db);
        case 'domain-works':
            return domainWorksByPublicationYear(db);
    }
}

program
    .command('report')
    .description('Compute a dashboard aggregate and print it as JSON')
    .argument('<name>', `Report: ${REPORTS.join(' | ')}`, parseReportName)
    .option('-d, --db <path>', 'SQLite database path')
    .option('-i, --institution <id>', 'OpenAlex institution id of the home institution')
    .option('--level <level>', `Classification level for topic-impact: ${CLASSIFICATION_LEVELS.join(' | ')}`, parseClassificationLevel, 'field_name')
    .option('--group-by <column>', `Split by-year counts: ${GROUPINGS.join(' | ')}`, parseGrouping)
    .option('--from-year <year>', 'First year for by-year', parseInteger)
    .option('--to-year <year>', 'Last year for by-year', parseInteger)
    .option('--work-types <types...>', 'Work types counted by topic-impact (default: article review)')
    .option('-o, --out <path>', 'Write the JSON to a file instead of stdout')
    .option('--log-level <level>', 'Log level: debug | info | warn | error', parseLevelOption)
    .action(async (name: ReportName, opts: ReportCliOptions) => {
        const config = await setup({
            ...commonOverrides(opts),
            ...(opts.institution !== undefined ? { institutionId: opts.institution } : {}),
        });

        try {
            const database = openOpenAlexDatabase(requireDatabase(config));
            let report: unknown;
            try {
                report = buildReport(database, name, opts, config);
            } finally {
                database.close();
            }

            const json = JSON.stringify(report, null, 2) + '\n';
            if (opts.out) {
                writeFileSync(opts.out, json, 'utf-8');
                getLogger().info({ report: name, path: opts.out }, 'Report written');
            } else {
                process.stdout.write(json);
            }
        } catch (error) {
            fail('Report failed', error);
        }
    });

await program.parseAsync();
