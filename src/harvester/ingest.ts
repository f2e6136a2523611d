import type { DatabaseHandler, InsertSummary, OpenAlexRows, OpenAlexWork } from '../types/index.js';
import { parseWork } from '../parser/work-parser.js';
import { getLogger } from '../utils/logger.js';
import { readJsonlWorks } from './jsonl-sink.js';

const logger = getLogger();

/**
 * Parse one work and insert its rows table by table in the handler's
 * declared order, so parents always land before their children.
 */
export function ingestWork(database: DatabaseHandler<OpenAlexRows>, work: OpenAlexWork): InsertSummary[] {
    const tables = parseWork(work);
    return database.insertOrder.map((table) => database.insertIfAbsent(table, tables[table]));
}

/**
 * Add the `inserted` counts of some insert summaries to a per-table tally.
 */
export function tallyInserted(totals: Record<string, number>, summaries: readonly InsertSummary[]): void {
    for (const summary of summaries) {
        totals[summary.table] = (totals[summary.table] ?? 0) + summary.inserted;
    }
}

export interface ImportSummary {
    records: number;
    /** Lines that were not valid JSON objects */
    invalid: number;
    inserted: Record<string, number>;
}

/**
 * Load a JSONL dump written by the harvester into the database.
 * Already-present rows are skipped, so importing the same file twice is safe.
 */
export async function importJsonl(path: string, database: DatabaseHandler<OpenAlexRows>): Promise<ImportSummary> {
    const summary: ImportSummary = { records: 0, invalid: 0, inserted: {} };

    const onInvalid = (lineNumber: number, error: unknown): void => {
        summary.invalid++;
        logger.warn({ path, lineNumber, err: error }, 'Skipping malformed JSONL line');
    };

    for await (const work of readJsonlWorks(path, onInvalid)) {
        tallyInserted(summary.inserted, ingestWork(database, work));
        summary.records++;

        if (summary.records % 1000 === 0) {
            logger.info({ records: summary.records }, 'Import progress');
        }
    }

    logger.info({ path, records: summary.records, invalid: summary.invalid }, 'Import complete');
    return summary;
}
