import { appendFileSync, createReadStream, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline';
import type { OpenAlexWork } from '../types/index.js';
import { isWorkRecord } from '../parser/work-parser.js';
import { getLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';

const logger = getLogger();

/**
 * Line-delimited JSON sink for raw work records.
 *
 * Write-once-per-run: the target must not exist when the sink is created.
 * Each page is appended in a single write, so an interrupted harvest keeps
 * every page written before the interruption.
 */
export class JsonlSink {
    private lines = 0;

    constructor(readonly path: string) {
        if (existsSync(path)) {
            throw new ConfigurationError(`Output file "${path}" already exists; choose a new path`);
        }
        mkdirSync(dirname(path), { recursive: true });
    }

    /**
     * Append records as one JSON object per line.
     */
    appendPage(records: readonly unknown[]): void {
        if (records.length === 0) return;

        const chunk = records.map((record) => JSON.stringify(record)).join('\n') + '\n';
        appendFileSync(this.path, chunk, 'utf-8');
        this.lines += records.length;
    }

    /**
     * Lines written by this sink so far.
     */
    get lineCount(): number {
        return this.lines;
    }
}

/**
 * Stream the work records of a JSONL dump, one parsed object per line.
 * Blank lines are ignored; malformed lines are reported through `onInvalid`.
 */
export async function* readJsonlWorks(
    path: string,
    onInvalid?: (lineNumber: number, error: unknown) => void
): AsyncGenerator<OpenAlexWork> {
    const lines = createInterface({
        input: createReadStream(path, { encoding: 'utf-8' }),
        crlfDelay: Infinity,
    });

    let lineNumber = 0;
    for await (const line of lines) {
        lineNumber++;
        if (!line.trim()) continue;

        let parsed: unknown;
        try {
            parsed = JSON.parse(line);
        } catch (error) {
            onInvalid?.(lineNumber, error);
            continue;
        }

        if (isWorkRecord(parsed)) {
            yield parsed;
        } else {
            onInvalid?.(lineNumber, new Error('Line is not a JSON object'));
        }
    }

    logger.debug({ path, lines: lineNumber }, 'JSONL file read');
}
