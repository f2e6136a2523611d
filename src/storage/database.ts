import Database from 'better-sqlite3';
import type {
    ColumnDefinition,
    ColumnType,
    DatabaseHandler,
    InsertSummary,
    OpenAlexRows,
    QueryParams,
    QueryResult,
    Row,
    RowMap,
    SchemaDefinition,
    SqlValue,
    TableName,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { OPENALEX_SCHEMA } from './schema.js';

const logger = getLogger();

const SQL_TYPES: Record<ColumnType, string> = {
    text: 'TEXT',
    integer: 'INTEGER',
    real: 'REAL',
    boolean: 'INTEGER',
    date: 'TEXT',
    'text[]': 'TEXT',
};

/**
 * Table definition flattened for statement generation.
 */
interface CompiledTable {
    name: string;
    columns: Array<[string, ColumnDefinition]>;
    primaryKey: string[];
    existsSql: string;
    insertSql: string;
}

interface TableStatements {
    exists: Database.Statement<SqlValue[]>;
    insert: Database.Statement<SqlValue[]>;
}

/**
 * SQLite store for any declarative table set, on top of better-sqlite3.
 * Handles schema creation, WAL mode, foreign keys, idempotent inserts and
 * failure-absorbing reads.
 */
export class SqliteDatabaseHandler<TRows extends RowMap> implements DatabaseHandler<TRows> {
    readonly insertOrder: readonly TableName<TRows>[];
    private db: Database.Database;
    private tables = new Map<string, CompiledTable>();
    private statements = new Map<string, TableStatements>();

    constructor(
        dbPath: string,
        private readonly schema: SchemaDefinition<TRows>
    ) {
        this.insertOrder = schema.insertOrder;
        this.compileTables();

        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        logger.debug({ dbPath, schema: schema.name }, 'Database opened');
    }

    /**
     * Create every declared table (parents first) and index that is missing.
     */
    ensureSchema(): void {
        const createAll = this.db.transaction(() => {
            for (const table of this.tables.values()) {
                this.db.exec(this.createTableSql(table));
            }
            for (const statement of this.schema.indexes ?? []) {
                this.db.exec(statement);
            }
        });
        createAll();

        const currentVersion = this.db.pragma('user_version', { simple: true });
        if (typeof currentVersion !== 'number' || currentVersion < this.schema.version) {
            this.db.pragma(`user_version = ${this.schema.version}`);
            logger.info({ schema: this.schema.name, version: this.schema.version }, 'Database schema ready');
        }
    }

    // ─── Inserts ──────────────────────────────────────────────

    /**
     * Insert rows whose primary key is not present yet.
     *
     * Each row commits on its own, so re-running a batch after a partial
     * failure only adds what is missing. The primary-key constraint
     * (`ON CONFLICT DO NOTHING`) covers a concurrent writer that wins the
     * race between the existence check and the insert.
     */
    insertIfAbsent<K extends TableName<TRows>>(table: K, records: TRows[K] | TRows[K][]): InsertSummary {
        const compiled = this.tables.get(table);
        if (!compiled) {
            throw new Error(`Unknown table "${table}" for schema ${this.schema.name}`);
        }

        const rows: Row[] = Array.isArray(records) ? records : [records];
        const statements = this.getStatements(compiled);
        const summary: InsertSummary = { table, inserted: 0, existing: 0, skipped: 0 };

        for (const row of rows) {
            const key = compiled.primaryKey.map((column) => row[column]);
            if (key.some(isMissingKeyPart)) {
                logger.warn({ table, key: Object.fromEntries(compiled.primaryKey.map((c, i) => [c, key[i] ?? null])) },
                    'Skipping row with missing primary key');
                summary.skipped++;
                continue;
            }

            const keyValues = compiled.primaryKey.map((column) => toSqlValue(row[column], columnType(compiled, column)));
            if (statements.exists.get(...keyValues) !== undefined) {
                summary.existing++;
                continue;
            }

            const values = compiled.columns.map(([column, definition]) => toSqlValue(row[column], definition.type));
            const result = statements.insert.run(...values);
            if (result.changes > 0) {
                summary.inserted++;
            } else {
                summary.existing++;
            }
        }

        logger.debug(summary, 'Insert batch processed');
        return summary;
    }

    // ─── Reads ────────────────────────────────────────────────

    /**
     * Run a read-only statement and return its columns and positional rows.
     * Any failure is logged and returned as an empty result.
     */
    query(sql: string, params: QueryParams = []): QueryResult {
        try {
            const stmt = this.db.prepare<unknown[], unknown[]>(sql);
            if (!stmt.reader) {
                throw new Error('Only statements that return rows can be run through query()');
            }

            const columns = stmt.columns().map((column) => column.name);
            stmt.raw(true);
            const rows = Array.isArray(params) ? stmt.all(...params) : stmt.all(params);
            return { columns, rows };
        } catch (error) {
            logger.error({ err: error, sql }, 'Query failed, returning empty result');
            return emptyResult();
        }
    }

    /**
     * Number of rows in one declared table.
     */
    countRows(table: TableName<TRows>): number {
        const compiled = this.tables.get(table);
        if (!compiled) {
            throw new Error(`Unknown table "${table}" for schema ${this.schema.name}`);
        }
        const count: unknown = this.db.prepare(`SELECT COUNT(*) FROM ${quote(compiled.name)}`).pluck().get();
        return typeof count === 'number' ? count : 0;
    }

    /**
     * Row counts for every declared table, in insertion order.
     */
    getStats(): Record<string, number> {
        const stats: Record<string, number> = {};
        for (const table of this.insertOrder) {
            stats[table] = this.countRows(table);
        }
        return stats;
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.statements.clear();
        this.db.close();
        logger.debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }

    private compileTables(): void {
        const seen = new Set<string>();

        for (const name of this.schema.insertOrder) {
            const definition = this.schema.tables[name];
            const columns: Array<[string, ColumnDefinition]> = Object.entries(definition.columns);
            const primaryKey: string[] = [...definition.primaryKey];

            for (const [column, { references }] of columns) {
                if (references && !seen.has(references.table)) {
                    throw new Error(
                        `Table "${name}" column "${column}" references "${references.table}", which is not declared before it`
                    );
                }
            }

            const columnList = columns.map(([column]) => quote(column)).join(', ');
            const placeholders = columns.map(() => '?').join(', ');

            this.tables.set(name, {
                name,
                columns,
                primaryKey,
                existsSql: `SELECT 1 FROM ${quote(name)} WHERE ${primaryKey.map((c) => `${quote(c)} = ?`).join(' AND ')} LIMIT 1`,
                insertSql: `INSERT INTO ${quote(name)} (${columnList}) VALUES (${placeholders}) ON CONFLICT DO NOTHING`,
            });
            seen.add(name);
        }

        for (const name of Object.keys(this.schema.tables)) {
            if (!seen.has(name)) {
                throw new Error(`Table "${name}" is missing from the insert order of schema ${this.schema.name}`);
            }
        }
    }

    private createTableSql(table: CompiledTable): string {
        const lines = table.columns.map(([column, definition]) => {
            const notNull = table.primaryKey.includes(column) ? ' NOT NULL' : '';
            return `  ${quote(column)} ${SQL_TYPES[definition.type]}${notNull}`;
        });

        lines.push(`  PRIMARY KEY (${table.primaryKey.map(quote).join(', ')})`);

        for (const [column, { references }] of table.columns) {
            if (references) {
                lines.push(`  FOREIGN KEY (${quote(column)}) REFERENCES ${quote(references.table)}(${quote(references.column)})`);
            }
        }

        return `CREATE TABLE IF NOT EXISTS ${quote(table.name)} (\n${lines.join(',\n')}\n)`;
    }

    private getStatements(table: CompiledTable): TableStatements {
        let statements = this.statements.get(table.name);
        if (!statements) {
            statements = {
                exists: this.db.prepare<SqlValue[]>(table.existsSql),
                insert: this.db.prepare<SqlValue[]>(table.insertSql),
            };
            this.statements.set(table.name, statements);
        }
        return statements;
    }
}

/**
 * Open (and create if needed) an SQLite database with the OpenAlex table set.
 */
export function openOpenAlexDatabase(dbPath: string): SqliteDatabaseHandler<OpenAlexRows> {
    const handler = new SqliteDatabaseHandler(dbPath, OPENALEX_SCHEMA);
    handler.ensureSchema();
    return handler;
}

/**
 * Convert a positional query result into column-keyed objects.
 */
export function toRecords(result: QueryResult): Array<Record<string, unknown>> {
    return result.rows.map((row) =>
        Object.fromEntries(result.columns.map((column, index) => [column, row[index]]))
    );
}

export function emptyResult(): QueryResult {
    return { columns: [], rows: [] };
}

// ─── Value conversion ─────────────────────────────────────

function quote(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
}

function isMissingKeyPart(value: unknown): boolean {
    return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

function columnType(table: CompiledTable, column: string): ColumnType {
    return table.columns.find(([name]) => name === column)?.[1].type ?? 'text';
}

/**
 * Convert a row value into something better-sqlite3 can bind.
 */
export function toSqlValue(value: unknown, type: ColumnType): SqlValue {
    if (value === null || value === undefined) return null;

    switch (type) {
        case 'boolean':
            if (typeof value === 'boolean') return value ? 1 : 0;
            return typeof value === 'number' ? value : null;
        case 'text[]':
            return JSON.stringify(Array.isArray(value) ? value : [value]);
        case 'integer':
        case 'real': {
            if (typeof value === 'number' || typeof value === 'bigint') return value;
            const parsed = Number(value);
            return Number.isFinite(parsed) ? parsed : null;
        }
        case 'text':
        case 'date':
            if (typeof value === 'string') return value;
            if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
            return JSON.stringify(value);
    }
}
