/**
 * Values better-sqlite3 can bind. Booleans and lists are converted
 * before binding according to the column type.
 */
export type SqlValue = string | number | bigint | null;

/**
 * Declared column types. `boolean` is stored as 0/1, `date` as ISO text,
 * `text[]` as a JSON-encoded array.
 */
export type ColumnType = 'text' | 'integer' | 'real' | 'boolean' | 'date' | 'text[]';

export interface ColumnDefinition {
    type: ColumnType;
    /** Foreign key target, e.g. `{ table: 'works', column: 'work_id' }` */
    references?: { table: string; column: string };
}

/** A candidate row keyed by column name. */
export type Row = Record<string, unknown>;

/** Table name → row type. */
export type RowMap = Record<string, Row>;

export type TableName<TRows extends RowMap> = keyof TRows & string;

export interface TableDefinition<TRow extends Row> {
    columns: { [C in keyof TRow & string]: ColumnDefinition };
    /** Single or composite primary key, in declaration order. */
    primaryKey: readonly (keyof TRow & string)[];
}

/**
 * Declarative table set. `insertOrder` lists parents before children so
 * that inserting table by table never violates a foreign key.
 */
export interface SchemaDefinition<TRows extends RowMap> {
    name: string;
    version: number;
    insertOrder: readonly TableName<TRows>[];
    tables: { [K in TableName<TRows>]: TableDefinition<TRows[K]> };
    /** Extra `CREATE INDEX IF NOT EXISTS` statements run after the tables. */
    indexes?: readonly string[];
}

/**
 * Outcome of one `insertIfAbsent` call.
 */
export interface InsertSummary {
    table: string;
    inserted: number;
    /** Rows whose primary key was already present */
    existing: number;
    /** Rows dropped because a primary-key component was missing */
    skipped: number;
}

/**
 * Tabular read result: ordered column names and positional rows.
 * An empty result (`columns: []`, `rows: []`) also stands for a failed query.
 */
export interface QueryResult {
    columns: string[];
    rows: unknown[][];
}

export type QueryParams = SqlValue[] | Record<string, SqlValue>;

/**
 * Storage capability used by the harvester and the report layer.
 */
export interface DatabaseHandler<TRows extends RowMap> {
    /** Table names, parents first. */
    readonly insertOrder: readonly TableName<TRows>[];

    /** Create every declared table that does not exist yet. Idempotent. */
    ensureSchema(): void;

    /**
     * Insert each row unless a row with the same primary key exists.
     * Rows with a missing primary-key component are skipped and logged.
     */
    insertIfAbsent<K extends TableName<TRows>>(table: K, records: TRows[K] | TRows[K][]): InsertSummary;

    /**
     * Run a read-only statement. Failures are logged and reported as an
     * empty result, never thrown.
     */
    query(sql: string, params?: QueryParams): QueryResult;

    close(): void;
}
