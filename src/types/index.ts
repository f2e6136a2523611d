/**
 * Barrel export for all shared types.
 */
export type {
    OpenAlexWork,
    OpenAlexSource,
    OpenAlexAuthorship,
    OpenAlexInstitution,
    OpenAlexYearCount,
    OpenAlexTopic,
    OpenAlexTopicLevel,
    OpenAlexWorksPage,
} from './openalex.js';
export type {
    SourceRow,
    AuthorRow,
    InstitutionRow,
    TopicRow,
    WorkRow,
    AuthorshipRow,
    CitedByYearRow,
    TopicByWorkRow,
    OpenAlexRows,
    OpenAlexTable,
    ParsedWorkTables,
} from './records.js';
export type {
    SqlValue,
    ColumnType,
    ColumnDefinition,
    Row,
    RowMap,
    TableName,
    TableDefinition,
    SchemaDefinition,
    InsertSummary,
    QueryResult,
    QueryParams,
    DatabaseHandler,
} from './database.js';
export { DEFAULT_CONFIG, MAX_PER_PAGE } from './config.js';
export type { BibHarvestConfig, LogLevel, HttpConfig } from './config.js';
