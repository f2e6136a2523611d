/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * HTTP behaviour for catalog requests.
 */
export interface HttpConfig {
    /** Per-request timeout in milliseconds */
    timeout: number;
    /** Retries on 429/5xx/connection resets before a request fails */
    maxRetries: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BibHarvestConfig {
    // Input
    ror?: string;
    fromYear?: number;
    toYear?: number;
    perPage: number;
    maxPages?: number;
    cursor?: string;
    mailto?: string;

    // Output
    database?: string;
    jsonl?: string;

    // Reports
    institutionId?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // HTTP
    http: HttpConfig;
}

/**
 * Largest page the OpenAlex list endpoints accept.
 */
export const MAX_PER_PAGE = 200;

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: BibHarvestConfig = {
    perPage: MAX_PER_PAGE,
    logLevel: 'info',
    jsonLogs: false,
    http: {
        timeout: 30000,
        maxRetries: 3,
    },
};
