import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type BibHarvestConfig, type HttpConfig } from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

/**
 * Configuration layer without the nested `http` block, which is merged separately.
 */
export type ConfigOverrides = Partial<Omit<BibHarvestConfig, 'http'>> & { http?: Partial<HttpConfig> };

/**
 * Load configuration from bibharvest.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('bibharvest', {
        searchPlaces: ['bibharvest.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return readConfigObject(result.config);
        }
    } catch (error) {
        getLogger().warn({ err: error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Keep only the recognised keys of a parsed config file, with the right types.
 * Unknown keys and mistyped values are dropped with a warning.
 */
export function readConfigObject(raw: unknown): ConfigOverrides {
    const config: ConfigOverrides = {};
    if (!isPlainObject(raw)) {
        getLogger().warn('Config file does not contain an object, ignoring it');
        return config;
    }

    const dropped: string[] = [];
    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'ror':
            case 'cursor':
            case 'mailto':
            case 'database':
            case 'jsonl':
            case 'institutionId':
                if (typeof value === 'string') config[key] = value;
                else dropped.push(key);
                break;
            case 'fromYear':
            case 'toYear':
            case 'perPage':
            case 'maxPages':
                if (typeof value === 'number') config[key] = value;
                else dropped.push(key);
                break;
            case 'jsonLogs':
                if (typeof value === 'boolean') config.jsonLogs = value;
                else dropped.push(key);
                break;
            case 'logLevel': {
                const level = typeof value === 'string' ? parseLogLevel(value) : undefined;
                if (level) config.logLevel = level;
                else dropped.push(key);
                break;
            }
            case 'http':
                if (isPlainObject(value)) config.http = readHttpConfig(value, dropped);
                else dropped.push(key);
                break;
            default:
                dropped.push(key);
        }
    }

    if (dropped.length > 0) {
        getLogger().warn({ keys: dropped }, 'Ignoring unknown or mistyped config keys');
    }
    return config;
}

function readHttpConfig(raw: Record<string, unknown>, dropped: string[]): Partial<HttpConfig> {
    const http: Partial<HttpConfig> = {};
    for (const [key, value] of Object.entries(raw)) {
        if ((key === 'timeout' || key === 'maxRetries') && typeof value === 'number') {
            http[key] = value;
        } else {
            dropped.push(`http.${key}`);
        }
    }
    return http;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const config: ConfigOverrides = {};

    const mailto = env['OPENALEX_MAILTO'];
    if (mailto) config.mailto = mailto;

    const database = env['BIBHARVEST_DB'];
    if (database) config.database = database;

    const level = parseLogLevel(env['BIBHARVEST_LOG_LEVEL']);
    if (level) config.logLevel = level;

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Layers must leave unset keys out rather than set them to undefined.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<BibHarvestConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        http: {
            ...DEFAULT_CONFIG.http,
            ...fileConfig?.http,
            ...cliFlags.http,
        },
    };
}
