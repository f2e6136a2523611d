import pino from 'pino';
import { PinoPretty } from 'pino-pretty';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Modules grab it at import time, so `initLogger()` reconfigures
 * the same instance in place instead of replacing it.
 * Logs go to stderr so report output on stdout stays machine-readable.
 */
let loggerInstance: pino.Logger | null = null;
let target: pino.DestinationStream = prettyStream();

function prettyStream(): pino.DestinationStream {
    return PinoPretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,name',
        destination: 2,
        sync: true,
    });
}

function createLogger(level: LogLevel): pino.Logger {
    return pino(
        { name: 'bibharvest', level },
        { write: (line: string) => target.write(line) }
    );
}

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    target = jsonLogs ? pino.destination({ dest: 2, sync: true }) : prettyStream();

    if (loggerInstance) {
        loggerInstance.level = level;
    } else {
        loggerInstance = createLogger(level);
    }
    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger at `BIBHARVEST_LOG_LEVEL` or info.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = createLogger(parseLogLevel(process.env['BIBHARVEST_LOG_LEVEL']) ?? 'info');
    }
    return loggerInstance;
}

/**
 * Narrow an arbitrary string to a supported log level.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
            return value;
        default:
            return undefined;
    }
}
