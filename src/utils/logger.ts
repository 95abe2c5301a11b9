import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Parse a log level name, or undefined when it is not one.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    return LOG_LEVELS.find((level) => level === value);
}

/**
 * Boolean environment flag: unset is undefined, `0` and `false` are off, anything else is on.
 */
export function parseEnvFlag(value: string | undefined): boolean | undefined {
    if (value === undefined || value === '') return undefined;
    return value !== '0' && value.toLowerCase() !== 'false';
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

    if (jsonLogs) {
        loggerInstance = pino({ level });
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return loggerInstance;
}

/**
 * Get the logger instance.
 * If not initialized, creates one from SCHOLARSCAN_LOG_LEVEL / SCHOLARSCAN_JSON_LOGS.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({
            level: parseLogLevel(process.env['SCHOLARSCAN_LOG_LEVEL']) ?? 'info',
            jsonLogs: parseEnvFlag(process.env['SCHOLARSCAN_JSON_LOGS']) ?? false,
        });
    }
    return loggerInstance;
}
