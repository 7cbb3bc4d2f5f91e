import pino from 'pino';
import { LOG_LEVELS, type LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    if (jsonLogs || level === 'silent') {
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
 * Level requested through COOCCUR_LOG_LEVEL, if it names a known level.
 */
function envLevel(): LogLevel | undefined {
    const raw = process.env['COOCCUR_LOG_LEVEL'];
    return LOG_LEVELS.find((level) => level === raw);
}

/**
 * Get the logger instance.
 * If not initialized, creates a default logger (info, or COOCCUR_LOG_LEVEL).
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: envLevel() ?? 'info' });
    }
    return loggerInstance;
}
