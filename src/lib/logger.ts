/**
 * Sink for graph events: node and link changes at `debug`, disposal at
 * `info`, and one `debug` entry per settled shortest-path step. Any object
 * with these four methods works (pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/** Used when a graph is built without a logger */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Writes graph events to the console, tagged with their level.
 */
export const consoleLogger: Logger = {
    debug: (msg, meta) => console.debug(`[Graph:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[Graph:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[Graph:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[Graph:ERROR] ${msg}`, meta ?? ''),
};

/** Accepted values of the `logLevel` graph option, most verbose first */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

/**
 * Drop graph events below `level`. A graph applies this to its `logger`
 * option using the `logLevel` option.
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];

    return {
        debug: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.debug >= minPriority) {
                baseLogger.debug(msg, meta);
            }
        },
        info: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.info >= minPriority) {
                baseLogger.info(msg, meta);
            }
        },
        warn: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.warn >= minPriority) {
                baseLogger.warn(msg, meta);
            }
        },
        error: (msg, meta) => {
            if (LOG_LEVEL_PRIORITY.error >= minPriority) {
                baseLogger.error(msg, meta);
            }
        },
    };
}

/**
 * Wraps a logger so every call carries `context` in its meta.
 * Per-call meta wins on key collisions.
 */
export function withContext(baseLogger: Logger, context: Record<string, unknown>): Logger {
    return {
        debug: (msg, meta) => baseLogger.debug(msg, { ...context, ...meta }),
        info: (msg, meta) => baseLogger.info(msg, { ...context, ...meta }),
        warn: (msg, meta) => baseLogger.warn(msg, { ...context, ...meta }),
        error: (msg, meta) => baseLogger.error(msg, { ...context, ...meta }),
    };
}
