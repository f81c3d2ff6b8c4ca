/**
 * Graph configuration: option schema, defaults and weight validation.
 */

import { z } from 'zod';
import type { Logger, LogLevel } from './logger';
import { LOG_LEVELS, createFilteredLogger, noopLogger } from './logger';
import { InvalidOptionsError, InvalidWeightError } from './errors';
import type { OptionIssue } from './errors';

/** Orders two node names; used to break ties between equally distant nodes. */
export type KeyComparator<T> = (a: T, b: T) => number;

export interface GraphOptions<T> {
    /**
     * Custom logger instance. Use `consoleLogger` for debug output.
     * Default: silent (no logging)
     */
    logger?: Logger;
    /**
     * Log level filter. Only applies if using a logger.
     * Default: 'info'
     */
    logLevel?: LogLevel;
    /**
     * Deterministic tie-break for shortest-path traversals. When omitted,
     * equally distant nodes are settled in node creation order.
     */
    compareKeys?: KeyComparator<T>;
}

export interface ResolvedGraphOptions<T> {
    logger: Logger;
    logLevel: LogLevel;
    compareKeys?: KeyComparator<T>;
}

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error'] as const;

function isLogger(value: unknown): value is Logger {
    if (typeof value !== 'object' || value === null) return false;
    return LOGGER_METHODS.every(method => typeof Reflect.get(value, method) === 'function');
}

export const graphOptionsSchema = z.object({
    logger: z.custom<Logger>(isLogger, { message: 'Expected a logger with debug/info/warn/error methods' }).optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
    compareKeys: z.custom<KeyComparator<unknown>>(
        value => typeof value === 'function',
        { message: 'Expected a comparator function' },
    ).optional(),
}).strict();

/** Edge weights: finite and strictly positive. */
export const weightSchema = z.number().finite().positive();

function toIssues(error: z.ZodError): OptionIssue[] {
    return error.errors.map(e => ({
        path: e.path,
        message: e.message,
    }));
}

/**
 * Validate user options and fill in defaults.
 * @throws InvalidOptionsError when the options do not match the schema
 */
export function resolveGraphOptions<T>(options: GraphOptions<T> = {}): ResolvedGraphOptions<T> {
    const result = graphOptionsSchema.safeParse(options);
    if (!result.success) {
        throw new InvalidOptionsError(toIssues(result.error));
    }

    const logLevel = options.logLevel ?? 'info';
    return {
        logger: createFilteredLogger(options.logger ?? noopLogger, logLevel),
        logLevel,
        compareKeys: options.compareKeys,
    };
}

/**
 * @throws InvalidWeightError for zero, negative, NaN or infinite weights
 */
export function validateWeight(weight: number): number {
    const result = weightSchema.safeParse(weight);
    if (!result.success) {
        throw new InvalidWeightError(weight);
    }
    return result.data;
}
