/**
 * Development-only console logging.
 *
 * Bundlers replace `process.env.NODE_ENV`; outside a bundle the guard keeps
 * browsers without `process` quiet.
 */

import { formatError } from './errors';

const IS_DEV = typeof process !== 'undefined' &&
    process.env.NODE_ENV !== 'production';

type LogLevel = 'log' | 'warn';

function write(level: LogLevel, context: string, message: string, data: unknown): void {
    if (!IS_DEV) return;
    const line = `[${context}] ${message}`;
    const args: unknown[] = data === undefined ? [line] : [line, data];
    console[level](...args);
}

export function devLog(context: string, message: string, data?: unknown): void {
    write('log', context, message, data);
}

export function devWarn(context: string, message: string, data?: unknown): void {
    write('warn', context, message, data);
}

/**
 * Logs the error in development and returns its display line.
 */
export function devError(context: string, error: unknown): string {
    const line = formatError(error, context);
    if (IS_DEV) {
        console.error(`[${context}]`, line);
    }
    return line;
}
