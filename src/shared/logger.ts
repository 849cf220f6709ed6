/**
 * @file logger.ts
 * @module shared/logger
 * @created 2026-09-03
 * @license MIT
 *
 * @fileoverview Console logging with verbose gating.
 */

/**
 * Minimal logging surface handed to library code.
 */
export interface Logger {
    info(message: string): void;
    warn(message: string): void;
    error(message: string, error?: unknown): void;
    /** Only printed in verbose mode */
    debug(message: string): void;
}

/**
 * Create a logger that writes to the console.
 * Debug output is printed only when `verbose` is set.
 */
export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
    const verbose = options.verbose ?? false;

    return {
        info: message => console.log(message),
        warn: message => console.warn(`Warning: ${message}`),
        error: (message, error) => {
            if (error === undefined) {
                console.error(`Error: ${message}`);
            } else if (verbose) {
                console.error(`Error: ${message}`, error);
            } else {
                const detail = error instanceof Error ? error.message : String(error);
                console.error(`Error: ${message}: ${detail}`);
            }
        },
        debug: message => {
            if (verbose) {
                console.log(`  -> ${message}`);
            }
        },
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    debug: () => undefined,
};
