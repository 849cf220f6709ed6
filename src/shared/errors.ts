/**
 * @file errors.ts
 * @module shared/errors
 * @created 2026-09-02
 * @license MIT
 *
 * @fileoverview Error classes raised by the parsers, the index and the query engine.
 */

/**
 * No usable description or examples could be extracted for a command or file.
 * Batch flows count it as skipped.
 */
export class UnlearnableError extends Error {
    readonly command: string;
    readonly reason: string;

    constructor(command: string, reason: string) {
        super(`Cannot learn '${command}': ${reason}`);
        this.name = 'UnlearnableError';
        this.command = command;
        this.reason = reason;
    }
}

/**
 * Input text is not valid UTF-8 (or contains unpaired surrogates).
 */
export class EncodingError extends Error {
    constructor(message: string = 'Malformed UTF-8 input') {
        super(message);
        this.name = 'EncodingError';
    }
}

/**
 * Reading or writing the persisted index failed.
 * The previously installed snapshot remains valid.
 */
export class IndexIOError extends Error {
    readonly path: string;

    constructor(path: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Index I/O failed at ${path}: ${detail}`, { cause });
        this.name = 'IndexIOError';
        this.path = path;
    }
}

/**
 * The escaped query could not be turned into terms.
 * Always a defect in escaping, never a "no results" condition.
 */
export class QueryBuildError extends Error {
    readonly query: string;

    constructor(query: string, message: string) {
        super(`Failed to build query from '${query}': ${message}`);
        this.name = 'QueryBuildError';
        this.query = query;
    }
}

/**
 * A `(name, lang)` key is not present.
 */
export class NotFoundError extends Error {
    readonly commandName: string;
    readonly lang: string;

    constructor(name: string, lang: string) {
        super(`Command '${name}' not found for language '${lang}'`);
        this.name = 'NotFoundError';
        this.commandName = name;
        this.lang = lang;
    }
}

/**
 * The configuration file exists but cannot be read or is invalid.
 */
export class ConfigError extends Error {
    constructor(path: string, message: string) {
        super(`Invalid configuration in ${path}: ${message}`);
        this.name = 'ConfigError';
    }
}
