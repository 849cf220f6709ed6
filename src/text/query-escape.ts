/**
 * @file query-escape.ts
 * @module text/query-escape
 * @created 2026-09-06
 * @license MIT
 *
 * @fileoverview Escaping of query operator characters and the matching unescape step.
 */

import { QueryBuildError } from '../shared/errors.js';

/**
 * Characters the query syntax treats as operators.
 */
export const QUERY_OPERATOR_CHARS: ReadonlySet<string> = new Set([
    '+', '-', '&', '|', '!', '(', ')', '{', '}', '[', ']',
    '^', '"', '~', '*', '?', ':', '\\', '/',
]);

/**
 * Backslash-escape every operator character so user input is always literal.
 *
 * @example
 * escapeForQuery('ps -a')        // 'ps \\-a'
 * escapeForQuery('a:b*c')        // 'a\\:b\\*c'
 * escapeForQuery('path/to/file') // 'path\\/to\\/file'
 */
export function escapeForQuery(text: string): string {
    let result = '';
    for (const char of text) {
        if (QUERY_OPERATOR_CHARS.has(char)) {
            result += '\\';
        }
        result += char;
    }
    return result;
}

/**
 * Read an escaped query back into literal text.
 *
 * Every operator character must be preceded by a backslash. An unescaped
 * operator or a trailing lone backslash means the escaping step is broken.
 *
 * @param escaped - Output of {@link escapeForQuery}
 * @returns The literal query text
 * @throws QueryBuildError on an unescaped operator or dangling escape
 */
export function unescapeQuery(escaped: string): string {
    const chars = Array.from(escaped);
    let literal = '';

    for (let i = 0; i < chars.length; i++) {
        const char = chars[i];
        if (char === '\\') {
            const next = chars[i + 1];
            if (next === undefined) {
                throw new QueryBuildError(escaped, 'dangling escape at end of query');
            }
            if (!QUERY_OPERATOR_CHARS.has(next)) {
                throw new QueryBuildError(escaped, `unexpected escape of '${next}'`);
            }
            literal += next;
            i++;
        } else if (QUERY_OPERATOR_CHARS.has(char)) {
            throw new QueryBuildError(escaped, `unescaped operator '${char}' at position ${i}`);
        } else {
            literal += char;
        }
    }

    return literal;
}
