/**
 * @file query-escape.test.ts
 * @module tests/unit/text/query-escape
 * @created 2026-09-20
 * @license MIT
 *
 * @fileoverview Unit tests for query escaping and the matching unescape step.
 */

import { QueryBuildError } from '../../../src/shared/errors.js';
import { escapeForQuery, QUERY_OPERATOR_CHARS, unescapeQuery } from '../../../src/text/query-escape.js';

describe('escapeForQuery', () => {
    it('should escape a leading dash', () => {
        expect(escapeForQuery('docker -a')).toBe('docker \\-a');
    });

    it('should escape parentheses, colons and wildcards', () => {
        expect(escapeForQuery('git (rebase)')).toBe('git \\(rebase\\)');
        expect(escapeForQuery('a:b*c')).toBe('a\\:b\\*c');
    });

    it('should escape backslashes and slashes', () => {
        expect(escapeForQuery('C:\\tmp/x')).toBe('C\\:\\\\tmp\\/x');
    });

    it('should leave plain text unchanged', () => {
        expect(escapeForQuery('查看 容器 logs')).toBe('查看 容器 logs');
    });
});

describe('unescapeQuery', () => {
    it('should read every escaped operator back literally', () => {
        const inputs = [
            'docker -a',
            'git (rebase)',
            'a:b*c',
            '"quoted" ~fuzzy^2',
            'x && y || !z',
            '{a}[b]?/c\\d+e',
            [...QUERY_OPERATOR_CHARS].join(''),
        ];
        for (const input of inputs) {
            expect(unescapeQuery(escapeForQuery(input))).toBe(input);
        }
    });

    it('should reject an unescaped operator', () => {
        expect(() => unescapeQuery('docker -a')).toThrow(QueryBuildError);
        expect(() => unescapeQuery('docker -a')).toThrow("unescaped operator '-' at position 7");
    });

    it('should reject a dangling escape', () => {
        expect(() => unescapeQuery('abc\\')).toThrow('dangling escape at end of query');
    });

    it('should reject escaping a non-operator', () => {
        expect(() => unescapeQuery('a\\b')).toThrow("unexpected escape of 'b'");
    });

    it('should carry the escaped query on the error', () => {
        try {
            unescapeQuery('a*');
            throw new Error('expected QueryBuildError');
        } catch (error) {
            expect(error).toBeInstanceOf(QueryBuildError);
            expect(error instanceof QueryBuildError && error.query).toBe('a*');
        }
    });
});
