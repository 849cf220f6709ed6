/**
 * @file script.ts
 * @module text/script
 * @created 2026-09-05
 * @license MIT
 *
 * @fileoverview Unicode script detection and splitting of text into script runs.
 */

/**
 * Han ideographs: Extension A, the unified block, compatibility ideographs
 * and the supplementary ideographic planes.
 */
const HAN_PATTERN = /[\u3400-\u4DBF\u4E00-\u9FFF\uF900-\uFAFF\u{20000}-\u{2FA1F}]/u;

/**
 * Letters, digits and combining marks of every other script.
 */
const WORD_PATTERN = /[\p{L}\p{N}\p{M}]/u;

/**
 * Kind of a single code point.
 */
export type ScriptKind = 'han' | 'word' | 'boundary';

/**
 * Contiguous run of code points of the same kind.
 */
export interface ScriptRun {
    kind: Exclude<ScriptKind, 'boundary'>;
    text: string;
}

/**
 * Classify a single code point.
 *
 * @param char - One code point (may be two UTF-16 units)
 */
export function classifyCodePoint(char: string): ScriptKind {
    if (HAN_PATTERN.test(char)) {
        return 'han';
    }
    if (WORD_PATTERN.test(char)) {
        return 'word';
    }
    return 'boundary';
}

/**
 * Split text into runs of Han and non-Han word characters.
 *
 * Boundary code points (whitespace, punctuation, symbols) end the current
 * run and are dropped. Runs are returned in their original order.
 *
 * @example
 * splitScriptRuns('用docker运行 app')
 * // [{ kind: 'han', text: '用' }, { kind: 'word', text: 'docker' },
 * //  { kind: 'han', text: '运行' }, { kind: 'word', text: 'app' }]
 */
export function splitScriptRuns(text: string): ScriptRun[] {
    const runs: ScriptRun[] = [];
    let currentKind: ScriptKind = 'boundary';
    let current = '';

    const flush = () => {
        if (current && currentKind !== 'boundary') {
            runs.push({ kind: currentKind, text: current });
        }
        current = '';
    };

    for (const char of text) {
        const kind = classifyCodePoint(char);
        if (kind !== currentKind) {
            flush();
            currentKind = kind;
        }
        if (kind !== 'boundary') {
            current += char;
        }
    }
    flush();

    return runs;
}
