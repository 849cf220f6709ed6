/**
 * @file segmenter.ts
 * @module text/segmenter
 * @created 2026-09-05
 * @license MIT
 *
 * @fileoverview Chinese word segmentation: dictionary longest match with a
 * character-bigram fallback for stretches the dictionary does not cover.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Location of the bundled dictionary (`data/zh-dict.txt` at the package root).
 */
export const DEFAULT_DICTIONARY_PATH = resolve(__dirname, '..', '..', 'data', 'zh-dict.txt');

/**
 * Split a run of unknown characters into overlapping bigrams.
 *
 * @example
 * toBigrams('甲乙丙') // ['甲乙', '乙丙']
 */
export function toBigrams(run: string): string[] {
    const chars = Array.from(run);
    if (chars.length <= 1) {
        return chars;
    }

    const grams: string[] = [];
    for (let i = 0; i < chars.length - 1; i++) {
        grams.push(chars[i] + chars[i + 1]);
    }
    return grams;
}

/**
 * Parse dictionary text: one word per line, `#` comments and blank lines ignored.
 */
export function parseDictionary(text: string): string[] {
    return text
        .split(/\r?\n/)
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'));
}

/**
 * Forward maximum matching segmenter.
 *
 * At each position the longest dictionary word is taken. Characters not
 * covered by any word are collected and emitted as bigrams once the next
 * dictionary word (or the end of the run) is reached.
 *
 * @example
 * ```typescript
 * const segmenter = new ChineseSegmenter(['复制', '文件']);
 * segmenter.segment('复制文件'); // ['复制', '文件']
 * ```
 */
export class ChineseSegmenter {
    private words: Set<string>;
    private maxWordLength: number;

    /**
     * Create a segmenter over a word list.
     * @param words - Dictionary words
     */
    constructor(words: Iterable<string>) {
        this.words = new Set();
        this.maxWordLength = 1;
        for (const word of words) {
            this.words.add(word);
            this.maxWordLength = Math.max(this.maxWordLength, Array.from(word).length);
        }
    }

    /**
     * Load a segmenter from a dictionary file.
     * @param path - Path to a word-per-line file
     */
    static fromFile(path: string): ChineseSegmenter {
        return new ChineseSegmenter(parseDictionary(readFileSync(path, 'utf-8')));
    }

    /**
     * Number of dictionary words.
     */
    get size(): number {
        return this.words.size;
    }

    /**
     * Whether a word is in the dictionary.
     */
    has(word: string): boolean {
        return this.words.has(word);
    }

    /**
     * Segment a run of Han characters.
     *
     * @param run - Text containing only ideographs
     * @returns Words in original order
     */
    segment(run: string): string[] {
        const chars = Array.from(run);
        const tokens: string[] = [];
        let unknown = '';

        const flushUnknown = () => {
            if (unknown) {
                for (const bigram of toBigrams(unknown)) {
                    tokens.push(bigram);
                }
                unknown = '';
            }
        };

        let i = 0;
        while (i < chars.length) {
            const word = this.longestMatchAt(chars, i);
            if (word) {
                flushUnknown();
                tokens.push(word.text);
                i += word.length;
            } else {
                unknown += chars[i];
                i++;
            }
        }
        flushUnknown();

        return tokens;
    }

    private longestMatchAt(chars: string[], start: number): { text: string; length: number } | null {
        const upper = Math.min(this.maxWordLength, chars.length - start);
        for (let length = upper; length >= 1; length--) {
            const candidate = chars.slice(start, start + length).join('');
            if (this.words.has(candidate)) {
                return { text: candidate, length };
            }
        }
        return null;
    }
}

let defaultSegmenter: ChineseSegmenter | null = null;

/**
 * Shared segmenter over the bundled dictionary, loaded on first use.
 */
export function getDefaultSegmenter(): ChineseSegmenter {
    if (!defaultSegmenter) {
        defaultSegmenter = ChineseSegmenter.fromFile(DEFAULT_DICTIONARY_PATH);
    }
    return defaultSegmenter;
}
