/**
 * @file tokenizer.ts
 * @module text/tokenizer
 * @created 2026-09-06
 * @license MIT
 *
 * @fileoverview Language-aware tokenization shared by indexing and querying.
 */

import { decodeText } from './encoding.js';
import { splitScriptRuns } from './script.js';
import { getDefaultSegmenter, toBigrams, type ChineseSegmenter } from './segmenter.js';

/**
 * Language hints whose ideographs are not Chinese words. Their Han runs are
 * split into bigrams instead of being matched against the Chinese dictionary.
 */
const BIGRAM_ONLY_LANGS = new Set(['ja', 'ko']);

/**
 * Whether a language hint selects dictionary segmentation for Han runs.
 */
export function usesChineseDictionary(langHint?: string): boolean {
    if (!langHint) {
        return true;
    }
    const primary = langHint.toLowerCase().split(/[-_]/)[0];
    return !BIGRAM_ONLY_LANGS.has(primary);
}

/**
 * Split text into search tokens.
 *
 * - Han runs are segmented into words (dictionary longest match, bigram
 *   fallback; bigrams only for `ja`/`ko` hints).
 * - Other letter/digit runs become lowercased tokens.
 * - Everything else is a boundary.
 *
 * Input is NFKC-normalized first so full-width forms match their ASCII
 * counterparts.
 *
 * @param input - Text or raw UTF-8 bytes
 * @param langHint - Language of the text (e.g., "en", "zh")
 * @param segmenter - Segmenter to use (defaults to the bundled dictionary)
 * @returns Tokens in original order, duplicates kept
 * @throws EncodingError if the input is not well-formed
 *
 * @example
 * tokenize('Docker 查看容器日志') // ['docker', '查看', '容器', '日志']
 */
export function tokenize(
    input: string | Uint8Array,
    langHint?: string,
    segmenter: ChineseSegmenter = getDefaultSegmenter()
): string[] {
    const text = decodeText(input).normalize('NFKC');
    const useDictionary = usesChineseDictionary(langHint);
    const tokens: string[] = [];

    for (const run of splitScriptRuns(text)) {
        if (run.kind === 'word') {
            tokens.push(run.text.toLowerCase());
            continue;
        }
        const words = useDictionary ? segmenter.segment(run.text) : toBigrams(run.text);
        for (const word of words) {
            tokens.push(word);
        }
    }

    return tokens;
}
