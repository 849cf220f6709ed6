/**
 * @file encoding.ts
 * @module text/encoding
 * @created 2026-09-05
 * @license MIT
 *
 * @fileoverview Strict UTF-8 decoding for text entering the parsers and the index.
 */

import { EncodingError } from '../shared/errors.js';

const UNPAIRED_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Turn raw input into a well-formed string.
 *
 * Bytes are decoded as strict UTF-8 (a leading BOM is dropped). Strings are
 * checked for unpaired surrogates, which cannot be encoded.
 *
 * @param input - Text or raw bytes
 * @throws EncodingError on malformed input
 */
export function decodeText(input: string | Uint8Array): string {
    if (typeof input === 'string') {
        if (UNPAIRED_SURROGATE.test(input)) {
            throw new EncodingError('Unpaired surrogate in input text');
        }
        return input;
    }

    try {
        return decoder.decode(input);
    } catch {
        throw new EncodingError();
    }
}
