/**
 * @file ansi.ts
 * @module shared/utils/ansi
 * @created 2026-09-08
 * @license MIT
 *
 * @fileoverview Removal of terminal escape sequences from captured process output.
 */

/**
 * Strip ANSI escape sequences and backspace overstrike.
 *
 * `man` renders bold as `X\bX` and underline as `_\bX`; a backspace removes
 * the character before it, leaving the plain text.
 *
 * @example
 * stripAnsiCodes('\x1b[1mBold\x1b[0m text') // 'Bold text'
 * stripAnsiCodes('N\bNA\bAM\bME\bE')        // 'NAME'
 */
export function stripAnsiCodes(text: string): string {
    let result = '';
    let i = 0;

    while (i < text.length) {
        const char = text[i];

        if (char === '\x1b') {
            if (text[i + 1] === '[') {
                // CSI: skip parameters up to the final letter
                i += 2;
                while (i < text.length && !/[A-Za-z]/.test(text[i])) {
                    i++;
                }
                i++;
            } else {
                i += 2;
            }
            continue;
        }

        if (char === '\b') {
            result = result.slice(0, -1);
        } else {
            result += char;
        }
        i++;
    }

    return result;
}
