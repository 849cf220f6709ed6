/**
 * @file line-classifier.ts
 * @module parser/line-classifier
 * @created 2026-09-08
 * @license MIT
 *
 * @fileoverview Classifies single lines of `--help` and `man` output.
 */

/**
 * Kind of a help/man line.
 *
 * - `usage`: `Usage: ls [OPTION]...`
 * - `options-header`: `Options:`, `OPTIONS`, `SYNOPSIS`, `Commands:`
 * - `examples-header`: `Examples:`, `EXAMPLES`
 * - `heading`: other man section titles (`NAME`, `DESCRIPTION`) and the
 *   `LS(1)  User Commands  LS(1)` page header
 * - `flag`: a line starting with `-x` or `--xyz`
 */
export type LineKind =
    | 'blank'
    | 'usage'
    | 'options-header'
    | 'examples-header'
    | 'heading'
    | 'flag'
    | 'text';

const USAGE_PATTERN = /^usage:?(\s|$)/i;

const OPTIONS_HEADER_PATTERN =
    /^(options|flags|synopsis|arguments|commands|subcommands|global options|available commands|positional arguments|optional arguments)\s*:?$/i;

const EXAMPLES_HEADER_PATTERN = /^examples?\s*:?$/i;

const MAN_SECTION_PATTERN = /^[A-Z][A-Z0-9 _/-]*$/;

const MAN_TITLE_PATTERN = /^\S+\([0-9A-Za-z]+\)(\s.*)?$/;

const FLAG_PATTERN = /^--?[A-Za-z0-9?]/;

/**
 * Classify one line.
 *
 * @param line - Raw line, indentation included
 */
export function classifyLine(line: string): LineKind {
    const trimmed = line.trim();

    if (!trimmed) {
        return 'blank';
    }
    if (USAGE_PATTERN.test(trimmed)) {
        return 'usage';
    }
    if (OPTIONS_HEADER_PATTERN.test(trimmed)) {
        return 'options-header';
    }
    if (EXAMPLES_HEADER_PATTERN.test(trimmed)) {
        return 'examples-header';
    }
    if (FLAG_PATTERN.test(trimmed)) {
        return 'flag';
    }

    const unindented = !/^\s/.test(line);
    if (unindented && trimmed.length > 1 && MAN_SECTION_PATTERN.test(trimmed)) {
        return 'heading';
    }
    if (unindented && MAN_TITLE_PATTERN.test(trimmed)) {
        return 'heading';
    }

    return 'text';
}

/**
 * Width of the leading whitespace of a line (tabs count as 8).
 */
export function indentOf(line: string): number {
    let width = 0;
    for (const char of line) {
        if (char === ' ') {
            width++;
        } else if (char === '\t') {
            width += 8;
        } else {
            break;
        }
    }
    return width;
}

/**
 * Collapse runs of whitespace into single spaces and trim.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
