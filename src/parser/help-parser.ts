/**
 * @file help-parser.ts
 * @module parser/help-parser
 * @created 2026-09-09
 * @license MIT
 *
 * @fileoverview Heuristic extraction of structured records from `--help` and `man` output.
 *
 * The pipeline is a set of pure steps, each usable on its own:
 * line classifier → description extractor → example extractors → source merge.
 */

import { UnlearnableError } from '../shared/errors.js';
import type { Example, StructuredRecord } from '../shared/types.js';
import { stripAnsiCodes } from '../shared/utils/ansi.js';
import { classifyLine, collapseWhitespace, indentOf } from './line-classifier.js';

/**
 * Default cap on examples per learned command.
 */
export const DEFAULT_MAX_EXAMPLES = 10;

/**
 * Description collection stops once the text exceeds this many characters.
 */
const DESCRIPTION_SOFT_LIMIT = 200;

/**
 * Only the first lines are searched for a man `NAME` line.
 */
const NAME_LINE_WINDOW = 20;

/**
 * Sources the help parser understands.
 */
export type HelpSource = 'help' | 'man';

/**
 * Which source to try first. `auto` prefers `--help`.
 */
export type SourcePreference = 'auto' | HelpSource;

/**
 * Output of one process invocation, as supplied by the process collaborator.
 */
export interface HelpCapture {
    /** Whether the invocation succeeded */
    ok: boolean;
    stdout: string;
    stderr?: string;
}

/**
 * Everything captured for one command.
 */
export interface HelpInput {
    command: string;
    /** Result of `<command> --help` (or `-h`), if attempted */
    help?: HelpCapture;
    /** Result of `man <command>`, if attempted */
    man?: HelpCapture;
}

/**
 * Options for {@link parseHelpOutput}.
 */
export interface HelpParseOptions {
    preferred?: SourcePreference;
    maxExamples?: number;
    /** Platform tag for the record (e.g., "linux") */
    platform?: string;
}

/**
 * Parsed record plus the sources that contributed to it, in priority order.
 */
export interface ParsedHelp {
    record: StructuredRecord;
    sources: HelpSource[];
}

/**
 * Description and examples extracted from a single source.
 */
export interface Extraction {
    description: string;
    examples: Example[];
}

const SOURCE_LABELS: Record<HelpSource, string> = {
    help: '--help',
    man: 'man',
};

/**
 * Text of a capture if it is usable: the invocation succeeded and the output
 * is non-empty after trimming. Falls back to stderr when stdout is blank.
 */
export function usableText(capture: HelpCapture | undefined): string | null {
    if (!capture || !capture.ok) {
        return null;
    }
    const raw = capture.stdout.trim() ? capture.stdout : capture.stderr ?? '';
    const cleaned = stripAnsiCodes(raw).replace(/\r\n?/g, '\n');
    return cleaned.trim() ? cleaned : null;
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Find a man `NAME` line such as `ls - list directory contents`.
 *
 * @returns The summary after the dash, or null
 */
export function findNameLine(lines: string[], command: string): string | null {
    const pattern = new RegExp(`^${escapeRegExp(command)}(?:\\s*,\\s*\\S+)*\\s+\\\\?-{1,2}\\s+(.+)$`, 'i');
    for (const line of lines.slice(0, NAME_LINE_WINDOW)) {
        const match = line.trim().match(pattern);
        if (match) {
            return collapseWhitespace(match[1]);
        }
    }
    return null;
}

/**
 * Extract the command description.
 *
 * A man `NAME` line wins. Otherwise the first contiguous block of text lines
 * before the first options header, examples header or flag line is used. A
 * usage paragraph in front of the block is skipped; a usage line after it
 * ends the block.
 *
 * @returns Collapsed description, or an empty string if none was found
 */
export function extractDescription(lines: string[], command: string): string {
    const fromName = findNameLine(lines, command);
    if (fromName) {
        return fromName;
    }

    const block: string[] = [];
    let inUsage = false;

    for (const line of lines) {
        const kind = classifyLine(line);

        if (kind === 'options-header' || kind === 'examples-header' || kind === 'flag') {
            break;
        }
        if (kind === 'usage') {
            if (block.length > 0) break;
            inUsage = true;
            continue;
        }
        if (kind === 'blank') {
            inUsage = false;
            if (block.length > 0) break;
            continue;
        }
        if (kind === 'heading') {
            if (block.length > 0) break;
            continue;
        }

        // Indented lines right after a usage line continue it ("  or:  cp ...")
        if (inUsage && indentOf(line) > 0) {
            continue;
        }
        inUsage = false;

        block.push(line.trim());
        if (block.join(' ').length > DESCRIPTION_SOFT_LIMIT) {
            break;
        }
    }

    return collapseWhitespace(block.join(' '));
}

/**
 * Split a flag line into its main flag and description.
 *
 * Options and description are separated by two or more spaces (or a tab).
 * The long form is preferred and argument placeholders are dropped.
 *
 * @example
 * parseFlagLine('-v, --verbose  Enable verbose output')
 * // { flag: '--verbose', description: 'Enable verbose output' }
 * parseFlagLine('-w, --width=COLS  set output width')
 * // { flag: '--width', description: 'set output width' }
 */
export function parseFlagLine(line: string): { flag: string; description: string } | null {
    const trimmed = line.trim();
    const split = trimmed.match(/^(\S.*?)(?:\s{2,}|\t)\s*(.*)$/);
    const optionsPart = split ? split[1] : trimmed;
    const description = split ? collapseWhitespace(split[2]) : '';

    const options = optionsPart
        .split(',')
        .map(option => option.trim())
        .filter(option => option.startsWith('-'));
    const main = options.find(option => option.startsWith('--')) ?? options[0];
    if (!main) {
        return null;
    }

    const flag = main.match(/^--?[A-Za-z0-9?][\w?-]*/);
    if (!flag) {
        return null;
    }

    return { flag: flag[0], description };
}

/**
 * Synthesize examples from flag lines, earliest flags first.
 *
 * A flag without an inline description takes the next non-blank line when
 * that line is indented deeper and is plain text (man page layout).
 */
export function extractFlagExamples(lines: string[], command: string, maxExamples: number): Example[] {
    const examples: Example[] = [];
    const seen = new Set<string>();

    for (let i = 0; i < lines.length && examples.length < maxExamples; i++) {
        if (classifyLine(lines[i]) !== 'flag') {
            continue;
        }

        const parsed = parseFlagLine(lines[i]);
        if (!parsed || seen.has(parsed.flag)) {
            continue;
        }

        let description = parsed.description;
        if (!description) {
            const next = lines.slice(i + 1).find(line => line.trim() !== '');
            if (next !== undefined && indentOf(next) > indentOf(lines[i]) && classifyLine(next) === 'text') {
                description = collapseWhitespace(next);
            }
        }
        if (!description) {
            continue;
        }

        seen.add(parsed.flag);
        examples.push({ description, code: `${command} ${parsed.flag}` });
    }

    return examples;
}

/**
 * Collect literal command lines from an EXAMPLES section.
 *
 * A command line starts with the command name (optionally behind a `$`
 * prompt). Its description is the text line just before it, or an inline
 * `# comment`, or "Example usage".
 */
export function extractLiteralExamples(lines: string[], command: string, maxExamples: number): Example[] {
    const examples: Example[] = [];
    const commandPattern = new RegExp(`^(?:\\$\\s+)?(${escapeRegExp(command)}(?:\\s.*)?)$`);
    let inExamples = false;
    let pendingDescription = '';

    for (const line of lines) {
        const kind = classifyLine(line);

        if (kind === 'examples-header') {
            inExamples = true;
            pendingDescription = '';
            continue;
        }
        if (!inExamples) {
            continue;
        }
        if (kind === 'heading' || kind === 'options-header' || kind === 'usage') {
            inExamples = false;
            continue;
        }
        if (kind === 'blank') {
            continue;
        }

        const match = line.trim().match(commandPattern);
        if (match) {
            let code = match[1].trim();
            let description = pendingDescription;
            const comment = code.match(/^(.*?)\s+#\s*(.+)$/);
            if (comment) {
                code = comment[1].trim();
                description = description || comment[2].trim();
            }

            examples.push({ description: description || 'Example usage', code });
            pendingDescription = '';
            if (examples.length >= maxExamples) {
                break;
            }
        } else if (kind === 'text' && line.trim().length < 100) {
            pendingDescription = collapseWhitespace(line).replace(/:$/, '');
        }
    }

    return examples;
}

/**
 * Union of two example lists by code, first list first, capped.
 */
export function mergeExamples(primary: Example[], secondary: Example[], maxExamples: number): Example[] {
    const merged: Example[] = [];
    const seen = new Set<string>();

    for (const example of [...primary, ...secondary]) {
        if (merged.length >= maxExamples) break;
        if (seen.has(example.code)) continue;
        seen.add(example.code);
        merged.push(example);
    }

    return merged;
}

/**
 * Run description and example extraction over one source text.
 */
export function extractFromText(text: string, command: string, maxExamples: number): Extraction {
    const lines = text.split('\n');
    const literal = extractLiteralExamples(lines, command, maxExamples);
    const flags = extractFlagExamples(lines, command, maxExamples);

    return {
        description: extractDescription(lines, command),
        examples: mergeExamples(literal, flags, maxExamples),
    };
}

/**
 * Order in which sources are tried.
 */
export function sourceOrder(preferred: SourcePreference): HelpSource[] {
    return preferred === 'man' ? ['man', 'help'] : ['help', 'man'];
}

/**
 * Parse captured help output into a structured record.
 *
 * The preferred usable source is parsed first. When it yields no description
 * or no example and the other source is usable, that one is parsed as well and
 * the two are merged: first non-empty description, union of examples up to
 * the cap.
 *
 * @param input - Command name and captured outputs
 * @param options - Source preference, example cap and platform
 * @returns The record and the sources used
 * @throws UnlearnableError if no description or no example can be found
 *
 * @example
 * ```typescript
 * const { record } = parseHelpOutput({
 *   command: 'mycmd',
 *   help: { ok: true, stdout: helpText },
 * });
 * ```
 */
export function parseHelpOutput(input: HelpInput, options: HelpParseOptions = {}): ParsedHelp {
    const { command } = input;
    const maxExamples = options.maxExamples ?? DEFAULT_MAX_EXAMPLES;

    const available = sourceOrder(options.preferred ?? 'auto')
        .map(source => ({ source, text: usableText(input[source]) }))
        .filter((entry): entry is { source: HelpSource; text: string } => entry.text !== null);

    if (available.length === 0) {
        throw new UnlearnableError(command, 'no help output available');
    }

    const [primary, secondary] = available;
    const used = [primary];
    let { description, examples } = extractFromText(primary.text, command, maxExamples);

    if ((!description || examples.length === 0) && secondary) {
        const fallback = extractFromText(secondary.text, command, maxExamples);
        used.push(secondary);
        description = description || fallback.description;
        examples = mergeExamples(examples, fallback.examples, maxExamples);
    }

    if (!description) {
        throw new UnlearnableError(command, 'no description found');
    }
    if (examples.length === 0) {
        throw new UnlearnableError(command, 'no examples found');
    }

    return {
        record: {
            name: command,
            description,
            category: 'local',
            platform: options.platform ?? 'common',
            lang: 'local',
            examples,
            content: used.map(entry => `Source: ${SOURCE_LABELS[entry.source]}\n\n${entry.text.trim()}`).join('\n\n'),
        },
        sources: used.map(entry => entry.source),
    };
}
