/**
 * @file markdown-importer.ts
 * @module parser/markdown-importer
 * @created 2026-09-10
 * @license MIT
 *
 * @fileoverview Parses tldr-style markdown pages into structured records and imports them in batches.
 */

import { UnlearnableError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { findRecordDefect } from '../shared/record.js';
import type { Example, StructuredRecord } from '../shared/types.js';
import { decodeText } from '../text/encoding.js';
import { parseTldrPath } from './tldr-path.js';

/**
 * Options for {@link parseTldrMarkdown}.
 */
export interface MarkdownParseOptions {
    /** Language of the page (default "en") */
    lang?: string;
    /** Platform tag (default "common"); also used as category */
    platform?: string;
    /** Identifier used in error messages when the page has no title */
    identifier?: string;
}

/**
 * One markdown file handed over by the archive/file collaborator.
 */
export interface MarkdownEntry {
    identifier: string;
    text: string | Uint8Array;
}

/**
 * A skipped or failed entry with the reason.
 */
export interface EntryIssue {
    identifier: string;
    reason: string;
}

/**
 * Outcome counts of a batch import.
 */
export interface ImportStats {
    imported: number;
    skipped: number;
    failed: number;
    /** Entries skipped because they are not learnable or filtered out */
    skippedIds: EntryIssue[];
    /** Entries that raised an error while being read or parsed */
    failures: EntryIssue[];
}

/**
 * Options for {@link importMarkdownBatch}.
 */
export interface BatchImportOptions {
    /** Language for entries outside a `pages.<lang>` tree (default "en") */
    langHint?: string;
    /** Accepted languages; empty or absent accepts all */
    languages?: string[];
    logger?: Logger;
}

/**
 * Result of a batch import.
 */
export interface BatchImportResult {
    records: StructuredRecord[];
    stats: ImportStats;
}

const FENCE_PATTERN = /^(`{3,}|~{3,})/;
const BULLET_PATTERN = /^[-*]\s+(.*)$/;
const INLINE_CODE_PATTERN = /^`(.+)`$/;

/**
 * Parse a tldr page.
 *
 * Grammar:
 * - first `# ` line → name
 * - first `> ` line → description
 * - `- ` bullet → example description, paired with the next non-empty line
 *   when it is inline code or a fenced block
 * - every other non-empty line → content
 *
 * `{{placeholders}}` in code are kept verbatim.
 *
 * @param input - Markdown text or raw UTF-8 bytes
 * @param options - Language, platform and identifier
 * @throws UnlearnableError if the name, description or all examples are missing
 * @throws EncodingError if the bytes are not valid UTF-8
 *
 * @example
 * ```typescript
 * const record = parseTldrMarkdown(
 *   '# docker\n\n> Manage Docker containers and images.\n\n- Run a container:\n\n`docker run {{image}}`\n',
 *   { lang: 'en' }
 * );
 * // record.examples → [{ description: 'Run a container', code: 'docker run {{image}}' }]
 * ```
 */
export function parseTldrMarkdown(input: string | Uint8Array, options: MarkdownParseOptions = {}): StructuredRecord {
    const lines = decodeText(input).split(/\r?\n/);

    let name = '';
    let description = '';
    const examples: Example[] = [];
    const content: string[] = [];
    let pending: { description: string; raw: string } | null = null;

    const flushPending = () => {
        if (pending) {
            content.push(pending.raw);
            pending = null;
        }
    };

    for (let i = 0; i < lines.length; i++) {
        const trimmed = lines[i].trim();
        if (!trimmed) {
            continue;
        }

        const fence = trimmed.match(FENCE_PATTERN);
        if (fence) {
            const marker = fence[1];
            const body: string[] = [];
            let closed = false;
            let j = i + 1;
            for (; j < lines.length; j++) {
                if (lines[j].trim() === marker) {
                    closed = true;
                    break;
                }
                body.push(lines[j]);
            }

            if (closed && pending) {
                examples.push({ description: pending.description, code: body.join('\n').trim() });
                pending = null;
            } else {
                flushPending();
                content.push(trimmed);
                for (const line of body) {
                    if (line.trim()) content.push(line.trim());
                }
                if (closed) content.push(marker);
            }
            i = j;
            continue;
        }

        if (!name && trimmed.startsWith('# ')) {
            flushPending();
            name = trimmed.slice(2).trim();
            continue;
        }

        if (trimmed.startsWith('>')) {
            flushPending();
            const quoted = trimmed.replace(/^>\s?/, '').trim();
            if (!description && quoted) {
                description = quoted;
            } else {
                content.push(trimmed);
            }
            continue;
        }

        const bullet = trimmed.match(BULLET_PATTERN);
        if (bullet) {
            flushPending();
            pending = { description: bullet[1].trim().replace(/:$/, '').trim(), raw: trimmed };
            continue;
        }

        const code = trimmed.match(INLINE_CODE_PATTERN);
        if (code && pending) {
            examples.push({ description: pending.description, code: code[1] });
            pending = null;
            continue;
        }

        flushPending();
        content.push(trimmed);
    }
    flushPending();

    const platform = options.platform ?? 'common';
    const record: StructuredRecord = {
        name,
        description,
        category: platform,
        platform,
        lang: options.lang ?? 'en',
        examples,
        content: content.join('\n'),
    };

    const defect = findRecordDefect(record);
    if (defect) {
        throw new UnlearnableError(name || options.identifier || '<unknown>', defect);
    }
    return record;
}

function formatCode(code: string): string {
    if (code.includes('\n') || code.startsWith('`') || code.endsWith('`')) {
        return `\`\`\`\n${code}\n\`\`\``;
    }
    return `\`${code}\``;
}

/**
 * Render a record as a tldr page that {@link parseTldrMarkdown} reads back
 * to the same record.
 */
export function serializeTldrMarkdown(record: StructuredRecord): string {
    const lines = [`# ${record.name}`, '', `> ${record.description}`];

    if (record.content) {
        for (const line of record.content.split('\n')) {
            lines.push(line);
        }
    }

    for (const example of record.examples) {
        lines.push('', `- ${example.description}:`, '', formatCode(example.code));
    }

    return `${lines.join('\n')}\n`;
}

/**
 * Parse a batch of markdown entries independently.
 *
 * Language and platform come from the tldr path when there is one. Entries
 * that are not learnable or whose language is not accepted are skipped; any
 * other error marks the entry as failed. No entry aborts the batch.
 *
 * @param entries - Markdown files to import
 * @param options - Language hint, accepted languages and logger
 * @returns Parsed records and outcome counts
 */
export function importMarkdownBatch(
    entries: Iterable<MarkdownEntry>,
    options: BatchImportOptions = {}
): BatchImportResult {
    const logger = options.logger ?? silentLogger;
    const accepted = options.languages && options.languages.length > 0 ? new Set(options.languages) : null;
    const records: StructuredRecord[] = [];
    const stats: ImportStats = { imported: 0, skipped: 0, failed: 0, skippedIds: [], failures: [] };

    for (const entry of entries) {
        const pathInfo = parseTldrPath(entry.identifier);
        const lang = pathInfo?.lang ?? options.langHint ?? 'en';

        if (accepted && !accepted.has(lang)) {
            stats.skipped++;
            stats.skippedIds.push({ identifier: entry.identifier, reason: `language '${lang}' not enabled` });
            continue;
        }

        try {
            const record = parseTldrMarkdown(entry.text, {
                lang,
                platform: pathInfo?.platform ?? 'common',
                identifier: entry.identifier,
            });
            records.push(record);
            stats.imported++;
        } catch (error) {
            if (error instanceof UnlearnableError) {
                stats.skipped++;
                stats.skippedIds.push({ identifier: entry.identifier, reason: error.reason });
                logger.debug(`Skipped ${entry.identifier}: ${error.reason}`);
            } else {
                const reason = error instanceof Error ? error.message : String(error);
                stats.failed++;
                stats.failures.push({ identifier: entry.identifier, reason });
                logger.debug(`Failed ${entry.identifier}: ${reason}`);
            }
        }
    }

    return { records, stats };
}
