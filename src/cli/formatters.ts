/**
 * @file formatters.ts
 * @module cli/formatters
 * @created 2026-09-19
 * @license MIT
 *
 * @fileoverview Output formatters for search results, records and statistics.
 */

import type { ImportStats } from '../parser/markdown-importer.js';
import type { KnowledgeBaseInfo, LearnAllStats } from '../service/knowledge-base.js';
import type { SearchResponse, SearchResult, StructuredRecord } from '../shared/types.js';

/**
 * Output format type.
 */
export type OutputFormat = 'simple' | 'table' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['simple', 'table', 'json'];

/**
 * Whether a string names an output format.
 */
export function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Longest description printed in simple output.
 */
const DESCRIPTION_PREVIEW_LENGTH = 100;

function truncate(text: string, width: number): string {
    return text.length > width ? text.substring(0, width - 3) + '...' : text;
}

/**
 * Format a search response for output.
 *
 * @param response - Search response to format
 * @param format - Output format
 * @returns Formatted string output
 */
export function formatSearchResponse(response: SearchResponse, format: OutputFormat): string {
    switch (format) {
        case 'json':
            return formatJson(response);
        case 'table':
            return formatTable(response.results);
        case 'simple':
        default:
            return formatSimple(response);
    }
}

/**
 * Format results as simple text.
 */
function formatSimple(response: SearchResponse): string {
    if (response.results.length === 0) {
        return 'No results found.';
    }

    const lines: string[] = [];
    for (const result of response.results) {
        lines.push(`${result.name} [${result.lang}/${result.category}] (${result.score.toFixed(2)})`);
        if (result.description) {
            lines.push(`  ${truncate(result.description, DESCRIPTION_PREVIEW_LENGTH)}`);
        }
        lines.push('');
    }

    const shown = response.results.length;
    lines.push(
        shown < response.total
            ? `Showing ${shown} of ${response.total} results (${response.elapsedMs} ms)`
            : `${response.total} results (${response.elapsedMs} ms)`
    );

    return lines.join('\n').trim();
}

/**
 * Format results as a table.
 */
function formatTable(results: SearchResult[]): string {
    if (results.length === 0) {
        return 'No results found.';
    }

    const nameWidth = Math.min(30, Math.max(4, ...results.map(r => r.name.length)));
    const langWidth = Math.max(4, ...results.map(r => r.lang.length));
    const categoryWidth = Math.max(8, ...results.map(r => r.category.length));
    const descriptionWidth = Math.min(60, Math.max(11, ...results.map(r => r.description.length)));

    const header = [
        'Name'.padEnd(nameWidth),
        'Lang'.padEnd(langWidth),
        'Category'.padEnd(categoryWidth),
        'Score'.padStart(7),
        'Description'.padEnd(descriptionWidth),
    ].join(' | ');

    const separator = [
        '-'.repeat(nameWidth),
        '-'.repeat(langWidth),
        '-'.repeat(categoryWidth),
        '-'.repeat(7),
        '-'.repeat(descriptionWidth),
    ].join('-+-');

    const rows = results.map(r =>
        [
            truncate(r.name, nameWidth).padEnd(nameWidth),
            r.lang.padEnd(langWidth),
            r.category.padEnd(categoryWidth),
            r.score.toFixed(2).padStart(7),
            truncate(r.description, descriptionWidth).padEnd(descriptionWidth),
        ].join(' | ')
    );

    return [header, separator, ...rows].join('\n');
}

/**
 * Format results as JSON.
 */
function formatJson(response: SearchResponse): string {
    return JSON.stringify(response, null, 2);
}

/**
 * Format one record for `show`.
 */
export function formatRecord(record: StructuredRecord): string {
    const lines = [
        `${record.name}`,
        `  ${record.description}`,
        '',
        `  Language: ${record.lang}   Category: ${record.category}   Platform: ${record.platform}`,
        '',
        'Examples:',
    ];

    record.examples.forEach((example, i) => {
        lines.push(`  ${i + 1}. ${example.description}`);
        lines.push(`     $ ${example.code}`);
    });

    return lines.join('\n');
}

/**
 * Format import counters.
 */
export function formatImportStats(stats: ImportStats, verbose: boolean = false): string {
    const lines = [`Imported: ${stats.imported}`, `Skipped:  ${stats.skipped}`, `Failed:   ${stats.failed}`];

    if (verbose) {
        for (const issue of stats.skippedIds) {
            lines.push(`  skipped ${issue.identifier}: ${issue.reason}`);
        }
        for (const issue of stats.failures) {
            lines.push(`  failed ${issue.identifier}: ${issue.reason}`);
        }
    }

    return lines.join('\n');
}

/**
 * Format batch learn counters.
 */
export function formatLearnStats(stats: LearnAllStats): string {
    return [
        `Total:   ${stats.total}`,
        `Learned: ${stats.learned}`,
        `Skipped: ${stats.skipped}`,
        `Failed:  ${stats.failed}`,
    ].join('\n');
}

/**
 * Format the knowledge base summary for `info`.
 */
export function formatInfo(info: KnowledgeBaseInfo, dataDir: string): string {
    const lines = [
        `Data directory:   ${dataDir}`,
        `Commands:         ${info.commandCount.toLocaleString()}`,
        `Languages:        ${info.languages.length > 0 ? info.languages.join(', ') : '(none)'}`,
        `Indexed:          ${info.indexedDocuments.toLocaleString()} (generation ${info.indexGeneration})`,
        `Index built:      ${info.indexBuiltAt}`,
    ];

    if (info.metadata) {
        lines.push(`Data version:     ${info.metadata.version}`);
        lines.push(`Last update:      ${info.metadata.lastUpdate}`);
    }

    return lines.join('\n');
}
