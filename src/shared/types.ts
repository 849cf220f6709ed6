/**
 * @file types.ts
 * @module shared/types
 * @created 2026-09-02
 * @license MIT
 *
 * @fileoverview Core record, document and search types shared across modules.
 */

/**
 * One usage example of a command.
 */
export interface Example {
    /** What the example does (e.g., "Run a container") */
    description: string;
    /** Command line, placeholders such as `{{image}}` kept verbatim */
    code: string;
}

/**
 * Parsed documentation of one command in one language.
 *
 * Uniquely keyed by `(name, lang)`.
 */
export interface StructuredRecord {
    /** Command name, case preserved (e.g., "docker-compose") */
    name: string;
    /** Short summary; never empty for a stored record */
    description: string;
    /** Classification tag (e.g., "common", "linux", "local") */
    category: string;
    /** Target platform (e.g., "common", "linux", "osx", "windows") */
    platform: string;
    /** Language code (e.g., "en", "zh", "local") */
    lang: string;
    /** Ordered examples; the first is the primary one */
    examples: Example[];
    /** Raw text blob kept for full-text search */
    content: string;
}

/**
 * Search-facing projection of a StructuredRecord.
 */
export interface IndexedDocument {
    docId: number;
    name: string;
    description: string;
    content: string;
    category: string;
    lang: string;
}

/**
 * A document as handed to the index, before it is assigned an id.
 */
export type DocumentInput = Omit<IndexedDocument, 'docId'>;

/**
 * Ranked hit produced by the query engine.
 */
export interface SearchResult {
    name: string;
    description: string;
    category: string;
    lang: string;
    /** Relevance score, non-negative */
    score: number;
}

/**
 * Options for a search call.
 */
export interface SearchOptions {
    /** Only documents in this language are visible */
    lang?: string;
    /** Maximum number of results (clamped to the configured ceiling) */
    limit?: number;
}

/**
 * Search response containing results and metadata.
 */
export interface SearchResponse {
    query: string;
    results: SearchResult[];
    /** Number of matching documents before truncation */
    total: number;
    elapsedMs: number;
}

/**
 * Summary information kept alongside the records.
 */
export interface StoreMetadata {
    version: string;
    commandCount: number;
    lastUpdate: string;
    languages: string[];
}

/**
 * Build the unique key of a record or document.
 */
export function recordKey(name: string, lang: string): string {
    return `${lang}:${name}`;
}

/**
 * Project a record onto the fields the index needs.
 */
export function toDocumentInput(record: StructuredRecord): DocumentInput {
    return {
        name: record.name,
        description: record.description,
        content: record.content,
        category: record.category,
        lang: record.lang,
    };
}
