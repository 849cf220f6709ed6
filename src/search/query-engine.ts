/**
 * @file query-engine.ts
 * @module search/query-engine
 * @created 2026-09-15
 * @license MIT
 *
 * @fileoverview Ranked keyword search over index snapshots.
 */

import { QueryBuildError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { FieldBoosts } from '../shared/config.js';
import type { SearchOptions, SearchResponse, SearchResult } from '../shared/types.js';
import { escapeForQuery, unescapeQuery } from '../text/query-escape.js';
import { tokenize } from '../text/tokenizer.js';
import type { SnapshotSource } from '../index/index-manager.js';
import type { FieldFrequencies, IndexSnapshot, Posting } from '../index/snapshot.js';

/**
 * Tunables of the query engine.
 */
export interface QueryEngineOptions {
    defaultLimit: number;
    maxLimit: number;
    boosts: FieldBoosts;
}

export const DEFAULT_QUERY_ENGINE_OPTIONS: QueryEngineOptions = {
    defaultLimit: 20,
    maxLimit: 100,
    boosts: { name: 3, description: 2, content: 1 },
};

/**
 * Inverse document frequency (BM25 variant, always positive).
 *
 * @param docCount - Documents visible to the query
 * @param docFrequency - Visible documents containing the token
 */
export function inverseDocumentFrequency(docCount: number, docFrequency: number): number {
    return Math.log(1 + (docCount - docFrequency + 0.5) / (docFrequency + 0.5));
}

/**
 * Boosted, dampened term frequency of one token in one document.
 */
export function fieldScore(tf: FieldFrequencies, boosts: FieldBoosts): number {
    return (
        boosts.name * Math.sqrt(tf.name) +
        boosts.description * Math.sqrt(tf.description) +
        boosts.content * Math.sqrt(tf.content)
    );
}

function compareText(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * Order results by score descending, then name, then language.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
    return b.score - a.score || compareText(a.name, b.name) || compareText(a.lang, b.lang);
}

/**
 * Turn raw user input into query terms.
 *
 * The input is escaped so every operator character is literal, read back by
 * the query builder and tokenized like indexed text. Duplicate terms are
 * dropped.
 *
 * @throws QueryBuildError if the escaped form cannot be read back
 */
export function buildQueryTerms(query: string, langHint?: string): string[] {
    const literal = unescapeQuery(escapeForQuery(query));
    return [...new Set(tokenize(literal, langHint))];
}

/**
 * Keyword search with tf-idf ranking and field boosts.
 *
 * @example
 * ```typescript
 * const engine = new QueryEngine(indexManager, { defaultLimit: 10, maxLimit: 50, boosts });
 * const response = engine.search('docker -a', { lang: 'en' });
 * ```
 */
export class QueryEngine {
    private source: SnapshotSource;
    private options: QueryEngineOptions;
    private logger: Logger;

    constructor(source: SnapshotSource, options: Partial<QueryEngineOptions> = {}, logger: Logger = silentLogger) {
        this.source = source;
        this.options = { ...DEFAULT_QUERY_ENGINE_OPTIONS, ...options };
        this.logger = logger;
    }

    /**
     * Search the current snapshot.
     *
     * @param query - Raw user input; operator characters are matched literally
     * @param options - Language filter and result limit
     * @throws QueryBuildError if the query cannot be built
     */
    search(query: string, options: SearchOptions = {}): SearchResponse {
        return this.searchSnapshot(this.source.currentSnapshot(), query, options);
    }

    /**
     * Search an explicit snapshot.
     */
    searchSnapshot(snapshot: IndexSnapshot, query: string, options: SearchOptions = {}): SearchResponse {
        const startTime = Date.now();
        const limit = this.clampLimit(options.limit);

        let terms: string[];
        try {
            terms = buildQueryTerms(query, options.lang);
        } catch (error) {
            if (error instanceof QueryBuildError) {
                this.logger.error(`Could not build query '${query}'`, error);
            }
            throw error;
        }

        const scores = this.scoreDocuments(snapshot, terms, options.lang);
        const results: SearchResult[] = [];
        for (const [docId, score] of scores) {
            const doc = snapshot.documents.get(docId);
            if (!doc) continue;
            results.push({
                name: doc.name,
                description: doc.description,
                category: doc.category,
                lang: doc.lang,
                score,
            });
        }
        results.sort(compareResults);

        this.logger.debug(`Query '${query}' → ${terms.length} terms, ${results.length} matches`);

        return {
            query,
            results: results.slice(0, limit),
            total: results.length,
            elapsedMs: Date.now() - startTime,
        };
    }

    /**
     * Clamp a requested limit to `[1, maxLimit]`.
     */
    clampLimit(limit: number | undefined): number {
        const requested = limit === undefined || !Number.isFinite(limit) ? this.options.defaultLimit : Math.floor(limit);
        return Math.min(Math.max(requested, 1), this.options.maxLimit);
    }

    /**
     * Accumulate scores of every document matching at least one term.
     *
     * With a language filter, postings of other languages are dropped before
     * anything is computed, and the document count and document frequencies
     * only cover that language.
     */
    private scoreDocuments(snapshot: IndexSnapshot, terms: string[], lang?: string): Map<number, number> {
        const scores = new Map<number, number>();
        const docCount = lang === undefined ? snapshot.docCount : snapshot.langCounts.get(lang) ?? 0;
        if (docCount === 0) {
            return scores;
        }

        const visible = (posting: Posting) => lang === undefined || snapshot.documents.get(posting.docId)?.lang === lang;

        for (const term of terms) {
            const postings = (snapshot.postings.get(term) ?? []).filter(visible);
            if (postings.length === 0) continue;

            const idf = inverseDocumentFrequency(docCount, postings.length);
            for (const posting of postings) {
                const contribution = idf * fieldScore(posting.tf, this.options.boosts);
                scores.set(posting.docId, (scores.get(posting.docId) ?? 0) + contribution);
            }
        }

        return scores;
    }
}
