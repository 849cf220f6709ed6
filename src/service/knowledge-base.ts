/**
 * @file knowledge-base.ts
 * @module service/knowledge-base
 * @created 2026-09-18
 * @license MIT
 *
 * @fileoverview Learn, import, search and maintenance flows over the record store and the index.
 *
 * Records only reach the store and the index through this service, which
 * applies the validity gate on the way in. Every write goes to the index
 * first and to the store second; when the store write fails the index is
 * rebuilt from the store, so the two never disagree for longer than a call.
 */

import { mkdirSync } from 'node:fs';
import { basename, join } from 'node:path';

import { captureSource, currentPlatform } from '../collectors/process-runner.js';
import { readMarkdownSource } from '../collectors/archive-reader.js';
import { IndexManager } from '../index/index-manager.js';
import type { IndexSnapshot } from '../index/snapshot.js';
import {
    parseHelpOutput,
    sourceOrder,
    type HelpCapture,
    type HelpInput,
    type HelpSource,
    type ParsedHelp,
    type SourcePreference,
} from '../parser/help-parser.js';
import {
    importMarkdownBatch,
    type EntryIssue,
    type ImportStats,
    type MarkdownEntry,
} from '../parser/markdown-importer.js';
import { QueryEngine } from '../search/query-engine.js';
import { defaultConfig, getDataDir, type AppConfig } from '../shared/config.js';
import { NotFoundError, UnlearnableError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import { findRecordDefect, recordListSchema } from '../shared/record.js';
import {
    recordKey,
    toDocumentInput,
    type SearchOptions,
    type SearchResponse,
    type StoreMetadata,
    type StructuredRecord,
} from '../shared/types.js';
import { SqliteRecordStore, type RecordStore } from '../store/record-store.js';

/**
 * Language tag of records learned from the local system.
 */
export const LOCAL_LANG = 'local';

/**
 * Version recorded in the metadata when only local commands were learned.
 */
const LOCAL_VERSION = 'local';

/**
 * Languages a lookup falls back to after the requested one.
 */
const FALLBACK_LANGS = ['en', 'zh'];

/**
 * Learned records written to the index and the store together.
 */
const LEARN_BATCH_SIZE = 200;

/**
 * Results shown when a lookup falls through to full-text search.
 */
const FIND_SEARCH_LIMIT = 10;

/**
 * Produces the raw output of one help source of a command.
 */
export type HelpCapturer = (command: string, source: HelpSource) => HelpCapture;

/**
 * Collaborators of a {@link KnowledgeBase}.
 */
export interface KnowledgeBaseOptions {
    store: RecordStore;
    index: IndexManager;
    config?: AppConfig;
    logger?: Logger;
    /** Defaults to running `<command> --help` or `man <command>` */
    capture?: HelpCapturer;
}

export interface LearnOptions {
    /** Re-learn even if the command is already known */
    force?: boolean;
    /** Try the man page before `--help` */
    preferMan?: boolean;
}

/**
 * Result of learning one command.
 */
export type LearnOutcome =
    | { status: 'learned'; record: StructuredRecord; sources: HelpSource[] }
    | { status: 'exists'; record: StructuredRecord };

export interface LearnAllOptions extends Omit<LearnOptions, 'force'> {
    /** Skip commands that are already known instead of re-learning them */
    skipExisting?: boolean;
    /** Called after each command */
    onProgress?: (done: number, total: number, command: string) => void;
}

/**
 * Outcome counts of a batch learn.
 */
export interface LearnAllStats {
    total: number;
    learned: number;
    skipped: number;
    failed: number;
    issues: EntryIssue[];
}

export interface ImportOptions {
    /** Language for pages outside a `pages.<lang>` tree */
    lang?: string;
    /** Data version written to the metadata (e.g., the archive name) */
    version?: string;
}

/**
 * Result of {@link KnowledgeBase.find}: the record itself, or the search
 * matches when no record is named like the query.
 */
export type FindResult =
    | { kind: 'record'; record: StructuredRecord }
    | { kind: 'matches'; response: SearchResponse };

/**
 * Summary returned by {@link KnowledgeBase.info}.
 */
export interface KnowledgeBaseInfo {
    commandCount: number;
    languages: string[];
    indexedDocuments: number;
    indexGeneration: number;
    indexBuiltAt: string;
    metadata: StoreMetadata | null;
}

/**
 * The command knowledge base.
 *
 * @example
 * ```typescript
 * const kb = await KnowledgeBase.open(resolveConfig(), logger);
 * await kb.learn('ls');
 * const response = kb.search('list directory', { lang: 'local' });
 * kb.close();
 * ```
 */
export class KnowledgeBase {
    readonly store: RecordStore;
    readonly index: IndexManager;
    readonly engine: QueryEngine;
    private config: AppConfig;
    private logger: Logger;
    private capture: HelpCapturer;

    constructor(options: KnowledgeBaseOptions) {
        this.store = options.store;
        this.index = options.index;
        this.config = options.config ?? defaultConfig();
        this.logger = options.logger ?? silentLogger;
        this.capture = options.capture ?? ((command, source) => captureSource(command, source));
        this.engine = new QueryEngine(
            this.index,
            {
                defaultLimit: this.config.search.defaultLimit,
                maxLimit: this.config.search.maxLimit,
                boosts: this.config.search.boosts,
            },
            this.logger
        );
    }

    /**
     * Open the knowledge base in the configured data directory.
     *
     * If the index does not hold as many documents as the store holds records
     * (first run after an upgrade, a deleted index directory, an interrupted
     * write), the index is rebuilt.
     */
    static async open(config: AppConfig, logger: Logger = silentLogger): Promise<KnowledgeBase> {
        const dataDir = getDataDir(config);
        mkdirSync(dataDir, { recursive: true });

        const store = new SqliteRecordStore(join(dataDir, config.storage.dbFilename));
        const index = await IndexManager.open(join(dataDir, config.storage.indexDirname), logger);
        const kb = new KnowledgeBase({ store, index, config, logger });

        const indexed = index.currentSnapshot().docCount;
        const stored = store.count();
        if (indexed !== stored) {
            logger.info(`Index has ${indexed} documents for ${stored} records, rebuilding...`);
            await kb.rebuildIndex();
        }
        return kb;
    }

    /**
     * Search the index.
     * @throws QueryBuildError if the query cannot be built
     */
    search(query: string, options: SearchOptions = {}): SearchResponse {
        return this.engine.search(query, options);
    }

    /**
     * Look up a record.
     * @returns The record, or null if it is not known
     */
    get(name: string, lang: string): StructuredRecord | null {
        return this.store.get(name, lang);
    }

    /**
     * Look up a record that must exist.
     * @throws NotFoundError if it is not known
     */
    require(name: string, lang: string): StructuredRecord {
        const record = this.store.get(name, lang);
        if (!record) {
            throw new NotFoundError(name, lang);
        }
        return record;
    }

    /**
     * Find the record named by `name`.
     *
     * The name is tried as given and with spaces replaced by `-` (so
     * `git commit` finds `git-commit`). Without `lang` the local record and the
     * default language are tried first; `en` and `zh` are tried last.
     *
     * @returns The first record found, or null
     */
    lookup(name: string, lang?: string): StructuredRecord | null {
        const trimmed = name.trim();
        const names = [trimmed];
        const hyphenated = trimmed.replace(/\s+/g, '-');
        if (hyphenated !== trimmed) {
            names.push(hyphenated);
        }

        const preferred = lang ? [lang] : [LOCAL_LANG, this.config.search.defaultLang];
        const langs = [...new Set([...preferred, ...FALLBACK_LANGS])];

        for (const candidate of names) {
            for (const candidateLang of langs) {
                const record = this.store.get(candidate, candidateLang);
                if (record) {
                    return record;
                }
            }
        }
        return null;
    }

    /**
     * Look a query up by name, falling back to full-text search in every
     * language. A search with exactly one match resolves to that record.
     *
     * @throws QueryBuildError if no record matches by name and the query cannot be searched
     */
    find(query: string, lang?: string): FindResult {
        const record = this.lookup(query, lang);
        if (record) {
            return { kind: 'record', record };
        }

        const response = this.search(query, { limit: FIND_SEARCH_LIMIT });
        const [only] = response.results;
        if (response.results.length === 1 && only) {
            const matched = this.store.get(only.name, only.lang);
            if (matched) {
                return { kind: 'record', record: matched };
            }
        }
        return { kind: 'matches', response };
    }

    /**
     * Learn one installed command from its `--help` or man page.
     *
     * @throws UnlearnableError if no description or example can be extracted
     * @throws IndexIOError if the index cannot be persisted; nothing is stored then
     */
    async learn(command: string, options: LearnOptions = {}): Promise<LearnOutcome> {
        if (!options.force) {
            const existing = this.store.get(command, LOCAL_LANG);
            if (existing) {
                return { status: 'exists', record: existing };
            }
        }

        const { record, sources } = this.captureAndParse(command, this.preferenceFor(options));

        await this.index.upsert(toDocumentInput(record));
        try {
            this.store.put(record);
        } catch (error) {
            await this.resyncIndex();
            throw error;
        }
        this.updateMetadata();

        this.logger.debug(`Learned '${command}' from ${sources.join(' + ')} (${record.examples.length} examples)`);
        return { status: 'learned', record, sources };
    }

    /**
     * Learn many commands. A command that cannot be learned is counted and
     * the batch continues.
     *
     * Learned records are written in batches, so the index is rebuilt once per
     * batch rather than once per command.
     *
     * @throws IndexIOError if a batch cannot be persisted
     */
    async learnAll(commands: string[], options: LearnAllOptions = {}): Promise<LearnAllStats> {
        const stats: LearnAllStats = { total: commands.length, learned: 0, skipped: 0, failed: 0, issues: [] };
        const preferred = this.preferenceFor(options);
        let pending: StructuredRecord[] = [];

        for (const [i, command] of commands.entries()) {
            if (options.skipExisting && this.store.get(command, LOCAL_LANG)) {
                stats.skipped++;
                stats.issues.push({ identifier: command, reason: 'already learned' });
            } else {
                try {
                    pending.push(this.captureAndParse(command, preferred).record);
                    stats.learned++;
                } catch (error) {
                    if (error instanceof UnlearnableError) {
                        stats.skipped++;
                        stats.issues.push({ identifier: command, reason: error.reason });
                    } else {
                        const reason = error instanceof Error ? error.message : String(error);
                        stats.failed++;
                        stats.issues.push({ identifier: command, reason });
                        this.logger.debug(`Failed to learn '${command}': ${reason}`);
                    }
                }
            }
            options.onProgress?.(i + 1, commands.length, command);

            if (pending.length >= LEARN_BATCH_SIZE) {
                await this.writeRecords(pending);
                pending = [];
            }
        }

        if (pending.length > 0) {
            await this.writeRecords(pending);
        }
        if (stats.learned > 0) {
            this.updateMetadata();
        }

        return stats;
    }

    /**
     * Import markdown pages, then rebuild the index from all stored records.
     */
    async importMarkdown(entries: Iterable<MarkdownEntry>, options: ImportOptions = {}): Promise<ImportStats> {
        const { records, stats } = importMarkdownBatch(entries, {
            langHint: options.lang,
            languages: options.lang ? [options.lang] : this.config.import.languages,
            logger: this.logger,
        });

        await this.writeRecords(records);
        this.updateMetadata(options.version);

        return stats;
    }

    /**
     * Import markdown pages from a directory, file or `.tar.gz` archive.
     */
    async importPath(path: string, options: ImportOptions = {}): Promise<ImportStats> {
        const entries = await readMarkdownSource(path);
        this.logger.debug(`Read ${entries.length} markdown files from ${path}`);
        return this.importMarkdown(entries, { version: basename(path), ...options });
    }

    /**
     * Import records from a parsed JSON value (an array of records).
     *
     * Records failing the validity gate are skipped and counted.
     *
     * @throws Error if the value is not an array of record objects
     */
    async importRecords(raw: unknown): Promise<ImportStats> {
        const parsed = recordListSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues
                .slice(0, 5)
                .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                .join('; ');
            throw new Error(`Invalid record list: ${issues}`);
        }

        const stats: ImportStats = { imported: 0, skipped: 0, failed: 0, skippedIds: [], failures: [] };
        const accepted: StructuredRecord[] = [];
        for (const record of parsed.data) {
            const defect = findRecordDefect(record);
            if (defect) {
                stats.skipped++;
                stats.skippedIds.push({ identifier: record.name || '<unnamed>', reason: defect });
                continue;
            }
            accepted.push(record);
        }

        await this.writeRecords(accepted);
        stats.imported = accepted.length;
        this.updateMetadata();

        return stats;
    }

    /**
     * All stored records, optionally of one language.
     */
    exportRecords(lang?: string): StructuredRecord[] {
        return this.store.list(lang);
    }

    /**
     * Remove a record from the store and the index.
     * @returns Whether a record was removed
     */
    async remove(name: string, lang: string): Promise<boolean> {
        if (this.index.has(name, lang)) {
            await this.index.delete(name, lang);
        }

        let removed: boolean;
        try {
            removed = this.store.delete(name, lang);
        } catch (error) {
            await this.resyncIndex();
            throw error;
        }
        if (removed) {
            this.updateMetadata();
        }
        return removed;
    }

    /**
     * Delete every record, the metadata and the index contents.
     */
    async reset(): Promise<void> {
        const removed = this.store.count();
        await this.index.rebuild([]);
        try {
            this.store.clear();
        } catch (error) {
            await this.resyncIndex();
            throw error;
        }
        this.logger.debug(`Reset knowledge base (${removed} records removed)`);
    }

    /**
     * Rebuild the index from every stored record.
     */
    rebuildIndex(): Promise<IndexSnapshot> {
        return this.index.rebuild(this.store.list().map(toDocumentInput));
    }

    info(): KnowledgeBaseInfo {
        const snapshot = this.index.currentSnapshot();
        return {
            commandCount: this.store.count(),
            languages: this.store.languages(),
            indexedDocuments: snapshot.docCount,
            indexGeneration: snapshot.generation,
            indexBuiltAt: snapshot.builtAt,
            metadata: this.store.getMetadata(),
        };
    }

    /**
     * Wait for pending index writes and close the store.
     */
    async close(): Promise<void> {
        await this.index.idle();
        this.store.close();
    }

    private preferenceFor(options: Pick<LearnOptions, 'preferMan'>): SourcePreference {
        return (options.preferMan ?? this.config.learn.preferMan) ? 'man' : 'auto';
    }

    /**
     * Capture the preferred source and parse it. The other source is only
     * captured when the first one does not yield a complete record.
     */
    private captureAndParse(command: string, preferred: SourcePreference): ParsedHelp {
        const parseOptions = {
            preferred,
            maxExamples: this.config.learn.maxExamples,
            platform: currentPlatform(),
        };
        const [first, second] = sourceOrder(preferred);
        const input: HelpInput = { command };

        input[first] = this.capture(command, first);
        try {
            return parseHelpOutput(input, parseOptions);
        } catch (error) {
            if (!(error instanceof UnlearnableError) || !second) {
                throw error;
            }
        }

        input[second] = this.capture(command, second);
        return parseHelpOutput(input, parseOptions);
    }

    /**
     * Write records to the index, then to the store.
     *
     * The index is rebuilt from the stored records merged with `records`; if
     * the store then rejects the batch, the index is rebuilt from the store.
     */
    private async writeRecords(records: StructuredRecord[]): Promise<void> {
        const merged = new Map<string, StructuredRecord>();
        for (const record of [...this.store.list(), ...records]) {
            merged.set(recordKey(record.name, record.lang), record);
        }

        await this.index.rebuild([...merged.values()].map(toDocumentInput));
        try {
            this.store.putMany(records);
        } catch (error) {
            await this.resyncIndex();
            throw error;
        }
    }

    /**
     * Bring the index back to the store's contents after a failed store write.
     */
    private async resyncIndex(): Promise<void> {
        try {
            await this.rebuildIndex();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.warn(`Index may be out of date, run 'rebuild': ${reason}`);
        }
    }

    private updateMetadata(version?: string): void {
        this.store.saveMetadata({
            version: version ?? this.store.getMetadata()?.version ?? LOCAL_VERSION,
            commandCount: this.store.count(),
            lastUpdate: new Date().toISOString(),
            languages: this.store.languages(),
        });
    }
}
