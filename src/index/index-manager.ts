/**
 * @file index-manager.ts
 * @module index/index-manager
 * @created 2026-09-14
 * @license MIT
 *
 * @fileoverview Owns the current index snapshot and serializes every write to it.
 */

import { silentLogger, type Logger } from '../shared/logger.js';
import { recordKey, type DocumentInput } from '../shared/types.js';
import { IndexStore } from './index-store.js';
import {
    buildSnapshot,
    emptySnapshot,
    withDocument,
    withoutDocument,
    type IndexSnapshot,
} from './snapshot.js';

/**
 * Options for {@link IndexManager}.
 */
export interface IndexManagerOptions {
    /** Persistence target; omit for a memory-only index */
    store?: IndexStore;
    logger?: Logger;
}

/**
 * Source of the snapshot a reader should query.
 */
export interface SnapshotSource {
    currentSnapshot(): IndexSnapshot;
}

/**
 * Manages the searchable index.
 *
 * Readers call {@link currentSnapshot} and keep using what they got for the
 * whole query, no matter what writers do meanwhile. Writers (`rebuild`,
 * `upsert`, `delete`) run one at a time in call order; each one builds a new
 * snapshot from the one before, persists it and then installs it. If
 * persisting fails the write is rejected with an `IndexIOError` and the
 * previous snapshot stays current.
 *
 * @example
 * ```typescript
 * const index = await IndexManager.open('/data/index');
 * await index.upsert({ name: 'ls', description: 'List files', content: '', category: 'common', lang: 'en' });
 * const snapshot = index.currentSnapshot();
 * ```
 */
export class IndexManager implements SnapshotSource {
    private current: IndexSnapshot;
    private writeQueue: Promise<void> = Promise.resolve();
    private store: IndexStore | null;
    private logger: Logger;

    constructor(initial: IndexSnapshot = emptySnapshot(), options: IndexManagerOptions = {}) {
        this.current = initial;
        this.store = options.store ?? null;
        this.logger = options.logger ?? silentLogger;
    }

    /**
     * Open an index, loading the persisted snapshot if there is one.
     *
     * @param dir - Index directory; omit for a memory-only index
     * @throws IndexIOError if the persisted files exist but cannot be read
     */
    static async open(dir?: string, logger: Logger = silentLogger): Promise<IndexManager> {
        if (!dir) {
            return new IndexManager(emptySnapshot(), { logger });
        }

        const store = new IndexStore(dir, logger);
        const loaded = await store.load();
        return new IndexManager(loaded ?? emptySnapshot(), { store, logger });
    }

    /**
     * The installed snapshot. Never waits for pending writes.
     */
    currentSnapshot(): IndexSnapshot {
        return this.current;
    }

    /**
     * Whether `(name, lang)` is indexed in the current snapshot.
     */
    has(name: string, lang: string): boolean {
        return this.current.keys.has(recordKey(name, lang));
    }

    /**
     * Replace the whole index with the given documents.
     *
     * Building the same document set twice yields snapshots that answer every
     * query identically.
     */
    rebuild(documents: Iterable<DocumentInput>): Promise<IndexSnapshot> {
        const batch = [...documents];
        return this.enqueue(base => {
            this.logger.debug(`Rebuilding index from ${batch.length} documents`);
            return buildSnapshot(batch, base.generation + 1);
        });
    }

    /**
     * Add a document, replacing any document with the same `(name, lang)`.
     */
    upsert(document: DocumentInput): Promise<IndexSnapshot> {
        return this.enqueue(base => withDocument(base, document, base.generation + 1));
    }

    /**
     * Remove the document keyed `(name, lang)`.
     * Removing a key that is not indexed leaves the index unchanged.
     */
    delete(name: string, lang: string): Promise<IndexSnapshot> {
        return this.enqueue(base => withoutDocument(base, name, lang, base.generation + 1));
    }

    /**
     * Resolves once every write queued so far has settled.
     */
    idle(): Promise<void> {
        return this.writeQueue;
    }

    /**
     * Run a write after all previously queued ones.
     *
     * `derive` returns the next snapshot, or null when nothing changes.
     */
    private enqueue(derive: (base: IndexSnapshot) => IndexSnapshot | null): Promise<IndexSnapshot> {
        const run = this.writeQueue.then(() => this.apply(derive));
        // The caller sees failures through `run`; later writes still proceed.
        this.writeQueue = run.then(
            () => undefined,
            () => undefined
        );
        return run;
    }

    private async apply(derive: (base: IndexSnapshot) => IndexSnapshot | null): Promise<IndexSnapshot> {
        const next = derive(this.current);
        if (!next) {
            return this.current;
        }

        if (this.store) {
            await this.store.save(next);
        }
        this.current = next;
        this.logger.debug(`Installed index generation ${next.generation} (${next.docCount} documents)`);
        return next;
    }
}
