/**
 * @file index-store.ts
 * @module index/index-store
 * @created 2026-09-13
 * @license MIT
 *
 * @fileoverview On-disk persistence of index snapshots.
 *
 * Layout of the index directory:
 * ```
 * index/
 *   meta.json           # schemaVersion, generation, docCount, builtAt, segments
 *   segment-<gen>.json  # documents and postings of that generation
 * ```
 */

import { existsSync } from 'node:fs';
import { mkdir, open, readdir, readFile, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { z } from 'zod';

import { IndexIOError } from '../shared/errors.js';
import { silentLogger, type Logger } from '../shared/logger.js';
import type { IndexedDocument } from '../shared/types.js';
import { restoreSnapshot, type IndexSnapshot, type Posting } from './snapshot.js';

/**
 * Version of the on-disk layout. Bumped on incompatible changes.
 */
export const INDEX_SCHEMA_VERSION = 1;

export const META_FILENAME = 'meta.json';

const SEGMENT_PATTERN = /^segment-(\d+)\.json$/;

const metaSchema = z.object({
    schemaVersion: z.number().int(),
    generation: z.number().int().nonnegative(),
    docCount: z.number().int().nonnegative(),
    builtAt: z.string(),
    nextDocId: z.number().int().positive(),
    segments: z.array(z.string()),
});

export type IndexMeta = z.infer<typeof metaSchema>;

const documentSchema = z.object({
    docId: z.number().int().positive(),
    name: z.string(),
    description: z.string(),
    content: z.string(),
    category: z.string(),
    lang: z.string(),
});

/** `[docId, tf(name), tf(description), tf(content)]` */
const postingTupleSchema = z.tuple([
    z.number().int().positive(),
    z.number().int().nonnegative(),
    z.number().int().nonnegative(),
    z.number().int().nonnegative(),
]);

const segmentSchema = z.object({
    generation: z.number().int().nonnegative(),
    documents: z.array(documentSchema),
    postings: z.array(z.tuple([z.string(), z.array(postingTupleSchema)])),
});

type SegmentFile = z.infer<typeof segmentSchema>;
type PostingTuple = z.infer<typeof postingTupleSchema>;

/**
 * Name of the segment file for a generation.
 */
export function segmentFilename(generation: number): string {
    return `segment-${generation}.json`;
}

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

function toSegmentFile(snapshot: IndexSnapshot): SegmentFile {
    const documents: IndexedDocument[] = [...snapshot.documents.values()].sort((a, b) => a.docId - b.docId);
    const tokens = [...snapshot.postings.keys()].sort();

    return {
        generation: snapshot.generation,
        documents,
        postings: tokens.map((token): [string, PostingTuple[]] => [
            token,
            (snapshot.postings.get(token) ?? []).map(
                (posting): PostingTuple => [
                    posting.docId,
                    posting.tf.name,
                    posting.tf.description,
                    posting.tf.content,
                ]
            ),
        ]),
    };
}

/**
 * Reads and writes snapshots in an index directory.
 *
 * Every file is written to a temporary name, fsynced and renamed into place,
 * segment first and `meta.json` last. A reader therefore always sees either
 * the previous or the new generation.
 *
 * @example
 * ```typescript
 * const store = new IndexStore('/data/index');
 * await store.save(snapshot);
 * const restored = await store.load();
 * ```
 */
export class IndexStore {
    readonly dir: string;
    private logger: Logger;

    constructor(dir: string, logger: Logger = silentLogger) {
        this.dir = dir;
        this.logger = logger;
    }

    get metaPath(): string {
        return join(this.dir, META_FILENAME);
    }

    /**
     * Load the persisted snapshot.
     *
     * @returns The snapshot, or null if nothing has been persisted yet
     * @throws IndexIOError if the files cannot be read or are malformed
     */
    async load(): Promise<IndexSnapshot | null> {
        if (!existsSync(this.metaPath)) {
            return null;
        }

        const meta = this.parseJson(this.metaPath, await this.readText(this.metaPath), metaSchema);
        if (meta.schemaVersion !== INDEX_SCHEMA_VERSION) {
            throw new IndexIOError(this.metaPath, `unsupported schema version ${meta.schemaVersion}`);
        }

        const segmentName = meta.segments[meta.segments.length - 1];
        if (!segmentName) {
            throw new IndexIOError(this.metaPath, 'no segment listed');
        }

        const segmentPath = join(this.dir, segmentName);
        if (!existsSync(segmentPath)) {
            throw new IndexIOError(segmentPath, 'segment listed in meta.json is missing');
        }

        const segment = this.parseJson(segmentPath, await this.readText(segmentPath), segmentSchema);
        const postings = segment.postings.map(([token, tuples]): [string, Posting[]] => [
            token,
            tuples.map(([docId, name, description, content]) => ({ docId, tf: { name, description, content } })),
        ]);

        const snapshot = restoreSnapshot(segment.documents, postings, meta);
        if (snapshot.docCount !== meta.docCount) {
            throw new IndexIOError(segmentPath, `expected ${meta.docCount} documents, found ${snapshot.docCount}`);
        }

        this.logger.debug(`Loaded index generation ${meta.generation} (${meta.docCount} documents)`);
        return snapshot;
    }

    /**
     * Persist a snapshot.
     *
     * @throws IndexIOError if any write fails; files of the previous
     * generation are left untouched in that case
     */
    async save(snapshot: IndexSnapshot): Promise<void> {
        const segmentName = segmentFilename(snapshot.generation);
        const meta: IndexMeta = {
            schemaVersion: INDEX_SCHEMA_VERSION,
            generation: snapshot.generation,
            docCount: snapshot.docCount,
            builtAt: snapshot.builtAt,
            nextDocId: snapshot.nextDocId,
            segments: [segmentName],
        };

        try {
            await mkdir(this.dir, { recursive: true });
        } catch (error) {
            throw new IndexIOError(this.dir, error);
        }

        await this.writeDurably(join(this.dir, segmentName), JSON.stringify(toSegmentFile(snapshot)));
        await this.writeDurably(this.metaPath, JSON.stringify(meta, null, 2));
        await this.removeStaleSegments(segmentName);
    }

    /**
     * Write a file through a temporary name, fsync it and rename it into place.
     */
    private async writeDurably(path: string, data: string): Promise<void> {
        const tempPath = `${path}.tmp-${process.pid}`;
        try {
            const handle = await open(tempPath, 'w');
            try {
                await handle.writeFile(data, 'utf-8');
                await handle.sync();
            } finally {
                await handle.close();
            }
            await rename(tempPath, path);
        } catch (error) {
            await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.debug(`Could not remove ${tempPath}: ${String(cleanupError)}`);
            });
            throw new IndexIOError(path, error);
        }
    }

    /**
     * Delete segment files other than the current one.
     *
     * Runs after meta.json has been committed, so a failure here does not
     * affect the new generation and is only reported.
     */
    private async removeStaleSegments(current: string): Promise<void> {
        let names: string[];
        try {
            names = await readdir(this.dir);
        } catch (error) {
            this.logger.warn(`Could not list ${this.dir}: ${error instanceof Error ? error.message : String(error)}`);
            return;
        }

        for (const name of names) {
            if (name === current || !SEGMENT_PATTERN.test(name)) continue;
            try {
                await rm(join(this.dir, name), { force: true });
                this.logger.debug(`Removed stale segment ${name}`);
            } catch (error) {
                this.logger.warn(`Could not remove stale segment ${name}: ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }

    private async readText(path: string): Promise<string> {
        try {
            return await readFile(path, 'utf-8');
        } catch (error) {
            throw new IndexIOError(path, error);
        }
    }

    private parseJson<T>(path: string, text: string, schema: z.ZodType<T>): T {
        let raw: unknown;
        try {
            raw = JSON.parse(text);
        } catch (error) {
            throw new IndexIOError(path, error);
        }

        const result = schema.safeParse(raw);
        if (!result.success) {
            throw new IndexIOError(path, describeIssues(result.error));
        }
        return result.data;
    }
}
