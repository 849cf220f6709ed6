/**
 * @file record-store.ts
 * @module store/record-store
 * @created 2026-09-16
 * @license MIT
 *
 * @fileoverview SQLite-backed persistence of structured records.
 */

import Database from 'better-sqlite3';
import { z } from 'zod';

import { assertLearnable } from '../shared/record.js';
import type { StoreMetadata, StructuredRecord } from '../shared/types.js';
import {
    CLEAR_ALL,
    COUNT_COMMANDS,
    COUNT_COMMANDS_BY_LANG,
    DELETE_COMMAND,
    SCHEMA_STATEMENTS,
    SELECT_ALL_COMMANDS,
    SELECT_COMMAND,
    SELECT_COMMANDS_BY_LANG,
    SELECT_LANGUAGES,
    SELECT_METADATA,
    UPSERT_COMMAND,
    UPSERT_METADATA,
} from './schema.js';

/**
 * Keyed storage of records, `(name, lang)` being the key.
 */
export interface RecordStore {
    get(name: string, lang: string): StructuredRecord | null;
    /** Insert or replace; rejects records that fail the validity gate */
    put(record: StructuredRecord): void;
    /** Insert or replace all records atomically */
    putMany(records: StructuredRecord[]): void;
    /** @returns Whether a record was removed */
    delete(name: string, lang: string): boolean;
    /** Records ordered by language then name */
    list(lang?: string): StructuredRecord[];
    count(lang?: string): number;
    languages(): string[];
    /** Remove every record and the metadata */
    clear(): void;
    getMetadata(): StoreMetadata | null;
    saveMetadata(metadata: StoreMetadata): void;
    close(): void;
}

const rowSchema = z.object({
    name: z.string(),
    lang: z.string(),
    description: z.string(),
    category: z.string(),
    platform: z.string(),
    examples: z.string(),
    content: z.string(),
});

const examplesSchema = z.array(z.object({ description: z.string(), code: z.string() }));

const countSchema = z.object({ count: z.number() });

const metadataRowSchema = z.object({ key: z.string(), value: z.string() });

/**
 * Metadata keys in the `metadata` table.
 */
const METADATA_KEYS = {
    version: 'version',
    commandCount: 'command_count',
    lastUpdate: 'last_update',
    languages: 'languages',
} as const;

function toRecord(row: unknown): StructuredRecord {
    const parsed = rowSchema.parse(row);
    return {
        name: parsed.name,
        description: parsed.description,
        category: parsed.category,
        platform: parsed.platform,
        lang: parsed.lang,
        examples: examplesSchema.parse(JSON.parse(parsed.examples)),
        content: parsed.content,
    };
}

/**
 * Record store on a better-sqlite3 database.
 *
 * @example
 * ```typescript
 * const store = new SqliteRecordStore('/data/data.db');
 * store.put(record);
 * const ls = store.get('ls', 'local');
 * store.close();
 * ```
 */
export class SqliteRecordStore implements RecordStore {
    private db: Database.Database;
    private getStmt: Database.Statement;
    private upsertStmt: Database.Statement;
    private deleteStmt: Database.Statement;

    /**
     * Open (and create if needed) a record database.
     * @param dbPath - Database file, or `:memory:`
     */
    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        this.db.pragma('journal_mode = WAL');

        for (const stmt of SCHEMA_STATEMENTS) {
            this.db.exec(stmt);
        }

        this.getStmt = this.db.prepare(SELECT_COMMAND);
        this.upsertStmt = this.db.prepare(UPSERT_COMMAND);
        this.deleteStmt = this.db.prepare(DELETE_COMMAND);
    }

    get(name: string, lang: string): StructuredRecord | null {
        const row = this.getStmt.get(name, lang);
        return row === undefined ? null : toRecord(row);
    }

    put(record: StructuredRecord): void {
        this.write(assertLearnable(record), new Date().toISOString());
    }

    putMany(records: StructuredRecord[]): void {
        for (const record of records) {
            assertLearnable(record);
        }

        const updatedAt = new Date().toISOString();
        const insertAll = this.db.transaction((batch: StructuredRecord[]) => {
            for (const record of batch) {
                this.write(record, updatedAt);
            }
        });
        insertAll(records);
    }

    delete(name: string, lang: string): boolean {
        return this.deleteStmt.run(name, lang).changes > 0;
    }

    list(lang?: string): StructuredRecord[] {
        const rows = lang === undefined
            ? this.db.prepare(SELECT_ALL_COMMANDS).all()
            : this.db.prepare(SELECT_COMMANDS_BY_LANG).all(lang);
        return rows.map(toRecord);
    }

    count(lang?: string): number {
        const row = lang === undefined
            ? this.db.prepare(COUNT_COMMANDS).get()
            : this.db.prepare(COUNT_COMMANDS_BY_LANG).get(lang);
        return countSchema.parse(row).count;
    }

    languages(): string[] {
        return this.db
            .prepare(SELECT_LANGUAGES)
            .all()
            .map(row => z.object({ lang: z.string() }).parse(row).lang);
    }

    clear(): void {
        this.db.transaction(() => this.db.exec(CLEAR_ALL))();
    }

    getMetadata(): StoreMetadata | null {
        const entries = new Map(
            this.db
                .prepare(SELECT_METADATA)
                .all()
                .map(row => {
                    const { key, value } = metadataRowSchema.parse(row);
                    return [key, value] as const;
                })
        );

        const version = entries.get(METADATA_KEYS.version);
        if (version === undefined) {
            return null;
        }

        return {
            version,
            commandCount: Number(entries.get(METADATA_KEYS.commandCount) ?? 0),
            lastUpdate: entries.get(METADATA_KEYS.lastUpdate) ?? '',
            languages: z.array(z.string()).parse(JSON.parse(entries.get(METADATA_KEYS.languages) ?? '[]')),
        };
    }

    saveMetadata(metadata: StoreMetadata): void {
        const stmt = this.db.prepare(UPSERT_METADATA);
        const saveAll = this.db.transaction(() => {
            stmt.run(METADATA_KEYS.version, metadata.version);
            stmt.run(METADATA_KEYS.commandCount, String(metadata.commandCount));
            stmt.run(METADATA_KEYS.lastUpdate, metadata.lastUpdate);
            stmt.run(METADATA_KEYS.languages, JSON.stringify(metadata.languages));
        });
        saveAll();
    }

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
    }

    private write(record: StructuredRecord, updatedAt: string): void {
        this.upsertStmt.run({
            name: record.name,
            lang: record.lang,
            description: record.description,
            category: record.category,
            platform: record.platform,
            examples: JSON.stringify(record.examples),
            content: record.content,
            updatedAt,
        });
    }
}
