/**
 * @file snapshot.ts
 * @module index/snapshot
 * @created 2026-09-12
 * @license MIT
 *
 * @fileoverview Immutable inverted-index snapshots and the copy-on-write operations that derive new ones.
 */

import { recordKey, type DocumentInput, type IndexedDocument } from '../shared/types.js';
import { tokenize } from '../text/tokenizer.js';

/**
 * Fields whose text is indexed.
 */
export type IndexedField = 'name' | 'description' | 'content';

export const INDEXED_FIELDS: readonly IndexedField[] = ['name', 'description', 'content'];

/**
 * Term frequency of one token in each indexed field of a document.
 */
export type FieldFrequencies = Readonly<Record<IndexedField, number>>;

/**
 * One entry of a postings list.
 */
export interface Posting {
    readonly docId: number;
    readonly tf: FieldFrequencies;
}

/**
 * Point-in-time view of the whole index.
 *
 * Nothing reachable from a snapshot is mutated after it has been built;
 * writers derive a new snapshot instead.
 */
export interface IndexSnapshot {
    /** Increases by one with every installed write */
    readonly generation: number;
    /** ISO timestamp of the write that produced this snapshot */
    readonly builtAt: string;
    readonly docCount: number;
    /** Next id to hand out */
    readonly nextDocId: number;
    readonly documents: ReadonlyMap<number, IndexedDocument>;
    /** `lang:name` → docId */
    readonly keys: ReadonlyMap<string, number>;
    readonly postings: ReadonlyMap<string, readonly Posting[]>;
    /** Distinct tokens of each document, used to drop its postings */
    readonly docTokens: ReadonlyMap<number, readonly string[]>;
    readonly langCounts: ReadonlyMap<string, number>;
}

/**
 * Mutable working copy used while deriving a snapshot.
 */
interface Draft {
    documents: Map<number, IndexedDocument>;
    keys: Map<string, number>;
    postings: Map<string, readonly Posting[]>;
    docTokens: Map<number, readonly string[]>;
    langCounts: Map<string, number>;
    nextDocId: number;
}

/**
 * Count token occurrences per field of a document.
 *
 * Each field is tokenized with the document's language as hint.
 */
export function analyzeDocument(doc: DocumentInput): Map<string, FieldFrequencies> {
    const counts = new Map<string, Record<IndexedField, number>>();

    for (const field of INDEXED_FIELDS) {
        for (const token of tokenize(doc[field], doc.lang)) {
            let tf = counts.get(token);
            if (!tf) {
                tf = { name: 0, description: 0, content: 0 };
                counts.set(token, tf);
            }
            tf[field]++;
        }
    }

    return counts;
}

/**
 * Snapshot of an empty index.
 */
export function emptySnapshot(generation: number = 0, builtAt: string = new Date(0).toISOString()): IndexSnapshot {
    return seal(
        {
            documents: new Map(),
            keys: new Map(),
            postings: new Map(),
            docTokens: new Map(),
            langCounts: new Map(),
            nextDocId: 1,
        },
        generation,
        builtAt
    );
}

function draftFrom(snapshot: IndexSnapshot): Draft {
    return {
        documents: new Map(snapshot.documents),
        keys: new Map(snapshot.keys),
        postings: new Map(snapshot.postings),
        docTokens: new Map(snapshot.docTokens),
        langCounts: new Map(snapshot.langCounts),
        nextDocId: snapshot.nextDocId,
    };
}

function seal(draft: Draft, generation: number, builtAt: string): IndexSnapshot {
    return Object.freeze({
        generation,
        builtAt,
        docCount: draft.documents.size,
        nextDocId: draft.nextDocId,
        documents: draft.documents,
        keys: draft.keys,
        postings: draft.postings,
        docTokens: draft.docTokens,
        langCounts: draft.langCounts,
    });
}

function adjustLangCount(draft: Draft, lang: string, delta: number): void {
    const next = (draft.langCounts.get(lang) ?? 0) + delta;
    if (next > 0) {
        draft.langCounts.set(lang, next);
    } else {
        draft.langCounts.delete(lang);
    }
}

function addToDraft(draft: Draft, input: DocumentInput): void {
    const key = recordKey(input.name, input.lang);
    const existing = draft.keys.get(key);
    if (existing !== undefined) {
        removeFromDraft(draft, existing);
    }

    const docId = draft.nextDocId++;
    const doc: IndexedDocument = Object.freeze({ docId, ...input });
    const analysis = analyzeDocument(input);

    for (const [token, tf] of analysis) {
        const list = draft.postings.get(token) ?? [];
        draft.postings.set(token, Object.freeze([...list, Object.freeze({ docId, tf: Object.freeze(tf) })]));
    }

    draft.documents.set(docId, doc);
    draft.keys.set(key, docId);
    draft.docTokens.set(docId, Object.freeze([...analysis.keys()]));
    adjustLangCount(draft, input.lang, 1);
}

function removeFromDraft(draft: Draft, docId: number): void {
    const doc = draft.documents.get(docId);
    if (!doc) {
        return;
    }

    for (const token of draft.docTokens.get(docId) ?? []) {
        const remaining = (draft.postings.get(token) ?? []).filter(posting => posting.docId !== docId);
        if (remaining.length > 0) {
            draft.postings.set(token, Object.freeze(remaining));
        } else {
            draft.postings.delete(token);
        }
    }

    draft.documents.delete(docId);
    draft.docTokens.delete(docId);
    draft.keys.delete(recordKey(doc.name, doc.lang));
    adjustLangCount(draft, doc.lang, -1);
}

/**
 * Build a complete snapshot from a document set.
 *
 * Ids are assigned in input order starting at 1, so the same input always
 * yields the same postings. A later document with the same `(name, lang)`
 * replaces an earlier one.
 */
export function buildSnapshot(
    documents: Iterable<DocumentInput>,
    generation: number,
    builtAt: string = new Date().toISOString()
): IndexSnapshot {
    const draft = draftFrom(emptySnapshot());
    for (const doc of documents) {
        addToDraft(draft, doc);
    }
    return seal(draft, generation, builtAt);
}

/**
 * Derive a snapshot with one document added or replaced.
 * Postings of untouched tokens are shared with the base snapshot.
 */
export function withDocument(
    base: IndexSnapshot,
    doc: DocumentInput,
    generation: number,
    builtAt: string = new Date().toISOString()
): IndexSnapshot {
    const draft = draftFrom(base);
    addToDraft(draft, doc);
    return seal(draft, generation, builtAt);
}

/**
 * Derive a snapshot without the document keyed `(name, lang)`.
 *
 * @returns The new snapshot, or null if the key is not indexed
 */
export function withoutDocument(
    base: IndexSnapshot,
    name: string,
    lang: string,
    generation: number,
    builtAt: string = new Date().toISOString()
): IndexSnapshot | null {
    const docId = base.keys.get(recordKey(name, lang));
    if (docId === undefined) {
        return null;
    }

    const draft = draftFrom(base);
    removeFromDraft(draft, docId);
    return seal(draft, generation, builtAt);
}

/**
 * Rebuild the derived tables of a snapshot from stored documents and postings.
 * Used when loading a persisted segment.
 */
export function restoreSnapshot(
    documents: readonly IndexedDocument[],
    postings: ReadonlyArray<readonly [string, readonly Posting[]]>,
    meta: { generation: number; builtAt: string; nextDocId: number }
): IndexSnapshot {
    const draft = draftFrom(emptySnapshot());
    const tokensByDoc = new Map<number, string[]>();

    for (const doc of documents) {
        draft.documents.set(doc.docId, Object.freeze({ ...doc }));
        draft.keys.set(recordKey(doc.name, doc.lang), doc.docId);
        adjustLangCount(draft, doc.lang, 1);
        tokensByDoc.set(doc.docId, []);
    }

    for (const [token, list] of postings) {
        const kept = list.filter(posting => draft.documents.has(posting.docId));
        if (kept.length === 0) continue;
        draft.postings.set(token, Object.freeze(kept.map(posting => Object.freeze({ docId: posting.docId, tf: Object.freeze({ ...posting.tf }) }))));
        for (const posting of kept) {
            tokensByDoc.get(posting.docId)?.push(token);
        }
    }

    for (const [docId, tokens] of tokensByDoc) {
        draft.docTokens.set(docId, Object.freeze(tokens));
    }

    const highestId = documents.reduce((max, doc) => Math.max(max, doc.docId), 0);
    draft.nextDocId = Math.max(meta.nextDocId, highestId + 1);

    return seal(draft, meta.generation, meta.builtAt);
}
