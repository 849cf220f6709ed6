/**
 * @file snapshot.test.ts
 * @module tests/unit/index/snapshot
 * @created 2026-09-22
 * @license MIT
 *
 * @fileoverview Unit tests for snapshot construction and copy-on-write updates.
 */

import {
    analyzeDocument,
    buildSnapshot,
    emptySnapshot,
    withDocument,
    withoutDocument,
} from '../../../src/index/snapshot.js';
import { makeDocument } from '../../setup.js';

describe('analyzeDocument', () => {
    it('should count tokens per field', () => {
        const counts = analyzeDocument(
            makeDocument({ name: 'tar', description: 'Archive files with tar', content: 'tar tar gzip' })
        );
        expect(counts.get('tar')).toEqual({ name: 1, description: 1, content: 2 });
        expect(counts.get('gzip')).toEqual({ name: 0, description: 0, content: 1 });
        expect(counts.get('archive')).toEqual({ name: 0, description: 1, content: 0 });
    });

    it('should segment chinese fields', () => {
        const counts = analyzeDocument(makeDocument({ name: 'docker', description: '查看容器日志', lang: 'zh' }));
        expect([...counts.keys()]).toEqual(['docker', '查看', '容器', '日志']);
    });
});

describe('buildSnapshot', () => {
    const docs = [
        makeDocument({ name: 'tar', description: 'Archive files' }),
        makeDocument({ name: 'zip', description: 'Package and compress files' }),
        makeDocument({ name: 'tar', description: '归档文件', lang: 'zh' }),
    ];

    it('should index every document', () => {
        const snapshot = buildSnapshot(docs, 1, '2026-01-01T00:00:00.000Z');

        expect(snapshot.generation).toBe(1);
        expect(snapshot.builtAt).toBe('2026-01-01T00:00:00.000Z');
        expect(snapshot.docCount).toBe(3);
        expect(snapshot.nextDocId).toBe(4);
        expect(snapshot.keys.get('en:tar')).toBe(1);
        expect(snapshot.keys.get('zh:tar')).toBe(3);
        expect(snapshot.langCounts.get('en')).toBe(2);
        expect(snapshot.langCounts.get('zh')).toBe(1);
        expect(snapshot.postings.get('files')?.map(p => p.docId)).toEqual([1, 2]);
    });

    it('should produce identical postings for identical input', () => {
        const first = buildSnapshot(docs, 1);
        const second = buildSnapshot(docs, 2);
        expect([...second.postings]).toEqual([...first.postings]);
        expect([...second.documents]).toEqual([...first.documents]);
    });

    it('should keep the last document of a duplicated key', () => {
        const snapshot = buildSnapshot(
            [makeDocument({ description: 'old text' }), makeDocument({ description: 'new text' })],
            1
        );
        expect(snapshot.docCount).toBe(1);
        expect(snapshot.postings.has('old')).toBe(false);
        expect(snapshot.postings.get('new')?.map(p => p.docId)).toEqual([2]);
    });

    it('should freeze the snapshot object', () => {
        expect(Object.isFrozen(buildSnapshot(docs, 1))).toBe(true);
    });
});

describe('withDocument', () => {
    it('should leave the base snapshot untouched', () => {
        const base = buildSnapshot([makeDocument({ name: 'ls', description: 'List files' })], 1);
        const next = withDocument(base, makeDocument({ name: 'cp', description: 'Copy files' }), 2);

        expect(base.docCount).toBe(1);
        expect(base.postings.get('files')).toHaveLength(1);
        expect(base.postings.has('copy')).toBe(false);
        expect(next.docCount).toBe(2);
        expect(next.postings.get('files')).toHaveLength(2);
    });

    it('should share postings of tokens it does not touch', () => {
        const base = buildSnapshot([makeDocument({ name: 'ls', description: 'List files' })], 1);
        const next = withDocument(base, makeDocument({ name: 'cp', description: 'Copy things' }), 2);
        expect(next.postings.get('list')).toBe(base.postings.get('list'));
    });

    it('should replace a document with the same key', () => {
        const base = buildSnapshot([makeDocument({ name: 'ls', description: 'List files' })], 1);
        const next = withDocument(base, makeDocument({ name: 'ls', description: 'Show directory' }), 2);

        expect(next.docCount).toBe(1);
        expect(next.postings.has('list')).toBe(false);
        expect(next.postings.has('files')).toBe(false);
        expect(next.postings.get('show')?.map(p => p.docId)).toEqual([2]);
        expect(next.keys.get('en:ls')).toBe(2);
    });
});

describe('withoutDocument', () => {
    it('should drop the document and its postings', () => {
        const base = buildSnapshot(
            [makeDocument({ name: 'ls', description: 'List files' }), makeDocument({ name: 'cp', description: 'Copy files' })],
            1
        );
        const next = withoutDocument(base, 'ls', 'en', 2);

        expect(next?.docCount).toBe(1);
        expect(next?.postings.has('ls')).toBe(false);
        expect(next?.postings.has('list')).toBe(false);
        expect(next?.postings.get('files')?.map(p => p.docId)).toEqual([2]);
        expect(next?.langCounts.get('en')).toBe(1);
    });

    it('should return null for an unknown key', () => {
        expect(withoutDocument(emptySnapshot(), 'ls', 'en', 1)).toBeNull();
    });

    it('should drop the language count with the last document', () => {
        const base = buildSnapshot([makeDocument({ lang: 'zh' })], 1);
        expect(withoutDocument(base, 'tar', 'zh', 2)?.langCounts.has('zh')).toBe(false);
    });
});
