/**
 * @file knowledge-base.test.ts
 * @module tests/integration/knowledge-base
 * @created 2026-09-25
 * @license MIT
 *
 * @fileoverview Integration tests for learn, import and maintenance flows over a real store and index.
 */

import { rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import type { HelpCapture, HelpSource } from '../../src/parser/help-parser.js';
import { IndexManager } from '../../src/index/index-manager.js';
import { KnowledgeBase, type HelpCapturer } from '../../src/service/knowledge-base.js';
import { defaultConfig, parseConfig } from '../../src/shared/config.js';
import { IndexIOError, NotFoundError, UnlearnableError } from '../../src/shared/errors.js';
import { SqliteRecordStore } from '../../src/store/record-store.js';
import { createTempDir, makeRecord, removeTempDir } from '../setup.js';

function helpFor(command: string): string {
    return [
        `Usage: ${command} [OPTION]... FILE`,
        `Frobnicate ${command} widgets.`,
        '',
        'Options:',
        '  -q, --quiet        suppress normal output',
        '  -v, --verbose      explain what is being done',
        '',
    ].join('\n');
}

/**
 * Capture stand-in: `nohelp` prints nothing, `boom` cannot be started,
 * anything else prints {@link helpFor} for `--help` and has no man page.
 */
function fakeCapture(command: string, source: HelpSource): HelpCapture {
    if (command === 'boom') {
        throw new Error('spawn failed');
    }
    if (command === 'nohelp' || source === 'man') {
        return { ok: false, stdout: '' };
    }
    return { ok: true, stdout: helpFor(command) };
}

const LS_PAGE = '# ls\n\n> List directory contents.\n\n- List all files:\n\n`ls -a`\n';
const TAR_ZH_PAGE = '# tar\n\n> 归档工具。\n\n- 创建归档:\n\n`tar cf {{target.tar}} {{file}}`\n';

describe('KnowledgeBase', () => {
    let store: SqliteRecordStore;
    let capture: jest.Mock<HelpCapture, Parameters<HelpCapturer>>;
    let kb: KnowledgeBase;

    beforeEach(() => {
        store = new SqliteRecordStore(':memory:');
        capture = jest.fn(fakeCapture);
        kb = new KnowledgeBase({ store, index: new IndexManager(), capture });
    });

    afterEach(async () => {
        await kb.close();
    });

    describe('learn', () => {
        it('should store, index and search a learned command', async () => {
            const outcome = await kb.learn('frob');

            expect(outcome.status).toBe('learned');
            expect(outcome.record).toMatchObject({
                name: 'frob',
                lang: 'local',
                category: 'local',
                description: 'Frobnicate frob widgets.',
            });
            expect(outcome.record.examples.map(e => e.code)).toEqual(['frob --quiet', 'frob --verbose']);
            expect(kb.get('frob', 'local')).toEqual(outcome.record);

            const response = kb.search('widgets', { lang: 'local' });
            expect(response.results.map(r => r.name)).toEqual(['frob']);
        });

        it('should update the metadata', async () => {
            await kb.learn('frob');

            expect(kb.info().metadata).toMatchObject({ version: 'local', commandCount: 1, languages: ['local'] });
        });

        it('should not re-learn a known command unless forced', async () => {
            await kb.learn('frob');
            const again = await kb.learn('frob');

            expect(again.status).toBe('exists');
            expect(capture).toHaveBeenCalledTimes(1);

            const forced = await kb.learn('frob', { force: true });
            expect(forced.status).toBe('learned');
            expect(capture).toHaveBeenCalledTimes(2);
            expect(kb.info().indexedDocuments).toBe(1);
        });

        it('should capture the preferred source first', async () => {
            await kb.learn('frob', { preferMan: true });
            expect(capture.mock.calls).toEqual([
                ['frob', 'man'],
                ['frob', 'help'],
            ]);
        });

        it('should not capture the man page when --help is enough', async () => {
            await kb.learn('frob');
            expect(capture.mock.calls).toEqual([['frob', 'help']]);
        });

        it('should capture both sources for a command without help', async () => {
            await expect(kb.learn('nohelp')).rejects.toThrow('no help output available');
            expect(capture.mock.calls).toEqual([
                ['nohelp', 'help'],
                ['nohelp', 'man'],
            ]);
        });

        it('should store nothing for a command without help', async () => {
            await expect(kb.learn('nohelp')).rejects.toThrow(UnlearnableError);

            expect(store.count()).toBe(0);
            expect(kb.index.currentSnapshot().docCount).toBe(0);
        });
    });

    describe('learnAll', () => {
        it('should count learned, skipped and failed commands', async () => {
            await kb.learn('alpha');
            const progress: string[] = [];

            const stats = await kb.learnAll(['alpha', 'beta', 'nohelp', 'boom'], {
                skipExisting: true,
                onProgress: (done, total, command) => progress.push(`${done}/${total} ${command}`),
            });

            expect(stats).toEqual({
                total: 4,
                learned: 1,
                skipped: 2,
                failed: 1,
                issues: [
                    { identifier: 'alpha', reason: 'already learned' },
                    { identifier: 'nohelp', reason: 'no help output available' },
                    { identifier: 'boom', reason: 'spawn failed' },
                ],
            });
            expect(progress).toEqual(['1/4 alpha', '2/4 beta', '3/4 nohelp', '4/4 boom']);
            expect(store.list('local').map(r => r.name)).toEqual(['alpha', 'beta']);
            expect(kb.search('widgets', { lang: 'local' }).results.map(r => r.name).sort()).toEqual(['alpha', 'beta']);
        });

        it('should write the index once per batch instead of once per command', async () => {
            await kb.learn('alpha');
            expect(kb.info().indexGeneration).toBe(1);

            const stats = await kb.learnAll(['beta', 'gamma', 'delta']);

            expect(stats.learned).toBe(3);
            expect(kb.info()).toMatchObject({ indexGeneration: 2, indexedDocuments: 4, commandCount: 4 });
            expect(kb.info().metadata?.commandCount).toBe(4);
        });

        it('should leave the index untouched when nothing was learned', async () => {
            const stats = await kb.learnAll(['nohelp']);

            expect(stats.skipped).toBe(1);
            expect(kb.info().indexGeneration).toBe(0);
            expect(kb.info().metadata).toBeNull();
        });

        it('should re-learn known commands by default', async () => {
            await kb.learn('alpha');
            const stats = await kb.learnAll(['alpha']);

            expect(stats.learned).toBe(1);
            expect(capture).toHaveBeenCalledTimes(2);
        });
    });

    describe('importMarkdown', () => {
        it('should import enabled languages and rebuild the index', async () => {
            const stats = await kb.importMarkdown(
                [
                    { identifier: 'pages/common/ls.md', text: LS_PAGE },
                    { identifier: 'pages.zh/linux/tar.md', text: TAR_ZH_PAGE },
                    { identifier: 'pages.fr/common/ls.md', text: LS_PAGE },
                ],
                { version: 'tldr-2.3.tar.gz' }
            );

            expect(stats.imported).toBe(2);
            expect(stats.skipped).toBe(1);
            expect(store.languages()).toEqual(['en', 'zh']);
            expect(kb.search('directory', { lang: 'en' }).results.map(r => r.name)).toEqual(['ls']);
            expect(kb.search('归档', { lang: 'zh' }).results.map(r => [r.name, r.category])).toEqual([
                ['tar', 'linux'],
            ]);
            expect(kb.info().metadata?.version).toBe('tldr-2.3.tar.gz');
        });

        it('should only accept the given language', async () => {
            const stats = await kb.importMarkdown(
                [
                    { identifier: 'git.md', text: LS_PAGE },
                    { identifier: 'pages/common/ls.md', text: LS_PAGE },
                ],
                { lang: 'zh' }
            );

            expect(stats.imported).toBe(1);
            expect(store.list().map(r => `${r.lang}:${r.name}`)).toEqual(['zh:ls']);
        });

        it('should keep learned commands searchable', async () => {
            await kb.learn('frob');
            await kb.importMarkdown([{ identifier: 'pages/common/ls.md', text: LS_PAGE }]);

            expect(kb.search('widgets', { lang: 'local' }).results.map(r => r.name)).toEqual(['frob']);
        });
    });

    describe('importRecords', () => {
        it('should skip records that fail the validity gate', async () => {
            const stats = await kb.importRecords([
                makeRecord(),
                { ...makeRecord({ name: 'zip' }), examples: [] },
                { name: 'gzip', description: 'Compress files', lang: 'en', examples: [{ description: 'c', code: 'gzip f' }] },
            ]);

            expect(stats.imported).toBe(2);
            expect(stats.skippedIds).toEqual([{ identifier: 'zip', reason: 'no examples' }]);
            expect(kb.get('gzip', 'en')).toEqual({
                name: 'gzip',
                description: 'Compress files',
                category: 'common',
                platform: 'common',
                lang: 'en',
                examples: [{ description: 'c', code: 'gzip f' }],
                content: '',
            });
            expect(kb.search('compress', { lang: 'en' }).results.map(r => r.name)).toEqual(['gzip']);
        });

        it('should reject a value that is not a record list', async () => {
            await expect(kb.importRecords({ records: [] })).rejects.toThrow('Invalid record list');
            await expect(kb.importRecords([{ name: 'ls' }])).rejects.toThrow('Invalid record list');
        });

        it('should round-trip exported records', async () => {
            await kb.importRecords([makeRecord(), makeRecord({ name: 'zip', lang: 'zh' })]);
            const exported = kb.exportRecords();

            const other = new KnowledgeBase({ store: new SqliteRecordStore(':memory:'), index: new IndexManager() });
            await other.importRecords(JSON.parse(JSON.stringify(exported)));

            expect(other.exportRecords()).toEqual(exported);
            expect(kb.exportRecords('zh').map(r => r.name)).toEqual(['zip']);
            await other.close();
        });
    });

    describe('search', () => {
        it('should search every language when none is given', async () => {
            await kb.learn('frob');
            await kb.importRecords([makeRecord({ description: 'Bundle widgets into an archive' })]);

            const response = kb.search('widgets');
            expect(response.total).toBe(2);
            expect(response.results.map(r => `${r.lang}:${r.name}`).sort()).toEqual(['en:tar', 'local:frob']);
        });
    });

    describe('lookup and removal', () => {
        it('should throw NotFoundError for an unknown record', async () => {
            expect(kb.get('tar', 'en')).toBeNull();
            expect(() => kb.require('tar', 'en')).toThrow(NotFoundError);
        });

        it('should look up a name in the requested language, then en, then zh', async () => {
            await kb.importRecords([
                makeRecord({ name: 'tar', lang: 'zh', description: '归档工具' }),
                makeRecord({ name: 'zip', lang: 'en', description: 'Package files' }),
                makeRecord({ name: 'zip', lang: 'fr', description: 'Compresser des fichiers' }),
            ]);

            expect(kb.lookup('zip', 'fr')?.lang).toBe('fr');
            expect(kb.lookup('zip', 'de')?.lang).toBe('en');
            expect(kb.lookup('tar', 'de')?.lang).toBe('zh');
            expect(kb.lookup('gzip', 'en')).toBeNull();
        });

        it('should prefer the local record when no language is given', async () => {
            await kb.learn('frob');
            await kb.importRecords([makeRecord({ name: 'frob', description: 'Frobnicate things' })]);

            expect(kb.lookup('frob')?.lang).toBe('local');
            expect(kb.lookup('frob', 'en')?.lang).toBe('en');
        });

        it('should turn spaces into hyphens when the name is not found', async () => {
            await kb.importRecords([makeRecord({ name: 'git-commit', description: 'Record changes' })]);

            expect(kb.lookup('  git   commit ')?.name).toBe('git-commit');
        });

        it('should fall back to full-text search', async () => {
            await kb.importRecords([
                makeRecord(),
                makeRecord({ name: 'zip', description: 'Package and compress files' }),
                makeRecord({ name: 'gzip', description: 'Compress files' }),
            ]);

            expect(kb.find('tar')).toEqual({ kind: 'record', record: makeRecord() });

            const single = kb.find('archiving');
            expect(single.kind === 'record' ? single.record.name : null).toBe('tar');

            const several = kb.find('compress');
            expect(several.kind).toBe('matches');
            expect(several.kind === 'matches' ? several.response.results.map(r => r.name).sort() : []).toEqual([
                'gzip',
                'zip',
            ]);

            const none = kb.find('rsync');
            expect(none.kind === 'matches' ? none.response.total : -1).toBe(0);
        });

        it('should remove a record from the store and the index', async () => {
            await kb.importRecords([makeRecord(), makeRecord({ name: 'zip', description: 'Archiving utility too' })]);

            expect(await kb.remove('tar', 'en')).toBe(true);
            expect(await kb.remove('tar', 'en')).toBe(false);
            expect(kb.get('tar', 'en')).toBeNull();
            expect(kb.search('archiving', { lang: 'en' }).results.map(r => r.name)).toEqual(['zip']);
            expect(kb.info().metadata?.commandCount).toBe(1);
        });
    });

    describe('reset', () => {
        it('should delete every record, the metadata and the index', async () => {
            await kb.learn('frob');
            await kb.importRecords([makeRecord()]);

            await kb.reset();

            expect(kb.info()).toMatchObject({ commandCount: 0, languages: [], indexedDocuments: 0, metadata: null });
            expect(kb.search('widgets').results).toEqual([]);
            expect(kb.lookup('frob')).toBeNull();
        });
    });

    describe('store failures', () => {
        it('should not index a learned command the store rejects', async () => {
            jest.spyOn(store, 'put').mockImplementation(() => {
                throw new Error('disk full');
            });

            await expect(kb.learn('frob')).rejects.toThrow('disk full');
            expect(kb.info().indexedDocuments).toBe(0);
            expect(kb.search('widgets').results).toEqual([]);
        });

        it('should keep the previous version indexed when a re-learn is rejected', async () => {
            await kb.importRecords([makeRecord({ name: 'frob', lang: 'local', description: 'Old frob gadgets' })]);
            jest.spyOn(store, 'put').mockImplementation(() => {
                throw new Error('disk full');
            });

            await expect(kb.learn('frob', { force: true })).rejects.toThrow('disk full');
            expect(kb.search('gadgets').results.map(r => r.name)).toEqual(['frob']);
            expect(kb.search('widgets').results).toEqual([]);
        });

        it('should not index an import the store rejects', async () => {
            jest.spyOn(store, 'putMany').mockImplementation(() => {
                throw new Error('disk full');
            });

            await expect(kb.importRecords([makeRecord()])).rejects.toThrow('disk full');
            expect(kb.info().indexedDocuments).toBe(0);
            expect(kb.search('tar').results).toEqual([]);
        });

        it('should keep a record searchable when the store refuses to delete it', async () => {
            await kb.importRecords([makeRecord()]);
            jest.spyOn(store, 'delete').mockImplementation(() => {
                throw new Error('database is locked');
            });

            await expect(kb.remove('tar', 'en')).rejects.toThrow('database is locked');
            expect(kb.search('tar').results.map(r => r.name)).toEqual(['tar']);
        });
    });

    describe('rebuildIndex/info', () => {
        it('should rebuild the index from the store', async () => {
            store.put(makeRecord());
            expect(kb.search('tar').results).toEqual([]);

            const snapshot = await kb.rebuildIndex();

            expect(snapshot.docCount).toBe(1);
            expect(kb.search('tar').results.map(r => r.name)).toEqual(['tar']);
            expect(kb.info()).toMatchObject({ commandCount: 1, languages: ['en'], indexedDocuments: 1 });
        });
    });
});

describe('KnowledgeBase.open', () => {
    let dir: string;

    beforeEach(() => {
        dir = createTempDir();
    });

    afterEach(() => {
        removeTempDir(dir);
    });

    it('should persist records and the index in the data directory', async () => {
        const config = parseConfig({ dataDir: dir });

        const first = await KnowledgeBase.open(config);
        await first.importRecords([makeRecord()]);
        await first.close();

        const second = await KnowledgeBase.open(config);
        expect(second.search('tar', { lang: 'en' }).results.map(r => r.name)).toEqual(['tar']);
        expect(second.info().indexGeneration).toBe(1);
        await second.close();
    });

    it('should rebuild a missing index from stored records', async () => {
        const config = parseConfig({ dataDir: dir, storage: { indexDirname: 'idx' } });
        const store = new SqliteRecordStore(join(dir, 'data.db'));
        store.put(makeRecord());
        store.close();

        const kb = await KnowledgeBase.open(config);
        expect(kb.search('tar').results.map(r => r.name)).toEqual(['tar']);
        await kb.close();
    });

    it('should rebuild an index that lags behind the store', async () => {
        const config = parseConfig({ dataDir: dir });

        const first = await KnowledgeBase.open(config);
        await first.importRecords([makeRecord()]);
        await first.close();

        const store = new SqliteRecordStore(join(dir, 'data.db'));
        store.put(makeRecord({ name: 'zip', description: 'Compress files' }));
        store.close();

        const second = await KnowledgeBase.open(config);
        expect(second.search('compress').results.map(r => r.name)).toEqual(['zip']);
        expect(second.info().indexedDocuments).toBe(2);
        await second.close();
    });

    describe('when the index cannot be written', () => {
        let indexDir: string;
        let kb: KnowledgeBase;

        beforeEach(async () => {
            indexDir = join(dir, 'idx');
            const index = await IndexManager.open(indexDir);
            kb = new KnowledgeBase({ store: new SqliteRecordStore(':memory:'), index, capture: fakeCapture });
        });

        afterEach(async () => {
            await kb.close();
        });

        const blockIndexDir = () => {
            rmSync(indexDir, { recursive: true, force: true });
            writeFileSync(indexDir, '');
        };

        it('should store nothing and succeed once the index is writable again', async () => {
            blockIndexDir();

            await expect(kb.learn('frob')).rejects.toThrow(IndexIOError);
            expect(kb.get('frob', 'local')).toBeNull();
            expect(kb.info()).toMatchObject({ commandCount: 0, indexedDocuments: 0 });

            rmSync(indexDir, { force: true });
            const outcome = await kb.learn('frob');

            expect(outcome.status).toBe('learned');
            expect(kb.search('widgets').results.map(r => r.name)).toEqual(['frob']);
        });

        it('should keep a record that could not be removed from the index', async () => {
            await kb.learn('frob');
            blockIndexDir();

            await expect(kb.remove('frob', 'local')).rejects.toThrow(IndexIOError);
            expect(kb.get('frob', 'local')).not.toBeNull();
            expect(kb.search('widgets').results.map(r => r.name)).toEqual(['frob']);
        });

        it('should store nothing from an import that could not be indexed', async () => {
            blockIndexDir();

            await expect(kb.importRecords([makeRecord()])).rejects.toThrow(IndexIOError);
            expect(kb.info().commandCount).toBe(0);
        });
    });

    it('should use defaults when no configuration is given', () => {
        const kb = new KnowledgeBase({ store: new SqliteRecordStore(':memory:'), index: new IndexManager() });
        expect(kb.engine.clampLimit(undefined)).toBe(defaultConfig().search.defaultLimit);
        return kb.close();
    });
});
