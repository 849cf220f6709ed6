/**
 * @file markdown-importer.test.ts
 * @module tests/unit/parser/markdown-importer
 * @created 2026-09-21
 * @license MIT
 *
 * @fileoverview Unit tests for tldr markdown parsing, serialization and batch import.
 */

import {
    importMarkdownBatch,
    parseTldrMarkdown,
    serializeTldrMarkdown,
} from '../../../src/parser/markdown-importer.js';
import { EncodingError, UnlearnableError } from '../../../src/shared/errors.js';
import { makeRecord } from '../../setup.js';

const DOCKER_PAGE = [
    '# docker',
    '',
    '> Manage Docker containers and images.',
    '> More information: <https://docs.docker.com>.',
    '',
    '- List running containers:',
    '',
    '`docker ps`',
    '',
    '- Run a container from an image:',
    '',
    '`docker run {{image}}`',
    '',
].join('\n');

describe('parseTldrMarkdown', () => {
    it('should parse name, description, examples and content', () => {
        expect(parseTldrMarkdown(DOCKER_PAGE)).toEqual({
            name: 'docker',
            description: 'Manage Docker containers and images.',
            category: 'common',
            platform: 'common',
            lang: 'en',
            examples: [
                { description: 'List running containers', code: 'docker ps' },
                { description: 'Run a container from an image', code: 'docker run {{image}}' },
            ],
            content: '> More information: <https://docs.docker.com>.',
        });
    });

    it('should apply language and platform', () => {
        const record = parseTldrMarkdown(DOCKER_PAGE, { lang: 'zh', platform: 'linux' });
        expect(record.lang).toBe('zh');
        expect(record.platform).toBe('linux');
        expect(record.category).toBe('linux');
    });

    it('should read fenced code blocks as example code', () => {
        const page = '# docker\n\n> Build images.\n\n- Build from a Dockerfile:\n\n```sh\ndocker build .\n```\n';
        expect(parseTldrMarkdown(page).examples).toEqual([
            { description: 'Build from a Dockerfile', code: 'docker build .' },
        ]);
    });

    it('should keep a bullet without code as content', () => {
        const page = '# ls\n\n> List files.\n\n- Note: see also dir\n\nPlain line\n\n- List all:\n\n`ls -a`\n';
        const record = parseTldrMarkdown(page);
        expect(record.examples).toEqual([{ description: 'List all', code: 'ls -a' }]);
        expect(record.content).toBe('- Note: see also dir\nPlain line');
    });

    it('should accept CRLF line endings and UTF-8 bytes', () => {
        const bytes = Buffer.from('# ls\r\n\r\n> 列出目录内容。\r\n\r\n- 列出所有文件:\r\n\r\n`ls -a`\r\n', 'utf-8');
        const record = parseTldrMarkdown(bytes, { lang: 'zh' });
        expect(record.description).toBe('列出目录内容。');
        expect(record.examples).toEqual([{ description: '列出所有文件', code: 'ls -a' }]);
    });

    it('should reject a page without examples', () => {
        expect(() => parseTldrMarkdown('# ls\n\n> List files.\n')).toThrow(new UnlearnableError('ls', 'no examples'));
    });

    it('should reject a page without description', () => {
        expect(() => parseTldrMarkdown('# ls\n\n- List:\n\n`ls`\n')).toThrow("Cannot learn 'ls': missing description");
    });

    it('should name the identifier when the title is missing', () => {
        expect(() => parseTldrMarkdown('> List files.\n', { identifier: 'pages/common/ls.md' })).toThrow(
            "Cannot learn 'pages/common/ls.md': missing name"
        );
    });

    it('should reject malformed UTF-8', () => {
        expect(() => parseTldrMarkdown(new Uint8Array([0x23, 0x20, 0xc3]))).toThrow(EncodingError);
    });
});

describe('serializeTldrMarkdown', () => {
    it('should render the tldr layout', () => {
        const record = makeRecord({
            name: 'docker',
            description: 'Manage Docker containers and images.',
            examples: [{ description: 'Run a container', code: 'docker run {{image}}' }],
        });
        expect(serializeTldrMarkdown(record)).toBe(
            '# docker\n\n> Manage Docker containers and images.\n\n- Run a container:\n\n`docker run {{image}}`\n'
        );
    });

    it('should read back to the same record', () => {
        const parsed = parseTldrMarkdown(DOCKER_PAGE, { lang: 'en', platform: 'common' });
        expect(parseTldrMarkdown(serializeTldrMarkdown(parsed), { lang: 'en', platform: 'common' })).toEqual(parsed);
    });

    it('should fence multi-line code and read it back', () => {
        const record = makeRecord({
            examples: [{ description: 'Pipe two commands', code: 'tar cf - dir |\n  gzip > out.tgz' }],
            content: 'See also: gzip',
        });
        expect(parseTldrMarkdown(serializeTldrMarkdown(record))).toEqual(record);
    });
});

describe('importMarkdownBatch', () => {
    const page = (name: string) => `# ${name}\n\n> Does ${name} things.\n\n- Run it:\n\n\`${name}\`\n`;

    it('should import, skip and fail entries independently', () => {
        const { records, stats } = importMarkdownBatch(
            [
                { identifier: 'tldr/pages/common/ls.md', text: page('ls') },
                { identifier: 'tldr/pages.zh/linux/ls.md', text: page('ls') },
                { identifier: 'tldr/pages.fr/common/ls.md', text: page('ls') },
                { identifier: 'tldr/pages/common/empty.md', text: '# empty\n\n> Nothing here.\n' },
                { identifier: 'tldr/pages/common/bad.md', text: new Uint8Array([0xff]) },
            ],
            { languages: ['en', 'zh'] }
        );

        expect(records.map(r => [r.name, r.lang, r.platform])).toEqual([
            ['ls', 'en', 'common'],
            ['ls', 'zh', 'linux'],
        ]);
        expect(stats.imported).toBe(2);
        expect(stats.skipped).toBe(2);
        expect(stats.failed).toBe(1);
        expect(stats.skippedIds).toEqual([
            { identifier: 'tldr/pages.fr/common/ls.md', reason: "language 'fr' not enabled" },
            { identifier: 'tldr/pages/common/empty.md', reason: 'no examples' },
        ]);
        expect(stats.failures).toEqual([{ identifier: 'tldr/pages/common/bad.md', reason: 'Malformed UTF-8 input' }]);
    });

    it('should use the language hint outside a pages tree', () => {
        const { records } = importMarkdownBatch([{ identifier: 'git.md', text: page('git') }], { langHint: 'zh' });
        expect(records).toHaveLength(1);
        expect(records[0].lang).toBe('zh');
        expect(records[0].platform).toBe('common');
    });

    it('should accept every language without a filter', () => {
        const { stats } = importMarkdownBatch([{ identifier: 'pages.fr/common/ls.md', text: page('ls') }]);
        expect(stats.imported).toBe(1);
    });
});
