/**
 * @file archive-reader.ts
 * @module collectors/archive-reader
 * @created 2026-09-17
 * @license MIT
 *
 * @fileoverview Reads markdown pages from a directory, a single file or a gzipped tar archive.
 */

import { createReadStream } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import { basename, join, relative, sep } from 'node:path';
import { createGunzip } from 'node:zlib';
import * as tar from 'tar-stream';

import type { MarkdownEntry } from '../parser/markdown-importer.js';

/**
 * Kind of markdown source a path points at.
 */
export type SourceKind = 'directory' | 'markdown' | 'tarball';

const MARKDOWN_PATTERN = /\.md$/i;
const TARBALL_PATTERN = /\.(tar\.gz|tgz)$/i;

/**
 * Whether an archive member or file name is a markdown page.
 */
export function isMarkdownPath(path: string): boolean {
    return MARKDOWN_PATTERN.test(path);
}

/**
 * Detect the kind of a markdown source.
 *
 * @throws Error if the path is neither a directory, a `.md` file nor a
 * `.tar.gz`/`.tgz` archive
 */
export async function detectSourceKind(path: string): Promise<SourceKind> {
    const stats = await stat(path);
    if (stats.isDirectory()) {
        return 'directory';
    }
    if (TARBALL_PATTERN.test(path)) {
        return 'tarball';
    }
    if (isMarkdownPath(path)) {
        return 'markdown';
    }
    throw new Error(`Unsupported source: ${path} (expected a directory, .md file or .tar.gz archive)`);
}

/**
 * Read every markdown page of a source.
 *
 * Entry text is returned as raw bytes so that decoding errors surface per
 * entry when the page is parsed. Identifiers are `/`-separated paths relative
 * to the source (directory) or inside the archive.
 *
 * @example
 * ```typescript
 * const entries = await readMarkdownSource('./tldr-main.tar.gz');
 * const { records, stats } = importMarkdownBatch(entries);
 * ```
 */
export async function readMarkdownSource(path: string): Promise<MarkdownEntry[]> {
    switch (await detectSourceKind(path)) {
        case 'directory':
            return readMarkdownDirectory(path);
        case 'tarball':
            return readMarkdownTarball(path);
        case 'markdown':
            return [{ identifier: basename(path), text: await readFile(path) }];
    }
}

/**
 * Read all `.md` files below a directory, sorted by identifier.
 */
export async function readMarkdownDirectory(root: string): Promise<MarkdownEntry[]> {
    const entries: MarkdownEntry[] = [];

    const walk = async (dir: string): Promise<void> => {
        const children = await readdir(dir, { withFileTypes: true });
        for (const child of children) {
            const childPath = join(dir, child.name);
            if (child.isDirectory()) {
                await walk(childPath);
            } else if (child.isFile() && isMarkdownPath(child.name)) {
                entries.push({
                    identifier: relative(root, childPath).split(sep).join('/'),
                    text: await readFile(childPath),
                });
            }
        }
    };

    await walk(root);
    return entries.sort((a, b) => (a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0));
}

/**
 * Read all `.md` members of a gzipped tar archive, in archive order.
 */
export function readMarkdownTarball(archivePath: string): Promise<MarkdownEntry[]> {
    return new Promise((resolve, reject) => {
        const extract = tar.extract();
        const entries: MarkdownEntry[] = [];

        extract.on('entry', (header, stream, next) => {
            if (header.type !== 'file' || !isMarkdownPath(header.name)) {
                stream.on('end', () => next());
                stream.resume();
                return;
            }

            const chunks: Buffer[] = [];
            stream.on('data', (chunk: unknown) => {
                if (Buffer.isBuffer(chunk)) {
                    chunks.push(chunk);
                } else if (typeof chunk === 'string') {
                    chunks.push(Buffer.from(chunk, 'utf-8'));
                } else {
                    stream.destroy(new Error(`Unexpected chunk type in ${header.name}`));
                }
            });
            stream.on('end', () => {
                entries.push({ identifier: header.name.replace(/^\.\//, ''), text: Buffer.concat(chunks) });
                next();
            });
            stream.on('error', reject);
        });

        extract.on('finish', () => resolve(entries));
        extract.on('error', reject);

        const readStream = createReadStream(archivePath);
        const gunzip = createGunzip();
        readStream.on('error', reject);
        gunzip.on('error', reject);

        readStream.pipe(gunzip).pipe(extract);
    });
}
