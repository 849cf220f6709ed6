/**
 * @file tldr-path.ts
 * @module parser/tldr-path
 * @created 2026-09-10
 * @license MIT
 *
 * @fileoverview Derives language, platform and command name from tldr-pages file paths.
 */

/**
 * Location information encoded in a tldr-pages path.
 */
export interface TldrPathInfo {
    lang: string;
    platform: string;
    name: string;
}

/**
 * Parse a tldr-pages path.
 *
 * The language comes from the `pages.<lang>` directory (plain `pages` is
 * English), the platform from the directory below it.
 *
 * @param identifier - Archive or filesystem path of a markdown file
 * @returns Path information, or null if the path is not inside a pages tree
 *
 * @example
 * parseTldrPath('tldr-2.3/pages.zh/common/docker.md')
 * // { lang: 'zh', platform: 'common', name: 'docker' }
 */
export function parseTldrPath(identifier: string): TldrPathInfo | null {
    const parts = identifier.replace(/\\/g, '/').split('/').filter(part => part && part !== '.');
    const pagesIndex = parts.findIndex(part => part === 'pages' || part.startsWith('pages.'));

    if (pagesIndex === -1 || parts.length < pagesIndex + 3) {
        return null;
    }

    const pagesDir = parts[pagesIndex];
    const lang = pagesDir.includes('.') ? pagesDir.slice(pagesDir.indexOf('.') + 1) || 'en' : 'en';
    const platform = parts[pagesIndex + 1];
    const name = commandNameFromPath(parts[parts.length - 1]);

    return { lang, platform, name };
}

/**
 * File name without directory and `.md` extension.
 */
export function commandNameFromPath(identifier: string): string {
    const base = identifier.replace(/\\/g, '/').split('/').pop() ?? identifier;
    return base.replace(/\.md$/i, '');
}
