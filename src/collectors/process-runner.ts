/**
 * @file process-runner.ts
 * @module collectors/process-runner
 * @created 2026-09-17
 * @license MIT
 *
 * @fileoverview Captures `--help` and `man` output of installed commands and lists
 * commands on PATH or in a man section.
 */

import { spawnSync } from 'node:child_process';
import { readdirSync, statSync } from 'node:fs';
import { delimiter, join } from 'node:path';

import type { HelpCapture, HelpSource } from '../parser/help-parser.js';
import { stripAnsiCodes } from '../shared/utils/ansi.js';

/**
 * Platform tags used in records.
 */
export type PlatformTag = 'linux' | 'osx' | 'windows' | 'common';

/**
 * Options for capturing help output.
 */
export interface CaptureOptions {
    /** Kill the process after this many milliseconds (default 5000) */
    timeoutMs?: number;
    /** Environment for the child process (default `process.env`) */
    env?: NodeJS.ProcessEnv;
}

const DEFAULT_TIMEOUT_MS = 5000;

/**
 * Output larger than this is truncated by the child process runner.
 */
const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * Command names passed to the runner. Anything else is refused before a
 * process is spawned.
 */
const COMMAND_NAME_PATTERN = /^[\w][\w.+-]*$/;

/**
 * Platform tag of the running system.
 */
export function currentPlatform(platform: NodeJS.Platform = process.platform): PlatformTag {
    switch (platform) {
        case 'linux':
            return 'linux';
        case 'darwin':
            return 'osx';
        case 'win32':
            return 'windows';
        default:
            return 'common';
    }
}

/**
 * Whether a string is a plausible command name.
 */
export function isValidCommandName(name: string): boolean {
    return COMMAND_NAME_PATTERN.test(name);
}

/**
 * Whether captured text looks like help output: it mentions a usual help
 * keyword or is longer than a one-line error.
 */
export function looksLikeHelp(text: string): boolean {
    const trimmed = text.trim();
    if (!trimmed) {
        return false;
    }
    const lower = trimmed.toLowerCase();
    return (
        ['usage', 'options', 'help', 'commands', 'synopsis', 'description'].some(keyword => lower.includes(keyword)) ||
        trimmed.length > 50
    );
}

function run(file: string, args: string[], options: CaptureOptions, extraEnv: NodeJS.ProcessEnv = {}): HelpCapture {
    const result = spawnSync(file, args, {
        encoding: 'utf-8',
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        maxBuffer: MAX_OUTPUT_BYTES,
        env: { ...(options.env ?? process.env), ...extraEnv },
        stdio: ['ignore', 'pipe', 'pipe'],
    });

    if (result.error) {
        return { ok: false, stdout: '', stderr: result.error.message };
    }

    const stdout = result.stdout ?? '';
    const stderr = result.stderr ?? '';
    // Many tools exit non-zero after printing help, so usable text counts as success
    const ok = result.status === 0 || looksLikeHelp(stdout) || looksLikeHelp(stderr);
    return { ok, stdout, stderr };
}

/**
 * Run `<command> --help`, falling back to `<command> -h`.
 */
export function captureHelp(command: string, options: CaptureOptions = {}): HelpCapture {
    if (!isValidCommandName(command)) {
        return { ok: false, stdout: '', stderr: `invalid command name '${command}'` };
    }

    let last: HelpCapture = { ok: false, stdout: '' };
    for (const flag of ['--help', '-h']) {
        last = run(command, [flag], options);
        if (last.ok && (looksLikeHelp(last.stdout) || looksLikeHelp(last.stderr ?? ''))) {
            return last;
        }
    }
    return { ...last, ok: false };
}

/**
 * Run `man <command>` with a plain pager and return the text without
 * terminal formatting. Not available on Windows.
 */
export function captureMan(command: string, options: CaptureOptions = {}): HelpCapture {
    if (currentPlatform() === 'windows') {
        return { ok: false, stdout: '', stderr: "'man' is not available on Windows" };
    }
    if (!isValidCommandName(command)) {
        return { ok: false, stdout: '', stderr: `invalid command name '${command}'` };
    }

    const capture = run('man', [command], options, { MANPAGER: 'cat', MANWIDTH: '80', GROFF_NO_SGR: '1' });
    return {
        ok: capture.ok && capture.stdout.trim() !== '',
        stdout: stripAnsiCodes(capture.stdout),
        stderr: capture.stderr,
    };
}

/**
 * Capture one help source of a command.
 */
export function captureSource(command: string, source: HelpSource, options: CaptureOptions = {}): HelpCapture {
    return source === 'man' ? captureMan(command, options) : captureHelp(command, options);
}

/**
 * Command names listed for a man section in `man -k` / `apropos` output.
 *
 * Lines look like `ls (1) - list directory contents`, `ls(1) - ...` or
 * `gzip, gunzip (1) - ...`; only the first name of a line is taken.
 *
 * @returns Sorted, de-duplicated command names
 */
export function parseManIndex(text: string, section: string): string[] {
    const names = new Set<string>();
    const markers = [`(${section})`, `(${section},`];

    for (const line of text.split(/\r?\n/)) {
        if (!markers.some(marker => line.includes(marker))) continue;

        const [first = ''] = line.trim().split(/[(, ]/);
        const name = first.trim();
        if (name && isValidCommandName(name)) {
            names.add(name);
        }
    }

    return [...names].sort();
}

/**
 * List the commands documented in a man section.
 *
 * Tries `man -k -s <section> .`, then `man -k .` (BSD man has no `-s`),
 * then `apropos .`.
 *
 * @param section - Man section, e.g. `1` for user commands or `8` for administration
 * @throws Error on Windows, for a malformed section, or if no listing tool works
 */
export function listManPages(section: string = '1', options: CaptureOptions = {}): string[] {
    if (currentPlatform() === 'windows') {
        throw new Error("'man' is not available on Windows; use --source path");
    }
    if (!/^\w+$/.test(section)) {
        throw new Error(`invalid man section '${section}'`);
    }

    const attempts: Array<[string, string[]]> = [
        ['man', ['-k', '-s', section, '.']],
        ['man', ['-k', '.']],
        ['apropos', ['.']],
    ];

    let lastError = 'no output';
    for (const [file, args] of attempts) {
        const result = run(file, args, options);
        if (result.ok && result.stdout.trim()) {
            return parseManIndex(result.stdout, section);
        }
        lastError = result.stderr?.trim() || lastError;
    }
    throw new Error(`Failed to list man pages: ${lastError}`);
}

/**
 * List executable files found in the directories of a PATH string.
 *
 * @param pathEnv - PATH value (default `process.env.PATH`)
 * @param prefix - Keep only names starting with this prefix
 * @returns Sorted, de-duplicated command names
 */
export function listPathCommands(pathEnv: string = process.env.PATH ?? '', prefix: string = ''): string[] {
    const names = new Set<string>();
    const windows = currentPlatform() === 'windows';

    for (const dir of pathEnv.split(delimiter)) {
        if (!dir) continue;

        let entries: string[];
        try {
            entries = readdirSync(dir);
        } catch {
            // Missing or unreadable PATH entries are common
            continue;
        }

        for (const entry of entries) {
            try {
                const stats = statSync(join(dir, entry));
                if (!stats.isFile()) continue;
                if (windows) {
                    if (!/\.(exe|cmd|bat|ps1)$/i.test(entry)) continue;
                } else if ((stats.mode & 0o111) === 0) {
                    continue;
                }
            } catch {
                continue;
            }

            const name = windows ? entry.replace(/\.(exe|cmd|bat|ps1)$/i, '') : entry;
            if (name.startsWith(prefix) && isValidCommandName(name)) {
                names.add(name);
            }
        }
    }

    return [...names].sort();
}
