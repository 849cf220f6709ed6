#!/usr/bin/env node

/**
 * @file index.ts
 * @module index
 * @created 2026-09-19
 * @license MIT
 *
 * @fileoverview CLI entry point for the command knowledge base.
 */

/**
 * @example
 * ```bash
 * # Learn an installed command from its --help / man page
 * cmdex learn rsync
 *
 * # Import tldr pages
 * cmdex import ./tldr-main.tar.gz
 *
 * # Learn the commands of man section 8
 * cmdex learn-all --source man --section 8
 *
 * # Search
 * cmdex search "compress directory" -l en -n 5
 * cmdex search 查看容器日志 -l zh
 * ```
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { createInterface } from 'node:readline/promises';

import { InvalidArgumentError, Option, program } from 'commander';

import { currentPlatform, listManPages, listPathCommands } from './collectors/process-runner.js';
import {
    formatImportStats,
    formatInfo,
    formatLearnStats,
    formatRecord,
    formatSearchResponse,
    isOutputFormat,
    OUTPUT_FORMATS,
} from './cli/formatters.js';
import { KnowledgeBase, LOCAL_LANG } from './service/knowledge-base.js';
import { getDataDir, resolveConfig, type AppConfig } from './shared/config.js';
import { UnlearnableError } from './shared/errors.js';
import { createConsoleLogger, type Logger } from './shared/logger.js';

/**
 * Options available on every command.
 */
interface GlobalOptions {
    /** Path to a configuration file */
    config?: string;
    /** Enable verbose output */
    verbose?: boolean;
}

interface LearnCommandOptions {
    man?: boolean;
    force?: boolean;
}

/**
 * Where `learn-all` finds command names. `auto` means `man` except on
 * Windows, where it means `path`.
 */
const LEARN_SOURCES = ['auto', 'man', 'path'] as const;
type LearnSource = (typeof LEARN_SOURCES)[number];

interface LearnAllCommandOptions {
    source: LearnSource;
    section: string;
    prefix?: string;
    limit?: number;
    skipExisting?: boolean;
    man?: boolean;
}

interface SearchCommandOptions {
    lang?: string;
    limit?: number;
    format: string;
}

/**
 * Parse a positive integer option value.
 */
function parsePositiveInt(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

/**
 * Build the shared context of a command and run it.
 *
 * Opens the knowledge base, runs the action, closes the knowledge base and
 * turns any error into a message and a non-zero exit code.
 */
async function withKnowledgeBase(
    action: (kb: KnowledgeBase, context: { config: AppConfig; logger: Logger; verbose: boolean }) => Promise<void>
): Promise<void> {
    const globals = program.opts<GlobalOptions>();
    const verbose = globals.verbose ?? false;
    const logger = createConsoleLogger({ verbose });

    let kb: KnowledgeBase | null = null;
    try {
        const config = resolveConfig(globals.config);
        kb = await KnowledgeBase.open(config, logger);
        await action(kb, { config, logger, verbose });
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error), verbose ? error : undefined);
        process.exitCode = 1;
    } finally {
        if (kb) {
            await kb.close();
        }
    }
}

/**
 * CLI entry point.
 *
 * Sets up the commander program with all available commands and options,
 * then parses command-line arguments to execute the appropriate action.
 */
async function main() {
    program
        .name('cmdex')
        .description('Searchable knowledge base of command-line documentation')
        .version('1.0.0')
        .option('-c, --config <file>', 'Path to a configuration file')
        .option('-v, --verbose', 'Enable verbose output');

    program
        .command('learn')
        .description('Learn an installed command from its --help output or man page')
        .argument('<command>', 'Command name')
        .option('--man', 'Prefer the man page over --help')
        .option('-f, --force', 'Re-learn even if the command is already known')
        .action((command: string, options: LearnCommandOptions) => learn(command, options));

    program
        .command('learn-all')
        .description('Learn every command of a man section or every executable found on PATH')
        .addOption(
            new Option('--source <source>', 'Where to find commands').choices(LEARN_SOURCES).default('auto')
        )
        .option('-s, --section <section>', 'Man section to learn (1 user commands, 8 administration)', '1')
        .option('-p, --prefix <prefix>', 'Only commands starting with this prefix')
        .option('--limit <n>', 'Maximum number of commands', parsePositiveInt)
        .option('--skip-existing', 'Skip commands that are already known')
        .option('--man', 'Prefer man pages over --help')
        .action((options: LearnAllCommandOptions) => learnAll(options));

    program
        .command('import')
        .description('Import tldr-style markdown pages from a directory, .md file or .tar.gz archive')
        .argument('<path>', 'Directory, markdown file or archive')
        .option('-l, --lang <lang>', 'Language of pages outside a pages.<lang> tree')
        .action((path: string, options: { lang?: string }) => importPages(path, options));

    program
        .command('import-json')
        .description('Import records from a JSON file')
        .argument('<file>', 'JSON file containing an array of records')
        .action((file: string) => importJson(file));

    program
        .command('export-json')
        .description('Export records to a JSON file')
        .argument('<file>', 'Output file')
        .option('-l, --lang <lang>', 'Only records of this language')
        .action((file: string, options: { lang?: string }) => exportJson(file, options));

    program
        .command('search')
        .description('Search the knowledge base')
        .argument('<query>', 'Search query')
        .option('-l, --lang <lang>', 'Only results in this language')
        .option('-n, --limit <n>', 'Maximum number of results', parsePositiveInt)
        .option('--format <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, 'simple')
        .action((query: string, options: SearchCommandOptions) => search(query, options));

    program
        .command('show')
        .description('Show the examples of a command')
        .argument('<name>', 'Command name')
        .option('-l, --lang <lang>', 'Language of the record')
        .action((name: string, options: { lang?: string }) => show(name, options));

    program
        .command('remove')
        .description('Remove a command from the knowledge base')
        .argument('<name>', 'Command name')
        .option('-l, --lang <lang>', 'Language of the record', LOCAL_LANG)
        .action((name: string, options: { lang: string }) => remove(name, options));

    program
        .command('reset')
        .description('Delete every record and the search index')
        .option('-y, --yes', 'Do not ask for confirmation')
        .action((options: { yes?: boolean }) => reset(options));

    program
        .command('rebuild')
        .description('Rebuild the search index from the stored records')
        .action(() => rebuild());

    program
        .command('info')
        .description('Show knowledge base statistics')
        .action(() => showInfo());

    program
        .command('config')
        .description('Print the effective configuration')
        .action(() => showConfig());

    await program.parseAsync();
}

/**
 * Learn one command.
 */
function learn(command: string, options: LearnCommandOptions): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        try {
            const outcome = await kb.learn(command, { force: options.force, preferMan: options.man });
            if (outcome.status === 'exists') {
                logger.info(`'${command}' is already learned. Use --force to re-learn.`);
                return;
            }
            logger.info(
                `Learned '${command}' from ${outcome.sources.join(' + ')}: ${outcome.record.examples.length} examples`
            );
        } catch (error) {
            if (error instanceof UnlearnableError) {
                logger.error(error.message);
                logger.info('Possible reasons:');
                logger.info('  - The command is not installed or not in your PATH');
                logger.info('  - It prints no --help output and has no man page');
                process.exitCode = 1;
                return;
            }
            throw error;
        }
    });
}

/**
 * Learn all commands found on PATH.
 */
function learnAll(options: LearnAllCommandOptions): Promise<void> {
    return withKnowledgeBase(async (kb, { logger, verbose }) => {
        const source = options.source === 'auto' ? (currentPlatform() === 'windows' ? 'path' : 'man') : options.source;
        logger.debug(`Source: ${source}`);

        const prefix = (options.prefix ?? '').toLowerCase();
        let commands = (source === 'man' ? listManPages(options.section) : listPathCommands(process.env.PATH)).filter(
            command => command.toLowerCase().startsWith(prefix)
        );
        if (options.limit !== undefined) {
            commands = commands.slice(0, options.limit);
        }
        logger.info(`Found ${commands.length.toLocaleString()} commands to learn`);

        const stats = await kb.learnAll(commands, {
            skipExisting: options.skipExisting,
            preferMan: options.man,
            onProgress: (done, total, command) => {
                if (verbose) {
                    logger.debug(`[${done}/${total}] ${command}`);
                } else if (done % 25 === 0 || done === total) {
                    process.stdout.write(`\rProgress: ${done}/${total}    `);
                }
            },
        });

        if (!verbose && commands.length > 0) {
            process.stdout.write('\n');
        }
        logger.info(formatLearnStats(stats));
    });
}

/**
 * Import markdown pages.
 */
function importPages(path: string, options: { lang?: string }): Promise<void> {
    return withKnowledgeBase(async (kb, { logger, verbose }) => {
        const stats = await kb.importPath(resolve(path), { lang: options.lang });
        logger.info(formatImportStats(stats, verbose));
    });
}

/**
 * Import records from JSON.
 */
function importJson(file: string): Promise<void> {
    return withKnowledgeBase(async (kb, { logger, verbose }) => {
        const raw: unknown = JSON.parse(readFileSync(resolve(file), 'utf-8'));
        const stats = await kb.importRecords(raw);
        logger.info(formatImportStats(stats, verbose));
    });
}

/**
 * Export records to JSON.
 */
function exportJson(file: string, options: { lang?: string }): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        const records = kb.exportRecords(options.lang);
        writeFileSync(resolve(file), JSON.stringify(records, null, 2) + '\n', 'utf-8');
        logger.info(`Exported ${records.length.toLocaleString()} records to ${resolve(file)}`);
    });
}

/**
 * Run a search.
 */
function search(query: string, options: SearchCommandOptions): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        if (!isOutputFormat(options.format)) {
            throw new Error(`Unknown format '${options.format}' (expected ${OUTPUT_FORMATS.join(', ')})`);
        }
        const response = kb.search(query, { lang: options.lang, limit: options.limit });
        logger.info(formatSearchResponse(response, options.format));
    });
}

/**
 * Show one record, or the search matches when no record has that name.
 */
function show(name: string, options: { lang?: string }): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        const found = kb.find(name, options.lang);
        if (found.kind === 'record') {
            logger.info(formatRecord(found.record));
            return;
        }
        if (found.response.results.length === 0) {
            throw new Error(`No command named '${name}' and no search results for it`);
        }
        logger.info(formatSearchResponse(found.response, 'simple'));
    });
}

/**
 * Remove one record.
 */
function remove(name: string, options: { lang: string }): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        const removed = await kb.remove(name, options.lang);
        if (!removed) {
            logger.warn(`'${name}' (${options.lang}) is not in the knowledge base`);
            process.exitCode = 1;
            return;
        }
        logger.info(`Removed '${name}' (${options.lang})`);
    });
}

/**
 * Delete all data after asking for confirmation.
 */
function reset(options: { yes?: boolean }): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        const { commandCount } = kb.info();
        if (commandCount === 0) {
            logger.info('No data found. Nothing to reset.');
            return;
        }

        if (!options.yes) {
            const rl = createInterface({ input: process.stdin, output: process.stdout });
            try {
                const answer = await rl.question(`Delete ${commandCount.toLocaleString()} records and the index? [y/N] `);
                if (!['y', 'yes'].includes(answer.trim().toLowerCase())) {
                    logger.info('Aborted.');
                    return;
                }
            } finally {
                rl.close();
            }
        }

        await kb.reset();
        logger.info(`Deleted ${commandCount.toLocaleString()} records and the index`);
    });
}

/**
 * Rebuild the index.
 */
function rebuild(): Promise<void> {
    return withKnowledgeBase(async (kb, { logger }) => {
        const startTime = Date.now();
        const snapshot = await kb.rebuildIndex();
        logger.info(
            `Indexed ${snapshot.docCount.toLocaleString()} documents (generation ${snapshot.generation}) in ${Date.now() - startTime} ms`
        );
    });
}

/**
 * Print statistics.
 */
function showInfo(): Promise<void> {
    return withKnowledgeBase(async (kb, { config, logger }) => {
        logger.info(formatInfo(kb.info(), getDataDir(config)));
    });
}

/**
 * Print the effective configuration without opening the knowledge base.
 */
async function showConfig(): Promise<void> {
    const globals = program.opts<GlobalOptions>();
    const logger = createConsoleLogger({ verbose: globals.verbose });
    try {
        const config = resolveConfig(globals.config);
        logger.info(JSON.stringify({ ...config, dataDir: getDataDir(config) }, null, 2));
    } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
}

main().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
});
