/**
 * @file config.ts
 * @module shared/config
 * @created 2026-09-03
 * @license MIT
 *
 * @fileoverview Application configuration: defaults, file lookup and validation.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import { z } from 'zod';

import { ConfigError } from './errors.js';

/**
 * Environment variable that overrides the default data directory.
 */
export const DATA_DIR_ENV = 'CMDEX_DATA_DIR';

/**
 * Name of the configuration file looked up in the working directory.
 */
export const LOCAL_CONFIG_FILE = 'cmdex.json';

const boostsSchema = z
    .object({
        name: z.number().positive().default(3),
        description: z.number().positive().default(2),
        content: z.number().positive().default(1),
    })
    .default({});

const configSchema = z
    .object({
        dataDir: z.string().min(1).optional(),
        storage: z
            .object({
                dbFilename: z.string().min(1).default('data.db'),
                indexDirname: z.string().min(1).default('index'),
            })
            .default({}),
        search: z
            .object({
                defaultLimit: z.number().int().positive().default(20),
                maxLimit: z.number().int().positive().default(100),
                defaultLang: z.string().min(1).default('en'),
                boosts: boostsSchema,
            })
            .default({}),
        learn: z
            .object({
                maxExamples: z.number().int().positive().default(10),
                preferMan: z.boolean().default(false),
            })
            .default({}),
        import: z
            .object({
                /** Languages accepted from markdown archives; empty accepts all */
                languages: z.array(z.string().min(1)).default(['en', 'zh']),
            })
            .default({}),
    })
    .strict();

export type AppConfig = z.infer<typeof configSchema>;
export type FieldBoosts = z.infer<typeof boostsSchema>;

/**
 * Parse and validate a raw configuration object, filling in defaults.
 *
 * @param raw - Parsed JSON value
 * @param source - Where the value came from, used in error messages
 * @throws ConfigError if the value does not match the schema
 */
export function parseConfig(raw: unknown, source: string = '<inline>'): AppConfig {
    const result = configSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(source, issues);
    }

    const config = result.data;
    if (config.search.defaultLimit > config.search.maxLimit) {
        throw new ConfigError(source, 'search.defaultLimit exceeds search.maxLimit');
    }
    return config;
}

/**
 * Built-in configuration.
 */
export function defaultConfig(): AppConfig {
    return parseConfig({});
}

/**
 * Load configuration from a JSON file.
 *
 * @param path - Path to the JSON file
 * @throws ConfigError if the file cannot be read or is invalid
 */
export function loadConfigFile(path: string): AppConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new ConfigError(path, detail);
    }
    return parseConfig(raw, path);
}

/**
 * Default data directory: `$CMDEX_DATA_DIR`, else `~/.local/share/cmdex`.
 */
export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
    const fromEnv = env[DATA_DIR_ENV];
    if (fromEnv) {
        return resolve(fromEnv);
    }
    return join(homedir(), '.local', 'share', 'cmdex');
}

/**
 * Resolve the effective configuration.
 *
 * Lookup order:
 * 1. Explicit path (must exist)
 * 2. `cmdex.json` in the working directory
 * 3. `config.json` in the data directory
 * 4. Built-in defaults
 *
 * @param explicitPath - Path given with `--config`
 * @param cwd - Working directory to search
 */
export function resolveConfig(explicitPath?: string, cwd: string = process.cwd()): AppConfig {
    if (explicitPath) {
        const resolved = resolve(cwd, explicitPath);
        if (!existsSync(resolved)) {
            throw new ConfigError(resolved, 'file not found');
        }
        return loadConfigFile(resolved);
    }

    const local = join(cwd, LOCAL_CONFIG_FILE);
    if (existsSync(local)) {
        return loadConfigFile(local);
    }

    const inDataDir = join(defaultDataDir(), 'config.json');
    if (existsSync(inDataDir)) {
        return loadConfigFile(inDataDir);
    }

    return defaultConfig();
}

/**
 * Data directory for a configuration.
 */
export function getDataDir(config: AppConfig): string {
    return config.dataDir ? resolve(config.dataDir) : defaultDataDir();
}
