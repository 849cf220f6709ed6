/**
 * @file config.test.ts
 * @module tests/unit/shared/config
 * @created 2026-09-23
 * @license MIT
 *
 * @fileoverview Unit tests for configuration defaults, validation and lookup.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

import {
    DATA_DIR_ENV,
    defaultConfig,
    defaultDataDir,
    getDataDir,
    parseConfig,
    resolveConfig,
} from '../../../src/shared/config.js';
import { ConfigError } from '../../../src/shared/errors.js';
import { createTempDir, removeTempDir } from '../../setup.js';

describe('parseConfig', () => {
    it('should fill in defaults', () => {
        expect(defaultConfig()).toEqual({
            storage: { dbFilename: 'data.db', indexDirname: 'index' },
            search: {
                defaultLimit: 20,
                maxLimit: 100,
                defaultLang: 'en',
                boosts: { name: 3, description: 2, content: 1 },
            },
            learn: { maxExamples: 10, preferMan: false },
            import: { languages: ['en', 'zh'] },
        });
    });

    it('should merge partial sections', () => {
        const config = parseConfig({ search: { maxLimit: 50, boosts: { name: 5 } } });

        expect(config.search.maxLimit).toBe(50);
        expect(config.search.defaultLimit).toBe(20);
        expect(config.search.boosts).toEqual({ name: 5, description: 2, content: 1 });
    });

    it('should reject invalid values', () => {
        expect(() => parseConfig({ search: { maxLimit: -1 } })).toThrow(ConfigError);
        expect(() => parseConfig({ learn: { preferMan: 'yes' } })).toThrow(ConfigError);
        expect(() => parseConfig('config')).toThrow(ConfigError);
    });

    it('should reject unknown keys', () => {
        expect(() => parseConfig({ colour: true })).toThrow(ConfigError);
    });

    it('should reject a default limit above the ceiling', () => {
        expect(() => parseConfig({ search: { defaultLimit: 30, maxLimit: 10 } }, 'test.json')).toThrow(
            'Invalid configuration in test.json: search.defaultLimit exceeds search.maxLimit'
        );
    });
});

describe('data directory', () => {
    it('should honour the environment variable', () => {
        expect(defaultDataDir({ [DATA_DIR_ENV]: '/srv/cmdex' })).toBe(resolve('/srv/cmdex'));
    });

    it('should default to the user data directory', () => {
        expect(defaultDataDir({})).toBe(join(homedir(), '.local', 'share', 'cmdex'));
    });

    it('should prefer the configured directory', () => {
        expect(getDataDir(parseConfig({ dataDir: '/var/lib/cmdex' }))).toBe(resolve('/var/lib/cmdex'));
    });
});

describe('resolveConfig', () => {
    let cwd: string;
    let dataDir: string;
    let savedDataDir: string | undefined;

    beforeEach(() => {
        cwd = createTempDir();
        dataDir = createTempDir();
        savedDataDir = process.env[DATA_DIR_ENV];
        process.env[DATA_DIR_ENV] = dataDir;
    });

    afterEach(() => {
        if (savedDataDir === undefined) {
            delete process.env[DATA_DIR_ENV];
        } else {
            process.env[DATA_DIR_ENV] = savedDataDir;
        }
        removeTempDir(cwd);
        removeTempDir(dataDir);
    });

    it('should return defaults when no file exists', () => {
        expect(resolveConfig(undefined, cwd)).toEqual(defaultConfig());
    });

    it('should load an explicit path relative to the working directory', () => {
        mkdirSync(join(cwd, 'conf'));
        writeFileSync(join(cwd, 'conf', 'custom.json'), JSON.stringify({ search: { defaultLang: 'zh' } }));

        expect(resolveConfig('conf/custom.json', cwd).search.defaultLang).toBe('zh');
    });

    it('should fail for a missing explicit path', () => {
        expect(() => resolveConfig('missing.json', cwd)).toThrow(ConfigError);
    });

    it('should fail for a file that is not JSON', () => {
        writeFileSync(join(cwd, 'cmdex.json'), '{ not json');
        expect(() => resolveConfig(undefined, cwd)).toThrow(ConfigError);
    });

    it('should find cmdex.json in the working directory first', () => {
        writeFileSync(join(cwd, 'cmdex.json'), JSON.stringify({ learn: { maxExamples: 3 } }));
        writeFileSync(join(dataDir, 'config.json'), JSON.stringify({ learn: { maxExamples: 7 } }));

        expect(resolveConfig(undefined, cwd).learn.maxExamples).toBe(3);
    });

    it('should fall back to config.json in the data directory', () => {
        writeFileSync(join(dataDir, 'config.json'), JSON.stringify({ learn: { maxExamples: 7 } }));

        expect(resolveConfig(undefined, cwd).learn.maxExamples).toBe(7);
    });
});
