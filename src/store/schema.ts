/**
 * @file schema.ts
 * @module store/schema
 * @created 2026-09-16
 * @license MIT
 *
 * @fileoverview SQL schema constants for the record database.
 */

/**
 * SQL statement to create the commands table.
 * `examples` holds a JSON array of `{ description, code }`.
 */
export const CREATE_COMMANDS_TABLE = `
CREATE TABLE IF NOT EXISTS commands (
        name TEXT NOT NULL,
        lang TEXT NOT NULL,
        description TEXT NOT NULL,
        category TEXT NOT NULL,
        platform TEXT NOT NULL,
        examples TEXT NOT NULL,
        content TEXT NOT NULL DEFAULT '',
        updated_at TEXT NOT NULL,
        PRIMARY KEY (lang, name)
)`;

/**
 * SQL statement to create the key/value metadata table.
 */
export const CREATE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
)`;

/**
 * Index for name lookups across languages.
 */
export const CREATE_NAME_INDEX = 'CREATE INDEX IF NOT EXISTS idx_commands_name ON commands(name)';

/**
 * All schema statements in order of execution.
 */
export const SCHEMA_STATEMENTS = [CREATE_COMMANDS_TABLE, CREATE_METADATA_TABLE, CREATE_NAME_INDEX];

/**
 * Insert a record, replacing the one with the same `(lang, name)`.
 */
export const UPSERT_COMMAND = `
INSERT INTO commands (name, lang, description, category, platform, examples, content, updated_at)
VALUES (@name, @lang, @description, @category, @platform, @examples, @content, @updatedAt)
ON CONFLICT(lang, name) DO UPDATE SET
        description = excluded.description,
        category = excluded.category,
        platform = excluded.platform,
        examples = excluded.examples,
        content = excluded.content,
        updated_at = excluded.updated_at`;

export const SELECT_COMMAND = `
SELECT name, lang, description, category, platform, examples, content
FROM commands WHERE name = ? AND lang = ?`;

export const SELECT_ALL_COMMANDS = `
SELECT name, lang, description, category, platform, examples, content
FROM commands ORDER BY lang, name`;

export const SELECT_COMMANDS_BY_LANG = `
SELECT name, lang, description, category, platform, examples, content
FROM commands WHERE lang = ? ORDER BY name`;

export const DELETE_COMMAND = 'DELETE FROM commands WHERE name = ? AND lang = ?';

/**
 * Remove every record and the metadata.
 */
export const CLEAR_ALL = 'DELETE FROM commands; DELETE FROM metadata;';

export const COUNT_COMMANDS = 'SELECT COUNT(*) AS count FROM commands';

export const COUNT_COMMANDS_BY_LANG = 'SELECT COUNT(*) AS count FROM commands WHERE lang = ?';

export const SELECT_LANGUAGES = 'SELECT DISTINCT lang FROM commands ORDER BY lang';

export const UPSERT_METADATA = `
INSERT INTO metadata (key, value) VALUES (?, ?)
ON CONFLICT(key) DO UPDATE SET value = excluded.value`;

export const SELECT_METADATA = 'SELECT key, value FROM metadata';
