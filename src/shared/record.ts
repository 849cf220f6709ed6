/**
 * @file record.ts
 * @module shared/record
 * @created 2026-09-04
 * @license MIT
 *
 * @fileoverview Validity gate and JSON schema for structured records.
 */

import { z } from 'zod';

import { UnlearnableError } from './errors.js';
import type { StructuredRecord } from './types.js';

/**
 * Schema for records exchanged as JSON (import-json / export-json).
 * `category` and `platform` default to "common".
 */
export const recordSchema = z.object({
    name: z.string(),
    description: z.string(),
    category: z.string().default('common'),
    platform: z.string().default('common'),
    lang: z.string().min(1),
    examples: z.array(
        z.object({
            description: z.string(),
            code: z.string(),
        })
    ),
    content: z.string().default(''),
});

export const recordListSchema = z.array(recordSchema);

/**
 * Check whether a record may be persisted and indexed.
 *
 * @returns The reason the record is rejected, or null if it is valid
 */
export function findRecordDefect(record: StructuredRecord): string | null {
    if (!record.name.trim()) {
        return 'missing name';
    }
    if (!record.description.trim()) {
        return 'missing description';
    }
    if (record.examples.length === 0) {
        return 'no examples';
    }
    return null;
}

/**
 * Throw if a record must not be persisted.
 *
 * @throws UnlearnableError naming the defect
 */
export function assertLearnable(record: StructuredRecord): StructuredRecord {
    const defect = findRecordDefect(record);
    if (defect) {
        throw new UnlearnableError(record.name || '<unnamed>', defect);
    }
    return record;
}
