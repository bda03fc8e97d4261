import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { EntityInput, RelationshipInput } from '../types/index.js';
import { SyncError, errorMessage } from '../utils/errors.js';

const optionalReference = z.string().min(1).nullable().optional();

const EntitySchema = z.object({
    id: z.string().min(1),
    entity_type: z.string().min(1),
    display_name: z.string().nullable().optional(),
    attributes: z.unknown(),
    source_file_id: optionalReference,
    project_id: optionalReference,
});

const RelationshipSchema = z.object({
    id: z.string().min(1),
    relationship_type: z.string().min(1),
    source_entity_id: z.string().min(1),
    target_entity_id: z.string().min(1),
    attributes: z.unknown(),
    source_file_id: optionalReference,
    project_id: optionalReference,
});

function duplicateIds(records: ReadonlyArray<{ id: string }>): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const { id } of records) {
        if (seen.has(id)) duplicates.add(id);
        seen.add(id);
    }
    return Array.from(duplicates);
}

/**
 * JSON file of records for the `load` command.
 */
export const RecordFileSchema = z
    .object({
        entities: z.array(EntitySchema).default([]),
        relationships: z.array(RelationshipSchema).default([]),
    })
    .superRefine((file, ctx) => {
        for (const [key, records] of [
            ['entities', file.entities],
            ['relationships', file.relationships],
        ] as const) {
            for (const id of duplicateIds(records)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `duplicate id "${id}"` });
            }
        }
    });

export interface RecordFile {
    entities: EntityInput[];
    relationships: RelationshipInput[];
}

/**
 * Validate parsed JSON as a record file.
 */
export function parseRecordFile(raw: unknown, source = 'record file'): RecordFile {
    const result = RecordFileSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new SyncError('INVALID_RECORD_FILE', `Invalid ${source}: ${issues.join('; ')}`, { details: { issues } });
    }
    return result.data;
}

export function readRecordFile(path: string): RecordFile {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new SyncError('INVALID_RECORD_FILE', `Cannot read ${path}: ${errorMessage(error)}`, { cause: error });
    }
    return parseRecordFile(raw, path);
}
