import type { EntityRecord, JsonValue, RelationshipRecord } from '../types/index.js';
import { canonicalJson, encode } from '../codec/semi-structured.js';
import { normalizeLabel, normalizeRelationshipType } from '../normalize/identifiers.js';
import { SCOPE_PROPERTY, type GraphProperties, type GraphValue } from '../graph/store.js';
import { EncodingError } from '../utils/errors.js';

/**
 * Properties the sync core owns. Attributes with these keys are stored
 * under `attr_<key>`; an attribute already named `attr_<key>` alongside
 * one is an EncodingError.
 */
export const RESERVED_PROPERTIES: ReadonlySet<string> = new Set([
    'id',
    'entity_type',
    'relationship_type',
    'display_name',
    'source_file_id',
    'project_id',
    SCOPE_PROPERTY,
]);

export const ATTRIBUTE_PREFIX = 'attr_';

export interface NodeProjection {
    label: string;
    properties: GraphProperties;
}

export interface RelationshipProjection {
    type: string;
    properties: GraphProperties;
}

function isStringArray(values: JsonValue[]): values is string[] {
    return values.every((v) => typeof v === 'string');
}

function isNumberArray(values: JsonValue[]): values is number[] {
    return values.every((v) => typeof v === 'number');
}

function isBooleanArray(values: JsonValue[]): values is boolean[] {
    return values.every((v) => typeof v === 'boolean');
}

/**
 * Graph form of an attribute value. Scalars and homogeneous scalar lists
 * are stored natively; maps and mixed or nested lists become canonical JSON
 * text. Null is omitted.
 */
export function toGraphValue(value: JsonValue): GraphValue | undefined {
    if (value === null) return undefined;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value)) {
        if (isStringArray(value)) return value;
        if (isNumberArray(value)) return value;
        if (isBooleanArray(value)) return value;
    }
    return canonicalJson(value);
}

function assignAttributes(target: GraphProperties, attributes: unknown): void {
    const encoded = encode(attributes);
    if (encoded === null) return;

    if (typeof encoded !== 'object' || Array.isArray(encoded)) {
        // Non-map payloads are kept whole
        const value = toGraphValue(encoded);
        if (value !== undefined) target['attributes'] = value;
        return;
    }

    const written = new Set<string>();
    for (const [key, item] of Object.entries(encoded)) {
        const value = toGraphValue(item);
        if (value === undefined) continue;
        const name = RESERVED_PROPERTIES.has(key) ? `${ATTRIBUTE_PREFIX}${key}` : key;
        if (written.has(name)) {
            throw new EncodingError(`Attribute property "${name}" is set by more than one attribute`, `$.${key}`);
        }
        written.add(name);
        target[name] = value;
    }
}

function assignOptional(target: GraphProperties, key: string, value: string | null): void {
    if (value !== null) target[key] = value;
}

/**
 * Node label and properties for an entity record. Throws EncodingError
 * when the attributes have no JSON form.
 */
export function projectEntity(entity: EntityRecord): NodeProjection {
    const properties: GraphProperties = {
        id: entity.id,
        entity_type: entity.entity_type,
    };
    assignOptional(properties, 'display_name', entity.display_name);
    assignOptional(properties, 'source_file_id', entity.source_file_id);
    assignOptional(properties, 'project_id', entity.project_id);
    assignAttributes(properties, entity.attributes);

    return { label: normalizeLabel(entity.entity_type), properties };
}

/**
 * Relationship type and properties for a relationship record.
 */
export function projectRelationship(relationship: RelationshipRecord): RelationshipProjection {
    const properties: GraphProperties = {
        id: relationship.id,
        relationship_type: relationship.relationship_type,
    };
    assignOptional(properties, 'source_file_id', relationship.source_file_id);
    assignOptional(properties, 'project_id', relationship.project_id);
    assignAttributes(properties, relationship.attributes);

    return { type: normalizeRelationshipType(relationship.relationship_type), properties };
}
