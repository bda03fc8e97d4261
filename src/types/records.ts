/**
 * JSON-compatible value, the shape every semi-structured column holds.
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Entity row in the relational store.
 */
export interface EntityRecord {
    id: string;
    entity_type: string;
    display_name: string | null;
    attributes: JsonValue;
    source_file_id: string | null;
    project_id: string | null;
}

/**
 * Relationship row in the relational store. Endpoints are plain ids with no
 * foreign-key constraint, so they may dangle.
 */
export interface RelationshipRecord {
    id: string;
    relationship_type: string;
    source_entity_id: string;
    target_entity_id: string;
    attributes: JsonValue;
    source_file_id: string | null;
    project_id: string | null;
}

/**
 * Input shape for writes: attributes may be any encodable value and the
 * nullable back-references may be left out.
 */
export interface EntityInput {
    id: string;
    entity_type: string;
    display_name?: string | null;
    attributes?: unknown;
    source_file_id?: string | null;
    project_id?: string | null;
}

export interface RelationshipInput {
    id: string;
    relationship_type: string;
    source_entity_id: string;
    target_entity_id: string;
    attributes?: unknown;
    source_file_id?: string | null;
    project_id?: string | null;
}

/**
 * Relationship row joined with its endpoints' entity types. A null type
 * means the endpoint entity does not exist in the relational store.
 */
export interface RelationshipWithEndpoints extends RelationshipRecord {
    source_entity_type: string | null;
    target_entity_type: string | null;
}
