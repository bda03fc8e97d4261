import type { ClearResult } from '../types/index.js';
import type { CypherParams } from './cypher.js';

/** Property holding the scope keys a node or relationship was exported under. */
export const SCOPE_PROPERTY = 'sync_scopes';

/** Label every exported node carries next to its canonical label. Never a normalized label. */
export const NODE_MARKER_LABEL = '_SyncNode';

export type GraphScalar = string | number | boolean;
export type GraphValue = GraphScalar | string[] | number[] | boolean[];
export type GraphProperties = Record<string, GraphValue>;

/**
 * Idempotent node write keyed on id. A node exported earlier under another
 * label is relabeled.
 */
export interface NodeUpsert {
    kind: 'upsert-node';
    label: string;
    id: string;
    properties: GraphProperties;
    scope: string;
    cypher: string;
    params: CypherParams;
}

/**
 * Idempotent relationship write keyed on id. An edge with the same id but a
 * different type or different endpoints is replaced. Writes nothing when
 * either endpoint node is absent or carries another label.
 */
export interface RelationshipUpsert {
    kind: 'upsert-relationship';
    type: string;
    id: string;
    sourceId: string;
    sourceLabel: string;
    targetId: string;
    targetLabel: string;
    properties: GraphProperties;
    scope: string;
    cypher: string;
    params: CypherParams;
}

export type GraphWrite = NodeUpsert | RelationshipUpsert;

export interface WriteResult {
    /** False when a relationship's endpoints could not be matched. */
    matched: boolean;
    created: boolean;
}

export interface GraphTransaction {
    run(write: GraphWrite): Promise<WriteResult>;
    commit(): Promise<void>;
    rollback(): Promise<void>;
}

export interface StoredNode {
    id: string;
    labels: string[];
    properties: Record<string, unknown>;
    scopes: string[];
}

export interface StoredRelationship {
    id: string;
    type: string;
    sourceId: string;
    targetId: string;
    properties: Record<string, unknown>;
    scopes: string[];
}

export interface GraphCounts {
    nodes: number;
    relationships: number;
}

/**
 * Labeled property graph the exporter writes to and the verifier reads from.
 * Every call is bounded by the store's query timeout.
 */
export interface GraphStore {
    readonly kind: string;
    ensureIndex(label: string): Promise<string>;
    beginTransaction(): Promise<GraphTransaction>;
    clearScope(scope: string): Promise<ClearResult>;
    countScope(scope: string): Promise<GraphCounts>;
    getNode(id: string, scope: string): Promise<StoredNode | null>;
    getRelationship(id: string, scope: string): Promise<StoredRelationship | null>;
    listLabels(scope: string): Promise<string[]>;
    listRelationshipTypes(scope: string): Promise<string[]>;
    close(): Promise<void>;
}
