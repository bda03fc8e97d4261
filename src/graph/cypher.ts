/**
 * Parameterized Cypher for every statement the sync core issues.
 * Labels and relationship types are always backtick-escaped; values only
 * ever travel as parameters.
 */

import {
    NODE_MARKER_LABEL,
    SCOPE_PROPERTY,
    type GraphProperties,
    type NodeUpsert,
    type RelationshipUpsert,
} from './store.js';

export type CypherParams = Record<string, unknown>;

export interface CypherQuery {
    cypher: string;
    params: CypherParams;
}

// ─── Escaping ─────────────────────────────────────────────

/**
 * Escape a label, relationship type or index name for Cypher.
 */
export function escapeIdentifier(name: string): string {
    return `\`${name.replace(/`/g, '``')}\``;
}

export function indexName(label: string): string {
    return `sync_${label}_id`;
}

// ─── Writes ───────────────────────────────────────────────

const ADD_SCOPE = `SET x.${SCOPE_PROPERTY} = CASE WHEN $scope IN scopes THEN scopes ELSE scopes + $scope END`;
const MARKER = escapeIdentifier(NODE_MARKER_LABEL);

export function buildIndexStatement(label: string): CypherQuery {
    return {
        cypher: `CREATE INDEX ${escapeIdentifier(indexName(label))} IF NOT EXISTS FOR (n:${escapeIdentifier(label)}) ON (n.id)`,
        params: {},
    };
}

/**
 * Every exported node carries the marker label; ids are unique across it.
 */
export function buildMarkerConstraint(): CypherQuery {
    return {
        cypher: `CREATE CONSTRAINT sync_node_id IF NOT EXISTS FOR (n:${MARKER}) REQUIRE n.id IS UNIQUE`,
        params: {},
    };
}

/**
 * Merge on id alone, set the canonical label and return any other labels
 * the node still carries from an earlier entity type.
 */
export function buildNodeUpsert(label: string, id: string, properties: GraphProperties, scope: string): NodeUpsert {
    const cypher = [
        `MERGE (x:${MARKER} {id: $id})`,
        `WITH x, coalesce(x.${SCOPE_PROPERTY}, []) AS scopes, [l IN labels(x) WHERE NOT l IN [$marker, $label]] AS stale`,
        'SET x = $properties',
        ADD_SCOPE,
        `SET x:${escapeIdentifier(label)}`,
        'RETURN stale',
    ].join('\n');

    return {
        kind: 'upsert-node',
        label,
        id,
        properties,
        scope,
        cypher,
        params: { id, label, marker: NODE_MARKER_LABEL, properties, scope },
    };
}

export function buildRemoveLabels(id: string, labels: readonly string[]): CypherQuery {
    return {
        cypher: `MATCH (x:${MARKER} {id: $id}) REMOVE x${labels.map((label) => `:${escapeIdentifier(label)}`).join('')}`,
        params: { id },
    };
}

export interface RelationshipUpsertInput {
    type: string;
    id: string;
    sourceId: string;
    sourceLabel: string;
    targetId: string;
    targetLabel: string;
    properties: GraphProperties;
    scope: string;
}

/**
 * Match both endpoints by id and label, drop an edge with the same id whose
 * type or endpoints differ, then merge the edge.
 */
export function buildRelationshipUpsert(input: RelationshipUpsertInput): RelationshipUpsert {
    // No endpoint match means no rows reach MERGE and count(x) is 0
    const cypher = [
        `MATCH (s:${MARKER} {id: $sourceId}) WHERE s:${escapeIdentifier(input.sourceLabel)}`,
        `MATCH (t:${MARKER} {id: $targetId}) WHERE t:${escapeIdentifier(input.targetLabel)}`,
        'OPTIONAL MATCH ()-[old {id: $id}]->()',
        'WITH s, t, [r IN collect(old) WHERE type(r) <> $type OR startNode(r) <> s OR endNode(r) <> t] AS moved',
        'FOREACH (r IN moved | DELETE r)',
        `MERGE (s)-[x:${escapeIdentifier(input.type)} {id: $id}]->(t)`,
        `WITH x, coalesce(x.${SCOPE_PROPERTY}, []) AS scopes`,
        'SET x = $properties',
        ADD_SCOPE,
        'RETURN count(x) AS matched',
    ].join('\n');

    return {
        kind: 'upsert-relationship',
        ...input,
        cypher,
        params: {
            id: input.id,
            type: input.type,
            sourceId: input.sourceId,
            targetId: input.targetId,
            properties: input.properties,
            scope: input.scope,
        },
    };
}

/**
 * Remove a scope's tag from everything carrying it; nodes and relationships
 * left without any scope are deleted.
 */
export function buildClearScope(scope: string): CypherQuery[] {
    const params = { scope };
    return [
        {
            cypher: `MATCH ()-[r]->() WHERE $scope IN r.${SCOPE_PROPERTY} AND size(r.${SCOPE_PROPERTY}) = 1 DELETE r`,
            params,
        },
        {
            cypher: `MATCH ()-[r]->() WHERE $scope IN r.${SCOPE_PROPERTY} SET r.${SCOPE_PROPERTY} = [s IN r.${SCOPE_PROPERTY} WHERE s <> $scope]`,
            params,
        },
        {
            cypher: `MATCH (n:${MARKER}) WHERE $scope IN n.${SCOPE_PROPERTY} AND size(n.${SCOPE_PROPERTY}) = 1 DETACH DELETE n`,
            params,
        },
        {
            cypher: `MATCH (n:${MARKER}) WHERE $scope IN n.${SCOPE_PROPERTY} SET n.${SCOPE_PROPERTY} = [s IN n.${SCOPE_PROPERTY} WHERE s <> $scope]`,
            params,
        },
    ];
}

// ─── Reads ────────────────────────────────────────────────

export function buildCountNodes(scope: string): CypherQuery {
    return { cypher: `MATCH (n:${MARKER}) WHERE $scope IN n.${SCOPE_PROPERTY} RETURN count(n) AS count`, params: { scope } };
}

export function buildCountRelationships(scope: string): CypherQuery {
    return {
        cypher: `MATCH ()-[r]->() WHERE $scope IN r.${SCOPE_PROPERTY} RETURN count(r) AS count`,
        params: { scope },
    };
}

export function buildGetNode(id: string, scope: string): CypherQuery {
    return {
        cypher: [
            `MATCH (n:${MARKER} {id: $id}) WHERE $scope IN n.${SCOPE_PROPERTY}`,
            'RETURN [l IN labels(n) WHERE l <> $marker] AS labels, properties(n) AS properties LIMIT 1',
        ].join('\n'),
        params: { id, scope, marker: NODE_MARKER_LABEL },
    };
}

export function buildGetRelationship(id: string, scope: string): CypherQuery {
    return {
        cypher: [
            `MATCH (s)-[r {id: $id}]->(t) WHERE $scope IN r.${SCOPE_PROPERTY}`,
            'RETURN type(r) AS type, s.id AS sourceId, t.id AS targetId, properties(r) AS properties LIMIT 1',
        ].join('\n'),
        params: { id, scope },
    };
}

export function buildListLabels(scope: string): CypherQuery {
    return {
        cypher: [
            `MATCH (n:${MARKER}) WHERE $scope IN n.${SCOPE_PROPERTY}`,
            'UNWIND labels(n) AS label',
            'WITH label WHERE label <> $marker',
            'RETURN DISTINCT label ORDER BY label',
        ].join('\n'),
        params: { scope, marker: NODE_MARKER_LABEL },
    };
}

export function buildListRelationshipTypes(scope: string): CypherQuery {
    return {
        cypher: `MATCH ()-[r]->() WHERE $scope IN r.${SCOPE_PROPERTY} RETURN DISTINCT type(r) AS type ORDER BY type`,
        params: { scope },
    };
}
