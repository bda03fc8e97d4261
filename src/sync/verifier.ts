import type {
    ContentMismatch,
    CountCheck,
    EntityRecord,
    RecordKind,
    RelationshipWithEndpoints,
    SyncScope,
    VerificationReport,
    VerifyOptions,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { RelationalStore } from '../storage/database.js';
import type { GraphProperties, GraphStore } from '../graph/store.js';
import { canonicallyEqual } from '../codec/semi-structured.js';
import { projectEntity, projectRelationship, type NodeProjection, type RelationshipProjection } from './projection.js';
import { scopeKey } from './scope.js';
import { EncodingError, SyncError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export type VerificationSource = Pick<
    RelationalStore,
    'countEntities' | 'countRelationships' | 'sampleEntities' | 'sampleRelationships'
>;

/**
 * Property-level differences between what the exporter would write and
 * what the graph holds.
 */
function compareProperties(
    kind: RecordKind,
    recordId: string,
    expected: GraphProperties,
    actual: Record<string, unknown>
): ContentMismatch[] {
    const mismatches: ContentMismatch[] = [];

    for (const [field, value] of Object.entries(expected)) {
        const stored = actual[field];
        if (!canonicallyEqual(value, stored)) {
            mismatches.push({ kind, recordId, mismatch: 'property', field, expected: value, actual: stored ?? null });
        }
    }

    for (const field of Object.keys(actual).sort()) {
        if (!(field in expected)) {
            mismatches.push({ kind, recordId, mismatch: 'unexpected-property', field, actual: actual[field] });
        }
    }

    return mismatches;
}

function unencodable(kind: RecordKind, recordId: string, error: EncodingError): ContentMismatch {
    return { kind, recordId, mismatch: 'unencodable', expected: error.message };
}

/**
 * Read-only comparison of a scope across the relational and graph stores.
 * Drift is reported as data; only store failures throw.
 */
export class SyncVerifier {
    constructor(
        private readonly source: VerificationSource,
        private readonly graph: GraphStore
    ) {}

    async countCheck(scope: SyncScope = {}): Promise<CountCheck> {
        const expectedNodes = this.source.countEntities(scope);
        const expectedRelationships = this.source.countRelationships(scope);
        const actual = await this.graph.countScope(scopeKey(scope));

        return {
            expectedNodes,
            actualNodes: actual.nodes,
            expectedRelationships,
            actualRelationships: actual.relationships,
            inSync: expectedNodes === actual.nodes && expectedRelationships === actual.relationships,
        };
    }

    /**
     * Compare a random sample of up to `sampleSize` entities and as many
     * relationships against the graph.
     */
    async contentCheck(scope: SyncScope = {}, sampleSize = DEFAULT_CONFIG.verify.sampleSize): Promise<ContentMismatch[]> {
        const { mismatches } = await this.sampleAndCompare(scope, sampleSize);
        return mismatches;
    }

    async verify(scope: SyncScope = {}, options: VerifyOptions = {}): Promise<VerificationReport> {
        const sampleSize = options.sampleSize ?? DEFAULT_CONFIG.verify.sampleSize;
        const key = scopeKey(scope);

        const counts = await this.countCheck(scope);
        const { sampled, mismatches } = await this.sampleAndCompare(scope, sampleSize);
        const inSync = counts.inSync && mismatches.length === 0;

        logger.info(
            { scope: key, inSync, counts, sampled, mismatches: mismatches.length },
            inSync ? 'Scope is in sync' : 'Scope has drifted'
        );

        return {
            scope: key,
            checkedAt: new Date().toISOString(),
            counts,
            sampled,
            mismatches,
            inSync,
        };
    }

    private async sampleAndCompare(
        scope: SyncScope,
        sampleSize: number
    ): Promise<{ sampled: { nodes: number; relationships: number }; mismatches: ContentMismatch[] }> {
        if (!Number.isInteger(sampleSize) || sampleSize < 0) {
            throw new SyncError('INVALID_OPTION', `sampleSize must be a non-negative integer, got ${sampleSize}`, {
                details: { sampleSize },
            });
        }

        const key = scopeKey(scope);
        const entities = sampleSize > 0 ? this.source.sampleEntities(scope, sampleSize) : [];
        const relationships = sampleSize > 0 ? this.source.sampleRelationships(scope, sampleSize) : [];

        const mismatches: ContentMismatch[] = [];
        for (const entity of entities) {
            mismatches.push(...(await this.checkEntity(entity, key)));
        }
        for (const relationship of relationships) {
            mismatches.push(...(await this.checkRelationship(relationship, key)));
        }

        return { sampled: { nodes: entities.length, relationships: relationships.length }, mismatches };
    }

    private async checkEntity(entity: EntityRecord, key: string): Promise<ContentMismatch[]> {
        const node = await this.graph.getNode(entity.id, key);
        if (!node) {
            return [{ kind: 'node', recordId: entity.id, mismatch: 'missing' }];
        }

        let projection: NodeProjection;
        try {
            projection = projectEntity(entity);
        } catch (error) {
            if (error instanceof EncodingError) return [unencodable('node', entity.id, error)];
            throw error;
        }

        const mismatches: ContentMismatch[] = [];
        if (!node.labels.includes(projection.label)) {
            mismatches.push({
                kind: 'node',
                recordId: entity.id,
                mismatch: 'label',
                expected: projection.label,
                actual: node.labels,
            });
        }
        mismatches.push(...compareProperties('node', entity.id, projection.properties, node.properties));
        return mismatches;
    }

    private async checkRelationship(relationship: RelationshipWithEndpoints, key: string): Promise<ContentMismatch[]> {
        const stored = await this.graph.getRelationship(relationship.id, key);
        if (!stored) {
            return [{ kind: 'relationship', recordId: relationship.id, mismatch: 'missing' }];
        }

        let projection: RelationshipProjection;
        try {
            projection = projectRelationship(relationship);
        } catch (error) {
            if (error instanceof EncodingError) return [unencodable('relationship', relationship.id, error)];
            throw error;
        }

        const mismatches: ContentMismatch[] = [];
        if (stored.type !== projection.type) {
            mismatches.push({
                kind: 'relationship',
                recordId: relationship.id,
                mismatch: 'relationship-type',
                expected: projection.type,
                actual: stored.type,
            });
        }
        if (stored.sourceId !== relationship.source_entity_id) {
            mismatches.push({
                kind: 'relationship',
                recordId: relationship.id,
                mismatch: 'endpoint',
                field: 'source',
                expected: relationship.source_entity_id,
                actual: stored.sourceId,
            });
        }
        if (stored.targetId !== relationship.target_entity_id) {
            mismatches.push({
                kind: 'relationship',
                recordId: relationship.id,
                mismatch: 'endpoint',
                field: 'target',
                expected: relationship.target_entity_id,
                actual: stored.targetId,
            });
        }
        mismatches.push(...compareProperties('relationship', relationship.id, projection.properties, stored.properties));
        return mismatches;
    }
}
