import { RelationalStore } from '../storage/database.js';
import { MemoryGraphStore } from '../graph/memory-store.js';
import type {
    GraphCounts,
    GraphStore,
    GraphTransaction,
    GraphWrite,
    StoredNode,
    StoredRelationship,
    WriteResult,
} from '../graph/store.js';
import type { ClearResult, EntityInput, RelationshipInput } from '../types/index.js';

export const SCENARIO_ENTITIES: EntityInput[] = [
    { id: 'p1', entity_type: 'Person', display_name: 'Ada', attributes: { age: 36, tags: ['math', 'code'] } },
    { id: 'p2', entity_type: 'person', display_name: 'Grace', attributes: { age: 45 } },
    {
        id: 'r1',
        entity_type: 'research_paper',
        display_name: 'Notes',
        attributes: { year: 1843, venue: { name: 'Journal', issue: 3 } },
    },
    { id: 'r2', entity_type: 'Research-Paper', display_name: 'Compilers', attributes: { year: 1952 } },
    { id: 'm1', entity_type: 'ML-Model', display_name: 'Engine', attributes: { params: [1.5, 2, 3] } },
];

export const SCENARIO_RELATIONSHIPS: RelationshipInput[] = [
    { id: 'w1', relationship_type: 'works-at', source_entity_id: 'p1', target_entity_id: 'm1' },
    { id: 'w2', relationship_type: 'WORKS_AT', source_entity_id: 'p2', target_entity_id: 'm1' },
    {
        id: 'c1',
        relationship_type: 'collaborates with',
        source_entity_id: 'p1',
        target_entity_id: 'p2',
        attributes: { since: 1840 },
    },
];

/**
 * In-memory relational store with the five-entity scenario loaded.
 */
export function createScenarioStore(): RelationalStore {
    const store = new RelationalStore(':memory:');
    store.upsertEntities(SCENARIO_ENTITIES);
    store.upsertRelationships(SCENARIO_RELATIONSHIPS);
    return store;
}

export type WriteInterceptor = (write: GraphWrite) => Promise<void> | void;

/**
 * Memory graph store that records what happens to it and lets a test
 * delay or fail individual writes.
 */
export class FaultInjectingGraphStore implements GraphStore {
    readonly kind = 'fault-injecting';
    readonly events: string[] = [];
    beforeWrite: WriteInterceptor | null = null;

    constructor(readonly inner: MemoryGraphStore = new MemoryGraphStore()) {}

    async ensureIndex(label: string): Promise<string> {
        this.events.push(`index:${label}`);
        return this.inner.ensureIndex(label);
    }

    async beginTransaction(): Promise<GraphTransaction> {
        const tx = await this.inner.beginTransaction();
        return {
            run: async (write: GraphWrite): Promise<WriteResult> => {
                await this.beforeWrite?.(write);
                this.events.push(`${write.kind}:${write.id}`);
                return tx.run(write);
            },
            commit: async () => {
                this.events.push('commit');
                await tx.commit();
            },
            rollback: async () => {
                this.events.push('rollback');
                await tx.rollback();
            },
        };
    }

    clearScope(scope: string): Promise<ClearResult> {
        this.events.push(`clear:${scope}`);
        return this.inner.clearScope(scope);
    }

    countScope(scope: string): Promise<GraphCounts> {
        return this.inner.countScope(scope);
    }

    getNode(id: string, scope: string): Promise<StoredNode | null> {
        return this.inner.getNode(id, scope);
    }

    getRelationship(id: string, scope: string): Promise<StoredRelationship | null> {
        return this.inner.getRelationship(id, scope);
    }

    listLabels(scope: string): Promise<string[]> {
        return this.inner.listLabels(scope);
    }

    listRelationshipTypes(scope: string): Promise<string[]> {
        return this.inner.listRelationshipTypes(scope);
    }

    close(): Promise<void> {
        return this.inner.close();
    }
}
