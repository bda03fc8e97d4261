import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SyncVerifier, type VerificationSource } from '../sync/verifier.js';
import { BatchExporter } from '../sync/exporter.js';
import { MemoryGraphStore } from '../graph/memory-store.js';
import { buildNodeUpsert, buildRelationshipUpsert } from '../graph/cypher.js';
import type { GraphWrite } from '../graph/store.js';
import type { RelationalStore } from '../storage/database.js';
import { SyncError } from '../utils/errors.js';
import { createScenarioStore } from './fixtures.js';

describe('SyncVerifier', () => {
    let store: RelationalStore;
    let graph: MemoryGraphStore;
    let verifier: SyncVerifier;

    beforeEach(async () => {
        store = createScenarioStore();
        graph = new MemoryGraphStore();
        verifier = new SyncVerifier(store, graph);
        await new BatchExporter(store, graph).export();
    });

    afterEach(() => {
        store.close();
    });

    async function tamper(write: GraphWrite): Promise<void> {
        const tx = await graph.beginTransaction();
        await tx.run(write);
        await tx.commit();
    }

    describe('countCheck', () => {
        it('should compare scope totals', async () => {
            expect(await verifier.countCheck()).toEqual({
                expectedNodes: 5,
                actualNodes: 5,
                expectedRelationships: 3,
                actualRelationships: 3,
                inSync: true,
            });
        });

        it('should report a scope that was never exported', async () => {
            store.upsertEntities([{ id: 'z1', entity_type: 'Topic', project_id: 'p9' }]);

            expect(await verifier.countCheck({ projectId: 'p9' })).toEqual({
                expectedNodes: 1,
                actualNodes: 0,
                expectedRelationships: 0,
                actualRelationships: 0,
                inSync: false,
            });
        });
    });

    describe('content drift', () => {
        it('should report changed and unexpected properties', async () => {
            await tamper(
                buildNodeUpsert(
                    'Person',
                    'p1',
                    { id: 'p1', entity_type: 'Person', display_name: 'Ada', age: 37, tags: ['math', 'code'], extra: true },
                    'all'
                )
            );

            const mismatches = await verifier.contentCheck({}, 20);

            expect(mismatches).toEqual([
                { kind: 'node', recordId: 'p1', mismatch: 'property', field: 'age', expected: 36, actual: 37 },
                { kind: 'node', recordId: 'p1', mismatch: 'unexpected-property', field: 'extra', actual: true },
            ]);
        });

        it('should report a property that went missing as null', async () => {
            await tamper(buildNodeUpsert('MlModel', 'm1', { id: 'm1', entity_type: 'ML-Model', display_name: 'Engine' }, 'all'));

            expect(await verifier.contentCheck({}, 20)).toEqual([
                { kind: 'node', recordId: 'm1', mismatch: 'property', field: 'params', expected: [1.5, 2, 3], actual: null },
            ]);
        });

        it('should report a node under the wrong label', async () => {
            const node = await graph.getNode('p2', 'all');
            await tamper(buildNodeUpsert('Human', 'p2', node?.properties ?? {}, 'all'));

            expect(await verifier.contentCheck({}, 20)).toEqual([
                { kind: 'node', recordId: 'p2', mismatch: 'label', expected: 'Person', actual: ['Human'] },
            ]);
        });

        it('should report reversed endpoints', async () => {
            await tamper(
                buildRelationshipUpsert({
                    type: 'COLLABORATES_WITH',
                    id: 'c1',
                    sourceId: 'p2',
                    sourceLabel: 'Person',
                    targetId: 'p1',
                    targetLabel: 'Person',
                    properties: { id: 'c1', relationship_type: 'collaborates with', since: 1840 },
                    scope: 'all',
                })
            );

            expect(await verifier.contentCheck({}, 20)).toEqual([
                { kind: 'relationship', recordId: 'c1', mismatch: 'endpoint', field: 'source', expected: 'p1', actual: 'p2' },
                { kind: 'relationship', recordId: 'c1', mismatch: 'endpoint', field: 'target', expected: 'p2', actual: 'p1' },
            ]);
        });

        it('should report a relationship whose type changed in the source', async () => {
            store.upsertRelationships([
                {
                    id: 'c1',
                    relationship_type: 'mentors',
                    source_entity_id: 'p1',
                    target_entity_id: 'p2',
                    attributes: { since: 1840 },
                },
            ]);

            expect(await verifier.contentCheck({}, 20)).toEqual([
                {
                    kind: 'relationship',
                    recordId: 'c1',
                    mismatch: 'relationship-type',
                    expected: 'MENTORS',
                    actual: 'COLLABORATES_WITH',
                },
                {
                    kind: 'relationship',
                    recordId: 'c1',
                    mismatch: 'property',
                    field: 'relationship_type',
                    expected: 'mentors',
                    actual: 'collaborates with',
                },
            ]);
        });

        it('should report every record as missing from an empty graph', async () => {
            const report = await new SyncVerifier(store, new MemoryGraphStore()).verify({}, { sampleSize: 20 });

            expect(report.inSync).toBe(false);
            expect(report.counts.actualNodes).toBe(0);
            expect(report.mismatches).toHaveLength(8);
            expect(report.mismatches.every((m) => m.mismatch === 'missing')).toBe(true);
            expect(report.mismatches.filter((m) => m.kind === 'node').map((m) => m.recordId).sort()).toEqual([
                'm1',
                'p1',
                'p2',
                'r1',
                'r2',
            ]);
        });

        it('should report records whose attributes cannot be encoded', async () => {
            const source: VerificationSource = {
                countEntities: (scope) => store.countEntities(scope),
                countRelationships: (scope) => store.countRelationships(scope),
                sampleEntities: (scope, size) =>
                    store
                        .sampleEntities(scope, size)
                        .map((entity) => (entity.id === 'p2' ? { ...entity, attributes: { age: Number.NaN } } : entity)),
                sampleRelationships: (scope, size) => store.sampleRelationships(scope, size),
            };

            expect(await new SyncVerifier(source, graph).contentCheck({}, 20)).toEqual([
                {
                    kind: 'node',
                    recordId: 'p2',
                    mismatch: 'unencodable',
                    expected: 'Non-finite number NaN has no JSON form at $.age',
                },
            ]);
        });
    });

    describe('verify', () => {
        it('should combine counts and sampled content', async () => {
            const report = await verifier.verify({}, { sampleSize: 2 });

            expect(report.scope).toBe('all');
            expect(report.inSync).toBe(true);
            expect(report.sampled).toEqual({ nodes: 2, relationships: 2 });
            expect(report.mismatches).toEqual([]);
            expect(Number.isNaN(Date.parse(report.checkedAt))).toBe(false);
        });

        it('should skip sampling when the sample size is zero', async () => {
            await tamper(buildNodeUpsert('Person', 'p1', { id: 'p1' }, 'all'));

            const report = await verifier.verify({}, { sampleSize: 0 });

            expect(report.sampled).toEqual({ nodes: 0, relationships: 0 });
            expect(report.inSync).toBe(true);
        });

        it('should reject a negative sample size', async () => {
            await expect(verifier.verify({}, { sampleSize: -1 })).rejects.toThrow(
                new SyncError('INVALID_OPTION', 'sampleSize must be a non-negative integer, got -1')
            );
        });

        it('should not write to either store', async () => {
            await verifier.verify();

            expect(graph.size()).toEqual({ nodes: 5, relationships: 3 });
            expect(store.getSyncRuns()).toHaveLength(1);
        });
    });
});
