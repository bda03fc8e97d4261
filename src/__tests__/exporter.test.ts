import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { BatchExporter, type RecordSource } from '../sync/exporter.js';
import { SyncVerifier } from '../sync/verifier.js';
import { InProcessScopeLock } from '../sync/lock.js';
import type { RelationalStore } from '../storage/database.js';
import { ConnectivityError, ExportAbortedError, LockTimeoutError, SyncError } from '../utils/errors.js';
import { createScenarioStore, FaultInjectingGraphStore } from './fixtures.js';

describe('BatchExporter', () => {
    let store: RelationalStore;
    let graph: FaultInjectingGraphStore;
    let exporter: BatchExporter;

    beforeEach(() => {
        store = createScenarioStore();
        graph = new FaultInjectingGraphStore();
        exporter = new BatchExporter(store, graph);
    });

    afterEach(() => {
        store.close();
    });

    describe('end-to-end', () => {
        it('should export mixed naming conventions into canonical labels and types', async () => {
            const run = await exporter.export();

            expect(run.status).toBe('completed');
            expect(run.scope).toBe('all');
            expect(run.nodes).toEqual({ attempted: 5, succeeded: 5, failed: 0 });
            expect(run.relationships).toEqual({ attempted: 3, succeeded: 3, failed: 0 });
            expect(run.labels).toEqual(['MlModel', 'Person', 'ResearchPaper']);
            expect(run.relationshipTypes).toEqual(['COLLABORATES_WITH', 'WORKS_AT']);
            expect(run.failures).toEqual([]);
            expect(run.failedBatches).toEqual([]);
            expect(run.haltedAt).toBeNull();
            expect(run.cancelled).toBe(false);

            expect(await graph.listLabels('all')).toEqual(['MlModel', 'Person', 'ResearchPaper']);
            expect(await graph.listRelationshipTypes('all')).toEqual(['COLLABORATES_WITH', 'WORKS_AT']);
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
        });

        it('should pass verification afterwards with a full sample', async () => {
            await exporter.export();
            const report = await new SyncVerifier(store, graph).verify({}, { sampleSize: 20 });

            expect(report.inSync).toBe(true);
            expect(report.counts).toEqual({
                expectedNodes: 5,
                actualNodes: 5,
                expectedRelationships: 3,
                actualRelationships: 3,
                inSync: true,
            });
            expect(report.sampled).toEqual({ nodes: 5, relationships: 3 });
            expect(report.mismatches).toEqual([]);
        });

        it('should project attributes onto node properties', async () => {
            await exporter.export();

            expect(await graph.getNode('r1', 'all')).toEqual({
                id: 'r1',
                labels: ['ResearchPaper'],
                properties: {
                    id: 'r1',
                    entity_type: 'research_paper',
                    display_name: 'Notes',
                    year: 1843,
                    venue: '{"issue":3,"name":"Journal"}',
                },
                scopes: ['all'],
            });
            expect(await graph.getRelationship('c1', 'all')).toEqual({
                id: 'c1',
                type: 'COLLABORATES_WITH',
                sourceId: 'p1',
                targetId: 'p2',
                properties: { id: 'c1', relationship_type: 'collaborates with', since: 1840 },
                scopes: ['all'],
            });
        });
    });

    describe('ordering', () => {
        it('should create every index before the first node write', async () => {
            const run = await exporter.export();

            expect(run.indexes).toEqual(['sync_MlModel_id', 'sync_Person_id', 'sync_ResearchPaper_id']);
            expect(graph.events.slice(0, 3)).toEqual(['index:MlModel', 'index:Person', 'index:ResearchPaper']);
        });

        it('should write relationships only after all nodes', async () => {
            await exporter.export({}, { labelConcurrency: 3, batchSize: 1 });

            const lastNode = graph.events.map((e) => e.startsWith('upsert-node')).lastIndexOf(true);
            const firstRelationship = graph.events.findIndex((e) => e.startsWith('upsert-relationship'));
            expect(lastNode).toBeGreaterThan(-1);
            expect(firstRelationship).toBeGreaterThan(lastNode);
        });

        it('should commit one transaction per page', async () => {
            await exporter.export({}, { batchSize: 2 });

            // MlModel: 1 page, Person: 1 page, ResearchPaper: 1 page, relationships: 2 pages
            expect(graph.events.filter((e) => e === 'commit')).toHaveLength(5);
        });
    });

    describe('idempotence', () => {
        it('should converge to the same graph when run twice', async () => {
            const first = await exporter.export();
            const second = await exporter.export();

            expect(second.status).toBe('completed');
            expect(second.nodes).toEqual(first.nodes);
            expect(second.relationships).toEqual(first.relationships);
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
            expect((await graph.getNode('p1', 'all'))?.scopes).toEqual(['all']);
        });

        it('should clear the scope first when asked', async () => {
            await exporter.export();
            const run = await exporter.export({}, { clearExisting: true });

            expect(run.clearExisting).toBe(true);
            expect(run.cleared).toEqual({ nodesDeleted: 5, relationshipsDeleted: 3 });
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
            expect(graph.events.filter((e) => e === 'clear:all')).toHaveLength(1);
        });

        it('should relabel a node whose entity type changed', async () => {
            await exporter.export();
            store.upsertEntities([
                { id: 'p2', entity_type: 'organization', display_name: 'Grace', attributes: { age: 45 } },
            ]);

            const run = await exporter.export();

            expect(run.status).toBe('completed');
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
            expect((await graph.getNode('p2', 'all'))?.labels).toEqual(['Organization']);
            expect(await graph.listLabels('all')).toEqual(['MlModel', 'Organization', 'Person', 'ResearchPaper']);
            const report = await new SyncVerifier(store, graph).verify({}, { sampleSize: 20 });
            expect(report.mismatches).toEqual([]);
        });

        it('should leave source records untouched', async () => {
            await exporter.export({}, { clearExisting: true });
            expect(store.countEntities()).toBe(5);
            expect(store.countRelationships()).toBe(3);
        });
    });

    describe('per-record failures', () => {
        it('should isolate a relationship whose endpoint does not exist', async () => {
            store.upsertRelationships([
                { id: 'd1', relationship_type: 'works-at', source_entity_id: 'p1', target_entity_id: 'ghost' },
            ]);

            const run = await exporter.export();

            expect(run.status).toBe('completed_with_failures');
            expect(run.relationships).toEqual({ attempted: 4, succeeded: 3, failed: 1 });
            expect(run.failures).toEqual([
                {
                    kind: 'relationship',
                    recordId: 'd1',
                    code: 'dangling-reference',
                    reason: 'Endpoint entity ghost does not exist',
                    batchIndex: 0,
                },
            ]);
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
        });

        it('should report relationships whose endpoint node is outside the exported scope', async () => {
            store.upsertEntities([{ id: 'x1', entity_type: 'Person', source_file_id: 'f2' }]);
            store.upsertEntities([{ id: 'y1', entity_type: 'Person', source_file_id: 'f1' }]);
            store.upsertRelationships([
                { id: 'k1', relationship_type: 'knows', source_entity_id: 'y1', target_entity_id: 'x1' },
            ]);

            const run = await exporter.export({ sourceFileId: 'f1' });

            expect(run.scope).toBe('file:f1');
            expect(run.nodes).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
            expect(run.failures).toEqual([
                {
                    kind: 'relationship',
                    recordId: 'k1',
                    code: 'dangling-reference',
                    reason: 'Endpoint node y1 or x1 is not in the graph',
                    batchIndex: 0,
                },
            ]);
        });

        it('should skip records whose attributes cannot be encoded', async () => {
            const source: RecordSource = {
                getDistinctEntityTypes: (scope) => store.getDistinctEntityTypes(scope),
                getEntityPage: (scope, page, types) =>
                    store
                        .getEntityPage(scope, page, types)
                        .map((entity) => (entity.id === 'm1' ? { ...entity, attributes: { params: Number.NaN } } : entity)),
                getRelationshipPage: (scope, page) => store.getRelationshipPage(scope, page),
                recordSyncRun: (run) => store.recordSyncRun(run),
            };

            const run = await new BatchExporter(source, graph).export();

            expect(run.nodes).toEqual({ attempted: 5, succeeded: 4, failed: 1 });
            expect(run.failures[0]).toEqual({
                kind: 'node',
                recordId: 'm1',
                code: 'encoding',
                reason: 'Non-finite number NaN has no JSON form at $.params',
                batchIndex: 0,
            });
            // Both WORKS_AT relationships point at the skipped node
            expect(run.relationships).toEqual({ attempted: 3, succeeded: 1, failed: 2 });
            expect(run.labels).toEqual(['Person', 'ResearchPaper']);
        });
    });

    describe('batch failures', () => {
        it('should roll back a timed-out batch and carry on', async () => {
            graph.beforeWrite = async (write) => {
                if (write.kind === 'upsert-node' && write.id === 'p1') await sleep(200);
            };

            const run = await exporter.export({}, { batchSize: 1, batchTimeoutMs: 50 });

            expect(run.status).toBe('completed_with_failures');
            expect(run.failedBatches).toEqual([
                {
                    phase: 'nodes',
                    label: 'Person',
                    batchIndex: 0,
                    recordCount: 1,
                    reason: 'nodes batch 0 timed out after 50ms',
                    timedOut: true,
                },
            ]);
            expect(run.nodes).toEqual({ attempted: 5, succeeded: 4, failed: 1 });
            expect(await graph.getNode('p1', 'all')).toBeNull();
            expect(await graph.getNode('p2', 'all')).not.toBeNull();
            // w1 and c1 both start at p1
            expect(run.relationships).toEqual({ attempted: 3, succeeded: 1, failed: 2 });
        });

        it('should treat a server-side transaction timeout as a timed-out batch', async () => {
            graph.beforeWrite = (write) => {
                if (write.id === 'p1') {
                    throw Object.assign(new Error('Transaction timed out'), {
                        code: 'Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration',
                    });
                }
            };

            const run = await exporter.export({}, { batchSize: 1 });

            expect(run.status).toBe('completed_with_failures');
            expect(run.failedBatches).toEqual([
                {
                    phase: 'nodes',
                    label: 'Person',
                    batchIndex: 0,
                    recordCount: 1,
                    reason: 'Transaction timed out',
                    timedOut: true,
                },
            ]);
            expect(run.haltedAt).toBeNull();
            expect(run.nodes).toEqual({ attempted: 5, succeeded: 4, failed: 1 });
            expect(run.relationships).toEqual({ attempted: 3, succeeded: 1, failed: 2 });
        });

        it('should halt at the first failing batch and report where', async () => {
            graph.beforeWrite = (write) => {
                if (write.id === 'p1') throw new Error('constraint violated');
            };

            const run = await exporter.export({}, { batchSize: 1 });

            expect(run.status).toBe('halted');
            expect(run.haltedAt).toEqual({
                phase: 'nodes',
                label: 'Person',
                batchIndex: 0,
                recordCount: 1,
                reason: 'constraint violated',
                timedOut: false,
            });
            expect(run.nodes).toEqual({ attempted: 2, succeeded: 1, failed: 1 });
            expect(run.relationships).toEqual({ attempted: 0, succeeded: 0, failed: 0 });
            expect(graph.inner.size()).toEqual({ nodes: 1, relationships: 0 });
            expect(graph.events).toContain('rollback');
        });

        it('should abort on lost connectivity and keep the partial run', async () => {
            graph.beforeWrite = (write) => {
                if (write.id === 'p2') throw new ConnectivityError('connection lost');
            };

            const error: unknown = await exporter.export({}, { batchSize: 1 }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ExportAbortedError);
            if (!(error instanceof ExportAbortedError)) return;
            expect(error.message).toBe('Export of scope "all" aborted: connection lost');
            expect(error.run.status).toBe('aborted');
            expect(error.run.nodes).toEqual({ attempted: 3, succeeded: 2, failed: 1 });
            expect(error.run.failedBatches).toEqual([
                {
                    phase: 'nodes',
                    label: 'Person',
                    batchIndex: 1,
                    recordCount: 1,
                    reason: 'connection lost',
                    timedOut: false,
                },
            ]);
            expect(error.cause).toBeInstanceOf(ConnectivityError);
            expect(store.getSyncRuns().map((r) => r.status)).toEqual(['aborted']);
        });

        it('should be safe to re-run after an aborted export', async () => {
            graph.beforeWrite = (write) => {
                if (write.id === 'r2') throw new ConnectivityError('connection lost');
            };
            await expect(exporter.export()).rejects.toBeInstanceOf(ExportAbortedError);

            graph.beforeWrite = null;
            const run = await exporter.export();

            expect(run.status).toBe('completed');
            expect(graph.inner.size()).toEqual({ nodes: 5, relationships: 3 });
        });
    });

    describe('cancellation', () => {
        it('should not start when already cancelled', async () => {
            const controller = new AbortController();
            controller.abort();

            const run = await exporter.export({}, { signal: controller.signal });

            expect(run.status).toBe('cancelled');
            expect(run.cancelled).toBe(true);
            expect(run.nodes.attempted).toBe(0);
            expect(graph.inner.size()).toEqual({ nodes: 0, relationships: 0 });
        });

        it('should finish the in-flight batch and start no more', async () => {
            const controller = new AbortController();
            graph.beforeWrite = () => controller.abort();

            const run = await exporter.export({}, { batchSize: 1, signal: controller.signal });

            expect(run.cancelled).toBe(true);
            expect(run.nodes).toEqual({ attempted: 1, succeeded: 1, failed: 0 });
            expect(run.relationships.attempted).toBe(0);
            expect(graph.inner.size()).toEqual({ nodes: 1, relationships: 0 });
        });
    });

    describe('locking', () => {
        it('should serialize exports of the same scope', async () => {
            const lock = new InProcessScopeLock();
            const first = new BatchExporter(store, graph, { lock });
            const second = new BatchExporter(store, graph, { lock });
            graph.beforeWrite = async (write) => {
                if (write.id === 'm1') await sleep(20);
            };

            const [a, b] = await Promise.all([first.export(), second.export()]);

            const [earlier, later] = Date.parse(a.startedAt) <= Date.parse(b.startedAt) ? [a, b] : [b, a];
            expect(Date.parse(later.startedAt)).toBeGreaterThanOrEqual(Date.parse(earlier.finishedAt));
            expect(lock.isHeld('all')).toBe(false);
        });

        it('should give up after the lock timeout', async () => {
            const lock = new InProcessScopeLock();
            const release = await lock.acquire('all', 0);

            const locked = new BatchExporter(store, graph, { lock });
            await expect(locked.export({}, { lockTimeoutMs: 20 })).rejects.toBeInstanceOf(LockTimeoutError);

            await release();
            expect((await locked.export()).status).toBe('completed');
        });
    });

    describe('options and history', () => {
        it('should reject invalid options before doing anything', async () => {
            await expect(exporter.export({}, { batchSize: 0 })).rejects.toThrow(
                new SyncError('INVALID_OPTION', 'batchSize must be a positive integer, got 0')
            );
            expect(graph.events).toEqual([]);
        });

        it('should record every run in the history table', async () => {
            const run = await exporter.export({ projectId: 'none' });

            expect(run.scope).toBe('project:none');
            expect(run.nodes.attempted).toBe(0);
            expect(store.getSyncRunRecord(run.runId)).toEqual(run);
        });

        it('should still return the run when history cannot be written', async () => {
            const source: RecordSource = {
                getDistinctEntityTypes: (scope) => store.getDistinctEntityTypes(scope),
                getEntityPage: (scope, page, types) => store.getEntityPage(scope, page, types),
                getRelationshipPage: (scope, page) => store.getRelationshipPage(scope, page),
                recordSyncRun: () => {
                    throw new Error('disk full');
                },
            };

            const run = await new BatchExporter(source, graph).export();
            expect(run.status).toBe('completed');
        });
    });
});
