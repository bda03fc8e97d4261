import pLimit from 'p-limit';
import type {
    BatchFailure,
    EntityRecord,
    ExportOptions,
    ExportPhase,
    RelationshipWithEndpoints,
    SyncRunRecord,
    SyncScope,
    SyncSettings,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import type { RelationalStore } from '../storage/database.js';
import type { GraphStore, GraphTransaction, GraphWrite, NodeUpsert, RelationshipUpsert, WriteResult } from '../graph/store.js';
import { buildNodeUpsert, buildRelationshipUpsert } from '../graph/cypher.js';
import { normalizeLabel } from '../normalize/identifiers.js';
import { projectEntity, projectRelationship } from './projection.js';
import { RunRecorder } from './run-record.js';
import { scopeKey } from './scope.js';
import { InProcessScopeLock, type ScopeLock } from './lock.js';
import {
    EncodingError,
    ExportAbortedError,
    SyncError,
    errorMessage,
    isConnectivityError,
    isTimeoutError,
} from '../utils/errors.js';
import { throwIfAborted, withTimeout } from '../utils/timeout.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * The relational reads and history write the exporter needs.
 */
export type RecordSource = Pick<
    RelationalStore,
    'getDistinctEntityTypes' | 'getEntityPage' | 'getRelationshipPage' | 'recordSyncRun'
>;

export type ExportDefaults = Pick<SyncSettings, 'batchSize' | 'batchTimeoutMs' | 'labelConcurrency' | 'lockTimeoutMs'>;

export interface BatchExporterOptions {
    lock?: ScopeLock;
    defaults?: Partial<ExportDefaults>;
}

interface ResolvedExportOptions extends ExportDefaults {
    clearExisting: boolean;
    signal: AbortSignal | undefined;
}

interface RunContext {
    scope: SyncScope;
    key: string;
    run: RunRecorder;
    options: ResolvedExportOptions;
    /** Set once a batch hits an unrecoverable error; siblings stop at their next boundary. */
    fatal: unknown;
}

interface BatchPosition {
    phase: ExportPhase;
    label?: string;
    batchIndex: number;
}

function requirePositiveInteger(name: string, value: number): number {
    if (!Number.isInteger(value) || value < 1) {
        throw new SyncError('INVALID_OPTION', `${name} must be a positive integer, got ${value}`, {
            details: { [name]: value },
        });
    }
    return value;
}

function requireNonNegative(name: string, value: number): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new SyncError('INVALID_OPTION', `${name} must be a non-negative number, got ${value}`, {
            details: { [name]: value },
        });
    }
    return value;
}

/**
 * Exports a scope of the relational store into the graph store: nodes first,
 * page by page, then relationships.
 */
export class BatchExporter {
    private readonly lock: ScopeLock;
    private readonly defaults: ExportDefaults;

    constructor(
        private readonly source: RecordSource,
        private readonly graph: GraphStore,
        options: BatchExporterOptions = {}
    ) {
        this.lock = options.lock ?? new InProcessScopeLock();
        this.defaults = {
            batchSize: options.defaults?.batchSize ?? DEFAULT_CONFIG.sync.batchSize,
            batchTimeoutMs: options.defaults?.batchTimeoutMs ?? DEFAULT_CONFIG.sync.batchTimeoutMs,
            labelConcurrency: options.defaults?.labelConcurrency ?? DEFAULT_CONFIG.sync.labelConcurrency,
            lockTimeoutMs: options.defaults?.lockTimeoutMs ?? DEFAULT_CONFIG.sync.lockTimeoutMs,
        };
    }

    private resolveOptions(options: ExportOptions): ResolvedExportOptions {
        return {
            batchSize: requirePositiveInteger('batchSize', options.batchSize ?? this.defaults.batchSize),
            batchTimeoutMs: requirePositiveInteger('batchTimeoutMs', options.batchTimeoutMs ?? this.defaults.batchTimeoutMs),
            labelConcurrency: requirePositiveInteger(
                'labelConcurrency',
                options.labelConcurrency ?? this.defaults.labelConcurrency
            ),
            lockTimeoutMs: requireNonNegative('lockTimeoutMs', options.lockTimeoutMs ?? this.defaults.lockTimeoutMs),
            clearExisting: options.clearExisting ?? false,
            signal: options.signal,
        };
    }

    /**
     * Export every in-scope record. Per-record and per-batch failures are
     * reported in the returned record; an unreachable store aborts the run
     * with ExportAbortedError carrying the partial record.
     */
    async export(scope: SyncScope = {}, options: ExportOptions = {}): Promise<SyncRunRecord> {
        const resolved = this.resolveOptions(options);
        const key = scopeKey(scope);
        const release = await this.lock.acquire(key, resolved.lockTimeoutMs);

        const ctx: RunContext = {
            scope,
            key,
            run: new RunRecorder(key, resolved.batchSize, resolved.clearExisting),
            options: resolved,
            fatal: undefined,
        };

        logger.info(
            { scope: key, runId: ctx.run.runId, batchSize: resolved.batchSize, clearExisting: resolved.clearExisting },
            'Export started'
        );

        try {
            await this.runPhases(ctx);
        } catch (error) {
            const record = ctx.run.finish({ aborted: true });
            this.persist(record);
            logger.error({ scope: key, runId: record.runId, error: errorMessage(error) }, 'Export aborted');
            throw new ExportAbortedError(`Export of scope "${key}" aborted: ${errorMessage(error)}`, record, error);
        } finally {
            await release();
        }

        const record = ctx.run.finish();
        this.persist(record);
        logger.info(
            {
                scope: key,
                runId: record.runId,
                status: record.status,
                nodes: record.nodes,
                relationships: record.relationships,
                elapsedMs: record.elapsedMs,
            },
            'Export finished'
        );
        return record;
    }

    private async runPhases(ctx: RunContext): Promise<void> {
        if (ctx.options.clearExisting) {
            ctx.run.cleared = await this.graph.clearScope(ctx.key);
            logger.info({ scope: ctx.key, ...ctx.run.cleared }, 'Cleared existing graph data for scope');
        }

        const groups = this.labelGroups(ctx.scope);

        // Indexes exist before the first node lands
        for (const label of groups.keys()) {
            ctx.run.indexes.push(await this.graph.ensureIndex(label));
        }

        const limit = pLimit(ctx.options.labelConcurrency);
        const outcomes = await Promise.allSettled(
            Array.from(groups, ([label, types]) => limit(() => this.exportLabel(ctx, label, types)))
        );
        const rejected = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
        if (rejected) {
            throw rejected.reason;
        }

        if (this.shouldStop(ctx)) return;
        await this.exportRelationships(ctx);
    }

    /**
     * Raw entity types grouped by the label they normalize to.
     */
    private labelGroups(scope: SyncScope): Map<string, string[]> {
        const groups = new Map<string, string[]>();
        for (const type of this.source.getDistinctEntityTypes(scope)) {
            const label = normalizeLabel(type);
            const types = groups.get(label) ?? [];
            types.push(type);
            groups.set(label, types);
        }
        for (const [label, types] of groups) {
            if (types.length > 1) {
                logger.debug({ label, types }, 'Entity types share a label');
            }
        }
        return groups;
    }

    private shouldStop(ctx: RunContext): boolean {
        if (ctx.fatal !== undefined || ctx.run.halted) return true;
        if (ctx.options.signal?.aborted) {
            ctx.run.cancelled = true;
            return true;
        }
        return false;
    }

    // ─── Nodes ────────────────────────────────────────────────

    private async exportLabel(ctx: RunContext, label: string, types: string[]): Promise<void> {
        let afterId: string | null = null;

        for (let batchIndex = 0; !this.shouldStop(ctx); batchIndex++) {
            const page: EntityRecord[] = this.source.getEntityPage(
                ctx.scope,
                { afterId, limit: ctx.options.batchSize },
                types
            );
            if (page.length === 0) break;

            await this.exportNodeBatch(ctx, label, batchIndex, page);

            afterId = page.at(-1)?.id ?? null;
            if (page.length < ctx.options.batchSize) break;
        }
    }

    private async exportNodeBatch(ctx: RunContext, label: string, batchIndex: number, page: EntityRecord[]): Promise<void> {
        const { run } = ctx;
        run.nodes.attempted += page.length;

        const writes: NodeUpsert[] = [];
        for (const entity of page) {
            try {
                const { properties } = projectEntity(entity);
                writes.push(buildNodeUpsert(label, entity.id, properties, ctx.key));
            } catch (error) {
                if (!(error instanceof EncodingError)) throw error;
                run.recordFailure({ kind: 'node', recordId: entity.id, code: 'encoding', reason: error.message, batchIndex });
            }
        }
        if (writes.length === 0) return;

        const results = await this.commitBatch(ctx, { phase: 'nodes', label, batchIndex }, writes);
        if (!results) return;

        run.nodes.succeeded += writes.length;
        run.addLabel(label);
        logger.debug({ scope: ctx.key, label, batchIndex, written: writes.length }, 'Node batch committed');
    }

    // ─── Relationships ────────────────────────────────────────

    private async exportRelationships(ctx: RunContext): Promise<void> {
        let afterId: string | null = null;

        for (let batchIndex = 0; !this.shouldStop(ctx); batchIndex++) {
            const page: RelationshipWithEndpoints[] = this.source.getRelationshipPage(ctx.scope, {
                afterId,
                limit: ctx.options.batchSize,
            });
            if (page.length === 0) break;

            await this.exportRelationshipBatch(ctx, batchIndex, page);

            afterId = page.at(-1)?.id ?? null;
            if (page.length < ctx.options.batchSize) break;
        }
    }

    private async exportRelationshipBatch(
        ctx: RunContext,
        batchIndex: number,
        page: RelationshipWithEndpoints[]
    ): Promise<void> {
        const { run } = ctx;
        run.relationships.attempted += page.length;

        const writes: RelationshipUpsert[] = [];
        for (const relationship of page) {
            const { source_entity_type: sourceType, target_entity_type: targetType } = relationship;
            if (sourceType === null || targetType === null) {
                const missing = sourceType === null ? relationship.source_entity_id : relationship.target_entity_id;
                run.recordFailure({
                    kind: 'relationship',
                    recordId: relationship.id,
                    code: 'dangling-reference',
                    reason: `Endpoint entity ${missing} does not exist`,
                    batchIndex,
                });
                continue;
            }

            try {
                const { type, properties } = projectRelationship(relationship);
                writes.push(
                    buildRelationshipUpsert({
                        type,
                        id: relationship.id,
                        sourceId: relationship.source_entity_id,
                        sourceLabel: normalizeLabel(sourceType),
                        targetId: relationship.target_entity_id,
                        targetLabel: normalizeLabel(targetType),
                        properties,
                        scope: ctx.key,
                    })
                );
            } catch (error) {
                if (!(error instanceof EncodingError)) throw error;
                run.recordFailure({
                    kind: 'relationship',
                    recordId: relationship.id,
                    code: 'encoding',
                    reason: error.message,
                    batchIndex,
                });
            }
        }
        if (writes.length === 0) return;

        const results = await this.commitBatch(ctx, { phase: 'relationships', batchIndex }, writes);
        if (!results) return;

        writes.forEach((write, i) => {
            if (results[i]?.matched) {
                run.relationships.succeeded++;
                run.addRelationshipType(write.type);
            } else {
                run.recordFailure({
                    kind: 'relationship',
                    recordId: write.id,
                    code: 'dangling-reference',
                    reason: `Endpoint node ${write.sourceId} or ${write.targetId} is not in the graph`,
                    batchIndex,
                });
            }
        });
        logger.debug({ scope: ctx.key, batchIndex, written: writes.length }, 'Relationship batch committed');
    }

    // ─── Batches ──────────────────────────────────────────────

    /**
     * Run one page of writes in a single transaction. Returns the per-write
     * results, or null when the batch failed and was rolled back.
     */
    private async commitBatch(ctx: RunContext, position: BatchPosition, writes: GraphWrite[]): Promise<WriteResult[] | null> {
        const tx = await this.graph.beginTransaction();
        try {
            const results = await withTimeout(
                `${position.phase} batch ${position.batchIndex}`,
                ctx.options.batchTimeoutMs,
                async (signal) => {
                    const applied: WriteResult[] = [];
                    for (const write of writes) {
                        throwIfAborted(signal, 'batch');
                        applied.push(await tx.run(write));
                    }
                    return applied;
                }
            );
            await tx.commit();
            return results;
        } catch (error) {
            await this.rollback(tx, ctx, position);

            const failure: BatchFailure = {
                ...position,
                recordCount: writes.length,
                reason: errorMessage(error),
                timedOut: isTimeoutError(error),
            };

            if (failure.timedOut) {
                ctx.run.recordBatchFailure(failure);
                logger.warn(
                    { scope: ctx.key, ...position, timeoutMs: ctx.options.batchTimeoutMs, error: failure.reason },
                    'Batch timed out, rolled back'
                );
                return null;
            }

            if (isConnectivityError(error)) {
                ctx.run.recordBatchFailure(failure);
                ctx.fatal = error;
                throw error;
            }

            ctx.run.halt(failure);
            logger.error({ scope: ctx.key, ...position, error: failure.reason }, 'Batch failed, halting export');
            return null;
        }
    }

    private async rollback(tx: GraphTransaction, ctx: RunContext, position: BatchPosition): Promise<void> {
        try {
            await tx.rollback();
        } catch (error) {
            logger.warn({ scope: ctx.key, ...position, error: errorMessage(error) }, 'Rollback failed');
        }
    }

    private persist(record: SyncRunRecord): void {
        try {
            this.source.recordSyncRun(record);
        } catch (error) {
            logger.warn({ runId: record.runId, error: errorMessage(error) }, 'Could not record sync run history');
        }
    }
}
