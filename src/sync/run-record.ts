import { randomUUID } from 'node:crypto';
import type {
    BatchFailure,
    ClearResult,
    PhaseCounts,
    RecordFailure,
    SyncRunRecord,
    SyncRunStatus,
} from '../types/index.js';

function emptyCounts(): PhaseCounts {
    return { attempted: 0, succeeded: 0, failed: 0 };
}

/**
 * Accumulates the outcome of one export run.
 */
export class RunRecorder {
    readonly runId = randomUUID();
    readonly nodes = emptyCounts();
    readonly relationships = emptyCounts();
    readonly failures: RecordFailure[] = [];
    readonly failedBatches: BatchFailure[] = [];
    readonly indexes: string[] = [];
    cleared: ClearResult | null = null;
    haltedAt: BatchFailure | null = null;
    cancelled = false;

    private readonly labels = new Set<string>();
    private readonly relationshipTypes = new Set<string>();
    private readonly started = Date.now();

    constructor(
        readonly scope: string,
        readonly batchSize: number,
        readonly clearExisting: boolean
    ) {}

    addLabel(label: string): void {
        this.labels.add(label);
    }

    addRelationshipType(type: string): void {
        this.relationshipTypes.add(type);
    }

    recordFailure(failure: RecordFailure): void {
        this.failures.push(failure);
        (failure.kind === 'node' ? this.nodes : this.relationships).failed++;
    }

    recordBatchFailure(failure: BatchFailure): void {
        this.failedBatches.push(failure);
        (failure.phase === 'nodes' ? this.nodes : this.relationships).failed += failure.recordCount;
    }

    halt(failure: BatchFailure): void {
        this.recordBatchFailure(failure);
        this.haltedAt = failure;
    }

    get halted(): boolean {
        return this.haltedAt !== null;
    }

    private status(aborted: boolean): SyncRunStatus {
        if (aborted) return 'aborted';
        if (this.haltedAt) return 'halted';
        if (this.cancelled) return 'cancelled';
        return this.nodes.failed + this.relationships.failed > 0 ? 'completed_with_failures' : 'completed';
    }

    finish(options: { aborted?: boolean } = {}): SyncRunRecord {
        const finished = Date.now();
        return {
            runId: this.runId,
            scope: this.scope,
            status: this.status(options.aborted ?? false),
            startedAt: new Date(this.started).toISOString(),
            finishedAt: new Date(finished).toISOString(),
            elapsedMs: finished - this.started,
            batchSize: this.batchSize,
            clearExisting: this.clearExisting,
            cleared: this.cleared,
            indexes: [...this.indexes],
            nodes: { ...this.nodes },
            relationships: { ...this.relationships },
            labels: Array.from(this.labels).sort(),
            relationshipTypes: Array.from(this.relationshipTypes).sort(),
            failures: [...this.failures],
            failedBatches: [...this.failedBatches],
            haltedAt: this.haltedAt,
            cancelled: this.cancelled,
        };
    }
}
