/**
 * Subset of the relational store a run covers. Empty means everything.
 */
export interface SyncScope {
    projectId?: string;
    sourceFileId?: string;
}

export interface PhaseCounts {
    attempted: number;
    succeeded: number;
    failed: number;
}

export type RecordKind = 'node' | 'relationship';

export type FailureCode = 'encoding' | 'dangling-reference';

/**
 * A single record that could not be written. Its batch carried on.
 */
export interface RecordFailure {
    kind: RecordKind;
    recordId: string;
    code: FailureCode;
    reason: string;
    batchIndex: number;
}

export type ExportPhase = 'nodes' | 'relationships';

export interface BatchFailure {
    phase: ExportPhase;
    /** Canonical label for node batches, absent for relationship batches. */
    label?: string;
    batchIndex: number;
    recordCount: number;
    reason: string;
    timedOut: boolean;
}

export interface ClearResult {
    nodesDeleted: number;
    relationshipsDeleted: number;
}

export type SyncRunStatus = 'completed' | 'completed_with_failures' | 'cancelled' | 'halted' | 'aborted';

/**
 * Outcome of one export run.
 */
export interface SyncRunRecord {
    runId: string;
    scope: string;
    status: SyncRunStatus;
    startedAt: string;
    finishedAt: string;
    elapsedMs: number;
    batchSize: number;
    clearExisting: boolean;
    cleared: ClearResult | null;
    indexes: string[];
    nodes: PhaseCounts;
    relationships: PhaseCounts;
    labels: string[];
    relationshipTypes: string[];
    failures: RecordFailure[];
    failedBatches: BatchFailure[];
    haltedAt: BatchFailure | null;
    cancelled: boolean;
}

export interface ExportOptions {
    batchSize?: number;
    clearExisting?: boolean;
    signal?: AbortSignal;
    batchTimeoutMs?: number;
    labelConcurrency?: number;
    lockTimeoutMs?: number;
}

// ─── Verification ─────────────────────────────────────────

export interface CountCheck {
    expectedNodes: number;
    actualNodes: number;
    expectedRelationships: number;
    actualRelationships: number;
    inSync: boolean;
}

export type MismatchKind =
    | 'missing'
    | 'label'
    | 'relationship-type'
    | 'endpoint'
    | 'property'
    | 'unexpected-property'
    | 'unencodable';

export interface ContentMismatch {
    kind: RecordKind;
    recordId: string;
    mismatch: MismatchKind;
    field?: string;
    expected?: unknown;
    actual?: unknown;
}

export interface VerificationReport {
    scope: string;
    checkedAt: string;
    counts: CountCheck;
    sampled: { nodes: number; relationships: number };
    mismatches: ContentMismatch[];
    inSync: boolean;
}

export interface VerifyOptions {
    sampleSize?: number;
}
