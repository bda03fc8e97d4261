/**
 * Barrel export for all shared types.
 */
export type {
    JsonPrimitive,
    JsonValue,
    JsonObject,
    EntityRecord,
    RelationshipRecord,
    EntityInput,
    RelationshipInput,
    RelationshipWithEndpoints,
} from './records.js';
export type {
    SyncScope,
    PhaseCounts,
    RecordKind,
    FailureCode,
    RecordFailure,
    ExportPhase,
    BatchFailure,
    ClearResult,
    SyncRunStatus,
    SyncRunRecord,
    ExportOptions,
    CountCheck,
    MismatchKind,
    ContentMismatch,
    VerificationReport,
    VerifyOptions,
} from './sync.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    LogLevel,
    LockMode,
    Neo4jSettings,
    SyncSettings,
    VerifySettings,
    RelgraphConfig,
    RelgraphConfigInput,
} from './config.js';
