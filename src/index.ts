export * from './types/index.js';

export { GraphSync, openGraphSync, type OpenGraphSyncOptions } from './sync/graph-sync.js';
export { BatchExporter, type BatchExporterOptions, type ExportDefaults, type RecordSource } from './sync/exporter.js';
export { SyncVerifier, type VerificationSource } from './sync/verifier.js';
export { DatabaseScopeLock, InProcessScopeLock, type ReleaseLock, type ScopeLock } from './sync/lock.js';
export { parseScope, scopeKey, ALL_SCOPE_KEY } from './sync/scope.js';
export { projectEntity, projectRelationship, RESERVED_PROPERTIES } from './sync/projection.js';

export { normalizeLabel, normalizeRelationshipType, tokenizeIdentifier } from './normalize/identifiers.js';

export {
    encode,
    serialize,
    decode,
    decodeDetailed,
    canonicalize,
    canonicalJson,
    canonicallyEqual,
    isFlattenable,
    type Flattenable,
    type DecodeResult,
    type DecodeOptions,
    type StoredForm,
} from './codec/semi-structured.js';
export {
    createSemiStructuredHook,
    rewriteSemiStructuredInsert,
    type BindParameters,
    type BoundStatement,
    type StatementHook,
} from './codec/statement-rewriter.js';

export { RelationalStore, SEMI_STRUCTURED_COLUMNS, type PageRequest, type StoreStats } from './storage/database.js';
export { parseRecordFile, readRecordFile, type RecordFile } from './storage/record-file.js';

export type { GraphStore, GraphTransaction, GraphWrite, StoredNode, StoredRelationship } from './graph/store.js';
export { MemoryGraphStore } from './graph/memory-store.js';
export { Neo4jGraphStore, type Neo4jStoreOptions, type DriverLike } from './graph/neo4j-store.js';

export {
    SyncError,
    EncodingError,
    ConnectivityError,
    BatchTimeoutError,
    LockTimeoutError,
    ExportAbortedError,
    isConnectivityError,
    isTimeoutError,
    type SyncErrorCode,
} from './utils/errors.js';
export { resolveConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
