import type {
    ExportOptions,
    RelgraphConfig,
    SyncRunRecord,
    SyncScope,
    VerificationReport,
    VerifyOptions,
} from '../types/index.js';
import { RelationalStore } from '../storage/database.js';
import type { GraphStore } from '../graph/store.js';
import { Neo4jGraphStore } from '../graph/neo4j-store.js';
import { BatchExporter } from './exporter.js';
import { SyncVerifier } from './verifier.js';
import { DatabaseScopeLock, InProcessScopeLock, type ScopeLock } from './lock.js';
import { SyncError } from '../utils/errors.js';
import { getNeo4jPassword } from '../utils/config.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Entry point for callers: one relational store, one graph store.
 * `export` is the only operation that writes, and only to the graph.
 */
export class GraphSync {
    private readonly exporter: BatchExporter;
    private readonly verifier: SyncVerifier;
    private readonly defaultSampleSize: number | undefined;

    constructor(
        readonly store: RelationalStore,
        readonly graph: GraphStore,
        options: { lock?: ScopeLock; config?: RelgraphConfig } = {}
    ) {
        const sync = options.config?.sync;
        this.exporter = new BatchExporter(store, graph, {
            lock: options.lock,
            defaults: sync && {
                batchSize: sync.batchSize,
                batchTimeoutMs: sync.batchTimeoutMs,
                labelConcurrency: sync.labelConcurrency,
                lockTimeoutMs: sync.lockTimeoutMs,
            },
        });
        this.verifier = new SyncVerifier(store, graph);
        this.defaultSampleSize = options.config?.verify.sampleSize;
    }

    export(scope: SyncScope = {}, options: ExportOptions = {}): Promise<SyncRunRecord> {
        return this.exporter.export(scope, options);
    }

    verify(scope: SyncScope = {}, options: VerifyOptions = {}): Promise<VerificationReport> {
        return this.verifier.verify(scope, { sampleSize: options.sampleSize ?? this.defaultSampleSize });
    }

    async close(): Promise<void> {
        await this.graph.close();
        this.store.close();
    }
}

export interface OpenGraphSyncOptions {
    /** Use this graph store instead of connecting to Neo4j. */
    graph?: GraphStore;
    /** Defaults to NEO4J_PASSWORD. */
    password?: string;
}

/**
 * Open both stores from resolved configuration.
 */
export async function openGraphSync(config: RelgraphConfig, options: OpenGraphSyncOptions = {}): Promise<GraphSync> {
    const store = new RelationalStore(config.database);

    let graph = options.graph;
    if (!graph) {
        const password = options.password ?? getNeo4jPassword();
        if (password === undefined) {
            store.close();
            throw new SyncError('INVALID_CONFIG', 'NEO4J_PASSWORD is not set');
        }
        try {
            graph = await Neo4jGraphStore.connect(config.neo4j, password, {
                queryTimeoutMs: config.sync.queryTimeoutMs,
                transactionTimeoutMs: Math.max(config.sync.batchTimeoutMs, config.sync.queryTimeoutMs),
            });
        } catch (error) {
            store.close();
            throw error;
        }
    }

    const lock =
        config.sync.lockMode === 'database'
            ? new DatabaseScopeLock(store, { ttlMs: config.sync.leaseTtlMs })
            : new InProcessScopeLock();

    logger.debug({ database: config.database, graph: graph.kind, lockMode: config.sync.lockMode }, 'Graph sync opened');
    return new GraphSync(store, graph, { lock, config });
}
