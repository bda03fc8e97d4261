import neo4j from 'neo4j-driver';
import type { ClearResult, Neo4jSettings } from '../types/index.js';
import {
    SCOPE_PROPERTY,
    type GraphCounts,
    type GraphStore,
    type GraphTransaction,
    type GraphWrite,
    type StoredNode,
    type StoredRelationship,
    type WriteResult,
} from './store.js';
import {
    buildClearScope,
    buildCountNodes,
    buildCountRelationships,
    buildGetNode,
    buildGetRelationship,
    buildIndexStatement,
    buildListLabels,
    buildListRelationshipTypes,
    buildMarkerConstraint,
    buildRemoveLabels,
    indexName,
    type CypherParams,
    type CypherQuery,
} from './cypher.js';
import {
    BatchTimeoutError,
    ConnectivityError,
    errorMessage,
    isConnectivityError,
    isTimeoutError,
} from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

export interface Neo4jStoreOptions {
    database: string;
    /** Server-side timeout for reads, index creation and scope clears. */
    queryTimeoutMs: number;
    /** Server-side timeout for batch transactions; never below the batch timeout. */
    transactionTimeoutMs: number;
}

// ─── Driver surface ───────────────────────────────────────

// The parts of neo4j-driver's Driver, Session and Transaction this store calls.

export interface QueryRecord {
    get(key: string): unknown;
}

export interface QueryCounters {
    nodesCreated: number;
    nodesDeleted: number;
    relationshipsCreated: number;
    relationshipsDeleted: number;
}

export interface QueryResult {
    records: QueryRecord[];
    summary: { counters: { updates(): QueryCounters } };
}

export interface DriverTransaction {
    run(cypher: string, params: CypherParams): Promise<QueryResult>;
    commit(): Promise<void>;
    rollback(): Promise<void>;
    isOpen(): boolean;
}

export interface DriverSession {
    run(cypher: string, params: CypherParams, config: { timeout: number }): Promise<QueryResult>;
    beginTransaction(config: { timeout: number }): DriverTransaction;
    close(): Promise<void>;
}

export interface DriverLike {
    session(config: { database: string; defaultAccessMode: 'READ' | 'WRITE' }): DriverSession;
    close(): Promise<void>;
}

// ─── Helpers ──────────────────────────────────────────────

function toNumber(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (neo4j.isInt(value)) return value.toNumber();
    return 0;
}

function toStringList(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function toProperties(value: unknown): Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
    return Object.fromEntries(Object.entries(value));
}

/**
 * Split the scope list off the stored properties.
 */
function splitScopes(properties: Record<string, unknown>): { properties: Record<string, unknown>; scopes: string[] } {
    const { [SCOPE_PROPERTY]: scopes, ...rest } = properties;
    return { properties: rest, scopes: toStringList(scopes) };
}

/**
 * Rethrow driver connectivity failures as ConnectivityError and server
 * transaction timeouts as BatchTimeoutError.
 */
function rethrow(error: unknown, operation: string, timeoutMs: number): never {
    if (isConnectivityError(error) && !(error instanceof ConnectivityError)) {
        throw new ConnectivityError(`Neo4j unreachable during ${operation}: ${errorMessage(error)}`, error);
    }
    if (isTimeoutError(error) && !(error instanceof BatchTimeoutError)) {
        throw new BatchTimeoutError(operation, timeoutMs, error);
    }
    throw error;
}

/**
 * Graph store backed by Neo4j through the official driver.
 */
export class Neo4jGraphStore implements GraphStore {
    readonly kind = 'neo4j';
    private markerReady = false;

    constructor(
        private readonly driver: DriverLike,
        private readonly options: Neo4jStoreOptions
    ) {}

    /**
     * Create a driver from settings and verify the server is reachable.
     */
    static async connect(
        settings: Neo4jSettings,
        password: string,
        timeouts: Pick<Neo4jStoreOptions, 'queryTimeoutMs' | 'transactionTimeoutMs'>
    ): Promise<Neo4jGraphStore> {
        const driver = neo4j.driver(settings.uri, neo4j.auth.basic(settings.username, password), {
            maxConnectionPoolSize: settings.maxConnectionPoolSize,
            connectionAcquisitionTimeout: settings.connectionAcquisitionTimeoutMs,
            disableLosslessIntegers: true,
            ...(settings.encrypted ? { encrypted: true } : {}),
        });

        try {
            await driver.verifyConnectivity({ database: settings.database });
        } catch (error) {
            await driver.close();
            throw new ConnectivityError(`Cannot connect to Neo4j at ${settings.uri}: ${errorMessage(error)}`, error);
        }

        logger.debug({ uri: settings.uri, database: settings.database }, 'Connected to Neo4j');
        return new Neo4jGraphStore(driver, { database: settings.database, ...timeouts });
    }

    private session(mode: 'READ' | 'WRITE'): DriverSession {
        return this.driver.session({
            database: this.options.database,
            defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE,
        });
    }

    private async read<T>(query: CypherQuery, operation: string, map: (records: QueryRecord[]) => T): Promise<T> {
        const session = this.session('READ');
        try {
            const result = await session.run(query.cypher, query.params, { timeout: this.options.queryTimeoutMs });
            return map(result.records);
        } catch (error) {
            return rethrow(error, operation, this.options.queryTimeoutMs);
        } finally {
            await session.close();
        }
    }

    async ensureIndex(label: string): Promise<string> {
        const session = this.session('WRITE');
        const timeout = this.options.queryTimeoutMs;
        try {
            if (!this.markerReady) {
                const constraint = buildMarkerConstraint();
                await session.run(constraint.cypher, constraint.params, { timeout });
                this.markerReady = true;
            }
            const query = buildIndexStatement(label);
            await session.run(query.cypher, query.params, { timeout });
            return indexName(label);
        } catch (error) {
            return rethrow(error, 'index creation', timeout);
        } finally {
            await session.close();
        }
    }

    async beginTransaction(): Promise<GraphTransaction> {
        const session = this.session('WRITE');
        const timeoutMs = this.options.transactionTimeoutMs;
        try {
            const tx = session.beginTransaction({ timeout: timeoutMs });
            return new Neo4jTransaction(session, tx, timeoutMs);
        } catch (error) {
            await session.close();
            return rethrow(error, 'begin transaction', timeoutMs);
        }
    }

    async clearScope(scope: string): Promise<ClearResult> {
        const session = this.session('WRITE');
        const timeout = this.options.queryTimeoutMs;
        let tx: DriverTransaction | undefined;
        try {
            tx = session.beginTransaction({ timeout });
            let nodesDeleted = 0;
            let relationshipsDeleted = 0;
            for (const query of buildClearScope(scope)) {
                const result = await tx.run(query.cypher, query.params);
                const updates = result.summary.counters.updates();
                nodesDeleted += updates.nodesDeleted;
                relationshipsDeleted += updates.relationshipsDeleted;
            }
            await tx.commit();
            return { nodesDeleted, relationshipsDeleted };
        } catch (error) {
            if (tx?.isOpen()) {
                await tx.rollback().catch((rollbackError: unknown) => {
                    logger.warn({ scope, error: errorMessage(rollbackError) }, 'Scope clear rollback failed');
                });
            }
            return rethrow(error, 'scope clear', timeout);
        } finally {
            await session.close();
        }
    }

    async countScope(scope: string): Promise<GraphCounts> {
        const count = (records: QueryRecord[]): number => toNumber(records[0]?.get('count'));
        const nodes = await this.read(buildCountNodes(scope), 'node count', count);
        const relationships = await this.read(buildCountRelationships(scope), 'relationship count', count);
        return { nodes, relationships };
    }

    async getNode(id: string, scope: string): Promise<StoredNode | null> {
        return this.read(buildGetNode(id, scope), 'node lookup', (records) => {
            const record = records[0];
            if (!record) return null;
            const { properties, scopes } = splitScopes(toProperties(record.get('properties')));
            return { id, labels: toStringList(record.get('labels')), properties, scopes };
        });
    }

    async getRelationship(id: string, scope: string): Promise<StoredRelationship | null> {
        return this.read(buildGetRelationship(id, scope), 'relationship lookup', (records) => {
            const record = records[0];
            if (!record) return null;
            const { properties, scopes } = splitScopes(toProperties(record.get('properties')));
            return {
                id,
                type: String(record.get('type')),
                sourceId: String(record.get('sourceId')),
                targetId: String(record.get('targetId')),
                properties,
                scopes,
            };
        });
    }

    async listLabels(scope: string): Promise<string[]> {
        return this.read(buildListLabels(scope), 'label listing', (records) =>
            records.map((record) => String(record.get('label')))
        );
    }

    async listRelationshipTypes(scope: string): Promise<string[]> {
        return this.read(buildListRelationshipTypes(scope), 'type listing', (records) =>
            records.map((record) => String(record.get('type')))
        );
    }

    async close(): Promise<void> {
        await this.driver.close();
    }
}

/**
 * One explicit driver transaction on its own session.
 */
class Neo4jTransaction implements GraphTransaction {
    constructor(
        private readonly session: DriverSession,
        private readonly tx: DriverTransaction,
        private readonly timeoutMs: number
    ) {}

    async run(write: GraphWrite): Promise<WriteResult> {
        const operation = `${write.kind} ${write.id}`;
        try {
            const result = await this.tx.run(write.cypher, write.params);
            if (write.kind === 'upsert-node') {
                const stale = toStringList(result.records[0]?.get('stale'));
                if (stale.length > 0) {
                    const relabel = buildRemoveLabels(write.id, stale);
                    await this.tx.run(relabel.cypher, relabel.params);
                }
                return { matched: true, created: result.summary.counters.updates().nodesCreated > 0 };
            }
            const matched = toNumber(result.records[0]?.get('matched')) > 0;
            return { matched, created: matched && result.summary.counters.updates().relationshipsCreated > 0 };
        } catch (error) {
            return rethrow(error, operation, this.timeoutMs);
        }
    }

    async commit(): Promise<void> {
        try {
            await this.tx.commit();
        } catch (error) {
            rethrow(error, 'commit', this.timeoutMs);
        } finally {
            await this.session.close();
        }
    }

    async rollback(): Promise<void> {
        try {
            if (this.tx.isOpen()) {
                await this.tx.rollback();
            }
        } catch (error) {
            rethrow(error, 'rollback', this.timeoutMs);
        } finally {
            await this.session.close();
        }
    }
}
