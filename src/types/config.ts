/**
 * Log level options. `silent` disables output entirely.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * How concurrent exports of the same scope are serialized.
 * `process` guards a single process; `database` takes a lease row in the
 * relational store so separate processes sharing it also wait.
 */
export type LockMode = 'process' | 'database';

/**
 * Neo4j connection settings. The password is read from NEO4J_PASSWORD and
 * never stored here.
 */
export interface Neo4jSettings {
    uri: string;
    username: string;
    database: string;
    maxConnectionPoolSize: number;
    connectionAcquisitionTimeoutMs: number;
    encrypted: boolean;
}

export interface SyncSettings {
    batchSize: number;
    batchTimeoutMs: number;
    queryTimeoutMs: number;
    labelConcurrency: number;
    lockMode: LockMode;
    lockTimeoutMs: number;
    leaseTtlMs: number;
}

export interface VerifySettings {
    sampleSize: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface RelgraphConfig {
    /** Path of the SQLite relational store. */
    database: string;

    neo4j: Neo4jSettings;
    sync: SyncSettings;
    verify: VerifySettings;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Partial configuration as accepted from a file, env vars or flags.
 */
export interface RelgraphConfigInput {
    database?: string;
    neo4j?: Partial<Neo4jSettings>;
    sync?: Partial<SyncSettings>;
    verify?: Partial<VerifySettings>;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: RelgraphConfig = {
    database: './relgraph.db',
    neo4j: {
        uri: 'bolt://localhost:7687',
        username: 'neo4j',
        database: 'neo4j',
        maxConnectionPoolSize: 50,
        connectionAcquisitionTimeoutMs: 30000,
        encrypted: false,
    },
    sync: {
        batchSize: 1000,
        batchTimeoutMs: 60000,
        queryTimeoutMs: 30000,
        labelConcurrency: 1,
        lockMode: 'process',
        lockTimeoutMs: 30000,
        leaseTtlMs: 300000,
    },
    verify: {
        sampleSize: 20,
    },
    logLevel: 'info',
    jsonLogs: false,
};
