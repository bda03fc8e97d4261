import { cosmiconfig } from 'cosmiconfig';
import {
    DEFAULT_CONFIG,
    type RelgraphConfig,
    type RelgraphConfigInput,
    type LockMode,
    type Neo4jSettings,
    type SyncSettings,
    type VerifySettings,
} from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

const CONFIG_SEARCH_PLACES = ['relgraph.config.json', '.relgraphrc.json'];

const NEO4J_KEYS: ReadonlyArray<keyof Neo4jSettings> = [
    'uri',
    'username',
    'database',
    'maxConnectionPoolSize',
    'connectionAcquisitionTimeoutMs',
    'encrypted',
];

const SYNC_KEYS: ReadonlyArray<keyof SyncSettings> = [
    'batchSize',
    'batchTimeoutMs',
    'queryTimeoutMs',
    'labelConcurrency',
    'lockMode',
    'lockTimeoutMs',
    'leaseTtlMs',
];

const VERIFY_KEYS: ReadonlyArray<keyof VerifySettings> = ['sampleSize'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
    const value = source[key];
    return typeof value === 'string' ? value : undefined;
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
    const value = source[key];
    return typeof value === 'boolean' ? value : undefined;
}

function pickLockMode(source: Record<string, unknown>, key: string): LockMode | undefined {
    const value = source[key];
    return value === 'process' || value === 'database' ? value : undefined;
}

/**
 * Overlay each layer's defined values on the defaults, later layers winning.
 */
function mergeSection<T extends object>(
    defaults: T,
    keys: ReadonlyArray<keyof T>,
    layers: Array<Partial<T> | undefined>
): T {
    const merged = { ...defaults };
    for (const layer of layers) {
        if (!layer) continue;
        for (const key of keys) {
            const value = layer[key];
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }
    return merged;
}

/**
 * Narrow a parsed config file to the known settings. Unknown keys and values
 * of the wrong type are ignored.
 */
export function parseConfigInput(raw: unknown): RelgraphConfigInput {
    if (!isRecord(raw)) return {};

    const neo4j = isRecord(raw['neo4j']) ? raw['neo4j'] : {};
    const sync = isRecord(raw['sync']) ? raw['sync'] : {};
    const verify = isRecord(raw['verify']) ? raw['verify'] : {};

    return {
        database: pickString(raw, 'database'),
        logLevel: parseLogLevel(pickString(raw, 'logLevel')),
        jsonLogs: pickBoolean(raw, 'jsonLogs'),
        neo4j: {
            uri: pickString(neo4j, 'uri'),
            username: pickString(neo4j, 'username'),
            database: pickString(neo4j, 'database'),
            maxConnectionPoolSize: pickNumber(neo4j, 'maxConnectionPoolSize'),
            connectionAcquisitionTimeoutMs: pickNumber(neo4j, 'connectionAcquisitionTimeoutMs'),
            encrypted: pickBoolean(neo4j, 'encrypted'),
        },
        sync: {
            batchSize: pickNumber(sync, 'batchSize'),
            batchTimeoutMs: pickNumber(sync, 'batchTimeoutMs'),
            queryTimeoutMs: pickNumber(sync, 'queryTimeoutMs'),
            labelConcurrency: pickNumber(sync, 'labelConcurrency'),
            lockMode: pickLockMode(sync, 'lockMode'),
            lockTimeoutMs: pickNumber(sync, 'lockTimeoutMs'),
            leaseTtlMs: pickNumber(sync, 'leaseTtlMs'),
        },
        verify: {
            sampleSize: pickNumber(verify, 'sampleSize'),
        },
    };
}

/**
 * Load configuration from relgraph.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<RelgraphConfigInput | null> {
    const explorer = cosmiconfig('relgraph', {
        searchPlaces: CONFIG_SEARCH_PLACES,
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parseConfigInput(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): RelgraphConfigInput {
    return {
        database: env['RELGRAPH_DB'],
        logLevel: parseLogLevel(env['RELGRAPH_LOG_LEVEL']),
        neo4j: {
            uri: env['NEO4J_URI'],
            username: env['NEO4J_USERNAME'] ?? env['NEO4J_USER'],
            database: env['NEO4J_DATABASE'],
        },
    };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: RelgraphConfigInput,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<RelgraphConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        database: cliFlags.database ?? envConfig.database ?? fileConfig?.database ?? DEFAULT_CONFIG.database,
        logLevel: cliFlags.logLevel ?? envConfig.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
        // Deep merge nested objects
        neo4j: mergeSection(DEFAULT_CONFIG.neo4j, NEO4J_KEYS, [fileConfig?.neo4j, envConfig.neo4j, cliFlags.neo4j]),
        sync: mergeSection(DEFAULT_CONFIG.sync, SYNC_KEYS, [fileConfig?.sync, envConfig.sync, cliFlags.sync]),
        verify: mergeSection(DEFAULT_CONFIG.verify, VERIFY_KEYS, [fileConfig?.verify, cliFlags.verify]),
    };
}

/**
 * Neo4j password from the environment. Never part of resolved config.
 */
export function getNeo4jPassword(env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env['NEO4J_PASSWORD'];
}
