#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { RelationalStore, type StoreStats, type SyncRunHistoryEntry } from '../storage/database.js';
import { readRecordFile } from '../storage/record-file.js';
import { MemoryGraphStore } from '../graph/memory-store.js';
import { openGraphSync } from '../sync/graph-sync.js';
import { parseScope, scopeKey } from '../sync/scope.js';
import { normalizeLabel, normalizeRelationshipType } from '../normalize/identifiers.js';
import { ExportAbortedError, errorMessage } from '../utils/errors.js';
import type { RelgraphConfig, RelgraphConfigInput, SyncRunRecord, VerificationReport } from '../types/index.js';

const VERSION = '0.1.0';

interface CommonOpts {
    db?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

interface ExportOpts extends CommonOpts {
    scope: string;
    batchSize?: number;
    clear: boolean;
    timeout?: number;
    concurrency?: number;
    neo4jUri?: string;
    dryRun: boolean;
}

interface VerifyOpts extends CommonOpts {
    scope: string;
    sampleSize?: number;
    neo4jUri?: string;
}

function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

function parseCount(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new InvalidArgumentError('Expected a non-negative integer.');
    }
    return parsed;
}

function parseLevel(value: string): string {
    if (!parseLogLevel(value)) {
        throw new InvalidArgumentError('Expected one of: error, warn, info, debug, silent.');
    }
    return value;
}

function commonFlags(opts: CommonOpts): RelgraphConfigInput {
    return {
        database: opts.db,
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    };
}

async function setup(flags: RelgraphConfigInput): Promise<RelgraphConfig> {
    const config = await resolveConfig(flags);
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--db <path>', 'Relational store path')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevel)
        .option('--json-logs', 'Output JSON logs');
}

function printRun(run: SyncRunRecord): void {
    console.log(`\nSync run ${run.runId} (${run.scope}): ${run.status} in ${run.elapsedMs}ms\n`);
    console.log(`  Nodes:         ${run.nodes.succeeded}/${run.nodes.attempted} written, ${run.nodes.failed} failed`);
    console.log(
        `  Relationships: ${run.relationships.succeeded}/${run.relationships.attempted} written, ${run.relationships.failed} failed`
    );
    console.log(`  Labels:        ${run.labels.join(', ') || '-'}`);
    console.log(`  Types:         ${run.relationshipTypes.join(', ') || '-'}`);
    if (run.cleared) {
        console.log(`  Cleared:       ${run.cleared.nodesDeleted} nodes, ${run.cleared.relationshipsDeleted} relationships`);
    }
    for (const failure of run.failures) {
        console.log(`  ✗ ${failure.kind} ${failure.recordId} [${failure.code}] ${failure.reason}`);
    }
    for (const batch of run.failedBatches) {
        const where = batch.label ? `${batch.phase}/${batch.label}` : batch.phase;
        console.log(`  ✗ batch ${where}#${batch.batchIndex} (${batch.recordCount} records) ${batch.reason}`);
    }
    console.log('');
}

function printReport(report: VerificationReport): void {
    const { counts } = report;
    console.log(`\nVerification of ${report.scope}: ${report.inSync ? 'in sync' : 'OUT OF SYNC'}\n`);
    console.log(`  Nodes:         expected ${counts.expectedNodes}, found ${counts.actualNodes}`);
    console.log(`  Relationships: expected ${counts.expectedRelationships}, found ${counts.actualRelationships}`);
    console.log(`  Sampled:       ${report.sampled.nodes} nodes, ${report.sampled.relationships} relationships`);
    for (const mismatch of report.mismatches) {
        const field = mismatch.field ? ` ${mismatch.field}` : '';
        console.log(
            `  ✗ ${mismatch.kind} ${mismatch.recordId} ${mismatch.mismatch}${field}: expected ${JSON.stringify(mismatch.expected)}, found ${JSON.stringify(mismatch.actual)}`
        );
    }
    console.log('');
}

const program = new Command();

program
    .name('relgraph')
    .description('Synchronize relational entity and relationship records into a property graph.')
    .version(VERSION);

// ─── LOAD command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('load')
        .description('Load entities and relationships from a JSON record file')
        .requiredOption('-i, --input <file>', 'Record file path')
).action(async (opts: CommonOpts & { input: string }) => {
    const config = await setup(commonFlags(opts));
    const logger = getLogger();

    const store = new RelationalStore(config.database);
    try {
        const records = readRecordFile(opts.input);
        const entities = store.upsertEntities(records.entities);
        const relationships = store.upsertRelationships(records.relationships);
        logger.info({ database: config.database, entities, relationships }, 'Records loaded');
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Load failed');
        process.exitCode = 1;
    } finally {
        store.close();
    }
});

// ─── EXPORT command ───────────────────────────────────────

withCommonOptions(
    program
        .command('export')
        .description('Export a scope of the relational store into the graph')
        .option('-s, --scope <scope>', 'Scope: all | project:<id> | file:<id> | project:<id>/file:<id>', 'all')
        .option('-b, --batch-size <n>', 'Records per graph transaction', parsePositiveInt)
        .option('--clear', 'Remove existing graph data for the scope first', false)
        .option('--timeout <ms>', 'Per-batch timeout in milliseconds', parsePositiveInt)
        .option('--concurrency <n>', 'Labels exported concurrently', parsePositiveInt)
        .option('--neo4j-uri <uri>', 'Neo4j bolt URI')
        .option('--dry-run', 'Write into an in-process graph instead of Neo4j', false)
).action(async (opts: ExportOpts) => {
    const config = await setup({
        ...commonFlags(opts),
        neo4j: { uri: opts.neo4jUri },
        sync: { batchSize: opts.batchSize, batchTimeoutMs: opts.timeout, labelConcurrency: opts.concurrency },
    });
    const logger = getLogger();

    const controller = new AbortController();
    const onInterrupt = (): void => {
        logger.warn('Interrupted, stopping at the next batch boundary');
        controller.abort();
    };

    try {
        const scope = parseScope(opts.scope);
        const sync = await openGraphSync(config, opts.dryRun ? { graph: new MemoryGraphStore() } : {});
        process.once('SIGINT', onInterrupt);
        try {
            const run = await sync.export(scope, { clearExisting: opts.clear, signal: controller.signal });
            printRun(run);
            if (run.status === 'halted') process.exitCode = 1;
        } finally {
            process.removeListener('SIGINT', onInterrupt);
            await sync.close();
        }
    } catch (error) {
        if (error instanceof ExportAbortedError) {
            printRun(error.run);
        }
        logger.error({ error: errorMessage(error) }, 'Export failed');
        process.exitCode = 1;
    }
});

// ─── VERIFY command ───────────────────────────────────────

withCommonOptions(
    program
        .command('verify')
        .description('Compare a scope between the relational store and the graph')
        .option('-s, --scope <scope>', 'Scope: all | project:<id> | file:<id> | project:<id>/file:<id>', 'all')
        .option('-n, --sample-size <n>', 'Records sampled per kind, 0 skips sampling', parseCount)
        .option('--neo4j-uri <uri>', 'Neo4j bolt URI')
).action(async (opts: VerifyOpts) => {
    const config = await setup({
        ...commonFlags(opts),
        neo4j: { uri: opts.neo4jUri },
        verify: { sampleSize: opts.sampleSize },
    });
    const logger = getLogger();

    try {
        const scope = parseScope(opts.scope);
        const sync = await openGraphSync(config);
        try {
            const report = await sync.verify(scope);
            printReport(report);
            if (!report.inSync) process.exitCode = 1;
        } finally {
            await sync.close();
        }
    } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Verify failed');
        process.exitCode = 1;
    }
});

// ─── NORMALIZE command ────────────────────────────────────

program
    .command('normalize')
    .description('Preview canonical graph identifiers')
    .argument('<names...>', 'Raw entity or relationship type names')
    .option('-r, --relationship', 'Normalize as relationship types', false)
    .action((names: string[], opts: { relationship: boolean }) => {
        const normalize = opts.relationship ? normalizeRelationshipType : normalizeLabel;
        for (const name of names) {
            console.log(`${name} → ${normalize(name)}`);
        }
    });

// ─── INSPECT command ──────────────────────────────────────

withCommonOptions(
    program.command('inspect').description('Show relational store statistics')
).action(async (opts: CommonOpts) => {
    const config = await setup(commonFlags(opts));

    try {
        const store = new RelationalStore(config.database);
        let stats: StoreStats;
        try {
            stats = store.getStats();
        } finally {
            store.close();
        }

        console.log(`\nRelational store ${config.database}\n`);
        console.log(`  Entities:      ${stats.entities}`);
        console.log(`  Relationships: ${stats.relationships} (${stats.danglingRelationships} dangling)`);
        console.log(`  Sync runs:     ${stats.syncRuns}`);

        if (Object.keys(stats.entitiesByType).length > 0) {
            console.log('\n  Entity types:');
            for (const [type, count] of Object.entries(stats.entitiesByType)) {
                console.log(`    ${type} → ${normalizeLabel(type)}: ${count}`);
            }
        }
        if (Object.keys(stats.relationshipsByType).length > 0) {
            console.log('\n  Relationship types:');
            for (const [type, count] of Object.entries(stats.relationshipsByType)) {
                console.log(`    ${type} → ${normalizeRelationshipType(type)}: ${count}`);
            }
        }

        console.log('');
    } catch (error) {
        getLogger().error({ error: errorMessage(error) }, 'Inspect failed');
        process.exitCode = 1;
    }
});

// ─── HISTORY command ──────────────────────────────────────

withCommonOptions(
    program
        .command('history')
        .description('List recent sync runs')
        .option('-n, --limit <n>', 'Number of runs', parsePositiveInt, 20)
        .option('--scope <scope>', 'Only runs for this scope')
).action(async (opts: CommonOpts & { limit: number; scope?: string }) => {
    const config = await setup(commonFlags(opts));

    try {
        const key = opts.scope === undefined ? undefined : scopeKey(parseScope(opts.scope));
        const store = new RelationalStore(config.database);
        let runs: SyncRunHistoryEntry[];
        try {
            runs = store.getSyncRuns(opts.limit, key);
        } finally {
            store.close();
        }

        if (runs.length === 0) {
            console.log('No sync runs recorded.');
            return;
        }
        for (const run of runs) {
            console.log(
                `${run.startedAt}  ${run.status.padEnd(23)} ${run.scope}  nodes=${run.nodesSucceeded} relationships=${run.relationshipsSucceeded} failed=${run.failed}  ${run.runId}`
            );
        }
    } catch (error) {
        getLogger().error({ error: errorMessage(error) }, 'History failed');
        process.exitCode = 1;
    }
});

program.parseAsync().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
});
