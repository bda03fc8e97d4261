import Database from 'better-sqlite3';
import type {
    EntityInput,
    EntityRecord,
    RelationshipInput,
    RelationshipWithEndpoints,
    SyncRunRecord,
    SyncScope,
    JsonValue,
} from '../types/index.js';
import { decode } from '../codec/semi-structured.js';
import { createSemiStructuredHook, type BindParameters, type StatementHook } from '../codec/statement-rewriter.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Entities: typed records with a semi-structured attribute map
CREATE TABLE IF NOT EXISTS entities (
  id TEXT PRIMARY KEY,
  entity_type TEXT NOT NULL,
  display_name TEXT,
  attributes TEXT,
  source_file_id TEXT,
  project_id TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Relationships: endpoints are plain ids, so dangling references stay visible
CREATE TABLE IF NOT EXISTS relationships (
  id TEXT PRIMARY KEY,
  relationship_type TEXT NOT NULL,
  source_entity_id TEXT NOT NULL,
  target_entity_id TEXT NOT NULL,
  attributes TEXT,
  source_file_id TEXT,
  project_id TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Sync runs: history of export outcomes
CREATE TABLE IF NOT EXISTS sync_runs (
  run_id TEXT PRIMARY KEY,
  scope TEXT NOT NULL,
  status TEXT NOT NULL,
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL,
  nodes_succeeded INTEGER NOT NULL DEFAULT 0,
  relationships_succeeded INTEGER NOT NULL DEFAULT 0,
  failed INTEGER NOT NULL DEFAULT 0,
  record TEXT NOT NULL
);

-- Sync locks: one lease row per scope being exported
CREATE TABLE IF NOT EXISTS sync_locks (
  scope TEXT PRIMARY KEY,
  owner TEXT NOT NULL,
  expires_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entities_type ON entities(entity_type);
CREATE INDEX IF NOT EXISTS idx_entities_file ON entities(source_file_id);
CREATE INDEX IF NOT EXISTS idx_entities_project ON entities(project_id);
CREATE INDEX IF NOT EXISTS idx_relationships_source ON relationships(source_entity_id);
CREATE INDEX IF NOT EXISTS idx_relationships_target ON relationships(target_entity_id);
CREATE INDEX IF NOT EXISTS idx_relationships_file ON relationships(source_file_id);
CREATE INDEX IF NOT EXISTS idx_relationships_project ON relationships(project_id);
CREATE INDEX IF NOT EXISTS idx_sync_runs_started ON sync_runs(started_at);
`;

/**
 * Semi-structured columns per table. Writes binding these columns are
 * rewritten by the statement hook.
 */
export const SEMI_STRUCTURED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
    entities: ['attributes'],
    relationships: ['attributes'],
    sync_runs: ['record'],
};

interface ScopeParams {
    projectId: string | null;
    sourceFileId: string | null;
}

interface EntityRow {
    id: string;
    entity_type: string;
    display_name: string | null;
    attributes: string | null;
    source_file_id: string | null;
    project_id: string | null;
}

interface RelationshipRow {
    id: string;
    relationship_type: string;
    source_entity_id: string;
    target_entity_id: string;
    attributes: string | null;
    source_file_id: string | null;
    project_id: string | null;
    source_entity_type: string | null;
    target_entity_type: string | null;
}

export interface PageRequest {
    afterId: string | null;
    limit: number;
}

export interface SyncRunHistoryEntry {
    runId: string;
    scope: string;
    status: string;
    startedAt: string;
    finishedAt: string;
    nodesSucceeded: number;
    relationshipsSucceeded: number;
    failed: number;
}

export interface StoreStats {
    entities: number;
    relationships: number;
    danglingRelationships: number;
    syncRuns: number;
    entitiesByType: Record<string, number>;
    relationshipsByType: Record<string, number>;
}

const ENTITY_SCOPE = `(@projectId IS NULL OR e.project_id = @projectId)
  AND (@sourceFileId IS NULL OR e.source_file_id = @sourceFileId)`;

const RELATIONSHIP_SCOPE = `(@projectId IS NULL OR COALESCE(r.project_id, src.project_id) = @projectId)
  AND (@sourceFileId IS NULL OR COALESCE(r.source_file_id, src.source_file_id) = @sourceFileId)`;

const RELATIONSHIP_SELECT = `
  SELECT r.id, r.relationship_type, r.source_entity_id, r.target_entity_id, r.attributes,
    COALESCE(r.source_file_id, src.source_file_id) AS source_file_id,
    COALESCE(r.project_id, src.project_id) AS project_id,
    src.entity_type AS source_entity_type,
    tgt.entity_type AS target_entity_type
  FROM relationships r
  LEFT JOIN entities src ON src.id = r.source_entity_id
  LEFT JOIN entities tgt ON tgt.id = r.target_entity_id`;

function scopeParams(scope: SyncScope): ScopeParams {
    return {
        projectId: scope.projectId ?? null,
        sourceFileId: scope.sourceFileId ?? null,
    };
}

/**
 * Relational store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, the semi-structured write path,
 * scoped paged reads and the sync bookkeeping tables.
 */
export class RelationalStore {
    private db: Database.Database;
    private hooks: StatementHook[] = [];

    constructor(dbPath: string, options: { parseFunction?: string } = {}) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('busy_timeout = 5000');

        // Run migrations
        this.migrate();

        this.addStatementHook(
            createSemiStructuredHook({ columns: SEMI_STRUCTURED_COLUMNS, parseFunction: options.parseFunction ?? 'json' })
        );

        logger.debug({ dbPath }, 'Relational store initialized');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            logger.debug('Relational store migrated to v1');
        }
    }

    // ─── Write path ───────────────────────────────────────────

    /**
     * Register a hook applied to every statement passing through `execute`.
     */
    addStatementHook(hook: StatementHook): void {
        this.hooks.push(hook);
    }

    /**
     * Run a write statement through the registered hooks.
     */
    execute(sql: string, params: BindParameters = []): Database.RunResult {
        const bound = this.hooks.reduce((statement, hook) => hook(statement), { sql, params });
        const stmt = this.db.prepare(bound.sql);
        return Array.isArray(bound.params) ? stmt.run(...bound.params) : stmt.run(bound.params);
    }

    // ─── Entities ─────────────────────────────────────────────

    /**
     * Insert or update entities in a single transaction.
     */
    upsertEntities(entities: EntityInput[]): number {
        const sql = `
      INSERT INTO entities (id, entity_type, display_name, attributes, source_file_id, project_id)
      VALUES (@id, @entity_type, @display_name, @attributes, @source_file_id, @project_id)
      ON CONFLICT(id) DO UPDATE SET
        entity_type = excluded.entity_type,
        display_name = excluded.display_name,
        attributes = excluded.attributes,
        source_file_id = excluded.source_file_id,
        project_id = excluded.project_id,
        updated_at = datetime('now')
    `;

        const upsertAll = this.db.transaction((records: EntityInput[]) => {
            let changes = 0;
            for (const entity of records) {
                changes += this.execute(sql, {
                    id: entity.id,
                    entity_type: entity.entity_type,
                    display_name: entity.display_name ?? null,
                    attributes: entity.attributes ?? null,
                    source_file_id: entity.source_file_id ?? null,
                    project_id: entity.project_id ?? null,
                }).changes;
            }
            return changes;
        });

        return upsertAll(entities);
    }

    /**
     * One page of in-scope entities ordered by id, optionally limited to
     * a set of raw entity types.
     */
    getEntityPage(scope: SyncScope, page: PageRequest, entityTypes?: readonly string[]): EntityRecord[] {
        const rows = this.db
            .prepare<ScopeParams & { types: string | null; afterId: string | null; limit: number }, EntityRow>(`
      SELECT e.id, e.entity_type, e.display_name, e.attributes, e.source_file_id, e.project_id
      FROM entities e
      WHERE ${ENTITY_SCOPE}
        AND (@types IS NULL OR e.entity_type IN (SELECT value FROM json_each(@types)))
        AND (@afterId IS NULL OR e.id > @afterId)
      ORDER BY e.id
      LIMIT @limit
    `)
            .all({
                ...scopeParams(scope),
                types: entityTypes ? JSON.stringify(entityTypes) : null,
                afterId: page.afterId,
                limit: page.limit,
            });
        return rows.map(toEntityRecord);
    }

    getEntity(id: string): EntityRecord | undefined {
        const row = this.db
            .prepare<[string], EntityRow>(
                'SELECT id, entity_type, display_name, attributes, source_file_id, project_id FROM entities WHERE id = ?'
            )
            .get(id);
        return row ? toEntityRecord(row) : undefined;
    }

    /**
     * Distinct raw entity types present in the scope.
     */
    getDistinctEntityTypes(scope: SyncScope): string[] {
        return this.db
            .prepare<ScopeParams, { entity_type: string }>(
                `SELECT DISTINCT e.entity_type FROM entities e WHERE ${ENTITY_SCOPE} ORDER BY e.entity_type`
            )
            .all(scopeParams(scope))
            .map((row) => row.entity_type);
    }

    countEntities(scope: SyncScope = {}): number {
        const row = this.db
            .prepare<ScopeParams, { count: number }>(`SELECT COUNT(*) AS count FROM entities e WHERE ${ENTITY_SCOPE}`)
            .get(scopeParams(scope));
        return row?.count ?? 0;
    }

    /**
     * Random sample of in-scope entities.
     */
    sampleEntities(scope: SyncScope, limit: number): EntityRecord[] {
        return this.db
            .prepare<ScopeParams & { limit: number }, EntityRow>(`
      SELECT e.id, e.entity_type, e.display_name, e.attributes, e.source_file_id, e.project_id
      FROM entities e
      WHERE ${ENTITY_SCOPE}
      ORDER BY random()
      LIMIT @limit
    `)
            .all({ ...scopeParams(scope), limit })
            .map(toEntityRecord);
    }

    // ─── Relationships ────────────────────────────────────────

    /**
     * Insert or update relationships in a single transaction.
     */
    upsertRelationships(relationships: RelationshipInput[]): number {
        const sql = `
      INSERT INTO relationships (id, relationship_type, source_entity_id, target_entity_id, attributes, source_file_id, project_id)
      VALUES (@id, @relationship_type, @source_entity_id, @target_entity_id, @attributes, @source_file_id, @project_id)
      ON CONFLICT(id) DO UPDATE SET
        relationship_type = excluded.relationship_type,
        source_entity_id = excluded.source_entity_id,
        target_entity_id = excluded.target_entity_id,
        attributes = excluded.attributes,
        source_file_id = excluded.source_file_id,
        project_id = excluded.project_id,
        updated_at = datetime('now')
    `;

        const upsertAll = this.db.transaction((records: RelationshipInput[]) => {
            let changes = 0;
            for (const relationship of records) {
                changes += this.execute(sql, {
                    id: relationship.id,
                    relationship_type: relationship.relationship_type,
                    source_entity_id: relationship.source_entity_id,
                    target_entity_id: relationship.target_entity_id,
                    attributes: relationship.attributes ?? null,
                    source_file_id: relationship.source_file_id ?? null,
                    project_id: relationship.project_id ?? null,
                }).changes;
            }
            return changes;
        });

        return upsertAll(relationships);
    }

    /**
     * One page of in-scope relationships ordered by id, joined with their
     * endpoints' entity types. File and project fall back to the source
     * entity's when the relationship has none.
     */
    getRelationshipPage(scope: SyncScope, page: PageRequest): RelationshipWithEndpoints[] {
        return this.db
            .prepare<ScopeParams & { afterId: string | null; limit: number }, RelationshipRow>(`
      ${RELATIONSHIP_SELECT}
      WHERE ${RELATIONSHIP_SCOPE}
        AND (@afterId IS NULL OR r.id > @afterId)
      ORDER BY r.id
      LIMIT @limit
    `)
            .all({ ...scopeParams(scope), afterId: page.afterId, limit: page.limit })
            .map(toRelationshipRecord);
    }

    getDistinctRelationshipTypes(scope: SyncScope): string[] {
        return this.db
            .prepare<ScopeParams, { relationship_type: string }>(`
      SELECT DISTINCT r.relationship_type
      FROM relationships r
      LEFT JOIN entities src ON src.id = r.source_entity_id
      WHERE ${RELATIONSHIP_SCOPE}
      ORDER BY r.relationship_type
    `)
            .all(scopeParams(scope))
            .map((row) => row.relationship_type);
    }

    countRelationships(scope: SyncScope = {}): number {
        const row = this.db
            .prepare<ScopeParams, { count: number }>(`
      SELECT COUNT(*) AS count
      FROM relationships r
      LEFT JOIN entities src ON src.id = r.source_entity_id
      WHERE ${RELATIONSHIP_SCOPE}
    `)
            .get(scopeParams(scope));
        return row?.count ?? 0;
    }

    sampleRelationships(scope: SyncScope, limit: number): RelationshipWithEndpoints[] {
        return this.db
            .prepare<ScopeParams & { limit: number }, RelationshipRow>(`
      ${RELATIONSHIP_SELECT}
      WHERE ${RELATIONSHIP_SCOPE}
      ORDER BY random()
      LIMIT @limit
    `)
            .all({ ...scopeParams(scope), limit })
            .map(toRelationshipRecord);
    }

    // ─── Sync runs ────────────────────────────────────────────

    /**
     * Append (or replace) a run in the history table.
     */
    recordSyncRun(run: SyncRunRecord): void {
        this.execute(
            `
      INSERT INTO sync_runs (run_id, scope, status, started_at, finished_at, nodes_succeeded, relationships_succeeded, failed, record)
      VALUES (@run_id, @scope, @status, @started_at, @finished_at, @nodes_succeeded, @relationships_succeeded, @failed, @record)
      ON CONFLICT(run_id) DO UPDATE SET
        status = excluded.status,
        finished_at = excluded.finished_at,
        nodes_succeeded = excluded.nodes_succeeded,
        relationships_succeeded = excluded.relationships_succeeded,
        failed = excluded.failed,
        record = excluded.record
    `,
            {
                run_id: run.runId,
                scope: run.scope,
                status: run.status,
                started_at: run.startedAt,
                finished_at: run.finishedAt,
                nodes_succeeded: run.nodes.succeeded,
                relationships_succeeded: run.relationships.succeeded,
                failed: run.nodes.failed + run.relationships.failed,
                record: run,
            }
        );
    }

    /**
     * Most recent runs first, optionally only those for one scope key.
     */
    getSyncRuns(limit = 20, scope?: string): SyncRunHistoryEntry[] {
        const where = scope === undefined ? '' : 'WHERE scope = ? ';
        const params: unknown[] = scope === undefined ? [limit] : [scope, limit];
        return this.db
            .prepare<
                unknown[],
                {
                    run_id: string;
                    scope: string;
                    status: string;
                    started_at: string;
                    finished_at: string;
                    nodes_succeeded: number;
                    relationships_succeeded: number;
                    failed: number;
                }
            >(
                `SELECT run_id, scope, status, started_at, finished_at, nodes_succeeded, relationships_succeeded, failed
         FROM sync_runs ${where}ORDER BY started_at DESC, run_id DESC LIMIT ?`
            )
            .all(...params)
            .map((row) => ({
                runId: row.run_id,
                scope: row.scope,
                status: row.status,
                startedAt: row.started_at,
                finishedAt: row.finished_at,
                nodesSucceeded: row.nodes_succeeded,
                relationshipsSucceeded: row.relationships_succeeded,
                failed: row.failed,
            }));
    }

    /**
     * Full stored record of one run, as decoded JSON.
     */
    getSyncRunRecord(runId: string): JsonValue | undefined {
        const row = this.db
            .prepare<[string], { record: string }>('SELECT record FROM sync_runs WHERE run_id = ?')
            .get(runId);
        return row ? decode(row.record, { form: 'text', context: { table: 'sync_runs', runId } }) : undefined;
    }

    // ─── Leases ───────────────────────────────────────────────

    /**
     * Take the lease on a scope unless another owner holds an unexpired one.
     */
    tryAcquireLease(scope: string, owner: string, ttlMs: number, now = Date.now()): boolean {
        const acquire = this.db.transaction(() => {
            this.execute('DELETE FROM sync_locks WHERE scope = ? AND expires_at <= ?', [scope, now]);
            const result = this.execute('INSERT OR IGNORE INTO sync_locks (scope, owner, expires_at) VALUES (?, ?, ?)', [
                scope,
                owner,
                now + ttlMs,
            ]);
            return result.changes > 0;
        });
        return acquire.immediate();
    }

    renewLease(scope: string, owner: string, ttlMs: number, now = Date.now()): boolean {
        const result = this.execute('UPDATE sync_locks SET expires_at = ? WHERE scope = ? AND owner = ?', [
            now + ttlMs,
            scope,
            owner,
        ]);
        return result.changes > 0;
    }

    releaseLease(scope: string, owner: string): void {
        this.execute('DELETE FROM sync_locks WHERE scope = ? AND owner = ?', [scope, owner]);
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): StoreStats {
        const count = (sql: string): number => this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

        const groupCounts = (sql: string): Record<string, number> => {
            const counts: Record<string, number> = {};
            for (const row of this.db.prepare<[], { type: string; count: number }>(sql).all()) {
                counts[row.type] = row.count;
            }
            return counts;
        };

        return {
            entities: count('SELECT COUNT(*) AS count FROM entities'),
            relationships: count('SELECT COUNT(*) AS count FROM relationships'),
            danglingRelationships: count(`
        SELECT COUNT(*) AS count FROM relationships r
        WHERE NOT EXISTS (SELECT 1 FROM entities e WHERE e.id = r.source_entity_id)
           OR NOT EXISTS (SELECT 1 FROM entities e WHERE e.id = r.target_entity_id)
      `),
            syncRuns: count('SELECT COUNT(*) AS count FROM sync_runs'),
            entitiesByType: groupCounts('SELECT entity_type AS type, COUNT(*) AS count FROM entities GROUP BY entity_type'),
            relationshipsByType: groupCounts(
                'SELECT relationship_type AS type, COUNT(*) AS count FROM relationships GROUP BY relationship_type'
            ),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Close the database connection.
     */
    close(): void {
        this.db.close();
        logger.debug('Relational store closed');
    }

    /**
     * Get the raw better-sqlite3 instance (for advanced queries).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

function toEntityRecord(row: EntityRow): EntityRecord {
    return {
        id: row.id,
        entity_type: row.entity_type,
        display_name: row.display_name,
        attributes: decode(row.attributes, { form: 'text', context: { table: 'entities', id: row.id } }),
        source_file_id: row.source_file_id,
        project_id: row.project_id,
    };
}

function toRelationshipRecord(row: RelationshipRow): RelationshipWithEndpoints {
    return {
        id: row.id,
        relationship_type: row.relationship_type,
        source_entity_id: row.source_entity_id,
        target_entity_id: row.target_entity_id,
        attributes: decode(row.attributes, { form: 'text', context: { table: 'relationships', id: row.id } }),
        source_file_id: row.source_file_id,
        project_id: row.project_id,
        source_entity_type: row.source_entity_type,
        target_entity_type: row.target_entity_type,
    };
}
