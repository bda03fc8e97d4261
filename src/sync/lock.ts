import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { setTimeout as sleep } from 'node:timers/promises';
import type { RelationalStore } from '../storage/database.js';
import { LockTimeoutError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

export type ReleaseLock = () => Promise<void>;

/**
 * Mutual exclusion per scope key. At most one export per scope runs at a time.
 */
export interface ScopeLock {
    acquire(scope: string, timeoutMs: number): Promise<ReleaseLock>;
}

interface Holder {
    released: Promise<void>;
    release: () => void;
}

function createHolder(): Holder {
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
        release = resolve;
    });
    return { released, release };
}

/**
 * Wait for `promise` up to `ms`. Resolves true when it settled in time.
 */
async function settlesWithin(promise: Promise<void>, ms: number): Promise<boolean> {
    const timer = new AbortController();
    try {
        return await Promise.race([
            promise.then(() => true),
            sleep(ms, false, { signal: timer.signal }),
        ]);
    } finally {
        timer.abort();
    }
}

/**
 * Lock held in this process's memory.
 */
export class InProcessScopeLock implements ScopeLock {
    private readonly holders = new Map<string, Holder>();

    async acquire(scope: string, timeoutMs: number): Promise<ReleaseLock> {
        const deadline = Date.now() + timeoutMs;

        for (let current = this.holders.get(scope); current; current = this.holders.get(scope)) {
            const remaining = deadline - Date.now();
            if (remaining <= 0 || !(await settlesWithin(current.released, remaining))) {
                throw new LockTimeoutError(scope, timeoutMs);
            }
        }

        const holder = createHolder();
        this.holders.set(scope, holder);

        return async () => {
            if (this.holders.get(scope) === holder) {
                this.holders.delete(scope);
            }
            holder.release();
        };
    }

    isHeld(scope: string): boolean {
        return this.holders.has(scope);
    }
}

export interface DatabaseScopeLockOptions {
    /** Lease lifetime; renewed while held. */
    ttlMs: number;
    pollIntervalMs?: number;
}

/**
 * Lease row in the relational store's `sync_locks` table, so separate
 * processes sharing the store serialize too. Expired leases are taken over.
 */
export class DatabaseScopeLock implements ScopeLock {
    private readonly owner = `${hostname()}:${process.pid}:${randomUUID()}`;
    private readonly pollIntervalMs: number;

    constructor(
        private readonly store: RelationalStore,
        private readonly options: DatabaseScopeLockOptions
    ) {
        this.pollIntervalMs = options.pollIntervalMs ?? 250;
    }

    async acquire(scope: string, timeoutMs: number): Promise<ReleaseLock> {
        const deadline = Date.now() + timeoutMs;

        while (!this.store.tryAcquireLease(scope, this.owner, this.options.ttlMs)) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                throw new LockTimeoutError(scope, timeoutMs);
            }
            await sleep(Math.min(this.pollIntervalMs, remaining));
        }

        const renewal = setInterval(() => {
            if (!this.store.renewLease(scope, this.owner, this.options.ttlMs)) {
                getLogger().warn({ scope }, 'Scope lease was lost while held');
            }
        }, Math.max(1, Math.floor(this.options.ttlMs / 3)));
        renewal.unref();

        return async () => {
            clearInterval(renewal);
            this.store.releaseLease(scope, this.owner);
        };
    }
}
