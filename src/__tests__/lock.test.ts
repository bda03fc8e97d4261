import { describe, it, expect, afterEach } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { InProcessScopeLock, DatabaseScopeLock } from '../sync/lock.js';
import { RelationalStore } from '../storage/database.js';
import { LockTimeoutError } from '../utils/errors.js';

describe('InProcessScopeLock', () => {
    it('should time out while the scope is held', async () => {
        const lock = new InProcessScopeLock();
        await lock.acquire('all', 0);

        await expect(lock.acquire('all', 10)).rejects.toThrow(
            new LockTimeoutError('all', 10)
        );
        expect(new LockTimeoutError('all', 10).message).toBe('Scope "all" is locked by another export (waited 10ms)');
    });

    it('should hand the scope to a waiter once released', async () => {
        const lock = new InProcessScopeLock();
        const release = await lock.acquire('all', 0);

        const waiting = lock.acquire('all', 1000);
        await sleep(10);
        await release();

        const second = await waiting;
        expect(lock.isHeld('all')).toBe(true);
        await second();
        expect(lock.isHeld('all')).toBe(false);
    });

    it('should lock scopes independently', async () => {
        const lock = new InProcessScopeLock();
        await lock.acquire('project:a', 0);

        const release = await lock.acquire('project:b', 0);
        expect(lock.isHeld('project:a')).toBe(true);
        expect(lock.isHeld('project:b')).toBe(true);
        await release();
    });

    it('should ignore a second release', async () => {
        const lock = new InProcessScopeLock();
        const first = await lock.acquire('all', 0);
        await first();
        const second = await lock.acquire('all', 0);

        await first();
        expect(lock.isHeld('all')).toBe(true);
        await second();
    });
});

describe('DatabaseScopeLock', () => {
    let store: RelationalStore;

    afterEach(() => {
        store.close();
    });

    it('should serialize owners sharing a store', async () => {
        store = new RelationalStore(':memory:');
        const first = new DatabaseScopeLock(store, { ttlMs: 60_000, pollIntervalMs: 5 });
        const second = new DatabaseScopeLock(store, { ttlMs: 60_000, pollIntervalMs: 5 });

        const release = await first.acquire('all', 0);
        await expect(second.acquire('all', 30)).rejects.toBeInstanceOf(LockTimeoutError);

        await release();
        const releaseSecond = await second.acquire('all', 0);
        await releaseSecond();
    });

    it('should acquire once the holder releases during the wait', async () => {
        store = new RelationalStore(':memory:');
        const first = new DatabaseScopeLock(store, { ttlMs: 60_000, pollIntervalMs: 5 });
        const second = new DatabaseScopeLock(store, { ttlMs: 60_000, pollIntervalMs: 5 });

        const release = await first.acquire('file:f1', 0);
        const waiting = second.acquire('file:f1', 1000);
        await sleep(15);
        await release();

        const releaseSecond = await waiting;
        await releaseSecond();
        expect(store.tryAcquireLease('file:f1', 'someone-else', 1000)).toBe(true);
    });
});
