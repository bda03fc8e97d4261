import { setTimeout as sleep } from 'node:timers/promises';
import { BatchTimeoutError } from './errors.js';

/**
 * Run `work` with a deadline. On expiry the signal handed to `work` is
 * aborted, the call waits for `work` to stop, then rejects with
 * BatchTimeoutError so the caller can roll back.
 */
export async function withTimeout<T>(
    operation: string,
    timeoutMs: number,
    work: (signal: AbortSignal) => Promise<T>
): Promise<T> {
    const workController = new AbortController();
    const timerController = new AbortController();
    const pending = work(workController.signal);

    const expired = sleep(timeoutMs, 'expired' as const, { signal: timerController.signal }).catch((error: unknown) => {
        if (timerController.signal.aborted) return 'cleared' as const;
        throw error;
    });

    try {
        const outcome = await Promise.race([pending.then((value) => ({ value })), expired]);
        if (typeof outcome === 'string') {
            workController.abort();
            await Promise.allSettled([pending]);
            throw new BatchTimeoutError(operation, timeoutMs);
        }
        return outcome.value;
    } finally {
        timerController.abort();
    }
}

/**
 * Throw the signal's reason when it has been aborted.
 */
export function throwIfAborted(signal: AbortSignal, operation: string): void {
    if (signal.aborted) {
        throw signal.reason instanceof Error ? signal.reason : new Error(`${operation} was interrupted`);
    }
}
