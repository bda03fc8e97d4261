import type { SyncRunRecord } from '../types/index.js';

export type SyncErrorCode =
    | 'ENCODING_ERROR'
    | 'CONNECTIVITY_ERROR'
    | 'BATCH_TIMEOUT'
    | 'LOCK_TIMEOUT'
    | 'EXPORT_ABORTED'
    | 'INVALID_OPTION'
    | 'INVALID_SCOPE'
    | 'INVALID_CONFIG'
    | 'INVALID_RECORD_FILE';

/**
 * Base error for everything raised by the sync core.
 */
export class SyncError extends Error {
    readonly code: SyncErrorCode;
    readonly details: Record<string, unknown>;

    constructor(code: SyncErrorCode, message: string, options: { details?: Record<string, unknown>; cause?: unknown } = {}) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = 'SyncError';
        this.code = code;
        this.details = options.details ?? {};
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * A value the semi-structured codec cannot represent as JSON.
 */
export class EncodingError extends SyncError {
    readonly path: string;

    constructor(message: string, path: string) {
        super('ENCODING_ERROR', `${message} at ${path}`, { details: { path } });
        this.name = 'EncodingError';
        this.path = path;
    }
}

/**
 * A store could not be reached, or the connection dropped mid-run.
 */
export class ConnectivityError extends SyncError {
    constructor(message: string, cause?: unknown) {
        super('CONNECTIVITY_ERROR', message, { cause });
        this.name = 'ConnectivityError';
    }
}

export class BatchTimeoutError extends SyncError {
    readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number, cause?: unknown) {
        super('BATCH_TIMEOUT', `${operation} timed out after ${timeoutMs}ms`, { details: { operation, timeoutMs }, cause });
        this.name = 'BatchTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

export class LockTimeoutError extends SyncError {
    readonly scope: string;

    constructor(scope: string, timeoutMs: number) {
        super('LOCK_TIMEOUT', `Scope "${scope}" is locked by another export (waited ${timeoutMs}ms)`, {
            details: { scope, timeoutMs },
        });
        this.name = 'LockTimeoutError';
        this.scope = scope;
    }
}

/**
 * Thrown when an export cannot continue at all. Carries the partial run.
 */
export class ExportAbortedError extends SyncError {
    readonly run: SyncRunRecord;

    constructor(message: string, run: SyncRunRecord, cause?: unknown) {
        super('EXPORT_ABORTED', message, { details: { runId: run.runId, scope: run.scope }, cause });
        this.name = 'ExportAbortedError';
        this.run = run;
    }
}

/**
 * Driver and socket error codes that mean the store itself is unreachable.
 */
const CONNECTIVITY_CODES = new Set([
    'ServiceUnavailable',
    'SessionExpired',
    'Neo.ClientError.Security.Unauthorized',
    'ECONNREFUSED',
    'ECONNRESET',
    'ENOTFOUND',
    'EHOSTUNREACH',
    'ETIMEDOUT',
    'SQLITE_CANTOPEN',
    'SQLITE_IOERR',
]);

/** Server-side transaction timeouts, including the one set by the client's transaction config. */
const TIMEOUT_CODE_PREFIX = 'Neo.ClientError.Transaction.TransactionTimedOut';

function errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
}

export function isConnectivityError(error: unknown): boolean {
    if (error instanceof ConnectivityError) return true;
    const code = errorCode(error);
    return code !== undefined && CONNECTIVITY_CODES.has(code);
}

export function isTimeoutError(error: unknown): boolean {
    if (error instanceof BatchTimeoutError) return true;
    return errorCode(error)?.startsWith(TIMEOUT_CODE_PREFIX) ?? false;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
