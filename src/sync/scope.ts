import type { SyncScope } from '../types/index.js';
import { SyncError } from '../utils/errors.js';

export const ALL_SCOPE_KEY = 'all';

const ESCAPES: Record<string, string> = { '%': '%25', '/': '%2F', ':': '%3A' };
const UNESCAPES: Record<string, string> = { '%25': '%', '%2F': '/', '%3A': ':' };

/** Percent-encode the characters that delimit scope key parts. */
function escapeId(id: string): string {
    return id.replace(/[%/:]/g, (char) => ESCAPES[char] ?? char);
}

function unescapeId(id: string): string {
    return id.replace(/%(?:25|2F|3A)/gi, (sequence) => UNESCAPES[sequence.toUpperCase()] ?? sequence);
}

/**
 * Stable key for a scope. Graph data written by a run is tagged with it.
 * Ids are escaped so distinct scopes never share a key.
 */
export function scopeKey(scope: SyncScope): string {
    const parts: string[] = [];
    if (scope.projectId !== undefined) parts.push(`project:${escapeId(scope.projectId)}`);
    if (scope.sourceFileId !== undefined) parts.push(`file:${escapeId(scope.sourceFileId)}`);
    return parts.length > 0 ? parts.join('/') : ALL_SCOPE_KEY;
}

/**
 * Parse the textual form accepted by the CLI: `all`, `project:<id>`,
 * `file:<id>` or both joined with `/`. `%2F`, `%3A` and `%25` in an id
 * stand for `/`, `:` and `%`.
 */
export function parseScope(text: string): SyncScope {
    const trimmed = text.trim();
    if (trimmed === '' || trimmed === ALL_SCOPE_KEY) return {};

    const scope: SyncScope = {};
    for (const part of trimmed.split('/')) {
        const separator = part.indexOf(':');
        const kind = separator === -1 ? part : part.slice(0, separator);
        const id = separator === -1 ? '' : unescapeId(part.slice(separator + 1));

        if (!id) {
            throw new SyncError('INVALID_SCOPE', `Scope part "${part}" has no id`, { details: { scope: text } });
        }
        if (kind === 'project' && scope.projectId === undefined) {
            scope.projectId = id;
        } else if (kind === 'file' && scope.sourceFileId === undefined) {
            scope.sourceFileId = id;
        } else {
            throw new SyncError('INVALID_SCOPE', `Unexpected scope part "${part}"`, { details: { scope: text } });
        }
    }
    return scope;
}
