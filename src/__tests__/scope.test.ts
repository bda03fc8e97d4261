import { describe, it, expect } from 'vitest';
import { scopeKey, parseScope, ALL_SCOPE_KEY } from '../sync/scope.js';
import { SyncError } from '../utils/errors.js';

describe('scopeKey', () => {
    it('should key the empty scope as all', () => {
        expect(scopeKey({})).toBe(ALL_SCOPE_KEY);
        expect(ALL_SCOPE_KEY).toBe('all');
    });

    it('should key project and file scopes', () => {
        expect(scopeKey({ projectId: 'p1' })).toBe('project:p1');
        expect(scopeKey({ sourceFileId: 'f1' })).toBe('file:f1');
        expect(scopeKey({ sourceFileId: 'f1', projectId: 'p1' })).toBe('project:p1/file:f1');
    });

    it('should escape separators inside ids', () => {
        expect(scopeKey({ projectId: 'a/file:b' })).toBe('project:a%2Ffile%3Ab');
        expect(scopeKey({ projectId: 'a', sourceFileId: 'b' })).toBe('project:a/file:b');
        expect(scopeKey({ sourceFileId: '100%' })).toBe('file:100%25');
    });
});

describe('parseScope', () => {
    it('should parse every key form', () => {
        expect(parseScope('all')).toEqual({});
        expect(parseScope('  ')).toEqual({});
        expect(parseScope('project:p1')).toEqual({ projectId: 'p1' });
        expect(parseScope('file:f1/project:p1')).toEqual({ projectId: 'p1', sourceFileId: 'f1' });
    });

    it('should invert scopeKey', () => {
        const scope = { projectId: 'alpha', sourceFileId: 'notes.csv' };
        expect(parseScope(scopeKey(scope))).toEqual(scope);
        expect(parseScope(scopeKey({ projectId: 'a/file:b' }))).toEqual({ projectId: 'a/file:b' });
        expect(parseScope(scopeKey({ sourceFileId: 's3://bucket/%2F' }))).toEqual({ sourceFileId: 's3://bucket/%2F' });
    });

    it('should keep colons inside ids', () => {
        expect(parseScope('file:s3:bucket')).toEqual({ sourceFileId: 's3:bucket' });
    });

    it('should reject malformed scopes', () => {
        expect(() => parseScope('project:')).toThrow(new SyncError('INVALID_SCOPE', 'Scope part "project:" has no id'));
        expect(() => parseScope('team:x')).toThrow(new SyncError('INVALID_SCOPE', 'Unexpected scope part "team:x"'));
        expect(() => parseScope('project:a/project:b')).toThrow('Unexpected scope part "project:b"');
    });
});
