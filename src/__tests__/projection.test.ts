import { describe, it, expect } from 'vitest';
import { projectEntity, projectRelationship, toGraphValue } from '../sync/projection.js';
import { EncodingError } from '../utils/errors.js';
import type { EntityRecord, RelationshipRecord } from '../types/index.js';

function entity(overrides: Partial<EntityRecord> = {}): EntityRecord {
    return {
        id: 'e1',
        entity_type: 'research_paper',
        display_name: null,
        attributes: null,
        source_file_id: null,
        project_id: null,
        ...overrides,
    };
}

describe('toGraphValue', () => {
    it('should keep scalars and homogeneous lists native', () => {
        expect(toGraphValue('x')).toBe('x');
        expect(toGraphValue(0)).toBe(0);
        expect(toGraphValue(false)).toBe(false);
        expect(toGraphValue(['a', 'b'])).toEqual(['a', 'b']);
        expect(toGraphValue([1, 2.5])).toEqual([1, 2.5]);
        expect(toGraphValue([])).toEqual([]);
    });

    it('should store maps and mixed or nested lists as canonical text', () => {
        expect(toGraphValue({ b: 1, a: { d: null, c: true } })).toBe('{"a":{"c":true,"d":null},"b":1}');
        expect(toGraphValue([1, 'a'])).toBe('[1,"a"]');
        expect(toGraphValue([[1], [2]])).toBe('[[1],[2]]');
    });

    it('should omit null', () => {
        expect(toGraphValue(null)).toBeUndefined();
    });
});

describe('projectEntity', () => {
    it('should derive the label and flatten attributes into properties', () => {
        expect(
            projectEntity(
                entity({
                    display_name: 'Notes',
                    project_id: 'p1',
                    attributes: { year: 1843, venue: { name: 'Journal' }, note: null },
                })
            )
        ).toEqual({
            label: 'ResearchPaper',
            properties: {
                id: 'e1',
                entity_type: 'research_paper',
                display_name: 'Notes',
                project_id: 'p1',
                year: 1843,
                venue: '{"name":"Journal"}',
            },
        });
    });

    it('should move attributes that collide with reserved properties', () => {
        expect(projectEntity(entity({ attributes: { id: 'other', sync_scopes: ['x'] } })).properties).toEqual({
            id: 'e1',
            entity_type: 'research_paper',
            attr_id: 'other',
            attr_sync_scopes: ['x'],
        });
    });

    it('should reject an attribute that collides with a moved reserved one', () => {
        expect(() => projectEntity(entity({ attributes: { id: 'other', attr_id: 'mine' } }))).toThrow(
            new EncodingError('Attribute property "attr_id" is set by more than one attribute', '$.attr_id')
        );
        expect(() => projectEntity(entity({ attributes: { attr_id: 'mine', id: 'other' } }))).toThrow(
            'Attribute property "attr_id" is set by more than one attribute at $.id'
        );
        expect(projectEntity(entity({ attributes: { attr_id: 'mine', id: null } })).properties['attr_id']).toBe('mine');
    });

    it('should keep non-map attributes whole', () => {
        expect(projectEntity(entity({ attributes: [1, 2] })).properties['attributes']).toEqual([1, 2]);
        expect(projectEntity(entity({ attributes: 'plain text' })).properties['attributes']).toBe('plain text');
    });

    it('should throw for values with no JSON form', () => {
        expect(() => projectEntity(entity({ attributes: { scores: [1, Number.POSITIVE_INFINITY] } }))).toThrow(
            new EncodingError('Non-finite number Infinity has no JSON form', '$.scores[1]')
        );
    });
});

describe('projectRelationship', () => {
    it('should derive the type and carry scope columns', () => {
        const relationship: RelationshipRecord = {
            id: 'w1',
            relationship_type: 'works-at',
            source_entity_id: 'p1',
            target_entity_id: 'm1',
            attributes: { since: 2020 },
            source_file_id: 'f1',
            project_id: null,
        };

        expect(projectRelationship(relationship)).toEqual({
            type: 'WORKS_AT',
            properties: { id: 'w1', relationship_type: 'works-at', source_file_id: 'f1', since: 2020 },
        });
    });
});
