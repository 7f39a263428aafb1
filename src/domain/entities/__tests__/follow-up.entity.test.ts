import { describe, expect, test } from 'vitest';

import { FollowUp } from '../follow-up.entity.js';

describe('FollowUp', () => {
    const followUp = new FollowUp({
        createdAt: '2026-01-10',
        event: 'Voto finale  sul decreto carceri',
        expectedDate: '2026-02-15',
        id: 'followup-1',
        storyId: 'story-that-no-longer-exists',
    });

    test('should default to unresolved', () => {
        expect(followUp.resolved).toBe(false);
    });

    test('should be due on or after its expected date', () => {
        expect(followUp.isDue('2026-02-14')).toBe(false);
        expect(followUp.isDue('2026-02-15')).toBe(true);
        expect(followUp.isDue('2026-03-01')).toBe(true);
    });

    test('should never be due once resolved', () => {
        // Given
        const resolved = new FollowUp({
            createdAt: '2026-01-10',
            event: 'Voto finale sul decreto carceri',
            expectedDate: '2026-02-15',
            id: 'followup-1',
            resolved: true,
        });

        // Then
        expect(resolved.isDue('2026-03-01')).toBe(false);
    });

    test('should compare events ignoring case and spacing', () => {
        expect(followUp.describesSameEvent('voto finale sul decreto carceri', '2026-02-15')).toBe(
            true,
        );
        expect(followUp.describesSameEvent('voto finale sul decreto carceri', '2026-02-16')).toBe(
            false,
        );
    });

    test('should reject an invalid expected date', () => {
        expect(
            () =>
                new FollowUp({
                    createdAt: '2026-01-10',
                    event: 'Udienza',
                    expectedDate: 'next week',
                    id: 'followup-2',
                }),
        ).toThrow('Invalid follow-up data');
    });
});
