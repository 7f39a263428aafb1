import { describe, expect, test } from 'vitest';

import { Keywords } from '../keywords.vo.js';

describe('Keywords', () => {
    test('should lowercase, trim and deduplicate keywords', () => {
        // Given
        const keywords = new Keywords(['Carceri', ' carceri ', 'DECRETO', '']);

        // Then
        expect(keywords.toArray()).toEqual(['carceri', 'decreto']);
        expect(keywords.size).toBe(2);
    });

    test('should only grow through union', () => {
        // Given
        const keywords = new Keywords(['decreto', 'carceri']);

        // When
        const merged = keywords.union(['Senato', 'decreto']);

        // Then
        expect(merged.toArray()).toEqual(['decreto', 'carceri', 'senato']);
        expect(keywords.toArray()).toEqual(['decreto', 'carceri']);
    });

    test('should look up keywords case-insensitively', () => {
        expect(new Keywords(['senato']).has('SENATO')).toBe(true);
        expect(new Keywords(['senato']).has('camera')).toBe(false);
    });
});
