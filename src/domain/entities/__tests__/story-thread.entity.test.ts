import { describe, expect, test } from 'vitest';

import { Keywords } from '../../value-objects/keywords.vo.js';
import { StoryStatus } from '../../value-objects/story-status.vo.js';
import { getMockStoryThread } from '../__mocks__/story-threads.mock.js';
import { StoryThread } from '../story-thread.entity.js';

describe('StoryThread', () => {
    test('should reject a last update earlier than the first sighting', () => {
        expect(
            () =>
                new StoryThread({
                    firstSeen: '2026-01-10',
                    id: 'story-1',
                    impactScore: 0.5,
                    keywords: new Keywords(['carceri']),
                    lastUpdate: '2026-01-09',
                    mentionCount: 1,
                    relatedArticles: [],
                    status: new StoryStatus('active'),
                    summary: '',
                    topic: 'Decreto Carceri',
                }),
        ).toThrow('Invalid story thread data');
    });

    test('should reject an impact score outside [0, 1]', () => {
        expect(
            () =>
                new StoryThread({
                    firstSeen: '2026-01-10',
                    id: 'story-1',
                    impactScore: 1.2,
                    keywords: new Keywords(),
                    lastUpdate: '2026-01-10',
                    mentionCount: 1,
                    relatedArticles: [],
                    status: new StoryStatus('active'),
                    summary: '',
                    topic: 'Decreto Carceri',
                }),
        ).toThrow('Invalid story thread data');
    });

    describe('merge', () => {
        test('should apply the update with a single extra mention', () => {
            // Given
            const story = getMockStoryThread({ mentionCount: 3 });

            // When
            const merged = story.merge(
                {
                    articleUrls: [
                        'https://example.org/articoli/decreto-carceri',
                        'https://example.org/a',
                        'https://example.org/b',
                        'https://example.org/a',
                    ],
                    impactScore: 0.8,
                    keywords: ['Senato', 'carceri'],
                    summary: 'Il decreto passa al Senato.',
                },
                '2026-02-01',
            );

            // Then
            expect(merged.mentionCount).toBe(4);
            expect(merged.summary).toBe('Il decreto passa al Senato.');
            expect(merged.impactScore).toBe(0.8);
            expect(merged.lastUpdate).toBe('2026-02-01');
            expect(merged.keywords.toArray()).toEqual(['decreto', 'carceri', 'senato']);
            expect(merged.relatedArticles).toEqual([
                'https://example.org/articoli/decreto-carceri',
                'https://example.org/a',
                'https://example.org/b',
            ]);
            expect(merged.id).toBe(story.id);
            expect(story.mentionCount).toBe(3);
        });

        test('should not count a second mention within the same run', () => {
            // Given
            const story = getMockStoryThread({ mentionCount: 2 });

            // When
            const merged = story.merge(
                { articleUrls: [], impactScore: 0.4, keywords: [], summary: 'Aggiornamento' },
                '2026-01-10',
                false,
            );

            // Then
            expect(merged.mentionCount).toBe(2);
        });

        test('should never move the last update backwards', () => {
            // Given
            const story = getMockStoryThread({ lastUpdate: '2026-03-01' });

            // When
            const merged = story.merge(
                { articleUrls: [], impactScore: 0.4, keywords: [], summary: 'Aggiornamento' },
                '2026-02-01',
            );

            // Then
            expect(merged.lastUpdate).toBe('2026-03-01');
        });
    });

    describe('matchesKeyword', () => {
        test('should match substrings of the topic or of stored keywords', () => {
            // Given
            const story = getMockStoryThread({
                keywords: ['sovraffollamento'],
                topic: 'Decreto Carceri',
            });

            // Then
            expect(story.matchesKeyword('DECRETO')).toBe(true);
            expect(story.matchesKeyword('affolla')).toBe(true);
            expect(story.matchesKeyword('amnistia')).toBe(false);
            expect(story.matchesKeyword('  ')).toBe(false);
        });
    });

    test('should consider a story stale strictly past the threshold', () => {
        // Given
        const story = getMockStoryThread({ lastUpdate: '2026-01-10' });

        // Then
        expect(story.isStale('2026-04-10', 90)).toBe(false);
        expect(story.isStale('2026-04-11', 90)).toBe(true);
    });
});
