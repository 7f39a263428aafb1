import { describe, expect, it, test } from 'vitest';

import { getMockArticle } from '../../entities/__mocks__/articles.mock.js';
import { getMockStoryThread } from '../../entities/__mocks__/story-threads.mock.js';
import { NarrativeContext } from '../../entities/narrative-context.entity.js';
import { CharacterPosition } from '../../value-objects/character-position.vo.js';
import {
    extractKeywords,
    findMatchingStories,
    findMentionedCharacters,
    keywordOverlap,
    normalizeText,
} from '../keyword-matcher.js';

describe('Keyword matcher', () => {
    describe('extractKeywords', () => {
        test('should keep distinct lowercase tokens of four letters or more', () => {
            // When
            const keywords = extractKeywords(
                'Il Senato vota il DECRETO: più città, più carceri, 2026 senato',
            );

            // Then
            expect([...keywords]).toEqual(['senato', 'vota', 'decreto', 'città', 'carceri']);
        });
    });

    describe('keywordOverlap', () => {
        it.each([
            { expected: 1, left: ['a1', 'b1'], right: ['a1', 'b1'] },
            { expected: 0, left: ['a1'], right: ['b1'] },
            { expected: 0, left: [], right: ['b1'] },
            { expected: 0, left: [], right: [] },
            { expected: 0.5, left: ['a1', 'b1'], right: ['a1', 'b1', 'c1', 'd1'] },
            { expected: 1 / 3, left: ['a1', 'b1'], right: ['b1', 'c1'] },
        ])('should score $left against $right as $expected', ({ expected, left, right }) => {
            // When
            const score = keywordOverlap(new Set(left), new Set(right));

            // Then
            expect(score).toBeCloseTo(expected);
            expect(score).toBeGreaterThanOrEqual(0);
            expect(score).toBeLessThanOrEqual(1);
        });
    });

    describe('findMatchingStories', () => {
        const article = getMockArticle({
            content: '',
            summary: '',
            title: 'Decreto carceri approvato',
        });

        test('should rank stories by overlap and drop those below the threshold', () => {
            // Given
            const context = new NarrativeContext({
                editorialTone: '',
                keyCharacters: [],
                lastUpdated: null,
                ongoingStorylines: [
                    getMockStoryThread({
                        id: 'partial',
                        keywords: ['decreto'],
                        summary: '',
                        topic: 'Riforma',
                    }),
                    getMockStoryThread({
                        id: 'strong',
                        keywords: ['decreto', 'carceri', 'approvato'],
                        summary: '',
                        topic: 'Decreto',
                    }),
                    getMockStoryThread({
                        id: 'unrelated',
                        keywords: ['sanità'],
                        summary: '',
                        topic: 'Ospedali',
                    }),
                ],
                pendingFollowups: [],
            });

            // When
            const matches = findMatchingStories(article, context);

            // Then
            expect(matches.map((match) => [match.story.id, match.score])).toEqual([
                ['strong', 1],
                ['partial', 0.25],
            ]);
        });

        test('should never match resolved stories', () => {
            // Given
            const context = new NarrativeContext({
                editorialTone: '',
                keyCharacters: [],
                lastUpdated: null,
                ongoingStorylines: [
                    getMockStoryThread({
                        keywords: ['decreto', 'carceri', 'approvato'],
                        status: 'resolved',
                        summary: '',
                        topic: 'Decreto',
                    }),
                ],
                pendingFollowups: [],
            });

            // Then
            expect(findMatchingStories(article, context, 0)).toEqual([]);
        });
    });

    describe('findMentionedCharacters', () => {
        test('should report a character once even when several aliases match', () => {
            // Given
            const context = NarrativeContext.empty();
            const position = new CharacterPosition({ date: '2026-01-10', stance: 'Favorevole' });
            context.addCharacter(
                {
                    aliases: ['Ministro Nordio', 'Guardasigilli'],
                    name: 'Carlo Nordio',
                    role: 'Ministro',
                },
                position,
            );
            context.addCharacter(
                { aliases: [], name: 'Andrea Ostellari', role: 'Sottosegretario' },
                position,
            );
            const article = getMockArticle({
                content: 'Il guardasigilli ha parlato. Il   ministro\nnordio ha poi aggiunto...',
                title: 'Carlo Nordio in Senato',
            });

            // When
            const mentioned = findMentionedCharacters(article, context);

            // Then
            expect(mentioned.map((character) => character.name)).toEqual(['Carlo Nordio']);
        });
    });

    test('should collapse whitespace when normalizing text', () => {
        expect(normalizeText('  Ministro\n\tNORDIO  ')).toBe('ministro nordio');
    });
});
