// Domain
import { type FollowUp } from '../../../../domain/entities/follow-up.entity.js';
import { type KeyCharacter } from '../../../../domain/entities/key-character.entity.js';
import { type StoryThread } from '../../../../domain/entities/story-thread.entity.js';
import { type StoryStatusType } from '../../../../domain/value-objects/story-status.vo.js';

type StoryResponse = {
    firstSeen: string;
    id: string;
    impactScore: number;
    keywords: string[];
    lastUpdate: string;
    mentionCount: number;
    relatedArticles: string[];
    status: StoryStatusType;
    summary: string;
    topic: string;
    weeklyHighlight: boolean;
};

type CharacterResponse = {
    aliases: string[];
    name: string;
    positions: Array<{
        date: string;
        sourceUrl: null | string;
        stance: string;
    }>;
    role: string;
};

type FollowUpResponse = {
    createdAt: string;
    event: string;
    expectedDate: string;
    id: string;
    storyId: null | string;
};

type HttpListResponse<T> = {
    items: T[];
    total: number;
};

/**
 * Formats narrative memory entities for the HTTP API
 */
export class NarrativeResponsePresenter {
    presentCharacter(character: KeyCharacter): CharacterResponse {
        return {
            aliases: character.aliases,
            name: character.name,
            positions: character.positions.map((position) => ({
                date: position.date,
                sourceUrl: position.sourceUrl ?? null,
                stance: position.stance,
            })),
            role: character.role,
        };
    }

    presentFollowUps(followUps: FollowUp[]): HttpListResponse<FollowUpResponse> {
        return {
            items: followUps.map((followUp) => ({
                createdAt: followUp.createdAt,
                event: followUp.event,
                expectedDate: followUp.expectedDate,
                id: followUp.id,
                storyId: followUp.storyId ?? null,
            })),
            total: followUps.length,
        };
    }

    presentStories(stories: StoryThread[]): HttpListResponse<StoryResponse> {
        return {
            items: stories.map((story) => this.presentStory(story)),
            total: stories.length,
        };
    }

    presentStory(story: StoryThread): StoryResponse {
        return {
            firstSeen: story.firstSeen,
            id: story.id,
            impactScore: story.impactScore,
            keywords: story.keywords.toArray(),
            lastUpdate: story.lastUpdate,
            mentionCount: story.mentionCount,
            relatedArticles: story.relatedArticles,
            status: story.status.value,
            summary: story.summary,
            topic: story.topic,
            weeklyHighlight: story.weeklyHighlight,
        };
    }
}
