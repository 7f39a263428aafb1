import { z } from 'zod/v4';

// Domain
import { FollowUp } from '../../../../domain/entities/follow-up.entity.js';
import { KeyCharacter } from '../../../../domain/entities/key-character.entity.js';
import { NarrativeContext } from '../../../../domain/entities/narrative-context.entity.js';
import { StoryThread } from '../../../../domain/entities/story-thread.entity.js';
import { CharacterPosition } from '../../../../domain/value-objects/character-position.vo.js';
import { Keywords } from '../../../../domain/value-objects/keywords.vo.js';
import { StoryStatus } from '../../../../domain/value-objects/story-status.vo.js';

const storyDocumentSchema = z.object({
    first_seen: z.string(),
    id: z.string(),
    impact_score: z.number().default(0),
    keywords: z.array(z.string()).default([]),
    last_update: z.string(),
    mention_count: z.number().int().default(1),
    related_articles: z.array(z.string()).default([]),
    status: z.string().default('active'),
    summary: z.string(),
    topic: z.string(),
    weekly_highlight: z.boolean().default(false),
});

const positionDocumentSchema = z.object({
    date: z.string(),
    source_url: z.string().nullish(),
    stance: z.string().default(''),
});

const characterDocumentSchema = z.object({
    aliases: z.array(z.string()).default([]),
    name: z.string(),
    positions: z.array(positionDocumentSchema).default([]),
    role: z.string(),
});

const followUpDocumentSchema = z.object({
    created_at: z.string(),
    event: z.string(),
    expected_date: z.string(),
    id: z.string(),
    resolved: z.boolean().default(false),
    story_id: z.string().nullish(),
});

export const narrativeDocumentSchema = z.object({
    editorial_tone: z.string().optional(),
    key_characters: z.array(characterDocumentSchema).default([]),
    last_updated: z.string().nullish(),
    ongoing_storylines: z.array(storyDocumentSchema).default([]),
    pending_followups: z.array(followUpDocumentSchema).default([]),
});

export type NarrativeDocument = z.input<typeof narrativeDocumentSchema>;

/**
 * Maps the narrative context to and from its snake_case JSON document
 */
export class NarrativeMapper {
    constructor(private readonly defaultEditorialTone: string) {}

    toDocument(context: NarrativeContext): NarrativeDocument {
        return {
            editorial_tone: context.editorialTone,
            key_characters: context.keyCharacters.map((character) => ({
                aliases: character.aliases,
                name: character.name,
                positions: character.positions.map((position) => ({
                    date: position.date,
                    source_url: position.sourceUrl ?? null,
                    stance: position.stance,
                })),
                role: character.role,
            })),
            last_updated: context.lastUpdated?.toISOString() ?? null,
            ongoing_storylines: context.ongoingStorylines.map((story) => ({
                first_seen: story.firstSeen,
                id: story.id,
                impact_score: story.impactScore,
                keywords: story.keywords.toArray(),
                last_update: story.lastUpdate,
                mention_count: story.mentionCount,
                related_articles: story.relatedArticles,
                status: story.status.value,
                summary: story.summary,
                topic: story.topic,
                weekly_highlight: story.weeklyHighlight,
            })),
            pending_followups: context.pendingFollowups.map((followUp) => ({
                created_at: followUp.createdAt,
                event: followUp.event,
                expected_date: followUp.expectedDate,
                id: followUp.id,
                resolved: followUp.resolved,
                story_id: followUp.storyId ?? null,
            })),
        };
    }

    /**
     * @throws when the document does not describe a valid narrative context
     */
    toDomain(raw: unknown): NarrativeContext {
        const document = narrativeDocumentSchema.parse(raw);

        return new NarrativeContext({
            editorialTone: document.editorial_tone ?? this.defaultEditorialTone,
            keyCharacters: document.key_characters.map(
                (character) =>
                    new KeyCharacter({
                        aliases: character.aliases,
                        name: character.name,
                        positions: character.positions.map(
                            (position) =>
                                new CharacterPosition({
                                    date: position.date,
                                    sourceUrl: position.source_url ?? undefined,
                                    stance: position.stance,
                                }),
                        ),
                        role: character.role,
                    }),
            ),
            lastUpdated: parseTimestamp(document.last_updated),
            ongoingStorylines: document.ongoing_storylines.map(
                (story) =>
                    new StoryThread({
                        firstSeen: story.first_seen,
                        id: story.id,
                        impactScore: story.impact_score,
                        keywords: new Keywords(story.keywords),
                        lastUpdate: story.last_update,
                        mentionCount: story.mention_count,
                        relatedArticles: story.related_articles,
                        status: new StoryStatus(story.status),
                        summary: story.summary,
                        topic: story.topic,
                        weeklyHighlight: story.weekly_highlight,
                    }),
            ),
            pendingFollowups: document.pending_followups.map(
                (followUp) =>
                    new FollowUp({
                        createdAt: followUp.created_at,
                        event: followUp.event,
                        expectedDate: followUp.expected_date,
                        id: followUp.id,
                        resolved: followUp.resolved,
                        storyId: followUp.story_id ?? undefined,
                    }),
            ),
        });
    }
}

function parseTimestamp(value: null | string | undefined): Date | null {
    if (!value) return null;

    const timestamp = new Date(value);
    return Number.isNaN(timestamp.getTime()) ? null : timestamp;
}
