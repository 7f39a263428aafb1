import { z } from 'zod/v4';

import { subtractDaysFromIsoDate } from '../../shared/date/calendar-date.js';
import { calendarDateSchema } from '../value-objects/calendar-date.vo.js';
import { Keywords } from '../value-objects/keywords.vo.js';
import { StoryStatus } from '../value-objects/story-status.vo.js';

export const storyThreadSchema = z
    .object({
        firstSeen: calendarDateSchema.describe('Run date the story was first tracked'),
        id: z.string().min(1).describe('Opaque identifier, immutable for the lifetime of the store'),
        impactScore: z.number().min(0).max(1).describe('Editorial weight of the story'),
        keywords: z.instanceof(Keywords),
        lastUpdate: calendarDateSchema.describe('Run date of the latest merge'),
        mentionCount: z.number().int().min(1).describe('Number of runs that touched the story'),
        relatedArticles: z.array(z.string().min(1)).describe('Source URLs, without duplicates'),
        status: z.instanceof(StoryStatus),
        summary: z.string(),
        topic: z.string().trim().min(1).describe('Short label of the narrative arc'),
        weeklyHighlight: z.boolean().default(false),
    })
    .refine((story) => story.lastUpdate >= story.firstSeen, {
        message: 'lastUpdate must not precede firstSeen',
        path: ['lastUpdate'],
    });

export type StoryThreadProps = z.input<typeof storyThreadSchema>;

export type StoryUpdate = {
    articleUrls: string[];
    impactScore?: number;
    keywords: string[];
    summary: string;
};

/**
 * @description A narrative arc tracked across issues of the newsletter
 */
export class StoryThread {
    public readonly firstSeen: string;
    public readonly id: string;
    public readonly impactScore: number;
    public readonly keywords: Keywords;
    public readonly lastUpdate: string;
    public readonly mentionCount: number;
    public readonly relatedArticles: string[];
    public readonly status: StoryStatus;
    public readonly summary: string;
    public readonly topic: string;
    public readonly weeklyHighlight: boolean;

    public constructor(data: StoryThreadProps) {
        const result = storyThreadSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid story thread data: ${result.error.message}`);
        }

        const validatedData = result.data;
        this.id = validatedData.id;
        this.topic = validatedData.topic;
        this.status = validatedData.status;
        this.firstSeen = validatedData.firstSeen;
        this.lastUpdate = validatedData.lastUpdate;
        this.summary = validatedData.summary;
        this.keywords = validatedData.keywords;
        this.relatedArticles = [...new Set(validatedData.relatedArticles)];
        this.mentionCount = validatedData.mentionCount;
        this.impactScore = validatedData.impactScore;
        this.weeklyHighlight = validatedData.weeklyHighlight;
    }

    public isStale(asOf: string, maxAgeDays: number): boolean {
        return this.lastUpdate < subtractDaysFromIsoDate(asOf, maxAgeDays);
    }

    /**
     * Substring match on the topic or on any stored keyword
     */
    public matchesKeyword(keyword: string): boolean {
        const needle = keyword.trim().toLowerCase();
        if (needle.length === 0) return false;

        return (
            this.topic.toLowerCase().includes(needle) ||
            this.keywords.toArray().some((stored) => stored.includes(needle))
        );
    }

    /**
     * Merges an extracted update.
     * The mention is counted only when `countMention` is set, so a story touched
     * several times in one run still gains a single mention.
     */
    public merge(update: StoryUpdate, runDate: string, countMention = true): StoryThread {
        return this.with({
            impactScore: update.impactScore ?? this.impactScore,
            keywords: this.keywords.union(update.keywords),
            lastUpdate: runDate > this.lastUpdate ? runDate : this.lastUpdate,
            mentionCount: countMention ? this.mentionCount + 1 : this.mentionCount,
            relatedArticles: [...this.relatedArticles, ...update.articleUrls],
            summary: update.summary,
        });
    }

    public toDormant(): StoryThread {
        return this.with({ status: new StoryStatus('dormant') });
    }

    private with(changes: Partial<StoryThreadProps>): StoryThread {
        return new StoryThread({
            firstSeen: this.firstSeen,
            id: this.id,
            impactScore: this.impactScore,
            keywords: this.keywords,
            lastUpdate: this.lastUpdate,
            mentionCount: this.mentionCount,
            relatedArticles: this.relatedArticles,
            status: this.status,
            summary: this.summary,
            topic: this.topic,
            weeklyHighlight: this.weeklyHighlight,
            ...changes,
        });
    }
}
