import { randomUUID } from 'node:crypto';

import { type CharacterPosition } from '../value-objects/character-position.vo.js';
import { Keywords } from '../value-objects/keywords.vo.js';
import { StoryStatus } from '../value-objects/story-status.vo.js';

import { FollowUp } from './follow-up.entity.js';
import { KeyCharacter } from './key-character.entity.js';
import { StoryThread, type StoryUpdate } from './story-thread.entity.js';

export const DEFAULT_EDITORIAL_TONE =
    'Riflessivo e professionale, attento ai progressi ma consapevole delle sfide sistemiche';

export type NarrativeContextProps = {
    editorialTone: string;
    keyCharacters: KeyCharacter[];
    lastUpdated: Date | null;
    ongoingStorylines: StoryThread[];
    pendingFollowups: FollowUp[];
};

export type NewStory = {
    articleUrls: string[];
    impactScore: number;
    keywords: string[];
    summary: string;
    topic: string;
};

export type NewCharacter = {
    aliases: string[];
    name: string;
    role: string;
};

export type NewFollowUp = {
    event: string;
    expectedDate: string;
    storyId?: string;
};

export type CharacterMergeResult = {
    character: KeyCharacter;
    merged: boolean;
};

/**
 * @description
 * Root aggregate of the narrative memory: story threads, key characters and
 * pending follow-ups. Loaded, mutated in memory and saved back as a whole.
 */
export class NarrativeContext {
    public readonly editorialTone: string;
    private characters: KeyCharacter[];
    private followups: FollowUp[];
    private lastUpdatedAt: Date | null;
    private stories: StoryThread[];

    public constructor(props: NarrativeContextProps) {
        const ids = new Set(props.ongoingStorylines.map((story) => story.id));
        if (ids.size !== props.ongoingStorylines.length) {
            throw new Error('Invalid narrative context data: story ids must be unique');
        }

        this.editorialTone = props.editorialTone;
        this.stories = [...props.ongoingStorylines];
        this.characters = [...props.keyCharacters];
        this.followups = [...props.pendingFollowups];
        this.lastUpdatedAt = props.lastUpdated;
    }

    public static empty(editorialTone = DEFAULT_EDITORIAL_TONE): NarrativeContext {
        return new NarrativeContext({
            editorialTone,
            keyCharacters: [],
            lastUpdated: null,
            ongoingStorylines: [],
            pendingFollowups: [],
        });
    }

    public get keyCharacters(): readonly KeyCharacter[] {
        return this.characters;
    }

    public get lastUpdated(): Date | null {
        return this.lastUpdatedAt;
    }

    public get ongoingStorylines(): readonly StoryThread[] {
        return this.stories;
    }

    public get pendingFollowups(): readonly FollowUp[] {
        return this.followups;
    }

    // Read accessors

    public getActiveStories(): StoryThread[] {
        return this.stories.filter((story) => story.status.isActive());
    }

    public getCharacterByName(name: string): KeyCharacter | undefined {
        return (
            this.characters.find((character) => character.name === name) ??
            this.characters.find((character) => character.isKnownAs(name))
        );
    }

    public getDormantStories(): StoryThread[] {
        return this.stories.filter((story) => story.status.isDormant());
    }

    public getDueFollowups(asOf: string): FollowUp[] {
        return this.followups.filter((followUp) => followUp.isDue(asOf));
    }

    public getPendingFollowups(): FollowUp[] {
        return this.followups.filter((followUp) => !followUp.resolved);
    }

    public getStoriesByKeyword(keyword: string): StoryThread[] {
        return this.stories.filter((story) => story.matchesKeyword(keyword));
    }

    public getStoryById(id: string): StoryThread | undefined {
        return this.stories.find((story) => story.id === id);
    }

    /**
     * Open story whose topic reads the same as the given one, ignoring case and spacing
     */
    public getOpenStoryByTopic(topic: string): StoryThread | undefined {
        const needle = topic.trim().toLowerCase().replace(/\s+/g, ' ');
        return this.stories.find(
            (story) =>
                !story.status.isResolved() &&
                story.topic.trim().toLowerCase().replace(/\s+/g, ' ') === needle,
        );
    }

    // Stories

    public addStory(story: NewStory, runDate: string): StoryThread {
        const created = new StoryThread({
            firstSeen: runDate,
            id: randomUUID(),
            impactScore: story.impactScore,
            keywords: new Keywords(story.keywords),
            lastUpdate: runDate,
            mentionCount: 1,
            relatedArticles: story.articleUrls,
            status: new StoryStatus('active'),
            summary: story.summary,
            topic: story.topic,
        });

        this.stories.push(created);
        return created;
    }

    public updateStory(
        id: string,
        update: StoryUpdate,
        runDate: string,
        countMention = true,
    ): StoryThread {
        const merged = this.requireStory(id).merge(update, runDate, countMention);
        this.replaceStory(merged);
        return merged;
    }

    /**
     * Moves active stories not updated within `maxAgeDays` of `asOf` to dormant.
     * Dormant and resolved stories are left untouched.
     */
    public archiveStale(asOf: string, maxAgeDays: number): number {
        let archived = 0;

        this.stories = this.stories.map((story) => {
            if (!story.status.isActive() || !story.isStale(asOf, maxAgeDays)) return story;
            archived++;
            return story.toDormant();
        });

        return archived;
    }

    // Characters

    public recordCharacterPosition(
        name: string,
        position: CharacterPosition,
    ): KeyCharacter | undefined {
        const character = this.getCharacterByName(name);
        if (!character) return undefined;

        const updated = character.withPosition(position);
        this.replaceCharacter(character, updated);
        return updated;
    }

    /**
     * Registers a character, with its first stance when one is known. A name that
     * already resolves to a known character is merged into it instead, keeping names unique.
     */
    public addCharacter(
        character: NewCharacter,
        position?: CharacterPosition,
    ): CharacterMergeResult {
        const existing =
            this.getCharacterByName(character.name) ??
            character.aliases
                .map((alias) => this.getCharacterByName(alias))
                .find((match) => match !== undefined);

        if (existing) {
            const withAliases = existing.withAliases(character.aliases);
            const updated = position ? withAliases.withPosition(position) : withAliases;
            this.replaceCharacter(existing, updated);
            return { character: updated, merged: true };
        }

        const created = new KeyCharacter({
            aliases: character.aliases,
            name: character.name,
            positions: position ? [position] : [],
            role: character.role,
        });
        this.characters.push(created);
        return { character: created, merged: false };
    }

    // Follow-ups

    /**
     * Appends a follow-up unless an unresolved one already describes the same event
     * on the same expected date. Returns undefined when nothing was added.
     */
    public addFollowUp(followUp: NewFollowUp, runDate: string): FollowUp | undefined {
        const duplicate = this.followups.some(
            (existing) =>
                !existing.resolved &&
                existing.describesSameEvent(followUp.event, followUp.expectedDate),
        );
        if (duplicate) return undefined;

        const created = new FollowUp({
            createdAt: runDate,
            event: followUp.event,
            expectedDate: followUp.expectedDate,
            id: randomUUID(),
            resolved: false,
            storyId: followUp.storyId,
        });
        this.followups.push(created);
        return created;
    }

    public stamp(now: Date): void {
        this.lastUpdatedAt = now;
    }

    private replaceCharacter(previous: KeyCharacter, next: KeyCharacter): void {
        this.characters = this.characters.map((character) =>
            character === previous ? next : character,
        );
    }

    private replaceStory(next: StoryThread): void {
        this.stories = this.stories.map((story) => (story.id === next.id ? next : story));
    }

    private requireStory(id: string): StoryThread {
        const story = this.getStoryById(id);
        if (!story) {
            throw new Error(`Unknown story thread: ${id}`);
        }
        return story;
    }
}
