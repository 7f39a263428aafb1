// Domain
import { type Article } from '../entities/article.entity.js';
import { type KeyCharacter } from '../entities/key-character.entity.js';
import { type NarrativeContext } from '../entities/narrative-context.entity.js';
import { type StoryThread } from '../entities/story-thread.entity.js';

export const DEFAULT_MIN_MATCH_SCORE = 0.15;

const CONTENT_PREFIX_LENGTH = 500;

// Latin letters and Italian accented vowels, bounded by non-word characters
const KEYWORD_PATTERN = /(?<![\p{L}\p{N}_])[a-zàèéìòù]{4,}(?![\p{L}\p{N}_])/gu;

export type StoryMatch = {
    score: number;
    story: StoryThread;
};

export function normalizeText(text: string): string {
    return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function extractKeywords(text: string): Set<string> {
    return new Set(text.toLowerCase().match(KEYWORD_PATTERN) ?? []);
}

/**
 * Jaccard similarity of two keyword sets, 0 when either is empty
 */
export function keywordOverlap(left: ReadonlySet<string>, right: ReadonlySet<string>): number {
    if (left.size === 0 || right.size === 0) return 0;

    let intersection = 0;
    for (const keyword of left) {
        if (right.has(keyword)) intersection++;
    }

    return intersection / (left.size + right.size - intersection);
}

function articleKeywords(article: Article): Set<string> {
    return extractKeywords(
        `${article.title} ${article.summary} ${article.content.slice(0, CONTENT_PREFIX_LENGTH)}`,
    );
}

function storyKeywords(story: StoryThread): Set<string> {
    const topic = story.topic.toLowerCase();

    return new Set([
        ...story.keywords.toArray(),
        topic,
        ...extractKeywords(topic),
        ...extractKeywords(story.summary),
    ]);
}

/**
 * Stories the article overlaps with, best match first. Resolved stories never match.
 */
export function findMatchingStories(
    article: Article,
    context: NarrativeContext,
    minScore = DEFAULT_MIN_MATCH_SCORE,
): StoryMatch[] {
    const keywords = articleKeywords(article);

    return context.ongoingStorylines
        .filter((story) => !story.status.isResolved())
        .map((story) => ({ score: keywordOverlap(keywords, storyKeywords(story)), story }))
        .filter((match) => match.score >= minScore)
        .sort((left, right) => right.score - left.score);
}

export function findMentionedCharacters(
    article: Article,
    context: NarrativeContext,
): KeyCharacter[] {
    const text = normalizeText(`${article.title} ${article.content}`);

    return context.keyCharacters.filter((character) =>
        [character.name, ...character.aliases].some((name) => {
            const needle = normalizeText(name);
            return needle.length > 0 && text.includes(needle);
        }),
    );
}
