import { randomUUID } from 'crypto';

import { Keywords } from '../../value-objects/keywords.vo.js';
import { StoryStatus, type StoryStatusType } from '../../value-objects/story-status.vo.js';
import { StoryThread } from '../story-thread.entity.js';

/**
 * Generates a single mock `StoryThread` with optional overrides.
 */
export function getMockStoryThread(options?: {
    firstSeen?: string;
    id?: string;
    keywords?: string[];
    lastUpdate?: string;
    mentionCount?: number;
    status?: StoryStatusType;
    summary?: string;
    topic?: string;
}): StoryThread {
    return new StoryThread({
        firstSeen: options?.firstSeen ?? '2026-01-01',
        id: options?.id ?? randomUUID(),
        impactScore: 0.5,
        keywords: new Keywords(options?.keywords ?? ['decreto', 'carceri']),
        lastUpdate: options?.lastUpdate ?? '2026-01-10',
        mentionCount: options?.mentionCount ?? 1,
        relatedArticles: ['https://example.org/articoli/decreto-carceri'],
        status: new StoryStatus(options?.status ?? 'active'),
        summary: options?.summary ?? 'Il governo prepara un decreto sulle carceri.',
        topic: options?.topic ?? 'Decreto Carceri',
    });
}
