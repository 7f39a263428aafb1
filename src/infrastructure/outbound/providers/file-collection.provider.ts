import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod/v4';

// Application
import {
    type CollectionBatch,
    type CollectionProviderPort,
} from '../../../application/ports/outbound/providers/collection.port.js';

// Domain
import { Article } from '../../../domain/entities/article.entity.js';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

const collectedArticleSchema = z.object({
    author: z.string().nullish(),
    content: z.string().nullish(),
    published_date: z.string().nullish(),
    source: z.string().nullish(),
    summary: z.string().nullish(),
    title: z.string().nullish(),
});

const collectionFileSchema = z.object({
    articles: z.record(z.string(), collectedArticleSchema).default({}),
    extractions: z
        .object({
            characters: z.unknown().optional(),
            events: z.unknown().optional(),
            followups: z.unknown().optional(),
            snapshots: z.unknown().optional(),
            stories: z.unknown().optional(),
        })
        .default({}),
});

const isMissingFile = (error: unknown): boolean =>
    error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads the day's batch from `<inbox>/<YYYY-MM-DD>.json`.
 * Articles are keyed by link, the same layout the collector writes.
 */
export class FileCollectionProvider implements CollectionProviderPort {
    constructor(
        private readonly inboxDirectory: string,
        private readonly logger: LoggerPort,
    ) {}

    async fetchBatch(collectionDate: string): Promise<CollectionBatch | null> {
        const filePath = join(this.inboxDirectory, `${collectionDate}.json`);

        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                this.logger.info('No collection batch for this date', { collectionDate, filePath });
                return null;
            }
            throw error;
        }

        const file = collectionFileSchema.parse(JSON.parse(content));
        const articles = Object.entries(file.articles).map(
            ([link, article]) =>
                new Article({
                    author: article.author ?? '',
                    content: article.content ?? '',
                    id: link,
                    link,
                    publishedDate: article.published_date ?? undefined,
                    source: article.source ?? '',
                    summary: article.summary ?? '',
                    title: article.title || 'Untitled',
                }),
        );

        this.logger.info('Collection batch loaded', {
            articles: articles.length,
            collectionDate,
        });

        return { articles, collectionDate, extractions: file.extractions };
    }
}
