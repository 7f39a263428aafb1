import { z } from 'zod/v4';

export const articleSchema = z.object({
    author: z.string().default(''),
    content: z.string().default(''),
    id: z.string().min(1).describe('Identifier assigned by the collector'),
    link: z.string().min(1).describe('Canonical URL of the article'),
    publishedDate: z.string().optional().describe('Publication date as reported by the feed'),
    source: z.string().default(''),
    summary: z.string().default('').describe('Summary written during enrichment'),
    title: z.string().trim().min(1),
});

export type ArticleProps = z.input<typeof articleSchema>;

/**
 * @description An enriched article handed over by the collection step
 */
export class Article {
    public readonly author: string;
    public readonly content: string;
    public readonly id: string;
    public readonly link: string;
    public readonly publishedDate?: string;
    public readonly source: string;
    public readonly summary: string;
    public readonly title: string;

    public constructor(data: ArticleProps) {
        const result = articleSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid article data: ${result.error.message}`);
        }

        this.id = result.data.id;
        this.title = result.data.title;
        this.link = result.data.link;
        this.content = result.data.content;
        this.author = result.data.author;
        this.source = result.data.source;
        this.summary = result.data.summary;
        this.publishedDate = result.data.publishedDate;
    }
}
