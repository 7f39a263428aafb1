import { Article, type ArticleProps } from '../article.entity.js';

/**
 * Generates a mock enriched `Article` with optional overrides.
 */
export function getMockArticle(overrides?: Partial<ArticleProps>): Article {
    return new Article({
        author: 'Redazione',
        content:
            'Il Senato ha approvato il decreto carceri dopo un lungo dibattito sul sovraffollamento.',
        id: 'article-1',
        link: 'https://example.org/articoli/decreto-carceri',
        publishedDate: '2026-01-10',
        source: 'Esempio Notizie',
        summary: 'Approvato il decreto carceri al Senato.',
        title: 'Decreto carceri, via libera del Senato',
        ...overrides,
    });
}
