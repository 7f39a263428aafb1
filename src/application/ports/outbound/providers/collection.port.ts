// Domain
import { type Article } from '../../../../domain/entities/article.entity.js';

/**
 * Raw extractor output per category. Each entry is either already-parsed JSON
 * or the model's text answer, possibly wrapped in a markdown code fence.
 */
export type RawExtractions = {
    characters?: unknown;
    events?: unknown;
    followups?: unknown;
    snapshots?: unknown;
    stories?: unknown;
};

/**
 * One day of collected material
 */
export type CollectionBatch = {
    articles: Article[];
    collectionDate: string;
    extractions: RawExtractions;
};

/**
 * Collection provider port - hands over the enriched articles and extraction results of a day
 */
export interface CollectionProviderPort {
    /**
     * Returns null when nothing was collected for that day
     */
    fetchBatch(collectionDate: string): Promise<CollectionBatch | null>;
}
