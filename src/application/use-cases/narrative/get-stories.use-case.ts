// Domain
import { type StoryThread } from '../../../domain/entities/story-thread.entity.js';
import { type StoryStatusType } from '../../../domain/value-objects/story-status.vo.js';

// Ports
import { type NarrativeRepositoryPort } from '../../ports/outbound/persistence/narrative-repository.port.js';

export interface GetStoriesParams {
    ids?: string[];
    keyword?: string;
    status?: StoryStatusType;
}

/**
 * Reads story threads from the narrative memory, most recently updated first
 */
export class GetStoriesUseCase {
    constructor(private readonly narrativeRepository: NarrativeRepositoryPort) {}

    async execute(params: GetStoriesParams = {}): Promise<StoryThread[]> {
        const { ids, keyword, status } = params;
        const context = await this.narrativeRepository.load();

        if (ids && ids.length > 0) {
            // When querying by ids, ignore the other filters
            return ids
                .map((id) => context.getStoryById(id))
                .filter((story): story is StoryThread => story !== undefined);
        }

        const stories = keyword
            ? context.getStoriesByKeyword(keyword)
            : [...context.ongoingStorylines];

        return stories
            .filter((story) => !status || story.status.value === status)
            .sort((left, right) => right.lastUpdate.localeCompare(left.lastUpdate));
    }
}
