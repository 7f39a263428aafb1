// Domain
import { type FollowUp } from '../../../domain/entities/follow-up.entity.js';

// Ports
import { type NarrativeRepositoryPort } from '../../ports/outbound/persistence/narrative-repository.port.js';

export interface GetFollowUpsParams {
    /** Only follow-ups expected on or before this day */
    dueBy?: string;
}

/**
 * Unresolved follow-ups, soonest first
 */
export class GetFollowUpsUseCase {
    constructor(private readonly narrativeRepository: NarrativeRepositoryPort) {}

    async execute(params: GetFollowUpsParams = {}): Promise<FollowUp[]> {
        const context = await this.narrativeRepository.load();
        const followUps = params.dueBy
            ? context.getDueFollowups(params.dueBy)
            : context.getPendingFollowups();

        return [...followUps].sort((left, right) =>
            left.expectedDate.localeCompare(right.expectedDate),
        );
    }
}
