// Domain
import { type PrisonEvent } from '../../../domain/entities/prison-event.entity.js';
import { type FacilityNormalizer } from '../../../domain/services/facility-normalizer.js';

// Ports
import { type PrisonEventRepositoryPort } from '../../ports/outbound/persistence/prison-event-repository.port.js';

export interface GetPrisonEventsParams {
    eventType?: string;
    facility?: string;
    includeAggregates?: boolean;
    limit: number;
    region?: string;
}

/**
 * Queries stored incidents. The facility filter accepts any known spelling.
 */
export class GetPrisonEventsUseCase {
    constructor(
        private readonly facilityNormalizer: FacilityNormalizer,
        private readonly prisonEventRepository: PrisonEventRepositoryPort,
    ) {}

    async execute(params: GetPrisonEventsParams): Promise<PrisonEvent[]> {
        const facility = this.facilityNormalizer.normalize(params.facility) ?? undefined;

        return this.prisonEventRepository.find({
            eventType: params.eventType,
            facility,
            includeAggregates: params.includeAggregates ?? false,
            limit: params.limit,
            region: params.region,
        });
    }
}
