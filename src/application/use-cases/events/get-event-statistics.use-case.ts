// Ports
import {
    type EventCount,
    type PrisonEventRepositoryPort,
} from '../../ports/outbound/persistence/prison-event-repository.port.js';

export interface EventStatistics {
    byFacility: EventCount[];
    byRegion: EventCount[];
    byType: EventCount[];
}

/**
 * Incident counts per type, region and facility. Aggregates are left out.
 */
export class GetEventStatisticsUseCase {
    constructor(private readonly prisonEventRepository: PrisonEventRepositoryPort) {}

    async execute(): Promise<EventStatistics> {
        const [byType, byRegion, byFacility] = await Promise.all([
            this.prisonEventRepository.countBy('eventType'),
            this.prisonEventRepository.countBy('region'),
            this.prisonEventRepository.countBy('facility'),
        ]);

        return { byFacility, byRegion, byType };
    }
}
