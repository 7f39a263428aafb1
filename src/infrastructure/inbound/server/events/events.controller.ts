// Application
import { type GetEventStatisticsUseCase } from '../../../../application/use-cases/events/get-event-statistics.use-case.js';
import { type GetPrisonEventsUseCase } from '../../../../application/use-cases/events/get-prison-events.use-case.js';
import { type GetLatestSnapshotsUseCase } from '../../../../application/use-cases/facilities/get-latest-snapshots.use-case.js';

import { EventsRequestHandler, type GetEventsHttpQuery } from './events-request.handler.js';
import { EventsResponsePresenter } from './events-response.presenter.js';

/**
 * Orchestrates HTTP request handling for the incident and facility endpoints
 */
export class EventsController {
    private readonly requestHandler: EventsRequestHandler;
    private readonly responsePresenter: EventsResponsePresenter;

    constructor(
        private readonly getPrisonEventsUseCase: GetPrisonEventsUseCase,
        private readonly getEventStatisticsUseCase: GetEventStatisticsUseCase,
        private readonly getLatestSnapshotsUseCase: GetLatestSnapshotsUseCase,
    ) {
        this.requestHandler = new EventsRequestHandler();
        this.responsePresenter = new EventsResponsePresenter();
    }

    async getEvents(rawQuery: GetEventsHttpQuery) {
        const validatedParams = this.requestHandler.handle(rawQuery);
        const events = await this.getPrisonEventsUseCase.execute(validatedParams);

        return this.responsePresenter.presentEvents(events);
    }

    async getLatestSnapshots() {
        const snapshots = await this.getLatestSnapshotsUseCase.execute();

        return this.responsePresenter.presentSnapshots(snapshots);
    }

    async getStatistics() {
        // Counts are already in their response shape
        return this.getEventStatisticsUseCase.execute();
    }
}
