import { Hono } from 'hono';

import { type EventsController } from './events.controller.js';

export const createEventsRouter = (eventsController: EventsController) => {
    const app = new Hono();

    app.get('/', async (c) => {
        const query = c.req.query();

        const response = await eventsController.getEvents({
            facility: query.facility,
            includeAggregates: query.includeAggregates,
            limit: query.limit,
            region: query.region,
            type: query.type,
        });

        return c.json(response);
    });

    app.get('/statistics', async (c) => c.json(await eventsController.getStatistics()));

    return app;
};

export const createFacilitiesRouter = (eventsController: EventsController) => {
    const app = new Hono();

    app.get('/snapshots/latest', async (c) =>
        c.json(await eventsController.getLatestSnapshots()),
    );

    return app;
};
