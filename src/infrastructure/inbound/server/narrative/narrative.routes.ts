import { Hono } from 'hono';

import { type NarrativeController } from './narrative.controller.js';

export const createStoriesRouter = (narrativeController: NarrativeController) => {
    const app = new Hono();

    app.get('/', async (c) => {
        const query = c.req.query();

        const response = await narrativeController.getStories({
            keyword: query.keyword,
            status: query.status,
        });

        return c.json(response);
    });

    app.get('/:id', async (c) => c.json(await narrativeController.getStory(c.req.param('id'))));

    return app;
};

export const createCharactersRouter = (narrativeController: NarrativeController) => {
    const app = new Hono();

    app.get('/:name', async (c) =>
        c.json(await narrativeController.getCharacter(c.req.param('name'))),
    );

    return app;
};

export const createFollowUpsRouter = (narrativeController: NarrativeController) => {
    const app = new Hono();

    app.get('/', async (c) =>
        c.json(await narrativeController.getFollowUps({ dueBy: c.req.query('dueBy') })),
    );

    return app;
};
