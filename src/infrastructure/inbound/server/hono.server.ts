import { serve } from '@hono/node-server';
import { Hono } from 'hono';

// Application
import {
    type ServerConfiguration,
    type ServerPort,
} from '../../../application/ports/inbound/server.port.js';

// Shared
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

import { createErrorHandlerMiddleware } from './error-handler.middleware.js';
import { type EventsController } from './events/events.controller.js';
import { createEventsRouter, createFacilitiesRouter } from './events/events.routes.js';
import { createHealthRouter } from './health/health.routes.js';
import { type NarrativeController } from './narrative/narrative.controller.js';
import {
    createCharactersRouter,
    createFollowUpsRouter,
    createStoriesRouter,
} from './narrative/narrative.routes.js';

export class HonoServer implements ServerPort {
    private app: Hono;
    private server: null | ReturnType<typeof serve> = null;

    constructor(
        private readonly logger: LoggerPort,
        private readonly narrativeController: NarrativeController,
        private readonly eventsController: EventsController,
    ) {
        this.app = new Hono();
        this.setupGlobalMiddleware();
        this.registerRoutes();
    }

    public async request(
        path: string,
        options?: { body?: object | string; headers?: Record<string, string>; method?: string },
    ): Promise<Response> {
        const init: RequestInit = {
            body: options?.body ? JSON.stringify(options.body) : undefined,
            headers: options?.headers,
            method: options?.method,
        };
        return this.app.request(path, init);
    }

    public async start(config: ServerConfiguration): Promise<void> {
        return new Promise((resolve) => {
            this.logger.debug('Starting server', { host: config.host, port: config.port });

            this.server = serve(
                { fetch: this.app.fetch, hostname: config.host, port: config.port },
                (info) => {
                    this.logger.info('Server listening', { host: info.address, port: info.port });
                    resolve();
                },
            );
        });
    }

    public async stop(): Promise<void> {
        const server = this.server;
        if (!server) return;

        this.logger.info('Stopping server');
        await new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        });
        this.server = null;
        this.logger.info('Server stopped');
    }

    private registerRoutes(): void {
        this.app.route('/', createHealthRouter());
        this.app.route('/stories', createStoriesRouter(this.narrativeController));
        this.app.route('/characters', createCharactersRouter(this.narrativeController));
        this.app.route('/followups', createFollowUpsRouter(this.narrativeController));
        this.app.route('/events', createEventsRouter(this.eventsController));
        this.app.route('/facilities', createFacilitiesRouter(this.eventsController));
    }

    private setupGlobalMiddleware(): void {
        this.app.onError(createErrorHandlerMiddleware(this.logger));
    }
}
