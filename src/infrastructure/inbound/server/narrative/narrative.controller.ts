import { HTTPException } from 'hono/http-exception';

// Application
import { type GetCharacterUseCase } from '../../../../application/use-cases/narrative/get-character.use-case.js';
import { type GetFollowUpsUseCase } from '../../../../application/use-cases/narrative/get-follow-ups.use-case.js';
import { type GetStoriesUseCase } from '../../../../application/use-cases/narrative/get-stories.use-case.js';

import {
    type GetFollowUpsHttpQuery,
    type GetStoriesHttpQuery,
    NarrativeRequestHandler,
} from './narrative-request.handler.js';
import { NarrativeResponsePresenter } from './narrative-response.presenter.js';

/**
 * Orchestrates HTTP request handling for the story, character and follow-up endpoints
 */
export class NarrativeController {
    private readonly requestHandler: NarrativeRequestHandler;
    private readonly responsePresenter: NarrativeResponsePresenter;

    constructor(
        private readonly getStoriesUseCase: GetStoriesUseCase,
        private readonly getCharacterUseCase: GetCharacterUseCase,
        private readonly getFollowUpsUseCase: GetFollowUpsUseCase,
    ) {
        this.requestHandler = new NarrativeRequestHandler();
        this.responsePresenter = new NarrativeResponsePresenter();
    }

    async getCharacter(rawName: string) {
        const name = this.requestHandler.handleCharacterName(rawName);
        const character = await this.getCharacterUseCase.execute(name);

        if (!character) {
            throw new HTTPException(404, { message: `Character not found: ${name}` });
        }

        return this.responsePresenter.presentCharacter(character);
    }

    async getFollowUps(rawQuery: GetFollowUpsHttpQuery) {
        const validatedParams = this.requestHandler.handleGetFollowUps(rawQuery);
        const followUps = await this.getFollowUpsUseCase.execute(validatedParams);

        return this.responsePresenter.presentFollowUps(followUps);
    }

    async getStories(rawQuery: GetStoriesHttpQuery) {
        const validatedParams = this.requestHandler.handleGetStories(rawQuery);
        const stories = await this.getStoriesUseCase.execute(validatedParams);

        return this.responsePresenter.presentStories(stories);
    }

    async getStory(id: string) {
        const [story] = await this.getStoriesUseCase.execute({ ids: [id] });

        if (!story) {
            throw new HTTPException(404, { message: `Story not found: ${id}` });
        }

        return this.responsePresenter.presentStory(story);
    }
}
