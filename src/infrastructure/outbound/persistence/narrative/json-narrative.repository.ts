import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

// Application
import { type NarrativeRepositoryPort } from '../../../../application/ports/outbound/persistence/narrative-repository.port.js';

// Domain
import { NarrativeContext } from '../../../../domain/entities/narrative-context.entity.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

import { NarrativeMapper } from './json-narrative.mapper.js';

/**
 * Stores the narrative context as one JSON document on disk.
 * Writes go to a temporary file renamed over the previous one.
 */
export class JsonNarrativeRepository implements NarrativeRepositoryPort {
    private readonly mapper: NarrativeMapper;

    constructor(
        private readonly filePath: string,
        private readonly editorialTone: string,
        private readonly logger: LoggerPort,
    ) {
        this.mapper = new NarrativeMapper(editorialTone);
    }

    async load(): Promise<NarrativeContext> {
        let content: string;

        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                this.logger.info('Narrative context not found, starting empty', {
                    path: this.filePath,
                });
                return NarrativeContext.empty(this.editorialTone);
            }
            throw error;
        }

        const context = this.mapper.toDomain(JSON.parse(content));

        this.logger.info('Narrative context loaded', {
            characters: context.keyCharacters.length,
            followups: context.pendingFollowups.length,
            stories: context.ongoingStorylines.length,
        });

        return context;
    }

    async save(context: NarrativeContext): Promise<void> {
        context.stamp(new Date());

        const temporaryPath = `${this.filePath}.tmp`;
        const content = JSON.stringify(this.mapper.toDocument(context), null, 2);

        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(temporaryPath, `${content}\n`, 'utf-8');
        await rename(temporaryPath, this.filePath);

        this.logger.info('Narrative context saved', {
            path: this.filePath,
            stories: context.ongoingStorylines.length,
        });
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
