import { beforeEach, describe, expect, test } from 'vitest';
import { type DeepMockProxy, mock } from 'vitest-mock-extended';

// Domain
import { getMockArticle } from '../../../../domain/entities/__mocks__/articles.mock.js';
import { getMockStoryThread } from '../../../../domain/entities/__mocks__/story-threads.mock.js';
import { KeyCharacter } from '../../../../domain/entities/key-character.entity.js';
import { NarrativeContext } from '../../../../domain/entities/narrative-context.entity.js';
import { CharacterPosition } from '../../../../domain/value-objects/character-position.vo.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Ports
import { type NarrativeRepositoryPort } from '../../../ports/outbound/persistence/narrative-repository.port.js';
import {
    type CollectionBatch,
    type CollectionProviderPort,
} from '../../../ports/outbound/providers/collection.port.js';

import {
    createEventRecordingCounters,
    type RecordPrisonEventsUseCase,
} from '../../events/record-prison-events.use-case.js';
import { type RecordFacilitySnapshotsUseCase } from '../../facilities/record-facility-snapshots.use-case.js';
import { ReconcileCollectionUseCase } from '../reconcile-collection.use-case.js';

describe('ReconcileCollectionUseCase', () => {
    const RUN_DATE = '2026-01-11';

    let useCase: ReconcileCollectionUseCase;
    let context: NarrativeContext;
    let mockCollectionProvider: DeepMockProxy<CollectionProviderPort>;
    let mockLogger: DeepMockProxy<LoggerPort>;
    let mockNarrativeRepository: DeepMockProxy<NarrativeRepositoryPort>;
    let mockRecordFacilitySnapshots: DeepMockProxy<RecordFacilitySnapshotsUseCase>;
    let mockRecordPrisonEvents: DeepMockProxy<RecordPrisonEventsUseCase>;

    const createBatch = (extractions: CollectionBatch['extractions']): CollectionBatch => ({
        articles: [
            getMockArticle(),
            getMockArticle({
                content: 'Il ministro Nordio ha annunciato nuovi fondi.',
                id: 'article-2',
                link: 'https://example.org/articoli/visita-sollicciano',
                summary: 'Visita del ministro.',
                title: 'Il Ministro Nordio visita Sollicciano',
            }),
        ],
        collectionDate: RUN_DATE,
        extractions,
    });

    beforeEach(() => {
        context = new NarrativeContext({
            editorialTone: 'Sobrio',
            keyCharacters: [
                new KeyCharacter({
                    aliases: ['Ministro Nordio'],
                    name: 'Carlo Nordio',
                    positions: [
                        new CharacterPosition({ date: '2026-01-05', stance: 'Annuncia il decreto' }),
                    ],
                    role: 'Ministro della Giustizia',
                }),
            ],
            lastUpdated: null,
            ongoingStorylines: [
                getMockStoryThread({
                    id: 'story-decreto',
                    lastUpdate: '2026-01-10',
                    summary: 'Il decreto arriva in Senato.',
                }),
                getMockStoryThread({
                    firstSeen: '2025-08-01',
                    id: 'story-vecchia',
                    keywords: ['riforma', 'giustizia'],
                    lastUpdate: '2025-09-01',
                    summary: 'Dibattito sulla riforma.',
                    topic: 'Riforma della giustizia',
                }),
            ],
            pendingFollowups: [],
        });

        mockCollectionProvider = mock<CollectionProviderPort>();
        mockLogger = mock<LoggerPort>();
        mockNarrativeRepository = mock<NarrativeRepositoryPort>();
        mockRecordFacilitySnapshots = mock<RecordFacilitySnapshotsUseCase>();
        mockRecordPrisonEvents = mock<RecordPrisonEventsUseCase>();

        mockNarrativeRepository.load.mockResolvedValue(context);
        mockNarrativeRepository.save.mockResolvedValue(undefined);
        mockRecordPrisonEvents.execute.mockImplementation(
            async (_raw, counters = createEventRecordingCounters()) => {
                counters.received = 2;
                counters.inserted = 2;
                return counters;
            },
        );

        useCase = new ReconcileCollectionUseCase(
            mockCollectionProvider,
            mockLogger,
            mockNarrativeRepository,
            mockRecordFacilitySnapshots,
            mockRecordPrisonEvents,
            { archiveAfterDays: 90, minMatchScore: 0.15 },
        );
    });

    describe('reconcile', () => {
        test('should merge every category into the narrative and save it once', async () => {
            // Given
            const batch = createBatch({
                characters: {
                    new_characters: [
                        {
                            aliases: ['Russo'],
                            initial_position: { stance: 'Prudente sui tempi' },
                            name: 'Giovanni Russo',
                            role: 'Capo del DAP',
                        },
                    ],
                    updated_characters: [
                        { name: 'Ministro Nordio', new_position: { stance: 'Difende il decreto' } },
                        { name: 'Sconosciuto', new_position: { stance: 'Contrario' } },
                    ],
                },
                events: { events: [] },
                followups: {
                    followups: [
                        {
                            event: 'Voto finale alla Camera',
                            expected_date: '2026-01-20',
                            story_id: 'story-decreto',
                        },
                        { event: 'voto finale  alla camera', expected_date: '2026-01-20' },
                        { event: 'Relazione annuale', expected_date: 'entro marzo' },
                    ],
                },
                stories: {
                    new_stories: [
                        {
                            keywords: ['approvazione'],
                            summary: 'Approvazione definitiva.',
                            topic: 'decreto carceri',
                        },
                        {
                            impact_score: 0.8,
                            keywords: ['suicidi'],
                            summary: 'Aumentano i suicidi.',
                            topic: 'Suicidi in carcere',
                        },
                    ],
                    updated_stories: [
                        {
                            article_urls: ['https://example.org/legge'],
                            id: 'story-decreto',
                            new_keywords: ['legge'],
                            new_summary: 'Il decreto è legge.',
                        },
                        { id: 'story-ignota', new_summary: 'Nessuna traccia.' },
                    ],
                },
            });

            // When
            const report = await useCase.reconcile(batch, RUN_DATE);

            // Then - the run went through every stage
            expect(report.stages).toEqual([
                'loaded',
                'story-merge-attempted',
                'character-merge-attempted',
                'followup-append-attempted',
                'event-extract-attempted',
                'snapshot-extract-attempted',
                'saved',
            ]);
            expect(report.archivedStories).toBe(1);
            expect(report.articles).toEqual({
                matchedStories: 1,
                mentionedCharacters: 1,
                total: 2,
            });

            // Then - stories
            expect(report.stories).toEqual({
                counters: { created: 1, skipped: 1, updated: 2 },
                status: 'applied',
            });
            const decreto = context.getStoryById('story-decreto');
            expect(decreto?.mentionCount).toBe(2);
            expect(decreto?.lastUpdate).toBe(RUN_DATE);
            expect(decreto?.summary).toBe('Approvazione definitiva.');
            expect(decreto?.keywords.toArray()).toEqual([
                'decreto',
                'carceri',
                'legge',
                'approvazione',
            ]);
            expect(context.getStoryById('story-vecchia')?.status.isDormant()).toBe(true);
            expect(context.getOpenStoryByTopic('Suicidi in carcere')?.impactScore).toBe(0.8);

            // Then - characters
            expect(report.characters).toEqual({
                counters: { created: 1, skipped: 1, updated: 1 },
                status: 'applied',
            });
            expect(context.getCharacterByName('Carlo Nordio')?.latestPosition).toMatchObject({
                date: RUN_DATE,
                stance: 'Difende il decreto',
            });
            expect(context.getCharacterByName('Russo')?.name).toBe('Giovanni Russo');

            // Then - follow-ups
            expect(report.followups).toEqual({
                counters: { created: 1, duplicates: 1, skipped: 1 },
                status: 'applied',
            });
            expect(context.getPendingFollowups()).toHaveLength(1);

            // Then - events were handed over, snapshots were absent
            expect(report.events).toEqual({
                counters: { aggregates: 0, duplicates: 0, inserted: 2, received: 2, skipped: 0 },
                status: 'applied',
            });
            expect(report.snapshots.status).toBe('skipped');
            expect(mockRecordFacilitySnapshots.execute).not.toHaveBeenCalled();
            expect(mockNarrativeRepository.save).toHaveBeenCalledTimes(1);
            expect(mockNarrativeRepository.save).toHaveBeenCalledWith(context);
        });

        test('should keep going when one category cannot be parsed', async () => {
            // Given
            const batch = createBatch({
                characters: {
                    updated_characters: [
                        { name: 'Carlo Nordio', new_position: { stance: 'Difende il decreto' } },
                    ],
                },
                events: { events: [] },
                stories: '```json\n{"new_stories": [\n```',
            });

            // When
            const report = await useCase.reconcile(batch, RUN_DATE);

            // Then
            expect(report.stories.status).toBe('failed');
            expect(report.stories.error).toEqual(expect.any(String));
            expect(report.characters).toEqual({
                counters: { created: 0, skipped: 0, updated: 1 },
                status: 'applied',
            });
            expect(report.events.status).toBe('applied');
            expect(report.stages).toContain('saved');
            expect(mockNarrativeRepository.save).toHaveBeenCalledWith(context);
            expect(mockLogger.error).toHaveBeenCalledWith('Extraction category failed', {
                category: 'stories',
                error: expect.any(SyntaxError),
            });
        });

        test('should track a new character even without a first stance', async () => {
            // Given
            const batch = createBatch({
                characters: {
                    new_characters: [
                        { aliases: ['Russo'], name: 'Giovanni Russo', role: 'Capo del DAP' },
                    ],
                },
            });

            // When
            const report = await useCase.reconcile(batch, RUN_DATE);

            // Then
            expect(report.characters).toEqual({
                counters: { created: 1, skipped: 0, updated: 0 },
                status: 'applied',
            });
            expect(context.getCharacterByName('Russo')).toMatchObject({
                name: 'Giovanni Russo',
                positions: [],
                role: 'Capo del DAP',
            });
        });

        test('should record events and snapshots even when the narrative cannot be loaded', async () => {
            // Given
            mockNarrativeRepository.load.mockRejectedValue(new Error('corrupt narrative file'));
            const batch = createBatch({
                events: { events: [] },
                snapshots: { snapshots: [] },
                stories: { new_stories: [{ summary: 'Mai salvata.', topic: 'Nuova' }] },
            });

            // When / Then
            await expect(useCase.reconcile(batch, RUN_DATE)).rejects.toThrow(
                'corrupt narrative file',
            );
            expect(mockRecordPrisonEvents.execute).toHaveBeenCalledTimes(1);
            expect(mockRecordFacilitySnapshots.execute).toHaveBeenCalledTimes(1);
            expect(mockNarrativeRepository.save).not.toHaveBeenCalled();
        });
    });

    describe('execute', () => {
        test('should do nothing when no batch was collected', async () => {
            // Given
            mockCollectionProvider.fetchBatch.mockResolvedValue(null);

            // When
            const report = await useCase.execute(RUN_DATE);

            // Then
            expect(report).toBeNull();
            expect(mockCollectionProvider.fetchBatch).toHaveBeenCalledWith(RUN_DATE);
            expect(mockNarrativeRepository.load).not.toHaveBeenCalled();
        });

        test('should log and rethrow when saving fails', async () => {
            // Given
            const error = new Error('read-only file system');
            mockCollectionProvider.fetchBatch.mockResolvedValue(createBatch({}));
            mockNarrativeRepository.save.mockRejectedValue(error);

            // When / Then
            await expect(useCase.execute(RUN_DATE)).rejects.toThrow('read-only file system');
            expect(mockLogger.error).toHaveBeenCalledWith(
                'Collection reconciliation encountered an error',
                { error, runDate: RUN_DATE },
            );
        });
    });
});
