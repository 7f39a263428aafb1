import { beforeEach, describe, expect, test } from 'vitest';
import { type DeepMockProxy, mock } from 'vitest-mock-extended';

// Domain
import { getMockPrisonEvent } from '../../../../domain/entities/__mocks__/prison-events.mock.js';
import { type PrisonEvent } from '../../../../domain/entities/prison-event.entity.js';
import { mockOfFacilityDirectory } from '../../../../domain/services/__mocks__/facility-directory.mock.js';
import { EventDeduplicator } from '../../../../domain/services/event-deduplicator.js';
import { FacilityNormalizer } from '../../../../domain/services/facility-normalizer.js';

// Shared
import { type LoggerPort } from '../../../../shared/logger/logger.port.js';

// Ports
import { type PrisonEventRepositoryPort } from '../../../ports/outbound/persistence/prison-event-repository.port.js';

import { RecordPrisonEventsUseCase } from '../record-prison-events.use-case.js';

describe('RecordPrisonEventsUseCase', () => {
    let useCase: RecordPrisonEventsUseCase;
    let mockLogger: DeepMockProxy<LoggerPort>;
    let mockPrisonEventRepository: DeepMockProxy<PrisonEventRepositoryPort>;

    const normalizer = new FacilityNormalizer(mockOfFacilityDirectory());

    const insertedEvents = (): PrisonEvent[] => {
        const [events] = mockPrisonEventRepository.createMany.mock.calls[0] ?? [[]];
        return events;
    };

    beforeEach(() => {
        mockLogger = mock<LoggerPort>();
        mockPrisonEventRepository = mock<PrisonEventRepositoryPort>();
        mockPrisonEventRepository.findForDeduplication.mockResolvedValue([]);
        mockPrisonEventRepository.createMany.mockImplementation(async (events) => events.length);

        useCase = new RecordPrisonEventsUseCase(
            new EventDeduplicator(normalizer),
            normalizer,
            mockLogger,
            mockPrisonEventRepository,
        );
    });

    describe('execute', () => {
        test('should store new incidents and drop the ones already known', async () => {
            // Given - the suicide was stored yesterday from another paper, under a raw spelling
            mockPrisonEventRepository.findForDeduplication.mockResolvedValue([
                getMockPrisonEvent({
                    facility: 'Brescia Canton Mombello',
                    sourceUrl: 'https://example.org/giornale-a',
                }),
            ]);
            const extraction = {
                events: [
                    {
                        count: 1,
                        description: 'Un detenuto si è tolto la vita in cella.',
                        event_date: '2026-01-10',
                        event_type: 'suicide',
                        facility: 'Canton Mombello',
                        source_url: 'https://example.org/giornale-b',
                    },
                    {
                        description: 'Aggressione a un agente durante la notte.',
                        event_date: '2026-01-11',
                        event_type: 'assault',
                        facility: 'casa circondariale di sollicciano',
                        source_url: 'https://example.org/giornale-c',
                    },
                    {
                        description: 'Aggressione a un agente durante la notte.',
                        event_date: '2026-01-11',
                        event_type: 'assault',
                        facility: 'Sollicciano',
                        source_url: 'https://example.org/giornale-c',
                    },
                    { event_date: '2026-01-11', source_url: 'https://example.org/giornale-c' },
                ],
            };

            // When
            const counters = await useCase.execute(extraction);

            // Then
            expect(counters).toEqual({
                aggregates: 0,
                duplicates: 2,
                inserted: 1,
                received: 4,
                skipped: 1,
            });
            expect(mockPrisonEventRepository.findForDeduplication).toHaveBeenCalledWith({
                dates: ['2026-01-10', '2026-01-11'],
                sourceUrls: [
                    'https://example.org/giornale-b',
                    'https://example.org/giornale-c',
                ],
            });
            const [stored] = insertedEvents();
            expect(stored).toMatchObject({
                confidence: 1,
                eventDate: '2026-01-11',
                eventType: 'assault',
                facility: 'Sollicciano (Firenze)',
                isAggregate: false,
                region: 'Toscana',
            });
        });

        test('should keep an event with an unreadable date as undated', async () => {
            // Given
            const extraction = {
                events: [
                    {
                        description: 'Protesta dei detenuti per il caldo.',
                        event_date: 'ieri',
                        event_type: 'protest',
                        facility: null,
                        source_url: 'https://example.org/giornale-d',
                    },
                ],
            };

            // When
            const counters = await useCase.execute(extraction);

            // Then
            expect(counters.inserted).toBe(1);
            expect(insertedEvents()[0]).toMatchObject({
                eventDate: undefined,
                eventType: 'protest',
                facility: undefined,
                region: undefined,
            });
            expect(mockLogger.warn).toHaveBeenCalledWith(
                'Unparseable event date, storing event as undated',
                { eventDate: 'ieri', sourceUrl: 'https://example.org/giornale-d' },
            );
        });

        test('should flag statistical roll-ups as aggregates', async () => {
            // Given - a fenced text answer, as returned by the extractor
            const extraction = [
                '```json',
                JSON.stringify({
                    events: [
                        {
                            count: 80,
                            description: "Sono 80 i suicidi in carcere dall'inizio dell'anno.",
                            event_date: '2026-01-01',
                            event_type: 'suicide',
                            source_url: 'https://example.org/dossier',
                        },
                    ],
                }),
                '```',
            ].join('\n');

            // When
            const counters = await useCase.execute(extraction);

            // Then
            expect(counters.aggregates).toBe(1);
            expect(insertedEvents()[0]?.isAggregate).toBe(true);
        });

        test('should not touch the repository when nothing is valid', async () => {
            // When
            const counters = await useCase.execute({ events: [{ description: 'senza tipo' }] });

            // Then
            expect(counters).toEqual({
                aggregates: 0,
                duplicates: 0,
                inserted: 0,
                received: 1,
                skipped: 1,
            });
            expect(mockPrisonEventRepository.findForDeduplication).not.toHaveBeenCalled();
            expect(mockPrisonEventRepository.createMany).not.toHaveBeenCalled();
        });

        test('should propagate storage failures', async () => {
            // Given
            mockPrisonEventRepository.createMany.mockRejectedValue(new Error('disk full'));

            // When / Then
            await expect(
                useCase.execute({
                    events: [
                        {
                            event_date: '2026-01-10',
                            event_type: 'death',
                            facility: 'Cremona',
                            source_url: 'https://example.org/giornale-e',
                        },
                    ],
                }),
            ).rejects.toThrow('disk full');
        });
    });
});
