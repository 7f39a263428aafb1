// Domain
import { type Article } from '../../../domain/entities/article.entity.js';
import { type NarrativeContext } from '../../../domain/entities/narrative-context.entity.js';
import {
    findMatchingStories,
    findMentionedCharacters,
} from '../../../domain/services/keyword-matcher.js';
import { CharacterPosition } from '../../../domain/value-objects/character-position.vo.js';

// Shared
import { parseIsoDate } from '../../../shared/date/calendar-date.js';
import { type LoggerPort } from '../../../shared/logger/logger.port.js';

// Ports
import { type NarrativeRepositoryPort } from '../../ports/outbound/persistence/narrative-repository.port.js';
import {
    type CollectionBatch,
    type CollectionProviderPort,
} from '../../ports/outbound/providers/collection.port.js';

import {
    createEventRecordingCounters,
    type EventRecordingCounters,
    type RecordPrisonEventsUseCase,
} from '../events/record-prison-events.use-case.js';
import {
    createSnapshotRecordingCounters,
    type RecordFacilitySnapshotsUseCase,
    type SnapshotRecordingCounters,
} from '../facilities/record-facility-snapshots.use-case.js';

import {
    characterExtractionSchema,
    characterUpdateRecordSchema,
    followUpExtractionSchema,
    followUpRecordSchema,
    newCharacterRecordSchema,
    newStoryRecordSchema,
    parseExtractionPayload,
    storyExtractionSchema,
    storyUpdateRecordSchema,
    validateRecords,
} from './extraction-payloads.js';

export type RunStage =
    | 'character-merge-attempted'
    | 'event-extract-attempted'
    | 'followup-append-attempted'
    | 'loaded'
    | 'saved'
    | 'snapshot-extract-attempted'
    | 'story-merge-attempted';

export type CategoryStatus = 'applied' | 'failed' | 'skipped';

export type CategoryReport<TCounters> = {
    counters: TCounters;
    error?: string;
    status: CategoryStatus;
};

export type MergeCounters = {
    created: number;
    skipped: number;
    updated: number;
};

export type FollowUpCounters = {
    created: number;
    duplicates: number;
    skipped: number;
};

export type ReconciliationReport = {
    archivedStories: number;
    articles: {
        mentionedCharacters: number;
        matchedStories: number;
        total: number;
    };
    characters: CategoryReport<MergeCounters>;
    events: CategoryReport<EventRecordingCounters>;
    followups: CategoryReport<FollowUpCounters>;
    runDate: string;
    snapshots: CategoryReport<SnapshotRecordingCounters>;
    stages: RunStage[];
    stories: CategoryReport<MergeCounters>;
};

export type ReconciliationSettings = {
    archiveAfterDays: number;
    minMatchScore: number;
};

/**
 * Use case applying one day of extraction results to the narrative memory and the event tables
 * @description Every category is applied on its own: a failure in one is logged and the others,
 * as well as the final save, still happen.
 */
export class ReconcileCollectionUseCase {
    constructor(
        private readonly collectionProvider: CollectionProviderPort,
        private readonly logger: LoggerPort,
        private readonly narrativeRepository: NarrativeRepositoryPort,
        private readonly recordFacilitySnapshots: RecordFacilitySnapshotsUseCase,
        private readonly recordPrisonEvents: RecordPrisonEventsUseCase,
        private readonly settings: ReconciliationSettings,
    ) {}

    /**
     * Reconcile the batch collected on `runDate`, if any
     * @returns The run report, or null when nothing was collected that day
     */
    public async execute(runDate: string): Promise<null | ReconciliationReport> {
        try {
            this.logger.info('Starting collection reconciliation', { runDate });

            const batch = await this.collectionProvider.fetchBatch(runDate);

            if (!batch) {
                this.logger.info('No collection batch for run date', { runDate });
                return null;
            }

            return await this.reconcile(batch, runDate);
        } catch (error) {
            this.logger.error('Collection reconciliation encountered an error', { error, runDate });
            throw error;
        }
    }

    public async reconcile(batch: CollectionBatch, runDate: string): Promise<ReconciliationReport> {
        const report = createReport(runDate, batch.articles.length);
        const { extractions } = batch;

        // Step 1: Load the narrative memory
        let context: NarrativeContext | null = null;
        let loadError: unknown = null;

        try {
            context = await this.narrativeRepository.load();
            report.stages.push('loaded');
        } catch (error) {
            loadError = error;
            this.logger.error('Failed to load narrative context', { error });
        }

        if (context) {
            const narrative = context;

            report.archivedStories = narrative.archiveStale(runDate, this.settings.archiveAfterDays);
            if (report.archivedStories > 0) {
                this.logger.info('Archived stale stories', { count: report.archivedStories });
            }

            this.linkArticles(batch.articles, narrative, report);

            // Step 2: Stories
            report.stories = await this.attempt(
                'stories',
                extractions.stories,
                report.stories,
                (counters) => this.mergeStories(narrative, extractions.stories, runDate, counters),
            );
            report.stages.push('story-merge-attempted');

            // Step 3: Characters
            report.characters = await this.attempt(
                'characters',
                extractions.characters,
                report.characters,
                (counters) =>
                    this.mergeCharacters(narrative, extractions.characters, runDate, counters),
            );
            report.stages.push('character-merge-attempted');

            // Step 4: Follow-ups
            report.followups = await this.attempt(
                'followups',
                extractions.followups,
                report.followups,
                (counters) =>
                    this.appendFollowUps(narrative, extractions.followups, runDate, counters),
            );
            report.stages.push('followup-append-attempted');
        }

        // Step 5: Events and snapshots live in their own tables
        report.events = await this.attempt(
            'events',
            extractions.events,
            report.events,
            (counters) => this.recordPrisonEvents.execute(extractions.events, counters),
        );
        report.stages.push('event-extract-attempted');

        report.snapshots = await this.attempt(
            'snapshots',
            extractions.snapshots,
            report.snapshots,
            (counters) => this.recordFacilitySnapshots.execute(extractions.snapshots, counters),
        );
        report.stages.push('snapshot-extract-attempted');

        if (!context) {
            throw loadError;
        }

        // Step 6: Persist the whole narrative memory
        await this.narrativeRepository.save(context);
        report.stages.push('saved');

        this.logger.info('Collection reconciliation completed', {
            archivedStories: report.archivedStories,
            characters: report.characters.status,
            events: report.events.status,
            followups: report.followups.status,
            runDate,
            snapshots: report.snapshots.status,
            stories: report.stories.status,
        });

        return report;
    }

    private async appendFollowUps(
        context: NarrativeContext,
        raw: unknown,
        runDate: string,
        counters: FollowUpCounters,
    ): Promise<FollowUpCounters> {
        const payload = followUpExtractionSchema.parse(parseExtractionPayload(raw));
        const records = validateRecords(
            payload.followups,
            followUpRecordSchema,
            'followups',
            this.logger,
        );
        counters.skipped = payload.followups.length - records.length;

        for (const record of records) {
            const expectedDate = parseIsoDate(record.expected_date);

            if (!expectedDate) {
                counters.skipped++;
                this.logger.warn('Skipping follow-up with invalid expected date', {
                    event: record.event,
                    expectedDate: record.expected_date,
                });
                continue;
            }

            if (record.story_id && !context.getStoryById(record.story_id)) {
                this.logger.debug('Follow-up refers to an untracked story', {
                    storyId: record.story_id,
                });
            }

            const created = context.addFollowUp(
                { event: record.event, expectedDate, storyId: record.story_id },
                runDate,
            );

            if (created) {
                counters.created++;
            } else {
                counters.duplicates++;
                this.logger.debug('Follow-up already pending', { event: record.event, expectedDate });
            }
        }

        return counters;
    }

    /**
     * Runs one category, turning any failure into a failed category report
     */
    private async attempt<TCounters>(
        category: string,
        raw: unknown,
        previous: CategoryReport<TCounters>,
        apply: (counters: TCounters) => Promise<TCounters>,
    ): Promise<CategoryReport<TCounters>> {
        if (raw === undefined || raw === null) {
            this.logger.debug('No extraction for category', { category });
            return previous;
        }

        const counters = previous.counters;

        try {
            await apply(counters);
            return { counters, status: 'applied' };
        } catch (error) {
            this.logger.error('Extraction category failed', { category, error });
            return {
                counters,
                error: error instanceof Error ? error.message : String(error),
                status: 'failed',
            };
        }
    }

    /**
     * Logs which tracked stories and characters each article relates to
     */
    private linkArticles(
        articles: Article[],
        context: NarrativeContext,
        report: ReconciliationReport,
    ): void {
        for (const article of articles) {
            const matches = findMatchingStories(article, context, this.settings.minMatchScore);
            const characters = findMentionedCharacters(article, context);

            if (matches.length > 0) report.articles.matchedStories++;
            if (characters.length > 0) report.articles.mentionedCharacters++;

            this.logger.debug('Article linked to narrative', {
                articleId: article.id,
                characters: characters.map((character) => character.name),
                stories: matches.map((match) => ({ id: match.story.id, score: match.score })),
            });
        }
    }

    private async mergeCharacters(
        context: NarrativeContext,
        raw: unknown,
        runDate: string,
        counters: MergeCounters,
    ): Promise<MergeCounters> {
        const payload = characterExtractionSchema.parse(parseExtractionPayload(raw));
        const updates = validateRecords(
            payload.updated_characters,
            characterUpdateRecordSchema,
            'characters',
            this.logger,
        );
        const additions = validateRecords(
            payload.new_characters,
            newCharacterRecordSchema,
            'characters',
            this.logger,
        );
        counters.skipped =
            payload.updated_characters.length +
            payload.new_characters.length -
            updates.length -
            additions.length;

        for (const update of updates) {
            const position = new CharacterPosition({
                date: runDate,
                sourceUrl: update.new_position.source_url,
                stance: update.new_position.stance,
            });

            if (context.recordCharacterPosition(update.name, position)) {
                counters.updated++;
            } else {
                counters.skipped++;
                this.logger.warn('Skipping position for unknown character', { name: update.name });
            }
        }

        for (const addition of additions) {
            const position = addition.initial_position
                ? new CharacterPosition({
                      date: runDate,
                      sourceUrl: addition.initial_position.source_url,
                      stance: addition.initial_position.stance,
                  })
                : undefined;

            const { merged } = context.addCharacter(
                { aliases: addition.aliases, name: addition.name, role: addition.role },
                position,
            );

            if (merged) {
                counters.updated++;
                this.logger.info('New character already tracked, merged as update', {
                    name: addition.name,
                });
            } else {
                counters.created++;
            }
        }

        return counters;
    }

    private async mergeStories(
        context: NarrativeContext,
        raw: unknown,
        runDate: string,
        counters: MergeCounters,
    ): Promise<MergeCounters> {
        const payload = storyExtractionSchema.parse(parseExtractionPayload(raw));
        const updates = validateRecords(
            payload.updated_stories,
            storyUpdateRecordSchema,
            'stories',
            this.logger,
        );
        const additions = validateRecords(
            payload.new_stories,
            newStoryRecordSchema,
            'stories',
            this.logger,
        );
        counters.skipped =
            payload.updated_stories.length +
            payload.new_stories.length -
            updates.length -
            additions.length;

        // A story gains at most one mention per run
        const mentioned = new Set<string>();

        for (const update of updates) {
            const story = context.getStoryById(update.id);

            if (!story || story.status.isResolved()) {
                counters.skipped++;
                this.logger.warn('Skipping update for unknown or resolved story', {
                    storyId: update.id,
                });
                continue;
            }

            context.updateStory(
                update.id,
                {
                    articleUrls: update.article_urls,
                    impactScore: update.impact_score,
                    keywords: update.new_keywords,
                    summary: update.new_summary,
                },
                runDate,
                !mentioned.has(update.id),
            );
            mentioned.add(update.id);
            counters.updated++;
        }

        for (const addition of additions) {
            const existing = context.getOpenStoryByTopic(addition.topic);

            if (existing) {
                context.updateStory(
                    existing.id,
                    {
                        articleUrls: addition.article_urls,
                        impactScore: addition.impact_score,
                        keywords: addition.keywords,
                        summary: addition.summary,
                    },
                    runDate,
                    !mentioned.has(existing.id),
                );
                mentioned.add(existing.id);
                counters.updated++;
                this.logger.info('New story matches a tracked topic, merged as update', {
                    storyId: existing.id,
                    topic: addition.topic,
                });
                continue;
            }

            const created = context.addStory(
                {
                    articleUrls: addition.article_urls,
                    impactScore: addition.impact_score,
                    keywords: addition.keywords,
                    summary: addition.summary,
                    topic: addition.topic,
                },
                runDate,
            );
            mentioned.add(created.id);
            counters.created++;
        }

        return counters;
    }
}

function createReport(runDate: string, articleCount: number): ReconciliationReport {
    const mergeCounters = (): MergeCounters => ({ created: 0, skipped: 0, updated: 0 });

    return {
        archivedStories: 0,
        articles: { matchedStories: 0, mentionedCharacters: 0, total: articleCount },
        characters: { counters: mergeCounters(), status: 'skipped' },
        events: { counters: createEventRecordingCounters(), status: 'skipped' },
        followups: { counters: { created: 0, duplicates: 0, skipped: 0 }, status: 'skipped' },
        runDate,
        snapshots: { counters: createSnapshotRecordingCounters(), status: 'skipped' },
        stages: [],
        stories: { counters: mergeCounters(), status: 'skipped' },
    };
}
