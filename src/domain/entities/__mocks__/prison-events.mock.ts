import { randomUUID } from 'crypto';

import { PrisonEvent, type PrisonEventProps } from '../prison-event.entity.js';

/**
 * Generates a mock `PrisonEvent` with optional overrides.
 */
export function getMockPrisonEvent(overrides?: Partial<PrisonEventProps>): PrisonEvent {
    return new PrisonEvent({
        confidence: 0.9,
        count: 1,
        description: 'Detenuto di 35 anni trovato impiccato nella cella.',
        eventDate: '2026-01-10',
        eventType: 'suicide',
        extractedAt: new Date('2026-01-11T06:30:00Z'),
        facility: 'Canton Mombello (Brescia)',
        id: randomUUID(),
        isAggregate: false,
        region: 'Lombardia',
        sourceUrl: 'https://example.org/cronaca/suicidio-brescia',
        ...overrides,
    });
}
