import { randomUUID } from 'crypto';

import { FacilitySnapshot, type FacilitySnapshotProps } from '../facility-snapshot.entity.js';

/**
 * Generates a mock `FacilitySnapshot` with optional overrides.
 */
export function getMockFacilitySnapshot(
    overrides?: Partial<FacilitySnapshotProps>,
): FacilitySnapshot {
    return new FacilitySnapshot({
        capacity: 189,
        extractedAt: new Date('2026-01-11T06:30:00Z'),
        facility: 'Canton Mombello (Brescia)',
        id: randomUUID(),
        inmates: 380,
        occupancyRate: 201,
        region: 'Lombardia',
        snapshotDate: '2026-01-10',
        sourceUrl: 'https://example.org/cronaca/sovraffollamento-brescia',
        ...overrides,
    });
}
