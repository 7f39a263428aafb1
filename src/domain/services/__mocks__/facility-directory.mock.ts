import { readFileSync } from 'node:fs';

import { type FacilityDirectory, facilityDirectorySchema } from '../facility-normalizer.js';

/**
 * Facility table shipped with the service
 */
export function mockOfFacilityDirectory(): FacilityDirectory {
    const file = new URL('../../../../data/facilities.json', import.meta.url);
    return facilityDirectorySchema.parse(JSON.parse(readFileSync(file, 'utf-8')));
}
