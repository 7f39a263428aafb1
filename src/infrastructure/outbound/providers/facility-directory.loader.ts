import { readFileSync } from 'node:fs';

// Domain
import {
    type FacilityDirectory,
    facilityDirectorySchema,
} from '../../../domain/services/facility-normalizer.js';

/**
 * Reads the alias and region tables once, at startup
 */
export function loadFacilityDirectory(filePath: string): FacilityDirectory {
    const content = readFileSync(filePath, 'utf-8');
    const result = facilityDirectorySchema.safeParse(JSON.parse(content));

    if (!result.success) {
        throw new Error(`Invalid facility directory ${filePath}: ${result.error.message}`);
    }

    return result.data;
}
