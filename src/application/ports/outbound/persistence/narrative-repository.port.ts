// Domain
import { type NarrativeContext } from '../../../../domain/entities/narrative-context.entity.js';

/**
 * Narrative repository port - persists the narrative context as a single document
 */
export interface NarrativeRepositoryPort {
    /**
     * Load the stored context, or an empty one when nothing was saved yet
     */
    load(): Promise<NarrativeContext>;

    /**
     * Stamp and persist the whole context, replacing the previous document
     */
    save(context: NarrativeContext): Promise<void>;
}
