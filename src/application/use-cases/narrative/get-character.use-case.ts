// Domain
import { type KeyCharacter } from '../../../domain/entities/key-character.entity.js';

// Ports
import { type NarrativeRepositoryPort } from '../../ports/outbound/persistence/narrative-repository.port.js';

/**
 * Looks a key character up by name or alias
 */
export class GetCharacterUseCase {
    constructor(private readonly narrativeRepository: NarrativeRepositoryPort) {}

    async execute(name: string): Promise<KeyCharacter | null> {
        const context = await this.narrativeRepository.load();
        return context.getCharacterByName(name) ?? null;
    }
}
