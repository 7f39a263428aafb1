import { z } from 'zod/v4';

import { CharacterPosition } from '../value-objects/character-position.vo.js';

export const keyCharacterSchema = z.object({
    aliases: z.array(z.string().trim().min(1)).describe('Alternate names and titles used for matching'),
    name: z.string().trim().min(1).describe('Canonical display name, unique in the store'),
    positions: z.array(z.instanceof(CharacterPosition)).describe('Append-only stance history'),
    role: z.string(),
});

export type KeyCharacterProps = z.input<typeof keyCharacterSchema>;

const normalizeName = (value: string): string => value.trim().toLowerCase();

/**
 * @description A public figure whose stances are tracked across runs
 */
export class KeyCharacter {
    public readonly aliases: string[];
    public readonly name: string;
    public readonly positions: CharacterPosition[];
    public readonly role: string;

    public constructor(data: KeyCharacterProps) {
        const result = keyCharacterSchema.safeParse(data);

        if (!result.success) {
            throw new Error(`Invalid key character data: ${result.error.message}`);
        }

        this.name = result.data.name;
        this.role = result.data.role;
        this.aliases = result.data.aliases;
        this.positions = result.data.positions;
    }

    public get latestPosition(): CharacterPosition | undefined {
        return this.positions.at(-1);
    }

    /**
     * Case-insensitive match against the name and every alias
     */
    public isKnownAs(name: string): boolean {
        const needle = normalizeName(name);
        return [this.name, ...this.aliases].some((known) => normalizeName(known) === needle);
    }

    public withAliases(aliases: string[]): KeyCharacter {
        const merged = [...this.aliases];

        for (const alias of aliases) {
            const known = [this.name, ...merged].some(
                (existing) => normalizeName(existing) === normalizeName(alias),
            );
            if (!known) merged.push(alias.trim());
        }

        return new KeyCharacter({
            aliases: merged,
            name: this.name,
            positions: this.positions,
            role: this.role,
        });
    }

    public withPosition(position: CharacterPosition): KeyCharacter {
        return new KeyCharacter({
            aliases: this.aliases,
            name: this.name,
            positions: [...this.positions, position],
            role: this.role,
        });
    }
}
