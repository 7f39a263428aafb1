import { z } from 'zod/v4';

export const facilityDirectorySchema = z.object({
    facilities: z.array(
        z.object({
            aliases: z.array(z.string().trim().min(1)).min(1),
            canonical: z.string().trim().min(1),
        }),
    ),
    prefixes: z.array(z.string().min(1)),
    regions: z.array(
        z.object({
            keywords: z.array(z.string().trim().min(1)).min(1),
            region: z.string().trim().min(1),
        }),
    ),
});

export type FacilityDirectory = z.infer<typeof facilityDirectorySchema>;

const MIN_SUBSTRING_ALIAS_LENGTH = 5;

const titleCase = (value: string): string =>
    value
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, separator: string, letter: string) =>
            `${separator}${letter.toUpperCase()}`,
        );

/**
 * Maps free-text facility names onto canonical identities.
 *
 * Lookup order: exact alias on the trimmed input, exact alias on the prefix-stripped
 * input, then containment of any alias of at least five characters (table order).
 * Unknown names come back title-cased with the institutional prefix removed.
 */
export class FacilityNormalizer {
    private readonly exactAliases = new Map<string, string>();
    private readonly prefixes: string[];
    private readonly regionKeywords: Array<{ keyword: string; region: string }>;
    private readonly substringAliases: Array<{ alias: string; canonical: string }> = [];

    constructor(directory: FacilityDirectory) {
        this.prefixes = directory.prefixes.map((prefix) => prefix.toLowerCase());

        for (const { aliases, canonical } of directory.facilities) {
            for (const alias of [canonical, ...aliases]) {
                const key = alias.trim().toLowerCase();
                if (!this.exactAliases.has(key)) this.exactAliases.set(key, canonical);
            }

            for (const alias of aliases) {
                const key = alias.trim().toLowerCase();
                if (key.length >= MIN_SUBSTRING_ALIAS_LENGTH) {
                    this.substringAliases.push({ alias: key, canonical });
                }
            }
        }

        this.regionKeywords = directory.regions.flatMap(({ keywords, region }) =>
            keywords.map((keyword) => ({ keyword: keyword.toLowerCase(), region })),
        );
    }

    normalize(rawName: null | string | undefined): null | string {
        if (!rawName) return null;

        const cleaned = rawName.toLowerCase().trim();
        if (cleaned.length === 0) return null;

        const stripped = this.stripPrefix(cleaned).replace(/["']/g, '').trim();

        const exact = this.exactAliases.get(cleaned) ?? this.exactAliases.get(stripped);
        if (exact) return exact;

        const contained = this.substringAliases.find(
            ({ alias }) => cleaned.includes(alias) || stripped.includes(alias),
        );
        if (contained) return contained.canonical;

        const fallback = titleCase(this.stripPrefix(rawName.trim()).trim());
        return fallback.length > 0 ? fallback : null;
    }

    regionOf(name: null | string | undefined): null | string {
        if (!name) return null;

        const lowered = name.toLowerCase();
        const match = this.regionKeywords.find(({ keyword }) => lowered.includes(keyword));

        return match?.region ?? null;
    }

    /**
     * Removes the first institutional prefix the name starts with, ignoring case
     */
    private stripPrefix(name: string): string {
        const lowered = name.toLowerCase();
        const prefix = this.prefixes.find((candidate) => lowered.startsWith(candidate));

        return prefix ? name.slice(prefix.length) : name;
    }
}
