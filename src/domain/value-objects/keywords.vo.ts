/**
 * @description
 * Set of lowercase keywords attached to a story thread.
 * Comparison is case-insensitive and the set only ever grows through `union`.
 */
export class Keywords {
    private readonly values: string[];

    constructor(keywords: readonly string[] = []) {
        const unique = new Set<string>();

        for (const keyword of keywords) {
            const cleaned = keyword.trim().toLowerCase();
            if (cleaned.length > 0) unique.add(cleaned);
        }

        this.values = [...unique];
    }

    public has(keyword: string): boolean {
        return this.values.includes(keyword.trim().toLowerCase());
    }

    public get size(): number {
        return this.values.length;
    }

    public toArray(): string[] {
        return [...this.values];
    }

    public union(keywords: readonly string[]): Keywords {
        return new Keywords([...this.values, ...keywords]);
    }
}
