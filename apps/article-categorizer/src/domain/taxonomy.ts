/**
 * @fileoverview Taxonomy
 *
 * The two-level category tree every classifier works against: ordered
 * primary categories, each with an allowed list of subcategories.
 *
 * @module domain/taxonomy
 */

/**
 * One primary category.
 */
export interface CategoryDefinition {
    /** Stable identifier, e.g. "AI" */
    readonly key: string;

    /** Human-readable label */
    readonly label: string;

    /** Natural-language description; this is what gets embedded */
    readonly description: string;
}

/**
 * Category tree.
 */
export interface Taxonomy {
    /** Primary categories in tie-break order */
    readonly primary: readonly CategoryDefinition[];

    /** Allowed subcategories per primary key */
    readonly subcategories: Readonly<Record<string, readonly string[]>>;

    /** Key used when nothing else applies ("Other") */
    readonly fallbackKey: string;
}

/**
 * Built-in taxonomy used when the configured one is missing or invalid.
 */
export function getDefaultTaxonomy(): Taxonomy {
    return createTaxonomy({
        primary: [
            {
                key        : "AI",
                label      : "Artificial Intelligence",
                description: "ML, neural networks, LLM",
            },
            {
                key        : "Programming",
                label      : "Programming",
                description: "Languages, frameworks, algorithms",
            },
            {
                key        : "Business",
                label      : "Business",
                description: "Business processes, management",
            },
            {
                key        : "Other",
                label      : "Other",
                description: "Other topics",
            },
        ],
        subcategories: {
            AI         : ["LLM", "NLP", "Computer Vision"],
            Programming: ["Python", "JavaScript", "Testing"],
            Business   : ["Management", "Strategy"],
            Other      : ["General"],
        },
    });
}

/**
 * Build a frozen taxonomy.
 *
 * The fallback key defaults to "Other" when that key exists, else to the
 * last primary key.
 *
 * @throws Error if `primary` is empty, keys repeat, or `fallbackKey` is unknown
 */
export function createTaxonomy(input: {
    primary: readonly CategoryDefinition[];
    subcategories?: Readonly<Record<string, readonly string[]>>;
    fallbackKey?: string;
}): Taxonomy {
    const keys = input.primary.map((category) => category.key);
    const lastKey = keys.at(-1);

    if (lastKey === undefined) {
        throw new Error("Taxonomy must define at least one primary category");
    }

    if (new Set(keys).size !== keys.length) {
        throw new Error("Taxonomy primary keys must be unique");
    }

    const fallbackKey = input.fallbackKey ?? (keys.includes("Other") ? "Other" : lastKey);
    if (!keys.includes(fallbackKey)) {
        throw new Error(`Taxonomy fallback key is not a primary key: ${fallbackKey}`);
    }

    const subcategories: Record<string, readonly string[]> = {};
    for (const key of keys) {
        subcategories[key] = Object.freeze([...new Set(input.subcategories?.[key] ?? [])]);
    }

    return Object.freeze({
        primary      : Object.freeze(input.primary.map((category) => Object.freeze({ ...category }))),
        subcategories: Object.freeze(subcategories),
        fallbackKey,
    });
}

export function hasCategory(taxonomy: Taxonomy, key: string): boolean {
    return taxonomy.primary.some((category) => category.key === key);
}

/**
 * Label of a primary key, or the key itself when unknown.
 */
export function getCategoryLabel(taxonomy: Taxonomy, key: string): string {
    return taxonomy.primary.find((category) => category.key === key)?.label ?? key;
}

export function getAllowedSubcategories(taxonomy: Taxonomy, key: string): readonly string[] {
    return taxonomy.subcategories[key] ?? [];
}
