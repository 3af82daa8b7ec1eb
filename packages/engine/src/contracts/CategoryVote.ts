/**
 * @fileoverview Category Vote
 *
 * What a single classification strategy contributes to the ensemble:
 * one or more category identifiers backed by one confidence value.
 * This is the contract boundary between strategies and the combiner.
 *
 * Design principles:
 * - Simple: categories are plain string keys
 * - Immutable: frozen on creation
 * - Attributed: every vote names the strategy that cast it
 *
 * @module @rubricator/engine/contracts/CategoryVote
 */

/**
 * Category identifier (a taxonomy key such as "AI" or "Business").
 */
export type CategoryKey = string;

/**
 * A vote cast by one strategy.
 *
 * @example
 * ```typescript
 * // Deterministic keyword rules
 * { source: "rule-based", categories: ["Business"], confidence: 0.25 }
 *
 * // External model naming several categories at once
 * { source: "llm", categories: ["AI", "Programming"], confidence: 0.8 }
 * ```
 */
export interface CategoryVote {
    /** Strategy that produced the vote */
    readonly source: string;

    /**
     * Categories the strategy stands behind, most relevant first.
     * Each category receives the full confidence of the vote.
     */
    readonly categories: readonly CategoryKey[];

    /**
     * Confidence between 0.0 and 1.0.
     * Default is 1.0 if omitted.
     */
    readonly confidence?: number;
}

/**
 * Factory function to create a CategoryVote.
 * Duplicate categories are dropped and the result is frozen.
 *
 * @param source - Strategy identifier
 * @param categories - Categories named by the strategy
 * @param confidence - Optional confidence (0.0 - 1.0)
 * @returns Frozen CategoryVote object
 */
export function createCategoryVote(
    source: string,
    categories: readonly CategoryKey[],
    confidence?: number
): CategoryVote {
    const vote: CategoryVote = {
        source,
        categories: Object.freeze([...new Set(categories)]),
        ...(confidence !== undefined && { confidence }),
    };

    return Object.freeze(vote);
}

/**
 * Get the effective confidence of a vote.
 * Returns 1.0 if confidence is not specified.
 */
export function getEffectiveConfidence(vote: CategoryVote): number {
    return vote.confidence ?? 1.0;
}
