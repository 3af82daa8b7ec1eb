/**
 * @fileoverview Ensemble Combiner
 *
 * Confidence-weighted voting across independent strategies. Each vote
 * adds its confidence to every category it names; categories are ranked
 * by their accumulated total.
 *
 * @module @rubricator/engine/engine/EnsembleCombiner
 */

import type { CategoryKey, CategoryVote } from "../contracts/CategoryVote.js";
import { getEffectiveConfidence } from "../contracts/CategoryVote.js";

/**
 * Tunables for {@link combineVotes}.
 */
export interface CombineOptions {
    /** A category survives only when its total is strictly above this (default: 0.1) */
    readonly threshold?: number;

    /** Maximum number of surviving categories (default: 3) */
    readonly maxCategories?: number;

    /** Upper bound on the combined confidence (default: 0.95) */
    readonly confidenceCap?: number;

    /** Category reported when nothing survives (default: "General") */
    readonly fallbackCategory?: CategoryKey;
}

/**
 * Accumulated vote for one category.
 */
export interface CategoryTally {
    readonly category: CategoryKey;
    readonly votes: number;
    readonly sources: readonly string[];
}

/**
 * Outcome of the ensemble vote.
 */
export interface EnsembleDecision {
    /** Surviving categories, best first; never empty */
    readonly categories: readonly CategoryKey[];

    /** Mean input confidence, capped */
    readonly confidence: number;

    /** Every mentioned category with its total, best first */
    readonly tallies: readonly CategoryTally[];

    /** True when no category cleared the threshold */
    readonly usedFallback: boolean;
}

export const kDefaultCombineOptions = Object.freeze({
    threshold       : 0.1,
    maxCategories   : 3,
    confidenceCap   : 0.95,
    fallbackCategory: "General",
} satisfies Required<CombineOptions>);

/**
 * Combine strategy votes into a single decision.
 *
 * Ties keep first-mention order (the order of `votes`, then of each
 * vote's categories).
 *
 * @example
 * ```typescript
 * combineVotes([
 *     createCategoryVote("embedding", ["Technology"], 0.6),
 *     createCategoryVote("llm", ["Technology"], 0.4),
 *     createCategoryVote("rule-based", ["Business"], 0.3),
 * ]).categories;
 * // ["Technology", "Business"]
 * ```
 */
export function combineVotes(
    votes: readonly CategoryVote[],
    options: CombineOptions = {}
): EnsembleDecision {
    const threshold = options.threshold ?? kDefaultCombineOptions.threshold;
    const maxCategories = options.maxCategories ?? kDefaultCombineOptions.maxCategories;
    const confidenceCap = options.confidenceCap ?? kDefaultCombineOptions.confidenceCap;
    const fallbackCategory = options.fallbackCategory ?? kDefaultCombineOptions.fallbackCategory;

    const totals = new Map<CategoryKey, { votes: number; sources: string[] }>();
    for (const vote of votes) {
        const confidence = getEffectiveConfidence(vote);
        for (const category of vote.categories) {
            const entry = totals.get(category) ?? { votes: 0, sources: [] };
            entry.votes += confidence;
            entry.sources.push(vote.source);
            totals.set(category, entry);
        }
    }

    // Array.prototype.sort is stable, so equal totals keep insertion order
    const tallies: CategoryTally[] = [...totals.entries()]
        .map(([category, entry]) => Object.freeze({
            category,
            votes  : entry.votes,
            sources: Object.freeze([...entry.sources]),
        }))
        .sort((a, b) => b.votes - a.votes);

    const survivors = tallies
        .filter((tally) => tally.votes > threshold)
        .slice(0, maxCategories)
        .map((tally) => tally.category);

    const meanConfidence = votes.length === 0
        ? 0
        : votes.reduce((sum, vote) => sum + getEffectiveConfidence(vote), 0) / votes.length;

    const usedFallback = survivors.length === 0;

    return Object.freeze({
        categories  : Object.freeze(usedFallback ? [fallbackCategory] : survivors),
        confidence  : Math.min(meanConfidence, confidenceCap),
        tallies     : Object.freeze(tallies),
        usedFallback,
    });
}
