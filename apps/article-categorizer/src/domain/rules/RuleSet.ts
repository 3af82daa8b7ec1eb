/**
 * @fileoverview Rule set
 *
 * Deterministic tables and scoring constants loaded from `rules.yaml`.
 *
 * @module domain/rules/RuleSet
 */

import type { KeywordRuleTable } from "./keywordRules.js";

/**
 * Ordered substring triggers that select a subcategory without a model call.
 */
export interface SubcategoryTrigger {
    readonly subcategory: string;
    readonly keywords: readonly string[];
}

/**
 * Tunable constants for confidence derivation.
 */
export interface ScoringSettings {
    /** Multiplier applied to a confident top similarity */
    readonly similarityBoost: number;

    /** Upper bound on embedding and label confidences */
    readonly confidenceCap: number;

    /** Top similarity above which the boost applies */
    readonly strongSimilarity: number;

    /** Runner-up similarity above which the boost applies */
    readonly secondSimilarity: number;

    /** Floor for an unconfident embedding result */
    readonly minEmbeddingConfidence: number;

    /** Ensemble survival threshold */
    readonly voteThreshold: number;
}

export interface RuleSet {
    readonly primaryKeywords: KeywordRuleTable;
    readonly subcategoryTriggers: Readonly<Record<string, readonly SubcategoryTrigger[]>>;
    readonly labelRules: KeywordRuleTable;
    readonly labelCategoryMap: Readonly<Record<string, string>>;
    readonly scoring: ScoringSettings;
}

export const kDefaultScoring: ScoringSettings = Object.freeze({
    similarityBoost       : 1.2,
    confidenceCap         : 0.95,
    strongSimilarity      : 0.4,
    secondSimilarity      : 0.3,
    minEmbeddingConfidence: 0.25,
    voteThreshold         : 0.1,
});

/**
 * Rule set with empty tables and default scoring.
 */
export function getEmptyRuleSet(): RuleSet {
    return Object.freeze({
        primaryKeywords    : {},
        subcategoryTriggers: {},
        labelRules         : {},
        labelCategoryMap   : {},
        scoring            : kDefaultScoring,
    });
}
