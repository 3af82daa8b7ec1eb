/**
 * @fileoverview Rule-Based Keyword Classifier
 *
 * Deterministic primary-category fallback. Pure: the same text always
 * yields the same key and confidence, and it never throws.
 *
 * @module domain/classifiers/RuleBasedClassifier
 */

import type { Taxonomy } from "../taxonomy.js";
import type { KeywordRuleTable } from "../rules/keywordRules.js";
import { scoreKeywordRules } from "../rules/keywordRules.js";
import type { PrimaryCategoryChoice } from "../results.js";

const kScoreCap = 0.9;
const kMatchedFloor = 0.25;
const kUnmatchedConfidence = 0.15;

export class RuleBasedClassifier {
    readonly id = "rule-based";

    constructor(
        private readonly taxonomy: Taxonomy,
        private readonly rules: KeywordRuleTable
    ) {}

    /**
     * Pick the category whose keyword table scores highest.
     *
     * Only a strictly higher score replaces the current best, so ties go to
     * the category listed first in the rule table. Rule tables for keys the
     * taxonomy does not define are ignored.
     */
    classify(text: string): PrimaryCategoryChoice {
        const known = new Set(this.taxonomy.primary.map((category) => category.key));

        let bestKey = this.taxonomy.fallbackKey;
        let bestScore = 0;

        for (const entry of scoreKeywordRules(text, this.rules, kScoreCap)) {
            if (known.has(entry.name) && entry.score > bestScore) {
                bestKey = entry.name;
                bestScore = entry.score;
            }
        }

        return Object.freeze({
            key       : bestKey,
            confidence: bestScore > 0 ? Math.max(bestScore, kMatchedFloor) : kUnmatchedConfidence,
            method    : "rule-based",
        });
    }
}
