/**
 * @fileoverview Keyword rule scoring
 *
 * One scoring routine for every weighted keyword table in the system
 * (primary category fallback and label fallback).
 *
 * @module domain/rules/keywordRules
 */

export interface KeywordRule {
    readonly keywords: readonly string[];
    readonly weight: number;
}

/**
 * Table of rules in evaluation order.
 */
export type KeywordRuleTable = Readonly<Record<string, KeywordRule>>;

export interface KeywordRuleScore {
    readonly name: string;
    readonly score: number;
    readonly matchedKeywords: readonly string[];
}

/**
 * Score every rule against `text`.
 *
 * A keyword matches when it occurs as a case-insensitive substring.
 * Score = `min(matches / keywords * weight, cap)`. Rules without any
 * match are omitted; the rest keep table order.
 *
 * @example
 * ```typescript
 * scoreKeywordRules("Налоги и бизнес", {
 *     Business: { keywords: ["бизнес", "налоги", "стартап", "финансы"], weight: 0.8 },
 * }, 0.9);
 * // [{ name: "Business", score: 0.4, matchedKeywords: ["бизнес", "налоги"] }]
 * ```
 */
export function scoreKeywordRules(
    text: string,
    rules: KeywordRuleTable,
    cap: number
): KeywordRuleScore[] {
    const haystack = text.toLowerCase();
    const scores: KeywordRuleScore[] = [];

    for (const [name, rule] of Object.entries(rules)) {
        if (rule.keywords.length === 0) {
            continue;
        }

        const matchedKeywords = rule.keywords.filter((keyword) => haystack.includes(keyword.toLowerCase()));
        if (matchedKeywords.length === 0) {
            continue;
        }

        scores.push({
            name,
            score: Math.min((matchedKeywords.length / rule.keywords.length) * rule.weight, cap),
            matchedKeywords,
        });
    }

    return scores;
}
