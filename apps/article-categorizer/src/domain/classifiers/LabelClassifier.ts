/**
 * @fileoverview Zero-Shot / Rule-Based Label Classifier
 *
 * Assigns human-readable topic labels from a fixed candidate list. A
 * zero-shot model is used when configured; otherwise, or when it fails,
 * the weighted keyword rules for the same labels decide.
 *
 * @module domain/classifiers/LabelClassifier
 */

import type { CategoryVote, Logger } from "@rubricator/engine";
import { createCategoryVote, describeError, kSilentLogger } from "@rubricator/engine";
import type { KeywordRuleTable } from "../rules/keywordRules.js";
import { scoreKeywordRules } from "../rules/keywordRules.js";
import type { RequestOptions, ZeroShotModel } from "../ports.js";
import type { LabelClassificationResult, RankedLabel } from "../results.js";
import { ModelResponseError } from "../errors.js";
import { cleanForLabels, truncate } from "../text/normalize.js";

export const kGeneralTopicLabel = "General topic";

const kMaxModelInputChars = 4000;
const kMaxRankedLabels = 3;
const kModelScoreThreshold = 0.1;
const kRuleScoreThreshold = 0.05;
const kRuleScoreCap = 0.95;
const kNoMatchConfidence = 0.1;

export interface LabelClassifierOptions {
    readonly rules: KeywordRuleTable;
    readonly model: ZeroShotModel | null;
    readonly enabled?: boolean;
    readonly logger?: Logger;
}

export class LabelClassifier {
    readonly id = "labels";

    private readonly rules: KeywordRuleTable;
    private readonly model: ZeroShotModel | null;
    private readonly enabled: boolean;
    private readonly logger: Logger;

    constructor(options: LabelClassifierOptions) {
        this.rules = options.rules;
        this.model = options.model;
        this.enabled = options.enabled ?? true;
        this.logger = options.logger ?? kSilentLogger;
    }

    get candidateLabels(): string[] {
        return Object.keys(this.rules);
    }

    /**
     * Classify an article. Never rejects; degraded modes are reported
     * through `method`.
     */
    async classify(
        text: string,
        title: string | null = null,
        options: RequestOptions = {}
    ): Promise<LabelClassificationResult> {
        if (!this.enabled) {
            return Object.freeze({
                primaryLabel: kGeneralTopicLabel,
                rankedLabels: Object.freeze([]),
                confidence  : 0,
                method      : "disabled",
            });
        }

        const cleaned = cleanForLabels(title ? `${title} ${text}` : text);

        if (this.model && this.candidateLabels.length > 0) {
            try {
                return await this.classifyWithModel(this.model, cleaned, options);
            }
            catch (error) {
                this.logger.warn("Zero-shot classification failed, using keyword rules", {
                    error: describeError(error),
                });
            }
        }

        try {
            return this.classifyWithRules(cleaned);
        }
        catch (error) {
            this.logger.error("Rule-based label classification failed", { error: describeError(error) });
            return Object.freeze({
                primaryLabel: kGeneralTopicLabel,
                rankedLabels: Object.freeze([]),
                confidence  : 0,
                method      : "error",
            });
        }
    }

    private async classifyWithModel(
        model: ZeroShotModel,
        text: string,
        options: RequestOptions
    ): Promise<LabelClassificationResult> {
        const prediction = await model.classify(truncate(text, kMaxModelInputChars, "..."), this.candidateLabels, options);

        const ranked: RankedLabel[] = prediction.labels
            .map((label, index) => ({ label, confidence: prediction.scores[index] ?? 0 }))
            .sort((a, b) => b.confidence - a.confidence);

        const top = ranked[0];
        if (!top) {
            throw new ModelResponseError("zero-shot", "no labels in prediction");
        }

        return Object.freeze({
            primaryLabel: top.label,
            rankedLabels: Object.freeze(
                ranked
                    .filter((entry) => entry.confidence > kModelScoreThreshold)
                    .slice(0, kMaxRankedLabels)
                    .map((entry) => Object.freeze(entry))
            ),
            confidence  : top.confidence,
            method      : "zero-shot",
        });
    }

    private classifyWithRules(text: string): LabelClassificationResult {
        const scores = scoreKeywordRules(text, this.rules, kRuleScoreCap).sort((a, b) => b.score - a.score);

        const top = scores[0];
        if (!top) {
            return Object.freeze({
                primaryLabel: kGeneralTopicLabel,
                rankedLabels: Object.freeze([]),
                confidence  : kNoMatchConfidence,
                method      : "rule-based",
            });
        }

        return Object.freeze({
            primaryLabel: top.name,
            rankedLabels: Object.freeze(
                scores
                    .slice(0, kMaxRankedLabels)
                    .filter((entry) => entry.score > kRuleScoreThreshold)
                    .map((entry) => Object.freeze({
                        label          : entry.name,
                        confidence     : entry.score,
                        matchedKeywords: Object.freeze([...entry.matchedKeywords]),
                    }))
            ),
            confidence  : top.score,
            method      : "rule-based",
        });
    }
}

/**
 * Turn the primary label into an ensemble vote through a label -> category
 * map. `null` when the label has no mapping to a known category or the
 * result carries no confidence.
 */
export function toLabelVote(
    result: LabelClassificationResult,
    labelCategoryMap: Readonly<Record<string, string>>,
    knownCategories: readonly string[]
): CategoryVote | null {
    const category = labelCategoryMap[result.primaryLabel];
    if (category === undefined || !knownCategories.includes(category) || result.confidence <= 0) {
        return null;
    }
    return createCategoryVote("labels", [category], result.confidence);
}
