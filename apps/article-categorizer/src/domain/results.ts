/**
 * @fileoverview Classification result types
 *
 * Every result carries its own `method` so that degraded modes are
 * visible in the output instead of raised as errors.
 *
 * @module domain/results
 */

import type { EnsembleDecision } from "@rubricator/engine";
import type { ArticleLanguage } from "./ArticleDocument.js";

export type ClassificationMethod = "embedding" | "rule-based" | "llm" | "ensemble";

/**
 * Primary category with subcategories and keywords.
 */
export interface ClassificationResult {
    readonly primaryCategoryKey: string;
    readonly primaryCategoryLabel: string;
    readonly subcategories: readonly string[];
    readonly keywords: readonly string[];
    readonly confidence: number;
    readonly method: ClassificationMethod;
}

/**
 * Category choice before subcategories and keywords are attached.
 */
export interface PrimaryCategoryChoice {
    readonly key: string;
    readonly confidence: number;
    readonly method: "embedding" | "rule-based";

    /** Top similarity scores, best first (embedding method only) */
    readonly similarities?: readonly CategorySimilarity[];
}

export interface CategorySimilarity {
    readonly key: string;
    readonly similarity: number;
}

export interface TopicResult {
    /** Cluster index; -1 when the text was too short or clustering failed */
    readonly topicId: number;
    readonly label: string;
    readonly keywords: readonly string[];
    readonly confidence: number;
}

export interface RankedLabel {
    readonly label: string;
    readonly confidence: number;
    readonly matchedKeywords?: readonly string[];
}

export type LabelMethod = "zero-shot" | "rule-based" | "disabled" | "error";

export interface LabelClassificationResult {
    readonly primaryLabel: string;
    readonly rankedLabels: readonly RankedLabel[];
    readonly confidence: number;
    readonly method: LabelMethod;
}

/**
 * Final, deep-frozen aggregate for one article.
 */
export interface CombinedCategorization {
    readonly id: string;
    readonly title: string | null;
    readonly summary: string;
    readonly language: ArticleLanguage;
    readonly ai: ClassificationResult;
    readonly topic: TopicResult | null;
    readonly labels: LabelClassificationResult | null;
    readonly ensemble: ClassificationResult;
    readonly decision: EnsembleDecision;

    /** Strategy ID -> outcome status ("ok", "failed", "timeout", "skipped") */
    readonly processingMethods: Readonly<Record<string, string>>;
}
