/**
 * @fileoverview Embedding Similarity Classifier
 *
 * Primary category by cosine similarity between the article embedding and
 * cached category-description embeddings. Any failure (no provider,
 * service error, malformed vectors) degrades to the rule-based result on
 * the same text; `classify` never rejects.
 *
 * @module domain/classifiers/EmbeddingSimilarityClassifier
 */

import type { Logger } from "@rubricator/engine";
import { describeError, kSilentLogger } from "@rubricator/engine";
import type { Taxonomy } from "../taxonomy.js";
import type { EmbeddingProvider, EmbeddingVector, RequestOptions } from "../ports.js";
import type { CategorySimilarity, PrimaryCategoryChoice } from "../results.js";
import type { ScoringSettings } from "../rules/RuleSet.js";
import { kDefaultScoring } from "../rules/RuleSet.js";
import { EmbeddingCache } from "../embeddings/EmbeddingCache.js";
import { ModelResponseError } from "../errors.js";
import { truncate } from "../text/normalize.js";
import type { RuleBasedClassifier } from "./RuleBasedClassifier.js";

const kMaxInputChars = 6000;
const kTopSimilarities = 3;
const kEpsilon = 1e-9;

/**
 * Cosine similarity `a·b / (|a||b| + 1e-9)`.
 *
 * @throws ModelResponseError when the vectors differ in length
 */
export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
        throw new ModelResponseError("embeddings", `dimension mismatch (${a.length} vs ${b.length})`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        const x = a[i] ?? 0;
        const y = b[i] ?? 0;
        dot += x * y;
        normA += x * x;
        normB += y * y;
    }

    return dot / (Math.sqrt(normA) * Math.sqrt(normB) + kEpsilon);
}

/**
 * Confidence from the top similarity scores (best first).
 *
 * Boosted when the best score is strong or the runner-up is close behind,
 * otherwise floored.
 *
 * @example
 * ```typescript
 * deriveSimilarityConfidence([0.5, 0.2, 0.1]);   // 0.6
 * deriveSimilarityConfidence([0.35, 0.32, 0.1]); // 0.42
 * deriveSimilarityConfidence([0.2, 0.1]);        // 0.25
 * ```
 */
export function deriveSimilarityConfidence(
    topScores: readonly number[],
    scoring: ScoringSettings = kDefaultScoring
): number {
    const best = topScores[0] ?? 0;
    const second = topScores[1];

    if (best > scoring.strongSimilarity || (second !== undefined && second > scoring.secondSimilarity)) {
        return Math.min(best * scoring.similarityBoost, scoring.confidenceCap);
    }
    return Math.max(best, scoring.minEmbeddingConfidence);
}

export interface EmbeddingSimilarityClassifierOptions {
    readonly taxonomy: Taxonomy;
    readonly provider: EmbeddingProvider | null;
    readonly fallback: RuleBasedClassifier;
    readonly cache?: EmbeddingCache;
    readonly scoring?: ScoringSettings;
    readonly logger?: Logger;
}

export class EmbeddingSimilarityClassifier {
    readonly id = "embedding";

    private readonly taxonomy: Taxonomy;
    private readonly provider: EmbeddingProvider | null;
    private readonly fallback: RuleBasedClassifier;
    private readonly cache: EmbeddingCache;
    private readonly scoring: ScoringSettings;
    private readonly logger: Logger;

    constructor(options: EmbeddingSimilarityClassifierOptions) {
        this.taxonomy = options.taxonomy;
        this.provider = options.provider;
        this.fallback = options.fallback;
        this.cache = options.cache ?? new EmbeddingCache();
        this.scoring = options.scoring ?? kDefaultScoring;
        this.logger = options.logger ?? kSilentLogger;
    }

    isAvailable(): boolean {
        return this.provider !== null;
    }

    async classify(text: string, options: RequestOptions = {}): Promise<PrimaryCategoryChoice> {
        const provider = this.provider;
        if (!provider) {
            return this.fallback.classify(text);
        }

        try {
            return await this.classifyWith(provider, text, options);
        }
        catch (error) {
            this.logger.warn("Embedding classification failed, using keyword rules", {
                error: describeError(error),
            });
            return this.fallback.classify(text);
        }
    }

    private async classifyWith(
        provider: EmbeddingProvider,
        text: string,
        options: RequestOptions
    ): Promise<PrimaryCategoryChoice> {
        const [queryVectors, categoryVectors] = await Promise.all([
            provider.embed([truncate(text, kMaxInputChars)], options),
            this.cache.resolve(this.taxonomy.primary, (texts) => provider.embed(texts), options.signal),
        ]);

        const query = queryVectors[0];
        if (!query) {
            throw new ModelResponseError("embeddings", "empty response for article text");
        }

        const ranked: CategorySimilarity[] = this.taxonomy.primary
            .map((category, index) => {
                const vector = categoryVectors[index];
                if (!vector) {
                    throw new ModelResponseError("embeddings", `missing vector for "${category.key}"`);
                }
                return { key: category.key, similarity: cosineSimilarity(query, vector) };
            })
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, kTopSimilarities);

        const top = ranked[0];
        if (!top) {
            throw new ModelResponseError("embeddings", "taxonomy has no categories");
        }

        const confidence = deriveSimilarityConfidence(ranked.map((entry) => entry.similarity), this.scoring);

        this.logger.debug("Embedding classification", {
            primary: top.key,
            confidence,
            top    : ranked,
        });

        return Object.freeze({
            key         : top.key,
            confidence,
            method      : "embedding",
            similarities: Object.freeze(ranked.map((entry) => Object.freeze(entry))),
        });
    }
}
