/**
 * @fileoverview Topic Clusterer
 *
 * Statistical topic discovery without any external service:
 * - single document: TF-IDF against a fixed set of filler documents,
 *   label from the top terms
 * - batch: TF-IDF + deterministic k-means, keywords and labels per cluster
 *
 * Both paths are deterministic for the same input.
 *
 * @module domain/topics/TopicClusterer
 */

import type { Logger } from "@rubricator/engine";
import { describeError, kSilentLogger } from "@rubricator/engine";
import type { TopicResult } from "../results.js";
import { cleanForTopics } from "../text/normalize.js";
import { isStopWord } from "../text/stopwords.js";
import { dot, fitTransform } from "./tfidf.js";
import { kMeans } from "./kmeans.js";
import { buildClusterLabel, selectClusterKeywords } from "./topicLabels.js";

export const kMinTopicTextLength = 20;

const kSingleDocumentTopTerms = 8;
const kSingleDocumentKeywords = 6;
const kSingleDocumentLabelTerms = 3;
const kMaxSingleLabelLength = 50;
const kMinTermScore = 0.001;
const kDefaultClusterCount = 5;
const kMaxClusterCount = 8;

/**
 * Neutral documents that give the single-document idf something to
 * contrast against.
 */
const kFillerDocuments: readonly string[] = [
    "программирование разработка код",
    "управление проект команда",
    "анализ данные исследование",
    "software development code",
    "project management team",
    "data analysis research",
];

const kTooShortLabel = "Text too short";
const kGeneralTopicLabel = "General topic";
const kErrorLabel = "Clustering error";

export interface TopicDocument {
    readonly text: string;
    readonly title?: string | null;
}

function isLetterWord(minLength: number): (token: string) => boolean {
    return (token) => token.length >= minLength && /^\p{L}+$/u.test(token);
}

function emptyTopic(label: string): TopicResult {
    return Object.freeze({ topicId: -1, label, keywords: Object.freeze([]), confidence: 0 });
}

function joinTitle(document: TopicDocument): string {
    return document.title ? `${document.title} ${document.text}` : document.text;
}

export class TopicClusterer {
    readonly id = "topic";

    constructor(private readonly logger: Logger = kSilentLogger) {}

    /**
     * Topic of a single document. Never throws.
     */
    clusterDocument(text: string, title: string | null = null): TopicResult {
        try {
            return this.clusterSingle(cleanForTopics(joinTitle({ text, title })));
        }
        catch (error) {
            this.logger.error("Topic clustering failed", { error: describeError(error) });
            return emptyTopic(kErrorLabel);
        }
    }

    /**
     * Cluster a batch of documents.
     *
     * Documents shorter than the minimum length, and whole batches with
     * fewer than two usable documents, take the single-document path.
     *
     * @returns One result per input, in input order
     */
    clusterDocuments(
        documents: readonly TopicDocument[],
        requestedClusters: number = kDefaultClusterCount
    ): TopicResult[] {
        const single = (): TopicResult[] => documents.map((document) => this.clusterDocument(document.text, document.title ?? null));

        if (documents.length < 2) {
            return single();
        }

        const cleaned = documents.map((document) => cleanForTopics(joinTitle(document)));
        const validIndices = cleaned
            .map((text, index) => (text.length >= kMinTopicTextLength ? index : -1))
            .filter((index) => index >= 0);

        if (validIndices.length < 2) {
            return single();
        }

        try {
            const validTexts = validIndices.map((index) => cleaned[index] ?? "");
            const clusters = this.clusterBatch(validTexts, requestedClusters);

            return documents.map((document, index) => {
                const position = validIndices.indexOf(index);
                return clusters[position] ?? this.clusterDocument(document.text, document.title ?? null);
            });
        }
        catch (error) {
            this.logger.error("Batch topic clustering failed", { error: describeError(error) });
            return single();
        }
    }

    private clusterSingle(cleanedText: string): TopicResult {
        if (cleanedText.length < kMinTopicTextLength) {
            return emptyTopic(kTooShortLabel);
        }

        const matrix = fitTransform([cleanedText, ...kFillerDocuments], {
            ngramRange : [1, 2],
            maxFeatures: 100,
            acceptToken: isLetterWord(3),
            isStopWord,
        });

        const scores = matrix.rows[0] ?? [];
        const keywords = matrix.vocabulary
            .map((term, column) => ({ term, score: scores[column] ?? 0 }))
            .sort((a, b) => b.score - a.score || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
            .slice(0, kSingleDocumentTopTerms)
            .filter((entry) => entry.score > kMinTermScore && entry.term.length > 2)
            .map((entry) => entry.term)
            .slice(0, kSingleDocumentKeywords);

        let label = kGeneralTopicLabel;
        if (keywords.length > 0) {
            label = keywords.slice(0, kSingleDocumentLabelTerms).join(" • ");
            if (label.length > kMaxSingleLabelLength) {
                label = `${label.slice(0, kMaxSingleLabelLength - 3)}...`;
            }
        }

        let confidence = 0.6;
        if (keywords.length >= 3) {
            confidence = 0.75;
        }
        if (keywords.length >= 5) {
            confidence = 0.85;
        }

        return Object.freeze({ topicId: 0, label, keywords: Object.freeze(keywords), confidence });
    }

    private clusterBatch(texts: readonly string[], requestedClusters: number): TopicResult[] {
        const vectors = fitTransform(texts, {
            ngramRange          : [1, 3],
            maxFeatures         : 500,
            acceptToken         : (token) => token.length >= 2,
            maxDocumentFrequency: 0.95,
        });

        const k = Math.max(2, Math.min(requestedClusters, Math.floor(texts.length / 2), kMaxClusterCount));
        const assignments = kMeans(vectors.rows, k);

        const keywordMatrix = fitTransform(texts, {
            ngramRange : [1, 3],
            maxFeatures: 500,
            acceptToken: isLetterWord(1),
            isStopWord,
        });

        const clusterIds = [...new Set(assignments)].sort((a, b) => a - b);
        const keywordsByCluster = new Map<number, string[]>();
        const labelsByCluster = new Map<number, string>();

        for (const clusterId of clusterIds) {
            const members = keywordMatrix.rows.filter((_, index) => assignments[index] === clusterId);
            const scored = keywordMatrix.vocabulary.map((term, column) => ({
                term,
                score: members.reduce((sum, row) => sum + (row[column] ?? 0), 0) / members.length,
            }));
            const keywords = selectClusterKeywords(scored);
            keywordsByCluster.set(clusterId, keywords);
            labelsByCluster.set(clusterId, buildClusterLabel(clusterId, keywords));
        }

        this.logger.debug("Batch topic clustering", { documents: texts.length, clusters: clusterIds.length });

        return assignments.map((clusterId, index) => {
            const row = vectors.rows[index] ?? [];
            const peers = vectors.rows.filter((_, other) => other !== index && assignments[other] === clusterId);
            const confidence = peers.length === 0
                ? 0.5
                : Math.max(0.1, Math.min(0.95, peers.reduce((sum, peer) => sum + dot(row, peer), 0) / peers.length));

            return Object.freeze({
                topicId : clusterId,
                label   : labelsByCluster.get(clusterId) ?? `Topic ${clusterId}`,
                keywords: Object.freeze([...(keywordsByCluster.get(clusterId) ?? [])]),
                confidence,
            });
        });
    }
}
