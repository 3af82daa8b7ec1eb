/**
 * @fileoverview Output record
 *
 * JSON shape handed to the persistence/API collaborator. Field names are
 * snake_case; the top-level primary/subcategory/keyword/confidence fields
 * duplicate `ai_categorization` for older consumers.
 *
 * @module domain/serialization
 */

import type {
    ClassificationResult,
    CombinedCategorization,
    LabelClassificationResult,
    TopicResult,
} from "./results.js";

export interface ClassificationRecord {
    primary_category: string;
    primary_category_label: string;
    subcategories: string[];
    keywords: string[];
    confidence: number;
    method: string;
}

export interface TopicRecord {
    topic_id: number;
    topic_label: string;
    topic_keywords: string[];
    confidence: number;
}

export interface LabelRecord {
    primary_category: string;
    categories: { category: string; confidence: number; matched_keywords?: string[] }[];
    confidence: number;
    method: string;
}

export interface CategorizationRecord extends Omit<ClassificationRecord, "method"> {
    id: string;
    title: string | null;
    summary: string;
    language: string;
    ai_categorization: ClassificationRecord;
    topic_clustering: TopicRecord | null;
    bart_categorization: LabelRecord | null;
    ensemble_categorization: ClassificationRecord & { votes: Record<string, number> };
    processing_methods: Record<string, string>;
}

function toClassificationRecord(result: ClassificationResult): ClassificationRecord {
    return {
        primary_category      : result.primaryCategoryKey,
        primary_category_label: result.primaryCategoryLabel,
        subcategories         : [...result.subcategories],
        keywords              : [...result.keywords],
        confidence            : result.confidence,
        method                : result.method,
    };
}

export function toTopicRecord(topic: TopicResult): TopicRecord {
    return {
        topic_id      : topic.topicId,
        topic_label   : topic.label,
        topic_keywords: [...topic.keywords],
        confidence    : topic.confidence,
    };
}

function toLabelRecord(labels: LabelClassificationResult): LabelRecord {
    return {
        primary_category: labels.primaryLabel,
        categories      : labels.rankedLabels.map((entry) => ({
            category  : entry.label,
            confidence: entry.confidence,
            ...(entry.matchedKeywords && { matched_keywords: [...entry.matchedKeywords] }),
        })),
        confidence      : labels.confidence,
        method          : labels.method,
    };
}

/**
 * Serialize a categorization into the output record.
 */
export function toCategorizationRecord(result: CombinedCategorization): CategorizationRecord {
    const ai = toClassificationRecord(result.ai);

    return {
        id                     : result.id,
        title                  : result.title,
        summary                : result.summary,
        language               : result.language,
        ai_categorization      : ai,
        topic_clustering       : result.topic ? toTopicRecord(result.topic) : null,
        bart_categorization    : result.labels ? toLabelRecord(result.labels) : null,
        ensemble_categorization: {
            ...toClassificationRecord(result.ensemble),
            votes: Object.fromEntries(result.decision.tallies.map((tally) => [tally.category, tally.votes])),
        },
        processing_methods     : { ...result.processingMethods },
        primary_category       : ai.primary_category,
        primary_category_label : ai.primary_category_label,
        subcategories          : [...ai.subcategories],
        keywords               : [...ai.keywords],
        confidence             : ai.confidence,
    };
}
