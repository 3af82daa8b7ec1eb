/**
 * @fileoverview Unit tests for the output record
 *
 * @module __tests__/serialization
 */

import { describe, it, expect } from "vitest";
import { combineVotes, createCategoryVote } from "@rubricator/engine";
import type { CombinedCategorization } from "../domain/results.js";
import { toCategorizationRecord, toTopicRecord } from "../domain/serialization.js";

const categorization: CombinedCategorization = {
    id      : "article-7",
    title   : "Налоги",
    summary : "Новые правила для ИП.",
    language: "ru",
    ai      : {
        primaryCategoryKey  : "Business",
        primaryCategoryLabel: "Business & Finance",
        subcategories       : ["Taxes"],
        keywords            : ["налог", "ИП"],
        confidence          : 0.82,
        method              : "embedding",
    },
    topic: {
        topicId   : 0,
        label     : "налог • ип",
        keywords  : ["налог", "ип"],
        confidence: 0.85,
    },
    labels: {
        primaryLabel: "Business and Finance",
        rankedLabels: [{ label: "Business and Finance", confidence: 0.4, matchedKeywords: ["налог"] }],
        confidence  : 0.4,
        method      : "rule-based",
    },
    ensemble: {
        primaryCategoryKey  : "Business",
        primaryCategoryLabel: "Business & Finance",
        subcategories       : ["Taxes"],
        keywords            : ["налог", "ИП"],
        confidence          : 0.61,
        method              : "ensemble",
    },
    decision: combineVotes([
        createCategoryVote("embedding", ["Business"], 0.82),
        createCategoryVote("labels", ["Business"], 0.4),
    ]),
    processingMethods: { summary: "ok", primary: "embedding", llm: "skipped" },
};

describe("toCategorizationRecord", () => {
    // Scenario: Full result
    it("should map every section to snake_case fields", () => {
        const record = toCategorizationRecord(categorization);

        expect(record.ai_categorization).toEqual({
            primary_category      : "Business",
            primary_category_label: "Business & Finance",
            subcategories         : ["Taxes"],
            keywords              : ["налог", "ИП"],
            confidence            : 0.82,
            method                : "embedding",
        });
        expect(record.topic_clustering).toEqual({
            topic_id      : 0,
            topic_label   : "налог • ип",
            topic_keywords: ["налог", "ип"],
            confidence    : 0.85,
        });
        expect(record.bart_categorization).toEqual({
            primary_category: "Business and Finance",
            categories      : [{ category: "Business and Finance", confidence: 0.4, matched_keywords: ["налог"] }],
            confidence      : 0.4,
            method          : "rule-based",
        });
        expect(record.ensemble_categorization.method).toBe("ensemble");
        expect(record.ensemble_categorization.votes).toEqual({ Business: 0.82 + 0.4 });
        expect(record.processing_methods).toEqual({ summary: "ok", primary: "embedding", llm: "skipped" });
    });

    // Scenario: Top-level fields mirror the primary classification
    it("should duplicate the AI classification at the top level", () => {
        const record = toCategorizationRecord(categorization);

        expect(record).toMatchObject({
            id                    : "article-7",
            title                 : "Налоги",
            summary               : "Новые правила для ИП.",
            language              : "ru",
            primary_category      : "Business",
            primary_category_label: "Business & Finance",
            subcategories         : ["Taxes"],
            keywords              : ["налог", "ИП"],
            confidence            : 0.82,
        });
        expect(record).not.toHaveProperty("method");
    });

    // Scenario: Strategies that produced nothing
    it("should emit null for missing topic and labels", () => {
        const record = toCategorizationRecord({ ...categorization, topic: null, labels: null });

        expect(record.topic_clustering).toBeNull();
        expect(record.bart_categorization).toBeNull();
    });

    // Scenario: Zero-shot labels carry no matched keywords
    it("should omit matched_keywords when a label has none", () => {
        const record = toCategorizationRecord({
            ...categorization,
            labels: {
                primaryLabel: "Sports",
                rankedLabels: [{ label: "Sports", confidence: 0.9 }],
                confidence  : 0.9,
                method      : "zero-shot",
            },
        });

        expect(record.bart_categorization?.categories).toEqual([{ category: "Sports", confidence: 0.9 }]);
    });

    it("should survive a JSON round trip unchanged", () => {
        const record = toCategorizationRecord(categorization);

        expect(JSON.parse(JSON.stringify(record))).toEqual(record);
    });
});

describe("toTopicRecord", () => {
    it("should map a too-short topic", () => {
        expect(toTopicRecord({ topicId: -1, label: "Text too short", keywords: [], confidence: 0 })).toEqual({
            topic_id      : -1,
            topic_label   : "Text too short",
            topic_keywords: [],
            confidence    : 0,
        });
    });
});
