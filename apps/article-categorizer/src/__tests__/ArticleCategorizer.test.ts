/**
 * @fileoverview Unit tests for ArticleCategorizer
 *
 * Tests cover:
 * - Fully offline categorization (keyword rules only)
 * - All services available, through in-process fakes
 * - Degraded services and timeouts
 * - Ensemble disagreement with the primary classifier
 * - Events, input validation and immutability
 *
 * @module __tests__/ArticleCategorizer
 */

import { describe, it, expect, vi } from "vitest";
import type { EventPayload } from "@rubricator/engine";
import { StrategyRunner } from "@rubricator/engine";
import { ArticleCategorizer } from "../domain/ArticleCategorizer.js";
import { RuleBasedClassifier } from "../domain/classifiers/RuleBasedClassifier.js";
import { EmbeddingSimilarityClassifier } from "../domain/classifiers/EmbeddingSimilarityClassifier.js";
import { SubcategoryKeywordExtractor } from "../domain/classifiers/SubcategoryKeywordExtractor.js";
import { LabelClassifier } from "../domain/classifiers/LabelClassifier.js";
import { TopicClusterer } from "../domain/topics/TopicClusterer.js";
import { CategorizationInputError } from "../domain/errors.js";
import { createTaxonomy, getAllowedSubcategories } from "../domain/taxonomy.js";
import type { RuleSet } from "../domain/rules/RuleSet.js";
import { kDefaultScoring } from "../domain/rules/RuleSet.js";
import type { ChatClient, ChatMessage, EmbeddingProvider } from "../domain/ports.js";

const taxonomy = createTaxonomy({
    primary: [
        { key: "AI", label: "Artificial Intelligence", description: "desc-ai" },
        { key: "Business", label: "Business", description: "desc-business" },
        { key: "Other", label: "Other", description: "desc-other" },
    ],
    subcategories: {
        AI      : ["LLM", "NLP"],
        Business: ["Taxes", "Legal"],
    },
});

const rules: RuleSet = {
    primaryKeywords: {
        AI      : { weight: 0.9, keywords: ["llm", "нейросет"] },
        Business: { weight: 0.8, keywords: ["налог", "бизнес"] },
    },
    subcategoryTriggers: {
        Business: [{ subcategory: "Taxes", keywords: ["налог"] }],
    },
    labelRules: {
        "Business and Finance": { weight: 0.8, keywords: ["налог", "бизнес", "стартап", "финансы"] },
    },
    labelCategoryMap: { "Business and Finance": "Business" },
    scoring         : kDefaultScoring,
};

const kTaxArticle = "Новый налог для малого бизнеса вступит в силу с января. Предприниматели должны пересчитать платежи.";

interface ChatReplies {
    readonly summary: string;
    readonly subcategories: string;
    readonly keywords: string;
    readonly categories: string;
}

/**
 * Chat fake that answers by the kind of request (read from the system prompt).
 */
function createChat(replies: ChatReplies) {
    return {
        complete: vi.fn(async (messages: readonly ChatMessage[]) => {
            const system = messages[0]?.content ?? "";
            if (system.includes("summarize")) {
                return replies.summary;
            }
            if (system.includes("subcategories")) {
                return replies.subcategories;
            }
            if (system.includes("keywords")) {
                return replies.keywords;
            }
            return replies.categories;
        }),
    };
}

/**
 * Embedding fake: anything mentioning LLM points at the AI description.
 */
function createEmbeddings(): EmbeddingProvider {
    return {
        embed: vi.fn(async (texts: readonly string[]) => texts.map((text) => {
            if (text === "desc-ai" || text.includes("LLM")) {
                return [1, 0, 0];
            }
            return text === "desc-business" ? [0, 1, 0] : [0, 0, 1];
        })),
    };
}

function buildCategorizer(ports: {
    chat?: ChatClient | null;
    embeddings?: EmbeddingProvider | null;
    runner?: StrategyRunner;
} = {}): ArticleCategorizer {
    const ruleBased = new RuleBasedClassifier(taxonomy, rules.primaryKeywords);

    return new ArticleCategorizer({
        taxonomy,
        rules,
        embedding: new EmbeddingSimilarityClassifier({
            taxonomy,
            provider: ports.embeddings ?? null,
            fallback: ruleBased,
            scoring : rules.scoring,
        }),
        extractor: new SubcategoryKeywordExtractor({
            taxonomy,
            client  : ports.chat ?? null,
            triggers: rules.subcategoryTriggers,
        }),
        topics: new TopicClusterer(),
        labels: new LabelClassifier({ rules: rules.labelRules, model: null }),
        runner: ports.runner,
    });
}

function recordEvents(categorizer: ArticleCategorizer): EventPayload[] {
    const events: EventPayload[] = [];
    categorizer.eventBus.subscribe("*", (event) => {
        events.push(event);
    });
    return events;
}

describe("ArticleCategorizer", () => {
    describe("offline", () => {
        // Scenario: No external service configured
        it("should categorize with keyword rules and local fallbacks", async () => {
            const categorizer = buildCategorizer();

            const result = await categorizer.categorize({ id: "tax-1", text: kTaxArticle });

            expect(result.id).toBe("tax-1");
            expect(result.language).toBe("ru");
            expect(result.summary).toBe(kTaxArticle);
            expect(result.ai).toEqual({
                primaryCategoryKey  : "Business",
                primaryCategoryLabel: "Business",
                subcategories       : ["Taxes"],
                keywords            : [
                    "Новый",
                    "налог",
                    "малого",
                    "бизнеса",
                    "вступит",
                    "января",
                    "Предприниматели",
                    "должны",
                ],
                confidence: 0.8,
                method    : "rule-based",
            });
            expect(result.labels?.primaryLabel).toBe("Business and Finance");
            expect(result.ensemble.primaryCategoryKey).toBe("Business");
            expect(result.ensemble.subcategories).toEqual(["Taxes"]);
            expect(result.ensemble.method).toBe("ensemble");
            expect(result.ensemble.confidence).toBeCloseTo(0.6, 10);
            expect(result.topic?.topicId).toBe(0);
            expect(result.processingMethods).toEqual({
                summary      : "ok",
                primary      : "rule-based",
                embedding    : "skipped",
                topic        : "ok",
                labels       : "rule-based",
                llm          : "skipped",
                keywords     : "ok",
                subcategories: "ok",
            });
        });

        // Scenario: Keywords harvested upstream
        it("should use supplied keywords instead of extracting them", async () => {
            const categorizer = buildCategorizer();

            const result = await categorizer.categorize({ text: kTaxArticle, extractedKeywords: ["налоги", "ИП"] });

            expect(result.ai.keywords).toEqual(["налоги", "ИП"]);
            expect(result.processingMethods.keywords).toBe("supplied");
        });
    });

    describe("with services", () => {
        // Scenario: Embeddings, chat summary, subcategories, keywords and vote all succeed
        it("should combine every strategy's vote", async () => {
            const chat = createChat({
                summary      : "Summary about LLM models.",
                subcategories: '["LLM"]',
                keywords     : '["LLM", "agents"]',
                categories   : '{"categories": ["AI"], "confidence": 0.9}',
            });
            const categorizer = buildCategorizer({ chat, embeddings: createEmbeddings() });

            const result = await categorizer.categorize({
                title: "LLM news",
                text : "Large language models are changing software.",
            });

            expect(result.summary).toBe("Summary about LLM models.");
            expect(result.language).toBe("en");
            expect(result.ai).toEqual({
                primaryCategoryKey  : "AI",
                primaryCategoryLabel: "Artificial Intelligence",
                subcategories       : ["LLM"],
                keywords            : ["LLM", "agents"],
                confidence          : 0.95,
                method              : "embedding",
            });
            expect(result.ensemble.primaryCategoryKey).toBe("AI");
            expect(result.ensemble.subcategories).toEqual(["LLM"]);
            expect(result.ensemble.confidence).toBeCloseTo(2.3 / 3, 10);
            expect(result.decision.tallies[0]?.category).toBe("AI");
            expect(result.decision.tallies[0]?.votes).toBeCloseTo(2.3, 10);
            expect(result.decision.tallies[0]?.sources).toEqual(["rule-based", "embedding", "llm"]);
            expect(result.processingMethods.embedding).toBe("ok");
            expect(result.processingMethods.llm).toBe("ok");
        });

        // Scenario: Ensemble overrules the primary classifier
        it("should only use trigger subcategories when the ensemble disagrees", async () => {
            const chat = createChat({
                summary      : "LLM считает налог.",
                subcategories: '["LLM"]',
                keywords     : '["налог"]',
                categories   : '{"categories": ["Business"], "confidence": 0.9}',
            });
            const categorizer = buildCategorizer({ chat });

            const result = await categorizer.categorize({ text: "LLM считает налог" });

            expect(result.ai.primaryCategoryKey).toBe("AI");
            expect(result.ai.subcategories).toEqual(["LLM"]);
            expect(result.ensemble.primaryCategoryKey).toBe("Business");
            expect(result.ensemble.subcategories).toEqual(["Taxes"]);
            expect(result.decision.categories).toEqual(["Business", "AI"]);
        });
    });

    describe("degraded services", () => {
        // Scenario: Every remote call rejects
        it("should still produce a complete result", async () => {
            const chat: ChatClient = { complete: vi.fn().mockRejectedValue(new Error("503")) };
            const embeddings: EmbeddingProvider = { embed: vi.fn().mockRejectedValue(new Error("503")) };
            const categorizer = buildCategorizer({ chat, embeddings });

            const result = await categorizer.categorize({ text: kTaxArticle });

            expect(result.summary).toBe(kTaxArticle);
            expect(result.ai.method).toBe("rule-based");
            expect(result.ai.primaryCategoryKey).toBe("Business");
            expect(result.ai.subcategories).toEqual(["Taxes"]);
            expect(result.processingMethods.primary).toBe("rule-based");
            expect(result.decision.tallies[0]?.sources).toEqual(["rule-based", "labels"]);
        });

        // Scenario: Embedding service never answers
        it("should time out a hanging strategy and keep the others", async () => {
            const embeddings: EmbeddingProvider = { embed: () => new Promise(() => undefined) };
            const categorizer = buildCategorizer({ embeddings, runner: new StrategyRunner({ timeoutMs: 20 }) });
            const events = recordEvents(categorizer);

            const result = await categorizer.categorize({ text: kTaxArticle });

            expect(result.processingMethods.embedding).toBe("timeout");
            expect(result.ai.method).toBe("rule-based");
            expect(result.topic?.topicId).toBe(0);
            const failure = events.find((event) => event.type === "strategy:failed");
            expect(failure?.data).toMatchObject({ strategyId: "embedding", status: "timeout" });
        });
    });

    describe("result guarantees", () => {
        const articles = [
            { text: kTaxArticle },
            { text: "Short" },
            { title: "LLM", text: "" },
            { text: "Weather report for the weekend: sunny with light wind." },
        ];

        // Scenario: Any input, any service mix
        it("should keep confidences in [0, 1] and subcategories within the taxonomy", async () => {
            const chat = createChat({
                summary      : "Summary.",
                subcategories: '["LLM", "Quantum", "Taxes"]',
                keywords     : "[]",
                categories   : '{"categories": ["Other"], "confidence": 0.5}',
            });

            for (const categorizer of [buildCategorizer(), buildCategorizer({ chat, embeddings: createEmbeddings() })]) {
                for (const article of articles) {
                    const result = await categorizer.categorize(article);

                    for (const classification of [result.ai, result.ensemble]) {
                        expect(classification.confidence).toBeGreaterThanOrEqual(0);
                        expect(classification.confidence).toBeLessThanOrEqual(1);
                        const allowed = getAllowedSubcategories(taxonomy, classification.primaryCategoryKey);
                        for (const subcategory of classification.subcategories) {
                            expect(allowed).toContain(subcategory);
                        }
                    }
                }
            }
        });

        it("should deep-freeze the result", async () => {
            const result = await buildCategorizer().categorize({ text: kTaxArticle });

            expect(Object.isFrozen(result)).toBe(true);
            expect(Object.isFrozen(result.ai.subcategories)).toBe(true);
            expect(Object.isFrozen(result.decision.tallies)).toBe(true);
            expect(Object.isFrozen(result.processingMethods)).toBe(true);
        });
    });

    describe("events and validation", () => {
        // Scenario: Lifecycle events share the trace ID
        it("should emit started, strategy and completed events", async () => {
            const categorizer = buildCategorizer();
            const events = recordEvents(categorizer);

            await categorizer.categorize({ text: kTaxArticle });

            const types = events.map((event) => event.type);
            expect(types[0]).toBe("categorization:started");
            expect(types.at(-1)).toBe("categorization:completed");
            expect(types).toContain("strategy:skipped");
            expect(types).toContain("strategy:completed");
            expect(new Set(events.map((event) => event.traceId)).size).toBe(1);
        });

        // Scenario: Empty article
        it("should reject empty input and emit a rejection event", async () => {
            const categorizer = buildCategorizer();
            const events = recordEvents(categorizer);

            await expect(categorizer.categorize({ text: "   " })).rejects.toThrow(CategorizationInputError);
            expect(events.map((event) => event.type)).toEqual(["categorization:rejected"]);
        });
    });

    describe("clusterTopics", () => {
        it("should return one topic per input", () => {
            const categorizer = buildCategorizer();

            const topics = categorizer.clusterTopics([{ text: kTaxArticle }, { text: "Hi" }]);

            expect(topics).toHaveLength(2);
            expect(topics[0]?.topicId).toBe(0);
            expect(topics[1]?.topicId).toBe(-1);
        });
    });
});
