/**
 * @fileoverview Article Categorizer
 *
 * Orchestrates every classification strategy for one article:
 *
 * 1. Build the document (input errors are the only thing that escapes)
 * 2. Summarize
 * 3. Fan out: embedding primary, topic, labels, LLM vote, keywords
 * 4. Subcategories for the chosen primary
 * 5. Ensemble vote over all available results
 * 6. Freeze and return the aggregate
 *
 * Each strategy runs through the StrategyRunner, so one failing or
 * slow service never costs the others their results.
 *
 * @module domain/ArticleCategorizer
 */

import type {
    CategoryVote,
    ClassificationStrategy,
    EventBus,
    Logger,
} from "@rubricator/engine";
import {
    StrategyRunner,
    combineVotes,
    createCategoryVote,
    createEvent,
    describeError,
    generateTraceId,
    kSilentLogger,
    outcomeValueOr,
} from "@rubricator/engine";
import type { ArticleDocument, ArticleInput } from "./ArticleDocument.js";
import { createArticleDocument } from "./ArticleDocument.js";
import type { Taxonomy } from "./taxonomy.js";
import { getAllowedSubcategories, getCategoryLabel } from "./taxonomy.js";
import type { RuleSet } from "./rules/RuleSet.js";
import type {
    ClassificationResult,
    CombinedCategorization,
    LabelClassificationResult,
    PrimaryCategoryChoice,
    TopicResult,
} from "./results.js";
import { RuleBasedClassifier } from "./classifiers/RuleBasedClassifier.js";
import type { EmbeddingSimilarityClassifier } from "./classifiers/EmbeddingSimilarityClassifier.js";
import type { SubcategoryKeywordExtractor } from "./classifiers/SubcategoryKeywordExtractor.js";
import { extractLocalKeywords, fallbackSummary } from "./classifiers/SubcategoryKeywordExtractor.js";
import type { LabelClassifier } from "./classifiers/LabelClassifier.js";
import { toLabelVote } from "./classifiers/LabelClassifier.js";
import type { TopicClusterer } from "./topics/TopicClusterer.js";
import { cleanText } from "./text/normalize.js";
import { deepFreeze } from "./deepFreeze.js";

const kMaxKeywords = 8;

export interface ArticleCategorizerDependencies {
    readonly taxonomy: Taxonomy;
    readonly rules: RuleSet;
    readonly embedding: EmbeddingSimilarityClassifier;
    readonly extractor: SubcategoryKeywordExtractor;
    readonly topics: TopicClusterer;
    readonly labels: LabelClassifier;
    readonly runner?: StrategyRunner;
    readonly logger?: Logger;
}

/**
 * Per-request values the strategies read.
 */
interface StrategyInput {
    readonly document: ArticleDocument;
    readonly summary: string;
}

export class ArticleCategorizer {
    private readonly taxonomy: Taxonomy;
    private readonly rules: RuleSet;
    private readonly ruleBased: RuleBasedClassifier;
    private readonly embedding: EmbeddingSimilarityClassifier;
    private readonly extractor: SubcategoryKeywordExtractor;
    private readonly topics: TopicClusterer;
    private readonly labels: LabelClassifier;
    private readonly runner: StrategyRunner;
    private readonly logger: Logger;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(dependencies: ArticleCategorizerDependencies) {
        this.taxonomy = dependencies.taxonomy;
        this.rules = dependencies.rules;
        this.ruleBased = new RuleBasedClassifier(dependencies.taxonomy, dependencies.rules.primaryKeywords);
        this.embedding = dependencies.embedding;
        this.extractor = dependencies.extractor;
        this.topics = dependencies.topics;
        this.labels = dependencies.labels;
        this.logger = dependencies.logger ?? kSilentLogger;
        this.runner = dependencies.runner ?? new StrategyRunner({ logger: this.logger });
        this.eventBus = this.runner.eventBus;
    }

    /**
     * Categorize one article.
     *
     * @throws CategorizationInputError when the article has neither text nor title
     */
    async categorize(input: ArticleInput): Promise<CombinedCategorization> {
        const traceId = generateTraceId();
        const startTime = Date.now();

        let document: ArticleDocument;
        try {
            document = createArticleDocument(input);
        }
        catch (error) {
            this.eventBus.emit(createEvent("categorization:rejected", { error: describeError(error) }, traceId));
            throw error;
        }

        this.eventBus.emit(createEvent("categorization:started", {
            documentId: document.id,
            language  : document.language,
            length    : document.cleanedText.length,
        }, traceId));

        const summaryOutcome = await this.runner.run(this.summaryStrategy(), document, traceId);
        const summary = outcomeValueOr(summaryOutcome, fallbackSummary(document.cleanedText));
        const request: StrategyInput = { document, summary };

        const suppliedKeywords = document.extractedKeywords.slice(0, kMaxKeywords);

        const [embeddingOutcome, topicOutcome, labelOutcome, voteOutcome, keywordOutcome] = await Promise.all([
            this.runner.run(this.embeddingStrategy(), request, traceId),
            this.runner.run(this.topicStrategy(), request, traceId),
            this.runner.run(this.labelStrategy(), request, traceId),
            this.runner.run(this.llmVoteStrategy(), request, traceId),
            suppliedKeywords.length > 0
                ? Promise.resolve(null)
                : this.runner.run(this.keywordStrategy(), request, traceId),
        ]);

        const ruleChoice = this.ruleBased.classify(summary);
        const aiChoice: PrimaryCategoryChoice = outcomeValueOr(embeddingOutcome, ruleChoice);

        const subcategoryOutcome = await this.runner.run(this.subcategoryStrategy(aiChoice.key), request, traceId);
        const subcategories = outcomeValueOr(subcategoryOutcome, []);

        const keywords = keywordOutcome === null
            ? suppliedKeywords
            : outcomeValueOr(keywordOutcome, extractLocalKeywords(summary, kMaxKeywords));

        const ai: ClassificationResult = {
            primaryCategoryKey  : aiChoice.key,
            primaryCategoryLabel: getCategoryLabel(this.taxonomy, aiChoice.key),
            subcategories,
            keywords,
            confidence          : aiChoice.confidence,
            method              : aiChoice.method,
        };

        const topic: TopicResult | null = outcomeValueOr(topicOutcome, null);
        const labels: LabelClassificationResult | null = outcomeValueOr(labelOutcome, null);

        const votes: CategoryVote[] = [createCategoryVote(this.ruleBased.id, [ruleChoice.key], ruleChoice.confidence)];
        if (aiChoice.method === "embedding") {
            votes.push(createCategoryVote(this.embedding.id, [aiChoice.key], aiChoice.confidence));
        }
        if (labels) {
            const labelVote = toLabelVote(
                labels,
                this.rules.labelCategoryMap,
                this.taxonomy.primary.map((category) => category.key)
            );
            if (labelVote) {
                votes.push(labelVote);
            }
        }
        const llmVote = outcomeValueOr(voteOutcome, null);
        if (llmVote) {
            votes.push(llmVote);
        }

        const decision = combineVotes(votes, {
            threshold       : this.rules.scoring.voteThreshold,
            confidenceCap   : this.rules.scoring.confidenceCap,
            fallbackCategory: this.taxonomy.fallbackKey,
        });
        const ensembleKey = decision.categories[0] ?? this.taxonomy.fallbackKey;

        const ensemble: ClassificationResult = {
            primaryCategoryKey  : ensembleKey,
            primaryCategoryLabel: getCategoryLabel(this.taxonomy, ensembleKey),
            subcategories       : this.ensembleSubcategories(ensembleKey, ai, summary),
            keywords,
            confidence          : decision.confidence,
            method              : "ensemble",
        };

        const processingMethods: Record<string, string> = {
            summary      : summaryOutcome.status,
            primary      : aiChoice.method,
            embedding    : embeddingOutcome.status,
            topic        : topicOutcome.status,
            labels       : labels?.method ?? labelOutcome.status,
            llm          : voteOutcome.status,
            keywords     : keywordOutcome === null ? "supplied" : keywordOutcome.status,
            subcategories: subcategoryOutcome.status,
        };

        const result: CombinedCategorization = deepFreeze({
            id      : document.id,
            title   : document.title,
            summary,
            language: document.language,
            ai,
            topic,
            labels,
            ensemble,
            decision,
            processingMethods,
        });

        const durationMs = Date.now() - startTime;
        this.eventBus.emit(createEvent("categorization:completed", {
            documentId: document.id,
            primary   : ai.primaryCategoryKey,
            ensemble  : ensemble.primaryCategoryKey,
            confidence: ensemble.confidence,
            durationMs,
        }, traceId));
        this.logger.debug("Article categorized", {
            traceId,
            documentId: document.id,
            primary   : ai.primaryCategoryKey,
            ensemble  : ensemble.primaryCategoryKey,
            durationMs,
        });

        return result;
    }

    /**
     * Batch topic clustering across several articles.
     *
     * @returns One topic per input, in input order
     */
    clusterTopics(inputs: readonly ArticleInput[], requestedClusters?: number): TopicResult[] {
        return this.topics.clusterDocuments(
            inputs.map((input) => ({ text: cleanText(input.text), title: cleanText(input.title) || null })),
            requestedClusters
        );
    }

    /**
     * Subcategories for the ensemble primary: the AI ones when both agree,
     * otherwise only a deterministic trigger hit.
     */
    private ensembleSubcategories(key: string, ai: ClassificationResult, summary: string): readonly string[] {
        if (key === ai.primaryCategoryKey) {
            return ai.subcategories;
        }
        const triggered = this.extractor.matchTrigger(key, summary);
        return triggered !== null && getAllowedSubcategories(this.taxonomy, key).includes(triggered) ? [triggered] : [];
    }

    private summaryStrategy(): ClassificationStrategy<ArticleDocument, string> {
        return {
            id : "summary",
            run: async (document, context) => {
                const outcome = await this.extractor.summarize(document.cleanedText, null, { signal: context.signal });
                if (outcome.kind === "fallback") {
                    context.logger.debug("Summary fallback", { reason: outcome.reason });
                }
                return outcome.value;
            },
        };
    }

    private embeddingStrategy(): ClassificationStrategy<StrategyInput, PrimaryCategoryChoice> {
        return {
            id         : this.embedding.id,
            isAvailable: () => this.embedding.isAvailable(),
            run        : ({ summary }, context) => this.embedding.classify(summary, { signal: context.signal }),
        };
    }

    private topicStrategy(): ClassificationStrategy<StrategyInput, TopicResult> {
        return {
            id : this.topics.id,
            run: ({ document }) => this.topics.clusterDocument(document.cleanedText),
        };
    }

    private labelStrategy(): ClassificationStrategy<StrategyInput, LabelClassificationResult> {
        return {
            id : this.labels.id,
            run: ({ document }, context) => this.labels.classify(document.cleanedText, null, { signal: context.signal }),
        };
    }

    private llmVoteStrategy(): ClassificationStrategy<StrategyInput, CategoryVote | null> {
        return {
            id         : this.extractor.id,
            isAvailable: () => this.extractor.isAvailable(),
            run        : async ({ summary }, context) => {
                const outcome = await this.extractor.suggestCategories(summary, { signal: context.signal });
                if (outcome.kind === "fallback") {
                    context.logger.debug("No LLM category vote", { reason: outcome.reason });
                }
                return outcome.value;
            },
        };
    }

    private keywordStrategy(): ClassificationStrategy<StrategyInput, readonly string[]> {
        return {
            id : "keywords",
            run: async ({ summary }, context) => (await this.extractor.extractKeywords(summary, kMaxKeywords, { signal: context.signal })).value,
        };
    }

    private subcategoryStrategy(primaryKey: string): ClassificationStrategy<StrategyInput, readonly string[]> {
        return {
            id : "subcategories",
            run: async ({ summary }, context) => {
                const outcome = await this.extractor.extractSubcategories(primaryKey, summary, 3, { signal: context.signal });
                if (outcome.kind === "fallback") {
                    context.logger.debug("Subcategory fallback", { primaryKey, reason: outcome.reason });
                }
                return outcome.value;
            },
        };
    }
}
