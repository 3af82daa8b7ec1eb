/**
 * @fileoverview Categorizer factory
 *
 * Wires configuration, adapters and classifiers into an
 * ArticleCategorizer. Capabilities whose credentials are missing are
 * passed as `null`, and the matching classifiers fall back to their
 * deterministic paths.
 *
 * @module createCategorizer
 */

import type { EventBus, Logger } from "@rubricator/engine";
import { InMemoryEventBus, StrategyRunner, createConsoleLogger } from "@rubricator/engine";
import type { Settings } from "./config/settings.js";
import { loadSettings } from "./config/settings.js";
import { loadTaxonomyWithFallback } from "./config/loadTaxonomy.js";
import { loadRulesWithFallback } from "./config/loadRules.js";
import { OpenAIChatClient, OpenAIEmbeddingProvider } from "./adapters/openai/index.js";
import { ZeroShotClient } from "./adapters/huggingface/index.js";
import type { ChatClient, EmbeddingProvider, ZeroShotModel } from "./domain/ports.js";
import { ArticleCategorizer } from "./domain/ArticleCategorizer.js";
import { RuleBasedClassifier } from "./domain/classifiers/RuleBasedClassifier.js";
import { EmbeddingSimilarityClassifier } from "./domain/classifiers/EmbeddingSimilarityClassifier.js";
import { SubcategoryKeywordExtractor } from "./domain/classifiers/SubcategoryKeywordExtractor.js";
import { LabelClassifier } from "./domain/classifiers/LabelClassifier.js";
import { TopicClusterer } from "./domain/topics/TopicClusterer.js";

export interface CreateCategorizerOptions {
    /** Parsed settings (default: read from process.env) */
    readonly settings?: Settings;

    /** Logger (default: console logger at the configured level) */
    readonly logger?: Logger;

    /** Port overrides; `null` disables a capability explicitly */
    readonly chat?: ChatClient | null;
    readonly embeddings?: EmbeddingProvider | null;
    readonly zeroShot?: ZeroShotModel | null;
}

function createChatClient(settings: Settings): ChatClient | null {
    if (!settings.openai.apiKey) {
        return null;
    }
    return new OpenAIChatClient({
        apiKey   : settings.openai.apiKey,
        baseURL  : settings.openai.baseURL ?? undefined,
        model    : settings.openai.chatModel,
        timeoutMs: settings.serviceTimeoutMs,
    });
}

function createEmbeddingProvider(settings: Settings): EmbeddingProvider | null {
    if (!settings.openai.apiKey) {
        return null;
    }
    return new OpenAIEmbeddingProvider({
        apiKey   : settings.openai.apiKey,
        baseURL  : settings.openai.baseURL ?? undefined,
        model    : settings.openai.embeddingModel,
        timeoutMs: settings.serviceTimeoutMs,
    });
}

function createZeroShotModel(settings: Settings): ZeroShotModel | null {
    if (!settings.zeroShot.token) {
        return null;
    }
    return new ZeroShotClient({
        token    : settings.zeroShot.token,
        model    : settings.zeroShot.model,
        timeoutMs: settings.serviceTimeoutMs,
    });
}

/**
 * Build a fully wired categorizer.
 *
 * @example
 * ```typescript
 * const categorizer = createCategorizer();
 * const result = await categorizer.categorize({ text, title });
 * result.ensemble.primaryCategoryKey; // "Business"
 * ```
 */
export function createCategorizer(options: CreateCategorizerOptions = {}): ArticleCategorizer {
    const settings = options.settings ?? loadSettings();
    const logger = options.logger ?? createConsoleLogger(settings.logLevel);

    const taxonomy = loadTaxonomyWithFallback(settings.taxonomyPath, logger);
    const rules = loadRulesWithFallback(settings.rulesPath, logger);

    const chat = options.chat !== undefined ? options.chat : createChatClient(settings);
    const embeddings = options.embeddings !== undefined ? options.embeddings : createEmbeddingProvider(settings);
    const zeroShot = options.zeroShot !== undefined ? options.zeroShot : createZeroShotModel(settings);

    logger.info("Categorizer configured", {
        categories: taxonomy.primary.length,
        chat      : chat !== null,
        embeddings: embeddings !== null,
        zeroShot  : zeroShot !== null,
        labels    : settings.labelClassifierEnabled,
    });

    const eventBus: EventBus = new InMemoryEventBus(logger);
    const runner = new StrategyRunner({
        timeoutMs: settings.serviceTimeoutMs,
        eventBus,
        logger,
    });

    const ruleBased = new RuleBasedClassifier(taxonomy, rules.primaryKeywords);

    return new ArticleCategorizer({
        taxonomy,
        rules,
        embedding: new EmbeddingSimilarityClassifier({
            taxonomy,
            provider: embeddings,
            fallback: ruleBased,
            scoring : rules.scoring,
            logger,
        }),
        extractor: new SubcategoryKeywordExtractor({
            taxonomy,
            client  : chat,
            triggers: rules.subcategoryTriggers,
            logger,
        }),
        topics: new TopicClusterer(logger),
        labels: new LabelClassifier({
            rules  : rules.labelRules,
            model  : zeroShot,
            enabled: settings.labelClassifierEnabled,
            logger,
        }),
        runner,
        logger,
    });
}
