/**
 * @fileoverview Domain barrel exports
 *
 * @module domain
 */

export * from "./taxonomy.js";
export * from "./errors.js";
export * from "./results.js";
export * from "./ports.js";
export * from "./ArticleDocument.js";
export * from "./ArticleCategorizer.js";
export * from "./serialization.js";
export * from "./text/normalize.js";
export * from "./rules/keywordRules.js";
export * from "./rules/RuleSet.js";
export * from "./embeddings/EmbeddingCache.js";
export * from "./classifiers/RuleBasedClassifier.js";
export * from "./classifiers/EmbeddingSimilarityClassifier.js";
export * from "./classifiers/SubcategoryKeywordExtractor.js";
export * from "./classifiers/LabelClassifier.js";
export * from "./topics/TopicClusterer.js";
