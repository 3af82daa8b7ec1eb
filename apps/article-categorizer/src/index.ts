/**
 * @fileoverview Article Categorizer - Library Entry Point
 *
 * Multi-method categorization of articles: embedding similarity against
 * category descriptions, deterministic keyword rules, LLM subcategories
 * and keywords, TF-IDF topic clustering, zero-shot labels, and an
 * ensemble vote across all of them.
 *
 * Use {@link createCategorizer} for a categorizer wired from the
 * environment, or construct {@link ArticleCategorizer} directly with
 * custom ports.
 *
 * @module article-categorizer
 */

export * from "./domain/index.js";
export * from "./config/index.js";
export * from "./adapters/openai/index.js";
export * from "./adapters/huggingface/index.js";
export { createCategorizer } from "./createCategorizer.js";
export type { CreateCategorizerOptions } from "./createCategorizer.js";
