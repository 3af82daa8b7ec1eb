/**
 * @fileoverview Rule Set Loader
 *
 * Loads keyword tables, subcategory triggers, label rules and scoring
 * constants from `rules.yaml`.
 *
 * @module config/loadRules
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Logger } from "@rubricator/engine";
import { describeError } from "@rubricator/engine";
import type { RuleSet } from "../domain/rules/RuleSet.js";
import { getEmptyRuleSet, kDefaultScoring } from "../domain/rules/RuleSet.js";

const KeywordRuleSchema = z.object({
    weight  : z.number().positive().max(1),
    keywords: z.array(z.string().min(1)).min(1),
});

const ScoringSchema = z.object({
    similarityBoost       : z.number().positive().default(kDefaultScoring.similarityBoost),
    confidenceCap         : z.number().min(0).max(1).default(kDefaultScoring.confidenceCap),
    strongSimilarity      : z.number().min(0).max(1).default(kDefaultScoring.strongSimilarity),
    secondSimilarity      : z.number().min(0).max(1).default(kDefaultScoring.secondSimilarity),
    minEmbeddingConfidence: z.number().min(0).max(1).default(kDefaultScoring.minEmbeddingConfidence),
    voteThreshold         : z.number().min(0).default(kDefaultScoring.voteThreshold),
});

const RulesFileSchema = z.object({
    primaryKeywords    : z.record(KeywordRuleSchema).default({}),
    subcategoryTriggers: z.record(z.array(z.object({
        subcategory: z.string().min(1),
        keywords   : z.array(z.string().min(1)).min(1),
    }))).default({}),
    labelRules      : z.record(KeywordRuleSchema).default({}),
    labelCategoryMap: z.record(z.string().min(1)).default({}),
    scoring         : ScoringSchema.default({}),
});

/**
 * Load rule tables from a YAML file.
 *
 * @param filePath - Path to rules.yaml
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadRules(filePath: string): RuleSet {
    if (!existsSync(filePath)) {
        throw new Error(`Rules file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed = RulesFileSchema.safeParse(parseYaml(content) ?? {});

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(
            `Invalid rules file format: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown error"}`
        );
    }

    return Object.freeze(parsed.data);
}

/**
 * Load rule tables, falling back to empty tables with default scoring.
 */
export function loadRulesWithFallback(filePath: string, logger?: Logger): RuleSet {
    try {
        return loadRules(filePath);
    }
    catch (error) {
        const message = `Failed to load rules from ${filePath}, keyword rules disabled`;
        if (logger) {
            logger.warn(message, { error: describeError(error) });
        }
        else {
            console.warn(message, describeError(error));
        }
        return getEmptyRuleSet();
    }
}
