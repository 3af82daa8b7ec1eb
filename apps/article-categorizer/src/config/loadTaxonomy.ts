/**
 * @fileoverview Taxonomy Loader
 *
 * Loads the category tree from `categories.yaml`.
 *
 * @module config/loadTaxonomy
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { Logger } from "@rubricator/engine";
import { describeError } from "@rubricator/engine";
import type { Taxonomy } from "../domain/taxonomy.js";
import { createTaxonomy, getDefaultTaxonomy } from "../domain/taxonomy.js";

const TaxonomyFileSchema = z.object({
    primary: z.array(z.object({
        key        : z.string().min(1),
        label      : z.string().min(1),
        description: z.string().min(1),
    })).min(1),
    subcategories: z.record(z.array(z.string().min(1))).default({}),
    fallback     : z.string().min(1).optional(),
});

/**
 * Load a taxonomy from a YAML file.
 *
 * @param filePath - Path to categories.yaml
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const taxonomy = loadTaxonomy("./config/categories.yaml");
 * taxonomy.primary.map((category) => category.key);
 * // ["AI", "Programming", ..., "Other"]
 * ```
 */
export function loadTaxonomy(filePath: string): Taxonomy {
    if (!existsSync(filePath)) {
        throw new Error(`Taxonomy file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed = TaxonomyFileSchema.safeParse(parseYaml(content));

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(
            `Invalid taxonomy file format: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown error"}`
        );
    }

    const { primary, subcategories, fallback } = parsed.data;
    return createTaxonomy({
        primary,
        subcategories,
        ...(fallback !== undefined && { fallbackKey: fallback }),
    });
}

/**
 * Load a taxonomy with fallback to the built-in default.
 */
export function loadTaxonomyWithFallback(filePath: string, logger?: Logger): Taxonomy {
    try {
        return loadTaxonomy(filePath);
    }
    catch (error) {
        const message = `Failed to load taxonomy from ${filePath}, using built-in default`;
        if (logger) {
            logger.warn(message, { error: describeError(error) });
        }
        else {
            console.warn(message, describeError(error));
        }
        return getDefaultTaxonomy();
    }
}
