/**
 * @fileoverview Unit tests for the categorizer factory
 *
 * Uses the shipped configuration files with every remote capability
 * disabled.
 *
 * @module __tests__/createCategorizer
 */

import { describe, it, expect, vi } from "vitest";
import type { Logger } from "@rubricator/engine";
import { loadSettings } from "../config/settings.js";
import { createCategorizer } from "../createCategorizer.js";

function createMockLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    } satisfies Logger;
}

describe("createCategorizer", () => {
    // Scenario: No credentials configured
    it("should build an offline categorizer from the shipped configuration", async () => {
        const logger = createMockLogger();
        const categorizer = createCategorizer({ settings: loadSettings({}), logger });

        const result = await categorizer.categorize({
            text: "Налоговое резидентство при эмиграции: что изменилось в НДФЛ",
        });

        expect(logger.info).toHaveBeenCalledWith("Categorizer configured", {
            categories: 10,
            chat      : false,
            embeddings: false,
            zeroShot  : false,
            labels    : true,
        });
        expect(result.ai.primaryCategoryKey).toBe("Business");
        expect(result.ai.method).toBe("rule-based");
        expect(result.ai.subcategories).toEqual(["Taxes"]);
        expect(result.processingMethods.embedding).toBe("skipped");
        expect(result.processingMethods.llm).toBe("skipped");
    });

    // Scenario: Injected ports take precedence over settings
    it("should use injected clients even without credentials", async () => {
        const chat = { complete: vi.fn().mockResolvedValue("Краткое содержание про налоги.") };
        const categorizer = createCategorizer({
            settings  : loadSettings({}),
            logger    : createMockLogger(),
            chat,
            embeddings: null,
            zeroShot  : null,
        });

        const result = await categorizer.categorize({ text: "Налоговое резидентство при эмиграции" });

        expect(chat.complete).toHaveBeenCalled();
        expect(result.summary).toBe("Краткое содержание про налоги.");
        expect(result.processingMethods.llm).toBe("ok");
    });

    // Scenario: Label classifier switched off
    it("should honour LABEL_CLASSIFIER=off", async () => {
        const categorizer = createCategorizer({
            settings: loadSettings({ LABEL_CLASSIFIER: "off" }),
            logger  : createMockLogger(),
        });

        const result = await categorizer.categorize({ text: "Налоговое резидентство при эмиграции" });

        expect(result.labels?.method).toBe("disabled");
        expect(result.processingMethods.labels).toBe("disabled");
    });

    // Scenario: Configuration files missing
    it("should fall back to the built-in taxonomy and empty rules with warnings", () => {
        const logger = createMockLogger();

        createCategorizer({
            settings: {
                ...loadSettings({}),
                taxonomyPath: "/nonexistent/categories.yaml",
                rulesPath   : "/nonexistent/rules.yaml",
            },
            logger,
        });

        expect(logger.warn).toHaveBeenCalledWith(
            "Failed to load taxonomy from /nonexistent/categories.yaml, using built-in default",
            { error: "Taxonomy file not found: /nonexistent/categories.yaml" }
        );
        expect(logger.warn).toHaveBeenCalledWith(
            "Failed to load rules from /nonexistent/rules.yaml, keyword rules disabled",
            { error: "Rules file not found: /nonexistent/rules.yaml" }
        );
    });
});
