/**
 * @fileoverview Unit tests for the taxonomy model
 *
 * @module __tests__/taxonomy
 */

import { describe, it, expect } from "vitest";
import {
    createTaxonomy,
    getDefaultTaxonomy,
    getAllowedSubcategories,
    getCategoryLabel,
    hasCategory,
} from "../domain/taxonomy.js";

const primary = [
    { key: "AI", label: "Artificial Intelligence", description: "Machine learning" },
    { key: "Business", label: "Business", description: "Companies and money" },
];

describe("taxonomy", () => {
    describe("getDefaultTaxonomy", () => {
        // Scenario: Built-in taxonomy used when configuration is unavailable
        it("should provide four categories with Other as fallback", () => {
            const taxonomy = getDefaultTaxonomy();

            expect(taxonomy.primary.map((category) => category.key)).toEqual(["AI", "Programming", "Business", "Other"]);
            expect(taxonomy.fallbackKey).toBe("Other");
            expect(getAllowedSubcategories(taxonomy, "AI")).toEqual(["LLM", "NLP", "Computer Vision"]);
        });
    });

    describe("createTaxonomy", () => {
        // Scenario: No "Other" key, no explicit fallback
        it("should fall back to the last primary key", () => {
            const taxonomy = createTaxonomy({ primary });

            expect(taxonomy.fallbackKey).toBe("Business");
        });

        // Scenario: Every primary key gets a subcategory list
        it("should give keys without subcategories an empty list and dedupe the rest", () => {
            const taxonomy = createTaxonomy({
                primary,
                subcategories: { AI: ["LLM", "NLP", "LLM"] },
            });

            expect(taxonomy.subcategories).toEqual({ AI: ["LLM", "NLP"], Business: [] });
        });

        it("should reject an empty primary list", () => {
            expect(() => createTaxonomy({ primary: [] })).toThrow("Taxonomy must define at least one primary category");
        });

        it("should reject duplicate keys", () => {
            expect(() => createTaxonomy({ primary: [...primary, primary[0]] })).toThrow(
                "Taxonomy primary keys must be unique"
            );
        });

        it("should reject an unknown fallback key", () => {
            expect(() => createTaxonomy({ primary, fallbackKey: "Nope" })).toThrow(
                "Taxonomy fallback key is not a primary key: Nope"
            );
        });

        // Scenario: Result cannot be mutated
        it("should freeze the taxonomy", () => {
            const taxonomy = createTaxonomy({ primary });

            expect(Object.isFrozen(taxonomy)).toBe(true);
            expect(Object.isFrozen(taxonomy.primary)).toBe(true);
            expect(Object.isFrozen(taxonomy.primary[0])).toBe(true);
        });
    });

    describe("lookups", () => {
        const taxonomy = createTaxonomy({ primary, subcategories: { AI: ["LLM"] } });

        it("should report known keys", () => {
            expect(hasCategory(taxonomy, "AI")).toBe(true);
            expect(hasCategory(taxonomy, "Sports")).toBe(false);
        });

        it("should return the label, or the key when unknown", () => {
            expect(getCategoryLabel(taxonomy, "AI")).toBe("Artificial Intelligence");
            expect(getCategoryLabel(taxonomy, "Sports")).toBe("Sports");
        });

        it("should return no subcategories for an unknown key", () => {
            expect(getAllowedSubcategories(taxonomy, "Sports")).toEqual([]);
        });
    });
});
