/**
 * @fileoverview Unit tests for text normalization and stop words
 *
 * @module __tests__/normalize
 */

import { describe, it, expect } from "vitest";
import {
    cleanText,
    cleanForTopics,
    cleanForLabels,
    detectLanguage,
    truncate,
} from "../domain/text/normalize.js";
import { isStopWord } from "../domain/text/stopwords.js";

describe("normalize", () => {
    describe("cleanText", () => {
        // Scenario: Markup and line breaks collapse into single spaces
        it("should strip tags and collapse whitespace", () => {
            expect(cleanText("<p>Hello,\n  <b>world</b></p>")).toBe("Hello, world");
        });

        // Scenario: Absent text
        it("should return an empty string for null and undefined", () => {
            expect(cleanText(null)).toBe("");
            expect(cleanText(undefined)).toBe("");
        });
    });

    describe("cleanForTopics", () => {
        // Scenario: URLs and punctuation are removed
        it("should keep only letters, digits and underscores", () => {
            expect(cleanForTopics("See https://example.com/x now: AI & ML!")).toBe("See now AI ML");
        });
    });

    describe("cleanForLabels", () => {
        // Scenario: Basic punctuation survives
        it("should keep basic punctuation and drop symbols", () => {
            expect(cleanForLabels("Rust: fast & safe (really)!")).toBe("Rust: fast safe really !");
        });
    });

    describe("detectLanguage", () => {
        // Scenario: Mostly Cyrillic
        it("should detect Russian text", () => {
            expect(detectLanguage("Привет мир")).toBe("ru");
        });

        // Scenario: Latin only
        it("should detect English text", () => {
            expect(detectLanguage("Hello world")).toBe("en");
        });

        // Scenario: 3 of 8 letters are Cyrillic (37.5%)
        it("should treat text above the 30% Cyrillic share as Russian", () => {
            expect(detectLanguage("Hello мир")).toBe("ru");
        });

        // Scenario: No letters at all
        it("should default to English without letters", () => {
            expect(detectLanguage("123 456")).toBe("en");
        });
    });

    describe("truncate", () => {
        it("should append the suffix only when the text is cut", () => {
            expect(truncate("abcdef", 3, "...")).toBe("abc...");
            expect(truncate("abc", 3, "...")).toBe("abc");
        });
    });

    describe("stop words", () => {
        // Scenario: Both languages are covered
        it("should recognize English and Russian stop words", () => {
            expect(isStopWord("the")).toBe(true);
            expect(isStopWord("The")).toBe(true);
            expect(isStopWord("и")).toBe(true);
            expect(isStopWord("kubernetes")).toBe(false);
        });
    });
});
