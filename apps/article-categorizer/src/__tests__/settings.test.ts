/**
 * @fileoverview Unit tests for environment settings
 *
 * @module __tests__/settings
 */

import { describe, it, expect } from "vitest";
import { loadSettings, kDefaultRulesPath, kDefaultTaxonomyPath } from "../config/settings.js";

describe("loadSettings", () => {
    // Scenario: Nothing configured
    it("should apply defaults and disable keyed services", () => {
        const settings = loadSettings({});

        expect(settings).toEqual({
            openai: {
                apiKey        : null,
                baseURL       : null,
                chatModel     : "gpt-4o-mini",
                embeddingModel: "text-embedding-3-small",
            },
            zeroShot: {
                token: null,
                model: "facebook/bart-large-mnli",
            },
            serviceTimeoutMs      : 30000,
            labelClassifierEnabled: true,
            taxonomyPath          : kDefaultTaxonomyPath,
            rulesPath             : kDefaultRulesPath,
            logLevel              : "info",
        });
    });

    // Scenario: Everything configured
    it("should read every variable", () => {
        const settings = loadSettings({
            OPENAI_API_KEY    : "test-secret",
            OPENAI_BASE_URL   : "http://localhost:8080/v1",
            OPENAI_CHAT_MODEL : "chat-model",
            OPENAI_EMBED_MODEL: "embed-model",
            HUGGINGFACE_TOKEN : "test-token",
            ZERO_SHOT_MODEL   : "org/nli-model",
            SERVICE_TIMEOUT_MS: "5000",
            LABEL_CLASSIFIER  : "off",
            TAXONOMY_PATH     : "/etc/categories.yaml",
            RULES_PATH        : "/etc/rules.yaml",
            LOG_LEVEL         : "debug",
        });

        expect(settings.openai).toEqual({
            apiKey        : "test-secret",
            baseURL       : "http://localhost:8080/v1",
            chatModel     : "chat-model",
            embeddingModel: "embed-model",
        });
        expect(settings.zeroShot).toEqual({ token: "test-token", model: "org/nli-model" });
        expect(settings.serviceTimeoutMs).toBe(5000);
        expect(settings.labelClassifierEnabled).toBe(false);
        expect(settings.taxonomyPath).toBe("/etc/categories.yaml");
        expect(settings.rulesPath).toBe("/etc/rules.yaml");
        expect(settings.logLevel).toBe("debug");
    });

    // Scenario: Blank values from an .env template
    it("should treat blank values as unset", () => {
        const settings = loadSettings({ OPENAI_API_KEY: "  ", SERVICE_TIMEOUT_MS: "" });

        expect(settings.openai.apiKey).toBeNull();
        expect(settings.serviceTimeoutMs).toBe(30000);
    });

    it("should reject an unknown log level", () => {
        expect(() => loadSettings({ LOG_LEVEL: "verbose" })).toThrow(/^Invalid environment: LOG_LEVEL/);
    });

    it("should reject a non-numeric timeout", () => {
        expect(() => loadSettings({ SERVICE_TIMEOUT_MS: "soon" })).toThrow(/^Invalid environment: SERVICE_TIMEOUT_MS/);
    });

    it("should reject a malformed base URL", () => {
        expect(() => loadSettings({ OPENAI_BASE_URL: "not a url" })).toThrow(/^Invalid environment: OPENAI_BASE_URL/);
    });
});
