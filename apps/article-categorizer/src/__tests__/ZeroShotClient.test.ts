/**
 * @fileoverview Unit tests for ZeroShotClient
 *
 * `fetch` is stubbed; no request leaves the process.
 *
 * @module __tests__/ZeroShotClient
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ZeroShotClient, kDefaultInferenceEndpoint } from "../adapters/huggingface/ZeroShotClient.js";

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status: number = 200, statusText: string = "OK"): Response {
    return new Response(JSON.stringify(body), {
        status,
        statusText,
        headers: { "Content-Type": "application/json" },
    });
}

describe("ZeroShotClient", () => {
    beforeEach(() => {
        mockFetch.mockReset();
        vi.stubGlobal("fetch", mockFetch);
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    // Scenario: Request format
    it("should post the text and candidate labels in multi-label mode", async () => {
        mockFetch.mockResolvedValue(jsonResponse({ labels: ["Sports"], scores: [0.7] }));
        const client = new ZeroShotClient({ token: "test-secret" });

        await client.classify("Match report", ["Sports", "Politics"]);

        expect(mockFetch).toHaveBeenCalledTimes(1);
        const [url, init] = mockFetch.mock.calls[0] ?? [];
        expect(url).toBe(`${kDefaultInferenceEndpoint}/facebook/bart-large-mnli`);
        expect(init).toMatchObject({
            method : "POST",
            headers: { "Authorization": "Bearer test-secret", "Content-Type": "application/json" },
        });
        expect(JSON.parse(String(init?.body))).toEqual({
            inputs    : "Match report",
            parameters: { candidate_labels: ["Sports", "Politics"], multi_label: true },
        });
    });

    // Scenario: Pipeline-shaped response, unsorted
    it("should sort pipeline responses best first", async () => {
        mockFetch.mockResolvedValue(jsonResponse({ labels: ["Politics", "Sports"], scores: [0.1, 0.8] }));
        const client = new ZeroShotClient({ token: "test-secret", model: "org/model", endpoint: "http://localhost:9000" });

        const prediction = await client.classify("Match report", ["Sports", "Politics"]);

        expect(prediction).toEqual({ labels: ["Sports", "Politics"], scores: [0.8, 0.1] });
        expect(mockFetch.mock.calls[0]?.[0]).toBe("http://localhost:9000/org/model");
    });

    // Scenario: Label/score pair list response
    it("should accept a list of label/score pairs", async () => {
        mockFetch.mockResolvedValue(jsonResponse([
            { label: "Science", score: 0.3 },
            { label: "Health", score: 0.6 },
        ]));
        const client = new ZeroShotClient({ token: "test-secret" });

        const prediction = await client.classify("Vaccine study", ["Science", "Health"]);

        expect(prediction).toEqual({ labels: ["Health", "Science"], scores: [0.6, 0.3] });
    });

    // Scenario: Pipeline response wrapped in a one-element list
    it("should accept a wrapped pipeline response", async () => {
        mockFetch.mockResolvedValue(jsonResponse([{ labels: ["Travel"], scores: [0.9] }]));
        const client = new ZeroShotClient({ token: "test-secret" });

        expect(await client.classify("Trip", ["Travel"])).toEqual({ labels: ["Travel"], scores: [0.9] });
    });

    // Scenario: HTTP error
    it("should throw on a non-ok status", async () => {
        mockFetch.mockResolvedValue(jsonResponse({ error: "loading" }, 503, "Service Unavailable"));
        const client = new ZeroShotClient({ token: "test-secret" });

        await expect(client.classify("Text", ["A"]))
            .rejects.toThrow("huggingface: Zero-shot request failed: 503 Service Unavailable");
    });

    // Scenario: Unknown body
    it("should throw on an unexpected response shape", async () => {
        mockFetch.mockResolvedValue(jsonResponse({ generated_text: "A" }));
        const client = new ZeroShotClient({ token: "test-secret" });

        await expect(client.classify("Text", ["A"]))
            .rejects.toThrow("huggingface: Unexpected zero-shot response shape");
    });

    // Scenario: Caller cancellation
    it("should combine the caller's signal with the deadline", async () => {
        mockFetch.mockResolvedValue(jsonResponse({ labels: ["A"], scores: [1] }));
        const controller = new AbortController();
        const client = new ZeroShotClient({ token: "test-secret" });

        await client.classify("Text", ["A"], { signal: controller.signal });
        const signal: unknown = mockFetch.mock.calls[0]?.[1]?.signal;
        controller.abort();

        expect(signal).toBeInstanceOf(AbortSignal);
        expect(signal).not.toBe(controller.signal);
        expect(signal instanceof AbortSignal && signal.aborted).toBe(true);
    });
});
