/**
 * @fileoverview External model ports
 *
 * The interfaces the domain needs from remote models. Adapters under
 * `adapters/` implement them; tests substitute in-process fakes. Every
 * method may reject, and each accepts an abort signal.
 *
 * @module domain/ports
 */

export type EmbeddingVector = readonly number[];

export interface RequestOptions {
    readonly signal?: AbortSignal;
}

export interface ChatMessage {
    readonly role: "system" | "user";
    readonly content: string;
}

export interface ChatRequestOptions extends RequestOptions {
    readonly temperature?: number;
    readonly maxTokens?: number;
}

/**
 * Single-turn chat completion.
 */
export interface ChatClient {
    /**
     * @returns The assistant reply text (may be empty)
     */
    complete(messages: readonly ChatMessage[], options?: ChatRequestOptions): Promise<string>;
}

/**
 * Text embedding service.
 */
export interface EmbeddingProvider {
    /**
     * Embed several texts in one request.
     *
     * @returns One vector per input, in input order
     */
    embed(texts: readonly string[], options?: RequestOptions): Promise<EmbeddingVector[]>;
}

/**
 * Zero-shot prediction: candidate labels with scores, best first.
 */
export interface ZeroShotPrediction {
    readonly labels: readonly string[];
    readonly scores: readonly number[];
}

/**
 * Multi-label zero-shot classification model.
 */
export interface ZeroShotModel {
    classify(
        text: string,
        candidateLabels: readonly string[],
        options?: RequestOptions
    ): Promise<ZeroShotPrediction>;
}
