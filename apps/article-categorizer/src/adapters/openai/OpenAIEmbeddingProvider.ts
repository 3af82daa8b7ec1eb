/**
 * @fileoverview OpenAI embeddings adapter
 *
 * @module adapters/openai/OpenAIEmbeddingProvider
 */

import OpenAI from "openai";
import type { EmbeddingProvider, EmbeddingVector, RequestOptions } from "../../domain/ports.js";
import { ModelResponseError } from "../../domain/errors.js";

export interface OpenAIEmbeddingProviderConfig {
    apiKey: string;
    baseURL?: string;

    /** Embedding model (default: text-embedding-3-small) */
    model?: string;

    timeoutMs?: number;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly timeoutMs: number;

    constructor(config: OpenAIEmbeddingProviderConfig) {
        this.client = new OpenAI({
            apiKey : config.apiKey,
            baseURL: config.baseURL,
        });
        this.model = config.model ?? "text-embedding-3-small";
        this.timeoutMs = config.timeoutMs ?? 30_000;
    }

    /**
     * Embed all texts in a single request. Vectors come back in input
     * order regardless of the order the API lists them.
     */
    async embed(texts: readonly string[], options: RequestOptions = {}): Promise<EmbeddingVector[]> {
        if (texts.length === 0) {
            return [];
        }

        const response = await this.client.embeddings.create({
            model: this.model,
            input: [...texts],
        }, {
            signal : options.signal,
            timeout: this.timeoutMs,
        });

        if (response.data.length !== texts.length) {
            throw new ModelResponseError(
                "openai",
                `Expected ${texts.length} embeddings, received ${response.data.length}`
            );
        }

        return [...response.data]
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }
}
