/**
 * @fileoverview OpenAI chat adapter
 *
 * Implements the ChatClient port with the OpenAI Chat Completions API.
 *
 * @module adapters/openai/OpenAIChatClient
 */

import OpenAI from "openai";
import type { ChatClient, ChatMessage, ChatRequestOptions } from "../../domain/ports.js";
import { ModelResponseError } from "../../domain/errors.js";

/**
 * Configuration options for the chat adapter
 */
export interface OpenAIChatClientConfig {
    /** OpenAI API key */
    apiKey: string;

    /** Alternative OpenAI-compatible endpoint */
    baseURL?: string;

    /** Model to use (default: gpt-4o-mini) */
    model?: string;

    /** Per-request deadline in milliseconds (default: 30000) */
    timeoutMs?: number;
}

export class OpenAIChatClient implements ChatClient {
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly timeoutMs: number;

    constructor(config: OpenAIChatClientConfig) {
        this.client = new OpenAI({
            apiKey : config.apiKey,
            baseURL: config.baseURL,
        });
        this.model = config.model ?? "gpt-4o-mini";
        this.timeoutMs = config.timeoutMs ?? 30_000;
    }

    async complete(messages: readonly ChatMessage[], options: ChatRequestOptions = {}): Promise<string> {
        const response = await this.client.chat.completions.create({
            model      : this.model,
            temperature: options.temperature ?? 0.1,
            max_tokens : options.maxTokens ?? 256,
            messages   : messages.map((message) => (message.role === "system"
                ? { role: "system" as const, content: message.content }
                : { role: "user" as const, content: message.content })),
        }, {
            signal : options.signal,
            timeout: this.timeoutMs,
        });

        const choice = response.choices[0];
        if (!choice) {
            throw new ModelResponseError("openai", "No choices in chat completion");
        }

        return choice.message.content ?? "";
    }
}
