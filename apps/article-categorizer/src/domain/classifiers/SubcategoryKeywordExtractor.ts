/**
 * @fileoverview LLM Subcategory / Keyword Extractor
 *
 * Chat-model helpers for everything the embedding step does not decide:
 * subcategories, keywords, the summary and an independent category vote.
 *
 * Every model reply is treated as untrusted: it is parsed, validated with
 * zod and either accepted (`ok`) or replaced by a deterministic local value
 * (`fallback`, with the reason). None of the public methods reject.
 *
 * @module domain/classifiers/SubcategoryKeywordExtractor
 */

import { z } from "zod";
import type { CategoryVote, Logger, Outcome } from "@rubricator/engine";
import {
    createCategoryVote,
    describeError,
    fallback,
    kSilentLogger,
    ok,
} from "@rubricator/engine";
import type { Taxonomy } from "../taxonomy.js";
import { getAllowedSubcategories } from "../taxonomy.js";
import type { SubcategoryTrigger } from "../rules/RuleSet.js";
import type { ChatClient, ChatMessage, RequestOptions } from "../ports.js";
import { truncate } from "../text/normalize.js";

const kMaxSummaryInputChars = 6000;
const kSummaryFallbackChars = 500;
const kDefaultMaxSubcategories = 3;
const kDefaultMaxKeywords = 8;
const kMinLocalKeywordLength = 5;

const StringListSchema = z.array(z.union([z.string(), z.number()]).transform(String));

const CategorySuggestionSchema = z.object({
    categories: z.array(z.string()),
    confidence: z.number().min(0).max(1),
});

/**
 * Parse a model reply as JSON, tolerating a surrounding Markdown code fence.
 *
 * @throws SyntaxError when the reply is not JSON
 */
export function parseModelJson(reply: string): unknown {
    const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/u.exec(reply.trim());
    return JSON.parse(fenced?.[1] ?? reply.trim());
}

/**
 * Deterministic keyword fallback: whitespace tokens stripped of surrounding
 * punctuation, longer than four characters, de-duplicated, first `max`.
 */
export function extractLocalKeywords(text: string, max: number = kDefaultMaxKeywords): string[] {
    const seen = new Set<string>();
    const keywords: string[] = [];

    for (const token of text.split(/\s+/u)) {
        const word = token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, "");
        if (word.length < kMinLocalKeywordLength || seen.has(word.toLowerCase())) {
            continue;
        }
        seen.add(word.toLowerCase());
        keywords.push(word);
        if (keywords.length >= max) {
            break;
        }
    }

    return keywords;
}

/**
 * Summary fallback: the text itself when short, else its head plus "...".
 */
export function fallbackSummary(text: string): string {
    return truncate(text, kSummaryFallbackChars, "...");
}

export interface SubcategoryKeywordExtractorOptions {
    readonly taxonomy: Taxonomy;
    readonly client: ChatClient | null;
    readonly triggers?: Readonly<Record<string, readonly SubcategoryTrigger[]>>;
    readonly logger?: Logger;
}

export class SubcategoryKeywordExtractor {
    readonly id = "llm";

    private readonly taxonomy: Taxonomy;
    private readonly client: ChatClient | null;
    private readonly triggers: Readonly<Record<string, readonly SubcategoryTrigger[]>>;
    private readonly logger: Logger;

    constructor(options: SubcategoryKeywordExtractorOptions) {
        this.taxonomy = options.taxonomy;
        this.client = options.client;
        this.triggers = options.triggers ?? {};
        this.logger = options.logger ?? kSilentLogger;
    }

    isAvailable(): boolean {
        return this.client !== null;
    }

    /**
     * First trigger for `primaryKey` whose keyword occurs in `summary` and
     * whose subcategory is allowed for that key. Case-insensitive.
     */
    matchTrigger(primaryKey: string, summary: string): string | null {
        const allowed = getAllowedSubcategories(this.taxonomy, primaryKey);
        const haystack = summary.toLowerCase();

        for (const trigger of this.triggers[primaryKey] ?? []) {
            const hit = trigger.keywords.some((keyword) => haystack.includes(keyword.toLowerCase()));
            if (hit && allowed.includes(trigger.subcategory)) {
                return trigger.subcategory;
            }
        }
        return null;
    }

    /**
     * Subcategories for a primary key.
     *
     * Order of precedence: no allowed list -> `[]`; a trigger hit -> that
     * subcategory without a model call; otherwise the model picks from the
     * allowed list. An unusable reply yields the first allowed entry; a
     * service failure (or no client) yields `[]`.
     */
    async extractSubcategories(
        primaryKey: string,
        summary: string,
        maxItems: number = kDefaultMaxSubcategories,
        options: RequestOptions = {}
    ): Promise<Outcome<readonly string[]>> {
        const allowed = getAllowedSubcategories(this.taxonomy, primaryKey);
        if (allowed.length === 0) {
            return ok([]);
        }

        const triggered = this.matchTrigger(primaryKey, summary);
        if (triggered !== null) {
            return ok([triggered]);
        }

        if (!this.client) {
            return fallback("chat model unavailable", []);
        }

        let reply: string;
        try {
            reply = await this.client.complete([
                {
                    role   : "system",
                    content: "You assign articles to subcategories. Reply with a JSON array of strings only.",
                },
                {
                    role   : "user",
                    content: `Pick up to ${maxItems} of the most fitting subcategories from the list.\n`
                        + `Reply with a JSON array containing only the chosen strings, no comments.\n\n`
                        + `Available subcategories: ${JSON.stringify(allowed)}\n\n`
                        + `Article summary: ${summary}`,
                },
            ], { ...options, temperature: 0.1, maxTokens: 100 });
        }
        catch (error) {
            this.logger.warn("Subcategory extraction failed", { primaryKey, error: describeError(error) });
            return fallback(`chat request failed: ${describeError(error)}`, []);
        }

        const parsed = this.parseList(reply);
        if (parsed.kind === "fallback") {
            const first = allowed.slice(0, 1);
            this.logger.debug("Unusable subcategory reply", { primaryKey, reason: parsed.reason });
            return fallback(parsed.reason, first);
        }

        const chosen = [...new Set(parsed.value.filter((item) => allowed.includes(item)))].slice(0, maxItems);
        return ok(chosen);
    }

    /**
     * Up to `max` keywords from the model; any failure yields the local
     * token fallback.
     */
    async extractKeywords(
        summary: string,
        max: number = kDefaultMaxKeywords,
        options: RequestOptions = {}
    ): Promise<Outcome<readonly string[]>> {
        if (!this.client) {
            return fallback("chat model unavailable", extractLocalKeywords(summary, max));
        }

        try {
            const reply = await this.client.complete([
                {
                    role   : "system",
                    content: "You extract keywords from texts. Reply with a JSON array of strings only.",
                },
                {
                    role   : "user",
                    content: `Extract up to ${max} keywords from the article text.\n`
                        + `Reply with a JSON array of strings, no comments.\n\n`
                        + `Text: ${summary}`,
                },
            ], { ...options, temperature: 0.1, maxTokens: 150 });

            const parsed = this.parseList(reply);
            if (parsed.kind === "fallback") {
                return fallback(parsed.reason, extractLocalKeywords(summary, max));
            }

            const keywords = [...new Set(parsed.value.map((item) => item.trim()).filter((item) => item.length > 0))];
            return ok(keywords.slice(0, max));
        }
        catch (error) {
            this.logger.warn("Keyword extraction failed", { error: describeError(error) });
            return fallback(`chat request failed: ${describeError(error)}`, extractLocalKeywords(summary, max));
        }
    }

    /**
     * Three to five sentence summary in the article's language.
     */
    async summarize(
        text: string,
        title: string | null = null,
        options: RequestOptions = {}
    ): Promise<Outcome<string>> {
        if (!this.client) {
            return fallback("chat model unavailable", fallbackSummary(text));
        }

        const content = truncate(title ? `${title}\n\n${text}` : text, kMaxSummaryInputChars);

        try {
            const reply = (await this.client.complete([
                { role: "system", content: "You summarize texts briefly and accurately." },
                {
                    role   : "user",
                    content: "Summarize the news item or article in 3-5 sentences, in the language of the source text.\n"
                        + "State the main topic and the key point.\n\n"
                        + `Text: \`\`\`${content}\`\`\``,
                },
            ], { ...options, temperature: 0.2, maxTokens: 220 })).trim();

            return reply.length > 0 ? ok(reply) : fallback("empty summary", fallbackSummary(text));
        }
        catch (error) {
            this.logger.warn("Summarization failed", { error: describeError(error) });
            return fallback(`chat request failed: ${describeError(error)}`, fallbackSummary(text));
        }
    }

    /**
     * Independent category vote from the chat model, restricted to
     * taxonomy keys. `null` when the model is unavailable or its reply
     * names no known category.
     */
    async suggestCategories(
        summary: string,
        options: RequestOptions = {}
    ): Promise<Outcome<CategoryVote | null>> {
        if (!this.client) {
            return fallback("chat model unavailable", null);
        }

        const keys = this.taxonomy.primary.map((category) => category.key);
        const messages: ChatMessage[] = [
            {
                role   : "system",
                content: "You categorize articles. Reply with a JSON object only.",
            },
            {
                role   : "user",
                content: `Choose up to 3 categories for the article from this list: ${JSON.stringify(keys)}.\n`
                    + `Reply as {"categories": [...], "confidence": <number between 0 and 1>}.\n\n`
                    + `Article summary: ${summary}`,
            },
        ];

        try {
            const reply = await this.client.complete(messages, { ...options, temperature: 0.1, maxTokens: 100 });
            const parsed = CategorySuggestionSchema.safeParse(parseModelJson(reply));
            if (!parsed.success) {
                return fallback(`invalid category reply: ${parsed.error.issues[0]?.message ?? "unknown"}`, null);
            }

            const known = parsed.data.categories.filter((key) => keys.includes(key));
            if (known.length === 0) {
                return fallback("reply named no taxonomy category", null);
            }
            return ok(createCategoryVote(this.id, known.slice(0, 3), parsed.data.confidence));
        }
        catch (error) {
            this.logger.warn("Category suggestion failed", { error: describeError(error) });
            return fallback(`category suggestion failed: ${describeError(error)}`, null);
        }
    }

    private parseList(reply: string): Outcome<string[]> {
        let json: unknown;
        try {
            json = parseModelJson(reply);
        }
        catch {
            return fallback("reply was not JSON", []);
        }

        const parsed = StringListSchema.safeParse(json);
        return parsed.success ? ok(parsed.data) : fallback("reply was not a JSON array of strings", []);
    }
}
