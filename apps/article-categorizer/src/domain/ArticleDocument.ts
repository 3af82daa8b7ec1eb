/**
 * @fileoverview Article Document
 *
 * The immutable unit every classifier receives. Cleaning happens once,
 * here, so all strategies see the same text.
 *
 * @module domain/ArticleDocument
 */

import { randomUUID } from "node:crypto";
import { cleanText, detectLanguage } from "./text/normalize.js";
import { CategorizationInputError } from "./errors.js";

export type ArticleLanguage = "ru" | "en";

/**
 * Input accepted from the text-extraction collaborator.
 */
export interface ArticleInput {
    readonly text: string;
    readonly title?: string | null;
    readonly language?: "auto" | ArticleLanguage;

    /** Keywords harvested upstream; used instead of extraction when non-empty */
    readonly extractedKeywords?: readonly string[];

    /** Optional caller-supplied ID (default: random UUID) */
    readonly id?: string;
}

export interface ArticleDocument {
    readonly id: string;
    readonly title: string | null;

    /** Raw text as received */
    readonly text: string;

    /** Markup-free, whitespace-normalized `title + text` */
    readonly cleanedText: string;

    readonly language: ArticleLanguage;
    readonly extractedKeywords: readonly string[];
}

/**
 * Factory function to create an ArticleDocument.
 *
 * @throws CategorizationInputError when both text and title are empty after cleaning
 *
 * @example
 * ```typescript
 * const doc = createArticleDocument({ title: "Налоги для IT", text: "<p>...</p>" });
 * doc.language; // "ru"
 * ```
 */
export function createArticleDocument(input: ArticleInput): ArticleDocument {
    const title = cleanText(input.title);
    const body = cleanText(input.text);
    const cleanedText = [title, body].filter((part) => part.length > 0).join(" ");

    if (cleanedText.length === 0) {
        throw new CategorizationInputError("Article has no text and no title");
    }

    const hint = input.language ?? "auto";

    return Object.freeze({
        id               : input.id ?? randomUUID(),
        title            : title.length > 0 ? title : null,
        text             : input.text,
        cleanedText,
        language         : hint === "auto" ? detectLanguage(cleanedText) : hint,
        extractedKeywords: Object.freeze(
            (input.extractedKeywords ?? [])
                .map((keyword) => keyword.trim())
                .filter((keyword) => keyword.length > 0)
        ),
    });
}
