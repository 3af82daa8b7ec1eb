/**
 * @fileoverview Text normalization
 *
 * Cleaning passes shared by the classifiers. Each classifier needs a
 * slightly different alphabet, so there is one function per consumer.
 *
 * @module domain/text/normalize
 */

const kUrlPattern = /(?:https?:\/\/|www\.)\S+/gu;

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/gu, " ").trim();
}

/**
 * Strip markup tags and normalize whitespace.
 * Entities are left as they are.
 *
 * @example
 * ```typescript
 * cleanText("<p>Hello,\n  <b>world</b></p>"); // "Hello, world"
 * ```
 */
export function cleanText(text: string | null | undefined): string {
    if (!text) {
        return "";
    }
    return collapseWhitespace(text.replace(/<[^>]+>/gu, " "));
}

/**
 * Drop URLs and everything except letters, digits, underscores and whitespace.
 */
export function cleanForTopics(text: string | null | undefined): string {
    if (!text) {
        return "";
    }
    return collapseWhitespace(
        text
            .replace(kUrlPattern, "")
            .replace(/[^\p{L}\p{N}_\s]/gu, " ")
    );
}

/**
 * Drop URLs and keep letters, digits and basic punctuation (`_ - . , ! ? ; :`).
 */
export function cleanForLabels(text: string | null | undefined): string {
    if (!text) {
        return "";
    }
    return collapseWhitespace(
        text
            .replace(kUrlPattern, "")
            .replace(/[^\p{L}\p{N}_\s\-.,!?;:]/gu, " ")
    );
}

/**
 * Guess the article language from its alphabet: "ru" when Cyrillic letters
 * make up more than 30% of all letters, otherwise "en".
 */
export function detectLanguage(text: string): "ru" | "en" {
    const letters = text.match(/\p{L}/gu);
    if (!letters) {
        return "en";
    }
    const cyrillic = letters.filter((letter) => /\p{Script=Cyrillic}/u.test(letter)).length;
    return cyrillic / letters.length > 0.3 ? "ru" : "en";
}

/**
 * Truncate to `maxLength` characters, appending `suffix` only when cut.
 */
export function truncate(text: string, maxLength: number, suffix = ""): string {
    return text.length > maxLength ? text.slice(0, maxLength) + suffix : text;
}
