/**
 * @fileoverview Stop words
 *
 * Russian and English stop-word lists from the `stopword` package, merged
 * into one lookup set.
 *
 * @module domain/text/stopwords
 */

import { eng, rus } from "stopword";

const kStopWords: ReadonlySet<string> = new Set([...eng, ...rus].map((word) => word.toLowerCase()));

export function isStopWord(word: string): boolean {
    return kStopWords.has(word.toLowerCase());
}
