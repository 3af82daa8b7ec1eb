/**
 * @fileoverview TF-IDF vectorizer
 *
 * Small in-process TF-IDF: raw term counts, smoothed idf
 * `ln((1 + n) / (1 + df)) + 1`, L2-normalized rows. The vocabulary is
 * sorted, and every tie is broken alphabetically, so the output depends
 * only on the input documents.
 *
 * @module domain/topics/tfidf
 */

export interface TfidfOptions {
    /** Smallest and largest n-gram size */
    readonly ngramRange: readonly [number, number];

    /** Keep the most frequent terms only (by corpus-wide count) */
    readonly maxFeatures: number;

    /** Token predicate applied to lower-cased word tokens */
    readonly acceptToken: (token: string) => boolean;

    /** Stop words are removed before n-grams are built */
    readonly isStopWord?: (token: string) => boolean;

    /** Drop terms present in more than this share of documents (0..1] */
    readonly maxDocumentFrequency?: number;
}

export interface TfidfMatrix {
    /** Terms in column order */
    readonly vocabulary: readonly string[];

    /** One L2-normalized row per document */
    readonly rows: readonly (readonly number[])[];
}

const kWordPattern = /[\p{L}\p{N}_]+/gu;

/**
 * Lower-cased word tokens accepted by `acceptToken`, stop words removed.
 */
export function tokenize(text: string, options: Pick<TfidfOptions, "acceptToken" | "isStopWord">): string[] {
    const words = text.toLowerCase().match(kWordPattern) ?? [];
    return words.filter((word) => options.acceptToken(word) && !(options.isStopWord?.(word) ?? false));
}

function buildNgrams(tokens: readonly string[], [min, max]: readonly [number, number]): string[] {
    const grams: string[] = [];
    for (let size = min; size <= max; size++) {
        for (let start = 0; start + size <= tokens.length; start++) {
            grams.push(tokens.slice(start, start + size).join(" "));
        }
    }
    return grams;
}

function countTerms(terms: readonly string[]): Map<string, number> {
    const counts = new Map<string, number>();
    for (const term of terms) {
        counts.set(term, (counts.get(term) ?? 0) + 1);
    }
    return counts;
}

function compareTerms(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Fit a vocabulary on `documents` and return their TF-IDF rows.
 */
export function fitTransform(documents: readonly string[], options: TfidfOptions): TfidfMatrix {
    const documentCounts = documents.map((document) => countTerms(buildNgrams(tokenize(document, options), options.ngramRange)));

    const documentFrequency = new Map<string, number>();
    const corpusFrequency = new Map<string, number>();
    for (const counts of documentCounts) {
        for (const [term, count] of counts) {
            documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
            corpusFrequency.set(term, (corpusFrequency.get(term) ?? 0) + count);
        }
    }

    const maxDocuments = (options.maxDocumentFrequency ?? 1) * documents.length;
    const candidates = [...corpusFrequency.keys()]
        .filter((term) => (documentFrequency.get(term) ?? 0) <= maxDocuments)
        .sort((a, b) => (corpusFrequency.get(b) ?? 0) - (corpusFrequency.get(a) ?? 0) || compareTerms(a, b))
        .slice(0, options.maxFeatures);

    const vocabulary = candidates.sort(compareTerms);
    const n = documents.length;
    const idf = vocabulary.map((term) => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

    const rows = documentCounts.map((counts) => {
        const row = vocabulary.map((term, column) => (counts.get(term) ?? 0) * (idf[column] ?? 0));
        const norm = Math.sqrt(row.reduce((sum, value) => sum + value * value, 0));
        return norm > 0 ? row.map((value) => value / norm) : row;
    });

    return { vocabulary, rows };
}

/**
 * Dot product of two equal-length rows (cosine similarity for L2 rows).
 */
export function dot(a: readonly number[], b: readonly number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += (a[i] ?? 0) * (b[i] ?? 0);
    }
    return sum;
}
