/**
 * @fileoverview Topic keywords and labels
 *
 * Turns per-cluster term scores into a short keyword list and a
 * human-readable label.
 *
 * @module domain/topics/topicLabels
 */

import { isStopWord } from "../text/stopwords.js";

const kMaxClusterKeywords = 6;
const kCandidatePool = 25;
const kPhraseBonus = 0.15;
const kMinScore = 0.001;
const kMaxClusterLabelLength = 40;
const kPreferredEndings = ["ание", "ение", "ость", "ство", "тель", "ция", "ный", "ская", "ское"];
const kSalientFragments = ["ани", "ени", "ост", "ств", "тор", "ние"];

export interface ScoredTerm {
    readonly term: string;
    readonly score: number;
}

function hasDigit(term: string): boolean {
    return /\p{N}/u.test(term);
}

function isPreferredTerm(term: string): boolean {
    return term.length > 6 || term.includes(" ") || kPreferredEndings.some((ending) => term.endsWith(ending));
}

/**
 * Pick up to six representative keywords for a cluster.
 *
 * Terms are ranked by `score + 0.15 * words` so phrases beat their parts.
 * A term whose short root (first 4 letters, or 3 for short terms) was
 * already taken is skipped unless it is long, multi-word or carries a
 * typical noun/adjective ending.
 */
export function selectClusterKeywords(scored: readonly ScoredTerm[]): string[] {
    const ranked = scored
        .filter((entry) => entry.score > kMinScore)
        .map((entry) => ({ ...entry, rank: entry.score + entry.term.split(" ").length * kPhraseBonus }))
        .sort((a, b) => b.rank - a.rank || (a.term < b.term ? -1 : a.term > b.term ? 1 : 0))
        .slice(0, kCandidatePool);

    const keywords: string[] = [];
    const seenRoots = new Set<string>();

    for (const { term } of ranked) {
        if (term.length < 3 || hasDigit(term) || isStopWord(term)) {
            continue;
        }

        const root = term.length > 4 ? term.slice(0, 4) : term.slice(0, 3);
        if (!seenRoots.has(root) || isPreferredTerm(term)) {
            keywords.push(term);
            seenRoots.add(root);
        }

        if (keywords.length >= kMaxClusterKeywords) {
            break;
        }
    }

    return keywords;
}

/**
 * Capitalize the first letter of every word, lower-case the rest.
 */
export function toTitleCase(text: string): string {
    return text
        .toLowerCase()
        .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase());
}

/**
 * Label for a cluster from its keywords.
 *
 * Salient terms (long, multi-word, or containing a typical noun fragment)
 * move to the front. One keyword is title-cased, two are joined with
 * " • ", three or more become "main (related)".
 */
export function buildClusterLabel(topicId: number, keywords: readonly string[]): string {
    let meaningful: string[] = [];
    for (const keyword of keywords.slice(0, 8)) {
        if (keyword.length <= 2 || hasDigit(keyword) || isStopWord(keyword)) {
            continue;
        }
        const salient = keyword.length > 6
            || keyword.includes(" ")
            || kSalientFragments.some((fragment) => keyword.includes(fragment));
        if (salient) {
            meaningful.unshift(keyword);
        }
        else {
            meaningful.push(keyword);
        }
    }

    if (meaningful.length === 0) {
        meaningful = keywords.slice(0, 3);
    }

    const [main, related] = meaningful;
    if (main === undefined) {
        return `Topic ${topicId}`;
    }

    let label: string;
    if (related === undefined) {
        label = toTitleCase(main);
    }
    else if (meaningful.length === 2) {
        label = `${main} • ${related}`;
    }
    else {
        label = `${main} (${related})`;
    }

    return label.length > kMaxClusterLabelLength ? `${label.slice(0, kMaxClusterLabelLength - 3)}...` : label;
}
