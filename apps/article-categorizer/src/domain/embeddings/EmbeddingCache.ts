/**
 * @fileoverview Embedding cache
 *
 * Process-lifetime store of category description vectors. Entries hold
 * promises, so concurrent callers asking for the same key share one
 * population request. A key is recomputed only when its description
 * changes; a failed population is evicted so the next call retries.
 *
 * Population never sees a caller's abort signal: a shared request must
 * outlive the caller that started it. Each caller only stops waiting.
 *
 * @module domain/embeddings/EmbeddingCache
 */

import type { EmbeddingVector } from "../ports.js";
import { ModelResponseError } from "../errors.js";

export interface EmbeddingCacheEntry {
    readonly key: string;
    readonly description: string;
}

type EmbedBatch = (texts: readonly string[]) => Promise<EmbeddingVector[]>;

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
    if (!signal) {
        return promise;
    }
    if (signal.aborted) {
        return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener("abort", onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener("abort", onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener("abort", onAbort);
                reject(error);
            }
        );
    });
}

interface CachedVector {
    readonly description: string;
    readonly vector: Promise<EmbeddingVector>;
}

export class EmbeddingCache {
    private readonly entries: Map<string, CachedVector> = new Map();

    /**
     * Resolve vectors for `requested`, embedding only the entries that are
     * missing or stale, in a single batch.
     *
     * @param signal - Stops this caller waiting; the shared population keeps running
     * @returns Vectors in the order of `requested`
     */
    async resolve(
        requested: readonly EmbeddingCacheEntry[],
        embed: EmbedBatch,
        signal?: AbortSignal
    ): Promise<EmbeddingVector[]> {
        const pending: Promise<EmbeddingVector>[] = [];
        const missing: EmbeddingCacheEntry[] = [];
        const missingSlots: number[] = [];

        requested.forEach((entry, index) => {
            const cached = this.entries.get(entry.key);
            if (cached && cached.description === entry.description) {
                pending[index] = cached.vector;
            }
            else {
                missing.push(entry);
                missingSlots.push(index);
            }
        });

        if (missing.length > 0) {
            const batch = embed(missing.map((entry) => entry.description));

            missing.forEach((entry, position) => {
                const vector = batch.then((vectors) => {
                    const result = vectors[position];
                    if (!result) {
                        throw new ModelResponseError("embeddings", `missing vector for "${entry.key}"`);
                    }
                    return result;
                });

                this.entries.set(entry.key, { description: entry.description, vector });
                vector.catch(() => {
                    if (this.entries.get(entry.key)?.vector === vector) {
                        this.entries.delete(entry.key);
                    }
                });

                const slot = missingSlots[position];
                if (slot !== undefined) {
                    pending[slot] = vector;
                }
            });
        }

        return abortable(Promise.all(pending), signal);
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    get size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }
}
