/**
 * @fileoverview Outcome
 *
 * Tagged result for anything parsed from an untrusted source such as a
 * language model reply. Either the parsed value was accepted (`ok`) or a
 * deterministic local value was substituted (`fallback`) and the reason
 * is kept for logging and provenance.
 *
 * @module @rubricator/engine/contracts/Outcome
 */

export interface OkOutcome<T> {
    readonly kind: "ok";
    readonly value: T;
}

export interface FallbackOutcome<T> {
    readonly kind: "fallback";
    readonly value: T;
    readonly reason: string;
}

export type Outcome<T> = OkOutcome<T> | FallbackOutcome<T>;

export function ok<T>(value: T): OkOutcome<T> {
    return Object.freeze({ kind: "ok", value });
}

export function fallback<T>(reason: string, value: T): FallbackOutcome<T> {
    return Object.freeze({ kind: "fallback", value, reason });
}

export function isFallback<T>(outcome: Outcome<T>): outcome is FallbackOutcome<T> {
    return outcome.kind === "fallback";
}
