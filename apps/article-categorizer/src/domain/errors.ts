/**
 * @fileoverview Categorization errors
 *
 * Only input errors leave the public entry point; service and
 * configuration failures are absorbed by local fallbacks.
 *
 * @module domain/errors
 */

/**
 * Raised when an article has neither text nor title.
 * Callers should not retry: the same input fails the same way.
 */
export class CategorizationInputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CategorizationInputError";
    }
}

/**
 * Raised by adapters when a remote model replies with something unusable.
 */
export class ModelResponseError extends Error {
    constructor(
        public readonly service: string,
        message: string
    ) {
        super(`${service}: ${message}`);
        this.name = "ModelResponseError";
    }
}
