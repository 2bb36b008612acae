/**
 * Centralized error handling for tree operations
 */

import type { Logger } from "./types.js";

/**
 * Custom error class for livetag operations
 */
export class LivetagError extends Error {
    readonly operation: string;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        operation: string,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'LivetagError';
        this.operation = operation;
        this.context = context;
    }
}

/**
 * Raised when a renderer lacks the capability an operation needs.
 * Fatal to that operation only; the tree stays usable.
 */
export class UnsupportedCapabilityError extends LivetagError {
    readonly capability: string;

    constructor(
        capability: string,
        operation: string,
        context?: Record<string, unknown>
    ) {
        super(`Renderer does not support "${capability}"`, operation, context);
        this.name = 'UnsupportedCapabilityError';
        this.capability = capability;
    }
}

/**
 * Centralized handler for failures the tree recovers from.
 * Logs errors consistently and can be extended for monitoring.
 */
export function handleTreeError(
    operation: string,
    error: unknown,
    context?: Record<string, unknown>,
    logger: Logger = console
): void {
    logger.error(`LiveTree.${operation}:`, error, context ?? '');
}
