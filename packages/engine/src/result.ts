/**
 * Result\<T\> — Collected-Error Pipelines
 *
 * A discriminated union for stages that report every problem at once
 * instead of throwing on the first one.
 *
 * @example
 * ```typescript
 * const result = normalizeDocuments(docs);
 * if (!result.ok) {
 *     for (const err of result.errors) console.error(err.message);
 *     return;
 * }
 * const model = result.value; // Narrowed to ApiModel
 * ```
 *
 * @module
 */
import { ValidationFailedError, type ValidationError } from './errors.js';

// ── Discriminated Union ──────────────────────────────────

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Failure {
    readonly ok: false;
    readonly errors: readonly ValidationError[];
}

export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(errors: readonly ValidationError[]): Failure {
    return { ok: false, errors };
}

/**
 * Unwrap a result, throwing {@link ValidationFailedError} with every
 * collected error on failure.
 */
export function unwrap<T>(result: Result<T>): T {
    if (!result.ok) throw new ValidationFailedError(result.errors);
    return result.value;
}
