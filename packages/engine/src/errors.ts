/**
 * Errors — Generation Pipeline Error Taxonomy
 *
 * Every stage of the pipeline fails with its own error type so the CLI
 * can decide how far a failure reaches:
 *
 * - {@link ParseError}            — malformed TOML or table shape. Fatal, aborts immediately.
 * - {@link ValidationError}       — one semantic problem in the parsed documents.
 *                                   Collected; the batch is fatal ({@link ValidationFailedError}).
 * - {@link MergeConflict}         — a merge target lacks usable region markers.
 *                                   Downgraded to a per-file skip.
 * - {@link ProjectIOError}        — filesystem failure, scoped to one file.
 *
 * @module
 */

// ── Parse ────────────────────────────────────────────────

/**
 * Malformed configuration text.
 *
 * Carries the 1-based line/column of the offending token or key,
 * plus the name of the source document.
 */
export class ParseError extends Error {
    readonly source: string;
    readonly line: number;
    readonly column: number;
    /** Human-readable cause without the location prefix */
    readonly reason: string;

    constructor(source: string, line: number, column: number, reason: string, options?: { cause?: unknown }) {
        super(`${source}:${line}:${column}: ${reason}`, options);
        this.name = 'ParseError';
        this.source = source;
        this.line = line;
        this.column = column;
        this.reason = reason;
    }
}

// ── Validation ───────────────────────────────────────────

/** Stable identifiers for every semantic check */
export type ValidationCode =
    | 'unknown-schema'
    | 'self-reference'
    | 'unknown-required-field'
    | 'required-on-primitive'
    | 'empty-enum'
    | 'value-not-in-enum'
    | 'unknown-path-param'
    | 'duplicate-path-param'
    | 'shadowed-path-param'
    | 'duplicate-endpoint'
    | 'duplicate-schema'
    | 'duplicate-translation'
    | 'invalid-duration'
    | 'invalid-type';

/**
 * A single semantic problem found in a parsed document.
 *
 * `location` names the document, section and field so the cause can be
 * found without looking at any intermediate state, e.g.
 * `users.toml › endpoints[0] (POST /user/new) › body`.
 */
export class ValidationError extends Error {
    readonly code: ValidationCode;
    readonly location: string;

    constructor(code: ValidationCode, location: string, message: string) {
        super(`${location}: ${message}`);
        this.name = 'ValidationError';
        this.code = code;
        this.location = location;
    }
}

/**
 * Thrown by pipeline entry points when validation produced errors.
 * Holds the full list, never just the first.
 */
export class ValidationFailedError extends Error {
    readonly errors: readonly ValidationError[];

    constructor(errors: readonly ValidationError[]) {
        const count = errors.length;
        super(
            `Validation failed with ${count} error${count !== 1 ? 's' : ''}:\n` +
            errors.map(e => `  • ${e.message}`).join('\n'),
        );
        this.name = 'ValidationFailedError';
        this.errors = errors;
    }
}

// ── Merge ────────────────────────────────────────────────

/** An existing merge target lacks matching region markers */
export class MergeConflict extends Error {
    readonly path: string;
    readonly region: string;
    readonly reason: string;

    constructor(path: string, region: string, reason: string) {
        super(`${path} [${region}]: ${reason}`);
        this.name = 'MergeConflict';
        this.path = path;
        this.region = region;
        this.reason = reason;
    }
}

// ── I/O ──────────────────────────────────────────────────

/** A filesystem operation on one project file failed */
export class ProjectIOError extends Error {
    readonly path: string;

    constructor(path: string, operation: string, cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super(`Cannot ${operation} "${path}": ${detail}`, { cause });
        this.name = 'ProjectIOError';
        this.path = path;
    }
}
