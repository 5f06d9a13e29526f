/**
 * TranslationTable — Model Field Value → Human Label
 *
 * Compiled from the `[models.<model>.<field>]` tables. Each field holds
 * an ordered list of `(matcher, label)` rules:
 *
 * - literal matcher — equals the stringified value
 * - `$span:<duration>` — the value is a timestamp no older than
 *   `duration` relative to an as-of instant
 *
 * Lookup is first-match in declaration order. No match means "no
 * translation" (`undefined`), never an error and never a synthesized
 * default.
 *
 * The table is read-only and is passed explicitly to whoever needs it;
 * there is no global registry.
 *
 * @module
 */
import { ValidationError } from '../errors.js';
import type { ApiDocument } from '../ir/types.js';
import { fail, succeed, type Result } from '../result.js';
import { parseDuration } from './Duration.js';

// ── Types ────────────────────────────────────────────────

export const SPAN_PREFIX = '$span:';

export type TranslationMatcher =
    | { readonly kind: 'literal'; readonly value: string }
    | { readonly kind: 'span'; readonly expression: string; readonly durationMs: number };

export interface TranslationRule {
    readonly matcher: TranslationMatcher;
    readonly label: string;
}

export interface TranslationEntry {
    readonly model: string;
    readonly field: string;
    readonly rules: readonly TranslationRule[];
}

/** A timestamp as Date, epoch milliseconds, or ISO-8601 text */
export type Instant = Date | number | string;

export interface TranslateOptions {
    /** Reference instant for span matchers (default: now) */
    readonly asOf?: Instant;
}

/** JSON-safe projection for presentation layers */
export type TranslationLookup = Readonly<Record<string, Readonly<Record<string, readonly LookupRule[]>>>>;

export type LookupRule =
    | { readonly value: string; readonly label: string }
    | { readonly withinMs: number; readonly label: string };

// ── Table ────────────────────────────────────────────────

export class TranslationTable {
    private readonly entries: ReadonlyMap<string, ReadonlyMap<string, readonly TranslationRule[]>>;

    constructor(entries: readonly TranslationEntry[]) {
        const models = new Map<string, Map<string, readonly TranslationRule[]>>();
        for (const entry of entries) {
            let fields = models.get(entry.model);
            if (!fields) {
                fields = new Map();
                models.set(entry.model, fields);
            }
            fields.set(entry.field, Object.freeze([...entry.rules]));
        }
        this.entries = models;
        Object.freeze(this);
    }

    /** Model names in declaration order */
    models(): string[] {
        return [...this.entries.keys()];
    }

    /** Translated field names of a model, in declaration order */
    fields(model: string): string[] {
        return [...(this.entries.get(model)?.keys() ?? [])];
    }

    rules(model: string, field: string): readonly TranslationRule[] {
        return this.entries.get(model)?.get(field) ?? [];
    }

    /**
     * Translate a field value.
     *
     * @returns The label of the first matching rule, or `undefined`
     */
    translate(model: string, field: string, value: unknown, options: TranslateOptions = {}): string | undefined {
        const rules = this.rules(model, field);
        if (rules.length === 0) return undefined;

        let asOf: number | undefined;
        for (const rule of rules) {
            const { matcher } = rule;
            if (matcher.kind === 'literal') {
                if (stringify(value) === matcher.value) return rule.label;
                continue;
            }

            const timestamp = toEpochMs(value);
            if (timestamp === undefined) continue;
            asOf ??= options.asOf === undefined ? Date.now() : toEpochMs(options.asOf);
            if (asOf === undefined) continue;
            if (asOf - timestamp <= matcher.durationMs) return rule.label;
        }
        return undefined;
    }

    toLookup(): TranslationLookup {
        const lookup: Record<string, Record<string, LookupRule[]>> = {};
        for (const [model, fields] of this.entries) {
            const out: Record<string, LookupRule[]> = {};
            for (const [field, rules] of fields) {
                out[field] = rules.map(({ matcher, label }) => matcher.kind === 'literal'
                    ? { value: matcher.value, label }
                    : { withinMs: matcher.durationMs, label });
            }
            lookup[model] = out;
        }
        return lookup;
    }
}

// ── Compilation ──────────────────────────────────────────

/**
 * Parse one matcher. Returns `undefined` for a span whose duration
 * does not parse.
 */
export function parseMatcher(raw: string): TranslationMatcher | undefined {
    if (!raw.startsWith(SPAN_PREFIX)) return { kind: 'literal', value: raw };

    const expression = raw.slice(SPAN_PREFIX.length);
    const durationMs = parseDuration(expression);
    return durationMs === undefined ? undefined : { kind: 'span', expression, durationMs };
}

/**
 * Compile the `models.*` tables of every document into one table.
 * Unparsable durations and model fields declared twice are reported
 * together.
 */
export function compileTranslations(documents: readonly ApiDocument[]): Result<TranslationTable> {
    const errors: ValidationError[] = [];
    const entries: TranslationEntry[] = [];
    const seen = new Map<string, string>();

    for (const doc of documents) {
        for (const decl of doc.models) {
            const location = `${doc.source} › models.${decl.model}.${decl.field}`;
            const key = `${decl.model}.${decl.field}`;

            const previous = seen.get(key);
            if (previous !== undefined) {
                errors.push(new ValidationError(
                    'duplicate-translation', location,
                    `translations for "${key}" are already declared in ${previous}`,
                ));
                continue;
            }
            seen.set(key, doc.source);

            const rules: TranslationRule[] = [];
            decl.translations.forEach(([raw, label], i) => {
                const matcher = parseMatcher(raw);
                if (!matcher) {
                    errors.push(new ValidationError(
                        'invalid-duration', `${location} › translations[${i}]`,
                        `cannot parse duration in "${raw}" (expected e.g. "$span:24h" or "$span:7d")`,
                    ));
                    return;
                }
                rules.push({ matcher, label });
            });
            entries.push({ model: decl.model, field: decl.field, rules });
        }
    }

    return errors.length > 0 ? fail(errors) : succeed(new TranslationTable(entries));
}

// ── Helpers ──────────────────────────────────────────────

function stringify(value: unknown): string {
    if (value instanceof Date) return value.toISOString();
    return String(value);
}

function toEpochMs(value: unknown): number | undefined {
    if (value instanceof Date) {
        const ms = value.getTime();
        return Number.isNaN(ms) ? undefined : ms;
    }
    if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
    if (typeof value === 'string') {
        const ms = Date.parse(value);
        return Number.isNaN(ms) ? undefined : ms;
    }
    return undefined;
}
