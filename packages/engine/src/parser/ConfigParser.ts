/**
 * ConfigParser — TOML API Description → {@link ApiDocument}
 *
 * Two passes, both purely syntactic:
 *
 *   1. `smol-toml` turns the text into plain tables (grammar errors carry
 *      the TOML parser's own line/column).
 *   2. Strict Zod schemas check the table shape section by section
 *      (unknown keys, type mismatches, malformed tables). Offending paths
 *      are located back in the text by {@link locate}.
 *
 * Schema names are NOT resolved here and no semantic rule is checked;
 * that is the normalizer's job.
 *
 * @module
 */
import { parse as parseToml, TomlError } from 'smol-toml';
import { z } from 'zod';
import { ParseError } from '../errors.js';
import {
    HTTP_METHODS,
    type ApiDocument, type BodyDecl, type ConfigValue, type EndpointDecl,
    type FieldDecl, type NamedFieldDecl, type NamedParameterDecl,
    type ParameterDecl, type SchemaDecl, type TranslationDecl,
} from '../ir/types.js';
import { formatPath, locate, type ValuePath } from './SourceLocator.js';

// ── Table Shapes ─────────────────────────────────────────

const CONFIG_VALUE: z.ZodType<ConfigValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.date(),
    z.array(CONFIG_VALUE),
    z.record(CONFIG_VALUE),
]));

const TABLE = z.record(z.unknown());

const DOCUMENT = z.object({
    name: z.string().min(1).optional(),
    endpoints: z.array(TABLE).optional(),
    schemas: z.record(TABLE).optional(),
    models: z.record(z.record(TABLE)).optional(),
}).strict();

const ENDPOINT = z.object({
    path: z.string().regex(/^\//, 'path must start with "/"'),
    method: z.string().transform(m => m.toUpperCase()).pipe(z.enum(HTTP_METHODS)),
    summary: z.string().optional(),
    description: z.string().optional(),
    tags: z.array(z.string()).optional(),
    body: z.unknown().optional(),
    query: TABLE.optional(),
    params: TABLE.optional(),
}).strict();

const BODY_TABLE = z.object({
    schema: z.string().min(1),
    description: z.string().optional(),
}).strict();

const FIELD_TABLE = z.object({
    type: z.string().min(1),
    format: z.string().optional(),
    items: z.unknown().optional(),
    description: z.string().optional(),
    enum: z.array(CONFIG_VALUE).optional(),
    default: CONFIG_VALUE.optional(),
    example: CONFIG_VALUE.optional(),
    properties: TABLE.optional(),
    required: z.array(z.string()).optional(),
}).strict();

const PARAMETER_TABLE = z.object({
    type: z.string().min(1),
    format: z.string().optional(),
    items: z.unknown().optional(),
    description: z.string().optional(),
    enum: z.array(CONFIG_VALUE).optional(),
    default: CONFIG_VALUE.optional(),
    example: CONFIG_VALUE.optional(),
    required: z.boolean().optional(),
}).strict();

/**
 * Keys of a schema table that describe the schema itself; every other key
 * is a field. A reserved name still declares a field when its value is a
 * table (`description = { type = "string" }`), except `example`, and
 * `items` of an array schema. The shorthand `description = "string"` is
 * always the schema's own description.
 */
export const SCHEMA_META_KEYS: ReadonlySet<string> = new Set(['type', 'format', 'description', 'enum', 'example', 'required', 'items']);

const SCHEMA_META = z.object({
    type: z.string().min(1).default('object'),
    format: z.string().optional(),
    description: z.string().optional(),
    enum: z.array(CONFIG_VALUE).optional(),
    example: CONFIG_VALUE.optional(),
    required: z.array(z.string()).optional(),
    items: z.unknown().optional(),
}).strict();

const TRANSLATION = z.object({
    translations: z.array(z.tuple([z.union([z.string(), z.number(), z.boolean()]), z.string()])),
}).strict();

// ── Public API ───────────────────────────────────────────

/**
 * Parse one TOML API description.
 *
 * @param text - The configuration text
 * @param source - Document name used in error locations (default: `<inline>`)
 * @throws {ParseError} On malformed text or table shape
 */
export function parseApiDocument(text: string, source = '<inline>'): ApiDocument {
    return new DocumentReader(text, source).read();
}

// ── Reader ───────────────────────────────────────────────

class DocumentReader {
    constructor(
        private readonly text: string,
        private readonly source: string,
    ) {}

    read(): ApiDocument {
        const root = this.check(DOCUMENT, this.toml(), []);

        const endpoints = (root.endpoints ?? []).map((table, i) => this.endpoint(table, ['endpoints', i]));
        const schemas = Object.entries(root.schemas ?? {})
            .map(([name, table]) => this.schema(name, table, ['schemas', name]));

        const models: TranslationDecl[] = [];
        for (const [model, fields] of Object.entries(root.models ?? {})) {
            for (const [field, table] of Object.entries(fields)) {
                const parsed = this.check(TRANSLATION, table, ['models', model, field]);
                models.push({
                    model,
                    field,
                    translations: parsed.translations.map(([matcher, label]) => [String(matcher), label] as const),
                });
            }
        }

        return {
            source: this.source,
            name: root.name ?? defaultName(this.source),
            endpoints,
            schemas,
            models,
        };
    }

    private toml(): Record<string, unknown> {
        try {
            return parseToml(this.text);
        } catch (err) {
            if (err instanceof TomlError) {
                const reason = err.message.split('\n')[0] ?? 'invalid TOML';
                throw new ParseError(this.source, err.line, err.column, reason, { cause: err });
            }
            throw err;
        }
    }

    private endpoint(table: Record<string, unknown>, path: ValuePath): EndpointDecl {
        const raw = this.check(ENDPOINT, table, path);
        const body = raw.body === undefined ? undefined : this.body(raw.body, [...path, 'body']);

        return {
            path: raw.path,
            method: raw.method,
            ...(raw.summary !== undefined ? { summary: raw.summary } : {}),
            ...(raw.description !== undefined ? { description: raw.description } : {}),
            ...(raw.tags !== undefined ? { tags: raw.tags } : {}),
            ...(body ? { body } : {}),
            query: this.parameters(raw.query ?? {}, [...path, 'query']),
            params: this.parameters(raw.params ?? {}, [...path, 'params']),
        };
    }

    /** `body = "newUser"` or `[endpoints.body] schema = "newUser"` */
    private body(value: unknown, path: ValuePath): BodyDecl {
        if (typeof value === 'string') {
            if (value.length === 0) this.fail(path, 'body schema name must not be empty');
            return { schema: value };
        }
        const raw = this.check(BODY_TABLE, value, path);
        return {
            schema: raw.schema,
            ...(raw.description !== undefined ? { description: raw.description } : {}),
        };
    }

    private parameters(table: Record<string, unknown>, path: ValuePath): NamedParameterDecl[] {
        return Object.entries(table).map(([name, value]) => ({
            name,
            decl: this.parameter(value, [...path, name]),
        }));
    }

    private parameter(value: unknown, path: ValuePath): ParameterDecl {
        if (typeof value === 'string') return { kind: 'shorthand', type: value };
        if (!isTable(value)) this.fail(path, `expected a type name or a table, received ${describeValue(value)}`);

        const raw = this.check(PARAMETER_TABLE, value, path);
        const items = raw.items === undefined ? undefined : this.field(raw.items, [...path, 'items']);
        return {
            kind: 'full',
            type: raw.type,
            ...(raw.format !== undefined ? { format: raw.format } : {}),
            ...(items ? { items } : {}),
            ...(raw.description !== undefined ? { description: raw.description } : {}),
            ...(raw.enum !== undefined ? { enum: raw.enum } : {}),
            ...(raw.default !== undefined ? { default: raw.default } : {}),
            ...(raw.example !== undefined ? { example: raw.example } : {}),
            ...(raw.required !== undefined ? { required: raw.required } : {}),
        };
    }

    private field(value: unknown, path: ValuePath): FieldDecl {
        if (typeof value === 'string') return { kind: 'shorthand', type: value };
        if (!isTable(value)) this.fail(path, `expected a type name or a table, received ${describeValue(value)}`);

        const raw = this.check(FIELD_TABLE, value, path);
        const items = raw.items === undefined ? undefined : this.field(raw.items, [...path, 'items']);
        const properties = raw.properties === undefined
            ? undefined
            : this.fields(raw.properties, [...path, 'properties']);

        return {
            kind: 'full',
            type: raw.type,
            ...(raw.format !== undefined ? { format: raw.format } : {}),
            ...(items ? { items } : {}),
            ...(raw.description !== undefined ? { description: raw.description } : {}),
            ...(raw.enum !== undefined ? { enum: raw.enum } : {}),
            ...(raw.default !== undefined ? { default: raw.default } : {}),
            ...(raw.example !== undefined ? { example: raw.example } : {}),
            ...(properties ? { properties } : {}),
            ...(raw.required !== undefined ? { required: raw.required } : {}),
        };
    }

    private fields(table: Record<string, unknown>, path: ValuePath): NamedFieldDecl[] {
        return Object.entries(table).map(([name, value]) => ({
            name,
            decl: this.field(value, [...path, name]),
        }));
    }

    private schema(name: string, table: Record<string, unknown>, path: ValuePath): SchemaDecl {
        const meta: Record<string, unknown> = {};
        const fieldTable: Record<string, unknown> = {};
        const isArray = table.type === 'array';
        for (const [key, value] of Object.entries(table)) {
            if (isSchemaMeta(key, value, isArray)) meta[key] = value;
            else fieldTable[key] = value;
        }

        const raw = this.check(SCHEMA_META, meta, path);
        const items = raw.items === undefined ? undefined : this.field(raw.items, [...path, 'items']);

        return {
            name,
            type: raw.type,
            ...(raw.format !== undefined ? { format: raw.format } : {}),
            ...(raw.description !== undefined ? { description: raw.description } : {}),
            ...(raw.enum !== undefined ? { enum: raw.enum } : {}),
            ...(raw.example !== undefined ? { example: raw.example } : {}),
            ...(raw.required !== undefined ? { required: raw.required } : {}),
            ...(items ? { items } : {}),
            fields: this.fields(fieldTable, path),
        };
    }

    // ── Error Plumbing ───────────────────────────────────

    private check<S extends z.ZodTypeAny>(schema: S, value: unknown, path: ValuePath): z.output<S> {
        const result = schema.safeParse(value);
        if (result.success) return result.data;

        const issue = result.error.issues[0];
        if (!issue) this.fail(path, 'invalid value');

        const issuePath = [...path, ...issue.path];
        if (issue.code === 'unrecognized_keys') {
            const key = issue.keys[0] ?? '';
            this.fail([...issuePath, key], `unknown key "${key}" in ${formatPath(issuePath)}`);
        }
        this.fail(issuePath, `${describeIssue(issue)} at ${formatPath(issuePath)}`);
    }

    private fail(path: ValuePath, reason: string): never {
        const { line, column } = locate(this.text, path);
        throw new ParseError(this.source, line, column, reason);
    }
}

// ── Helpers ──────────────────────────────────────────────

function isSchemaMeta(key: string, value: unknown, isArray: boolean): boolean {
    if (!SCHEMA_META_KEYS.has(key)) return false;
    if (!isTable(value) || key === 'example') return true;
    return key === 'items' && isArray;
}

function isTable(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function describeValue(value: unknown): string {
    if (Array.isArray(value)) return 'array';
    if (value instanceof Date) return 'date';
    return typeof value;
}

function describeIssue(issue: z.ZodIssue): string {
    if (issue.code === 'invalid_type') {
        if (issue.received === 'undefined') {
            const key = issue.path[issue.path.length - 1];
            return `missing required key "${String(key)}"`;
        }
        return `expected ${issue.expected}, received ${issue.received}`;
    }
    return issue.message;
}

/** `config/openapi/users.toml` → `users` */
function defaultName(source: string): string {
    const base = source.split(/[\\/]/).pop() ?? source;
    return base.replace(/\.toml$/i, '') || 'default';
}
