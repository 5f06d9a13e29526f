/**
 * Normalizer — Validate and Canonicalize Parsed Documents
 *
 * Turns one or more {@link ApiDocument}s into a frozen {@link ApiModel},
 * or returns every {@link ValidationError} found. Checks are independent
 * and never short-circuit, so one run reports all problems:
 *
 * - body / query / parameter / field types naming a schema must resolve
 * - a schema may not reference itself from inside its own declaration
 * - `required` names must be declared fields (and never on primitives)
 * - `enum` sets are non-empty and contain `default` / `example`
 * - path parameter overrides name a real `{placeholder}`; placeholders are
 *   unique; query parameters do not shadow them
 * - `(method, path)` pairs, schema names and translated fields are unique
 * - translation span durations parse
 *
 * Normalization expands shorthand declarations, defaults descriptions to
 * `""` and materializes implicit path parameters as strings.
 *
 * @module
 */
import { ValidationError, type ValidationCode } from '../errors.js';
import {
    PRIMITIVE_TYPES,
    type ApiDocument, type ApiGroup, type ApiModel, type ConfigValue,
    type Endpoint, type EndpointDecl, type Field, type FieldDecl, type FieldSpec,
    type FieldType, type NamedFieldDecl, type ParameterDecl, type ParameterLocation,
    type ParameterSpec, type PrimitiveType, type Schema, type SchemaDecl,
} from '../ir/types.js';
import { fail, succeed, type Result } from '../result.js';
import { compileTranslations } from '../translation/TranslationTable.js';

// ── Public API ───────────────────────────────────────────

/**
 * Validate and normalize a set of documents sharing one schema namespace.
 * Documents are processed in the given order.
 */
export function normalizeDocuments(documents: readonly ApiDocument[]): Result<ApiModel> {
    return new Normalizer(documents).run();
}

/** Validate and normalize a single document */
export function normalizeDocument(document: ApiDocument): Result<ApiModel> {
    return normalizeDocuments([document]);
}

/** `{user_id}` placeholders of a path, in order (duplicates kept) */
export function pathPlaceholders(path: string): string[] {
    return [...path.matchAll(/\{([^}]+)\}/g)].map(m => (m[1] ?? '').trim());
}

// ── Internal Shape ───────────────────────────────────────

/** Field and parameter declarations flattened to one shape */
interface DeclShape {
    readonly type: string;
    readonly format?: string;
    readonly items?: FieldDecl;
    readonly description?: string;
    readonly enum?: readonly ConfigValue[];
    readonly default?: ConfigValue;
    readonly example?: ConfigValue;
    readonly properties?: readonly NamedFieldDecl[];
    readonly required?: readonly string[];
}

function fieldShape(decl: FieldDecl): DeclShape {
    return decl.kind === 'shorthand' ? { type: decl.type } : decl;
}

function parameterShape(decl: ParameterDecl): DeclShape {
    if (decl.kind === 'shorthand') return { type: decl.type };
    const { required: _required, ...rest } = decl;
    return rest;
}

// ── Normalizer ───────────────────────────────────────────

class Normalizer {
    private readonly errors: ValidationError[] = [];
    private readonly schemaSources = new Map<string, string>();

    constructor(private readonly documents: readonly ApiDocument[]) {}

    run(): Result<ApiModel> {
        // Names first, so references resolve regardless of declaration order
        for (const doc of this.documents) {
            for (const decl of doc.schemas) {
                const previous = this.schemaSources.get(decl.name);
                if (previous !== undefined) {
                    this.report('duplicate-schema', `${doc.source} › schemas.${decl.name}`,
                        `schema "${decl.name}" is already declared in ${previous}`);
                    continue;
                }
                this.schemaSources.set(decl.name, doc.source);
            }
        }

        const schemas: Schema[] = [];
        const claimed = new Set<string>();
        for (const doc of this.documents) {
            for (const decl of doc.schemas) {
                if (claimed.has(decl.name)) continue;
                claimed.add(decl.name);
                schemas.push(this.schema(decl, doc.source));
            }
        }

        const groups: ApiGroup[] = [];
        const routes = new Map<string, string>();
        for (const doc of this.documents) {
            const endpoints = doc.endpoints.map((decl, i) => this.endpoint(decl, doc, i, routes));
            groups.push({ name: doc.name, source: doc.source, endpoints });
        }

        const translations = compileTranslations(this.documents);
        if (!translations.ok) this.errors.push(...translations.errors);

        if (this.errors.length > 0 || !translations.ok) return fail(this.errors);

        const model: ApiModel = {
            groups,
            endpoints: groups.flatMap(g => g.endpoints),
            schemas,
            translations: translations.value,
        };
        return succeed(freezeDeep(model));
    }

    // ── Schemas ──────────────────────────────────────────

    private schema(decl: SchemaDecl, source: string): Schema {
        const location = `${source} › schemas.${decl.name}`;
        const base = {
            ...(decl.format !== undefined ? { format: decl.format } : {}),
            description: decl.description ?? '',
            ...(decl.enum !== undefined ? { enum: decl.enum } : {}),
            ...(decl.example !== undefined ? { example: decl.example } : {}),
        };

        let type: FieldType;
        if (decl.type === 'object') {
            type = this.objectType(decl.fields, decl.required ?? [], location, decl.name);
        } else if (decl.type === 'array') {
            type = this.arraySchemaType(decl, location);
        } else {
            if (decl.required !== undefined) {
                this.report('required-on-primitive', `${location} › required`,
                    `"required" is only allowed on object schemas, not "${decl.type}"`);
            }
            if (decl.fields.length > 0) {
                this.report('invalid-type', `${location} › ${decl.fields[0]?.name ?? ''}`,
                    `fields are only allowed on object schemas or arrays of objects, not "${decl.type}"`);
            }
            type = this.namedType(decl.type, location, decl.name);
        }

        const spec: FieldSpec = { type, ...base };
        this.checkEnum(spec, location);
        return { name: decl.name, source, spec };
    }

    /**
     * `type = "array"`: `items = "object"` takes the schema's own fields
     * and `required` as the item object.
     */
    private arraySchemaType(decl: SchemaDecl, location: string): FieldType {
        const items = decl.items;
        if (!items) {
            this.report('invalid-type', location, 'array schemas require "items"');
            return { kind: 'array', items: { type: { kind: 'primitive', type: 'string' }, description: '' } };
        }

        if (items.kind === 'shorthand' && items.type === 'object') {
            return {
                kind: 'array',
                items: {
                    type: this.objectType(decl.fields, decl.required ?? [], location, decl.name),
                    description: '',
                },
            };
        }

        if (decl.fields.length > 0 || decl.required !== undefined) {
            this.report('invalid-type', location,
                'fields and "required" on an array schema need items = "object"');
        }
        return { kind: 'array', items: this.spec(fieldShape(items), `${location} › items`, decl.name) };
    }

    private objectType(
        fields: readonly NamedFieldDecl[],
        required: readonly string[],
        location: string,
        owner: string | undefined,
    ): FieldType {
        const normalized: Field[] = fields.map(({ name, decl }) => ({
            name,
            spec: this.spec(fieldShape(decl), `${location} › ${name}`, owner),
        }));

        const declared = new Set(fields.map(f => f.name));
        for (const name of required) {
            if (!declared.has(name)) {
                this.report('unknown-required-field', `${location} › required`,
                    `required field "${name}" is not declared`);
            }
        }

        return { kind: 'object', fields: normalized, required: [...required] };
    }

    // ── Fields ───────────────────────────────────────────

    private spec(shape: DeclShape, location: string, owner: string | undefined): FieldSpec {
        const spec: FieldSpec = {
            type: this.shapeType(shape, location, owner),
            ...(shape.format !== undefined ? { format: shape.format } : {}),
            description: shape.description ?? '',
            ...(shape.enum !== undefined ? { enum: shape.enum } : {}),
            ...(shape.default !== undefined ? { default: shape.default } : {}),
            ...(shape.example !== undefined ? { example: shape.example } : {}),
        };
        this.checkEnum(spec, location);
        return spec;
    }

    private shapeType(shape: DeclShape, location: string, owner: string | undefined): FieldType {
        if (shape.type === 'array') {
            if (!shape.items) {
                this.report('invalid-type', location, 'array type requires "items"');
                return { kind: 'array', items: { type: { kind: 'primitive', type: 'string' }, description: '' } };
            }
            return { kind: 'array', items: this.spec(fieldShape(shape.items), `${location} › items`, owner) };
        }
        if (shape.type === 'object') {
            return this.objectType(shape.properties ?? [], shape.required ?? [], location, owner);
        }
        return this.namedType(shape.type, location, owner);
    }

    /** A primitive name, or a reference that must resolve */
    private namedType(name: string, location: string, owner: string | undefined): FieldType {
        if (isPrimitive(name)) return { kind: 'primitive', type: name };

        if (name === owner) {
            this.report('self-reference', location, `schema "${owner}" references itself`);
        } else if (!this.schemaSources.has(name)) {
            this.report('unknown-schema', location, `unknown schema "${name}"`);
        }
        return { kind: 'reference', schema: name };
    }

    private checkEnum(spec: FieldSpec, location: string): void {
        if (spec.enum === undefined) return;
        if (spec.enum.length === 0) {
            this.report('empty-enum', `${location} › enum`, 'enum must list at least one value');
            return;
        }

        const allowed = new Set(spec.enum.map(valueKey));
        const check = (key: 'default' | 'example', value: ConfigValue | undefined): void => {
            if (value === undefined) return;
            const values = Array.isArray(value) ? value : [value];
            for (const v of values) {
                if (!allowed.has(valueKey(v))) {
                    this.report('value-not-in-enum', `${location} › ${key}`,
                        `${key} ${JSON.stringify(v)} is not one of ${JSON.stringify(spec.enum)}`);
                }
            }
        };
        check('default', spec.default);
        check('example', spec.example);
    }

    // ── Endpoints ────────────────────────────────────────

    private endpoint(decl: EndpointDecl, doc: ApiDocument, index: number, routes: Map<string, string>): Endpoint {
        const location = `${doc.source} › endpoints[${index}] (${decl.method} ${decl.path})`;

        const routeKey = `${decl.method} ${decl.path}`;
        const previous = routes.get(routeKey);
        if (previous !== undefined) {
            this.report('duplicate-endpoint', location, `${routeKey} is already declared at ${previous}`);
        } else {
            routes.set(routeKey, location);
        }

        if (decl.body && !this.schemaSources.has(decl.body.schema)) {
            this.report('unknown-schema', `${location} › body`,
                `endpoint ${routeKey} references unknown schema "${decl.body.schema}"`);
        }

        const placeholders = pathPlaceholders(decl.path);
        const unique = [...new Set(placeholders)];
        if (unique.length !== placeholders.length) {
            const dupes = placeholders.filter((name, i) => placeholders.indexOf(name) !== i);
            this.report('duplicate-path-param', `${location} › path`,
                `path placeholder "${dupes[0] ?? ''}" appears more than once`);
        }

        for (const { name } of decl.params) {
            if (!unique.includes(name)) {
                this.report('unknown-path-param', `${location} › params.${name}`,
                    `"${name}" is not a placeholder in ${decl.path}`);
            }
        }

        const pathParams = unique.map(name => {
            const override = decl.params.find(p => p.name === name);
            return override
                ? this.parameter(name, 'path', override.decl, `${location} › params.${name}`)
                : implicitPathParam(name);
        });

        const query = decl.query.map(({ name, decl: param }) => {
            if (unique.includes(name)) {
                this.report('shadowed-path-param', `${location} › query.${name}`,
                    `query parameter "${name}" shadows the path parameter of the same name`);
            }
            return this.parameter(name, 'query', param, `${location} › query.${name}`);
        });

        return {
            group: doc.name,
            path: decl.path,
            method: decl.method,
            summary: decl.summary ?? '',
            description: decl.description ?? '',
            tags: [...new Set([doc.name, ...(decl.tags ?? [])])],
            ...(decl.body ? { body: decl.body } : {}),
            pathParams,
            query,
        };
    }

    private parameter(name: string, location: ParameterLocation, decl: ParameterDecl, where: string): ParameterSpec {
        const required = location === 'path' || (decl.kind === 'full' && decl.required === true);
        return {
            name,
            in: location,
            required,
            ...this.spec(parameterShape(decl), where, undefined),
        };
    }

    private report(code: ValidationCode, location: string, message: string): void {
        this.errors.push(new ValidationError(code, location, message));
    }
}

// ── Helpers ──────────────────────────────────────────────

const PRIMITIVES: ReadonlySet<string> = new Set(PRIMITIVE_TYPES);

function isPrimitive(name: string): name is PrimitiveType {
    return PRIMITIVES.has(name);
}

function implicitPathParam(name: string): ParameterSpec {
    return {
        name,
        in: 'path',
        required: true,
        type: { kind: 'primitive', type: 'string' },
        description: '',
    };
}

/** Equality key for enum membership (dates compare by instant) */
function valueKey(value: ConfigValue): string {
    if (value instanceof Date) return `date:${value.toISOString()}`;
    if (Array.isArray(value)) return `[${value.map(valueKey).join(',')}]`;
    if (typeof value === 'object') {
        return `{${Object.entries(value).map(([k, v]) => `${JSON.stringify(k)}:${valueKey(v)}`).join(',')}}`;
    }
    return JSON.stringify(value);
}

/** Freeze the model graph; the translation table freezes itself */
function freezeDeep<T>(value: T): T {
    if (typeof value !== 'object' || value === null || Object.isFrozen(value) || value instanceof Date) {
        return value;
    }
    for (const child of Object.values(value)) freezeDeep(child);
    Object.freeze(value);
    return value;
}
