/**
 * OpenApiMapper — Normalized Model → OpenAPI 3.1 Document
 *
 * Pure transform. Every endpoint becomes one operation under its path,
 * keyed by lowercase HTTP method; every schema becomes one
 * `components.schemas` entry. Paths and schemas keep declaration order,
 * so repeated generation from unchanged input is byte-stable.
 *
 * Unknown `format` values are passed through verbatim.
 *
 * @module
 */
import type { ApiModel, ConfigValue, Endpoint, FieldSpec, HttpMethod, ParameterSpec } from '../ir/types.js';
import { toSnakeCase } from '../render/TemplateHelpers.js';
import type {
    JsonSchema, JsonValue, OpenApiDocument, OpenApiInfo, OpenApiMethod,
    OpenApiOperation, OpenApiParameter, OpenApiPathItem, OpenApiServer,
} from './types.js';

// ── Options ──────────────────────────────────────────────

export const OPENAPI_VERSION = '3.1.0';

export interface DocumentOptions {
    readonly info: OpenApiInfo;
    readonly servers?: readonly OpenApiServer[];
}

const METHOD_KEYS: Readonly<Record<HttpMethod, OpenApiMethod>> = {
    GET: 'get',
    POST: 'post',
    PUT: 'put',
    DELETE: 'delete',
    PATCH: 'patch',
};

/** `#/components/schemas/newUser` */
export function schemaRef(name: string): string {
    return `#/components/schemas/${name}`;
}

// ── Public API ───────────────────────────────────────────

/**
 * Build the OpenAPI document for a validated model.
 */
export function buildOpenApiDocument(model: ApiModel, options: DocumentOptions): OpenApiDocument {
    const paths: Record<string, OpenApiPathItem> = {};
    const usedIds = new Set<string>();

    for (const endpoint of model.endpoints) {
        const item = paths[endpoint.path] ?? {};
        paths[endpoint.path] = { ...item, [METHOD_KEYS[endpoint.method]]: mapOperation(endpoint, usedIds) };
    }

    const schemas: Record<string, JsonSchema> = {};
    for (const schema of model.schemas) {
        schemas[schema.name] = mapFieldSpec(schema.spec);
    }

    return {
        openapi: OPENAPI_VERSION,
        info: options.info,
        ...(options.servers && options.servers.length > 0 ? { servers: options.servers } : {}),
        tags: model.groups.map(g => ({ name: g.name })),
        paths,
        components: { schemas },
    };
}

/**
 * Serialize a document the same way on every run:
 * two-space JSON with a trailing newline.
 */
export function serializeDocument(document: OpenApiDocument): string {
    return JSON.stringify(document, null, 2) + '\n';
}

// ── Operations ───────────────────────────────────────────

function mapOperation(endpoint: Endpoint, usedIds: Set<string>): OpenApiOperation {
    const parameters = [...endpoint.pathParams, ...endpoint.query].map(mapParameter);

    return {
        tags: endpoint.tags,
        ...(endpoint.summary ? { summary: endpoint.summary } : {}),
        ...(endpoint.description ? { description: endpoint.description } : {}),
        operationId: operationId(endpoint, usedIds),
        ...(parameters.length > 0 ? { parameters } : {}),
        ...(endpoint.body ? {
            requestBody: {
                ...(endpoint.body.description ? { description: endpoint.body.description } : {}),
                required: true,
                content: { 'application/json': { schema: { $ref: schemaRef(endpoint.body.schema) } } },
            },
        } : {}),
        responses: { default: { description: 'Default response' } },
    };
}

function mapParameter(param: ParameterSpec): OpenApiParameter {
    return {
        name: param.name,
        in: param.in,
        ...(param.description ? { description: param.description } : {}),
        required: param.required,
        schema: mapFieldSpec({ ...param, description: '' }),
    };
}

/**
 * `POST /user/{user_id}/update` → `post_user_user_id_update`,
 * deduplicated with `_2`, `_3`.
 */
function operationId(endpoint: Endpoint, used: Set<string>): string {
    const base = toSnakeCase(`${endpoint.method.toLowerCase()}_${endpoint.path.replace(/[^A-Za-z0-9]+/g, '_')}`);
    let candidate = base;
    for (let i = 2; used.has(candidate); i++) candidate = `${base}_${i}`;
    used.add(candidate);
    return candidate;
}

// ── Schemas ──────────────────────────────────────────────

/**
 * Map a field spec to a JSON Schema node.
 *
 * Key order is fixed: `$ref`/`type`, `format`, `items`, `properties`,
 * `required`, `enum`, `default`, `example`, `description`.
 */
export function mapFieldSpec(spec: FieldSpec): JsonSchema {
    return {
        ...typeNode(spec),
        ...(spec.format !== undefined && spec.type.kind !== 'array' ? { format: spec.format } : {}),
        ...(spec.enum !== undefined ? { enum: spec.enum.map(toJsonValue) } : {}),
        ...(spec.default !== undefined ? { default: toJsonValue(spec.default) } : {}),
        ...(spec.example !== undefined ? { example: toJsonValue(spec.example) } : {}),
        ...(spec.description ? { description: spec.description } : {}),
    };
}

function typeNode(spec: FieldSpec): JsonSchema {
    const { type } = spec;
    switch (type.kind) {
        case 'reference':
            return { $ref: schemaRef(type.schema) };
        case 'primitive':
            return { type: type.type };
        case 'array':
            return {
                type: 'array',
                ...(spec.format !== undefined ? { format: spec.format } : {}),
                items: mapFieldSpec(type.items),
            };
        case 'object': {
            const properties: Record<string, JsonSchema> = {};
            for (const field of type.fields) properties[field.name] = mapFieldSpec(field.spec);
            return {
                type: 'object',
                ...(type.fields.length > 0 ? { properties } : {}),
                ...(type.required.length > 0 ? { required: type.required } : {}),
            };
        }
    }
}

/** TOML dates become ISO-8601 strings */
export function toJsonValue(value: ConfigValue): JsonValue {
    if (value instanceof Date) return value.toISOString();
    if (Array.isArray(value)) return value.map(toJsonValue);
    if (typeof value === 'object') {
        const out: Record<string, JsonValue> = {};
        for (const [key, v] of Object.entries(value)) out[key] = toJsonValue(v);
        return out;
    }
    return value;
}
