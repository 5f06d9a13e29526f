/**
 * Intermediate Representation Types
 *
 * Two layers share this module:
 *
 * - **Declarations** (`*Decl`) — what the parser produced. Purely syntactic:
 *   shorthand and full forms are both kept, schema names are unresolved.
 * - **Normalized model** — what the validator returns. Shorthand is expanded,
 *   defaults are applied, every type is a {@link FieldType} tree and
 *   references are known to resolve.
 *
 * The OpenAPI mapper, translation mapper and fragment renderer only ever
 * see the normalized model.
 *
 * @module
 */
import type { TranslationTable } from '../translation/TranslationTable.js';

// ── Scalars ──────────────────────────────────────────────

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = typeof HTTP_METHODS[number];

export const PRIMITIVE_TYPES = ['string', 'integer', 'number', 'boolean'] as const;

export type PrimitiveType = typeof PRIMITIVE_TYPES[number];

/** Any value a TOML document can hold */
export type ConfigValue =
    | string
    | number
    | boolean
    | Date
    | readonly ConfigValue[]
    | { readonly [key: string]: ConfigValue };

// ── Declarations (parser output) ─────────────────────────

/** `roles = "string"` */
export interface ShorthandDecl {
    readonly kind: 'shorthand';
    readonly type: string;
}

/** `tags = { type = "array", items = { type = "string", format = "uuid" } }` */
export interface FieldDeclFull {
    readonly kind: 'full';
    readonly type: string;
    readonly format?: string;
    readonly items?: FieldDecl;
    readonly description?: string;
    readonly enum?: readonly ConfigValue[];
    readonly default?: ConfigValue;
    readonly example?: ConfigValue;
    /** Inline object fields (only meaningful when `type = "object"`) */
    readonly properties?: readonly NamedFieldDecl[];
    /** Required inline object fields */
    readonly required?: readonly string[];
}

export type FieldDecl = ShorthandDecl | FieldDeclFull;

export interface NamedFieldDecl {
    readonly name: string;
    readonly decl: FieldDecl;
}

export interface ParameterDeclFull {
    readonly kind: 'full';
    readonly type: string;
    readonly format?: string;
    readonly items?: FieldDecl;
    readonly description?: string;
    readonly enum?: readonly ConfigValue[];
    readonly default?: ConfigValue;
    readonly example?: ConfigValue;
    readonly required?: boolean;
}

export type ParameterDecl = ShorthandDecl | ParameterDeclFull;

export interface NamedParameterDecl {
    readonly name: string;
    readonly decl: ParameterDecl;
}

export interface BodyDecl {
    readonly schema: string;
    readonly description?: string;
}

export interface EndpointDecl {
    readonly path: string;
    readonly method: HttpMethod;
    readonly summary?: string;
    readonly description?: string;
    readonly tags?: readonly string[];
    readonly body?: BodyDecl;
    readonly query: readonly NamedParameterDecl[];
    /** Explicit overrides for `{placeholder}` path parameters */
    readonly params: readonly NamedParameterDecl[];
}

export interface SchemaDecl {
    readonly name: string;
    readonly type: string;
    readonly format?: string;
    readonly description?: string;
    readonly enum?: readonly ConfigValue[];
    readonly example?: ConfigValue;
    readonly required?: readonly string[];
    readonly items?: FieldDecl;
    readonly fields: readonly NamedFieldDecl[];
}

/** One `[models.<model>.<field>]` table */
export interface TranslationDecl {
    readonly model: string;
    readonly field: string;
    /** `[matcher, label]` pairs in declaration order */
    readonly translations: readonly (readonly [string, string])[];
}

/** One parsed TOML document */
export interface ApiDocument {
    /** Where the text came from (file name or `<inline>`) */
    readonly source: string;
    readonly name: string;
    readonly endpoints: readonly EndpointDecl[];
    readonly schemas: readonly SchemaDecl[];
    readonly models: readonly TranslationDecl[];
}

// ── Normalized Model ─────────────────────────────────────

/** Canonical type tree every downstream stage works on */
export type FieldType =
    | { readonly kind: 'primitive'; readonly type: PrimitiveType }
    | { readonly kind: 'array'; readonly items: FieldSpec }
    | { readonly kind: 'object'; readonly fields: readonly Field[]; readonly required: readonly string[] }
    | { readonly kind: 'reference'; readonly schema: string };

export interface FieldSpec {
    readonly type: FieldType;
    readonly format?: string;
    readonly description: string;
    readonly enum?: readonly ConfigValue[];
    readonly default?: ConfigValue;
    readonly example?: ConfigValue;
}

export interface Field {
    readonly name: string;
    readonly spec: FieldSpec;
}

export type ParameterLocation = 'path' | 'query';

export interface ParameterSpec extends FieldSpec {
    readonly name: string;
    readonly in: ParameterLocation;
    readonly required: boolean;
}

export interface Schema {
    readonly name: string;
    readonly source: string;
    readonly spec: FieldSpec;
}

export interface Endpoint {
    /** Name of the document (API group) that declared it */
    readonly group: string;
    readonly path: string;
    readonly method: HttpMethod;
    readonly summary: string;
    readonly description: string;
    readonly tags: readonly string[];
    readonly body?: BodyDecl;
    /** In placeholder order */
    readonly pathParams: readonly ParameterSpec[];
    /** In declaration order */
    readonly query: readonly ParameterSpec[];
}

export interface ApiGroup {
    readonly name: string;
    readonly source: string;
    readonly endpoints: readonly Endpoint[];
}

/** The validated, immutable model of one or more API documents */
export interface ApiModel {
    readonly groups: readonly ApiGroup[];
    /** Every endpoint of every group, in declaration order */
    readonly endpoints: readonly Endpoint[];
    /** Every schema of every group, in declaration order */
    readonly schemas: readonly Schema[];
    readonly translations: TranslationTable;
}
