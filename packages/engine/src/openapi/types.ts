/**
 * OpenAPI 3.1 Document Structure
 *
 * Only the subset the mapper emits.
 *
 * @module
 */

export type JsonValue =
    | string
    | number
    | boolean
    | null
    | readonly JsonValue[]
    | { readonly [key: string]: JsonValue };

export interface JsonSchema {
    readonly $ref?: string;
    readonly type?: string;
    readonly format?: string;
    readonly items?: JsonSchema;
    readonly properties?: Readonly<Record<string, JsonSchema>>;
    readonly required?: readonly string[];
    readonly enum?: readonly JsonValue[];
    readonly default?: JsonValue;
    readonly example?: JsonValue;
    readonly description?: string;
}

export interface OpenApiInfo {
    readonly title: string;
    readonly version: string;
    readonly description?: string;
}

export interface OpenApiServer {
    readonly url: string;
    readonly description?: string;
}

export interface OpenApiTag {
    readonly name: string;
}

export interface OpenApiParameter {
    readonly name: string;
    readonly in: 'path' | 'query';
    readonly description?: string;
    readonly required: boolean;
    readonly schema: JsonSchema;
}

export interface OpenApiRequestBody {
    readonly description?: string;
    readonly required: boolean;
    readonly content: Readonly<Record<string, { readonly schema: JsonSchema }>>;
}

export interface OpenApiResponse {
    readonly description: string;
}

export interface OpenApiOperation {
    readonly tags: readonly string[];
    readonly summary?: string;
    readonly description?: string;
    readonly operationId: string;
    readonly parameters?: readonly OpenApiParameter[];
    readonly requestBody?: OpenApiRequestBody;
    readonly responses: Readonly<Record<string, OpenApiResponse>>;
}

export type OpenApiMethod = 'get' | 'post' | 'put' | 'delete' | 'patch';

export type OpenApiPathItem = Partial<Record<OpenApiMethod, OpenApiOperation>>;

export interface OpenApiDocument {
    readonly openapi: string;
    readonly info: OpenApiInfo;
    readonly servers?: readonly OpenApiServer[];
    readonly tags: readonly OpenApiTag[];
    readonly paths: Readonly<Record<string, OpenApiPathItem>>;
    readonly components: {
        readonly schemas: Readonly<Record<string, JsonSchema>>;
    };
}
