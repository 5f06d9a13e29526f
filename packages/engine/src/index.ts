/**
 * @apiweave/engine — Root Barrel Export
 *
 * Public API for programmatic usage.
 *
 * @example
 * ```typescript
 * import { generateArtifacts, planMerge, unwrap } from '@apiweave/engine';
 *
 * const artifacts = unwrap(generateArtifacts(
 *     [{ source: 'users.toml', text }],
 *     { info: { title: 'Users API', version: '1.0.0' } },
 * ));
 * const operations = planMerge(artifacts.fragments, tree);
 * ```
 *
 * @module
 */

// ── Errors & Results ─────────────────────────────────────
export {
    ParseError, ValidationError, ValidationFailedError,
    MergeConflict, ProjectIOError,
} from './errors.js';
export type { ValidationCode } from './errors.js';
export { succeed, fail, unwrap } from './result.js';
export type { Result, Success, Failure } from './result.js';

// ── IR ───────────────────────────────────────────────────
export { HTTP_METHODS, PRIMITIVE_TYPES } from './ir/types.js';
export type {
    HttpMethod, PrimitiveType, ConfigValue,
    ApiDocument, EndpointDecl, SchemaDecl, TranslationDecl, BodyDecl,
    FieldDecl, NamedFieldDecl, ParameterDecl, NamedParameterDecl,
    ApiModel, ApiGroup, Endpoint, Schema, Field, FieldSpec, FieldType,
    ParameterSpec, ParameterLocation,
} from './ir/types.js';

// ── Parser ───────────────────────────────────────────────
export { parseApiDocument, SCHEMA_META_KEYS } from './parser/ConfigParser.js';
export { locate, formatPath } from './parser/SourceLocator.js';
export type { ValuePath, SourcePosition } from './parser/SourceLocator.js';

// ── Validator ────────────────────────────────────────────
export { normalizeDocuments, normalizeDocument, pathPlaceholders } from './validator/Normalizer.js';

// ── OpenAPI ──────────────────────────────────────────────
export {
    buildOpenApiDocument, serializeDocument, mapFieldSpec, schemaRef, OPENAPI_VERSION,
} from './openapi/OpenApiMapper.js';
export type { DocumentOptions } from './openapi/OpenApiMapper.js';
export type {
    OpenApiDocument, OpenApiOperation, OpenApiParameter, OpenApiInfo,
    OpenApiServer, JsonSchema, JsonValue,
} from './openapi/types.js';

// ── Translations ─────────────────────────────────────────
export {
    TranslationTable, compileTranslations, parseMatcher, SPAN_PREFIX,
} from './translation/TranslationTable.js';
export type {
    TranslationMatcher, TranslationRule, TranslationEntry, TranslationLookup,
    LookupRule, TranslateOptions, Instant,
} from './translation/TranslationTable.js';
export { parseDuration } from './translation/Duration.js';

// ── Rendering ────────────────────────────────────────────
export {
    renderFragments, renderRoutes, renderTranslations, renderEndpointTable,
    DEFAULT_FRAGMENT_TARGETS,
} from './render/FragmentRenderer.js';
export type { FragmentFeatures, FragmentTargets, FragmentOptions } from './render/FragmentRenderer.js';
export { toSnakeCase } from './render/TemplateHelpers.js';

// ── Merge ────────────────────────────────────────────────
export {
    planMerge, resolveWrites, applyPatches, spliceRegion, formatFragment, lineEnding,
} from './merge/RegionMerger.js';
export type { MergeOptions, FileWrite } from './merge/RegionMerger.js';
export { commentSyntax, markerLines, findRegion, DEFAULT_MARKER_PREFIX } from './merge/RegionMarkers.js';
export type { CommentSyntax, RegionBounds } from './merge/RegionMarkers.js';
export type {
    Template, FileTemplate, FragmentTemplate,
    FileOperation, CreateOperation, PatchOperation, SkipOperation, FileTree,
} from './merge/types.js';

// ── Pipeline ─────────────────────────────────────────────
export { generateArtifacts } from './pipeline.js';
export type { SourceDocument, GenerateOptions, Artifacts } from './pipeline.js';
