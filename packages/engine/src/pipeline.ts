/**
 * Pipeline — Configuration Text → Generated Artifacts
 *
 * Runs the pure stages in order:
 *
 *   parse (each source) → normalize (all sources) → OpenAPI + translations → fragments
 *
 * A {@link ParseError} is thrown at the first malformed source.
 * Validation problems come back together as a failed {@link Result}.
 * Nothing here touches the filesystem.
 *
 * @module
 */
import type { ApiModel } from './ir/types.js';
import { buildOpenApiDocument, serializeDocument, type DocumentOptions } from './openapi/OpenApiMapper.js';
import type { OpenApiDocument } from './openapi/types.js';
import type { FragmentTemplate } from './merge/types.js';
import { parseApiDocument } from './parser/ConfigParser.js';
import { renderFragments, type FragmentOptions } from './render/FragmentRenderer.js';
import { succeed, type Result } from './result.js';
import type { TranslationTable } from './translation/TranslationTable.js';
import { normalizeDocuments } from './validator/Normalizer.js';

export interface SourceDocument {
    /** Name used in error locations, usually the file path */
    readonly source: string;
    readonly text: string;
}

export interface GenerateOptions extends DocumentOptions {
    readonly fragments?: FragmentOptions;
}

export interface Artifacts {
    readonly model: ApiModel;
    readonly openapi: OpenApiDocument;
    /** Serialized OpenAPI document, byte-stable for unchanged input */
    readonly openapiJson: string;
    readonly translations: TranslationTable;
    /** Serialized translation lookup */
    readonly translationsJson: string;
    readonly fragments: readonly FragmentTemplate[];
}

/**
 * Generate every artifact for a set of configuration sources.
 *
 * @throws {ParseError} When a source is malformed
 */
export function generateArtifacts(sources: readonly SourceDocument[], options: GenerateOptions): Result<Artifacts> {
    const documents = sources.map(({ source, text }) => parseApiDocument(text, source));

    const normalized = normalizeDocuments(documents);
    if (!normalized.ok) return normalized;

    const model = normalized.value;
    const openapi = buildOpenApiDocument(model, options);
    return succeed({
        model,
        openapi,
        openapiJson: serializeDocument(openapi),
        translations: model.translations,
        translationsJson: JSON.stringify(model.translations.toLookup(), null, 2) + '\n',
        fragments: renderFragments(openapi, model.translations, options.fragments),
    });
}
