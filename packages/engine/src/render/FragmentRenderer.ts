/**
 * FragmentRenderer — Generated Regions for Project Files
 *
 * Renders the text that goes between region markers in hand-edited
 * project files. Consumes the outputs of the two mappers (the OpenAPI
 * document and the translation table), never the raw configuration.
 *
 *   Region        → Default target
 *   `routes`        src/routes.ts      route table entries
 *   `translations`  src/translations.ts translation rules literal
 *   `endpoints`     README.md          Markdown endpoint table
 *
 * Output is deterministic; fragments carry no indentation of their own
 * (the merger indents them to the begin marker).
 *
 * @module
 */
import type { FragmentTemplate } from '../merge/types.js';
import type { OpenApiDocument, OpenApiOperation } from '../openapi/types.js';
import type { TranslationTable } from '../translation/TranslationTable.js';
import { escapeMarkdownCell, escapeTs, indent, tsKey } from './TemplateHelpers.js';

// ── Options ──────────────────────────────────────────────

export interface FragmentFeatures {
    readonly routes: boolean;
    readonly translations: boolean;
    readonly readme: boolean;
}

export interface FragmentTargets {
    readonly routes: string;
    readonly translations: string;
    readonly readme: string;
}

export const DEFAULT_FRAGMENT_TARGETS: FragmentTargets = {
    routes: 'src/routes.ts',
    translations: 'src/translations.ts',
    readme: 'README.md',
};

export interface FragmentOptions {
    readonly features?: Partial<FragmentFeatures>;
    readonly targets?: Partial<FragmentTargets>;
}

// ── Public API ───────────────────────────────────────────

/**
 * Render every enabled fragment.
 */
export function renderFragments(
    document: OpenApiDocument,
    translations: TranslationTable,
    options: FragmentOptions = {},
): FragmentTemplate[] {
    const features: FragmentFeatures = { routes: true, translations: true, readme: true, ...options.features };
    const targets: FragmentTargets = { ...DEFAULT_FRAGMENT_TARGETS, ...options.targets };
    const fragments: FragmentTemplate[] = [];

    if (features.routes) {
        fragments.push({ kind: 'fragment', path: targets.routes, region: 'routes', content: renderRoutes(document) });
    }
    if (features.translations) {
        fragments.push({
            kind: 'fragment', path: targets.translations, region: 'translations',
            content: renderTranslations(translations),
        });
    }
    if (features.readme) {
        fragments.push({ kind: 'fragment', path: targets.readme, region: 'endpoints', content: renderEndpointTable(document) });
    }

    return fragments;
}

/**
 * One `RouteSpec` literal per operation.
 *
 * @example
 * { method: 'POST', path: '/user/new', operationId: 'post_user_new', summary: 'Creates a new user', body: 'newUser' },
 */
export function renderRoutes(document: OpenApiDocument): string {
    return operations(document)
        .map(({ method, path, operation }) => {
            const body = bodySchema(operation);
            const parts = [
                `method: '${method}'`,
                `path: '${escapeTs(path)}'`,
                `operationId: '${escapeTs(operation.operationId)}'`,
                `summary: '${escapeTs(operation.summary ?? '')}'`,
                ...(body !== undefined ? [`body: '${escapeTs(body)}'`] : []),
            ];
            return `{ ${parts.join(', ')} },\n`;
        })
        .join('');
}

/**
 * Object-literal entries keyed by model, then field.
 *
 * @example
 * user: {
 *     status: [
 *         { value: 'Active', label: 'Active user' },
 *     ],
 * },
 */
export function renderTranslations(table: TranslationTable): string {
    const lines: string[] = [];
    for (const model of table.models()) {
        lines.push(`${tsKey(model)}: {`);
        for (const field of table.fields(model)) {
            lines.push(indent(`${tsKey(field)}: [`, '    '));
            for (const { matcher, label } of table.rules(model, field)) {
                const rule = matcher.kind === 'literal'
                    ? `{ value: '${escapeTs(matcher.value)}', label: '${escapeTs(label)}' },`
                    : `{ withinMs: ${matcher.durationMs}, label: '${escapeTs(label)}' },`;
                lines.push(indent(rule, '        '));
            }
            lines.push(indent('],', '    '));
        }
        lines.push('},');
    }
    return lines.map(line => `${line}\n`).join('');
}

/** Markdown table of every operation */
export function renderEndpointTable(document: OpenApiDocument): string {
    const rows = operations(document).map(({ method, path, operation }) =>
        `| \`${method}\` | \`${escapeMarkdownCell(path)}\` | ${escapeMarkdownCell(operation.summary ?? '')} |`);
    return ['| Method | Path | Summary |', '| --- | --- | --- |', ...rows].map(line => `${line}\n`).join('');
}

// ── Helpers ──────────────────────────────────────────────

interface OperationEntry {
    readonly method: string;
    readonly path: string;
    readonly operation: OpenApiOperation;
}

function operations(document: OpenApiDocument): OperationEntry[] {
    const entries: OperationEntry[] = [];
    for (const [path, item] of Object.entries(document.paths)) {
        for (const [method, operation] of Object.entries(item)) {
            if (operation) entries.push({ method: method.toUpperCase(), path, operation });
        }
    }
    return entries;
}

function bodySchema(operation: OpenApiOperation): string | undefined {
    const ref = operation.requestBody?.content['application/json']?.schema.$ref;
    return ref?.slice(ref.lastIndexOf('/') + 1);
}
