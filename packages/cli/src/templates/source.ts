/**
 * Project Templates — Source Files
 *
 * The route and translation modules carry empty marked regions; the
 * scaffolder fills them from the sample API description before writing,
 * and `apiweave generate` keeps them current afterwards. Everything
 * outside the markers belongs to the developer.
 *
 * @module
 */
import { markerLines } from '@apiweave/engine';
import type { ProjectConfig } from '../scaffold/types.js';

// ── src/types.ts ─────────────────────────────────────────

export function typesTs(): string {
    return `/** Shapes of the generated route and translation tables */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export interface RouteSpec {
    readonly method: HttpMethod;
    readonly path: string;
    readonly operationId: string;
    readonly summary: string;
    /** Request body schema name */
    readonly body?: string;
}

export type TranslationRule =
    | { readonly value: string; readonly label: string }
    | { readonly withinMs: number; readonly label: string };

export type TranslationRules = Readonly<Record<string, Readonly<Record<string, readonly TranslationRule[]>>>>;
`;
}

// ── src/routes.ts ────────────────────────────────────────

export function routesTs(config: ProjectConfig): string {
    const { begin, end } = markerLines('src/routes.ts', 'routes', config.markerPrefix);
    return `import type { RouteSpec } from './types.js';

/**
 * Route table. Entries between the markers are rebuilt by
 * \`apiweave generate\`; add hand-written routes outside them.
 */
export const routes: RouteSpec[] = [
    ${begin}
    ${end}
];
`;
}

// ── src/translations.ts ──────────────────────────────────

export function translationsTs(config: ProjectConfig): string {
    const { begin, end } = markerLines('src/translations.ts', 'translations', config.markerPrefix);
    return `import type { TranslationRules } from './types.js';

/**
 * Field value labels, rebuilt from the [models.*] tables by
 * \`apiweave generate\`.
 */
export const translations: TranslationRules = {
    ${begin}
    ${end}
};

/** Label of the first matching rule, or undefined */
export function translate(model: string, field: string, value: unknown, asOf: number = Date.now()): string | undefined {
    const rules = translations[model]?.[field] ?? [];
    for (const rule of rules) {
        if ('value' in rule) {
            if (String(value) === rule.value) return rule.label;
            continue;
        }
        const time = value instanceof Date ? value.getTime() : typeof value === 'string' ? Date.parse(value) : Number(value);
        if (!Number.isNaN(time) && asOf - time <= rule.withinMs) return rule.label;
    }
    return undefined;
}
`;
}

// ── src/main.ts ──────────────────────────────────────────

export function mainTs(): string {
    return `import { routes } from './routes.js';
import { translate } from './translations.js';

for (const route of routes) {
    console.log(route.method.padEnd(7) + route.path.padEnd(32) + route.summary);
}

console.log(translate('task', 'status', 'Done') ?? '(no label)');
`;
}
