/**
 * GeneratorConfig — Project-Level Generator Settings
 *
 * Controls where the API descriptions live, where the generated
 * documents go, which fragments are merged into project files, and the
 * region marker prefix.
 *
 * Can be loaded from `apiweave.yaml` or passed programmatically.
 *
 * @module
 */
import { z } from 'zod';
import { DEFAULT_FRAGMENT_TARGETS, DEFAULT_MARKER_PREFIX } from '@apiweave/engine';
import type { FragmentFeatures, FragmentTargets, OpenApiServer } from '@apiweave/engine';

// ── Sections ─────────────────────────────────────────────

/** The generated OpenAPI document */
export interface OpenApiSettings {
    /** Output path relative to the project root, or `-` for stdout */
    readonly output: string;
    readonly title: string;
    readonly version: string;
    readonly servers: readonly OpenApiServer[];
}

/** The generated translation lookup */
export interface TranslationSettings {
    readonly output: string;
}

export interface MarkerSettings {
    /** `apiweave` → `// apiweave:begin routes` */
    readonly prefix: string;
}

// ── Main Config ──────────────────────────────────────────

export interface GeneratorConfig {
    /** Directory of `*.toml` API descriptions, relative to the project root */
    readonly input: string;
    readonly openapi: OpenApiSettings;
    readonly translations: TranslationSettings;
    /** Which fragments are merged into project files */
    readonly features: FragmentFeatures;
    /** Which file each fragment is merged into */
    readonly targets: FragmentTargets;
    readonly markers: MarkerSettings;
}

// ── File Schema ──────────────────────────────────────────

const SERVER = z.object({
    url: z.string().min(1),
    description: z.string().optional(),
}).strict();

/** Shape of `apiweave.yaml`; every key is optional */
export const CONFIG_FILE_SCHEMA = z.object({
    input: z.string().min(1).optional(),
    openapi: z.object({
        output: z.string().min(1).optional(),
        title: z.string().optional(),
        version: z.string().optional(),
        servers: z.array(SERVER).optional(),
    }).strict().optional(),
    translations: z.object({
        output: z.string().min(1).optional(),
    }).strict().optional(),
    features: z.object({
        routes: z.boolean().optional(),
        translations: z.boolean().optional(),
        readme: z.boolean().optional(),
    }).strict().optional(),
    targets: z.object({
        routes: z.string().min(1).optional(),
        translations: z.string().min(1).optional(),
        readme: z.string().min(1).optional(),
    }).strict().optional(),
    markers: z.object({
        prefix: z.string().regex(/^[A-Za-z0-9_.-]+$/, 'prefix may only contain letters, digits, "_", "." and "-"').optional(),
    }).strict().optional(),
}).strict();

/** Partial config as written in a file */
export type PartialConfig = z.infer<typeof CONFIG_FILE_SCHEMA>;

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_CONFIG: GeneratorConfig = {
    input: 'config/openapi',
    openapi: {
        output: 'public/openapi.json',
        title: 'API',
        version: '1.0.0',
        servers: [],
    },
    translations: {
        output: 'public/translations.json',
    },
    features: {
        routes: true,
        translations: true,
        readme: true,
    },
    targets: DEFAULT_FRAGMENT_TARGETS,
    markers: {
        prefix: DEFAULT_MARKER_PREFIX,
    },
};

// ── Merge ────────────────────────────────────────────────

/**
 * Merge a partial config with defaults, section by section.
 */
export function mergeConfig(partial: PartialConfig): GeneratorConfig {
    const openapi = partial.openapi ?? {};
    const features = partial.features ?? {};
    const targets = partial.targets ?? {};

    return {
        input: partial.input ?? DEFAULT_CONFIG.input,
        openapi: {
            output: openapi.output ?? DEFAULT_CONFIG.openapi.output,
            title: openapi.title ?? DEFAULT_CONFIG.openapi.title,
            version: openapi.version ?? DEFAULT_CONFIG.openapi.version,
            servers: openapi.servers?.map(s => ({
                url: s.url,
                ...(s.description !== undefined ? { description: s.description } : {}),
            })) ?? DEFAULT_CONFIG.openapi.servers,
        },
        translations: {
            output: partial.translations?.output ?? DEFAULT_CONFIG.translations.output,
        },
        features: {
            routes: features.routes ?? DEFAULT_CONFIG.features.routes,
            translations: features.translations ?? DEFAULT_CONFIG.features.translations,
            readme: features.readme ?? DEFAULT_CONFIG.features.readme,
        },
        targets: {
            routes: targets.routes ?? DEFAULT_CONFIG.targets.routes,
            translations: targets.translations ?? DEFAULT_CONFIG.targets.translations,
            readme: targets.readme ?? DEFAULT_CONFIG.targets.readme,
        },
        markers: {
            prefix: partial.markers?.prefix ?? DEFAULT_CONFIG.markers.prefix,
        },
    };
}
