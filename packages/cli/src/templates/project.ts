/**
 * Project Templates — Root Files
 *
 * Each function receives a ProjectConfig and returns the file contents.
 *
 * @module
 */
import { stringify as stringifyYaml } from 'yaml';
import { DEFAULT_CONFIG } from '../config/GeneratorConfig.js';
import type { ProjectConfig } from '../scaffold/types.js';

// ── Versions ─────────────────────────────────────────────

const TSX_VERSION = '^4.19.0';
const TYPESCRIPT_VERSION = '^5.7.3';
const NODE_TYPES_VERSION = '^20.17.0';

export const PROJECT_VERSION = '0.1.0';

// ── package.json ─────────────────────────────────────────

/** The generator runs from the `apiweave` that created the project, so it is not a dependency */
export function packageJson(config: ProjectConfig): string {
    const pkg = {
        name: config.name,
        version: PROJECT_VERSION,
        private: true,
        type: 'module',
        scripts: {
            dev: 'tsx watch src/main.ts',
            start: 'tsx src/main.ts',
            build: 'tsc',
        },
        engines: {
            node: '>=20',
        },
        devDependencies: {
            '@types/node': NODE_TYPES_VERSION,
            'tsx': TSX_VERSION,
            'typescript': TYPESCRIPT_VERSION,
        },
    };
    return JSON.stringify(pkg, null, 2) + '\n';
}

// ── tsconfig.json ────────────────────────────────────────

export function tsconfig(): string {
    return JSON.stringify({
        compilerOptions: {
            target: 'ES2022',
            module: 'NodeNext',
            moduleResolution: 'NodeNext',
            strict: true,
            outDir: 'dist',
            rootDir: 'src',
            skipLibCheck: true,
            resolveJsonModule: true,
        },
        include: ['src'],
    }, null, 2) + '\n';
}

// ── .gitignore ───────────────────────────────────────────

export function gitignore(): string {
    return `node_modules/
dist/
certs/
*.log
.env
`;
}

// ── apiweave.yaml ────────────────────────────────────────

/** Generator settings, with the defaults spelled out so they are easy to change */
export function generatorConfig(config: ProjectConfig): string {
    const settings = {
        input: DEFAULT_CONFIG.input,
        openapi: {
            output: DEFAULT_CONFIG.openapi.output,
            title: config.name,
            version: PROJECT_VERSION,
        },
        translations: {
            output: DEFAULT_CONFIG.translations.output,
        },
        features: { ...DEFAULT_CONFIG.features },
        markers: {
            prefix: config.markerPrefix,
        },
    };
    return `# apiweave generator settings\n${stringifyYaml(settings)}`;
}
