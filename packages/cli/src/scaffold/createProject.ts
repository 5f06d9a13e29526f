/**
 * createProject — `apiweave new`
 *
 * Builds the complete file tree of a new project in memory, runs the
 * generation pipeline on the bundled sample API description, splices the
 * generated fragments into the templates, and only then writes anything.
 * A parse, validation or merge failure leaves the target untouched.
 *
 * @module
 */
import { execSync } from 'node:child_process';
import { basename } from 'node:path';
import {
    generateArtifacts, planMerge, unwrap, MergeConflict,
    type FileTemplate, type Template,
} from '@apiweave/engine';
import { DEFAULT_CONFIG } from '../config/GeneratorConfig.js';
import { ProgressTracker } from '../progress.js';
import * as tpl from '../templates/index.js';
import { isEmptyDirectory, writeProjectFile } from './ProjectFiles.js';
import { PROJECT_NAME_PATTERN, type CommandRunner, type ProjectConfig } from './types.js';

export interface CreateOptions {
    /** Package name (default: the target directory name) */
    readonly name?: string;
    /** Run `git init` after writing (default: true) */
    readonly git?: boolean;
    /** Region marker prefix (default: `apiweave`) */
    readonly markerPrefix?: string;
    readonly runCommand?: CommandRunner;
    readonly tracker?: ProgressTracker;
}

export interface CreateResult {
    readonly config: ProjectConfig;
    /** Project-relative paths, in write order */
    readonly files: readonly string[];
    readonly gitInitialized: boolean;
}

/** Default runner: a synchronous child process with output suppressed */
export const execCommand: CommandRunner = (command, cwd) => {
    execSync(command, { cwd, stdio: 'ignore', timeout: 30_000 });
};

// ── Scaffold ─────────────────────────────────────────────

/**
 * Create a new project in `targetDir`.
 *
 * @throws {Error} When the name is invalid or the directory is not empty
 * @throws {ParseError | ValidationFailedError} When the sample description is broken
 * @throws {MergeConflict} When a template lacks a region marker
 * @throws {ProjectIOError} When a file cannot be written
 */
export async function createProject(targetDir: string, options: CreateOptions = {}): Promise<CreateResult> {
    const tracker = options.tracker ?? new ProgressTracker();
    const config: ProjectConfig = {
        name: options.name ?? basename(targetDir),
        markerPrefix: options.markerPrefix ?? DEFAULT_CONFIG.markers.prefix,
    };

    if (!PROJECT_NAME_PATTERN.test(config.name)) {
        throw new Error(`Invalid project name "${config.name}": use lowercase letters, digits, ".", "_" and "-"`);
    }
    if (!await isEmptyDirectory(targetDir)) {
        throw new Error(`Directory "${targetDir}" already exists and is not empty`);
    }

    tracker.start('render', 'Rendering templates');
    const files = buildFileList(config);
    const sample = files.find(f => f.path === tpl.SAMPLE_API_PATH);
    const artifacts = unwrap(generateArtifacts(
        sample ? [{ source: sample.path, text: sample.content }] : [],
        {
            info: { title: config.name, version: tpl.PROJECT_VERSION },
            fragments: { features: DEFAULT_CONFIG.features, targets: DEFAULT_CONFIG.targets },
        },
    ));

    const templates: Template[] = [
        ...files,
        { kind: 'file', path: DEFAULT_CONFIG.openapi.output, content: artifacts.openapiJson },
        { kind: 'file', path: DEFAULT_CONFIG.translations.output, content: artifacts.translationsJson },
        ...artifacts.fragments,
    ];

    const operations = planMerge(templates, new Map(), { prefix: config.markerPrefix });
    const writes: FileTemplate[] = [];
    for (const op of operations) {
        if (op.kind === 'skip') throw new MergeConflict(op.path, op.region ?? '', op.reason);
        if (op.kind === 'create') writes.push({ kind: 'file', path: op.path, content: op.content });
    }
    tracker.done('render', 'Rendering templates', `${writes.length} files, ${artifacts.model.endpoints.length} endpoints`);

    tracker.start('write', 'Writing files');
    for (const file of writes) {
        await writeProjectFile(targetDir, file.path, file.content);
    }
    tracker.done('write', 'Writing files', targetDir);

    let gitInitialized = false;
    if (options.git ?? true) {
        tracker.start('git', 'Initializing git repository');
        try {
            (options.runCommand ?? execCommand)('git init', targetDir);
            gitInitialized = true;
            tracker.done('git', 'Initializing git repository');
        } catch (err) {
            const detail = err instanceof Error ? err.message : String(err);
            tracker.warn('git', 'git init failed, run it manually', detail);
        }
    }

    return { config, files: writes.map(f => f.path), gitInitialized };
}

// ── File List Builder ────────────────────────────────────

function buildFileList(config: ProjectConfig): FileTemplate[] {
    const files: FileTemplate[] = [];
    const add = (path: string, content: string): void => {
        files.push({ kind: 'file', path, content });
    };

    // ── Root files ───────────────────────────────────────
    add('package.json', tpl.packageJson(config));
    add('tsconfig.json', tpl.tsconfig());
    add('.gitignore', tpl.gitignore());
    add('apiweave.yaml', tpl.generatorConfig(config));
    add('README.md', tpl.readme(config));

    // ── API description ──────────────────────────────────
    add(tpl.SAMPLE_API_PATH, tpl.sampleApiToml());

    // ── Sources ──────────────────────────────────────────
    add('src/types.ts', tpl.typesTs());
    add('src/routes.ts', tpl.routesTs(config));
    add('src/translations.ts', tpl.translationsTs(config));
    add('src/main.ts', tpl.mainTs());

    return files;
}
