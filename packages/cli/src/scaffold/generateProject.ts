/**
 * generateProject — `apiweave generate`
 *
 * Regenerates an existing project from its API descriptions:
 *
 *   1. load settings (`apiweave.yaml` + CLI overrides)
 *   2. read `<input>/*.toml` in file-name order
 *   3. parse (fatal) → validate (fatal batch) → map → render
 *   4. snapshot every merge target and document output in parallel
 *   5. plan region patches against the snapshot
 *   6. write the documents and patched files one file at a time
 *
 * Every read happens before step 6. From there on a failed write is
 * recorded against its file and the remaining files are still written.
 * Files are never deleted. Relative paths are taken from the project
 * root; absolute ones are used as given.
 *
 * @module
 */
import { join, resolve } from 'node:path';
import { readFile } from 'node:fs/promises';
import {
    generateArtifacts, planMerge, resolveWrites, unwrap, ProjectIOError,
    type FileOperation, type SkipOperation, type SourceDocument,
} from '@apiweave/engine';
import { applyCliOverrides, ConfigError, loadConfig, type CliOverrides } from '../config/ConfigLoader.js';
import type { GeneratorConfig } from '../config/GeneratorConfig.js';
import { ProgressTracker } from '../progress.js';
import { listTomlFiles, snapshotTree, writeProjectFile } from './ProjectFiles.js';

export interface GenerateOptions {
    /** Explicit config file, relative to the project */
    readonly configPath?: string;
    readonly overrides?: CliOverrides;
    /** Plan and report without writing */
    readonly dryRun?: boolean;
    /** Receives the OpenAPI document when its output is `-` */
    readonly stdout?: (text: string) => void;
    readonly tracker?: ProgressTracker;
}

export interface GenerateReport {
    readonly config: GeneratorConfig;
    /** Source files, project-relative */
    readonly sources: readonly string[];
    /** Region operations planned against the snapshot */
    readonly operations: readonly FileOperation[];
    /** Files that did not exist before */
    readonly created: readonly string[];
    /** Whole generated documents rewritten with new content */
    readonly updated: readonly string[];
    /** Files whose marked regions were rewritten */
    readonly patched: readonly string[];
    readonly skipped: readonly SkipOperation[];
    /** Documents and regions already up to date */
    readonly unchanged: readonly string[];
    readonly failed: readonly ProjectIOError[];
    readonly dryRun: boolean;
}

/**
 * Regenerate the project rooted at `projectDir`.
 *
 * @throws {ConfigError} When the settings file is invalid or two outputs share a path
 * @throws {ParseError} When an API description is malformed
 * @throws {ValidationFailedError} With every validation error found
 * @throws {ProjectIOError} When the input directory cannot be read
 */
export async function generateProject(projectDir: string, options: GenerateOptions = {}): Promise<GenerateReport> {
    const root = resolve(projectDir);
    const tracker = options.tracker ?? new ProgressTracker();
    const dryRun = options.dryRun ?? false;

    const config = applyCliOverrides(loadConfig(options.configPath, root), options.overrides ?? {});

    // ── Read & generate ──────────────────────────────────
    tracker.start('read', 'Reading API descriptions');
    const inputDir = resolve(root, config.input);
    const names = await listTomlFiles(inputDir);
    const sources: SourceDocument[] = await Promise.all(names.map(async name => {
        const source = `${config.input}/${name}`;
        try {
            return { source, text: await readFile(join(inputDir, name), 'utf-8') };
        } catch (err) {
            throw new ProjectIOError(source, 'read', err);
        }
    }));
    tracker.done('read', 'Reading API descriptions', `${sources.length} file${sources.length !== 1 ? 's' : ''}`);

    tracker.start('generate', 'Validating and mapping');
    const artifacts = unwrap(generateArtifacts(sources, {
        info: { title: config.openapi.title, version: config.openapi.version },
        servers: config.openapi.servers,
        fragments: { features: config.features, targets: config.targets },
    }));
    tracker.done('generate', 'Validating and mapping',
        `${artifacts.model.endpoints.length} endpoints, ${artifacts.model.schemas.length} schemas`);

    // ── Plan ─────────────────────────────────────────────
    tracker.start('plan', 'Planning file changes');
    const documents: [string, string][] = [
        [config.openapi.output, artifacts.openapiJson],
        [config.translations.output, artifacts.translationsJson],
    ];
    assertDistinctOutputs(root, [
        ...artifacts.fragments.map((f): [string, string] => [MARKED_REGION, f.path]),
        ['openapi.output', config.openapi.output],
        ['translations.output', config.translations.output],
    ]);

    const snapshot = await snapshotTree(root, [
        ...artifacts.fragments.map(f => f.path),
        ...documents.map(([path]) => path).filter(path => path !== STDOUT),
    ]);
    const unreadable = new Set(snapshot.failures.map(f => f.path));
    const fragments = artifacts.fragments.filter(f => !unreadable.has(f.path));
    const prefix = config.markers.prefix;
    const operations = planMerge(fragments, snapshot.tree, { prefix });
    const writes = resolveWrites(operations, snapshot.tree, { prefix });
    tracker.done('plan', 'Planning file changes', `${operations.length} operation${operations.length !== 1 ? 's' : ''}`);

    const created: string[] = [];
    const updated: string[] = [];
    const patched: string[] = [];
    const unchanged: string[] = [];
    const failed: ProjectIOError[] = [...snapshot.failures];

    const touched = new Set(operations.flatMap(op => op.kind === 'create' ? [] : [`${op.path}#${op.region ?? ''}`]));
    for (const fragment of fragments) {
        const key = `${fragment.path}#${fragment.region}`;
        if (!touched.has(key)) unchanged.push(key);
    }

    // ── Write ────────────────────────────────────────────
    tracker.start('write', dryRun ? 'Dry run' : 'Writing files');

    for (const [path, content] of documents) {
        if (path === STDOUT) {
            (options.stdout ?? writeStdout)(content);
            continue;
        }
        if (unreadable.has(path)) continue;
        const existing = snapshot.tree.get(path);
        if (existing === content) {
            unchanged.push(path);
            continue;
        }
        try {
            if (!dryRun) await writeProjectFile(root, path, content);
            (existing === undefined ? created : updated).push(path);
        } catch (err) {
            failed.push(err instanceof ProjectIOError ? err : new ProjectIOError(path, 'write', err));
        }
    }

    for (const write of writes) {
        try {
            if (!dryRun) await writeProjectFile(root, write.path, write.content);
            (write.kind === 'create' ? created : patched).push(write.path);
        } catch (err) {
            failed.push(err instanceof ProjectIOError ? err : new ProjectIOError(write.path, 'write', err));
        }
    }

    const skipped = operations.filter((op): op is SkipOperation => op.kind === 'skip');
    const summary = formatSummary({ created, updated, patched, skipped, unchanged, failed });
    const label = dryRun ? 'Dry run' : 'Writing files';
    if (failed.length > 0) tracker.fail('write', label, summary);
    else if (skipped.length > 0) tracker.warn('write', label, summary);
    else tracker.done('write', label, summary);

    return {
        config,
        sources: sources.map(s => s.source),
        operations,
        created,
        updated,
        patched,
        skipped,
        unchanged,
        failed,
        dryRun,
    };
}

/** Output path that sends a document to stdout */
const STDOUT = '-';

const MARKED_REGION = 'a marked region';

/**
 * A document output may not share its path with the other document or
 * with a merge target. Regions of one file share it freely.
 */
function assertDistinctOutputs(root: string, outputs: readonly [string, string][]): void {
    const seen = new Map<string, string>();
    for (const [name, path] of outputs) {
        if (path === STDOUT) continue;
        const key = resolve(root, path);
        const other = seen.get(key);
        if (other !== undefined && other !== name) {
            throw new ConfigError(name, `"${path}" is already written by ${other}`);
        }
        seen.set(key, name);
    }
}

function writeStdout(text: string): void {
    process.stdout.write(text);
}

/** `1 created, 0 updated, 2 patched, 0 skipped, 3 unchanged` */
export function formatSummary(report: Pick<GenerateReport, 'created' | 'updated' | 'patched' | 'skipped' | 'unchanged' | 'failed'>): string {
    const parts = [
        `${report.created.length} created`,
        `${report.updated.length} updated`,
        `${report.patched.length} patched`,
        `${report.skipped.length} skipped`,
        `${report.unchanged.length} unchanged`,
    ];
    if (report.failed.length > 0) parts.push(`${report.failed.length} failed`);
    return parts.join(', ');
}
