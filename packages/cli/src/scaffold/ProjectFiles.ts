/**
 * ProjectFiles — Filesystem Access for the Scaffolder
 *
 * Paths given to these helpers are resolved against the project root, so
 * an absolute path is used as is. Every failure is wrapped in a
 * {@link ProjectIOError} naming the file.
 *
 * @module
 */
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { ProjectIOError } from '@apiweave/engine';

/** Snapshot of merge targets, plus the files that could not be read */
export interface TreeSnapshot {
    readonly tree: ReadonlyMap<string, string>;
    readonly failures: readonly ProjectIOError[];
}

/**
 * Read every listed file in parallel. Missing files are simply absent
 * from the tree.
 */
export async function snapshotTree(root: string, paths: readonly string[]): Promise<TreeSnapshot> {
    const unique = [...new Set(paths)];
    const settled = await Promise.allSettled(unique.map(path => readOptional(root, path)));

    const tree = new Map<string, string>();
    const failures: ProjectIOError[] = [];
    settled.forEach((outcome, i) => {
        const path = unique[i] ?? '';
        if (outcome.status === 'rejected') {
            failures.push(new ProjectIOError(path, 'read', outcome.reason));
        } else if (outcome.value !== undefined) {
            tree.set(path, outcome.value);
        }
    });
    return { tree, failures };
}

/** File text, or `undefined` when it does not exist */
export async function readOptional(root: string, path: string): Promise<string | undefined> {
    try {
        return await readFile(resolve(root, path), 'utf-8');
    } catch (err) {
        if (isNotFound(err)) return undefined;
        throw err;
    }
}

/**
 * Write a file, creating parent directories.
 *
 * @throws {ProjectIOError}
 */
export async function writeProjectFile(root: string, path: string, content: string): Promise<void> {
    const fullPath = resolve(root, path);
    try {
        await mkdir(dirname(fullPath), { recursive: true });
        await writeFile(fullPath, content, 'utf-8');
    } catch (err) {
        throw new ProjectIOError(path, 'write', err);
    }
}

/** `true` when the directory is missing or has no entries */
export async function isEmptyDirectory(dir: string): Promise<boolean> {
    try {
        return (await readdir(dir)).length === 0;
    } catch (err) {
        if (isNotFound(err)) return true;
        throw new ProjectIOError(dir, 'read directory', err);
    }
}

/** `*.toml` files of a directory, sorted by name */
export async function listTomlFiles(dir: string): Promise<string[]> {
    try {
        const entries = await readdir(dir, { withFileTypes: true });
        return entries
            .filter(entry => entry.isFile() && entry.name.endsWith('.toml'))
            .map(entry => entry.name)
            .sort();
    } catch (err) {
        throw new ProjectIOError(dir, 'read directory', err);
    }
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
