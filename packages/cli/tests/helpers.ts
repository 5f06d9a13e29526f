import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { ProgressReporter, ProgressStep } from '../src/progress.js';

/** Fresh empty directory under the OS temp dir */
export function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'apiweave-'));
}

export function removeDir(dir: string): Promise<void> {
    return rm(dir, { recursive: true, force: true });
}

export function read(root: string, path: string): Promise<string> {
    return readFile(join(root, path), 'utf-8');
}

export async function write(root: string, path: string, content: string): Promise<void> {
    await mkdir(dirname(join(root, path)), { recursive: true });
    await writeFile(join(root, path), content, 'utf-8');
}

/** Reporter that keeps every step it receives */
export function recordingReporter(): { reporter: ProgressReporter; steps: ProgressStep[] } {
    const steps: ProgressStep[] = [];
    return { reporter: step => { steps.push(step); }, steps };
}
