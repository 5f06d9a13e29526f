import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { createProject } from '../../src/scaffold/createProject.js';
import { generateProject } from '../../src/scaffold/generateProject.js';
import { ProgressTracker, silentReporter } from '../../src/progress.js';
import { makeTempDir, read, recordingReporter, removeDir, write } from '../helpers.js';

// ============================================================================
// createProject Tests
// ============================================================================

const quiet = (): ProgressTracker => new ProgressTracker(silentReporter);

describe('createProject', () => {
    let root: string;
    let target: string;

    beforeEach(async () => {
        root = await makeTempDir();
        target = join(root, 'my-api');
    });

    afterEach(async () => {
        await removeDir(root);
    });

    // ── File tree ──

    describe('File tree', () => {
        it('should write every project file in order', async () => {
            const result = await createProject(target, { git: false, tracker: quiet() });

            expect(result.config).toEqual({ name: 'my-api', markerPrefix: 'apiweave' });
            expect(result.files).toEqual([
                'package.json',
                'tsconfig.json',
                '.gitignore',
                'apiweave.yaml',
                'README.md',
                'config/openapi/task.toml',
                'src/types.ts',
                'src/routes.ts',
                'src/translations.ts',
                'src/main.ts',
                'public/openapi.json',
                'public/translations.json',
            ]);
        });

        it('should name the package after the directory', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const pkg: unknown = JSON.parse(await read(target, 'package.json'));
            expect(pkg).toMatchObject({ name: 'my-api', version: '0.1.0', private: true, type: 'module' });
        });

        it('should only depend on packages that install from the registry', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const pkg: unknown = JSON.parse(await read(target, 'package.json'));
            expect(pkg).toMatchObject({
                scripts: { dev: 'tsx watch src/main.ts', start: 'tsx src/main.ts', build: 'tsc' },
                devDependencies: { '@types/node': '^20.17.0', 'tsx': '^4.19.0', 'typescript': '^5.7.3' },
            });
            expect(pkg).not.toHaveProperty('scripts.generate');
            expect(pkg).not.toHaveProperty('devDependencies.apiweave');
            expect(pkg).not.toHaveProperty('dependencies');
        });

        it('should use an explicit name over the directory name', async () => {
            const result = await createProject(target, { name: 'billing', git: false, tracker: quiet() });
            expect(result.config.name).toBe('billing');
            expect(await read(target, 'README.md')).toMatch(/^# billing\n/);
        });
    });

    // ── Generated content ──

    describe('Generated content', () => {
        it('should fill the route region from the sample description', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const routes = await read(target, 'src/routes.ts');
            expect(routes).toContain(
                "    // apiweave:begin routes\n" +
                "    { method: 'POST', path: '/task/new', operationId: 'post_task_new', summary: 'Creates a task', body: 'newTask' },\n",
            );
            expect(routes).toContain('    // apiweave:end routes\n];\n');
        });

        it('should fill the translation region', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const translations = await read(target, 'src/translations.ts');
            expect(translations).toContain(
                '    task: {\n' +
                '        status: [\n' +
                "            { value: 'Open', label: 'To do' },\n" +
                "            { value: 'Done', label: 'Finished' },\n" +
                '        ],\n',
            );
        });

        it('should fill the README endpoint table', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const readme = await read(target, 'README.md');
            expect(readme).toContain('<!-- apiweave:begin endpoints -->\n| Method | Path | Summary |\n| --- | --- | --- |\n');
            expect(readme).toContain('| `POST` | `/task/new` | Creates a task |\n');
        });

        it('should write a valid OpenAPI document', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const doc: unknown = JSON.parse(await read(target, 'public/openapi.json'));
            expect(doc).toMatchObject({ openapi: '3.1.0', info: { title: 'my-api', version: '0.1.0' } });
            expect(doc).toHaveProperty(['paths', '/task/{task_id}/view', 'get', 'operationId'], 'get_task_task_id_view');
        });

        it('should write the translation lookup', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            expect(JSON.parse(await read(target, 'public/translations.json'))).toEqual({
                task: {
                    status: [
                        { value: 'Open', label: 'To do' },
                        { value: 'Done', label: 'Finished' },
                    ],
                    updated_at: [
                        { withinMs: 3_600_000, label: 'Just now' },
                        { withinMs: 86_400_000, label: 'Today' },
                    ],
                },
            });
        });

        it('should write markers with a custom prefix', async () => {
            await createProject(target, { git: false, markerPrefix: 'gen', tracker: quiet() });
            expect(await read(target, 'src/routes.ts')).toContain('    // gen:begin routes\n');
            expect(await read(target, 'apiweave.yaml')).toContain('prefix: gen');
        });

        it('should leave a project that regenerates without changes', async () => {
            await createProject(target, { git: false, tracker: quiet() });
            const report = await generateProject(target, { tracker: quiet() });

            expect(report.created).toEqual([]);
            expect(report.updated).toEqual([]);
            expect(report.patched).toEqual([]);
            expect(report.skipped).toEqual([]);
            expect(report.unchanged).toEqual([
                'src/routes.ts#routes',
                'src/translations.ts#translations',
                'README.md#endpoints',
                'public/openapi.json',
                'public/translations.json',
            ]);
        });
    });

    // ── git ──

    describe('git', () => {
        it('should run git init in the new directory', async () => {
            const runCommand = vi.fn();
            const result = await createProject(target, { runCommand, tracker: quiet() });
            expect(runCommand).toHaveBeenCalledWith('git init', target);
            expect(result.gitInitialized).toBe(true);
        });

        it('should skip git when disabled', async () => {
            const runCommand = vi.fn();
            const result = await createProject(target, { git: false, runCommand, tracker: quiet() });
            expect(runCommand).not.toHaveBeenCalled();
            expect(result.gitInitialized).toBe(false);
        });

        it('should warn instead of failing when git init fails', async () => {
            const { reporter, steps } = recordingReporter();
            const runCommand = vi.fn(() => { throw new Error('git: command not found'); });

            const result = await createProject(target, { runCommand, tracker: new ProgressTracker(reporter) });

            expect(result.gitInitialized).toBe(false);
            expect(steps.at(-1)).toMatchObject({ id: 'git', status: 'warn', detail: 'git: command not found' });
            expect(await read(target, 'package.json')).toContain('"name": "my-api"');
        });
    });

    // ── Refusals ──

    describe('Refusals', () => {
        it('should refuse a directory that is not empty', async () => {
            await write(target, 'notes.txt', 'keep me');
            await expect(createProject(target, { git: false, tracker: quiet() }))
                .rejects.toThrow('already exists and is not empty');
            expect(await read(target, 'notes.txt')).toBe('keep me');
        });

        it('should accept an existing empty directory', async () => {
            const result = await createProject(root, { name: 'inplace', git: false, tracker: quiet() });
            expect(result.files).toHaveLength(12);
        });

        it('should reject an invalid package name', async () => {
            await expect(createProject(target, { name: 'My API', git: false, tracker: quiet() }))
                .rejects.toThrow('Invalid project name "My API"');
        });
    });
});
