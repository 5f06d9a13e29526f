/**
 * ConfigLoader — YAML Configuration File Reader
 *
 * Loads `apiweave.yaml` from the project root or a specified path,
 * validates the structure, and merges with defaults. CLI args override
 * file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { CONFIG_FILE_SCHEMA, mergeConfig, type GeneratorConfig } from './GeneratorConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'apiweave.yaml',
    'apiweave.yml',
    'apiweave.json',
];

// ── Errors ───────────────────────────────────────────────

/** The generator configuration file is missing, unreadable or malformed */
export class ConfigError extends Error {
    readonly file: string;

    constructor(file: string, reason: string, options?: { cause?: unknown }) {
        super(`${file}: ${reason}`, options);
        this.name = 'ConfigError';
        this.file = file;
    }
}

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `apiweave.yaml` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @returns Fully merged GeneratorConfig
 * @throws {ConfigError} When the file is missing or invalid
 */
export function loadConfig(configPath?: string, cwd?: string): GeneratorConfig {
    const workDir = cwd ?? process.cwd();

    // 1. Explicit path
    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new ConfigError(absPath, 'config file not found');
        }
        return parseConfigFile(absPath);
    }

    // 2. Auto-detect
    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    // 3. All defaults
    return mergeConfig({});
}

/**
 * Merge a loaded config with CLI argument overrides.
 *
 * CLI args take precedence over file values.
 */
export function applyCliOverrides(config: GeneratorConfig, cli: CliOverrides): GeneratorConfig {
    return {
        ...config,
        ...(cli.input !== undefined ? { input: cli.input } : {}),
        openapi: {
            ...config.openapi,
            ...(cli.output !== undefined ? { output: cli.output } : {}),
        },
    };
}

/** CLI arguments that can override config file values */
export interface CliOverrides {
    readonly input?: string;
    readonly output?: string;
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): GeneratorConfig {
    const content = readFileSync(filePath, 'utf-8');

    let raw: unknown;
    try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new ConfigError(filePath, `cannot parse: ${detail}`, { cause: err });
    }

    // An empty YAML file parses to null
    const result = CONFIG_FILE_SCHEMA.safeParse(raw ?? {});
    if (!result.success) {
        throw new ConfigError(filePath, describeIssues(result.error.issues));
    }
    return mergeConfig(result.data);
}

function describeIssues(issues: readonly z.ZodIssue[]): string {
    return issues
        .map(issue => {
            const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
            if (issue.code === 'unrecognized_keys') return `unknown key "${issue.keys.join('", "')}" in ${where}`;
            return `${where}: ${issue.message}`;
        })
        .join('; ');
}
