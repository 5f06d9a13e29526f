/**
 * apiweave — CLI package
 *
 * The commands behind the `apiweave` executable, usable as functions.
 *
 * @module
 */

// ── CLI ──────────────────────────────────────────────────
export {
    run, parseArgs, formatError, commandNew, commandGenerate, commandCert,
    processIO, HELP, APIWEAVE_VERSION,
} from './cli.js';
export type { CliArgs, CliIO } from './cli.js';

// ── Configuration ────────────────────────────────────────
export { loadConfig, applyCliOverrides, ConfigError, CONFIG_FILENAMES } from './config/ConfigLoader.js';
export type { CliOverrides } from './config/ConfigLoader.js';
export { CONFIG_FILE_SCHEMA, DEFAULT_CONFIG, mergeConfig } from './config/GeneratorConfig.js';
export type {
    GeneratorConfig, PartialConfig, OpenApiSettings, TranslationSettings, MarkerSettings,
} from './config/GeneratorConfig.js';

// ── Commands ─────────────────────────────────────────────
export { createProject, execCommand } from './scaffold/createProject.js';
export type { CreateOptions, CreateResult } from './scaffold/createProject.js';
export { generateProject, formatSummary } from './scaffold/generateProject.js';
export type { GenerateOptions, GenerateReport } from './scaffold/generateProject.js';
export { provisionCertificateSettings, generateAccountKey, acmeToml } from './cert/provision.js';
export type { CertOptions, CertResult } from './cert/provision.js';
export type { ProjectConfig, CommandRunner } from './scaffold/types.js';

// ── Progress ─────────────────────────────────────────────
export { ProgressTracker, createDefaultReporter, silentReporter } from './progress.js';
export type { ProgressStep, ProgressReporter, StepStatus } from './progress.js';
