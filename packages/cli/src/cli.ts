/**
 * apiweave CLI
 *
 * Commands:
 *
 *   apiweave new <name> [--no-git]
 *       Scaffold a project with a sample API description, generated
 *       documents and marked regions already filled in.
 *
 *   apiweave generate [-c <config>] [-i <dir>] [-o <file|->] [--dry-run]
 *       Regenerate the OpenAPI and translation documents and refresh the
 *       marked regions of project files. Exits 1 on any parse or
 *       validation error, after printing all of them.
 *
 *   apiweave cert --domain <domain> --email <email> [--staging]
 *       Write ACME settings and an account key.
 *
 * @module
 */
import { resolve } from 'node:path';
import * as p from '@clack/prompts';
import pc from 'picocolors';
import { ValidationFailedError } from '@apiweave/engine';
import { provisionCertificateSettings } from './cert/provision.js';
import { createProject } from './scaffold/createProject.js';
import { formatSummary, generateProject } from './scaffold/generateProject.js';
import { PROJECT_NAME_PATTERN, type CommandRunner } from './scaffold/types.js';
import { ProgressTracker, createDefaultReporter, type ProgressReporter } from './progress.js';

// ============================================================================
// Constants
// ============================================================================

export const APIWEAVE_VERSION = '0.4.0';

export const HELP = `
apiweave — API descriptions to OpenAPI, translations and project code

USAGE
  apiweave new <name>                 Create a new project
  apiweave generate                   Regenerate documents and marked regions
  apiweave cert --domain <d> --email <e>
                                      Write ACME settings and an account key

OPTIONS
  --cwd <dir>             Project root directory (default: process.cwd())
  --no-git                new: skip \`git init\`
  --config, -c <path>     generate: settings file (default: apiweave.yaml)
  --input, -i <dir>       generate: API description directory
  --output, -o <file|->   generate: OpenAPI output path, \`-\` for stdout
  --dry-run               generate: report changes without writing
  --domain <domain>       cert: domain to certify (repeatable)
  --email <email>         cert: ACME account contact
  --staging               cert: use the staging directory
  --version, -v           Show the version
  --help, -h              Show this help message

EXAMPLES
  apiweave new my-api
  apiweave generate --dry-run
  apiweave generate -o - > openapi.json
  apiweave cert --domain api.example.com --email ops@example.com --staging
`.trim();

// ============================================================================
// Output
// ============================================================================

/** Where the commands write; swapped out by tests */
export interface CliIO {
    readonly stdout: (text: string) => void;
    readonly stderr: (text: string) => void;
}

export const processIO: CliIO = {
    stdout: text => { process.stdout.write(text); },
    stderr: text => { process.stderr.write(text); },
};

/**
 * Render a fatal error. A validation failure lists every error.
 */
export function formatError(err: unknown): string {
    if (err instanceof ValidationFailedError) {
        const count = err.errors.length;
        return [
            `${pc.red('✗')} Validation failed with ${count} error${count !== 1 ? 's' : ''}:`,
            ...err.errors.map(e => `  ${pc.red('•')} ${e.message}`),
        ].join('\n');
    }
    const message = err instanceof Error ? err.message : String(err);
    return `${pc.red('✗')} ${message}`;
}

// ============================================================================
// Arg Parser
// ============================================================================

export interface CliArgs {
    command: string;
    projectName: string | undefined;
    cwd: string;
    config: string | undefined;
    input: string | undefined;
    output: string | undefined;
    dryRun: boolean;
    git: boolean;
    domains: string[];
    email: string | undefined;
    staging: boolean;
    help: boolean;
    version: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
    const args = argv.slice(2);
    const result: CliArgs = {
        command: '',
        projectName: undefined,
        cwd: process.cwd(),
        config: undefined,
        input: undefined,
        output: undefined,
        dryRun: false,
        git: true,
        domains: [],
        email: undefined,
        staging: false,
        help: false,
        version: false,
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i] ?? '';
        switch (arg) {
            case '--cwd':
                result.cwd = args[++i] ?? process.cwd();
                break;
            case '--no-git':
                result.git = false;
                break;
            case '-c':
            case '--config':
                result.config = args[++i];
                break;
            case '-i':
            case '--input':
                result.input = args[++i];
                break;
            case '-o':
            case '--output':
                result.output = args[++i];
                break;
            case '--dry-run':
                result.dryRun = true;
                break;
            case '--domain': {
                const domain = args[++i];
                if (domain !== undefined) result.domains.push(domain);
                break;
            }
            case '--email':
                result.email = args[++i];
                break;
            case '--staging':
                result.staging = true;
                break;
            case '-v':
            case '--version':
                result.version = true;
                break;
            case '-h':
            case '--help':
                result.help = true;
                break;
            default:
                if (!result.command) result.command = arg;
                else if (result.command === 'new' && result.projectName === undefined) result.projectName = arg;
                break;
        }
    }

    return result;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * `apiweave new` — asks for the name on a terminal when it is missing.
 */
export async function commandNew(args: CliArgs, io: CliIO = processIO, runCommand?: CommandRunner): Promise<number> {
    p.intro(pc.bgCyan(pc.black(' apiweave ')));

    let name = args.projectName;
    if (name === undefined) {
        if (!process.stdin.isTTY) {
            io.stderr(`${pc.red('✗')} Missing project name: apiweave new <name>\n`);
            return 1;
        }
        const answer = await p.text({
            message: 'What is your project named?',
            placeholder: 'my-api',
            defaultValue: 'my-api',
            validate: (val) => {
                if (val && !PROJECT_NAME_PATTERN.test(val)) {
                    return 'Only lowercase letters, digits, ".", "_" and "-" are allowed';
                }
                return undefined;
            },
        });
        if (p.isCancel(answer)) {
            p.cancel('Operation cancelled.');
            return 1;
        }
        name = answer;
    }

    const spinner = createSpinnerReporter();
    try {
        await createProject(resolve(args.cwd, name), {
            name,
            git: args.git,
            tracker: new ProgressTracker(spinner.report),
            ...(runCommand ? { runCommand } : {}),
        });
    } catch (err) {
        spinner.abort();
        throw err;
    }

    p.note([`cd ${name}`, 'npm install', 'npm run dev'].join('\n'), 'Next steps');
    p.outro(`${pc.green('Done!')} Edit ${pc.cyan('config/openapi/*.toml')}, then run ${pc.cyan('apiweave generate')}.`);
    return 0;
}

/**
 * `apiweave generate` — progress and summary on stderr, so `-o -`
 * leaves only the document on stdout.
 */
export async function commandGenerate(args: CliArgs, io: CliIO = processIO): Promise<number> {
    const report = await generateProject(args.cwd, {
        configPath: args.config,
        overrides: {
            ...(args.input !== undefined ? { input: args.input } : {}),
            ...(args.output !== undefined ? { output: args.output } : {}),
        },
        dryRun: args.dryRun,
        stdout: io.stdout,
        tracker: new ProgressTracker(createDefaultReporter(io.stderr)),
    });

    for (const path of report.created) io.stderr(`  ${pc.green('+')} ${path}\n`);
    for (const path of report.updated) io.stderr(`  ${pc.cyan('~')} ${path}\n`);
    for (const path of report.patched) io.stderr(`  ${pc.cyan('~')} ${path}\n`);
    for (const skip of report.skipped) {
        const region = skip.region !== undefined ? ` [${skip.region}]` : '';
        io.stderr(`  ${pc.yellow('!')} ${skip.path}${region}: ${skip.reason}\n`);
    }
    for (const err of report.failed) io.stderr(`  ${pc.red('✗')} ${err.message}\n`);

    const prefix = report.dryRun ? 'Dry run: ' : '';
    io.stderr(`\n${prefix}${formatSummary(report)}\n`);
    return report.failed.length > 0 ? 1 : 0;
}

/** `apiweave cert` */
export async function commandCert(args: CliArgs, io: CliIO = processIO): Promise<number> {
    const result = await provisionCertificateSettings(args.cwd, {
        domains: args.domains,
        email: args.email ?? '',
        staging: args.staging,
    });

    for (const path of result.created) io.stderr(`  ${pc.green('+')} ${path}\n`);
    for (const path of result.existing) io.stderr(`  ${pc.dim('=')} ${path} ${pc.dim('(exists, kept)')}\n`);
    return 0;
}

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Run the CLI and return the exit status.
 */
export async function run(argv: string[], io: CliIO = processIO): Promise<number> {
    const args = parseArgs(argv);

    if (args.version) {
        io.stdout(`${APIWEAVE_VERSION}\n`);
        return 0;
    }
    if (args.help || !args.command || args.command === 'help') {
        io.stdout(`${HELP}\n`);
        return args.help || args.command === 'help' ? 0 : 1;
    }

    try {
        switch (args.command) {
            case 'new':
                return await commandNew(args, io);
            case 'generate':
                return await commandGenerate(args, io);
            case 'cert':
                return await commandCert(args, io);
            default:
                io.stderr(`Unknown command: "${args.command}"\n\n`);
                io.stdout(`${HELP}\n`);
                return 1;
        }
    } catch (err) {
        io.stderr(`${formatError(err)}\n`);
        return 1;
    }
}

// ── Spinner ──────────────────────────────────────────────

/** Drives a @clack/prompts spinner from progress steps */
function createSpinnerReporter(): { report: ProgressReporter; abort: () => void } {
    const spinner = p.spinner();
    let active = false;

    const report: ProgressReporter = (step) => {
        const detail = step.detail ? pc.dim(` — ${step.detail}`) : '';
        switch (step.status) {
            case 'running':
                spinner.start(step.label);
                active = true;
                break;
            case 'done':
                spinner.stop(`${step.label}${detail}`);
                active = false;
                break;
            case 'warn':
                if (active) spinner.stop(pc.yellow(`${step.label}${detail}`));
                else p.log.warn(`${step.label}${detail}`);
                active = false;
                break;
            case 'failed':
                spinner.stop(pc.red(`${step.label}${detail}`));
                active = false;
                break;
            case 'pending':
                break;
        }
    };

    return {
        report,
        abort: () => {
            if (active) spinner.stop(pc.red('Aborted'));
            active = false;
        },
    };
}
