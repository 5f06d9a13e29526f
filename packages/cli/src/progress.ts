/**
 * Progress Reporter (Composer / Yarn-style progress output)
 *
 * Commands report steps through a {@link ProgressTracker}; the default
 * reporter prints one colored line per state change to stderr so that
 * `generate -o -` can pipe the OpenAPI document through stdout.
 *
 * @module
 */
import pc from 'picocolors';

/**
 * Step status for CLI progress reporting.
 */
export type StepStatus = 'pending' | 'running' | 'done' | 'warn' | 'failed';

/**
 * A progress step emitted during CLI operations.
 */
export interface ProgressStep {
    /** Step identifier */
    readonly id: string;
    /** Human-readable label */
    readonly label: string;
    /** Current status */
    readonly status: StepStatus;
    /** Optional detail (e.g. "3 files, 12 endpoints") */
    readonly detail?: string;
    /** Duration in milliseconds (set when done/failed) */
    readonly durationMs?: number;
}

/**
 * Callback that receives progress updates.
 */
export type ProgressReporter = (step: ProgressStep) => void;

/** Icon map for each step status */
const STATUS_ICONS: Record<StepStatus, string> = {
    pending: pc.dim('○'),
    running: pc.cyan('◐'),
    done: pc.green('●'),
    warn: pc.yellow('▲'),
    failed: pc.red('✗'),
};

/**
 * Create the default pretty-print progress reporter.
 * Output goes to stderr so it doesn't pollute piped stdout.
 */
export function createDefaultReporter(write: (text: string) => void = text => process.stderr.write(text)): ProgressReporter {
    return (step: ProgressStep): void => {
        if (step.status === 'running') return;
        const icon = STATUS_ICONS[step.status];
        const timing = step.durationMs !== undefined ? pc.dim(` (${step.durationMs}ms)`) : '';
        const detail = step.detail ? ` — ${step.detail}` : '';
        write(`  ${icon} ${step.label}${detail}${timing}\n`);
    };
}

/** Reporter that drops every step */
export const silentReporter: ProgressReporter = () => undefined;

/**
 * A progress tracker that drives step-by-step progress reporting.
 */
export class ProgressTracker {
    private readonly reporter: ProgressReporter;
    private startTimes = new Map<string, number>();

    constructor(reporter?: ProgressReporter) {
        this.reporter = reporter ?? createDefaultReporter();
    }

    /** Mark a step as running */
    start(id: string, label: string): void {
        this.startTimes.set(id, Date.now());
        this.reporter({ id, label, status: 'running' });
    }

    /** Mark a step as completed */
    done(id: string, label: string, detail?: string): void {
        this.finish('done', id, label, detail);
    }

    /** Mark a step as completed with something worth a look */
    warn(id: string, label: string, detail?: string): void {
        this.finish('warn', id, label, detail);
    }

    /** Mark a step as failed */
    fail(id: string, label: string, detail?: string): void {
        this.finish('failed', id, label, detail);
    }

    private finish(status: StepStatus, id: string, label: string, detail: string | undefined): void {
        const durationMs = this.elapsed(id);
        this.reporter({
            id, label, status,
            ...(detail !== undefined ? { detail } : {}),
            ...(durationMs !== undefined ? { durationMs } : {}),
        });
    }

    private elapsed(id: string): number | undefined {
        const start = this.startTimes.get(id);
        if (start === undefined) return undefined;
        this.startTimes.delete(id);
        return Date.now() - start;
    }
}
