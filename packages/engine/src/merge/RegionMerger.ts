/**
 * RegionMerger — Templates × Existing Tree → File Operations
 *
 * Planning is pure: it reads the snapshot and returns operations, the
 * caller performs the writes.
 *
 *   Target missing, file template      → Create (fragments spliced in)
 *   Target missing, fragments only     → Skip("file not found")
 *   Target exists, file template       → nothing (never overwritten)
 *   Target exists, fragment            → Patch, or nothing when unchanged
 *   Markers missing or malformed       → Skip(conflict reason)
 *
 * Only the text strictly between a region's markers is replaced. Fragment
 * lines are indented to the begin marker and written with the target's
 * own line ending.
 *
 * @module
 */
import { MergeConflict } from '../errors.js';
import { DEFAULT_MARKER_PREFIX, findRegion } from './RegionMarkers.js';
import type {
    FileOperation, FileTemplate, FileTree, FragmentTemplate, PatchOperation, Template,
} from './types.js';

export interface MergeOptions {
    /** Marker prefix (default: `apiweave`) */
    readonly prefix?: string;
}

/** One file to write after planning */
export interface FileWrite {
    readonly kind: 'create' | 'patch';
    readonly path: string;
    readonly content: string;
}

// ── Planning ─────────────────────────────────────────────

/**
 * Plan the operations needed to bring a tree up to date.
 *
 * Operations come out grouped by path, in first-template order.
 */
export function planMerge(
    templates: readonly Template[],
    tree: FileTree,
    options: MergeOptions = {},
): FileOperation[] {
    const prefix = options.prefix ?? DEFAULT_MARKER_PREFIX;
    const operations: FileOperation[] = [];

    for (const [path, group] of groupByPath(templates)) {
        const existing = tree.get(path);

        if (existing === undefined) {
            if (!group.file) {
                for (const fragment of group.fragments) {
                    operations.push({ kind: 'skip', path, region: fragment.region, reason: 'file not found' });
                }
                continue;
            }

            let content = group.file.content;
            const skipped: FileOperation[] = [];
            for (const fragment of group.fragments) {
                try {
                    content = spliceRegion(content, path, fragment.region, fragment.content, prefix);
                } catch (err) {
                    if (!(err instanceof MergeConflict)) throw err;
                    skipped.push({ kind: 'skip', path, region: fragment.region, reason: err.reason });
                }
            }
            operations.push({ kind: 'create', path, content }, ...skipped);
            continue;
        }

        for (const fragment of group.fragments) {
            try {
                const patch = planPatch(existing, path, fragment, prefix);
                if (patch) operations.push(patch);
            } catch (err) {
                if (!(err instanceof MergeConflict)) throw err;
                operations.push({ kind: 'skip', path, region: fragment.region, reason: err.reason });
            }
        }
    }

    return operations;
}

/**
 * Collapse operations into one write per file: creates as-is, patches
 * applied in order on top of the snapshot text.
 */
export function resolveWrites(
    operations: readonly FileOperation[],
    tree: FileTree,
    options: MergeOptions = {},
): FileWrite[] {
    const writes: FileWrite[] = [];
    const patches = new Map<string, PatchOperation[]>();

    for (const op of operations) {
        if (op.kind === 'create') {
            writes.push({ kind: 'create', path: op.path, content: op.content });
        } else if (op.kind === 'patch') {
            const list = patches.get(op.path) ?? [];
            list.push(op);
            patches.set(op.path, list);
        }
    }

    for (const [path, list] of patches) {
        const original = tree.get(path);
        if (original === undefined) {
            throw new MergeConflict(path, list[0]?.region ?? '', 'patched file is missing from the snapshot');
        }
        writes.push({ kind: 'patch', path, content: applyPatches(original, list, options) });
    }

    return writes;
}

/**
 * Apply region patches to a file's text, one after another.
 *
 * @throws {MergeConflict} When a patched region can no longer be found
 */
export function applyPatches(text: string, patches: readonly PatchOperation[], options: MergeOptions = {}): string {
    const prefix = options.prefix ?? DEFAULT_MARKER_PREFIX;
    let result = text;
    for (const patch of patches) {
        const bounds = findRegion(result, patch.path, patch.region, prefix);
        result = result.slice(0, bounds.innerStart) + patch.content + result.slice(bounds.innerEnd);
    }
    return result;
}

/**
 * Replace a region's inner text with a fragment, formatted for the file.
 *
 * @throws {MergeConflict} When the region's markers are missing or malformed
 */
export function spliceRegion(
    text: string,
    path: string,
    region: string,
    fragment: string,
    prefix = DEFAULT_MARKER_PREFIX,
): string {
    const bounds = findRegion(text, path, region, prefix);
    const inner = formatFragment(fragment, bounds.indent, lineEnding(text));
    return text.slice(0, bounds.innerStart) + inner + text.slice(bounds.innerEnd);
}

/**
 * Fragment text as it sits between the markers: every non-empty line
 * prefixed with `indent`, every line terminated with `eol`.
 */
export function formatFragment(fragment: string, indent: string, eol: string): string {
    const normalized = fragment.replace(/\r\n/g, '\n');
    if (normalized.length === 0) return '';

    const lines = normalized.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines.map(line => (line.length > 0 ? indent + line : line) + eol).join('');
}

/** `\r\n` when the text uses it anywhere, `\n` otherwise */
export function lineEnding(text: string): string {
    return text.includes('\r\n') ? '\r\n' : '\n';
}

// ── Internal ─────────────────────────────────────────────

interface PathGroup {
    file?: FileTemplate;
    readonly fragments: FragmentTemplate[];
}

function groupByPath(templates: readonly Template[]): Map<string, PathGroup> {
    const groups = new Map<string, PathGroup>();
    for (const template of templates) {
        let group = groups.get(template.path);
        if (!group) {
            group = { fragments: [] };
            groups.set(template.path, group);
        }
        if (template.kind === 'file') group.file = template;
        else group.fragments.push(template);
    }
    return groups;
}

function planPatch(text: string, path: string, fragment: FragmentTemplate, prefix: string): PatchOperation | undefined {
    const bounds = findRegion(text, path, fragment.region, prefix);
    const content = formatFragment(fragment.content, bounds.indent, lineEnding(text));
    if (text.slice(bounds.innerStart, bounds.innerEnd) === content) return undefined;
    return { kind: 'patch', path, region: fragment.region, content };
}
