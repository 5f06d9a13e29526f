/**
 * SourceLocator — Map a Value Path Back to a Line/Column
 *
 * The TOML parser hands back plain objects without positions, so shape
 * errors found afterwards are located by scanning the text: find the
 * table header that owns the path, then the key line inside that table.
 *
 * `[[endpoints]]` headers are counted so `['endpoints', 2, 'body']`
 * resolves to the `[endpoints.body]` table that follows the third
 * `[[endpoints]]` header.
 *
 * @module
 */

export type ValuePath = readonly (string | number)[];

export interface SourcePosition {
    readonly line: number;
    readonly column: number;
}

interface Section {
    readonly path: ValuePath;
    /** 0-based line index of the header */
    readonly start: number;
    /** 0-based line index where the next header begins */
    end: number;
}

const ARRAY_HEADER = /^\s*\[\[\s*([^\]]+?)\s*\]\]/;
const TABLE_HEADER = /^\s*\[\s*([^\]]+?)\s*\]/;

/**
 * Locate `path` inside `text`. Falls back to the owning header,
 * then to line 1 column 1.
 */
export function locate(text: string, path: ValuePath): SourcePosition {
    const lines = text.split(/\r?\n/);
    const sections = scanSections(lines);

    // Longest header path that prefixes the value path
    let owner: Section | undefined;
    for (const section of sections) {
        if (isPrefix(section.path, path) && (!owner || section.path.length > owner.path.length)) {
            owner = section;
        }
    }

    const from = owner ? owner.start + 1 : 0;
    const to = owner ? owner.end : (sections[0]?.start ?? lines.length);
    const rest = path.slice(owner ? owner.path.length : 0);

    const key = rest.find((segment): segment is string => typeof segment === 'string');
    if (key !== undefined) {
        const found = findKey(lines, key, from, to);
        if (found) {
            // Refine to a nested inline-table key on the same line
            const nested = rest.slice(rest.indexOf(key) + 1).find((s): s is string => typeof s === 'string');
            if (nested !== undefined) {
                const column = findKeyInLine(lines[found.line - 1] ?? '', nested, found.column);
                if (column !== undefined) return { line: found.line, column };
            }
            return found;
        }
    }

    if (owner) {
        const headerLine = lines[owner.start] ?? '';
        return { line: owner.start + 1, column: headerLine.search(/\S/) + 1 };
    }
    return { line: 1, column: 1 };
}

/** Render a value path as `endpoints[2].query.roles` */
export function formatPath(path: ValuePath): string {
    let out = '';
    for (const segment of path) {
        if (typeof segment === 'number') out += `[${segment}]`;
        else out += out.length === 0 ? segment : `.${segment}`;
    }
    return out.length > 0 ? out : '(root)';
}

// ── Internal ─────────────────────────────────────────────

function scanSections(lines: readonly string[]): Section[] {
    const sections: Section[] = [];
    const arrayCounts = new Map<string, number>();

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i] ?? '';
        const arrayMatch = ARRAY_HEADER.exec(line);
        const tableMatch = arrayMatch ? null : TABLE_HEADER.exec(line);
        const raw = arrayMatch?.[1] ?? tableMatch?.[1];
        if (raw === undefined) continue;

        const keys = splitDottedKey(raw);
        let path: (string | number)[];

        if (arrayMatch) {
            const joined = keys.join('.');
            const index = arrayCounts.get(joined) ?? 0;
            arrayCounts.set(joined, index + 1);
            path = [...keys, index];
        } else {
            path = [];
            for (let k = 0; k < keys.length; k++) {
                const key = keys[k] ?? '';
                path.push(key);
                const count = arrayCounts.get(keys.slice(0, k + 1).join('.'));
                if (count !== undefined) path.push(count - 1);
            }
        }

        const previous = sections[sections.length - 1];
        if (previous) previous.end = i;
        sections.push({ path, start: i, end: lines.length });
    }

    return sections;
}

function splitDottedKey(raw: string): string[] {
    const keys: string[] = [];
    let current = '';
    let quote: string | undefined;

    for (const ch of raw) {
        if (quote) {
            if (ch === quote) quote = undefined;
            else current += ch;
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '.') {
            keys.push(current.trim());
            current = '';
        } else {
            current += ch;
        }
    }
    keys.push(current.trim());
    return keys;
}

function isPrefix(prefix: ValuePath, path: ValuePath): boolean {
    if (prefix.length > path.length) return false;
    return prefix.every((segment, i) => segment === path[i]);
}

function findKey(lines: readonly string[], key: string, from: number, to: number): SourcePosition | undefined {
    const pattern = new RegExp(`^(\\s*)(?:"${escapeRegExp(key)}"|'${escapeRegExp(key)}'|${escapeRegExp(key)})\\s*=`);
    for (let i = from; i < to; i++) {
        const match = pattern.exec(lines[i] ?? '');
        if (match) return { line: i + 1, column: (match[1]?.length ?? 0) + 1 };
    }
    return undefined;
}

function findKeyInLine(line: string, key: string, afterColumn: number): number | undefined {
    const pattern = new RegExp(`[{,\\s]${escapeRegExp(key)}\\s*=`, 'g');
    pattern.lastIndex = afterColumn;
    const match = pattern.exec(line);
    return match ? match.index + 2 : undefined;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
