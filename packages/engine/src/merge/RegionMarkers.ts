/**
 * RegionMarkers — Comment-Aware Region Delimiters
 *
 * A region is delimited by two marker lines written in the target
 * file's own comment syntax:
 *
 * ```ts
 * // apiweave:begin routes
 * // apiweave:end routes
 * ```
 *
 * ```md
 * <!-- apiweave:begin endpoints -->
 * <!-- apiweave:end endpoints -->
 * ```
 *
 * @module
 */
import { MergeConflict } from '../errors.js';

// ── Comment Syntax ───────────────────────────────────────

export interface CommentSyntax {
    readonly open: string;
    readonly close: string;
}

const LINE_SLASH: CommentSyntax = { open: '//', close: '' };
const LINE_HASH: CommentSyntax = { open: '#', close: '' };
const LINE_DASH: CommentSyntax = { open: '--', close: '' };
const BLOCK_HTML: CommentSyntax = { open: '<!--', close: '-->' };
const BLOCK_C: CommentSyntax = { open: '/*', close: '*/' };

const SYNTAX_BY_EXTENSION: Readonly<Record<string, CommentSyntax>> = {
    ts: LINE_SLASH, tsx: LINE_SLASH, mts: LINE_SLASH, cts: LINE_SLASH,
    js: LINE_SLASH, jsx: LINE_SLASH, mjs: LINE_SLASH, cjs: LINE_SLASH,
    md: BLOCK_HTML, html: BLOCK_HTML, xml: BLOCK_HTML, vue: BLOCK_HTML, svelte: BLOCK_HTML,
    toml: LINE_HASH, yaml: LINE_HASH, yml: LINE_HASH, sh: LINE_HASH, env: LINE_HASH, py: LINE_HASH,
    sql: LINE_DASH,
    css: BLOCK_C, scss: BLOCK_C,
};

/** Files without an extension that still have a known syntax */
const SYNTAX_BY_BASENAME: Readonly<Record<string, CommentSyntax>> = {
    '.gitignore': LINE_HASH,
    '.env': LINE_HASH,
    'Dockerfile': LINE_HASH,
};

export const DEFAULT_MARKER_PREFIX = 'apiweave';

/**
 * Comment syntax for a project-relative path, or `undefined` when the
 * file type is unknown.
 */
export function commentSyntax(path: string): CommentSyntax | undefined {
    const base = path.slice(path.lastIndexOf('/') + 1);
    const byName = SYNTAX_BY_BASENAME[base];
    if (byName) return byName;

    const dot = base.lastIndexOf('.');
    if (dot <= 0) return undefined;
    return SYNTAX_BY_EXTENSION[base.slice(dot + 1).toLowerCase()];
}

/**
 * The begin/end marker lines for a region, without indentation.
 *
 * @throws {MergeConflict} When the file type has no known comment syntax
 */
export function markerLines(path: string, region: string, prefix = DEFAULT_MARKER_PREFIX): { begin: string; end: string } {
    const syntax = requireSyntax(path, region);
    const tail = syntax.close ? ` ${syntax.close}` : '';
    return {
        begin: `${syntax.open} ${prefix}:begin ${region}${tail}`,
        end: `${syntax.open} ${prefix}:end ${region}${tail}`,
    };
}

// ── Region Location ──────────────────────────────────────

/** Character offsets of one region inside a text */
export interface RegionBounds {
    /** First character after the begin marker's line ending */
    readonly innerStart: number;
    /** First character of the end marker line */
    readonly innerEnd: number;
    /** Leading whitespace of the begin marker */
    readonly indent: string;
}

/**
 * Find a region in a file's text.
 *
 * Exactly one begin and one end marker must exist, begin first, and the
 * begin line must end with a line break.
 *
 * @throws {MergeConflict} When the markers are missing, duplicated or out of order
 */
export function findRegion(text: string, path: string, region: string, prefix = DEFAULT_MARKER_PREFIX): RegionBounds {
    const syntax = requireSyntax(path, region);
    const beginPattern = markerPattern(syntax, prefix, 'begin', region);
    const endPattern = markerPattern(syntax, prefix, 'end', region);

    const begins: { start: number; next: number; indent: string; terminated: boolean }[] = [];
    const ends: number[] = [];

    const linePattern = /[^\n]*(\n|$)/g;
    let match: RegExpExecArray | null;
    while ((match = linePattern.exec(text)) !== null) {
        const start = match.index;
        const raw = match[0];
        if (raw.length === 0) break;

        const line = raw.replace(/\r?\n$/, '');
        const begin = beginPattern.exec(line);
        if (begin) {
            begins.push({ start, next: start + raw.length, indent: begin[1] ?? '', terminated: raw.endsWith('\n') });
        } else if (endPattern.test(line)) {
            ends.push(start);
        }
    }

    const first = begins[0];
    const last = ends[0];
    if (!first) throw new MergeConflict(path, region, `missing begin marker "${prefix}:begin ${region}"`);
    if (last === undefined) throw new MergeConflict(path, region, `missing end marker "${prefix}:end ${region}"`);
    if (begins.length > 1 || ends.length > 1) {
        throw new MergeConflict(path, region, 'region markers appear more than once');
    }
    if (last < first.start) throw new MergeConflict(path, region, 'end marker comes before begin marker');
    if (!first.terminated) throw new MergeConflict(path, region, 'begin marker is not followed by a line break');

    return { innerStart: first.next, innerEnd: last, indent: first.indent };
}

// ── Internal ─────────────────────────────────────────────

function requireSyntax(path: string, region: string): CommentSyntax {
    const syntax = commentSyntax(path);
    if (!syntax) throw new MergeConflict(path, region, 'no comment syntax known for this file type');
    return syntax;
}

function markerPattern(syntax: CommentSyntax, prefix: string, edge: 'begin' | 'end', region: string): RegExp {
    const close = syntax.close ? `\\s*${escapeRegExp(syntax.close)}` : '';
    return new RegExp(
        `^(\\s*)${escapeRegExp(syntax.open)}\\s*${escapeRegExp(prefix)}:${edge}\\s+${escapeRegExp(region)}${close}\\s*$`,
    );
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
