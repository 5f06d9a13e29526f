/**
 * TemplateHelpers — Code Generation Utilities
 *
 * Pure string helpers shared by the fragment renderer and the
 * OpenAPI mapper.
 *
 * @module
 */

// ── Case Converters ──────────────────────────────────────

/**
 * Convert a camelCase, PascalCase or delimited string to snake_case.
 *
 * @example
 * toSnakeCase('getUserById')        → 'get_user_by_id'
 * toSnakeCase('post__user_new')     → 'post_user_new'
 * toSnakeCase('HTTPServer')         → 'http_server'
 */
export function toSnakeCase(str: string): string {
    return str
        // Insert underscore before uppercase letters (camelCase boundaries)
        .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
        // Insert underscore between consecutive uppercase followed by lowercase
        .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
        .toLowerCase()
        .replace(/[^a-z0-9_]+/g, '_')
        // Collapse multiple underscores
        .replace(/_+/g, '_')
        // Trim leading/trailing underscores
        .replace(/^_|_$/g, '');
}

// ── Code Formatting ──────────────────────────────────────

/**
 * Indent every non-empty line of a string by the given prefix.
 */
export function indent(code: string, pad: string): string {
    return code
        .split('\n')
        .map(line => line.length > 0 ? pad + line : line)
        .join('\n');
}

/**
 * Escape a string for use inside single-quoted TypeScript literals.
 */
export function escapeTs(str: string): string {
    return str
        .replace(/\\/g, '\\\\')
        .replace(/'/g, "\\'")
        .replace(/\n/g, '\\n')
        .replace(/\r/g, '\\r');
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render an object key: bare when it is a valid identifier, quoted otherwise.
 *
 * @example
 * tsKey('status')     → 'status'
 * tsKey('updated-at') → "'updated-at'"
 */
export function tsKey(key: string): string {
    return IDENTIFIER.test(key) ? key : `'${escapeTs(key)}'`;
}

/**
 * Escape a value for a Markdown table cell.
 */
export function escapeMarkdownCell(str: string): string {
    return str.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}
