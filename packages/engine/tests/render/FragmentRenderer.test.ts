import { describe, it, expect } from 'vitest';
import { parseApiDocument } from '../../src/parser/ConfigParser.js';
import { normalizeDocument } from '../../src/validator/Normalizer.js';
import { buildOpenApiDocument } from '../../src/openapi/OpenApiMapper.js';
import {
    renderFragments, renderRoutes, renderTranslations, renderEndpointTable,
} from '../../src/render/FragmentRenderer.js';
import { toSnakeCase, tsKey, escapeTs, escapeMarkdownCell } from '../../src/render/TemplateHelpers.js';
import { unwrap } from '../../src/result.js';
import type { ApiModel } from '../../src/ir/types.js';
import type { OpenApiDocument } from '../../src/openapi/types.js';
import { fixture } from '../helpers.js';

// ============================================================================
// FragmentRenderer Tests
// ============================================================================

function load(text = fixture('users.toml')): { model: ApiModel; document: OpenApiDocument } {
    const model = unwrap(normalizeDocument(parseApiDocument(text, 'users.toml')));
    return { model, document: buildOpenApiDocument(model, { info: { title: 'Users API', version: '1.0.0' } }) };
}

describe('FragmentRenderer', () => {
    // ── Routes ──

    describe('renderRoutes', () => {
        it('should render one route literal per operation', () => {
            const { document } = load();
            expect(renderRoutes(document)).toBe([
                "{ method: 'POST', path: '/user/new', operationId: 'post_user_new', summary: 'Creates a new user', body: 'newUser' },",
                "{ method: 'POST', path: '/user/{user_id}/update', operationId: 'post_user_user_id_update', summary: 'Updates a user by ID', body: 'userInfo' },",
                "{ method: 'GET', path: '/user/{user_id}/view', operationId: 'get_user_user_id_view', summary: 'Gets a user by ID' },",
                "{ method: 'GET', path: '/user/list', operationId: 'get_user_list', summary: 'Finds a list of users' },",
                "{ method: 'GET', path: '/user/export', operationId: 'get_user_export', summary: 'Exports the user data' },",
                '',
            ].join('\n'));
        });

        it('should escape quotes in summaries', () => {
            const { document } = load('[[endpoints]]\npath = "/a"\nmethod = "GET"\nsummary = "Owner\'s list"\n');
            expect(renderRoutes(document)).toBe("{ method: 'GET', path: '/a', operationId: 'get_a', summary: 'Owner\\'s list' },\n");
        });

        it('should render nothing for a document without endpoints', () => {
            const { document } = load('');
            expect(renderRoutes(document)).toBe('');
        });
    });

    // ── Translations ──

    describe('renderTranslations', () => {
        it('should render literal and span rules', () => {
            const { model } = load();
            expect(renderTranslations(model.translations)).toBe([
                'user: {',
                '    status: [',
                "        { value: 'Active', label: 'Active user' },",
                "        { value: 'Inactive', label: 'Dormant' },",
                '    ],',
                '    updated_at: [',
                "        { withinMs: 86400000, label: 'Updated today' },",
                "        { withinMs: 604800000, label: 'Updated this week' },",
                '    ],',
                '},',
                '',
            ].join('\n'));
        });

        it('should quote keys that are not identifiers', () => {
            const { model } = load('[models.user."last-seen"]\ntranslations = [["x", "y"]]\n');
            expect(renderTranslations(model.translations)).toBe([
                'user: {',
                "    'last-seen': [",
                "        { value: 'x', label: 'y' },",
                '    ],',
                '},',
                '',
            ].join('\n'));
        });
    });

    // ── Endpoint Table ──

    describe('renderEndpointTable', () => {
        it('should render a Markdown table', () => {
            const { document } = load('[[endpoints]]\npath = "/ping"\nmethod = "GET"\nsummary = "Health | liveness"\n');
            expect(renderEndpointTable(document)).toBe([
                '| Method | Path | Summary |',
                '| --- | --- | --- |',
                '| `GET` | `/ping` | Health \\| liveness |',
                '',
            ].join('\n'));
        });
    });

    // ── Fragments ──

    describe('renderFragments', () => {
        it('should target the default files and regions', () => {
            const { model, document } = load();
            const fragments = renderFragments(document, model.translations);
            expect(fragments.map(f => `${f.path}#${f.region}`)).toEqual([
                'src/routes.ts#routes',
                'src/translations.ts#translations',
                'README.md#endpoints',
            ]);
        });

        it('should honour feature flags and target overrides', () => {
            const { model, document } = load();
            const fragments = renderFragments(document, model.translations, {
                features: { translations: false, readme: false },
                targets: { routes: 'server/routes.ts' },
            });
            expect(fragments.map(f => `${f.path}#${f.region}`)).toEqual(['server/routes.ts#routes']);
        });
    });
});

describe('TemplateHelpers', () => {
    it('should convert to snake_case', () => {
        expect(toSnakeCase('getUserById')).toBe('get_user_by_id');
        expect(toSnakeCase('HTTPServer')).toBe('http_server');
        expect(toSnakeCase('post__user/{id}')).toBe('post_user_id');
    });

    it('should quote and escape keys', () => {
        expect(tsKey('status')).toBe('status');
        expect(tsKey('updated-at')).toBe("'updated-at'");
        expect(escapeTs("it's\n")).toBe("it\\'s\\n");
    });

    it('should escape Markdown cells', () => {
        expect(escapeMarkdownCell('a|b\nc')).toBe('a\\|b c');
    });
});
