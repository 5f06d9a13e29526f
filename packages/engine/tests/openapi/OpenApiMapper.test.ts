import { describe, it, expect } from 'vitest';
import { parseApiDocument } from '../../src/parser/ConfigParser.js';
import { normalizeDocument } from '../../src/validator/Normalizer.js';
import { buildOpenApiDocument, serializeDocument, mapFieldSpec } from '../../src/openapi/OpenApiMapper.js';
import { unwrap } from '../../src/result.js';
import type { OpenApiDocument } from '../../src/openapi/types.js';
import { fixture } from '../helpers.js';

// ============================================================================
// OpenApiMapper Tests
// ============================================================================

const INFO = { title: 'Users API', version: '1.0.0' };

function build(text: string): OpenApiDocument {
    return buildOpenApiDocument(unwrap(normalizeDocument(parseApiDocument(text, 'users.toml'))), { info: INFO });
}

const USERS = fixture('users.toml');

describe('OpenApiMapper', () => {
    // ── Document Shell ──

    describe('Document', () => {
        it('should emit OpenAPI 3.1 with the given info', () => {
            const doc = build(USERS);
            expect(doc.openapi).toBe('3.1.0');
            expect(doc.info).toEqual(INFO);
        });

        it('should emit one tag per API group', () => {
            expect(build(USERS).tags).toEqual([{ name: 'Users' }]);
        });

        it('should omit servers unless configured', () => {
            const model = unwrap(normalizeDocument(parseApiDocument(USERS)));
            expect(buildOpenApiDocument(model, { info: INFO }).servers).toBeUndefined();
            const withServers = buildOpenApiDocument(model, { info: INFO, servers: [{ url: 'http://localhost:6080' }] });
            expect(withServers.servers).toEqual([{ url: 'http://localhost:6080' }]);
        });

        it('should preserve path and schema declaration order', () => {
            const doc = build(USERS);
            expect(Object.keys(doc.paths)).toEqual([
                '/user/new',
                '/user/{user_id}/update',
                '/user/{user_id}/view',
                '/user/list',
                '/user/export',
            ]);
            expect(Object.keys(doc.components.schemas)).toEqual(['userId', 'newUser', 'userInfo', 'userData']);
        });

        it('should keep endpoint order whatever order the schemas are declared in', () => {
            const endpoints = [
                '[[endpoints]]', 'path = "/b"', 'method = "POST"', 'body = "item"', '',
                '[[endpoints]]', 'path = "/a"', 'method = "POST"', 'body = "200"', '',
                '[[endpoints]]', 'path = "/c"', 'method = "GET"', '',
            ].join('\n');
            const schemas: Record<string, string> = {
                item: '[schemas.item]\nname = "string"\n',
                ok: '[schemas."200"]\ncode = "integer"\n',
                page: '[schemas.page]\ntype = "array"\nitems = "item"\n',
            };
            const orders = [
                ['item', 'ok', 'page'],
                ['ok', 'page', 'item'],
                ['page', 'item', 'ok'],
            ];

            for (const order of orders) {
                const text = `${endpoints}\n${order.map(key => schemas[key] ?? '').join('\n')}`;
                const doc = build(text);
                expect(Object.keys(doc.paths)).toEqual(['/b', '/a', '/c']);
                expect(Object.keys(doc.components.schemas).sort()).toEqual(['200', 'item', 'page']);
                expect(doc.paths['/a']?.post?.requestBody?.content['application/json']?.schema.$ref)
                    .toBe('#/components/schemas/200');
            }
        });

        it('should group methods sharing a path', () => {
            const doc = build('[[endpoints]]\npath = "/a"\nmethod = "GET"\n[[endpoints]]\npath = "/a"\nmethod = "DELETE"\n');
            expect(Object.keys(doc.paths['/a'] ?? {})).toEqual(['get', 'delete']);
        });

        it('should serialize byte-identically on every run', () => {
            expect(serializeDocument(build(USERS))).toBe(serializeDocument(build(USERS)));
            expect(serializeDocument(build(USERS)).endsWith('}\n')).toBe(true);
        });
    });

    // ── Schemas ──

    describe('Schemas', () => {
        it('should map newUser with its required names and uuid tags', () => {
            const newUser = build(USERS).components.schemas['newUser'];
            expect(newUser?.type).toBe('object');
            expect(newUser?.required).toEqual(['name', 'roles', 'account', 'password']);
            expect(JSON.stringify(newUser?.properties?.['tags'])).toBe(
                '{"type":"array","items":{"type":"string","format":"uuid"}}',
            );
        });

        it('should map nested fields with descriptions and examples', () => {
            const props = build(USERS).components.schemas['newUser']?.properties;
            expect(props?.['roles']).toEqual({
                type: 'array', items: { type: 'string' }, example: ['admin'], description: 'User roles',
            });
            expect(props?.['password']).toEqual({ type: 'string', format: 'password', description: 'User password' });
        });

        it('should map primitive schemas', () => {
            expect(build(USERS).components.schemas['userId']).toEqual({
                type: 'string', format: 'uuid', description: 'User ID',
            });
        });

        it('should map schema references to $ref', () => {
            const userInfo = build(USERS).components.schemas['userInfo'];
            expect(userInfo?.properties?.['owner']).toEqual({ $ref: '#/components/schemas/userId' });
            expect(userInfo?.required).toBeUndefined();
        });

        it('should map array schemas of objects', () => {
            expect(build(USERS).components.schemas['userData']).toEqual({
                type: 'array',
                items: {
                    type: 'object',
                    properties: {
                        account: { type: 'string' },
                        password: { type: 'string', format: 'password' },
                    },
                    required: ['account'],
                },
            });
        });

        it('should pass unknown formats through', () => {
            const doc = build('[schemas.a]\nwhen = { type = "string", format = "x-fiscal-quarter" }\n');
            expect(doc.components.schemas['a']?.properties?.['when']).toEqual({ type: 'string', format: 'x-fiscal-quarter' });
        });

        it('should emit TOML dates as ISO strings', () => {
            const doc = build('[schemas.a]\nsince = { type = "string", format = "date-time", example = 2024-05-01T08:30:00Z }\n');
            expect(doc.components.schemas['a']?.properties?.['since']?.example).toBe('2024-05-01T08:30:00.000Z');
        });
    });

    // ── Operations ──

    describe('Operations', () => {
        it('should map a body to a required JSON request body', () => {
            const op = build(USERS).paths['/user/new']?.post;
            expect(op?.requestBody).toEqual({
                required: true,
                content: { 'application/json': { schema: { $ref: '#/components/schemas/newUser' } } },
            });
            expect(op?.summary).toBe('Creates a new user');
            expect(op?.tags).toEqual(['Users']);
        });

        it('should map query parameters to plain string schemas', () => {
            const op = build(USERS).paths['/user/list']?.get;
            expect(op?.parameters).toEqual([
                { name: 'roles', in: 'query', description: 'User roles', required: false, schema: { type: 'string' } },
                { name: 'tags', in: 'query', description: 'User tags', required: false, schema: { type: 'string' } },
            ]);
        });

        it('should keep enum and default in the parameter schema', () => {
            const op = build(USERS).paths['/user/export']?.get;
            expect(op?.parameters).toEqual([
                {
                    name: 'format', in: 'query', description: 'File format', required: false,
                    schema: { type: 'string', enum: ['csv', 'json'], default: 'json' },
                },
                { name: 'limit', in: 'query', required: true, schema: { type: 'integer' } },
            ]);
        });

        it('should list path parameters before query parameters', () => {
            const doc = build([
                '[[endpoints]]',
                'path = "/org/{org_id}/users"',
                'method = "GET"',
                '[endpoints.query]',
                'page = "integer"',
            ].join('\n'));
            expect(doc.paths['/org/{org_id}/users']?.get?.parameters?.map(p => `${p.in}:${p.name}`)).toEqual([
                'path:org_id',
                'query:page',
            ]);
        });

        it('should derive operation ids from method and path', () => {
            const doc = build(USERS);
            expect(doc.paths['/user/new']?.post?.operationId).toBe('post_user_new');
            expect(doc.paths['/user/{user_id}/update']?.post?.operationId).toBe('post_user_user_id_update');
        });

        it('should deduplicate colliding operation ids', () => {
            const doc = build('[[endpoints]]\npath = "/a-b"\nmethod = "GET"\n[[endpoints]]\npath = "/a_b"\nmethod = "GET"\n');
            expect(doc.paths['/a-b']?.get?.operationId).toBe('get_a_b');
            expect(doc.paths['/a_b']?.get?.operationId).toBe('get_a_b_2');
        });

        it('should always declare a default response', () => {
            expect(build(USERS).paths['/user/list']?.get?.responses).toEqual({
                default: { description: 'Default response' },
            });
        });
    });

    // ── mapFieldSpec ──

    describe('mapFieldSpec', () => {
        it('should skip empty descriptions', () => {
            expect(mapFieldSpec({ type: { kind: 'primitive', type: 'boolean' }, description: '' })).toEqual({ type: 'boolean' });
        });

        it('should map inline objects', () => {
            expect(mapFieldSpec({
                type: {
                    kind: 'object',
                    fields: [{ name: 'x', spec: { type: { kind: 'primitive', type: 'number' }, description: '' } }],
                    required: ['x'],
                },
                description: 'Point',
            })).toEqual({ type: 'object', properties: { x: { type: 'number' } }, required: ['x'], description: 'Point' });
        });
    });
});
