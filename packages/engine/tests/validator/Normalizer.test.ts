import { describe, it, expect } from 'vitest';
import { parseApiDocument } from '../../src/parser/ConfigParser.js';
import { normalizeDocument, normalizeDocuments, pathPlaceholders } from '../../src/validator/Normalizer.js';
import type { ValidationError } from '../../src/errors.js';
import type { ApiModel } from '../../src/ir/types.js';
import { fixture } from '../helpers.js';

// ============================================================================
// Normalizer Tests
// ============================================================================

const USERS = fixture('users.toml');

function model(text: string, source = '<inline>'): ApiModel {
    const result = normalizeDocument(parseApiDocument(text, source));
    if (!result.ok) throw new Error(result.errors.map(e => e.message).join('\n'));
    return result.value;
}

function errors(...texts: string[]): readonly ValidationError[] {
    const docs = texts.map((text, i) => parseApiDocument(text, `doc${i + 1}.toml`));
    const result = normalizeDocuments(docs);
    if (result.ok) throw new Error('expected validation to fail');
    return result.errors;
}

describe('Normalizer', () => {
    // ── Fixture ──

    describe('Valid Document', () => {
        it('should normalize the users fixture', () => {
            const m = model(USERS, 'users.toml');
            expect(m.groups.map(g => g.name)).toEqual(['Users']);
            expect(m.endpoints).toHaveLength(5);
            expect(m.schemas.map(s => s.name)).toEqual(['userId', 'newUser', 'userInfo', 'userData']);
        });

        it('should expand shorthand fields', () => {
            const userInfo = model(USERS).schemas[2];
            expect(userInfo?.spec.type).toEqual({
                kind: 'object',
                fields: [
                    { name: 'name', spec: { type: { kind: 'primitive', type: 'string' }, description: '' } },
                    {
                        name: 'status',
                        spec: {
                            type: { kind: 'primitive', type: 'string' },
                            description: 'User status',
                            enum: ['Active', 'Inactive', 'Locked'],
                        },
                    },
                    { name: 'owner', spec: { type: { kind: 'reference', schema: 'userId' }, description: '' } },
                ],
                required: [],
            });
        });

        it('should use the array schema fields as the item object', () => {
            const userData = model(USERS).schemas[3];
            expect(userData?.spec.type).toEqual({
                kind: 'array',
                items: {
                    type: {
                        kind: 'object',
                        fields: [
                            { name: 'account', spec: { type: { kind: 'primitive', type: 'string' }, description: '' } },
                            {
                                name: 'password',
                                spec: { type: { kind: 'primitive', type: 'string' }, format: 'password', description: '' },
                            },
                        ],
                        required: ['account'],
                    },
                    description: '',
                },
            });
        });

        it('should materialize implicit path parameters as required strings', () => {
            const update = model(USERS).endpoints[1];
            expect(update?.pathParams).toEqual([
                { name: 'user_id', in: 'path', required: true, type: { kind: 'primitive', type: 'string' }, description: '' },
            ]);
        });

        it('should apply path parameter overrides', () => {
            const view = model(USERS).endpoints[2];
            expect(view?.pathParams).toEqual([{
                name: 'user_id', in: 'path', required: true,
                type: { kind: 'primitive', type: 'string' }, format: 'uuid', description: 'User ID',
            }]);
        });

        it('should make query parameters optional unless marked required', () => {
            const exportEndpoint = model(USERS).endpoints[4];
            expect(exportEndpoint?.query.map(q => [q.name, q.required])).toEqual([['format', false], ['limit', true]]);
        });

        it('should default summary and description to empty strings', () => {
            const m = model('[[endpoints]]\npath = "/ping"\nmethod = "GET"\n');
            expect(m.endpoints[0]?.summary).toBe('');
            expect(m.endpoints[0]?.description).toBe('');
        });

        it('should tag endpoints with the document name first', () => {
            const m = model('name = "Ops"\n[[endpoints]]\npath = "/ping"\nmethod = "GET"\ntags = ["health", "Ops"]\n');
            expect(m.endpoints[0]?.tags).toEqual(['Ops', 'health']);
        });

        it('should freeze the model', () => {
            const m = model(USERS);
            expect(Object.isFrozen(m)).toBe(true);
            expect(Object.isFrozen(m.endpoints[0])).toBe(true);
            expect(Object.isFrozen(m.schemas[1]?.spec.type)).toBe(true);
        });

        it('should resolve references declared later or in another document', () => {
            const first = parseApiDocument('[[endpoints]]\npath = "/a"\nmethod = "POST"\nbody = "b"\n', 'a.toml');
            const second = parseApiDocument('[schemas.b]\nid = "integer"\n', 'b.toml');
            const result = normalizeDocuments([first, second]);
            expect(result.ok).toBe(true);
        });

        it('should allow references between different schemas', () => {
            const m = model('[schemas.tree]\nroot = "node"\n\n[schemas.node]\nlabel = "string"\n');
            expect(m.schemas).toHaveLength(2);
        });
    });

    // ── Referential Integrity ──

    describe('Referential Integrity', () => {
        it('should report exactly one error for an unknown body schema', () => {
            const errs = errors('[[endpoints]]\npath = "/user/new"\nmethod = "POST"\nbody = "ghost"\n');
            expect(errs).toHaveLength(1);
            expect(errs[0]?.code).toBe('unknown-schema');
            expect(errs[0]?.location).toBe('doc1.toml › endpoints[0] (POST /user/new) › body');
            expect(errs[0]?.message).toBe(
                'doc1.toml › endpoints[0] (POST /user/new) › body: endpoint POST /user/new references unknown schema "ghost"',
            );
        });

        it('should report unknown field types', () => {
            const errs = errors('[schemas.a]\nchild = "missing"\n');
            expect(errs.map(e => [e.code, e.location])).toEqual([['unknown-schema', 'doc1.toml › schemas.a › child']]);
        });

        it('should reject direct self-reference', () => {
            const errs = errors('[schemas.node]\nparent = "node"\n');
            expect(errs.map(e => e.code)).toEqual(['self-reference']);
        });

        it('should reject self-reference through an array', () => {
            const errs = errors('[schemas.node]\nchildren = { type = "array", items = "node" }\n');
            expect(errs.map(e => [e.code, e.location])).toEqual([
                ['self-reference', 'doc1.toml › schemas.node › children › items'],
            ]);
        });
    });

    // ── Schema Rules ──

    describe('Schema Rules', () => {
        it('should reject required names that are not fields', () => {
            const errs = errors('[schemas.a]\nrequired = ["id", "nope"]\nid = "integer"\n');
            expect(errs.map(e => e.code)).toEqual(['unknown-required-field']);
            expect(errs[0]?.message).toBe('doc1.toml › schemas.a › required: required field "nope" is not declared');
        });

        it('should reject required on a primitive schema', () => {
            const errs = errors('[schemas.id]\ntype = "string"\nrequired = ["x"]\n');
            expect(errs.map(e => e.code)).toEqual(['required-on-primitive']);
        });

        it('should reject an empty enum', () => {
            const errs = errors('[schemas.a]\nstatus = { type = "string", enum = [] }\n');
            expect(errs.map(e => e.code)).toEqual(['empty-enum']);
        });

        it('should reject a default outside the enum', () => {
            const errs = errors('[schemas.a]\nstatus = { type = "string", enum = ["on", "off"], default = "maybe" }\n');
            expect(errs.map(e => [e.code, e.location])).toEqual([['value-not-in-enum', 'doc1.toml › schemas.a › status › default']]);
        });

        it('should check array examples element by element', () => {
            const errs = errors('[schemas.a]\nroles = { type = "array", items = "string", enum = ["admin"], example = ["admin", "root"] }\n');
            expect(errs.map(e => e.code)).toEqual(['value-not-in-enum']);
        });

        it('should reject arrays without items', () => {
            const errs = errors('[schemas.a]\nlist = { type = "array" }\n');
            expect(errs.map(e => e.code)).toEqual(['invalid-type']);
        });

        it('should reject duplicate schemas across documents', () => {
            const errs = errors('[schemas.a]\nid = "integer"\n', '[schemas.a]\nid = "string"\n');
            expect(errs.map(e => [e.code, e.location])).toEqual([['duplicate-schema', 'doc2.toml › schemas.a']]);
        });
    });

    // ── Endpoint Rules ──

    describe('Endpoint Rules', () => {
        it('should reject overrides for missing placeholders', () => {
            const errs = errors('[[endpoints]]\npath = "/user/{id}"\nmethod = "GET"\n[endpoints.params]\nuser_id = "integer"\n');
            expect(errs.map(e => [e.code, e.location])).toEqual([
                ['unknown-path-param', 'doc1.toml › endpoints[0] (GET /user/{id}) › params.user_id'],
            ]);
        });

        it('should reject repeated placeholders', () => {
            const errs = errors('[[endpoints]]\npath = "/a/{id}/b/{id}"\nmethod = "GET"\n');
            expect(errs.map(e => e.code)).toEqual(['duplicate-path-param']);
        });

        it('should reject query parameters that shadow path parameters', () => {
            const errs = errors('[[endpoints]]\npath = "/a/{id}"\nmethod = "GET"\n[endpoints.query]\nid = "string"\n');
            expect(errs.map(e => e.code)).toEqual(['shadowed-path-param']);
        });

        it('should reject duplicate method and path pairs across documents', () => {
            const endpoint = '[[endpoints]]\npath = "/ping"\nmethod = "GET"\n';
            const errs = errors(endpoint, endpoint);
            expect(errs.map(e => e.code)).toEqual(['duplicate-endpoint']);
            expect(errs[0]?.message).toBe(
                'doc2.toml › endpoints[0] (GET /ping): GET /ping is already declared at doc1.toml › endpoints[0] (GET /ping)',
            );
        });

        it('should allow the same path with different methods', () => {
            const m = model('[[endpoints]]\npath = "/a"\nmethod = "GET"\n[[endpoints]]\npath = "/a"\nmethod = "DELETE"\n');
            expect(m.endpoints.map(e => e.method)).toEqual(['GET', 'DELETE']);
        });
    });

    // ── Collection ──

    describe('Error Collection', () => {
        it('should report every problem in one run', () => {
            const errs = errors([
                '[[endpoints]]',
                'path = "/a"',
                'method = "POST"',
                'body = "ghost"',
                '',
                '[schemas.s]',
                'required = ["missing"]',
                'self = "s"',
                '',
                '[models.user.seen]',
                'translations = [["$span:soon", "Recently"]]',
            ].join('\n'));

            expect(errs.map(e => e.code)).toEqual([
                'self-reference',
                'unknown-required-field',
                'unknown-schema',
                'invalid-duration',
            ]);
        });
    });

    // ── Helpers ──

    describe('pathPlaceholders', () => {
        it('should list placeholders in order', () => {
            expect(pathPlaceholders('/org/{org_id}/user/{user_id}')).toEqual(['org_id', 'user_id']);
            expect(pathPlaceholders('/health')).toEqual([]);
        });
    });
});
