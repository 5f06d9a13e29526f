import { describe, it, expect } from 'vitest';
import { generateArtifacts } from '../../src/pipeline.js';
import { planMerge, resolveWrites } from '../../src/merge/RegionMerger.js';
import { ParseError } from '../../src/errors.js';
import { unwrap } from '../../src/result.js';
import { fixture } from '../helpers.js';

// ── Full pipeline: TOML → OpenAPI + translations → merged project files ──

const SOURCES = [{ source: 'config/openapi/users.toml', text: fixture('users.toml') }];
const OPTIONS = { info: { title: 'Users API', version: '1.0.0' } };

const README = [
    '# users-api',
    '',
    'Notes written by hand.',
    '',
    '<!-- apiweave:begin endpoints -->',
    '<!-- apiweave:end endpoints -->',
    '',
].join('\n');

describe('Pipeline', () => {
    it('should generate every artifact from the sources', () => {
        const artifacts = unwrap(generateArtifacts(SOURCES, OPTIONS));
        expect(artifacts.model.endpoints).toHaveLength(5);
        expect(artifacts.openapi.info.title).toBe('Users API');
        expect(JSON.parse(artifacts.openapiJson)).toEqual(JSON.parse(JSON.stringify(artifacts.openapi)));
        expect(JSON.parse(artifacts.translationsJson)).toEqual(artifacts.translations.toLookup());
        expect(artifacts.fragments.map(f => f.region)).toEqual(['routes', 'translations', 'endpoints']);
    });

    it('should be byte-stable across runs', () => {
        const first = unwrap(generateArtifacts(SOURCES, OPTIONS));
        const second = unwrap(generateArtifacts(SOURCES, OPTIONS));
        expect(second.openapiJson).toBe(first.openapiJson);
        expect(second.translationsJson).toBe(first.translationsJson);
        expect(second.fragments).toEqual(first.fragments);
    });

    it('should return validation errors instead of throwing', () => {
        const result = generateArtifacts(
            [{ source: 'bad.toml', text: '[[endpoints]]\npath = "/a"\nmethod = "POST"\nbody = "ghost"\n' }],
            OPTIONS,
        );
        expect(result.ok).toBe(false);
    });

    it('should throw ParseError for malformed sources', () => {
        expect(() => generateArtifacts([{ source: 'bad.toml', text: 'name = ' }], OPTIONS)).toThrow(ParseError);
    });

    it('should merge the endpoint table into a hand-written README', () => {
        const artifacts = unwrap(generateArtifacts(SOURCES, { ...OPTIONS, fragments: { features: { routes: false, translations: false } } }));
        const files = new Map([['README.md', README]]);
        const writes = resolveWrites(planMerge(artifacts.fragments, files), files);

        expect(writes).toHaveLength(1);
        expect(writes[0]?.content).toBe([
            '# users-api',
            '',
            'Notes written by hand.',
            '',
            '<!-- apiweave:begin endpoints -->',
            '| Method | Path | Summary |',
            '| --- | --- | --- |',
            '| `POST` | `/user/new` | Creates a new user |',
            '| `POST` | `/user/{user_id}/update` | Updates a user by ID |',
            '| `GET` | `/user/{user_id}/view` | Gets a user by ID |',
            '| `GET` | `/user/list` | Finds a list of users |',
            '| `GET` | `/user/export` | Exports the user data |',
            '<!-- apiweave:end endpoints -->',
            '',
        ].join('\n'));

        const merged = new Map([['README.md', writes[0]?.content ?? '']]);
        expect(planMerge(artifacts.fragments, merged)).toEqual([]);
    });
});
