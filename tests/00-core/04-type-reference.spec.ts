import { describe, expect, it } from 'vitest';
import {
    collectTypeNames,
    getEndpointTypeReferences,
    isImplementableReference,
    isValidTypeReference,
} from '@src/core/parser/type-reference.js';
import { DeclarationError } from '@src/core/diagnostics.js';
import { getPathPlaceholders, parseHttpMethod, validatePathTemplate } from '@src/core/parser/endpoint-builder.js';
import { parseDeclarations } from '@src/core/parser.js';

const location = { file: 'api.provider', line: 1, column: 1 };

describe('Core: Type references', () => {
    it('should accept single type expressions', () => {
        expect(isValidTypeReference('User[]')).toBe(true);
        expect(isValidTypeReference('Record<string, number>')).toBe(true);
        expect(isValidTypeReference("'a' | 'b'")).toBe(true);
        expect(isValidTypeReference('{ id: string; tags?: string[] }')).toBe(true);
    });

    it('should reject text that is not exactly one type', () => {
        expect(isValidTypeReference('')).toBe(false);
        expect(isValidTypeReference('User User')).toBe(false);
        expect(isValidTypeReference('{ id: string')).toBe(false);
        expect(isValidTypeReference('User; type Other = string')).toBe(false);
    });

    it('should collect the left-most name of every referenced type', () => {
        expect(collectTypeNames('Page<User> | Models.Error')).toEqual(['Models', 'Page', 'User']);
        expect(collectTypeNames('Record<string, Array<Item>>')).toEqual(['Item']);
        expect(collectTypeNames('{ owner: User; friends: User[] }')).toEqual(['User']);
        expect(collectTypeNames('<T>(value: T) => Promise<T>')).toEqual([]);
        expect(collectTypeNames('typeof defaults')).toEqual(['defaults']);
    });

    it('should list endpoint types in parameter order followed by the response', () => {
        const [provider] = parseDeclarations(
            'Api, { { path: "/x/{id}", method: PUT, res: R, query_params: Q, headers: H, req: B, path_params: P } }',
            'api.provider',
        );
        expect(getEndpointTypeReferences(provider.endpoints[0]).map(ref => ref.text)).toEqual(['P', 'B', 'H', 'Q', 'R']);
    });

    it('should accept only named types after implements', () => {
        expect(isImplementableReference('UserReader')).toBe(true);
        expect(isImplementableReference('Api.Reader<User>')).toBe(true);
        expect(isImplementableReference('UserReader | AdminReader')).toBe(false);
        expect(isImplementableReference('{ get(): void }')).toBe(false);
        expect(isImplementableReference('Reader[]')).toBe(false);
    });

    it('should list the implemented interface after the response', () => {
        const [provider] = parseDeclarations(
            'Api, { { path: "/x", method: GET, implements: Reader<R>, res: R } }',
            'api.provider',
        );
        expect(provider.endpoints[0].implements?.text).toBe('Reader<R>');
        expect(getEndpointTypeReferences(provider.endpoints[0]).map(ref => ref.text)).toEqual(['R', 'Reader<R>']);
    });

    it('should reject an implements field that is not a named type', () => {
        let error: unknown;
        try {
            parseDeclarations('Api, { { path: "/x", method: GET, res: R, implements: A | B } }', 'api.provider');
        } catch (caught) {
            error = caught;
        }
        expect(error).toBeInstanceOf(DeclarationError);
        expect(error).toMatchObject({
            code: 'MalformedDeclaration',
            message: 'Field "implements" must name an interface, got: A | B',
            fragment: 'A | B',
        });
    });
});

describe('Core: Endpoint fields', () => {
    it('should parse methods case-insensitively', () => {
        expect(parseHttpMethod('get', location)).toBe('GET');
        expect(parseHttpMethod('Post', location)).toBe('POST');
        expect(() => parseHttpMethod('HEAD', location)).toThrow(
            'Unsupported HTTP method "HEAD". Expected one of GET, POST, PUT, DELETE.',
        );
    });

    it('should list placeholders in order of appearance', () => {
        expect(getPathPlaceholders('/users/{user_id}/resources/{resource_id}')).toEqual(['user_id', 'resource_id']);
        expect(getPathPlaceholders('/users')).toEqual([]);
    });

    it('should validate placeholder syntax', () => {
        expect(() => validatePathTemplate('/users/{id}/posts', location)).not.toThrow();
        expect(() => validatePathTemplate('/users/{}', location)).toThrow(
            'Malformed placeholder at position 7 of path "/users/{}". Placeholders look like {name}.',
        );
        expect(() => validatePathTemplate('/users/id}', location)).toThrow('Unmatched "}" at position 9 of path "/users/id}".');
    });
});
