import { describe, expect, it } from 'vitest';
import { camelCase, kebabCase, snakeCase } from '@src/core/utils/string.js';
import { toModuleSpecifier, toSiblingSpecifier } from '@src/core/utils/module-specifier.js';

describe('Core: String utils', () => {
    it('camelCase should join words and humps', () => {
        expect(camelCase('get_users_id')).toBe('getUsersId');
        expect(camelCase('post_api_v1_posts')).toBe('postApiV1Posts');
        expect(camelCase('get')).toBe('get');
        expect(camelCase('')).toBe('');
    });

    it('snakeCase should split humps and collapse separators', () => {
        expect(snakeCase('users/user_id')).toBe('users_user_id');
        expect(snakeCase('userProfiles/v2.json')).toBe('user_profiles_v2_json');
        expect(snakeCase('HTTPServer')).toBe('http_server');
        expect(snakeCase('--a--b--')).toBe('a_b');
        expect(snakeCase('')).toBe('');
    });

    it('kebabCase should lower-case and hyphenate', () => {
        expect(kebabCase('UserApi')).toBe('user-api');
        expect(kebabCase('billing_v2')).toBe('billing-v2');
        expect(kebabCase('')).toBe('');
    });
});

describe('Core: Module specifiers', () => {
    it('should build a relative specifier to a file outside the output directory', () => {
        expect(toModuleSpecifier('/project/generated', '/project/models.ts', '.js')).toBe('../models.js');
    });

    it('should keep the "./" prefix for files below the output directory', () => {
        expect(toModuleSpecifier('/out', '/out/types/models.d.ts', '')).toBe('./types/models');
    });

    it('should build sibling specifiers', () => {
        expect(toSiblingSpecifier('provider-runtime', '.ts')).toBe('./provider-runtime.ts');
    });
});
