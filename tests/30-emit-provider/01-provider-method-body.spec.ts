import { describe, expect, it } from 'vitest';
import { runGenerator } from '../shared/helpers.js';
import { userApiDeclaration } from '../fixtures/declarations.fixture.js';

async function getBody(methodName: string): Promise<string> {
    const { project } = await runGenerator(userApiDeclaration);
    return (
        project
            .getSourceFileOrThrow('/generated/user-api.provider.ts')
            .getClassOrThrow('UserApi')
            .getMethodOrThrow(methodName)
            .getBodyText() ?? ''
    );
}

describe('Emitter: provider method bodies', () => {
    it('should use the literal path when there is nothing to substitute', async () => {
        const body = await getBody('get_users');
        expect(body).toContain("const url = buildUrl(this.url, '/users');");
        expect(body).toContain('const requestHeaders = new Headers();');
        expect(body).toContain("method: 'GET'");
        expect(body).not.toContain('resolvePath');
        expect(body).not.toContain('serializeBody');
    });

    it('should resolve placeholders from pathParams', async () => {
        const body = await getBody('get_users_id');
        expect(body).toContain("const url = buildUrl(this.url, resolvePath('/users/{id}', pathParams));");
    });

    it('should serialize the body and default the content type', async () => {
        const body = await getBody('put_users_id');
        expect(body).toContain('const requestHeaders = new Headers(headers);');
        expect(body).toContain('const payload = serializeBody(body);');
        expect(body).toContain("requestHeaders.set('Content-Type', 'application/json')");
        expect(body).toContain('body: payload');
        expect(body).toContain("method: 'PUT'");
    });

    it('should append query parameters', async () => {
        const body = await getBody('get_search');
        expect(body).toContain('appendQuery(url, queryParams);');
        expect(body).toContain('const value = await readJson<Page<User>>(response);');
    });

    it('should return every failure as a value', async () => {
        const body = await getBody('delete_users_id');
        expect(body).toContain('this.timeout');
        expect(body).toContain('return { ok: true, value };');
        expect(body).toContain('return { ok: false, error: toProviderError(error) };');
    });
});
