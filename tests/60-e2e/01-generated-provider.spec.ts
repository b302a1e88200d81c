import { describe, expect, it } from 'vitest';
import { createFetchStub, jsonResponse, loadProvider, runGenerator } from '../shared/helpers.js';
import { userApiDeclaration } from '../fixtures/declarations.fixture.js';

async function createUserApi(
    respond: Parameters<typeof createFetchStub>[0],
    baseUrl = 'http://api.test/',
    timeout = 5,
) {
    const { project } = await runGenerator(userApiDeclaration);
    const stub = createFetchStub(respond);
    const { runtime, providerModule } = loadProvider(project, 'user-api.provider.ts', stub.fetch);
    return { api: new providerModule.UserApi(baseUrl, timeout), requests: stub.requests, runtime };
}

describe('E2E: generated provider', () => {
    it('should fetch a list', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse([{ id: 1, name: 'Ada' }]));
        const result = await api.get_users();

        expect(result).toEqual({ ok: true, value: [{ id: 1, name: 'Ada' }] });
        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('http://api.test/users');
        expect(requests[0].method).toBe('GET');
        expect(requests[0].body).toBeUndefined();
    });

    it('should substitute path parameters', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({ id: 42, name: 'Bo' }));
        const result = await api.get_users_id({ id: 42 });

        expect(result).toEqual({ ok: true, value: { id: 42, name: 'Bo' } });
        expect(requests[0].url).toBe('http://api.test/users/42');
    });

    it('should send a JSON body', async () => {
        const { api, requests } = await createUserApi(request => jsonResponse({ id: 7, ...JSON.parse(request.body ?? '{}') }));
        const result = await api.create_user({ name: 'Cy' });

        expect(result).toEqual({ ok: true, value: { id: 7, name: 'Cy' } });
        expect(requests[0].method).toBe('POST');
        expect(requests[0].body).toBe('{"name":"Cy"}');
        expect(requests[0].headers.get('content-type')).toBe('application/json');
    });

    it('should keep caller headers, including a content type', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({ id: 1, name: 'Di' }));
        await api.put_users_id({ id: 'a/b' }, { name: 'Di' }, { 'Content-Type': 'application/merge-patch+json', 'X-Trace': 't-1' });

        expect(requests[0].url).toBe('http://api.test/users/a%2Fb');
        expect(requests[0].method).toBe('PUT');
        expect(requests[0].headers.get('content-type')).toBe('application/merge-patch+json');
        expect(requests[0].headers.get('x-trace')).toBe('t-1');
    });

    it('should encode query parameters', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({ items: [], total: 0 }));
        const result = await api.get_search({ q: 'x y', tags: ['a', 'b'], limit: undefined });

        expect(result).toEqual({ ok: true, value: { items: [], total: 0 } });
        expect(requests[0].url).toBe('http://api.test/search?q=x+y&tags=a&tags=b');
    });

    it('should append paths to a base URL with a path of its own', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse([]), 'http://api.test/v2');
        await api.get_users();
        expect(requests[0].url).toBe('http://api.test/v2/users');
    });

    it('should keep the query of the base URL alongside caller query parameters', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({ items: [], total: 0 }), 'http://api.test/v2?key=k1');
        await api.get_users();
        await api.get_search({ q: 'z' });
        expect(requests[0].url).toBe('http://api.test/v2/users?key=k1');
        expect(requests[1].url).toBe('http://api.test/v2/search?key=k1&q=z');
    });

    it('should return non-2xx statuses as HttpStatusError', async () => {
        const { api, runtime } = await createUserApi(() => new Response('boom', { status: 500 }));
        const result = await api.delete_users_id({ id: 3 });

        expect(result.ok).toBe(false);
        expect(result.error).toBeInstanceOf(runtime.ProviderError);
        expect(result.error.kind).toBe('HttpStatusError');
        expect(result.error.status).toBe(500);
        expect(result.error.bodySnippet).toBe('boom');
    });

    it('should fail URL construction without sending a request', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({}));
        const result = await api.get_users_id({});

        expect(result.ok).toBe(false);
        expect(result.error.kind).toBe('UrlConstructionError');
        expect(result.error.path).toBe('/users/{id}');
        expect(requests).toHaveLength(0);
    });

    it('should report a path parameter with a lone surrogate as a URL failure', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({}));
        const result = await api.get_users_id({ id: '\uD800' });

        expect(result.ok).toBe(false);
        expect(result.error.kind).toBe('UrlConstructionError');
        expect(result.error.message).toBe('Path parameter "id" is not valid text');
        expect(requests).toHaveLength(0);
    });

    it('should fail query serialization without sending a request', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({}));
        const result = await api.get_search({ q: { nested: true } });

        expect(result.error.kind).toBe('QuerySerializationError');
        expect(requests).toHaveLength(0);
    });

    it('should fail body serialization without sending a request', async () => {
        const { api, requests } = await createUserApi(() => jsonResponse({}));
        const result = await api.create_user({ id: 1n });

        expect(result.error.kind).toBe('BodySerializationError');
        expect(requests).toHaveLength(0);
    });

    it('should return a DeserializationError for a non-JSON success body', async () => {
        const { api } = await createUserApi(() => new Response('not json', { status: 200 }));
        const result = await api.get_users();
        expect(result.error.kind).toBe('DeserializationError');
    });

    it('should return a NetworkError when fetch rejects', async () => {
        const { api } = await createUserApi(() => {
            throw new TypeError('fetch failed');
        });
        const result = await api.get_users();
        expect(result.error.kind).toBe('NetworkError');
        expect(result.error.message).toBe('Request to http://api.test/users failed: fetch failed');
    });

    it('should return a NetworkError when the timeout expires', async () => {
        const { api } = await createUserApi(
            (_request, signal) =>
                new Promise<Response>((_resolve, reject) => {
                    signal?.addEventListener('abort', () => reject(signal?.reason));
                }),
            'http://api.test',
            0.05,
        );
        const result = await api.get_users();
        expect(result.error.kind).toBe('NetworkError');
        expect(result.error.message).toBe('Request to http://api.test/users timed out after 0.05s');
    });

    it('should validate constructor arguments', async () => {
        const { project } = await runGenerator(userApiDeclaration);
        const { providerModule } = loadProvider(project, 'user-api.provider.ts', createFetchStub(() => jsonResponse({})).fetch);

        expect(() => new providerModule.UserApi('http://api.test', 0)).toThrow(RangeError);
        expect(() => new providerModule.UserApi('http://api.test', Number.NaN)).toThrow(
            'timeout must be a positive number of seconds, got NaN',
        );
        expect(() => new providerModule.UserApi('not a url', 5)).toThrow(TypeError);
        expect(() => new providerModule.UserApi(new URL('http://api.test'), 1)).not.toThrow();
    });
});
