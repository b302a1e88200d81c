import * as path from 'node:path';
import { Project, Scope, VariableDeclarationKind } from 'ts-morph';

import { BODY_SNIPPET_LENGTH, RUNTIME_FILE_NAME, UTILITY_GENERATOR_HEADER_COMMENT } from '../../core/constants.js';

/**
 * Generates `provider-runtime.ts`, the support module every generated provider imports:
 * the error and result types, the fetch-based transport and the request pipeline stages.
 * The module has no imports of its own.
 */
export class RuntimeGenerator {
    constructor(private readonly project: Project) {}

    public generate(outputDir: string): void {
        const filePath = path.join(outputDir, `${RUNTIME_FILE_NAME}.ts`);
        const sourceFile = this.project.createSourceFile(filePath, '', { overwrite: true });

        sourceFile.insertText(0, UTILITY_GENERATOR_HEADER_COMMENT);

        sourceFile.addTypeAlias({
            name: 'ProviderErrorKind',
            isExported: true,
            docs: ['The pipeline stage a request failed in.'],
            type: [
                "'UrlConstructionError'",
                "'QuerySerializationError'",
                "'BodySerializationError'",
                "'NetworkError'",
                "'HttpStatusError'",
                "'DeserializationError'",
            ].join(' | '),
        });

        sourceFile.addInterface({
            name: 'ProviderErrorDetail',
            isExported: true,
            properties: [
                { name: 'path', type: 'string', hasQuestionToken: true, docs: ['The path template, for URL failures.'] },
                { name: 'status', type: 'number', hasQuestionToken: true },
                {
                    name: 'bodySnippet',
                    type: 'string',
                    hasQuestionToken: true,
                    docs: [`The first ${BODY_SNIPPET_LENGTH} characters of a non-2xx response body.`],
                },
                { name: 'cause', type: 'unknown', hasQuestionToken: true },
            ],
        });

        sourceFile.addClass({
            name: 'ProviderError',
            isExported: true,
            extends: 'Error',
            docs: ['A failed provider call. Returned inside a `ProviderResult`, never thrown to the caller.'],
            properties: [
                { name: 'kind', type: 'ProviderErrorKind', scope: Scope.Public, isReadonly: true },
                { name: 'path', type: 'string', hasQuestionToken: true, scope: Scope.Public, isReadonly: true },
                { name: 'status', type: 'number', hasQuestionToken: true, scope: Scope.Public, isReadonly: true },
                { name: 'bodySnippet', type: 'string', hasQuestionToken: true, scope: Scope.Public, isReadonly: true },
            ],
            ctors: [
                {
                    parameters: [
                        { name: 'kind', type: 'ProviderErrorKind' },
                        { name: 'message', type: 'string' },
                        { name: 'detail', type: 'ProviderErrorDetail', initializer: '{}' },
                    ],
                    statements: `
super(message, detail.cause === undefined ? undefined : { cause: detail.cause });
this.name = 'ProviderError';
this.kind = kind;
this.path = detail.path;
this.status = detail.status;
this.bodySnippet = detail.bodySnippet;`,
                },
            ],
        });

        sourceFile.addTypeAlias({
            name: 'ProviderResult',
            isExported: true,
            typeParameters: ['T'],
            type: '{ ok: true; value: T } | { ok: false; error: ProviderError }',
        });

        sourceFile.addInterface({
            name: 'Transport',
            isExported: true,
            docs: ['Sends one request. Rejects with a `NetworkError` when no response arrives.'],
            methods: [
                {
                    name: 'send',
                    parameters: [
                        { name: 'url', type: 'URL' },
                        { name: 'init', type: 'RequestInit' },
                        { name: 'timeoutSeconds', type: 'number' },
                    ],
                    returnType: 'Promise<Response>',
                },
            ],
        });

        sourceFile.addVariableStatement({
            declarationKind: VariableDeclarationKind.Const,
            declarations: [{ name: 'PLACEHOLDER', initializer: '/\\{([A-Za-z_$][A-Za-z0-9_$]*)\\}/g' }],
        });

        sourceFile.addFunctions([
            {
                name: 'createTransport',
                isExported: true,
                docs: ['A transport over `fetch`. The timeout bounds the exchange up to the response headers, not the body read.'],
                parameters: [{ name: 'fetchImpl', type: 'typeof fetch', initializer: 'fetch' }],
                returnType: 'Transport',
                statements: `
return {
    async send(url: URL, init: RequestInit, timeoutSeconds: number): Promise<Response> {
        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, timeoutSeconds * 1000);
        try {
            return await fetchImpl(url, { ...init, signal: controller.signal });
        } catch (error) {
            const message = timedOut
                ? \`Request to \${url.href} timed out after \${timeoutSeconds}s\`
                : \`Request to \${url.href} failed: \${describeError(error)}\`;
            throw new ProviderError('NetworkError', message, { cause: error });
        } finally {
            clearTimeout(timer);
        }
    },
};`,
            },
            {
                name: 'resolvePath',
                isExported: true,
                docs: ['Substitutes every `{name}` of a path template with the URI-encoded value of the same-named field.'],
                parameters: [
                    { name: 'template', type: 'string' },
                    { name: 'params', type: 'object', hasQuestionToken: true },
                ],
                returnType: 'string',
                statements: `
const values = new Map<string, unknown>(Object.entries(params ?? {}));
return template.replace(PLACEHOLDER, (_match: string, name: string) => {
    const value = values.get(name);
    const fail = (reason: string, cause?: unknown): never => {
        throw new ProviderError('UrlConstructionError', \`Path parameter "\${name}" \${reason}\`, { path: template, cause });
    };
    const encode = (text: string): string => {
        try {
            return encodeURIComponent(text);
        } catch (error) {
            // lone surrogates
            return fail('is not valid text', error);
        }
    };
    if (value === undefined || value === null) return fail('is missing');
    switch (typeof value) {
        case 'string':
            return value === '' ? fail('is empty') : encode(value);
        case 'number':
            return Number.isFinite(value) ? encode(String(value)) : fail(\`is not a finite number (\${value})\`);
        case 'boolean':
        case 'bigint':
            return encode(String(value));
        default:
            return fail(\`has unsupported type \${typeof value}\`);
    }
});`,
            },
            {
                name: 'buildUrl',
                isExported: true,
                docs: ['Appends a resolved path to the base URL path, dropping its trailing slashes. The base query is kept.'],
                parameters: [
                    { name: 'base', type: 'URL' },
                    { name: 'path', type: 'string' },
                ],
                returnType: 'URL',
                statements: `
const stem = new URL(base.href);
stem.search = '';
stem.hash = '';
const root = stem.href.replace(/\\/+$/, '');
const suffix = path.startsWith('/') ? path : \`/\${path}\`;
try {
    const url = new URL(\`\${root}\${suffix}\`);
    base.searchParams.forEach((value, key) => url.searchParams.append(key, value));
    return url;
} catch (error) {
    throw new ProviderError('UrlConstructionError', \`Cannot build a URL from "\${root}" and "\${path}"\`, {
        path,
        cause: error,
    });
}`,
            },
            {
                name: 'appendQuery',
                isExported: true,
                docs: [
                    'Appends the own fields of `query` to the URL. `undefined` and `null` fields are skipped and arrays repeat the key.',
                ],
                parameters: [
                    { name: 'url', type: 'URL' },
                    { name: 'query', type: 'object', hasQuestionToken: true },
                ],
                returnType: 'URL',
                statements: `
if (query === undefined || query === null) return url;
if (typeof query !== 'object' || Array.isArray(query)) {
    throw new ProviderError('QuerySerializationError', 'Query parameters must be a plain object');
}
for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    const items: unknown[] = Array.isArray(value) ? value : [value];
    for (const item of items) {
        if (item === undefined || item === null) continue;
        url.searchParams.append(key, toQueryValue(key, item));
    }
}
return url;`,
            },
            {
                name: 'toQueryValue',
                parameters: [
                    { name: 'key', type: 'string' },
                    { name: 'value', type: 'unknown' },
                ],
                returnType: 'string',
                statements: `
if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
        throw new ProviderError('QuerySerializationError', \`Query parameter "\${key}" is an invalid date\`);
    }
    return value.toISOString();
}
switch (typeof value) {
    case 'string':
        return value;
    case 'number':
    case 'boolean':
    case 'bigint':
        return String(value);
    default:
        throw new ProviderError(
            'QuerySerializationError',
            \`Query parameter "\${key}" has unsupported type \${typeof value}\`,
        );
}`,
            },
            {
                name: 'serializeBody',
                isExported: true,
                parameters: [{ name: 'body', type: 'unknown' }],
                returnType: 'string',
                statements: `
let text: string | undefined;
try {
    text = JSON.stringify(body);
} catch (error) {
    throw new ProviderError('BodySerializationError', \`Request body cannot be serialized: \${describeError(error)}\`, {
        cause: error,
    });
}
if (text === undefined) {
    throw new ProviderError('BodySerializationError', \`Request body of type \${typeof body} has no JSON form\`);
}
return text;`,
            },
            {
                name: 'readJson',
                isExported: true,
                isAsync: true,
                docs: ['Reads the response body, rejecting non-2xx statuses before the body is parsed.'],
                typeParameters: ['T'],
                parameters: [{ name: 'response', type: 'Response' }],
                returnType: 'Promise<T>',
                statements: `
let text: string;
try {
    text = await response.text();
} catch (error) {
    throw new ProviderError('NetworkError', \`Failed to read the response body: \${describeError(error)}\`, {
        cause: error,
    });
}
if (response.status < 200 || response.status > 299) {
    throw new ProviderError('HttpStatusError', \`Request failed with status \${response.status}\`, {
        status: response.status,
        bodySnippet: Array.from(text).slice(0, ${BODY_SNIPPET_LENGTH}).join(''),
    });
}
try {
    return JSON.parse(text);
} catch (error) {
    throw new ProviderError('DeserializationError', \`Response body is not valid JSON: \${describeError(error)}\`, {
        status: response.status,
        cause: error,
    });
}`,
            },
            {
                name: 'toProviderError',
                isExported: true,
                parameters: [{ name: 'error', type: 'unknown' }],
                returnType: 'ProviderError',
                statements: `
if (error instanceof ProviderError) return error;
return new ProviderError('NetworkError', describeError(error), { cause: error });`,
            },
            {
                name: 'describeError',
                parameters: [{ name: 'error', type: 'unknown' }],
                returnType: 'string',
                statements: 'return error instanceof Error ? error.message : String(error);',
            },
        ]);

        sourceFile.formatText();
    }
}
