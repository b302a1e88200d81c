import { ClassDeclaration, OptionalKind, ParameterDeclarationStructure } from 'ts-morph';

import { getPathPlaceholders } from '../../core/parser/endpoint-builder.js';
import { ResolvedEndpointDescriptor } from '../../core/types/index.js';

/** The runtime helpers a method body calls, beyond those every method uses. */
export interface MethodRuntimeUsage {
    resolvePath: boolean;
    appendQuery: boolean;
    serializeBody: boolean;
}

function quote(value: string): string {
    return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Emits one async method per endpoint. Parameters appear in the order
 * `pathParams`, `body`, `headers`, `queryParams`, each only when the endpoint declares it.
 */
export class ProviderMethodGenerator {
    public getRuntimeUsage(endpoint: ResolvedEndpointDescriptor): MethodRuntimeUsage {
        return {
            resolvePath: endpoint.pathParams !== undefined || getPathPlaceholders(endpoint.path).length > 0,
            appendQuery: endpoint.queryParams !== undefined,
            serializeBody: endpoint.req !== undefined,
        };
    }

    public addProviderMethod(classDeclaration: ClassDeclaration, endpoint: ResolvedEndpointDescriptor): void {
        const parameters: OptionalKind<ParameterDeclarationStructure>[] = [];
        if (endpoint.pathParams) parameters.push({ name: 'pathParams', type: endpoint.pathParams.text });
        if (endpoint.req) parameters.push({ name: 'body', type: endpoint.req.text });
        if (endpoint.headers) parameters.push({ name: 'headers', type: endpoint.headers.text });
        if (endpoint.queryParams) parameters.push({ name: 'queryParams', type: endpoint.queryParams.text });

        classDeclaration.addMethod({
            name: endpoint.fnName,
            isAsync: true,
            parameters,
            returnType: `Promise<ProviderResult<${endpoint.res.text}>>`,
            docs: [`\`${endpoint.method} ${endpoint.path}\``],
            statements: this.emitMethodBody(endpoint),
        });
    }

    private emitMethodBody(endpoint: ResolvedEndpointDescriptor): string {
        const usage = this.getRuntimeUsage(endpoint);
        const lines: string[] = [];

        const pathExpression = usage.resolvePath
            ? `resolvePath(${quote(endpoint.path)}${endpoint.pathParams ? ', pathParams' : ''})`
            : quote(endpoint.path);
        lines.push(`const url = buildUrl(this.url, ${pathExpression});`);

        if (usage.appendQuery) {
            lines.push('appendQuery(url, queryParams);');
        }

        lines.push(`const requestHeaders = new Headers(${endpoint.headers ? 'headers' : ''});`);

        const init = [`method: '${endpoint.method}'`, 'headers: requestHeaders'];
        if (usage.serializeBody) {
            lines.push('const payload = serializeBody(body);');
            lines.push(
                `if (!requestHeaders.has('Content-Type')) { requestHeaders.set('Content-Type', 'application/json'); }`,
            );
            init.push('body: payload');
        }

        lines.push(`const response = await this.client.send(url, { ${init.join(', ')} }, this.timeout);`);
        lines.push(`const value = await readJson<${endpoint.res.text}>(response);`);
        lines.push('return { ok: true, value };');

        return `
try {
${lines.join('\n')}
} catch (error) {
return { ok: false, error: toProviderError(error) };
}`;
    }
}
