import { RESERVED_PROVIDER_MEMBERS } from '../constants.js';
import { DeclarationError } from '../diagnostics.js';
import { GeneratorConfigOptions } from '../types/config.js';
import {
    EndpointDescriptor,
    HttpMethod,
    ProviderDescriptor,
    ResolvedEndpointDescriptor,
    ResolvedProviderDescriptor,
} from '../types/index.js';
import { camelCase, kebabCase, snakeCase } from './string.js';

/**
 * Computes the default method name of an endpoint: the lower-cased HTTP method followed by
 * the path, with placeholder braces dropped and separators turned into underscores.
 *
 * @example
 * deriveFunctionName('GET', '/users');      // 'get_users'
 * deriveFunctionName('PUT', '/users/{id}'); // 'put_users_id'
 * deriveFunctionName('GET', '/');           // 'get'
 */
export function deriveFunctionName(method: HttpMethod, path: string): string {
    const pathPart = snakeCase(path.replace(/^\/+/, '').replace(/[{}]/g, ''));
    const prefix = method.toLowerCase();
    return pathPart ? `${prefix}_${pathPart}` : prefix;
}

function describeEndpoint(endpoint: EndpointDescriptor): string {
    return `${endpoint.method} ${endpoint.path}`;
}

/**
 * Gives every endpoint of a provider a concrete method name, deriving the missing ones.
 * The input descriptor is left untouched.
 *
 * @throws {DeclarationError} `DuplicateFunctionName` when two endpoints resolve to the same name,
 * `ReservedFunctionName` when a name would shadow a member of the generated class.
 */
export function resolveFunctionNames(
    provider: ProviderDescriptor,
    options: Pick<GeneratorConfigOptions, 'methodNameStyle'> = {},
): ResolvedProviderDescriptor {
    const used = new Map<string, EndpointDescriptor>();

    const endpoints = provider.endpoints.map((endpoint): ResolvedEndpointDescriptor => {
        const derivedName = endpoint.fnName === undefined;
        let fnName = endpoint.fnName ?? deriveFunctionName(endpoint.method, endpoint.path);
        if (derivedName && options.methodNameStyle === 'camel') {
            fnName = camelCase(fnName);
        }

        const location =
            (derivedName ? endpoint.fieldLocations.path : endpoint.fieldLocations.fn_name) ?? endpoint.location;
        const fragment = derivedName ? `${describeEndpoint(endpoint)} -> ${fnName}` : `fn_name: ${fnName}`;

        if (RESERVED_PROVIDER_MEMBERS.has(fnName)) {
            throw new DeclarationError(
                'ReservedFunctionName',
                `Method name "${fnName}" collides with a member of provider "${provider.name}".`,
                fragment,
                location,
            );
        }

        const previous = used.get(fnName);
        if (previous) {
            throw new DeclarationError(
                'DuplicateFunctionName',
                `Method name "${fnName}" is already used by ${describeEndpoint(previous)} in provider "${provider.name}".`,
                fragment,
                location,
            );
        }
        used.set(fnName, endpoint);

        return { ...endpoint, fnName, derivedName };
    });

    return { ...provider, endpoints };
}

/** File name of the generated provider, e.g. `UserApi` -> `user-api.provider.ts`. */
export function getProviderFileName(providerName: string): string {
    return `${kebabCase(providerName)}.provider.ts`;
}
