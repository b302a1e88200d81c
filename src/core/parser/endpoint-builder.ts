import { ENDPOINT_FIELD_KEYS, REQUIRED_ENDPOINT_FIELDS, SUPPORTED_HTTP_METHODS } from '../constants.js';
import { DeclarationError } from '../diagnostics.js';
import {
    EndpointDescriptor,
    EndpointFieldKey,
    HttpMethod,
    SourceLocation,
    TypeReference,
} from '../types/index.js';
import { isImplementableReference, isValidTypeReference } from './type-reference.js';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const PLACEHOLDER = /^\{([A-Za-z_$][A-Za-z0-9_$]*)\}/;

type TypeFieldKey = 'req' | 'res' | 'headers' | 'query_params' | 'path_params' | 'implements';

export function isIdentifier(value: string): boolean {
    return IDENTIFIER.test(value);
}

export function isEndpointFieldKey(key: string): key is EndpointFieldKey {
    return (ENDPOINT_FIELD_KEYS as readonly string[]).includes(key);
}

function isTypeFieldKey(key: EndpointFieldKey): key is TypeFieldKey {
    return key !== 'path' && key !== 'method' && key !== 'fn_name';
}

/**
 * Matches an HTTP method token case-insensitively against the supported methods.
 * @throws {DeclarationError} `UnsupportedMethod` for any other token.
 */
export function parseHttpMethod(token: string, location: SourceLocation): HttpMethod {
    const method = SUPPORTED_HTTP_METHODS.find(candidate => candidate === token.toUpperCase());
    if (!method) {
        throw new DeclarationError(
            'UnsupportedMethod',
            `Unsupported HTTP method "${token}". Expected one of ${SUPPORTED_HTTP_METHODS.join(', ')}.`,
            token,
            location,
        );
    }
    return method;
}

/**
 * Checks the placeholder syntax of a path template: every `{` must open an `{identifier}`
 * and no `}` may appear on its own.
 */
export function validatePathTemplate(path: string, location: SourceLocation): void {
    for (let i = 0; i < path.length; i++) {
        const char = path[i];
        if (char === '{') {
            const match = PLACEHOLDER.exec(path.slice(i));
            if (!match) {
                throw new DeclarationError(
                    'InvalidPath',
                    `Malformed placeholder at position ${i} of path "${path}". Placeholders look like {name}.`,
                    path,
                    location,
                );
            }
            i += match[0].length - 1;
        } else if (char === '}') {
            throw new DeclarationError(
                'InvalidPath',
                `Unmatched "}" at position ${i} of path "${path}".`,
                path,
                location,
            );
        }
    }
}

/** Names of the `{placeholder}` tokens of a path template, in order of appearance. */
export function getPathPlaceholders(path: string): string[] {
    return [...path.matchAll(/\{([A-Za-z_$][A-Za-z0-9_$]*)\}/g)].map(match => match[1]);
}

/**
 * Accumulates the fields of one endpoint block and turns them into an EndpointDescriptor.
 * Shared by the DSL and the schema parsers so both report the same diagnostics.
 */
export class EndpointBuilder {
    private path?: string;
    private method?: HttpMethod;
    private fnName?: string;
    private readonly types: Partial<Record<TypeFieldKey, TypeReference>> = {};
    private readonly fieldLocations: Partial<Record<EndpointFieldKey, SourceLocation>> = {};

    constructor(private readonly location: SourceLocation) {}

    /**
     * Validates a field key before its value is read.
     * @throws {DeclarationError} `UnknownField` or `DuplicateField`.
     */
    public acceptKey(key: string, location: SourceLocation): EndpointFieldKey {
        if (!isEndpointFieldKey(key)) {
            throw new DeclarationError(
                'UnknownField',
                `Unknown endpoint field "${key}". Expected one of ${ENDPOINT_FIELD_KEYS.join(', ')}.`,
                key,
                location,
            );
        }
        if (this.fieldLocations[key]) {
            throw new DeclarationError('DuplicateField', `Field "${key}" is supplied more than once.`, key, location);
        }
        return key;
    }

    public set(key: EndpointFieldKey, value: string, location: SourceLocation): void {
        this.fieldLocations[key] = location;

        switch (key) {
            case 'path':
                validatePathTemplate(value, location);
                this.path = value;
                return;
            case 'method':
                this.method = parseHttpMethod(value, location);
                return;
            case 'fn_name':
                if (!isIdentifier(value)) {
                    throw new DeclarationError(
                        'MalformedDeclaration',
                        `fn_name must be an identifier, got "${value}".`,
                        value,
                        location,
                    );
                }
                this.fnName = value;
                return;
        }

        if (isTypeFieldKey(key)) {
            if (!isValidTypeReference(value)) {
                throw new DeclarationError(
                    'MalformedDeclaration',
                    `Field "${key}" is not a valid TypeScript type: ${value}`,
                    value,
                    location,
                );
            }
            if (key === 'implements' && !isImplementableReference(value)) {
                throw new DeclarationError(
                    'MalformedDeclaration',
                    `Field "implements" must name an interface, got: ${value}`,
                    value,
                    location,
                );
            }
            this.types[key] = { text: value, location };
        }
    }

    /**
     * @param fragment The endpoint block as written, reported when a required field is missing.
     * @throws {DeclarationError} `MissingRequiredField` for the first absent required field.
     */
    public build(fragment: string): EndpointDescriptor {
        for (const field of REQUIRED_ENDPOINT_FIELDS) {
            if (!this.fieldLocations[field]) {
                throw new DeclarationError(
                    'MissingRequiredField',
                    `Endpoint is missing required field "${field}".`,
                    fragment,
                    this.location,
                );
            }
        }

        const { path, method, fnName } = this;
        const res = this.types.res;
        if (path === undefined || method === undefined || res === undefined) {
            throw new DeclarationError('MalformedDeclaration', 'Endpoint is incomplete.', fragment, this.location);
        }

        return {
            path,
            method,
            ...(fnName !== undefined && { fnName }),
            ...(this.types.req && { req: this.types.req }),
            res,
            ...(this.types.headers && { headers: this.types.headers }),
            ...(this.types.query_params && { queryParams: this.types.query_params }),
            ...(this.types.path_params && { pathParams: this.types.path_params }),
            ...(this.types.implements && { implements: this.types.implements }),
            location: this.location,
            fieldLocations: { ...this.fieldLocations },
        };
    }
}
