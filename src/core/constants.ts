import { HttpMethod } from './types/descriptor.js';

export const PROVIDER_GENERATOR_HEADER_COMMENT = `/**
 * This file was generated by provider-codegen from an endpoint declaration.
 * Changes made here are overwritten on the next generation run.
 */
`;

export const UTILITY_GENERATOR_HEADER_COMMENT = `/**
 * Runtime support for generated providers. Generated by provider-codegen.
 */
`;

export const SUPPORTED_HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'DELETE'];

/** Keys an endpoint block may carry, as written in a declaration. */
export const ENDPOINT_FIELD_KEYS = [
    'path',
    'method',
    'fn_name',
    'req',
    'res',
    'headers',
    'query_params',
    'path_params',
    'implements',
] as const;

export const REQUIRED_ENDPOINT_FIELDS = ['path', 'method', 'res'] as const;

/** Members every generated provider class declares; endpoint methods cannot reuse them. */
export const RESERVED_PROVIDER_MEMBERS: ReadonlySet<string> = new Set(['url', 'client', 'timeout', 'constructor']);

export const RUNTIME_FILE_NAME = 'provider-runtime';

/** Number of body characters kept on an HttpStatusError. */
export const BODY_SNIPPET_LENGTH = 256;

/**
 * Global type names that never need an import and are never looked up in a type registry.
 */
export const BUILTIN_TYPE_NAMES: ReadonlySet<string> = new Set([
    'Array',
    'ReadonlyArray',
    'Record',
    'Partial',
    'Required',
    'Readonly',
    'Pick',
    'Omit',
    'Exclude',
    'Extract',
    'NonNullable',
    'ReturnType',
    'Awaited',
    'Promise',
    'Map',
    'ReadonlyMap',
    'Set',
    'ReadonlySet',
    'Date',
    'Headers',
    'HeadersInit',
    'URLSearchParams',
    'Blob',
    'Uint8Array',
    'ArrayBuffer',
    'Object',
    'String',
    'Number',
    'Boolean',
    'BigInt',
    'Symbol',
]);
