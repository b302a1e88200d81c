/**
 * @fileoverview
 * The in-memory model of a parsed provider declaration. Descriptors exist only for the
 * duration of one generation run.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Position of a fragment inside a DSL declaration file. 1-based. */
export interface TextLocation {
    file: string;
    line: number;
    column: number;
}

/** Position of a value inside a JSON or YAML endpoint table, as a JSON pointer. */
export interface PointerLocation {
    file: string;
    pointer: string;
}

export type SourceLocation = TextLocation | PointerLocation;

/**
 * A TypeScript type expression copied verbatim from the declaration,
 * e.g. `User[]` or `Record<string, string>`.
 */
export interface TypeReference {
    readonly text: string;
    readonly location: SourceLocation;
}

/** The endpoint keys as they are spelled in a declaration. */
export type EndpointFieldKey =
    | 'path'
    | 'method'
    | 'fn_name'
    | 'req'
    | 'res'
    | 'headers'
    | 'query_params'
    | 'path_params'
    | 'implements';

export interface EndpointDescriptor {
    readonly path: string;
    readonly method: HttpMethod;
    readonly fnName?: string;
    readonly req?: TypeReference;
    readonly res: TypeReference;
    readonly headers?: TypeReference;
    readonly queryParams?: TypeReference;
    readonly pathParams?: TypeReference;
    /** An interface the generated class declares it implements. */
    readonly implements?: TypeReference;
    /** Where the endpoint block starts. */
    readonly location: SourceLocation;
    /** Where each supplied field's value starts. */
    readonly fieldLocations: Readonly<Partial<Record<EndpointFieldKey, SourceLocation>>>;
}

export interface ProviderDescriptor {
    readonly name: string;
    readonly endpoints: readonly EndpointDescriptor[];
    readonly location: SourceLocation;
}

export interface ResolvedEndpointDescriptor extends EndpointDescriptor {
    readonly fnName: string;
    /** True when `fnName` was computed from the method and path. */
    readonly derivedName: boolean;
}

export interface ResolvedProviderDescriptor extends ProviderDescriptor {
    readonly endpoints: readonly ResolvedEndpointDescriptor[];
}

export type DeclarationFormat = 'dsl' | 'json' | 'yaml';
