// src/core/diagnostics.ts

import { SourceLocation } from './types/index.js';

export type DiagnosticCode =
    | 'MalformedDeclaration'
    | 'MissingRequiredField'
    | 'UnsupportedMethod'
    | 'UnknownField'
    | 'DuplicateField'
    | 'DuplicateFunctionName'
    | 'ReservedFunctionName'
    | 'DuplicateProviderName'
    | 'InvalidPath'
    | 'UnknownType';

/**
 * Error thrown when a provider declaration cannot be turned into a provider.
 * Carries the offending fragment of the declaration and where it was found.
 */
export class DeclarationError extends Error {
    constructor(
        public readonly code: DiagnosticCode,
        message: string,
        public readonly fragment: string,
        public readonly location: SourceLocation,
    ) {
        super(message);
        this.name = 'DeclarationError';
    }
}

export function formatLocation(location: SourceLocation): string {
    if ('pointer' in location) {
        return `${location.file}#${location.pointer}`;
    }
    return `${location.file}:${location.line}:${location.column}`;
}

/**
 * Renders a diagnostic the way compilers print them:
 *
 * ```
 * api.provider:4:21 - error UnsupportedMethod: Unsupported HTTP method "PATCH".
 *     PATCH
 * ```
 */
export function formatDiagnostic(error: DeclarationError): string {
    const header = `${formatLocation(error.location)} - error ${error.code}: ${error.message}`;
    if (!error.fragment) return header;
    const fragment = error.fragment
        .split('\n')
        .map(line => `    ${line}`)
        .join('\n');
    return `${header}\n${fragment}`;
}

export function isDeclarationError(error: unknown): error is DeclarationError {
    return error instanceof DeclarationError;
}
