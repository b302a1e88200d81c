/**
 * @fileoverview
 * This file contains the DeclarationParser class, the entry point that turns a declaration
 * file of any supported format into provider descriptors.
 */

import { DeclarationError } from './diagnostics.js';
import { DeclarationLoader, detectDeclarationFormat } from './parser/declaration-loader.js';
import { DslParser } from './parser/dsl-parser.js';
import { SchemaParser } from './parser/schema-parser.js';
import { DeclarationFormat, ProviderDescriptor } from './types/index.js';
import { getProviderFileName } from './utils/naming.js';

/**
 * Parses the declarations of one compilation unit (one input file).
 * @param source The file content.
 * @param fileName Used in diagnostics and, when `format` is omitted, to pick the format.
 * @throws {DeclarationError} on the first structural or validation failure, including two
 * providers whose generated files would share a name.
 */
export function parseDeclarations(
    source: string,
    fileName: string,
    format: DeclarationFormat = detectDeclarationFormat(fileName),
): ProviderDescriptor[] {
    const providers =
        format === 'dsl' ? new DslParser(source, fileName).parse() : new SchemaParser(source, fileName, format).parse();

    const fileOwners = new Map<string, string>();
    for (const provider of providers) {
        const fileName = getProviderFileName(provider.name);
        const owner = fileOwners.get(fileName);
        if (owner === provider.name) {
            throw new DeclarationError(
                'DuplicateProviderName',
                `Provider "${provider.name}" is declared more than once in this file.`,
                provider.name,
                provider.location,
            );
        }
        if (owner !== undefined) {
            throw new DeclarationError(
                'DuplicateProviderName',
                `Provider "${provider.name}" would be written to ${fileName}, which provider "${owner}" already uses.`,
                provider.name,
                provider.location,
            );
        }
        fileOwners.set(fileName, provider.name);
    }
    return providers;
}

/**
 * A parsed declaration file.
 */
export class DeclarationParser {
    public readonly providers: ProviderDescriptor[];

    public constructor(
        public readonly source: string,
        public readonly fileName: string,
        public readonly format: DeclarationFormat = detectDeclarationFormat(fileName),
    ) {
        this.providers = parseDeclarations(source, fileName, format);
    }

    static async create(inputPath: string): Promise<DeclarationParser> {
        const { source, file, format } = await DeclarationLoader.load(inputPath);
        return new DeclarationParser(source, file, format);
    }
}
