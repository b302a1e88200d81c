import { Node, Project, SourceFile } from 'ts-morph';

import { DeclarationError } from './diagnostics.js';
import { collectTypeNames, getEndpointTypeReferences } from './parser/type-reference.js';
import { ProviderDescriptor } from './types/index.js';

function declaresType(node: Node): boolean {
    return (
        Node.isInterfaceDeclaration(node) ||
        Node.isTypeAliasDeclaration(node) ||
        Node.isClassDeclaration(node) ||
        Node.isEnumDeclaration(node) ||
        Node.isModuleDeclaration(node)
    );
}

/**
 * The set of type names a declaration may refer to.
 * Built from the exports of a TypeScript module, from a plain list of names, or both.
 */
export class TypeRegistry {
    private readonly names: Set<string>;

    private constructor(names: Iterable<string>) {
        this.names = new Set(names);
    }

    static fromNames(names: Iterable<string>): TypeRegistry {
        return new TypeRegistry(names);
    }

    /** Every exported interface, type alias, class, enum and namespace of `sourceFile`. */
    static fromSourceFile(sourceFile: SourceFile, extraNames: Iterable<string> = []): TypeRegistry {
        const names = new Set(extraNames);
        for (const [name, declarations] of sourceFile.getExportedDeclarations()) {
            if (declarations.some(declaresType)) names.add(name);
        }
        return new TypeRegistry(names);
    }

    static fromFile(filePath: string, extraNames: Iterable<string> = [], project?: Project): TypeRegistry {
        const activeProject = project ?? new Project({ skipAddingFilesFromTsConfig: true });
        const sourceFile = activeProject.getSourceFile(filePath) ?? activeProject.addSourceFileAtPath(filePath);
        return TypeRegistry.fromSourceFile(sourceFile, extraNames);
    }

    public has(name: string): boolean {
        return this.names.has(name);
    }

    public get size(): number {
        return this.names.size;
    }

    /**
     * @throws {DeclarationError} `UnknownType` for the first referenced name the registry lacks.
     */
    public validate(provider: ProviderDescriptor): void {
        for (const endpoint of provider.endpoints) {
            for (const ref of getEndpointTypeReferences(endpoint)) {
                const missing = collectTypeNames(ref.text).find(name => !this.has(name));
                if (missing !== undefined) {
                    throw new DeclarationError(
                        'UnknownType',
                        `Type "${missing}" is not declared in the type registry.`,
                        ref.text,
                        ref.location,
                    );
                }
            }
        }
    }
}
