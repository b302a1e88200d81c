import * as path from 'node:path';
import { ClassDeclaration, Project, Scope, SourceFile } from 'ts-morph';

import { PROVIDER_GENERATOR_HEADER_COMMENT, RUNTIME_FILE_NAME } from '../../core/constants.js';
import { getPathPlaceholders } from '../../core/parser/endpoint-builder.js';
import { collectTypeNames, getEndpointTypeReferences } from '../../core/parser/type-reference.js';
import { ResolvedProviderDescriptor } from '../../core/types/index.js';
import { getProviderFileName, toSiblingSpecifier } from '../../core/utils/index.js';
import { ProviderMethodGenerator } from './provider-method.generator.js';

export interface ProviderGeneratorOptions {
    /** Module the referenced type names are imported from. No import is written when absent. */
    typesModule?: string;
    importExtension: string;
}

/** The distinct `implements` references of a provider's endpoints, in declaration order. */
export function getImplementedInterfaces(provider: ResolvedProviderDescriptor): string[] {
    const names = provider.endpoints.flatMap(endpoint => (endpoint.implements ? [endpoint.implements.text] : []));
    return [...new Set(names)];
}

/**
 * Generates `<kebab-name>.provider.ts` holding the provider class of one declaration.
 */
export class ProviderGenerator {
    private readonly methodGenerator = new ProviderMethodGenerator();
    /** Messages about endpoints whose generated method can never succeed. */
    public readonly warnings: string[] = [];

    constructor(
        private readonly project: Project,
        private readonly options: ProviderGeneratorOptions,
    ) {}

    public generate(provider: ResolvedProviderDescriptor, outputDir: string): SourceFile {
        const filePath = path.join(outputDir, getProviderFileName(provider.name));
        const sourceFile = this.project.createSourceFile(filePath, '', { overwrite: true });

        sourceFile.insertText(0, PROVIDER_GENERATOR_HEADER_COMMENT);

        this.collectWarnings(provider);
        this.generateImports(sourceFile, provider);

        const providerClass = sourceFile.addClass({
            name: provider.name,
            isExported: true,
            implements: getImplementedInterfaces(provider),
        });
        this.addPropertiesAndConstructor(providerClass);

        for (const endpoint of provider.endpoints) {
            this.methodGenerator.addProviderMethod(providerClass, endpoint);
        }

        sourceFile.formatText();
        return sourceFile;
    }

    private generateImports(sourceFile: SourceFile, provider: ResolvedProviderDescriptor): void {
        const runtimeNames = new Set(['buildUrl', 'createTransport', 'readJson', 'toProviderError']);
        for (const endpoint of provider.endpoints) {
            const usage = this.methodGenerator.getRuntimeUsage(endpoint);
            if (usage.resolvePath) runtimeNames.add('resolvePath');
            if (usage.appendQuery) runtimeNames.add('appendQuery');
            if (usage.serializeBody) runtimeNames.add('serializeBody');
        }

        const runtimeSpecifier = toSiblingSpecifier(RUNTIME_FILE_NAME, this.options.importExtension);
        sourceFile.addImportDeclaration({
            moduleSpecifier: runtimeSpecifier,
            namedImports: [...runtimeNames].sort(),
        });
        sourceFile.addImportDeclaration({
            isTypeOnly: true,
            moduleSpecifier: runtimeSpecifier,
            namedImports: ['ProviderResult', 'Transport'],
        });

        if (!this.options.typesModule) return;

        const typeNames = new Set<string>();
        for (const endpoint of provider.endpoints) {
            for (const ref of getEndpointTypeReferences(endpoint)) {
                collectTypeNames(ref.text).forEach(name => typeNames.add(name));
            }
        }
        if (typeNames.size > 0) {
            sourceFile.addImportDeclaration({
                isTypeOnly: true,
                moduleSpecifier: this.options.typesModule,
                namedImports: [...typeNames].sort(),
            });
        }
    }

    private addPropertiesAndConstructor(providerClass: ClassDeclaration): void {
        providerClass.addProperties([
            { name: 'url', type: 'URL', scope: Scope.Private, isReadonly: true },
            { name: 'client', type: 'Transport', scope: Scope.Private, isReadonly: true },
            { name: 'timeout', type: 'number', scope: Scope.Private, isReadonly: true, docs: ['Seconds.'] },
        ]);

        providerClass.addConstructor({
            parameters: [
                { name: 'url', type: 'string | URL' },
                { name: 'timeout', type: 'number' },
            ],
            docs: ['@param url Base URL every endpoint path is appended to.\n@param timeout Request timeout in seconds.'],
            statements: `
if (!Number.isFinite(timeout) || timeout <= 0) {
    throw new RangeError(\`timeout must be a positive number of seconds, got \${timeout}\`);
}
this.url = new URL(url);
this.timeout = timeout;
this.client = createTransport();`,
        });
    }

    private collectWarnings(provider: ResolvedProviderDescriptor): void {
        for (const endpoint of provider.endpoints) {
            const placeholders = getPathPlaceholders(endpoint.path);
            if (placeholders.length > 0 && !endpoint.pathParams) {
                this.warnings.push(
                    `${provider.name}.${endpoint.fnName}: path "${endpoint.path}" has placeholders ` +
                        `(${placeholders.join(', ')}) but no path_params; every call returns UrlConstructionError.`,
                );
            }
        }
    }
}
