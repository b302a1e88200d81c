// src/index.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import { ModuleKind, Project, ScriptTarget } from 'ts-morph';

import { DeclarationParser } from './core/parser.js';
import { TypeRegistry } from './core/type-registry.js';
import { DeclarationFormat, GeneratorConfig, ResolvedProviderDescriptor } from './core/types.js';
import { resolveFunctionNames } from './core/utils/index.js';
import { ProviderClientGenerator } from './generators/provider-client.generator.js';

export * from './core/types.js';
export { DeclarationError, formatDiagnostic, formatLocation, isDeclarationError } from './core/diagnostics.js';
export type { DiagnosticCode } from './core/diagnostics.js';
export { DeclarationParser, parseDeclarations } from './core/parser.js';
export { TypeRegistry } from './core/type-registry.js';
export { deriveFunctionName, getProviderFileName, resolveFunctionNames } from './core/utils/index.js';
export { ProviderClientGenerator } from './generators/provider-client.generator.js';

/**
 * For test environments, allows passing the declaration source instead of reading `config.input`.
 */
export type TestGeneratorConfig = {
    /** The declaration text. */
    source: string;
    /** Name reported in diagnostics. Defaults to `config.input`. */
    fileName?: string;
    /** Defaults to the format implied by the file name. */
    format?: DeclarationFormat;
    /** Used instead of the registry described by `config.options`. */
    registry?: TypeRegistry;
};

/**
 * Reads and parses the declaration file named by `config.input`.
 */
export async function loadDeclarations(
    config: GeneratorConfig,
    testConfig?: TestGeneratorConfig,
): Promise<DeclarationParser> {
    if (testConfig) {
        return new DeclarationParser(testConfig.source, testConfig.fileName ?? config.input, testConfig.format);
    }
    return DeclarationParser.create(config.input);
}

function loadTypeRegistry(
    config: GeneratorConfig,
    project: Project,
    testConfig?: TestGeneratorConfig,
): TypeRegistry | undefined {
    if (testConfig?.registry) return testConfig.registry;
    const { typeRegistry, knownTypes = [] } = config.options;
    if (typeRegistry) return TypeRegistry.fromFile(path.resolve(typeRegistry), knownTypes, project);
    if (knownTypes.length > 0) return TypeRegistry.fromNames(knownTypes);
    return undefined;
}

/**
 * Parses the declarations, resolves every method name and checks type references against
 * the registry when one is configured. Nothing is generated.
 * @throws {DeclarationError} on the first failure.
 */
export async function validateDeclarations(
    config: GeneratorConfig,
    project: Project = new Project({ skipAddingFilesFromTsConfig: true }),
    testConfig?: TestGeneratorConfig,
): Promise<ResolvedProviderDescriptor[]> {
    const parser = await loadDeclarations(config, testConfig);
    const registry = loadTypeRegistry(config, project, testConfig);

    return parser.providers.map(provider => {
        const resolved = resolveFunctionNames(provider, config.options);
        registry?.validate(resolved);
        return resolved;
    });
}

/**
 * Orchestrates the entire code generation process based on a configuration object.
 * @param config The generator configuration object.
 * @param project Optional ts-morph Project to use. If not provided, a new one is created. Useful for testing.
 * @param testConfig Optional configuration for test environments to inject the declaration source.
 * @returns The providers that were generated.
 */
export async function generateFromConfig(
    config: GeneratorConfig,
    project?: Project,
    testConfig?: TestGeneratorConfig,
): Promise<ResolvedProviderDescriptor[]> {
    const isTestEnv = !!testConfig;

    const activeProject =
        project ||
        new Project({
            compilerOptions: {
                declaration: true,
                target: ScriptTarget.ES2022,
                module: ModuleKind.NodeNext,
                strict: true,
                ...config.compilerOptions,
            },
        });

    if (!isTestEnv && !fs.existsSync(config.output)) {
        fs.mkdirSync(config.output, { recursive: true });
    }

    if (!isTestEnv) {
        console.log(`📡 Processing provider declarations from file: ${config.input}`);
    }

    try {
        const providers = await validateDeclarations(config, activeProject, testConfig);

        const generator = new ProviderClientGenerator();
        await generator.generate(activeProject, providers, config, config.output);

        if (!isTestEnv) {
            for (const warning of generator.warnings) {
                console.warn(`⚠️  ${warning}`);
            }
            await activeProject.save();
            console.log(`✅ Generated ${providers.length} provider(s) in ${config.output}`);
        }
        return providers;
    } catch (error) {
        if (!isTestEnv) {
            console.error('❌ Generation failed:', error instanceof Error ? error.message : error);
        }
        throw error;
    }
}
