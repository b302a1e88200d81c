import * as path from 'node:path';
import { Project } from 'ts-morph';

import { AbstractClientGenerator } from '../core/generator.js';
import { GeneratorConfig } from '../core/types/config.js';
import { ResolvedProviderDescriptor } from '../core/types/index.js';
import { toModuleSpecifier } from '../core/utils/index.js';
import { ProviderIndexGenerator } from './provider/index.generator.js';
import { ProviderGenerator } from './provider/provider.generator.js';
import { RuntimeGenerator } from './runtime/runtime.generator.js';

/**
 * Writes the provider classes of one declaration file, the shared runtime and the barrel.
 */
export class ProviderClientGenerator extends AbstractClientGenerator {
    /** Warnings raised during the last run. */
    public warnings: string[] = [];

    /**
     * @param project The ts-morph Project to add the generated files to.
     * @param providers Providers whose method names are already resolved.
     * @param config The generator configuration.
     * @param outputDir The directory the files are written to.
     */
    public async generate(
        project: Project,
        providers: readonly ResolvedProviderDescriptor[],
        config: GeneratorConfig,
        outputDir: string,
    ): Promise<void> {
        const importExtension = config.options.importExtension ?? '.js';
        const providerGenerator = new ProviderGenerator(project, {
            typesModule: resolveTypesModule(config, outputDir),
            importExtension,
        });

        new RuntimeGenerator(project).generate(outputDir);
        for (const provider of providers) {
            providerGenerator.generate(provider, outputDir);
        }

        if (config.options.emitIndex !== false) {
            new ProviderIndexGenerator(project, importExtension).generateIndex(outputDir);
        }

        this.warnings = providerGenerator.warnings;
    }
}

/**
 * The module the generated files import referenced types from: `typesModule` as configured,
 * or else the relative path from the output directory to the type registry file.
 */
export function resolveTypesModule(config: GeneratorConfig, outputDir: string): string | undefined {
    const { typesModule, typeRegistry, importExtension = '.js' } = config.options;
    if (typesModule) return typesModule;
    if (!typeRegistry) return undefined;
    return toModuleSpecifier(path.resolve(outputDir), path.resolve(typeRegistry), importExtension);
}
