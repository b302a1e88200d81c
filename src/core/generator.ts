import { Project } from 'ts-morph';

import { GeneratorConfig } from './types/config.js';
import { ResolvedProviderDescriptor } from './types/index.js';

/**
 * Contract for generators that turn resolved providers into source files.
 */
export interface IClientGenerator {
    /**
     * Execute the generation process.
     * @param project The active ts-morph project.
     * @param providers The validated providers of one declaration file.
     * @param config The generation configuration.
     * @param outputDir The root directory for the output.
     */
    generate(
        project: Project,
        providers: readonly ResolvedProviderDescriptor[],
        config: GeneratorConfig,
        outputDir: string,
    ): Promise<void>;
}

export abstract class AbstractClientGenerator implements IClientGenerator {
    abstract generate(
        project: Project,
        providers: readonly ResolvedProviderDescriptor[],
        config: GeneratorConfig,
        outputDir: string,
    ): Promise<void>;
}
