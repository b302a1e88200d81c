import * as path from 'node:path';
import { Project } from 'ts-morph';

import { PROVIDER_GENERATOR_HEADER_COMMENT, RUNTIME_FILE_NAME } from '../../core/constants.js';
import { toSiblingSpecifier } from '../../core/utils/index.js';

/**
 * Generates `index.ts`, re-exporting every provider class of the output directory and the runtime.
 */
export class ProviderIndexGenerator {
    constructor(
        private readonly project: Project,
        private readonly importExtension: string,
    ) {}

    public generateIndex(outputDir: string): void {
        const indexPath = path.join(outputDir, 'index.ts');
        const sourceFile = this.project.createSourceFile(indexPath, '', { overwrite: true });

        sourceFile.insertText(0, PROVIDER_GENERATOR_HEADER_COMMENT);

        const providerFiles = (this.project.getDirectory(outputDir)?.getSourceFiles() ?? [])
            .filter(file => file.getFilePath().endsWith('.provider.ts'))
            .sort((a, b) => a.getFilePath().localeCompare(b.getFilePath()));

        for (const providerFile of providerFiles) {
            const className = providerFile.getClasses().find(cls => cls.isExported())?.getName();
            if (className) {
                sourceFile.addExportDeclaration({
                    namedExports: [className],
                    moduleSpecifier: toSiblingSpecifier(
                        path.basename(providerFile.getFilePath(), '.ts'),
                        this.importExtension,
                    ),
                });
            }
        }

        sourceFile.addExportDeclaration({
            moduleSpecifier: toSiblingSpecifier(RUNTIME_FILE_NAME, this.importExtension),
        });

        sourceFile.formatText();
    }
}
