import * as fs from 'node:fs';
import * as path from 'node:path';

import { DeclarationFormat } from '../types/index.js';

export interface LoadedDeclaration {
    source: string;
    file: string;
    format: DeclarationFormat;
}

/** Picks the input format from the file extension; anything that is not JSON or YAML is DSL. */
export function detectDeclarationFormat(fileName: string): DeclarationFormat {
    const extension = path.extname(fileName).toLowerCase();
    if (extension === '.json') return 'json';
    if (extension === '.yaml' || extension === '.yml') return 'yaml';
    return 'dsl';
}

export class DeclarationLoader {
    /**
     * Reads a declaration file from disk.
     * @param inputPath Absolute, or relative to the current working directory.
     */
    public static async load(inputPath: string): Promise<LoadedDeclaration> {
        const file = path.resolve(process.cwd(), inputPath);
        if (!fs.existsSync(file)) {
            throw new Error(`Input file not found at ${file}`);
        }

        try {
            const source = await fs.promises.readFile(file, 'utf8');
            return { source, file, format: detectDeclarationFormat(file) };
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new Error(`Failed to read content from "${file}": ${message}`);
        }
    }
}
