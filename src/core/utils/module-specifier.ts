import { posix as path } from 'node:path';

/**
 * Builds a relative module specifier from a directory to a TypeScript file,
 * e.g. (`/out/api`, `/out/models.ts`, '.js') -> `'../models.js'`.
 */
export function toModuleSpecifier(fromDir: string, targetFile: string, importExtension: string): string {
    const relative = path.relative(toPosix(fromDir), toPosix(targetFile)).replace(/\.(d\.)?[cm]?tsx?$/, '');
    const specifier = relative.startsWith('.') ? relative : `./${relative}`;
    return `${specifier}${importExtension}`;
}

/** Specifier of a file generated next to the importing one, e.g. `./provider-runtime.js`. */
export function toSiblingSpecifier(baseName: string, importExtension: string): string {
    return `./${baseName}${importExtension}`;
}

function toPosix(value: string): string {
    return value.replace(/\\/g, '/');
}
