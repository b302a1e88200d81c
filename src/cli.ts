#!/usr/bin/env node
import { Command, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import yaml from 'js-yaml';

import { formatDiagnostic, isDeclarationError } from './core/diagnostics.js';
import { GeneratorConfig, GeneratorConfigOptions } from './core/types.js';
import { generateFromConfig, validateDeclarations } from './index.js';

interface GenerateCommandOptions {
    config?: string;
    input?: string;
    output?: string;
    methodNameStyle?: 'snake' | 'camel';
    typesModule?: string;
    typeRegistry?: string;
    importExtension?: '.js' | '.ts' | 'none';
    index?: boolean;
}

interface CheckCommandOptions {
    config?: string;
    input?: string;
    typeRegistry?: string;
}

type ConfigFile = Partial<GeneratorConfig>;

function readVersion(): string {
    const packageJson: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
        return String(packageJson.version);
    }
    return '0.0.0';
}

function isConfigFile(value: unknown): value is ConfigFile {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigModule(resolvedPath: string): Promise<unknown> {
    const extension = path.extname(resolvedPath).toLowerCase();
    if (extension === '.json' || extension === '.yaml' || extension === '.yml') {
        return yaml.load(await fs.promises.readFile(resolvedPath, 'utf-8'), { filename: resolvedPath });
    }
    const configModule: unknown = await import(pathToFileURL(resolvedPath).href);
    if (isConfigFile(configModule)) {
        if ('default' in configModule) return configModule.default;
        if ('config' in configModule) return configModule.config;
    }
    return configModule;
}

async function loadConfigFile(configPath: string): Promise<ConfigFile> {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
    }

    let config: unknown;
    try {
        config = await readConfigModule(resolvedPath);
    } catch (error) {
        throw new Error(`Failed to load configuration file: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isConfigFile(config)) {
        throw new Error(`Configuration file ${resolvedPath} must export an object.`);
    }

    const configDir = path.dirname(resolvedPath);
    const resolved: ConfigFile = { ...config, options: { ...config.options } };
    if (config.input && !path.isAbsolute(config.input)) {
        resolved.input = path.resolve(configDir, config.input);
    }
    if (config.output && !path.isAbsolute(config.output)) {
        resolved.output = path.resolve(configDir, config.output);
    }
    const typeRegistry = config.options?.typeRegistry;
    if (resolved.options && typeRegistry && !path.isAbsolute(typeRegistry)) {
        resolved.options.typeRegistry = path.resolve(configDir, typeRegistry);
    }
    return resolved;
}

/** The options given on the command line. Absent flags leave the config file's values in place. */
function getCliOptions(options: GenerateCommandOptions): GeneratorConfigOptions {
    const cliOptions: GeneratorConfigOptions = {};
    if (options.methodNameStyle) cliOptions.methodNameStyle = options.methodNameStyle;
    if (options.typesModule) cliOptions.typesModule = options.typesModule;
    if (options.typeRegistry) cliOptions.typeRegistry = path.resolve(process.cwd(), options.typeRegistry);
    if (options.importExtension) {
        cliOptions.importExtension = options.importExtension === 'none' ? '' : options.importExtension;
    }
    // Commander sets `index` to `false` only when `--no-index` is passed.
    if (options.index === false) cliOptions.emitIndex = false;
    return cliOptions;
}

function reportFailure(error: unknown, summary: string): void {
    if (isDeclarationError(error)) {
        console.error(formatDiagnostic(error));
    } else {
        console.error(`❌ ${summary}:`, error instanceof Error ? error.message : String(error));
    }
}

async function runGeneration(options: GenerateCommandOptions): Promise<void> {
    const startTime = Date.now();
    let generating = false;
    try {
        let baseConfig: ConfigFile = {};
        if (options.config) {
            console.log(`📜 Loading configuration from: ${options.config}`);
            baseConfig = await loadConfigFile(options.config);
        }

        const cliOptions = getCliOptions(options);

        const finalConfig: GeneratorConfig = {
            input: options.input ?? baseConfig.input ?? '',
            output: options.output ?? baseConfig.output ?? '',
            options: {
                methodNameStyle: 'snake',
                importExtension: '.js',
                emitIndex: true,
                ...baseConfig.options,
                ...cliOptions,
            },
            ...(baseConfig.compilerOptions && { compilerOptions: baseConfig.compilerOptions }),
        };

        if (!finalConfig.input) {
            throw new Error('Input path is required. Provide it via --input or a config file.');
        }
        if (!finalConfig.output) {
            finalConfig.output = './generated';
            console.warn(`Output path not specified, defaulting to '${finalConfig.output}'.`);
        }

        if (!path.isAbsolute(finalConfig.output)) {
            finalConfig.output = path.resolve(process.cwd(), finalConfig.output);
        }

        console.log('🚀 Starting code generation with the following configuration:');
        console.log(yaml.dump({ ...finalConfig, options: { ...finalConfig.options } }, { indent: 2, skipInvalid: true }));

        generating = true;
        await generateFromConfig(finalConfig);
    } catch (error) {
        // generateFromConfig has already logged the failure summary
        if (isDeclarationError(error) || !generating) reportFailure(error, 'Generation failed');
        process.exitCode = 1;
    } finally {
        const duration = (Date.now() - startTime) / 1000;
        console.log(`\n⏱️  Duration: ${duration.toFixed(2)} seconds`);
    }
}

async function runCheck(options: CheckCommandOptions): Promise<void> {
    try {
        const baseConfig: ConfigFile = options.config ? await loadConfigFile(options.config) : {};
        const input = options.input ?? baseConfig.input;
        if (!input) {
            throw new Error('Input path is required. Provide it via --input or a config file.');
        }
        const providers = await validateDeclarations({
            input,
            output: baseConfig.output ?? '',
            options: {
                ...baseConfig.options,
                ...(options.typeRegistry ? { typeRegistry: path.resolve(process.cwd(), options.typeRegistry) } : {}),
            },
        });
        const endpointCount = providers.reduce((count, provider) => count + provider.endpoints.length, 0);
        console.log(`✅ ${input}: ${providers.length} provider(s), ${endpointCount} endpoint(s)`);
    } catch (error) {
        reportFailure(error, 'Check failed');
        process.exitCode = 1;
    }
}

const program = new Command();
program
    .name('provider-codegen')
    .description('Generates typed HTTP provider classes from endpoint declarations')
    .version(readVersion());

program
    .command('generate')
    .description('Generate provider classes from a declaration file')
    .option('-c, --config <path>', 'Path to a configuration file (e.g., provider-codegen.config.js)')
    .option('-i, --input <path>', 'Path to the declaration file (overrides config)')
    .option('-o, --output <path>', 'Output directory for generated files (overrides config)')
    .addOption(new Option('--methodNameStyle <style>', 'Casing of derived method names').choices(['snake', 'camel']))
    .option('--typesModule <specifier>', 'Module the generated providers import referenced types from')
    .option('--typeRegistry <path>', 'TypeScript file declaring every type the declarations may reference')
    .addOption(
        new Option('--importExtension <ext>', 'Extension of relative imports between generated files').choices([
            '.js',
            '.ts',
            'none',
        ]),
    )
    .option('--no-index', 'Do not write index.ts')
    .action(runGeneration);

program
    .command('check')
    .description('Parse and validate a declaration file without generating code')
    .option('-c, --config <path>', 'Path to a configuration file')
    .option('-i, --input <path>', 'Path to the declaration file (overrides config)')
    .option('--typeRegistry <path>', 'TypeScript file declaring every type the declarations may reference')
    .action(runCheck);

await program.parseAsync(process.argv);
