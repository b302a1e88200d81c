import yaml from 'js-yaml';

import { DeclarationError } from '../diagnostics.js';
import { EndpointDescriptor, PointerLocation, ProviderDescriptor } from '../types/index.js';
import { EndpointBuilder, isEndpointFieldKey, isIdentifier } from './endpoint-builder.js';

type SchemaRecord = Record<string, unknown>;

const DUPLICATE_KEY_REASON = 'duplicated mapping key';
/** A mapping key, plain or quoted, at the start of the text. */
const MAPPING_KEY = /^(["']?)([A-Za-z_$][A-Za-z0-9_$]*)\1\s*:/;

function isRecord(value: unknown): value is SchemaRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
    return JSON.stringify(value) ?? String(value);
}

/**
 * Reads endpoint tables written as JSON or YAML, either a single provider
 *
 * ```yaml
 * name: UserApi
 * endpoints:
 *   - { path: /users, method: GET, res: "User[]" }
 * ```
 *
 * or several under a `providers` list.
 */
export class SchemaParser {
    constructor(
        private readonly source: string,
        private readonly file: string,
        private readonly format: 'json' | 'yaml',
    ) {}

    public parse(): ProviderDescriptor[] {
        const document = this.load();

        if (isRecord(document) && 'providers' in document) {
            this.assertOnlyKeys(document, ['providers'], '');
            const providers = document.providers;
            if (!Array.isArray(providers) || providers.length === 0) {
                throw this.malformed('"providers" must be a non-empty list.', describe(providers), '/providers');
            }
            return providers.map((provider, index) => this.parseProvider(provider, `/providers/${index}`));
        }

        return [this.parseProvider(document, '')];
    }

    private load(): unknown {
        try {
            // JSON.parse gives the syntax errors; yaml.load reads the same text and rejects repeated keys.
            if (this.format === 'json') JSON.parse(this.source);
            return yaml.load(this.source, { filename: this.file });
        } catch (error) {
            throw this.loadError(error);
        }
    }

    private loadError(error: unknown): DeclarationError {
        if (error instanceof yaml.YAMLException && error.reason === DUPLICATE_KEY_REASON) {
            const { buffer, position, line, column } = error.mark;
            const key = MAPPING_KEY.exec(buffer.slice(position))?.[2];
            if (key !== undefined && isEndpointFieldKey(key)) {
                return new DeclarationError('DuplicateField', `Field "${key}" is supplied more than once.`, key, {
                    file: this.file,
                    line: line + 1,
                    column: column + 1,
                });
            }
        }
        const message = error instanceof Error ? error.message : String(error);
        return this.malformed(`Invalid ${this.format.toUpperCase()}: ${message}`, this.source.split('\n')[0], '');
    }

    private parseProvider(value: unknown, pointer: string): ProviderDescriptor {
        if (!isRecord(value)) {
            throw this.malformed('A provider must be an object with "name" and "endpoints".', describe(value), pointer);
        }
        this.assertOnlyKeys(value, ['name', 'endpoints'], pointer);

        const name = value.name;
        if (typeof name !== 'string' || !isIdentifier(name)) {
            throw this.malformed('Expected a provider name.', describe(name), `${pointer}/name`);
        }

        const endpoints = value.endpoints;
        if (!Array.isArray(endpoints)) {
            throw this.malformed(`Provider "${name}" has no endpoint list.`, describe(value), `${pointer}/endpoints`);
        }
        if (endpoints.length === 0) {
            throw this.malformed(`Provider "${name}" declares no endpoints.`, describe(value), `${pointer}/endpoints`);
        }

        return {
            name,
            endpoints: endpoints.map((endpoint, index) => this.parseEndpoint(endpoint, `${pointer}/endpoints/${index}`)),
            location: this.at(pointer),
        };
    }

    private parseEndpoint(value: unknown, pointer: string): EndpointDescriptor {
        if (!isRecord(value)) {
            throw this.malformed('An endpoint must be an object.', describe(value), pointer);
        }

        const builder = new EndpointBuilder(this.at(pointer));
        for (const [key, fieldValue] of Object.entries(value)) {
            const location = this.at(`${pointer}/${key}`);
            const field = builder.acceptKey(key, location);
            if (typeof fieldValue !== 'string') {
                throw new DeclarationError(
                    'MalformedDeclaration',
                    `Field "${key}" must be a string.`,
                    `${key}: ${describe(fieldValue)}`,
                    location,
                );
            }
            builder.set(field, fieldValue, location);
        }
        return builder.build(describe(value));
    }

    private assertOnlyKeys(value: SchemaRecord, allowed: string[], pointer: string): void {
        const unexpected = Object.keys(value).find(key => !allowed.includes(key));
        if (unexpected !== undefined) {
            throw this.malformed(
                `Unexpected key "${unexpected}". Expected ${allowed.map(key => `"${key}"`).join(' and ')}.`,
                unexpected,
                `${pointer}/${unexpected}`,
            );
        }
    }

    private at(pointer: string): PointerLocation {
        return { file: this.file, pointer: pointer || '/' };
    }

    private malformed(message: string, fragment: string, pointer: string): DeclarationError {
        return new DeclarationError('MalformedDeclaration', message, fragment, this.at(pointer));
    }
}
