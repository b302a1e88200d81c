import { DeclarationError } from '../diagnostics.js';
import { EndpointDescriptor, ProviderDescriptor } from '../types/index.js';
import { EndpointBuilder } from './endpoint-builder.js';
import { Scanner } from './scanner.js';

/**
 * Parses the provider declaration syntax:
 *
 * ```
 * UserApi, {
 *     { path: "/users", method: GET, res: User[] },
 *     { path: "/users/{id}", method: GET, path_params: UserPath, res: User },
 * }
 * ```
 *
 * A file may hold several declarations, optionally separated by `;`.
 */
export class DslParser {
    private readonly scanner: Scanner;

    constructor(source: string, file: string) {
        this.scanner = new Scanner(source, file);
    }

    public parse(): ProviderDescriptor[] {
        const providers: ProviderDescriptor[] = [];

        while (!this.scanner.isAtEnd()) {
            providers.push(this.parseDeclaration());
            while (this.scanner.tryConsume(';')) {
                // separators between declarations are optional
            }
        }

        if (providers.length === 0) {
            throw new DeclarationError(
                'MalformedDeclaration',
                'Expected a provider declaration.',
                '',
                this.scanner.locationAt(0),
            );
        }
        return providers;
    }

    private parseDeclaration(): ProviderDescriptor {
        const location = this.scanner.location();
        const start = this.scanner.offset;

        const name = this.scanner.readIdentifier();
        if (!name) {
            throw this.scanner.malformed('Expected a provider name.', start);
        }
        this.scanner.expect(',', `Expected "," after provider name "${name.value}".`);

        const listStart = this.scanner.location();
        if (!this.scanner.tryConsume('{')) {
            throw this.scanner.malformed(
                `Expected "{" to open the endpoint list of provider "${name.value}".`,
                this.scanner.offset,
            );
        }
        if (this.scanner.peek() === '}') {
            throw new DeclarationError(
                'MalformedDeclaration',
                `Provider "${name.value}" declares no endpoints.`,
                this.scanner.slice(start, this.scanner.offset + 1),
                listStart,
            );
        }

        const endpoints: EndpointDescriptor[] = [];
        for (;;) {
            endpoints.push(this.parseEndpoint());
            if (!this.scanner.tryConsume(',')) break;
            if (this.scanner.peek() === '}') break;
        }
        this.scanner.expect('}', `Expected "," or "}" after an endpoint of provider "${name.value}".`);

        return { name: name.value, endpoints, location };
    }

    private parseEndpoint(): EndpointDescriptor {
        const location = this.scanner.location();
        const start = this.scanner.offset;
        if (!this.scanner.tryConsume('{')) {
            throw this.scanner.malformed('Expected "{" to open an endpoint block.', start);
        }

        const builder = new EndpointBuilder(location);

        while (this.scanner.peek() !== '}') {
            if (this.scanner.isAtEnd()) {
                throw this.scanner.malformed('Unterminated endpoint block.', start);
            }

            const key = this.scanner.readIdentifier();
            if (!key) {
                throw this.scanner.malformed('Expected a field name.', this.scanner.offset);
            }
            const field = builder.acceptKey(key.value, key.location);
            this.scanner.expect(':', `Expected ":" after field "${key.value}".`);

            switch (field) {
                case 'path': {
                    const literal = this.scanner.readString();
                    if (!literal) {
                        throw this.scanner.malformed('Expected a string literal for "path".', this.scanner.offset);
                    }
                    builder.set(field, literal.value, literal.location);
                    break;
                }
                case 'method':
                case 'fn_name': {
                    const word = this.scanner.readWord();
                    if (!word.value) {
                        throw this.scanner.malformed(`Expected a value for "${field}".`, word.start);
                    }
                    builder.set(field, word.value, word.location);
                    break;
                }
                default: {
                    const type = this.scanner.readTypeText();
                    builder.set(field, type.value, type.location);
                }
            }

            if (!this.scanner.tryConsume(',')) break;
        }

        this.scanner.expect('}', 'Expected "," or "}" after an endpoint field.');
        return builder.build(this.scanner.slice(start));
    }
}
