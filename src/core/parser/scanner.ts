import { DeclarationError } from '../diagnostics.js';
import { TextLocation } from '../types/index.js';

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;

const CLOSING_BRACKETS: Record<string, string> = {
    '(': ')',
    '[': ']',
    '{': '}',
    '<': '>',
};

const STRING_ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    '"': '"',
    "'": "'",
    '\\': '\\',
    '/': '/',
};

export interface ScannedValue {
    value: string;
    location: TextLocation;
    /** Offset of the first character of the value. */
    start: number;
}

/**
 * Character-level cursor over a declaration file.
 * Whitespace, `//` and `/* *\/` comments are trivia and are skipped before every read.
 */
export class Scanner {
    private pos = 0;
    private readonly lineStarts: number[] = [0];

    constructor(
        public readonly source: string,
        public readonly file: string,
    ) {
        for (let i = 0; i < source.length; i++) {
            if (source[i] === '\n') this.lineStarts.push(i + 1);
        }
    }

    public get offset(): number {
        return this.pos;
    }

    public locationAt(offset: number): TextLocation {
        let low = 0;
        let high = this.lineStarts.length - 1;
        while (low < high) {
            const mid = (low + high + 1) >> 1;
            if (this.lineStarts[mid] <= offset) low = mid;
            else high = mid - 1;
        }
        return { file: this.file, line: low + 1, column: offset - this.lineStarts[low] + 1 };
    }

    /** Location of the next significant character. */
    public location(): TextLocation {
        this.skipTrivia();
        return this.locationAt(this.pos);
    }

    public isAtEnd(): boolean {
        this.skipTrivia();
        return this.pos >= this.source.length;
    }

    /** The next significant character, or '' at end of input. */
    public peek(): string {
        this.skipTrivia();
        return this.source[this.pos] ?? '';
    }

    public tryConsume(char: string): boolean {
        if (this.peek() !== char) return false;
        this.pos++;
        return true;
    }

    public expect(char: string, message: string): void {
        if (!this.tryConsume(char)) {
            throw this.malformed(message, this.pos);
        }
    }

    public readIdentifier(): ScannedValue | undefined {
        this.skipTrivia();
        const start = this.pos;
        if (!IDENTIFIER_START.test(this.source[start] ?? '')) return undefined;
        let end = start + 1;
        while (end < this.source.length && IDENTIFIER_PART.test(this.source[end])) end++;
        this.pos = end;
        return { value: this.source.slice(start, end), location: this.locationAt(start), start };
    }

    /** Reads raw text up to the next delimiter (`,` `}` `;` or whitespace). */
    public readWord(): ScannedValue {
        this.skipTrivia();
        const start = this.pos;
        let end = start;
        while (end < this.source.length && !/[\s,};]/.test(this.source[end])) end++;
        this.pos = end;
        return { value: this.source.slice(start, end), location: this.locationAt(start), start };
    }

    public readString(): ScannedValue | undefined {
        this.skipTrivia();
        const start = this.pos;
        const quote = this.source[start];
        if (quote !== '"' && quote !== "'") return undefined;

        let value = '';
        let i = start + 1;
        while (i < this.source.length) {
            const char = this.source[i];
            if (char === quote) {
                this.pos = i + 1;
                return { value, location: this.locationAt(start), start };
            }
            if (char === '\n') break;
            if (char === '\\') {
                const escaped = STRING_ESCAPES[this.source[i + 1] ?? ''];
                if (escaped === undefined) {
                    throw this.malformed(`Unsupported escape sequence "\\${this.source[i + 1] ?? ''}"`, i);
                }
                value += escaped;
                i += 2;
                continue;
            }
            value += char;
            i++;
        }
        throw this.malformed('Unterminated string literal', start);
    }

    /**
     * Reads a TypeScript type expression up to the next `,` `}` or `;` outside any brackets.
     * Comments are dropped and line breaks folded; the text is otherwise returned as written.
     */
    public readTypeText(): ScannedValue {
        this.skipTrivia();
        const start = this.pos;
        const closers: string[] = [];
        const comments: Array<[number, number]> = [];
        let i = start;

        while (i < this.source.length) {
            const char = this.source[i];
            const next = this.source[i + 1];

            if (char === '"' || char === "'" || char === '`') {
                i = this.skipQuoted(i);
                continue;
            }
            if (char === '/' && (next === '/' || next === '*')) {
                const end = this.skipComment(i);
                comments.push([i, end]);
                i = end;
                continue;
            }
            if (char === '=' && next === '>') {
                i += 2;
                continue;
            }
            const closer = CLOSING_BRACKETS[char];
            if (closer) {
                closers.push(closer);
                i++;
                continue;
            }
            if (closers.length === 0 && (char === ',' || char === '}' || char === ';')) break;
            if (char === ')' || char === ']' || char === '}' || char === '>') {
                if (closers.pop() !== char) {
                    throw this.malformed(`Unbalanced "${char}" in type reference`, i);
                }
            }
            i++;
        }

        if (closers.length > 0) {
            throw this.malformed('Unterminated type reference', start);
        }

        this.pos = i;
        let raw = '';
        let cursor = start;
        for (const [from, to] of comments) {
            raw += `${this.source.slice(cursor, from)} `;
            cursor = to;
        }
        raw += this.source.slice(cursor, i);
        const value = raw.replace(/\s*\n\s*/g, ' ').trim();
        if (!value) {
            throw this.malformed('Expected a type reference', start);
        }
        return { value, location: this.locationAt(start), start };
    }

    /** The rest of the line starting at `offset`, used as the fragment of a diagnostic. */
    public fragmentAt(offset: number): string {
        const end = this.source.indexOf('\n', offset);
        const line = this.source.slice(offset, end === -1 ? undefined : end).trim();
        return line || '<end of input>';
    }

    public slice(start: number, end: number = this.pos): string {
        return this.source.slice(start, end).trim();
    }

    public malformed(message: string, offset: number, fragment?: string): DeclarationError {
        return new DeclarationError(
            'MalformedDeclaration',
            message,
            fragment ?? this.fragmentAt(offset),
            this.locationAt(offset),
        );
    }

    private skipTrivia(): void {
        while (this.pos < this.source.length) {
            const char = this.source[this.pos];
            if (/\s/.test(char)) {
                this.pos++;
            } else if (char === '/' && (this.source[this.pos + 1] === '/' || this.source[this.pos + 1] === '*')) {
                this.pos = this.skipComment(this.pos);
            } else {
                return;
            }
        }
    }

    private skipComment(offset: number): number {
        if (this.source[offset + 1] === '/') {
            const end = this.source.indexOf('\n', offset);
            return end === -1 ? this.source.length : end + 1;
        }
        const end = this.source.indexOf('*/', offset + 2);
        if (end === -1) {
            throw this.malformed('Unterminated block comment', offset);
        }
        return end + 2;
    }

    private skipQuoted(offset: number): number {
        const quote = this.source[offset];
        let i = offset + 1;
        while (i < this.source.length) {
            const char = this.source[i];
            if (char === '\\') {
                i += 2;
                continue;
            }
            if (char === quote) return i + 1;
            i++;
        }
        throw this.malformed('Unterminated string literal', offset);
    }
}
