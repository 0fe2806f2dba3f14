/**
 * Safe structured-literal parser
 *
 * Reads the textual form of a mapping as upstream systems dump it, either
 * JSON or the repr style with single quotes, True/False/None and tuples.
 * Nothing is evaluated: the grammar has no names other than the six
 * boolean/null keywords.
 */

export type LiteralValue =
    | string
    | number
    | boolean
    | null
    | LiteralValue[]
    | { [key: string]: LiteralValue };

export class LiteralSyntaxError extends Error {
    readonly name = 'LiteralSyntaxError' as const;
    readonly position: number;

    constructor(message: string, position: number) {
        super(`${message} at position ${position}`);
        this.position = position;
        Object.setPrototypeOf(this, LiteralSyntaxError.prototype);
    }
}

const KEYWORDS: Record<string, boolean | null> = {
    True: true,
    true: true,
    False: false,
    false: false,
    None: null,
    null: null,
};

const SIMPLE_ESCAPES: Record<string, string> = {
    n: '\n',
    t: '\t',
    r: '\r',
    b: '\b',
    f: '\f',
    v: '\v',
    '0': '\0',
    '\\': '\\',
    "'": "'",
    '"': '"',
    '\n': '',
};

const NUMBER_PATTERN = /[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/y;
const WORD_PATTERN = /[A-Za-z_][A-Za-z0-9_]*/y;

function isWhitespace(ch: string): boolean {
    return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isHashable(value: LiteralValue): value is string | number | boolean | null {
    return value === null || typeof value !== 'object';
}

class LiteralParser {
    private pos = 0;

    constructor(private readonly text: string) {}

    parseDocument(): LiteralValue {
        const value = this.parseValue();
        this.skipWhitespace();
        if (this.pos < this.text.length) {
            this.fail('Unexpected trailing input');
        }
        return value;
    }

    private parseValue(): LiteralValue {
        this.skipWhitespace();
        const ch = this.text[this.pos];

        if (ch === undefined) this.fail('Unexpected end of input');
        if (ch === '{') return this.parseMapping();
        if (ch === '[') return this.parseSequence(']');
        if (ch === '(') return this.parseTuple();
        if (ch === '"' || ch === "'") return this.parseString();
        // u'...' prefix from older dumps
        if ((ch === 'u' || ch === 'U') && (this.text[this.pos + 1] === "'" || this.text[this.pos + 1] === '"')) {
            this.pos++;
            return this.parseString();
        }
        if (ch === '-' || ch === '+' || ch === '.' || (ch >= '0' && ch <= '9')) return this.parseNumber();
        return this.parseKeyword();
    }

    private parseMapping(): { [key: string]: LiteralValue } {
        this.pos++;
        const entries: Array<[string, LiteralValue]> = [];

        this.skipWhitespace();
        if (this.consume('}')) return {};

        for (;;) {
            const keyStart = this.pos;
            const key = this.parseValue();
            if (!isHashable(key)) {
                this.fail('Mapping keys must be strings, numbers, booleans or null', keyStart);
            }

            this.skipWhitespace();
            if (!this.consume(':')) this.fail("Expected ':'");

            entries.push([String(key), this.parseValue()]);

            this.skipWhitespace();
            if (this.consume('}')) break;
            if (!this.consume(',')) this.fail("Expected ',' or '}'");
            this.skipWhitespace();
            if (this.consume('}')) break;
        }

        // fromEntries defines own properties, so a "__proto__" key stays data
        return Object.fromEntries(entries);
    }

    private parseSequence(close: string): LiteralValue[] {
        this.pos++;
        const items: LiteralValue[] = [];

        this.skipWhitespace();
        if (this.consume(close)) return items;

        for (;;) {
            items.push(this.parseValue());
            this.skipWhitespace();
            if (this.consume(close)) break;
            if (!this.consume(',')) this.fail(`Expected ',' or '${close}'`);
            this.skipWhitespace();
            if (this.consume(close)) break;
        }

        return items;
    }

    /** `(x)` is a parenthesized value, `(x,)` and `(x, y)` are tuples */
    private parseTuple(): LiteralValue {
        const start = this.pos;
        const items = this.parseSequence(')');
        const inner = this.text.slice(start + 1, this.pos - 1).trimEnd();
        if (items.length === 1 && !inner.endsWith(',')) {
            return items[0];
        }
        return items;
    }

    private parseString(): string {
        const quote = this.text[this.pos];
        const start = this.pos;
        this.pos++;
        let result = '';

        for (;;) {
            const ch = this.text[this.pos];
            if (ch === undefined || ch === '\n') this.fail('Unterminated string', start);
            this.pos++;

            if (ch === quote) return result;
            if (ch !== '\\') {
                result += ch;
                continue;
            }

            const escape = this.text[this.pos];
            if (escape === undefined) this.fail('Unterminated string', start);
            this.pos++;

            if (escape in SIMPLE_ESCAPES) {
                result += SIMPLE_ESCAPES[escape];
            } else if (escape === 'x') {
                result += this.readCodePoint(2);
            } else if (escape === 'u') {
                result += this.readCodePoint(4);
            } else if (escape === 'U') {
                result += this.readCodePoint(8);
            } else {
                // Unknown escapes keep their backslash
                result += `\\${escape}`;
            }
        }
    }

    private readCodePoint(digits: number): string {
        const hex = this.text.slice(this.pos, this.pos + digits);
        if (hex.length !== digits || !/^[0-9a-fA-F]+$/.test(hex)) {
            this.fail(`Invalid \\${digits === 2 ? 'x' : digits === 4 ? 'u' : 'U'} escape`);
        }
        const codePoint = parseInt(hex, 16);
        if (codePoint > 0x10ffff) this.fail('Escape out of Unicode range');
        this.pos += digits;
        return String.fromCodePoint(codePoint);
    }

    private parseNumber(): number {
        NUMBER_PATTERN.lastIndex = this.pos;
        const match = NUMBER_PATTERN.exec(this.text);
        if (!match) this.fail('Invalid number');
        this.pos += match[0].length;
        return Number(match[0]);
    }

    private parseKeyword(): boolean | null {
        WORD_PATTERN.lastIndex = this.pos;
        const match = WORD_PATTERN.exec(this.text);
        if (!match) this.fail(`Unexpected character '${this.text[this.pos]}'`);

        const word = match[0];
        if (!Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
            this.fail(`Unknown name '${word}'`);
        }
        this.pos += word.length;
        return KEYWORDS[word];
    }

    private skipWhitespace(): void {
        while (this.pos < this.text.length && isWhitespace(this.text[this.pos])) {
            this.pos++;
        }
    }

    private consume(expected: string): boolean {
        if (this.text[this.pos] === expected) {
            this.pos++;
            return true;
        }
        return false;
    }

    private fail(message: string, position: number = this.pos): never {
        throw new LiteralSyntaxError(message, position);
    }
}

/**
 * Parse a literal data structure. Throws LiteralSyntaxError on anything
 * outside the grammar.
 */
export function parseLiteral(text: string): LiteralValue {
    return new LiteralParser(text).parseDocument();
}
