// waymark/framework/path-parser.ts — route pattern parser.
//
//   path             = "/" [ segment-or-param *( "/" segment-or-param ) ]
//   segment-or-param = segment / param
//   segment          = *pchar
//   pchar            = unreserved / pct-encoded / sub-delims / ":" / "@"
//   param            = "{" *WSP name *WSP "}"
//   name             = ALPHA *( ALPHA / DIGIT )
//
// Works on the UTF-8 bytes of the pattern so every reported position is a
// byte offset. Only ASCII is ever accepted, so literal text and names are
// sliced back out as latin1 without loss.

import {
    describeByte,
    isAsciiAlpha,
    isAsciiAlphanumeric,
    isHexDigit,
    scanSegment,
} from "./path-scan";

const SLASH = 0x2f;
const PERCENT = 0x25;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;
const SPACE = 0x20;
const TAB = 0x09;

export type Part =
    | { readonly kind: "literal"; readonly value: string }
    | { readonly kind: "param"; readonly name: string };

export type ParseErrorDetail =
    | { kind: "expected-exact"; expected: number; actual: number; pos: number }
    | { kind: "expected"; expected: string; actual: number; pos: number }
    | { kind: "end-of-input"; pos: number }
    | { kind: "not-absolute" };

export type ParseResult<T> =
    | { ok: true; data: T }
    | { ok: false; error: PatternParseError };

export function describeParseError(detail: ParseErrorDetail): string {
    switch (detail.kind) {
        case "expected-exact":
            return `unexpected ${describeByte(detail.actual)} at position ${detail.pos}, expected ${describeByte(detail.expected)}`;
        case "expected":
            return `unexpected ${describeByte(detail.actual)} at position ${detail.pos}, expected ${detail.expected}`;
        case "end-of-input":
            return `unexpected end of input at position ${detail.pos}`;
        case "not-absolute":
            return "route patterns must start with a single '/'";
    }
}

export class PatternParseError extends Error {
    constructor(
        readonly detail: ParseErrorDetail,
        readonly pattern: string,
    ) {
        super(`invalid route pattern "${pattern}": ${describeParseError(detail)}`);
        this.name = "PatternParseError";
    }

    /** Byte offset of the violation; undefined for `not-absolute`. */
    get pos(): number | undefined {
        return this.detail.kind === "not-absolute" ? undefined : this.detail.pos;
    }
}

export class Parser {
    private readonly bytes: Buffer;
    /** start of the literal run not yet emitted */
    private anchor = 0;
    private cursor = 0;

    constructor(readonly source: string) {
        this.bytes = Buffer.from(source, "utf8");
    }

    /** Parses the whole pattern. Throws PatternParseError on the first violation. */
    parse(): Part[] {
        if (this.peek() !== SLASH) throw this.fail({ kind: "not-absolute" });
        // the first segment must be non-empty or absent (RFC 3986 §3.3)
        if (this.bytes[1] === SLASH) throw this.fail({ kind: "not-absolute" });
        if (this.bytes.length === 1) return [];

        const parts: Part[] = [];
        while (this.eat(SLASH)) {
            if (this.peek() !== OPEN_BRACE) {
                this.cursor = scanSegment(this.bytes, this.cursor);
                continue;
            }

            this.flush(parts);
            this.cursor++;
            this.skipWhitespace();
            const name = this.parameterName();
            this.skipWhitespace();
            this.expect(CLOSE_BRACE);

            this.anchor = this.cursor;
            parts.push({ kind: "param", name });
        }

        if (this.cursor < this.bytes.length) throw this.fail(this.diagnoseStop());

        this.flush(parts);
        return parts;
    }

    private parameterName(): string {
        const start = this.cursor;
        const first = this.next();
        if (!isAsciiAlpha(first)) {
            throw this.fail({ kind: "expected", expected: "an ASCII letter", actual: first, pos: start });
        }
        this.skipWhile(isAsciiAlphanumeric);
        return this.capture(start);
    }

    /** Explains why scanning stopped before the end of input. */
    private diagnoseStop(): ParseErrorDetail {
        const at = this.cursor;
        const actual = this.bytes[at];

        if (actual === PERCENT) {
            for (const pos of [at + 1, at + 2]) {
                if (pos >= this.bytes.length) return { kind: "end-of-input", pos };
                if (!isHexDigit(this.bytes[pos])) {
                    return { kind: "expected", expected: "a hex digit", actual: this.bytes[pos], pos };
                }
            }
        }

        // right after a closing brace the next segment must begin
        if (at === this.anchor && this.anchor > 0) {
            return { kind: "expected-exact", expected: SLASH, actual, pos: at };
        }

        return { kind: "expected", expected: "a path character", actual, pos: at };
    }

    private flush(parts: Part[]): void {
        if (this.cursor > this.anchor) parts.push({ kind: "literal", value: this.capture(this.anchor) });
        this.anchor = this.cursor;
    }

    private capture(from: number): string {
        return this.bytes.toString("latin1", from, this.cursor);
    }

    private skipWhitespace(): void {
        this.skipWhile((b) => b === SPACE || b === TAB);
    }

    private skipWhile(predicate: (b: number) => boolean): void {
        while (this.cursor < this.bytes.length && predicate(this.bytes[this.cursor])) this.cursor++;
    }

    private expect(expected: number): void {
        const actual = this.peek();
        if (actual === undefined) throw this.fail({ kind: "end-of-input", pos: this.cursor });
        if (actual !== expected) {
            throw this.fail({ kind: "expected-exact", expected, actual, pos: this.cursor });
        }
        this.cursor++;
    }

    private eat(expected: number): boolean {
        if (this.peek() !== expected) return false;
        this.cursor++;
        return true;
    }

    private next(): number {
        const b = this.peek();
        if (b === undefined) throw this.fail({ kind: "end-of-input", pos: this.cursor });
        this.cursor++;
        return b;
    }

    private peek(): number | undefined {
        return this.cursor < this.bytes.length ? this.bytes[this.cursor] : undefined;
    }

    private fail(detail: ParseErrorDetail): PatternParseError {
        return new PatternParseError(detail, this.source);
    }
}

export function parsePattern(source: string): ParseResult<Part[]> {
    try {
        return { ok: true, data: new Parser(source).parse() };
    } catch (e) {
        if (e instanceof PatternParseError) return { ok: false, error: e };
        throw e;
    }
}
