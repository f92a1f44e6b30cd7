// path-parser.test.ts — Node.js native test runner
import test from "node:test";
import assert from "node:assert/strict";
import {
    Parser,
    PatternParseError,
    parsePattern,
    type ParseErrorDetail,
    type Part,
} from "../waymark/framework/path-parser";

const lit = (value: string): Part => ({ kind: "literal", value });
const param = (name: string): Part => ({ kind: "param", name });

function parse(pattern: string): Part[] {
    return new Parser(pattern).parse();
}

function failure(pattern: string): PatternParseError {
    const result = parsePattern(pattern);
    assert.equal(result.ok, false, `expected "${pattern}" to be rejected`);
    if (result.ok) throw new Error("unreachable");
    return result.error;
}

function detailOf(pattern: string): ParseErrorDetail {
    return failure(pattern).detail;
}

test("Parser: literal path is a single part", () => {
    assert.deepEqual(parse("/url/path/to/parse"), [lit("/url/path/to/parse")]);
});

test("Parser: trailing slash stays in the literal", () => {
    assert.deepEqual(parse("/url/path/to/parse/"), [lit("/url/path/to/parse/")]);
});

test("Parser: root path has no parts", () => {
    assert.deepEqual(parse("/"), []);
});

test("Parser: rejects patterns without a leading slash", () => {
    assert.deepEqual(detailOf("url/path/to/parse/"), { kind: "not-absolute" });
    assert.deepEqual(detailOf(""), { kind: "not-absolute" });
});

test("Parser: rejects an empty first segment", () => {
    assert.deepEqual(detailOf("//x"), { kind: "not-absolute" });
    assert.deepEqual(detailOf("//"), { kind: "not-absolute" });
});

test("Parser: literal boundaries around a parameter", () => {
    assert.deepEqual(parse("/a/{id}/b"), [lit("/a/"), param("id"), lit("/b")]);
});

test("Parser: trailing parameter", () => {
    assert.deepEqual(parse("/url/with/{parameters}"), [lit("/url/with/"), param("parameters")]);
});

test("Parser: consecutive parameters", () => {
    assert.deepEqual(parse("/{a}/{b}"), [lit("/"), param("a"), lit("/"), param("b")]);
});

test("Parser: whitespace inside braces is dropped", () => {
    assert.deepEqual(parse("/{ id\t}/x"), [lit("/"), param("id"), lit("/x")]);
});

test("Parser: names may continue with digits", () => {
    assert.deepEqual(parse("/{a1B2}"), [lit("/"), param("a1B2")]);
});

test("Parser: duplicate names are accepted", () => {
    assert.deepEqual(parse("/{id}/{id}"), [lit("/"), param("id"), lit("/"), param("id")]);
});

test("Parser: percent-encoding stays undecoded in literals", () => {
    assert.deepEqual(parse("/files/%2F"), [lit("/files/%2F")]);
    assert.deepEqual(parse("/a%2fb/c"), [lit("/a%2fb/c")]);
});

test("Parser: sub-delimiters, colon and at-sign are literal bytes", () => {
    assert.deepEqual(parse("/user@host/:x/;v=1"), [lit("/user@host/:x/;v=1")]);
});

test("Parser: name starting with a digit is rejected at the digit", () => {
    const err = failure("/{1abc}");
    assert.deepEqual(err.detail, { kind: "expected", expected: "an ASCII letter", actual: 0x31, pos: 2 });
    assert.equal(err.pos, 2);
    assert.equal(err.message, `invalid route pattern "/{1abc}": unexpected '1' at position 2, expected an ASCII letter`);
});

test("Parser: empty braces are rejected", () => {
    assert.deepEqual(detailOf("/{}"), { kind: "expected", expected: "an ASCII letter", actual: 0x7d, pos: 2 });
});

test("Parser: unterminated parameter", () => {
    assert.deepEqual(detailOf("/{id"), { kind: "end-of-input", pos: 4 });
    assert.deepEqual(detailOf("/{"), { kind: "end-of-input", pos: 2 });
});

test("Parser: missing closing brace", () => {
    const err = failure("/{id x}");
    assert.deepEqual(err.detail, { kind: "expected-exact", expected: 0x7d, actual: 0x78, pos: 5 });
    assert.equal(err.message, `invalid route pattern "/{id x}": unexpected 'x' at position 5, expected '}'`);
});

test("Parser: malformed percent-encoding", () => {
    assert.deepEqual(detailOf("/a/%zz"), { kind: "expected", expected: "a hex digit", actual: 0x7a, pos: 4 });
    assert.deepEqual(detailOf("/a/%4g"), { kind: "expected", expected: "a hex digit", actual: 0x67, pos: 5 });
    assert.deepEqual(detailOf("/a/%4"), { kind: "end-of-input", pos: 5 });
});

test("Parser: a parameter must end its segment", () => {
    assert.deepEqual(detailOf("/{id}x"), { kind: "expected-exact", expected: 0x2f, actual: 0x78, pos: 5 });
    assert.deepEqual(detailOf("/{a}{b}"), { kind: "expected-exact", expected: 0x2f, actual: 0x7b, pos: 4 });
});

test("Parser: parameters only start a segment", () => {
    assert.deepEqual(detailOf("/a{id}"), { kind: "expected", expected: "a path character", actual: 0x7b, pos: 2 });
});

test("Parser: bytes outside the grammar", () => {
    const err = failure("/a b");
    assert.deepEqual(err.detail, { kind: "expected", expected: "a path character", actual: 0x20, pos: 2 });
    assert.equal(err.message, `invalid route pattern "/a b": unexpected 0x20 at position 2, expected a path character`);

    // positions are byte offsets into the UTF-8 encoding
    assert.deepEqual(detailOf("/café/x"), { kind: "expected", expected: "a path character", actual: 0xc3, pos: 4 });
});

test("Parser: not-absolute error has no position", () => {
    const err = failure("x");
    assert.equal(err.pos, undefined);
    assert.equal(err.name, "PatternParseError");
    assert.ok(err instanceof Error);
    assert.equal(err.message, `invalid route pattern "x": route patterns must start with a single '/'`);
});

test("Parser: Parser#parse throws what parsePattern returns", () => {
    assert.throws(() => parse("/{1}"), PatternParseError);
    const ok = parsePattern("/a/{b}");
    assert.deepEqual(ok, { ok: true, data: [lit("/a/"), param("b")] });
});
