// path-matcher.test.ts — Node.js native test runner
import test from "node:test";
import assert from "node:assert/strict";
import {
    Pattern,
    PatternParseError,
    decodeMatches,
    matchPath,
    normalizePath,
} from "../waymark/framework/path-matcher";

test("Matcher: captures a parameter between literals", () => {
    const p = Pattern.compile("/a/{id}/b");
    assert.deepEqual(p.tryMatch("/a/42/b"), [{ name: "id", value: "42" }]);
});

test("Matcher: literal mismatch is no match", () => {
    const p = Pattern.compile("/a/{id}/b");
    assert.equal(p.tryMatch("/a/42/c"), undefined);
    assert.equal(p.tryMatch("/x/42/b"), undefined);
});

test("Matcher: a parameter may capture an empty segment", () => {
    const p = Pattern.compile("/a/{id}/b");
    assert.deepEqual(p.tryMatch("/a//b"), [{ name: "id", value: "" }]);
});

test("Matcher: trailing parameter takes the last segment", () => {
    const p = Pattern.compile("/url/with/{parameters}");
    assert.deepEqual(p.tryMatch("/url/with/xyz"), [{ name: "parameters", value: "xyz" }]);
});

test("Matcher: leftover path is no match", () => {
    const p = Pattern.compile("/url/with/{parameters}");
    assert.equal(p.tryMatch("/url/with/xyz/extra"), undefined);
    assert.equal(Pattern.compile("/users").tryMatch("/users/42"), undefined);
});

test("Matcher: path shorter than a literal is no match", () => {
    assert.equal(Pattern.compile("/abc").tryMatch("/ab"), undefined);
});

test("Matcher: root pattern matches only the root", () => {
    const root = Pattern.compile("/");
    assert.deepEqual(root.parts, []);
    assert.deepEqual(root.tryMatch("/"), []);
    assert.equal(root.tryMatch("/a"), undefined);
});

test("Matcher: captures come out in pattern order", () => {
    const p = Pattern.compile("/{a}/x/{b}/{c}");
    assert.deepEqual(p.tryMatch("/1/x/2/3"), [
        { name: "a", value: "1" },
        { name: "b", value: "2" },
        { name: "c", value: "3" },
    ]);
    assert.deepEqual(p.paramNames, ["a", "b", "c"]);
});

test("Matcher: duplicate names produce duplicate matches", () => {
    const matches = Pattern.compile("/{id}/{id}").tryMatch("/1/2");
    assert.deepEqual(matches, [{ name: "id", value: "1" }, { name: "id", value: "2" }]);
    assert.deepEqual(decodeMatches(matches ?? []), { id: "2" });
});

test("Matcher: percent-encoded literals compare byte for byte", () => {
    const p = Pattern.compile("/files/%2F");
    assert.deepEqual(p.tryMatch("/files/%2F"), []);
    assert.equal(p.tryMatch("/files/%2f"), undefined);
    assert.equal(p.tryMatch("/files//"), undefined);
});

test("Matcher: parameter values stay raw until decoded", () => {
    const matches = Pattern.compile("/u/{name}").tryMatch("/u/stat%20card");
    assert.deepEqual(matches, [{ name: "name", value: "stat%20card" }]);
    assert.deepEqual(decodeMatches(matches ?? []), { name: "stat card" });
    assert.deepEqual(decodeMatches([{ name: "c", value: "caf%C3%A9" }]), { c: "café" });
});

test("Matcher: malformed request paths are no match", () => {
    const p = Pattern.compile("/u/{name}");
    assert.equal(p.tryMatch("/u/a%zz"), undefined);
    assert.equal(p.tryMatch("/u/a b"), undefined);
    assert.equal(p.tryMatch("/u/café"), undefined);
    assert.equal(Pattern.compile("/u/{name}/x").tryMatch("/u/a%2/x"), undefined);
});

test("Matcher: invalid UTF-8 in a capture does not decode", () => {
    assert.equal(decodeMatches([{ name: "x", value: "%FF" }]), undefined);
});

test("Matcher: compiled patterns are frozen", () => {
    const p = Pattern.compile("/a/{id}");
    assert.ok(Object.isFrozen(p));
    assert.ok(Object.isFrozen(p.parts));
    assert.ok(Object.isFrozen(p.parts[0]));
    assert.equal(p.raw, "/a/{id}");
    assert.equal(String(p), "/a/{id}");
});

test("Matcher: compiling twice gives equal patterns and matching is repeatable", () => {
    const a = Pattern.compile("/shop/{category}/items/{sku}");
    const b = Pattern.compile("/shop/{category}/items/{sku}");
    assert.deepEqual(a, b);
    assert.deepEqual(a.tryMatch("/shop/tea/items/oolong-7"), b.tryMatch("/shop/tea/items/oolong-7"));
    assert.deepEqual(a.tryMatch("/shop/tea/items/oolong-7"), [
        { name: "category", value: "tea" },
        { name: "sku", value: "oolong-7" },
    ]);
});

test("Matcher: format writes the parts back out", () => {
    for (const raw of ["/", "/a", "/a/{id}/b", "/{x}/{y}", "/files/%2F/{name}", "/a/b/"]) {
        assert.equal(Pattern.compile(raw).format(), raw);
    }
    assert.equal(Pattern.compile("/a/{ id\t}/b").format(), "/a/{id}/b");
});

test("Matcher: build fills parameters with encoded values", () => {
    const p = Pattern.compile("/users/{id}/posts/{post}");
    assert.equal(p.build({ id: 7, post: "a b" }), "/users/7/posts/a%20b");
    assert.equal(Pattern.compile("/").build({}), "/");
    assert.throws(
        () => p.build({ id: 7 }),
        { message: `Missing value for route parameter "post" in /users/{id}/posts/{post}` },
    );
});

test("Matcher: compile throws, tryCompile reports", () => {
    assert.throws(() => Pattern.compile("url/path"), PatternParseError);
    const res = Pattern.tryCompile("/{1abc}");
    assert.equal(res.ok, false);
    if (!res.ok) assert.equal(res.error.pos, 2);
});

test("Matcher: normalizePath strips one trailing slash", () => {
    assert.equal(normalizePath("/"), "/");
    assert.equal(normalizePath("/a/"), "/a");
    assert.equal(normalizePath("/a"), "/a");
    assert.equal(normalizePath("/a//"), "/a/");
});

test("Matcher: matchPath compiles, normalizes and decodes", () => {
    assert.deepEqual(matchPath("/users/{id}", "/users/42/"), { ok: true, params: { id: "42" } });
    assert.deepEqual(matchPath("/users/{id}", "/posts/42"), { ok: false, params: {} });
    assert.deepEqual(matchPath("/", "/"), { ok: true, params: {} });
    assert.deepEqual(matchPath("/f/{name}", "/f/%FF"), { ok: false, params: {} });
});
