// waymark/framework/path-matcher.ts — compiled route patterns and request-time matching.
// /users/{id} style: literals compare byte for byte, a parameter takes exactly one segment.

import { parsePattern, PatternParseError, type ParseResult, type Part } from "./path-parser";
import { scanSegment } from "./path-scan";

export type { Part } from "./path-parser";

/** One captured parameter. `value` is the raw, still percent-encoded text. */
export interface Match {
    name: string;
    value: string;
}

export interface MatchResult {
    ok: boolean;
    params: Record<string, string>;
}

export class Pattern {
    private constructor(
        readonly raw: string,
        readonly parts: readonly Part[],
    ) {
        Object.freeze(this);
    }

    /** Compiles a pattern or throws PatternParseError. */
    static compile(raw: string): Pattern {
        const parsed = Pattern.tryCompile(raw);
        if (!parsed.ok) throw parsed.error;
        return parsed.data;
    }

    static tryCompile(raw: string): ParseResult<Pattern> {
        const parsed = parsePattern(raw);
        if (!parsed.ok) return parsed;
        const parts = Object.freeze(parsed.data.map((p) => Object.freeze(p)));
        return { ok: true, data: new Pattern(raw, parts) };
    }

    get paramNames(): string[] {
        const names: string[] = [];
        for (const part of this.parts) if (part.kind === "param") names.push(part.name);
        return names;
    }

    /**
     * Matches an already normalized path (see normalizePath). Returns the
     * captures in pattern order, or undefined when the path does not fit.
     * A parameter may capture an empty segment (`/a//b` against `/a/{id}/b`).
     */
    tryMatch(path: string): Match[] | undefined {
        if (this.parts.length === 0) return path === "/" ? [] : undefined;

        const bytes = Buffer.from(path, "utf8");
        const matches: Match[] = [];
        let cursor = 0;

        for (const part of this.parts) {
            if (part.kind === "literal") {
                if (!hasLiteralAt(bytes, cursor, part.value)) return undefined;
                cursor += part.value.length;
            } else {
                const end = scanSegment(bytes, cursor);
                matches.push({ name: part.name, value: bytes.toString("latin1", cursor, end) });
                cursor = end;
            }
        }

        // anything left over means the pattern only covers a prefix of the path
        return cursor === bytes.length ? matches : undefined;
    }

    /** Parts written back out, with `{ name }` spacing dropped. */
    format(): string {
        if (this.parts.length === 0) return "/";
        return this.parts.map((p) => (p.kind === "literal" ? p.value : `{${p.name}}`)).join("");
    }

    /** Fills every parameter with its percent-encoded value. */
    build(values: Record<string, string | number>): string {
        if (this.parts.length === 0) return "/";
        let out = "";
        for (const part of this.parts) {
            if (part.kind === "literal") {
                out += part.value;
                continue;
            }
            const value = values[part.name];
            if (value === undefined) {
                throw new Error(`Missing value for route parameter "${part.name}" in ${this.raw}`);
            }
            out += encodeURIComponent(String(value));
        }
        return out;
    }

    toString(): string {
        return this.raw;
    }
}

function hasLiteralAt(bytes: Uint8Array, at: number, literal: string): boolean {
    if (at + literal.length > bytes.length) return false;
    for (let i = 0; i < literal.length; i++) {
        if (bytes[at + i] !== literal.charCodeAt(i)) return false;
    }
    return true;
}

/** Strips one trailing slash; `/` stays as it is. */
export function normalizePath(path: string): string {
    return path !== "/" && path.endsWith("/") ? path.slice(0, -1) : path;
}

/**
 * Percent-decodes captured values into a record keyed by name. A later
 * duplicate name wins. Returns undefined when a value is not valid
 * percent-encoded UTF-8.
 */
export function decodeMatches(matches: readonly Match[]): Record<string, string> | undefined {
    const params: Record<string, string> = {};
    for (const m of matches) {
        try {
            params[m.name] = decodeURIComponent(m.value);
        } catch (e) {
            if (e instanceof URIError) return undefined;
            throw e;
        }
    }
    return params;
}

/** One-shot compile, normalize and match; throws for a malformed pattern. */
export function matchPath(pattern: string, pathname: string): MatchResult {
    const matches = Pattern.compile(pattern).tryMatch(normalizePath(pathname));
    const params = matches ? decodeMatches(matches) : undefined;
    return params ? { ok: true, params } : { ok: false, params: {} };
}

export { PatternParseError };
