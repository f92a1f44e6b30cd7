// waymark/http/request.ts
import type { IncomingHttpHeaders } from "node:http";
import type { Match } from "../framework/path-matcher";
import type { HttpMethod } from "./types";

/**
 * What a handler sees: the matched request with its body fully read.
 *
 * `path` is the request target as sent, without query or fragment; it is
 * what the router matched. `matches` keeps every capture in pattern order
 * with its raw value; `params` holds the percent-decoded values by name.
 */
export class Request {
    constructor(
        readonly method: HttpMethod,
        readonly url: URL,
        readonly path: string,
        readonly headers: IncomingHttpHeaders,
        readonly body: Buffer,
        readonly matches: readonly Match[],
        readonly params: Readonly<Record<string, string>>,
        readonly requestId: string,
    ) {}

    param(name: string): string | undefined {
        return Object.hasOwn(this.params, name) ? this.params[name] : undefined;
    }

    header(name: string): string | undefined {
        const v = this.headers[name.toLowerCase()];
        return Array.isArray(v) ? v.join(", ") : v;
    }

    text(): string {
        return this.body.toString("utf8");
    }

    json(): unknown {
        return JSON.parse(this.text());
    }
}
