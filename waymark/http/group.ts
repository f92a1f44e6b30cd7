// waymark/http/group.ts
import { Pattern } from "../framework/path-matcher";
import type { AfterHook, BeforeHook, RouteHooks } from "./middleware";
import { Route, SealedError } from "./route";
import type { Handler, HttpMethod } from "./types";

/**
 * Routes sharing a path prefix and a set of before/after hooks.
 *
 * ```ts
 * const api = new Group("/api");
 * api.get("/users/{id}", (req) => `user ${req.param("id")}`);
 * api.post("/users", createUser).named("users.create");
 * ```
 */
export class Group implements RouteHooks {
    readonly routes = new Map<HttpMethod, Route[]>();
    readonly before: BeforeHook[] = [];
    readonly after: AfterHook[] = [];
    private sealed = false;

    constructor(readonly prefix = "") {}

    /** Compiles `prefix + pattern` and appends the route. Throws PatternParseError for a bad pattern. */
    add(method: HttpMethod, pattern: string, handler: Handler): Route {
        this.assertOpen();
        const route = new Route(method, Pattern.compile(joinPath(this.prefix, pattern)), handler);
        const list = this.routes.get(method);
        if (list) list.push(route);
        else this.routes.set(method, [route]);
        return route;
    }

    get(pattern: string, handler: Handler)     { return this.add("GET", pattern, handler); }
    post(pattern: string, handler: Handler)    { return this.add("POST", pattern, handler); }
    put(pattern: string, handler: Handler)     { return this.add("PUT", pattern, handler); }
    patch(pattern: string, handler: Handler)   { return this.add("PATCH", pattern, handler); }
    delete(pattern: string, handler: Handler)  { return this.add("DELETE", pattern, handler); }
    head(pattern: string, handler: Handler)    { return this.add("HEAD", pattern, handler); }
    options(pattern: string, handler: Handler) { return this.add("OPTIONS", pattern, handler); }

    useBefore(hook: BeforeHook): this {
        this.assertOpen();
        this.before.push(hook);
        return this;
    }

    useAfter(hook: AfterHook): this {
        this.assertOpen();
        this.after.push(hook);
        return this;
    }

    /** Routes registered for one method, in registration order. */
    routesFor(method: HttpMethod): readonly Route[] {
        return this.routes.get(method) ?? [];
    }

    all(): Route[] {
        return [...this.routes.values()].flat();
    }

    seal(): void {
        if (this.sealed) return;
        this.sealed = true;
        for (const list of this.routes.values()) {
            for (const route of list) route.seal();
            Object.freeze(list);
        }
        Object.freeze(this.before);
        Object.freeze(this.after);
    }

    private assertOpen(): void {
        if (this.sealed) throw new SealedError(`group "${this.prefix}"`);
    }
}

/**
 * Joins a group prefix and a route pattern. A pattern of `/` under a prefix
 * is the prefix itself, so `/app` + `/` serves `/app` rather than the
 * never-matching `/app/`. A pattern without its leading `/` comes back
 * unchanged and fails to compile, as it would in the root group.
 */
export function joinPath(prefix: string, pattern: string): string {
    if (!prefix || !pattern.startsWith("/")) return pattern;
    const base = prefix.endsWith("/") ? prefix.slice(0, -1) : prefix;
    return pattern === "/" ? base || "/" : base + pattern;
}
