// waymark/http/router.ts — method-keyed route table with router-level hooks
import { decodeMatches, normalizePath, type Match } from "../framework/path-matcher";
import { Group } from "./group";
import type { AfterHook, BeforeHook, BeginHook, FinishHook, RouteHooks } from "./middleware";
import { SealedError, type Route } from "./route";
import type { HttpMethod } from "./types";

export interface RouteMatch {
    group: Group;
    route: Route;
    matches: Match[];
    params: Record<string, string>;
}

/**
 * Holds groups in mount order; the first group is the root group (no prefix).
 * Lookups walk groups, then each group's routes for the method, and the
 * first route that matches wins.
 *
 * After `seal()` the table is read-only and can be shared by every request.
 */
export class Router implements RouteHooks {
    readonly groups: Group[] = [new Group("")];
    readonly begin: BeginHook[] = [];
    readonly before: BeforeHook[] = [];
    readonly after: AfterHook[] = [];
    readonly finish: FinishHook[] = [];
    private sealed = false;

    get root(): Group {
        return this.groups[0];
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    mount(group: Group): this {
        if (this.sealed) throw new SealedError("router");
        this.groups.push(group);
        return this;
    }

    /**
     * Finds the route for `method` and a request path. The path is normalized
     * (one trailing slash dropped) before matching. A route whose captures are
     * not valid percent-encoded UTF-8 does not match.
     */
    route(method: HttpMethod, path: string): RouteMatch | undefined {
        const normalized = normalizePath(path);
        for (const group of this.groups) {
            for (const route of group.routesFor(method)) {
                const matches = route.path.tryMatch(normalized);
                if (!matches) continue;
                const params = decodeMatches(matches);
                if (params) return { group, route, matches, params };
            }
        }
        return undefined;
    }

    byName(name: string): Route | undefined {
        for (const group of this.groups) {
            const found = group.all().find((r) => r.name === name);
            if (found) return found;
        }
        return undefined;
    }

    routes(): Route[] {
        return this.groups.flatMap((g) => g.all());
    }

    seal(): void {
        if (this.sealed) return;
        this.sealed = true;
        for (const group of this.groups) group.seal();
        Object.freeze(this.groups);
        Object.freeze(this.begin);
        Object.freeze(this.before);
        Object.freeze(this.after);
        Object.freeze(this.finish);
    }
}
