// waymark/http/middleware.ts — hook types and the runners that walk them in order.
//
//   begin   observes the raw request before routing; cannot reply
//   before  sees the matched Request; returning a Reply skips the handler
//   after   sees the Request and the Reply; returning a Reply replaces it
//   finish  observes the outcome after the reply was written
//
// Order for a matched request:
//   router.before -> group.before -> route.before -> handler
//   -> route.after -> group.after -> router.after

import type { IncomingHttpHeaders } from "node:http";
import type { Request } from "./request";
import type { Reply } from "./respond";

type MaybePromise<T> = T | Promise<T>;

export interface IncomingInfo {
    method: string;
    url: URL;
    /** raw request path, query and fragment cut off */
    path: string;
    headers: IncomingHttpHeaders;
    requestId: string;
}

export interface FinishInfo {
    method: string;
    path: string;
    status: number;
    durationMs: number;
    requestId: string;
    /** "GET /users/{id}", absent when nothing matched */
    route?: string;
}

export type BeginHook = (info: IncomingInfo) => MaybePromise<void>;
export type BeforeHook = (req: Request) => MaybePromise<Reply | void>;
export type AfterHook = (req: Request, reply: Reply) => MaybePromise<Reply | void>;
export type FinishHook = (info: FinishInfo) => MaybePromise<void>;

/** Hook lists a route, a group and the router each carry. */
export interface RouteHooks {
    readonly before: BeforeHook[];
    readonly after: AfterHook[];
}

/** Runs before hooks; the first reply returned short-circuits the rest. */
export async function runBefore(layers: readonly RouteHooks[], req: Request): Promise<Reply | undefined> {
    for (const layer of layers) {
        for (const hook of layer.before) {
            const out = await hook(req);
            if (out) return out;
        }
    }
    return undefined;
}

/** Runs after hooks innermost layer first, threading the reply through. */
export async function runAfter(layers: readonly RouteHooks[], req: Request, reply: Reply): Promise<Reply> {
    let current = reply;
    for (let i = layers.length - 1; i >= 0; i--) {
        for (const hook of layers[i].after) {
            const out = await hook(req, current);
            if (out) current = out;
        }
    }
    return current;
}
