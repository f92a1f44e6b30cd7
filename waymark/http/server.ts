// waymark/http/server.ts — bare Node HTTP listener on top of the Router.

import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { randomUUID } from "node:crypto";
import { createLogger, type Logger } from "../log/logger";
import { DEFAULT_MAX_BODY_BYTES } from "./config";
import { HttpError, isHttpError } from "./errors";
import { runAfter, runBefore, type FinishInfo, type RouteHooks } from "./middleware";
import { Request } from "./request";
import { notFound, serverError, text, toReply, type Reply } from "./respond";
import type { RouteMatch, Router } from "./router";
import { isHttpMethod } from "./types";

export interface ListenerOptions {
    /** default 64 KiB */
    maxBodyBytes?: number;
    /** incoming header to reuse as request id; default 'x-request-id' */
    requestIdHeader?: string;
    logger?: Logger;
}

/* --------------------------------- Helpers --------------------------------- */

function readBody(req: IncomingMessage, limit: number): Promise<Buffer> {
    // a declared length is checked before anything is read
    if (Number(req.headers["content-length"]) > limit) {
        return Promise.reject(new HttpError(413, "Body too big"));
    }
    return new Promise<Buffer>((resolve, reject) => {
        const chunks: Buffer[] = [];
        let total = 0;
        req.on("data", (chunk: Buffer) => {
            total += chunk.length;
            if (total > limit) {
                // keep draining so the reply can still go out on this socket
                chunks.length = 0;
                reject(new HttpError(413, "Body too big"));
                return;
            }
            chunks.push(chunk);
        });
        req.on("end", () => resolve(Buffer.concat(chunks)));
        req.on("error", reject);
    });
}

async function dispatch(router: Router, found: RouteMatch, req: Request): Promise<Reply> {
    const layers: RouteHooks[] = [router, found.group, found.route];
    const early = await runBefore(layers, req);
    const reply = early ?? toReply(await found.route.handler(req));
    return runAfter(layers, req, reply);
}

function send(res: ServerResponse, reply: Reply, requestId: string, method: string): number {
    const body = typeof reply.body === "string" ? Buffer.from(reply.body, "utf8") : reply.body;
    res.statusCode = reply.status;
    for (const [k, v] of Object.entries(reply.headers)) res.setHeader(k, v);
    res.setHeader("X-Request-Id", requestId);
    res.setHeader("Content-Length", body.length);
    if (method === "HEAD") {
        res.end();
        return 0;
    }
    res.end(body);
    return body.length;
}

/**
 * The path the router sees: the request target up to `?` or `#`, with no
 * dot-segment resolution or decoding. Absolute-form targets keep their
 * path component.
 */
export function routingPath(target: string): string {
    let raw = target || "/";
    if (!raw.startsWith("/")) {
        const scheme = raw.indexOf("://");
        if (scheme < 0) return raw;
        const rest = raw.slice(scheme + 3);
        const end = rest.search(/[/?#]/);
        if (end < 0) return "/";
        raw = rest[end] === "/" ? rest.slice(end) : "/" + rest.slice(end);
    }
    const cut = raw.search(/[?#]/);
    return cut < 0 ? raw : raw.slice(0, cut);
}

/* -------------------------- Shared request handler -------------------------- */

export function buildRequestListener(router: Router, opts: ListenerOptions = {}) {
    const maxBody = opts.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    const reqIdHeader = (opts.requestIdHeader ?? "x-request-id").toLowerCase();
    const logger = opts.logger ?? createLogger({ name: "http" });

    async function handle(req: IncomingMessage, res: ServerResponse) {
        const t0 = process.hrtime.bigint();
        const incomingId = req.headers[reqIdHeader];
        const requestId = typeof incomingId === "string" && incomingId ? incomingId : randomUUID();
        const method = (req.method || "GET").toUpperCase();
        let path = "/";
        let route: string | undefined;
        let reply: Reply;

        try {
            path = routingPath(req.url || "/");
            const url = new URL(req.url || "/", "http://localhost");

            for (const hook of router.begin) await hook({ method, url, path, headers: req.headers, requestId });

            const found = isHttpMethod(method) ? router.route(method, path) : undefined;
            if (!found) {
                reply = notFound();
            } else {
                route = String(found.route);
                const body = await readBody(req, maxBody);
                const request = new Request(found.route.method, url, path, req.headers, body, found.matches, found.params, requestId);
                reply = await dispatch(router, found, request);
            }
        } catch (e) {
            if (isHttpError(e)) {
                reply = text(e.message, e.status);
            } else {
                logger.error(e instanceof Error ? e : String(e), { method, path, route, request_id: requestId });
                reply = serverError();
            }
        }

        const bytes = send(res, reply, requestId, method);
        const durationMs = Number((process.hrtime.bigint() - t0) / 1_000_000n);

        const info: FinishInfo = { method, path, status: reply.status, durationMs, requestId, route };
        for (const hook of router.finish) {
            try {
                await hook(info);
            } catch (e) {
                logger.warn("finish hook failed", { error: e instanceof Error ? e.message : String(e), request_id: requestId });
            }
        }

        logger.access({ method, path, status: reply.status, duration_ms: durationMs, bytes, route, request_id: requestId });
    }

    return async function listener(req: IncomingMessage, res: ServerResponse): Promise<void> {
        try {
            await handle(req, res);
        } catch (e) {
            logger.fatal(e instanceof Error ? e : String(e), { url: req.url });
            if (!res.headersSent) res.statusCode = 500;
            if (!res.writableEnded) res.end();
        }
    };
}

/* ---------------------------------- Servers -------------------------------- */

export function createNodeServer(router: Router, opts?: ListenerOptions) {
    return http.createServer(buildRequestListener(router, opts));
}
