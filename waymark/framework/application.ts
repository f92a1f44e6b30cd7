// waymark/framework/application.ts

import type { Server } from "node:http";
import { loadConfig, type AppConfig } from "../http/config";
import { Group } from "../http/group";
import type { AfterHook, BeforeHook, BeginHook, FinishHook } from "../http/middleware";
import { SealedError, type Route } from "../http/route";
import { Router } from "../http/router";
import { buildRequestListener, createNodeServer } from "../http/server";
import type { Handler, HttpMethod } from "../http/types";
import { createLogger, type Logger } from "../log/logger";

export interface AppOptions {
    config?: AppConfig;
    logger?: Logger;
}

export class App {
    readonly router = new Router();
    readonly config: AppConfig;
    private readonly logger: Logger;

    constructor(opts: AppOptions = {}) {
        this.config = opts.config ?? loadConfig();
        this.logger = opts.logger ?? createLogger({
            name: this.config.appName,
            level: this.config.logLevel,
            layout: this.config.logJson ? "json" : "text",
        });
    }

    getLogger(): Logger {
        return this.logger;
    }

    /** Builds a group under `prefix` and mounts it after the groups already there. */
    mount(prefix: string, register: (group: Group) => void): this {
        const group = new Group(prefix);
        register(group);
        return this.mountGroup(group);
    }

    mountGroup(group: Group): this {
        this.router.mount(group);
        this.logger.debug("Mounted route group", { prefix: group.prefix, routes: group.all().length });
        return this;
    }

    add(method: HttpMethod, pattern: string, handler: Handler): Route {
        return this.router.root.add(method, pattern, handler);
    }

    get(pattern: string, handler: Handler)    { return this.add("GET", pattern, handler); }
    post(pattern: string, handler: Handler)   { return this.add("POST", pattern, handler); }
    put(pattern: string, handler: Handler)    { return this.add("PUT", pattern, handler); }
    patch(pattern: string, handler: Handler)  { return this.add("PATCH", pattern, handler); }
    delete(pattern: string, handler: Handler) { return this.add("DELETE", pattern, handler); }

    begin(hook: BeginHook): this   { return this.hook(this.router.begin, hook); }
    before(hook: BeforeHook): this { return this.hook(this.router.before, hook); }
    after(hook: AfterHook): this   { return this.hook(this.router.after, hook); }
    finish(hook: FinishHook): this { return this.hook(this.router.finish, hook); }

    /** Seals the route table and returns the Node request listener. */
    listener() {
        this.router.seal();
        return buildRequestListener(this.router, this.listenerOptions());
    }

    /** Seals the route table and starts serving. Resolves once the port is bound. */
    async listen(port = this.config.httpPort, host = this.config.host): Promise<Server> {
        this.router.seal();
        const server = createNodeServer(this.router, this.listenerOptions());
        await new Promise<void>((resolve, reject) => {
            server.once("error", reject);
            server.listen(port, host, () => {
                server.off("error", reject);
                resolve();
            });
        });
        const addr = server.address();
        const bound = typeof addr === "object" && addr ? addr.port : port;
        this.logger.success(`[HTTP] listening on http://${host}:${bound}`, { routes: this.router.routes().length });
        return server;
    }

    private listenerOptions() {
        return {
            maxBodyBytes: this.config.maxBodyBytes,
            requestIdHeader: this.config.requestIdHeader,
            logger: this.logger.child("http"),
        };
    }

    private hook<H>(list: H[], hook: H): this {
        if (this.router.isSealed) throw new SealedError("router hooks");
        list.push(hook);
        return this;
    }
}
