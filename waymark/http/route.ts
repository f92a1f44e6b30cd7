// waymark/http/route.ts
import type { Pattern } from "../framework/path-matcher";
import type { AfterHook, BeforeHook, RouteHooks } from "./middleware";
import type { Handler, HttpMethod } from "./types";

export class SealedError extends Error {
    constructor(what: string) {
        super(`Cannot modify ${what}: routes are sealed once the server is listening`);
        this.name = "SealedError";
    }
}

export class Route implements RouteHooks {
    readonly before: BeforeHook[] = [];
    readonly after: AfterHook[] = [];
    private routeName?: string;
    private sealed = false;

    constructor(
        readonly method: HttpMethod,
        readonly path: Pattern,
        readonly handler: Handler,
    ) {}

    get name(): string | undefined {
        return this.routeName;
    }

    named(name: string): this {
        this.assertOpen();
        this.routeName = name;
        return this;
    }

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

    /** Reverse routing: the concrete path for the given parameter values. */
    url(values: Record<string, string | number> = {}): string {
        return this.path.build(values);
    }

    seal(): void {
        this.sealed = true;
        Object.freeze(this.before);
        Object.freeze(this.after);
    }

    private assertOpen(): void {
        if (this.sealed) throw new SealedError(`route ${this}`);
    }

    toString(): string {
        return `${this.method} ${this.path.raw}`;
    }
}
