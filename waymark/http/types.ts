// waymark/http/types.ts
import type { Request } from "./request";
import type { HandlerResult } from "./respond";

export type HttpMethod =
    | "GET" | "POST" | "PUT" | "DELETE" | "PATCH"
    | "OPTIONS" | "HEAD" | "TRACE" | "CONNECT";

export const HTTP_METHODS: readonly HttpMethod[] = [
    "GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS", "HEAD", "TRACE", "CONNECT",
];

export function isHttpMethod(v: string): v is HttpMethod {
    return HTTP_METHODS.some((m) => m === v);
}

export type Handler = (req: Request) => HandlerResult | Promise<HandlerResult>;
