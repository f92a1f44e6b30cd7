// waymark/http/respond.ts — reply shape returned by handlers and hooks

export interface Reply {
    status: number;
    headers: Record<string, string>;
    body: string | Buffer;
}

/** What a handler may return: a full reply, or plain text for a 200. */
export type HandlerResult = Reply | string;

export const TEXT = "text/plain; charset=utf-8";
export const JSON_TYPE = "application/json; charset=utf-8";

export const text = (body: string, status = 200): Reply => ({ status, headers: { "Content-Type": TEXT }, body });

export const json = (body: unknown, status = 200): Reply =>
    ({ status, headers: { "Content-Type": JSON_TYPE }, body: JSON.stringify(body) });

export const notFound = (): Reply => text("Not Found", 404);
export const serverError = (): Reply => text("Internal Server Error", 500);

export function toReply(result: HandlerResult): Reply {
    return typeof result === "string" ? text(result) : result;
}
