// waymark/index.ts — public surface

export { App, type AppOptions } from "./framework/application";
export {
    Pattern,
    decodeMatches,
    matchPath,
    normalizePath,
    type Match,
    type MatchResult,
    type Part,
} from "./framework/path-matcher";
export {
    PatternParseError,
    describeParseError,
    parsePattern,
    type ParseErrorDetail,
    type ParseResult,
} from "./framework/path-parser";

export { Group, joinPath } from "./http/group";
export { Route, SealedError } from "./http/route";
export { Router, type RouteMatch } from "./http/router";
export { Request } from "./http/request";
export * from "./http/respond";
export { HttpError } from "./http/errors";
export { buildRequestListener, createNodeServer, type ListenerOptions } from "./http/server";
export type { AfterHook, BeforeHook, BeginHook, FinishHook, FinishInfo, IncomingInfo } from "./http/middleware";
export type { Handler, HttpMethod } from "./http/types";
export { loadConfig, type AppConfig } from "./http/config";

export { createLogger, type Logger, type LoggerOptions } from "./log/logger";
