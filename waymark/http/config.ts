// waymark/http/config.ts
// Env helpers + a small, typed app config loader.
// Uses dotenv (loaded in the entrypoint).

import type { LogLevel } from "../log/logger";
import { levelFromEnv } from "../log/logger";

export function boolEnv(name: string, def = false): boolean {
    const v = process.env[name];
    if (v == null || v.trim() === "") return def;
    return /^(1|true|yes|on)$/i.test(v);
}

export function intEnv(name: string, def: number): number {
    const v = process.env[name];
    if (v == null || v.trim() === "") return def;
    const n = parseInt(v, 10);
    return Number.isFinite(n) ? n : def;
}

export function strEnv(name: string, def = ""): string {
    const v = process.env[name];
    return v == null ? def : v;
}

export const DEFAULT_MAX_BODY_BYTES = 64 * 1024;

export interface AppConfig {
    appName: string;
    host: string;
    httpPort: number;

    /** request bodies above this size are answered with 413 */
    maxBodyBytes: number;
    requestIdHeader: string;

    logLevel: LogLevel;
    logJson: boolean;
}

export function loadConfig(): AppConfig {
    return {
        appName: strEnv("APP_NAME", "waymark"),
        host: strEnv("APP_HOST", strEnv("HOST", "127.0.0.1")),
        httpPort: intEnv("APP_PORT", intEnv("PORT", 3000)),
        maxBodyBytes: intEnv("MAX_BODY_BYTES", DEFAULT_MAX_BODY_BYTES),
        requestIdHeader: strEnv("REQUEST_ID_HEADER", "x-request-id").toLowerCase(),
        logLevel: levelFromEnv(),
        logJson: boolEnv("LOG_JSON", false),
    };
}
