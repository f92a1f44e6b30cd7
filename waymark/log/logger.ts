// waymark/log/logger.ts — leveled console logger with optional file sink
import fs from "node:fs";
import path from "node:path";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type Layout = "text" | "json";
export type LogContext = Record<string, unknown>;

const LEVEL_NUM: Record<LogLevel, number> = { trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60 };
const LEVELS = Object.keys(LEVEL_NUM);

export interface AccessLogRecord {
    ts?: string;
    method: string;
    path: string;
    status: number;
    duration_ms: number;
    bytes?: number;
    route?: string;
    request_id?: string;
}

export interface LoggerOptions {
    name?: string;
    level?: LogLevel;
    layout?: Layout;
    color?: boolean;
    console?: boolean;
    /** file sink, or false to disable */
    file?: { path: string; append?: boolean } | false;
    redact?: string[];
}

export interface Logger {
    readonly name: string;
    level: LogLevel;
    trace(msg: string, ctx?: LogContext): void;
    debug(msg: string, ctx?: LogContext): void;
    info(msg: string, ctx?: LogContext): void;
    warn(msg: string, ctx?: LogContext): void;
    error(msg: string | Error, ctx?: LogContext): void;
    fatal(msg: string | Error, ctx?: LogContext): void;
    success(msg: string, ctx?: LogContext): void;
    access(rec: AccessLogRecord): void;
    child(scope: string): Logger;
}

function isLogLevel(v: string): v is LogLevel {
    return LEVELS.includes(v);
}

export function levelFromEnv(): LogLevel {
    const v = String(process.env.LOG_LEVEL || "").toLowerCase();
    if (isLogLevel(v)) return v;
    return process.env.APP_DEBUG === "true" ? "debug" : "info";
}

function layoutFromEnv(): Layout {
    return /^(1|true|yes|on)$/i.test(process.env.LOG_JSON || "") ? "json" : "text";
}

const paint = (code: number) => (s: string) => `\x1b[${code}m${s}\x1b[0m`;
const COLORS: Record<LogLevel, (s: string) => string> = {
    trace: paint(90),
    debug: paint(36),
    info: paint(34),
    warn: paint(33),
    error: paint(31),
    fatal: (s) => paint(1)(paint(31)(s)),
};

function redactObj(obj: LogContext, redact: string[]): LogContext {
    if (!redact.length) return obj;
    const out: LogContext = {};
    for (const [k, v] of Object.entries(obj)) out[k] = redact.includes(k) ? "[REDACTED]" : v;
    return out;
}

function makeFileSink(filePath: string, append: boolean) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const stream = fs.createWriteStream(filePath, { flags: append ? "a" : "w" });
    stream.on("error", (e) => console.error(`[log] file sink ${filePath} failed: ${e.message}`));
    return (line: string) => {
        if (stream.writable) stream.write(line + "\n");
    };
}

function errorContext(m: string | Error, ctx?: LogContext): [string, LogContext | undefined] {
    if (!(m instanceof Error)) return [m, ctx];
    return [m.message, { ...ctx, err: { name: m.name, message: m.message, stack: m.stack } }];
}

interface Settings {
    name: string;
    level: LogLevel;
    layout: Layout;
    color: boolean;
    console: boolean;
    redact: string[];
    sink?: (line: string) => void;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
    const filePath = opts.file === undefined ? process.env.LOG_FILE_PATH : opts.file && opts.file.path;
    const append = opts.file ? opts.file.append !== false : true;

    return build({
        name: opts.name ?? (process.env.APP_NAME || "waymark"),
        level: opts.level ?? levelFromEnv(),
        layout: opts.layout ?? layoutFromEnv(),
        color: opts.color ?? (process.stdout.isTTY ?? false),
        console: opts.console ?? true,
        redact: opts.redact ?? ["password", "token", "secret", "authorization"],
        sink: filePath ? makeFileSink(filePath, append) : undefined,
    });
}

function build(base: Settings): Logger {
    function line(level: LogLevel, msg: string, ctx?: LogContext): string {
        const fields = ctx && Object.keys(ctx).length ? redactObj(ctx, base.redact) : undefined;
        if (base.layout === "json") {
            return JSON.stringify({ t: new Date().toISOString(), name: base.name, level, msg, ...fields });
        }
        const head = `${new Date().toISOString()} ${base.name} ${level.toUpperCase()}:`;
        const tail = fields ? " " + JSON.stringify(fields) : "";
        return (base.color ? COLORS[level](head) : head) + " " + msg + tail;
    }

    function write(level: LogLevel, msg: string, ctx?: LogContext) {
        if (LEVEL_NUM[base.level] > LEVEL_NUM[level]) return;
        const out = line(level, msg, ctx);
        if (base.console) {
            const fn = level === "error" || level === "fatal" ? console.error : level === "warn" ? console.warn : console.log;
            fn(out);
        }
        base.sink?.(out);
    }

    return {
        name: base.name,
        get level() { return base.level; },
        set level(v: LogLevel) { base.level = v; },

        trace: (m, c) => write("trace", m, c),
        debug: (m, c) => write("debug", m, c),
        info: (m, c) => write("info", m, c),
        warn: (m, c) => write("warn", m, c),
        error: (m, c) => write("error", ...errorContext(m, c)),
        fatal: (m, c) => write("fatal", ...errorContext(m, c)),
        success: (m, c) => write("info", m, { ...c, ok: true }),

        access(rec) {
            if (LEVEL_NUM[base.level] > LEVEL_NUM.info) return;
            const data = { ...rec, ts: rec.ts ?? new Date().toISOString() };
            const out = base.layout === "json"
                ? JSON.stringify({ level: "access", name: base.name, ...data })
                : `${data.ts} ${base.name} ACCESS: ${data.method} ${data.path} ${data.status} ${data.duration_ms}ms`;
            if (base.console) console.log(out);
            base.sink?.(out);
        },

        // a child copies the parent's settings; later level changes do not propagate
        child: (scope) => build({ ...base, name: `${base.name}:${scope}` }),
    };
}
