// cortex/log/logger.ts
import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";
export type TimeFormat = "iso" | "epoch" | "none";
export type Layout = "text" | "json";

const EMOJI: Record<string, string> = {
    trace: "🧭", debug: "🔧", info: "ℹ️", warn: "⚠️", error: "❌", fatal: "💥",
    access: "📨", success: "✅",
};

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];
const LEVEL_NUM: Record<LogLevel, number> = { trace: 10, debug: 20, info: 30, warn: 40, error: 50, fatal: 60 };

export interface AccessLogRecord {
    ts?: string; method?: string; path?: string; status?: number; duration_ms?: number;
    bytes?: number; ip?: string; ua?: string;
}

export type LogContext = Record<string, unknown>;

export interface LoggerOptions {
    name?: string;
    level?: LogLevel;
    layout?: Layout;
    emoji?: boolean;
    color?: boolean;
    time?: TimeFormat;
    console?: boolean;
    /** file sink; off unless a path is given */
    file?: { path: string; append?: boolean } | false;
    redact?: string[];
    /** return false to drop a record that passed the level check */
    sampler?: (level: LogLevel, msg: string, ctx?: LogContext) => boolean;
}

export interface Logger {
    readonly level: LogLevel;
    trace(msg: string, ctx?: LogContext): void;
    debug(msg: string, ctx?: LogContext): void;
    info(msg: string, ctx?: LogContext): void;
    warn(msg: string, ctx?: LogContext): void;
    error(msg: string | Error, ctx?: LogContext): void;
    fatal(msg: string | Error, ctx?: LogContext): void;
    success(msg: string, ctx?: LogContext): void;
    access(rec: AccessLogRecord): void;
    /** flush and close the file sink; resolves at once without one */
    close(): Promise<void>;
}

export function isLogLevel(v: string): v is LogLevel {
    return LOG_LEVELS.some((l) => l === v);
}

export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
    const v = String(env.LOG_LEVEL || "").toLowerCase();
    if (isLogLevel(v)) return v;
    return env.APP_DEBUG === "true" ? "debug" : "info";
}

function paint(level: LogLevel, s: string): string {
    switch (level) {
        case "trace": return chalk.gray(s);
        case "debug": return chalk.cyan(s);
        case "info":  return chalk.blue(s);
        case "warn":  return chalk.yellow(s);
        case "error": return chalk.red(s);
        case "fatal": return chalk.bold.red(s);
    }
}

export function redactObj(obj: LogContext | undefined, redact: string[]): LogContext | undefined {
    if (!obj || !redact.length) return obj;
    const out: LogContext = {};
    for (const [k, v] of Object.entries(obj)) out[k] = redact.includes(k.toLowerCase()) ? "[REDACTED]" : v;
    return out;
}

function makeFileSink(filePath: string, append: boolean) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const stream = fs.createWriteStream(filePath, { flags: append ? "a" : "w" });
    stream.on("error", (e) => console.error(`[logger] file sink ${filePath} failed: ${e.message}`));
    return {
        write(line: string) { stream.write(line + "\n"); },
        close: () => new Promise<void>((resolve) => { stream.end(() => resolve()); }),
    };
}

function errorCtx(m: string | Error, c?: LogContext): [string, LogContext | undefined] {
    if (!(m instanceof Error)) return [m, c];
    return [m.message, { ...(c || {}), err: { name: m.name, message: m.message, stack: m.stack } }];
}

export function makeLogger(opts: LoggerOptions = {}): Logger {
    const name = opts.name ?? (process.env.APP_NAME || "cortex");
    const level = opts.level ?? levelFromEnv();
    const layout = opts.layout ?? "text";
    const emoji = opts.emoji ?? true;
    const color = opts.color ?? (process.stdout?.isTTY ?? false);
    const time = opts.time ?? "iso";
    const toConsole = opts.console ?? true;
    const redact = (opts.redact ?? ["password", "token", "secret", "authorization"]).map(k => k.toLowerCase());
    const sampler = opts.sampler ?? (() => true);
    const fileSink = opts.file ? makeFileSink(opts.file.path, opts.file.append !== false) : undefined;

    const stamp = () => time === "iso" ? new Date().toISOString() : time === "epoch" ? String(Date.now()) : undefined;

    function fmt(lvl: LogLevel, msg: string, ctx: LogContext | undefined, icon: string): string {
        if (layout === "json") {
            return JSON.stringify({ t: stamp(), name, level: lvl, msg, ...(ctx || {}) });
        }
        const t = stamp();
        const head = (emoji ? icon + " " : "") + (t ? `${t} ` : "") + `${name} ${lvl.toUpperCase()}:`;
        const tail = ctx && Object.keys(ctx).length ? " " + JSON.stringify(ctx) : "";
        return (color ? paint(lvl, head) : head) + " " + msg + tail;
    }

    function write(lvl: LogLevel, msg: string, ctx?: LogContext, icon = EMOJI[lvl]) {
        if (LEVEL_NUM[level] > LEVEL_NUM[lvl]) return;
        if (!sampler(lvl, msg, ctx)) return;

        const line = fmt(lvl, msg, redactObj(ctx, redact), icon);
        if (toConsole) {
            const fn = lvl === "error" || lvl === "fatal" ? console.error : lvl === "warn" ? console.warn : console.log;
            fn(line);
        }
        fileSink?.write(line);
    }

    return {
        level,
        trace: (m, c) => write("trace", m, c),
        debug: (m, c) => write("debug", m, c),
        info:  (m, c) => write("info", m, c),
        warn:  (m, c) => write("warn", m, c),
        error: (m, c) => write("error", ...errorCtx(m, c)),
        fatal: (m, c) => write("fatal", ...errorCtx(m, c)),
        // info level, shown with a check mark
        success: (m, c) => write("info", m, { ...(c || {}), ok: true }, EMOJI.success),

        access(rec) {
            const data = { ...rec, ts: rec.ts || new Date().toISOString() };
            write("info", `${data.method || ""} ${data.path || ""} ${data.status ?? ""} ${data.duration_ms ?? ""}ms`, { ...data }, EMOJI.access);
        },

        close: () => fileSink ? fileSink.close() : Promise.resolve(),
    };
}

// Shorthand
export const createLogger = makeLogger;
