// cortex/http/config.ts
// Env helpers + the typed app config, built once at startup.
// dotenv is loaded by the entrypoint (server.ts), never here.

import {
    type CorsPolicy,
    DEFAULT_ALLOWED_HEADERS,
    DEFAULT_METHODS,
    normCors,
    parseHeadersMode,
    parseOriginEnv,
} from "./cors";
import { type LogLevel, levelFromEnv } from "../log/logger";

type Env = NodeJS.ProcessEnv;

export function boolEnv(env: Env, name: string, def = false): boolean {
    const v = env[name];
    if (v == null) return def;
    return /^(1|true|yes|on)$/i.test(v);
}

export function intEnv(env: Env, name: string, def: number): number {
    const v = env[name];
    if (v == null || v.trim() === "") return def;
    const n = parseInt(v, 10);
    return Number.isFinite(n) ? n : def;
}

export function strEnv(env: Env, name: string, def = ""): string {
    const v = env[name];
    return v == null ? def : v;
}

export function listEnv(env: Env, name: string, sep = ",", def: readonly string[] = []): readonly string[] {
    const v = env[name];
    if (v == null || !v.trim()) return def;
    return v.split(sep).map(s => s.trim()).filter(Boolean);
}

/** The CORS policy from CORS_* (see cors.ts for the keys) */
export function loadCorsPolicy(env: Env = process.env): CorsPolicy {
    return normCors({
        origin: parseOriginEnv(env.CORS_ORIGIN),
        methods: listEnv(env, "CORS_METHODS", ",", DEFAULT_METHODS),
        allowedHeaders: listEnv(env, "CORS_ALLOWED_HEADERS", ",", DEFAULT_ALLOWED_HEADERS),
        headersMode: parseHeadersMode(env.CORS_HEADERS_MODE),
        exposedHeaders: listEnv(env, "CORS_EXPOSED_HEADERS"),
        credentials: boolEnv(env, "CORS_CREDENTIALS", false),
        maxAge: intEnv(env, "CORS_MAX_AGE", 600),
        vary: boolEnv(env, "CORS_VARY", true),
    });
}

export interface AppConfig {
    readonly appName: string;
    readonly host: string;
    readonly port: number;
    /** `file` is set only when LOG_FILE_PATH is */
    readonly log: Readonly<{ level: LogLevel; json: boolean; file?: string }>;
    readonly cors: CorsPolicy;
}

export function loadConfig(env: Env = process.env): AppConfig {
    return Object.freeze({
        appName: strEnv(env, "APP_NAME", "cortex"),
        host: strEnv(env, "APP_HOST", strEnv(env, "HOST", "0.0.0.0")),
        port: intEnv(env, "APP_PORT", intEnv(env, "PORT", 8080)),
        log: Object.freeze({
            level: levelFromEnv(env),
            json: boolEnv(env, "LOG_JSON", false),
            ...(strEnv(env, "LOG_FILE_PATH") ? { file: strEnv(env, "LOG_FILE_PATH") } : {}),
        }),
        cors: loadCorsPolicy(env),
    });
}
