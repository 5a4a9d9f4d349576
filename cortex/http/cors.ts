// cors.ts
/**
 * CORS policy and the preflight responder.
 * - The policy is built once at startup (see config.ts) and frozen.
 * - preflight() never fails: a browser probe that errors breaks every cross-origin call.
 *
 * ENV (all optional, read by loadCorsPolicy in config.ts):
 *   CORS_ORIGIN="*" | "https://a.com,https://b.com" | "re:^https://(.*)\\.example\\.com$"
 *   CORS_METHODS="GET,POST,OPTIONS"
 *   CORS_ALLOWED_HEADERS="Content-Type,Authorization,X-Api-Key"
 *   CORS_HEADERS_MODE=fixed-list|echo-requested
 *   CORS_EXPOSED_HEADERS="X-Request-Id"
 *   CORS_CREDENTIALS=true|false
 *   CORS_MAX_AGE=600
 *   CORS_VARY=true|false
 */

import type { HttpRequest, HttpResponse } from "./types";
import { getHeader } from "./headers";

export type OriginMatcher = "*" | string | RegExp | ReadonlyArray<string | RegExp>;

export type AllowHeadersMode = "fixed-list" | "echo-requested";

export interface CorsOptions {
    origin?: OriginMatcher;                 // default: '*'
    methods?: readonly string[];            // default: GET, POST, OPTIONS
    allowedHeaders?: readonly string[];     // default: ['Content-Type','Authorization','X-Api-Key']
    headersMode?: AllowHeadersMode;         // default: 'fixed-list'
    exposedHeaders?: readonly string[];     // default: []
    credentials?: boolean;                  // default: false
    maxAge?: number;                        // default: 600
    vary?: boolean;                         // default: true
}

export interface CorsPolicy {
    readonly origin: OriginMatcher;
    readonly methods: readonly string[];
    readonly allowedHeaders: readonly string[];
    readonly headersMode: AllowHeadersMode;
    readonly exposedHeaders: readonly string[];
    readonly credentials: boolean;
    readonly maxAge: number;
    readonly vary: boolean;
}

export const DEFAULT_METHODS: readonly string[] = ["GET", "POST", "OPTIONS"];
export const DEFAULT_ALLOWED_HEADERS: readonly string[] = ["Content-Type", "Authorization", "X-Api-Key"];

// ---------- helpers ----------
export function parseList(v: string | undefined, def: string[] = []): string[] {
    if (!v) return def;
    return v.split(",").map(s => s.trim()).filter(Boolean);
}

/** Parse CORS_ORIGIN to an OriginMatcher */
export function parseOriginEnv(v: string | undefined): OriginMatcher {
    if (!v || v === "*") return "*";
    if (v.includes(",")) return parseList(v);
    if (v.startsWith("re:")) return new RegExp(v.slice(3));
    return v;
}

export function parseHeadersMode(v: string | undefined): AllowHeadersMode {
    return v === "echo-requested" ? "echo-requested" : "fixed-list";
}

/** Normalize options to a frozen, fully-required policy */
export function normCors(c: CorsOptions = {}): CorsPolicy {
    return Object.freeze({
        origin: c.origin ?? "*",
        methods: Object.freeze([...(c.methods ?? DEFAULT_METHODS)]),
        allowedHeaders: Object.freeze([...(c.allowedHeaders ?? DEFAULT_ALLOWED_HEADERS)]),
        headersMode: c.headersMode ?? "fixed-list",
        exposedHeaders: Object.freeze([...(c.exposedHeaders ?? [])]),
        credentials: !!c.credentials,
        maxAge: c.maxAge ?? 600,
        vary: c.vary ?? true,
    });
}

/** Decide which Origin header to return */
export function matchOrigin(reqOrigin: string | undefined, matcher: OriginMatcher): string | null {
    if (matcher === "*") return "*";
    if (typeof matcher === "string") return reqOrigin === matcher ? matcher : null;
    if (matcher instanceof RegExp) return reqOrigin && matcher.test(reqOrigin) ? reqOrigin : null;
    for (const m of matcher) {
        const v = matchOrigin(reqOrigin, m);
        if (v) return v;
    }
    return null;
}

/** Merge Vary header safely */
export function appendVary(current: string | string[] | undefined, value: string): string {
    const set = new Set<string>(
        (Array.isArray(current) ? current.join(",") : current ?? "")
            .split(",")
            .map(s => s.trim())
            .filter(Boolean)
    );
    set.add(value);
    return Array.from(set).join(", ");
}

function allowOrigin(req: Readonly<HttpRequest>, policy: CorsPolicy): string | null {
    const reqOrigin = getHeader(req, "Origin");
    const matched = matchOrigin(reqOrigin, policy.origin);
    // with credentials the browser rejects '*'
    if (policy.credentials && matched === "*") return reqOrigin ?? null;
    return matched;
}

function allowHeaders(req: Readonly<HttpRequest>, policy: CorsPolicy): readonly string[] {
    if (policy.headersMode === "echo-requested") {
        const requested = parseList(getHeader(req, "Access-Control-Request-Headers"));
        if (requested.length) return requested;
    }
    return policy.allowedHeaders;
}

/**
 * Answer a CORS preflight (OPTIONS) request: 204, empty body, negotiated headers.
 * The request body is never read.
 */
export function preflight(req: Readonly<HttpRequest>, policy: CorsPolicy): HttpResponse {
    const headers: Record<string, string> = {};
    const origin = allowOrigin(req, policy);
    if (origin) headers["Access-Control-Allow-Origin"] = origin;
    if (policy.credentials) headers["Access-Control-Allow-Credentials"] = "true";
    headers["Access-Control-Allow-Methods"] = policy.methods.join(", ");
    headers["Access-Control-Allow-Headers"] = allowHeaders(req, policy).join(", ");
    if (policy.maxAge > 0) headers["Access-Control-Max-Age"] = String(policy.maxAge);
    if (policy.vary) {
        let vary = appendVary(undefined, "Origin");
        if (policy.headersMode === "echo-requested") vary = appendVary(vary, "Access-Control-Request-Headers");
        headers["Vary"] = vary;
    }
    return { status: 204, headers, body: Buffer.alloc(0) };
}

/** Attach the non-preflight CORS headers to an outgoing response (mutates and returns it). */
export function withCors(res: HttpResponse, req: Readonly<HttpRequest>, policy: CorsPolicy): HttpResponse {
    const origin = allowOrigin(req, policy);
    if (origin) res.headers["Access-Control-Allow-Origin"] = origin;
    if (policy.credentials) res.headers["Access-Control-Allow-Credentials"] = "true";
    if (policy.exposedHeaders.length) res.headers["Access-Control-Expose-Headers"] = policy.exposedHeaders.join(", ");
    if (policy.vary && origin && origin !== "*") res.headers["Vary"] = appendVary(res.headers["Vary"], "Origin");
    return res;
}
