// cortex/http/respond.ts
import type { HttpRequest, HttpResponse } from "./types";
import { type CorsPolicy, withCors } from "./cors";
import { serializationFailure } from "./errors";

export const APPLICATION_JSON = "application/json";
export const TEXT_PLAIN = "text/plain; charset=utf-8";

/**
 * JSON.stringify that refuses what RFC 8259 cannot carry instead of silently
 * turning it into null or dropping it.
 */
export function encodeJson(value: unknown): string {
    const replacer = (_key: string, v: unknown) => {
        if (typeof v === "number" && !Number.isFinite(v)) {
            throw new TypeError(`Cannot encode non-finite number ${v} as JSON`);
        }
        return v;
    };
    // throws TypeError itself on cycles and bigint
    const out: string | undefined = JSON.stringify(value, replacer);
    if (out === undefined) throw new TypeError(`Cannot encode ${typeof value} as JSON`);
    return out;
}

const build = (status: number, contentType: string, body: string): HttpResponse => ({
    status,
    headers: { "Content-Type": contentType },
    body: Buffer.from(body, "utf8"),
});

/**
 * 200 response with a JSON body. Change `status` on the result for other success codes.
 * @throws HttpError SerializationFailure
 */
export function json(value: unknown): HttpResponse {
    let body: string;
    try {
        body = encodeJson(value);
    } catch (e) {
        throw serializationFailure(e);
    }
    return build(200, APPLICATION_JSON, body);
}

/** 200 with a plain-text message */
export const text = (message: string) => build(200, TEXT_PLAIN, message);

export const notFound = (message = "Item not found") =>
    build(404, APPLICATION_JSON, JSON.stringify({ ok: false, error: "NOT_FOUND", message }));

export const badRequest = (message = "Bad Request") =>
    build(400, APPLICATION_JSON, JSON.stringify({ ok: false, error: "BAD_REQUEST", message }));

/** json(value), or a 404 when there is nothing to return */
export function jsonOrNotFound<T>(value: T | null | undefined): HttpResponse {
    return value === null || value === undefined ? notFound() : json(value);
}

/** json(value) with the CORS headers a browser expects on the actual (non-preflight) response */
export function jsonCors(value: unknown, req: Readonly<HttpRequest>, policy: CorsPolicy): HttpResponse {
    return withCors(json(value), req, policy);
}
