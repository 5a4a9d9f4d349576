// cortex/http/client.ts — small JSON API client over fetch.
// Failures surface as HttpError so a handler that proxies an upstream call can just let them propagate.

import type { Validator } from "./types";
import { serializationFailure, upstreamIoFailure } from "./errors";
import { encodeJson } from "./respond";

export interface ClientOptions {
    /** X-Api-Key value; falls back to env X_API_KEY, then "" */
    apiKey?: string;
    fetch?: typeof fetch;
    env?: NodeJS.ProcessEnv;
}

export function resolveApiKey(opts: ClientOptions = {}): string {
    if (opts.apiKey !== undefined) return opts.apiKey;
    return (opts.env ?? process.env).X_API_KEY ?? "";
}

async function send(method: string, url: string, payload: unknown, opts: ClientOptions): Promise<string> {
    const headers: Record<string, string> = {
        "Accept": "application/json",
        "X-Api-Key": resolveApiKey(opts),
    };

    let body: string | undefined;
    if (payload !== undefined) {
        try {
            body = encodeJson(payload);
        } catch (e) {
            throw serializationFailure(e);
        }
        // without it some servers only read the first property of the object
        headers["Content-Type"] = "application/json; charset=UTF-8";
    }

    const doFetch = opts.fetch ?? fetch;
    let res: Response;
    try {
        res = await doFetch(url, { method, headers, body });
    } catch (e) {
        throw upstreamIoFailure(e);
    }
    if (!res.ok) {
        throw upstreamIoFailure(new Error(`${method} ${url} responded ${res.status}`), res.status);
    }
    try {
        return await res.text();
    } catch (e) {
        throw upstreamIoFailure(e);
    }
}

function decode<T>(raw: string, validate?: Validator<T>): unknown {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (e) {
        throw serializationFailure(e);
    }
    if (!validate) return parsed;
    const v = validate(parsed);
    if (!v.ok) throw serializationFailure(new Error(`Unexpected response shape: ${v.errors.join("; ")}`));
    return v.data;
}

export function getJson(url: string, opts?: ClientOptions): Promise<unknown>;
export function getJson<T>(url: string, opts: ClientOptions, validate: Validator<T>): Promise<T>;
export async function getJson<T>(url: string, opts: ClientOptions = {}, validate?: Validator<T>): Promise<unknown> {
    return decode(await send("GET", url, undefined, opts), validate);
}

/** Send `payload` as JSON and decode the JSON reply */
export function postJson(url: string, payload: unknown, opts?: ClientOptions): Promise<unknown>;
export function postJson<T>(url: string, payload: unknown, opts: ClientOptions, validate: Validator<T>): Promise<T>;
export async function postJson<T>(url: string, payload: unknown, opts: ClientOptions = {}, validate?: Validator<T>): Promise<unknown> {
    return decode(await send("POST", url, payload, opts), validate);
}

/** POST without reading a reply body */
export async function postNoBack(url: string, payload: unknown, opts: ClientOptions = {}): Promise<void> {
    await send("POST", url, payload, opts);
}

export function putJson(url: string, opts?: ClientOptions): Promise<unknown>;
export function putJson<T>(url: string, opts: ClientOptions, validate: Validator<T>): Promise<T>;
export async function putJson<T>(url: string, opts: ClientOptions = {}, validate?: Validator<T>): Promise<unknown> {
    return decode(await send("PUT", url, undefined, opts), validate);
}
