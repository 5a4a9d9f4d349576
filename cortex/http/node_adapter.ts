// node_adapter.ts — bare Node HTTP transport around a single Handler, with JSON access logs.
// Routing is the handler's business; this file only converts in and out and owns the error boundary.

import http, { type IncomingMessage, type ServerResponse } from "node:http";
import type { Handler, HttpRequest, HttpResponse } from "./types";
import { invalidPayload, toHttpError, toResponse, upstreamIoFailure } from "./errors";
import type { Logger } from "../log/logger";

export interface AdapterOptions {
    /** default 1 MB */
    bodyLimitBytes?: number;
    logger?: Logger;
}

/** What readRequest needs from an IncomingMessage */
export type IncomingLike = Pick<IncomingMessage, "method" | "url" | "headers"> &
    AsyncIterable<Buffer | string> & { socket?: { remoteAddress?: string } };

/** What writeResponse needs from a ServerResponse */
export interface OutgoingLike {
    statusCode: number;
    setHeader(name: string, value: string | string[]): unknown;
    end(body: Buffer): unknown;
}

const NO_BODY = ["GET", "HEAD", "OPTIONS", "TRACE", "CONNECT"];

/** Split a request-target on its first "?"; the path is kept raw, as sent. */
export function splitTarget(target: string | undefined): { path: string; query: string } {
    const raw = target || "/";
    const q = raw.indexOf("?");
    if (q === -1) return { path: raw, query: "" };
    return { path: raw.slice(0, q) || "/", query: raw.slice(q + 1) };
}

export async function readRequest(incoming: IncomingLike, opts: AdapterOptions = {}): Promise<HttpRequest> {
    const limit = opts.bodyLimitBytes ?? 1_000_000;
    const method = (incoming.method || "GET").toUpperCase();
    const { path, query } = splitTarget(incoming.url);

    let body: Buffer | undefined;
    if (!NO_BODY.includes(method)) {
        const chunks: Buffer[] = [];
        let total = 0;
        try {
            for await (const chunk of incoming) {
                const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
                total += buf.length;
                // keep draining past the limit so the 400 can still be written on this socket
                if (total <= limit) chunks.push(buf);
            }
        } catch (e) {
            throw upstreamIoFailure(e);
        }
        if (total > limit) throw invalidPayload(`body exceeds ${limit} bytes`);
        body = Buffer.concat(chunks);
    }

    return {
        method,
        path,
        query,
        headers: incoming.headers,
        body,
        ip: incoming.socket?.remoteAddress,
    };
}

export function writeResponse(res: OutgoingLike, out: HttpResponse): void {
    res.statusCode = out.status;
    for (const [k, v] of Object.entries(out.headers)) res.setHeader(k, v);
    res.end(out.body);
}

/**
 * The error boundary: whatever the handler throws becomes a response.
 * 5xx causes go to the log, never to the client.
 */
export async function handleSafely(handler: Handler, req: Readonly<HttpRequest>, logger?: Logger): Promise<HttpResponse> {
    try {
        return await handler(req);
    } catch (e) {
        const err = toHttpError(e);
        const ctx = { method: req.method, path: req.path, kind: err.kind, status: err.status };
        if (err.status >= 500) logger?.error(err, ctx);
        else logger?.debug(err.message, ctx);
        return toResponse(err);
    }
}

export function createListener(handler: Handler, opts: AdapterOptions = {}) {
    const logger = opts.logger;

    return async function listener(incoming: IncomingMessage, res: ServerResponse): Promise<void> {
        const t0 = process.hrtime.bigint();
        let out: HttpResponse;
        let req: HttpRequest | undefined;
        try {
            req = await readRequest(incoming, opts);
            out = await handleSafely(handler, req, logger);
        } catch (e) {
            // only readRequest gets here
            const err = toHttpError(e);
            const ctx = { method: incoming.method, url: incoming.url, kind: err.kind, status: err.status };
            if (err.status >= 500) logger?.error(err, ctx);
            else logger?.debug(err.message, ctx);
            out = toResponse(err);
        }
        writeResponse(res, out);

        logger?.access({
            method: req?.method ?? incoming.method,
            path: req?.path ?? splitTarget(incoming.url).path,
            status: out.status,
            duration_ms: Number((process.hrtime.bigint() - t0) / 1_000_000n),
            bytes: out.body.length,
            ip: req?.ip,
            ua: incoming.headers["user-agent"],
        });
    };
}

export function createNodeServer(handler: Handler, opts: AdapterOptions = {}) {
    const listener = createListener(handler, opts);
    return http.createServer((req, res) => {
        listener(req, res).catch((e: unknown) => {
            opts.logger?.fatal(e instanceof Error ? e : String(e));
            if (!res.headersSent) res.statusCode = 500;
            res.end();
        });
    });
}
