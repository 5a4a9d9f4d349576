// cortex/http/types.ts

import type { IncomingHttpHeaders } from "node:http";

/**
 * Minimal transport-agnostic HttpRequest.
 *
 * - Built by an adapter (see node_adapter.ts) and handed to handlers read-only.
 * - Header keys are lowercase, exactly as Node delivers them.
 */
export interface HttpRequest {
    /** HTTP method, uppercased (GET, POST, OPTIONS...) */
    method: string;

    /** Path of the incoming request, without the query string */
    path: string;

    /** Raw query string without the leading "?" (may be empty) */
    query: string;

    headers: IncomingHttpHeaders;

    /** Raw body bytes, when the adapter read one */
    body?: Buffer;

    /** Client IP if the adapter provides it */
    ip?: string;
}

/**
 * Response handed back to the transport.
 * A string[] header value is written as repeated header lines.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string | string[]>;
    body: Buffer;
}

export type Handler = (req: Readonly<HttpRequest>) => Promise<HttpResponse> | HttpResponse;

export type ValidationResult<T> =
    | { ok: true; data: T }
    | { ok: false; errors: string[] };

export type Validator<T> = (value: unknown) => ValidationResult<T>;
