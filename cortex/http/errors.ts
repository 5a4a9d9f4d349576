// cortex/http/errors.ts
// One error type for everything a handler can fail with, and the single place
// where a failure becomes a wire status.

import type { HttpResponse } from "./types";

export type ScalarKind = "int" | "i32" | "u32" | "float" | "bool" | "string";

export type HttpErrorDetail =
    | { kind: "MissingParameter"; name: string }
    | { kind: "InvalidParameterFormat"; name: string; value: string; expected: ScalarKind }
    | { kind: "InvalidPayload"; reason: string }
    | { kind: "SerializationFailure"; cause: unknown }
    | { kind: "UpstreamIoFailure"; cause: unknown; upstreamStatus?: number };

export type HttpErrorKind = HttpErrorDetail["kind"];

export const STATUS_BY_KIND = {
    MissingParameter: 400,
    InvalidParameterFormat: 400,
    InvalidPayload: 400,
    SerializationFailure: 500,
    UpstreamIoFailure: 502,
} as const satisfies Record<HttpErrorKind, number>;

const CODE_BY_KIND = {
    MissingParameter: "MISSING_PARAMETER",
    InvalidParameterFormat: "INVALID_PARAMETER",
    InvalidPayload: "INVALID_PAYLOAD",
    SerializationFailure: "SERIALIZATION_FAILURE",
    UpstreamIoFailure: "UPSTREAM_FAILURE",
} as const satisfies Record<HttpErrorKind, string>;

export interface ErrorBody {
    ok: false;
    error: string;
    message: string;
}

function assertNever(x: never): never {
    throw new Error(`Unhandled error kind: ${JSON.stringify(x)}`);
}

/** Message safe to put on the wire. Internal causes never appear here. */
export function publicMessage(detail: HttpErrorDetail): string {
    switch (detail.kind) {
        case "MissingParameter":
            return `Required argument '${detail.name}' not found`;
        case "InvalidParameterFormat":
            return `Could not convert value '${detail.value}' for key '${detail.name}' to ${detail.expected} type`;
        case "InvalidPayload":
            return `Invalid request body: ${detail.reason}`;
        case "SerializationFailure":
            return "Internal Server Error";
        case "UpstreamIoFailure":
            return "Bad Gateway";
        default:
            return assertNever(detail);
    }
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return String(cause);
}

export class HttpError extends Error {
    readonly detail: HttpErrorDetail;

    constructor(detail: HttpErrorDetail) {
        // Error.message keeps the internal cause for logs; publicMessage() is what clients see.
        const message =
            detail.kind === "SerializationFailure"
                ? `JSON serialization failed: ${describeCause(detail.cause)}`
                : detail.kind === "UpstreamIoFailure"
                    ? `Upstream I/O failed: ${describeCause(detail.cause)}`
                    : publicMessage(detail);
        super(message);
        this.name = "HttpError";
        this.detail = detail;
    }

    get kind(): HttpErrorKind {
        return this.detail.kind;
    }

    get status(): number {
        return STATUS_BY_KIND[this.detail.kind];
    }
}

export const isHttpError = (e: unknown): e is HttpError => e instanceof HttpError;

// ---------- constructors ----------
export const missingParameter = (name: string) =>
    new HttpError({ kind: "MissingParameter", name });

export const invalidParameterFormat = (name: string, value: string, expected: ScalarKind) =>
    new HttpError({ kind: "InvalidParameterFormat", name, value, expected });

export const invalidPayload = (reason: string) =>
    new HttpError({ kind: "InvalidPayload", reason });

export const serializationFailure = (cause: unknown) =>
    new HttpError({ kind: "SerializationFailure", cause });

export const upstreamIoFailure = (cause: unknown, upstreamStatus?: number) =>
    new HttpError({ kind: "UpstreamIoFailure", cause, upstreamStatus });

/**
 * Anything thrown past a handler, as an HttpError.
 * A plain bug in the handler (a TypeError, say) also lands here and goes out as 502 UPSTREAM_FAILURE;
 * the cause stays in the log.
 */
export function toHttpError(e: unknown): HttpError {
    return isHttpError(e) ? e : upstreamIoFailure(e);
}

export function errorBody(detail: HttpErrorDetail): ErrorBody {
    return { ok: false, error: CODE_BY_KIND[detail.kind], message: publicMessage(detail) };
}

/** Total: every kind renders to exactly one status and a JSON body. */
export function toResponse(error: HttpError): HttpResponse {
    return {
        status: STATUS_BY_KIND[error.detail.kind],
        headers: { "Content-Type": "application/json" },
        body: Buffer.from(JSON.stringify(errorBody(error.detail)), "utf8"),
    };
}
