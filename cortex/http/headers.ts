// cortex/http/headers.ts
import type { HttpRequest } from "./types";

/** Used when no usable client address is known but a string is expected downstream. */
export const UNKNOWN_IP = "?.?.?.?";

export interface CommonHeaders {
    userAgent?: string;
    contentType?: string;
    authorization?: string;
    xApiKey?: string;
    host?: string;
    accept?: string;
}

const COMMON: ReadonlyArray<[keyof CommonHeaders, string]> = [
    ["userAgent", "user-agent"],
    ["contentType", "content-type"],
    ["authorization", "authorization"],
    ["xApiKey", "x-api-key"],
    ["host", "host"],
    ["accept", "accept"],
];

/** Case-insensitive header lookup. Empty values count as absent; repeated headers yield the first. */
export function getHeader(req: Readonly<HttpRequest>, name: string): string | undefined {
    const raw = req.headers[name.toLowerCase()];
    const v = Array.isArray(raw) ? raw[0] : raw;
    return v ? v : undefined;
}

export function getCommonHeaders(req: Readonly<HttpRequest>): Readonly<CommonHeaders> {
    const out: CommonHeaders = {};
    for (const [key, header] of COMMON) {
        const v = getHeader(req, header);
        if (v !== undefined) out[key] = v;
    }
    return Object.freeze(out);
}

/**
 * Pick the real client address out of an X-Forwarded-For chain.
 *
 * Behind a dockerised nginx using `$proxy_add_x_forwarded_for` the header reads
 * "104.218.65.97, 172.69.59.58"; the 172.* hop is the container network.
 */
export function realIpFrom(forwardedFor: string): string | undefined {
    return forwardedFor
        .split(", ")
        .filter((ip) => !ip.startsWith("172."))
        .find((ip) => ip.length > 0);
}

export function clientIp(req: Readonly<HttpRequest>): string {
    const fwd = getHeader(req, "X-Forwarded-For");
    return (fwd && realIpFrom(fwd)) || req.ip || UNKNOWN_IP;
}
