// tests/http/request.harness.ts — in-memory request builder shared by the http tests.
import type { IncomingHttpHeaders } from "node:http";
import type { HttpRequest, HttpResponse } from "../../cortex/http/types";

export function makeRequest(target: string, init: { method?: string; headers?: IncomingHttpHeaders; body?: string } = {}): HttpRequest {
    const q = target.indexOf("?");
    return {
        method: init.method ?? "GET",
        path: q === -1 ? target : target.slice(0, q),
        query: q === -1 ? "" : target.slice(q + 1),
        headers: init.headers ?? {},
        body: init.body === undefined ? undefined : Buffer.from(init.body, "utf8"),
    };
}

export const bodyText = (res: HttpResponse) => res.body.toString("utf8");

export const bodyJson = (res: HttpResponse): unknown => JSON.parse(bodyText(res));
