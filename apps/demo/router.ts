// apps/demo/router.ts
// Demo routing: a plain match on (method, path) that leans on the cortex helpers.
//   GET  /                 -> greeting
//   GET  /users?user_id=5  -> { id: 5, name: "Some Body" }
//   OPTIONS *              -> CORS preflight

import type { Handler } from "../../cortex/http/types";
import type { AppConfig } from "../../cortex/http/config";
import type { Logger } from "../../cortex/log/logger";
import { getCommonHeaders } from "../../cortex/http/headers";
import { getQueryParam } from "../../cortex/http/parse";
import { preflight } from "../../cortex/http/cors";
import { jsonCors, notFound, text } from "../../cortex/http/respond";

export const INDEX_MESSAGE = "Hello from the cortex HTTP helpers!";

export interface User {
    id: number;
    name: string;
}

export function makeRouter(config: AppConfig, logger?: Logger): Handler {
    return (req) => {
        const hdrs = getCommonHeaders(req);
        logger?.trace("request", { method: req.method, path: req.path, userAgent: hdrs.userAgent });

        if (req.method === "OPTIONS") return preflight(req, config.cors);

        if (req.method === "GET" && (req.path === "/" || req.path === "/index.html")) {
            return text(INDEX_MESSAGE);
        }

        if (req.path === "/users") {
            const userId = getQueryParam(req, "user_id", "i32");
            const user: User = { id: userId, name: "Some Body" };
            return jsonCors(user, req, config.cors);
        }

        return notFound("Not Found");
    };
}
