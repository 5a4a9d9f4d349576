// server.ts — boots the demo router on plain Node http.

import "dotenv/config";
import { loadConfig } from "./cortex/http/config";
import { createNodeServer } from "./cortex/http/node_adapter";
import { createLogger } from "./cortex/log/logger";
import { makeRouter } from "./apps/demo/router";

const config = loadConfig();
const logger = createLogger({
    name: config.appName,
    level: config.log.level,
    layout: config.log.json ? "json" : "text",
    file: config.log.file ? { path: config.log.file } : false,
});

const server = createNodeServer(makeRouter(config, logger), { logger });

server.listen(config.port, config.host, () => {
    logger.success(`Listening on http://${config.host}:${config.port}`);
});

const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server`);
    server.close((err) => {
        if (err) logger.error(err);
        logger.close().then(
            () => process.exit(err ? 1 : 0),
            () => process.exit(1),
        );
    });
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
