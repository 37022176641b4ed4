import type { Server } from "node:net";
import { serve } from "@hono/node-server";
import { getEnv } from "./config/index.js";
import { createApp } from "./index.js";
import { logger } from "./logger.js";
import type { RouteOptions } from "./routes.js";

/**
 * Start the HTTP surface on `port`. Resolves once the socket is listening and
 * rejects when it cannot listen; SIGINT and SIGTERM close it.
 */
export const startServer = (
  port: number = getEnv().PORT,
  options: RouteOptions = {},
): Promise<Server> =>
  new Promise((resolve, reject) => {
    const app = createApp(options);
    const server: Server = serve({ fetch: app.fetch, port }, (info) => {
      server.off("error", reject);
      logger.info("Server listening", { port: info.port });

      const handleShutdown = (signal: NodeJS.Signals) => {
        logger.info("Received shutdown signal", { signal });
        server.close();
      };
      process.once("SIGINT", handleShutdown);
      process.once("SIGTERM", handleShutdown);

      resolve(server);
    });

    server.once("error", reject);
  });
