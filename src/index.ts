import { Hono } from "hono";
import { logger } from "./logger.js";
import { registerRoutes, type RouteOptions } from "./routes.js";

export const createApp = (options: RouteOptions = {}) => {
  const app = new Hono();

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.info("Request completed", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      elapsedMs: Date.now() - startedAt,
    });
  });

  registerRoutes(app, options);

  app.get("/", (c) =>
    c.json({
      service: "shelf-scraper",
      docs: "POST /runs to stream page events and a run summary, GET /health for readiness",
    }),
  );

  return app;
};

export default createApp;
