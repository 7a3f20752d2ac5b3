import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import errors from "./plugins/errors.js";
import rl from "./plugins/rate-limit.js";
import research, { type ResearchPluginOptions } from "./plugins/research.js";
import researchRoutes from "./routes/research.js";
import indicesRoutes from "./routes/indices.js";
import cacheRoutes from "./routes/cache.js";

export interface BuildAppOptions extends ResearchPluginOptions {
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  // Structured pino logging through Fastify; research components get a
  // child of this logger.
  const app = Fastify({
    logger: options.logger ?? { level: "info" },
    bodyLimit: 1048576,
  });

  await app.register(fastifyCors, {
    origin: process.env.CORS_ORIGIN || true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
  });

  // Registration order matters: errors first so every later plugin and
  // route gets consistent error shaping
  await app.register(errors);
  await app.register(rl);
  await app.register(research, { createServices: options.createServices });

  // Business routes
  await app.register(researchRoutes, { prefix: "/api/v1/research" });
  await app.register(indicesRoutes, { prefix: "/api/v1/indices" });
  await app.register(cacheRoutes, { prefix: "/api/v1/cache" });

  app.get("/healthz", async (_req, rep) => {
    return rep.send({ ok: true });
  });

  return app;
}
