import fp from "fastify-plugin";
import fastifyRateLimit from "@fastify/rate-limit";
import type { preHandlerAsyncHookHandler } from "fastify";

declare module "fastify" {
  interface FastifyInstance {
    rlPerRoute(maxPerMinute: number): preHandlerAsyncHookHandler;
  }
}

// Rate limiting is opt-in per route: handlers add `app.rlPerRoute(n)` as a
// preHandler to cap a client at n requests per minute.
export default fp(async (app) => {
  await app.register(fastifyRateLimit, { global: false });

  app.decorate("rlPerRoute", (maxPerMinute: number) =>
    app.rateLimit({ max: maxPerMinute, timeWindow: "1 minute" })
  );
});
