import type { FastifyPluginAsync } from "fastify";
import { EvictQuery } from "./schemas.js";

// Content cache administration
const routes: FastifyPluginAsync = async (app) => {
  const { cache } = app.research;

  app.get("/", async (_req, rep) => {
    const entries = await cache.listEntries();
    return rep.status(200).send({ entries });
  });

  // Without olderThanDays every entry is removed
  app.delete("/", async (req, rep) => {
    const { olderThanDays } = EvictQuery.parse(req.query);
    const removed = await cache.evict(olderThanDays);
    req.log.info({ olderThanDays: olderThanDays ?? null, removed }, "cache evicted");
    return rep.status(200).send({ removed });
  });
};

export default routes;
