import type { FastifyPluginAsync } from "fastify";
import { IndexParams, IndexQueryBody } from "./schemas.js";

// Retrieval indices: listing and question answering
const routes: FastifyPluginAsync = async (app) => {
  const { indexStore } = app.research;

  app.get("/", async (_req, rep) => {
    const indices = await indexStore.list();
    return rep.status(200).send({ indices });
  });

  app.post("/:indexId/query", { preHandler: [app.rlPerRoute(20)] }, async (req, rep) => {
    const { indexId } = IndexParams.parse(req.params);
    const { query, topK, scoreThreshold } = IndexQueryBody.parse(req.body);

    if (!(await indexStore.exists(indexId))) {
      return rep
        .status(404)
        .send({ error: { code: "not_found", message: `Index ${indexId} not found` } });
    }

    const result = await indexStore.query(indexId, query, topK, scoreThreshold);
    if (!result) {
      return rep
        .status(500)
        .send({ error: { code: "query_failed", message: "Query failed" } });
    }
    return rep.status(200).send(result);
  });
};

export default routes;
