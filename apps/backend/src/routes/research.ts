import type { FastifyPluginAsync } from "fastify";
import type { StartRejection } from "core";
import { ContextParams, CreateGroupBody, GroupParams, GroupQueryBody } from "./schemas.js";

const START_REJECTIONS: Record<StartRejection, { status: number; error: string }> = {
  "already-running": { status: 409, error: "Research is already running for this group" },
  "group-not-found": { status: 404, error: "Task group not found" },
  "no-open-tasks": { status: 400, error: "All tasks in this group are completed" },
};

// Task groups and their background research jobs. Every route is scoped to
// a context (one research session).
const routes: FastifyPluginAsync = async (app) => {
  const { taskGroups, jobs } = app.research;

  app.get("/:contextId/groups", async (req, rep) => {
    const { contextId } = ContextParams.parse(req.params);
    const groups = await taskGroups.listGroups(contextId);
    return rep.status(200).send({ groups });
  });

  app.post("/:contextId/groups", async (req, rep) => {
    const { contextId } = ContextParams.parse(req.params);
    const body = CreateGroupBody.parse(req.body);
    const group = await taskGroups.createGroup(contextId, body);
    req.log.info({ contextId, groupId: group.id, tasks: group.tasks.length }, "task group created");
    return rep.status(201).send({ group });
  });

  app.get("/:contextId/groups/:groupId", async (req, rep) => {
    const { contextId, groupId } = GroupParams.parse(req.params);
    const group = await taskGroups.getGroup(contextId, groupId);
    if (!group) {
      return rep
        .status(404)
        .send({ error: { code: "not_found", message: "Task group not found" } });
    }
    return rep.status(200).send(group);
  });

  app.post(
    "/:contextId/groups/:groupId/start",
    { preHandler: [app.rlPerRoute(5)] },
    async (req, rep) => {
      const key = GroupParams.parse(req.params);
      const result = await jobs.start(key);
      if (result.accepted) {
        req.log.info(key, "research job started");
        return rep.status(202).send({ success: true });
      }

      const rejection = START_REJECTIONS[result.reason];
      return rep.status(rejection.status).send({ success: false, error: rejection.error });
    }
  );

  app.get("/:contextId/groups/:groupId/progress", async (req, rep) => {
    const key = GroupParams.parse(req.params);
    return rep.status(200).send(jobs.poll(key));
  });

  app.post(
    "/:contextId/groups/:groupId/query",
    { preHandler: [app.rlPerRoute(20)] },
    async (req, rep) => {
      const { contextId, groupId } = GroupParams.parse(req.params);
      const { query } = GroupQueryBody.parse(req.body);

      const result = await jobs.queryGroup(contextId, groupId, query);
      if (!result.success) {
        const status = result.error === "Task group not found" ? 404 : 400;
        return rep.status(status).send(result);
      }
      return rep.status(200).send(result);
    }
  );
};

export default routes;
