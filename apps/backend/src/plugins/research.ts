import fp from "fastify-plugin";
import { fromPino, type Logger, type ResearchServices } from "core";

declare module "fastify" {
  interface FastifyInstance {
    research: ResearchServices;
  }
}

export interface ResearchPluginOptions {
  createServices: (logger: Logger) => ResearchServices;
}

// Decorates the app with the research pipeline. Components log through the
// app's pino logger; shutdown waits for running research jobs.
export default fp<ResearchPluginOptions>(async (app, opts) => {
  const services = opts.createServices(fromPino(app.log));
  app.decorate("research", services);

  app.addHook("onClose", async () => {
    app.log.info("Waiting for running research jobs");
    await services.jobs.whenAllIdle();
  });
});
