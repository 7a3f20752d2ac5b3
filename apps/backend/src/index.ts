import "dotenv/config";
import * as path from "path";
import { createResearchServices, getConfigPath, loadConfig } from "core";
import { buildApp } from "./app.js";

const config = loadConfig();
// Relative data directories live beside the config file that named them
const configPath = getConfigPath();
const baseDir = configPath ? path.dirname(configPath) : process.cwd();

const app = await buildApp({
  logger: { level: config.logging.level },
  createServices: (logger) =>
    createResearchServices({
      config,
      logger,
      baseDir,
      openaiApiKey: process.env.OPENAI_API_KEY,
      braveApiKey: process.env.BRAVE_SEARCH_API_KEY,
    }),
});

const port = Number(process.env.PORT || 8080);

// Startup log to aid operational visibility
app.log.info(
  {
    env: process.env.NODE_ENV || "development",
    port,
    configPath: configPath ?? "(defaults)",
  },
  "Starting research API server"
);

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        app.log.error({ err: error }, "Shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ host: "0.0.0.0", port });
