import { createApp, createDefaultDeps } from "./app.js";
import { loadConfig } from "./server/env.js";

const config = loadConfig();
const app = createApp(createDefaultDeps(config), {
  corsOrigin: config.corsOrigin,
});

const server = app.listen(config.port, "0.0.0.0", () => {
  console.log(`API listening at http://localhost:${config.port}`);
  console.log(`Upstream: ${config.upstream.baseUrl}`);
});

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server`);
  server.close((error) => {
    if (error) {
      console.error("Error while closing server", error);
      process.exitCode = 1;
    }
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
