import express, { type Express } from "express";

import type { AppConfig } from "./server/env.js";
import { ChatStore } from "./server/chat.js";
import { createExternalDataService } from "./server/externalData.js";
import { createHttpClient } from "./server/httpClient.js";
import { TimelineStore } from "./server/timeline.js";
import {
  cors,
  errorHandler,
  notFoundHandler,
  requestId,
  requestLogger,
} from "./http/middleware.js";
import { registerRoutes, type RouteDeps } from "./http/routes.js";

export type AppOptions = {
  corsOrigin: string;
};

/**
 * Wires the services into a real server configuration: one timeline store,
 * one chat log and one detail cache for the life of the process.
 */
export function createDefaultDeps(config: AppConfig): RouteDeps {
  return {
    timeline: new TimelineStore(),
    externalData: createExternalDataService({ config: config.upstream }),
    chat: new ChatStore({ replyDelayMs: config.chat.replyDelayMs }),
    createHttpClient: (ctx) =>
      createHttpClient({
        requestId: ctx.requestId,
        defaults: {
          timeoutMs: config.upstream.timeoutMs,
          retries: config.upstream.retries,
        },
      }),
  };
}

/**
 * Builds the Express app without listening, so tests can mount it on an
 * ephemeral port with their own dependencies.
 */
export function createApp(deps: RouteDeps, options: AppOptions): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(requestId());
  app.use(requestLogger());
  app.use(cors(options.corsOrigin));
  app.use(express.json());

  registerRoutes(app, deps);

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}
