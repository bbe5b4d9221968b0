/**
 * @fileoverview API route definitions
 *
 * ROUTE ORGANIZATION:
 * - /timeline       Care timeline events (static, in memory)
 * - /external_data  Paged, searchable records proxied from the upstream API
 * - /chat           Simulated chat with a keyword bot
 * - /, /health      Service info and health check
 *
 * Handlers validate input, call a service and send JSON. Failures go to
 * `next(error)` and are rendered by the error middleware.
 */

import { Router, type Express, type NextFunction, type Request, type Response } from "express";

import type { ChatStore } from "../server/chat.js";
import type { ExternalDataService } from "../server/externalData.js";
import type { HttpClient } from "../server/httpClient.js";
import { buildRequestContext, type RequestContext } from "../server/requestContext.js";
import type { TimelineStore } from "../server/timeline.js";
import {
  chatBodySchema,
  chatQuerySchema,
  externalDataQuerySchema,
  parseInput,
  pokemonParamsSchema,
  timelineParamsSchema,
  timelineQuerySchema,
} from "./validation.js";

export type RouteDeps = {
  timeline: TimelineStore;
  externalData: ExternalDataService;
  chat: ChatStore;
  /** Builds the upstream client for one request */
  createHttpClient: (ctx: RequestContext) => HttpClient;
};

// ============================================================================
// ROUTE REGISTRATION
// ============================================================================

/**
 * Registers all API routes on the Express app.
 *
 * @example
 * const app = express();
 * registerRoutes(app, deps);
 * app.listen(8000);
 */
export function registerRoutes(app: Express, deps: RouteDeps): void {
  app.use("/timeline", createTimelineRouter(deps));
  app.use("/external_data", createExternalDataRouter(deps));
  app.use("/chat", createChatRouter(deps));
  registerUtilityRoutes(app);
}

// ============================================================================
// TIMELINE ROUTES
// ============================================================================

function createTimelineRouter({ timeline }: RouteDeps): Router {
  const router = Router();

  /**
   * GET /timeline/?type=Audit&limit=5
   * -> the 5 newest Audit events
   */
  router.get("/", (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(timelineQuerySchema, req.query);
      res.status(200).json(timeline.listEvents(query));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /timeline/3
   * -> event 3, or 404
   */
  router.get("/:eventId", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { eventId } = parseInput(timelineParamsSchema, req.params);
      res.status(200).json(timeline.getEvent(eventId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

// ============================================================================
// EXTERNAL DATA ROUTES
// ============================================================================

function createExternalDataRouter({ externalData, createHttpClient }: RouteDeps): Router {
  const router = Router();

  /**
   * GET /external_data/?page=2&limit=5&search=char
   *
   * Response:
   * - 200: { pokemon: [...], page, total, has_more }
   * - 422: invalid page/limit
   * - upstream status: the list call failed upstream
   * - 500: anything unexpected
   */
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(externalDataQuerySchema, req.query);
      const ctx = buildRequestContext(req);
      const result = await externalData.getPage(createHttpClient(ctx), query);
      res.status(200).json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /external_data/pikachu
   * -> the record, or 404
   */
  router.get("/:name", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { name } = parseInput(pokemonParamsSchema, req.params);
      const ctx = buildRequestContext(req);
      const pokemon = await externalData.getByName(createHttpClient(ctx), name);
      res.status(200).json(pokemon);
    } catch (error) {
      next(error);
    }
  });

  return router;
}

// ============================================================================
// CHAT ROUTES
// ============================================================================

function createChatRouter({ chat }: RouteDeps): Router {
  const router = Router();

  /**
   * GET /chat/?sender=alice&limit=20
   * -> newest messages first
   */
  router.get("/", (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseInput(chatQuerySchema, req.query);
      res.status(200).json(chat.listMessages(query));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /chat/  { "sender": "alice", "message": "hello" }
   * -> { reply, bot_response } after the simulated delay
   */
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseInput(chatBodySchema, req.body);
      res.status(200).json(await chat.postMessage(body));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

// ============================================================================
// UTILITY ROUTES
// ============================================================================

function registerUtilityRoutes(app: Express): void {
  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      message: "Welcome to the assessment API!",
      endpoints: {
        "/timeline": "Get timeline data",
        "/external_data": "Fetch external data",
        "/chat (GET)": "Get chat messages",
        "/chat (POST)": "Send a chat message",
        "/health": "Health check",
      },
    });
  });

  /**
   * GET /health
   *
   * For load balancers and container probes.
   */
  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      status: "ok",
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString(),
    });
  });
}
