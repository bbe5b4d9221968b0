/**
 * @fileoverview Express middleware for the API server
 *
 * ORDER MATTERS. `createApp` installs them as:
 * 1. requestId (every later log line can use the id)
 * 2. requestLogger
 * 3. cors
 * 4. body parsing and routes
 * 5. notFoundHandler
 * 6. errorHandler (last, four arguments)
 */

import crypto from "crypto";
import type { Request, Response, NextFunction } from "express";
import { API_ERROR_CODES, makeErrorBody } from "@assessment/shared";

import { ApiError } from "../server/errors.js";
import { readRequestId, REQUEST_ID_HEADER } from "../server/requestContext.js";

// ============================================================================
// REQUEST ID
// ============================================================================

/**
 * Makes sure every request carries an `X-Request-ID`, keeping the caller's
 * when it sent a valid one, and echoes it on the response.
 */
export function requestId() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const id = readRequestId(req) ?? crypto.randomUUID();
    req.headers[REQUEST_ID_HEADER] = id;
    res.setHeader("X-Request-ID", id);
    next();
  };
}

// ============================================================================
// REQUEST LOGGING
// ============================================================================

/**
 * Logs every request when its response finishes:
 *
 * GET /external_data/?page=2 200 143.20ms
 */
export function requestLogger() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      console.log(
        `${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(2)}ms`
      );
    });

    next();
  };
}

// ============================================================================
// CORS
// ============================================================================

/**
 * Allows browser clients from `origin` (default "*") and answers preflight
 * requests directly with 204.
 */
export function cors(origin: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader("Access-Control-Allow-Origin", origin);
    res.setHeader("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      req.get("Access-Control-Request-Headers") ?? "Content-Type, X-Request-ID"
    );
    res.setHeader("Access-Control-Expose-Headers", "X-Request-ID");

    // Credentials cannot be combined with a wildcard origin.
    if (origin !== "*") {
      res.setHeader("Access-Control-Allow-Credentials", "true");
      res.setHeader("Vary", "Origin");
    }

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ============================================================================
// FALLBACKS
// ============================================================================

export function notFoundHandler() {
  return (req: Request, res: Response): void => {
    res
      .status(404)
      .json(
        makeErrorBody(
          API_ERROR_CODES.NOT_FOUND,
          `Route ${req.method} ${req.originalUrl} not found`
        )
      );
  };
}

function isBodyParseError(error: unknown): boolean {
  return (
    error instanceof SyntaxError &&
    "type" in error &&
    error.type === "entity.parse.failed"
  );
}

/**
 * Maps thrown errors to responses.
 *
 * - ApiError: its own status and body
 * - Malformed JSON body: 400
 * - Anything else: 500 with the generic message; details only go to the log
 */
export function errorHandler() {
  return (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction
  ): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const id = readRequestId(req) ?? "-";

    if (error instanceof ApiError) {
      if (error.status >= 500) {
        console.error(
          `[error] ${req.method} ${req.originalUrl} requestId=${id}`,
          error.cause ?? error
        );
      }
      res.status(error.status).json(error.toBody());
      return;
    }

    if (isBodyParseError(error)) {
      res
        .status(400)
        .json(makeErrorBody(API_ERROR_CODES.VALIDATION, "Malformed JSON body"));
      return;
    }

    console.error(
      `[error] ${req.method} ${req.originalUrl} requestId=${id}`,
      error
    );
    res.status(500).json(makeErrorBody(API_ERROR_CODES.INTERNAL));
  };
}
