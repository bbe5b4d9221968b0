import type express from "express";
import crypto from "crypto";

export const REQUEST_ID_HEADER = "x-request-id";

/** Per-request values handed to the upstream client */
export type RequestContext = {
  requestId: string;
};

/**
 * Returns the caller-supplied request id when it is a plain token, else null.
 */
export function readRequestId(req: express.Request): string | null {
  const incoming = req.get(REQUEST_ID_HEADER)?.trim();
  if (incoming && /^[\w.-]{1,128}$/.test(incoming)) {
    return incoming;
  }
  return null;
}

export function buildRequestContext(req: express.Request): RequestContext {
  return { requestId: readRequestId(req) ?? crypto.randomUUID() };
}
