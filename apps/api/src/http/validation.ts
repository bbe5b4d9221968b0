/**
 * @fileoverview Request schemas for query strings, params and bodies
 *
 * Query values arrive as strings, so numbers use `z.coerce`. A value that
 * appears twice (`?page=1&page=2`) arrives as an array and fails coercion.
 */

import { z } from "zod";

import { ValidationError } from "../server/errors.js";
import { DEFAULT_TIMELINE_LIMIT } from "../server/timeline.js";

export const MAX_PAGE_SIZE = 50;

const positiveInt = z.coerce.number().int().min(1);

/** `GET /external_data/` */
export const externalDataQuerySchema = z.object({
  page: positiveInt.default(1),
  limit: positiveInt.max(MAX_PAGE_SIZE).default(10),
  // An empty search term means no search.
  search: z
    .string()
    .optional()
    .transform((s) => (s ? s : undefined)),
});

/** `GET /external_data/:name` */
export const pokemonParamsSchema = z.object({
  name: z.string().trim().min(1),
});

/** `GET /timeline/` */
export const timelineQuerySchema = z.object({
  type: z.string().optional(),
  limit: positiveInt.default(DEFAULT_TIMELINE_LIMIT),
});

/** `GET /timeline/:eventId` */
export const timelineParamsSchema = z.object({
  eventId: z.coerce.number().int(),
});

/** `GET /chat/` */
export const chatQuerySchema = z.object({
  limit: positiveInt.optional(),
  sender: z.string().optional(),
});

/** `POST /chat/` */
export const chatBodySchema = z.object({
  sender: z.string(),
  message: z.string(),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
    .join("; ");
}

/**
 * Parses `value` against `schema`.
 *
 * @throws ValidationError (422) listing every failing field
 *
 * @example
 * const query = parseInput(externalDataQuerySchema, req.query);
 * query.limit; // number, 1..50
 */
export function parseInput<Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  value: unknown,
): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}
