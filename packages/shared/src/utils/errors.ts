/**
 * @fileoverview Error codes, default messages and the error body factory
 *
 * The server builds every error response with `makeErrorBody`.
 */

import type { ApiErrorBody, ApiErrorCode } from "../types/api.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Error codes carried in the `code` field of an error body.
 */
export const API_ERROR_CODES = {
  /** Query string or body did not pass validation */
  VALIDATION: "VALIDATION_FAILED",
  /** The requested resource does not exist */
  NOT_FOUND: "NOT_FOUND",
  /** The upstream API answered with a non-OK status */
  UPSTREAM: "UPSTREAM_FAILED",
  /** Anything else */
  INTERNAL: "INTERNAL",
} as const satisfies Record<string, ApiErrorCode>;

/**
 * Default user-facing messages, one per code.
 */
export const API_ERROR_MESSAGES = {
  VALIDATION: "The request is invalid.",
  NOT_FOUND: "Resource not found",
  UPSTREAM: "Failed to fetch data from external API",
  INTERNAL: "Internal server error",
} as const;

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Creates an error body. The message defaults to the code's standard text.
 *
 * @example
 * makeErrorBody("NOT_FOUND", "Pokemon not found");
 * // { code: "NOT_FOUND", message: "Pokemon not found" }
 */
export function makeErrorBody(
  code: ApiErrorCode,
  message?: string
): ApiErrorBody {
  return { code, message: message ?? defaultMessageFor(code) };
}

function defaultMessageFor(code: ApiErrorCode): string {
  switch (code) {
    case "VALIDATION_FAILED":
      return API_ERROR_MESSAGES.VALIDATION;
    case "NOT_FOUND":
      return API_ERROR_MESSAGES.NOT_FOUND;
    case "UPSTREAM_FAILED":
      return API_ERROR_MESSAGES.UPSTREAM;
    case "INTERNAL":
      return API_ERROR_MESSAGES.INTERNAL;
  }
}
