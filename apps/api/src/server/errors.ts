/**
 * @fileoverview Error classes thrown by the services and mapped to HTTP
 * responses by the error middleware.
 *
 * Services throw; the middleware in `http/middleware.ts` turns an `ApiError`
 * into `res.status(err.status).json(err.toBody())`. Anything that is not an
 * `ApiError` becomes a 500 with the generic internal message.
 */

import type { ApiErrorBody, ApiErrorCode } from "@assessment/shared";
import { API_ERROR_CODES, API_ERROR_MESSAGES, makeErrorBody } from "@assessment/shared";

export class ApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: ApiErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toBody(): ApiErrorBody {
    return makeErrorBody(this.code, this.message);
  }
}

/** Invalid query string or body. 422 for schema failures, 400 for semantic ones. */
export class ValidationError extends ApiError {
  constructor(message: string, status: 400 | 422 = 422) {
    super(status, API_ERROR_CODES.VALIDATION, message);
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string = API_ERROR_MESSAGES.NOT_FOUND) {
    super(404, API_ERROR_CODES.NOT_FOUND, message);
  }
}

/** The upstream API answered a list request with a non-OK status. */
export class UpstreamError extends ApiError {
  constructor(status: number, message: string = API_ERROR_MESSAGES.UPSTREAM) {
    super(status, API_ERROR_CODES.UPSTREAM, message);
  }
}

export class InternalError extends ApiError {
  constructor(cause?: unknown) {
    super(500, API_ERROR_CODES.INTERNAL, API_ERROR_MESSAGES.INTERNAL, { cause });
  }
}
