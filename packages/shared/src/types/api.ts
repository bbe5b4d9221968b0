/**
 * @fileoverview Error payload returned by every failing endpoint
 *
 * All failures share one shape so clients can branch on `code` without
 * parsing the message:
 *
 * ```typescript
 * const res = await fetch("/external_data/missingno");
 * if (!res.ok) {
 *   const body: ApiErrorBody = await res.json();
 *   if (body.code === "NOT_FOUND") showEmptyState();
 * }
 * ```
 */

export type ApiErrorCode =
  | "VALIDATION_FAILED"
  | "NOT_FOUND"
  | "UPSTREAM_FAILED"
  | "INTERNAL";

export type ApiErrorBody = {
  /** Machine-readable error code */
  code: ApiErrorCode;
  /** Human-readable message, safe to show to users */
  message: string;
};
