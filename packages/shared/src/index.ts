/**
 * @fileoverview Main entry point for the @assessment/shared package
 *
 * Types and helpers used by the API server and by anything that consumes it.
 *
 * TYPES (./types):
 * - Pokemon, PokemonPage: external data resource
 * - TimelineEvent: timeline resource
 * - ChatMessage, ChatRequest, ChatResponse: chat resource
 * - ApiErrorBody: shape of every error response
 *
 * UTILITIES (./utils):
 * - sleep
 * - pageOffset, hasMorePages, slicePage
 * - makeErrorBody, API_ERROR_CODES, API_ERROR_MESSAGES
 *
 * @example
 * import type { Pokemon } from "@assessment/shared";
 * import { makeErrorBody } from "@assessment/shared";
 */

export * from "./types/index.js";
export * from "./utils/index.js";
