/**
 * @fileoverview Utility exports for the shared package
 *
 * - sleep: async delay for retries and simulated latency
 * - pagination: offset and has-more arithmetic
 * - errors: error codes, messages and the error body factory
 */

export * from "./sleep.js";
export * from "./pagination.js";
export * from "./errors.js";
