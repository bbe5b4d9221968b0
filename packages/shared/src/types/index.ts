/**
 * @fileoverview Type exports for the shared package
 *
 * ```typescript
 * import type { Pokemon, TimelineEvent, ChatMessage } from "@assessment/shared";
 * ```
 */

export * from "./api.js";
export * from "./chat.js";
export * from "./pokemon.js";
export * from "./timeline.js";
