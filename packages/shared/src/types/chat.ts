/**
 * @fileoverview Wire types for the simulated chat
 */

/**
 * A message stored in the chat log, from a user or from the bot.
 */
export type ChatMessage = {
  /** Monotonic id, starting at 1 */
  id: number;
  sender: string;
  message: string;
  /** ISO-8601 timestamp */
  timestamp: string;
};

/**
 * Body of `POST /chat/`.
 */
export type ChatRequest = {
  sender: string;
  message: string;
};

/**
 * Result of posting a message: the stored user message and the bot's answer.
 */
export type ChatResponse = {
  reply: ChatMessage;
  bot_response: ChatMessage;
};

export type ChatQuery = {
  limit?: number;
  sender?: string;
};
