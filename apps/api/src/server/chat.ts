/**
 * @fileoverview Simulated chat: an in-memory message log and a keyword bot
 *
 * Posting a message stores it, waits `replyDelayMs` to simulate the bot
 * thinking, then stores and returns the bot's reply.
 *
 * BOT REPLIES:
 * The lowercased message is checked for each keyword in order (hello, help,
 * thanks, problem, issue); the first keyword found as a substring picks its
 * reply. Otherwise a generic reply is picked at random.
 */

import type { ChatMessage, ChatQuery, ChatRequest, ChatResponse } from "@assessment/shared";
import { sleep } from "@assessment/shared";

import { ValidationError } from "./errors.js";

// ============================================================================
// REPLIES
// ============================================================================

export const BOT_SENDER = "Bot";

export const GENERIC_REPLIES: readonly string[] = [
  "Hello! How can I assist you today?",
  "I'm here to help! What do you need?",
  "Can you please provide more details?",
  "Thank you for reaching out!",
  "I'm glad to assist you with that.",
  "Let me check that for you.",
  "Could you clarify your question?",
  "I'm here to support you!",
  "What else can I do for you?",
  "Feel free to ask me anything!",
];

export const KEYWORD_REPLIES: ReadonlyArray<readonly [keyword: string, reply: string]> = [
  ["hello", "Hi there! How can I help you?"],
  ["help", "Sure! What do you need assistance with?"],
  ["thanks", "You're welcome! Let me know if you have more questions."],
  ["problem", "I'm sorry to hear that. Can you tell me more about the problem?"],
  ["issue", "Let's see how we can resolve that issue together."],
];

/**
 * Picks the bot's answer to `userMessage`.
 *
 * @param random - source in [0, 1), used only when no keyword matches
 *
 * @example
 * generateBotReply("Thanks a lot"); // "You're welcome! Let me know if you have more questions."
 */
export function generateBotReply(
  userMessage: string,
  random: () => number = Math.random,
): string {
  const lower = userMessage.toLowerCase();

  for (const [keyword, reply] of KEYWORD_REPLIES) {
    if (lower.includes(keyword)) return reply;
  }

  const index = Math.min(
    Math.floor(random() * GENERIC_REPLIES.length),
    GENERIC_REPLIES.length - 1,
  );
  return GENERIC_REPLIES[index];
}

// ============================================================================
// STORE
// ============================================================================

export type ChatStoreOptions = {
  replyDelayMs: number;
  now?: () => Date;
  random?: () => number;
};

export class ChatStore {
  private messages: ChatMessage[] = [];
  private nextId = 1;
  private readonly replyDelayMs: number;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(options: ChatStoreOptions) {
    this.replyDelayMs = options.replyDelayMs;
    this.now = options.now ?? (() => new Date());
    this.random = options.random ?? Math.random;
  }

  private append(sender: string, message: string): ChatMessage {
    const entry: ChatMessage = {
      id: this.nextId++,
      sender,
      message,
      timestamp: this.now().toISOString(),
    };
    this.messages.push(entry);
    return entry;
  }

  /**
   * Newest first. Messages with equal timestamps keep insertion order.
   */
  listMessages(query: ChatQuery = {}): ChatMessage[] {
    const { sender, limit } = query;

    const messages = this.messages
      .filter((m) => !sender || m.sender === sender)
      .sort((a, b) => Date.parse(b.timestamp) - Date.parse(a.timestamp));

    return limit ? messages.slice(0, limit) : messages;
  }

  /**
   * @throws ValidationError (400) when the message is blank
   */
  async postMessage(request: ChatRequest): Promise<ChatResponse> {
    if (!request.message.trim()) {
      throw new ValidationError("Message cannot be empty", 400);
    }

    const reply = this.append(request.sender, request.message);

    if (this.replyDelayMs > 0) {
      await sleep(this.replyDelayMs);
    }

    const botResponse = this.append(
      BOT_SENDER,
      generateBotReply(request.message, this.random),
    );

    return { reply, bot_response: botResponse };
  }

  get size(): number {
    return this.messages.length;
  }
}
