/**
 * @fileoverview Promise-based delay
 *
 * Used between upstream retry attempts and to simulate the chat bot's
 * thinking time.
 */

/**
 * Resolves after `ms` milliseconds.
 *
 * @example
 * await sleep(1000);
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
