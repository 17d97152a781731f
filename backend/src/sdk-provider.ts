/**
 * SDK Provider
 *
 * Holds the Claude Agent SDK query function used for briefing generation
 * and quiz scoring.
 * - Production: call initializeSdkProvider() at startup
 * - Tests: call configureSdkForTesting() with a mock
 * - Without either: getSdkQuery() throws SdkNotInitializedError, so tests
 *   never reach the real API by accident
 */

import { query } from "@anthropic-ai/claude-agent-sdk";

export type QueryFunction = typeof query;
export type QueryResult = ReturnType<QueryFunction>;

let _queryFn: QueryFunction | null = null;
let _initialized = false;

export class SdkNotInitializedError extends Error {
  constructor() {
    super(
      "SDK not initialized. Call initializeSdkProvider() at startup, " +
        "or configureSdkForTesting() in tests."
    );
    this.name = "SdkNotInitializedError";
  }
}

/**
 * Initialize with the real SDK (once, at startup).
 */
export function initializeSdkProvider(): void {
  if (_initialized) {
    throw new Error("SDK provider already initialized");
  }
  _queryFn = query;
  _initialized = true;
}

/**
 * Configure with a mock. Returns a cleanup function for afterEach.
 */
export function configureSdkForTesting(mockFn: QueryFunction): () => void {
  _queryFn = mockFn;
  _initialized = true;

  return () => {
    _queryFn = null;
    _initialized = false;
  };
}

export function getSdkQuery(): QueryFunction {
  if (!_initialized || _queryFn === null) {
    throw new SdkNotInitializedError();
  }
  return _queryFn;
}

/**
 * Reset for test isolation. Safe to call when not initialized.
 */
export function _resetForTesting(): void {
  _queryFn = null;
  _initialized = false;
}

// =============================================================================
// Response Collection
// =============================================================================

/**
 * Concatenate the text blocks of every assistant message in a query result.
 */
export async function collectResponse(queryResult: QueryResult): Promise<string> {
  const parts: string[] = [];

  for await (const event of queryResult) {
    if (event.type !== "assistant") {
      continue;
    }
    for (const block of event.message.content) {
      if (block.type === "text" && block.text) {
        parts.push(block.text);
      }
    }
  }

  return parts.join("");
}
