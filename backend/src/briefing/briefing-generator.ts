/**
 * Briefing Generator
 *
 * Sends a system + user prompt through the Claude Agent SDK and collects the
 * text reply. Each attempt is aborted after the configured timeout; failures
 * that look transient are retried with backoff.
 */

import type { BriefingFeature } from "@study-brief/shared";
import { createLogger } from "../logger.js";
import { errorMessage } from "../file-utils.js";
import { collectResponse, getSdkQuery } from "../sdk-provider.js";

const log = createLogger("briefing-generator");

// =============================================================================
// Constants
// =============================================================================

export const MAX_ATTEMPTS = 3;

/**
 * Wait before attempt 2, 3, ...
 */
export const DEFAULT_RETRY_DELAYS_MS: readonly number[] = [5_000, 15_000, 45_000];

/**
 * Tools each feature may use. The news briefing looks things up on the web;
 * quiz generation and scoring work from the prompt alone.
 */
const FEATURE_TOOLS: Readonly<Record<BriefingFeature, string[]>> = {
  news: ["WebSearch", "WebFetch"],
  quiz: [],
};

const FEATURE_MAX_TURNS: Readonly<Record<BriefingFeature, number>> = {
  news: 20,
  quiz: 1,
};

// =============================================================================
// Types
// =============================================================================

export interface GenerateOptions {
  systemPrompt: string;
  userPrompt: string;
  feature: BriefingFeature;
  model: string;
  timeoutSeconds: number;
  retryDelaysMs?: readonly number[];
  sleep?: (ms: number) => Promise<void>;
  /** Name used in log lines */
  operation?: string;
}

export type GenerationResult =
  | { success: true; text: string; attempts: number }
  | { success: false; error: string; retriable: boolean; attempts: number };

export class GenerationTimeoutError extends Error {
  constructor(seconds: number) {
    super(`Timed out after ${seconds}s`);
    this.name = "GenerationTimeoutError";
  }
}

// =============================================================================
// Error Classification
// =============================================================================

/**
 * Rate limits, network trouble, timeouts and SDK process exits are worth
 * another attempt; anything else (auth, bad request) is not.
 */
export function isRetriableError(message: string): boolean {
  const retriablePatterns = [
    /rate.?limit/i,
    /token.?limit/i,
    /quota/i,
    /too many requests/i,
    /429/,
    /overloaded/i,
    /network/i,
    /connection/i,
    /timeout/i,
    /timed out/i,
    /ECONNREFUSED/,
    /ECONNRESET/,
    /ETIMEDOUT/,
    /ENOTFOUND/,
    /process exited/i,
    /exit.?code/i,
  ];

  return retriablePatterns.some((pattern) => pattern.test(message));
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Generation
// =============================================================================

async function runQuery(options: GenerateOptions): Promise<string> {
  const abortController = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    abortController.abort();
  }, options.timeoutSeconds * 1000);

  try {
    const queryResult = getSdkQuery()({
      prompt: options.userPrompt,
      options: {
        model: options.model,
        systemPrompt: options.systemPrompt,
        allowedTools: FEATURE_TOOLS[options.feature],
        maxTurns: FEATURE_MAX_TURNS[options.feature],
        abortController,
      },
    });
    return await collectResponse(queryResult);
  } catch (error) {
    if (timedOut) {
      throw new GenerationTimeoutError(options.timeoutSeconds);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Generate text for one prompt pair, retrying transient failures.
 */
export async function generateText(options: GenerateOptions): Promise<GenerationResult> {
  const delays = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
  const sleep = options.sleep ?? defaultSleep;
  const operation = options.operation ?? `${options.feature} briefing`;

  let lastError = "";
  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    try {
      const text = await runQuery(options);
      if (attempt > 1) {
        log.info(`${operation}: succeeded on attempt ${attempt}`);
      }
      return { success: true, text, attempts: attempt };
    } catch (error) {
      lastError = errorMessage(error);
      const retriable = isRetriableError(lastError);
      log.warn(`${operation}: attempt ${attempt}/${MAX_ATTEMPTS} failed: ${lastError}`);

      if (!retriable) {
        return { success: false, error: lastError, retriable: false, attempts: attempt };
      }
      if (attempt < MAX_ATTEMPTS) {
        const delay = delays[Math.min(attempt - 1, delays.length - 1)] ?? 0;
        log.info(`${operation}: retrying in ${delay / 1000}s`);
        await sleep(delay);
      }
    }
  }

  log.error(`${operation}: all ${MAX_ATTEMPTS} attempts failed`);
  return { success: false, error: lastError, retriable: true, attempts: MAX_ATTEMPTS };
}
