/**
 * Briefing Generator Tests
 *
 * The SDK is replaced with mocks; sleeps are recorded instead of waited.
 */

import { describe, test, expect, vi, afterEach } from "vitest";
import { _resetForTesting, configureSdkForTesting, type QueryFunction } from "../../sdk-provider.js";
import { generateText, isRetriableError, type GenerateOptions } from "../briefing-generator.js";
import { createFailingMockSdk, createMockSdk } from "../../__tests__/test-helpers.js";

afterEach(() => {
  _resetForTesting();
});

function options(overrides: Partial<GenerateOptions> = {}): GenerateOptions {
  return {
    systemPrompt: "system",
    userPrompt: "user prompt",
    feature: "news",
    model: "sonnet",
    timeoutSeconds: 60,
    sleep: vi.fn(() => Promise.resolve()),
    ...overrides,
  };
}

describe("isRetriableError", () => {
  test.each([
    "Rate limit exceeded",
    "429 Too Many Requests",
    "connection reset",
    "Timed out after 30s",
    "Claude Code process exited with code 1",
  ])("%s is retriable", (message) => {
    expect(isRetriableError(message)).toBe(true);
  });

  test.each(["Invalid API key", "Bad request: prompt too long"])("%s is not", (message) => {
    expect(isRetriableError(message)).toBe(false);
  });
});

describe("generateText", () => {
  test("returns the collected text", async () => {
    const prompts: string[] = [];
    configureSdkForTesting(createMockSdk("## Briefing", prompts));

    const result = await generateText(options());

    expect(result).toEqual({ success: true, text: "## Briefing", attempts: 1 });
    expect(prompts).toEqual(["user prompt"]);
  });

  test("retries transient failures with backoff", async () => {
    configureSdkForTesting(createFailingMockSdk([new Error("rate limit exceeded")], "ok"));
    const sleep = vi.fn(() => Promise.resolve());

    const result = await generateText(options({ sleep }));

    expect(result).toEqual({ success: true, text: "ok", attempts: 2 });
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(5000);
  });

  test("gives up after three attempts", async () => {
    configureSdkForTesting(
      createFailingMockSdk([
        new Error("network down"),
        new Error("network down"),
        new Error("network down"),
      ])
    );
    const sleep = vi.fn(() => Promise.resolve());

    const result = await generateText(options({ sleep }));

    expect(result).toEqual({
      success: false,
      error: "network down",
      retriable: true,
      attempts: 3,
    });
    expect(sleep.mock.calls).toEqual([[5000], [15000]]);
  });

  test("does not retry permanent failures", async () => {
    configureSdkForTesting(createFailingMockSdk([new Error("Invalid API key")], "never"));
    const sleep = vi.fn(() => Promise.resolve());

    const result = await generateText(options({ sleep }));

    expect(result).toEqual({
      success: false,
      error: "Invalid API key",
      retriable: false,
      attempts: 1,
    });
    expect(sleep).not.toHaveBeenCalled();
  });

  test("uses injected delays", async () => {
    configureSdkForTesting(createFailingMockSdk([new Error("timeout")], "ok"));
    const sleep = vi.fn(() => Promise.resolve());

    await generateText(options({ sleep, retryDelaysMs: [0] }));

    expect(sleep).toHaveBeenCalledWith(0);
  });

  test("aborts a query that runs past the timeout", async () => {
    const hanging = ((args: { options?: { abortController?: AbortController } }) => {
      const signal = args.options?.abortController?.signal;
      async function* neverAnswers() {
        await new Promise((_, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        });
        yield { type: "assistant", message: { content: [] } };
      }
      return neverAnswers();
    }) as unknown as QueryFunction;
    configureSdkForTesting(hanging);

    const result = await generateText(options({ timeoutSeconds: 0.01 }));

    expect(result).toEqual({
      success: false,
      error: "Timed out after 0.01s",
      retriable: true,
      attempts: 3,
    });
  });

  test("passes feature tools and the abort controller to the SDK", async () => {
    const calls: Array<{ prompt: string; options: Record<string, unknown> }> = [];
    const recording = ((args: { prompt: string; options: Record<string, unknown> }) => {
      calls.push(args);
      return createMockSdk("x")(args as never);
    }) as unknown as QueryFunction;
    configureSdkForTesting(recording);

    await generateText(options({ feature: "quiz", model: "haiku" }));

    expect(calls[0]?.options).toMatchObject({
      model: "haiku",
      systemPrompt: "system",
      allowedTools: [],
      maxTurns: 1,
    });
    expect(calls[0]?.options.abortController).toBeInstanceOf(AbortController);
  });
});
