/**
 * Model Client Tests
 *
 * Retry, backoff, truncation growth and abort handling against a scripted
 * provider. The AI SDK provider is exercised with `generateText` mocked.
 *
 * @module pipeline/model-client.test
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { generateText } from "ai";
import { DEFAULT_ENGINE_CONFIG, type ClientConfig } from "@/lib/config-schemas";
import { getCircuitState, resetProviderHealth } from "@/lib/provider-health";
import { ModelInvocationError, RunAbortedError, StageTimeoutError } from "@/lib/pipeline/errors";
import { AiSdkProvider, ModelClient, type ModelRequest } from "@/lib/pipeline/model-client";
import { TokenRateLimiter } from "@/lib/pipeline/rate-limiter";
import { apiError, reply, ScriptedProvider, sequence } from "@test/helpers/fake-provider";

vi.mock("ai", () => ({ generateText: vi.fn() }));

const config: ClientConfig = { ...DEFAULT_ENGINE_CONFIG.client, backoffBaseMs: 10, backoffMaxMs: 25 };

const request: ModelRequest = {
  provider: "openai",
  modelId: "gpt-4.1",
  system: "Extract.",
  payload: "## TASK\nstage1",
  maxTokens: 1400,
  temperature: 0,
};

function clientFor(provider: ScriptedProvider, overrides: Partial<ClientConfig> = {}) {
  const sleeps: number[] = [];
  const client = new ModelClient(provider, {
    config: { ...config, ...overrides },
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { client, sleeps };
}

async function invocationError(promise: Promise<unknown>): Promise<ModelInvocationError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ModelInvocationError) return err;
    throw err;
  }
  throw new Error("expected a ModelInvocationError");
}

beforeEach(() => {
  resetProviderHealth();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ModelClient schedules", () => {
  const { client } = clientFor(new ScriptedProvider(() => reply("{}")));

  it("grows maxTokens by half, at least the minimum, up to the cap", () => {
    expect(client.growMaxTokens(1400)).toBe(2100);
    expect(client.growMaxTokens(100)).toBe(356);
    expect(client.growMaxTokens(8000)).toBe(8192);
  });

  it("doubles the backoff up to the maximum", () => {
    expect([1, 2, 3].map((attempt) => client.backoffMs(attempt))).toEqual([10, 20, 25]);
  });
});

describe("ModelClient.invoke", () => {
  it("returns the first complete response", async () => {
    const provider = new ScriptedProvider(() => reply('{"ok": true}'));
    const { client } = clientFor(provider);

    const result = await client.invoke(request);

    expect(result.content).toBe('{"ok": true}');
    expect(result.attempts).toHaveLength(1);
    expect(result.attempts[0]).toMatchObject({ attempt: 1, maxTokens: 1400, errorKind: null, finishReason: "stop" });
  });

  it("backs off between transient failures", async () => {
    const provider = new ScriptedProvider(sequence(apiError(429), apiError(503), reply("{}")));
    const { client, sleeps } = clientFor(provider);

    const result = await client.invoke(request);

    expect(sleeps).toEqual([10, 20]);
    expect(result.attempts.map((a) => a.errorCategory)).toEqual(["rate_limit", "provider_outage", null]);
    expect(result.attempts.map((a) => a.errorKind)).toEqual(["TRANSIENT", "TRANSIENT", null]);
  });

  it("fails as FATAL once transient failures exhaust the budget", async () => {
    const provider = new ScriptedProvider(() => apiError(503));
    const { client, sleeps } = clientFor(provider);

    const error = await invocationError(client.invoke(request));

    expect(error.message).toBe("Retry budget of 3 attempts exhausted (provider_outage)");
    expect(error.kind).toBe("FATAL");
    expect(error.attempts).toHaveLength(3);
    expect(sleeps).toEqual([10, 20]);
    expect(getCircuitState("openai")).toBe("open");
  });

  it("does not retry a permanent error", async () => {
    const provider = new ScriptedProvider(() => apiError(400, "Invalid schema"));
    const { client } = clientFor(provider);

    const error = await invocationError(client.invoke(request));

    expect(error.message).toBe("Model call failed: bad_request");
    expect(error.category).toBe("bad_request");
    expect(provider.requests).toHaveLength(1);
  });

  it("asks for more output after a truncated response", async () => {
    const provider = new ScriptedProvider(sequence(reply('{"a":', "length"), reply('{"a": 1}')));
    const { client } = clientFor(provider);

    const result = await client.invoke(request);

    expect(provider.requests.map((r) => r.maxTokens)).toEqual([1400, 2100]);
    expect(result.attempts.map((a) => a.errorKind)).toEqual(["TRUNCATION", null]);
  });

  it("reports a GATE_FAILURE with the partial text when output stays truncated", async () => {
    const provider = new ScriptedProvider(() => reply('{"a":', "length"));
    const { client } = clientFor(provider);

    const error = await invocationError(client.invoke(request));

    expect(error.kind).toBe("GATE_FAILURE");
    expect(error.message).toBe("Output still truncated after 3 attempts");
    expect(error.partialContent).toBe('{"a":');
  });

  it("starts below the cap when the request asks for more", async () => {
    const provider = new ScriptedProvider(() => reply("{}"));
    const { client } = clientFor(provider);

    await client.invoke({ ...request, maxTokens: 20_000 });

    expect(provider.requests[0].maxTokens).toBe(8192);
  });

  it("times out a hung call and classifies it as transient", async () => {
    const provider = new ScriptedProvider(() => new Promise<never>(() => {}));
    const { client } = clientFor(provider, { maxAttempts: 1, callTimeoutMs: 20 });

    const error = await invocationError(client.invoke(request));

    expect(error.message).toBe("Retry budget of 1 attempts exhausted (timeout)");
    expect(error.attempts[0].errorKind).toBe("TRANSIENT");
  });

  it("refuses to start when the signal is already aborted", async () => {
    const provider = new ScriptedProvider(() => reply("{}"));
    const { client } = clientFor(provider);
    const controller = new AbortController();
    controller.abort();

    await expect(client.invoke(request, { signal: controller.signal })).rejects.toBeInstanceOf(RunAbortedError);
    expect(provider.requests).toHaveLength(0);
  });

  it("turns an abort during the call into RunAbortedError", async () => {
    const controller = new AbortController();
    const provider = new ScriptedProvider(() => {
      controller.abort();
      return new Promise<never>(() => {});
    });
    const { client } = clientFor(provider);

    await expect(client.invoke(request, { signal: controller.signal })).rejects.toBeInstanceOf(RunAbortedError);
  });

  it("stops at the deadline instead of backing off past it", async () => {
    let clock = 0;
    const provider = new ScriptedProvider(() => apiError(503));
    const client = new ModelClient(provider, {
      config,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    });

    const promise = client.invoke(request, { deadline: 5, deadlineScope: "stage", deadlineTimeoutMs: 5 });

    await expect(promise).rejects.toBeInstanceOf(StageTimeoutError);
    await expect(promise).rejects.toThrow("Stage timeout of 5ms elapsed");
    expect(provider.requests).toHaveLength(1);
  });

  it("reserves prompt and output tokens with the rate limiter", async () => {
    const limiter = new TokenRateLimiter({ tokensPerMinute: 100_000 });
    const provider = new ScriptedProvider(() => reply("{}"));
    const client = new ModelClient(provider, { config, rateLimiter: limiter });

    await client.invoke(request);

    // "Extract." + "## TASK\nstage1" is 22 chars → 6 tokens
    expect(limiter.currentUsage()).toBe(1406);
  });

  it("estimates the reservation with the configured characters per token", async () => {
    const limiter = new TokenRateLimiter({ tokensPerMinute: 100_000 });
    const provider = new ScriptedProvider(() => reply("{}"));
    const client = new ModelClient(provider, { config, rateLimiter: limiter, charsPerToken: 2 });

    await client.invoke(request);

    expect(limiter.currentUsage()).toBe(1411);
  });
});

describe("AiSdkProvider", () => {
  it("maps the AI SDK result onto a provider response", async () => {
    vi.mocked(generateText).mockResolvedValueOnce({
      text: '{"ok": true}',
      finishReason: "length",
      usage: { inputTokens: 10, outputTokens: 5, totalTokens: undefined },
    } as unknown as Awaited<ReturnType<typeof generateText>>);

    const response = await new AiSdkProvider().generate(request, new AbortController().signal);

    expect(response).toEqual({
      text: '{"ok": true}',
      finishReason: "length",
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    });
    expect(vi.mocked(generateText).mock.calls[0][0]).toMatchObject({
      system: "Extract.",
      messages: [{ role: "user", content: "## TASK\nstage1" }],
      maxOutputTokens: 1400,
      temperature: 0,
      maxRetries: 0,
    });
  });
});
