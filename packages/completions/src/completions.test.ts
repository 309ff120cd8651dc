import { describe, it, expect, vi, afterEach } from "vitest";
import { CompletionError } from "@quire/errors";
import { createLogger } from "@quire/logger";
import { CohereCompletionClient } from "./cohere-completion-client.js";
import type { CohereChatFn } from "./cohere-completion-client.js";
import { createCompletionClient } from "./factory.js";

const logger = createLogger({ level: "silent" });
const clients: CohereCompletionClient[] = [];

function makeClient(chat: CohereChatFn) {
  const client = new CohereCompletionClient({
    apiKey: "test-secret",
    timeoutMs: 1500,
    logger,
    chat,
    breaker: { volumeThreshold: 100 },
  });
  clients.push(client);
  return client;
}

afterEach(() => {
  for (const client of clients.splice(0)) client.close();
});

describe("CohereCompletionClient", () => {
  it("sends a single user message and joins the text parts", async () => {
    const chat = vi.fn<CohereChatFn>(async () => ({
      message: {
        content: [
          { type: "text", text: "  First part. " },
          { type: "thinking" },
          { type: "text", text: "Second part.  " },
        ],
      },
    }));
    const client = makeClient(chat);

    const text = await client.complete("Summarise this.", { temperature: 0.1 });

    expect(text).toBe("First part. Second part.");
    expect(chat).toHaveBeenCalledWith(
      {
        model: "command-r-08-2024",
        messages: [{ role: "user", content: "Summarise this." }],
        temperature: 0.1,
      },
      { maxRetries: 0, timeoutInSeconds: 2 },
    );
  });

  it("forwards the abort signal", async () => {
    const chat = vi.fn<CohereChatFn>(async () => ({ message: { content: [] } }));
    const client = makeClient(chat);
    const controller = new AbortController();

    await expect(client.complete("x", { signal: controller.signal })).resolves.toBe("");
    expect(chat.mock.calls[0]?.[1]?.abortSignal).toBe(controller.signal);
    expect(chat.mock.calls[0]?.[0].temperature).toBe(0.3);
  });

  it("refuses to start when the signal is already aborted", async () => {
    const chat = vi.fn<CohereChatFn>(async () => ({ message: {} }));
    const client = makeClient(chat);
    const controller = new AbortController();
    controller.abort();

    await expect(client.complete("x", { signal: controller.signal })).rejects.toThrow(
      CompletionError,
    );
    expect(chat).not.toHaveBeenCalled();
  });

  it("wraps SDK failures in CompletionError", async () => {
    const client = makeClient(async () => {
      throw new Error("502 bad gateway");
    });

    const err: unknown = await client.complete("x").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CompletionError);
    expect(err).toMatchObject({
      code: "COMPLETION_FAILED",
      service: "cohere",
      message: "Cohere chat failed: 502 bad gateway",
    });
  });

  it("fails fast once the circuit opens", async () => {
    const chat = vi.fn<CohereChatFn>(async () => {
      throw new Error("down");
    });
    const client = new CohereCompletionClient({
      apiKey: "test-secret",
      logger,
      chat,
      breaker: { volumeThreshold: 1, errorThresholdPercentage: 1, resetTimeout: 60_000 },
    });
    clients.push(client);

    await expect(client.complete("x")).rejects.toThrow("Cohere chat failed: down");
    await expect(client.complete("x")).rejects.toThrow("Completion circuit is open");
    expect(chat).toHaveBeenCalledTimes(1);
    await expect(client.healthCheck()).resolves.toBe(false);
  });
});

describe("createCompletionClient", () => {
  it("returns null without an API key", () => {
    expect(
      createCompletionClient({
        apiKey: "",
        model: "command-r-08-2024",
        timeoutMs: 1000,
        temperature: 0.3,
        logger,
      }),
    ).toBeNull();
  });

  it("builds a Cohere client with the configured model", () => {
    const client = createCompletionClient({
      apiKey: "test-secret",
      model: "command-r-plus",
      timeoutMs: 1000,
      temperature: 0.3,
      logger,
    });

    expect(client?.name).toBe("cohere");
    expect(client?.model).toBe("command-r-plus");
    if (client instanceof CohereCompletionClient) client.close();
  });
});
