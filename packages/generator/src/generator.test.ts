import { describe, it, expect, vi, beforeEach } from "vitest";
import { CohereError } from "cohere-ai";
import { ExternalServiceError } from "@hybridrag/errors";
import { CohereTextGenerator } from "./cohere-generator.js";
import { createTextGenerator } from "./factory.js";

const { chat } = vi.hoisted(() => ({ chat: vi.fn() }));

vi.mock("cohere-ai", () => {
  class CohereClient {
    v2 = { chat };
  }
  class CohereError extends Error {
    readonly statusCode?: number;
    constructor({ message, statusCode }: { message: string; statusCode?: number }) {
      super(message);
      this.statusCode = statusCode;
    }
  }
  return { CohereClient, CohereError };
});

function textResponse(...texts: string[]) {
  return { message: { role: "assistant", content: texts.map((text) => ({ type: "text", text })) } };
}

describe("CohereTextGenerator", () => {
  beforeEach(() => {
    chat.mockReset();
  });

  it("sends the prompt as a single user message and joins text parts", async () => {
    chat.mockResolvedValue(textResponse("FastAPI has ", "routers."));
    const generator = new CohereTextGenerator({ apiKey: "test-key", model: "command-test" });

    const text = await generator.generate("What does FastAPI have?");

    expect(text).toBe("FastAPI has routers.");
    expect(chat).toHaveBeenCalledWith({
      model: "command-test",
      messages: [{ role: "user", content: "What does FastAPI have?" }],
      maxTokens: 256,
      temperature: 0.1,
    });
  });

  it("returns an empty string when the reply has no content", async () => {
    chat.mockResolvedValue({ message: { role: "assistant" } });
    const generator = new CohereTextGenerator({ apiKey: "test-key" });

    expect(await generator.generate("hello")).toBe("");
  });

  it("does not retry a rejected API key", async () => {
    chat.mockRejectedValue(new CohereError({ message: "invalid api token", statusCode: 401 }));
    const generator = new CohereTextGenerator({ apiKey: "test-key", maxRetries: 3, retryBaseDelayMs: 1 });

    const failure = generator.generate("hello");

    await expect(failure).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(failure).rejects.toMatchObject({ statusCode: 401, service: "cohere" });
    expect(chat).toHaveBeenCalledOnce();
  });

  it("retries server errors before succeeding", async () => {
    chat
      .mockRejectedValueOnce(new CohereError({ message: "overloaded", statusCode: 503 }))
      .mockResolvedValue(textResponse("ok"));
    const generator = new CohereTextGenerator({ apiKey: "test-key", maxRetries: 2, retryBaseDelayMs: 1 });

    expect(await generator.generate("hello")).toBe("ok");
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it("reports health from a probe request", async () => {
    const generator = new CohereTextGenerator({ apiKey: "test-key" });

    chat.mockResolvedValueOnce(textResponse("pong"));
    expect(await generator.healthCheck()).toBe(true);

    chat.mockRejectedValueOnce(new Error("ECONNREFUSED"));
    expect(await generator.healthCheck()).toBe(false);
  });
});

describe("createTextGenerator factory", () => {
  const baseConfig = { apiKey: "", chatModel: "command-test", embedModel: "embed-v4.0", maxRetries: 2 };

  it("returns null without an API key", () => {
    expect(createTextGenerator(baseConfig)).toBeNull();
  });

  it("creates a Cohere generator with an API key", () => {
    const generator = createTextGenerator({ ...baseConfig, apiKey: "test-key" });
    expect(generator).toBeInstanceOf(CohereTextGenerator);
    expect(generator?.name).toBe("cohere");
  });
});
