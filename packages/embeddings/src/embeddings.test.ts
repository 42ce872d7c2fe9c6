import { describe, it, expect, vi, beforeEach } from "vitest";
import { ExternalServiceError } from "@hybridrag/errors";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

const { embed } = vi.hoisted(() => ({ embed: vi.fn() }));

vi.mock("cohere-ai", () => {
  class CohereClient {
    v2 = { embed };
  }
  return { CohereClient };
});

describe("CohereEmbeddingProvider", () => {
  beforeEach(() => {
    embed.mockReset();
  });

  it("embeds passages as documents and sums billed tokens", async () => {
    embed.mockResolvedValue({
      embeddings: { float: [[0.1, 0.2], [0.3, 0.4]] },
      meta: { billedUnits: { inputTokens: 7 } },
    });
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    const result = await provider.batchEmbed(["first", "second"], "search_document");

    expect(result).toEqual({
      embeddings: [[0.1, 0.2], [0.3, 0.4]],
      model: "embed-v4.0",
      tokensUsed: 7,
    });
    expect(embed).toHaveBeenCalledWith({
      texts: ["first", "second"],
      model: "embed-v4.0",
      inputType: "search_document",
      embeddingTypes: ["float"],
    });
  });

  it("splits large inputs into batches of 96", async () => {
    embed.mockImplementation(({ texts }: { texts: string[] }) =>
      Promise.resolve({ embeddings: { float: texts.map(() => [1]) } }),
    );
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key", model: "embed-test" });
    const texts = Array.from({ length: 100 }, (_, i) => `passage ${String(i)}`);

    const result = await provider.batchEmbed(texts, "search_document");

    expect(embed).toHaveBeenCalledTimes(2);
    expect(result.embeddings).toHaveLength(100);
    expect(result.tokensUsed).toBe(0);
  });

  it("wraps client failures in ExternalServiceError", async () => {
    embed.mockRejectedValue(new Error("ECONNRESET"));
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    await expect(provider.embed("question", "search_query")).rejects.toThrow(
      new ExternalServiceError("Cohere embedding failed: ECONNRESET", "cohere"),
    );
  });

  it("rejects a response with a missing vector", async () => {
    embed.mockResolvedValue({ embeddings: { float: [] } });
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    await expect(provider.embed("question", "search_query")).rejects.toThrow(
      "Cohere returned 0 embeddings for 1 texts",
    );
  });

  it("reports health from a probe embedding", async () => {
    const provider = new CohereEmbeddingProvider({ apiKey: "test-key" });

    embed.mockResolvedValueOnce({ embeddings: { float: [[0.5]] } });
    expect(await provider.healthCheck()).toBe(true);

    embed.mockRejectedValueOnce(new Error("down"));
    expect(await provider.healthCheck()).toBe(false);
  });
});
