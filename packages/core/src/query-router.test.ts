import { describe, it, expect, vi } from "vitest";
import { GeneratorUnavailableError } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import {
  GenerativeQueryRouter,
  KeywordQueryRouter,
  buildRoutingPrompt,
  createQueryRouter,
  parseRoutingReply,
} from "./query-router.js";

function fakeGenerator(generate: ITextGenerator["generate"]): ITextGenerator {
  return { name: "fake", generate, healthCheck: async () => true };
}

describe("KeywordQueryRouter", () => {
  const router = new KeywordQueryRouter();

  it.each([
    ["What is FastAPI?", "semantic"],
    ["How does FastAPI relate to routers?", "relational"],
    ["Explain dependency injection", "semantic"],
    ["Which libraries does Pydantic depend on? It depends on typing.", "relational"],
    ["Tell me everything", "semantic"],
  ] as const)("routes %j to %s", async (question, expected) => {
    expect(await router.route(question)).toBe(expected);
  });

  it("prefers relational when both lists match", () => {
    expect(router.decide("What is the relationship between FastAPI and Starlette?")).toBe("relational");
  });

  it("is case-insensitive and deterministic", () => {
    const first = router.decide("HOW DOES routing WORK");
    expect(first).toBe("relational");
    expect(router.decide("HOW DOES routing WORK")).toBe(first);
  });

  it("accepts custom indicator lists", () => {
    const custom = new KeywordQueryRouter({ relationalIndicators: ["graph"], semanticIndicators: [] });

    expect(custom.decide("Show the graph for FastAPI")).toBe("relational");
    expect(custom.decide("How does FastAPI relate to routers?")).toBe("semantic");
  });
});

describe("parseRoutingReply", () => {
  it.each([
    ["(A)", "semantic"],
    ["The best method is (B) Relationship Query.", "relational"],
    ["relationship query", "relational"],
    ["Semantic search fits best", "semantic"],
    ["I am not sure", "semantic"],
  ] as const)("reads %j as %s", (reply, expected) => {
    expect(parseRoutingReply(reply)).toBe(expected);
  });
});

describe("GenerativeQueryRouter", () => {
  it("asks the generator with both options and the question", async () => {
    const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("(B)");
    const router = new GenerativeQueryRouter({ generator: fakeGenerator(generate) });

    expect(await router.route("How does FastAPI relate to routers?")).toBe("relational");
    expect(generate).toHaveBeenCalledWith(buildRoutingPrompt("How does FastAPI relate to routers?"));
  });

  it("falls back to semantic when the generator fails", async () => {
    const router = new GenerativeQueryRouter({
      generator: fakeGenerator(() => Promise.reject(new Error("timeout"))),
    });

    expect(await router.route("How does FastAPI relate to routers?")).toBe("semantic");
  });
});

describe("buildRoutingPrompt", () => {
  it("names both options by letter", () => {
    const prompt = buildRoutingPrompt("What is FastAPI?");

    expect(prompt).toContain("(A) Semantic Search:");
    expect(prompt).toContain("(B) Relationship Query:");
    expect(prompt).toContain("Question: 'What is FastAPI?'");
  });
});

describe("createQueryRouter", () => {
  it("builds the keyword router without a generator", () => {
    expect(createQueryRouter("keyword", { generator: null }).strategy).toBe("keyword");
  });

  it("requires a generator for generative routing", () => {
    expect(() => createQueryRouter("generative", { generator: null })).toThrow(GeneratorUnavailableError);
  });
});
