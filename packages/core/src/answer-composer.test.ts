import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ITextGenerator } from "@hybridrag/generator";
import { InMemorySemanticIndex } from "@hybridrag/semantic-index";
import { InMemoryRelationshipIndex } from "@hybridrag/relationship-index";
import {
  NO_INFORMATION,
  NO_RELATIONSHIPS,
  buildRelationalPrompt,
  buildSemanticPrompt,
  composeAnswer,
  type AnswerDependencies,
} from "./answer-composer.js";

function fakeGenerator(generate: ITextGenerator["generate"]): ITextGenerator {
  return { name: "fake", generate, healthCheck: async () => true };
}

describe("composeAnswer", () => {
  let semanticIndex: InMemorySemanticIndex;
  let relationshipIndex: InMemoryRelationshipIndex;
  let deps: AnswerDependencies;

  beforeEach(async () => {
    semanticIndex = new InMemorySemanticIndex();
    await semanticIndex.add("c1", "Qdrant is a vector database.", { source: "docs.txt", sequenceIndex: 2 });
    await semanticIndex.add("c2", "FastAPI has routers.", { source: "docs.txt", sequenceIndex: 0 });
    await semanticIndex.add("c3", "Routers group endpoints in FastAPI.", { source: "guide.md", sequenceIndex: 0 });

    relationshipIndex = new InMemoryRelationshipIndex();
    await relationshipIndex.mergeEdge("FastAPI", "HAS", "routers");
    await relationshipIndex.mergeEdge("FastAPI", "USES", "Starlette");
    await relationshipIndex.mergeEdge("Pydantic", "PROVIDES", "validation");

    deps = { semanticIndex, relationshipIndex, generator: null, topK: 3, factLimit: 5 };
  });

  describe("semantic route", () => {
    it("answers from the retrieved passages with the generator", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("FastAPI has routers.");

      const answer = await composeAnswer("What does FastAPI have?", "semantic", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(generate).toHaveBeenCalledWith(
        buildSemanticPrompt(
          "FastAPI has routers.\n\nRouters group endpoints in FastAPI.",
          "What does FastAPI have?",
        ),
      );
      expect(answer).toEqual({
        text: "FastAPI has routers.",
        evidence: [{ store: "semantic", chunkIds: ["c2", "c3"], documents: ["docs.txt", "guide.md"] }],
      });
    });

    it("falls back to the start of the context without a generator", async () => {
      const answer = await composeAnswer("What does FastAPI have?", "semantic", deps);

      expect(answer.text).toBe(
        "Based on the available information: FastAPI has routers.\n\nRouters group endpoints in FastAPI....",
      );
    });

    it("cuts the fallback context at 200 characters", async () => {
      const long = "alpha ".repeat(50).trim();
      const index = new InMemorySemanticIndex();
      await index.add("long", long, { source: "long.txt", sequenceIndex: 0 });

      const answer = await composeAnswer("alpha", "semantic", { ...deps, semanticIndex: index });

      expect(answer.text).toBe(`Based on the available information: ${long.slice(0, 200)}...`);
    });

    it("falls back when the generator fails", async () => {
      const generator = fakeGenerator(() => Promise.reject(new Error("rate limited")));

      const answer = await composeAnswer("What is Qdrant?", "semantic", { ...deps, generator });

      expect(answer.text).toBe("Based on the available information: Qdrant is a vector database....");
      expect(answer.evidence).toEqual([{ store: "semantic", chunkIds: ["c1"], documents: ["docs.txt"] }]);
    });

    it("falls back when the generator returns a blank answer", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("   ");

      const answer = await composeAnswer("What is Qdrant?", "semantic", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(generate).toHaveBeenCalledOnce();
      expect(answer).toEqual({
        text: "Based on the available information: Qdrant is a vector database....",
        evidence: [{ store: "semantic", chunkIds: ["c1"], documents: ["docs.txt"] }],
      });
    });

    it("does not call the generator when nothing matches", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>();

      const answer = await composeAnswer("Explain kubernetes", "semantic", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(answer).toEqual({ text: NO_INFORMATION, evidence: [] });
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe("relational route", () => {
    it("answers from matching facts with the generator", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("It has routers and uses Starlette.");

      const answer = await composeAnswer("How does FastAPI work?", "relational", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(generate).toHaveBeenCalledWith(
        buildRelationalPrompt("• FastAPI has routers\n• FastAPI uses Starlette", "How does FastAPI work?"),
      );
      expect(answer).toEqual({
        text: "It has routers and uses Starlette.",
        evidence: [{ store: "relational", matchCount: 2 }],
      });
    });

    it("lists the facts when the generator returns an empty answer", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("");

      const answer = await composeAnswer("How does FastAPI work?", "relational", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(answer).toEqual({
        text: "Based on the relationships:\n• FastAPI has routers\n• FastAPI uses Starlette",
        evidence: [{ store: "relational", matchCount: 2 }],
      });
    });

    it("lists the facts without a generator", async () => {
      const answer = await composeAnswer("How does FastAPI work?", "relational", deps);

      expect(answer.text).toBe("Based on the relationships:\n• FastAPI has routers\n• FastAPI uses Starlette");
    });

    it("limits the facts but counts every match", async () => {
      const answer = await composeAnswer("How does FastAPI work?", "relational", { ...deps, factLimit: 1 });

      expect(answer).toEqual({
        text: "Based on the relationships:\n• FastAPI has routers",
        evidence: [{ store: "relational", matchCount: 2 }],
      });
    });

    it("reports when no relationship matches", async () => {
      const generate = vi.fn<ITextGenerator["generate"]>();

      const answer = await composeAnswer("How does Django relate to Flask?", "relational", {
        ...deps,
        generator: fakeGenerator(generate),
      });

      expect(answer).toEqual({ text: NO_RELATIONSHIPS, evidence: [] });
      expect(generate).not.toHaveBeenCalled();
    });
  });
});
