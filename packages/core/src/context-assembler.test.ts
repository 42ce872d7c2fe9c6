import { describe, it, expect } from "vitest";
import type { RetrievalResult } from "@hybridrag/types";
import { assembleFacts, assemblePassages, formatFact } from "./context-assembler.js";

function passage(content: string, rank: number): RetrievalResult {
  return {
    content,
    rank,
    source: { store: "semantic", chunkId: `chunk-${String(rank)}`, documentSource: "docs.txt", sequenceIndex: rank - 1, score: 1 / rank },
  };
}

function fact(subject: string, predicate: string, object: string, rank: number): RetrievalResult {
  const triple = { subject, predicate, object };
  return { content: formatFact(triple), rank, source: { store: "relational", triple } };
}

describe("assemblePassages", () => {
  it("returns an empty string for no results", () => {
    expect(assemblePassages([])).toBe("");
  });

  it("joins passages in rank order with blank lines", () => {
    const context = assemblePassages([passage("Second passage.", 2), passage("First passage.", 1)]);

    expect(context).toBe("First passage.\n\nSecond passage.");
  });
});

describe("formatFact", () => {
  it("lower-cases the predicate and replaces underscores with spaces", () => {
    expect(formatFact({ subject: "FastAPI", predicate: "HAS_COMPONENT", object: "routers" })).toBe(
      "• FastAPI has component routers",
    );
  });
});

describe("assembleFacts", () => {
  it("keeps at most `limit` facts, one per line", () => {
    const facts = assembleFacts(
      [
        fact("FastAPI", "HAS", "routers", 1),
        fact("Pydantic", "PROVIDES", "validation", 2),
        fact("Qdrant", "IS_A", "database", 3),
      ],
      2,
    );

    expect(facts).toBe("• FastAPI has routers\n• Pydantic provides validation");
  });
});
