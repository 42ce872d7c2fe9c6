import { describe, it, expect, vi } from "vitest";
import { GeneratorUnavailableError } from "@hybridrag/errors";
import type { ITextGenerator } from "@hybridrag/generator";
import { normalizeTriple } from "./normalize.js";
import { PatternRelationExtractor, predicateForVerb } from "./pattern-extractor.js";
import {
  GenerativeRelationExtractor,
  buildExtractionPrompt,
  parseTripleLines,
} from "./generative-extractor.js";
import { createRelationExtractor } from "./factory.js";

function fakeGenerator(generate: ITextGenerator["generate"]): ITextGenerator {
  return { name: "fake", generate, healthCheck: async () => true };
}

describe("normalizeTriple", () => {
  it("strips quotes, trims and upper-snake-cases the predicate", () => {
    expect(normalizeTriple(' "FastAPI" ', " has component ", "'routers'")).toEqual({
      subject: "FastAPI",
      predicate: "HAS_COMPONENT",
      object: "routers",
    });
  });

  it("rejects triples with an empty part", () => {
    expect(normalizeTriple("FastAPI", "HAS", '""')).toBeNull();
    expect(normalizeTriple("  ", "HAS", "routers")).toBeNull();
  });
});

describe("PatternRelationExtractor", () => {
  const extractor = new PatternRelationExtractor();

  it("extracts a possession fact", async () => {
    const triples = await extractor.extract("FastAPI has routers. Routers enable organization.");

    expect(triples).toEqual([{ subject: "FastAPI", predicate: "HAS", object: "routers" }]);
  });

  it("skips articles after is/are and applies templates in order", async () => {
    const triples = await extractor.extract("Neo4j uses Cypher. Qdrant is a database.");

    expect(triples).toEqual([
      { subject: "Qdrant", predicate: "IS_A", object: "database" },
      { subject: "Neo4j", predicate: "USES", object: "Cypher" },
    ]);
  });

  it("drops entities shorter than three characters", async () => {
    expect(await extractor.extract("It has data. Go is fun.")).toEqual([]);
  });

  it("returns nothing for text without relation verbs", async () => {
    expect(await extractor.extract("Routers enable organization.")).toEqual([]);
  });

  it("maps unknown verbs to RELATES_TO", () => {
    expect(predicateForVerb("Supports")).toBe("SUPPORTS");
    expect(predicateForVerb("enables")).toBe("RELATES_TO");
  });
});

describe("parseTripleLines", () => {
  it("reads one triple per line and ignores other lines", () => {
    const output = [
      "Here are the triples:",
      "(FastAPI, HAS_COMPONENT, routers)",
      "(routers, enables, organization)",
      "(incomplete, triple)",
    ].join("\n");

    expect(parseTripleLines(output)).toEqual([
      { subject: "FastAPI", predicate: "HAS_COMPONENT", object: "routers" },
      { subject: "routers", predicate: "ENABLES", object: "organization" },
    ]);
  });
});

describe("GenerativeRelationExtractor", () => {
  it("prompts the generator with the chunk text", async () => {
    const generate = vi.fn<ITextGenerator["generate"]>().mockResolvedValue("(Pydantic, PROVIDES, validation)");
    const extractor = new GenerativeRelationExtractor({ generator: fakeGenerator(generate) });

    const triples = await extractor.extract("Pydantic provides validation.");

    expect(generate).toHaveBeenCalledWith(buildExtractionPrompt("Pydantic provides validation."));
    expect(triples).toEqual([{ subject: "Pydantic", predicate: "PROVIDES", object: "validation" }]);
  });

  it("yields no triples when the generator fails", async () => {
    const generator = fakeGenerator(() => Promise.reject(new Error("model offline")));
    const extractor = new GenerativeRelationExtractor({ generator });

    expect(await extractor.extract("Pydantic provides validation.")).toEqual([]);
  });
});

describe("createRelationExtractor", () => {
  it("builds the pattern extractor without a generator", () => {
    expect(createRelationExtractor("pattern", { generator: null }).strategy).toBe("pattern");
  });

  it("requires a generator for generative extraction", () => {
    expect(() => createRelationExtractor("generative", { generator: null })).toThrow(GeneratorUnavailableError);
  });
});
