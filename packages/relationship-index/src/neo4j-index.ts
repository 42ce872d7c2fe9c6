import neo4j, { type Driver, type Integer, type ManagedTransaction } from "neo4j-driver";
import type { RelationshipIndexStats, Triple } from "@hybridrag/types";
import { tokenize } from "@hybridrag/chunker";
import { StoreWriteError, ValidationError, errorMessage } from "@hybridrag/errors";
import { createSilentLogger, type Logger } from "@hybridrag/logger";
import type { IRelationshipIndex } from "./relationship-index.interface.js";

export interface Neo4jRelationshipIndexOptions {
  uri: string;
  user: string;
  password: string;
  database?: string;
  logger?: Logger;
}

const MERGE_NODE = `
MERGE (n:Entity {name: $name})
SET n.tokens = $tokens
`;

const MATCH_EDGES = `
MATCH (s:Entity)-[r]->(o:Entity)
WHERE any(k IN $keywords WHERE k IN s.tokens OR k IN o.tokens)
RETURN s.name AS subject, type(r) AS predicate, o.name AS object
`;

const COUNT_NODES = "MATCH (n:Entity) RETURN count(n) AS count";
const COUNT_EDGES = "MATCH (:Entity)-[r]->(:Entity) RETURN count(r) AS count";

/**
 * Relationship types cannot be parameterised; the predicate is spliced into
 * the query as a backtick-quoted identifier.
 */
export function quoteRelationshipType(predicate: string): string {
  if (predicate.length === 0) {
    throw new ValidationError("Relationship type must not be empty", { predicate: "empty" });
  }
  return `\`${predicate.replace(/`/g, "``")}\``;
}

export class Neo4jRelationshipIndex implements IRelationshipIndex {
  readonly backend = "neo4j";
  private readonly driver: Driver;
  private readonly database: string | undefined;
  private readonly logger: Logger;

  constructor(options: Neo4jRelationshipIndexOptions) {
    this.driver = neo4j.driver(options.uri, neo4j.auth.basic(options.user, options.password));
    this.database = options.database;
    this.logger = options.logger ?? createSilentLogger();
  }

  async mergeNode(name: string): Promise<void> {
    await this.write(async (tx) => {
      await tx.run(MERGE_NODE, { name, tokens: tokenize(name) });
    });
  }

  async mergeEdge(subject: string, predicate: string, object: string): Promise<void> {
    const query = `
MERGE (h:Entity {name: $subject})
SET h.tokens = $subjectTokens
MERGE (t:Entity {name: $object})
SET t.tokens = $objectTokens
MERGE (h)-[:${quoteRelationshipType(predicate)}]->(t)
`;
    await this.write(async (tx) => {
      await tx.run(query, {
        subject,
        subjectTokens: tokenize(subject),
        object,
        objectTokens: tokenize(object),
      });
    });
  }

  async match(keywords: readonly string[]): Promise<Triple[]> {
    if (keywords.length === 0) return [];

    const session = this.driver.session({ database: this.database });
    try {
      const result = await session.executeRead((tx) =>
        tx.run<{ subject: string; predicate: string; object: string }>(MATCH_EDGES, {
          keywords: [...keywords],
        }),
      );
      return result.records.map((record) => ({
        subject: record.get("subject"),
        predicate: record.get("predicate"),
        object: record.get("object"),
      }));
    } finally {
      await session.close();
    }
  }

  async stats(): Promise<RelationshipIndexStats> {
    const session = this.driver.session({ database: this.database });
    try {
      const count = async (query: string): Promise<number> => {
        const result = await session.executeRead((tx) => tx.run<{ count: Integer }>(query));
        return result.records[0]?.get("count").toNumber() ?? 0;
      };
      const nodes = await count(COUNT_NODES);
      const edges = await count(COUNT_EDGES);
      return { nodes, edges };
    } finally {
      await session.close();
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.driver.verifyConnectivity();
      return true;
    } catch (error: unknown) {
      this.logger.debug({ err: errorMessage(error) }, "neo4j health check failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async write(work: (tx: ManagedTransaction) => Promise<void>): Promise<void> {
    const session = this.driver.session({ database: this.database });
    try {
      await session.executeWrite(work);
    } catch (error: unknown) {
      throw new StoreWriteError(`Neo4j write failed: ${errorMessage(error)}`, "relationship-index", {
        cause: error,
      });
    } finally {
      await session.close();
    }
  }
}
