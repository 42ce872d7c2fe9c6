/**
 * Property names that carry credentials for the stores and the generator.
 */
const SECRET_KEYS = [
  "apiKey",
  "api_key",
  "password",
  "neo4jPassword",
  "qdrantApiKey",
  "token",
  "authorization",
] as const;

/**
 * JSON paths for Pino's `redact` option: each secret key at the top level and
 * one level down (e.g. `cohere.apiKey`).
 */
export const REDACT_PATHS: string[] = [...SECRET_KEYS, ...SECRET_KEYS.map((key) => `*.${key}`)];

export const REDACTED = "[REDACTED]";
