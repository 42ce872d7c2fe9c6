import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { DocumentRef, LoadedDocument } from "@hybridrag/types";
import { DocumentNotFoundError } from "@hybridrag/errors";

export interface IDocumentSource {
  /** Rejects with DocumentNotFoundError when the document does not exist. */
  read(ref: DocumentRef): Promise<LoadedDocument>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/** Reads UTF-8 text files, resolving relative sources against `baseDir`. */
export class FileDocumentSource implements IDocumentSource {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async read(ref: DocumentRef): Promise<LoadedDocument> {
    const path = resolve(this.baseDir, ref.source);

    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (error: unknown) {
      if (isMissingFile(error)) {
        throw new DocumentNotFoundError(ref.source, { cause: error });
      }
      throw error;
    }

    return { source: ref.source, text };
  }
}
