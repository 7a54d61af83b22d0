/**
 * Graph document on the local filesystem.
 * Project documents live in .code-graph/code_graph.json under the project root.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { Result } from "@codegraph/core";
import { Ok, Err, tryCatch } from "@codegraph/core";
import type { GraphDocument } from "../core/ports/GraphDocument.js";
import { PersistenceError } from "../core/errors.js";

export const GRAPH_DIR = ".code-graph";
export const GRAPH_FILE = "code_graph.json";

export class FileGraphDocument implements GraphDocument {
  readonly location: string;

  constructor(filePath: string) {
    this.location = resolve(filePath);
  }

  /**
   * Document for a project root: <root>/.code-graph/code_graph.json
   */
  static forProject(projectPath: string): FileGraphDocument {
    return new FileGraphDocument(join(projectPath, GRAPH_DIR, GRAPH_FILE));
  }

  read(): Result<string | null, PersistenceError> {
    try {
      return Ok(readFileSync(this.location, "utf-8"));
    } catch (e) {
      if (isMissingFile(e)) {
        return Ok(null);
      }
      return Err(new PersistenceError(this.location, toError(e)));
    }
  }

  /**
   * Write to a temp file beside the target, then rename over it.
   */
  write(content: string): Result<void, PersistenceError> {
    const tempPath = `${this.location}.tmp`;

    const written = tryCatch(() => {
      mkdirSync(dirname(this.location), { recursive: true });
      writeFileSync(tempPath, content, "utf-8");
      renameSync(tempPath, this.location); // Atomic on POSIX
    });

    if (!written.ok) {
      const removed = tryCatch(() => rmSync(tempPath, { force: true }));
      if (!removed.ok) {
        console.error(`[code-graph] Could not remove ${tempPath}: ${removed.error.message}`);
      }
      return Err(new PersistenceError(this.location, written.error));
    }
    return Ok(undefined);
  }
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
