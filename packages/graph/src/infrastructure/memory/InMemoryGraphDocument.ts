import type { Result } from "@codegraph/core";
import { Ok, Err } from "@codegraph/core";
import type { GraphDocument } from "../../core/ports/GraphDocument.js";
import { PersistenceError } from "../../core/errors.js";

/**
 * In-memory graph document, for tests and embedding.
 * Writes can be made to fail to exercise persistence error paths.
 */
export class InMemoryGraphDocument implements GraphDocument {
  private failure: Error | null = null;
  /** Number of successful writes */
  writes = 0;

  constructor(
    private content: string | null = null,
    readonly location = "memory://code-graph"
  ) {}

  read(): Result<string | null, PersistenceError> {
    return Ok(this.content);
  }

  write(content: string): Result<void, PersistenceError> {
    if (this.failure) {
      return Err(new PersistenceError(this.location, this.failure));
    }
    this.content = content;
    this.writes++;
    return Ok(undefined);
  }

  /**
   * Make subsequent writes fail with the given error; null restores them.
   */
  failWrites(error: Error | null): void {
    this.failure = error;
  }

  get current(): string | null {
    return this.content;
  }
}
