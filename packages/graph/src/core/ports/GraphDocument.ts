import type { Result } from "@codegraph/core";
import type { PersistenceError } from "../errors.js";

/**
 * Durable home of one graph document.
 */
export interface GraphDocument {
  /** Where the document lives, for messages and logs */
  readonly location: string;

  /**
   * Whole document text, or null if it does not exist yet.
   */
  read(): Result<string | null, PersistenceError>;

  /**
   * Replace the document. Readers see either the old or the new
   * content, never a partial write.
   */
  write(content: string): Result<void, PersistenceError>;
}
