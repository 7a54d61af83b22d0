/**
 * Error taxonomy for the code graph.
 * Returned inside Result values, never thrown across the service boundary.
 */

export type GraphErrorKind = "validation" | "corruption" | "persistence";

export abstract class GraphError extends Error {
  abstract readonly kind: GraphErrorKind;
}

export interface ValidationIssue {
  /** Position of the offending item in its batch */
  index: number;
  /** The item's id, when it had a string one */
  id?: string;
  /** Field path inside the item, e.g. "metadata.functions" */
  path: string;
  message: string;
}

/**
 * Malformed caller input. The whole batch was rejected.
 */
export class ValidationError extends GraphError {
  readonly kind = "validation";

  constructor(
    message: string,
    readonly issues: ValidationIssue[] = []
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * A persisted document exists but is not a readable graph.
 */
export class CorruptionError extends GraphError {
  readonly kind = "corruption";

  constructor(
    readonly location: string,
    readonly reason: string
  ) {
    super(`Graph document at ${location} is corrupt: ${reason}`);
    this.name = "CorruptionError";
  }
}

/**
 * Reading or writing the document failed.
 *
 * When raised after a mutation, `applied` holds that mutation's result:
 * the change is live in memory but not on disk.
 */
export class PersistenceError<T = unknown> extends GraphError {
  readonly kind = "persistence";

  constructor(
    readonly location: string,
    readonly failure: Error,
    readonly applied?: T
  ) {
    super(
      applied === undefined
        ? `Could not access graph document at ${location}: ${failure.message}`
        : `Graph updated in memory but not saved to ${location}: ${failure.message}`
    );
    this.name = "PersistenceError";
  }

  /**
   * Same failure, annotated with the mutation that was applied in memory.
   */
  withApplied<U>(applied: U): PersistenceError<U> {
    return new PersistenceError(this.location, this.failure, applied);
  }
}
