/**
 * In-memory code graph: the canonical node and edge maps plus the
 * highlight overlay. Every mutation validates its whole input before
 * touching state, so a rejected batch leaves the graph unchanged.
 */

import type * as z from "zod/v4";
import type { Result } from "@codegraph/core";
import { Ok, Err } from "@codegraph/core";
import {
  NO_HIGHLIGHT,
  formatEdgeId,
  parseEdgeSequence,
  type AddEdgesResult,
  type AddNodesResult,
  type CodeNode,
  type DanglingEdge,
  type DanglingEdgeReport,
  type Edge,
  type GraphSnapshot,
  type GraphStats,
  type HighlightOptions,
  type HighlightResult,
} from "./model.js";
import {
  EdgeBatchSchema,
  HighlightColorSchema,
  NodeBatchSchema,
  formatIssues,
  toValidationIssues,
  type EdgeInput,
  type GraphDocumentData,
} from "./schemas.js";
import { ValidationError } from "./errors.js";

export class GraphStore {
  // Maps keep insertion order, which is also document order.
  private readonly nodes = new Map<string, CodeNode>();
  private readonly edges = new Map<string, Edge>();
  private readonly highlightQuestions = new Map<string, string>();

  // Next auto edge id. Only moves forward, so ids are never reused.
  private nextEdgeSequence = 0;

  /**
   * Rebuild a store from decoded document data. Repeated ids: last one wins.
   */
  static fromDocument(data: GraphDocumentData): GraphStore {
    const store = new GraphStore();

    for (const node of data.nodes) {
      store.nodes.set(node.id, { ...node, highlight: node.highlight ?? NO_HIGHLIGHT });
    }
    for (const edge of data.edges) {
      store.reserveEdgeId(edge.id);
      store.edges.set(edge.id, {
        id: edge.id,
        source: edge.source,
        target: edge.target,
        type: edge.type,
        highlight: edge.highlight ?? NO_HIGHLIGHT,
      });
    }
    for (const [color, question] of Object.entries(data.highlightQuestions)) {
      store.highlightQuestions.set(color, question);
    }

    return store;
  }

  // --- Mutations ---

  /**
   * Insert or replace nodes by id.
   * Type and metadata are replaced wholesale; highlight survives unless
   * the input carries its own.
   */
  addNodes(inputs: readonly unknown[]): Result<AddNodesResult, ValidationError> {
    const parsed = NodeBatchSchema.safeParse(inputs);
    if (!parsed.success) {
      return Err(batchError("node", parsed.error, inputs));
    }

    const result: AddNodesResult = { ids: [], created: [], updated: [] };
    const seen = new Set<string>();

    for (const input of parsed.data) {
      const existing = this.nodes.get(input.id);
      this.nodes.set(input.id, {
        ...input,
        highlight: input.highlight ?? existing?.highlight ?? NO_HIGHLIGHT,
      });

      if (seen.has(input.id)) continue;
      seen.add(input.id);
      result.ids.push(input.id);
      (existing ? result.updated : result.created).push(input.id);
    }

    return Ok(result);
  }

  /**
   * Add edges, assigning edge_<n> ids where none is given.
   * Endpoints are not checked here; see findDanglingEdges.
   * An explicit id that already exists replaces that edge, keeping its highlight.
   */
  addEdges(inputs: readonly unknown[]): Result<AddEdgesResult, ValidationError> {
    const parsed = EdgeBatchSchema.safeParse(inputs);
    if (!parsed.success) {
      return Err(batchError("edge", parsed.error, inputs));
    }

    const sequenceBefore = this.nextEdgeSequence;

    // Reserve explicit ids first so auto ids in the same batch skip them.
    for (const input of parsed.data) {
      if (input.id !== undefined) this.reserveEdgeId(input.id);
    }

    const assigned: Array<{ id: string; input: EdgeInput }> = [];
    for (const input of parsed.data) {
      const id = input.id ?? this.allocateEdgeId();
      if (id === null) {
        this.nextEdgeSequence = sequenceBefore;
        return Err(
          new ValidationError(
            "Rejected edge batch: no automatic edge ids are left. Give the new edges explicit ids."
          )
        );
      }
      assigned.push({ id, input });
    }

    const ids: string[] = [];
    const seen = new Set<string>();

    for (const { id, input } of assigned) {
      const existing = this.edges.get(id);
      this.edges.set(id, {
        id,
        source: input.source,
        target: input.target,
        type: input.type,
        highlight: input.highlight ?? existing?.highlight ?? NO_HIGHLIGHT,
      });

      if (seen.has(id)) continue;
      seen.add(id);
      ids.push(id);
    }

    return Ok({ ids });
  }

  highlightNodes(
    ids: readonly string[],
    color: number,
    options: HighlightOptions = {}
  ): Result<HighlightResult, ValidationError> {
    return this.applyHighlight(this.nodes, ids, color, options);
  }

  highlightEdges(
    ids: readonly string[],
    color: number,
    options: HighlightOptions = {}
  ): Result<HighlightResult, ValidationError> {
    return this.applyHighlight(this.edges, ids, color, options);
  }

  // --- Queries ---

  getNode(id: string): CodeNode | undefined {
    const node = this.nodes.get(id);
    return node ? structuredClone(node) : undefined;
  }

  getEdge(id: string): Edge | undefined {
    const edge = this.edges.get(id);
    return edge ? structuredClone(edge) : undefined;
  }

  /**
   * Frozen copy of the whole graph. Later mutations do not show through.
   */
  snapshot(): GraphSnapshot {
    return deepFreeze({
      nodes: Array.from(this.nodes.values(), (node) => structuredClone(node)),
      edges: Array.from(this.edges.values(), (edge) => structuredClone(edge)),
      highlightQuestions: Object.fromEntries(this.highlightQuestions),
    });
  }

  /**
   * Edges whose source or target has no node.
   */
  findDanglingEdges(): DanglingEdgeReport {
    const edges: DanglingEdge[] = [];
    const missingNodeIds = new Set<string>();

    for (const edge of this.edges.values()) {
      const missing = [...new Set([edge.source, edge.target])].filter((id) => !this.nodes.has(id));
      if (missing.length === 0) continue;

      edges.push({ id: edge.id, source: edge.source, target: edge.target, missing });
      for (const id of missing) missingNodeIds.add(id);
    }

    return { edges, missingNodeIds: [...missingNodeIds] };
  }

  stats(): GraphStats {
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      danglingEdges: this.findDanglingEdges().edges.length,
    };
  }

  // --- Internals ---

  private applyHighlight<T extends { highlight: number }>(
    items: Map<string, T>,
    ids: readonly string[],
    color: number,
    options: HighlightOptions
  ): Result<HighlightResult, ValidationError> {
    const checked = HighlightColorSchema.safeParse(color);
    if (!checked.success) {
      const reason = checked.error.issues.map((issue) => issue.message).join(", ");
      return Err(new ValidationError(`Invalid highlight color ${color}: ${reason}`));
    }

    const requested = new Set(ids);

    if (options.exclusive) {
      for (const [id, item] of items) {
        if (!requested.has(id)) item.highlight = NO_HIGHLIGHT;
      }
    }

    const result: HighlightResult = { applied: [], notFound: [] };
    for (const id of requested) {
      const item = items.get(id);
      if (item) {
        item.highlight = color;
        result.applied.push(id);
      } else {
        result.notFound.push(id);
      }
    }

    if (options.question) {
      this.highlightQuestions.set(String(color), options.question);
    }

    return Ok(result);
  }

  /** Null once the sequence has run past the safe integer range. */
  private allocateEdgeId(): string | null {
    while (Number.isSafeInteger(this.nextEdgeSequence)) {
      const id = formatEdgeId(this.nextEdgeSequence++);
      if (!this.edges.has(id)) return id;
    }
    return null;
  }

  private reserveEdgeId(id: string): void {
    const sequence = parseEdgeSequence(id);
    // The counter must stay a safe integer.
    if (sequence !== null && sequence >= this.nextEdgeSequence && Number.isSafeInteger(sequence + 1)) {
      this.nextEdgeSequence = sequence + 1;
    }
  }
}

function batchError(
  kind: "node" | "edge",
  error: z.ZodError,
  inputs: readonly unknown[]
): ValidationError {
  const issues = toValidationIssues(error, inputs);
  const failed = new Set(issues.map((issue) => issue.index)).size;
  return new ValidationError(
    `Rejected ${kind} batch: ${failed} invalid ${kind}(s) of ${inputs.length}. ${formatIssues(issues)}`,
    issues
  );
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
