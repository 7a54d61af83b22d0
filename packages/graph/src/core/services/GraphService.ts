/**
 * Graph service - applies mutations to the store and persists the whole
 * graph after each one.
 *
 * All document I/O is synchronous, so a mutation and its save finish in
 * one turn of the event loop and readers never see a half-applied batch.
 */

import type { Result } from "@codegraph/core";
import { Ok, Err, map } from "@codegraph/core";
import { GraphStore } from "../GraphStore.js";
import { decodeGraph, encodeGraph } from "../GraphCodec.js";
import type { GraphDocument } from "../ports/GraphDocument.js";
import type { CorruptionError, PersistenceError, ValidationError } from "../errors.js";
import type {
  AddEdgesResult,
  AddNodesResult,
  DanglingEdgeReport,
  GraphSnapshot,
  GraphStats,
  HighlightOptions,
  HighlightResult,
} from "../model.js";

export type MutationResult<T> = Result<T, ValidationError | PersistenceError<T>>;

export type OpenError = CorruptionError | PersistenceError;

export interface GraphView extends GraphSnapshot {
  dangling: DanglingEdgeReport;
}

export interface SwitchOptions {
  /** Start from an empty graph instead of loading the document */
  reset?: boolean;
}

export class GraphService {
  private unsaved = false;

  private constructor(
    private store: GraphStore,
    private document: GraphDocument
  ) {}

  /**
   * Load the graph from a document. A missing document is an empty graph.
   */
  static open(document: GraphDocument): Result<GraphService, OpenError> {
    return map(loadStore(document), (store) => new GraphService(store, document));
  }

  get location(): string {
    return this.document.location;
  }

  /** True while the last save failed and memory is ahead of the document. */
  get hasUnsavedChanges(): boolean {
    return this.unsaved;
  }

  addNodes(nodes: readonly unknown[]): MutationResult<AddNodesResult> {
    return this.mutate(() => this.store.addNodes(nodes));
  }

  addEdges(edges: readonly unknown[]): MutationResult<AddEdgesResult> {
    return this.mutate(() => this.store.addEdges(edges));
  }

  highlightNodes(ids: readonly string[], color: number, options?: HighlightOptions): MutationResult<HighlightResult> {
    return this.mutate(() => this.store.highlightNodes(ids, color, options));
  }

  highlightEdges(ids: readonly string[], color: number, options?: HighlightOptions): MutationResult<HighlightResult> {
    return this.mutate(() => this.store.highlightEdges(ids, color, options));
  }

  /**
   * Snapshot of the graph together with its dangling-edge report.
   */
  readGraph(): GraphView {
    return { ...this.store.snapshot(), dangling: this.store.findDanglingEdges() };
  }

  checkIntegrity(): DanglingEdgeReport {
    return this.store.findDanglingEdges();
  }

  stats(): GraphStats {
    return this.store.stats();
  }

  /**
   * Point the service at another document and write it out immediately.
   * On a load failure the current graph and document stay active.
   */
  switchDocument(document: GraphDocument, options: SwitchOptions = {}): Result<GraphStats, OpenError> {
    let store: GraphStore;
    if (options.reset) {
      store = new GraphStore();
    } else {
      const loaded = loadStore(document);
      if (!loaded.ok) {
        return loaded;
      }
      store = loaded.value;
    }

    const saved = document.write(encodeGraph(store));
    if (!saved.ok) {
      return saved;
    }

    this.store = store;
    this.document = document;
    this.unsaved = false;
    console.error(`[code-graph] Switched to ${document.location}`);
    return Ok(store.stats());
  }

  /**
   * Write the current graph to the document.
   */
  save(): Result<void, PersistenceError> {
    const saved = this.document.write(encodeGraph(this.store));
    this.unsaved = !saved.ok;
    return saved;
  }

  private mutate<T>(apply: () => Result<T, ValidationError>): MutationResult<T> {
    const applied = apply();
    if (!applied.ok) {
      return applied;
    }

    const saved = this.save();
    if (!saved.ok) {
      console.error(`[code-graph] ${saved.error.message}. Memory and disk have diverged.`);
      return Err(saved.error.withApplied(applied.value));
    }

    return applied;
  }
}

function loadStore(document: GraphDocument): Result<GraphStore, OpenError> {
  const text = document.read();
  if (!text.ok) {
    return text;
  }
  return decodeGraph(text.value, document.location);
}
