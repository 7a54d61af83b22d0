/**
 * Code graph package - a persisted graph of classes, functions and files.
 *
 * MCP tools:
 * - init_graph: Open or create a project's graph
 * - add_nodes / add_edges: Upsert nodes, add relationships
 * - highlight_nodes / highlight_edges: Color parts of the graph
 * - read_graph: Whole graph as JSON
 * - check_graph: Edges pointing at missing nodes
 */

export { GraphStore } from "./core/GraphStore.js";
export { decodeGraph, encodeGraph } from "./core/GraphCodec.js";
export { GraphService } from "./core/services/GraphService.js";
export type { GraphView, MutationResult, OpenError, SwitchOptions } from "./core/services/GraphService.js";
export type { GraphDocument } from "./core/ports/GraphDocument.js";
export { FileGraphDocument, GRAPH_DIR, GRAPH_FILE } from "./infrastructure/FileGraphDocument.js";
export { InMemoryGraphDocument } from "./infrastructure/memory/InMemoryGraphDocument.js";
export { GraphError, ValidationError, CorruptionError, PersistenceError } from "./core/errors.js";
export type { GraphErrorKind, ValidationIssue } from "./core/errors.js";
export { NODE_TYPES, EDGE_TYPES, NO_HIGHLIGHT } from "./core/model.js";
export type {
  NodeType,
  EdgeType,
  ClassMetadata,
  FunctionMetadata,
  FileMetadata,
  ClassNode,
  FunctionNode,
  FileNode,
  CodeNode,
  Edge,
  GraphSnapshot,
  GraphStats,
  DanglingEdge,
  DanglingEdgeReport,
  AddNodesResult,
  AddEdgesResult,
  HighlightResult,
  HighlightOptions,
} from "./core/model.js";
export { loadConfig, GRAPH_FILE_ENV } from "./config.js";
export type { GraphConfig } from "./config.js";
export { registerGraphTools } from "./tools/registerTools.js";
