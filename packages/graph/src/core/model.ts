/**
 * Code graph model.
 * Nodes are code elements (classes, functions, files); edges are the
 * relationships between them. Both carry an integer highlight color.
 */

export const NODE_TYPES = ["class", "function", "file"] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const EDGE_TYPES = ["inherit", "invokes", "contains"] as const;
export type EdgeType = (typeof EDGE_TYPES)[number];

/** Highlight color meaning "not highlighted". */
export const NO_HIGHLIGHT = 0;

export interface ClassMetadata {
  /** Method names */
  functions: string[];
  attributes: string[];
  /** Ids of nested nodes */
  children: string[];
}

export interface FunctionMetadata {
  parameters: string[];
  returns: string;
  brief_summary: string;
  full_documentation: string;
}

export interface FileMetadata {
  /** Ids of class nodes declared in the file */
  classes: string[];
  /** Ids of function nodes declared in the file */
  functions: string[];
}

interface NodeBase {
  /** Caller-supplied identity; full paths for files, "path::name" for symbols */
  id: string;
  highlight: number;
}

export interface ClassNode extends NodeBase {
  type: "class";
  metadata: ClassMetadata;
}

export interface FunctionNode extends NodeBase {
  type: "function";
  metadata: FunctionMetadata;
}

export interface FileNode extends NodeBase {
  type: "file";
  metadata: FileMetadata;
}

/**
 * A node in the graph. Metadata shape follows the type tag.
 */
export type CodeNode = ClassNode | FunctionNode | FileNode;

/**
 * A directed relationship. Source and target may name nodes that do
 * not exist yet; see DanglingEdgeReport.
 */
export interface Edge {
  id: string;
  source: string;
  target: string;
  type: EdgeType;
  highlight: number;
}

/**
 * Point-in-time, deep-frozen copy of the graph in insertion order.
 */
export interface GraphSnapshot {
  readonly nodes: readonly CodeNode[];
  readonly edges: readonly Edge[];
  /** Question or explanation recorded per highlight color */
  readonly highlightQuestions: Readonly<Record<string, string>>;
}

export interface DanglingEdge {
  id: string;
  source: string;
  target: string;
  /** Endpoint ids with no node, source first */
  missing: string[];
}

export interface DanglingEdgeReport {
  edges: DanglingEdge[];
  /** Distinct unresolved node ids, first-seen order */
  missingNodeIds: string[];
}

export interface GraphStats {
  nodes: number;
  edges: number;
  danglingEdges: number;
}

export interface AddNodesResult {
  /** Every distinct id in the batch, input order */
  ids: string[];
  created: string[];
  updated: string[];
}

export interface AddEdgesResult {
  ids: string[];
}

export interface HighlightResult {
  applied: string[];
  notFound: string[];
}

export interface HighlightOptions {
  /** Reset every other node (or edge) to NO_HIGHLIGHT first */
  exclusive?: boolean;
  /** Recorded against the color in highlightQuestions when non-empty */
  question?: string;
}

const EDGE_ID_PATTERN = /^edge_(\d+)$/;

export function formatEdgeId(sequence: number): string {
  return `edge_${sequence}`;
}

/**
 * Sequence number of an auto-style edge id, or null for any other id.
 */
export function parseEdgeSequence(id: string): number | null {
  const match = EDGE_ID_PATTERN.exec(id);
  if (!match) {
    return null;
  }
  const sequence = Number(match[1]);
  return Number.isSafeInteger(sequence) ? sequence : null;
}
