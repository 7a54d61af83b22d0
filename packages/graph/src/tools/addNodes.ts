/**
 * add_nodes tool - Insert or replace code nodes.
 */

import * as z from "zod/v4";
import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";
import { graphErrorResponse } from "./format.js";
import { NODE_TYPES, type NodeType } from "../core/model.js";

interface AddNodesInput {
  nodes: Array<{
    id: string;
    type: NodeType;
    metadata?: Record<string, unknown>;
    highlight?: number;
  }>;
}

const NodeSchema = z.object({
  id: z
    .string()
    .describe("Unique id. Use the full path for files and path::name for classes and functions"),
  type: z.enum(NODE_TYPES).describe("Node type"),
  metadata: z
    .record(z.string(), z.unknown())
    .optional()
    .describe(
      "Type-specific metadata. class: {functions, attributes, children}; " +
        "function: {parameters, returns, brief_summary, full_documentation}; " +
        "file: {classes, functions}. Missing fields default to empty"
    ),
  highlight: z.number().int().optional().describe("Color code (0 = no highlight). Omit to keep the current one"),
});

export const registerAddNodes: ToolRegistrar = (server, service) => {
  server.registerTool(
    "add_nodes",
    {
      title: "Add nodes",
      description:
        "Add classes, functions or files to the code graph. Existing ids are replaced (metadata is not merged). " +
        "The batch is rejected as a whole if any node is invalid.",
      inputSchema: {
        nodes: z.array(NodeSchema).describe("Nodes to add"),
      },
    },
    async (input: AddNodesInput) => {
      const result = service.addNodes(input.nodes);

      if (!result.ok) {
        return graphErrorResponse(result.error);
      }

      const { ids, created, updated } = result.value;
      return successResponse(`Added ${created.length} node(s), updated ${updated.length} node(s).`, {
        ids,
        created,
        updated,
      });
    }
  );
};
