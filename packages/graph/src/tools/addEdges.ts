/**
 * add_edges tool - Add relationships between nodes.
 */

import * as z from "zod/v4";
import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";
import { graphErrorResponse } from "./format.js";
import { EDGE_TYPES, type EdgeType } from "../core/model.js";

interface AddEdgesInput {
  edges: Array<{
    id?: string;
    source: string;
    target: string;
    type: EdgeType;
    highlight?: number;
  }>;
}

const EdgeSchema = z.object({
  id: z.string().optional().describe("Edge id. Generated as edge_<n> when omitted"),
  source: z.string().describe("Source node id"),
  target: z.string().describe("Target node id"),
  type: z.enum(EDGE_TYPES).describe("Relationship type"),
  highlight: z.number().int().optional().describe("Color code (0 = no highlight)"),
});

export const registerAddEdges: ToolRegistrar = (server, service) => {
  server.registerTool(
    "add_edges",
    {
      title: "Add edges",
      description:
        "Add edges to the code graph. Endpoints may name nodes that are added later; " +
        "use check_graph to list unresolved ones. Returns the edge ids.",
      inputSchema: {
        edges: z.array(EdgeSchema).describe("Edges to add"),
      },
    },
    async (input: AddEdgesInput) => {
      const result = service.addEdges(input.edges);

      if (!result.ok) {
        return graphErrorResponse(result.error);
      }

      const { ids } = result.value;
      return successResponse(`Added ${ids.length} edge(s): ${ids.join(", ")}`, { ids });
    }
  );
};
