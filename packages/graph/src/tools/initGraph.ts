/**
 * init_graph tool - Open (or create) the graph of a codebase.
 */

import * as z from "zod/v4";
import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";
import { graphErrorResponse } from "./format.js";
import { FileGraphDocument } from "../infrastructure/FileGraphDocument.js";

interface InitGraphInput {
  path: string;
  reset?: boolean;
}

export const registerInitGraph: ToolRegistrar = (server, service) => {
  server.registerTool(
    "init_graph",
    {
      title: "Initialize graph",
      description:
        "Use the graph stored in <path>/.code-graph/code_graph.json, creating it if needed. " +
        "An existing graph is loaded unless reset is true.",
      inputSchema: {
        path: z.string().describe("Root directory of the codebase"),
        reset: z.boolean().optional().describe("Start from an empty graph, discarding the stored one"),
      },
    },
    async (input: InitGraphInput) => {
      const result = service.switchDocument(FileGraphDocument.forProject(input.path), {
        reset: input.reset,
      });

      if (!result.ok) {
        return graphErrorResponse(result.error);
      }

      const stats = result.value;
      return successResponse(
        `Graph ready at ${service.location} (${stats.nodes} nodes, ${stats.edges} edges).`,
        { location: service.location, nodes: stats.nodes, edges: stats.edges }
      );
    }
  );
};
