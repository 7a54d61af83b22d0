/**
 * read_graph tool - Return the whole graph.
 */

import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";

export const registerReadGraph: ToolRegistrar = (server, service) => {
  server.registerTool(
    "read_graph",
    {
      title: "Read graph",
      description:
        "Return all nodes, edges and highlight questions as JSON, plus a report of edges whose endpoints do not exist.",
      inputSchema: {},
    },
    async () => {
      const { nodes, edges, highlightQuestions, dangling } = service.readGraph();
      const graph = { nodes, edges, highlightQuestions, dangling };

      return successResponse(JSON.stringify(graph, null, 2), graph);
    }
  );
};
