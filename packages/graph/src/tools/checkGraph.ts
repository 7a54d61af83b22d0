/**
 * check_graph tool - Report edges that point at missing nodes.
 */

import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";

export const registerCheckGraph: ToolRegistrar = (server, service) => {
  server.registerTool(
    "check_graph",
    {
      title: "Check graph",
      description: "List edges whose source or target node has not been added, and the missing node ids.",
      inputSchema: {},
    },
    async () => {
      const report = service.checkIntegrity();
      const stats = service.stats();

      const lines = [`Nodes: ${stats.nodes}, edges: ${stats.edges}, dangling edges: ${report.edges.length}`];
      for (const edge of report.edges) {
        lines.push(`- ${edge.id}: ${edge.source} -> ${edge.target} (missing: ${edge.missing.join(", ")})`);
      }

      return successResponse(lines.join("\n"), {
        edges: report.edges,
        missingNodeIds: report.missingNodeIds,
      });
    }
  );
};
