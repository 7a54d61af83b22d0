/**
 * highlight_nodes tool - Color nodes to point at them while explaining code.
 */

import * as z from "zod/v4";
import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";
import { formatHighlight, graphErrorResponse } from "./format.js";

interface HighlightNodesInput {
  node_ids: string[];
  color: number;
  question?: string;
  exclusive?: boolean;
}

export const registerHighlightNodes: ToolRegistrar = (server, service) => {
  server.registerTool(
    "highlight_nodes",
    {
      title: "Highlight nodes",
      description:
        "Set the highlight color of nodes. Unknown ids are reported, not fatal. " +
        "Color 0 removes the highlight.",
      inputSchema: {
        node_ids: z.array(z.string()).describe("Node ids to highlight"),
        color: z.number().int().describe("Color code (0 = no highlight)"),
        question: z.string().optional().describe("Question or explanation to associate with this color"),
        exclusive: z.boolean().optional().describe("Clear every other node's highlight first"),
      },
    },
    async (input: HighlightNodesInput) => {
      const result = service.highlightNodes(input.node_ids, input.color, {
        question: input.question,
        exclusive: input.exclusive,
      });

      if (!result.ok) {
        return graphErrorResponse(result.error);
      }

      return successResponse(formatHighlight("node", input.color, result.value), {
        applied: result.value.applied,
        notFound: result.value.notFound,
      });
    }
  );
};
