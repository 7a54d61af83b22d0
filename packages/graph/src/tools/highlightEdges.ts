/**
 * highlight_edges tool - Color edges to point at relationships.
 */

import * as z from "zod/v4";
import { successResponse } from "@codegraph/core";
import type { ToolRegistrar } from "./types.js";
import { formatHighlight, graphErrorResponse } from "./format.js";

interface HighlightEdgesInput {
  edge_ids: string[];
  color: number;
  question?: string;
  exclusive?: boolean;
}

export const registerHighlightEdges: ToolRegistrar = (server, service) => {
  server.registerTool(
    "highlight_edges",
    {
      title: "Highlight edges",
      description:
        "Set the highlight color of edges. Unknown ids are reported, not fatal. " +
        "Color 0 removes the highlight.",
      inputSchema: {
        edge_ids: z.array(z.string()).describe("Edge ids to highlight"),
        color: z.number().int().describe("Color code (0 = no highlight)"),
        question: z.string().optional().describe("Question or explanation to associate with this color"),
        exclusive: z.boolean().optional().describe("Clear every other edge's highlight first"),
      },
    },
    async (input: HighlightEdgesInput) => {
      const result = service.highlightEdges(input.edge_ids, input.color, {
        question: input.question,
        exclusive: input.exclusive,
      });

      if (!result.ok) {
        return graphErrorResponse(result.error);
      }

      return successResponse(formatHighlight("edge", input.color, result.value), {
        applied: result.value.applied,
        notFound: result.value.notFound,
      });
    }
  );
};
