/**
 * Register all code graph MCP tools.
 */

import type { McpServer } from "@codegraph/core";
import type { GraphService } from "../core/services/GraphService.js";

import { registerInitGraph } from "./initGraph.js";
import { registerAddNodes } from "./addNodes.js";
import { registerAddEdges } from "./addEdges.js";
import { registerHighlightNodes } from "./highlightNodes.js";
import { registerHighlightEdges } from "./highlightEdges.js";
import { registerReadGraph } from "./readGraph.js";
import { registerCheckGraph } from "./checkGraph.js";

export function registerGraphTools(server: McpServer, service: GraphService): void {
  registerInitGraph(server, service);
  registerAddNodes(server, service);
  registerAddEdges(server, service);
  registerHighlightNodes(server, service);
  registerHighlightEdges(server, service);
  registerReadGraph(server, service);
  registerCheckGraph(server, service);
}
