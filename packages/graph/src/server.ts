#!/usr/bin/env node
/**
 * Code graph MCP server.
 * Keeps a code-structure graph in a JSON document and exposes it to agents.
 */

import { runServer } from "@codegraph/core";
import { loadConfig } from "./config.js";
import { GraphService } from "./core/services/GraphService.js";
import { FileGraphDocument } from "./infrastructure/FileGraphDocument.js";
import { registerGraphTools } from "./tools/registerTools.js";

interface Services {
  graph: GraphService;
}

runServer<Services>({
  config: {
    name: "code-graph:graph",
    version: "0.1.0",
  },
  createServices: () => {
    const { graphFile } = loadConfig();
    const opened = GraphService.open(new FileGraphDocument(graphFile));
    if (!opened.ok) {
      throw opened.error;
    }
    return { graph: opened.value };
  },
  registerTools: (server, services) => {
    registerGraphTools(server, services.graph);
  },
  onStartup: (services) => {
    const stats = services.graph.stats();
    console.error(
      `[code-graph] Loaded ${services.graph.location}: ${stats.nodes} nodes, ${stats.edges} edges (${stats.danglingEdges} dangling)`
    );
  },
  onShutdown: (services) => {
    if (!services.graph.hasUnsavedChanges) return;
    const saved = services.graph.save();
    if (!saved.ok) {
      throw saved.error;
    }
    console.error(`[code-graph] Saved pending changes to ${services.graph.location}`);
  },
});
