/**
 * Shared types for graph tool registration.
 */

import type { McpServer } from "@codegraph/core";
import type { GraphService } from "../core/services/GraphService.js";

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, service: GraphService): void;
}
