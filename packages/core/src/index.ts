export {
  Ok,
  Err,
  map,
  tryCatch,
} from "./result.js";
export type { Result } from "./result.js";

export {
  errorResponse,
  successResponse,
} from "./mcp.js";
export type { TextContent, ToolResponse, ErrorPayload } from "./mcp.js";

export { bootstrapServer, runServer, McpServer } from "./server.js";
export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
