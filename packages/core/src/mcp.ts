/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers for creating consistent tool responses.
 */

/**
 * MCP text content block.
 */
export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 */
export interface ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
}

export type ErrorPayload = { success: false; error: string } & Record<string, unknown>;

/**
 * Create an error response. Extra fields are merged into the structured content.
 */
export function errorResponse(
  message: string,
  details?: Record<string, unknown>
): ToolResponse<ErrorPayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { ...details, success: false, error: message },
    isError: true,
  };
}

/**
 * Create a success response with text and optional structured content.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data?: T
): ToolResponse<Record<string, unknown> & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: data ? { ...data, success: true as const } : { success: true as const },
  };
}
