/**
 * Tool response formatting shared by the graph tools.
 */

import { errorResponse, type ToolResponse } from "@codegraph/core";
import type { CorruptionError, PersistenceError, ValidationError } from "../core/errors.js";
import type { HighlightResult } from "../core/model.js";

export function graphErrorResponse(error: ValidationError | CorruptionError | PersistenceError): ToolResponse {
  switch (error.kind) {
    case "validation":
      return errorResponse(error.message, { kind: error.kind, issues: error.issues });
    case "corruption":
      return errorResponse(error.message, { kind: error.kind, location: error.location });
    case "persistence": {
      const response = errorResponse(error.message, {
        kind: error.kind,
        location: error.location,
        applied: error.applied ?? null,
      });
      if (error.applied !== undefined) {
        response.content.push({
          type: "text",
          text: `Applied in memory only: ${JSON.stringify(error.applied)}`,
        });
      }
      return response;
    }
  }
}

export function formatHighlight(kind: "node" | "edge", color: number, result: HighlightResult): string {
  const lines = [`Highlighted ${result.applied.length} ${kind}(s) with color ${color}.`];
  if (result.notFound.length > 0) {
    lines.push(`Not found: ${result.notFound.join(", ")}`);
  }
  return lines.join("\n");
}
