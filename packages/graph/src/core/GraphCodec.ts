/**
 * Graph <-> JSON document.
 *
 * Only fields of the graph model survive a round trip: unknown keys in a
 * document are dropped on decode and never written back.
 */

import type { Result } from "@codegraph/core";
import { Ok, Err, tryCatch } from "@codegraph/core";
import { GraphStore } from "./GraphStore.js";
import { GraphDocumentSchema } from "./schemas.js";
import { CorruptionError } from "./errors.js";

/**
 * Decode document text. Absent (null) or blank text is an empty graph.
 */
export function decodeGraph(text: string | null, location: string): Result<GraphStore, CorruptionError> {
  if (text === null || text.trim() === "") {
    return Ok(new GraphStore());
  }

  const json = tryCatch((): unknown => JSON.parse(text));
  if (!json.ok) {
    return Err(new CorruptionError(location, `invalid JSON (${json.error.message})`));
  }

  const parsed = GraphDocumentSchema.safeParse(json.value);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.map(String).join(".") : "document";
    return Err(new CorruptionError(location, `${where}: ${first?.message ?? "does not match the graph schema"}`));
  }

  return Ok(GraphStore.fromDocument(parsed.data));
}

/**
 * Encode the full graph, highlight state included, as pretty-printed JSON.
 */
export function encodeGraph(store: GraphStore): string {
  const { nodes, edges, highlightQuestions } = store.snapshot();
  return `${JSON.stringify({ nodes, edges, highlightQuestions }, null, 2)}\n`;
}
