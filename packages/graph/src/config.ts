/**
 * Server configuration from the environment.
 */

import { isAbsolute, join, resolve } from "node:path";
import { GRAPH_DIR, GRAPH_FILE } from "./infrastructure/FileGraphDocument.js";

export const GRAPH_FILE_ENV = "CODE_GRAPH_FILE";

export interface GraphConfig {
  /** Absolute path of the graph document */
  graphFile: string;
}

/**
 * CODE_GRAPH_FILE, absolute or relative to cwd; defaults to
 * <cwd>/.code-graph/code_graph.json.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): GraphConfig {
  const configured = env[GRAPH_FILE_ENV]?.trim();
  if (!configured) {
    return { graphFile: join(resolve(cwd), GRAPH_DIR, GRAPH_FILE) };
  }
  return { graphFile: isAbsolute(configured) ? configured : resolve(cwd, configured) };
}
