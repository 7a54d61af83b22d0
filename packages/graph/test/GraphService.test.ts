import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { GraphService } from "../src/core/services/GraphService.js";
import { FileGraphDocument } from "../src/infrastructure/FileGraphDocument.js";
import { InMemoryGraphDocument } from "../src/infrastructure/memory/InMemoryGraphDocument.js";
import { decodeGraph } from "../src/core/GraphCodec.js";
import { CorruptionError, PersistenceError } from "../src/core/errors.js";
import type { GraphDocument } from "../src/core/ports/GraphDocument.js";

function openOk(document: GraphDocument): GraphService {
  const result = GraphService.open(document);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

describe("GraphService", () => {
  let testDir: string;
  let document: FileGraphDocument;
  let service: GraphService;

  beforeEach(() => {
    testDir = join(tmpdir(), `code-graph-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(testDir, { recursive: true });
    document = FileGraphDocument.forProject(testDir);
    service = openOk(document);
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  describe("open", () => {
    it("starts empty without creating the document", () => {
      expect(service.stats()).toEqual({ nodes: 0, edges: 0, danglingEdges: 0 });
      expect(existsSync(document.location)).toBe(false);
      expect(document.location).toBe(join(testDir, ".code-graph", "code_graph.json"));
    });

    it("fails on a corrupt document and leaves it untouched", () => {
      mkdirSync(join(testDir, ".code-graph"), { recursive: true });
      writeFileSync(document.location, "{not json", "utf-8");

      const result = GraphService.open(FileGraphDocument.forProject(testDir));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(CorruptionError);
      }
      expect(readFileSync(document.location, "utf-8")).toBe("{not json");
    });

    it("fails when the document cannot be read", () => {
      const directory = join(testDir, "graph.json");
      mkdirSync(directory);

      const result = GraphService.open(new FileGraphDocument(directory));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PersistenceError);
        expect(result.error.kind).toBe("persistence");
      }
    });
  });

  describe("persistence", () => {
    it("writes the graph after each mutation", () => {
      service.addNodes([{ id: "src/app.ts", type: "file" }]);

      const decoded = decodeGraph(readFileSync(document.location, "utf-8"), document.location);
      expect(decoded.ok).toBe(true);
      if (decoded.ok) {
        expect(decoded.value.getNode("src/app.ts")?.type).toBe("file");
      }
      expect(existsSync(`${document.location}.tmp`)).toBe(false);
    });

    it("persists nodes, edges and highlights across service instances", () => {
      service.addNodes([{ id: "a", type: "function" }, { id: "b", type: "function" }]);
      service.addEdges([{ source: "a", target: "b", type: "invokes" }]);
      service.highlightNodes(["a"], 3, { question: "Who calls b?" });
      service.highlightEdges(["edge_0"], 3);

      const reopened = openOk(FileGraphDocument.forProject(testDir));
      const graph = reopened.readGraph();

      expect(graph.nodes.map((node) => [node.id, node.highlight])).toEqual([
        ["a", 3],
        ["b", 0],
      ]);
      expect(graph.edges).toEqual([{ id: "edge_0", source: "a", target: "b", type: "invokes", highlight: 3 }]);
      expect(graph.highlightQuestions).toEqual({ "3": "Who calls b?" });
    });

    it("continues edge numbering after a reload", () => {
      service.addEdges([
        { source: "a", target: "b", type: "invokes" },
        { source: "b", target: "c", type: "invokes" },
      ]);

      const reopened = openOk(FileGraphDocument.forProject(testDir));
      const result = reopened.addEdges([{ source: "c", target: "d", type: "invokes" }]);

      expect(result).toEqual({ ok: true, value: { ids: ["edge_2"] } });
    });

    it("does not write when validation fails", () => {
      const memory = new InMemoryGraphDocument();
      const memoryService = openOk(memory);

      const result = memoryService.addNodes([{ id: "", type: "file" }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("validation");
      }
      expect(memory.writes).toBe(0);
    });

    it("reports a failed save and keeps the change in memory", () => {
      const memory = new InMemoryGraphDocument();
      const memoryService = openOk(memory);
      memory.failWrites(new Error("disk full"));

      const result = memoryService.addNodes([{ id: "a.ts", type: "file" }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PersistenceError);
        expect(result.error.message).toBe(
          "Graph updated in memory but not saved to memory://code-graph: disk full"
        );
        if (result.error instanceof PersistenceError) {
          expect(result.error.applied).toEqual({ ids: ["a.ts"], created: ["a.ts"], updated: [] });
        }
      }
      expect(memoryService.readGraph().nodes.map((node) => node.id)).toEqual(["a.ts"]);
      expect(memory.current).toBeNull();

      expect(memoryService.hasUnsavedChanges).toBe(true);

      memory.failWrites(null);
      expect(memoryService.save()).toEqual({ ok: true, value: undefined });
      expect(memoryService.hasUnsavedChanges).toBe(false);
      expect(memory.current).toContain('"id": "a.ts"');
    });

    it("reports a file that cannot be replaced and removes the temp file", () => {
      mkdirSync(join(document.location, "occupied"), { recursive: true });

      const result = service.addNodes([{ id: "b.ts", type: "file" }]);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(PersistenceError);
        expect(result.error.message.startsWith(
          `Graph updated in memory but not saved to ${document.location}: `
        )).toBe(true);
        if (result.error instanceof PersistenceError) {
          expect(result.error.location).toBe(document.location);
          expect(result.error.applied).toEqual({ ids: ["b.ts"], created: ["b.ts"], updated: [] });
        }
      }
      expect(service.readGraph().nodes.map((node) => node.id)).toEqual(["b.ts"]);
      expect(existsSync(`${document.location}.tmp`)).toBe(false);
    });

    it("reports a failed highlight save with the applied ids", () => {
      const memory = new InMemoryGraphDocument();
      const memoryService = openOk(memory);
      memoryService.addNodes([{ id: "a", type: "file" }]);
      memory.failWrites(new Error("read-only"));

      const result = memoryService.highlightNodes(["a", "ghost"], 1);

      expect(result.ok).toBe(false);
      if (!result.ok && result.error instanceof PersistenceError) {
        expect(result.error.applied).toEqual({ applied: ["a"], notFound: ["ghost"] });
      }
    });
  });

  describe("readGraph", () => {
    it("includes the dangling-edge report", () => {
      service.addNodes([{ id: "A", type: "class" }]);
      service.addEdges([{ source: "A", target: "B", type: "inherit" }]);

      expect(service.readGraph().dangling).toEqual({
        edges: [{ id: "edge_0", source: "A", target: "B", missing: ["B"] }],
        missingNodeIds: ["B"],
      });
      expect(service.checkIntegrity().missingNodeIds).toEqual(["B"]);
    });
  });

  describe("switchDocument", () => {
    let otherDir: string;

    beforeEach(() => {
      otherDir = join(testDir, "other");
      service.addNodes([{ id: "a", type: "file" }]);
    });

    it("loads another document and creates it on disk", () => {
      const other = FileGraphDocument.forProject(otherDir);
      const result = service.switchDocument(other);

      expect(result).toEqual({ ok: true, value: { nodes: 0, edges: 0, danglingEdges: 0 } });
      expect(service.location).toBe(other.location);
      expect(existsSync(other.location)).toBe(true);
      expect(service.readGraph().nodes).toEqual([]);
    });

    it("keeps the stored graph unless reset", () => {
      service.switchDocument(FileGraphDocument.forProject(otherDir));
      const back = service.switchDocument(FileGraphDocument.forProject(testDir));

      expect(back).toEqual({ ok: true, value: { nodes: 1, edges: 0, danglingEdges: 0 } });
      expect(service.readGraph().nodes.map((node) => node.id)).toEqual(["a"]);
    });

    it("empties the stored graph on reset", () => {
      const result = service.switchDocument(FileGraphDocument.forProject(testDir), { reset: true });

      expect(result).toEqual({ ok: true, value: { nodes: 0, edges: 0, danglingEdges: 0 } });
      expect(JSON.parse(readFileSync(document.location, "utf-8")).nodes).toEqual([]);
    });

    it("stays on the current graph when the new document is corrupt", () => {
      const broken = new InMemoryGraphDocument("not json", "memory://broken");
      const result = service.switchDocument(broken);

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe("corruption");
      }
      expect(service.location).toBe(document.location);
      expect(service.readGraph().nodes.map((node) => node.id)).toEqual(["a"]);
    });
  });
});
