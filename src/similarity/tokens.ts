import type { Graph } from "../graph/types.js";
import { sortBy } from "../util/stableSort.js";
import { sortEdges } from "../diagram/serializeDiagram.js";

/**
 * Flat, order-independent encoding of a graph: nodes by id, then edges by
 * (source, target, label, style).
 */
export function structuralTokens(graph: Graph): string[] {
  const nodes = sortBy(graph.nodes, (n) => n.id).map((n) => `node:${n.id}:${n.kind}`);
  const edges = sortEdges(graph.edges).map((e) => `edge:${e.from}->${e.to}:${e.label ?? ""}:${e.style}`);
  return [...nodes, ...edges];
}

const DIRECTIVE_LINE = /^@(start|end)uml\b/i;

/** Raw lines of a diagram; a trailing newline does not add an empty line. */
export function textLines(text: string, clean = false): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (!clean) return lines;
  return lines
    .map((l) => l.trim())
    .filter((l) => l !== "" && !l.startsWith("'") && !DIRECTIVE_LINE.test(l));
}
