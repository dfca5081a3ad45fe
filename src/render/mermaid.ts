import type { EdgeStyle, Graph, NodeId, NodeKind } from "../graph/types.js";
import { sortBy } from "../util/stableSort.js";
import { edgeText, sortEdges } from "../diagram/serializeDiagram.js";

export interface MermaidOptions {
  title?: string;
  /** Show edge versions (truncated) where an edge has no label. */
  showVersion?: boolean;
}

const SHAPES: Record<NodeKind, [string, string]> = {
  component: ["[", "]"],
  interface: ["((", "))"],
  class: ["[[", "]]"],
  package: ["[/", "\\]"],
  unknown: ["(", ")"],
};

const LINKS: Record<EdgeStyle, string> = {
  "solid-association": "-->",
  "dashed-dependency": "-.->",
  composition: "--o",
  inheritance: "==>",
};

function escapeText(text: string): string {
  return text.replace(/"/g, "#quot;").replace(/\|/g, "#124;");
}

/** Mermaid ids allow [A-Za-z0-9_]; collisions after the rewrite get a numeric suffix. */
function mermaidIds(ids: readonly NodeId[]): Map<NodeId, string> {
  const out = new Map<NodeId, string>();
  const taken = new Set<string>();
  for (const id of ids) {
    const base = id.replace(/[^A-Za-z0-9_]/g, "_") || "node";
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) candidate = `${base}_${n}`;
    taken.add(candidate);
    out.set(id, candidate);
  }
  return out;
}

/** Flowchart view of a graph, one node line per node and one link line per edge. */
export function renderMermaid(graph: Graph, options: MermaidOptions = {}): string {
  const nodes = sortBy(graph.nodes, (n) => n.id);
  const ids = mermaidIds(nodes.map((n) => n.id));
  const idOf = (id: NodeId): string => ids.get(id) ?? id;

  const out: string[] = [];
  if (options.title !== undefined && options.title !== "") {
    out.push("---", `title: ${options.title}`, "---");
  }
  out.push("graph LR");

  for (const node of nodes) {
    const [open, close] = SHAPES[node.kind];
    out.push(`  ${idOf(node.id)}${open}"${escapeText(node.label)}"${close}`);
  }

  for (const edge of sortEdges(graph.edges)) {
    const link = LINKS[edge.style];
    const text = edgeText(edge, options.showVersion ?? false);
    const labelled = text !== undefined && text !== "" ? `${link}|${escapeText(text)}|` : link;
    out.push(`  ${idOf(edge.from)} ${labelled} ${idOf(edge.to)}`);
  }

  return out.join("\n") + "\n";
}
