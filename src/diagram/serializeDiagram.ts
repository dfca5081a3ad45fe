import { namespaceTree } from "../graph/graph.js";
import type { EdgeStyle, Graph, GraphEdge, GraphNode, NamespaceTree, NodeKind } from "../graph/types.js";
import { sortByTuple } from "../util/stableSort.js";
import { UNKNOWN_STEREOTYPE } from "./grammar.js";

export interface SerializeOptions {
  /** Lines written right after @startuml (skinparams, title, legend). */
  header?: readonly string[];
  /** Fall back to the edge version when an edge has no label. */
  showVersion?: boolean;
}

export const VERSION_LABEL_LENGTH = 10;

const ARROWS: Record<EdgeStyle, string> = {
  "solid-association": "-->",
  "dashed-dependency": "..>",
  composition: "*--",
  inheritance: "--|>",
};

const KEYWORDS: Record<Exclude<NodeKind, "unknown">, string> = {
  component: "component",
  interface: "interface",
  class: "class",
  package: "package",
};

const INDENT = "  ";

function quote(label: string): string {
  return `"${label.replace(/"/g, "'")}"`;
}

export function edgeText(edge: GraphEdge, showVersion: boolean): string | undefined {
  if (edge.label !== undefined) return edge.label.trim();
  if (showVersion && edge.version !== undefined && edge.version !== "") {
    return edge.version.slice(0, VERSION_LABEL_LENGTH);
  }
  return undefined;
}

export function sortEdges(edges: readonly GraphEdge[]): GraphEdge[] {
  return sortByTuple(edges, (e) => [e.from, e.to, e.label ?? "", e.style]);
}

function declarationLine(node: GraphNode, pad: string): string {
  switch (node.kind) {
    case "unknown":
      // declared explicitly so a relation cannot resolve it to a same-named package member
      return `${pad}component ${quote(node.label)} as ${node.id} ${UNKNOWN_STEREOTYPE}`;
    case "component":
    case "interface":
    case "class":
    case "package":
      return `${pad}${KEYWORDS[node.kind]} ${quote(node.label)} as ${node.id}`;
  }
}

function emitLevel(level: NamespaceTree, depth: number, out: string[]): void {
  const pad = INDENT.repeat(depth);
  const claimed = new Set<NamespaceTree>();

  for (const node of level.members) {
    const line = declarationLine(node, pad);
    if (node.kind !== "package") {
      out.push(line);
      continue;
    }
    out.push(`${line} {`);
    const child = level.children.find((c) => c.name === node.label);
    if (child !== undefined && !claimed.has(child)) {
      claimed.add(child);
      emitLevel(child, depth + 1, out);
    }
    out.push(`${pad}}`);
  }

  // members whose enclosing package has no node of its own
  for (const child of level.children) {
    if (claimed.has(child)) continue;
    out.push(`${pad}package ${quote(child.name)} {`);
    emitLevel(child, depth + 1, out);
    out.push(`${pad}}`);
  }
}

/**
 * Renders a graph as diagram text that parseDiagram() reads back into the
 * same nodes and edges. Declarations and relations are sorted so equal graphs
 * serialize identically.
 */
export function serializeDiagram(graph: Graph, options: SerializeOptions = {}): string {
  const showVersion = options.showVersion ?? false;
  const out: string[] = ["@startuml"];
  if (options.header !== undefined && options.header.length > 0) {
    out.push(...options.header, "");
  }

  emitLevel(namespaceTree(graph), 0, out);
  out.push("");

  for (const edge of sortEdges(graph.edges)) {
    const label = edgeText(edge, showVersion);
    const base = `${edge.from} ${ARROWS[edge.style]} ${edge.to}`;
    out.push(label !== undefined && label !== "" ? `${base} : ${label}` : base);
  }

  out.push("", "@enduml");
  return out.join("\n") + "\n";
}
