import { GraphBuilder, edgeKey, freezeGraph, removeIsolated } from "../graph/graph.js";
import { canonicalId, canonicalSegment } from "../graph/identity.js";
import type { Graph, GraphEdge, GraphNode, NodeId } from "../graph/types.js";

/** Namespace prefix as a list of package labels, outermost first. */
export type NamespacePrefix = readonly string[];

export interface NormalizeOptions {
  canonicalizeIds?: boolean;
  collapse?: readonly NamespacePrefix[];
  pruneIsolated?: boolean;
}

/** "Core/Storage" -> ["Core", "Storage"]. */
export function parseNamespacePrefix(raw: string): string[] {
  return raw
    .split("/")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

interface RewireRules {
  /** Identity used to spot edges made redundant by a merge. */
  key: (edge: GraphEdge) => string;
  /** Drop self-loops that only exist because both ends merged. */
  dropMergedLoops: boolean;
}

/**
 * Rebuilds the graph with endpoints mapped through idMap. Edges left untouched
 * by the mapping always survive; a rewritten edge is dropped when an edge with
 * the same key already exists.
 */
function rewire(
  nodes: Iterable<GraphNode>,
  edges: readonly GraphEdge[],
  idMap: Map<NodeId, NodeId>,
  rules: RewireRules,
): Graph {
  const mapped = edges.map((before) => {
    const edge: GraphEdge = {
      ...before,
      from: idMap.get(before.from) ?? before.from,
      to: idMap.get(before.to) ?? before.to,
    };
    const rewritten = edge.from !== before.from || edge.to !== before.to;
    const mergedLoop = rewritten && edge.from === edge.to && before.from !== before.to;
    return { edge, rewritten, mergedLoop };
  });

  const seen = new Set<string>();
  for (const m of mapped) {
    if (!m.rewritten) seen.add(rules.key(m.edge));
  }

  const builder = new GraphBuilder();
  for (const node of nodes) builder.addNode(node);
  for (const m of mapped) {
    if (m.rewritten) {
      if (rules.dropMergedLoops && m.mergedLoop) continue;
      const key = rules.key(m.edge);
      if (seen.has(key)) continue;
      seen.add(key);
    }
    builder.addEdge(m.edge);
  }
  return builder.build();
}

/**
 * Maps every id through canonicalId(). Nodes that collide merge: the first
 * keeps its attributes unless it is "unknown" and a later one is not.
 */
function canonicalizeIdentities(graph: Graph): Graph {
  const idMap = new Map<NodeId, NodeId>();
  const merged = new Map<NodeId, GraphNode>();
  for (const node of graph.nodes) {
    const id = canonicalId(node.id);
    idMap.set(node.id, id);
    const prev = merged.get(id);
    if (prev === undefined || (prev.kind === "unknown" && node.kind !== "unknown")) {
      merged.set(id, { ...node, id });
    }
  }

  return rewire(merged.values(), graph.edges, idMap, { key: edgeKey, dropMergedLoops: false });
}

/** Path a collapse prefix is matched against: a package counts as inside itself. */
function memberPath(node: GraphNode): readonly string[] {
  switch (node.kind) {
    case "package":
      return [...node.namespace, node.label];
    case "component":
    case "interface":
    case "class":
    case "unknown":
      return node.namespace;
  }
}

function startsWith(path: readonly string[], prefix: readonly string[]): boolean {
  if (prefix.length === 0 || path.length < prefix.length) return false;
  return prefix.every((seg, i) => canonicalSegment(path[i]) === canonicalSegment(seg));
}

function collapseNamespaces(
  graph: Graph,
  prefixes: readonly NamespacePrefix[],
  idTransform: (id: string) => string,
): Graph {
  // outermost prefix wins when prefixes nest
  const ordered = [...prefixes].filter((p) => p.length > 0).sort((a, b) => a.length - b.length);
  const synthetic = new Map<NamespacePrefix, GraphNode>();
  const syntheticFor = (prefix: NamespacePrefix): GraphNode => {
    let node = synthetic.get(prefix);
    if (node === undefined) {
      node = {
        id: idTransform(prefix.map(canonicalSegment).join(".")),
        label: prefix[prefix.length - 1],
        kind: "package",
        namespace: prefix.slice(0, -1),
      };
      synthetic.set(prefix, node);
    }
    return node;
  };

  const idMap = new Map<NodeId, NodeId>();
  const kept = new Map<NodeId, GraphNode>();
  for (const node of graph.nodes) {
    const prefix = ordered.find((p) => startsWith(memberPath(node), p));
    const target = prefix !== undefined ? syntheticFor(prefix) : node;
    idMap.set(node.id, target.id);
    if (!kept.has(target.id)) kept.set(target.id, target);
  }

  // an edge inside one collapsed group disappears with the group
  return rewire(kept.values(), graph.edges, idMap, {
    key: (e) => [e.from, e.to, e.label ?? ""].join("\u0000"),
    dropMergedLoops: true,
  });
}

/**
 * Canonicalizes a graph so two independently authored diagrams can be
 * compared: id canonicalization, then namespace collapsing, then isolated
 * node pruning. Pure: the input graph is never modified.
 */
export function normalizeGraph(graph: Graph, options: NormalizeOptions = {}): Graph {
  const canonicalize = options.canonicalizeIds ?? true;
  const collapse = options.collapse ?? [];

  let result = graph;
  if (canonicalize) result = canonicalizeIdentities(result);
  if (collapse.length > 0) {
    result = collapseNamespaces(result, collapse, canonicalize ? canonicalId : (id) => id);
  }
  if (options.pruneIsolated ?? false) result = removeIsolated(result);
  return result === graph ? freezeGraph(graph.nodes, graph.edges) : result;
}
