import { BuildError } from "../errors/index.js";
import { GraphBuilder, removeIsolated, subgraph } from "../graph/graph.js";
import { safeId, safePrefix } from "../graph/identity.js";
import type { Graph, GraphEdge, GraphNode, NodeId, Warning } from "../graph/types.js";
import { projectAlias, simplifyLabel } from "./labels.js";
import { parseDump, type DumpEntry, type ModuleRef } from "./parseDump.js";

export interface BuildOptions {
  /** Allow-list of module prefixes; empty or containing "*" keeps everything. */
  packages?: readonly string[];
  /** Deny-list of module prefixes, applied after the allow-list. */
  hidePackages?: readonly string[];
  /** Keep nodes at most this many hops from a root. */
  maxDepth?: number;
  /** Keep only the edges leaving this module (name or safe id) and their targets. */
  directOf?: string;
  /** Merge modules that share a project name. */
  projectAliases?: boolean;
  removeIsolated?: boolean;
  /** Attach the consumer version to every edge. */
  showVersion?: boolean;
}

export interface BuildResult {
  graph: Graph;
  warnings: Warning[];
}

function moduleNode(ref: ModuleRef): GraphNode {
  const node: GraphNode = {
    id: safeId(ref.name),
    label: simplifyLabel(ref.name),
    kind: "component",
    namespace: [],
  };
  return ref.version !== undefined ? { ...node, version: ref.version } : node;
}

function graphFromEntries(entries: readonly DumpEntry[], showVersion: boolean): Graph {
  const builder = new GraphBuilder();
  for (const { producer, consumer } of entries) {
    // first occurrence wins, so a node keeps the first version seen
    builder.addNode(moduleNode(producer));
    builder.addNode(moduleNode(consumer));

    const edge: GraphEdge = {
      from: safeId(producer.name),
      to: safeId(consumer.name),
      style: "solid-association",
    };
    builder.addEdge(showVersion && consumer.version !== undefined ? { ...edge, version: consumer.version } : edge);
  }
  return builder.build();
}

function filterByPrefixes(graph: Graph, packages: readonly string[], hidden: readonly string[]): Graph {
  const allowAll = packages.length === 0 || packages.includes("*");
  const allowed = packages.filter((p) => p !== "*").map(safePrefix);
  const denied = hidden.map(safePrefix).filter((p) => p !== "");

  return subgraph(graph, (node) => {
    if (!allowAll && !allowed.some((p) => node.id.startsWith(p))) return false;
    return !denied.some((p) => node.id.startsWith(p));
  });
}

/** Minimum hop count from the roots (in-degree zero, or every node when the graph has none). */
export function nodeDepths(graph: Graph): Map<NodeId, number> {
  const indegree = new Map<NodeId, number>(graph.nodes.map((n) => [n.id, 0]));
  const successors = new Map<NodeId, NodeId[]>(graph.nodes.map((n) => [n.id, []]));
  for (const edge of graph.edges) {
    indegree.set(edge.to, (indegree.get(edge.to) ?? 0) + 1);
    successors.get(edge.from)?.push(edge.to);
  }

  let roots = graph.nodes.filter((n) => indegree.get(n.id) === 0).map((n) => n.id);
  if (roots.length === 0) roots = graph.nodes.map((n) => n.id);

  const depths = new Map<NodeId, number>();
  const queue: NodeId[] = [];
  for (const root of roots) {
    depths.set(root, 0);
    queue.push(root);
  }
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    const next = (depths.get(id) ?? 0) + 1;
    for (const succ of successors.get(id) ?? []) {
      const known = depths.get(succ);
      if (known === undefined || next < known) {
        depths.set(succ, next);
        queue.push(succ);
      }
    }
  }
  return depths;
}

function filterByDepth(graph: Graph, maxDepth: number): Graph {
  const depths = nodeDepths(graph);
  return subgraph(graph, (n) => {
    const depth = depths.get(n.id);
    return depth !== undefined && depth <= maxDepth;
  });
}

function filterDirectOf(graph: Graph, root: string): Graph {
  const rootId = safeId(root);
  if (!graph.nodes.some((n) => n.id === rootId)) {
    throw new BuildError(`--direct-of: no module "${root}" in the filtered graph`, "unknown-root", {
      root,
    });
  }
  const targets = new Set<NodeId>([rootId]);
  for (const edge of graph.edges) {
    if (edge.from === rootId) targets.add(edge.to);
  }
  return subgraph(
    graph,
    (n) => targets.has(n.id),
    (e) => e.from === rootId,
  );
}

/**
 * Re-keys every node by projectAlias(label). Nodes sharing a key merge into
 * the first one seen; self-loops and duplicate edges created by the merge drop.
 */
export function consolidateProjects(graph: Graph): Graph {
  const idMap = new Map<NodeId, NodeId>();
  const builder = new GraphBuilder();
  for (const node of graph.nodes) {
    const alias = projectAlias(node.label);
    idMap.set(node.id, alias);
    builder.addNode({ ...node, id: alias });
  }

  const seen = new Set<string>();
  for (const edge of graph.edges) {
    const from = idMap.get(edge.from) ?? edge.from;
    const to = idMap.get(edge.to) ?? edge.to;
    if (from === to) continue;
    const key = [from, to, edge.label ?? "", edge.version ?? ""].join("\u0000");
    if (seen.has(key)) continue;
    seen.add(key);
    builder.addEdge({ ...edge, from, to });
  }
  return builder.build();
}

/**
 * Turns a dependency dump into a filtered graph. Filters run in a fixed order:
 * allow-list, deny-list, depth, direct dependencies, project aliasing and
 * finally isolated-node removal.
 */
export function buildDependencyGraph(text: string, options: BuildOptions = {}): BuildResult {
  const { entries, warnings } = parseDump(text);
  if (entries.length === 0) {
    throw new BuildError("dependency dump contains no valid entries", "empty-dump", {
      warnings: warnings.length,
    });
  }

  let graph = graphFromEntries(entries, options.showVersion ?? false);
  const before = graph.nodes.length;

  graph = filterByPrefixes(graph, options.packages ?? [], options.hidePackages ?? []);
  if (options.maxDepth !== undefined) graph = filterByDepth(graph, options.maxDepth);
  if (options.directOf !== undefined) graph = filterDirectOf(graph, options.directOf);
  if (options.projectAliases ?? false) graph = consolidateProjects(graph);
  if (options.removeIsolated ?? false) graph = removeIsolated(graph);

  if (graph.nodes.length === 0) {
    throw new BuildError(`filters removed all ${before} modules`, "empty-graph", { modules: before });
  }
  return { graph, warnings };
}
