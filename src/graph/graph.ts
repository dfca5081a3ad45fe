import { GraphError } from "../errors/index.js";
import { sortBy } from "../util/stableSort.js";
import type { Graph, GraphEdge, GraphNode, NamespaceTree, NodeId } from "./types.js";

/**
 * Mutable accumulator used while a graph is parsed or built.
 * Node order is insertion order; build() hands out a frozen snapshot.
 */
export class GraphBuilder {
  private readonly nodes = new Map<NodeId, GraphNode>();
  private readonly edges: GraphEdge[] = [];

  has(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  get(id: NodeId): GraphNode | undefined {
    return this.nodes.get(id);
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  /** Returns false (and keeps the existing node) when the id is taken. */
  addNode(node: GraphNode): boolean {
    if (this.nodes.has(node.id)) return false;
    this.nodes.set(node.id, node);
    return true;
  }

  addEdge(edge: GraphEdge): void {
    for (const end of [edge.from, edge.to]) {
      if (!this.nodes.has(end)) {
        throw new GraphError(`edge ${edge.from} -> ${edge.to} references missing node "${end}"`, {
          from: edge.from,
          to: edge.to,
        });
      }
    }
    this.edges.push(edge);
  }

  build(): Graph {
    return freezeGraph([...this.nodes.values()], this.edges);
  }
}

export function freezeGraph(nodes: readonly GraphNode[], edges: readonly GraphEdge[]): Graph {
  return Object.freeze({
    nodes: Object.freeze(
      nodes.map((n) => Object.freeze({ ...n, namespace: Object.freeze([...n.namespace]) })),
    ),
    edges: Object.freeze(edges.map((e) => Object.freeze({ ...e }))),
  });
}

/** Rebuilds a graph keeping the nodes and edges the predicates accept. Dangling edges drop. */
export function subgraph(
  graph: Graph,
  keepNode: (node: GraphNode) => boolean,
  keepEdge: (edge: GraphEdge) => boolean = () => true,
): Graph {
  const builder = new GraphBuilder();
  for (const node of graph.nodes) {
    if (keepNode(node)) builder.addNode(node);
  }
  for (const edge of graph.edges) {
    if (builder.has(edge.from) && builder.has(edge.to) && keepEdge(edge)) {
      builder.addEdge(edge);
    }
  }
  return builder.build();
}

/** Total degree (in + out) per node; a self-loop counts twice. */
export function degreeMap(graph: Graph): Map<NodeId, number> {
  const degrees = new Map<NodeId, number>();
  for (const node of graph.nodes) degrees.set(node.id, 0);
  for (const edge of graph.edges) {
    degrees.set(edge.from, (degrees.get(edge.from) ?? 0) + 1);
    degrees.set(edge.to, (degrees.get(edge.to) ?? 0) + 1);
  }
  return degrees;
}

export function removeIsolated(graph: Graph): Graph {
  const degrees = degreeMap(graph);
  return subgraph(graph, (n) => (degrees.get(n.id) ?? 0) > 0);
}

export function edgeKey(edge: GraphEdge): string {
  return [edge.from, edge.to, edge.label ?? "", edge.style].join("\u0000");
}

/**
 * Groups nodes by namespace path. Package nodes are members of their own
 * enclosing level; their contents live in the child named after their label.
 */
export function namespaceTree(graph: Graph): NamespaceTree {
  const root: NamespaceTree = { name: "", path: [], members: [], children: [] };

  const levelFor = (path: readonly string[]): NamespaceTree => {
    let level = root;
    for (let depth = 0; depth < path.length; depth++) {
      const name = path[depth];
      let child = level.children.find((c) => c.name === name);
      if (!child) {
        child = { name, path: path.slice(0, depth + 1), members: [], children: [] };
        level.children.push(child);
      }
      level = child;
    }
    return level;
  };

  for (const node of sortBy(graph.nodes, (n) => n.id)) {
    levelFor(node.namespace).members.push(node);
    if (node.kind === "package") levelFor([...node.namespace, node.label]);
  }

  return root;
}
