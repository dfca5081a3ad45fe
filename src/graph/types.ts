export type NodeId = string;

export type NodeKind = "component" | "interface" | "class" | "package" | "unknown";

export type EdgeStyle =
  | "solid-association"
  | "dashed-dependency"
  | "composition"
  | "inheritance";

export interface GraphNode {
  id: NodeId;
  /** Human-readable name, e.g. "containers | podman". */
  label: string;
  kind: NodeKind;
  /** Labels of the enclosing package blocks, outermost first. */
  namespace: readonly string[];
  version?: string;
}

export interface GraphEdge {
  from: NodeId;
  to: NodeId;
  label?: string;
  style: EdgeStyle;
  /** Only set by the dependency-dump flavour. */
  version?: string;
}

export interface Graph {
  nodes: readonly GraphNode[];
  edges: readonly GraphEdge[];
}

/** A recoverable, per-line problem. Never thrown. */
export interface Warning {
  line: number;
  message: string;
  text: string;
}

export interface NamespaceTree {
  /** Label of this namespace level ("" for the root). */
  name: string;
  path: readonly string[];
  members: GraphNode[];
  children: NamespaceTree[];
}
