export type {
  EdgeStyle,
  Graph,
  GraphEdge,
  GraphNode,
  NamespaceTree,
  NodeId,
  NodeKind,
  Warning,
} from "./graph/types.js";
export { GraphBuilder, namespaceTree, removeIsolated } from "./graph/graph.js";
export { canonicalId, canonicalLabelId, safeId } from "./graph/identity.js";

export {
  BuildError,
  ConfigError,
  EmptyDiagramError,
  GraphError,
  InputError,
  ParseError,
  ReflexionError,
  UsageError,
  type BuildErrorReason,
} from "./errors/index.js";

export { parseDiagram, type DiagramParseResult } from "./diagram/parseDiagram.js";
export { serializeDiagram, type SerializeOptions } from "./diagram/serializeDiagram.js";

export {
  normalizeGraph,
  parseNamespacePrefix,
  type NamespacePrefix,
  type NormalizeOptions,
} from "./normalize/normalizeGraph.js";

export { parseDump, type DumpEntry, type DumpParseResult, type ModuleRef } from "./depgraph/parseDump.js";
export { projectAlias, simplifyLabel } from "./depgraph/labels.js";
export {
  buildDependencyGraph,
  consolidateProjects,
  nodeDepths,
  type BuildOptions,
  type BuildResult,
} from "./depgraph/buildDependencyGraph.js";
export {
  renderDependencyDiagram,
  type DiagramFormat,
  type RenderOptions,
} from "./depgraph/renderDependencyDiagram.js";

export { matchingBlocks, matchingRatio, type MatchingBlock } from "./similarity/matchingRatio.js";
export { structuralTokens, textLines } from "./similarity/tokens.js";
export {
  compareDiagrams,
  structuralScore,
  textualScore,
  type CompareOptions,
  type DiagramSource,
  type SimilarityResult,
  type TextualOptions,
} from "./similarity/score.js";

export { renderMermaid, type MermaidOptions } from "./render/mermaid.js";

export {
  defaultConfig,
  loadReflexionConfig,
  validateConfig,
  type ReflexionConfig,
} from "./config/reflexionYaml.js";
