import { serializeDiagram } from "../diagram/serializeDiagram.js";
import type { Graph } from "../graph/types.js";
import { renderMermaid } from "../render/mermaid.js";

export type DiagramFormat = "plantuml" | "mermaid";

export const DIAGRAM_FORMATS: readonly DiagramFormat[] = ["plantuml", "mermaid"];

export const DEFAULT_TITLE = "Generated Architecture";

export interface RenderOptions {
  format?: DiagramFormat;
  title?: string;
  showVersion?: boolean;
}

export function dependencyHeader(title: string): string[] {
  return [
    "skinparam componentStyle rectangle",
    "left to right direction",
    `title ${title}`,
    'legend "Naming scheme: Organisation | Project"',
  ];
}

export function renderDependencyDiagram(graph: Graph, options: RenderOptions = {}): string {
  const title = options.title ?? DEFAULT_TITLE;
  const showVersion = options.showVersion ?? false;
  switch (options.format ?? "plantuml") {
    case "plantuml":
      return serializeDiagram(graph, { header: dependencyHeader(title), showVersion });
    case "mermaid":
      return renderMermaid(graph, { title, showVersion });
  }
}
