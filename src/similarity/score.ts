import { parseDiagram } from "../diagram/parseDiagram.js";
import { EmptyDiagramError } from "../errors/index.js";
import type { Graph, Warning } from "../graph/types.js";
import { normalizeGraph, type NormalizeOptions } from "../normalize/normalizeGraph.js";
import { matchingRatio } from "./matchingRatio.js";
import { structuralTokens, textLines } from "./tokens.js";

export const DEFAULT_MAX_TOKENS = 50_000;

export interface TextualOptions {
  /** Drop @startuml/@enduml, comment and blank lines, and trim before matching. */
  cleanText?: boolean;
}

export interface CompareOptions extends TextualOptions {
  normalize?: NormalizeOptions;
  /** Longer token or line sequences are truncated to this length. */
  maxTokens?: number;
}

export interface DiagramSource {
  /** Shown in errors and warnings, usually the file path. */
  name: string;
  text: string;
}

export interface SourcedWarning extends Warning {
  source: string;
}

export interface SimilarityResult {
  structural: number;
  textual: number;
  graphs: [Graph, Graph];
  warnings: SourcedWarning[];
}

export function structuralScore(a: Graph, b: Graph): number {
  return matchingRatio(structuralTokens(a), structuralTokens(b));
}

export function textualScore(a: string, b: string, options: TextualOptions = {}): number {
  const clean = options.cleanText ?? false;
  return matchingRatio(textLines(a, clean), textLines(b, clean));
}

function loadGraph(source: DiagramSource, options: NormalizeOptions, warnings: SourcedWarning[]): Graph {
  const parsed = parseDiagram(source.text);
  for (const w of parsed.warnings) warnings.push({ ...w, source: source.name });
  const graph = normalizeGraph(parsed.graph, options);
  if (graph.nodes.length === 0) throw new EmptyDiagramError(source.name);
  return graph;
}

function capped(seq: string[], limit: number, what: string, source: string, warnings: SourcedWarning[]): string[] {
  if (seq.length <= limit) return seq;
  warnings.push({
    source,
    line: 0,
    message: `${what} truncated from ${seq.length} to ${limit} entries`,
    text: "",
  });
  return seq.slice(0, limit);
}

/**
 * Parses, normalizes and scores two diagrams. Both scores are reported in
 * argument order; the ratio is not guaranteed symmetric when tie-breaking
 * differs between the two directions.
 */
export function compareDiagrams(
  a: DiagramSource,
  b: DiagramSource,
  options: CompareOptions = {},
): SimilarityResult {
  const warnings: SourcedWarning[] = [];
  const normalize = options.normalize ?? {};
  const limit = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const clean = options.cleanText ?? false;

  const graphA = loadGraph(a, normalize, warnings);
  const graphB = loadGraph(b, normalize, warnings);

  const structural = matchingRatio(
    capped(structuralTokens(graphA), limit, "structural tokens", a.name, warnings),
    capped(structuralTokens(graphB), limit, "structural tokens", b.name, warnings),
  );
  const textual = matchingRatio(
    capped(textLines(a.text, clean), limit, "text lines", a.name, warnings),
    capped(textLines(b.text, clean), limit, "text lines", b.name, warnings),
  );

  return { structural, textual, graphs: [graphA, graphB], warnings };
}
