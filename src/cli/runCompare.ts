/**
 * reflexion compare: structural and textual similarity of two diagrams.
 * Exit 0 scored, 1 unreadable/unparseable/empty input, 2 bad usage or config.
 */

import { basename, dirname, extname, join, resolve } from "path";
import { loadReflexionConfig, type ReflexionConfig } from "../config/reflexionYaml.js";
import { UsageError } from "../errors/index.js";
import type { Graph } from "../graph/types.js";
import { parseNamespacePrefix } from "../normalize/normalizeGraph.js";
import { renderMermaid } from "../render/mermaid.js";
import { compareDiagrams, type CompareOptions, type SimilarityResult } from "../similarity/score.js";
import { stableStringify } from "../util/stableJson.js";
import { integerValue, parseArgs, type ParsedArgs } from "./args.js";
import { readText, writeText } from "./files.js";
import { EXIT_OK, printWarnings, reportFailure } from "./output.js";

export const COMPARE_USAGE =
  "usage: reflexion compare <a> <b> [--visualize] [--out-dir dir] [--collapse p...] " +
  "[--no-canonical-ids] [--prune-isolated] [--clean-text] [--precision N] [--json] " +
  "[--config path] [--quiet]";

const COMPARE_FLAGS = {
  boolean: ["visualize", "no-canonical-ids", "prune-isolated", "clean-text", "json", "quiet"],
  single: ["out-dir", "precision", "config"],
  multi: ["collapse"],
} as const;

const MAX_PRECISION = 10;

export const VIEW_SUFFIX = ".view.mmd";

interface CompareSettings {
  options: CompareOptions;
  precision: number;
}

function settingsFrom(config: ReflexionConfig, args: ParsedArgs): CompareSettings {
  const collapse = args.lists.get("collapse") ?? config.normalize.collapse;
  const precision = integerValue(args, "precision", 0) ?? config.compare.precision;
  if (precision > MAX_PRECISION) throw new UsageError(`--precision must be at most ${MAX_PRECISION}`);

  return {
    precision,
    options: {
      normalize: {
        canonicalizeIds: config.normalize.canonicalizeIds && !args.flags.has("no-canonical-ids"),
        collapse: collapse.map(parseNamespacePrefix).filter((p) => p.length > 0),
        pruneIsolated: config.normalize.pruneIsolated || args.flags.has("prune-isolated"),
      },
      maxTokens: config.compare.maxTokens,
      cleanText: config.compare.cleanText || args.flags.has("clean-text"),
    },
  };
}

/** "<dir>/arch.puml" -> "<dir or out-dir>/arch.view.mmd" */
export function viewPath(input: string, outDir: string | undefined): string {
  const name = basename(input, extname(input)) + VIEW_SUFFIX;
  return join(outDir ?? dirname(input), name);
}

function writeViews(
  cwd: string,
  inputs: readonly [string, string],
  graphs: readonly [Graph, Graph],
  outDir?: string,
): string[] {
  const dir = outDir !== undefined ? resolve(cwd, outDir) : undefined;
  return inputs.map((input, i) => {
    const path = viewPath(resolve(cwd, input), dir);
    writeText(path, renderMermaid(graphs[i], { title: basename(input) }));
    return path;
  });
}

function round(value: number, precision: number): number {
  return Number(value.toFixed(precision));
}

function jsonReport(inputs: readonly [string, string], result: SimilarityResult, precision: number): string {
  const [a, b] = result.graphs;
  return stableStringify({
    a: { path: inputs[0], nodes: a.nodes.length, edges: a.edges.length },
    b: { path: inputs[1], nodes: b.nodes.length, edges: b.edges.length },
    structural: round(result.structural, precision),
    textual: round(result.textual, precision),
    warnings: result.warnings.length,
  });
}

export function runCompare(argv: readonly string[], cwd: string): number {
  try {
    const args = parseArgs(argv, COMPARE_FLAGS);
    if (args.positionals.length !== 2) {
      throw new UsageError(`expected two diagram files, got ${args.positionals.length} argument(s)`);
    }
    const inputs: [string, string] = [args.positionals[0], args.positionals[1]];
    const { options, precision } = settingsFrom(loadReflexionConfig(cwd, args.values.get("config")), args);

    const result = compareDiagrams(
      { name: inputs[0], text: readText(resolve(cwd, inputs[0])) },
      { name: inputs[1], text: readText(resolve(cwd, inputs[1])) },
      options,
    );
    printWarnings("compare", result.warnings, args.flags.has("quiet"));

    if (args.flags.has("json")) {
      console.log(jsonReport(inputs, result, precision));
    } else {
      console.log(`Similarity score using structural approach: ${result.structural.toFixed(precision)}`);
      console.log(`Similarity score using textual approach: ${result.textual.toFixed(precision)}`);
    }

    if (args.flags.has("visualize")) {
      for (const path of writeViews(cwd, inputs, result.graphs, args.values.get("out-dir"))) {
        console.error(`reflexion compare: wrote ${path}`);
      }
    }
    return EXIT_OK;
  } catch (err) {
    return reportFailure("compare", err, COMPARE_USAGE);
  }
}
