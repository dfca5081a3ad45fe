/**
 * reflexion build: dependency dump -> filtered component diagram.
 * Exit 0 written, 1 unreadable input or empty result, 2 bad usage or config.
 */

import { resolve } from "path";
import { loadReflexionConfig, type BuildConfig } from "../config/reflexionYaml.js";
import { buildDependencyGraph } from "../depgraph/buildDependencyGraph.js";
import { DIAGRAM_FORMATS, renderDependencyDiagram } from "../depgraph/renderDependencyDiagram.js";
import { UsageError } from "../errors/index.js";
import { integerValue, parseArgs, type ParsedArgs } from "./args.js";
import { readText, writeText } from "./files.js";
import { EXIT_OK, printWarnings, reportFailure } from "./output.js";

export const BUILD_USAGE =
  "usage: reflexion build <dump> <out> [--show-version] [--remove-isolated] [--packages p...] " +
  "[--hide-packages p...] [--max-depth N] [--direct-of module] [--project-aliases] " +
  "[--format plantuml|mermaid] [--title T] [--config path] [--quiet]";

const BUILD_FLAGS = {
  boolean: ["show-version", "remove-isolated", "project-aliases", "quiet"],
  single: ["max-depth", "direct-of", "format", "title", "config"],
  multi: ["packages", "hide-packages"],
} as const;

/** Flags override the configuration file. */
function mergeBuildConfig(base: BuildConfig, args: ParsedArgs): BuildConfig {
  const merged: BuildConfig = {
    ...base,
    packages: args.lists.get("packages") ?? base.packages,
    hidePackages: args.lists.get("hide-packages") ?? base.hidePackages,
    removeIsolated: base.removeIsolated || args.flags.has("remove-isolated"),
    showVersion: base.showVersion || args.flags.has("show-version"),
    projectAliases: base.projectAliases || args.flags.has("project-aliases"),
    title: args.values.get("title") ?? base.title,
  };

  const format = args.values.get("format");
  if (format !== undefined) {
    const known = DIAGRAM_FORMATS.find((f) => f === format);
    if (known === undefined) throw new UsageError(`--format must be one of ${DIAGRAM_FORMATS.join(", ")}`);
    merged.format = known;
  }
  const maxDepth = integerValue(args, "max-depth", 0);
  if (maxDepth !== undefined) merged.maxDepth = maxDepth;
  const directOf = args.values.get("direct-of");
  if (directOf !== undefined) merged.directOf = directOf;
  return merged;
}

export function runBuild(argv: readonly string[], cwd: string): number {
  try {
    const args = parseArgs(argv, BUILD_FLAGS);
    if (args.positionals.length !== 2) {
      throw new UsageError(`expected <dump> and <out>, got ${args.positionals.length} argument(s)`);
    }
    const [dumpArg, outArg] = args.positionals;
    const config = mergeBuildConfig(loadReflexionConfig(cwd, args.values.get("config")).build, args);

    const { graph, warnings } = buildDependencyGraph(readText(resolve(cwd, dumpArg)), config);
    printWarnings("build", warnings, args.flags.has("quiet"));

    const text = renderDependencyDiagram(graph, {
      format: config.format,
      title: config.title,
      showVersion: config.showVersion,
    });
    writeText(resolve(cwd, outArg), text);
    console.log(`reflexion build: wrote ${outArg} (${graph.nodes.length} nodes, ${graph.edges.length} edges)`);
    return EXIT_OK;
  } catch (err) {
    return reportFailure("build", err, BUILD_USAGE);
  }
}
