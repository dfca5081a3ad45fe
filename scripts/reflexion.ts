#!/usr/bin/env node
/**
 * reflexion CLI.
 * Usage: reflexion build <dump> <out> [options]
 *        reflexion compare <a> <b> [options]
 */

import { runBuild, BUILD_USAGE } from "../src/cli/runBuild.js";
import { runCompare, COMPARE_USAGE } from "../src/cli/runCompare.js";

function main(argv: string[]): number {
  const [command, ...rest] = argv;
  switch (command) {
    case "build":
      return runBuild(rest, process.cwd());
    case "compare":
      return runCompare(rest, process.cwd());
    default:
      if (command !== undefined && command !== "--help" && command !== "-h") {
        console.error(`reflexion: unknown command "${command}"`);
      }
      console.error(BUILD_USAGE);
      console.error(COMPARE_USAGE);
      return command === "--help" || command === "-h" ? 0 : 2;
  }
}

process.exitCode = main(process.argv.slice(2));
