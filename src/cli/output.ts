/**
 * stdout carries results; stderr carries warnings and failures, each line
 * prefixed "reflexion <command>:".
 */

import { ConfigError, UsageError, errorMessage } from "../errors/index.js";
import type { Warning } from "../graph/types.js";

export type CommandName = "build" | "compare";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export function formatWarning(command: CommandName, warning: Warning & { source?: string }): string {
  const where = [warning.source, warning.line > 0 ? `line ${warning.line}` : undefined]
    .filter((part): part is string => part !== undefined)
    .join(" ");
  const prefix = where !== "" ? `warning ${where}: ` : "warning: ";
  const detail = warning.text !== "" ? ` (${warning.text})` : "";
  return `reflexion ${command}: ${prefix}${warning.message}${detail}`;
}

export function printWarnings(
  command: CommandName,
  warnings: ReadonlyArray<Warning & { source?: string }>,
  quiet: boolean,
): void {
  if (quiet) return;
  for (const w of warnings) console.error(formatWarning(command, w));
}

/** Prints the failure and maps it to an exit code: 2 for usage/config, 1 otherwise. */
export function reportFailure(command: CommandName, err: unknown, usage?: string): number {
  console.error(`reflexion ${command}: ${errorMessage(err)}`);
  if (err instanceof UsageError) {
    if (usage !== undefined) console.error(usage);
    return EXIT_USAGE;
  }
  return err instanceof ConfigError ? EXIT_USAGE : EXIT_FAILURE;
}
