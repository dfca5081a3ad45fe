/**
 * Error taxonomy. Per-line problems are returned as warnings and never thrown;
 * everything here aborts the current operation.
 */

export class ReflexionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Structurally unbalanced diagram (stray "}" or a block left open). */
export class ParseError extends ReflexionError {
  constructor(
    message: string,
    public readonly line: number,
    context?: Record<string, unknown>,
  ) {
    super(message, "PARSE_ERROR", { ...context, line });
  }
}

/** An edge was added before one of its endpoints. */
export class GraphError extends ReflexionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "GRAPH_ERROR", context);
  }
}

export type BuildErrorReason = "empty-dump" | "empty-graph" | "unknown-root";

export class BuildError extends ReflexionError {
  constructor(
    message: string,
    public readonly reason: BuildErrorReason,
    context?: Record<string, unknown>,
  ) {
    super(message, `BUILD_${reason.toUpperCase().replace(/-/g, "_")}`, context);
  }
}

/** A diagram offered for comparison has no nodes. */
export class EmptyDiagramError extends ReflexionError {
  constructor(public readonly source: string) {
    super(`${source}: diagram contains no nodes`, "EMPTY_DIAGRAM", { source });
  }
}

export class ConfigError extends ReflexionError {
  constructor(message: string, public readonly path?: string) {
    super(message, "CONFIG_ERROR", path !== undefined ? { path } : undefined);
  }
}

export class UsageError extends ReflexionError {
  constructor(message: string) {
    super(message, "USAGE_ERROR");
  }
}

export class InputError extends ReflexionError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly operation: "read" | "write",
  ) {
    super(message, `INPUT_${operation.toUpperCase()}_ERROR`, { path, operation });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
