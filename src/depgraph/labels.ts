/**
 * Module naming helpers. Labels follow the "Organisation | Project" scheme
 * printed in the generated diagram legend.
 */

const HOST_PREFIX = /^github\.com\//;

function stripVersion(name: string): string {
  const at = name.indexOf("@");
  return at >= 0 ? name.slice(0, at) : name;
}

/** "github.com/containers/podman/v5@v5.0.1" -> "containers | podman/v5". */
export function simplifyLabel(moduleName: string): string {
  const simplified = stripVersion(moduleName.replace(HOST_PREFIX, "")).replace(/^\/+|\/+$/g, "");
  const slash = simplified.indexOf("/");
  if (slash < 0) return simplified;
  return `${simplified.slice(0, slash)} | ${simplified.slice(slash + 1)}`;
}

/**
 * Project-level alias: "rootless-containers | rootlesskit/v2" -> "rootlesskit_v2_".
 * The trailing "_" keeps aliases clear of diagram keywords.
 */
export function projectAlias(label: string): string {
  const bar = label.indexOf("|");
  const project = bar >= 0 ? label.slice(bar + 1).trim() : label;
  const bare = stripVersion(project.replace(HOST_PREFIX, "")).trim();
  const alias = bare.replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return `${alias}_`;
}
