/**
 * Identifier canonicalization shared by the parser, the normalizer and the
 * dependency builder.
 */

/** "Storage Layer" -> "storage_layer". Returns "" when nothing alphanumeric remains. */
export function canonicalSegment(label: string): string {
  return label
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Id for a declaration without alias: enclosing package labels and own label, joined by ".". */
export function canonicalLabelId(label: string, namespace: readonly string[]): string {
  const own = canonicalSegment(label);
  if (own === "") return "";
  return [...namespace.map(canonicalSegment).filter((s) => s !== ""), own].join(".");
}

/**
 * Case-folds and strips separators so cosmetic renames collapse:
 * "Podman-Core", "podman_core" and "PodmanCore" all become "podmancore".
 * Dots survive because they separate namespace levels.
 */
export function canonicalId(id: string): string {
  const folded = id
    .toLowerCase()
    .replace(/[^a-z0-9.]+/g, "")
    .replace(/\.{2,}/g, ".")
    .replace(/^\.+|\.+$/g, "");
  return folded === "" ? id.toLowerCase() : folded;
}

/** Dependency-dump ids: every non-alphanumeric becomes "_" (github.com/a/b -> github_com_a_b). */
export function safeId(name: string): string {
  return name.replace(/[^A-Za-z0-9]/g, "_");
}

/** Allow/deny-list prefixes are compared in safe-id space; a trailing "/" is ignored. */
export function safePrefix(prefix: string): string {
  return safeId(prefix.replace(/\/+$/, ""));
}
