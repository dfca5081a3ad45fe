/**
 * JSON for `compare --json`: object keys in binary order so two runs over the
 * same diagrams print byte-identical reports. Arrays keep their order.
 */

import { stringCompareBinary } from "./stableSort.js";

export function stableStringify(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (typeof value === "boolean") return String(value);
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "null";
  if (typeof value === "string") return JSON.stringify(value);

  if (Array.isArray(value)) {
    return "[" + value.map((v: unknown) => stableStringify(v)).join(",") + "]";
  }

  if (typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => stringCompareBinary(a, b));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
  }

  return "null";
}
