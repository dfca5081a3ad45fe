import type { Warning } from "../graph/types.js";

export interface ModuleRef {
  name: string;
  version?: string;
}

export interface DumpEntry {
  line: number;
  producer: ModuleRef;
  consumer: ModuleRef;
}

export interface DumpParseResult {
  entries: DumpEntry[];
  warnings: Warning[];
}

/** "github.com/a/b@v1.2.0" -> { name, version }. Null when either side of "@" is empty. */
export function parseModuleRef(token: string): ModuleRef | null {
  const at = token.indexOf("@");
  if (at < 0) return token === "" ? null : { name: token };
  const name = token.slice(0, at);
  const version = token.slice(at + 1);
  if (name === "" || version === "") return null;
  return { name, version };
}

/**
 * Reads a "producer consumer" pair dump such as `go mod graph` output.
 * Blank lines and "#" comments are skipped; anything else that is not exactly
 * two well-formed tokens becomes a warning.
 */
export function parseDump(text: string): DumpParseResult {
  const entries: DumpEntry[] = [];
  const warnings: Warning[] = [];

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = i + 1;
    const trimmed = lines[i].trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;

    const parts = trimmed.split(/\s+/);
    if (parts.length !== 2) {
      warnings.push({ line, message: `expected 2 tokens, found ${parts.length}`, text: trimmed });
      continue;
    }

    const producer = parseModuleRef(parts[0]);
    const consumer = parseModuleRef(parts[1]);
    if (producer === null || consumer === null) {
      warnings.push({ line, message: "malformed module@version token", text: trimmed });
      continue;
    }
    entries.push({ line, producer, consumer });
  }

  return { entries, warnings };
}
