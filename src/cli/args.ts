import { UsageError } from "../errors/index.js";

export interface FlagSpec {
  /** Presence flags: --quiet */
  boolean?: readonly string[];
  /** One value: --title T or --title=T */
  single?: readonly string[];
  /** Following non-flag arguments, comma separated values allowed: --packages a b,c */
  multi?: readonly string[];
}

export interface ParsedArgs {
  positionals: string[];
  flags: Set<string>;
  values: Map<string, string>;
  lists: Map<string, string[]>;
}

function splitList(raw: string): string[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "");
}

const isFlag = (arg: string): boolean => arg.startsWith("--") && arg.length > 2;

/**
 * Hand-rolled flag parser. Flag names are given without the leading "--".
 * A multi flag written as --name=a,b takes only that value; written as
 * --name a b it takes every argument up to the next flag.
 */
export function parseArgs(argv: readonly string[], spec: FlagSpec): ParsedArgs {
  const booleans = new Set(spec.boolean ?? []);
  const singles = new Set(spec.single ?? []);
  const multis = new Set(spec.multi ?? []);
  const parsed: ParsedArgs = { positionals: [], flags: new Set(), values: new Map(), lists: new Map() };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--") {
      parsed.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!isFlag(arg)) {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq >= 0 ? arg.slice(2, eq) : arg.slice(2);
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    if (booleans.has(name)) {
      if (inline !== undefined) throw new UsageError(`--${name} takes no value`);
      parsed.flags.add(name);
    } else if (singles.has(name)) {
      const value = inline ?? argv[i + 1];
      if (value === undefined || (inline === undefined && isFlag(value))) {
        throw new UsageError(`--${name} requires a value`);
      }
      if (inline === undefined) i++;
      parsed.values.set(name, value);
    } else if (multis.has(name)) {
      const collected = parsed.lists.get(name) ?? [];
      if (inline !== undefined) {
        collected.push(...splitList(inline));
      } else {
        while (i + 1 < argv.length && !isFlag(argv[i + 1])) collected.push(...splitList(argv[++i]));
      }
      if (collected.length === 0) throw new UsageError(`--${name} requires at least one value`);
      parsed.lists.set(name, collected);
    } else {
      throw new UsageError(`unknown option --${name}`);
    }
  }

  return parsed;
}

export function integerValue(args: ParsedArgs, name: string, min: number): number | undefined {
  const raw = args.values.get(name);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isInteger(n) || n < min) {
    throw new UsageError(`--${name} must be an integer >= ${min}`);
  }
  return n;
}
