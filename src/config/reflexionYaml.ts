/**
 * .reflexion.yml loader (v1, frozen schema). Sections: build, normalize, compare.
 * Command-line flags override what is loaded here.
 */

import { readFileSync, existsSync } from "fs";
import { isAbsolute, join } from "path";
import { parse } from "yaml";
import { DEFAULT_TITLE, DIAGRAM_FORMATS, type DiagramFormat } from "../depgraph/renderDependencyDiagram.js";
import { ConfigError, errorMessage } from "../errors/index.js";
import { DEFAULT_MAX_TOKENS } from "../similarity/score.js";

export const CONFIG_FILE = ".reflexion.yml";
export const CONFIG_ENV = "REFLEXION_CONFIG";

const SECTION_KEYS = {
  build: new Set([
    "packages",
    "hidePackages",
    "removeIsolated",
    "showVersion",
    "maxDepth",
    "directOf",
    "projectAliases",
    "format",
    "title",
  ]),
  normalize: new Set(["canonicalizeIds", "collapse", "pruneIsolated"]),
  compare: new Set(["precision", "maxTokens", "cleanText"]),
} as const;

type Section = keyof typeof SECTION_KEYS;

const DEFAULT_PRECISION = 4;
const MAX_PRECISION = 10;

export interface BuildConfig {
  packages: string[];
  hidePackages: string[];
  removeIsolated: boolean;
  showVersion: boolean;
  maxDepth?: number;
  directOf?: string;
  projectAliases: boolean;
  format: DiagramFormat;
  title: string;
}

export interface NormalizeConfig {
  canonicalizeIds: boolean;
  /** Namespace prefixes with segments joined by "/". */
  collapse: string[];
  pruneIsolated: boolean;
}

export interface CompareConfig {
  precision: number;
  maxTokens: number;
  cleanText: boolean;
}

export interface ReflexionConfig {
  build: BuildConfig;
  normalize: NormalizeConfig;
  compare: CompareConfig;
}

export function defaultConfig(): ReflexionConfig {
  return {
    build: {
      packages: [],
      hidePackages: [],
      removeIsolated: false,
      showVersion: false,
      projectAliases: false,
      format: "plantuml",
      title: DEFAULT_TITLE,
    },
    normalize: { canonicalizeIds: true, collapse: [], pruneIsolated: false },
    compare: { precision: DEFAULT_PRECISION, maxTokens: DEFAULT_MAX_TOKENS, cleanText: false },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Field reader bound to one section; every failure names the offending key. */
class SectionReader {
  constructor(
    private readonly file: string,
    private readonly section: Section,
    private readonly values: Record<string, unknown>,
  ) {
    for (const key of Object.keys(values)) {
      if (!SECTION_KEYS[section].has(key)) {
        throw new ConfigError(`${file}: unknown key "${section}.${key}" (v1 schema is frozen)`, file);
      }
    }
  }

  private invalid(key: string, expected: string): ConfigError {
    return new ConfigError(`${this.file}: ${this.section}.${key} must be ${expected}`, this.file);
  }

  boolean(key: string, fallback: boolean): boolean {
    const v = this.values[key];
    if (v === undefined) return fallback;
    if (typeof v !== "boolean") throw this.invalid(key, "true or false");
    return v;
  }

  string(key: string): string | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (typeof v !== "string" || v.trim() === "") throw this.invalid(key, "a non-empty string");
    return v;
  }

  strings(key: string): string[] {
    const v = this.values[key];
    if (v === undefined) return [];
    if (!Array.isArray(v)) throw this.invalid(key, "an array of strings");
    return v.map((item: unknown, i) => {
      if (typeof item !== "string") throw this.invalid(`${key}[${i}]`, "a string");
      return item;
    });
  }

  integer(key: string, min: number, max: number = Number.MAX_SAFE_INTEGER): number | undefined {
    const v = this.values[key];
    if (v === undefined) return undefined;
    if (typeof v !== "number" || !Number.isInteger(v) || v < min || v > max) {
      const range = max === Number.MAX_SAFE_INTEGER ? `an integer >= ${min}` : `an integer between ${min} and ${max}`;
      throw this.invalid(key, range);
    }
    return v;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[], fallback: T): T {
    const v = this.values[key];
    if (v === undefined) return fallback;
    const match = allowed.find((a) => a === v);
    if (match === undefined) throw this.invalid(key, `one of ${allowed.join(", ")}`);
    return match;
  }
}

function section(file: string, root: Record<string, unknown>, name: Section): SectionReader {
  const value = root[name];
  if (value === undefined || value === null) return new SectionReader(file, name, {});
  if (!isRecord(value)) throw new ConfigError(`${file}: ${name} must be a mapping`, file);
  return new SectionReader(file, name, value);
}

/** Validates already-parsed YAML. Exported for callers that hold the document in memory. */
export function validateConfig(raw: unknown, file: string = CONFIG_FILE): ReflexionConfig {
  const defaults = defaultConfig();
  if (raw === null || raw === undefined) return defaults;
  if (!isRecord(raw)) throw new ConfigError(`${file}: root must be a mapping`, file);

  for (const key of Object.keys(raw)) {
    if (!(key in SECTION_KEYS)) {
      throw new ConfigError(`${file}: unknown key "${key}" (v1 schema is frozen)`, file);
    }
  }

  const build = section(file, raw, "build");
  const normalize = section(file, raw, "normalize");
  const compare = section(file, raw, "compare");

  const buildConfig: BuildConfig = {
    packages: build.strings("packages"),
    hidePackages: build.strings("hidePackages"),
    removeIsolated: build.boolean("removeIsolated", defaults.build.removeIsolated),
    showVersion: build.boolean("showVersion", defaults.build.showVersion),
    projectAliases: build.boolean("projectAliases", defaults.build.projectAliases),
    format: build.oneOf("format", DIAGRAM_FORMATS, defaults.build.format),
    title: build.string("title") ?? defaults.build.title,
  };
  const maxDepth = build.integer("maxDepth", 0);
  if (maxDepth !== undefined) buildConfig.maxDepth = maxDepth;
  const directOf = build.string("directOf");
  if (directOf !== undefined) buildConfig.directOf = directOf;

  return {
    build: buildConfig,
    normalize: {
      canonicalizeIds: normalize.boolean("canonicalizeIds", defaults.normalize.canonicalizeIds),
      collapse: normalize.strings("collapse"),
      pruneIsolated: normalize.boolean("pruneIsolated", defaults.normalize.pruneIsolated),
    },
    compare: {
      precision: compare.integer("precision", 0, MAX_PRECISION) ?? defaults.compare.precision,
      maxTokens: compare.integer("maxTokens", 1) ?? defaults.compare.maxTokens,
      cleanText: compare.boolean("cleanText", defaults.compare.cleanText),
    },
  };
}

/**
 * Load and validate the configuration.
 * Lookup: explicit path, then $REFLEXION_CONFIG, then .reflexion.yml in cwd.
 * A missing default file yields the defaults; a missing named file is an error.
 * Invalid YAML, unknown keys or bad values throw ConfigError (caller exits 2).
 */
export function loadReflexionConfig(
  cwd: string,
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ReflexionConfig {
  const candidate = explicitPath ?? env[CONFIG_ENV];
  const named = candidate !== undefined && candidate !== "" ? candidate : undefined;
  const path = named === undefined ? join(cwd, CONFIG_FILE) : isAbsolute(named) ? named : join(cwd, named);

  if (!existsSync(path)) {
    if (named !== undefined) {
      throw new ConfigError(`${named}: configuration file not found`, path);
    }
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigError(`${path}: invalid YAML: ${errorMessage(err)}`, path);
  }
  return validateConfig(raw, path);
}
