import { ParseError } from "../errors/index.js";
import { GraphBuilder } from "../graph/graph.js";
import { canonicalLabelId } from "../graph/identity.js";
import type { Graph, GraphNode, NodeId, NodeKind, Warning } from "../graph/types.js";
import { classifyLine, type Construct, type Endpoint, type IgnoredBlockKind } from "./grammar.js";

export interface DiagramParseResult {
  graph: Graph;
  warnings: Warning[];
}

interface OpenBlock {
  label: string;
  line: number;
}

interface IgnoredBlock {
  kind: IgnoredBlockKind;
  line: number;
  depth: number;
}

type RelationConstruct = Extract<Construct, { type: "relation" }>;

interface PendingRelation {
  relation: RelationConstruct;
  namespace: readonly string[];
  line: number;
}

/** Per-call parser state; nothing here outlives a parseDiagram() call. */
interface ParserState {
  builder: GraphBuilder;
  namespace: OpenBlock[];
  ignored: IgnoredBlock | null;
  blockCommentLine: number | null;
  labelIndex: Map<string, NodeId>;
  /** Aliases given to notes; relations touching one only attach the note. */
  noteAliases: Set<string>;
  relations: PendingRelation[];
  warnings: Warning[];
}

const END_NOTE = /^end\s*note$/i;
const END_LEGEND = /^end\s*legend$/i;

function warn(state: ParserState, line: number, message: string, text: string): void {
  state.warnings.push({ line, message, text: text.trim() });
}

function currentPath(state: ParserState): string[] {
  return state.namespace.map((b) => b.label);
}

function braceDelta(text: string): number {
  let delta = 0;
  for (const ch of text) {
    if (ch === "{") delta++;
    else if (ch === "}") delta--;
  }
  return delta;
}

/** Returns true while the line is swallowed by an open note/legend/skinparam/body block. */
function consumeIgnored(state: ParserState, trimmed: string): boolean {
  const block = state.ignored;
  if (block === null) return false;
  switch (block.kind) {
    case "note":
      if (END_NOTE.test(trimmed)) state.ignored = null;
      break;
    case "legend":
      if (END_LEGEND.test(trimmed)) state.ignored = null;
      break;
    case "skinparam":
    case "body":
      block.depth += braceDelta(trimmed);
      if (block.depth <= 0) state.ignored = null;
      break;
  }
  return true;
}

function declare(
  state: ParserState,
  kind: NodeKind,
  label: string,
  alias: string | undefined,
  line: number,
  text: string,
): void {
  const namespace = currentPath(state);
  const id = alias ?? canonicalLabelId(label, namespace);
  if (id === "") {
    warn(state, line, `declaration "${label}" has no usable identifier`, text);
    return;
  }

  const node: GraphNode = { id, label, kind, namespace };
  const existing = state.builder.get(id);
  if (existing === undefined) {
    state.builder.addNode(node);
  } else if (existing.kind === "package" && kind === "package") {
    return;
  } else {
    warn(state, line, `duplicate declaration of "${id}" (first kept)`, text);
    return;
  }
  if (!state.labelIndex.has(label)) state.labelIndex.set(label, id);
}

function structure(state: ParserState, construct: Construct, line: number, text: string): void {
  switch (construct.type) {
    case "comment":
    case "directive":
      return;
    case "block-comment":
      if (!construct.closed) state.blockCommentLine = line;
      return;
    case "annotation":
      if (construct.alias !== undefined) state.noteAliases.add(construct.alias);
      return;
    case "ignored-block":
      if (construct.alias !== undefined) state.noteAliases.add(construct.alias);
      state.ignored = { kind: construct.kind, line, depth: construct.kind === "skinparam" ? 1 : 0 };
      return;
    case "block-close": {
      const closed = state.namespace.pop();
      if (closed === undefined) {
        throw new ParseError(`line ${line}: "}" closes no open block`, line);
      }
      return;
    }
    case "block-open":
      declare(state, "package", construct.label, construct.alias, line, text);
      state.namespace.push({ label: construct.label, line });
      return;
    case "declaration":
      declare(state, construct.kind, construct.label, construct.alias, line, text);
      if (construct.hasBody) state.ignored = { kind: "body", line, depth: 1 };
      return;
    case "relation":
      state.relations.push({ relation: construct, namespace: currentPath(state), line });
      return;
    default: {
      const unreachable: never = construct;
      throw new Error(`unhandled construct ${JSON.stringify(unreachable)}`);
    }
  }
}

/**
 * Endpoint lookup order: exact id, canonical id inside the current package,
 * canonical id at top level, display label. Anything else becomes an
 * implicit node of kind "unknown".
 */
function resolve(state: ParserState, endpoint: Endpoint, namespace: readonly string[]): NodeId {
  const { builder } = state;
  const candidates =
    endpoint.form === "name"
      ? [endpoint.value, canonicalLabelId(endpoint.value, namespace), canonicalLabelId(endpoint.value, [])]
      : [canonicalLabelId(endpoint.value, namespace), canonicalLabelId(endpoint.value, [])];

  for (const id of candidates) {
    if (id !== "" && builder.has(id)) return id;
  }
  const byLabel = state.labelIndex.get(endpoint.value);
  if (byLabel !== undefined) return byLabel;

  const implicitId =
    endpoint.form === "name" ? endpoint.value : canonicalLabelId(endpoint.value, []) || endpoint.value;
  builder.addNode({ id: implicitId, label: endpoint.value, kind: "unknown", namespace: [] });
  return implicitId;
}

function isNote(state: ParserState, endpoint: Endpoint): boolean {
  if (endpoint.form !== "name") return false;
  return state.noteAliases.has(endpoint.value) && !state.builder.has(endpoint.value);
}

function connect(state: ParserState, pending: PendingRelation): void {
  const { relation, namespace } = pending;
  if (isNote(state, relation.left) || isNote(state, relation.right)) return;
  const left = resolve(state, relation.left, namespace);
  const right = resolve(state, relation.right, namespace);
  const [from, to] = relation.reversed ? [right, left] : [left, right];
  state.builder.addEdge(
    relation.label !== undefined
      ? { from, to, style: relation.style, label: relation.label }
      : { from, to, style: relation.style },
  );
}

/**
 * Parses diagram text into a graph. Malformed lines become warnings; only an
 * unbalanced package block throws ParseError.
 */
export function parseDiagram(text: string): DiagramParseResult {
  const state: ParserState = {
    builder: new GraphBuilder(),
    namespace: [],
    ignored: null,
    blockCommentLine: null,
    labelIndex: new Map(),
    noteAliases: new Set(),
    relations: [],
    warnings: [],
  };

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = i + 1;
    const raw = lines[i];
    const trimmed = raw.trim();

    if (state.blockCommentLine !== null) {
      if (trimmed.includes("'/")) state.blockCommentLine = null;
      continue;
    }
    if (consumeIgnored(state, trimmed)) continue;
    if (trimmed === "") continue;

    const construct = classifyLine(trimmed);
    if (construct === null) {
      warn(state, line, "unrecognized line", raw);
      continue;
    }
    structure(state, construct, line, raw);
  }

  const open = state.namespace[state.namespace.length - 1];
  if (open !== undefined) {
    throw new ParseError(`line ${open.line}: block "${open.label}" is never closed`, open.line, {
      label: open.label,
    });
  }
  if (state.blockCommentLine !== null) {
    warn(state, state.blockCommentLine, "unterminated block comment", lines[state.blockCommentLine - 1]);
  }
  if (state.ignored !== null) {
    warn(state, state.ignored.line, `unterminated ${state.ignored.kind} block`, lines[state.ignored.line - 1]);
  }

  for (const pending of state.relations) connect(state, pending);

  return { graph: state.builder.build(), warnings: state.warnings };
}
