import type { EdgeStyle, NodeKind } from "../graph/types.js";
import { LineScanner } from "./scanner.js";

/**
 * One rule per line construct. Each rule either consumes the whole (trimmed)
 * line and returns a construct, or returns null without side effects.
 */

export type DeclaredKind = Exclude<NodeKind, "package" | "unknown">;

export type Endpoint =
  | { form: "name"; value: string }
  | { form: "bracket"; value: string };

export type IgnoredBlockKind = "note" | "legend" | "skinparam" | "body";

/** Marks a declaration as a node that is only known from relations. */
export const UNKNOWN_STEREOTYPE = "<<unknown>>";

export type Construct =
  | { type: "comment" }
  | { type: "block-comment"; closed: boolean }
  | { type: "directive" }
  | { type: "annotation"; alias?: string }
  | { type: "ignored-block"; kind: IgnoredBlockKind; alias?: string }
  | { type: "block-close" }
  | { type: "block-open"; label: string; alias?: string }
  | {
      type: "declaration";
      kind: DeclaredKind | "unknown";
      label: string;
      alias?: string;
      hasBody: boolean;
    }
  | {
      type: "relation";
      left: Endpoint;
      right: Endpoint;
      style: EdgeStyle;
      reversed: boolean;
      label?: string;
    };

const IDENTIFIER = /[\p{L}\p{N}_$]+(?:\.[\p{L}\p{N}_$]+)*/uy;
const BRACKET = /\[([^\]]+)\]/y;
const STEREOTYPE = /<<[^>]*>>/y;
const COLOR = /#[\w.]+/y;
const ARROW =
  /(<\||<|\*|o(?=[-.]))?([-.]+)(?:(\[[^\]]*\]|up|down|left|right|u|d|l|r)([-.]+))?(\|>|>|\*|o(?=[\s"[]|$))?/y;

const DIRECTIVES = [
  "@startuml",
  "@enduml",
  "title",
  "left to right direction",
  "top to bottom direction",
  "hide",
  "show",
  "scale",
  "caption",
  "header",
  "footer",
  "allowmixing",
] as const;

const CONTAINER_WORDS = [
  "package",
  "namespace",
  "folder",
  "frame",
  "node",
  "rectangle",
  "cloud",
  "database",
  "component",
] as const;

const DECLARATION_KINDS: ReadonlyArray<readonly [string, DeclaredKind]> = [
  ["abstract class", "class"],
  ["abstract", "class"],
  ["class", "class"],
  ["enum", "class"],
  ["entity", "class"],
  ["interface", "interface"],
  ["component", "component"],
  ["artifact", "component"],
  ["node", "component"],
  ["database", "component"],
  ["rectangle", "component"],
  ["cloud", "component"],
  ["folder", "component"],
  ["frame", "component"],
  ["actor", "component"],
];

const LEGEND_POSITION = /^((left|right|top|bottom|center)\s*){0,2}$/i;
const NOTE_ALIAS = /(?:^|\s)as\s+([\p{L}\p{N}_$]+(?:\.[\p{L}\p{N}_$]+)*)\s*$/u;

function identifier(s: LineScanner): string | null {
  const m = s.match(IDENTIFIER);
  return m ? m[0] : null;
}

function bracket(s: LineScanner): string | null {
  const m = s.match(BRACKET);
  return m ? m[1].trim() : null;
}

/** `as alias`, preceded by whitespace. */
function aliasClause(s: LineScanner): string | null {
  return s.attempt((t) => {
    if (!t.space()) return null;
    if (t.keyword(["as"]) === null) return null;
    if (!t.space()) return null;
    return identifier(t);
  });
}

/** Skips any number of stereotypes and colours; returns the stereotypes seen. */
function decorations(s: LineScanner): string[] {
  const stereotypes: string[] = [];
  for (;;) {
    const consumed = s.attempt((t) => {
      t.space();
      return t.match(STEREOTYPE) ?? t.match(COLOR);
    });
    if (consumed === null) return stereotypes;
    if (consumed[0].startsWith("<<")) stereotypes.push(consumed[0]);
  }
}

/** `as N1` on a note head; quoted text and anything after a colon are not searched. */
function noteAlias(rest: string): string | undefined {
  const head = rest.replace(/"[^"]*"/g, " ").split(":")[0];
  return NOTE_ALIAS.exec(head)?.[1];
}

function atEnd(s: LineScanner): boolean {
  s.space();
  return s.done;
}

export function comment(s: LineScanner): Construct | null {
  if (s.literal("/'")) {
    return { type: "block-comment", closed: s.rest().includes("'/") };
  }
  if (s.literal("'")) {
    s.rest();
    return { type: "comment" };
  }
  return null;
}

export function ignoredBlock(s: LineScanner): Construct | null {
  const word = s.keyword(["note", "legend", "skinparam"]);
  if (word === null) return null;
  const rest = s.rest().trim();
  switch (word) {
    case "note": {
      const alias = noteAlias(rest);
      if (rest.includes(":") || rest.includes('"')) {
        return alias !== undefined ? { type: "annotation", alias } : { type: "annotation" };
      }
      return alias !== undefined
        ? { type: "ignored-block", kind: "note", alias }
        : { type: "ignored-block", kind: "note" };
    }
    case "legend":
      return LEGEND_POSITION.test(rest) ? { type: "ignored-block", kind: "legend" } : { type: "directive" };
    default:
      return rest.endsWith("{") ? { type: "ignored-block", kind: "skinparam" } : { type: "directive" };
  }
}

export function directive(s: LineScanner): Construct | null {
  if (s.literal("!") || s.keyword(DIRECTIVES) !== null) {
    s.rest();
    return { type: "directive" };
  }
  return null;
}

export function blockClose(s: LineScanner): Construct | null {
  if (!s.literal("}")) return null;
  return atEnd(s) ? { type: "block-close" } : null;
}

export function blockOpen(s: LineScanner): Construct | null {
  if (s.keyword(CONTAINER_WORDS) === null || !s.space()) return null;
  const label = s.quoted() ?? identifier(s);
  if (label === null) return null;
  const alias = aliasClause(s);
  decorations(s);
  s.space();
  if (!s.literal("{") || !atEnd(s)) return null;
  return alias !== null ? { type: "block-open", label, alias } : { type: "block-open", label };
}

function declarationHead(s: LineScanner): { kind: DeclaredKind; label: string } | null {
  const shorthandComponent = bracket(s);
  if (shorthandComponent !== null) return { kind: "component", label: shorthandComponent };

  if (s.literal("()")) {
    s.space();
    const label = s.quoted() ?? identifier(s);
    return label !== null ? { kind: "interface", label } : null;
  }

  for (const [word, kind] of DECLARATION_KINDS) {
    const matched = s.attempt((t) => (t.keyword([word]) !== null && t.space() ? word : null));
    if (matched === null) continue;
    const label = s.quoted() ?? bracket(s) ?? identifier(s);
    return label !== null ? { kind, label } : null;
  }
  return null;
}

export function declaration(s: LineScanner): Construct | null {
  const head = declarationHead(s);
  if (head === null) return null;
  const alias = aliasClause(s);
  const kind = decorations(s).includes(UNKNOWN_STEREOTYPE) ? "unknown" : head.kind;
  s.space();
  let hasBody = false;
  if (s.literal("{")) {
    s.space();
    hasBody = !s.literal("}");
  }
  if (!atEnd(s)) return null;
  return alias !== null
    ? { type: "declaration", kind, label: head.label, alias, hasBody }
    : { type: "declaration", kind, label: head.label, hasBody };
}

function endpoint(s: LineScanner): Endpoint | null {
  const b = bracket(s);
  if (b !== null) return { form: "bracket", value: b };
  const id = identifier(s);
  return id !== null ? { form: "name", value: id } : null;
}

function nonEmpty(text: string | null): string | undefined {
  const trimmed = text?.trim() ?? "";
  return trimmed !== "" ? trimmed : undefined;
}

function arrowStyle(leftHead: string, body: string, rightHead: string): EdgeStyle {
  if (leftHead === "<|" || rightHead === "|>") return "inheritance";
  if (leftHead === "*" || leftHead === "o" || rightHead === "*" || rightHead === "o") {
    return "composition";
  }
  return body.includes(".") ? "dashed-dependency" : "solid-association";
}

export function relation(s: LineScanner): Construct | null {
  const left = endpoint(s);
  if (left === null) return null;
  s.space();
  const inlineBefore = s.quoted();
  s.space();

  const arrow = s.match(ARROW);
  if (arrow === null) return null;
  const leftHead = arrow[1] ?? "";
  const body = arrow[2] + (arrow[4] ?? "");
  const rightHead = arrow[5] ?? "";

  s.space();
  const inlineAfter = s.quoted();
  s.space();
  const right = endpoint(s);
  if (right === null) return null;
  s.space();

  let colonLabel: string | undefined;
  if (s.literal(":")) {
    const text = s.rest().trim();
    if (text !== "") colonLabel = text;
  }
  if (!atEnd(s)) return null;

  const reversed = (leftHead === "<" || leftHead === "<|") && rightHead !== ">" && rightHead !== "|>";
  const label = colonLabel ?? nonEmpty(inlineBefore) ?? nonEmpty(inlineAfter);
  const style = arrowStyle(leftHead, body, rightHead);
  return label !== undefined
    ? { type: "relation", left, right, style, reversed, label }
    : { type: "relation", left, right, style, reversed };
}

/**
 * Rules in the order they are tried. Relations go before directives so an
 * edge whose source id is a reserved word ("note --> x") stays an edge.
 */
const RULES: ReadonlyArray<(s: LineScanner) => Construct | null> = [
  comment,
  blockClose,
  relation,
  ignoredBlock,
  directive,
  blockOpen,
  declaration,
];

export function classifyLine(line: string): Construct | null {
  const s = new LineScanner(line.trim());
  for (const rule of RULES) {
    const construct = s.attempt(rule);
    if (construct !== null) return construct;
  }
  return null;
}
