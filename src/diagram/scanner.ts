/**
 * Cursor over a single diagram line. Grammar rules consume from it and
 * return null on mismatch; attempt() rewinds the cursor when a rule fails.
 */
export class LineScanner {
  pos = 0;

  constructor(readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  peek(): string {
    return this.text.charAt(this.pos);
  }

  /** Skips whitespace; returns whether any was consumed. */
  space(): boolean {
    const start = this.pos;
    while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) this.pos++;
    return this.pos > start;
  }

  /** Matches a sticky (y-flag) regex at the cursor. */
  match(re: RegExp): RegExpExecArray | null {
    re.lastIndex = this.pos;
    const m = re.exec(this.text);
    if (!m) return null;
    this.pos += m[0].length;
    return m;
  }

  literal(s: string): boolean {
    if (!this.text.startsWith(s, this.pos)) return false;
    this.pos += s.length;
    return true;
  }

  /** Case-insensitive keyword that must not run into an identifier character. */
  keyword(words: readonly string[]): string | null {
    const lower = this.text.toLowerCase();
    for (const word of words) {
      if (!lower.startsWith(word, this.pos)) continue;
      const next = this.text.charAt(this.pos + word.length);
      if (next !== "" && /[\p{L}\p{N}_]/u.test(next)) continue;
      this.pos += word.length;
      return word;
    }
    return null;
  }

  /** "double quoted" text, quotes removed. */
  quoted(): string | null {
    const m = this.match(QUOTED);
    return m ? m[1] : null;
  }

  rest(): string {
    const r = this.text.slice(this.pos);
    this.pos = this.text.length;
    return r;
  }

  attempt<T>(rule: (s: LineScanner) => T | null): T | null {
    const mark = this.pos;
    const result = rule(this);
    if (result === null) this.pos = mark;
    return result;
  }
}

const QUOTED = /"([^"]*)"/y;
