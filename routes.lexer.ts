import { isMethod, ParseError } from "./routes";
import type { Method, OpaqueCode } from "./routes";
import { checkAllCasesHandled, LineIndex } from "./utils";
import type { Position } from "./utils";

export type Punct = "::" | "{" | "}" | "*" | ",";

export type Token =
  | { tag: "string"; value: string; position: Position }
  | { tag: "ident"; name: string; position: Position }
  | { tag: "method"; method: Method; position: Position }
  | { tag: "punct"; punct: Punct; position: Position }
  | { tag: "other"; text: string; position: Position }
  | { tag: "eof"; position: Position };

export type TopLevelMarks = {
  commas: number[];
  semicolons: number[];
  // offsets of the `{` opening each top-level block
  blocks: number[];
  lineComments: number;
};

// block: stops right after the bracket that empties the initial stack
// all: walks to the end, recording what it meets outside of brackets
type ScanMode = { tag: "block" } | { tag: "all"; marks: TopLevelMarks };

function emptyMarks(): TopLevelMarks {
  return { commas: [], semicolons: [], blocks: [], lineComments: 0 };
}

const simpleEscapes: { [c: string]: string } = {
  n: "\n",
  r: "\r",
  t: "\t",
  b: "\b",
  f: "\f",
  v: "\v",
  "0": "\0",
};

const closers: { [c: string]: string } = { "(": ")", "[": "]", "{": "}" };

function isIdentStart(c: string): boolean {
  return /[A-Za-z_$]/.test(c);
}

function isIdentPart(c: string): boolean {
  return /[A-Za-z0-9_$]/.test(c);
}

export function describeToken(t: Token): string {
  if (t.tag === "string") {
    return "string literal " + JSON.stringify(t.value);
  } else if (t.tag === "ident") {
    return "identifier `" + t.name + "`";
  } else if (t.tag === "method") {
    return "method `" + t.method + "`";
  } else if (t.tag === "punct") {
    return "`" + t.punct + "`";
  } else if (t.tag === "other") {
    return "`" + t.text + "`";
  } else if (t.tag === "eof") {
    return "end of input";
  } else {
    return checkAllCasesHandled(t);
  }
}

/**
 * Scans route table source into tokens, one at a time.
 *
 * Works on the slice `[start, end)` of `source` so that positions stay
 * relative to the whole text (eg: a macro invocation inside a bigger file).
 *
 * Besides plain tokens, the lexer can capture opaque code: a balanced block,
 * or an expression running up to a top-level comma. Captured code is never
 * tokenized; brackets are only balanced while skipping over string, template
 * and comment contents.
 */
export class Lexer {
  private source: string;
  private end: number;
  private offset: number;
  private lines: LineIndex;
  private lookahead: Token | null = null;

  constructor(source: string, start = 0, end = source.length, lines?: LineIndex) {
    this.source = source;
    this.offset = start;
    this.end = end;
    this.lines = lines || new LineIndex(source);
  }

  peek(): Token {
    if (this.lookahead === null) {
      this.lookahead = this.scanToken();
    }
    return this.lookahead;
  }

  next(): Token {
    const t = this.peek();
    this.lookahead = null;
    return t;
  }

  /**
   * Captures a `{ ... }` block and returns what is between the braces, untouched.
   */
  readBlock(expected: string): OpaqueCode {
    const open = this.peek();
    if (open.tag !== "punct" || open.punct !== "{") {
      throw new ParseError(open.position, expected, describeToken(open));
    }
    const contentStart = open.position.offset + 1;
    const after = this.scanCode(contentStart, ["}"], { tag: "block" });
    this.lookahead = null;
    this.offset = after;
    return {
      code: this.source.slice(contentStart, after - 1),
      position: open.position,
    };
  }

  /**
   * Captures the code in front of a trailing `{ ... }` block: everything up to
   * (not including) the last top-level comma before the last top-level block.
   * Commas in type arguments, eg: `Route.create<A, B>()`, stay in the capture.
   * The comma itself is left for `next()`.
   */
  readExpression(expected: string): OpaqueCode {
    const first = this.peek();
    const start = first.position.offset;
    const marks = emptyMarks();
    this.scanCode(start, [], { tag: "all", marks });
    const block = marks.blocks[marks.blocks.length - 1];
    const commas =
      block === undefined ? marks.commas : marks.commas.filter((c) => c < block);
    const stop = commas[commas.length - 1];
    if (stop === undefined) {
      throw new ParseError(
        this.positionAt(block === undefined ? this.end : block),
        "`,`",
        block === undefined ? "end of input" : "`{`"
      );
    }
    const code = this.source.slice(start, stop).trimEnd();
    if (code === "") {
      throw new ParseError(first.position, expected, describeToken(first));
    }
    this.lookahead = null;
    this.offset = stop;
    return { code, position: first.position };
  }

  /**
   * Skips code up to the bracket closing one that was opened right before the
   * current offset, and returns the offset of that closing bracket.
   */
  closeBracket(closer: ")" | "]" | "}"): number {
    const after = this.scanCode(this.offset, [closer], { tag: "block" });
    this.lookahead = null;
    this.offset = after;
    return after - 1;
  }

  /**
   * Walks the rest of the input as opaque code and reports where it has
   * commas and semicolons outside of any bracket.
   */
  scanTopLevel(): TopLevelMarks {
    const marks = emptyMarks();
    this.offset = this.scanCode(this.offset, [], { tag: "all", marks });
    this.lookahead = null;
    return marks;
  }

  /**
   * Moves past whitespace and comments without reading the token behind them,
   * and returns where that token starts.
   */
  skipToCode(): number {
    this.offset = this.skipTrivia(this.offset);
    this.lookahead = null;
    return this.offset;
  }

  /**
   * Looks for the next match of the sticky `pattern` that starts in code, not
   * in a string, template or comment, and moves right past it.
   *
   * Meant for host source that only has to be walked, not understood: a quote
   * that is never closed on its line (eg: in JSX text) is skipped up to the
   * end of that line instead of failing.
   */
  findInCode(pattern: RegExp): { index: number; text: string } | null {
    let i = this.offset;
    while (i < this.end) {
      const c = this.source[i];
      if (c === '"' || c === "'") {
        i = this.skipLine(i);
      } else if (c === "`") {
        i = this.skipQuoted(i);
      } else if (c === "/" && (this.source[i + 1] === "/" || this.source[i + 1] === "*")) {
        i = this.skipTrivia(i);
      } else {
        pattern.lastIndex = i;
        const match = pattern.exec(this.source);
        if (match !== null && match.index === i) {
          this.lookahead = null;
          this.offset = i + match[0].length;
          return { index: i, text: match[0] };
        }
        i++;
      }
    }
    this.lookahead = null;
    this.offset = i;
    return null;
  }

  private positionAt(offset: number): Position {
    return this.lines.positionAt(offset);
  }

  private scanToken(): Token {
    const i = this.skipTrivia(this.offset);
    const position = this.positionAt(i);
    if (i >= this.end) {
      this.offset = i;
      return { tag: "eof", position };
    }
    const c = this.source[i];

    if (c === '"' || c === "'") {
      const { value, after } = this.scanString(i);
      this.offset = after;
      return { tag: "string", value, position };
    }
    if (isIdentStart(c)) {
      let j = i + 1;
      while (j < this.end && isIdentPart(this.source[j])) {
        j++;
      }
      const name = this.source.slice(i, j);
      this.offset = j;
      return isMethod(name)
        ? { tag: "method", method: name, position }
        : { tag: "ident", name, position };
    }
    if (c === ":" && this.source[i + 1] === ":" && i + 1 < this.end) {
      this.offset = i + 2;
      return { tag: "punct", punct: "::", position };
    }
    if (c === "{" || c === "}" || c === "*" || c === ",") {
      this.offset = i + 1;
      return { tag: "punct", punct: c, position };
    }
    this.offset = i + 1;
    return { tag: "other", text: c, position };
  }

  // Whitespace and comments
  private skipTrivia(from: number): number {
    let i = from;
    while (i < this.end) {
      const c = this.source[i];
      if (/\s/.test(c)) {
        i++;
      } else if (c === "/" && this.source[i + 1] === "/") {
        while (i < this.end && this.source[i] !== "\n") {
          i++;
        }
      } else if (c === "/" && this.source[i + 1] === "*") {
        i = this.skipBlockComment(i);
      } else {
        break;
      }
    }
    return i;
  }

  private skipBlockComment(from: number): number {
    const close = this.source.indexOf("*/", from + 2);
    if (close === -1 || close + 2 > this.end) {
      throw new ParseError(this.positionAt(this.end), "`*/`", "end of input");
    }
    return close + 2;
  }

  private scanString(from: number): { value: string; after: number } {
    const quote = this.source[from];
    let value = "";
    let i = from + 1;
    while (i < this.end) {
      const c = this.source[i];
      if (c === quote) {
        return { value, after: i + 1 };
      } else if (c === "\n") {
        break;
      } else if (c === "\\") {
        const { text, after } = this.scanEscape(i);
        value += text;
        i = after;
      } else {
        value += c;
        i++;
      }
    }
    const found = i < this.end ? "end of line" : "end of input";
    throw new ParseError(this.positionAt(i), "closing `" + quote + "`", found);
  }

  private scanEscape(from: number): { text: string; after: number } {
    if (from + 1 >= this.end) {
      throw new ParseError(this.positionAt(this.end), "escape sequence", "end of input");
    }
    const c = this.source[from + 1];
    if (c in simpleEscapes) {
      return { text: simpleEscapes[c], after: from + 2 };
    }
    if (c === "\n") {
      // line continuation
      return { text: "", after: from + 2 };
    }
    if (c === "\r") {
      return { text: "", after: this.source[from + 2] === "\n" ? from + 3 : from + 2 };
    }
    if (c === "x" || c === "u") {
      const braced = c === "u" && this.source[from + 2] === "{";
      const digitsStart = braced ? from + 3 : from + 2;
      const digitsEnd = braced
        ? this.source.indexOf("}", digitsStart)
        : digitsStart + (c === "x" ? 2 : 4);
      const digits = this.source.slice(digitsStart, digitsEnd);
      const codePoint = parseInt(digits, 16);
      if (
        digitsEnd === -1 ||
        digitsEnd > this.end ||
        !/^[0-9A-Fa-f]+$/.test(digits) ||
        codePoint > 0x10ffff
      ) {
        throw new ParseError(
          this.positionAt(from),
          "valid `\\" + c + "` escape",
          JSON.stringify(this.source.slice(from, Math.max(digitsEnd, digitsStart)))
        );
      }
      return {
        text: String.fromCodePoint(codePoint),
        after: braced ? digitsEnd + 1 : digitsEnd,
      };
    }
    return { text: c, after: from + 2 };
  }

  // Skips a string up to its closing quote or the end of its line
  private skipLine(from: number): number {
    const quote = this.source[from];
    let i = from + 1;
    while (i < this.end && this.source[i] !== "\n") {
      if (this.source[i] === "\\") {
        i += 2;
      } else if (this.source[i] === quote) {
        return i + 1;
      } else {
        i++;
      }
    }
    return Math.min(i, this.end);
  }

  // Skips a quoted string or template without decoding it
  private skipQuoted(from: number): number {
    const quote = this.source[from];
    let i = from + 1;
    while (i < this.end) {
      const c = this.source[i];
      if (c === "\\") {
        i += 2;
      } else if (c === quote) {
        return i + 1;
      } else if (quote === "`" && c === "$" && this.source[i + 1] === "{") {
        i = this.scanCode(i + 2, ["}"], { tag: "block" });
      } else if (c === "\n" && quote !== "`") {
        break;
      } else {
        i++;
      }
    }
    const found = i < this.end ? "end of line" : "end of input";
    throw new ParseError(this.positionAt(Math.min(i, this.end)), "closing `" + quote + "`", found);
  }

  /**
   * Walks over opaque code starting at `from`, see `ScanMode` for where it stops.
   */
  private scanCode(from: number, stack: string[], mode: ScanMode): number {
    let i = from;
    while (i < this.end) {
      const c = this.source[i];
      if (c === '"' || c === "'" || c === "`") {
        i = this.skipQuoted(i);
      } else if (c === "/" && this.source[i + 1] === "/") {
        if (mode.tag === "all") {
          mode.marks.lineComments++;
        }
        i = this.skipTrivia(i);
      } else if (c === "/" && this.source[i + 1] === "*") {
        i = this.skipTrivia(i);
      } else if (c in closers) {
        if (c === "{" && stack.length === 0 && mode.tag === "all") {
          mode.marks.blocks.push(i);
        }
        stack.push(closers[c]);
        i++;
      } else if (c === ")" || c === "]" || c === "}") {
        const expected = stack.pop();
        if (expected !== c) {
          throw new ParseError(
            this.positionAt(i),
            expected ? "`" + expected + "`" : "code",
            "`" + c + "`"
          );
        }
        i++;
        if (stack.length === 0 && mode.tag === "block") {
          return i;
        }
      } else if (stack.length === 0 && (c === "," || c === ";")) {
        if (mode.tag === "all") {
          (c === "," ? mode.marks.commas : mode.marks.semicolons).push(i);
        }
        i++;
      } else {
        i++;
      }
    }
    if (mode.tag === "all" && stack.length === 0) {
      return i;
    }
    const missing = stack.length > 0 ? "`" + stack[stack.length - 1] + "`" : "code";
    throw new ParseError(this.positionAt(this.end), missing, "end of input");
  }
}
