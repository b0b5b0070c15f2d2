import { deriveHandler, renderPathTemplate } from "./routes.handler";
import { resolveOptions } from "./routes.config";
import type { CompilerOptions } from "./routes.config";
import { Lexer } from "./routes.lexer";
import type { NestedRoute, NormalRoute, RouteEntry, RouteTable } from "./routes";
import { checkAllCasesHandled } from "./utils";

// A block that starts with one of these holds statements, not a lone expression
const statementKeywords = new Set([
  "const",
  "let",
  "var",
  "return",
  "if",
  "for",
  "while",
  "do",
  "switch",
  "try",
  "throw",
  "function",
  "class",
  "import",
  "export",
]);

/**
 * Turns a route table into one builder chain expression, eg:
 *
 *   new Route()
 *     .at("/", get(get_index))
 *     .at("/pastes/:id", get(paste.get_paste).post(paste.post_paste))
 *     .nest("/admin", admin.routes())
 *
 * Entries are emitted in table order and never look at each other, so the same
 * table and options always give the same text.
 * `lineIndent` goes in front of every line after the first one, to line the
 * chain up with the code around it.
 */
export function generateRoutes(
  table: RouteTable,
  options?: Partial<CompilerOptions>,
  lineIndent = ""
): string {
  const opts = resolveOptions(options);
  const base = table.base === null ? opts.defaultBase : table.base.code.trim();
  const operations = table.entries.map((entry) => renderEntry(entry, opts));
  if (opts.layout === "inline") {
    return base + operations.join("");
  } else {
    return [base, ...operations.map((op) => lineIndent + opts.indent + op)].join("\n");
  }
}

function renderEntry(entry: RouteEntry, opts: CompilerOptions): string {
  if (entry.tag === "nested") {
    return renderNested(entry);
  } else if (entry.tag === "normal") {
    return renderNormal(entry, opts);
  } else {
    return checkAllCasesHandled(entry);
  }
}

function renderNested(route: NestedRoute): string {
  return `.nest(${JSON.stringify(route.mountPath)}, ${renderEndpoint(
    route.endpoint.code
  )})`;
}

function renderNormal(route: NormalRoute, opts: CompilerOptions): string {
  const chain = route.methods.reduce(function (acc, method) {
    const handler = renderPathTemplate(
      deriveHandler(route.handler, method),
      opts.pathSeparator
    );
    const fn = method.toLowerCase();
    return acc === ""
      ? `${opts.methodPrefix}${fn}(${handler})`
      : `${acc}.${fn}(${handler})`;
  }, "");
  return `.at(${JSON.stringify(route.path)}, ${chain})`;
}

const word = /[A-Za-z_$][A-Za-z0-9_$]*/y;

function wordAt(code: string, offset: number): string | null {
  word.lastIndex = offset;
  const match = word.exec(code);
  return match === null ? null : match[0];
}

// Whether the code starts with a statement rather than an expression.
// Only words are looked at, so nothing in the code gets decoded.
function startsWithStatement(code: string): boolean {
  const start = new Lexer(code).skipToCode();
  const keyword = wordAt(code, start);
  if (keyword === null || !statementKeywords.has(keyword)) {
    return false;
  }
  const after = new Lexer(code, start + keyword.length).skipToCode();
  const next = code.charAt(after);
  if (keyword === "import") {
    // import("./x"), import.meta
    return next !== "(" && next !== ".";
  } else if (keyword === "function") {
    return next !== "(";
  } else if (keyword === "class") {
    return next !== "{" && wordAt(code, after) !== "extends";
  }
  return true;
}

/**
 * A block holding a single expression is spliced in as that expression, without
 * its braces. Anything else becomes an immediately invoked arrow function: it
 * has to `return` the endpoint, unless its last statement is an expression
 * without a semicolon, which then gets returned.
 *
 * The code was captured and balanced by the parser, so this never fails.
 */
export function renderEndpoint(code: string): string {
  const marks = new Lexer(code).scanTopLevel();
  const lastSemicolon = marks.semicolons[marks.semicolons.length - 1];
  const trailingSemicolon =
    lastSemicolon !== undefined &&
    new Lexer(code, lastSemicolon + 1).skipToCode() === code.length;
  const expression = trailingSemicolon ? code.slice(0, lastSemicolon) : code;
  const otherSemicolons = marks.semicolons.length - (trailingSemicolon ? 1 : 0);

  if (otherSemicolons > 0 || startsWithStatement(expression)) {
    return `(() => {${returnTail(code, trailingSemicolon ? undefined : lastSemicolon)}})()`;
  }
  if (marks.lineComments > 0) {
    // keep the newline that ends the comment
    return `(${expression.trim()}\n)`;
  }
  if (marks.commas.length > 0) {
    return `(${expression.trim()})`;
  }
  return expression.trim();
}

// eg: ` const r = mk(); r ` -> ` const r = mk(); return r `
function returnTail(code: string, lastSemicolon: number | undefined): string {
  if (lastSemicolon === undefined) {
    return code;
  }
  const tail = code.slice(lastSemicolon + 1);
  if (startsWithStatement(tail)) {
    return code;
  }
  const tailStart = new Lexer(code, lastSemicolon + 1).skipToCode();
  return code.slice(0, tailStart) + "return " + code.slice(tailStart);
}
