import { escapeRegExp } from "lodash";
import { Either, Left, Right } from "purify-ts/Either";
import { debuglog } from "util";
import { generateRoutes } from "./routes.codegen";
import { resolveOptions } from "./routes.config";
import type { CompilerOptions } from "./routes.config";
import { deriveHandler, renderPathTemplate } from "./routes.handler";
import { Lexer } from "./routes.lexer";
import { parseRouteTable, parseRoutes } from "./routes.parser";
import { ParseError } from "./routes";
import type { RouteTable } from "./routes";
import { checkAllCasesHandled, LineIndex } from "./utils";

const log = debuglog("routedef");

export type Expansion = {
  code: string;
  tables: RouteTable[];
};

/**
 * Compiles the text of one route table to a builder chain expression.
 *
 * @example
 * compileRoutes(`{ "/" index GET }`, { layout: "inline" });
 * // Right('new Route().at("/", get(get_index))')
 */
export function compileRoutes(
  source: string,
  options?: Partial<CompilerOptions>
): Either<ParseError, string> {
  return parseRoutes(source).map((table) => generateRoutes(table, options));
}

/**
 * Replaces every `defineRoutes!( ... )` invocation in a TypeScript source with
 * the code it stands for. Error positions point into `source`.
 *
 * Invocations written inside strings, templates or comments are left alone.
 */
export function expandMacros(
  source: string,
  options?: Partial<CompilerOptions>
): Either<ParseError, Expansion> {
  const opts = resolveOptions(options);
  const lines = new LineIndex(source);
  const invocation = new RegExp(
    `(?<![A-Za-z0-9_$])${escapeRegExp(opts.macroName)}!\\s*\\(`,
    "y"
  );
  const host = new Lexer(source, 0, source.length, lines);

  const tables: RouteTable[] = [];
  let code = "";
  let copiedUpTo = 0;
  try {
    let match = host.findInCode(invocation);
    while (match !== null) {
      const start = match.index;
      const argsStart = start + match.text.length;
      const argsEnd = host.closeBracket(")");
      const table = parseRouteTable(source, { start: argsStart, end: argsEnd, lines });
      const position = lines.positionAt(start);
      log(
        `Expanding ${opts.macroName}! at ${position.line}:${position.column} (${table.entries.length} routes)`
      );

      tables.push(table);
      code += source.slice(copiedUpTo, start);
      code += generateRoutes(table, opts, indentOfLine(source, start));
      copiedUpTo = argsEnd + 1;
      match = host.findInCode(invocation);
    }
  } catch (err) {
    if (err instanceof ParseError) {
      return Left(err);
    }
    throw err;
  }
  code += source.slice(copiedUpTo);

  return Right({ code, tables });
}

function indentOfLine(source: string, offset: number): string {
  const lineStart = source.lastIndexOf("\n", offset - 1) + 1;
  const indent = /^[ \t]*/.exec(source.slice(lineStart, offset));
  return indent === null ? "" : indent[0];
}

/**
 * One line per binding, for humans:
 *
 *   GET    /pastes/:id -> paste.get_paste
 *   POST   /pastes/:id -> paste.post_paste
 *   NEST   /admin
 */
export function listRoutes(
  table: RouteTable,
  options?: Partial<CompilerOptions>
): string[] {
  const opts = resolveOptions(options);
  const out: string[] = [];
  for (const entry of table.entries) {
    if (entry.tag === "nested") {
      out.push(`${"NEST".padEnd(6)} ${entry.mountPath}`);
    } else if (entry.tag === "normal") {
      for (const method of entry.methods) {
        const handler = renderPathTemplate(
          deriveHandler(entry.handler, method),
          opts.pathSeparator
        );
        out.push(`${method.padEnd(6)} ${entry.path} -> ${handler}`);
      }
    } else {
      checkAllCasesHandled(entry);
    }
  }
  return out;
}
