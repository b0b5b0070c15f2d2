import { Either, Left, Right } from "purify-ts/Either";
import { describeToken, Lexer } from "./routes.lexer";
import type { Token } from "./routes.lexer";
import { ParseError } from "./routes";
import type {
  Method,
  NestedRoute,
  NormalRoute,
  OpaqueCode,
  PathTemplate,
  RouteEntry,
  RouteTable,
} from "./routes";
import type { LineIndex } from "./utils";

/*
Grammar:

  body    = [ EXPR "," ] "{" { route } "}" ;
  route   = "*" STRING BLOCK
          |     STRING path methods ;
  path    = IDENT { "::" IDENT } ;
  methods = method { method } ;
  method  = "GET" | "POST" | "PUT" | "DELETE" ;

The first token of a route (`*` or a string literal) is enough to pick the
production, so a single token of lookahead does the job and we never backtrack.
*/

export type SourceRange = {
  start: number;
  end: number;
  lines?: LineIndex;
};

const routeStart = "`*`, a string literal or `}`";
const methodNames = "HTTP method (GET, POST, PUT, DELETE)";

/**
 * Parses a route table.
 * Fails on the first syntax error, there is no partial table.
 *
 * @example
 * parseRoutes(`{ "/" index GET }`);
 * // Right({ base: null, entries: [{ tag: "normal", path: "/", handler: ["index"], methods: ["GET"], ... }] })
 */
export function parseRoutes(
  source: string,
  range?: SourceRange
): Either<ParseError, RouteTable> {
  try {
    return Right(parseRouteTable(source, range));
  } catch (err) {
    if (err instanceof ParseError) {
      return Left(err);
    }
    throw err;
  }
}

// Same as parseRoutes, but throws the ParseError
export function parseRouteTable(source: string, range?: SourceRange): RouteTable {
  const lexer = new Lexer(
    source,
    range ? range.start : 0,
    range ? range.end : source.length,
    range ? range.lines : undefined
  );
  return parseBody(lexer);
}

function fail(t: Token, expected: string): never {
  throw new ParseError(t.position, expected, describeToken(t));
}

function isPunct(t: Token, punct: string): boolean {
  return t.tag === "punct" && t.punct === punct;
}

function expectPunct(lexer: Lexer, punct: string): Token {
  const t = lexer.next();
  if (!isPunct(t, punct)) {
    fail(t, "`" + punct + "`");
  }
  return t;
}

function parseBody(lexer: Lexer): RouteTable {
  const first = lexer.peek();
  if (first.tag === "eof") {
    fail(first, "route table `{`");
  }

  let base: OpaqueCode | null = null;
  if (!isPunct(first, "{")) {
    base = lexer.readExpression("router expression");
    expectPunct(lexer, ",");
  }

  expectPunct(lexer, "{");
  const entries: RouteEntry[] = [];
  while (true) {
    const t = lexer.peek();
    if (isPunct(t, "}")) {
      lexer.next();
      break;
    } else if (isPunct(t, "*")) {
      entries.push(parseNestedRoute(lexer));
    } else if (t.tag === "string") {
      entries.push(parseNormalRoute(lexer));
    } else if (t.tag === "eof") {
      fail(t, "`}` closing the route table");
    } else {
      fail(t, routeStart);
    }
  }

  const trailing = lexer.next();
  if (trailing.tag !== "eof") {
    fail(trailing, "end of input after the route table");
  }

  return { base, entries };
}

function parseNestedRoute(lexer: Lexer): NestedRoute {
  const star = lexer.next();
  const mountPath = lexer.next();
  if (mountPath.tag !== "string") {
    return fail(mountPath, "mount path string literal");
  }
  const endpoint = lexer.readBlock("endpoint block `{ ... }`");
  if (endpoint.code.trim() === "") {
    throw new ParseError(endpoint.position, "endpoint expression", "empty block");
  }
  return {
    tag: "nested",
    mountPath: mountPath.value,
    endpoint,
    position: star.position,
  };
}

function parseNormalRoute(lexer: Lexer): NormalRoute {
  const path = lexer.next();
  if (path.tag !== "string") {
    return fail(path, "path string literal");
  }
  const handler = parsePathTemplate(lexer);
  const methods = parseMethods(lexer);
  return {
    tag: "normal",
    path: path.value,
    handler,
    methods,
    position: path.position,
  };
}

function parsePathTemplate(lexer: Lexer): PathTemplate {
  const head = lexer.next();
  if (head.tag !== "ident") {
    return fail(head, "handler identifier");
  }
  const rest: string[] = [];
  while (isPunct(lexer.peek(), "::")) {
    lexer.next();
    const segment = lexer.next();
    if (segment.tag !== "ident") {
      return fail(segment, "identifier after `::`");
    }
    rest.push(segment.name);
  }
  return [head.name, ...rest];
}

function parseMethods(lexer: Lexer): [Method, ...Method[]] {
  const first = lexer.next();
  if (first.tag !== "method") {
    return fail(first, methodNames);
  }
  const methods: [Method, ...Method[]] = [first.method];
  let t = lexer.peek();
  while (t.tag === "method") {
    if (methods.includes(t.method)) {
      fail(t, "a method not already bound on this path");
    }
    methods.push(t.method);
    lexer.next();
    t = lexer.peek();
  }
  return methods;
}
