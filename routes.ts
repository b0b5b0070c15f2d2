import type { Position } from "./utils";

export type { Position } from "./utils";

export type Method = "GET" | "POST" | "PUT" | "DELETE";

export const allMethods: readonly Method[] = ["GET", "POST", "PUT", "DELETE"];

export function isMethod(s: string): s is Method {
  return allMethods.some((m) => m === s);
}

// Module-qualified handler name, eg: paste::pastes -> ["paste", "pastes"]
// The last segment is the one that gets rewritten per method
export type PathTemplate = readonly [string, ...string[]];

// Code we splice into the output without ever parsing it ourselves
export type OpaqueCode = {
  readonly code: string;
  readonly position: Position;
};

export type NestedRoute = {
  readonly tag: "nested";
  readonly mountPath: string;
  readonly endpoint: OpaqueCode;
  readonly position: Position;
};

export type NormalRoute = {
  readonly tag: "normal";
  readonly path: string;
  readonly handler: PathTemplate;
  readonly methods: readonly [Method, ...Method[]];
  readonly position: Position;
};

export type RouteEntry = NestedRoute | NormalRoute;

/**
 * Result of parsing one route table.
 * Entries are kept in source order: routers apply routes in registration order
 * when resolving overlaps, so the generated chain must follow the same order.
 *
 * A null `base` means the chain starts from a fresh, empty router.
 */
export type RouteTable = {
  readonly base: OpaqueCode | null;
  readonly entries: readonly RouteEntry[];
};

export class ParseError extends Error {
  public position: Position;
  public expected: string;
  public found: string;

  constructor(position: Position, expected: string, found: string) {
    super();
    this.name = "ParseError";
    this.position = position;
    this.expected = expected;
    this.found = found;
    this.message = `${position.line}:${position.column}: expected ${expected}, found ${found}`;
  }
}
