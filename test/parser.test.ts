import assert from "node:assert";
import { test } from "node:test";
import { parseRoutes } from "../routes.parser";
import { canonicalExample, expectLeft, shape } from "./helpers";

function parseError(source: string): string {
  return expectLeft(parseRoutes(source)).message;
}

test("parses the canonical example in source order", function () {
  const table = parseRoutes(canonicalExample).unsafeCoerce();
  assert.strictEqual(table.base, null);
  assert.deepStrictEqual(table.entries.map(shape), [
    { tag: "normal", path: "/", handler: ["index"], methods: ["GET"] },
    { tag: "normal", path: "/pastes", handler: ["paste", "pastes"], methods: ["GET"] },
    {
      tag: "normal",
      path: "/pastes/:id",
      handler: ["paste", "paste"],
      methods: ["GET", "POST"],
    },
    { tag: "nested", mountPath: "/admin", endpoint: " admin.buildRoutes() " },
  ]);
});

test("records where each route starts", function () {
  const table = parseRoutes(`{ "/" index GET\n  *"/a" { a } }`).unsafeCoerce();
  assert.deepStrictEqual(
    table.entries.map((e) => e.position),
    [
      { offset: 2, line: 1, column: 3 },
      { offset: 18, line: 2, column: 3 },
    ]
  );
});

test("keeps the order methods were written in", function () {
  const table = parseRoutes(`{ "/b" s3::bucket DELETE PUT GET POST }`).unsafeCoerce();
  assert.deepStrictEqual(table.entries.map(shape), [
    {
      tag: "normal",
      path: "/b",
      handler: ["s3", "bucket"],
      methods: ["DELETE", "PUT", "GET", "POST"],
    },
  ]);
});

test("takes a leading expression as the base router", function () {
  const table = parseRoutes(`app.routes(), { "/" index GET }`).unsafeCoerce();
  assert.deepStrictEqual(table.base, {
    code: "app.routes()",
    position: { offset: 0, line: 1, column: 1 },
  });
  assert.strictEqual(table.entries.length, 1);
});

test("does not split the base expression on nested commas", function () {
  const table = parseRoutes(`withDefaults(new Route(), { a: 1 }), {}`).unsafeCoerce();
  assert.strictEqual(table.base?.code, "withDefaults(new Route(), { a: 1 })");
  assert.deepStrictEqual(table.entries, []);
});

test("keeps type arguments of the base expression", function () {
  const table = parseRoutes(`Route.create<Ctx, State>(), { "/" index GET }`).unsafeCoerce();
  assert.strictEqual(table.base?.code, "Route.create<Ctx, State>()");
  assert.deepStrictEqual(table.entries.map(shape), [
    { tag: "normal", path: "/", handler: ["index"], methods: ["GET"] },
  ]);
});

test("accepts an empty route table", function () {
  assert.deepStrictEqual(parseRoutes("{}").unsafeCoerce(), { base: null, entries: [] });
});

test("accepts comments and single quoted strings", function () {
  const source = [
    "{",
    "  // home",
    `  '/it\\'s' index GET /* root */`,
    "}",
  ].join("\n");
  const table = parseRoutes(source).unsafeCoerce();
  assert.deepStrictEqual(table.entries.map(shape), [
    { tag: "normal", path: "/it's", handler: ["index"], methods: ["GET"] },
  ]);
});

test("rejects a missing closing brace", function () {
  assert.strictEqual(
    parseError(`{ "/" index GET`),
    "1:16: expected `}` closing the route table, found end of input"
  );
});

test("rejects a normal route without methods", function () {
  assert.strictEqual(
    parseError(`{ "/" index "/x" other GET }`),
    `1:13: expected HTTP method (GET, POST, PUT, DELETE), found string literal "/x"`
  );
  assert.strictEqual(
    parseError(`{ "/" index }`),
    "1:13: expected HTTP method (GET, POST, PUT, DELETE), found `}`"
  );
});

test("rejects path template segments that are not plain identifiers", function () {
  assert.strictEqual(
    parseError(`{ "/" foo::<T> GET }`),
    "1:12: expected identifier after `::`, found `<`"
  );
  assert.strictEqual(
    parseError(`{ "/" foo<T> GET }`),
    "1:10: expected HTTP method (GET, POST, PUT, DELETE), found `<`"
  );
  assert.strictEqual(
    parseError(`{ "/" 3d GET }`),
    "1:7: expected handler identifier, found `3`"
  );
  assert.strictEqual(
    parseError(`{ "/" GET GET }`),
    "1:7: expected handler identifier, found method `GET`"
  );
});

test("rejects a route starting with neither `*` nor a string", function () {
  assert.strictEqual(
    parseError(`{ index GET }`),
    "1:3: expected `*`, a string literal or `}`, found identifier `index`"
  );
  assert.strictEqual(
    parseError(`{ "/" index GET extra }`),
    "1:17: expected `*`, a string literal or `}`, found identifier `extra`"
  );
});

test("rejects a method bound twice on the same path", function () {
  assert.strictEqual(
    parseError(`{ "/" index GET POST GET }`),
    "1:22: expected a method not already bound on this path, found method `GET`"
  );
});

test("rejects nested routes without an endpoint", function () {
  assert.strictEqual(
    parseError(`{ *"/a" admin }`),
    "1:9: expected endpoint block `{ ... }`, found identifier `admin`"
  );
  assert.strictEqual(
    parseError(`{ *"/a" { } }`),
    "1:9: expected endpoint expression, found empty block"
  );
  assert.strictEqual(
    parseError(`{ * admin { a } }`),
    "1:5: expected mount path string literal, found identifier `admin`"
  );
});

test("rejects anything after the route table", function () {
  assert.strictEqual(
    parseError(`{ } x`),
    "1:5: expected end of input after the route table, found identifier `x`"
  );
});

test("rejects empty input and a base without its comma", function () {
  assert.strictEqual(
    parseError(""),
    "1:1: expected route table `{`, found end of input"
  );
  assert.strictEqual(parseError("app { }"), "1:5: expected `,`, found `{`");
  assert.strictEqual(parseError("app"), "1:4: expected `,`, found end of input");
  assert.strictEqual(
    parseError(", { }"),
    "1:1: expected router expression, found `,`"
  );
});

test("reports errors on the line they happen", function () {
  const error = expectLeft(parseRoutes(`{\n  "/" index GET\n  "/x" x\n}`));
  assert.deepStrictEqual(error.position, { offset: 27, line: 4, column: 1 });
  assert.strictEqual(error.expected, "HTTP method (GET, POST, PUT, DELETE)");
  assert.strictEqual(error.found, "`}`");
});
