import assert from "node:assert";
import { test } from "node:test";
import { deriveHandler, renderPathTemplate } from "../routes.handler";
import type { PathTemplate } from "../routes";

test("prefixes the last segment with the lowercased method", function () {
  assert.deepStrictEqual(deriveHandler(["s3", "bucket"], "POST"), ["s3", "post_bucket"]);
  assert.deepStrictEqual(deriveHandler(["index"], "GET"), ["get_index"]);
  assert.deepStrictEqual(deriveHandler(["api", "v1", "user"], "DELETE"), [
    "api",
    "v1",
    "delete_user",
  ]);
  assert.deepStrictEqual(deriveHandler(["upload"], "PUT"), ["put_upload"]);
});

test("leaves the template alone", function () {
  const template: PathTemplate = ["paste", "paste"];
  deriveHandler(template, "GET");
  assert.deepStrictEqual(template, ["paste", "paste"]);
});

test("joins segments with the configured separator", function () {
  assert.strictEqual(renderPathTemplate(["paste", "get_paste"], "."), "paste.get_paste");
  assert.strictEqual(renderPathTemplate(["paste", "get_paste"], "::"), "paste::get_paste");
  assert.strictEqual(renderPathTemplate(["get_index"], "."), "get_index");
});
