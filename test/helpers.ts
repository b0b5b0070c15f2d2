import type { Either } from "purify-ts/Either";
import type { RouteEntry } from "../routes";

export function expectLeft<L, R>(e: Either<L, R>): L {
  if (e.isLeft()) {
    return e.extract();
  }
  throw new Error("Expected Left, got Right: " + JSON.stringify(e.extract()));
}

// Route entry without its positions, easier to compare
export function shape(entry: RouteEntry): object {
  if (entry.tag === "nested") {
    return { tag: "nested", mountPath: entry.mountPath, endpoint: entry.endpoint.code };
  } else {
    return {
      tag: "normal",
      path: entry.path,
      handler: [...entry.handler],
      methods: [...entry.methods],
    };
  }
}

export const canonicalExample = [
  `{ "/" index GET`,
  `  "/pastes" paste::pastes GET`,
  `  "/pastes/:id" paste::paste GET POST`,
  `  *"/admin" { admin.buildRoutes() } }`,
].join("\n");
