import type { Method, PathTemplate } from "./routes";

/**
 * Picks the concrete handler for one method of a route: the last segment of the
 * template gets the lowercased method as prefix.
 *
 * @example
 * deriveHandler(["s3", "bucket"], "POST"); // ["s3", "post_bucket"]
 * deriveHandler(["index"], "GET"); // ["get_index"]
 */
export function deriveHandler(
  template: PathTemplate,
  method: Method
): PathTemplate {
  const [head, ...rest] = template;
  const prefix = method.toLowerCase() + "_";
  if (rest.length === 0) {
    return [prefix + head];
  }
  const last = rest[rest.length - 1];
  return [head, ...rest.slice(0, -1), prefix + last];
}

export function renderPathTemplate(
  template: PathTemplate,
  separator: string
): string {
  return template.join(separator);
}
