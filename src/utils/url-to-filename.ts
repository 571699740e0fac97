import { posix } from "node:path";

export interface StoragePath {
  directory: string;
  filename: string;
}

/**
 * Escape a string like a form component: unreserved characters are kept,
 * spaces become "+", everything else (including "/") is percent-encoded
 */
export function quotePlus(value: string): string {
  return encodeURIComponent(value)
    .replace(
      /[!'()*]/g,
      (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
    )
    .replace(/%20/g, "+");
}

/**
 * Move the query before the last suffix of the path, so the extension stays last
 */
function spliceQuery(path: string, query: string): string {
  if (!query) return path;

  const dir = posix.dirname(path);
  const base = posix.basename(path);
  const dot = base.lastIndexOf(".");
  const name =
    dot > 0
      ? `${base.slice(0, dot)}--${query}${base.slice(dot)}`
      : `${base}--${query}`;

  return dir === "." ? name : `${dir}/${name}`;
}

/**
 * Convert an absolute image URL into its storage location
 *
 * - Uses the hostname as directory
 * - Removes the leading slash from the path
 * - Moves the query before the path suffix
 *
 * @example
 * urlToFilename("https://sub.example.org/images/SomeExample.jpg?SomeParam=1")
 * // => { directory: "sub.example.org", filename: "images%2FSomeExample--SomeParam%3D1.jpg" }
 */
export function urlToFilename(url: string): StoragePath {
  const { hostname, pathname, search } = new URL(url);
  const path = pathname.slice(1) || "index";

  return {
    directory: hostname,
    filename: quotePlus(spliceQuery(path, search.slice(1))),
  };
}
