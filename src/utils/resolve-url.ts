import { ParseError } from "./errors";

/**
 * Resolve a possibly relative reference against a base URL and drop its fragment
 *
 * Query strings are kept, since they are sent over HTTP; fragments are not.
 *
 * @example
 * resolveUrl("3/4/some.png", "http://example.org/1/2") // "http://example.org/1/3/4/some.png"
 * resolveUrl("some.png?a=1&b#hash", "http://example.org/1/2/") // "http://example.org/1/2/some.png?a=1&b"
 */
export function resolveUrl(reference: string, baseUrl: string): string {
  if (!URL.canParse(reference, baseUrl)) {
    throw new ParseError(`Cannot resolve "${reference}" against ${baseUrl}`, {
      url: baseUrl,
    });
  }

  const url = new URL(reference, baseUrl);
  url.hash = "";
  return url.href;
}
