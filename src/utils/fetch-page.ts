/**
 * Fetch a page or image over HTTP with a timeout and identifying header
 */

import type { FetchedResource } from "../types";
import { FetchError, describeError } from "./errors";

export interface FetchOptions {
  timeout?: number;
  userAgent?: string;
}

const DEFAULT_TIMEOUT = 30000;

/**
 * Perform one GET request, following redirects
 *
 * The timeout covers both headers and body. Non-2xx responses, network
 * failures and timeouts all raise a FetchError; there is no retry here.
 */
export async function fetchResource(
  url: string,
  options: FetchOptions = {},
): Promise<FetchedResource> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const headers: Record<string, string> = {};
  if (options.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      headers,
      redirect: "follow",
      signal: controller.signal,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(`HTTP ${response.status}: ${response.statusText}`, {
        url,
        status: response.status,
      });
    }

    const body = Buffer.from(await response.arrayBuffer());
    return {
      url: response.url || url,
      body,
      contentType: response.headers.get("content-type"),
    };
  } catch (error) {
    if (error instanceof FetchError) throw error;
    if (controller.signal.aborted) {
      throw new FetchError(`Timed out after ${timeout}ms`, {
        url,
        cause: error,
        timedOut: true,
      });
    }
    throw new FetchError(describeError(error), { url, cause: error });
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetch a page and decode its body as text
 *
 * @returns The final URL after redirects (the base for relative links) and the markup
 */
export async function fetchPage(
  url: string,
  options: FetchOptions = {},
): Promise<{ url: string; body: string }> {
  const resource = await fetchResource(url, options);
  return { url: resource.url, body: resource.body.toString("utf-8") };
}
