import { describe, it, expect, vi, afterEach } from "vitest";
import { fetchPage, fetchResource } from "./fetch-page";
import { FetchError } from "./errors";

function withUrl(response: Response, url: string): Response {
  Object.defineProperty(response, "url", { value: url });
  return response;
}

async function catchError(promise: Promise<unknown>): Promise<FetchError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof FetchError)) {
    throw new Error(`Expected a FetchError, got ${String(error)}`);
  }
  return error;
}

describe("fetchResource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body, content type and requested URL", async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response("<html></html>", {
          headers: { "content-type": "text/html; charset=utf-8" },
        }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const resource = await fetchResource("http://example.org/", {
      timeout: 1000,
      userAgent: "test-agent",
    });

    expect(resource.url).toBe("http://example.org/");
    expect(resource.body.toString("utf-8")).toBe("<html></html>");
    expect(resource.contentType).toBe("text/html; charset=utf-8");
    expect(fetchMock).toHaveBeenCalledWith(
      "http://example.org/",
      expect.objectContaining({
        headers: { "User-Agent": "test-agent" },
        redirect: "follow",
      }),
    );
  });

  it("reports the final URL after redirects", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        withUrl(new Response("ok"), "https://www.example.org/moved/"),
      ),
    );

    const page = await fetchPage("http://example.org/old");

    expect(page).toEqual({ url: "https://www.example.org/moved/", body: "ok" });
  });

  it("fails on non-2xx responses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        async () =>
          new Response("nope", { status: 404, statusText: "Not Found" }),
      ),
    );

    const error = await catchError(fetchResource("http://example.org/missing"));

    expect(error.message).toBe("HTTP 404: Not Found");
    expect(error.status).toBe(404);
    expect(error.url).toBe("http://example.org/missing");
    expect(error.timedOut).toBe(false);
  });

  it("releases the body of a failed response", async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("nope"));
      },
      cancel,
    });
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(body, { status: 503 })),
    );

    const error = await catchError(fetchResource("http://example.org/busy"));

    expect(error.status).toBe(503);
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("fails on network errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const error = await catchError(fetchResource("http://example.org/"));

    expect(error.message).toBe("fetch failed");
    expect(error.status).toBeUndefined();
    expect(error.cause).toBeInstanceOf(TypeError);
  });

  it("fails when the timeout elapses", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener("abort", () =>
              reject(new Error("This operation was aborted")),
            );
          }),
      ),
    );

    const error = await catchError(
      fetchResource("http://example.org/slow", { timeout: 20 }),
    );

    expect(error.timedOut).toBe(true);
    expect(error.message).toBe("Timed out after 20ms");
  });
});
