import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchError } from "../src/domain/errors.js";
import { HttpPageFetcher } from "../src/infra/http/pageFetcher.js";

const fetcher = new HttpPageFetcher({ timeoutMs: 1000, userAgent: "test-agent" });

function stubResponse(status: number, contentType: string, body: string) {
  const fetchMock = vi.fn(
    async (_url: string, _init?: RequestInit) =>
      new Response(body, { status, headers: { "Content-Type": contentType } }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("HttpPageFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the HTML body with the user agent set", async () => {
    const fetchMock = stubResponse(200, "text/html; charset=utf-8", "<p>KitKat</p>");

    const page = await fetcher.fetchPage("https://example.com/products/kitkat");

    expect(page.status).toBe(200);
    expect(page.body).toBe("<p>KitKat</p>");
    expect(page.contentType).toBe("text/html; charset=utf-8");
    const headers = fetchMock.mock.calls[0][1]?.headers;
    expect(headers).toMatchObject({ "User-Agent": "test-agent" });
  });

  it("turns error statuses into FetchError with the status", async () => {
    stubResponse(503, "text/html", "busy");

    const error = await fetcher.fetchPage("https://example.com/").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ status: 503, message: "HTTP 503 for https://example.com/" });
  });

  it("cancels the body of an error response", async () => {
    const cancel = vi.fn();
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.enqueue(new TextEncoder().encode("<p>Not found</p>"));
      },
      cancel,
    });
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(body, { status: 404, headers: { "Content-Type": "text/html" } })),
    );

    await expect(fetcher.fetchPage("https://example.com/gone")).rejects.toThrow(
      "HTTP 404 for https://example.com/gone",
    );
    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it("rejects non-HTML documents", async () => {
    stubResponse(200, "application/pdf", "%PDF");

    await expect(fetcher.fetchPage("https://example.com/leaflet")).rejects.toThrow(
      "Unsupported content type application/pdf for https://example.com/leaflet",
    );
  });

  it("wraps network errors without a status", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    const error = await fetcher.fetchPage("https://example.com/").catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      status: undefined,
      message: "Fetch failed for https://example.com/: fetch failed",
    });
  });
});
