import { afterEach, describe, expect, test, vi } from "vitest";
import { FetchError } from "../src/errors.js";
import { fetchHtmlWithRetries, HttpPageFetcher } from "../src/fetcher.js";

const URL_UNDER_TEST = "https://example.com/api/guide";
const SETTINGS = { timeoutMs: 1000, retries: 2, userAgent: "test-agent" };

const htmlResponse = (body: string, status = 200): Response =>
  new Response(body, {
    status,
    headers: { "content-type": "text/html; charset=utf-8" },
  });

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("fetchHtmlWithRetries", () => {
  test("retries server errors until a page arrives", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValueOnce(htmlResponse("down", 503))
      .mockResolvedValueOnce(htmlResponse("down", 502))
      .mockResolvedValueOnce(htmlResponse("<p>ok</p>"));
    vi.stubGlobal("fetch", fetchMock);

    const result = await fetchHtmlWithRetries(URL_UNDER_TEST, SETTINGS);

    expect(result).toEqual({ text: "<p>ok</p>", finalUrl: URL_UNDER_TEST });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  test("does not retry client errors", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(htmlResponse("missing", 404));
    vi.stubGlobal("fetch", fetchMock);

    const failure = await fetchHtmlWithRetries(URL_UNDER_TEST, SETTINGS).catch(
      (error: unknown) => error
    );

    expect(failure).toBeInstanceOf(FetchError);
    expect(failure).toMatchObject({ reason: "http_error", status: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("rejects non-HTML responses as navigation errors", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
      new Response("{}", { headers: { "content-type": "application/json" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      fetchHtmlWithRetries(URL_UNDER_TEST, SETTINGS)
    ).rejects.toMatchObject({ reason: "navigation_error", status: 200 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("maps an expired timer to a timeout failure", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            reject(new DOMException("The operation was aborted", "AbortError"));
          });
        })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      fetchHtmlWithRetries(URL_UNDER_TEST, { ...SETTINGS, timeoutMs: 10 })
    ).rejects.toMatchObject({
      reason: "timeout",
      message: "Timed out after 10ms",
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe("HttpPageFetcher", () => {
  test("turns the fetched HTML into a page result", async () => {
    vi.stubGlobal(
      "fetch",
      vi
        .fn<typeof fetch>()
        .mockResolvedValue(
          htmlResponse(
            '<html><head><title>Guide</title></head><body><a href="next">Next</a></body></html>'
          )
        )
    );

    const fetcher = new HttpPageFetcher(SETTINGS);
    await fetcher.open();
    const page = await fetcher.fetch(URL_UNDER_TEST);
    await fetcher.close();

    expect(page.url).toBe(URL_UNDER_TEST);
    expect(page.outboundLinks).toEqual(["https://example.com/api/next"]);
  });
});
