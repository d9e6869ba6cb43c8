import { describe, it, expect, vi } from "vitest";

import { SourceAuthError, SourceUnavailableError } from "../../../src/errors.js";
import {
  PaginatedFetcher,
  readNextLink,
  type FetchFn,
  type SleepFn,
} from "../../../src/scraper/fetcher.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * A response whose body reports whether the reader released it.
 */
function trackedResponse(status: number): {
  response: Response;
  cancelled: () => boolean;
} {
  let cancelled = false;
  const body = new ReadableStream<Uint8Array>({
    cancel() {
      cancelled = true;
    },
  });
  return {
    response: new Response(body, { status }),
    cancelled: () => cancelled,
  };
}

function createFetcher(fetchFn: FetchFn) {
  const sleep = vi.fn<SleepFn>().mockResolvedValue(undefined);
  const fetcher = new PaginatedFetcher({
    fetch: fetchFn,
    sleep,
    policy: {
      pageSize: 5,
      pageDelayMs: 10,
      rateLimitCooldownMs: 1000,
      networkRetryDelaysMs: [1, 2],
    },
  });
  return { fetcher, sleep };
}

async function collectItems(
  fetcher: PaginatedFetcher,
  url: string
): Promise<unknown[]> {
  const items: unknown[] = [];
  for await (const page of fetcher.fetchAll(url, { itemsKey: "bills" })) {
    items.push(...page.items);
  }
  return items;
}

describe("scraper/fetcher", () => {
  describe("readNextLink", () => {
    it("should read pagination.next", () => {
      expect(readNextLink({ pagination: { next: "https://api.test/p2" } })).toBe(
        "https://api.test/p2"
      );
    });

    it("should return null without a pagination block", () => {
      expect(readNextLink({ bills: [] })).toBeNull();
    });

    it("should return null for an empty next link", () => {
      expect(readNextLink({ pagination: { next: "" } })).toBeNull();
    });
  });

  describe("fetchAll", () => {
    it("should follow next links until a page has none", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(
          jsonResponse({
            bills: [{ n: 1 }, { n: 2 }],
            pagination: { next: "https://api.test/bill/119?offset=2" },
          })
        )
        .mockResolvedValueOnce(jsonResponse({ bills: [{ n: 3 }] }));
      const { fetcher, sleep } = createFetcher(fetchFn);

      const items = await collectItems(
        fetcher,
        "https://api.test/bill/119?format=json"
      );

      expect(items).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }]);
      expect(fetchFn).toHaveBeenCalledTimes(2);
      expect(fetchFn.mock.calls[0]?.[0]).toBe(
        "https://api.test/bill/119?format=json&limit=5"
      );
      expect(fetchFn.mock.calls[1]?.[0]).toBe(
        "https://api.test/bill/119?offset=2"
      );
      expect(sleep).toHaveBeenCalledTimes(1);
      expect(sleep).toHaveBeenCalledWith(10, undefined);
    });

    it("should stop at an empty page even with a next link", async () => {
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(
        jsonResponse({
          bills: [],
          pagination: { next: "https://api.test/bill/119?offset=5" },
        })
      );
      const { fetcher } = createFetcher(fetchFn);

      expect(await collectItems(fetcher, "https://api.test/bill/119")).toEqual(
        []
      );
      expect(fetchFn).toHaveBeenCalledTimes(1);
    });

    it("should treat 404 as an empty sequence", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({ error: "not found" }, 404));
      const { fetcher } = createFetcher(fetchFn);

      expect(await collectItems(fetcher, "https://api.test/bill/119")).toEqual(
        []
      );
    });

    it("should release the body of a 404 response", async () => {
      const { response, cancelled } = trackedResponse(404);
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(response);
      const { fetcher } = createFetcher(fetchFn);

      await collectItems(fetcher, "https://api.test/bill/119");

      expect(cancelled()).toBe(true);
    });

    it("should keep pages fetched before an unexpected status", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(
          jsonResponse({
            bills: [{ n: 1 }],
            pagination: { next: "https://api.test/bill/119?offset=1" },
          })
        )
        .mockResolvedValueOnce(jsonResponse({}, 500));
      const { fetcher } = createFetcher(fetchFn);

      expect(await collectItems(fetcher, "https://api.test/bill/119")).toEqual([
        { n: 1 },
      ]);
    });

    it("should retry the same URL after a rate limit cool-down", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({}, 429))
        .mockResolvedValueOnce(jsonResponse({ bills: [{ n: 1 }] }));
      const { fetcher, sleep } = createFetcher(fetchFn);

      expect(await collectItems(fetcher, "https://api.test/bill/119")).toEqual([
        { n: 1 },
      ]);
      expect(fetchFn.mock.calls[0]?.[0]).toBe(fetchFn.mock.calls[1]?.[0]);
      expect(sleep).toHaveBeenCalledWith(1000, undefined);
    });

    it("should raise SourceAuthError on 401", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({}, 401));
      const { fetcher } = createFetcher(fetchFn);

      await expect(
        collectItems(fetcher, "https://api.test/bill/119")
      ).rejects.toBeInstanceOf(SourceAuthError);
    });

    it("should give up after the configured network retries", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockRejectedValue(new TypeError("fetch failed"));
      const { fetcher, sleep } = createFetcher(fetchFn);

      await expect(
        collectItems(fetcher, "https://api.test/bill/119")
      ).rejects.toBeInstanceOf(SourceUnavailableError);
      expect(fetchFn).toHaveBeenCalledTimes(3);
      expect(sleep.mock.calls.map((call) => call[0])).toEqual([1, 2]);
    });

    it("should recover when a retry succeeds", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockRejectedValueOnce(new TypeError("fetch failed"))
        .mockResolvedValueOnce(jsonResponse({ bills: [{ n: 7 }] }));
      const { fetcher } = createFetcher(fetchFn);

      expect(await collectItems(fetcher, "https://api.test/bill/119")).toEqual([
        { n: 7 },
      ]);
    });

    it("should not request anything once the signal is aborted", async () => {
      const fetchFn = vi.fn<FetchFn>();
      const { fetcher } = createFetcher(fetchFn);
      const controller = new AbortController();
      controller.abort();

      const pages = fetcher.fetchAll("https://api.test/bill/119", {
        itemsKey: "bills",
        signal: controller.signal,
      });

      await expect(pages.next()).rejects.toThrow();
      expect(fetchFn).not.toHaveBeenCalled();
    });
  });

  describe("fetchDocument", () => {
    it("should return the JSON object body", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({ bill: { number: "1" } }));
      const { fetcher } = createFetcher(fetchFn);

      expect(await fetcher.fetchDocument("https://api.test/doc")).toEqual({
        bill: { number: "1" },
      });
    });

    it("should return null on 404", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({}, 404));
      const { fetcher } = createFetcher(fetchFn);

      expect(await fetcher.fetchDocument("https://api.test/doc")).toBeNull();
    });

    it("should release the body of an unexpected status", async () => {
      const { response, cancelled } = trackedResponse(500);
      const fetchFn = vi.fn<FetchFn>().mockResolvedValueOnce(response);
      const { fetcher } = createFetcher(fetchFn);

      expect(await fetcher.fetchDocument("https://api.test/doc")).toBeNull();
      expect(cancelled()).toBe(true);
    });

    it("should return null for a non-object body", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse([1, 2, 3]));
      const { fetcher } = createFetcher(fetchFn);

      expect(await fetcher.fetchDocument("https://api.test/doc")).toBeNull();
    });

    it("should raise SourceAuthError on 403", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(jsonResponse({}, 403));
      const { fetcher } = createFetcher(fetchFn);

      await expect(
        fetcher.fetchDocument("https://api.test/doc")
      ).rejects.toBeInstanceOf(SourceAuthError);
    });
  });

  describe("fetchText", () => {
    it("should return the raw body", async () => {
      const fetchFn = vi
        .fn<FetchFn>()
        .mockResolvedValueOnce(new Response("- name: Test\n"));
      const { fetcher } = createFetcher(fetchFn);

      expect(await fetcher.fetchText("https://example.test/a.yaml")).toBe(
        "- name: Test\n"
      );
    });
  });
});
