import { Readable } from "node:stream";
import { setTimeout as delay } from "node:timers/promises";

import { SourceAuthError, SourceUnavailableError } from "../errors.js";
import { sourceLogger } from "../logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Retry and pacing settings for one rate-limited source.
 */
export interface FetchPolicy {
  /** Sent as `limit` on the first request of a paginated sequence. */
  pageSize: number;
  /** Pause between successful pages and between single-document requests. */
  pageDelayMs: number;
  /** Wait after an HTTP 429 before retrying the same URL. */
  rateLimitCooldownMs: number;
  /** One retry per entry after a network failure, then give up. */
  networkRetryDelaysMs: number[];
}

export const DEFAULT_FETCH_POLICY: FetchPolicy = {
  pageSize: 250,
  pageDelayMs: 500,
  rateLimitCooldownMs: 60_000,
  networkRetryDelaysMs: [2000, 5000, 15_000],
};

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RequestOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface FetchAllOptions extends RequestOptions {
  /** Key of the item array in each page body, e.g. "bills". */
  itemsKey: string;
  pageSize?: number;
}

export interface SourcePage {
  url: string;
  items: unknown[];
  body: Record<string, unknown>;
}

export interface FetcherOptions {
  policy?: Partial<FetchPolicy>;
  fetch?: FetchFn;
  sleep?: SleepFn;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Continuation link from a page body (`pagination.next`).
 */
export function readNextLink(body: Record<string, unknown>): string | null {
  const pagination = body.pagination;
  if (!isRecord(pagination)) {
    return null;
  }
  const next = pagination.next;
  return typeof next === "string" && next !== "" ? next : null;
}

function isAuthFailure(status: number): boolean {
  return status === 401 || status === 403;
}

// ============================================================================
// Paginated Fetcher
// ============================================================================

export class PaginatedFetcher {
  readonly policy: FetchPolicy;
  private readonly fetchFn: FetchFn;
  private readonly sleep: SleepFn;

  constructor(options: FetcherOptions = {}) {
    this.policy = { ...DEFAULT_FETCH_POLICY, ...options.policy };
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Lazily walk a paginated JSON source.
   *
   * The sequence ends on an empty page, a missing `pagination.next`, a 404
   * (nothing upstream) or any other non-200 status (partial result, logged).
   * 429 responses are retried after the cool-down until the signal aborts.
   */
  async *fetchAll(
    initialUrl: string,
    options: FetchAllOptions
  ): AsyncGenerator<SourcePage, void, undefined> {
    const firstUrl = new URL(initialUrl);
    firstUrl.searchParams.set(
      "limit",
      String(options.pageSize ?? this.policy.pageSize)
    );

    let nextUrl: string | null = firstUrl.toString();
    let pageCount = 0;

    while (nextUrl !== null) {
      if (pageCount > 0) {
        await this.pause(options.signal);
      }

      const url: string = nextUrl;
      const response = await this.request(url, options);

      // Bodies of responses we do not read still hold the connection
      if (!response.ok) {
        await response.body?.cancel();
      }
      if (response.status === 404) {
        sourceLogger.debug({ url }, "Source returned 404, no data upstream");
        return;
      }
      if (isAuthFailure(response.status)) {
        throw new SourceAuthError(url, response.status);
      }
      if (!response.ok) {
        sourceLogger.error(
          { url, status: response.status, statusText: response.statusText },
          "Unexpected status, ending page sequence"
        );
        return;
      }

      const body: unknown = await response.json();
      if (!isRecord(body)) {
        sourceLogger.warn({ url }, "Page body is not an object, ending sequence");
        return;
      }

      const rawItems = body[options.itemsKey];
      const items: unknown[] = Array.isArray(rawItems) ? rawItems : [];
      if (items.length === 0) {
        sourceLogger.debug({ url, pageCount }, "Empty page, sequence complete");
        return;
      }

      pageCount++;
      sourceLogger.debug(
        { url, page: pageCount, items: items.length },
        "Fetched page"
      );
      yield { url, items, body };

      nextUrl = readNextLink(body);
    }
  }

  /**
   * Fetch a single JSON document. Returns null on 404 or any other non-200.
   */
  async fetchDocument(
    url: string,
    options: RequestOptions = {}
  ): Promise<Record<string, unknown> | null> {
    const response = await this.fetchOk(url, options);
    if (response === null) {
      return null;
    }
    const body: unknown = await response.json();
    if (!isRecord(body)) {
      sourceLogger.warn({ url }, "Document body is not an object");
      return null;
    }
    return body;
  }

  /**
   * Fetch a whole text document (manifests, header definitions).
   */
  async fetchText(
    url: string,
    options: RequestOptions = {}
  ): Promise<string | null> {
    const response = await this.fetchOk(url, options);
    return response === null ? null : await response.text();
  }

  /**
   * Open a streaming download for bulk files that must not be buffered.
   */
  async openStream(
    url: string,
    options: RequestOptions = {}
  ): Promise<Readable | null> {
    const response = await this.fetchOk(url, options);
    if (response?.body == null) {
      return null;
    }
    return Readable.fromWeb(response.body);
  }

  /**
   * Inter-request pause for sources polled one document at a time.
   */
  async pause(signal?: AbortSignal): Promise<void> {
    if (this.policy.pageDelayMs > 0) {
      await this.sleep(this.policy.pageDelayMs, signal);
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async fetchOk(
    url: string,
    options: RequestOptions
  ): Promise<Response | null> {
    const response = await this.request(url, options);

    if (!response.ok) {
      await response.body?.cancel();
    }
    if (isAuthFailure(response.status)) {
      throw new SourceAuthError(url, response.status);
    }
    if (response.status === 404) {
      sourceLogger.debug({ url }, "Document not found upstream");
      return null;
    }
    if (!response.ok) {
      sourceLogger.error(
        { url, status: response.status, statusText: response.statusText },
        "Unexpected status fetching document"
      );
      return null;
    }
    return response;
  }

  /**
   * One logical request: 429 and network failures are retried here, every
   * other status is returned to the caller.
   */
  private async request(
    url: string,
    options: RequestOptions
  ): Promise<Response> {
    const { signal } = options;
    let networkFailures = 0;

    for (;;) {
      signal?.throwIfAborted();

      let response: Response;
      const startTime = performance.now();
      try {
        response = await this.fetchFn(url, {
          headers: { Accept: "application/json", ...options.headers },
          signal,
        });
      } catch (error) {
        if (signal?.aborted === true) {
          throw error;
        }
        const retryDelay = this.policy.networkRetryDelaysMs[networkFailures];
        networkFailures++;
        if (retryDelay === undefined) {
          sourceLogger.error(
            { url, attempts: networkFailures, error },
            "Network retries exhausted"
          );
          throw new SourceUnavailableError(url, networkFailures, {
            cause: error,
          });
        }
        sourceLogger.warn(
          { url, attempt: networkFailures, retryDelay, error },
          "Network failure, retrying"
        );
        await this.sleep(retryDelay, signal);
        continue;
      }

      const duration = Math.round(performance.now() - startTime);
      sourceLogger.debug(
        { url, status: response.status, duration: `${String(duration)}ms` },
        "Received response"
      );

      if (response.status === 429) {
        await response.body?.cancel();
        sourceLogger.warn(
          { url, cooldownMs: this.policy.rateLimitCooldownMs },
          "Rate limited, cooling down before retrying"
        );
        await this.sleep(this.policy.rateLimitCooldownMs, signal);
        continue;
      }

      return response;
    }
  }
}
