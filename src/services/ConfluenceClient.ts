/**
 * ConfluenceClient: pages, attachments and comments over Confluence REST v1.
 *
 * Every request goes through the rate limiter, carries Basic auth and a
 * timeout, and reports its latency. Space listings and single pages are
 * cached in memory. Failed requests are not retried.
 */

import { CONFLUENCE_DEFAULTS, HTTP_DEFAULTS, PROCESSING_DEFAULTS } from "../config/constants";
import type { ConfluenceCredentials } from "../config/ConfluenceConfig";
import { isConfluenceRagError } from "../errors/ConfluenceRagError";
import { ConfluenceRagNetworkError } from "../errors/NetworkError";
import { ConfluenceRagValidationError } from "../errors/ValidationError";
import { createLogger, type StructuredLogger } from "../utils/logger";
import { SlidingWindowRateLimiter } from "../utils/rateLimiter";
import { withAbortTimeout } from "../utils/timeout";
import { TtlCache, cacheKey } from "../utils/ttlCache";
import type { MetricsRecorder } from "./MetricsCollector";
import type { RawAttachment, RawComment, RawPage } from "./PageProcessor.types";

export interface ConfluenceClientOptions {
  timeoutMs?: number;
  rateLimiter?: SlidingWindowRateLimiter;
  metrics?: MetricsRecorder;
  logger?: StructuredLogger;
  spaceCache?: TtlCache<RawPage[]>;
  pageCache?: TtlCache<RawPage>;
}

export interface GetPageOptions {
  includeAttachments?: boolean;
  includeComments?: boolean;
}

const RATE_LIMIT_KEY = "confluence";

type Json = Record<string, unknown>;

function isJson(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Walk a JSON path; undefined as soon as a step is missing. */
function at(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isJson(current)) return undefined;
    current = current[key];
  }
  return current;
}

function str(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return "";
}

function num(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function results(body: unknown): unknown[] {
  const list = at(body, "results");
  return Array.isArray(list) ? list : [];
}

export class ConfluenceClient {
  private readonly baseUrl: string;
  private readonly authHeader: string;
  private readonly timeoutMs: number;
  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly metrics?: MetricsRecorder;
  private readonly log: StructuredLogger;
  private readonly spaceCache: TtlCache<RawPage[]>;
  private readonly pageCache: TtlCache<RawPage>;

  constructor(credentials: ConfluenceCredentials, options: ConfluenceClientOptions = {}) {
    this.baseUrl = credentials.baseUrl.replace(/\/+$/, "");
    this.authHeader =
      "Basic " + Buffer.from(`${credentials.username}:${credentials.apiToken}`).toString("base64");
    this.timeoutMs = options.timeoutMs ?? HTTP_DEFAULTS.TIMEOUT_MS;
    this.rateLimiter =
      options.rateLimiter ??
      new SlidingWindowRateLimiter(CONFLUENCE_DEFAULTS.RATE_LIMIT, CONFLUENCE_DEFAULTS.RATE_WINDOW_MS);
    this.metrics = options.metrics;
    this.log = options.logger ?? createLogger({ component: "ConfluenceClient" });
    this.spaceCache = options.spaceCache ?? new TtlCache<RawPage[]>(CONFLUENCE_DEFAULTS.SPACE_CACHE_TTL_MS);
    this.pageCache = options.pageCache ?? new TtlCache<RawPage>(CONFLUENCE_DEFAULTS.PAGE_CACHE_TTL_MS);
  }

  private buildHeaders(): Headers {
    return new Headers({
      authorization: this.authHeader,
      accept: "application/json",
      "user-agent": HTTP_DEFAULTS.USER_AGENT,
    });
  }

  private async getJson(path: string, query: Record<string, string | number> = {}): Promise<Json> {
    const url = new URL(`${this.baseUrl}/wiki/rest/api/${path}`);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, String(value));
    }
    const endpoint = url.toString();

    if (!this.rateLimiter.tryAcquire(RATE_LIMIT_KEY)) {
      this.metrics?.recordError?.("rate_limited");
      throw ConfluenceRagNetworkError.rateLimited(endpoint, this.rateLimiter.windowLength);
    }

    const startedAt = Date.now();
    try {
      const res = await withAbortTimeout(this.timeoutMs, (signal) =>
        fetch(endpoint, { method: "GET", headers: this.buildHeaders(), signal })
      );
      if (!res.ok) {
        throw ConfluenceRagNetworkError.apiError(endpoint, res.status, res.statusText || "");
      }
      const body: unknown = await res.json();
      if (!isJson(body)) {
        throw ConfluenceRagValidationError.invalidFormat("response", "JSON object", typeof body, {
          operation: "confluenceRequest",
          url: endpoint,
        });
      }
      return body;
    } catch (error) {
      this.metrics?.recordError?.(PROCESSING_DEFAULTS.METRIC_CONFLUENCE_REQUEST);
      if (isConfluenceRagError(error)) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        throw ConfluenceRagNetworkError.timeout(endpoint, this.timeoutMs);
      }
      this.log.warn("Confluence request failed", { endpoint }, error);
      throw ConfluenceRagNetworkError.connectionFailed(
        endpoint,
        error instanceof Error ? error : undefined
      );
    } finally {
      this.metrics?.recordDuration(
        PROCESSING_DEFAULTS.METRIC_CONFLUENCE_REQUEST,
        (Date.now() - startedAt) / 1000
      );
    }
  }

  private toRawPage(item: unknown, url: string): RawPage {
    return {
      id: str(at(item, "id")),
      title: str(at(item, "title")),
      content: str(at(item, "body", "storage", "value")),
      url,
      version: num(at(item, "version", "number")),
      lastModified: str(at(item, "version", "when")),
      attachments: [],
      comments: [],
    };
  }

  /** All pages of a space, following pagination until a short page. */
  async getSpacePages(spaceKey: string): Promise<RawPage[]> {
    const key = cacheKey("space", spaceKey);
    const cached = this.spaceCache.get(key);
    if (cached) {
      this.log.debug("Space listing served from cache", { spaceKey });
      return cached;
    }

    const limit = CONFLUENCE_DEFAULTS.PAGE_LIMIT;
    const pages: RawPage[] = [];
    for (let start = 0; ; start += limit) {
      const body = await this.getJson("content", {
        spaceKey,
        type: "page",
        start,
        limit,
        expand: CONFLUENCE_DEFAULTS.EXPAND,
      });
      const batch = results(body);
      for (const item of batch) {
        const id = str(at(item, "id"));
        pages.push(
          this.toRawPage(item, `${this.baseUrl}/wiki/spaces/${encodeURIComponent(spaceKey)}/pages/${id}`)
        );
      }
      if (batch.length < limit) break;
    }

    this.log.info("Fetched space pages", { spaceKey, count: pages.length });
    this.spaceCache.set(key, pages);
    return pages;
  }

  async getPage(pageId: string, options: GetPageOptions = {}): Promise<RawPage> {
    const includeAttachments = options.includeAttachments ?? false;
    const includeComments = options.includeComments ?? false;
    const key = cacheKey("page", pageId, includeAttachments, includeComments);
    const cached = this.pageCache.get(key);
    if (cached) return cached;

    const body = await this.getJson(`content/${encodeURIComponent(pageId)}`, {
      expand: CONFLUENCE_DEFAULTS.EXPAND,
    });
    const base = this.toRawPage(body, `${this.baseUrl}/wiki/pages/${str(at(body, "id")) || pageId}`);

    const [attachments, comments] = await Promise.all([
      includeAttachments ? this.getAttachments(pageId) : Promise.resolve([]),
      includeComments ? this.getComments(pageId) : Promise.resolve([]),
    ]);

    const page: RawPage = { ...base, attachments, comments };
    this.pageCache.set(key, page);
    return page;
  }

  async getAttachments(pageId: string): Promise<RawAttachment[]> {
    const body = await this.getJson(`content/${encodeURIComponent(pageId)}/child/attachment`);
    return results(body).map((item) => {
      const title = str(at(item, "title"));
      return {
        id: str(at(item, "id")),
        title,
        filename: title,
        mediaType: str(at(item, "metadata", "mediaType")),
        size: num(at(item, "extensions", "fileSize")),
        url: `${this.baseUrl}/wiki/download/attachments/${pageId}/${encodeURIComponent(title)}`,
      };
    });
  }

  async getComments(pageId: string): Promise<RawComment[]> {
    const body = await this.getJson(`content/${encodeURIComponent(pageId)}/child/comment`, {
      expand: "body.storage,history",
    });
    return results(body).map((item) => ({
      id: str(at(item, "id")),
      author: str(at(item, "history", "createdBy", "displayName")),
      created: str(at(item, "history", "createdDate")),
      content: str(at(item, "body", "storage", "value")),
    }));
  }

  clearCache(): void {
    this.spaceCache.clear();
    this.pageCache.clear();
  }
}
