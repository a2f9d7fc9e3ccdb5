import { DEFAULT_USER_AGENT } from "@/types";

const DEFAULT_TIMEOUT_MS = 30_000;

export interface FetchedPage {
  html: string;
  finalUrl: string;
}

/**
 * The one HTTP client of a run. Created once at startup and passed to every scraper;
 * carries the identifying User-Agent and the per-request timeout. No retries.
 */
export interface HttpClient {
  fetchHtml(url: string): Promise<string>;
  fetchHtmlWithUrl(url: string): Promise<FetchedPage>;
  postJson(url: string, body: unknown): Promise<unknown>;
}

export interface HttpClientOptions {
  userAgent?: string;
  timeoutMs?: number;
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  const userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  /** Response body and final URL. The timeout covers the headers and the whole body. */
  async function request(
    url: string,
    init: { method: string; body?: string; headers?: Record<string, string> }
  ): Promise<{ text: string; finalUrl: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(url, {
        method: init.method,
        body: init.body,
        signal: controller.signal,
        redirect: "follow",
        headers: { "User-Agent": userAgent, ...init.headers },
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}: ${url}`);
      }
      const text = await res.text();
      return { text, finalUrl: res.url || url };
    } catch (e) {
      if (controller.signal.aborted) throw new Error(`Timeout after ${timeoutMs}ms: ${url}`);
      throw e;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  async function fetchHtmlWithUrl(url: string): Promise<FetchedPage> {
    const { text, finalUrl } = await request(url, { method: "GET" });
    return { html: text, finalUrl };
  }

  return {
    fetchHtmlWithUrl,

    async fetchHtml(url: string): Promise<string> {
      const { html } = await fetchHtmlWithUrl(url);
      return html;
    },

    async postJson(url: string, body: unknown): Promise<unknown> {
      const { text } = await request(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
      });
      return text ? (JSON.parse(text) as unknown) : null;
    },
  };
}
