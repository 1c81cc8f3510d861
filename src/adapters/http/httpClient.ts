import { MonitorError } from "../../domain/errors";
import { CookieJar } from "./cookieJar";

export interface HttpResponseLike {
  status: number;
  headers: Headers;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<HttpResponseLike>;

export interface HttpRequestOptions {
  method?: "GET" | "POST";
  path: string;
  form?: URLSearchParams;
  timeoutMs?: number;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface HttpTextResponse {
  status: number;
  url: string;
  contentType: string;
  body: string;
}

const MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export class HttpClient {
  readonly origin: string;
  readonly cookies = new CookieJar();
  private readonly defaultTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(host: string, defaultTimeoutMs: number, fetchImpl: FetchLike = fetch) {
    this.origin = `http://${host.replace(/\/+$/, "")}`;
    this.defaultTimeoutMs = defaultTimeoutMs;
    this.fetchImpl = fetchImpl;
  }

  /**
   * Issues the request and follows redirects by hand so that cookies set on
   * every hop land in the jar. `url` in the result is the final location.
   */
  async requestText(options: HttpRequestOptions): Promise<HttpTextResponse> {
    const controller = new AbortController();
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;
    const handle = setTimeout(() => controller.abort(), timeout);
    const release = forwardAbort(options.signal, controller);

    let url = new URL(options.path, `${this.origin}/`).toString();
    let method = options.method ?? "GET";
    let form = options.form;

    try {
      for (let hop = 0; ; hop += 1) {
        const response = await this.fetchImpl(url, {
          method,
          headers: this.buildHeaders(options.headers, form),
          body: form,
          redirect: "manual",
          signal: controller.signal
        });
        this.cookies.store(response.headers.getSetCookie());

        const location = response.headers.get("location");
        if (REDIRECT_STATUSES.has(response.status) && location && hop < MAX_REDIRECTS) {
          await response.text();
          url = new URL(location, url).toString();
          if (response.status !== 307 && response.status !== 308) {
            method = "GET";
            form = undefined;
          }
          continue;
        }

        return {
          status: response.status,
          url,
          contentType: response.headers.get("content-type") || "",
          body: await response.text()
        };
      }
    } catch (error) {
      if (error instanceof MonitorError) {
        throw error;
      }
      if (options.signal?.aborted) {
        throw new MonitorError({
          code: "orchestrator.cancelled",
          message: `Request to ${url} was aborted.`,
          cause: error
        });
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new MonitorError({
          code: "http.timeout",
          message: `Request to ${url} timed out after ${timeout} ms.`,
          cause: error
        });
      }
      throw new MonitorError({
        code: "http.network_error",
        message: `Cannot reach ${this.origin}: ${(error as Error).message || "network request failed"}.`,
        cause: error
      });
    } finally {
      clearTimeout(handle);
      release();
    }
  }

  private buildHeaders(extra: Record<string, string> | undefined, form: URLSearchParams | undefined): Headers {
    const headers = new Headers(extra || {});
    const cookie = this.cookies.header();
    if (cookie) {
      headers.set("Cookie", cookie);
    }
    if (form) {
      headers.set("Content-Type", "application/x-www-form-urlencoded");
    }
    return headers;
  }
}

function forwardAbort(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) {
    return () => undefined;
  }
  if (source.aborted) {
    target.abort();
    return () => undefined;
  }
  const onAbort = (): void => target.abort();
  source.addEventListener("abort", onAbort, { once: true });
  return () => source.removeEventListener("abort", onAbort);
}
