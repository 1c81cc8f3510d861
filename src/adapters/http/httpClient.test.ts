import { describe, expect, it } from "vitest";
import { FetchLike, HttpClient, HttpResponseLike } from "./httpClient";
import { MonitorError } from "../../domain/errors";

interface Call {
  url: string;
  method: string;
  cookie: string | null;
  body: string;
}

function scripted(replies: Array<{ status: number; headers?: Record<string, string>; body?: string }>) {
  const calls: Call[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const headers = new Headers(init.headers);
    calls.push({
      url,
      method: init.method ?? "GET",
      cookie: headers.get("cookie"),
      body: init.body instanceof URLSearchParams ? init.body.toString() : ""
    });
    const reply = replies.shift() ?? { status: 404 };
    return {
      status: reply.status,
      headers: new Headers(reply.headers ?? {}),
      text: async () => reply.body ?? ""
    };
  };
  return { calls, fetchImpl };
}

function abortError(): Error {
  const error = new Error("The operation was aborted.");
  error.name = "AbortError";
  return error;
}

const hanging: FetchLike = (_url, init) =>
  new Promise<HttpResponseLike>((_resolve, reject) => {
    init.signal?.addEventListener("abort", () => reject(abortError()));
  });

async function captureError(action: () => Promise<unknown>): Promise<MonitorError> {
  try {
    await action();
  } catch (error) {
    if (error instanceof MonitorError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected the request to fail");
}

describe("http client", () => {
  it("follows redirects, keeps cookies and switches POST to GET", async () => {
    const { calls, fetchImpl } = scripted([
      { status: 302, headers: { location: "/home", "set-cookie": "sid=s1; Path=/" } },
      { status: 200, body: "welcome", headers: { "content-type": "text/html" } }
    ]);
    const client = new HttpClient("10.0.0.5:8080", 1000, fetchImpl);

    const response = await client.requestText({
      method: "POST",
      path: "/api/login",
      form: new URLSearchParams({ us: "admin" })
    });

    expect(response).toEqual({
      status: 200,
      url: "http://10.0.0.5:8080/home",
      contentType: "text/html",
      body: "welcome"
    });
    expect(calls).toEqual([
      { url: "http://10.0.0.5:8080/api/login", method: "POST", cookie: null, body: "us=admin" },
      { url: "http://10.0.0.5:8080/home", method: "GET", cookie: "sid=s1", body: "" }
    ]);
  });

  it("stops following after five redirects", async () => {
    const loop = Array.from({ length: 7 }, () => ({ status: 302, headers: { location: "/again" } }));
    const { calls, fetchImpl } = scripted(loop);
    const client = new HttpClient("dev", 1000, fetchImpl);

    const response = await client.requestText({ path: "/start" });

    expect(response.status).toBe(302);
    expect(calls).toHaveLength(6);
  });

  it("maps a timeout to http.timeout", async () => {
    const client = new HttpClient("dev", 1000, hanging);
    const error = await captureError(() => client.requestText({ path: "/slow", timeoutMs: 20 }));
    expect(error.code).toBe("http.timeout");
    expect(error.message).toBe("Request to http://dev/slow timed out after 20 ms.");
  });

  it("maps transport failures to http.network_error", async () => {
    const client = new HttpClient("dev", 1000, async () => {
      throw new TypeError("fetch failed");
    });
    const error = await captureError(() => client.requestText({ path: "/x" }));
    expect(error.code).toBe("http.network_error");
    expect(error.message).toBe("Cannot reach http://dev: fetch failed.");
  });

  it("reports an externally aborted request as cancelled", async () => {
    const client = new HttpClient("dev", 10_000, hanging);
    const controller = new AbortController();
    const pending = captureError(() => client.requestText({ path: "/x", signal: controller.signal }));
    controller.abort();
    const error = await pending;
    expect(error.code).toBe("orchestrator.cancelled");
  });
});
