import { describe, expect, it, vi } from "vitest";
import { probeEndpoint } from "../src/probe/endpointProbe";
import { BROWSER_USER_AGENT } from "../src/probe/http";
import { FakeHttpClient, json } from "./helpers/fakeHttp";

const endpoint = { id: "alpha", baseUrl: "https://alpha.example.test/api" };
const DETAIL_URL = "https://alpha.example.test/api?ac=detail&pg=1&limit=1";
const LIST_URL = "https://alpha.example.test/api?ac=list&pg=1&limit=1";

describe("endpoint probe", () => {
  it("stops at the first candidate that validates", async () => {
    const http = new FakeHttpClient(() => json(200, { list: [] }));
    const result = await probeEndpoint(endpoint, { http, retryDelayMs: 0 });

    expect(result).toEqual({
      id: "alpha",
      url: DETAIL_URL,
      valid: true,
      statusCode: 200,
      message: "valid",
      attempts: 1
    });
    expect(http.calls).toEqual([DETAIL_URL]);
  });

  it("sends the browser user agent and the configured timeout", async () => {
    const http = new FakeHttpClient(() => json(200, { a: 1 }));
    await probeEndpoint(endpoint, { http, timeoutMs: 1234 });

    expect(http.options[0].timeoutMs).toBe(1234);
    expect(http.options[0].headers["User-Agent"]).toBe(BROWSER_USER_AGENT);
  });

  it("moves on past non-JSON and rejected bodies", async () => {
    const http = new FakeHttpClient((url) => {
      if (url === DETAIL_URL) return { status: 200, body: "<html>blocked</html>" };
      if (url === LIST_URL) return json(200, { code: 0 });
      return json(200, { list: [{ id: 7, title: "x" }] });
    });
    const result = await probeEndpoint(endpoint, { http, retryDelayMs: 0 });

    expect(result.valid).toBe(true);
    expect(result.url).toBe("https://alpha.example.test/api?limit=1");
    expect(http.calls).toHaveLength(3);
  });

  it("reports the last status after exhausting attempts on HTTP 500", async () => {
    const http = new FakeHttpClient(() => ({ status: 500, body: "" }));
    const sleep = vi.fn(async () => undefined);
    const result = await probeEndpoint(endpoint, { http, maxAttempts: 3, retryDelayMs: 1000, sleep });

    expect(result).toEqual({
      id: "alpha",
      url: "https://alpha.example.test/api",
      valid: false,
      statusCode: 500,
      message: "HTTP 500",
      attempts: 3
    });
    expect(http.calls).toHaveLength(12);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("uses the no-response sentinel when every request fails in transport", async () => {
    const http = new FakeHttpClient(() => new Error("getaddrinfo ENOTFOUND alpha.example.test"));
    const result = await probeEndpoint(endpoint, { http, maxAttempts: 2, retryDelayMs: 0 });

    expect(result.valid).toBe(false);
    expect(result.statusCode).toBeNull();
    expect(result.message).toBe("getaddrinfo ENOTFOUND alpha.example.test");
    expect(http.calls).toHaveLength(8);
  });

  it("keeps a seen status when a later candidate fails in transport", async () => {
    const http = new FakeHttpClient((url) =>
      url === DETAIL_URL ? { status: 403, body: "" } : new Error("socket hang up")
    );
    const result = await probeEndpoint(endpoint, { http, maxAttempts: 1 });

    expect(result.statusCode).toBe(403);
    expect(result.message).toBe("socket hang up");
  });

  it("includes the cause of a wrapped fetch failure", async () => {
    const error = new Error("fetch failed", { cause: new Error("connect ECONNREFUSED 127.0.0.1:9") });
    const http = new FakeHttpClient(() => error);
    const result = await probeEndpoint(endpoint, { http, maxAttempts: 1 });

    expect(result.message).toBe("fetch failed: connect ECONNREFUSED 127.0.0.1:9");
  });

  it("succeeds on a later attempt round", async () => {
    let round = 0;
    const http = new FakeHttpClient((url) => {
      if (url === DETAIL_URL) round++;
      return round >= 2 ? json(200, { data: [] }) : { status: 502, body: "" };
    });
    const result = await probeEndpoint(endpoint, { http, maxAttempts: 3, retryDelayMs: 0 });

    expect(result.valid).toBe(true);
    expect(result.attempts).toBe(2);
    expect(result.url).toBe(DETAIL_URL);
    expect(http.calls).toHaveLength(5);
  });
});
