import { Agent, fetch } from "undici";

/** Certificate trust for probe requests; "insecure" skips certificate verification. */
export type TrustPolicy = "verify" | "insecure";

export const TRUST_POLICIES = ["verify", "insecure"] as const satisfies readonly TrustPolicy[];

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36";

export interface HttpGetOptions {
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpClient {
  get(url: string, options: HttpGetOptions): Promise<HttpResponse>;
}

export interface UndiciHttpClientOptions {
  trustPolicy: TrustPolicy;
}

export class UndiciHttpClient implements HttpClient {
  readonly trustPolicy: TrustPolicy;
  private agent: Agent;

  constructor(options: UndiciHttpClientOptions) {
    this.trustPolicy = options.trustPolicy;
    this.agent = new Agent({
      connect: { rejectUnauthorized: options.trustPolicy === "verify" }
    });
  }

  async get(url: string, options: HttpGetOptions): Promise<HttpResponse> {
    const response = await fetch(url, {
      method: "GET",
      headers: options.headers,
      redirect: "follow",
      dispatcher: this.agent,
      signal: AbortSignal.timeout(options.timeoutMs)
    });
    const body = await response.text();
    return { status: response.status, body };
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}

export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // fetch wraps socket/DNS/TLS failures as "fetch failed" with the reason in `cause`.
  const cause = error.cause;
  if (cause instanceof Error && cause.message && cause.message !== error.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message || error.name;
}
