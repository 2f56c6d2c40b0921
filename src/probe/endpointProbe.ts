import { EndpointConfig, ProbeResult } from "../types/probeResult";
import { buildCandidateUrls } from "./candidates";
import { BROWSER_USER_AGENT, HttpClient, describeError } from "./http";
import { isValidCatalogResponse } from "./responseValidator";
import { sleep as defaultSleep } from "../utils/time";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_TIMEOUT_MS = 10000;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export interface ProbeOptions {
  http: HttpClient;
  maxAttempts?: number;
  timeoutMs?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface LastObservation {
  statusCode: number | null;
  message: string;
}

type CandidateOutcome =
  | { kind: "valid"; statusCode: number }
  | { kind: "invalid"; statusCode: number | null; message: string };

async function tryCandidate(
  url: string,
  http: HttpClient,
  timeoutMs: number
): Promise<CandidateOutcome> {
  let status: number;
  let body: string;
  try {
    const response = await http.get(url, {
      headers: { "User-Agent": BROWSER_USER_AGENT, Accept: "application/json, */*" },
      timeoutMs
    });
    status = response.status;
    body = response.body;
  } catch (error) {
    return { kind: "invalid", statusCode: null, message: describeError(error) };
  }

  if (status !== 200) {
    return { kind: "invalid", statusCode: status, message: `HTTP ${status}` };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return { kind: "invalid", statusCode: status, message: "invalid JSON response" };
  }

  if (!isValidCatalogResponse(payload)) {
    return { kind: "invalid", statusCode: status, message: "response rejected by validator" };
  }
  return { kind: "valid", statusCode: status };
}

/**
 * Probes one endpoint across its candidate URLs, retrying whole rounds up to
 * `maxAttempts` times. Resolves with a result for every outcome.
 */
export async function probeEndpoint(
  endpoint: EndpointConfig,
  options: ProbeOptions
): Promise<ProbeResult> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const sleep = options.sleep ?? defaultSleep;
  const candidates = buildCandidateUrls(endpoint.baseUrl);

  const last: LastObservation = { statusCode: null, message: "no candidate URL was tried" };

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    for (const url of candidates) {
      const outcome = await tryCandidate(url, options.http, timeoutMs);
      if (outcome.kind === "valid") {
        return {
          id: endpoint.id,
          url,
          valid: true,
          statusCode: outcome.statusCode,
          message: "valid",
          attempts: attempt
        };
      }
      // A later transport error must not erase a status seen earlier.
      if (outcome.statusCode !== null) {
        last.statusCode = outcome.statusCode;
      }
      last.message = outcome.message;
    }

    if (attempt < maxAttempts && retryDelayMs > 0) {
      await sleep(retryDelayMs);
    }
  }

  return {
    id: endpoint.id,
    url: endpoint.baseUrl,
    valid: false,
    statusCode: last.statusCode,
    message: last.message,
    attempts: maxAttempts
  };
}
