import pLimit from "p-limit";
import { EndpointConfig, ProbeResult } from "../types/probeResult";
import { describeError } from "./http";

export const DEFAULT_CONCURRENCY = 20;

export type ProbeFn = (endpoint: EndpointConfig) => Promise<ProbeResult>;

export interface SchedulerOptions {
  probe: ProbeFn;
  concurrency?: number;
  onResult?: (result: ProbeResult, completed: number, total: number) => void;
}

function failedResult(endpoint: EndpointConfig, error: unknown): ProbeResult {
  return {
    id: endpoint.id,
    url: endpoint.baseUrl,
    valid: false,
    statusCode: null,
    message: `probe failed: ${describeError(error)}`,
    attempts: 0
  };
}

/**
 * Runs one probe per endpoint with at most `concurrency` in flight and
 * resolves once all of them have finished. Results keep the input order.
 */
export async function runProbes(
  endpoints: readonly EndpointConfig[],
  options: SchedulerOptions
): Promise<ProbeResult[]> {
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));
  const results = new Array<ProbeResult>(endpoints.length);
  let completed = 0;

  await Promise.all(
    endpoints.map((endpoint, index) =>
      limit(async () => {
        let result: ProbeResult;
        try {
          result = await options.probe(endpoint);
        } catch (error) {
          result = failedResult(endpoint, error);
        }
        results[index] = result;
        completed++;
        try {
          options.onResult?.(result, completed, endpoints.length);
        } catch (error) {
          console.error(`Progress callback failed for ${endpoint.id}: ${describeError(error)}`);
        }
      })
    )
  );

  return results;
}
