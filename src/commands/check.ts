import path from "path";
import { loadApiConfig, pruneApiConfig, writePrunedConfig } from "../config/apiConfig";
import { ProbeSettings } from "../config/settings";
import { probeEndpoint } from "../probe/endpointProbe";
import { HttpClient, UndiciHttpClient } from "../probe/http";
import { runProbes } from "../probe/scheduler";
import { buildReportDocument, formatReport, partitionResults } from "../report/summary";
import { ConfirmFn, confirm as promptConfirm } from "../io/prompt";
import { writeJson } from "../utils/fs";
import { nowUtcIsoSeconds } from "../utils/time";
import { EndpointConfig, ProbeResult } from "../types/probeResult";

export interface CheckOptions {
  settings: ProbeSettings;
  yes?: boolean;
  dryRun?: boolean;
  reportPath?: string;
  quiet?: boolean;
  http?: HttpClient;
  confirm?: ConfirmFn;
  sleep?: (ms: number) => Promise<void>;
}

export interface CheckOutcome {
  results: ProbeResult[];
  removed: string[];
  backupPath: string | null;
}

function writeProgress(completed: number, total: number): void {
  process.stderr.write(`\r  ${completed}/${total} probed`);
  if (completed === total) process.stderr.write("\n");
}

async function probeAll(
  options: CheckOptions,
  http: HttpClient,
  endpoints: EndpointConfig[]
): Promise<ProbeResult[]> {
  const { settings } = options;
  return runProbes(endpoints, {
    concurrency: settings.concurrency,
    probe: (endpoint) =>
      probeEndpoint(endpoint, {
        http,
        maxAttempts: settings.maxAttempts,
        timeoutMs: settings.timeoutMs,
        retryDelayMs: settings.retryDelayMs,
        sleep: options.sleep
      }),
    onResult: options.quiet ? undefined : (_result, completed, total) => writeProgress(completed, total)
  });
}

export async function runCheck(options: CheckOptions): Promise<CheckOutcome> {
  const { settings } = options;
  const loaded = await loadApiConfig(settings.configPath);
  console.log(`Loaded ${loaded.endpoints.length} endpoints from ${loaded.path}`);
  console.log(
    `Probing with concurrency ${settings.concurrency}, ${settings.maxAttempts} attempts, ` +
      `timeout ${settings.timeoutMs}ms, TLS ${settings.trustPolicy === "verify" ? "verified" : "unverified (insecure)"}`
  );
  console.log("=".repeat(80));

  let results: ProbeResult[];
  if (options.http) {
    results = await probeAll(options, options.http, loaded.endpoints);
  } else {
    const http = new UndiciHttpClient({ trustPolicy: settings.trustPolicy });
    try {
      results = await probeAll(options, http, loaded.endpoints);
    } finally {
      await http.close();
    }
  }

  for (const line of formatReport(results)) {
    console.log(line);
  }

  if (options.reportPath) {
    const reportPath = path.resolve(options.reportPath);
    await writeJson(
      reportPath,
      buildReportDocument(results, { configPath: loaded.path, generatedAt: nowUtcIsoSeconds() })
    );
    console.log(`Wrote report to ${reportPath}`);
  }

  const invalidIds = partitionResults(results).invalid.map((result) => result.id);
  const outcome: CheckOutcome = { results, removed: [], backupPath: null };

  if (invalidIds.length === 0) {
    console.log("All endpoints are valid; nothing to prune.");
    return outcome;
  }

  if (options.dryRun) {
    console.log(`Dry run: would remove ${invalidIds.length} invalid endpoints: ${invalidIds.join(", ")}`);
    return outcome;
  }

  const ask = options.confirm ?? promptConfirm;
  const confirmed =
    options.yes === true ||
    (await ask(`\nRemove ${invalidIds.length} invalid endpoints from ${loaded.path}? (y/N): `));
  if (!confirmed) {
    console.log("Prune skipped; config left unchanged.");
    return outcome;
  }

  const pruned = pruneApiConfig(loaded.config, invalidIds);
  const backupPath = await writePrunedConfig({ configPath: loaded.path, config: pruned.config });
  for (const id of pruned.removed) {
    console.log(`Removed invalid endpoint: ${id}`);
  }
  console.log(`Backed up original config to ${backupPath}`);
  console.log(`Removed ${pruned.removed.length} invalid endpoints from ${loaded.path}`);

  return { results, removed: pruned.removed, backupPath };
}
