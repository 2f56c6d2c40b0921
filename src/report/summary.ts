import { ProbeResult } from "../types/probeResult";

export interface PartitionedResults {
  valid: ProbeResult[];
  invalid: ProbeResult[];
}

export interface ReportMeta {
  configPath: string;
  generatedAt: string;
}

export interface ProbeReportDocument {
  generated_at: string;
  config_path: string;
  total: number;
  valid_count: number;
  invalid_count: number;
  results: ProbeResult[];
}

const RULE = "=".repeat(80);
const SUBRULE = "-".repeat(40);

export function partitionResults(results: readonly ProbeResult[]): PartitionedResults {
  const valid: ProbeResult[] = [];
  const invalid: ProbeResult[] = [];
  for (const result of results) {
    (result.valid ? valid : invalid).push(result);
  }
  return { valid, invalid };
}

export function formatResultLine(result: ProbeResult): string {
  if (result.valid) {
    return `✓ ${result.id}: ${result.url} (status ${result.statusCode ?? "n/a"})`;
  }
  if (result.statusCode === null) {
    return `✗ ${result.id}: ${result.url} (request failed: ${result.message})`;
  }
  return `✗ ${result.id}: ${result.url} (status ${result.statusCode}: ${result.message})`;
}

export function formatSummaryLine(results: readonly ProbeResult[]): string {
  const { valid } = partitionResults(results);
  return `Summary: ${valid.length}/${results.length} endpoints valid`;
}

export function formatReport(results: readonly ProbeResult[]): string[] {
  const { valid, invalid } = partitionResults(results);
  return [
    "Results:",
    RULE,
    "",
    `Valid endpoints (${valid.length}):`,
    SUBRULE,
    ...valid.map(formatResultLine),
    "",
    `Invalid endpoints (${invalid.length}):`,
    SUBRULE,
    ...invalid.map(formatResultLine),
    "",
    formatSummaryLine(results)
  ];
}

export function buildReportDocument(
  results: readonly ProbeResult[],
  meta: ReportMeta
): ProbeReportDocument {
  const { valid, invalid } = partitionResults(results);
  return {
    generated_at: meta.generatedAt,
    config_path: meta.configPath,
    total: results.length,
    valid_count: valid.length,
    invalid_count: invalid.length,
    results: [...results]
  };
}
