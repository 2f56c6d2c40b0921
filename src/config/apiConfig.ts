import path from "path";
import { z } from "zod";
import { copyFile, pathExists, readLosslessJson, writeLosslessJson } from "../utils/fs";
import { EndpointConfig } from "../types/probeResult";

// Plain records keep the file's key order, so a rewritten config only differs
// where entries were removed.
export const ApiSiteSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

export const ApiConfigSchema = z
  .record(z.string(), z.unknown())
  .superRefine((config, ctx) => {
    if (config.api_site === undefined) return;
    const sites = ApiSiteSchema.safeParse(config.api_site);
    if (sites.success) return;
    for (const issue of sites.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["api_site", ...issue.path],
        message: issue.message
      });
    }
  });

export type ApiConfig = z.infer<typeof ApiConfigSchema>;
export type ApiSite = z.infer<typeof ApiSiteSchema>;

export interface LoadedApiConfig {
  path: string;
  config: ApiConfig;
  endpoints: EndpointConfig[];
}

export interface PruneResult {
  config: ApiConfig;
  removed: string[];
}

export interface WritePrunedOptions {
  configPath: string;
  config: ApiConfig;
}

export function backupPathFor(configPath: string): string {
  return `${configPath}.backup`;
}

function apiSiteOf(config: ApiConfig): ApiSite {
  return ApiSiteSchema.parse(config.api_site ?? {});
}

export function parseApiConfig(data: unknown, label: string): ApiConfig {
  const parsed = ApiConfigSchema.safeParse(data);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "<root>"} ${issue.message}`)
    .join("; ");
  throw new Error(`${label} is not a valid API config: ${issues}`);
}

/** Entries under `api_site` whose `api` field is a string, in file order. */
export function extractEndpoints(config: ApiConfig): EndpointConfig[] {
  const endpoints: EndpointConfig[] = [];
  for (const [id, entry] of Object.entries(apiSiteOf(config))) {
    if (typeof entry.api === "string") {
      endpoints.push({ id, baseUrl: entry.api });
    }
  }
  return endpoints;
}

export async function loadApiConfig(configPath: string): Promise<LoadedApiConfig> {
  const resolved = path.resolve(configPath);
  if (!(await pathExists(resolved))) {
    throw new Error(`Config file not found: ${resolved}`);
  }

  let data: unknown;
  try {
    data = await readLosslessJson(resolved);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read config ${resolved}: ${reason}`);
  }

  const config = parseApiConfig(data, resolved);
  return { path: resolved, config, endpoints: extractEndpoints(config) };
}

/**
 * Returns a new config without the given `api_site` entries. Kept entries and
 * other top-level values are shared with `config`, not copied.
 */
export function pruneApiConfig(config: ApiConfig, ids: Iterable<string>): PruneResult {
  if (config.api_site === undefined) return { config: { ...config }, removed: [] };

  const drop = new Set(ids);
  const kept: ApiSite = {};
  const removed: string[] = [];
  for (const [id, entry] of Object.entries(apiSiteOf(config))) {
    if (drop.has(id)) {
      removed.push(id);
    } else {
      kept[id] = entry;
    }
  }
  // Overriding an existing key in a spread keeps its position among the top-level keys.
  return { config: { ...config, api_site: kept }, removed };
}

/**
 * Copies the current file to `<config>.backup` byte for byte, then overwrites
 * the config with the pruned document. Returns the backup path.
 */
export async function writePrunedConfig(options: WritePrunedOptions): Promise<string> {
  const backupPath = backupPathFor(options.configPath);
  await copyFile(options.configPath, backupPath);
  await writeLosslessJson(options.configPath, options.config);
  return backupPath;
}
