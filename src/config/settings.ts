import { z } from "zod";
import { TRUST_POLICIES } from "../probe/http";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_RETRY_DELAY_MS, DEFAULT_TIMEOUT_MS } from "../probe/endpointProbe";
import { DEFAULT_CONCURRENCY } from "../probe/scheduler";

export const DEFAULT_CONFIG_PATH = "config.json";

const positiveInt = z.coerce.number().int().positive();

export const ProbeSettingsSchema = z.object({
  configPath: z.string().min(1).default(DEFAULT_CONFIG_PATH),
  concurrency: positiveInt.default(DEFAULT_CONCURRENCY),
  maxAttempts: positiveInt.default(DEFAULT_MAX_ATTEMPTS),
  timeoutMs: positiveInt.default(DEFAULT_TIMEOUT_MS),
  retryDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
  trustPolicy: z.enum(TRUST_POLICIES).default("insecure")
});

export type ProbeSettings = z.infer<typeof ProbeSettingsSchema>;
export type SettingsOverrides = { [K in keyof ProbeSettings]?: string | number };

function pick(override: string | number | undefined, envValue: string | undefined): unknown {
  if (override !== undefined) return override;
  if (envValue === undefined || envValue.trim() === "") return undefined;
  return envValue.trim();
}

/** CLI overrides win over API_PROBE_* environment variables, then defaults. */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): ProbeSettings {
  const parsed = ProbeSettingsSchema.safeParse({
    configPath: pick(overrides.configPath, env.API_PROBE_CONFIG),
    concurrency: pick(overrides.concurrency, env.API_PROBE_CONCURRENCY),
    maxAttempts: pick(overrides.maxAttempts, env.API_PROBE_MAX_ATTEMPTS),
    timeoutMs: pick(overrides.timeoutMs, env.API_PROBE_TIMEOUT_MS),
    retryDelayMs: pick(overrides.retryDelayMs, env.API_PROBE_RETRY_DELAY_MS),
    trustPolicy: pick(overrides.trustPolicy, env.API_PROBE_TLS)
  });
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid probe settings: ${issues}`);
}
