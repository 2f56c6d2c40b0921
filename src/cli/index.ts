#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCheck } from "../commands/check";
import { runList } from "../commands/list";
import { resolveSettings } from "../config/settings";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.API_PROBE_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("api-site-probe")
  .description("Probe the api_site endpoints of a config file and prune the invalid ones")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides API_PROBE_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("check", { isDefault: true })
  .description("Probe every endpoint, print a report and offer to prune invalid ones")
  .option("--config <path>", "Config file with an api_site map (env API_PROBE_CONFIG, default config.json)")
  .option("--concurrency <n>", "Max probes in flight (env API_PROBE_CONCURRENCY, default 20)")
  .option("--attempts <n>", "Attempt rounds per endpoint (env API_PROBE_MAX_ATTEMPTS, default 3)")
  .option("--timeout <ms>", "Per-request timeout (env API_PROBE_TIMEOUT_MS, default 10000)")
  .option("--retry-delay <ms>", "Pause between attempt rounds (env API_PROBE_RETRY_DELAY_MS, default 1000)")
  .option("--tls <policy>", "Certificate trust: verify | insecure (env API_PROBE_TLS, default insecure)")
  .option("-y, --yes", "Prune invalid endpoints without asking")
  .option("--dry-run", "Report what would be pruned without writing anything")
  .option("--report <path>", "Also write the results as JSON")
  .option("-q, --quiet", "Hide the progress counter")
  .action(async (opts) => {
    const settings = resolveSettings({
      configPath: opts.config,
      concurrency: opts.concurrency,
      maxAttempts: opts.attempts,
      timeoutMs: opts.timeout,
      retryDelayMs: opts.retryDelay,
      trustPolicy: opts.tls
    });
    await runCheck({
      settings,
      yes: opts.yes,
      dryRun: opts.dryRun,
      reportPath: opts.report,
      quiet: opts.quiet
    });
  });

program
  .command("list")
  .description("List the endpoints eligible for probing")
  .option("--config <path>", "Config file with an api_site map (env API_PROBE_CONFIG, default config.json)")
  .action(async (opts) => {
    const settings = resolveSettings({ configPath: opts.config });
    await runList({ configPath: settings.configPath });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
