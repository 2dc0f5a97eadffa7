#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { readFile } from "node:fs/promises";

import { runCycle, type CycleDeps } from "./agent.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_REPORT_PATH, type ReportTarget } from "./exporters/report.js";
import type { AgentConfig } from "./types.js";
import { getEnv, getEnvInt, getOptionalEnv, log, sleep } from "./util.js";
import { parseAgentConfig } from "./validators/check.js";

async function loadConfig(file: string): Promise<AgentConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(file, "utf8"));
  } catch (e) {
    throw new ConfigError(`reading ${file}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }

  const { config, issues } = parseAgentConfig(raw);
  for (const issue of issues) {
    log("check_config_error", { index: issue.index, name: issue.name, error: issue.message });
  }
  return config;
}

function reportTarget(): ReportTarget | null {
  const appUrl = getOptionalEnv("APP_URL");
  if (!appUrl) return null;

  const timeoutMs = getEnvInt("AGENT_TIMEOUT_MS", 2500);
  return {
    appUrl,
    reportPath: getEnv("AGENT_REPORT_PATH", DEFAULT_REPORT_PATH),
    agentToken: getEnv("AGENT_TOKEN"),
    // Reports carry a whole cycle, so allow more than a single probe.
    timeoutMs: Math.max(7000, timeoutMs * 4),
    dryRun: (process.env.AGENT_DRY_RUN ?? "").toLowerCase() === "true",
  };
}

async function main() {
  const configFile = getEnv("AGENT_CONFIG", "checks.json");
  const intervalSeconds = getEnvInt("AGENT_INTERVAL_SECONDS", 0);
  const deps: CycleDeps = {
    concurrency: getEnvInt("AGENT_CONCURRENCY", 1),
    location: getEnv("AGENT_LOCATION", "status-agent"),
    report: reportTarget(),
  };

  log("agent_start", {
    config: configFile,
    interval_seconds: intervalSeconds,
    concurrency: deps.concurrency,
    report: deps.report ? deps.report.appUrl : null,
  });

  for (;;) {
    // Re-read every cycle so edits to the checks file apply without a restart.
    const config = await loadConfig(configFile);
    const cycle = await runCycle(config, deps);
    log("cycle_done", {
      checks: cycle.verdicts.length,
      failed_configs: cycle.failures.length,
      down: cycle.verdicts.filter((v) => v.down).length,
      degraded: cycle.verdicts.filter((v) => v.degraded).length,
    });

    if (intervalSeconds <= 0) return;
    await sleep(intervalSeconds * 1000);
  }
}

main().catch((e) => {
  log("fatal", { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
