import type { Dispatcher } from "undici";

import { runHttpCheck } from "./checks/http.js";
import { verdictStatus } from "./checks/verdict.js";
import { ConfigError, toErrorMessage } from "./errors.js";
import { buildAvailabilityReport, sendReports, type ReportTarget } from "./exporters/report.js";
import { maintainStorage, storeVerdicts } from "./storage/fs.js";
import type { AgentConfig, HttpCheckConfig, Verdict } from "./types.js";
import { log, mapWithConcurrency } from "./util.js";

export type CheckFailure = {
  name: string;
  error: string;
};

export type CycleReport = {
  verdicts: Verdict[];
  failures: CheckFailure[];
  stored: string | null;
  deleted: number;
  reported: boolean;
};

export type CycleDeps = {
  concurrency: number;
  location: string;
  report: ReportTarget | null;
  dispatcher?: Dispatcher;
};

export async function runChecks(
  checks: HttpCheckConfig[],
  opts: { concurrency: number; dispatcher?: Dispatcher },
): Promise<{ verdicts: Verdict[]; failures: CheckFailure[] }> {
  const outcomes = await mapWithConcurrency(checks, opts.concurrency, async (check): Promise<{ verdict: Verdict } | { failure: CheckFailure }> => {
    try {
      const verdict = await runHttpCheck(check, { dispatcher: opts.dispatcher });
      log("check_done", {
        name: verdict.title,
        status: verdictStatus(verdict),
        median_ms: Math.round(verdict.stats.median),
        notice: verdict.notice ?? null,
      });
      return { verdict };
    } catch (e) {
      // Anything other than a configuration problem is a bug; let it surface.
      if (!(e instanceof ConfigError)) throw e;
      log("check_config_error", { name: check.name, error: e.message });
      return { failure: { name: check.name, error: e.message } };
    }
  });

  const verdicts: Verdict[] = [];
  const failures: CheckFailure[] = [];
  for (const outcome of outcomes) {
    if ("verdict" in outcome) verdicts.push(outcome.verdict);
    else failures.push(outcome.failure);
  }
  return { verdicts, failures };
}

/** One pass over every configured check: probe, store, prune, report. */
export async function runCycle(config: AgentConfig, deps: CycleDeps): Promise<CycleReport> {
  const { verdicts, failures } = await runChecks(config.checks, {
    concurrency: deps.concurrency,
    dispatcher: deps.dispatcher,
  });

  let stored: string | null = null;
  let deleted = 0;
  if (config.storage && verdicts.length) {
    try {
      stored = await storeVerdicts(config.storage.dir, verdicts);
      deleted = await maintainStorage(config.storage.dir, config.storage.checkExpiryMs);
      log("maintain_done", { dir: config.storage.dir, stored, deleted });
    } catch (e) {
      log("store_failed", { dir: config.storage.dir, error: toErrorMessage(e) });
    }
  }

  let reported = false;
  if (deps.report && verdicts.length) {
    const result = await sendReports(
      deps.report,
      verdicts.map((verdict) => buildAvailabilityReport(verdict, deps.location)),
    );
    if (result.ok) {
      reported = true;
    } else {
      log("report_failed", { status: result.status, text: result.text });
    }
  }

  return { verdicts, failures, stored, deleted, reported };
}
