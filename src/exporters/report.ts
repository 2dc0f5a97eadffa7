import type { AvailabilityReport, Verdict } from "../types.js";
import { fetchJson, log } from "../util.js";

export const DEFAULT_REPORT_PATH = "/v1/availability";
export const TOKEN_HEADER = "x-status-agent-token";

export type ReportTarget = {
  appUrl: string;
  // Collector route, joined onto appUrl.
  reportPath: string;
  agentToken: string;
  timeoutMs: number;
  dryRun: boolean;
};

export type SendResult = { ok: true } | { ok: false; status: number; text: string | null };

export function buildAvailabilityReport(verdict: Verdict, location: string): AvailabilityReport {
  return {
    name: verdict.title,
    endpoint: verdict.endpoint,
    checked_at: new Date(verdict.timestamp).toISOString(),
    success: verdict.healthy,
    duration_ms: Math.round(verdict.stats.mean),
    run_location: location,
    message: verdict.notice ?? null,
  };
}

export async function sendReports(target: ReportTarget, reports: AvailabilityReport[]): Promise<SendResult> {
  if (target.dryRun) {
    log("dry_run", { reports: reports.length });
    return { ok: true };
  }

  const url = `${target.appUrl.replace(/\/+$/, "")}/${target.reportPath.replace(/^\/+/, "")}`;
  const res = await fetchJson<unknown>(url, {
    method: "POST",
    headers: {
      "content-type": "application/json",
      [TOKEN_HEADER]: target.agentToken,
    },
    body: JSON.stringify({ availability: reports }),
    timeoutMs: target.timeoutMs,
  });

  if (!res.ok) {
    return { ok: false, status: res.status, text: res.text };
  }
  return { ok: true };
}
