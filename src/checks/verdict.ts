import type { Attempt, HealthStatus, Stats, Verdict } from "../types.js";
import { formatMs } from "../util.js";

export const EMPTY_STATS: Readonly<Stats> = Object.freeze({ total: 0, mean: 0, median: 0, min: 0, max: 0 });

/**
 * Statistics over the round trip times of the attempts that succeeded.
 * With an even number of samples the median is the mean of the two middle ones.
 */
export function computeStats(times: readonly Attempt[]): Stats {
  const rtts = times
    .filter((attempt) => !attempt.error)
    .map((attempt) => attempt.rttMs)
    .sort((a, b) => a - b);
  if (!rtts.length) {
    return { ...EMPTY_STATS };
  }

  const total = rtts.reduce((sum, rtt) => sum + rtt, 0);
  const half = Math.floor(rtts.length / 2);
  const median = rtts.length % 2 === 0 ? (rtts[half - 1] + rtts[half]) / 2 : rtts[half];

  return {
    total,
    mean: total / rtts.length,
    median,
    min: rtts[0],
    max: rtts[rtts.length - 1],
  };
}

export function summarizeAttempts(times: readonly Attempt[]) {
  const label = times.length === 1 ? "attempt" : "attempts";
  return `${times.length} ${label} (${times.map((attempt) => formatMs(attempt.rttMs)).join(" ")})`;
}

export type CheckResult = Pick<Verdict, "title" | "endpoint" | "timestamp" | "times">;

/**
 * Turns the recorded attempts into the final verdict. Any failed attempt
 * makes the endpoint down and latency is then not judged; otherwise a
 * median above a non-zero threshold makes it degraded.
 */
export function conclude(result: CheckResult, thresholdRttMs = 0): Verdict {
  const stats = computeStats(result.times);
  const base = {
    ...result,
    stats,
    thresholdRttMs,
    healthy: false,
    degraded: false,
    down: false,
  };

  const failedIndex = result.times.findIndex((attempt) => !!attempt.error);
  if (failedIndex >= 0) {
    const failure = result.times[failedIndex].error;
    return {
      ...base,
      down: true,
      notice: `attempt ${failedIndex + 1} failed: ${failure} - ${summarizeAttempts(result.times)}`,
    };
  }

  if (thresholdRttMs > 0 && stats.median > thresholdRttMs) {
    return {
      ...base,
      degraded: true,
      notice: `median round trip time exceeded threshold (${formatMs(thresholdRttMs)}) - ${summarizeAttempts(result.times)}`,
    };
  }

  return { ...base, healthy: true };
}

export function verdictStatus(verdict: Pick<Verdict, "down" | "degraded">): HealthStatus {
  if (verdict.down) return "DOWN";
  if (verdict.degraded) return "DEGRADED";
  return "HEALTHY";
}
