export type HealthStatus = "HEALTHY" | "DEGRADED" | "DOWN";

export type HttpCheckConfig = {
  name: string;
  url: string;
  // Expected status of a healthy endpoint; 0 means 200.
  upStatus?: number;
  // 0 disables the degraded classification.
  thresholdRttMs?: number;
  mustContain?: string;
  mustNotContain?: string;
  attempts?: number;
  attemptSpacingMs?: number;
  tlsSkipVerify?: boolean;
  tlsCaFile?: string;
  headers?: Record<string, string | string[]>;
};

export type Attempt = {
  readonly rttMs: number;
  // Absent when the attempt succeeded.
  readonly error?: string;
};

export type Stats = {
  total: number;
  mean: number;
  median: number;
  min: number;
  max: number;
};

export type Verdict = {
  title: string;
  endpoint: string;
  timestamp: number;
  times: readonly Attempt[];
  stats: Stats;
  thresholdRttMs: number;
  healthy: boolean;
  degraded: boolean;
  down: boolean;
  notice?: string;
};

export type StorageConfig = {
  dir: string;
  checkExpiryMs: number;
};

export type AgentConfig = {
  checks: HttpCheckConfig[];
  storage: StorageConfig | null;
};

export type AvailabilityReport = {
  name: string;
  endpoint: string;
  checked_at: string;
  success: boolean;
  duration_ms: number;
  run_location: string;
  message: string | null;
};
