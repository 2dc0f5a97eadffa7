import { z } from "zod";

import { ConfigError } from "../errors.js";
import type { AgentConfig, HttpCheckConfig } from "../types.js";

const headerValueSchema = z.union([z.string(), z.array(z.string())]);

export const httpCheckSchema = z
  .object({
    endpoint_name: z.string().trim().min(1, "endpoint_name is required"),
    endpoint_url: z.string().trim().min(1, "endpoint_url is required"),
    up_status: z.number().int().min(0).max(599).optional(),
    threshold_rtt_ms: z.number().min(0).optional(),
    must_contain: z.string().optional(),
    must_not_contain: z.string().optional(),
    attempts: z.number().int().optional(),
    attempt_spacing_ms: z.number().min(0).optional(),
    tls_skip_verify: z.boolean().optional(),
    tls_ca_file: z.string().optional(),
    headers: z.record(headerValueSchema).optional(),
  })
  .transform(
    (raw): HttpCheckConfig => ({
      name: raw.endpoint_name,
      url: raw.endpoint_url,
      upStatus: raw.up_status,
      thresholdRttMs: raw.threshold_rtt_ms,
      mustContain: raw.must_contain || undefined,
      mustNotContain: raw.must_not_contain || undefined,
      attempts: raw.attempts,
      attemptSpacingMs: raw.attempt_spacing_ms,
      tlsSkipVerify: raw.tls_skip_verify,
      tlsCaFile: raw.tls_ca_file || undefined,
      headers: raw.headers,
    }),
  );

export const storageSchema = z.object({
  dir: z.string().trim().min(1),
  check_expiry_seconds: z.number().int().min(0).default(0),
});

export const agentConfigSchema = z.object({
  checks: z.array(z.unknown()).default([]),
  storage: storageSchema.nullable().optional(),
});

export type CheckIssue = {
  index: number;
  name: string | null;
  message: string;
};

export function formatIssues(error: z.ZodError) {
  return error.issues.map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message)).join("; ");
}

function rawName(value: unknown): string | null {
  if (value && typeof value === "object" && "endpoint_name" in value) {
    const name = value.endpoint_name;
    return typeof name === "string" ? name : null;
  }
  return null;
}

/**
 * Validates the whole checks file. A bad entry is reported and skipped so
 * one typo does not stop the other endpoints from being probed.
 */
export function parseAgentConfig(input: unknown): { config: AgentConfig; issues: CheckIssue[] } {
  const parsed = agentConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`invalid agent config: ${formatIssues(parsed.error)}`);
  }

  const checks: HttpCheckConfig[] = [];
  const issues: CheckIssue[] = [];
  parsed.data.checks.forEach((entry, index) => {
    const check = httpCheckSchema.safeParse(entry);
    if (check.success) {
      checks.push(check.data);
    } else {
      issues.push({ index, name: rawName(entry), message: formatIssues(check.error) });
    }
  });

  const storage = parsed.data.storage
    ? { dir: parsed.data.storage.dir, checkExpiryMs: parsed.data.storage.check_expiry_seconds * 1000 }
    : null;

  return { config: { checks, storage }, issues };
}
