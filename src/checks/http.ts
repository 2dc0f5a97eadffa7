import type { Dispatcher } from "undici";

import { ConfigError } from "../errors.js";
import type { HttpCheckConfig, Verdict } from "../types.js";
import { executeAttempts, prepareRequest } from "./attempts.js";
import { buildTransport, closeTransport, parseTargetUrl, type Transport } from "./transport.js";
import { conclude } from "./verdict.js";

export type HttpCheckOptions = {
  // Pre-built client; when set no transport is built for the check.
  dispatcher?: Dispatcher;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

const DEFAULT_UP_STATUS = 200;

/**
 * Probes one endpoint and returns its verdict. Only configuration problems
 * (bad URL, unusable CA file) are thrown, before any request is sent;
 * an unhealthy endpoint is still a successful check.
 */
export async function runHttpCheck(config: HttpCheckConfig, opts: HttpCheckOptions = {}): Promise<Verdict> {
  if (!config.name.trim()) {
    throw new ConfigError("endpoint name is required");
  }
  if (!config.url.trim()) {
    throw new ConfigError("endpoint URL is required", { check: config.name });
  }

  const targetUrl = parseTargetUrl(config.url, config.name);
  const probe = prepareRequest(targetUrl, config.headers);
  const transport: Transport = opts.dispatcher
    ? { dispatcher: opts.dispatcher, owned: false }
    : await buildTransport(config, targetUrl);

  const timestamp = Date.now();
  try {
    const times = await executeAttempts(probe, transport.dispatcher, {
      attempts: Math.max(1, config.attempts ?? 1),
      attemptSpacingMs: config.attemptSpacingMs ?? 0,
      rules: {
        upStatus: config.upStatus || DEFAULT_UP_STATUS,
        mustContain: config.mustContain,
        mustNotContain: config.mustNotContain,
      },
      now: opts.now,
      sleep: opts.sleep,
    });

    return conclude({ title: config.name, endpoint: config.url, timestamp, times }, config.thresholdRttMs ?? 0);
  } finally {
    await closeTransport(transport);
  }
}
