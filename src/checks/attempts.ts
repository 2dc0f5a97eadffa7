import { request, type Dispatcher } from "undici";

import { toErrorMessage } from "../errors.js";
import type { Attempt } from "../types.js";
import { log, sleep as defaultSleep } from "../util.js";
import { classifyResponse, type ClassifyRules } from "./classify.js";

export type ProbeRequest = {
  url: string;
  headers: Record<string, string>;
  // Value of a configured Host header; replaces the host the request is addressed to.
  host: string | null;
};

export type ExecuteOptions = {
  attempts: number;
  attemptSpacingMs: number;
  rules: ClassifyRules;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export function prepareRequest(url: URL, headers: Record<string, string | string[]> = {}): ProbeRequest {
  const outbound: Record<string, string> = {};
  let host: string | null = null;

  for (const [key, raw] of Object.entries(headers)) {
    const values = Array.isArray(raw) ? raw : [raw];
    if (!values.length) continue;
    if (key.toLowerCase() === "host") {
      host = values[0];
      continue;
    }
    outbound[key] = values.join(", ");
  }

  return { url: url.toString(), headers: outbound, host };
}

async function releaseBody(body: Dispatcher.ResponseData["body"]) {
  try {
    await body.dump();
  } catch (error) {
    log("body_release_failed", { error: toErrorMessage(error) });
  }
}

async function attemptOnce(
  probe: ProbeRequest,
  dispatcher: Dispatcher,
  rules: ClassifyRules,
  now: () => number,
): Promise<Attempt> {
  const started = now();
  let response: Dispatcher.ResponseData;
  try {
    response = await request(probe.url, {
      dispatcher,
      method: "GET",
      headers: probe.host ? { ...probe.headers, host: probe.host } : probe.headers,
    });
  } catch (error) {
    return { rttMs: now() - started, error: toErrorMessage(error) };
  }

  const rttMs = now() - started;
  try {
    const failure = await classifyResponse(response, rules);
    return failure ? { rttMs, error: failure } : { rttMs };
  } finally {
    await releaseBody(response.body);
  }
}

/**
 * Runs the configured number of attempts one after another. Every attempt
 * yields a record, in issue order; a failed attempt never stops the rest.
 */
export async function executeAttempts(
  probe: ProbeRequest,
  dispatcher: Dispatcher,
  options: ExecuteOptions,
): Promise<Attempt[]> {
  const now = options.now ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;
  const total = Math.max(1, options.attempts);
  const times: Attempt[] = [];

  for (let i = 0; i < total; i += 1) {
    times.push(Object.freeze(await attemptOnce(probe, dispatcher, options.rules, now)));

    if (options.attemptSpacingMs > 0 && i < total - 1) {
      await sleep(options.attemptSpacingMs);
    }
  }

  return times;
}
