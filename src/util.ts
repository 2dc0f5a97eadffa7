import { setTimeout as sleepTimeout } from "node:timers/promises";

export async function sleep(ms: number) {
  await sleepTimeout(ms);
}

export function getEnv(key: string, fallback?: string) {
  const value = process.env[key] ?? fallback;
  if (!value) {
    throw new Error(`Missing env var ${key}`);
  }
  return value;
}

export function getOptionalEnv(key: string): string | null {
  const value = process.env[key];
  if (!value) return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

export function getEnvInt(key: string, fallback: number) {
  const raw = process.env[key];
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function formatMs(ms: number) {
  return `${Math.round(ms)}ms`;
}

export async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let cursor = 0;
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await fn(items[index]);
    }
  });
  await Promise.all(workers);
  return results;
}

export async function fetchJson<T>(
  url: string,
  init: RequestInit & { timeoutMs?: number } = {},
): Promise<{ ok: boolean; status: number; data: T | null; text: string | null; duration_ms: number }> {
  const controller = new AbortController();
  const timeoutMs = init.timeoutMs ?? 10_000;
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const startedAt = Date.now();

  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    const status = res.status;
    const contentType = res.headers.get("content-type") ?? "";
    const duration_ms = Date.now() - startedAt;
    if (contentType.includes("application/json")) {
      const data = (await res.json()) as T;
      return { ok: res.ok, status, data, text: null, duration_ms };
    }
    const text = await res.text();
    return { ok: res.ok, status, data: null, text, duration_ms };
  } catch (error) {
    // undici throws AbortError on timeout; keep the shape stable so callers log it.
    const name = error instanceof Error ? error.name : null;
    const message = error instanceof Error ? error.message : String(error);
    if (name === "AbortError" || message.toLowerCase().includes("aborted")) {
      return {
        ok: false,
        status: 0,
        data: null,
        text: `timeout after ${timeoutMs}ms`,
        duration_ms: Date.now() - startedAt,
      };
    }

    if (error instanceof Error) {
      const parts: string[] = [`${error.name}: ${error.message}`];
      const cause: unknown = error.cause;
      if (cause instanceof Error) {
        parts.push(`cause=${cause.name}: ${cause.message}`);
      } else if (cause !== undefined) {
        parts.push(`cause=${String(cause)}`);
      }
      return { ok: false, status: 0, data: null, text: parts.join(" | "), duration_ms: Date.now() - startedAt };
    }

    return { ok: false, status: 0, data: null, text: message, duration_ms: Date.now() - startedAt };
  } finally {
    clearTimeout(timeout);
  }
}

export function log(event: string, payload: Record<string, unknown> = {}) {
  // One JSON object per line for journald/docker log collectors.
  const line = JSON.stringify({ ts: new Date().toISOString(), event, ...payload });
  // eslint-disable-next-line no-console
  console.log(line);
}
