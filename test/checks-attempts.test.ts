import { afterEach, describe, expect, it, vi } from "vitest";

vi.mock("undici", async (importOriginal) => {
  const actual = await importOriginal<typeof import("undici")>();
  return { ...actual, request: vi.fn() };
});

import { request, type Dispatcher } from "undici";

import { executeAttempts, prepareRequest } from "../src/checks/attempts.js";

const dispatcher = {} as Dispatcher;

function fakeResponse(statusCode: number, body = "") {
  return {
    statusCode,
    body: {
      text: vi.fn(async () => body),
      dump: vi.fn(async () => undefined),
    },
  };
}

function steppingClock(...values: number[]) {
  const queue = values.slice();
  return () => {
    const next = queue.shift();
    if (next === undefined) throw new Error("clock exhausted");
    return next;
  };
}

const probe = prepareRequest(new URL("https://status.test/health"));

describe("checks/attempts", () => {
  afterEach(() => {
    vi.resetAllMocks();
  });

  describe("prepareRequest", () => {
    it("joins multiple values and routes Host to the host override", () => {
      const prepared = prepareRequest(new URL("https://10.0.0.5:8443/health?full=1"), {
        Accept: ["application/json", "text/plain"],
        "X-Probe": "status-agent",
        hOsT: ["api.internal.test", "ignored.test"],
      });
      expect(prepared).toEqual({
        url: "https://10.0.0.5:8443/health?full=1",
        headers: { Accept: "application/json, text/plain", "X-Probe": "status-agent" },
        host: "api.internal.test",
      });
    });

    it("has no host override without a Host header", () => {
      expect(prepareRequest(new URL("http://status.test/")).host).toBeNull();
    });

    it("skips headers with no values", () => {
      expect(prepareRequest(new URL("http://status.test/"), { "X-Empty": [] }).headers).toEqual({});
    });
  });

  it("records every attempt in order with its round trip time", async () => {
    vi.mocked(request)
      .mockResolvedValueOnce(fakeResponse(200) as never)
      .mockResolvedValueOnce(fakeResponse(200) as never)
      .mockResolvedValueOnce(fakeResponse(200) as never);

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 3,
      attemptSpacingMs: 0,
      rules: { upStatus: 200 },
      now: steppingClock(0, 50, 100, 160, 200, 240),
    });

    expect(times).toEqual([{ rttMs: 50 }, { rttMs: 60 }, { rttMs: 40 }]);
    expect(Object.isFrozen(times[0])).toBe(true);
    expect(request).toHaveBeenCalledTimes(3);
    expect(request).toHaveBeenCalledWith("https://status.test/health", {
      dispatcher,
      method: "GET",
      headers: {},
    });
  });

  it("keeps going after a transport error", async () => {
    vi.mocked(request)
      .mockRejectedValueOnce(new Error("connect ECONNREFUSED 10.0.0.5:443"))
      .mockResolvedValueOnce(fakeResponse(200) as never);

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 2,
      attemptSpacingMs: 0,
      rules: { upStatus: 200 },
      now: steppingClock(0, 3, 10, 30),
    });

    expect(times).toEqual([{ rttMs: 3, error: "connect ECONNREFUSED 10.0.0.5:443" }, { rttMs: 20 }]);
  });

  it("records classification failures and releases every body", async () => {
    const ok = fakeResponse(200, "all good");
    const wrongStatus = fakeResponse(502);
    const bad = fakeResponse(200, "ERROR: db offline");
    vi.mocked(request)
      .mockResolvedValueOnce(ok as never)
      .mockResolvedValueOnce(wrongStatus as never)
      .mockResolvedValueOnce(bad as never);

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 3,
      attemptSpacingMs: 0,
      rules: { upStatus: 200, mustNotContain: "ERROR" },
      now: steppingClock(0, 1, 0, 1, 0, 1),
    });

    expect(times.map((t) => t.error)).toEqual([undefined, "response status 502 Bad Gateway", "response contains 'ERROR'"]);
    expect(ok.body.dump).toHaveBeenCalledTimes(1);
    expect(wrongStatus.body.dump).toHaveBeenCalledTimes(1);
    expect(bad.body.dump).toHaveBeenCalledTimes(1);
  });

  it("releases the body when reading it fails", async () => {
    const broken = fakeResponse(200);
    broken.body.text.mockRejectedValueOnce(new Error("aborted"));
    vi.mocked(request).mockResolvedValueOnce(broken as never);

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 1,
      attemptSpacingMs: 0,
      rules: { upStatus: 200, mustContain: "ok" },
      now: steppingClock(0, 8),
    });

    expect(times).toEqual([{ rttMs: 8, error: "reading response body: aborted" }]);
    expect(broken.body.dump).toHaveBeenCalledTimes(1);
  });

  it("sends the Host override as the request host", async () => {
    vi.mocked(request).mockResolvedValueOnce(fakeResponse(200) as never);
    const withHost = prepareRequest(new URL("https://10.0.0.5/health"), { Host: "api.internal.test", Accept: "*/*" });

    await executeAttempts(withHost, dispatcher, { attempts: 1, attemptSpacingMs: 0, rules: { upStatus: 200 } });

    expect(request).toHaveBeenCalledWith("https://10.0.0.5/health", {
      dispatcher,
      method: "GET",
      headers: { Accept: "*/*", host: "api.internal.test" },
    });
  });

  it("spaces attempts apart but never sleeps after the last one", async () => {
    const events: string[] = [];
    vi.mocked(request).mockImplementation(async () => {
      events.push("request");
      return fakeResponse(200) as never;
    });
    const sleep = vi.fn(async (ms: number) => {
      events.push(`sleep ${ms}`);
    });

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 3,
      attemptSpacingMs: 250,
      rules: { upStatus: 200 },
      sleep,
    });

    expect(times).toHaveLength(3);
    expect(events).toEqual(["request", "sleep 250", "request", "sleep 250", "request"]);
  });

  it("runs one attempt when the count is below one", async () => {
    vi.mocked(request).mockResolvedValue(fakeResponse(200) as never);
    const sleep = vi.fn(async () => undefined);

    const times = await executeAttempts(probe, dispatcher, {
      attempts: 0,
      attemptSpacingMs: 100,
      rules: { upStatus: 200 },
      sleep,
    });

    expect(times).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("never overlaps attempts", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    vi.mocked(request).mockImplementation(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight -= 1;
      return fakeResponse(200) as never;
    });

    await executeAttempts(probe, dispatcher, { attempts: 4, attemptSpacingMs: 0, rules: { upStatus: 200 } });

    expect(maxInFlight).toBe(1);
  });
});
