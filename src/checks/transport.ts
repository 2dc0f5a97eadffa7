import { readFile } from "node:fs/promises";
import { X509Certificate } from "node:crypto";
import net, { isIP } from "node:net";
import tls from "node:tls";
import { Agent, type Dispatcher, type buildConnector } from "undici";

import { ConfigError } from "../errors.js";
import type { HttpCheckConfig } from "../types.js";

export type Transport = {
  dispatcher: Dispatcher;
  // Owned transports were built for one invocation and must be closed by it.
  owned: boolean;
};

export type TransportPolicy = {
  // TCP dial plus TLS handshake.
  connectTimeoutMs: number;
  headersTimeoutMs: number;
  bodyTimeoutMs: number;
};

export const DEFAULT_POLICY: Readonly<TransportPolicy> = Object.freeze({
  connectTimeoutMs: 10_000,
  headersTimeoutMs: 5_000,
  bodyTimeoutMs: 10_000,
});

const DIAL_TIMEOUT_MS = 5_000;
const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

let defaultTransport: Transport | null = null;

function agentOptions(policy: TransportPolicy): Agent.Options {
  return {
    // pipelining 0 disables keep-alive; every attempt opens a fresh connection.
    // No per-origin connection cap: checks on the same host run side by side.
    pipelining: 0,
    headersTimeout: policy.headersTimeoutMs,
    bodyTimeout: policy.bodyTimeoutMs,
    // 3xx responses are returned to the caller as is.
    maxRedirections: 0,
  };
}

/**
 * Shared transport used when a check needs no TLS customisation.
 * Built on first use and never mutated afterwards.
 *
 * `connectTimeoutMs` bounds the TCP dial and the TLS handshake together;
 * undici has no separate handshake timer.
 */
export function getDefaultTransport(): Transport {
  if (!defaultTransport) {
    defaultTransport = Object.freeze({
      dispatcher: new Agent({
        ...agentOptions(DEFAULT_POLICY),
        connect: { timeout: DEFAULT_POLICY.connectTimeoutMs },
      }),
      owned: false,
    });
  }
  return defaultTransport;
}

export function parseTargetUrl(raw: string, check?: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ConfigError("error parsing URL", { check, cause: error });
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ConfigError(`unsupported URL scheme ${url.protocol}`, { check });
  }
  return url;
}

export function splitPemCertificates(pem: string): string[] {
  return pem.match(PEM_BLOCK) ?? [];
}

function isParsableCertificate(block: string) {
  try {
    new X509Certificate(block);
    return true;
  } catch {
    return false;
  }
}

export async function buildTlsOptions(
  config: Pick<HttpCheckConfig, "name" | "tlsSkipVerify" | "tlsCaFile">,
): Promise<tls.ConnectionOptions> {
  const options: tls.ConnectionOptions = {};
  if (config.tlsSkipVerify) {
    options.rejectUnauthorized = false;
  }

  if (config.tlsCaFile) {
    let rootPem: string;
    try {
      rootPem = await readFile(config.tlsCaFile, "utf8");
    } catch (error) {
      throw new ConfigError("error reading root certificate", { check: config.name, cause: error });
    }
    if (!rootPem.trim()) {
      throw new ConfigError("error reading root certificate", { check: config.name });
    }

    const extra = splitPemCertificates(rootPem).filter(isParsableCertificate);
    if (!extra.length) {
      throw new ConfigError("error parsing root certificate", { check: config.name });
    }
    // Node 20 has no handle on the OS store; the bundled root list stands in for it.
    options.ca = [...tls.rootCertificates, ...extra];
  }

  return options;
}

/**
 * Connect function that always dials the check's target and runs the TLS
 * handshake itself, so the check's trust settings apply to every connection.
 */
export function createConnector(targetUrl: URL, tlsOptions: tls.ConnectionOptions): buildConnector.connector {
  const host = targetUrl.hostname.replace(/^\[(.*)\]$/, "$1");
  const secure = targetUrl.protocol === "https:";
  const port = Number(targetUrl.port || (secure ? 443 : 80));

  return (_options, callback) => {
    let settled = false;
    const socket = secure
      ? tls.connect({ ...tlsOptions, host, port, servername: isIP(host) ? undefined : host })
      : net.connect({ host, port });

    const finish = (error: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.removeListener("error", finish);
      if (error) {
        socket.destroy();
        callback(error, null);
        return;
      }
      callback(null, socket);
    };

    const timer = setTimeout(() => {
      finish(new Error(`dial tcp ${host}:${port}: i/o timeout after ${DIAL_TIMEOUT_MS}ms`));
    }, DIAL_TIMEOUT_MS);

    socket.once("error", finish);
    socket.once(secure ? "secureConnect" : "connect", () => finish(null));
  };
}

export async function buildTransport(config: HttpCheckConfig, targetUrl: URL): Promise<Transport> {
  if (!config.tlsSkipVerify && !config.tlsCaFile) {
    return getDefaultTransport();
  }

  const tlsOptions = await buildTlsOptions(config);
  return {
    dispatcher: new Agent({
      ...agentOptions(DEFAULT_POLICY),
      connect: createConnector(targetUrl, tlsOptions),
    }),
    owned: true,
  };
}

export async function closeTransport(transport: Transport) {
  if (!transport.owned) return;
  await transport.dispatcher.close();
}
