/**
 * HTTP session — long-lived undici dispatchers for proxies and custom CAs
 *
 * Proxies rotate round-robin, one per request. With only a CA bundle a single
 * Agent trusting it is shared by every request. With neither, requests go
 * through undici's global dispatcher.
 */

import { readFileSync } from "fs";
import { Agent, ProxyAgent, type Dispatcher } from "undici";
import type { HttpSession, HttpSessionOptions } from "@/types";
import { DEFAULT_PROXY_SCHEME } from "@/constants";
import { ConfigurationError } from "@/config/configurationError";
import { describeError } from "@/utils";
import * as logger from "@/logger";

/**
 * Normalize a proxy entry to a URL undici accepts
 * "host:port" and "user:pass@host:port" get an http:// scheme
 */
export function formatProxyUrl(proxy: string): string {
  const trimmed = proxy.trim();
  return trimmed.includes("://") ? trimmed : `${DEFAULT_PROXY_SCHEME}${trimmed}`;
}

function readCaCert(caCertPath: string): Buffer {
  try {
    return readFileSync(caCertPath);
  } catch (error) {
    throw new ConfigurationError(
      `CA certificate could not be read from ${caCertPath}: ${describeError(error)}`,
    );
  }
}

/**
 * Create a session whose dispatchers apply the given proxies and CA bundle
 */
export function createHttpSession(options: HttpSessionOptions = {}): HttpSession {
  const ca = options.caCert ? readCaCert(options.caCert) : undefined;
  const proxies = (options.proxies ?? [])
    .map((proxy) => proxy.trim())
    .filter((proxy) => proxy.length > 0);

  const dispatchers: Dispatcher[] =
    proxies.length > 0
      ? proxies.map(
          (proxy) =>
            new ProxyAgent({
              uri: formatProxyUrl(proxy),
              requestTls: ca ? { ca } : undefined,
            }),
        )
      : ca
        ? [new Agent({ connect: { ca } })]
        : [];

  logger.debug("HTTP session created", {
    proxies: proxies.length,
    customCa: ca !== undefined,
  });

  let cursor = 0;

  return {
    nextDispatcher(): Dispatcher | undefined {
      if (dispatchers.length === 0) {
        return undefined;
      }
      const dispatcher = dispatchers[cursor % dispatchers.length];
      cursor++;
      return dispatcher;
    },

    async close(): Promise<void> {
      await Promise.all(dispatchers.map((dispatcher) => dispatcher.close()));
    },
  };
}
