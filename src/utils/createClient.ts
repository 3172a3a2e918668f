import { createPublicClient, http, webSocket, type Chain, type PublicClient } from 'viem';

export interface ChainClientOptions {
  rpcUrl: string;
  chain: Chain;
  pollingIntervalMs: number;
}

export function isWebSocketUrl(url: string): boolean {
  return /^wss?:\/\//i.test(url);
}

/**
 * Create a viem public client for the configured endpoint.
 * ws(s) endpoints get a push subscription; http(s) endpoints fall back to
 * filter polling. Socket reconnection is left to the subscriber's backoff.
 */
export function createClient({ rpcUrl, chain, pollingIntervalMs }: ChainClientOptions): PublicClient {
  const transport = isWebSocketUrl(rpcUrl)
    ? webSocket(rpcUrl, { reconnect: false, retryCount: 0 })
    : http(rpcUrl, { retryCount: 3, retryDelay: 500, timeout: 30000 });

  return createPublicClient({
    chain,
    transport,
    pollingInterval: pollingIntervalMs,
  });
}
