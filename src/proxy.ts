/**
 * Proxy Liveness Probe — is the reverse-proxy frontend accepting connections?
 */

import { createConnection } from 'net';

export interface ProxyConfig {
  enabled: boolean;
  host: string;
  port: number;
  timeoutMs: number;
  /** Skip the TCP check and report the proxy as reachable. */
  assumeAvailable: boolean;
}

export type ProxyProbe = (config: ProxyConfig) => Promise<boolean>;

export const isProxyAvailable: ProxyProbe = (config) => {
  if (config.assumeAvailable) return Promise.resolve(true);

  return new Promise<boolean>(resolve => {
    const socket = createConnection({ host: config.host, port: config.port });
    const finish = (available: boolean) => {
      socket.destroy();
      resolve(available);
    };
    socket.setTimeout(config.timeoutMs, () => finish(false));
    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
  });
};

/** Servers are rewritten to proxy paths only when proxying is on and the proxy answers. */
export async function resolveProxyMode(config: ProxyConfig, probe: ProxyProbe = isProxyAvailable): Promise<boolean> {
  if (!config.enabled) return false;
  return probe(config);
}
