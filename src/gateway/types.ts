import type { DeviceConfig } from '../config.js';
import type { DomainSet } from '../domains/normalize.js';

export type GatewaySnapshot = {
  staticDomains: DomainSet;
  resolvedDomains: DomainSet;
};

export interface GatewayClient {
  /** Names that already have a static DNS entry. */
  listStaticRedirectDomains(): Promise<DomainSet>;
  /** Names in the resolver cache with an A or CNAME record. */
  listResolvedDomains(): Promise<DomainSet>;
  addStaticRedirect(domain: string, redirectIp: string, comment: string): Promise<void>;
  flushResolverCache(): Promise<void>;
  close(): Promise<void>;
}

export type GatewayConnector = (device: DeviceConfig) => Promise<GatewayClient>;

export type GatewayConnectOptions = {
  timeoutMs: number;
  apiPort: number;
  apiTls: boolean;
  restScheme: 'http' | 'https';
  tlsInsecure: boolean;
};

export function deviceLabel(device: Pick<DeviceConfig, 'name' | 'host'>): string {
  return `${device.name} (${device.host})`;
}

export async function takeSnapshot(client: GatewayClient): Promise<GatewaySnapshot> {
  const staticDomains = await client.listStaticRedirectDomains();
  const resolvedDomains = await client.listResolvedDomains();
  return { staticDomains, resolvedDomains };
}
