import { RouterOSAPI } from 'node-routeros';
import { z } from 'zod';
import type { DeviceConfig } from '../config.js';
import { DeviceConnectionError, GatewayCommandError, errorMessage } from '../errors.js';
import { canonicalDomain, type DomainSet } from '../domains/normalize.js';
import { deviceLabel, type GatewayClient, type GatewayConnectOptions } from './types.js';

const nameRows = z.array(z.object({ name: z.string().optional() }).passthrough());

/**
 * Binary API transport (8728, or 8729 with TLS). The library tries a plain
 * login first and answers the MD5 challenge when an older device sends one,
 * so `plain` and `token` devices share this client.
 */
export class RouterOsApiClient implements GatewayClient {
  private lastError: Error | null = null;

  private constructor(
    private readonly api: RouterOSAPI,
    private readonly timeoutMs: number
  ) {}

  static async connect(device: DeviceConfig, opts: GatewayConnectOptions): Promise<RouterOsApiClient> {
    const api = new RouterOSAPI({
      host: device.host,
      user: device.user,
      password: device.password,
      port: opts.apiPort,
      timeout: Math.max(1, Math.ceil(opts.timeoutMs / 1000)),
      keepalive: false,
      ...(opts.apiTls ? { tls: { rejectUnauthorized: !opts.tlsInsecure } } : {})
    });
    const client = new RouterOsApiClient(api, opts.timeoutMs);
    // Socket errors after connect are reported through the failing command instead.
    api.on('error', (e: unknown) => {
      client.lastError = e instanceof Error ? e : new Error(errorMessage(e));
    });

    try {
      await api.connect();
    } catch (e) {
      throw new DeviceConnectionError(deviceLabel(device), errorMessage(e), { cause: e });
    }
    return client;
  }

  /** Runs one command; a `!trap` or a reply slower than the timeout rejects. */
  async command(menu: string, params: string[] = []): Promise<unknown> {
    if (!this.api.connected) {
      throw new GatewayCommandError(menu, this.lastError ? errorMessage(this.lastError) : 'CONNECTION_CLOSED');
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new GatewayCommandError(menu, 'TIMEOUT')), this.timeoutMs);
    });
    try {
      return await Promise.race([this.api.write(menu, params), timeout]);
    } catch (e) {
      if (e instanceof GatewayCommandError) throw e;
      throw new GatewayCommandError(menu, errorMessage(e), { cause: e });
    } finally {
      clearTimeout(timer);
    }
  }

  private async names(menu: string, params: string[]): Promise<DomainSet> {
    const rows = nameRows.parse(await this.command(menu, params));
    const result: DomainSet = new Set();
    for (const row of rows) {
      const name = canonicalDomain(row.name ?? '');
      if (name) result.add(name);
    }
    return result;
  }

  async listStaticRedirectDomains(): Promise<DomainSet> {
    return await this.names('/ip/dns/static/print', ['=.proplist=name']);
  }

  async listResolvedDomains(): Promise<DomainSet> {
    return await this.names('/ip/dns/cache/all/print', ['=.proplist=name', '?type=A', '?type=CNAME', '?#|']);
  }

  async addStaticRedirect(domain: string, redirectIp: string, comment: string): Promise<void> {
    await this.command('/ip/dns/static/add', [
      `=name=${domain}`,
      `=address=${redirectIp}`,
      `=comment=${comment}`,
      '=disabled=no'
    ]);
  }

  async flushResolverCache(): Promise<void> {
    await this.command('/ip/dns/cache/flush');
  }

  async close(): Promise<void> {
    if (!this.api.connected) return;
    await this.api.close();
  }
}
