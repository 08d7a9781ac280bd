import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';
import type { DeviceConfig } from '../config.js';
import { DeviceConnectionError, GatewayCommandError, errorMessage } from '../errors.js';
import { canonicalDomain, type DomainSet } from '../domains/normalize.js';
import { deviceLabel, type GatewayClient, type GatewayConnectOptions } from './types.js';

const nameRows = z.array(z.object({ name: z.string().optional() }).passthrough());
const cacheRows = z.array(z.object({ name: z.string().optional(), type: z.string().optional() }).passthrough());
const restError = z.object({ error: z.number().optional(), message: z.string().optional(), detail: z.string().optional() });

// Error bodies may come from a proxy in front of the device and need not be JSON.
function errorDetail(text: string): string | undefined {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = restError.safeParse(payload);
  return parsed.success ? parsed.data.detail ?? parsed.data.message : undefined;
}

const RESOLVED_TYPES = new Set(['A', 'CNAME']);

export type RestClientOptions = GatewayConnectOptions & {
  /** Overrides the connection pool, e.g. with a MockAgent in tests. */
  dispatcher?: Dispatcher;
};

export class RouterOsRestClient implements GatewayClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly ownsDispatcher: boolean;
  private readonly dispatcher: Dispatcher;

  constructor(
    device: DeviceConfig,
    private readonly opts: RestClientOptions
  ) {
    const host = device.host.includes(':') && !device.host.startsWith('[') ? `[${device.host}]` : device.host;
    this.baseUrl = `${opts.restScheme}://${host}/rest`;
    this.authorization = `Basic ${Buffer.from(`${device.user}:${device.password}`, 'utf8').toString('base64')}`;
    this.ownsDispatcher = !opts.dispatcher;
    this.dispatcher =
      opts.dispatcher ??
      new Agent({
        connections: 2,
        connect: { rejectUnauthorized: !opts.tlsInsecure }
      });
  }

  static async connect(device: DeviceConfig, opts: RestClientOptions): Promise<RouterOsRestClient> {
    const client = new RouterOsRestClient(device, opts);
    try {
      await client.call('GET', '/system/identity');
    } catch (e) {
      await client.close();
      throw new DeviceConnectionError(deviceLabel(device), errorMessage(e), { cause: e });
    }
    return client;
  }

  private async call(method: 'GET' | 'PUT' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const command = `${method} ${path}`;
    const ac = new AbortController();
    const timer = setTimeout(() => ac.abort(), this.opts.timeoutMs);
    try {
      const res = await request(`${this.baseUrl}${path}`, {
        method,
        headers: {
          authorization: this.authorization,
          accept: 'application/json',
          ...(body === undefined ? {} : { 'content-type': 'application/json' })
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        dispatcher: this.dispatcher,
        signal: ac.signal
      });

      const text = await res.body.text();

      if (res.statusCode < 200 || res.statusCode >= 300) {
        const detail = errorDetail(text);
        throw new GatewayCommandError(command, `HTTP_${res.statusCode}${detail ? `: ${detail}` : ''}`);
      }
      return text ? JSON.parse(text) : null;
    } catch (e) {
      if (e instanceof GatewayCommandError) throw e;
      if (ac.signal.aborted) throw new GatewayCommandError(command, 'TIMEOUT', { cause: e });
      throw new GatewayCommandError(command, errorMessage(e), { cause: e });
    } finally {
      clearTimeout(timer);
    }
  }

  async listStaticRedirectDomains(): Promise<DomainSet> {
    const rows = nameRows.parse(await this.call('GET', '/ip/dns/static?.proplist=name'));
    const result: DomainSet = new Set();
    for (const row of rows) {
      const name = canonicalDomain(row.name ?? '');
      if (name) result.add(name);
    }
    return result;
  }

  async listResolvedDomains(): Promise<DomainSet> {
    const rows = cacheRows.parse(await this.call('GET', '/ip/dns/cache/all?.proplist=name,type'));
    const result: DomainSet = new Set();
    for (const row of rows) {
      if (!row.type || !RESOLVED_TYPES.has(row.type)) continue;
      const name = canonicalDomain(row.name ?? '');
      if (name) result.add(name);
    }
    return result;
  }

  async addStaticRedirect(domain: string, redirectIp: string, comment: string): Promise<void> {
    await this.call('PUT', '/ip/dns/static', {
      name: domain,
      address: redirectIp,
      comment,
      disabled: 'false'
    });
  }

  async flushResolverCache(): Promise<void> {
    await this.call('POST', '/ip/dns/cache/flush', {});
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) await this.dispatcher.close();
  }
}
