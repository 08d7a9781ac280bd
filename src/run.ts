import type { AppConfig, DeviceConfig } from './config.js';
import { errorMessage } from './errors.js';
import { applyBlockSet } from './apply.js';
import { getDeniedDomains, type DeniedDomainsDeps } from './blocklists/cache.js';
import { readAllowList } from './domains/files.js';
import type { DomainSet } from './domains/normalize.js';
import { computeBlockSet } from './reconcile.js';
import { connectOptionsFromConfig, createGatewayConnector } from './gateway/connect.js';
import {
  deviceLabel,
  takeSnapshot,
  type GatewayClient,
  type GatewayConnector,
  type GatewaySnapshot
} from './gateway/types.js';
import { silentLogger, type Logger } from './logger.js';

type DeviceBase = { device: string; host: string };

export type DeviceOutcome =
  | (DeviceBase & {
      status: 'ok' | 'partial';
      dryRun: boolean;
      staticCount: number;
      resolvedCount: number;
      blocked: string[];
      failed: { domain: string; error: string }[];
      flushError?: string;
    })
  | (DeviceBase & { status: 'connection-failed'; error: string })
  | (DeviceBase & { status: 'snapshot-failed'; error: string });

export type RunReport = {
  startedAt: string;
  finishedAt: string;
  denied: { count: number; refreshed: boolean; stale: boolean };
  allowedCount: number;
  devices: DeviceOutcome[];
};

export type RunDeps = {
  logger?: Logger;
  connect?: GatewayConnector;
  now?: () => Date;
  fetchAll?: DeniedDomainsDeps['fetchAll'];
};

type RunInputs = {
  denied: DomainSet;
  allowed: DomainSet;
  redirectIp: string;
  comment: string;
  dryRun: boolean;
};

async function closeQuietly(client: GatewayClient, log: Logger): Promise<void> {
  try {
    await client.close();
  } catch (e) {
    log.debug({ err: errorMessage(e) }, 'error while closing gateway connection');
  }
}

/** Processes one device; every failure is folded into the returned outcome. */
export async function processDevice(
  device: DeviceConfig,
  inputs: RunInputs,
  connect: GatewayConnector,
  logger: Logger
): Promise<DeviceOutcome> {
  const label = deviceLabel(device);
  const base: DeviceBase = { device: device.name, host: device.host };
  const log = logger.child({ device: label });

  let client: GatewayClient;
  try {
    client = await connect(device);
  } catch (e) {
    log.error({ err: errorMessage(e) }, 'gateway connection failed; skipping device');
    return { ...base, status: 'connection-failed', error: errorMessage(e) };
  }

  try {
    let snapshot: GatewaySnapshot;
    try {
      snapshot = await takeSnapshot(client);
    } catch (e) {
      log.error({ err: errorMessage(e) }, 'failed to read gateway DNS state; skipping device');
      return { ...base, status: 'snapshot-failed', error: errorMessage(e) };
    }

    const blockSet = computeBlockSet(inputs.denied, snapshot.staticDomains, snapshot.resolvedDomains, inputs.allowed);
    const counts = { staticCount: snapshot.staticDomains.size, resolvedCount: snapshot.resolvedDomains.size };
    log.info({ ...counts, toBlock: blockSet.size }, 'reconciled gateway state');

    if (inputs.dryRun) {
      const blocked = Array.from(blockSet).sort();
      log.info({ domains: blocked }, 'dry run: no rules written');
      return { ...base, ...counts, status: 'ok', dryRun: true, blocked, failed: [] };
    }

    const applied = await applyBlockSet(
      client,
      blockSet,
      { redirectIp: inputs.redirectIp, comment: inputs.comment, device: label },
      log
    );
    const status = applied.failed.length || applied.flushError ? 'partial' : 'ok';
    return {
      ...base,
      ...counts,
      status,
      dryRun: false,
      blocked: applied.added,
      failed: applied.failed,
      ...(applied.flushError ? { flushError: applied.flushError } : {})
    };
  } finally {
    await closeQuietly(client, log);
  }
}

/**
 * One full pass: refresh or reuse the denied-domain cache, then reconcile each
 * device in turn. Cache and allow-list failures are fatal; device failures are not.
 */
export async function runOnce(config: AppConfig, deps: RunDeps = {}): Promise<RunReport> {
  const log = deps.logger ?? silentLogger();
  const now = deps.now ?? (() => new Date());
  const connect = deps.connect ?? createGatewayConnector(connectOptionsFromConfig(config));
  const startedAt = now().toISOString();

  const denied = await getDeniedDomains(
    {
      cachePath: config.DENIED_DOMAINS_FILE,
      sourcesFilePath: config.SOURCES_FILE,
      maxAgeHours: config.DENIED_DOMAINS_MAX_AGE_HOURS,
      keepStaleOnError: config.KEEP_STALE_ON_REFRESH_ERROR,
      fetch: {
        timeoutMs: config.FETCH_TIMEOUT_MS,
        maxBytes: config.FETCH_MAX_BYTES,
        policy: config.SOURCE_FAILURE_POLICY
      }
    },
    { logger: log, now, fetchAll: deps.fetchAll }
  );

  const allowed = await readAllowList(config.ALLOWED_DOMAINS_FILE);
  log.info({ denied: denied.domains.size, allowed: allowed.size, devices: config.devices.length }, 'starting run');

  const inputs: RunInputs = {
    denied: denied.domains,
    allowed,
    redirectIp: config.REDIRECT_TO_IP,
    comment: config.RULE_COMMENT,
    dryRun: config.DRY_RUN
  };

  const devices: DeviceOutcome[] = [];
  for (const device of config.devices) {
    devices.push(await processDevice(device, inputs, connect, log));
  }

  const report: RunReport = {
    startedAt,
    finishedAt: now().toISOString(),
    denied: { count: denied.domains.size, refreshed: denied.refreshed, stale: denied.stale },
    allowedCount: allowed.size,
    devices
  };
  log.info({ devices: devices.map((d) => ({ device: d.device, status: d.status })) }, 'run finished');
  return report;
}
