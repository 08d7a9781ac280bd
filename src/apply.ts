import { RuleApplicationError, errorMessage } from './errors.js';
import type { GatewayClient } from './gateway/types.js';
import { silentLogger, type Logger } from './logger.js';

export type ApplyOptions = {
  redirectIp: string;
  comment: string;
  /** Label used in errors and logs. */
  device: string;
};

export type ApplyResult = {
  added: string[];
  failed: { domain: string; error: string }[];
  flushError?: string;
};

/**
 * Adds one redirect per domain, then flushes the device's resolver cache once.
 * A failed rule is logged and skipped; rules already added stay in place.
 */
export async function applyBlockSet(
  client: GatewayClient,
  blockSet: Iterable<string>,
  opts: ApplyOptions,
  logger: Logger = silentLogger()
): Promise<ApplyResult> {
  const result: ApplyResult = { added: [], failed: [] };

  for (const domain of blockSet) {
    try {
      await client.addStaticRedirect(domain, opts.redirectIp, opts.comment);
      result.added.push(domain);
      logger.info({ domain }, 'blocked');
    } catch (e) {
      const err = new RuleApplicationError(opts.device, domain, { cause: e });
      result.failed.push({ domain, error: errorMessage(e) });
      logger.warn({ domain, err: err.message }, 'failed to add redirect rule');
    }
  }

  try {
    await client.flushResolverCache();
  } catch (e) {
    result.flushError = errorMessage(e);
    logger.warn({ err: result.flushError }, 'failed to flush resolver cache');
  }

  return result;
}
