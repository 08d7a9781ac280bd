import { SourceFetchError, errorMessage } from '../errors.js';
import { parseHostsText, type DomainSet } from '../domains/normalize.js';
import { silentLogger, type Logger } from '../logger.js';

export type SourceFailurePolicy = 'fail-fast' | 'skip';

export type FetchOptions = {
  timeoutMs?: number;
  maxBytes?: number;
  policy?: SourceFailurePolicy;
  logger?: Logger;
};

const USER_AGENT = 'gateway-adblock/0.1';

async function downloadText(url: string, timeoutMs: number, maxBytes: number): Promise<string> {
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  let buf: Buffer;
  try {
    const res = await fetch(url, {
      method: 'GET',
      headers: { 'user-agent': USER_AGENT },
      signal: ac.signal
    });
    if (!res.ok) throw new SourceFetchError(url, `HTTP_${res.status}`);

    buf = Buffer.from(await res.arrayBuffer());
  } catch (e) {
    if (e instanceof SourceFetchError) throw e;
    if (ac.signal.aborted) throw new SourceFetchError(url, 'TIMEOUT', { cause: e });
    throw new SourceFetchError(url, errorMessage(e), { cause: e });
  } finally {
    clearTimeout(timer);
  }

  if (buf.length > maxBytes) throw new SourceFetchError(url, 'TOO_LARGE');

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buf);
  } catch (e) {
    throw new SourceFetchError(url, 'INVALID_UTF8', { cause: e });
  }
}

export async function fetchSourceDomains(url: string, opts: FetchOptions = {}): Promise<DomainSet> {
  const timeoutMs = opts.timeoutMs ?? 15_000;
  const maxBytes = opts.maxBytes ?? 25 * 1024 * 1024;
  return parseHostsText(await downloadText(url, timeoutMs, maxBytes));
}

/**
 * Unions every source into one set. Under `fail-fast` the first failure aborts;
 * under `skip` failures are logged and skipped, but at least one source must succeed.
 */
export async function fetchAllSources(sources: readonly string[], opts: FetchOptions = {}): Promise<DomainSet> {
  const policy = opts.policy ?? 'fail-fast';
  const log = opts.logger ?? silentLogger();
  const result: DomainSet = new Set();
  const failures: SourceFetchError[] = [];

  for (const url of sources) {
    try {
      const domains = await fetchSourceDomains(url, opts);
      for (const d of domains) result.add(d);
      log.debug({ url, count: domains.size }, 'fetched blocklist');
    } catch (e) {
      const err = e instanceof SourceFetchError ? e : new SourceFetchError(url, errorMessage(e), { cause: e });
      if (policy === 'fail-fast') throw err;
      log.warn({ url, err: err.message }, 'skipping blocklist source');
      failures.push(err);
    }
  }

  if (sources.length > 0 && failures.length === sources.length) {
    const last = failures[failures.length - 1];
    throw new SourceFetchError(last.url, `all ${sources.length} sources failed`, { cause: last });
  }

  return result;
}
