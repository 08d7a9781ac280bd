import fs from 'node:fs/promises';
import { CacheIOError, EmptySourceListError, SourceFetchError, errorMessage } from '../errors.js';
import { parseListText, type DomainSet } from '../domains/normalize.js';
import { writeDomainsFile } from '../domains/files.js';
import { silentLogger, type Logger } from '../logger.js';
import { loadSourceList } from './sources.js';
import { fetchAllSources, type FetchOptions } from './fetch.js';

const MS_PER_HOUR = 60 * 60 * 1000;

export type DeniedDomainsOptions = {
  cachePath: string;
  sourcesFilePath: string;
  maxAgeHours: number;
  /** Serve the last completed aggregation when a refresh fails. */
  keepStaleOnError?: boolean;
  fetch?: Omit<FetchOptions, 'logger'>;
};

export type DeniedDomainsDeps = {
  logger?: Logger;
  now?: () => Date;
  fetchAll?: (sources: readonly string[]) => Promise<DomainSet>;
  loadSources?: (filePath: string) => Promise<string[]>;
};

export type DeniedDomains = {
  domains: DomainSet;
  refreshed: boolean;
  stale: boolean;
  /** `null` when no completed aggregation existed before this call. */
  ageHours: number | null;
};

async function statMtime(filePath: string): Promise<Date | null> {
  try {
    const st = await fs.stat(filePath);
    return st.mtime;
  } catch (e) {
    if (isNotFound(e)) return null;
    throw new CacheIOError(filePath, errorMessage(e), { cause: e });
  }
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

// Placeholder keeps the epoch as mtime so it stays stale until a real aggregation lands.
async function createPlaceholder(filePath: string): Promise<void> {
  try {
    await fs.writeFile(filePath, '', { flag: 'wx' });
    await fs.utimes(filePath, 0, 0);
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'EEXIST') return;
    throw new CacheIOError(filePath, errorMessage(e), { cause: e });
  }
}

async function readCache(filePath: string): Promise<DomainSet> {
  try {
    return parseListText(await fs.readFile(filePath, 'utf8'));
  } catch (e) {
    throw new CacheIOError(filePath, errorMessage(e), { cause: e });
  }
}

export function ageInHours(mtime: Date, now: Date): number {
  return (now.getTime() - mtime.getTime()) / MS_PER_HOUR;
}

/** Refresh is due only once the age is strictly past the threshold. */
export function isStale(ageHours: number | null, maxAgeHours: number): boolean {
  return ageHours === null || ageHours > maxAgeHours;
}

export async function getDeniedDomains(opts: DeniedDomainsOptions, deps: DeniedDomainsDeps = {}): Promise<DeniedDomains> {
  const log = deps.logger ?? silentLogger();
  const now = deps.now ?? (() => new Date());
  const loadSources = deps.loadSources ?? loadSourceList;
  const fetchAll =
    deps.fetchAll ?? ((sources: readonly string[]) => fetchAllSources(sources, { ...opts.fetch, logger: log }));

  const mtime = await statMtime(opts.cachePath);
  if (!mtime) await createPlaceholder(opts.cachePath);

  // An epoch mtime marks our own placeholder: nothing has been aggregated yet.
  const completed = mtime !== null && mtime.getTime() > 0;
  const ageHours = completed ? ageInHours(mtime, now()) : null;

  if (!isStale(ageHours, opts.maxAgeHours)) {
    const domains = await readCache(opts.cachePath);
    log.debug({ path: opts.cachePath, ageHours, count: domains.size }, 'denied-domain cache is fresh');
    return { domains, refreshed: false, stale: false, ageHours };
  }

  let domains: DomainSet;
  try {
    const sources = await loadSources(opts.sourcesFilePath);
    // Nothing to aggregate: keep the previous cache rather than overwrite it with an empty one.
    if (!sources.length) throw new EmptySourceListError(opts.sourcesFilePath);
    domains = await fetchAll(sources);
  } catch (e) {
    const refreshFailed = e instanceof SourceFetchError || e instanceof EmptySourceListError;
    if (refreshFailed && opts.keepStaleOnError && completed) {
      log.error({ err: errorMessage(e), path: opts.cachePath, ageHours }, 'blocklist refresh failed; using previous cache');
      return { domains: await readCache(opts.cachePath), refreshed: false, stale: true, ageHours };
    }
    throw e;
  }

  try {
    await writeDomainsFile(opts.cachePath, domains);
  } catch (e) {
    throw new CacheIOError(opts.cachePath, errorMessage(e), { cause: e });
  }
  log.info({ path: opts.cachePath, count: domains.size }, 'denied-domain cache refreshed');

  return { domains, refreshed: true, stale: false, ageHours: 0 };
}
