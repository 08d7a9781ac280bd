import fs from 'node:fs/promises';
import { DomainFileError, errorMessage } from '../errors.js';
import { formatDomainSet, parseListText, type DomainSet } from './normalize.js';

export async function readDomainsFile(filePath: string): Promise<DomainSet> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new DomainFileError(filePath, errorMessage(e), { cause: e });
  }
  return parseListText(raw);
}

/** Missing path setting means "no allow-list"; a configured but unreadable file is an error. */
export async function readAllowList(filePath: string): Promise<DomainSet> {
  if (!filePath.trim()) return new Set();
  return await readDomainsFile(filePath);
}

/** Writes next to the target and renames over it so readers never see a partial list. */
export async function writeDomainsFile(filePath: string, domains: Iterable<string>): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, formatDomainSet(domains), 'utf8');
  await fs.rename(tmpPath, filePath);
}
