import fs from 'node:fs/promises';
import { ConfigError, DomainFileError, errorMessage } from '../errors.js';
import { normalizeText } from '../domains/normalize.js';

function isHttpUrl(value: string): boolean {
  try {
    const u = new URL(value);
    return u.protocol === 'http:' || u.protocol === 'https:';
  } catch {
    return false;
  }
}

export function parseSourceList(raw: string, origin = 'source list'): string[] {
  const text = normalizeText(raw);
  if (!text) return [];

  const urls: string[] = [];
  const bad: string[] = [];
  for (const line of text.split('\n')) {
    const url = line.trim();
    if (!url) continue;
    if (isHttpUrl(url)) urls.push(url);
    else bad.push(`${origin}: not an http(s) URL: "${url}"`);
  }
  if (bad.length) throw new ConfigError(bad);
  return urls;
}

export async function loadSourceList(filePath: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (e) {
    throw new DomainFileError(filePath, errorMessage(e), { cause: e });
  }
  return parseSourceList(raw, filePath);
}
