import ipaddr from 'ipaddr.js';

export type DomainSet = Set<string>;

/**
 * Cleans raw list text into newline-delimited records: comments, tabs, leading
 * spaces, blank lines and carriage returns are removed. Idempotent.
 */
export function normalizeText(raw: string): string {
  // CRs go first; removing them last would strand blank lines and leading spaces
  // from CRLF input and a second pass would change the result.
  let text = raw.replace(/\r+/g, '');
  if (!text.endsWith('\n')) text += '\n';
  text = text.replace(/#[^\n]*/g, '');
  text = text.replace(/\t+/g, '\n');
  text = text.replace(/^ +/gm, '');
  text = text.replace(/\n{2,}/g, '\n');
  return text.replace(/^\n/, '').replace(/\n$/, '');
}

/**
 * Hosts-file pass over normalized text: `0.0.0.0 ads.example.com` -> `ads.example.com`.
 * Lines carrying several names are split one name per line.
 */
export function stripHostsAddresses(text: string): string {
  return text
    .replace(/^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3} +/gm, '')
    .replace(/ +/g, '\n')
    .replace(/\n{2,}/g, '\n')
    .replace(/^\n/, '')
    .replace(/\n$/, '');
}

/** Canonical form used for every set comparison: trimmed, lowercase, no trailing dot. */
export function canonicalDomain(input: string): string {
  return input.trim().toLowerCase().replace(/\.+$/, '');
}

function isIpLiteral(token: string): boolean {
  if (ipaddr.IPv4.isValidFourPartDecimal(token)) return true;
  return token.includes(':') && ipaddr.IPv6.isValid(token);
}

export function parseDomainSet(text: string): DomainSet {
  const result: DomainSet = new Set();
  for (const line of text.split('\n')) {
    const domain = canonicalDomain(line);
    if (!domain || isIpLiteral(domain)) continue;
    result.add(domain);
  }
  return result;
}

export function parseHostsText(raw: string): DomainSet {
  return parseDomainSet(stripHostsAddresses(normalizeText(raw)));
}

/** Generic (non-hosts) parse, used for the allow-list and the denied-domain cache. */
export function parseListText(raw: string): DomainSet {
  return parseDomainSet(normalizeText(raw));
}

export function formatDomainSet(domains: Iterable<string>): string {
  return Array.from(domains).sort().join('\n');
}
