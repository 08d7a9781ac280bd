import type { DomainSet } from './domains/normalize.js';

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): DomainSet {
  const out: DomainSet = new Set();
  for (const d of a) if (!b.has(d)) out.add(d);
  return out;
}

function intersection(a: ReadonlySet<string>, b: ReadonlySet<string>): DomainSet {
  const out: DomainSet = new Set();
  for (const d of a) if (b.has(d)) out.add(d);
  return out;
}

/**
 * Domains that need a new redirect rule: seen by the gateway's resolver, not yet
 * covered by a static entry, not allowed, and present on a denylist.
 *
 * `((resolved - static) - allowed) ∩ denied`, in that order.
 */
export function computeBlockSet(
  denied: ReadonlySet<string>,
  staticDomains: ReadonlySet<string>,
  resolved: ReadonlySet<string>,
  allowed: ReadonlySet<string>
): DomainSet {
  const unseen = difference(resolved, staticDomains);
  const candidates = difference(unseen, allowed);
  return intersection(candidates, denied);
}
