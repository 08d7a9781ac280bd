import { describe, expect, it } from 'vitest';
import { computeBlockSet } from '../../src/reconcile.js';

describe('computeBlockSet', () => {
  it('only blocks denied domains that were resolved, are not static and not allowed', () => {
    const result = computeBlockSet(
      new Set(['a', 'b', 'c']),
      new Set(['a']),
      new Set(['a', 'b', 'x']),
      new Set(['x'])
    );
    expect(result).toEqual(new Set(['b']));
  });

  it('returns nothing when the gateway resolved nothing', () => {
    const result = computeBlockSet(new Set(['a', 'b']), new Set(), new Set(), new Set());
    expect(result.size).toBe(0);
  });

  it('never blocks allowed domains even when denied and resolved', () => {
    const result = computeBlockSet(new Set(['ads.example']), new Set(), new Set(['ads.example']), new Set(['ads.example']));
    expect(result.size).toBe(0);
  });

  it('does not re-block domains that already have a static entry', () => {
    const result = computeBlockSet(
      new Set(['ads.example', 'track.example']),
      new Set(['ads.example']),
      new Set(['ads.example', 'track.example']),
      new Set()
    );
    expect(result).toEqual(new Set(['track.example']));
  });

  it('leaves its inputs untouched', () => {
    const resolved = new Set(['a', 'b']);
    computeBlockSet(new Set(['a']), new Set(['b']), resolved, new Set());
    expect(resolved).toEqual(new Set(['a', 'b']));
  });
});
