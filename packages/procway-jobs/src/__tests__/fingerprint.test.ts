/**
 * Fingerprint stability
 * Same semantic request -> same digest; different requested outputs -> different digest
 */

import { canonicalize, computeFingerprint, normalizeOutputs } from '../fingerprint';

describe('computeFingerprint', () => {
  it('hashes the canonical JSON form with sha256', () => {
    // sha256 of {"process_id":"echo","inputs":{"text":"hi"},"outputs":["output_text"]}
    expect(computeFingerprint('echo', { text: 'hi' }, ['output_text'])).toBe(
      '51f5b16b8ed634fca00d9a9b1b9aae6f14623176daacd2f91091ebe1b3ed0d1e'
    );
  });

  it('is invariant under input key order', () => {
    const a = computeFingerprint('p', { alpha: 1, beta: { y: [1, 2], x: 'z' } }, ['out']);
    const b = computeFingerprint('p', { beta: { x: 'z', y: [1, 2] }, alpha: 1 }, ['out']);
    expect(a).toBe(b);
  });

  it('is invariant under output order and duplicates', () => {
    const a = computeFingerprint('p', { v: 1 }, ['b', 'a']);
    const b = computeFingerprint('p', { v: 1 }, ['a', 'b', 'a']);
    expect(a).toBe(b);
  });

  it('changes when the requested outputs change', () => {
    const both = computeFingerprint('p', { v: 1 }, ['a', 'b']);
    const one = computeFingerprint('p', { v: 1 }, ['a']);
    expect(both).not.toBe(one);
  });

  it('changes with the process id and with input values', () => {
    const base = computeFingerprint('p', { v: 1 }, ['a']);
    expect(computeFingerprint('q', { v: 1 }, ['a'])).not.toBe(base);
    expect(computeFingerprint('p', { v: 2 }, ['a'])).not.toBe(base);
  });

  it('keeps array order significant', () => {
    expect(computeFingerprint('p', { v: [1, 2] }, ['a'])).not.toBe(computeFingerprint('p', { v: [2, 1] }, ['a']));
  });
});

describe('canonicalize', () => {
  it('sorts keys at every depth and drops undefined members', () => {
    const canonical = canonicalize({ b: { d: 1, c: undefined }, a: [undefined, { f: 1, e: 2 }] });
    expect(JSON.stringify(canonical)).toBe('{"a":[null,{"e":2,"f":1}],"b":{"d":1}}');
  });

  it('rejects non-finite numbers', () => {
    expect(() => canonicalize({ v: Number.NaN })).toThrow(TypeError);
    expect(() => canonicalize([Number.POSITIVE_INFINITY])).toThrow('Cannot fingerprint non-finite number Infinity');
  });

  it('rejects values JSON cannot carry', () => {
    expect(() => canonicalize({ f: () => 1 })).toThrow('Cannot fingerprint value of type function');
  });
});

describe('normalizeOutputs', () => {
  it('de-duplicates and sorts', () => {
    expect(normalizeOutputs(['length', 'output_text', 'length'])).toEqual(['length', 'output_text']);
  });
});
