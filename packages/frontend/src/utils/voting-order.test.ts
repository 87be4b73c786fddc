import { describe, it, expect } from 'vitest';
import { fnv1a, orderForVoter } from './voting-order';

const items = Array.from({ length: 12 }, (_, i) => ({ id: i + 1 }));

describe('fnv1a', () => {
  it('matches the reference offset basis for the empty string', () => {
    expect(fnv1a('')).toBe(0x811c9dc5);
  });

  it('hashes "a" to the published FNV-1a value', () => {
    expect(fnv1a('a')).toBe(0xe40c292c);
  });
});

describe('orderForVoter', () => {
  it('returns a permutation of the input without mutating it', () => {
    const input = [...items];
    const ordered = orderForVoter(input, 'voter-1');

    expect(input).toEqual(items);
    expect([...ordered].sort((a, b) => a.id - b.id)).toEqual(items);
  });

  it('gives the same voter the same order every time', () => {
    expect(orderForVoter(items, 'voter-1')).toEqual(orderForVoter(items, 'voter-1'));
  });

  it('keeps the relative order of existing scenarios when one is added', () => {
    const before = orderForVoter(items, 'voter-1').map((item) => item.id);
    const after = orderForVoter([...items, { id: 13 }], 'voter-1')
      .map((item) => item.id)
      .filter((id) => id !== 13);

    expect(after).toEqual(before);
  });

  it('handles an empty list', () => {
    expect(orderForVoter([], 'voter-1')).toEqual([]);
  });
});
