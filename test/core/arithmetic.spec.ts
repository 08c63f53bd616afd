import { describe, it, expect } from 'vitest';
import { add, differential, mul, sum, tagOf } from '../../src/core/Arithmetic.js';
import { Complex } from '../../src/core/Complex.js';
import { Domain, Domains } from '../../src/core/Domain.js';
import { Differential, dne, one, thunk, wirtinger, zero } from '../../src/core/Differentials.js';

describe('Differential arithmetic', () => {
  const samples: Differential[] = [
    zero(),
    one(),
    dne(),
    thunk(() => 2),
    wirtinger(1, 2),
    3,
    [1, 2]
  ];

  it('should tag every kind', () => {
    expect(samples.map(tagOf)).toEqual(['zero', 'one', 'dne', 'thunk', 'wirtinger', 'extern', 'extern']);
  });

  it('should add every pair of kinds', () => {
    for (const a of samples) {
      for (const b of samples) {
        expect(() => add(a, b)).not.toThrow();
      }
    }
  });

  it('should multiply every pair except two Wirtinger values', () => {
    for (const a of samples) {
      for (const b of samples) {
        if (tagOf(a) === 'wirtinger' && tagOf(b) === 'wirtinger') continue;
        expect(() => mul(a, b)).not.toThrow();
      }
    }
  });

  it('should fall through to host arithmetic for extern values', () => {
    expect(add(3, 4)).toBe(7);
    expect(mul(3, 4)).toBe(12);
    expect(mul([1, 2], 2)).toEqual([2, 4]);
  });

  it('should force thunks on either side', () => {
    expect(add(3, thunk(() => 4))).toBe(7);
    expect(mul(thunk(() => 3), thunk(() => 4))).toBe(12);
  });

  it('should sum to Zero when empty', () => {
    expect(sum([])).toBe(zero());
    expect(sum([1, dne(), one(), zero()])).toBe(2);
  });
});

describe('differential()', () => {
  const domains: Domain[] = [
    Domains.realScalar(),
    Domains.complexScalar(),
    Domains.realArray(),
    Domains.complexArray(),
    Domains.opaque()
  ];

  it('should collapse Wirtinger values over a real domain', () => {
    expect(differential(Domains.realScalar(), wirtinger(2, 2))).toBe(4);
    expect(differential(Domains.realArray(), wirtinger(2, 2))).toBe(4);
    expect(differential(Domains.realArray(), wirtinger([1, 2], [3, 4]))).toEqual([4, 6]);
  });

  it('should keep Wirtinger values over a complex domain', () => {
    const w = wirtinger(2, 2);
    expect(differential(Domains.complexScalar(), w)).toBe(w);
    expect(differential(Domains.complexArray(), w)).toBe(w);
    expect(differential(Domains.opaque(), w)).toBe(w);
  });

  it('should return every other differential unchanged', () => {
    const others: Differential[] = [
      dne(),
      thunk(() => 23),
      thunk(() => wirtinger(2, 2)),
      [1, 2],
      one(),
      zero(),
      0,
      new Complex(1, 1)
    ];

    for (const domain of domains) {
      for (const value of others) {
        expect(differential(domain, value)).toBe(value);
      }
    }
  });
});
