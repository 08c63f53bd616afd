import { describe, it, expect } from 'vitest';
import { Complex } from '../../src/core/Complex.js';
import {
  ArgTypeRegistry,
  accepts,
  formatSignature,
  isMoreSpecific,
  isSubtype,
  signatureMatches
} from '../../src/rules/ArgTypes.js';

describe('ArgTypeRegistry', () => {
  const types = new ArgTypeRegistry();
  const number = types.getOrThrow('number');
  const real = types.getOrThrow('real');
  const complex = types.getOrThrow('complex');
  const array = types.getOrThrow('array');
  const any = types.getOrThrow('any');

  it('should register the built-in types', () => {
    for (const name of ['any', 'number', 'real', 'complex', 'array', 'string', 'boolean']) {
      expect(types.has(name)).toBe(true);
    }
  });

  it('should order types from general to specific', () => {
    expect(isSubtype(real, number)).toBe(true);
    expect(isSubtype(real, any)).toBe(true);
    expect(isSubtype(number, real)).toBe(false);
    expect(isSubtype(complex, real)).toBe(false);
    expect(isSubtype(real, real)).toBe(true);
  });

  it('should test values against the type and its ancestors', () => {
    expect(accepts(number, 1)).toBe(true);
    expect(accepts(number, new Complex(0, 1))).toBe(true);
    expect(accepts(real, new Complex(0, 1))).toBe(false);
    expect(accepts(array, [1, 2])).toBe(true);
    expect(accepts(array, 1)).toBe(false);
    expect(accepts(any, 'x')).toBe(true);
  });

  it('should define custom types under an existing parent', () => {
    const registry = new ArgTypeRegistry();
    const positive = registry.define('positive', 'real', value => typeof value === 'number' && value > 0);

    expect(isSubtype(positive, registry.getOrThrow('number'))).toBe(true);
    expect(accepts(positive, 2)).toBe(true);
    expect(accepts(positive, -2)).toBe(false);
    expect(types.has('positive')).toBe(false);
  });

  it('should reject duplicate and unknown types', () => {
    const registry = new ArgTypeRegistry();
    expect(() => registry.define('real', 'number', () => true)).toThrow("Argument type 'real' is already defined");
    expect(() => registry.define('small', 'tiny', () => true)).toThrow("Argument type 'tiny' is not defined");
    expect(() => registry.resolve('quaternion')).toThrow("Argument type 'quaternion' is not defined");
    expect(registry.resolve(real)).toBe(real);
  });

  it('should match and compare signatures', () => {
    expect(signatureMatches([real, number], [1, new Complex(1, 1)])).toBe(true);
    expect(signatureMatches([real, number], [1])).toBe(false);
    expect(isMoreSpecific([real, real], [real, number])).toBe(true);
    expect(isMoreSpecific([real, number], [number, real])).toBe(false);
    expect(isMoreSpecific([real], [real])).toBe(false);
    expect(formatSignature([real, array])).toBe('real, array');
  });
});
