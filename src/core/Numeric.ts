/**
 * Host numeric values ("extern" values) that every differential reduces to.
 * Arrays are flat and combine elementwise; a scalar broadcasts against an array.
 */

import { Complex } from './Complex.js';
import { DifferentialAlgebraError } from './Errors.js';

export type Scalar = number | Complex;

export type NumericArray = Scalar[];

export type Extern = Scalar | NumericArray;

export function isScalar(value: unknown): value is Scalar {
  return typeof value === 'number' || value instanceof Complex;
}

export function isNumericArray(value: unknown): value is NumericArray {
  return Array.isArray(value) && value.every(isScalar);
}

export function isExtern(value: unknown): value is Extern {
  return isScalar(value) || isNumericArray(value);
}

function addScalars(a: Scalar, b: Scalar): Scalar {
  if (typeof a === 'number' && typeof b === 'number') return a + b;
  return Complex.from(a).add(b);
}

function mulScalars(a: Scalar, b: Scalar): Scalar {
  if (typeof a === 'number' && typeof b === 'number') return a * b;
  return Complex.from(a).mul(b);
}

function conjScalar(a: Scalar): Scalar {
  return typeof a === 'number' ? a : a.conj();
}

/**
 * Apply a scalar operation elementwise, broadcasting scalars against arrays
 */
function elementwise(
  a: Extern,
  b: Extern,
  op: (x: Scalar, y: Scalar) => Scalar,
  symbol: string
): Extern {
  if (Array.isArray(a)) {
    if (Array.isArray(b)) {
      if (a.length !== b.length) {
        throw new DifferentialAlgebraError(
          `array lengths differ (${a.length} vs ${b.length})`,
          symbol
        );
      }
      const right = b;
      return a.map((x, i) => op(x, right[i]));
    }
    const scalar = b;
    return a.map(x => op(x, scalar));
  }
  const scalar = a;
  if (Array.isArray(b)) {
    return b.map(y => op(scalar, y));
  }
  return op(scalar, b);
}

export function addValues(a: Extern, b: Extern): Extern {
  return elementwise(a, b, addScalars, '+');
}

export function mulValues(a: Extern, b: Extern): Extern {
  return elementwise(a, b, mulScalars, '*');
}

export function conjValue(a: Extern): Extern {
  return Array.isArray(a) ? a.map(conjScalar) : conjScalar(a);
}

export function formatValue(value: Extern): string {
  if (Array.isArray(value)) {
    return `[${value.map(v => v.toString()).join(', ')}]`;
  }
  return value.toString();
}
