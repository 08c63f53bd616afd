/**
 * Addition and multiplication over every pair of differential kinds.
 *
 * Both operations dispatch on the tags of their two operands. Rows are tried
 * in order and the first one claiming either operand decides the result, so
 * e.g. Zero beats a Thunk under multiplication and the thunk is never forced.
 */

import { Domain, Domains } from './Domain.js';
import {
  Differential,
  DifferentialKind,
  Wirtinger,
  describe,
  force,
  isWirtinger,
  wirtingerPart,
  zero
} from './Differentials.js';
import { DifferentialAlgebraError } from './Errors.js';
import { addValues, conjValue, isExtern, mulValues } from './Numeric.js';

export type Tag = DifferentialKind | 'extern';

export function tagOf(value: Differential): Tag {
  return isExtern(value) ? 'extern' : value.kind;
}

/**
 * A row of the dispatch table: the tag it claims and how to combine when
 * the claimed operand is on the left or on the right.
 */
interface DispatchRow {
  tag: Tag;
  left(a: Differential, b: Differential): Differential;
  right(a: Differential, b: Differential): Differential;
}

function dispatch(rows: DispatchRow[], a: Differential, b: Differential, symbol: string): Differential {
  const ta = tagOf(a);
  const tb = tagOf(b);
  for (const row of rows) {
    if (ta === row.tag) return row.left(a, b);
    if (tb === row.tag) return row.right(a, b);
  }
  if (isExtern(a) && isExtern(b)) {
    return symbol === '+' ? addValues(a, b) : mulValues(a, b);
  }
  throw new DifferentialAlgebraError('no rule combines these operands', symbol, [describe(a), describe(b)]);
}

/**
 * Narrow a value known to carry the 'wirtinger' tag
 */
function asWirtinger(value: Differential, operation: string): Wirtinger {
  if (!isWirtinger(value)) {
    throw new DifferentialAlgebraError('expected a Wirtinger value', operation, [describe(value)]);
  }
  return value;
}

const additionRows: DispatchRow[] = [
  {
    // identity
    tag: 'zero',
    left: (_, b) => b,
    right: a => a
  },
  {
    // a missing derivative contributes nothing to a sum
    tag: 'dne',
    left: (_, b) => b,
    right: a => a
  },
  {
    tag: 'thunk',
    left: (a, b) => add(force(a), b),
    right: (a, b) => add(a, force(b))
  },
  {
    tag: 'wirtinger',
    left: (a, b) => {
      const w = asWirtinger(a, '+');
      if (isWirtinger(b)) {
        return new Wirtinger(wirtingerPart(add(w.primal, b.primal), '+'), wirtingerPart(add(w.conjugate, b.conjugate), '+'));
      }
      return new Wirtinger(wirtingerPart(add(w.primal, b), '+'), w.conjugate);
    },
    right: (a, b) => {
      const w = asWirtinger(b, '+');
      return new Wirtinger(wirtingerPart(add(a, w.primal), '+'), w.conjugate);
    }
  },
  {
    tag: 'one',
    left: (_, b) => add(1, b),
    right: a => add(a, 1)
  }
];

const multiplicationRows: DispatchRow[] = [
  {
    // absorbing, checked before anything that would need evaluating
    tag: 'zero',
    left: a => a,
    right: (_, b) => b
  },
  {
    tag: 'dne',
    left: a => a,
    right: (_, b) => b
  },
  {
    // identity
    tag: 'one',
    left: (_, b) => b,
    right: a => a
  },
  {
    tag: 'thunk',
    left: (a, b) => mul(force(a), b),
    right: (a, b) => mul(a, force(b))
  },
  {
    tag: 'wirtinger',
    left: (a, b) => {
      const w = asWirtinger(a, '*');
      if (isWirtinger(b)) {
        throw new DifferentialAlgebraError(
          'Wirtinger × Wirtinger is undefined',
          '*',
          [describe(a), describe(b)]
        );
      }
      return new Wirtinger(wirtingerPart(mul(w.primal, b), '*'), wirtingerPart(mul(w.conjugate, b), '*'));
    },
    right: (a, b) => {
      const w = asWirtinger(b, '*');
      return new Wirtinger(wirtingerPart(mul(a, w.primal), '*'), wirtingerPart(mul(a, w.conjugate), '*'));
    }
  }
];

export function add(a: Differential, b: Differential): Differential {
  return dispatch(additionRows, a, b, '+');
}

export function mul(a: Differential, b: Differential): Differential {
  return dispatch(multiplicationRows, a, b, '*');
}

/**
 * Sum of any number of differentials; the empty sum is Zero
 */
export function sum(values: readonly Differential[]): Differential {
  return values.reduce<Differential>((acc, value) => add(acc, value), zero());
}

/**
 * Complex conjugate of a differential
 */
export function conj(value: Differential): Differential {
  if (isExtern(value)) return conjValue(value);

  switch (value.kind) {
    case 'zero':
    case 'one':
    case 'dne':
      return value;
    case 'thunk':
      return conj(force(value));
    case 'wirtinger':
      throw new DifferentialAlgebraError(
        'the conjugate of a Wirtinger value is not defined partwise',
        'conj',
        [value.toString()]
      );
  }
}

/**
 * Collapse a Wirtinger pair to primal + conjugate when the domain is real.
 * Every other (value, domain) combination is returned unchanged.
 */
export function differential(domain: Domain, value: Differential): Differential {
  if (isWirtinger(value) && Domains.isReal(domain)) {
    return add(value.primal, value.conjugate);
  }
  return value;
}
