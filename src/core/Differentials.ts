/**
 * Differential values: the closed set of derivative kinds shared by
 * forward- and reverse-mode rules, plus plain numeric ("extern") values.
 */

import { DifferentialAlgebraError } from './Errors.js';
import { Extern, formatValue, isExtern } from './Numeric.js';

export type DifferentialKind = 'zero' | 'one' | 'dne' | 'thunk' | 'wirtinger';

/**
 * Base of every non-extern differential.
 * Iterating a differential yields the value itself exactly once, so a single
 * differential can stand in for a one-element tuple of propagator outputs.
 */
export abstract class AbstractDifferential {
  abstract readonly kind: DifferentialKind;

  *[Symbol.iterator](): Iterator<this> {
    yield this;
  }

  abstract toString(): string;
}

/**
 * Exact additive identity
 */
export class Zero extends AbstractDifferential {
  readonly kind = 'zero';

  toString(): string {
    return 'Zero()';
  }
}

/**
 * Exact multiplicative identity
 */
export class One extends AbstractDifferential {
  readonly kind = 'one';

  toString(): string {
    return 'One()';
  }
}

/**
 * The derivative does not exist (e.g. w.r.t. an integer index)
 */
export class DoesNotExist extends AbstractDifferential {
  readonly kind = 'dne';

  toString(): string {
    return 'DoesNotExist()';
  }
}

/**
 * Deferred differential. Forcing re-runs the computation every time.
 */
export class Thunk extends AbstractDifferential {
  readonly kind = 'thunk';

  constructor(readonly compute: () => Differential) {
    super();
  }

  force(): Differential {
    return this.compute();
  }

  toString(): string {
    return `Thunk(${this.compute.name || this.compute.toString()})`;
  }
}

/**
 * A part of a Wirtinger pair: anything but another Wirtinger
 */
export type WirtingerPart = Exclude<Differential, Wirtinger>;

/**
 * Split complex derivative: ∂f/∂z (primal) and ∂f/∂z̄ (conjugate)
 */
export class Wirtinger extends AbstractDifferential {
  readonly kind = 'wirtinger';

  constructor(
    readonly primal: WirtingerPart,
    readonly conjugate: WirtingerPart
  ) {
    super();
    if (isWirtinger(primal) || isWirtinger(conjugate)) {
      throw new DifferentialAlgebraError(
        'Wirtinger parts cannot themselves be Wirtinger values',
        'Wirtinger',
        [describe(primal), describe(conjugate)]
      );
    }
  }

  toString(): string {
    return `Wirtinger(${describe(this.primal)}, ${describe(this.conjugate)})`;
  }
}

export type Differential = Zero | One | DoesNotExist | Thunk | Wirtinger | Extern;

const ZERO = new Zero();
const ONE = new One();
const DNE = new DoesNotExist();

/**
 * First element of every pullback result: rules built here never close over
 * differentiable state, so there is no derivative w.r.t. the function itself.
 */
export const NO_FIELDS: DoesNotExist = DNE;

export function zero(): Zero {
  return ZERO;
}

export function one(): One {
  return ONE;
}

export function dne(): DoesNotExist {
  return DNE;
}

export function thunk(compute: () => Differential): Thunk {
  return new Thunk(compute);
}

export function wirtinger(primal: WirtingerPart, conjugate: WirtingerPart): Wirtinger {
  return new Wirtinger(primal, conjugate);
}

export function isDifferential(value: unknown): value is Differential {
  return value instanceof AbstractDifferential || isExtern(value);
}

export function isZero(value: unknown): value is Zero {
  return value instanceof Zero;
}

export function isOne(value: unknown): value is One {
  return value instanceof One;
}

export function isDoesNotExist(value: unknown): value is DoesNotExist {
  return value instanceof DoesNotExist;
}

export function isThunk(value: unknown): value is Thunk {
  return value instanceof Thunk;
}

export function isWirtinger(value: unknown): value is Wirtinger {
  return value instanceof Wirtinger;
}

export function describe(value: Differential): string {
  return isExtern(value) ? formatValue(value) : value.toString();
}

export function wirtingerPrimal(value: Differential): WirtingerPart {
  if (!isWirtinger(value)) {
    throw new DifferentialAlgebraError('not a Wirtinger value', 'wirtingerPrimal', [describe(value)]);
  }
  return value.primal;
}

export function wirtingerConjugate(value: Differential): WirtingerPart {
  if (!isWirtinger(value)) {
    throw new DifferentialAlgebraError('not a Wirtinger value', 'wirtingerConjugate', [describe(value)]);
  }
  return value.conjugate;
}

/**
 * Narrow a value to a Wirtinger part, rejecting nested pairs
 */
export function wirtingerPart(value: Differential, operation: string): WirtingerPart {
  if (isWirtinger(value)) {
    throw new DifferentialAlgebraError(
      'Wirtinger parts cannot themselves be Wirtinger values',
      operation,
      [describe(value)]
    );
  }
  return value;
}

/**
 * ∂/∂z part of any differential; a non-Wirtinger value is its own primal part
 */
export function primalPart(value: Differential): WirtingerPart {
  const forced = isThunk(value) ? force(value) : value;
  return isWirtinger(forced) ? forced.primal : forced;
}

/**
 * ∂/∂z̄ part of any differential; a non-Wirtinger value has none
 */
export function conjugatePart(value: Differential): WirtingerPart {
  const forced = isThunk(value) ? force(value) : value;
  return isWirtinger(forced) ? forced.conjugate : ZERO;
}

/**
 * Force a thunk until a non-thunk value is reached
 */
export function force(value: Differential): Differential {
  let current = value;
  while (isThunk(current)) {
    current = current.force();
  }
  return current;
}

/**
 * Convert a differential to a plain host value
 */
export function extern(value: Differential): Extern {
  if (isExtern(value)) return value;

  switch (value.kind) {
    case 'zero':
      return 0;
    case 'one':
      return 1;
    case 'thunk':
      return extern(force(value));
    case 'dne':
      throw new DifferentialAlgebraError(
        'a derivative that does not exist has no numeric value',
        'extern',
        [value.toString()]
      );
    case 'wirtinger':
      throw new DifferentialAlgebraError(
        'ambiguous; choose the primal or conjugate part explicitly',
        'extern',
        [value.toString()]
      );
  }
}
