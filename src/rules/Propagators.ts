/**
 * Propagators: callables that apply stored partial derivatives to incoming
 * differentials, and the helpers AD engines use to fold their outputs into
 * accumulators they own.
 */

import { add } from '../core/Arithmetic.js';
import { Domain, Domains } from '../core/Domain.js';
import {
  Differential,
  DoesNotExist,
  Wirtinger,
  dne,
  extern,
  wirtingerPart
} from '../core/Differentials.js';
import { DifferentialAlgebraError } from '../core/Errors.js';
import { NumericArray, isNumericArray } from '../core/Numeric.js';

/**
 * Propagation function wrapped by a rule
 */
export type Propagation<Out> = (...deltas: Differential[]) => Out;

/**
 * In-place updater: stores `acc + propagation(...deltas)` into `acc` and returns it
 */
export type Updater = (acc: NumericArray, ...deltas: Differential[]) => NumericArray;

/**
 * Base of every propagator. Forward rules produce pushforwards and reverse
 * rules produce pullbacks; both are pure functions of their differential inputs.
 */
export abstract class AbstractRule<Out = Differential> {
  abstract propagate(...deltas: Differential[]): Out;
}

/**
 * A propagation function with an optional dedicated in-place updater.
 *
 * @example
 * // d(x * y) = Δx * y + x * Δy
 * new Rule((dx, dy) => add(mul(dx, y), mul(x, dy)))
 */
export class Rule<Out = Differential> extends AbstractRule<Out> {
  constructor(
    readonly propagation: Propagation<Out>,
    readonly updater?: Updater
  ) {
    super();
  }

  propagate(...deltas: Differential[]): Out {
    return this.propagation(...deltas);
  }

  toString(): string {
    const name = this.propagation.name || 'anonymous';
    return this.updater ? `Rule(${name}, ${this.updater.name || 'anonymous'})` : `Rule(${name})`;
  }
}

/**
 * Propagator for an argument the function is not differentiable in.
 * Ignores its inputs.
 */
export class DNERule extends AbstractRule<DoesNotExist> {
  propagate(..._deltas: Differential[]): DoesNotExist {
    return dne();
  }

  toString(): string {
    return 'DNERule()';
  }
}

/**
 * Evaluates a primal (∂/∂z) and a conjugate (∂/∂z̄) propagator and pairs
 * their results. Prefer `ruleForDomain` when the domain might be real.
 */
export class WirtingerRule extends AbstractRule<Wirtinger> {
  constructor(
    readonly primal: AbstractRule<Differential>,
    readonly conjugate: AbstractRule<Differential>
  ) {
    super();
  }

  propagate(...deltas: Differential[]): Wirtinger {
    return new Wirtinger(
      wirtingerPart(this.primal.propagate(...deltas), 'WirtingerRule'),
      wirtingerPart(this.conjugate.propagate(...deltas), 'WirtingerRule')
    );
  }

  toString(): string {
    return `WirtingerRule(${String(this.primal)}, ${String(this.conjugate)})`;
  }
}

/**
 * A rule evaluating to `primal(...) + conjugate(...)` when the domain is real,
 * otherwise a WirtingerRule.
 */
export function ruleForDomain(
  domain: Domain,
  primal: AbstractRule<Differential>,
  conjugate: AbstractRule<Differential>
): AbstractRule<Differential> {
  if (Domains.isReal(domain)) {
    return new Rule((...deltas) => add(primal.propagate(...deltas), conjugate.propagate(...deltas)));
  }
  return new WirtingerRule(primal, conjugate);
}

/**
 * `acc + rule(...deltas)` in differential arithmetic
 */
export function accumulate(
  acc: Differential,
  rule: AbstractRule<Differential>,
  ...deltas: Differential[]
): Differential {
  return add(acc, rule.propagate(...deltas));
}

/**
 * Like `accumulate`, but writes the sum into an array accumulator and returns it.
 * A rule carrying an updater does the update itself; a non-array accumulator
 * cannot be updated in place and gets the plain `accumulate` result instead.
 */
export function accumulateInPlace(
  acc: Differential,
  rule: AbstractRule<Differential>,
  ...deltas: Differential[]
): Differential {
  if (!isNumericArray(acc)) {
    return accumulate(acc, rule, ...deltas);
  }
  if (rule instanceof Rule && rule.updater) {
    return rule.updater(acc, ...deltas);
  }
  return materializeInto(acc, add(acc, rule.propagate(...deltas)));
}

/**
 * Write `rule(...deltas)` into `acc`, overwriting its contents
 */
export function store(
  acc: NumericArray,
  rule: AbstractRule<Differential>,
  ...deltas: Differential[]
): NumericArray {
  return materializeInto(acc, rule.propagate(...deltas));
}

/**
 * Copy a differential into array storage, broadcasting scalars
 */
export function materializeInto(target: NumericArray, value: Differential): NumericArray {
  const concrete = extern(value);
  if (Array.isArray(concrete)) {
    if (concrete.length !== target.length) {
      throw new DifferentialAlgebraError(
        `cannot store ${concrete.length} values into an accumulator of length ${target.length}`,
        'materialize'
      );
    }
    // Source and target may be the same array
    const values = concrete.slice();
    for (let i = 0; i < target.length; i++) {
      target[i] = values[i];
    }
    return target;
  }
  target.fill(concrete);
  return target;
}
