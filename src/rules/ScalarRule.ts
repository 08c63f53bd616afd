/**
 * Declarative scalar rules
 *
 * Given a function, the partial derivative of every output w.r.t. every
 * input, and optional setup, generates and registers the matching frule and
 * rrule:
 *
 *   frule(f, x₁, x₂, ...) = [Ω, (_, Δx₁, Δx₂, ...) => [
 *     ∂f₁/∂x₁ * Δx₁ + ∂f₁/∂x₂ * Δx₂ + ...,
 *     ∂f₂/∂x₁ * Δx₁ + ∂f₂/∂x₂ * Δx₂ + ...,
 *   ]]
 *
 *   rrule(f, x₁, x₂, ...) = [Ω, (ΔΩ₁, ΔΩ₂, ...) => [
 *     NO_FIELDS,
 *     ∂f₁/∂x₁ * ΔΩ₁ + ∂f₂/∂x₁ * ΔΩ₂ + ...,
 *     ∂f₁/∂x₂ * ΔΩ₁ + ∂f₂/∂x₂ * ΔΩ₂ + ...,
 *   ]]
 *
 * Unannotated arguments are constrained to number-like scalars.
 */

import { add, conj, differential, mul, sum } from '../core/Arithmetic.js';
import { Domain, Domains } from '../core/Domain.js';
import {
  Differential,
  NO_FIELDS,
  Wirtinger,
  conjugatePart,
  primalPart,
  thunk,
  wirtingerPart
} from '../core/Differentials.js';
import { RuleDefinitionError } from '../core/Errors.js';
import { ArgTypeSpec, Signature, formatSignature, signatureMatches } from './ArgTypes.js';
import { Rule } from './Propagators.js';
import { RuleImplementation, RuleRegistry, defaultRuleRegistry } from './RuleRegistry.js';

/**
 * What every partial expression can see: the arguments, the primal result
 * Ω (`omega`) and whatever setup returned
 */
export interface RuleScope<A extends unknown[], R, S> {
  readonly args: A;
  readonly omega: R;
  readonly setup: S;
}

export type PartialFn<Scope> = (scope: Scope) => Differential;

/**
 * A partial written with the Wirtinger constructor. Its primal and conjugate
 * parts are propagated separately and collapsed when the domain is real.
 */
export interface WirtingerPartial<Scope> {
  readonly kind: 'wirtinger';
  readonly expression: PartialFn<Scope>;
}

export type PartialExpression<Scope> = PartialFn<Scope> | WirtingerPartial<Scope>;

/**
 * Partials of one output: one per input, or a bare expression for a single input
 */
export type PartialRow<Scope> = PartialExpression<Scope> | readonly PartialExpression<Scope>[];

export function wirtingerPartial<Scope>(expression: PartialFn<Scope>): WirtingerPartial<Scope> {
  return { kind: 'wirtinger', expression };
}

interface ScalarRuleBase<A extends unknown[], R, Scope> {
  f: (...args: A) => R;
  /**
   * One constraint per argument; `null` or a missing list means 'number'
   */
  argTypes?: readonly (ArgTypeSpec | null)[];
  partials: readonly PartialRow<Scope>[];
}

export interface ScalarRuleDeclaration<A extends unknown[], R>
  extends ScalarRuleBase<A, R, RuleScope<A, R, undefined>> {
  setup?: undefined;
}

export interface ScalarRuleWithSetup<A extends unknown[], R, S>
  extends ScalarRuleBase<A, R, RuleScope<A, R, S>> {
  /**
   * Runs once per lookup, after the primal
   */
  setup: (args: A, omega: R) => S;
}

export interface ScalarRuleDefinition {
  name: string;
  signature: Signature;
  inputs: number;
  outputs: number;
}

const DEFAULT_ARG_TYPE = 'number';

function isWirtingerPartial<Scope>(expr: PartialExpression<Scope>): expr is WirtingerPartial<Scope> {
  return typeof expr !== 'function';
}

function evaluatePartial<Scope>(expr: PartialExpression<Scope>, scope: Scope): Differential {
  return isWirtingerPartial(expr) ? expr.expression(scope) : expr(scope);
}

/**
 * Δs ⋅ ∂s, each partial deferred so a Zero (or absent) Δ skips evaluating it
 */
function standardPropagation<Scope>(
  deltas: readonly Differential[],
  partials: readonly PartialExpression<Scope>[],
  scope: Scope
): Differential {
  return sum(partials.map((p, i) => mul(thunk(() => evaluatePartial(p, scope)), deltas[i])));
}

/**
 * Propagation when some partials are Wirtinger pairs:
 *
 *   primal    += ∂f/∂z · Δ + conj(∂f/∂z̄) · Δ̄
 *   conjugate += ∂f/∂z̄ · Δ + conj(∂f/∂z) · Δ̄
 *
 * where Δ and Δ̄ are the primal and conjugate parts of the incoming differential.
 */
function wirtingerPropagation<Scope>(
  domain: Domain,
  deltas: readonly Differential[],
  partials: readonly PartialExpression<Scope>[],
  scope: Scope
): Differential {
  const primalTerms: Differential[] = [];
  const conjugateTerms: Differential[] = [];

  partials.forEach((p, i) => {
    const delta = deltas[i];
    if (isWirtingerPartial(p)) {
      const d = p.expression(scope);
      primalTerms.push(add(
        mul(primalPart(d), primalPart(delta)),
        mul(conj(conjugatePart(d)), conjugatePart(delta))
      ));
      conjugateTerms.push(add(
        mul(conjugatePart(d), primalPart(delta)),
        mul(conj(primalPart(d)), conjugatePart(delta))
      ));
    } else {
      // A plain partial ∂ is holomorphic: ∂f/∂z = ∂ and ∂f/∂z̄ = 0
      primalTerms.push(mul(thunk(() => evaluatePartial(p, scope)), primalPart(delta)));
      conjugateTerms.push(mul(thunk(() => conj(evaluatePartial(p, scope))), conjugatePart(delta)));
    }
  });

  const w = new Wirtinger(
    wirtingerPart(sum(primalTerms), 'scalarRule'),
    wirtingerPart(sum(conjugateTerms), 'scalarRule')
  );
  return differential(domain, w);
}

function propagation<Scope>(
  domain: Domain,
  deltas: readonly Differential[],
  partials: readonly PartialExpression<Scope>[],
  scope: Scope
): Differential {
  if (partials.some(isWirtingerPartial)) {
    return wirtingerPropagation(domain, deltas, partials, scope);
  }
  return standardPropagation(deltas, partials, scope);
}

/**
 * Check the declaration and normalise every row to a tuple
 */
function normalizePartials<Scope>(
  name: string,
  inputs: number,
  rows: readonly PartialRow<Scope>[]
): PartialExpression<Scope>[][] {
  if (rows.length === 0) {
    throw new RuleDefinitionError('at least one output must declare its partials', name);
  }

  return rows.map((row, output) => {
    if (isPartialTuple(row)) {
      if (row.length !== inputs) {
        throw new RuleDefinitionError(
          `output ${output + 1} declares ${row.length} partial(s) for ${inputs} input(s)`,
          name
        );
      }
      return [...row];
    }
    if (inputs !== 1) {
      throw new RuleDefinitionError(
        `output ${output + 1} gives a bare partial but the function has ${inputs} inputs`,
        name,
        'use one tuple of partials per output'
      );
    }
    return [row];
  });
}

function isPartialTuple<Scope>(row: PartialRow<Scope>): row is readonly PartialExpression<Scope>[] {
  return Array.isArray(row);
}

function hasSetup<A extends unknown[], R, S>(
  declaration: ScalarRuleDeclaration<A, R> | ScalarRuleWithSetup<A, R, S>
): declaration is ScalarRuleWithSetup<A, R, S> {
  return declaration.setup !== undefined;
}

function nameFunction<T extends (...args: never[]) => unknown>(fn: T, name: string): T {
  Object.defineProperty(fn, 'name', { value: name });
  return fn;
}

function defineScalarRule<A extends unknown[], R, S>(
  declaration: ScalarRuleBase<A, R, RuleScope<A, R, S>>,
  setup: (args: A, omega: R) => S,
  registry: RuleRegistry
): ScalarRuleDefinition {
  const { f } = declaration;
  const name = f.name || '<anonymous>';

  // Functors carry state the propagators have no slot for
  if (Object.keys(f).length > 0) {
    throw new RuleDefinitionError(
      `scalar rules cannot be used on closures/functors (such as ${name})`,
      name,
      `has fields: ${Object.keys(f).join(', ')}`
    );
  }

  const inputs = declaration.argTypes?.length ?? f.length;
  if (inputs === 0) {
    throw new RuleDefinitionError('scalar rules need at least one input', name);
  }
  if (f.length > inputs) {
    throw new RuleDefinitionError(
      `${inputs} argument type(s) given for ${f.length} parameters`,
      name
    );
  }

  const partials = normalizePartials(name, inputs, declaration.partials);
  const outputs = partials.length;

  const argTypes = declaration.argTypes ?? new Array<ArgTypeSpec | null>(inputs).fill(null);
  let signature: Signature;
  try {
    signature = argTypes.map(spec => registry.argTypes.resolve(spec ?? DEFAULT_ARG_TYPE));
  } catch (err) {
    throw new RuleDefinitionError(
      'unknown argument type',
      name,
      err instanceof Error ? err.message : String(err)
    );
  }

  // Pullback partials are the transpose: input i reads the i-th entry of every output
  const transposed = Array.from({ length: inputs }, (_, i) => partials.map(row => row[i]));

  const accepts = (args: readonly unknown[]): args is A => signatureMatches(signature, args);

  const prepare = (args: readonly unknown[]) => {
    if (!accepts(args)) {
      throw new Error(`Rule for ${name} called with arguments outside (${formatSignature(signature)})`);
    }
    const omega = f(...args);
    const scope: RuleScope<A, R, S> = { args, omega, setup: setup(args, omega) };
    const domain = Domains.promote(args);
    return { omega, scope, domain };
  };

  const frule: RuleImplementation = args => {
    const { omega, scope, domain } = prepare(args);

    // The first input is the differential w.r.t. f itself, always ignored
    const pushforward = nameFunction((_self: Differential, ...deltas: Differential[]) =>
      partials.map(row => propagation(domain, deltas, row, scope)),
      `${name}_pushforward`
    );

    return [omega, new Rule(pushforward)];
  };

  const rrule: RuleImplementation = args => {
    const { omega, scope, domain } = prepare(args);

    const pullback = nameFunction((...deltas: Differential[]) =>
      [NO_FIELDS, ...transposed.map(column => propagation(domain, deltas, column, scope))],
      `${name}_pullback`
    );

    return [omega, new Rule(pullback)];
  };

  registry.defineFrule(f, signature, frule);
  registry.defineRrule(f, signature, rrule);

  return { name, signature, inputs, outputs };
}

/**
 * Generate and register the frule and rrule of a scalar function.
 *
 * @example
 * scalarRule({ f: hypot, partials: [[({ args: [x], omega }) => x / omega, ({ args: [, y], omega }) => y / omega]] });
 * scalarRule({ f: myabs2, partials: [wirtingerPartial(({ args: [x] }) => wirtinger(conj(x), x))] });
 */
export function scalarRule<A extends unknown[], R>(
  declaration: ScalarRuleDeclaration<A, R>,
  registry?: RuleRegistry
): ScalarRuleDefinition;
export function scalarRule<A extends unknown[], R, S>(
  declaration: ScalarRuleWithSetup<A, R, S>,
  registry?: RuleRegistry
): ScalarRuleDefinition;
export function scalarRule<A extends unknown[], R, S>(
  declaration: ScalarRuleDeclaration<A, R> | ScalarRuleWithSetup<A, R, S>,
  registry: RuleRegistry = defaultRuleRegistry
): ScalarRuleDefinition {
  if (hasSetup(declaration)) {
    return defineScalarRule(declaration, declaration.setup, registry);
  }
  return defineScalarRule<A, R, undefined>(declaration, () => undefined, registry);
}
