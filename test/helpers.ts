/**
 * Test helper utilities to reduce boilerplate in test files
 */

import { Differential, NO_FIELDS } from '../src/core/Differentials.js';
import { PrimalFunction, RuleRegistry, RuleResult } from '../src/rules/RuleRegistry.js';

/**
 * Assert that a lookup found a rule
 *
 * @example
 * const [y, pushforward] = expectRule(registry.frule(cool, 1));
 */
export function expectRule(result: RuleResult | undefined): RuleResult {
  if (result === undefined) {
    throw new Error('Expected a rule, got none');
  }
  return result;
}

/**
 * Look up the frule and apply its pushforward to one tangent per argument
 *
 * @example
 * const { primal, tangents } = pushforwardAt(registry, cool, [1, 2], [1, 1]);
 */
export function pushforwardAt(
  registry: RuleRegistry,
  f: PrimalFunction,
  args: unknown[],
  tangents: Differential[]
): { primal: unknown; tangents: readonly Differential[] } {
  const [primal, pushforward] = expectRule(registry.frule(f, ...args));
  return { primal, tangents: pushforward.propagate(NO_FIELDS, ...tangents) };
}

/**
 * Look up the rrule and apply its pullback to one cotangent per output
 */
export function pullbackAt(
  registry: RuleRegistry,
  f: PrimalFunction,
  args: unknown[],
  cotangents: Differential[]
): { primal: unknown; cotangents: readonly Differential[] } {
  const [primal, pullback] = expectRule(registry.rrule(f, ...args));
  return { primal, cotangents: pullback.propagate(...cotangents) };
}
