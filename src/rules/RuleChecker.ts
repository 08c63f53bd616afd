/**
 * Numerical rule checking
 * Validates registered frule/rrule propagators against finite difference approximations
 */

import { Differential, NO_FIELDS, extern, one, zero } from '../core/Differentials.js';
import { PrimalFunction, RuleMode, RuleRegistry, defaultRuleRegistry } from './RuleRegistry.js';

/**
 * Rule checking result
 */
export interface RuleCheckResult {
  passed: boolean;
  errors: RuleCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface RuleCheckError {
  mode: RuleMode;
  input: number;
  output: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

export interface RuleCheckerOptions {
  registry?: RuleRegistry;
  epsilon?: number;
  tolerance?: number;
  verbose?: boolean;
}

/**
 * Format rule check results as a human-readable string
 */
export function formatRuleCheckResult(result: RuleCheckResult, funcName: string): string {
  if (result.passed) {
    return `✓ ${funcName}: ${result.totalChecks} partials verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${funcName}: ${result.errors.length}/${result.totalChecks} partials FAILED`
  ];

  for (const e of result.errors) {
    lines.push(
      `  ${e.mode} ∂out${e.output + 1}/∂in${e.input + 1}: analytical=${e.analytical.toFixed(6)}, ` +
      `numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`
    );
  }

  return lines.join('\n');
}

function toReal(value: Differential, what: string): number {
  const concrete = extern(value);
  if (typeof concrete !== 'number') {
    throw new Error(`Expected a real scalar for ${what}`);
  }
  return concrete;
}

/**
 * Outputs of a primal call: a number, or an array of numbers for several outputs
 */
function primalOutputs(value: unknown): number[] {
  if (typeof value === 'number') return [value];
  if (Array.isArray(value) && value.every((v): v is number => typeof v === 'number')) {
    return value;
  }
  throw new Error('Rule checking needs real scalar outputs');
}

/**
 * Rule checker for functions of real scalars
 */
export class RuleChecker {
  private registry: RuleRegistry;
  private epsilon: number;
  private tolerance: number;
  private verbose: boolean;

  constructor(options: RuleCheckerOptions = {}) {
    const {
      registry = defaultRuleRegistry,
      epsilon = 1e-5,
      tolerance = 1e-4,
      verbose = false
    } = options;

    this.registry = registry;
    this.epsilon = epsilon;
    this.tolerance = tolerance;
    this.verbose = verbose;
  }

  /**
   * Check both rules of `f` at a test point
   */
  check(f: PrimalFunction, testPoint: readonly number[]): RuleCheckResult {
    const name = f.name || '<anonymous>';
    const jacobian = this.numericalJacobian(f, testPoint);
    const errors: RuleCheckError[] = [];
    let totalChecks = 0;

    const record = (mode: RuleMode, output: number, input: number, analytical: number) => {
      totalChecks++;
      const numerical = jacobian[output][input];
      const error = Math.abs(analytical - numerical);
      const relativeError = Math.abs(error / (numerical + 1e-10));

      if (error > this.tolerance && relativeError > this.tolerance) {
        errors.push({ mode, input, output, analytical, numerical, error, relativeError });
      }
    };

    const forward = this.registry.frule(f, ...testPoint);
    if (!forward) {
      throw new Error(`No frule registered for ${name} at this test point`);
    }
    const [, pushforward] = forward;

    // One seed per input, One at the input being checked and Zero elsewhere
    for (let input = 0; input < testPoint.length; input++) {
      const seeds = testPoint.map((_, k) => (k === input ? one() : zero()));
      const tangents = pushforward.propagate(NO_FIELDS, ...seeds);
      if (tangents.length !== jacobian.length) {
        throw new Error(`${name}_pushforward returned ${tangents.length} tangent(s) for ${jacobian.length} output(s)`);
      }
      tangents.forEach((t, output) => record('frule', output, input, toReal(t, `${name} tangent`)));
    }

    const reverse = this.registry.rrule(f, ...testPoint);
    if (!reverse) {
      throw new Error(`No rrule registered for ${name} at this test point`);
    }
    const [, pullback] = reverse;

    for (let output = 0; output < jacobian.length; output++) {
      const seeds = jacobian.map((_, k) => (k === output ? one() : zero()));
      const [, ...cotangents] = pullback.propagate(...seeds);
      cotangents.forEach((c, input) => record('rrule', output, input, toReal(c, `${name} cotangent`)));
    }

    const maxError = errors.length > 0 ? Math.max(...errors.map(e => e.error)) : 0;
    const meanError = errors.length > 0
      ? errors.reduce((acc, e) => acc + e.error, 0) / errors.length
      : 0;

    if (this.verbose) {
      console.log(`[check] ${name}: ${totalChecks} partials, ${errors.length} failed`);
    }

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError,
      totalChecks
    };
  }

  /**
   * Central differences: J[output][input] = (f(x + h) - f(x - h)) / 2h
   */
  private numericalJacobian(f: PrimalFunction, testPoint: readonly number[]): number[][] {
    const outputs = primalOutputs(Reflect.apply(f, undefined, testPoint)).length;
    const jacobian: number[][] = Array.from({ length: outputs }, () => new Array<number>(testPoint.length).fill(0));

    for (let input = 0; input < testPoint.length; input++) {
      const plus = testPoint.map((x, k) => (k === input ? x + this.epsilon : x));
      const minus = testPoint.map((x, k) => (k === input ? x - this.epsilon : x));
      const fPlus = primalOutputs(Reflect.apply(f, undefined, plus));
      const fMinus = primalOutputs(Reflect.apply(f, undefined, minus));

      for (let output = 0; output < outputs; output++) {
        jacobian[output][input] = (fPlus[output] - fMinus[output]) / (2 * this.epsilon);
      }
    }

    return jacobian;
  }
}
