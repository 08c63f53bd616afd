import { describe, it, expect, vi, afterEach } from 'vitest';
import { Complex } from '../../src/core/Complex.js';
import { NO_FIELDS, dne, one } from '../../src/core/Differentials.js';
import { AmbiguousRuleError } from '../../src/core/Errors.js';
import { DNERule, Rule } from '../../src/rules/Propagators.js';
import {
  Keywords,
  RuleImplementation,
  RuleRegistry,
  frule,
  kwargs,
  rrule
} from '../../src/rules/RuleRegistry.js';
import { scalarRule } from '../../src/rules/ScalarRule.js';
import { expectRule } from '../helpers.js';

function tagged(label: string): RuleImplementation {
  return args => [label, new Rule(() => [args.length])];
}

function labelOf(result: ReturnType<RuleRegistry['frule']>): unknown {
  return expectRule(result)[0];
}

describe('Rule lookup', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return undefined before any rule is declared', () => {
    function untouched(x: number): number {
      return x;
    }

    expect(frule(untouched, 1)).toBeUndefined();
    expect(rrule(untouched, 1)).toBeUndefined();
    expect(frule(untouched, 1, kwargs({ iscool: true }))).toBeUndefined();
    expect(rrule(untouched, 1, kwargs({ iscool: true }))).toBeUndefined();
  });

  it('should return undefined when no signature accepts the arguments', () => {
    const registry = new RuleRegistry();
    function square(x: number): number {
      return x * x;
    }
    registry.defineFrule(square, ['real'], tagged('real'));

    expect(registry.frule(square, new Complex(1, 1))).toBeUndefined();
    expect(registry.frule(square, 1, 2)).toBeUndefined();
    expect(registry.rrule(square, 1)).toBeUndefined();
  });

  it('should select between disjoint constraints', () => {
    const registry = new RuleRegistry();
    function scale(x: number | number[]): number | number[] {
      return typeof x === 'number' ? 2 * x : x.map(v => 2 * v);
    }

    scalarRule({ f: scale, partials: [() => 2] }, registry);
    scalarRule({ f: scale, argTypes: ['array'], partials: [() => 3] }, registry);

    expect(registry.methods('frule', scale)).toEqual(['scale(number)', 'scale(array)']);
    expect(registry.methods('rrule', scale)).toEqual(['scale(number)', 'scale(array)']);

    const [y, pushforward] = expectRule(registry.frule(scale, 1));
    expect(y).toBe(2);
    expect(pushforward.propagate(NO_FIELDS, 1)).toEqual([2]);

    const [ys, arrayPushforward] = expectRule(registry.frule(scale, [1, 2]));
    expect(ys).toEqual([2, 4]);
    expect(arrayPushforward.propagate(NO_FIELDS, 1)).toEqual([3]);

    const [, pullback] = expectRule(registry.rrule(scale, 1));
    const cotangents = pullback.propagate(1);
    expect(cotangents).toEqual([NO_FIELDS, 2]);
    expect(cotangents[0]).toBe(NO_FIELDS);
  });

  it('should prefer the most specific signature', () => {
    const registry = new RuleRegistry();
    function f(x: number): number {
      return x;
    }
    registry.defineFrule(f, ['number'], tagged('number'));
    registry.defineFrule(f, ['real'], tagged('real'));
    registry.defineFrule(f, ['any'], tagged('any'));

    expect(labelOf(registry.frule(f, 1))).toBe('real');
    expect(labelOf(registry.frule(f, new Complex(0, 1)))).toBe('number');
    expect(labelOf(registry.frule(f, 'x'))).toBe('any');
  });

  it('should throw when several rules are equally specific', () => {
    const registry = new RuleRegistry();
    function f(x: number, y: number): number {
      return x + y;
    }
    registry.defineFrule(f, ['real', 'number'], tagged('first'));
    registry.defineFrule(f, ['number', 'real'], tagged('second'));

    expect(() => registry.frule(f, 1, 2)).toThrow(AmbiguousRuleError);
    expect(() => registry.frule(f, 1, 2)).toThrow(
      "Ambiguous frule for 'f': 2 equally specific rules match (f(real, number) | f(number, real))"
    );
    expect(labelOf(registry.frule(f, 1, new Complex(0, 1)))).toBe('first');
    expect(labelOf(registry.frule(f, new Complex(0, 1), 1))).toBe('second');
  });

  it('should resolve an ambiguity once a more specific rule is added', () => {
    const registry = new RuleRegistry();
    function f(x: number, y: number): number {
      return x + y;
    }
    registry.defineFrule(f, ['real', 'number'], tagged('first'));
    registry.defineFrule(f, ['number', 'real'], tagged('second'));
    registry.defineFrule(f, ['real', 'real'], tagged('both'));

    expect(labelOf(registry.frule(f, 1, 2))).toBe('both');
  });

  it('should replace a rule declared again with the same signature', () => {
    const registry = new RuleRegistry();
    function f(x: number): number {
      return x;
    }
    registry.defineFrule(f, ['real'], tagged('old'));
    registry.defineFrule(f, ['real'], tagged('new'));

    expect(registry.methods('frule', f)).toEqual(['f(real)']);
    expect(labelOf(registry.frule(f, 1))).toBe('new');
  });

  it('should pass keywords to the rule but not use them for selection', () => {
    const registry = new RuleRegistry();
    const seen: Keywords[] = [];
    function f(x: number): number {
      return x;
    }
    registry.defineRrule(f, ['real'], (args, keywords) => {
      seen.push(keywords);
      return [args[0], new Rule(() => [NO_FIELDS, dne()])];
    });

    const [, pullback] = expectRule(registry.rrule(f, 3, kwargs({ iscool: true })));

    expect(pullback.propagate(one())).toEqual([NO_FIELDS, dne()]);
    expect(seen).toHaveLength(1);
    expect(seen[0].get('iscool')).toBe(true);
    expect(seen[0].size).toBe(1);

    registry.rrule(f, 3);
    expect(seen[1].size).toBe(0);
  });

  it('should accept DNERule as a propagator result', () => {
    const registry = new RuleRegistry();
    function index(i: number): number {
      return i;
    }
    const propagator = new Rule(() => [new DNERule().propagate()]);
    registry.defineFrule(index, ['real'], () => [0, propagator]);

    const [, pushforward] = expectRule(registry.frule(index, 4));
    expect(pushforward.propagate(NO_FIELDS, 1)).toEqual([dne()]);
  });

  it('should report which functions have rules', () => {
    const registry = new RuleRegistry();
    function f(x: number): number {
      return x;
    }
    registry.defineFrule(f, ['real'], tagged('real'));

    expect(registry.hasRule('frule', f)).toBe(true);
    expect(registry.hasRule('frule', f, ['real'])).toBe(true);
    expect(registry.hasRule('frule', f, ['number'])).toBe(false);
    expect(registry.hasRule('rrule', f)).toBe(false);
    expect(registry.methods('rrule', f)).toEqual([]);
  });

  it('should log definitions and misses when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const registry = new RuleRegistry({ verbose: true });
    function square(x: number): number {
      return x * x;
    }

    registry.defineFrule(square, ['real'], tagged('real'));
    registry.defineFrule(square, ['real'], tagged('real'));
    registry.frule(square, 'x');

    expect(log.mock.calls).toEqual([
      ['[rules] Defined frule for square(real)'],
      ['[rules] Replaced frule for square(real)'],
      ['[rules] No frule for square with 1 argument(s)']
    ]);
  });

  it('should stay quiet by default', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const registry = new RuleRegistry();
    function square(x: number): number {
      return x * x;
    }

    registry.defineFrule(square, ['real'], tagged('real'));
    registry.frule(square, 'x');

    expect(log).not.toHaveBeenCalled();
  });
});
