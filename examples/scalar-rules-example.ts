/**
 * Example: declaring scalar rules and driving them by hand, the way a
 * forward-mode and a reverse-mode engine would
 */

import {
  NO_FIELDS,
  RuleChecker,
  extern,
  formatRuleCheckResult,
  frule,
  one,
  rrule,
  scalarRule,
  zero
} from '../src/index.js';

function hypot(x: number, y: number): number {
  return Math.sqrt(x * x + y * y);
}

function polar(x: number, y: number): [number, number] {
  return [Math.sqrt(x * x + y * y), Math.atan2(y, x)];
}

scalarRule({
  f: hypot,
  partials: [[({ args: [x], omega }) => x / omega, ({ args: [, y], omega }) => y / omega]]
});

scalarRule({
  f: polar,
  setup: (args: [number, number]) => ({ r2: args[0] * args[0] + args[1] * args[1] }),
  partials: [
    [({ args: [x], omega: [r] }) => x / r, ({ args: [, y], omega: [r] }) => y / r],
    [({ args: [, y], setup }) => -y / setup.r2, ({ args: [x], setup }) => x / setup.r2]
  ]
});

console.log('=== hypot(3, 4) ===\n');

const forward = frule(hypot, 3, 4);
if (forward) {
  const [y, pushforward] = forward;
  console.log(`primal:        ${String(y)}`);
  console.log(`∂/∂x (frule):  ${String(extern(pushforward.propagate(NO_FIELDS, one(), zero())[0]))}`);
  console.log(`∂/∂y (frule):  ${String(extern(pushforward.propagate(NO_FIELDS, zero(), one())[0]))}`);
}

const reverse = rrule(hypot, 3, 4);
if (reverse) {
  const [, pullback] = reverse;
  const [, dx, dy] = pullback.propagate(one());
  console.log(`gradient (rrule): [${String(extern(dx))}, ${String(extern(dy))}]`);
}

console.log('\n=== Numerical verification ===\n');

const checker = new RuleChecker();
console.log(formatRuleCheckResult(checker.check(hypot, [3, 4]), 'hypot'));
console.log(formatRuleCheckResult(checker.check(polar, [1, 2]), 'polar'));
